import winston from 'winston';

export interface OutputStyle {
    label(text: string): string;
    error(text: string): string;
}

const PLAIN: OutputStyle = {
    label: (text) => text,
    error: (text) => text,
};

/**
 * Colour is an explicit value handed to the presenters. It reuses the
 * logger's colorizer; `color: false` yields plain text.
 */
export function createOutputStyle(options: { color: boolean }): OutputStyle {
    if (!options.color) {
        return PLAIN;
    }
    const colorizer = winston.format.colorize({ colors: { label: 'cyan', failure: 'red' } });
    return {
        label: (text) => colorizer.colorize('label', text),
        error: (text) => colorizer.colorize('failure', text),
    };
}
