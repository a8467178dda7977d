import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const stackStr = stack ? `\n${stack}` : '';
    return `${timestamp} [${level}]: ${message}${metaStr}${stackStr}`;
});

// stdout carries the report; every log level goes to stderr.
const STDERR_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function consoleTransport(color: boolean) {
    const format = color
        ? combine(colorize({ all: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), logFormat)
        : combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), logFormat);
    return new winston.transports.Console({ stderrLevels: STDERR_LEVELS, format });
}

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL ?? 'warn',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [consoleTransport(true)],
});

export function configureLogger(options: { level: string; color: boolean }): void {
    logger.level = options.level;
    logger.clear();
    logger.add(consoleTransport(options.color));
}
