/**
 * Parses the command line, opens the Telegram session and runs one
 * investigation. The exit code reflects how it ended.
 */

import { resolve } from 'node:path';
import { buildProgram, resolveSelector, type CliOptions } from './cli.js';
import { loadConfig, resolveTimeZone } from './config.js';
import { configureLogger, describeError, EXIT_CODES, exitCodeFor, logger } from './lib/index.js';
import type { ExitCode } from './lib/index.js';
import { runInvestigation, type InvestigationRequest } from './modules/dispatcher.js';
import { createOutputStyle } from './presenters/style.js';
import { createTerminalPrompter, openTelegramGateway } from './telegram/session.js';

function writeLine(stream: NodeJS.WriteStream): (text: string) => void {
    return (text) => {
        stream.write(`${text}\n`);
    };
}

export async function main(argv: string[]): Promise<ExitCode> {
    const program = buildProgram();
    program.parse(argv);
    const options = program.opts<CliOptions>();
    const style = createOutputStyle({ color: options.color });
    const writeErr = writeLine(process.stderr);

    let request: InvestigationRequest;
    try {
        const selector = resolveSelector(options);
        const config = loadConfig();
        configureLogger({ level: options.verbose ? 'debug' : config.LOG_LEVEL, color: options.color });

        const timeZone = resolveTimeZone(config, options.tz);

        const session = {
            apiId: config.TG_API_ID,
            apiHash: config.TG_API_HASH,
            sessionName: options.session ?? config.TG_SESSION,
            phone: config.TG_PHONE || undefined,
            password: config.TG_PASSWORD || undefined,
        };

        request = {
            selector,
            options: {
                timeZone,
                photos: options.photos,
                limitPhotos: options.limitPhotos,
                outputDir: resolve(options.outputDir),
                photoEnumerationCap: config.PHOTO_ENUMERATION_CAP,
            },
            json: options.json,
            style,
            openGateway: () => openTelegramGateway(session, createTerminalPrompter()),
            writeOut: writeLine(process.stdout),
            writeErr,
        };
    } catch (error) {
        writeErr(style.error(describeError(error)));
        return exitCodeFor(error);
    }

    return runInvestigation(request);
}

/**
 * Record the outcome as the process exit code. The process is left to end on
 * its own so output piped to another program is fully flushed.
 */
export async function reportExit(outcome: Promise<ExitCode>, target: Pick<NodeJS.Process, 'exitCode'>): Promise<void> {
    try {
        target.exitCode = await outcome;
    } catch (error) {
        logger.error('Fatal error:', error);
        target.exitCode = EXIT_CODES.unexpected;
    }
}
