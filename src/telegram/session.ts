import { createInterface } from 'node:readline/promises';
import { TelegramClient } from 'telegram';
import { Logger, LogLevel } from 'telegram/extensions/Logger.js';
import { StoreSession } from 'telegram/sessions/index.js';
import { logger } from '../lib/index.js';
import { translatePlatformError } from './errors.js';
import { GramjsGateway } from './gramjs-gateway.js';

export interface SessionSettings {
    apiId: number;
    apiHash: string;
    sessionName: string;
    phone?: string;
    password?: string;
}

export interface Prompter {
    ask(question: string): Promise<string>;
    close(): void;
}

/**
 * Interactive login prompts. Questions go to stderr so stdout stays clean.
 */
export function createTerminalPrompter(): Prompter {
    let readline: ReturnType<typeof createInterface> | null = null;
    return {
        async ask(question) {
            readline ??= createInterface({ input: process.stdin, output: process.stderr });
            return (await readline.question(question)).trim();
        },
        close() {
            readline?.close();
            readline = null;
        },
    };
}

/**
 * Connect and authorize. The session file (named after `sessionName`) is
 * reused on later runs, so prompts only appear on the first login.
 */
export async function openTelegramGateway(settings: SessionSettings, prompter: Prompter): Promise<GramjsGateway> {
    const client = new TelegramClient(new StoreSession(settings.sessionName), settings.apiId, settings.apiHash, {
        connectionRetries: 5,
        // GramJS logs to stdout; keep it quiet.
        baseLogger: new Logger(LogLevel.NONE),
    });

    try {
        await client.start({
            phoneNumber: async () => settings.phone ?? prompter.ask('Phone number (international format): '),
            password: async () => settings.password ?? prompter.ask('Enter 2FA password: '),
            phoneCode: async () => prompter.ask('Login code: '),
            onError: async (error) => {
                logger.error(`Telegram login failed: ${error.message}`);
                return true;
            },
        });
    } catch (error) {
        await client.destroy();
        throw translatePlatformError(error);
    } finally {
        prompter.close();
    }

    logger.info(`✅ Connected to Telegram (session "${settings.sessionName}")`);
    return new GramjsGateway(client);
}
