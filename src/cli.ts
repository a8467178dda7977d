/**
 * Command-line surface
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { ConfigurationError } from './lib/errors.js';
import { parseMessageUrl } from './modules/message-osint.js';
import type { TargetSelector } from './types/index.js';

export interface CliOptions {
    username?: string;
    id?: string;
    phone?: string;
    url?: string;
    json: boolean;
    photos: boolean;
    limitPhotos: number;
    tz?: string;
    session?: string;
    outputDir: string;
    color: boolean;
    verbose: boolean;
}

const SELECTORS = ['username', 'id', 'phone', 'url'] as const;

function selectorOption(flags: string, description: string, name: (typeof SELECTORS)[number]): Option {
    return new Option(flags, description).conflicts(SELECTORS.filter((other) => other !== name));
}

export function parseNonNegativeInt(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

export function buildProgram(): Command {
    return new Command()
        .name('tg-recon')
        .description('Telegram OSINT (public access): users, channels, groups and messages')
        .addOption(selectorOption('-u, --username <handle>', 'username, with or without @', 'username'))
        .addOption(selectorOption('-i, --id <id>', 'numeric user, chat or channel id', 'id'))
        .addOption(selectorOption('-p, --phone <number>', 'phone number with country code', 'phone'))
        .addOption(selectorOption('-l, --url <url>', 'public message URL (https://t.me/<channel>/<msg_id>)', 'url'))
        .option('--json', 'output JSON', false)
        .option('--photos', 'download profile photos', false)
        .option('--limit-photos <n>', 'max historical photos to download', parseNonNegativeInt, 10)
        .option('--tz <zone>', 'time zone for dates (default: $TZ or Europe/Paris)')
        .option('--session <name>', 'session name (default: $TG_SESSION or session_name)')
        .option('--output-dir <dir>', 'directory for downloaded photos', '.')
        .option('--no-color', 'disable colored output')
        .option('-v, --verbose', 'debug logging on stderr', false);
}

/**
 * Turn the four mutually exclusive target flags into a selector. Message
 * links are parsed here, before any connection is made.
 */
export function resolveSelector(options: Pick<CliOptions, 'username' | 'id' | 'phone' | 'url'>): TargetSelector {
    const given = SELECTORS.filter((name) => options[name] !== undefined);
    if (given.length !== 1) {
        throw new ConfigurationError('Exactly one of --username, --id, --phone or --url is required.');
    }

    if (options.username !== undefined) {
        const username = options.username.trim().replace(/^@+/, '');
        if (!username) {
            throw new ConfigurationError('Username must not be empty.');
        }
        return { kind: 'username', username };
    }
    if (options.id !== undefined) {
        const id = options.id.trim();
        if (!/^-?\d+$/.test(id)) {
            throw new ConfigurationError(`--id must be an integer, got "${options.id}".`);
        }
        return { kind: 'id', id };
    }
    if (options.phone !== undefined) {
        return { kind: 'phone', phone: options.phone.trim() };
    }
    if (options.url !== undefined) {
        return { kind: 'url', locator: parseMessageUrl(options.url.trim()) };
    }
    throw new ConfigurationError('Exactly one of --username, --id, --phone or --url is required.');
}
