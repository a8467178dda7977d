import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from './lib/errors.js';
import { assertTimeZone } from './modules/timestamp.js';

const envSchema = z.object({
    // Telegram application credentials (https://my.telegram.org/apps)
    TG_API_ID: z.coerce.number().int().positive('TG_API_ID must be a positive integer'),
    TG_API_HASH: z.string().min(1, 'Telegram API hash is required'),

    // Login; prompted for interactively when missing
    TG_PHONE: z.string().optional(),
    TG_PASSWORD: z.string().optional(),
    TG_SESSION: z.string().min(1).default('session_name'),

    // Output; the zone is checked by resolveTimeZone
    TZ: z.string().min(1).default('Europe/Paris'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),

    // Upper bound when counting a profile's photo history
    PHOTO_ENUMERATION_CAP: z.coerce.number().int().positive().default(1_000_000),

    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type Config = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
    const parseResult = envSchema.safeParse(env);

    if (!parseResult.success) {
        const details = parseResult.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid environment variables: ${details}`);
    }

    return parseResult.data;
}

/**
 * `--tz` wins over `TZ`. Only the zone that will be used is validated.
 */
export function resolveTimeZone(config: Config, override?: string): string {
    const timeZone = override ?? config.TZ;
    assertTimeZone(timeZone);
    return timeZone;
}

export function loadConfig(): Config {
    dotenv.config();
    return parseConfig(process.env);
}
