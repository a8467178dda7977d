/**
 * Error taxonomy
 * Every failure the CLI reports maps to exactly one process exit code.
 */

export const EXIT_CODES = {
    ok: 0,
    configuration: 1,
    notFound: 2,
    accessDenied: 3,
    adminRequired: 4,
    rateLimited: 5,
    platform: 6,
    unexpected: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class ReconError extends Error {
    readonly exitCode: ExitCode;

    constructor(message: string, exitCode: ExitCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.exitCode = exitCode;
    }
}

/**
 * Bad environment, bad CLI usage or an unknown time zone
 */
export class ConfigurationError extends ReconError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, EXIT_CODES.configuration, options);
    }
}

export class TargetNotFoundError extends ReconError {
    constructor(message = 'Target not found.', options?: { cause?: unknown }) {
        super(message, EXIT_CODES.notFound, options);
    }
}

/**
 * Raised while parsing a message link, before anything touches the network
 */
export class MessageUrlFormatError extends ReconError {
    constructor(message: string) {
        super(message, EXIT_CODES.notFound);
    }
}

/**
 * Failure reported by the Telegram API. `rpcName` is the platform's error
 * identifier (CHANNEL_PRIVATE, FLOOD_WAIT, ...).
 */
export class PlatformError extends ReconError {
    readonly rpcName: string;

    constructor(rpcName: string, message?: string, exitCode: ExitCode = EXIT_CODES.platform, options?: { cause?: unknown }) {
        super(message ?? `Telegram RPC error: ${rpcName}`, exitCode, options);
        this.rpcName = rpcName;
    }
}

export class AccessDeniedError extends PlatformError {
    constructor(rpcName: string, options?: { cause?: unknown }) {
        super(rpcName, 'This chat/channel is private or requires membership.', EXIT_CODES.accessDenied, options);
    }
}

export class AdminRequiredError extends PlatformError {
    constructor(rpcName: string, options?: { cause?: unknown }) {
        super(rpcName, 'Admin rights required for this operation.', EXIT_CODES.adminRequired, options);
    }
}

export class RateLimitedError extends PlatformError {
    readonly seconds: number;

    constructor(seconds: number, options?: { cause?: unknown }) {
        super('FLOOD_WAIT', `Rate limited. Retry after ${seconds}s.`, EXIT_CODES.rateLimited, options);
        this.seconds = seconds;
    }
}

export function exitCodeFor(error: unknown): ExitCode {
    return error instanceof ReconError ? error.exitCode : EXIT_CODES.unexpected;
}

/**
 * One-line operator-facing description of a failure
 */
export function describeError(error: unknown): string {
    if (error instanceof ReconError) {
        return error.message;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return `Unexpected error: ${detail}`;
}
