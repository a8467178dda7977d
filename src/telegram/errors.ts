import { errors } from 'telegram';
import {
    AccessDeniedError,
    AdminRequiredError,
    PlatformError,
    RateLimitedError,
    ReconError,
    TargetNotFoundError,
} from '../lib/errors.js';

const NOT_FOUND = new Set(['USERNAME_NOT_OCCUPIED', 'PEER_ID_INVALID', 'CHANNEL_INVALID', 'MSG_ID_INVALID']);
const ACCESS_DENIED = new Set(['CHANNEL_PRIVATE', 'CHANNEL_PUBLIC_GROUP_NA', 'CHAT_FORBIDDEN', 'USER_PRIVACY_RESTRICTED']);

// GramJS raises plain Errors when a string or id cannot be mapped to an entity.
const UNRESOLVED_ENTITY = /cannot find any entity|no user has .* as username|could not find the input entity/i;

/**
 * Map a GramJS failure onto the CLI's error taxonomy. Values that are not
 * platform failures are returned untouched.
 */
export function translatePlatformError(error: unknown): unknown {
    if (error instanceof ReconError) {
        return error;
    }
    if (error instanceof errors.FloodWaitError) {
        return new RateLimitedError(error.seconds, { cause: error });
    }
    if (error instanceof errors.RPCError) {
        const rpcName = error.errorMessage;
        if (rpcName === 'USERNAME_INVALID') {
            return new TargetNotFoundError('Invalid username.', { cause: error });
        }
        if (NOT_FOUND.has(rpcName)) {
            return new TargetNotFoundError(
                rpcName === 'USERNAME_NOT_OCCUPIED' ? 'Username not found.' : 'Target not found.',
                { cause: error }
            );
        }
        if (ACCESS_DENIED.has(rpcName)) {
            return new AccessDeniedError(rpcName, { cause: error });
        }
        if (rpcName === 'CHAT_ADMIN_REQUIRED') {
            return new AdminRequiredError(rpcName, { cause: error });
        }
        return new PlatformError(rpcName, undefined, undefined, { cause: error });
    }
    if (error instanceof Error && UNRESOLVED_ENTITY.test(error.message)) {
        return new TargetNotFoundError('Target not found.', { cause: error });
    }
    return error;
}
