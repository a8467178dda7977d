import { Api, errors } from 'telegram';
import { describe, expect, it } from 'vitest';
import {
    AccessDeniedError,
    AdminRequiredError,
    ConfigurationError,
    PlatformError,
    RateLimitedError,
    TargetNotFoundError,
} from '../lib/errors.js';
import { translatePlatformError } from './errors.js';

function rpcError(name: string, code = 400): errors.RPCError {
    return new errors.RPCError(name, new Api.help.GetConfig(), code);
}

describe('translatePlatformError', () => {
    it('turns flood waits into rate limits', () => {
        const translated = translatePlatformError(
            new errors.FloodWaitError({ request: new Api.help.GetConfig(), capture: 30 })
        );
        expect(translated).toBeInstanceOf(RateLimitedError);
        expect(translated).toHaveProperty('seconds', 30);
    });

    it.each([
        ['CHANNEL_PRIVATE', AccessDeniedError],
        ['CHAT_FORBIDDEN', AccessDeniedError],
        ['USER_PRIVACY_RESTRICTED', AccessDeniedError],
        ['CHAT_ADMIN_REQUIRED', AdminRequiredError],
        ['PEER_ID_INVALID', TargetNotFoundError],
        ['MSG_ID_INVALID', TargetNotFoundError],
    ])('maps %s', (name, expected) => {
        expect(translatePlatformError(rpcError(name))).toBeInstanceOf(expected);
    });

    it('names username failures', () => {
        expect(translatePlatformError(rpcError('USERNAME_NOT_OCCUPIED'))).toHaveProperty('message', 'Username not found.');
        expect(translatePlatformError(rpcError('USERNAME_INVALID'))).toHaveProperty('message', 'Invalid username.');
    });

    it('keeps the rpc name of other platform errors', () => {
        const translated = translatePlatformError(rpcError('PHOTO_INVALID'));
        expect(translated).toBeInstanceOf(PlatformError);
        expect(translated).toHaveProperty('rpcName', 'PHOTO_INVALID');
        expect(translated).toHaveProperty('exitCode', 6);
    });

    it('treats unresolvable entities as not found', () => {
        const translated = translatePlatformError(new Error('Cannot find any entity corresponding to "ghost_user"'));
        expect(translated).toBeInstanceOf(TargetNotFoundError);
    });

    it('passes other values through', () => {
        const known = new ConfigurationError('bad');
        const unknown = new Error('boom');
        expect(translatePlatformError(known)).toBe(known);
        expect(translatePlatformError(unknown)).toBe(unknown);
    });
});
