import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { AccessDeniedError, PlatformError, RateLimitedError } from '../lib/errors.js';
import { FakeGateway, userRecord } from '../test-support/fake-gateway.js';
import type { CollectOptions } from '../types/index.js';
import { collectUserInfo } from './user-osint.js';

const options: CollectOptions = {
    timeZone: 'UTC',
    photos: false,
    limitPhotos: 10,
    outputDir: 'out',
    photoEnumerationCap: 1_000_000,
};

const user = userRecord({
    lastName: 'Lovelace',
    status: { kind: 'offline', wasOnline: new Date('2024-03-05T14:07:09Z') },
    flags: { premium: true, verified: false, bot: true, scam: false, fake: false, support: false },
    emojiStatus: { until: new Date('2025-01-01T00:00:00Z') },
});

const history = [
    { id: 'a', date: new Date('2024-02-01T10:00:00Z') },
    { id: 'b', date: new Date('2023-12-24T18:45:30Z') },
];

describe('collectUserInfo', () => {
    it('builds the full profile', async () => {
        const gateway = new FakeGateway({
            fullUsers: { '1001': { about: 'Builder of engines. https://ada.dev @babbage_c #maths', commonChatsCount: 3 } },
            photos: { '1001': history },
        });

        const info = await collectUserInfo(gateway, user, options);

        expect(info).toEqual({
            kind: 'user',
            id: '1001',
            firstName: 'Ada',
            lastName: 'Lovelace',
            username: 'ada_lovelace',
            lastSeen: '2024-03-05 14:07:09 UTC',
            bio: 'Builder of engines. https://ada.dev @babbage_c #maths',
            bioEntities: { urls: ['https://ada.dev'], mentions: ['babbage_c'], hashtags: ['maths'] },
            flags: { premium: true, verified: false, bot: true, scam: false, fake: false, support: false },
            emojiStatus: true,
            emojiStatusUntil: '2025-01-01 00:00:00 UTC',
            botInfoVersion: null,
            restrictionReason: null,
            hasVideoAvatar: false,
            commonChatsCount: 3,
            profilePhotosCount: 2,
            downloadedPhotos: [],
        });
        expect('downloadError' in info).toBe(false);
    });

    it('does not download without the photos option', async () => {
        const gateway = new FakeGateway({ photos: { '1001': history } });
        await collectUserInfo(gateway, user, options);
        expect(gateway.calls).toEqual(['getFullUser:1001', 'iterProfilePhotos:1001/1000000']);
    });

    it('reports an unknown photo count when enumeration is refused', async () => {
        const gateway = new FakeGateway({ failures: { iterProfilePhotos: new PlatformError('PHOTO_INVALID') } });
        const info = await collectUserInfo(gateway, user, options);
        expect(info.profilePhotosCount).toBeNull();
        expect(info.lastSeen).toBe('2024-03-05 14:07:09 UTC');
    });

    it('keeps the profile when a download is rate limited', async () => {
        const gateway = new FakeGateway({
            fullUsers: { '1001': { about: 'Engines #maths', commonChatsCount: null } },
            photos: { '1001': history },
            failPhotoDownload: { index: 0, error: new RateLimitedError(42) },
        });

        const info = await collectUserInfo(gateway, user, { ...options, photos: true });

        expect(info.downloadedPhotos).toEqual([join('out', '1001.jpg')]);
        expect(info.downloadError).toBe('Rate limited, wait 42s');
        expect(info.bio).toBe('Engines #maths');
        expect(info.bioEntities.hashtags).toEqual(['maths']);
    });

    it('keeps the profile when the photo cannot be written', async () => {
        const gateway = new FakeGateway({
            fullUsers: { '1001': { about: 'hi', commonChatsCount: null } },
            failures: { downloadProfilePhoto: new Error("ENOENT: no such file or directory, open 'nope/1001.jpg'") },
        });

        const info = await collectUserInfo(gateway, user, { ...options, photos: true });

        expect(info.bio).toBe('hi');
        expect(info.downloadedPhotos).toEqual([]);
        expect(info.downloadError).toBe("ENOENT: no such file or directory, open 'nope/1001.jpg'");
    });

    it('fails when the full profile is denied', async () => {
        const gateway = new FakeGateway({ failures: { getFullUser: new AccessDeniedError('USER_PRIVACY_RESTRICTED') } });
        await expect(collectUserInfo(gateway, user, options)).rejects.toBeInstanceOf(AccessDeniedError);
    });

    it('has no emoji status fields for a plain user', async () => {
        const info = await collectUserInfo(new FakeGateway(), userRecord(), options);
        expect(info.emojiStatus).toBe(false);
        expect(info.emojiStatusUntil).toBeNull();
        expect(info.lastSeen).toBe('recently');
        expect(info.bio).toBeNull();
        expect(info.bioEntities).toEqual({ urls: [], mentions: [], hashtags: [] });
    });
});
