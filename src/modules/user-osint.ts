/**
 * User OSINT Module
 * - Full profile and biography entities
 * - Presence, reputation flags, photo history size
 * - Optional profile photo download
 */

import { logger } from '../lib/index.js';
import type { TelegramGateway, UserRecord } from '../telegram/gateway.js';
import type { CollectOptions, UserInfo } from '../types/index.js';
import { countProfilePhotos, describeDownloadFailure, downloadPhotos } from './photos.js';
import { describePresence } from './presence.js';
import { extractEntities } from './text-entities.js';
import { formatTimestamp } from './timestamp.js';

export async function collectUserInfo(
    gateway: TelegramGateway,
    user: UserRecord,
    options: CollectOptions
): Promise<UserInfo> {
    logger.info(`User lookup: ${user.id}`);

    const full = await gateway.getFullUser(user);
    const profilePhotosCount = await countProfilePhotos(gateway, user, options.photoEnumerationCap);
    const download = options.photos ? await downloadPhotos(gateway, user, options) : null;

    return {
        kind: 'user',
        id: user.id,
        firstName: user.firstName,
        lastName: user.lastName,
        username: user.username,
        lastSeen: describePresence(user.status, options.timeZone),
        bio: full.about,
        bioEntities: extractEntities(full.about),
        flags: { ...user.flags },
        emojiStatus: user.emojiStatus !== null,
        emojiStatusUntil: formatTimestamp(user.emojiStatus?.until, options.timeZone),
        botInfoVersion: user.botInfoVersion,
        restrictionReason: user.restrictionReason,
        hasVideoAvatar: user.hasVideoAvatar,
        commonChatsCount: full.commonChatsCount,
        profilePhotosCount,
        downloadedPhotos: download?.paths ?? [],
        ...(download?.error ? { downloadError: describeDownloadFailure(download.error) } : {}),
    };
}
