/**
 * Channel OSINT Module
 * Broadcast channels and supergroups: description entities,
 * membership counters, moderation flags, linked chat and location.
 */

import { logger } from '../lib/index.js';
import type { ChannelRecord, TelegramGateway } from '../telegram/gateway.js';
import type { ChannelInfo, CollectOptions } from '../types/index.js';
import { describeDownloadFailure, downloadPhotos } from './photos.js';
import { extractEntities } from './text-entities.js';
import { formatTimestamp } from './timestamp.js';

export async function collectChannelInfo(
    gateway: TelegramGateway,
    channel: ChannelRecord,
    options: CollectOptions
): Promise<ChannelInfo> {
    logger.info(`Channel lookup: ${channel.id}`);

    const full = await gateway.getFullChannel(channel);
    const download = options.photos ? await downloadPhotos(gateway, channel, options) : null;

    return {
        kind: 'channel',
        type: channel.flags.megagroup ? 'supergroup' : 'channel',
        id: channel.id,
        title: channel.title,
        username: channel.username,
        created: formatTimestamp(channel.date, options.timeZone),
        about: full.about,
        aboutEntities: extractEntities(full.about),
        flags: { ...channel.flags },
        participantsCount: full.participantsCount,
        adminsCount: full.adminsCount,
        onlineCount: full.onlineCount,
        bannedCount: full.bannedCount,
        kickedCount: full.kickedCount,
        slowmodeSeconds: full.slowmodeSeconds,
        defaultBannedRights: [...channel.defaultBannedRights],
        linkedChatId: full.linkedChatId,
        stickerSet: full.stickerSet,
        location: full.location,
        themeEmoticon: full.themeEmoticon,
        downloadedPhotos: download?.paths ?? [],
        ...(download?.error ? { downloadError: describeDownloadFailure(download.error) } : {}),
    };
}
