import { logger } from '../lib/index.js';
import type { GroupRecord, TelegramGateway } from '../telegram/gateway.js';
import type { CollectOptions, GroupInfo } from '../types/index.js';
import { downloadPhotos } from './photos.js';
import { formatTimestamp } from './timestamp.js';

/**
 * Basic (non-super) groups expose no full-info record worth fetching.
 */
export async function collectGroupInfo(
    gateway: TelegramGateway,
    group: GroupRecord,
    options: CollectOptions
): Promise<GroupInfo> {
    logger.info(`Group lookup: ${group.id}`);

    const download = options.photos ? await downloadPhotos(gateway, group, options) : null;

    return {
        kind: 'group',
        id: group.id,
        title: group.title,
        created: formatTimestamp(group.date, options.timeZone),
        participantsCount: group.participantsCount,
        downloadedPhotos: download?.paths ?? [],
        ...(download?.error ? { downloadError: download.error.message } : {}),
    };
}
