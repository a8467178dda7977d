/**
 * Message OSINT Module
 * - Parses public message links (t.me/<channel>/<id>, t.me/c/<internal>/<id>)
 * - Merges pattern-matched and platform-declared text entities
 * - Describes attached media
 */

import { logger, MessageUrlFormatError, TargetNotFoundError } from '../lib/index.js';
import type { EntityKey, MediaRecord, MessageRecord, ResolvedTarget, TelegramGateway } from '../telegram/gateway.js';
import type { CollectOptions, ExtractedEntities, MediaDescriptor, MessageInfo, MessageLocator } from '../types/index.js';
import { extractEntities } from './text-entities.js';
import { formatTimestamp } from './timestamp.js';

const INTEGER_PATTERN = /^\d+$/;

function parseInteger(value: string, what: string): number {
    const parsed = Number(value);
    if (!INTEGER_PATTERN.test(value) || !Number.isSafeInteger(parsed)) {
        throw new MessageUrlFormatError(`${what} must be an integer, got "${value}".`);
    }
    return parsed;
}

export function parseMessageUrl(url: string): MessageLocator {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        throw new MessageUrlFormatError(`Not a valid URL: "${url}".`);
    }

    const parts = pathname.split('/').filter((part) => part.length > 0);
    if (parts.length < 2) {
        throw new MessageUrlFormatError(
            'Unsupported URL. Expected /<channel>/<message_id> or /c/<internal_id>/<message_id>.'
        );
    }

    if (parts[0] === 'c') {
        if (parts.length < 3) {
            throw new MessageUrlFormatError('Unsupported /c/ URL. Expected /c/<internal_id>/<message_id>.');
        }
        return {
            channel: { kind: 'internal', internalId: parseInteger(parts[1], 'Internal chat id') },
            messageId: parseInteger(parts[2], 'Message id'),
        };
    }

    return {
        channel: { kind: 'handle', handle: parts[0] },
        messageId: parseInteger(parts[1], 'Message id'),
    };
}

function channelKey(locator: MessageLocator): EntityKey {
    return locator.channel.kind === 'handle'
        ? { kind: 'handle', handle: locator.channel.handle }
        : { kind: 'internal_channel', internalId: locator.channel.internalId };
}

function channelLabel(target: ResolvedTarget): string {
    if (target.kind === 'group') return target.id;
    return target.username ?? target.id;
}

function mergeSorted(...lists: string[][]): string[] {
    return [...new Set(lists.flat())].sort();
}

/**
 * Entities the platform declared on the message text. Mentions and hashtags
 * are sliced out of the text by offset/length.
 */
function richEntities(record: MessageRecord): ExtractedEntities {
    const found: ExtractedEntities = { urls: [], mentions: [], hashtags: [] };
    for (const entity of record.richEntities) {
        if (entity.type === 'text_url') {
            found.urls.push(entity.url);
            continue;
        }
        if (!record.text) continue;
        const slice = record.text.slice(entity.offset, entity.offset + entity.length);
        if (entity.type === 'mention') {
            found.mentions.push(slice.replace(/^@+/, ''));
        } else {
            found.hashtags.push(slice.replace(/^#+/, ''));
        }
    }
    return found;
}

function describeMedia(media: MediaRecord | null): MediaDescriptor | null {
    if (!media) {
        return null;
    }
    const descriptor: MediaDescriptor = { kind: media.kind };
    if (media.document) {
        descriptor.mimeType = media.document.mimeType;
        descriptor.size = media.document.size;
        descriptor.fileName = media.document.attributes.find((attribute) => attribute.fileName !== null)?.fileName ?? null;
    }
    if (media.hasPhoto) {
        descriptor.hasPhoto = true;
    }
    return descriptor;
}

export async function collectMessageInfo(
    gateway: TelegramGateway,
    link: string | MessageLocator,
    options: Pick<CollectOptions, 'timeZone'>
): Promise<MessageInfo> {
    const locator = typeof link === 'string' ? parseMessageUrl(link) : link;
    logger.info(`Message lookup: ${locator.messageId}`, { channel: locator.channel });

    const target = await gateway.resolve(channelKey(locator));
    const record = await gateway.getMessage(target, locator.messageId);
    if (!record) {
        throw new TargetNotFoundError(`Message ${locator.messageId} not found.`);
    }

    const plain = extractEntities(record.text);
    const rich = richEntities(record);

    return {
        kind: 'message',
        channel: channelLabel(target),
        id: record.id,
        date: formatTimestamp(record.date, options.timeZone),
        editDate: formatTimestamp(record.editDate, options.timeZone),
        text: record.text,
        views: record.views,
        forwards: record.forwards,
        replies: record.replies,
        reactions: record.reactions.map((reaction) => ({ ...reaction })),
        forwardedFrom: record.forwardedFrom,
        viaBotId: record.viaBotId,
        replyToMessageId: record.replyToMessageId,
        entities: {
            urls: mergeSorted(plain.urls, rich.urls),
            mentions: mergeSorted(plain.mentions, rich.mentions),
            hashtags: mergeSorted(plain.hashtags, rich.hashtags),
        },
        media: describeMedia(record.media),
        raw: record.raw,
    };
}
