/**
 * GramJS -> neutral record mapping.
 * `classifyEntity` is the single place that decides whether a resolved
 * entity is a user, a channel/supergroup or a basic group.
 */

import { Api } from 'telegram';
import { AccessDeniedError, TargetNotFoundError } from '../lib/errors.js';
import { toJsonValue } from '../lib/json.js';
import type {
    ChannelFullRecord,
    ChannelRecord,
    DocumentAttributeRecord,
    GroupRecord,
    MediaRecord,
    MessageRecord,
    PresenceStatus,
    ResolvedTarget,
    RichEntity,
    UserFullRecord,
    UserRecord,
} from './gateway.js';
import type { ReactionCount } from '../types/index.js';

export type GramEntity = Api.User | Api.Channel | Api.Chat | Api.ChatForbidden;

export interface ClassifiedEntity {
    target: ResolvedTarget;
    entity: GramEntity;
}

export function toDate(seconds: number | null | undefined): Date | null {
    return seconds ? new Date(seconds * 1000) : null;
}

function readNumber(source: object, key: string): number | undefined {
    const value: unknown = Reflect.get(source, key);
    return typeof value === 'number' ? value : undefined;
}

export function toPresenceStatus(status: Api.TypeUserStatus | undefined): PresenceStatus | null {
    if (!status) return null;
    const name = status.className;
    if (status instanceof Api.UserStatusEmpty) return { kind: 'empty' };
    if (status instanceof Api.UserStatusOnline) return { kind: 'online' };
    if (status instanceof Api.UserStatusOffline) return { kind: 'offline', wasOnline: toDate(status.wasOnline) };
    if (status instanceof Api.UserStatusRecently) return { kind: 'recently' };
    if (status instanceof Api.UserStatusLastWeek) return { kind: 'last_week' };
    if (status instanceof Api.UserStatusLastMonth) return { kind: 'last_month' };
    return { kind: 'unrecognized', name };
}

function describeRestrictions(reasons: Api.TypeRestrictionReason[] | undefined): string | null {
    if (!reasons || reasons.length === 0) return null;
    return reasons.map((reason) => `${reason.platform}: ${reason.reason} (${reason.text})`).join('; ');
}

export function toUserRecord(user: Api.User): UserRecord {
    const emojiStatus = user.emojiStatus && !(user.emojiStatus instanceof Api.EmojiStatusEmpty)
        ? { until: toDate(readNumber(user.emojiStatus, 'until')) }
        : null;

    return {
        kind: 'user',
        id: user.id.toString(),
        firstName: user.firstName ?? null,
        lastName: user.lastName ?? null,
        username: user.username ?? null,
        status: toPresenceStatus(user.status),
        flags: {
            premium: Boolean(user.premium),
            verified: Boolean(user.verified),
            bot: Boolean(user.bot),
            scam: Boolean(user.scam),
            fake: Boolean(user.fake),
            support: Boolean(user.support),
        },
        botInfoVersion: user.botInfoVersion ?? null,
        restrictionReason: describeRestrictions(user.restrictionReason),
        emojiStatus,
        hasVideoAvatar: user.photo instanceof Api.UserProfilePhoto && Boolean(user.photo.hasVideo),
    };
}

function bannedRights(rights: Api.TypeChatBannedRights | undefined): string[] {
    if (!rights) return [];
    return Object.entries(rights)
        .filter(([, value]) => value === true)
        .map(([key]) => key);
}

export function toChannelRecord(channel: Api.Channel): ChannelRecord {
    return {
        kind: 'channel',
        id: channel.id.toString(),
        title: channel.title,
        username: channel.username ?? null,
        date: toDate(channel.date),
        flags: {
            verified: Boolean(channel.verified),
            scam: Boolean(channel.scam),
            fake: Boolean(channel.fake),
            restricted: Boolean(channel.restricted),
            forum: Boolean(channel.forum),
            gigagroup: Boolean(channel.gigagroup),
            broadcast: Boolean(channel.broadcast),
            megagroup: Boolean(channel.megagroup),
        },
        defaultBannedRights: bannedRights(channel.defaultBannedRights),
    };
}

export function toGroupRecord(chat: Api.Chat | Api.ChatForbidden): GroupRecord {
    return {
        kind: 'group',
        id: chat.id.toString(),
        title: chat.title,
        date: chat instanceof Api.Chat ? toDate(chat.date) : null,
        participantsCount: chat instanceof Api.Chat ? chat.participantsCount : null,
    };
}

export function classifyEntity(entity: unknown): ClassifiedEntity {
    if (entity instanceof Api.User) {
        return { target: toUserRecord(entity), entity };
    }
    if (entity instanceof Api.Channel) {
        return { target: toChannelRecord(entity), entity };
    }
    if (entity instanceof Api.Chat || entity instanceof Api.ChatForbidden) {
        return { target: toGroupRecord(entity), entity };
    }
    if (entity instanceof Api.ChannelForbidden) {
        throw new AccessDeniedError('CHANNEL_PRIVATE');
    }
    throw new TargetNotFoundError();
}

export function toUserFullRecord(result: Api.users.UserFull): UserFullRecord {
    return {
        about: result.fullUser.about || null,
        commonChatsCount: result.fullUser.commonChatsCount ?? null,
    };
}

export function toChannelFullRecord(full: Api.ChannelFull): ChannelFullRecord {
    const location = full.location instanceof Api.ChannelLocation && full.location.geoPoint instanceof Api.GeoPoint
        ? {
            latitude: full.location.geoPoint.lat,
            longitude: full.location.geoPoint.long,
            address: full.location.address,
        }
        : null;

    return {
        about: full.about || null,
        participantsCount: full.participantsCount ?? null,
        adminsCount: full.adminsCount ?? null,
        kickedCount: full.kickedCount ?? null,
        bannedCount: full.bannedCount ?? null,
        onlineCount: full.onlineCount ?? null,
        slowmodeSeconds: full.slowmodeSeconds ?? null,
        linkedChatId: full.linkedChatId ? full.linkedChatId.toString() : null,
        location,
        stickerSet: full.stickerset instanceof Api.StickerSet ? full.stickerset.shortName : null,
        themeEmoticon: full.themeEmoticon ?? null,
    };
}

function describePeer(peer: Api.TypePeer | undefined): string | null {
    if (peer instanceof Api.PeerUser) return `user ${peer.userId.toString()}`;
    if (peer instanceof Api.PeerChannel) return `channel ${peer.channelId.toString()}`;
    if (peer instanceof Api.PeerChat) return `chat ${peer.chatId.toString()}`;
    return null;
}

function describeForward(header: Api.TypeMessageFwdHeader | undefined): string | null {
    if (!header) return null;
    const origin = header.fromName ?? describePeer(header.fromId) ?? 'hidden';
    return header.channelPost ? `${origin} (post ${header.channelPost})` : origin;
}

function toReactionCount(result: Api.TypeReactionCount): ReactionCount {
    const { reaction } = result;
    const name = reaction.className;
    if (reaction instanceof Api.ReactionEmoji) {
        return { reaction: reaction.emoticon, count: result.count };
    }
    if (reaction instanceof Api.ReactionCustomEmoji) {
        return { reaction: `custom:${reaction.documentId.toString()}`, count: result.count };
    }
    return { reaction: name, count: result.count };
}

function toRichEntities(entity: Api.TypeMessageEntity): RichEntity[] {
    if (entity instanceof Api.MessageEntityTextUrl) {
        return [{ type: 'text_url', offset: entity.offset, length: entity.length, url: entity.url }];
    }
    if (entity instanceof Api.MessageEntityMention) {
        return [{ type: 'mention', offset: entity.offset, length: entity.length }];
    }
    if (entity instanceof Api.MessageEntityHashtag) {
        return [{ type: 'hashtag', offset: entity.offset, length: entity.length }];
    }
    return [];
}

function toDocumentAttribute(attribute: Api.TypeDocumentAttribute): DocumentAttributeRecord {
    return {
        type: attribute.className,
        fileName: attribute instanceof Api.DocumentAttributeFilename ? attribute.fileName : null,
    };
}

export function toMediaRecord(media: Api.TypeMessageMedia | undefined): MediaRecord | null {
    if (!media) return null;
    // MessageMediaDocument -> document
    const kind = media.className.replace(/^MessageMedia/, '').toLowerCase();

    if (media instanceof Api.MessageMediaDocument && media.document instanceof Api.Document) {
        const size = Number(media.document.size.toString());
        return {
            kind,
            document: {
                mimeType: media.document.mimeType || null,
                size: Number.isFinite(size) ? size : null,
                attributes: media.document.attributes.map(toDocumentAttribute),
            },
            hasPhoto: false,
        };
    }
    return {
        kind,
        document: null,
        hasPhoto: media instanceof Api.MessageMediaPhoto && media.photo instanceof Api.Photo,
    };
}

export function toMessageRecord(message: Api.Message): MessageRecord {
    return {
        id: message.id,
        date: toDate(message.date),
        editDate: toDate(message.editDate),
        text: message.message ?? '',
        views: message.views ?? null,
        forwards: message.forwards ?? null,
        replies: message.replies instanceof Api.MessageReplies ? message.replies.replies : null,
        reactions: message.reactions instanceof Api.MessageReactions
            ? message.reactions.results.map(toReactionCount)
            : [],
        forwardedFrom: describeForward(message.fwdFrom),
        viaBotId: message.viaBotId ? message.viaBotId.toString() : null,
        replyToMessageId: message.replyTo instanceof Api.MessageReplyHeader
            ? message.replyTo.replyToMsgId ?? null
            : null,
        richEntities: (message.entities ?? []).flatMap(toRichEntities),
        media: toMediaRecord(message.media),
        raw: toJsonValue(message),
    };
}
