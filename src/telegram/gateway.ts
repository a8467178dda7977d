/**
 * Telegram gateway
 * The only surface the collectors see. Implementations return
 * platform-neutral records and throw errors from lib/errors.
 */

import type { JsonValue } from '../lib/json.js';
import type { ChannelFlag, ChannelLocation, ReactionCount, UserFlag } from '../types/index.js';

export type EntityKey =
    | { kind: 'handle'; handle: string }
    | { kind: 'id'; id: string }
    | { kind: 'internal_channel'; internalId: number };

export type PresenceStatus =
    | { kind: 'empty' }
    | { kind: 'online' }
    | { kind: 'offline'; wasOnline: Date | null }
    | { kind: 'recently' }
    | { kind: 'last_week' }
    | { kind: 'last_month' }
    | { kind: 'unrecognized'; name: string };

export interface UserRecord {
    kind: 'user';
    id: string;
    firstName: string | null;
    lastName: string | null;
    username: string | null;
    status: PresenceStatus | null;
    flags: Record<UserFlag, boolean>;
    botInfoVersion: number | null;
    restrictionReason: string | null;
    emojiStatus: { until: Date | null } | null;
    hasVideoAvatar: boolean;
}

export interface ChannelRecord {
    kind: 'channel';
    id: string;
    title: string;
    username: string | null;
    date: Date | null;
    flags: Record<ChannelFlag, boolean>;
    defaultBannedRights: string[];
}

export interface GroupRecord {
    kind: 'group';
    id: string;
    title: string | null;
    date: Date | null;
    participantsCount: number | null;
}

export type ResolvedTarget = UserRecord | ChannelRecord | GroupRecord;

export interface UserFullRecord {
    about: string | null;
    commonChatsCount: number | null;
}

export interface ChannelFullRecord {
    about: string | null;
    participantsCount: number | null;
    adminsCount: number | null;
    kickedCount: number | null;
    bannedCount: number | null;
    onlineCount: number | null;
    slowmodeSeconds: number | null;
    linkedChatId: string | null;
    location: ChannelLocation | null;
    stickerSet: string | null;
    themeEmoticon: string | null;
}

export interface ProfilePhoto {
    id: string;
    date: Date | null;
}

/** Platform-declared annotation on message text; offsets are UTF-16 units */
export type RichEntity =
    | { type: 'text_url'; offset: number; length: number; url: string }
    | { type: 'mention'; offset: number; length: number }
    | { type: 'hashtag'; offset: number; length: number };

export interface DocumentAttributeRecord {
    type: string;
    fileName: string | null;
}

export interface MediaRecord {
    kind: string;
    document: {
        mimeType: string | null;
        size: number | null;
        attributes: DocumentAttributeRecord[];
    } | null;
    hasPhoto: boolean;
}

export interface MessageRecord {
    id: number;
    date: Date | null;
    editDate: Date | null;
    text: string;
    views: number | null;
    forwards: number | null;
    replies: number | null;
    reactions: ReactionCount[];
    forwardedFrom: string | null;
    viaBotId: string | null;
    replyToMessageId: number | null;
    richEntities: RichEntity[];
    media: MediaRecord | null;
    raw: JsonValue;
}

export interface TelegramGateway {
    resolve(key: EntityKey): Promise<ResolvedTarget>;
    getFullUser(user: UserRecord): Promise<UserFullRecord>;
    getFullChannel(channel: ChannelRecord): Promise<ChannelFullRecord>;
    /** Newest first, at most `limit` photos */
    iterProfilePhotos(target: ResolvedTarget, limit: number): AsyncIterable<ProfilePhoto>;
    /** Resolves to the written path, or null when the target has no photo */
    downloadProfilePhoto(target: ResolvedTarget, filePath: string): Promise<string | null>;
    downloadPhoto(photo: ProfilePhoto, filePath: string): Promise<string | null>;
    getMessage(target: ResolvedTarget, messageId: number): Promise<MessageRecord | null>;
    importContact(phone: string): Promise<UserRecord | null>;
    deleteContact(user: UserRecord): Promise<void>;
    disconnect(): Promise<void>;
}
