/**
 * tg-recon Type Definitions
 * Records produced by the collectors and consumed by the presenters
 */

import type { JsonValue } from '../lib/json.js';

export const USER_FLAGS = ['premium', 'verified', 'bot', 'scam', 'fake', 'support'] as const;
export type UserFlag = (typeof USER_FLAGS)[number];

export const CHANNEL_FLAGS = [
    'verified',
    'scam',
    'fake',
    'restricted',
    'forum',
    'gigagroup',
    'broadcast',
    'megagroup',
] as const;
export type ChannelFlag = (typeof CHANNEL_FLAGS)[number];

export interface ExtractedEntities {
    urls: string[];
    mentions: string[];
    hashtags: string[];
}

export interface UserInfo {
    kind: 'user';
    id: string;
    firstName: string | null;
    lastName: string | null;
    username: string | null;
    lastSeen: string;
    bio: string | null;
    bioEntities: ExtractedEntities;
    flags: Record<UserFlag, boolean>;
    emojiStatus: boolean;
    emojiStatusUntil: string | null;
    botInfoVersion: number | null;
    restrictionReason: string | null;
    hasVideoAvatar: boolean;
    commonChatsCount: number | null;
    /** null when the photo history could not be enumerated */
    profilePhotosCount: number | null;
    downloadedPhotos: string[];
    downloadError?: string;
}

export interface ChannelLocation {
    latitude: number;
    longitude: number;
    address: string;
}

export interface ChannelInfo {
    kind: 'channel';
    type: 'channel' | 'supergroup';
    id: string;
    title: string;
    username: string | null;
    created: string | null;
    about: string | null;
    aboutEntities: ExtractedEntities;
    flags: Record<ChannelFlag, boolean>;
    participantsCount: number | null;
    adminsCount: number | null;
    onlineCount: number | null;
    bannedCount: number | null;
    kickedCount: number | null;
    slowmodeSeconds: number | null;
    defaultBannedRights: string[];
    linkedChatId: string | null;
    stickerSet: string | null;
    location: ChannelLocation | null;
    themeEmoticon: string | null;
    downloadedPhotos: string[];
    downloadError?: string;
}

export interface GroupInfo {
    kind: 'group';
    id: string;
    title: string | null;
    created: string | null;
    participantsCount: number | null;
    downloadedPhotos: string[];
    downloadError?: string;
}

export interface ReactionCount {
    reaction: string;
    count: number;
}

export interface MediaDescriptor {
    kind: string;
    mimeType?: string | null;
    size?: number | null;
    fileName?: string | null;
    hasPhoto?: boolean;
}

export interface MessageInfo {
    kind: 'message';
    /** Channel handle, or its numeric id when it has none */
    channel: string;
    id: number;
    date: string | null;
    editDate: string | null;
    text: string;
    views: number | null;
    forwards: number | null;
    replies: number | null;
    reactions: ReactionCount[];
    forwardedFrom: string | null;
    viaBotId: string | null;
    replyToMessageId: number | null;
    entities: ExtractedEntities;
    media: MediaDescriptor | null;
    raw: JsonValue;
}

export type CollectedInfo = UserInfo | ChannelInfo | GroupInfo | MessageInfo;

export interface CollectOptions {
    timeZone: string;
    photos: boolean;
    limitPhotos: number;
    outputDir: string;
    photoEnumerationCap: number;
}

export type ChannelReference =
    | { kind: 'handle'; handle: string }
    | { kind: 'internal'; internalId: number };

export interface MessageLocator {
    channel: ChannelReference;
    messageId: number;
}

export type TargetSelector =
    | { kind: 'username'; username: string }
    | { kind: 'id'; id: string }
    | { kind: 'phone'; phone: string }
    | { kind: 'url'; locator: MessageLocator };
