/**
 * Human-readable presenter: one `Label: value` line per populated field.
 */

import {
    CHANNEL_FLAGS,
    USER_FLAGS,
    type ChannelInfo,
    type ChannelLocation,
    type CollectedInfo,
    type GroupInfo,
    type MediaDescriptor,
    type MessageInfo,
    type ReactionCount,
    type UserInfo,
} from '../types/index.js';
import type { OutputStyle } from './style.js';

type FieldValue = string | number | readonly string[] | null | undefined;
type Field = readonly [label: string, value: FieldValue];

function formatValue(value: FieldValue): string | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return String(value);
    const text = typeof value === 'string' ? value : value.join(', ');
    return text === '' ? null : text;
}

function renderFields(fields: readonly Field[], style: OutputStyle): string {
    const lines: string[] = [];
    for (const [label, value] of fields) {
        const text = formatValue(value);
        if (text !== null) {
            lines.push(`${style.label(label)}: ${text}`);
        }
    }
    return lines.join('\n');
}

export function formatFlags<F extends string>(order: readonly F[], flags: Record<F, boolean>): string {
    const set = order.filter((flag) => flags[flag]);
    return set.length > 0 ? set.join(', ') : 'none';
}

function handle(username: string | null): string | null {
    return username ? `@${username}` : null;
}

function yes(value: boolean): string | null {
    return value ? 'yes' : null;
}

function formatLocation(location: ChannelLocation | null): string | null {
    if (!location) return null;
    const coordinates = `${location.latitude}, ${location.longitude}`;
    return location.address ? `${coordinates} (${location.address})` : coordinates;
}

function formatReactions(reactions: ReactionCount[]): string[] {
    return reactions.map((entry) => `${entry.reaction} ${entry.count}`);
}

export function formatMedia(media: MediaDescriptor | null): string | null {
    if (!media) return null;
    const details: string[] = [];
    if (media.mimeType) details.push(media.mimeType);
    if (media.size !== undefined && media.size !== null) details.push(`${media.size} bytes`);
    if (media.fileName) details.push(media.fileName);
    if (media.hasPhoto) details.push('has photo');
    return details.length > 0 ? `${media.kind} (${details.join(', ')})` : media.kind;
}

function userFields(info: UserInfo): Field[] {
    const fields: Field[] = [
        ['User ID', info.id],
        ['First name', info.firstName],
        ['Last name', info.lastName],
        ['Username', handle(info.username)],
        ['Last seen', info.lastSeen],
        ['Flags', formatFlags(USER_FLAGS, info.flags)],
        ['Emoji status', yes(info.emojiStatus)],
        ['Emoji status until', info.emojiStatusUntil],
        ['Video avatar', yes(info.hasVideoAvatar)],
        ['Bot info version', info.botInfoVersion],
        ['Restriction reason', info.restrictionReason],
        ['Common chats', info.commonChatsCount],
        ['Profile photos count', info.profilePhotosCount],
    ];
    if (info.bio) {
        fields.push(
            ['Bio', info.bio],
            ['Bio URLs', info.bioEntities.urls],
            ['Bio mentions', info.bioEntities.mentions],
            ['Bio hashtags', info.bioEntities.hashtags]
        );
    }
    fields.push(['Downloaded photos', info.downloadedPhotos], ['Download error', info.downloadError]);
    return fields;
}

function channelFields(info: ChannelInfo): Field[] {
    const fields: Field[] = [
        ['Type', info.type],
        ['Channel ID', info.id],
        ['Title', info.title],
        ['Username', handle(info.username)],
        ['Created', info.created],
        ['Flags', formatFlags(CHANNEL_FLAGS, info.flags)],
        ['Participants', info.participantsCount],
        ['Admins', info.adminsCount],
        ['Online', info.onlineCount],
        ['Banned', info.bannedCount],
        ['Kicked', info.kickedCount],
        ['Slowmode (s)', info.slowmodeSeconds],
        ['Default banned rights', info.defaultBannedRights],
        ['Linked chat id', info.linkedChatId],
        ['Sticker set', info.stickerSet],
        ['Location', formatLocation(info.location)],
        ['Theme emoticon', info.themeEmoticon],
    ];
    if (info.about) {
        fields.push(
            ['About', info.about],
            ['About URLs', info.aboutEntities.urls],
            ['About mentions', info.aboutEntities.mentions],
            ['About hashtags', info.aboutEntities.hashtags]
        );
    }
    fields.push(['Downloaded photos', info.downloadedPhotos], ['Download error', info.downloadError]);
    return fields;
}

function groupFields(info: GroupInfo): Field[] {
    return [
        ['Type', 'group'],
        ['Group ID', info.id],
        ['Title', info.title],
        ['Created', info.created],
        ['Participants', info.participantsCount],
        ['Downloaded photos', info.downloadedPhotos],
        ['Download error', info.downloadError],
    ];
}

// The raw platform record is JSON-only.
function messageFields(info: MessageInfo): Field[] {
    return [
        ['Channel', info.channel],
        ['Message ID', info.id],
        ['Date', info.date],
        ['Edited', info.editDate],
        ['Views', info.views],
        ['Forwards', info.forwards],
        ['Replies', info.replies],
        ['Reactions', formatReactions(info.reactions)],
        ['Forwarded from', info.forwardedFrom],
        ['Via bot id', info.viaBotId],
        ['Reply to', info.replyToMessageId],
        ['Text', info.text],
        ['URLs', info.entities.urls],
        ['Mentions', info.entities.mentions],
        ['Hashtags', info.entities.hashtags],
        ['Media', formatMedia(info.media)],
    ];
}

export function renderHuman(info: CollectedInfo, style: OutputStyle): string {
    switch (info.kind) {
        case 'user':
            return renderFields(userFields(info), style);
        case 'channel':
            return renderFields(channelFields(info), style);
        case 'group':
            return renderFields(groupFields(info), style);
        case 'message':
            return renderFields(messageFields(info), style);
    }
}
