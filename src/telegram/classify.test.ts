import bigInt from 'big-integer';
import { Api } from 'telegram';
import { describe, expect, it } from 'vitest';
import { AccessDeniedError, TargetNotFoundError } from '../lib/errors.js';
import { collectMessageInfo } from '../modules/message-osint.js';
import { channelRecord, FakeGateway } from '../test-support/fake-gateway.js';
import {
    classifyEntity,
    toChannelFullRecord,
    toDate,
    toMediaRecord,
    toMessageRecord,
    toPresenceStatus,
} from './classify.js';

describe('classifyEntity', () => {
    it('maps users', () => {
        const { target } = classifyEntity(
            new Api.User({ id: bigInt(42), firstName: 'Ada', username: 'ada_l', premium: true, bot: true })
        );
        expect(target).toEqual({
            kind: 'user',
            id: '42',
            firstName: 'Ada',
            lastName: null,
            username: 'ada_l',
            status: null,
            flags: { premium: true, verified: false, bot: true, scam: false, fake: false, support: false },
            botInfoVersion: null,
            restrictionReason: null,
            emojiStatus: null,
            hasVideoAvatar: false,
        });
    });

    it('maps channels and supergroups', () => {
        const { target } = classifyEntity(
            new Api.Channel({
                id: bigInt(7),
                title: 'Harbour News',
                photo: new Api.ChatPhotoEmpty(),
                date: 1622536200,
                megagroup: true,
            })
        );
        expect(target.kind).toBe('channel');
        if (target.kind !== 'channel') return;
        expect(target.id).toBe('7');
        expect(target.username).toBeNull();
        expect(target.date).toEqual(new Date('2021-06-01T08:30:00Z'));
        expect(target.flags.megagroup).toBe(true);
        expect(target.flags.broadcast).toBe(false);
        expect(target.defaultBannedRights).toEqual([]);
    });

    it('lists the restricted default rights', () => {
        const { target } = classifyEntity(
            new Api.Channel({
                id: bigInt(7),
                title: 'Harbour Chat',
                photo: new Api.ChatPhotoEmpty(),
                date: 1622536200,
                defaultBannedRights: new Api.ChatBannedRights({ untilDate: 0, sendMedia: true, inviteUsers: true }),
            })
        );
        expect(target.kind === 'channel' && target.defaultBannedRights).toEqual(['sendMedia', 'inviteUsers']);
    });

    it('refuses forbidden channels', () => {
        expect(() =>
            classifyEntity(new Api.ChannelForbidden({ id: bigInt(7), accessHash: bigInt(1), title: 'Hidden' }))
        ).toThrow(AccessDeniedError);
    });

    it('refuses anything else', () => {
        expect(() => classifyEntity({})).toThrow(TargetNotFoundError);
    });
});

describe('toPresenceStatus', () => {
    it('maps known statuses', () => {
        expect(toPresenceStatus(new Api.UserStatusOffline({ wasOnline: 1709647629 }))).toEqual({
            kind: 'offline',
            wasOnline: new Date('2024-03-05T14:07:09Z'),
        });
        expect(toPresenceStatus(new Api.UserStatusOnline({ expires: 1709647629 }))).toEqual({ kind: 'online' });
        expect(toPresenceStatus(undefined)).toBeNull();
    });
});

describe('toDate', () => {
    it('reads unix seconds', () => {
        expect(toDate(1709647629)).toEqual(new Date('2024-03-05T14:07:09Z'));
        expect(toDate(0)).toBeNull();
        expect(toDate(undefined)).toBeNull();
    });
});

function channelMessage(overrides: Partial<ConstructorParameters<typeof Api.Message>[0]> = {}): Api.Message {
    return new Api.Message({
        id: 42,
        peerId: new Api.PeerChannel({ channelId: bigInt(2002) }),
        date: 1709647629,
        message: '',
        ...overrides,
    });
}

describe('toMessageRecord', () => {
    it('maps counters, reply, forward and reactions', () => {
        const record = toMessageRecord(
            channelMessage({
                message: 'Launch day',
                editDate: 1709647689,
                views: 1500,
                forwards: 12,
                replies: new Api.MessageReplies({ replies: 4, repliesPts: 1 }),
                replyTo: new Api.MessageReplyHeader({ replyToMsgId: 41 }),
                fwdFrom: new Api.MessageFwdHeader({
                    date: 1709640000,
                    fromId: new Api.PeerChannel({ channelId: bigInt(7) }),
                    channelPost: 9,
                }),
                viaBotId: bigInt(99),
                reactions: new Api.MessageReactions({
                    results: [
                        new Api.ReactionCount({ reaction: new Api.ReactionEmoji({ emoticon: '👍' }), count: 3 }),
                        new Api.ReactionCount({
                            reaction: new Api.ReactionCustomEmoji({ documentId: bigInt(555) }),
                            count: 1,
                        }),
                    ],
                }),
            })
        );

        expect(record.id).toBe(42);
        expect(record.date).toEqual(new Date('2024-03-05T14:07:09Z'));
        expect(record.editDate).toEqual(new Date('2024-03-05T14:08:09Z'));
        expect(record.text).toBe('Launch day');
        expect(record.views).toBe(1500);
        expect(record.forwards).toBe(12);
        expect(record.replies).toBe(4);
        expect(record.replyToMessageId).toBe(41);
        expect(record.forwardedFrom).toBe('channel 7 (post 9)');
        expect(record.viaBotId).toBe('99');
        expect(record.reactions).toEqual([
            { reaction: '👍', count: 3 },
            { reaction: 'custom:555', count: 1 },
        ]);
    });

    it('prefers the forward sender name', () => {
        const record = toMessageRecord(
            channelMessage({ fwdFrom: new Api.MessageFwdHeader({ date: 1709640000, fromName: 'Anonymous Admiral' }) })
        );
        expect(record.forwardedFrom).toBe('Anonymous Admiral');
    });

    it('leaves absent fields empty', () => {
        const record = toMessageRecord(channelMessage());
        expect(record).toMatchObject({
            editDate: null,
            views: null,
            forwards: null,
            replies: null,
            reactions: [],
            forwardedFrom: null,
            viaBotId: null,
            replyToMessageId: null,
            richEntities: [],
            media: null,
        });
    });

    it('keeps the raw record as JSON', () => {
        const record = toMessageRecord(channelMessage({ message: 'hello' }));
        expect(record.raw).toMatchObject({
            className: 'Message',
            id: 42,
            message: 'hello',
            peerId: { className: 'PeerChannel', channelId: '2002' },
        });
    });

    it('keeps text urls, mentions and hashtags with UTF-16 offsets', async () => {
        // The rocket emoji is two UTF-16 code units.
        const record = toMessageRecord(
            channelMessage({
                message: '🚀 #launch with @rocket_team',
                entities: [
                    new Api.MessageEntityTextUrl({ offset: 0, length: 2, url: 'https://docs.example/z' }),
                    new Api.MessageEntityHashtag({ offset: 3, length: 7 }),
                    new Api.MessageEntityMention({ offset: 16, length: 12 }),
                    new Api.MessageEntityBold({ offset: 11, length: 4 }),
                ],
            })
        );
        expect(record.richEntities).toEqual([
            { type: 'text_url', offset: 0, length: 2, url: 'https://docs.example/z' },
            { type: 'hashtag', offset: 3, length: 7 },
            { type: 'mention', offset: 16, length: 12 },
        ]);

        const gateway = new FakeGateway({
            targets: { harbour_news: channelRecord() },
            messages: { '2002:42': record },
        });
        const info = await collectMessageInfo(gateway, 'https://t.me/harbour_news/42', { timeZone: 'UTC' });
        expect(info.entities).toEqual({
            urls: ['https://docs.example/z'],
            mentions: ['rocket_team'],
            hashtags: ['launch'],
        });
    });
});

describe('toMediaRecord', () => {
    it('describes documents', () => {
        const media = new Api.MessageMediaDocument({
            document: new Api.Document({
                id: bigInt(1),
                accessHash: bigInt(2),
                fileReference: Buffer.alloc(0),
                date: 1709647629,
                mimeType: 'video/mp4',
                size: bigInt(2048),
                dcId: 2,
                attributes: [
                    new Api.DocumentAttributeVideo({ duration: 3, w: 640, h: 480 }),
                    new Api.DocumentAttributeFilename({ fileName: 'clip.mp4' }),
                ],
            }),
        });
        expect(toMediaRecord(media)).toEqual({
            kind: 'document',
            document: {
                mimeType: 'video/mp4',
                size: 2048,
                attributes: [
                    { type: 'DocumentAttributeVideo', fileName: null },
                    { type: 'DocumentAttributeFilename', fileName: 'clip.mp4' },
                ],
            },
            hasPhoto: false,
        });
    });

    it('flags photos', () => {
        const media = new Api.MessageMediaPhoto({
            photo: new Api.Photo({
                id: bigInt(5),
                accessHash: bigInt(6),
                fileReference: Buffer.alloc(0),
                date: 1709647629,
                sizes: [],
                dcId: 2,
            }),
        });
        expect(toMediaRecord(media)).toEqual({ kind: 'photo', document: null, hasPhoto: true });
    });

    it('names other media by type', () => {
        expect(toMediaRecord(new Api.MessageMediaGeo({ geo: new Api.GeoPointEmpty() }))).toEqual({
            kind: 'geo',
            document: null,
            hasPhoto: false,
        });
        expect(toMediaRecord(undefined)).toBeNull();
    });
});

describe('toChannelFullRecord', () => {
    it('maps counters, linked chat and location', () => {
        const full = new Api.ChannelFull({
            id: bigInt(2002),
            about: 'Daily #harbour updates',
            participantsCount: 1200,
            adminsCount: 4,
            onlineCount: 87,
            slowmodeSeconds: 30,
            linkedChatId: bigInt(777),
            location: new Api.ChannelLocation({
                geoPoint: new Api.GeoPoint({ long: 2.35, lat: 48.85, accessHash: bigInt(0) }),
                address: 'Quai de la Tournelle',
            }),
            themeEmoticon: '🌊',
            readInboxMaxId: 0,
            readOutboxMaxId: 0,
            unreadCount: 0,
            chatPhoto: new Api.PhotoEmpty({ id: bigInt(0) }),
            notifySettings: new Api.PeerNotifySettings({}),
            botInfo: [],
            pts: 1,
        });
        expect(toChannelFullRecord(full)).toEqual({
            about: 'Daily #harbour updates',
            participantsCount: 1200,
            adminsCount: 4,
            kickedCount: null,
            bannedCount: null,
            onlineCount: 87,
            slowmodeSeconds: 30,
            linkedChatId: '777',
            location: { latitude: 48.85, longitude: 2.35, address: 'Quai de la Tournelle' },
            stickerSet: null,
            themeEmoticon: '🌊',
        });
    });
});
