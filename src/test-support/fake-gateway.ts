import { TargetNotFoundError } from '../lib/errors.js';
import type {
    ChannelFullRecord,
    ChannelRecord,
    EntityKey,
    GroupRecord,
    MessageRecord,
    ProfilePhoto,
    ResolvedTarget,
    TelegramGateway,
    UserFullRecord,
    UserRecord,
} from '../telegram/gateway.js';

export function userRecord(overrides: Partial<UserRecord> = {}): UserRecord {
    return {
        kind: 'user',
        id: '1001',
        firstName: 'Ada',
        lastName: null,
        username: 'ada_lovelace',
        status: { kind: 'recently' },
        flags: { premium: false, verified: false, bot: false, scam: false, fake: false, support: false },
        botInfoVersion: null,
        restrictionReason: null,
        emojiStatus: null,
        hasVideoAvatar: false,
        ...overrides,
    };
}

export function channelRecord(overrides: Partial<ChannelRecord> = {}): ChannelRecord {
    return {
        kind: 'channel',
        id: '2002',
        title: 'Harbour News',
        username: 'harbour_news',
        date: new Date('2021-06-01T08:30:00Z'),
        flags: {
            verified: false,
            scam: false,
            fake: false,
            restricted: false,
            forum: false,
            gigagroup: false,
            broadcast: true,
            megagroup: false,
        },
        defaultBannedRights: [],
        ...overrides,
    };
}

export function groupRecord(overrides: Partial<GroupRecord> = {}): GroupRecord {
    return {
        kind: 'group',
        id: '3003',
        title: 'Book Club',
        date: new Date('2019-01-02T03:04:05Z'),
        participantsCount: 12,
        ...overrides,
    };
}

export function channelFullRecord(overrides: Partial<ChannelFullRecord> = {}): ChannelFullRecord {
    return {
        about: null,
        participantsCount: null,
        adminsCount: null,
        kickedCount: null,
        bannedCount: null,
        onlineCount: null,
        slowmodeSeconds: null,
        linkedChatId: null,
        location: null,
        stickerSet: null,
        themeEmoticon: null,
        ...overrides,
    };
}

export function messageRecord(overrides: Partial<MessageRecord> = {}): MessageRecord {
    return {
        id: 42,
        date: new Date('2024-03-05T14:07:09Z'),
        editDate: null,
        text: '',
        views: null,
        forwards: null,
        replies: null,
        reactions: [],
        forwardedFrom: null,
        viaBotId: null,
        replyToMessageId: null,
        richEntities: [],
        media: null,
        raw: { className: 'Message', id: 42 },
        ...overrides,
    };
}

export type FakeOperation =
    | 'resolve'
    | 'getFullUser'
    | 'getFullChannel'
    | 'iterProfilePhotos'
    | 'downloadProfilePhoto'
    | 'getMessage'
    | 'importContact'
    | 'deleteContact'
    | 'disconnect';

export interface FakeGatewayData {
    /** Keyed by handle, id or `c:<internalId>` */
    targets?: Record<string, ResolvedTarget>;
    fullUsers?: Record<string, UserFullRecord>;
    fullChannels?: Record<string, ChannelFullRecord>;
    photos?: Record<string, ProfilePhoto[]>;
    /** Keyed by `<targetId>:<messageId>` */
    messages?: Record<string, MessageRecord>;
    contacts?: Record<string, UserRecord>;
    /** Target ids without a current profile photo */
    withoutCurrentPhoto?: string[];
    failures?: Partial<Record<FakeOperation, Error>>;
    /** Fail the nth (0-based) historical photo download */
    failPhotoDownload?: { index: number; error: Error };
}

/**
 * In-memory TelegramGateway. Records every call as `<operation>:<argument>`.
 */
export class FakeGateway implements TelegramGateway {
    readonly calls: string[] = [];
    private photoDownloads = 0;

    constructor(private readonly data: FakeGatewayData = {}) {}

    private record(operation: FakeOperation | 'downloadPhoto', argument: string): void {
        this.calls.push(`${operation}:${argument}`);
        const failure = operation === 'downloadPhoto' ? undefined : this.data.failures?.[operation];
        if (failure) throw failure;
    }

    async resolve(key: EntityKey): Promise<ResolvedTarget> {
        const lookup = key.kind === 'handle' ? key.handle : key.kind === 'id' ? key.id : `c:${key.internalId}`;
        this.record('resolve', lookup);
        const target = this.data.targets?.[lookup];
        if (!target) throw new TargetNotFoundError();
        return target;
    }

    async getFullUser(user: UserRecord): Promise<UserFullRecord> {
        this.record('getFullUser', user.id);
        return this.data.fullUsers?.[user.id] ?? { about: null, commonChatsCount: null };
    }

    async getFullChannel(channel: ChannelRecord): Promise<ChannelFullRecord> {
        this.record('getFullChannel', channel.id);
        return this.data.fullChannels?.[channel.id] ?? channelFullRecord();
    }

    async *iterProfilePhotos(target: ResolvedTarget, limit: number): AsyncGenerator<ProfilePhoto> {
        this.record('iterProfilePhotos', `${target.id}/${limit}`);
        yield* (this.data.photos?.[target.id] ?? []).slice(0, limit);
    }

    async downloadProfilePhoto(target: ResolvedTarget, filePath: string): Promise<string | null> {
        this.record('downloadProfilePhoto', filePath);
        return this.data.withoutCurrentPhoto?.includes(target.id) ? null : filePath;
    }

    async downloadPhoto(photo: ProfilePhoto, filePath: string): Promise<string | null> {
        this.record('downloadPhoto', filePath);
        const failure = this.data.failPhotoDownload;
        if (failure && failure.index === this.photoDownloads) throw failure.error;
        this.photoDownloads++;
        return filePath;
    }

    async getMessage(target: ResolvedTarget, messageId: number): Promise<MessageRecord | null> {
        this.record('getMessage', `${target.id}:${messageId}`);
        return this.data.messages?.[`${target.id}:${messageId}`] ?? null;
    }

    async importContact(phone: string): Promise<UserRecord | null> {
        this.record('importContact', phone);
        return this.data.contacts?.[phone] ?? null;
    }

    async deleteContact(user: UserRecord): Promise<void> {
        this.record('deleteContact', user.id);
    }

    async disconnect(): Promise<void> {
        this.record('disconnect', '');
    }
}
