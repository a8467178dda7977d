/**
 * TelegramGateway backed by a GramJS client.
 * Resolved GramJS entities and photos are kept in memory so the neutral
 * records handed to the collectors can be mapped back for follow-up calls.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import bigInt from 'big-integer';
import { Api, type TelegramClient } from 'telegram';
import { logger, PlatformError, TargetNotFoundError } from '../lib/index.js';
import {
    classifyEntity,
    toChannelFullRecord,
    toDate,
    toMessageRecord,
    toUserFullRecord,
    toUserRecord,
    type GramEntity,
} from './classify.js';
import { translatePlatformError } from './errors.js';
import type {
    ChannelFullRecord,
    ChannelRecord,
    EntityKey,
    MessageRecord,
    ProfilePhoto,
    ResolvedTarget,
    TelegramGateway,
    UserFullRecord,
    UserRecord,
} from './gateway.js';

// GetUserPhotos page size accepted by the API.
const PHOTO_PAGE_SIZE = 100;

function cacheKey(target: ResolvedTarget): string {
    return `${target.kind}:${target.id}`;
}

function toEntityLike(key: EntityKey): string | bigInt.BigInteger {
    switch (key.kind) {
        case 'handle':
            return key.handle;
        case 'id':
            return bigInt(key.id);
        case 'internal_channel':
            // t.me/c/ links carry the bare channel id; the API wants it marked.
            return bigInt(`-100${key.internalId}`);
    }
}

export class GramjsGateway implements TelegramGateway {
    private readonly entities = new Map<string, GramEntity>();
    private readonly photos = new Map<string, Api.Photo>();

    constructor(private readonly client: TelegramClient) {}

    async resolve(key: EntityKey): Promise<ResolvedTarget> {
        const resolved = await this.call(() => this.client.getEntity(toEntityLike(key)));
        const { target, entity } = classifyEntity(resolved);
        this.entities.set(cacheKey(target), entity);
        logger.debug(`Resolved ${key.kind} to ${target.kind} ${target.id}`);
        return target;
    }

    async getFullUser(user: UserRecord): Promise<UserFullRecord> {
        const entity = this.entityFor(user);
        const result = await this.call(() => this.client.invoke(new Api.users.GetFullUser({ id: entity })));
        return toUserFullRecord(result);
    }

    async getFullChannel(channel: ChannelRecord): Promise<ChannelFullRecord> {
        const entity = this.entityFor(channel);
        const result = await this.call(() => this.client.invoke(new Api.channels.GetFullChannel({ channel: entity })));
        if (!(result.fullChat instanceof Api.ChannelFull)) {
            throw new PlatformError('CHANNEL_INVALID', `Unexpected full-info record ${result.fullChat.className}`);
        }
        return toChannelFullRecord(result.fullChat);
    }

    async *iterProfilePhotos(target: ResolvedTarget, limit: number): AsyncGenerator<ProfilePhoto> {
        const entity = this.entityFor(target);
        const photos = target.kind === 'user'
            ? this.userPhotos(entity, limit)
            : this.chatPhotos(entity, limit);
        for await (const photo of photos) {
            const id = photo.id.toString();
            this.photos.set(id, photo);
            yield { id, date: toDate(photo.date) };
        }
    }

    async downloadProfilePhoto(target: ResolvedTarget, filePath: string): Promise<string | null> {
        const entity = this.entityFor(target);
        const data = await this.call(() => this.client.downloadProfilePhoto(entity, { isBig: true }));
        return this.save(data, filePath);
    }

    async downloadPhoto(photo: ProfilePhoto, filePath: string): Promise<string | null> {
        const native = this.photos.get(photo.id);
        if (!native) {
            throw new TargetNotFoundError(`Photo ${photo.id} was not listed by this session.`);
        }
        const data = await this.call(() => this.client.downloadMedia(new Api.MessageMediaPhoto({ photo: native }), {}));
        return this.save(data, filePath);
    }

    async getMessage(target: ResolvedTarget, messageId: number): Promise<MessageRecord | null> {
        const entity = this.entityFor(target);
        const messages = await this.call(() => this.client.getMessages(entity, { ids: messageId }));
        const message = messages.at(0);
        return message instanceof Api.Message ? toMessageRecord(message) : null;
    }

    async importContact(phone: string): Promise<UserRecord | null> {
        const result = await this.call(() =>
            this.client.invoke(
                new Api.contacts.ImportContacts({
                    contacts: [
                        new Api.InputPhoneContact({
                            clientId: bigInt.zero,
                            phone,
                            firstName: 'Temp',
                            lastName: 'Contact',
                        }),
                    ],
                })
            )
        );
        const user = result.users.find((candidate): candidate is Api.User => candidate instanceof Api.User);
        if (!user) return null;

        const record = toUserRecord(user);
        this.entities.set(cacheKey(record), user);
        return record;
    }

    async deleteContact(user: UserRecord): Promise<void> {
        const entity = this.entityFor(user);
        await this.call(() => this.client.invoke(new Api.contacts.DeleteContacts({ id: [entity] })));
    }

    async disconnect(): Promise<void> {
        await this.client.destroy();
        logger.debug('Telegram session closed');
    }

    private async *userPhotos(entity: GramEntity, limit: number): AsyncGenerator<Api.Photo> {
        let offset = 0;
        while (offset < limit) {
            const page = await this.call(() =>
                this.client.invoke(
                    new Api.photos.GetUserPhotos({
                        userId: entity,
                        offset,
                        maxId: bigInt.zero,
                        limit: Math.min(PHOTO_PAGE_SIZE, limit - offset),
                    })
                )
            );
            for (const photo of page.photos) {
                if (photo instanceof Api.Photo) yield photo;
            }
            offset += page.photos.length;
            // photos.Photos is the complete list; only slices continue.
            if (page.photos.length === 0 || !(page instanceof Api.photos.PhotosSlice)) break;
        }
    }

    // Channels and groups keep their photo history as "photo changed" service messages.
    private async *chatPhotos(entity: GramEntity, limit: number): AsyncGenerator<Api.Photo> {
        const messages: Api.TypeMessage[] = await this.call(() =>
            this.client.getMessages(entity, { filter: new Api.InputMessagesFilterChatPhotos(), limit })
        );
        for (const message of messages) {
            if (
                message instanceof Api.MessageService &&
                message.action instanceof Api.MessageActionChatEditPhoto &&
                message.action.photo instanceof Api.Photo
            ) {
                yield message.action.photo;
            }
        }
    }

    private entityFor(target: ResolvedTarget): GramEntity {
        const entity = this.entities.get(cacheKey(target));
        if (!entity) {
            throw new TargetNotFoundError(`${target.kind} ${target.id} was not resolved by this session.`);
        }
        return entity;
    }

    private async save(data: string | Buffer | undefined, filePath: string): Promise<string | null> {
        if (typeof data === 'string') return data;
        if (!data || data.length === 0) return null;
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(filePath, data);
        return filePath;
    }

    private async call<T>(operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (error) {
            throw translatePlatformError(error);
        }
    }
}
