/**
 * Dispatcher
 * Resolves the selected target, runs the matching collector, renders the
 * record and maps any failure to an exit code. The session is released on
 * every path.
 */

import { describeError, EXIT_CODES, exitCodeFor, logger, TargetNotFoundError } from '../lib/index.js';
import type { ExitCode } from '../lib/index.js';
import { renderHuman } from '../presenters/human.js';
import { renderJson } from '../presenters/json.js';
import type { OutputStyle } from '../presenters/style.js';
import type { ResolvedTarget, TelegramGateway, UserRecord } from '../telegram/gateway.js';
import type { CollectedInfo, CollectOptions, TargetSelector } from '../types/index.js';
import { collectChannelInfo } from './channel-osint.js';
import { collectGroupInfo } from './group-osint.js';
import { collectMessageInfo } from './message-osint.js';
import { collectUserInfo } from './user-osint.js';

export function collectResolved(
    gateway: TelegramGateway,
    target: ResolvedTarget,
    options: CollectOptions
): Promise<CollectedInfo> {
    switch (target.kind) {
        case 'user':
            return collectUserInfo(gateway, target, options);
        case 'channel':
            return collectChannelInfo(gateway, target, options);
        case 'group':
            return collectGroupInfo(gateway, target, options);
    }
}

/**
 * Look a user up by phone through a temporary contact. The contact is
 * deleted again whether or not `use` succeeds; a failed delete is only
 * logged.
 */
export async function withTemporaryContact<T>(
    gateway: TelegramGateway,
    phone: string,
    use: (user: UserRecord) => Promise<T>
): Promise<T> {
    const user = await gateway.importContact(phone);
    if (!user) {
        throw new TargetNotFoundError(`No user found with phone number ${phone}`);
    }
    try {
        return await use(user);
    } finally {
        try {
            await gateway.deleteContact(user);
            logger.debug(`Temporary contact ${user.id} removed`);
        } catch (error) {
            logger.warn(`Temporary contact ${user.id} may remain: ${describeError(error)}`);
        }
    }
}

export async function collectTarget(
    gateway: TelegramGateway,
    selector: TargetSelector,
    options: CollectOptions
): Promise<CollectedInfo> {
    switch (selector.kind) {
        case 'username': {
            const target = await gateway.resolve({ kind: 'handle', handle: selector.username });
            return collectResolved(gateway, target, options);
        }
        case 'id': {
            const target = await gateway.resolve({ kind: 'id', id: selector.id });
            return collectResolved(gateway, target, options);
        }
        case 'phone':
            return withTemporaryContact(gateway, selector.phone, (user) => collectUserInfo(gateway, user, options));
        case 'url':
            return collectMessageInfo(gateway, selector.locator, options);
    }
}

export function renderInfo(info: CollectedInfo, json: boolean, style: OutputStyle): string {
    return json ? renderJson(info) : renderHuman(info, style);
}

export interface InvestigationRequest {
    selector: TargetSelector;
    options: CollectOptions;
    json: boolean;
    style: OutputStyle;
    openGateway: () => Promise<TelegramGateway>;
    writeOut: (text: string) => void;
    writeErr: (text: string) => void;
}

export async function runInvestigation(request: InvestigationRequest): Promise<ExitCode> {
    let gateway: TelegramGateway | null = null;

    try {
        gateway = await request.openGateway();
        const info = await collectTarget(gateway, request.selector, request.options);
        request.writeOut(renderInfo(info, request.json, request.style));
        return EXIT_CODES.ok;
    } catch (error) {
        logger.debug('Investigation failed', { error: error instanceof Error ? error.stack : String(error) });
        request.writeErr(request.style.error(describeError(error)));
        return exitCodeFor(error);
    } finally {
        if (gateway) {
            try {
                await gateway.disconnect();
            } catch (error) {
                logger.warn('Failed to close the Telegram session', { error: describeError(error) });
            }
        }
    }
}
