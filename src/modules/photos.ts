/**
 * Profile photo helpers shared by the user, channel and group collectors.
 * Downloads are best-effort: any failure is returned, never thrown.
 */

import { join } from 'node:path';
import { logger, PlatformError, RateLimitedError } from '../lib/index.js';
import type { ResolvedTarget, TelegramGateway } from '../telegram/gateway.js';

export interface PhotoDownloadResult {
    paths: string[];
    error: Error | null;
}

/**
 * 2024-03-05T14:07:09Z -> 20240305_140709
 */
export function photoFileStem(date: Date | null, index: number): string {
    if (!date) {
        return `photo_${index}`;
    }
    return date.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
}

/**
 * Count the photo history, stopping at `cap`. Null when the platform refuses.
 */
export async function countProfilePhotos(
    gateway: TelegramGateway,
    target: ResolvedTarget,
    cap: number
): Promise<number | null> {
    let count = 0;
    try {
        for await (const _photo of gateway.iterProfilePhotos(target, cap)) {
            count++;
            if (count >= cap) break;
        }
    } catch (error) {
        if (!(error instanceof PlatformError)) throw error;
        logger.warn(`Profile photo enumeration failed for ${target.kind} ${target.id}: ${error.rpcName}`);
        return null;
    }
    return count;
}

/**
 * Download the current photo as `<id>.jpg`, then up to `limitPhotos`
 * historical photos named after their upload time.
 */
export async function downloadPhotos(
    gateway: TelegramGateway,
    target: ResolvedTarget,
    options: { limitPhotos: number; outputDir: string }
): Promise<PhotoDownloadResult> {
    const paths: string[] = [];

    try {
        const current = await gateway.downloadProfilePhoto(target, join(options.outputDir, `${target.id}.jpg`));
        if (current) paths.push(current);

        if (options.limitPhotos > 0) {
            let index = 0;
            for await (const photo of gateway.iterProfilePhotos(target, options.limitPhotos)) {
                if (index >= options.limitPhotos) break;
                const fileName = `${photoFileStem(photo.date, index)}.jpg`;
                const saved = await gateway.downloadPhoto(photo, join(options.outputDir, fileName));
                if (saved) paths.push(saved);
                index++;
            }
        }
    } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        logger.warn(`Photo download stopped for ${target.kind} ${target.id}: ${failure.message}`);
        return { paths, error: failure };
    }

    logger.info(`Downloaded ${paths.length} photo(s) for ${target.kind} ${target.id}`);
    return { paths, error: null };
}

export function describeDownloadFailure(error: Error): string {
    if (error instanceof RateLimitedError) {
        return `Rate limited, wait ${error.seconds}s`;
    }
    if (error instanceof PlatformError) {
        return `RPC error: ${error.rpcName}`;
    }
    return error.message;
}
