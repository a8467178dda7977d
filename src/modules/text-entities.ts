/**
 * Text Entity Extractor
 * Pulls URLs, @mentions and #hashtags out of free text
 */

import type { ExtractedEntities } from '../types/index.js';

const URL_PATTERN = /(https?:\/\/\S+)/gi;
// Telegram handles are at least 5 characters long.
const MENTION_PATTERN = /@([A-Za-z0-9_]{5,})/g;
const HASHTAG_PATTERN = /#(\w{2,})/g;

function captures(text: string, pattern: RegExp): string[] {
    return Array.from(text.matchAll(pattern), (match) => match[1]);
}

/**
 * Matches are returned in order of appearance, duplicates included.
 */
export function extractEntities(text: string | null | undefined): ExtractedEntities {
    if (!text) {
        return { urls: [], mentions: [], hashtags: [] };
    }
    return {
        urls: captures(text, URL_PATTERN),
        mentions: captures(text, MENTION_PATTERN),
        hashtags: captures(text, HASHTAG_PATTERN),
    };
}
