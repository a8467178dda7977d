import { toJsonValue } from '../lib/json.js';
import type { CollectedInfo } from '../types/index.js';

/**
 * Two-space indented JSON; non-ASCII text is kept as is.
 */
export function renderJson(info: CollectedInfo): string {
    return JSON.stringify(toJsonValue(info), null, 2);
}
