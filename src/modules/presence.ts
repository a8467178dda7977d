import type { PresenceStatus } from '../telegram/gateway.js';
import { formatTimestamp } from './timestamp.js';

/**
 * "Last seen" phrase for a presence status. Never throws.
 */
export function describePresence(status: PresenceStatus | null | undefined, timeZone: string): string {
    switch (status?.kind) {
        case 'empty':
            return 'never';
        case 'online':
            return 'now';
        case 'offline':
            return formatTimestamp(status.wasOnline, timeZone) ?? 'unknown';
        case 'recently':
            return 'recently';
        case 'last_week':
            return 'last week';
        case 'last_month':
            return 'last month';
        default:
            return 'unknown';
    }
}
