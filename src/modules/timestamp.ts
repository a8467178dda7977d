import { ConfigurationError } from '../lib/errors.js';

// en-US only abbreviates American zones; en-GB knows the European ones (CET, BST).
const PRIMARY_LOCALE = 'en-US';
const ZONE_NAME_LOCALE = 'en-GB';
const OFFSET_ZONE_NAME = /^GMT[+-]/;

type Parts = Partial<Record<Intl.DateTimeFormatPartTypes, string>>;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string, locale: string = PRIMARY_LOCALE): Intl.DateTimeFormat {
    const key = `${locale}|${timeZone}`;
    let formatter = formatters.get(key);
    if (!formatter) {
        try {
            formatter = new Intl.DateTimeFormat(locale, {
                timeZone,
                year: 'numeric',
                month: '2-digit',
                day: '2-digit',
                hour: '2-digit',
                minute: '2-digit',
                second: '2-digit',
                hourCycle: 'h23',
                timeZoneName: 'short',
            });
        } catch (error) {
            throw new ConfigurationError(`Unknown time zone "${timeZone}"`, { cause: error });
        }
        formatters.set(key, formatter);
    }
    return formatter;
}

function partsOf(instant: Date, timeZone: string, locale?: string): Parts {
    const parts: Parts = {};
    for (const part of formatterFor(timeZone, locale).formatToParts(instant)) {
        parts[part.type] = part.value;
    }
    return parts;
}

/**
 * Short zone name, preferring an abbreviation over a `GMT+1` style offset.
 */
function zoneName(instant: Date, timeZone: string, primary: string | undefined): string | undefined {
    if (!primary || !OFFSET_ZONE_NAME.test(primary)) {
        return primary;
    }
    const alternative = partsOf(instant, timeZone, ZONE_NAME_LOCALE).timeZoneName;
    return alternative && !OFFSET_ZONE_NAME.test(alternative) ? alternative : primary;
}

export function assertTimeZone(timeZone: string): void {
    formatterFor(timeZone);
}

/**
 * Render an instant as `YYYY-MM-DD HH:MM:SS <zone>` in the given IANA zone.
 * Returns null when there is no instant.
 */
export function formatTimestamp(instant: Date | null | undefined, timeZone: string): string | null {
    if (!instant) {
        return null;
    }
    const { year, month, day, hour, minute, second, timeZoneName } = partsOf(instant, timeZone);
    return `${year}-${month}-${day} ${hour}:${minute}:${second} ${zoneName(instant, timeZone, timeZoneName)}`;
}
