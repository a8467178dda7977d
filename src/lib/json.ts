export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// Bookkeeping fields GramJS puts on every TL object.
const OMITTED_KEYS = new Set(['originalArgs', 'CONSTRUCTOR_ID', 'SUBCLASS_OF_ID', 'classType']);

function isWalkable(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
        return true;
    }
    return 'className' in value && typeof value.className === 'string';
}

/**
 * Project an arbitrary value (including GramJS TL objects) onto JSON.
 * Plain objects and TL objects are walked; any other non-primitive is
 * stringified. Keys starting with `_` hold client back-references and are
 * skipped.
 */
export function toJsonValue(value: unknown, ancestors: Set<object> = new Set()): JsonValue {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : String(value);
    }
    if (typeof value !== 'object') {
        // bigint, symbol, function
        return String(value);
    }
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }
    if (value instanceof Uint8Array) {
        return Buffer.from(value).toString('base64');
    }
    if (ancestors.has(value)) {
        return '[Circular]';
    }

    ancestors.add(value);
    try {
        if (Array.isArray(value)) {
            return value.map((item: unknown) => toJsonValue(item, ancestors));
        }
        if (!isWalkable(value)) {
            return String(value);
        }
        const result: { [key: string]: JsonValue } = {};
        for (const [key, item] of Object.entries(value)) {
            if (key.startsWith('_') || OMITTED_KEYS.has(key)) continue;
            if (item === undefined || typeof item === 'function') continue;
            result[key] = toJsonValue(item, ancestors);
        }
        return result;
    } finally {
        ancestors.delete(value);
    }
}
