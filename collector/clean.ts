/**
 * Weather Collector — Record Cleaner
 *
 * Makes individual field values safe to embed in a comma-delimited row.
 * Every function here is total: no input shape makes it throw.
 */

import { EMPTY, FIELDNAMES } from './types';

/**
 * Default string form of a value that is neither text nor a primitive scalar.
 */
export function stringifyUnknown(value: unknown): string {
    if (value === null || value === undefined) return EMPTY;
    if (typeof value === 'string') return value;
    if (typeof value === 'object' || typeof value === 'function') {
        try {
            return JSON.stringify(value) ?? Object.prototype.toString.call(value);
        } catch {
            return Object.prototype.toString.call(value);
        }
    }
    return String(value);
}

/** Remove every leading and trailing double quote. */
export function stripWrappingQuotes(value: string): string {
    return value.replace(/^"+|"+$/g, '');
}

function cleanText(value: string): string {
    let cleaned = value.trim().replace(/\n/g, ' ').replace(/\r/g, '');

    // Collapse quotes doubled by earlier write/read round-trips.
    while (cleaned.includes('""')) {
        cleaned = cleaned.replace(/""/g, '"');
    }

    cleaned = stripWrappingQuotes(cleaned);

    if (cleaned.includes(',') || cleaned.includes('"')) {
        // TODO: backticks are legitimate in free text; drop this once no consumer depends on it.
        return `"${cleaned.replace(/`/g, '')}"`;
    }
    return cleaned;
}

export function cleanValue(value: unknown): string {
    if (value === null || value === undefined) return EMPTY;
    if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'bigint') {
        return String(value);
    }
    if (typeof value === 'string') return cleanText(value);
    return stringifyUnknown(value);
}

/**
 * Clean a record (or a decoded row) into cells in schema order.
 * Fields the source lacks become empty cells; unknown fields are dropped.
 */
export function cleanRecord(record: Record<string, unknown>): string[] {
    return FIELDNAMES.map((field) => cleanValue(record[field]));
}
