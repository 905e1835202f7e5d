/**
 * Weather Collector — Time Utilities
 */

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in UTC.
 * This is the `timestamp` column and half of every composite key.
 */
export function formatTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * UTC calendar date (`YYYY-MM-DD`) used to partition datasets.
 */
export function toDateString(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
