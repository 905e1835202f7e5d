/**
 * Weather Collector — Dataset Merger
 *
 * Read-modify-write of the daily consolidated dataset. The whole object is
 * re-serialized and replaced on every save; there is no partial append.
 */
/* eslint-disable no-console */

import { cleanRecord, stringifyUnknown } from './clean';
import { formatCsvRow, readCsvRecords, type CsvTable } from './csv';
import { CsvParseError } from './errors';
import type { StorageBackend } from './storage/backend';
import { toDateString } from './time';
import { FIELDNAMES, type WeatherRecord } from './types';

export const DATASET_CONTENT_TYPE = 'text/csv';

export interface DatasetMergeResult {
    /** Full serialized dataset, header included */
    content: string;
    /** False when the record's composite key was already present */
    appended: boolean;
    /** Data rows in `content` */
    rowCount: number;
    /** Repeated keys removed from the existing content */
    duplicatesDropped: number;
    /** True when non-blank existing content was unreadable and discarded */
    reset: boolean;
}

export interface SavedDataset extends DatasetMergeResult {
    key: string;
}

/**
 * Storage key of the dataset for the UTC day of `date`.
 */
export function datasetKey(date: Date): string {
    return `weather_data_${toDateString(date)}.csv`;
}

/**
 * `timestamp_region`, the uniqueness key within a dataset.
 */
export function compositeKey(record: Record<string, unknown>): string {
    return `${stringifyUnknown(record.timestamp)}_${stringifyUnknown(record.region)}`;
}

/**
 * Minimal sanity check: something other than whitespace, with at least one delimiter.
 */
export function isUsableDataset(text: string): boolean {
    return text.trim().length > 0 && text.includes(',');
}

interface ExistingRows {
    rows: Record<string, string>[];
    keys: Set<string>;
    duplicatesDropped: number;
    reset: boolean;
}

function loadExistingRows(existing: string | null): ExistingRows {
    const empty = (reset: boolean): ExistingRows => ({
        rows: [],
        keys: new Set(),
        duplicatesDropped: 0,
        reset
    });

    if (existing === null) return empty(false);
    if (!isUsableDataset(existing)) return empty(existing.trim().length > 0);

    let table: CsvTable;
    try {
        table = readCsvRecords(existing);
    } catch (error) {
        if (error instanceof CsvParseError) return empty(true);
        throw error;
    }

    if (!table.header.includes('timestamp') || !table.header.includes('region')) {
        return empty(true);
    }

    const keys = new Set<string>();
    const rows: Record<string, string>[] = [];
    let duplicatesDropped = 0;
    for (const row of table.records) {
        const key = compositeKey(row);
        if (keys.has(key)) {
            duplicatesDropped += 1;
            continue;
        }
        keys.add(key);
        rows.push(row);
    }

    return { rows, keys, duplicatesDropped, reset: false };
}

/**
 * Merge one record into the current dataset text (null when no dataset exists).
 * Existing rows keep their order, the first occurrence of each key wins, and
 * the record is appended last unless its key is already present.
 */
export function mergeDataset(existing: string | null, record: WeatherRecord): DatasetMergeResult {
    const { rows, keys, duplicatesDropped, reset } = loadExistingRows(existing);

    let content = formatCsvRow(FIELDNAMES);
    for (const row of rows) {
        content += formatCsvRow(cleanRecord(row));
    }

    const appended = !keys.has(compositeKey(record));
    if (appended) {
        content += formatCsvRow(cleanRecord(record));
    }

    return {
        content,
        appended,
        rowCount: rows.length + (appended ? 1 : 0),
        duplicatesDropped,
        reset
    };
}

/**
 * Decode stored dataset bytes as UTF-8; undefined when they are not valid UTF-8.
 */
export function decodeDataset(bytes: Uint8Array): string | undefined {
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
        if (error instanceof TypeError) return undefined;
        throw error;
    }
}

export interface SaveOptions {
    /** Selects the date partition (default: current time) */
    now?: Date;
}

/**
 * Load the day's dataset, merge the record, and write the full dataset back.
 * The write happens even when the record was a duplicate.
 */
export async function saveConsolidatedRecord(
    storage: StorageBackend,
    record: WeatherRecord,
    options: SaveOptions = {}
): Promise<SavedDataset> {
    const key = datasetKey(options.now ?? new Date());

    const existingBytes = await storage.get(key);
    const existing = existingBytes ? decodeDataset(existingBytes) : null;

    // Undecodable bytes are discarded like any other unreadable dataset.
    const merge = existing === undefined
        ? { ...mergeDataset(null, record), reset: true }
        : mergeDataset(existing, record);
    if (merge.reset) {
        console.warn(`[dataset] Existing ${key} was unreadable; starting a fresh dataset`);
    }
    if (merge.duplicatesDropped > 0) {
        console.warn(`[dataset] Dropped ${merge.duplicatesDropped} duplicate rows from ${key}`);
    }

    await storage.put(key, new TextEncoder().encode(merge.content), DATASET_CONTENT_TYPE);

    if (merge.appended) {
        console.log(`[dataset] Appended ${compositeKey(record)} → ${key} (${merge.rowCount} rows)`);
    } else {
        console.log(`[dataset] Skipped duplicate ${compositeKey(record)} → ${key}`);
    }

    return { key, ...merge };
}
