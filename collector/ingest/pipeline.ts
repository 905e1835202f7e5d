/**
 * Weather Collector — Collection Pipeline
 *
 * Main entry point for a collection run.
 * For each region in order: resolve station, fetch payloads, normalize,
 * merge into the day's dataset.
 */
/* eslint-disable no-console */

import { saveConsolidatedRecord } from '../dataset';
import { describeError, err, ok, type Result } from '../errors';
import { normalizeObservation } from '../normalize';
import { REGIONS } from '../regions';
import type { StorageBackend } from '../storage/backend';
import { formatTimestamp, sleep } from '../time';
import type {
    CollectionResponse,
    CollectionSummary,
    FailedRegion,
    Region,
    WeatherRecord
} from '../types';
import type { WeatherSource } from './fetcher';

export const DEFAULT_REGION_DELAY_MS = 1_000;

// =============================================================================
// Region Pipeline
// =============================================================================

export type RegionStage = 'station' | 'observation' | 'normalize' | 'save';

export interface RegionSuccess {
    region: string;
    record: WeatherRecord;
    datasetKey: string;
    appended: boolean;
}

export interface RegionFailure {
    region: string;
    stage: RegionStage;
    error: string;
}

export interface RegionDependencies {
    source: WeatherSource;
    storage: StorageBackend;
    /** Collection time: record timestamp and date partition */
    now: Date;
}

/**
 * Run one region end to end. Never throws: any fatal failure is returned
 * with the stage it happened in.
 */
export async function processRegion(
    region: Region,
    deps: RegionDependencies
): Promise<Result<RegionSuccess, RegionFailure>> {
    const { source, storage, now } = deps;
    let stage: RegionStage = 'station';

    try {
        const station = await source.getStationData(region.lat, region.lon);

        stage = 'observation';
        const weather = await source.getWeatherData(station);
        const alerts = await source.getWeatherAlerts(station.forecastZone);

        stage = 'normalize';
        const record = normalizeObservation({ ...weather, alerts }, region.name, now);

        stage = 'save';
        const saved = await saveConsolidatedRecord(storage, record, { now });

        return ok({
            region: region.name,
            record,
            datasetKey: saved.key,
            appended: saved.appended
        });
    } catch (error) {
        const message = describeError(error);
        console.error(`[collect] Error processing region ${region.name} (${stage}): ${message}`);
        return err({ region: region.name, stage, error: message });
    }
}

// =============================================================================
// Collection Runner
// =============================================================================

export interface CollectionOptions {
    source: WeatherSource;
    storage: StorageBackend;
    /** Regions in processing order (default: the full region table) */
    regions?: readonly Region[];
    /** Pause before every region after the first (default: 1000) */
    regionDelayMs?: number;
    /** Override clock (for deterministic timestamps) */
    clock?: () => Date;
    /** Override pacing sleep */
    sleep?: (ms: number) => Promise<void>;
}

interface RunResults {
    successful_regions: string[];
    failed_regions: FailedRegion[];
}

async function collect(
    options: CollectionOptions,
    executionStart: Date,
    results: RunResults
): Promise<CollectionSummary> {
    const {
        source,
        storage,
        regions = REGIONS,
        regionDelayMs = DEFAULT_REGION_DELAY_MS,
        clock = () => new Date(),
        sleep: pause = sleep
    } = options;

    console.log(`[collect] Starting execution at: ${formatTimestamp(executionStart)}`);

    for (const [index, region] of regions.entries()) {
        // NWS rate limit: pace region starts
        if (index > 0 && regionDelayMs > 0) {
            await pause(regionDelayMs);
        }

        const now = clock();
        console.log(`[collect] Processing region: ${region.name} at ${formatTimestamp(now)}`);

        const result = await processRegion(region, { source, storage, now });
        if (result.ok) {
            results.successful_regions.push(result.value.region);
        } else {
            results.failed_regions.push({ region: result.error.region, error: result.error.error });
        }
    }

    const executionEnd = clock();
    console.log(
        `[collect] Completed execution at: ${formatTimestamp(executionEnd)} ` +
        `(${results.successful_regions.length} succeeded, ${results.failed_regions.length} failed)`
    );

    return {
        message: 'Weather data collection completed',
        execution_start: formatTimestamp(executionStart),
        execution_end: formatTimestamp(executionEnd),
        processed_count: results.successful_regions.length,
        failed_count: results.failed_regions.length,
        successful_regions: results.successful_regions,
        failed_regions: results.failed_regions
    };
}

/**
 * Process every region once and summarize. Region failures are recorded in
 * the summary; they never stop the run.
 */
export async function runCollection(options: CollectionOptions): Promise<CollectionSummary> {
    const executionStart = (options.clock ?? (() => new Date()))();
    return collect(options, executionStart, { successful_regions: [], failed_regions: [] });
}

/**
 * Run a collection and wrap it as a status payload: 200 when the run
 * completes (whatever happened to individual regions), 500 when the run
 * itself fails.
 */
export async function handleCollection(options: CollectionOptions): Promise<CollectionResponse> {
    const executionStart = (options.clock ?? (() => new Date()))();
    const results: RunResults = { successful_regions: [], failed_regions: [] };

    try {
        const summary = await collect(options, executionStart, results);
        return { statusCode: 200, body: summary };
    } catch (error) {
        const message = describeError(error);
        console.error(`[collect] Collection run failed: ${message}`);
        return {
            statusCode: 500,
            body: {
                error: `Collection run failed: ${message}`,
                execution_start: formatTimestamp(executionStart),
                results
            }
        };
    }
}
