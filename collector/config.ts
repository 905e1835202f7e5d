/**
 * Weather Collector — Runtime Configuration
 *
 * Settings come from environment variables (entry points load `.env` via
 * dotenv first). Blank variables count as unset.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_NWS_API_BASE, DEFAULT_REQUEST_TIMEOUT_MS, NwsClient } from './ingest/fetcher';
import { DEFAULT_REGION_DELAY_MS } from './ingest/pipeline';
import type { StorageBackend } from './storage/backend';
import { LocalStorage } from './storage/local-storage';
import { createS3Storage } from './storage/s3-storage';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
    WEATHER_BUCKET: z.string().min(1).default('weather-processed-data'),
    NWS_API_BASE: z.string().url().default(DEFAULT_NWS_API_BASE),
    NWS_USER_AGENT: z.string().min(1).default('(weather-collector, weather-collector@example.com)'),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
    REGION_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_REGION_DELAY_MS),
    STORAGE_DRIVER: z.enum(['s3', 'local']).default('s3'),
    LOCAL_DATA_DIR: z.string().min(1).default('./data'),
    AWS_REGION: z.string().min(1).default('us-east-1'),
    AWS_S3_ENDPOINT: z.string().url().optional(),
    S3_FORCE_PATH_STYLE: booleanFlag,
    PORT: z.coerce.number().int().positive().default(3000)
});

export type StorageConfig =
    | { driver: 's3'; bucket: string; region: string; endpoint?: string; forcePathStyle: boolean }
    | { driver: 'local'; dataDir: string };

export interface CollectorConfig {
    nwsApiBase: string;
    userAgent: string;
    requestTimeoutMs: number;
    regionDelayMs: number;
    storage: StorageConfig;
    port: number;
}

function compactEnv(env: NodeJS.ProcessEnv): Record<string, string> {
    const compacted: Record<string, string> = {};
    for (const [name, value] of Object.entries(env)) {
        const trimmed = value?.trim();
        if (trimmed) compacted[name] = trimmed;
    }
    return compacted;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
    const parsed = EnvSchema.safeParse(compactEnv(env));
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const values = parsed.data;

    const storage: StorageConfig =
        values.STORAGE_DRIVER === 'local'
            ? { driver: 'local', dataDir: values.LOCAL_DATA_DIR }
            : {
                driver: 's3',
                bucket: values.WEATHER_BUCKET,
                region: values.AWS_REGION,
                endpoint: values.AWS_S3_ENDPOINT,
                forcePathStyle: values.S3_FORCE_PATH_STYLE
            };

    return {
        nwsApiBase: values.NWS_API_BASE,
        userAgent: values.NWS_USER_AGENT,
        requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
        regionDelayMs: values.REGION_DELAY_MS,
        storage,
        port: values.PORT
    };
}

/**
 * Build the process-wide storage backend. Call once and pass it down.
 */
export function createStorage(config: StorageConfig): StorageBackend {
    if (config.driver === 'local') {
        return new LocalStorage(config.dataDir);
    }
    return createS3Storage({
        bucket: config.bucket,
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle
    });
}

export function createWeatherSource(config: CollectorConfig): NwsClient {
    return new NwsClient({
        baseUrl: config.nwsApiBase,
        userAgent: config.userAgent,
        timeoutMs: config.requestTimeoutMs
    });
}
