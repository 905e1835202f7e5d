/**
 * Weather Collector — NWS Fetcher
 *
 * Fetches raw observations, forecasts and alerts from the National Weather
 * Service API (api.weather.gov). No transformation beyond resolving endpoints;
 * normalization happens in ../normalize.
 */
/* eslint-disable no-console */

import { z } from 'zod';
import { HttpRequestError, describeError } from '../errors';
import type { RawObservationBundle, StationData } from '../types';

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_NWS_API_BASE = 'https://api.weather.gov';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const EMPTY_ALERTS = Object.freeze({ features: [] });

export interface NwsClientOptions {
    baseUrl?: string;
    /** NWS asks every client to identify itself with contact details */
    userAgent: string;
    /** Per-request timeout */
    timeoutMs?: number;
}

/**
 * Source of raw weather payloads for the region pipeline.
 */
export interface WeatherSource {
    getStationData(lat: string, lon: string): Promise<StationData>;
    getWeatherData(station: StationData): Promise<Omit<RawObservationBundle, 'alerts'>>;
    getWeatherAlerts(zoneId: string | null): Promise<unknown>;
}

// =============================================================================
// Response Schemas
// =============================================================================

const PointsResponseSchema = z.object({
    properties: z.object({
        observationStations: z.string().min(1),
        forecastGridData: z.string().min(1),
        forecastHourly: z.string().min(1),
        forecast: z.string().min(1),
        forecastZone: z.string().nullish()
    })
});

// Stations come nearest first; only the first one is read.
const StationsResponseSchema = z.object({
    features: z.array(z.unknown()).default([])
});

const StationFeatureSchema = z.object({
    properties: z.object({
        stationIdentifier: z.string().min(1)
    })
});

function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, url: string): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Unexpected response from ${url}: ${issues}`);
    }
    return result.data;
}

/**
 * Zone id from a forecast zone URL (`.../zones/forecast/AZZ540` → `AZZ540`).
 */
export function zoneIdFromUrl(url: string): string | null {
    const segment = url.replace(/\/+$/, '').split('/').pop();
    return segment ? segment : null;
}

// =============================================================================
// Client
// =============================================================================

export class NwsClient implements WeatherSource {
    private readonly baseUrl: string;
    private readonly userAgent: string;
    private readonly timeoutMs: number;

    constructor(options: NwsClientOptions) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_NWS_API_BASE).replace(/\/+$/, '');
        this.userAgent = options.userAgent;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    }

    /**
     * GET a JSON document. Non-2xx responses, network errors and timeouts
     * all surface as HttpRequestError.
     */
    async fetchJson(url: string): Promise<unknown> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
            const response = await fetch(url, {
                headers: {
                    'User-Agent': this.userAgent,
                    Accept: 'application/geo+json'
                },
                signal: controller.signal
            });
            if (!response.ok) {
                throw new HttpRequestError(`Fetch failed: ${response.status} ${response.statusText} (${url})`, {
                    url,
                    status: response.status
                });
            }
            const data: unknown = await response.json();
            return data;
        } catch (error) {
            if (error instanceof HttpRequestError) throw error;
            if (controller.signal.aborted) {
                throw new HttpRequestError(`Request timed out after ${this.timeoutMs}ms (${url})`, {
                    url,
                    cause: error
                });
            }
            throw new HttpRequestError(`Request failed: ${describeError(error)} (${url})`, { url, cause: error });
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Resolve the nearest observation station and forecast endpoints for a point.
     */
    async getStationData(lat: string, lon: string): Promise<StationData> {
        const pointsUrl = `${this.baseUrl}/points/${lat},${lon}`;
        const points = parseResponse(PointsResponseSchema, await this.fetchJson(pointsUrl), pointsUrl);
        const { properties } = points;

        const stationsUrl = properties.observationStations;
        const stations = parseResponse(StationsResponseSchema, await this.fetchJson(stationsUrl), stationsUrl);
        if (stations.features.length === 0) {
            throw new Error('No weather stations found in response');
        }
        const nearest = parseResponse(StationFeatureSchema, stations.features[0], stationsUrl);

        return {
            stationId: nearest.properties.stationIdentifier,
            forecastGrid: properties.forecastGridData,
            forecastHourly: properties.forecastHourly,
            forecast: properties.forecast,
            forecastZone: properties.forecastZone ? zoneIdFromUrl(properties.forecastZone) : null
        };
    }

    /**
     * Latest observation plus hourly, period and grid forecasts.
     * Only the observation is required; a failed forecast becomes `{}`.
     */
    async getWeatherData(station: StationData): Promise<Omit<RawObservationBundle, 'alerts'>> {
        const observationUrl = `${this.baseUrl}/stations/${encodeURIComponent(station.stationId)}/observations/latest`;
        const current = await this.fetchJson(observationUrl);

        const hourly = await this.fetchOptional('hourly', station.forecastHourly, {});
        const forecast = await this.fetchOptional('forecast', station.forecast, {});
        const grid = await this.fetchOptional('grid', station.forecastGrid, {});

        return { current, hourly, forecast, grid };
    }

    /**
     * Active alerts for a forecast zone; `{ features: [] }` when unavailable.
     */
    async getWeatherAlerts(zoneId: string | null): Promise<unknown> {
        if (!zoneId) {
            console.warn('[fetch] No forecast zone for point; skipping alerts');
            return EMPTY_ALERTS;
        }
        const alertsUrl = `${this.baseUrl}/alerts/active/zone/${encodeURIComponent(zoneId)}`;
        return this.fetchOptional('alerts', alertsUrl, EMPTY_ALERTS);
    }

    private async fetchOptional(kind: string, url: string, placeholder: unknown): Promise<unknown> {
        try {
            return await this.fetchJson(url);
        } catch (error) {
            console.warn(`[fetch] Error getting ${kind} data: ${describeError(error)}`);
            return placeholder;
        }
    }
}
