/**
 * Weather Collector — Core Type Definitions
 *
 * These types define the flat record schema written to the daily datasets and
 * the transient raw bundle each region poll produces.
 */

// =============================================================================
// Record Schema
// =============================================================================

/**
 * Column order of every dataset. Defines both the in-memory record shape and
 * the on-disk header; never reordered.
 */
export const FIELDNAMES = [
    'timestamp',
    'region',
    'temperature_celsius',
    'temperature_fahrenheit',
    'humidity',
    'wind_speed_ms',
    'wind_direction',
    'barometric_pressure',
    'visibility',
    'dew_point',
    'heat_index',
    'wind_chill',
    'present_weather',
    'forecast_temp',
    'short_forecast',
    'detailed_forecast',
    'snow_level',
    'ice_accumulation',
    'precipitation_probability',
    'max_temperature',
    'min_temperature',
    'uv_index',
    'has_alerts'
] as const;

export type FieldName = (typeof FIELDNAMES)[number];

/** Empty-value marker shared by every field. */
export const EMPTY = '';

/**
 * A normalized field value. Numeric fields hold a number once coerced,
 * or whatever non-numeric value the source sent.
 */
export type FieldValue = string | number;

export type AlertFlag = 'Yes' | 'No';

/**
 * One observation of one region at one collection time.
 * Every field is present; absent data is the empty marker.
 */
export type WeatherRecord = {
    [K in FieldName]: K extends 'has_alerts' ? AlertFlag : K extends 'timestamp' | 'region' ? string : FieldValue;
};

// =============================================================================
// Raw Source Payloads
// =============================================================================

/**
 * Raw responses gathered for one region in one poll cycle.
 * Shapes are whatever the upstream API returned; nothing is trusted.
 */
export interface RawObservationBundle {
    /** Latest station observation */
    current: unknown;

    /** Hourly forecast (collected, not mapped into the record) */
    hourly: unknown;

    /** Short-term period forecast */
    forecast: unknown;

    /** Grid forecast: properties of time-ordered validity/value lists */
    grid: unknown;

    /** Active alerts for the region's forecast zone */
    alerts: unknown;
}

/** Endpoints resolved from the points lookup for a coordinate. */
export interface StationData {
    stationId: string;
    forecastGrid: string;
    forecastHourly: string;
    forecast: string;
    /** Zone identifier used for the alerts lookup, when the API reported one */
    forecastZone: string | null;
}

// =============================================================================
// Regions
// =============================================================================

export interface Region {
    name: string;
    /** Decimal degrees, kept as text so URLs use the configured precision */
    lat: string;
    lon: string;
    description: string;
}

// =============================================================================
// Run Summary
// =============================================================================

export interface FailedRegion {
    region: string;
    error: string;
}

/**
 * Final status payload of one collection run.
 * Keys are snake_case: this object is the JSON body returned to callers.
 */
export interface CollectionSummary {
    message: string;
    execution_start: string;
    execution_end: string;
    processed_count: number;
    failed_count: number;
    successful_regions: string[];
    failed_regions: FailedRegion[];
}

export interface RunFailureBody {
    error: string;
    execution_start: string;
    results: {
        successful_regions: string[];
        failed_regions: FailedRegion[];
    };
}

export type CollectionResponse =
    | { statusCode: 200; body: CollectionSummary }
    | { statusCode: 500; body: RunFailureBody };
