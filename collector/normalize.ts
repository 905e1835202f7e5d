/**
 * Weather Collector — Field Normalizer
 *
 * Flattens the raw observation, forecast, grid and alert payloads of one
 * region into a WeatherRecord. Lookups never throw on malformed input; they
 * fall back to the empty marker instead.
 */

import { stringifyUnknown, stripWrappingQuotes } from './clean';
import { formatTimestamp } from './time';
import { EMPTY, type FieldValue, type RawObservationBundle, type WeatherRecord } from './types';

type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk `keys` into nested objects. Any non-object step, missing key or
 * null/undefined result returns `fallback`.
 */
export function safeGetValue(data: unknown, keys: readonly string[], fallback: unknown = EMPTY): unknown {
    let current: unknown = data;
    for (const key of keys) {
        if (!isJsonObject(current) || !Object.hasOwn(current, key)) {
            return fallback;
        }
        current = current[key];
    }
    return current ?? fallback;
}

/**
 * Value of the first validity-period entry of a grid property,
 * e.g. `grid.snowLevel.values[0].value`.
 */
export function safeGetGridValue(grid: unknown, property: string): unknown {
    const values = safeGetValue(grid, [property, 'values'], []);
    if (!Array.isArray(values) || values.length === 0) {
        return EMPTY;
    }
    return safeGetValue(values[0], ['value'], EMPTY);
}

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerce numeric values (numbers or numeric text) to numbers; integral
 * values print without a fractional part (`"72.0"` → 72). Everything else
 * passes through as text; empty input stays empty rather than becoming 0.
 */
export function formatNumber(value: unknown): FieldValue {
    if (value === null || value === undefined || value === EMPTY) {
        return EMPTY;
    }
    if (typeof value === 'number') {
        return value;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (!NUMERIC_PATTERN.test(trimmed)) return value;
        const parsed = Number(trimmed);
        return Number.isFinite(parsed) ? parsed : value;
    }
    return stringifyUnknown(value);
}

export function celsiusToFahrenheit(celsius: FieldValue): FieldValue {
    if (typeof celsius !== 'number' || !Number.isFinite(celsius)) {
        return EMPTY;
    }
    return formatNumber((celsius * 9) / 5 + 32);
}

/**
 * First period of a period forecast (`properties.periods[0]`), or `{}`.
 */
export function firstForecastPeriod(forecast: unknown): unknown {
    const periods = safeGetValue(forecast, ['properties', 'periods'], []);
    return Array.isArray(periods) && periods.length > 0 ? periods[0] : {};
}

/**
 * Build the record for one region from its raw bundle.
 *
 * @param now collection time; becomes the record timestamp
 */
export function normalizeObservation(
    bundle: RawObservationBundle,
    regionName: string,
    now: Date
): WeatherRecord {
    const current = safeGetValue(bundle.current, ['properties'], {});
    const forecast = firstForecastPeriod(bundle.forecast);
    const grid = safeGetValue(bundle.grid, ['properties'], {});

    const observed = (property: string): FieldValue =>
        formatNumber(safeGetValue(current, [property, 'value']));
    const gridded = (property: string): FieldValue => formatNumber(safeGetGridValue(grid, property));

    const temperatureCelsius = observed('temperature');
    const features = safeGetValue(bundle.alerts, ['features'], []);

    // Commas become pipes so free text never splits a CSV row.
    const detailedForecast = stripWrappingQuotes(
        stringifyUnknown(safeGetValue(forecast, ['detailedForecast']))
    ).replace(/,/g, '|');

    return {
        timestamp: formatTimestamp(now),
        region: regionName,
        temperature_celsius: temperatureCelsius,
        temperature_fahrenheit: celsiusToFahrenheit(temperatureCelsius),
        humidity: observed('relativeHumidity'),
        wind_speed_ms: observed('windSpeed'),
        wind_direction: observed('windDirection'),
        barometric_pressure: observed('barometricPressure'),
        visibility: observed('visibility'),
        dew_point: observed('dewpoint'),
        heat_index: observed('heatIndex'),
        wind_chill: observed('windChill'),
        present_weather: stringifyUnknown(safeGetValue(current, ['textDescription'])),
        forecast_temp: formatNumber(safeGetValue(forecast, ['temperature'])),
        short_forecast: stringifyUnknown(safeGetValue(forecast, ['shortForecast'])),
        detailed_forecast: detailedForecast,
        snow_level: gridded('snowLevel'),
        ice_accumulation: gridded('iceAccumulation'),
        precipitation_probability: gridded('probabilityOfPrecipitation'),
        max_temperature: gridded('maxTemperature'),
        min_temperature: gridded('minTemperature'),
        uv_index: gridded('maxDaytimeUVIndex'),
        has_alerts: Array.isArray(features) && features.length > 0 ? 'Yes' : 'No'
    };
}
