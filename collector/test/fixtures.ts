import { FIELDNAMES, type FieldName, type WeatherRecord } from '../types';

/**
 * Raw NWS-shaped payloads for a hot, dry afternoon in Phoenix.
 */
export const phoenixObservation = {
    properties: {
        textDescription: 'Clear',
        temperature: { unitCode: 'wmoUnit:degC', value: 38.0 },
        relativeHumidity: { unitCode: 'wmoUnit:percent', value: 10 },
        windSpeed: { unitCode: 'wmoUnit:km_h-1', value: 14.8 },
        windDirection: { unitCode: 'wmoUnit:degree_(angle)', value: 250 },
        barometricPressure: { unitCode: 'wmoUnit:Pa', value: 100780 },
        visibility: { unitCode: 'wmoUnit:m', value: 16090 },
        dewpoint: { unitCode: 'wmoUnit:degC', value: -1.1 },
        heatIndex: { unitCode: 'wmoUnit:degC', value: null },
        windChill: { unitCode: 'wmoUnit:degC', value: null }
    }
};

export const phoenixForecast = {
    properties: {
        periods: [
            {
                number: 1,
                name: 'This Afternoon',
                temperature: 104,
                shortForecast: 'Sunny',
                detailedForecast: '"Sunny, with a high near 104. Light wind."'
            },
            {
                number: 2,
                name: 'Tonight',
                temperature: 84,
                shortForecast: 'Clear',
                detailedForecast: 'Clear, with a low around 84.'
            }
        ]
    }
};

export const phoenixGrid = {
    properties: {
        snowLevel: { uom: 'wmoUnit:m', values: [] },
        probabilityOfPrecipitation: {
            uom: 'wmoUnit:percent',
            values: [
                { validTime: '2026-07-04T18:00:00+00:00/PT3H', value: 20 },
                { validTime: '2026-07-04T21:00:00+00:00/PT3H', value: 50 }
            ]
        },
        maxTemperature: { uom: 'wmoUnit:degC', values: [{ validTime: '2026-07-04T14:00:00+00:00/PT13H', value: 41.1 }] },
        minTemperature: { uom: 'wmoUnit:degC', values: [{ validTime: '2026-07-05T03:00:00+00:00/PT14H', value: '28.0' }] },
        maxDaytimeUVIndex: { values: [{ validTime: '2026-07-04T14:00:00+00:00/PT13H', value: null }] }
    }
};

/**
 * A record with every field empty except the ones given.
 */
export function makeRecord(fields: Partial<WeatherRecord> & Pick<WeatherRecord, 'timestamp' | 'region'>): WeatherRecord {
    const { timestamp, region, ...rest } = fields;
    return {
        timestamp,
        region,
        temperature_celsius: '',
        temperature_fahrenheit: '',
        humidity: '',
        wind_speed_ms: '',
        wind_direction: '',
        barometric_pressure: '',
        visibility: '',
        dew_point: '',
        heat_index: '',
        wind_chill: '',
        present_weather: '',
        forecast_temp: '',
        short_forecast: '',
        detailed_forecast: '',
        snow_level: '',
        ice_accumulation: '',
        precipitation_probability: '',
        max_temperature: '',
        min_temperature: '',
        uv_index: '',
        has_alerts: 'No',
        ...rest
    };
}

export const HEADER_LINE = `${FIELDNAMES.join(',')}\r\n`;

/**
 * Expected CSV line for cells already in on-disk form.
 */
export function csvLine(cells: Partial<Record<FieldName, string>>): string {
    return `${FIELDNAMES.map((field) => cells[field] ?? '').join(',')}\r\n`;
}
