/**
 * Weather Collector — Region Table
 *
 * Fixed polling points, processed in this order on every run.
 */

import type { Region } from './types';

export const REGIONS: readonly Region[] = Object.freeze([
    // Northeast
    { name: 'UMass_Dartmouth', lat: '41.6297', lon: '-71.0068', description: 'Base location - varied seasonal weather' },
    { name: 'NYC_Central_Park', lat: '40.7829', lon: '-73.9654', description: 'Urban heat island, coastal effects' },
    { name: 'Mount_Washington_NH', lat: '44.2706', lon: '-71.3033', description: 'Extreme wind, alpine conditions' },

    // Southeast
    { name: 'Miami_FL', lat: '25.7617', lon: '-80.1918', description: 'Tropical weather, hurricanes' },
    { name: 'New_Orleans_LA', lat: '29.9511', lon: '-90.0715', description: 'Gulf Coast weather, high humidity' },

    // Midwest
    { name: 'Oklahoma_City_OK', lat: '35.4676', lon: '-97.5164', description: 'Tornado alley, severe storms' },
    { name: 'Chicago_IL', lat: '41.8781', lon: '-87.6298', description: 'Lake effect weather' },

    // Mountain
    { name: 'Denver_CO', lat: '39.7392', lon: '-104.9903', description: 'High altitude, mountain weather' },
    { name: 'Salt_Lake_City_UT', lat: '40.7608', lon: '-111.8910', description: 'Lake effect snow' },

    // West Coast
    { name: 'Seattle_WA', lat: '47.6062', lon: '-122.3321', description: 'Marine climate, persistent clouds' },
    { name: 'San_Francisco_CA', lat: '37.7749', lon: '-122.4194', description: 'Marine layer, microclimate' },

    // Desert Southwest
    { name: 'Phoenix_AZ', lat: '33.4484', lon: '-112.0740', description: 'Extreme heat, monsoon' },

    // Alaska
    { name: 'Anchorage_AK', lat: '61.2181', lon: '-149.9003', description: 'Subarctic conditions' },

    // Hawaii
    { name: 'Honolulu_HI', lat: '21.3069', lon: '-157.8583', description: 'Tropical climate' }
].map((region) => Object.freeze(region)));

export function findRegion(name: string): Region | undefined {
    return REGIONS.find((region) => region.name === name);
}
