/**
 * Run one collection from the command line.
 *
 *   npm run collect                      # every region
 *   npm run collect -- Phoenix_AZ Miami_FL
 */
import 'dotenv/config';
import {
    REGIONS,
    createStorage,
    createWeatherSource,
    findRegion,
    handleCollection,
    loadConfig,
    type Region
} from '../collector';

function selectRegions(names: string[]): readonly Region[] {
    if (names.length === 0) return REGIONS;
    return names.map((name) => {
        const region = findRegion(name);
        if (!region) {
            throw new Error(`Unknown region: ${name} (known: ${REGIONS.map((r) => r.name).join(', ')})`);
        }
        return region;
    });
}

async function main(): Promise<void> {
    const config = loadConfig();
    const regions = selectRegions(process.argv.slice(2));

    const response = await handleCollection({
        source: createWeatherSource(config),
        storage: createStorage(config.storage),
        regions,
        regionDelayMs: config.regionDelayMs
    });

    console.log(JSON.stringify(response, null, 2));
    if (response.statusCode !== 200) {
        process.exitCode = 1;
    }
}

main().catch((error) => {
    console.error('[collect] Failed:', error);
    process.exitCode = 1;
});
