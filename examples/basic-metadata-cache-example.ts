/**
 * Basic metadata cache example
 *
 * Builds a cache over in-memory resources, looks up a region and a non-geographical
 * calling code, and shows that repeated lookups share one record.
 *
 * Run with: npx tsx examples/basic-metadata-cache-example.ts
 */
import {
  createCallingCodeClassifier,
  createMemoryMetadataLoader,
  createMetadataCache,
  formatBytes
} from '../src';

const resources = {
  Example_GB: JSON.stringify({
    metadata: [{
      id: 'GB',
      countryCode: 44,
      internationalPrefix: '00',
      nationalPrefix: '0',
      generalDesc: { nationalNumberPattern: '[1-357-9]\\d{9}', possibleLength: [10] }
    }]
  }),
  Example_800: JSON.stringify({
    metadata: [{
      id: '001',
      countryCode: 800,
      generalDesc: { nationalNumberPattern: '\\d{8}', possibleLength: [8] }
    }]
  })
};

export const runBasicMetadataCacheExample = async () => {
  const cache = createMetadataCache({
    filePrefix: 'Example',
    metadataLoader: createMemoryMetadataLoader(resources),
    callingCodeClassifier: createCallingCodeClassifier({ 44: ['GB'], 800: ['001'] })
  });

  const gb = await cache.getMetadataForRegion('GB');
  console.log(`GB uses calling code +${gb.countryCode}`);

  const tollFree = await cache.getMetadataForNonGeographicalRegion(800);
  console.log(`+800 belongs to region ${tollFree?.id}`);

  // +44 is geographical, so the non-geographical partition has nothing for it
  const notNonGeographical = await cache.getMetadataForNonGeographicalRegion(44);
  console.log(`+44 non-geographical metadata: ${notNonGeographical}`);

  const gbAgain = await cache.getMetadataForRegion('GB');
  console.log(`Second GB lookup returned the same record: ${gbAgain === gb}`);

  const info = cache.getCacheInfo();
  console.log(`Cached ${info.regionCount} region(s), ${info.nonGeographicalCount} non-geographical, ~${formatBytes(info.estimatedSizeBytes)}`);

  return { gb, gbAgain, tollFree, notNonGeographical, stats: cache.getStats() };
};

if (process.argv[1] && import.meta.url.endsWith(process.argv[1].split('/').pop() ?? '')) {
  runBasicMetadataCacheExample().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
