import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fromEnv, fromFileObject, loadConfigFile, mergeLayers, normalizeConfig } from '../config';
import { ConfigValidationError } from '../errors';

test('reads settings from the environment', () => {
  const raw = fromEnv({
    BASE_ADDRESS: '500 Castro St, Mountain View, CA',
    GOOGLE_MAPS_API_KEY: 'test-key',
    SEARCH_RADIUS_MILES: '2.5',
    MIN_RATINGS_SOURCE: '20',
    SEARCH_KEYWORDS: 'sushi, ramen,,',
    PAGE_LIMIT: '',
  });
  assert.deepEqual(normalizeConfig(raw), {
    baseAddress: '500 Castro St, Mountain View, CA',
    googleMapsApiKey: 'test-key',
    radiusMiles: 2.5,
    minRatings: 20,
    keywords: ['sushi', 'ramen'],
    pageLimit: 10,
    pageSettleDelayMs: 2000,
    geocodeIntervalMs: 1000,
    keywordDelayMs: 1000,
    outputFile: 'google_maps_leads.csv',
    nominatimUrl: undefined,
    nominatimUserAgent: undefined,
  });
});

test('accepts snake_case keys in a config file and rejects unknown ones', () => {
  assert.deepEqual(fromFileObject({ base_address: '1 Elm St', search_keywords: ['tacos'], pageLimit: 3 }), {
    baseAddress: '1 Elm St',
    searchKeywords: ['tacos'],
    pageLimit: 3,
  });
  assert.throws(() => fromFileObject({ radius: 3 }), ConfigValidationError);
  assert.throws(() => fromFileObject(['nope']), ConfigValidationError);
});

test('loads a JSON config file', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'cfg-'));
  const good = join(dir, 'leads.config.json');
  writeFileSync(good, JSON.stringify({ base_address: '1 Elm St', min_ratings_source: 5 }));
  assert.deepEqual(await loadConfigFile(good), { baseAddress: '1 Elm St', minRatingsSource: 5 });

  await assert.rejects(loadConfigFile(join(dir, 'config.yaml.json')), (error: unknown) => {
    assert.ok(error instanceof ConfigValidationError);
    assert.equal(error.message, `config file not found: ${join(dir, 'config.yaml.json')}`);
    return true;
  });

  const bad = join(dir, 'broken.json');
  writeFileSync(bad, '{ base_address: ');
  await assert.rejects(loadConfigFile(bad), ConfigValidationError);
});

test('later layers override earlier ones, undefined does not', () => {
  const merged = mergeLayers({ baseAddress: 'env', searchRadiusMiles: '1' }, { baseAddress: 'file' }, { baseAddress: undefined, searchRadiusMiles: '4' });
  assert.deepEqual(merged, { baseAddress: 'file', searchRadiusMiles: '4' });
});

test('a missing API key is left for the pipeline to reject', () => {
  assert.equal(normalizeConfig({ baseAddress: '1 Elm St' }).googleMapsApiKey, '');
});

test('rejects invalid values', () => {
  const invalid = [
    {},
    { baseAddress: '  ' },
    { baseAddress: 'x', searchRadiusMiles: 'far' },
    { baseAddress: 'x', searchRadiusMiles: -1 },
    { baseAddress: 'x', minRatingsSource: 2.5 },
    { baseAddress: 'x', pageLimit: 0 },
    { baseAddress: 'x', searchKeywords: [1, 2] },
    { baseAddress: 'x', googleMapsApiKey: 42 },
    { baseAddress: 'x', pageSettleDelayMs: 500 },
    { baseAddress: 'x', geocodeIntervalMs: 0 },
  ];
  for (const raw of invalid) {
    assert.throws(() => normalizeConfig(raw), ConfigValidationError, JSON.stringify(raw));
  }
});
