import test from 'node:test';
import assert from 'node:assert/strict';
import { buildProgram, main, optionsToRaw } from '../cli';

test('maps command line flags onto config settings', () => {
  const opts = buildProgram()
    .parse(['node', 'cli', '-a', '1 Elm St', '-r', '2', '--min-ratings', '15', '-k', 'sushi,ramen', '-p', '3', '-o', 'out.csv'])
    .opts();
  assert.deepEqual(optionsToRaw(opts), {
    baseAddress: '1 Elm St',
    searchRadiusMiles: '2',
    minRatingsSource: '15',
    searchKeywords: 'sushi,ramen',
    pageLimit: '3',
    outputFile: 'out.csv',
  });
});

test('exits with status 1 when no API key is configured', async () => {
  delete process.env.GOOGLE_MAPS_API_KEY;
  assert.equal(await main(['node', 'cli', '--address', '1 Elm St']), 1);
});

test('exits with status 1 on invalid settings', async () => {
  assert.equal(await main(['node', 'cli', '--address', '1 Elm St', '--radius', 'far']), 1);
});

test('exits with status 1 when the config file does not exist', async () => {
  assert.equal(await main(['node', 'cli', '--config', 'does-not-exist.json', '--address', '1 Elm St']), 1);
});

test('the --config help says the file is JSON, not YAML', () => {
  const option = buildProgram().options.find((o) => o.long === '--config');
  assert.ok(option);
  assert.match(option.description, /JSON config file; takes the snake_case keys of the old config\.yaml/);
  assert.match(option.description, /not YAML/);
});
