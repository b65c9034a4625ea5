import test from 'node:test';
import assert from 'node:assert/strict';
import { RateLimiter } from '../../utils/rateLimiter';
import { NominatimResolver, parseNominatimHit } from '../nominatim';
import { stubAxios } from './fakes';

const noWait = () => new RateLimiter(0);

test('resolves the first hit, converting string coordinates', async () => {
  const { client, requests } = stubAxios(() => [{ lat: '37.3861', lon: '-122.0839', display_name: 'Mountain View' }]);
  const resolver = new NominatimResolver({ client, limiter: noWait() });

  assert.deepEqual(await resolver.resolve(' 500 Castro St, Mountain View, CA '), { latitude: 37.3861, longitude: -122.0839 });
  assert.equal(requests[0].url, 'https://nominatim.openstreetmap.org/search');
  assert.deepEqual(requests[0].params, { q: '500 Castro St, Mountain View, CA', format: 'json', limit: 1 });
});

test('returns null when there is no match', async () => {
  const { client } = stubAxios(() => []);
  const resolver = new NominatimResolver({ client, limiter: noWait() });
  assert.equal(await resolver.resolve('Nowhere'), null);
});

test('returns null when the request fails', async () => {
  const { client } = stubAxios(() => new Error('timeout of 10000ms exceeded'));
  const resolver = new NominatimResolver({ client, limiter: noWait() });
  assert.equal(await resolver.resolve('1 Main St'), null);
});

test('does not call the provider for a blank address', async () => {
  const { client, requests } = stubAxios(() => []);
  const resolver = new NominatimResolver({ client, limiter: noWait() });
  assert.equal(await resolver.resolve('   '), null);
  assert.equal(requests.length, 0);
});

test('waits between consecutive lookups', async () => {
  const waits: number[] = [];
  let clock = 5000;
  const limiter = new RateLimiter(
    1000,
    async (ms) => {
      waits.push(ms);
      clock += ms;
    },
    () => clock,
  );
  const { client } = stubAxios(() => [{ lat: '1', lon: '2' }]);
  const resolver = new NominatimResolver({ client, limiter });

  await resolver.resolve('a');
  clock += 250;
  await resolver.resolve('b');

  assert.deepEqual(waits, [750]);
});

test('parseNominatimHit rejects malformed bodies', () => {
  assert.equal(parseNominatimHit({ lat: '1', lon: '2' }), null);
  assert.equal(parseNominatimHit([{ lat: 'north', lon: '2' }]), null);
  assert.equal(parseNominatimHit([{ lat: '1' }]), null);
  assert.deepEqual(parseNominatimHit([{ lat: 1.5, lon: -2 }]), { latitude: 1.5, longitude: -2 });
});

test('a slow lookup is still followed by a full pause', async () => {
  const waits: number[] = [];
  let clock = 0;
  const limiter = new RateLimiter(
    1000,
    async (ms) => {
      waits.push(ms);
      clock += ms;
    },
    () => clock,
  );
  const starts: number[] = [];
  const { client } = stubAxios(() => {
    starts.push(clock);
    clock += 1500;
    return [{ lat: '1', lon: '2' }];
  });
  const resolver = new NominatimResolver({ client, limiter });

  await resolver.resolve('a');
  await resolver.resolve('b');

  assert.deepEqual(waits, [1000]);
  assert.deepEqual(starts, [0, 2500]);
});
