import { AxiosInstance } from 'axios';
import { isResolved } from '../core/distance';
import { Coordinate, CoordinateResolver } from '../core/types';
import { createHttpClient, describeHttpError } from '../utils/httpClient';
import { log } from '../utils/logger';
import { RateLimiter } from '../utils/rateLimiter';

export const NOMINATIM_SEARCH_URL = 'https://nominatim.openstreetmap.org/search';
export const GEOCODE_TIMEOUT_MS = 10000;
// Nominatim usage policy: at most one request per second.
export const MIN_GEOCODE_INTERVAL_MS = 1000;

export interface NominatimResolverOptions {
  client?: AxiosInstance;
  url?: string;
  userAgent?: string;
  limiter?: RateLimiter;
}

const toNumber = (value: unknown): number => (typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN);

/** Reads the first hit of a `format=json` search response; Nominatim returns lat/lon as strings. */
export const parseNominatimHit = (body: unknown): Coordinate | null => {
  if (!Array.isArray(body) || body.length === 0) return null;
  const hit: unknown = body[0];
  if (typeof hit !== 'object' || hit === null || !('lat' in hit) || !('lon' in hit)) return null;
  const coord = { latitude: toNumber(hit.lat), longitude: toNumber(hit.lon) };
  return isResolved(coord) ? coord : null;
};

export class NominatimResolver implements CoordinateResolver {
  private readonly client: AxiosInstance;
  private readonly url: string;
  private readonly limiter: RateLimiter;

  constructor(options: NominatimResolverOptions = {}) {
    this.client = options.client ?? createHttpClient({ timeoutMs: GEOCODE_TIMEOUT_MS, userAgent: options.userAgent });
    this.url = options.url ?? NOMINATIM_SEARCH_URL;
    this.limiter = options.limiter ?? new RateLimiter(MIN_GEOCODE_INTERVAL_MS);
  }

  async resolve(address: string): Promise<Coordinate | null> {
    const q = address.trim();
    if (!q) return null;

    try {
      const { data } = await this.limiter.run(() => this.client.get<unknown>(this.url, { params: { q, format: 'json', limit: 1 } }));
      return parseNominatimHit(data);
    } catch (error) {
      log('WARN', `geocoding failed for "${q}"`, describeHttpError(error));
      return null;
    }
  }
}
