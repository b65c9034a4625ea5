import { promises as fs } from 'fs';
import { DEFAULT_PAGE_LIMIT, DEFAULT_SETTLE_DELAY_MS } from '../adapters/google_places';
import { MIN_GEOCODE_INTERVAL_MS } from '../adapters/nominatim';
import { DEFAULT_OUTPUT_FILE } from '../adapters/csvSink';
import { ConfigValidationError } from './errors';
import { DEFAULT_KEYWORD_DELAY_MS } from './pipeline';
import { LeadPipelineConfig } from './types';

export interface ResolverSettings {
  geocodeIntervalMs: number;
  nominatimUrl?: string;
  nominatimUserAgent?: string;
}

export interface AppConfig extends LeadPipelineConfig, ResolverSettings {
  pageLimit: number;
  pageSettleDelayMs: number; // provider minimum, raising it is allowed
  keywordDelayMs: number;
  outputFile: string;
}

export type RawConfig = Record<string, unknown>;

export const DEFAULT_RADIUS_MILES = 5;
export const DEFAULT_MIN_RATINGS = 0;

// snake_case keys accepted in a config file, keyed to their camelCase form.
const FILE_KEYS: Record<string, string> = {
  base_address: 'baseAddress',
  google_maps_api_key: 'googleMapsApiKey',
  search_radius_miles: 'searchRadiusMiles',
  min_ratings_source: 'minRatingsSource',
  search_keywords: 'searchKeywords',
  page_limit: 'pageLimit',
  page_settle_delay_ms: 'pageSettleDelayMs',
  geocode_interval_ms: 'geocodeIntervalMs',
  keyword_delay_ms: 'keywordDelayMs',
  output_file: 'outputFile',
  nominatim_url: 'nominatimUrl',
  nominatim_user_agent: 'nominatimUserAgent',
};

const ENV_KEYS: Record<string, string> = {
  BASE_ADDRESS: 'baseAddress',
  GOOGLE_MAPS_API_KEY: 'googleMapsApiKey',
  SEARCH_RADIUS_MILES: 'searchRadiusMiles',
  MIN_RATINGS_SOURCE: 'minRatingsSource',
  SEARCH_KEYWORDS: 'searchKeywords',
  PAGE_LIMIT: 'pageLimit',
  PAGE_SETTLE_DELAY_MS: 'pageSettleDelayMs',
  GEOCODE_INTERVAL_MS: 'geocodeIntervalMs',
  KEYWORD_DELAY_MS: 'keywordDelayMs',
  OUTPUT_FILE: 'outputFile',
  NOMINATIM_URL: 'nominatimUrl',
  NOMINATIM_USER_AGENT: 'nominatimUserAgent',
};

const KNOWN_KEYS = new Set(Object.values(FILE_KEYS));

const isRecord = (value: unknown): value is RawConfig => !!value && typeof value === 'object' && !Array.isArray(value);

export const fromEnv = (env: NodeJS.ProcessEnv = process.env): RawConfig => {
  const raw: RawConfig = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') raw[key] = value;
  }
  return raw;
};

export const fromFileObject = (parsed: unknown, source = 'config file'): RawConfig => {
  if (!isRecord(parsed)) throw new ConfigValidationError(`${source} must contain a JSON object`);
  const raw: RawConfig = {};
  for (const [name, value] of Object.entries(parsed)) {
    const key = Object.prototype.hasOwnProperty.call(FILE_KEYS, name) ? FILE_KEYS[name] : name;
    if (!KNOWN_KEYS.has(key)) throw new ConfigValidationError(`${source}: ${name} is not a supported setting`);
    raw[key] = value;
  }
  return raw;
};

const isMissingFile = (error: unknown): boolean => error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const loadConfigFile = async (path: string): Promise<RawConfig> => {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) throw new ConfigValidationError(`config file not found: ${path}`);
    throw new ConfigValidationError(`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigValidationError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return fromFileObject(parsed, path);
};

const toNumber = (value: unknown): number => (typeof value === 'string' && value.trim() ? Number(value) : typeof value === 'number' ? value : NaN);

const validateNonNegativeNumber = (value: unknown, key: string, fallback: number): number => {
  if (value === undefined) return fallback;
  const n = toNumber(value);
  if (!Number.isFinite(n) || n < 0) throw new ConfigValidationError(`${key} must be a non-negative number`);
  return n;
};

const validateNonNegativeInteger = (value: unknown, key: string, fallback: number): number => {
  const n = validateNonNegativeNumber(value, key, fallback);
  if (!Number.isInteger(n)) throw new ConfigValidationError(`${key} must be an integer`);
  return n;
};

const validateAtLeast = (value: unknown, key: string, minimum: number): number => {
  const n = validateNonNegativeNumber(value, key, minimum);
  if (n < minimum) throw new ConfigValidationError(`${key} must be at least ${minimum}`);
  return n;
};

const validateString = (value: unknown, key: string): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigValidationError(`${key} must be a non-empty string`);
  }
  return value.trim();
};

const validateKeywords = (value: unknown): string[] => {
  if (value === undefined || value === null) return [];
  const list = typeof value === 'string' ? value.split(',') : value;
  if (!Array.isArray(list) || list.some((k) => typeof k !== 'string')) {
    throw new ConfigValidationError('searchKeywords must be a list of strings');
  }
  return list.map((k: string) => k.trim()).filter(Boolean);
};

/** Later layers win; a layer's undefined values do not mask earlier ones. */
export const mergeLayers = (...layers: RawConfig[]): RawConfig => {
  const merged: RawConfig = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
};

/** Geocoder settings alone, so one resolver can outlive a single run. */
export const resolverSettings = (raw: RawConfig): ResolverSettings => ({
  geocodeIntervalMs: validateAtLeast(raw.geocodeIntervalMs, 'geocodeIntervalMs', MIN_GEOCODE_INTERVAL_MS),
  nominatimUrl: validateString(raw.nominatimUrl, 'nominatimUrl'),
  nominatimUserAgent: validateString(raw.nominatimUserAgent, 'nominatimUserAgent'),
});

export const normalizeConfig = (raw: RawConfig): AppConfig => {
  const baseAddress = validateString(raw.baseAddress, 'baseAddress');
  if (!baseAddress) throw new ConfigValidationError('baseAddress is required');

  const pageLimit = validateNonNegativeInteger(raw.pageLimit, 'pageLimit', DEFAULT_PAGE_LIMIT);
  if (pageLimit < 1) throw new ConfigValidationError('pageLimit must be at least 1');

  const apiKey = raw.googleMapsApiKey;
  if (apiKey !== undefined && typeof apiKey !== 'string') throw new ConfigValidationError('googleMapsApiKey must be a string');

  return {
    baseAddress,
    // A missing key is reported by the pipeline as a fatal credential error.
    googleMapsApiKey: apiKey?.trim() ?? '',
    radiusMiles: validateNonNegativeNumber(raw.searchRadiusMiles, 'searchRadiusMiles', DEFAULT_RADIUS_MILES),
    minRatings: validateNonNegativeInteger(raw.minRatingsSource, 'minRatingsSource', DEFAULT_MIN_RATINGS),
    keywords: validateKeywords(raw.searchKeywords),
    pageLimit,
    pageSettleDelayMs: validateAtLeast(raw.pageSettleDelayMs, 'pageSettleDelayMs', DEFAULT_SETTLE_DELAY_MS),
    keywordDelayMs: validateNonNegativeNumber(raw.keywordDelayMs, 'keywordDelayMs', DEFAULT_KEYWORD_DELAY_MS),
    outputFile: validateString(raw.outputFile, 'outputFile') ?? DEFAULT_OUTPUT_FILE,
    ...resolverSettings(raw),
  };
};
