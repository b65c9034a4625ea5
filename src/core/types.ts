export interface Coordinate {
  latitude: number;
  longitude: number;
}

export type UnknownSignal = 'unknown';

export const UNKNOWN: UnknownSignal = 'unknown';

export interface SearchQuery {
  readonly origin: Coordinate;
  readonly radiusMeters: number;
  readonly keyword?: string;
}

export interface RawCandidate {
  stableId: string | null; // place_id, null when the provider omitted it
  name: string;
  address: string; // vicinity
  rating: number | UnknownSignal;
  ratingCount: number | string; // user_ratings_total, validated by the filter
  sourceUrl: string;
  keyword?: string;
}

export interface Lead {
  readonly name: string;
  readonly address: string;
  readonly rating: number | UnknownSignal;
  readonly ratingCount: number;
  readonly sourceUrl: string;
}

export interface FilterConfig {
  radiusMiles: number;
  minRatings: number;
}

export interface LeadPipelineConfig extends FilterConfig {
  baseAddress: string;
  googleMapsApiKey: string;
  keywords: string[];
}

export interface CoordinateResolver {
  resolve(address: string): Promise<Coordinate | null>;
}

export interface LeadSink {
  save(leads: Lead[]): Promise<void>;
}
