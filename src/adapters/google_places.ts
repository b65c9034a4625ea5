import { AxiosInstance } from 'axios';
import { DiagnosticObserver, loggingObserver } from '../core/diagnostics';
import { RawCandidate, SearchQuery, UNKNOWN } from '../core/types';
import { createHttpClient, describeHttpError } from '../utils/httpClient';
import { sleep, Sleep } from '../utils/rateLimiter';

export const NEARBY_SEARCH_URL = 'https://maps.googleapis.com/maps/api/place/nearbysearch/json';
export const PLACE_TYPE = 'restaurant';
export const DEFAULT_PAGE_LIMIT = 10;
export const DEFAULT_SETTLE_DELAY_MS = 2000;

export interface NearbySearchParams {
  key: string;
  location: string;
  radius: number;
  type: typeof PLACE_TYPE;
  keyword?: string;
  pagetoken?: string;
}

export interface NearbySearchResponse {
  status: string;
  results: unknown[];
  next_page_token?: string;
  error_message?: string;
}

/** Wire boundary to the Places API; resolves with the undecoded response body. */
export interface PlacesTransport {
  nearbySearch(params: NearbySearchParams): Promise<unknown>;
}

export const createAxiosPlacesTransport = (client: AxiosInstance = createHttpClient(), url = NEARBY_SEARCH_URL): PlacesTransport => ({
  nearbySearch: async (params) => {
    const { data } = await client.get<unknown>(url, { params });
    return data;
  },
});

// ---- pagination state machine ----

export type PaginationStatus = 'fetching' | 'awaitingToken' | 'done' | 'failed';

export type StopReason = 'exhausted' | 'page-limit' | 'zero-results' | 'api-error' | 'transport-error' | 'decode-error';

export interface PaginationState {
  status: PaginationStatus;
  continuationToken: string | null;
  pagesFetched: number;
  pageLimit: number;
  stopReason?: StopReason;
  discardedToken?: string;
}

export type PageOutcome =
  | { kind: 'ok'; nextPageToken: string | null }
  | { kind: 'zero-results' }
  | { kind: 'api-error'; status: string }
  | { kind: 'transport-error' }
  | { kind: 'decode-error' };

export const initialPagination = (pageLimit: number): PaginationState => ({
  status: 'fetching',
  continuationToken: null,
  pagesFetched: 0,
  pageLimit,
});

/**
 * Applies the outcome of one request to the state. `pagesFetched` counts
 * responses that decoded, so a failed request does not consume the page budget.
 */
export const advancePagination = (state: PaginationState, outcome: PageOutcome): PaginationState => {
  if (state.status !== 'fetching') return state;
  switch (outcome.kind) {
    case 'ok': {
      const pagesFetched = state.pagesFetched + 1;
      if (!outcome.nextPageToken) {
        return { ...state, pagesFetched, status: 'done', continuationToken: null, stopReason: 'exhausted' };
      }
      if (pagesFetched >= state.pageLimit) {
        return {
          ...state,
          pagesFetched,
          status: 'done',
          continuationToken: null,
          stopReason: 'page-limit',
          discardedToken: outcome.nextPageToken,
        };
      }
      return { ...state, pagesFetched, status: 'awaitingToken', continuationToken: outcome.nextPageToken };
    }
    case 'zero-results':
      return { ...state, pagesFetched: state.pagesFetched + 1, status: 'done', continuationToken: null, stopReason: 'zero-results' };
    case 'api-error':
      return { ...state, pagesFetched: state.pagesFetched + 1, status: 'failed', continuationToken: null, stopReason: 'api-error' };
    case 'transport-error':
    case 'decode-error':
      return { ...state, status: 'failed', continuationToken: null, stopReason: outcome.kind };
  }
};

/** awaitingToken -> fetching once the settle delay has elapsed. */
export const resumePagination = (state: PaginationState): PaginationState =>
  state.status === 'awaitingToken' ? { ...state, status: 'fetching' } : state;

// ---- decoding ----

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null && !Array.isArray(value);

const nonEmptyString = (value: unknown): string | null => (typeof value === 'string' && value.trim() ? value.trim() : null);

export const decodeNearbySearch = (body: unknown): NearbySearchResponse | null => {
  if (!isRecord(body) || typeof body.status !== 'string') return null;
  if (body.results !== undefined && !Array.isArray(body.results)) return null;
  return {
    status: body.status,
    results: Array.isArray(body.results) ? body.results : [],
    next_page_token: nonEmptyString(body.next_page_token) ?? undefined,
    error_message: typeof body.error_message === 'string' ? body.error_message : undefined,
  };
};

export const placeUrl = (placeId: string): string =>
  `https://www.google.com/maps/search/?api=1&query=Google&query_place_id=${encodeURIComponent(placeId)}`;

export type ParsedPlace = { ok: true; candidate: RawCandidate } | { ok: false; missing: string[]; name: string | null };

export const parsePlace = (place: unknown, keyword?: string): ParsedPlace => {
  const record = isRecord(place) ? place : {};
  const name = nonEmptyString(record.name);
  const address = nonEmptyString(record.vicinity);
  const placeId = nonEmptyString(record.place_id);

  if (!name || !address || !placeId) {
    const missing: string[] = [];
    if (!name) missing.push('name');
    if (!address) missing.push('vicinity');
    if (!placeId) missing.push('place_id');
    return { ok: false, missing, name };
  }

  const rating = typeof record.rating === 'number' && Number.isFinite(record.rating) ? record.rating : UNKNOWN;
  const total = record.user_ratings_total;
  const ratingCount = typeof total === 'number' || typeof total === 'string' ? total : UNKNOWN;

  return {
    ok: true,
    candidate: { stableId: placeId, name, address, rating, ratingCount, sourceUrl: placeUrl(placeId), keyword },
  };
};

// ---- client ----

export interface PlacesSearchClientOptions {
  apiKey: string;
  transport?: PlacesTransport;
  pageLimit?: number;
  settleDelayMs?: number;
  observer?: DiagnosticObserver;
  sleep?: Sleep;
}

export interface SearchOutcome {
  candidates: RawCandidate[];
  state: PaginationState;
}

export class PlacesSearchClient {
  private readonly transport: PlacesTransport;
  private readonly pageLimit: number;
  private readonly settleDelayMs: number;
  private readonly observer: DiagnosticObserver;
  private readonly pause: Sleep;

  constructor(private readonly options: PlacesSearchClientOptions) {
    this.transport = options.transport ?? createAxiosPlacesTransport();
    this.pageLimit = Math.max(1, Math.trunc(options.pageLimit ?? DEFAULT_PAGE_LIMIT));
    this.settleDelayMs = Math.max(0, options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS);
    this.observer = options.observer ?? loggingObserver;
    this.pause = options.sleep ?? sleep;
  }

  async search(query: SearchQuery): Promise<RawCandidate[]> {
    const { candidates } = await this.searchWithState(query);
    return candidates;
  }

  async searchWithState(query: SearchQuery): Promise<SearchOutcome> {
    const candidates: RawCandidate[] = [];
    let state = initialPagination(this.pageLimit);

    this.observer.onDiagnostic('search-started', {
      keyword: query.keyword ?? null,
      location: formatLocation(query),
      radius: Math.trunc(query.radiusMeters),
      type: PLACE_TYPE,
    });

    while (state.status === 'fetching' || state.status === 'awaitingToken') {
      if (state.status === 'awaitingToken') {
        await this.pause(this.settleDelayMs);
        state = resumePagination(state);
      }
      const outcome = await this.fetchPage(query, state, candidates);
      state = advancePagination(state, outcome);
    }

    if (state.stopReason === 'page-limit') {
      this.observer.onDiagnostic('page-limit-reached', {
        keyword: query.keyword ?? null,
        pageLimit: state.pageLimit,
        discardedToken: state.discardedToken?.slice(0, 20),
      });
    }

    return { candidates, state };
  }

  private buildParams(query: SearchQuery, pageToken: string | null): NearbySearchParams {
    const params: NearbySearchParams = {
      key: this.options.apiKey,
      location: formatLocation(query),
      radius: Math.trunc(query.radiusMeters),
      type: PLACE_TYPE,
    };
    if (query.keyword) params.keyword = query.keyword;
    if (pageToken) params.pagetoken = pageToken;
    return params;
  }

  private async fetchPage(query: SearchQuery, state: PaginationState, sink: RawCandidate[]): Promise<PageOutcome> {
    const page = state.pagesFetched + 1;
    const keyword = query.keyword ?? null;
    const params = this.buildParams(query, state.continuationToken);

    let body: unknown;
    try {
      body = await this.transport.nearbySearch(params);
    } catch (error) {
      this.observer.onDiagnostic('transport-error', { keyword, page, error: describeHttpError(error) });
      return { kind: 'transport-error' };
    }

    const response = decodeNearbySearch(body);
    if (!response) {
      this.observer.onDiagnostic('decode-error', { keyword, page, body: typeof body === 'string' ? body.slice(0, 200) : typeof body });
      return { kind: 'decode-error' };
    }

    if (response.status === 'ZERO_RESULTS') {
      this.observer.onDiagnostic('zero-results', { keyword, page, initial: page === 1 });
      return { kind: 'zero-results' };
    }

    if (response.status !== 'OK') {
      this.observer.onDiagnostic('api-error', {
        keyword,
        page,
        status: response.status,
        message: response.error_message ?? '',
        hint: errorHint(response.status, !!params.pagetoken),
      });
      return { kind: 'api-error', status: response.status };
    }

    let accepted = 0;
    for (const place of response.results) {
      const parsed = parsePlace(place, query.keyword);
      if (parsed.ok) {
        sink.push(parsed.candidate);
        accepted += 1;
      } else {
        this.observer.onDiagnostic('missing-fields', { keyword, page, name: parsed.name, missing: parsed.missing });
      }
    }

    this.observer.onDiagnostic('page-fetched', {
      keyword,
      page,
      results: response.results.length,
      accepted,
      hasNextPage: !!response.next_page_token,
    });

    return { kind: 'ok', nextPageToken: response.next_page_token ?? null };
  }
}

const formatLocation = (query: SearchQuery): string => `${query.origin.latitude},${query.origin.longitude}`;

const errorHint = (status: string, continuation: boolean): string | undefined => {
  if (status === 'REQUEST_DENIED') return 'check the API key and that the Places API is enabled for it';
  if (status === 'INVALID_REQUEST' && continuation) return 'the page token may have expired or is not yet valid';
  if (status === 'OVER_QUERY_LIMIT') return 'quota exhausted for this key';
  return undefined;
};
