import { createAxiosPlacesTransport, PlacesSearchClient, PlacesTransport } from '../adapters/google_places';
import { NominatimResolver } from '../adapters/nominatim';
import { createHttpClient } from '../utils/httpClient';
import { RateLimiter } from '../utils/rateLimiter';
import { AppConfig, ResolverSettings } from './config';
import { DiagnosticObserver, loggingObserver } from './diagnostics';
import { LeadPipelineDeps, PipelineResult, runLeadPipeline } from './pipeline';
import { CoordinateResolver } from './types';

export interface AdapterOverrides {
  resolver?: CoordinateResolver;
  transport?: PlacesTransport;
  observer?: DiagnosticObserver;
}

// The limiter lives inside the resolver: share one resolver to share the rate limit.
export const createResolver = (config: ResolverSettings): CoordinateResolver =>
  new NominatimResolver({
    url: config.nominatimUrl,
    userAgent: config.nominatimUserAgent,
    limiter: new RateLimiter(config.geocodeIntervalMs),
  });

export const createPipelineDeps = (config: AppConfig, overrides: AdapterOverrides = {}): LeadPipelineDeps => {
  const observer = overrides.observer ?? loggingObserver;
  return {
    resolver: overrides.resolver ?? createResolver(config),
    search: new PlacesSearchClient({
      apiKey: config.googleMapsApiKey,
      transport: overrides.transport ?? createAxiosPlacesTransport(createHttpClient()),
      pageLimit: config.pageLimit,
      settleDelayMs: config.pageSettleDelayMs,
      observer,
    }),
    observer,
    keywordDelayMs: config.keywordDelayMs,
  };
};

export const runWithConfig = (config: AppConfig, overrides: AdapterOverrides = {}): Promise<PipelineResult> =>
  runLeadPipeline(config, createPipelineDeps(config, overrides));
