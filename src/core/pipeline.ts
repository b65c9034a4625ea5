import { CandidateBatch, mergeCandidates } from './deduplicator';
import { DiagnosticObserver, loggingObserver } from './diagnostics';
import { DistanceFn, isResolved, milesToMeters } from './distance';
import { PipelineError } from './errors';
import { filterCandidates } from './leadFilter';
import { Coordinate, CoordinateResolver, Lead, LeadPipelineConfig, RawCandidate, SearchQuery } from './types';
import { sleep, Sleep } from '../utils/rateLimiter';

export const API_KEY_PLACEHOLDER = 'YOUR_GOOGLE_MAPS_API_KEY_HERE';
export const DEFAULT_KEYWORD_DELAY_MS = 1000;
export const UNSCOPED_LABEL = '(unscoped)';

export interface CandidateSearch {
  search(query: SearchQuery): Promise<RawCandidate[]>;
}

export interface LeadPipelineDeps {
  resolver: CoordinateResolver;
  search: CandidateSearch;
  observer?: DiagnosticObserver;
  distance?: DistanceFn;
  keywordDelayMs?: number;
  sleep?: Sleep;
}

export type PipelineOutcome = 'completed' | 'no-candidates' | 'no-qualified-leads';

export interface PipelineResult {
  outcome: PipelineOutcome;
  origin: Coordinate;
  candidatesFound: number;
  uniqueCandidates: number;
  leads: Lead[];
}

export const hasUsableApiKey = (key: string | undefined): boolean => !!key && !!key.trim() && key.trim() !== API_KEY_PLACEHOLDER;

export const runLeadPipeline = async (config: LeadPipelineConfig, deps: LeadPipelineDeps): Promise<PipelineResult> => {
  const observer = deps.observer ?? loggingObserver;
  const pause = deps.sleep ?? sleep;
  const keywordDelayMs = deps.keywordDelayMs ?? DEFAULT_KEYWORD_DELAY_MS;

  if (!hasUsableApiKey(config.googleMapsApiKey)) {
    throw new PipelineError('MISSING_CREDENTIAL', 'Google Maps API key is missing or still set to the placeholder');
  }

  const origin = await deps.resolver.resolve(config.baseAddress);
  if (!isResolved(origin)) {
    throw new PipelineError('ORIGIN_UNRESOLVED', `Could not geocode base address: ${config.baseAddress}`);
  }
  observer.onDiagnostic('origin-resolved', { address: config.baseAddress, ...origin });

  const radiusMeters = milesToMeters(config.radiusMiles);
  const keywords = config.keywords.map((k) => k.trim()).filter(Boolean);
  const batches: CandidateBatch[] = [];

  if (keywords.length === 0) {
    const candidates = await deps.search.search({ origin, radiusMeters });
    batches.push({ label: UNSCOPED_LABEL, candidates });
  } else {
    for (const [i, keyword] of keywords.entries()) {
      if (i > 0 && keywordDelayMs > 0) await pause(keywordDelayMs);
      const candidates = await deps.search.search({ origin, radiusMeters, keyword });
      batches.push({ label: keyword, candidates });
    }
  }

  const candidatesFound = batches.reduce((n, b) => n + b.candidates.length, 0);
  const unique = mergeCandidates(batches, observer);

  if (unique.length === 0) {
    observer.onDiagnostic('run-summary', { outcome: 'no-candidates', candidatesFound, uniqueCandidates: 0, leads: 0 });
    return { outcome: 'no-candidates', origin, candidatesFound, uniqueCandidates: 0, leads: [] };
  }

  const leads = await filterCandidates(
    unique,
    origin,
    { radiusMiles: config.radiusMiles, minRatings: config.minRatings },
    { resolver: deps.resolver, observer, distance: deps.distance },
  );

  const outcome: PipelineOutcome = leads.length > 0 ? 'completed' : 'no-qualified-leads';
  observer.onDiagnostic('run-summary', { outcome, candidatesFound, uniqueCandidates: unique.length, leads: leads.length });
  return { outcome, origin, candidatesFound, uniqueCandidates: unique.length, leads };
};
