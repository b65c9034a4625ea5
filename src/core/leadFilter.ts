import { DiagnosticObserver, loggingObserver } from './diagnostics';
import { DistanceFn, haversineMiles, isResolved } from './distance';
import { Coordinate, CoordinateResolver, FilterConfig, Lead, RawCandidate, UNKNOWN } from './types';

const SENTINELS = new Set<string>([UNKNOWN, 'n/a']);

export type RatingCount = { ok: true; value: number } | { ok: false };

/**
 * Absent or sentinel counts are 0. Anything else must be a non-negative integer
 * (a numeric string is accepted); otherwise the value is malformed.
 */
export const normalizeRatingCount = (raw: number | string | null | undefined): RatingCount => {
  if (raw === null || raw === undefined) return { ok: true, value: 0 };
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw >= 0 ? { ok: true, value: raw } : { ok: false };
  }
  const text = raw.trim();
  if (SENTINELS.has(text.toLowerCase())) return { ok: true, value: 0 };
  if (!/^\+?\d+$/.test(text)) return { ok: false };
  return { ok: true, value: Number.parseInt(text, 10) };
};

export interface LeadFilterDeps {
  resolver: CoordinateResolver;
  observer?: DiagnosticObserver;
  distance?: DistanceFn;
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

export const filterCandidates = async (
  candidates: RawCandidate[],
  origin: Coordinate,
  config: FilterConfig,
  deps: LeadFilterDeps,
): Promise<Lead[]> => {
  const observer = deps.observer ?? loggingObserver;
  const distanceOf = deps.distance ?? haversineMiles;
  const leads: Lead[] = [];

  for (const candidate of candidates) {
    const { name } = candidate;
    const keyword = candidate.keyword ?? null;
    const coord = await deps.resolver.resolve(candidate.address);
    if (!isResolved(coord)) {
      observer.onDiagnostic('unresolved-address', { name, address: candidate.address });
      continue;
    }

    const distance = distanceOf(origin, coord);

    const count = normalizeRatingCount(candidate.ratingCount);
    if (!count.ok) {
      observer.onDiagnostic('malformed-rating-count', { name, ratingCount: candidate.ratingCount });
      continue;
    }

    observer.onDiagnostic('candidate-evaluated', { name, keyword, distanceMiles: round2(distance), ratingCount: count.value });

    const withinRadius = distance <= config.radiusMiles;
    const popularEnough = count.value >= config.minRatings;

    if (withinRadius && popularEnough) {
      leads.push(
        Object.freeze({
          name,
          address: candidate.address,
          rating: candidate.rating,
          ratingCount: count.value,
          sourceUrl: candidate.sourceUrl,
        }),
      );
      observer.onDiagnostic('lead-accepted', { name, keyword });
      continue;
    }

    if (!withinRadius) {
      observer.onDiagnostic('distance-exceeded', { name, distanceMiles: round2(distance), radiusMiles: config.radiusMiles });
    }
    if (!popularEnough) {
      observer.onDiagnostic('rating-count-below-minimum', { name, ratingCount: count.value, minRatings: config.minRatings });
    }
  }

  return leads;
};
