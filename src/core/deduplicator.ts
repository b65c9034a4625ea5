import { DiagnosticObserver, loggingObserver } from './diagnostics';
import { RawCandidate } from './types';

export interface CandidateBatch {
  label: string; // keyword, or "(unscoped)"
  candidates: RawCandidate[];
}

const identityOf = (candidate: RawCandidate): string | null => {
  const id = candidate.stableId?.trim();
  return id ? id : null;
};

/**
 * Merges batches in the order given, keeping the first candidate seen for each
 * stable id. Candidates without an id cannot be matched and are always kept.
 */
export const mergeCandidates = (batches: CandidateBatch[], observer: DiagnosticObserver = loggingObserver): RawCandidate[] => {
  const index = new Map<string, RawCandidate>();
  const merged: RawCandidate[] = [];

  for (const batch of batches) {
    let added = 0;
    for (const candidate of batch.candidates) {
      const id = identityOf(candidate);
      if (id === null) {
        observer.onDiagnostic('unverified-identity', { name: candidate.name, source: batch.label, keyword: candidate.keyword ?? null });
        merged.push(candidate);
        added += 1;
        continue;
      }
      if (index.has(id)) continue;
      index.set(id, candidate);
      merged.push(candidate);
      added += 1;
    }
    observer.onDiagnostic('keyword-merged', { source: batch.label, found: batch.candidates.length, added, total: merged.length });
  }

  return merged;
};

export const toBatches = (sequences: RawCandidate[][]): CandidateBatch[] =>
  sequences.map((candidates, i) => ({ label: `batch ${i + 1}`, candidates }));
