import { log, LogLevel } from '../utils/logger';

export type DiagnosticKind =
  // query-scoped
  | 'search-started'
  | 'page-fetched'
  | 'zero-results'
  | 'api-error'
  | 'transport-error'
  | 'decode-error'
  | 'page-limit-reached'
  | 'missing-fields'
  // merge
  | 'unverified-identity'
  | 'keyword-merged'
  // candidate-scoped
  | 'unresolved-address'
  | 'malformed-rating-count'
  | 'candidate-evaluated'
  | 'distance-exceeded'
  | 'rating-count-below-minimum'
  | 'lead-accepted'
  // run-level
  | 'origin-resolved'
  | 'run-summary';

export type DiagnosticContext = Record<string, unknown>;

export interface DiagnosticObserver {
  onDiagnostic(kind: DiagnosticKind, context: DiagnosticContext): void;
}

const LEVELS: Record<DiagnosticKind, LogLevel> = {
  'search-started': 'INFO',
  'page-fetched': 'DEBUG',
  'zero-results': 'INFO',
  'api-error': 'ERROR',
  'transport-error': 'ERROR',
  'decode-error': 'ERROR',
  'page-limit-reached': 'INFO',
  'missing-fields': 'WARN',
  'unverified-identity': 'WARN',
  'keyword-merged': 'INFO',
  'unresolved-address': 'WARN',
  'malformed-rating-count': 'WARN',
  'candidate-evaluated': 'DEBUG',
  'distance-exceeded': 'INFO',
  'rating-count-below-minimum': 'INFO',
  'lead-accepted': 'INFO',
  'origin-resolved': 'INFO',
  'run-summary': 'INFO',
};

export const levelFor = (kind: DiagnosticKind): LogLevel => LEVELS[kind];

export const loggingObserver: DiagnosticObserver = {
  onDiagnostic: (kind, context) => log(levelFor(kind), `[${kind}]`, context),
};

export const silentObserver: DiagnosticObserver = { onDiagnostic: () => undefined };

export interface RecordedDiagnostic {
  kind: DiagnosticKind;
  context: DiagnosticContext;
}

export class RecordingObserver implements DiagnosticObserver {
  readonly events: RecordedDiagnostic[] = [];

  constructor(private readonly next: DiagnosticObserver = silentObserver) {}

  onDiagnostic(kind: DiagnosticKind, context: DiagnosticContext): void {
    this.events.push({ kind, context });
    this.next.onDiagnostic(kind, context);
  }

  kinds(): DiagnosticKind[] {
    return this.events.map((e) => e.kind);
  }

  ofKind(kind: DiagnosticKind): DiagnosticContext[] {
    return this.events.filter((e) => e.kind === kind).map((e) => e.context);
  }
}
