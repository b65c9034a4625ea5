export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export type PipelineErrorCode = 'MISSING_CREDENTIAL' | 'ORIGIN_UNRESOLVED';

/** Aborts the whole run before any search is issued or any lead is written. */
export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
