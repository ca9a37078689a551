/**
 * Extraction Error Classes
 *
 * SegmentationError and FilterConfigError are fatal for their scope
 * (document and configuration). BatchDispatchError is retried when the
 * server looks busy or unreachable and then recorded as a failed batch.
 * A schema mismatch is not an exception at all: it comes back from the
 * model client as a ValidationFailure value.
 *
 * @module services/extraction/errors
 */

type ExtractionErrorCode =
  | 'EMPTY_TEXT'
  | 'INVALID_PATTERN'
  | 'MODEL_HTTP_ERROR'
  | 'MODEL_TIMEOUT'
  | 'MODEL_NETWORK_ERROR';

export class SegmentationError extends Error {
  public readonly code: ExtractionErrorCode = 'EMPTY_TEXT';

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SegmentationError';
  }
}

export class FilterConfigError extends Error {
  public readonly code: ExtractionErrorCode = 'INVALID_PATTERN';

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FilterConfigError';
  }
}

export class BatchDispatchError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BatchDispatchError';
  }
}

/**
 * Model output that did not conform to the extraction schema
 */
export interface ValidationFailure {
  reason: string;
  /** Raw model text, truncated, for the run log */
  rawOutput?: string;
}

/**
 * Tagged result returned by every ModelClient
 */
export type ModelResult<T> = { ok: true; value: T } | { ok: false; failure: ValidationFailure };
