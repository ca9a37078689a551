/**
 * Extraction record and run summary interfaces
 *
 * @module models/extraction
 */

import type { TextUnit } from './document.js';

/**
 * Extraction targets
 * - money: monetary amounts with their context
 * - entity: consortium composition (organization types, minimum entities)
 */
export type ExtractionType = 'money' | 'entity';

export const EXTRACTION_TYPES = ['money', 'entity'] as const;

/**
 * A monetary fact found in a document
 */
export interface MoneyRecord {
  type: 'money';
  id: string;
  documentId: string;
  value: number;
  currency: string;
  /** Short description of what the amount refers to */
  context: string;
  /** Sentence the amount was read from */
  originalSentence: string;
}

/**
 * A consortium requirement found in a document
 */
export interface EntityRecord {
  type: 'entity';
  id: string;
  documentId: string;
  organizationTypes: string[];
  minEntities: number[];
}

export type ExtractedRecord = MoneyRecord | EntityRecord;

/**
 * Maps an extraction type to its record type
 */
export type RecordFor<T extends ExtractionType> = T extends 'money' ? MoneyRecord : EntityRecord;

/**
 * A bounded group of text units sent to the model in one call
 */
export interface ExtractionBatch {
  index: number;
  units: TextUnit[];
}

/**
 * Why a batch contributed no records
 * - validation: model output did not match the schema
 * - dispatch: the model could not be reached after retries
 */
export type BatchFailureKind = 'validation' | 'dispatch';

export interface BatchFailure {
  documentId: string;
  batchIndex: number;
  kind: BatchFailureKind;
  message: string;
}

/**
 * Outcome of extracting one target from one document
 */
export interface BatchExtractionResult<R extends ExtractedRecord = ExtractedRecord> {
  records: R[];
  failures: BatchFailure[];
  batchCount: number;
  /** Batches whose output validated (possibly with zero facts) */
  extractedBatches: number;
  /** Batches skipped because the output failed validation */
  skippedBatches: number;
  /** Batches that could not be dispatched */
  failedBatches: number;
  /** Batches never sent because the failure threshold was exceeded */
  abandonedBatches: number;
  aborted: boolean;
}

/**
 * Batch counts for one target of one document
 */
export interface TargetSummary {
  batchCount: number;
  extractedBatches: number;
  skippedBatches: number;
  failedBatches: number;
  abandonedBatches: number;
  recordCount: number;
  aborted: boolean;
}

export interface DocumentRunSummary {
  documentId: string;
  money: TargetSummary | null;
  entity: TargetSummary | null;
  /** Set when the document could not be processed at all */
  error: string | null;
  failures: BatchFailure[];
}

export interface RunSummary {
  documents: DocumentRunSummary[];
  totalMoneyRecords: number;
  totalEntityRecords: number;
  duplicatesRemoved: number;
  durationMs: number;
}
