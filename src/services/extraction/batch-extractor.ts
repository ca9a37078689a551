/**
 * BatchExtractor - bounded, validated LLM extraction over filtered units
 *
 * Units are cut into consecutive batches of at most `batchSize`. Batches
 * go out in waves of at most `concurrency`, each behind the shared rate
 * limiter, and come back joined in batch order whatever order they finish
 * in. A batch whose output fails validation contributes nothing and is
 * recorded; a batch that cannot be dispatched is retried with backoff while
 * the server looks busy or unreachable, then recorded. Neither aborts the
 * document unless the failure threshold is exceeded, in which case the
 * remaining waves are abandoned and the records already gathered are kept.
 *
 * @module services/extraction/batch-extractor
 */

import { v4 as uuidv4 } from 'uuid';
import { DISPATCH_RETRY_POLICY, withRetry, type RetryPolicy } from '../../utils/backoff.js';
import { MONEY_SCHEMA, ENTITY_SCHEMA, type ExtractionSchema } from '../llm/schemas.js';
import type { MoneyOutput, EntityOutput } from '../llm/schemas.js';
import { DEFAULT_SYSTEM_PROMPTS, renderBatchPrompt } from '../llm/prompts.js';
import type { ModelClient } from '../llm/client.js';
import type { RateLimiter } from '../llm/rate-limiter.js';
import type { TextUnit } from '../../models/document.js';
import type {
  BatchExtractionResult,
  BatchFailure,
  EntityRecord,
  ExtractedRecord,
  ExtractionBatch,
  ExtractionType,
  MoneyRecord,
} from '../../models/extraction.js';

/**
 * How one extraction target turns validated model output into records
 */
export interface ExtractionTarget<R extends ExtractedRecord, O> {
  type: ExtractionType;
  schema: ExtractionSchema<O>;
  toRecords(output: O, documentId: string, batch: ExtractionBatch): R[];
}

function batchText(batch: ExtractionBatch): string {
  return batch.units.map((u) => u.text).join(' ');
}

export const MONEY_TARGET: ExtractionTarget<MoneyRecord, MoneyOutput> = {
  type: 'money',
  schema: MONEY_SCHEMA,
  toRecords(output, documentId, batch) {
    return output.items.map((item): MoneyRecord => ({
      type: 'money',
      id: uuidv4(),
      documentId,
      value: item.value,
      currency: item.currency,
      context: item.context,
      // Provenance falls back to the whole batch when the model gave none
      originalSentence: item.original_sentence ?? batchText(batch),
    }));
  },
};

export const ENTITY_TARGET: ExtractionTarget<EntityRecord, EntityOutput> = {
  type: 'entity',
  schema: ENTITY_SCHEMA,
  toRecords(output, documentId) {
    return output.items.map((item): EntityRecord => ({
      type: 'entity',
      id: uuidv4(),
      documentId,
      organizationTypes: item.organization_type,
      minEntities: item.min_entities,
    }));
  },
};

/**
 * Split units into consecutive batches of at most batchSize.
 * N units give ceil(N / batchSize) batches; only the last may be short.
 *
 * @throws RangeError when batchSize is not a positive integer
 */
export function partition(units: readonly TextUnit[], batchSize: number): ExtractionBatch[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  const batches: ExtractionBatch[] = [];
  for (let i = 0; i < units.length; i += batchSize) {
    batches.push({ index: batches.length, units: units.slice(i, i + batchSize) });
  }
  return batches;
}

export interface BatchExtractorOptions {
  client: ModelClient;
  rateLimiter?: RateLimiter;
  /** Batches in flight at once (default 1) */
  concurrency?: number;
  /** Extra attempts after a retryable dispatch error (default 2) */
  maxRetries?: number;
  /** Failed batches tolerated per call before the rest are abandoned (default: never) */
  maxBatchFailures?: number | null;
  backoff?: Partial<Omit<RetryPolicy, 'maxAttempts'>>;
}

export interface ExtractRequest {
  documentId: string;
  units: readonly TextUnit[];
  batchSize: number;
  target: ExtractionType;
  systemPrompt?: string;
}

type BatchOutcome<R> =
  | { kind: 'ok'; records: R[] }
  | { kind: 'validation'; message: string }
  | { kind: 'dispatch'; message: string };

export class BatchExtractor {
  private readonly client: ModelClient;
  private readonly rateLimiter: RateLimiter | undefined;
  private readonly concurrency: number;
  private readonly maxBatchFailures: number | null;
  private readonly retryPolicy: RetryPolicy;

  constructor(options: BatchExtractorOptions) {
    this.client = options.client;
    this.rateLimiter = options.rateLimiter;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.maxBatchFailures = options.maxBatchFailures ?? null;
    this.retryPolicy = {
      ...DISPATCH_RETRY_POLICY,
      ...options.backoff,
      maxAttempts: Math.max(0, Math.floor(options.maxRetries ?? 2)) + 1,
    };
  }

  extract(request: ExtractRequest & { target: 'money' }): Promise<BatchExtractionResult<MoneyRecord>>;
  extract(request: ExtractRequest & { target: 'entity' }): Promise<BatchExtractionResult<EntityRecord>>;
  extract(request: ExtractRequest): Promise<BatchExtractionResult>;
  extract(request: ExtractRequest): Promise<BatchExtractionResult> {
    return request.target === 'money'
      ? this.run(request, MONEY_TARGET)
      : this.run(request, ENTITY_TARGET);
  }

  /**
   * Extract with an explicit target definition
   */
  async run<R extends ExtractedRecord, O>(
    request: Omit<ExtractRequest, 'target'>,
    target: ExtractionTarget<R, O>
  ): Promise<BatchExtractionResult<R>> {
    const { documentId } = request;
    const systemPrompt = request.systemPrompt ?? DEFAULT_SYSTEM_PROMPTS[target.type];
    const batches = partition(request.units, request.batchSize);

    const result: BatchExtractionResult<R> = {
      records: [],
      failures: [],
      batchCount: batches.length,
      extractedBatches: 0,
      skippedBatches: 0,
      failedBatches: 0,
      abandonedBatches: 0,
      aborted: false,
    };

    for (let start = 0; start < batches.length; start += this.concurrency) {
      const wave = batches.slice(start, start + this.concurrency);
      // Promise.all keeps input order, so records join in batch order
      const outcomes = await Promise.all(
        wave.map((batch) => this.runBatch(documentId, batch, systemPrompt, target))
      );

      outcomes.forEach((outcome, i) => {
        const batchIndex = wave[i].index;
        if (outcome.kind === 'ok') {
          result.extractedBatches++;
          result.records.push(...outcome.records);
          return;
        }
        if (outcome.kind === 'validation') {
          result.skippedBatches++;
        } else {
          result.failedBatches++;
        }
        const failure: BatchFailure = {
          documentId,
          batchIndex,
          kind: outcome.kind,
          message: outcome.message,
        };
        result.failures.push(failure);
      });

      if (this.maxBatchFailures !== null && result.failures.length > this.maxBatchFailures) {
        result.aborted = true;
        result.abandonedBatches = batches.length - (start + wave.length);
        console.error(
          `[BatchExtractor] ${documentId} ${target.type}: ${result.failures.length} failed batches ` +
            `exceed threshold ${this.maxBatchFailures}, abandoning ${result.abandonedBatches} batches`
        );
        break;
      }
    }

    console.error(
      `[BatchExtractor] ${documentId} ${target.type}: ${result.records.length} records from ` +
        `${result.extractedBatches}/${result.batchCount} batches ` +
        `(skipped ${result.skippedBatches}, failed ${result.failedBatches})`
    );
    return result;
  }

  private async runBatch<R extends ExtractedRecord, O>(
    documentId: string,
    batch: ExtractionBatch,
    systemPrompt: string,
    target: ExtractionTarget<R, O>
  ): Promise<BatchOutcome<R>> {
    const prompt = renderBatchPrompt(systemPrompt, batch.units);

    try {
      const response = await withRetry(
        async () => {
          await this.rateLimiter?.acquire();
          return this.client.invoke(prompt, target.schema);
        },
        { policy: this.retryPolicy, label: `${documentId} batch ${batch.index}` }
      );

      if (!response.ok) {
        console.error(
          `[BatchExtractor] ${documentId} batch ${batch.index} skipped: ${response.failure.reason}`
        );
        return { kind: 'validation', message: response.failure.reason };
      }
      return { kind: 'ok', records: target.toRecords(response.value, documentId, batch) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[BatchExtractor] ${documentId} batch ${batch.index} failed: ${message}`);
      return { kind: 'dispatch', message };
    }
  }
}
