/**
 * Pipeline Configuration
 *
 * One zod schema covers the Ollama connection, generation parameters and
 * the extraction/dedup knobs. Values come from environment variables with
 * the defaults of the reference run (phi4 for money, gemma3 for entities).
 *
 * @module services/llm/config
 */

import { z } from 'zod';
import { PARAGRAPH_SEGMENTATION_MODES, REFERENCE_DEPTHS } from '../../models/document.js';

export const DEFAULT_MODELS = {
  MONEY: 'phi4:14b',
  ENTITY: 'gemma3:27b',
  EMBEDDING: 'nomic-embed-text',
} as const;

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export const PipelineConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_OLLAMA_URL),

  moneyModel: z.string().min(1).default(DEFAULT_MODELS.MONEY),
  entityModel: z.string().min(1).default(DEFAULT_MODELS.ENTITY),
  embeddingModel: z.string().min(1).default(DEFAULT_MODELS.EMBEDDING),

  // Generation
  temperature: z.number().min(0).max(2).default(0.3),
  topP: z.number().gt(0).max(1).default(0.3),
  seed: z.number().int().default(42),
  maxOutputTokens: z.number().int().positive().default(4096),
  requestTimeoutMs: z.number().int().positive().default(120_000),

  // Extraction
  moneyBatchSize: z.number().int().positive().default(3),
  entityBatchSize: z.number().int().positive().default(1),
  referenceDepth: z.enum(REFERENCE_DEPTHS).default('paragraphs'),
  paragraphMode: z.enum(PARAGRAPH_SEGMENTATION_MODES).default('empty_line'),
  concurrency: z.number().int().positive().default(2),
  /** Failed batches tolerated per document before the rest are abandoned; null = never */
  maxBatchFailures: z.number().int().nonnegative().nullable().default(null),
  /** 0 disables the limiter */
  requestsPerMinute: z.number().int().nonnegative().default(60),

  // Deduplication (cosine distance)
  dedupThreshold: z.number().min(0).max(2).default(0.5),

  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().nonnegative().default(500),
      maxDelayMs: z.number().nonnegative().default(10_000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().positive().default(5),
      recoveryTimeMs: z.number().int().positive().default(60_000),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid integer env var ${name}: "${raw}"`);
  }
  return parsed;
}

function parseFloatEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function stringEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Load pipeline configuration from environment variables.
 *
 * Environment variables:
 *   OLLAMA_BASE_URL          Ollama server URL (default: http://localhost:11434)
 *   ETL_MONEY_MODEL          Model for monetary extraction (default: phi4:14b)
 *   ETL_ENTITY_MODEL         Model for consortium extraction (default: gemma3:27b)
 *   ETL_EMBEDDING_MODEL      Embedding model for dedup (default: nomic-embed-text)
 *   ETL_TEMPERATURE, ETL_TOP_P, ETL_SEED, ETL_MAX_OUTPUT_TOKENS
 *   ETL_MONEY_BATCH_SIZE, ETL_ENTITY_BATCH_SIZE, ETL_REFERENCE_DEPTH
 *   ETL_DEDUP_THRESHOLD, ETL_CONCURRENCY, ETL_MAX_BATCH_FAILURES,
 *   ETL_REQUESTS_PER_MINUTE
 *
 * Overrides win over the environment.
 *
 * @throws Error when a numeric env var does not parse
 * @throws ZodError when a value is out of range
 */
export function loadPipelineConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  const fromEnv: PipelineConfigInput = {
    baseUrl: stringEnv('OLLAMA_BASE_URL'),
    moneyModel: stringEnv('ETL_MONEY_MODEL'),
    entityModel: stringEnv('ETL_ENTITY_MODEL'),
    embeddingModel: stringEnv('ETL_EMBEDDING_MODEL'),
    temperature: parseFloatEnv('ETL_TEMPERATURE'),
    topP: parseFloatEnv('ETL_TOP_P'),
    seed: parseIntEnv('ETL_SEED'),
    maxOutputTokens: parseIntEnv('ETL_MAX_OUTPUT_TOKENS'),
    moneyBatchSize: parseIntEnv('ETL_MONEY_BATCH_SIZE'),
    entityBatchSize: parseIntEnv('ETL_ENTITY_BATCH_SIZE'),
    dedupThreshold: parseFloatEnv('ETL_DEDUP_THRESHOLD'),
    concurrency: parseIntEnv('ETL_CONCURRENCY'),
    maxBatchFailures: parseIntEnv('ETL_MAX_BATCH_FAILURES'),
    requestsPerMinute: parseIntEnv('ETL_REQUESTS_PER_MINUTE'),
  };

  const depth = stringEnv('ETL_REFERENCE_DEPTH');
  if (depth !== undefined) {
    const parsedDepth = z.enum(REFERENCE_DEPTHS).safeParse(depth);
    if (!parsedDepth.success) {
      throw new Error(
        `Invalid ETL_REFERENCE_DEPTH: "${depth}". Expected one of: ${REFERENCE_DEPTHS.join(', ')}`
      );
    }
    fromEnv.referenceDepth = parsedDepth.data;
  }

  // undefined keys fall through to the schema defaults
  const defined = Object.fromEntries(
    Object.entries(fromEnv).filter(([, value]) => value !== undefined)
  );

  return PipelineConfigSchema.parse({ ...defined, ...overrides });
}
