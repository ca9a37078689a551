/**
 * Wiring of the Ollama-backed run dependencies from a pipeline config
 *
 * The money and entity clients share one circuit breaker and one rate
 * limiter, since both talk to the same Ollama instance.
 *
 * @module services/pipeline/dependencies
 */

import { BatchExtractor } from '../extraction/batch-extractor.js';
import { OllamaEmbeddingProvider } from '../embedding/ollama.js';
import { FileTextExtractor } from '../ingest/text-extractor.js';
import { OllamaModelClient } from '../llm/client.js';
import { CircuitBreaker } from '../llm/circuit-breaker.js';
import { RateLimiter } from '../llm/rate-limiter.js';
import type { PipelineConfig } from '../llm/config.js';
import type { DirectoryRunDependencies, RunOptions } from './orchestrator.js';

export function createRunDependencies(config: PipelineConfig): DirectoryRunDependencies {
  const circuitBreaker = new CircuitBreaker({
    failureThreshold: config.circuitBreaker.failureThreshold,
    recoveryTimeMs: config.circuitBreaker.recoveryTimeMs,
  });
  const rateLimiter = new RateLimiter(config.requestsPerMinute);

  const extractorFor = (model: string): BatchExtractor =>
    new BatchExtractor({
      client: new OllamaModelClient({ model, config, circuitBreaker }),
      rateLimiter,
      concurrency: config.concurrency,
      maxRetries: config.retry.maxAttempts - 1,
      maxBatchFailures: config.maxBatchFailures,
      backoff: {
        baseDelayMs: config.retry.baseDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
      },
    });

  return {
    moneyExtractor: extractorFor(config.moneyModel),
    entityExtractor: extractorFor(config.entityModel),
    embedder: new OllamaEmbeddingProvider({ model: config.embeddingModel, config }),
    textExtractor: new FileTextExtractor(),
  };
}

/**
 * Run options carried by the pipeline config
 */
export function runOptionsFromConfig(config: PipelineConfig): RunOptions {
  return {
    referenceDepth: config.referenceDepth,
    paragraphMode: config.paragraphMode,
    moneyBatchSize: config.moneyBatchSize,
    entityBatchSize: config.entityBatchSize,
    dedupThreshold: config.dedupThreshold,
  };
}
