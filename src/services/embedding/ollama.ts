/**
 * OllamaEmbeddingProvider - sentence embeddings from Ollama's /api/embed
 *
 * Used only by deduplication. A failure is an EmbeddingError; the caller
 * decides what to do with the record (dedup passes it through unmerged).
 *
 * @module services/embedding/ollama
 */

import { z } from 'zod';
import { loadPipelineConfig, type PipelineConfigInput } from '../llm/config.js';

type EmbeddingErrorCode = 'EMPTY_INPUT' | 'EMBEDDING_FAILED' | 'PARSE_ERROR' | 'DIMENSION_MISMATCH';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

/**
 * Text in, fixed-length vector out
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<Float32Array>;
}

const EmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())).min(1),
});

const EMBED_TIMEOUT_MS = 60_000;

export interface OllamaEmbeddingOptions {
  model?: string;
  baseUrl?: string;
  /** Prepended to every input, e.g. "clustering: " for nomic-embed-text */
  prefix?: string;
  config?: PipelineConfigInput;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly prefix: string;
  private dimension: number | null = null;

  constructor(options: OllamaEmbeddingOptions = {}) {
    const config = loadPipelineConfig(options.config);
    this.model = options.model ?? config.embeddingModel;
    this.baseUrl = options.baseUrl ?? config.baseUrl;
    this.prefix = options.prefix ?? '';
  }

  async embed(text: string): Promise<Float32Array> {
    if (text.trim().length === 0) {
      throw new EmbeddingError('Text to embed cannot be empty', 'EMPTY_INPUT');
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), EMBED_TIMEOUT_MS);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: this.prefix + text }),
        signal: controller.signal,
      });
    } catch (error) {
      throw new EmbeddingError(
        `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
        'EMBEDDING_FAILED',
        { model: this.model, aborted: controller.signal.aborted }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new EmbeddingError(
        `Ollama embed error ${response.status}: ${body.slice(0, 200)}`,
        'EMBEDDING_FAILED',
        { model: this.model, status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new EmbeddingError(
        `/api/embed returned a body that is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        'PARSE_ERROR',
        { model: this.model, status: response.status }
      );
    }

    const parsed = EmbedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError('Unexpected /api/embed response body', 'PARSE_ERROR', {
        model: this.model,
      });
    }

    const vector = parsed.data.embeddings[0];
    // Every vector of a run must have the same length for cosine distance
    if (this.dimension === null) {
      this.dimension = vector.length;
    } else if (vector.length !== this.dimension) {
      throw new EmbeddingError(
        `Embedding has ${vector.length} dimensions, expected ${this.dimension}`,
        'DIMENSION_MISMATCH',
        { model: this.model, actualDim: vector.length, expectedDim: this.dimension }
      );
    }
    return new Float32Array(vector);
  }
}
