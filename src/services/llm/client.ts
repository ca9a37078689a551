/**
 * Ollama Model Client
 *
 * Sends one extraction prompt to a locally running Ollama instance through
 * /api/generate, with the extraction JSON Schema as structured output
 * `format`, and validates the answer. No API key required.
 *
 * Start Ollama and pull the models before use:
 *   ollama serve
 *   ollama pull phi4:14b
 *   ollama pull gemma3:27b
 */

import { z } from 'zod';
import { loadPipelineConfig, type PipelineConfig, type PipelineConfigInput } from './config.js';
import { CircuitBreaker, CircuitBreakerOpenError } from './circuit-breaker.js';
import { parseModelText, type ExtractionSchema } from './schemas.js';
import { BatchDispatchError, type ModelResult } from '../extraction/errors.js';

// Re-export error type for callers
export { CircuitBreakerOpenError };

/**
 * Prompt + schema in, validated data or a ValidationFailure out.
 * Transport problems throw BatchDispatchError.
 */
export interface ModelClient {
  invoke<T>(prompt: string, schema: ExtractionSchema<T>): Promise<ModelResult<T>>;
}

const OllamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

/**
 * Token usage from the last response
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface OllamaModelClientOptions {
  /** Ollama model tag, e.g. phi4:14b */
  model: string;
  config?: PipelineConfigInput;
  /** Share one breaker between the money and entity clients */
  circuitBreaker?: CircuitBreaker;
}

export class OllamaModelClient implements ModelClient {
  readonly model: string;
  private readonly config: PipelineConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly usage: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };

  constructor(options: OllamaModelClientOptions) {
    this.model = options.model;
    this.config = loadPipelineConfig(options.config);
    this.circuitBreaker =
      options.circuitBreaker ??
      new CircuitBreaker({
        failureThreshold: this.config.circuitBreaker.failureThreshold,
        recoveryTimeMs: this.config.circuitBreaker.recoveryTimeMs,
      });
  }

  async invoke<T>(prompt: string, schema: ExtractionSchema<T>): Promise<ModelResult<T>> {
    const text = await this.circuitBreaker.execute(() =>
      this.callOllamaGenerate(prompt, schema.jsonSchema)
    );
    const result = parseModelText(schema, text);
    if (!result.ok) {
      console.error(`[OllamaClient] ${this.model}: ${result.failure.reason}`);
    }
    return result;
  }

  /**
   * Call Ollama /api/generate, returning the raw response text
   */
  private async callOllamaGenerate(
    prompt: string,
    format: Record<string, unknown>
  ): Promise<string> {
    const url = `${this.config.baseUrl}/api/generate`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          format,
          options: {
            temperature: this.config.temperature,
            top_p: this.config.topP,
            seed: this.config.seed,
            num_predict: this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new BatchDispatchError(
          `Ollama request timed out after ${this.config.requestTimeoutMs}ms`,
          'MODEL_TIMEOUT',
          { model: this.model, timeoutMs: this.config.requestTimeoutMs }
        );
      }
      throw new BatchDispatchError(
        `Ollama request failed: ${error instanceof Error ? error.message : String(error)}`,
        'MODEL_NETWORK_ERROR',
        { model: this.model, url }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      throw new BatchDispatchError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        'MODEL_HTTP_ERROR',
        { model: this.model, status: rawResponse.status }
      );
    }

    let body: unknown;
    try {
      body = await rawResponse.json();
    } catch (error) {
      throw new BatchDispatchError(
        `Ollama returned a body that is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        'MODEL_HTTP_ERROR',
        { model: this.model, status: rawResponse.status }
      );
    }

    const parsed = OllamaGenerateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new BatchDispatchError(
        'Ollama returned an unexpected response body',
        'MODEL_HTTP_ERROR',
        { model: this.model, status: rawResponse.status }
      );
    }

    const inputTokens = parsed.data.prompt_eval_count ?? 0;
    const outputTokens = parsed.data.eval_count ?? 0;
    this.usage.inputTokens += inputTokens;
    this.usage.outputTokens += outputTokens;
    this.usage.totalTokens += inputTokens + outputTokens;

    return parsed.data.response;
  }

  getStatus() {
    return {
      model: this.model,
      baseUrl: this.config.baseUrl,
      usage: { ...this.usage },
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }

  reset(): void {
    this.circuitBreaker.reset();
  }
}
