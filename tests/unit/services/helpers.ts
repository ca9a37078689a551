/**
 * In-process stand-ins for the Ollama model and embedding endpoints
 *
 * @module tests/unit/services/helpers
 */

import { EmbeddingError, type EmbeddingProvider } from '../../../src/services/embedding/ollama.js';
import type { ModelClient } from '../../../src/services/llm/client.js';
import type { ExtractionSchema } from '../../../src/services/llm/schemas.js';
import type { ModelResult } from '../../../src/services/extraction/errors.js';
import type { MoneyRecord } from '../../../src/models/extraction.js';

/**
 * Answers each prompt with the decoded JSON returned by `reply`, validated
 * by the real extraction schema. A reply that throws rejects the call.
 */
export class ScriptedModelClient implements ModelClient {
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string, call: number) => unknown) {}

  async invoke<T>(prompt: string, schema: ExtractionSchema<T>): Promise<ModelResult<T>> {
    const call = this.prompts.length;
    this.prompts.push(prompt);
    return schema.parse(this.reply(prompt, call));
  }
}

/**
 * Embeds by keyword: the vector has a 1 for every topic whose keyword the
 * text contains. Text with no keyword gets a vector of its own.
 */
export class KeywordEmbedder implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly topics: readonly string[],
    private readonly failOn: readonly string[] = []
  ) {}

  async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    if (this.failOn.some((f) => text.includes(f))) {
      throw new EmbeddingError(`Cannot embed: ${text}`, 'EMBEDDING_FAILED');
    }
    const lower = text.toLowerCase();
    const vector = new Float32Array(this.topics.length + 1);
    this.topics.forEach((topic, i) => {
      if (lower.includes(topic)) vector[i] = 1;
    });
    if (vector.every((v) => v === 0)) vector[this.topics.length] = 1;
    return vector;
  }
}

let nextId = 0;

export function moneyRecord(overrides: Partial<MoneyRecord> = {}): MoneyRecord {
  nextId++;
  return {
    type: 'money',
    id: `m${nextId}`,
    documentId: 'doc-1',
    value: 500000,
    currency: 'EUR',
    context: 'maximum grant',
    originalSentence: 'The maximum grant is EUR 500,000.',
    ...overrides,
  };
}
