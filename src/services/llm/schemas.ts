/**
 * Extraction schemas
 *
 * Each schema pairs the JSON Schema handed to Ollama's `format` field with
 * the zod parser that decides whether the model's answer is usable.
 * Parsing never throws: a mismatch is a ValidationFailure value.
 *
 * @module services/llm/schemas
 */

import { z } from 'zod';
import type { ModelResult } from '../extraction/errors.js';
import type { ExtractionType } from '../../models/extraction.js';

/** Raw model output kept on a failure, for the run log */
const RAW_OUTPUT_PREVIEW = 500;

export interface ExtractionSchema<T> {
  name: string;
  /** JSON Schema sent to the model as structured output format */
  jsonSchema: Record<string, unknown>;
  parse(data: unknown): ModelResult<T>;
}

/**
 * Build an ExtractionSchema from a zod schema and its JSON Schema twin
 */
export function defineSchema<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  jsonSchema: Record<string, unknown>
): ExtractionSchema<z.infer<S>> {
  return {
    name,
    jsonSchema,
    parse(data: unknown): ModelResult<z.infer<S>> {
      const result = schema.safeParse(data);
      if (result.success) {
        return { ok: true, value: result.data };
      }
      const reason = result.error.errors
        .map((e) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
        .join('; ');
      return { ok: false, failure: { reason: `${name} schema mismatch: ${reason}` } };
    },
  };
}

/**
 * Parse raw model text as JSON and validate it.
 */
export function parseModelText<T>(schema: ExtractionSchema<T>, text: string): ModelResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      failure: {
        reason: `Model output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        rawOutput: text.slice(0, RAW_OUTPUT_PREVIEW),
      },
    };
  }
  const result = schema.parse(data);
  if (!result.ok) {
    return { ok: false, failure: { ...result.failure, rawOutput: text.slice(0, RAW_OUTPUT_PREVIEW) } };
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MONEY
// ═══════════════════════════════════════════════════════════════════════════════

const MoneyItemSchema = z.object({
  value: z.number().finite(),
  currency: z.string().trim().min(1),
  context: z.string().trim().min(1),
  original_sentence: z.string().trim().min(1).optional(),
});

export const MoneyOutputSchema = z.object({
  items: z.array(MoneyItemSchema),
});

export type MoneyItem = z.infer<typeof MoneyItemSchema>;
export type MoneyOutput = z.infer<typeof MoneyOutputSchema>;

export const MONEY_SCHEMA = defineSchema('money', MoneyOutputSchema, {
  type: 'object',
  properties: {
    items: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          value: { type: 'number' },
          currency: { type: 'string' },
          context: { type: 'string' },
          original_sentence: { type: 'string' },
        },
        required: ['value', 'currency', 'context', 'original_sentence'],
      },
    },
  },
  required: ['items'],
});

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY
// ═══════════════════════════════════════════════════════════════════════════════

const EntityItemSchema = z.object({
  organization_type: z.array(z.string().trim().min(1)).min(1),
  min_entities: z.array(z.number().int().nonnegative()).min(1),
});

export const EntityOutputSchema = z.object({
  items: z.array(EntityItemSchema),
});

export type EntityItem = z.infer<typeof EntityItemSchema>;
export type EntityOutput = z.infer<typeof EntityOutputSchema>;

export const ENTITY_SCHEMA = defineSchema('entity', EntityOutputSchema, {
  type: 'object',
  properties: {
    items: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          organization_type: { type: 'array', items: { type: 'string' } },
          min_entities: { type: 'array', items: { type: 'integer' } },
        },
        required: ['organization_type', 'min_entities'],
      },
    },
  },
  required: ['items'],
});

export interface SchemaByType {
  money: ExtractionSchema<MoneyOutput>;
  entity: ExtractionSchema<EntityOutput>;
}

export const EXTRACTION_SCHEMAS: SchemaByType = {
  money: MONEY_SCHEMA,
  entity: ENTITY_SCHEMA,
};

export function schemaFor<T extends ExtractionType>(type: T): SchemaByType[T] {
  return EXTRACTION_SCHEMAS[type];
}
