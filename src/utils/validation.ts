/**
 * Grant Call ETL - Zod Validation Schemas
 *
 * Input validation for all MCP tool inputs.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';
import { EXTRACTION_TYPES } from '../models/extraction.js';
import { PARAGRAPH_SEGMENTATION_MODES, REFERENCE_DEPTHS } from '../models/document.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing field
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ExtractionTypeSchema = z.enum(EXTRACTION_TYPES);

export const ReferenceDepthSchema = z.enum(REFERENCE_DEPTHS);

export const ParagraphModeSchema = z.enum(PARAGRAPH_SEGMENTATION_MODES);

const DocumentText = z.string().min(1, 'Document text is required');

/**
 * Configuration keys exposed through etl_config_get / etl_config_set
 */
export const ConfigKey = z.enum([
  'ollama_base_url',
  'money_model',
  'entity_model',
  'embedding_model',
  'temperature',
  'top_p',
  'seed',
  'max_output_tokens',
  'request_timeout_ms',
  'money_batch_size',
  'entity_batch_size',
  'reference_depth',
  'paragraph_mode',
  'concurrency',
  'max_batch_failures',
  'requests_per_minute',
  'dedup_threshold',
]);

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SegmentDocumentInput = z.object({
  text: DocumentText,
  paragraph_mode: ParagraphModeSchema.optional(),
  include_sentences: z.boolean().default(false),
});

export const FilterUnitsInput = z.object({
  text: DocumentText,
  target: ExtractionTypeSchema.default('money'),
  /** Overrides the built-in pattern of the target */
  pattern: z.string().min(1).optional(),
  reference_depth: ReferenceDepthSchema.optional(),
  paragraph_mode: ParagraphModeSchema.optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ExtractDocumentInput = z.object({
  text: DocumentText,
  document_id: z.string().min(1).default('document'),
  deduplicate: z.boolean().default(true),
  money_pattern: z.string().min(1).optional(),
  entity_pattern: z.string().min(1).optional(),
});

export const RunPipelineInput = z.object({
  input_dir: z.string().min(1, 'Input directory is required'),
  output_dir: z.string().min(1, 'Output directory is required'),
  deduplicate: z.boolean().default(true),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Allowed base directories: home, the temp dir, the working directory and
 * anything listed in GRANT_ETL_ALLOWED_DIRS (comma-separated).
 */
function getDefaultAllowedBaseDirs(): string[] {
  const dirs = [path.resolve(homedir()), path.resolve(tmpdir()), path.resolve(process.cwd())];

  const extraDirs = process.env.GRANT_ETL_ALLOWED_DIRS;
  if (extraDirs) {
    for (const d of extraDirs.split(',')) {
      const trimmed = d.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }
  return dirs;
}

/**
 * Resolve a path and check it stays inside an allowed base directory.
 *
 * @throws ValidationError if the path contains null bytes or escapes allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);

  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set the GRANT_ETL_ALLOWED_DIRS environment variable ` +
        `(comma-separated list of directories).`
    );
  }

  return resolved;
}
