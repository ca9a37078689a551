/**
 * Extraction MCP Tools
 *
 * Tools: etl_segment_document, etl_filter_units, etl_extract_document,
 * etl_run_pipeline
 *
 * The first two are dry runs that never reach Ollama; the last two run the
 * full segment, filter, extract and deduplicate flow.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/extraction
 */

import { z } from 'zod';
import { getConfig, getRunDependencies, recordRun } from '../server/state.js';
import { successResult } from '../server/types.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';
import {
  validateInput,
  sanitizePath,
  SegmentDocumentInput,
  FilterUnitsInput,
  ExtractDocumentInput,
  RunPipelineInput,
  ExtractionTypeSchema,
  ReferenceDepthSchema,
  ParagraphModeSchema,
} from '../utils/validation.js';
import { segment } from '../services/segmentation/segmenter.js';
import { BUILTIN_PATTERNS, selectUnits } from '../services/filtering/filter.js';
import { runExtraction, runFromDirectory } from '../services/pipeline/orchestrator.js';
import { runOptionsFromConfig } from '../services/pipeline/dependencies.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DRY-RUN TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle etl_segment_document - split text into paragraphs (and sentences)
 */
export async function handleSegmentDocument(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(SegmentDocumentInput, params);
    const mode = input.paragraph_mode ?? getConfig().paragraphMode;
    const document = segment(input.text, { documentId: 'input', mode });

    const paragraphs = document.paragraphs.map((p) => ({
      index: p.index,
      text: p.text,
      ...(input.include_sentences && {
        sentences: document.sentences(p.index).map((s) => s.text),
      }),
    }));

    return formatResponse(
      successResult({
        paragraph_mode: mode,
        paragraph_count: paragraphs.length,
        paragraphs,
        next_steps: [
          { tool: 'etl_filter_units', description: 'See which units a filter pattern keeps' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle etl_filter_units - show the units a pattern selects for extraction
 */
export async function handleFilterUnits(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(FilterUnitsInput, params);
    const config = getConfig();
    const depth = input.reference_depth ?? config.referenceDepth;
    const pattern = input.pattern ?? BUILTIN_PATTERNS[input.target];

    const document = segment(input.text, {
      documentId: 'input',
      mode: input.paragraph_mode ?? config.paragraphMode,
    });
    const units = selectUnits(document, pattern, depth);

    return formatResponse(
      successResult({
        target: input.target,
        pattern,
        reference_depth: depth,
        paragraph_count: document.paragraphs.length,
        unit_count: units.length,
        units: units.map((u) => ({
          paragraph_index: u.paragraphIndex,
          ...(u.sentenceIndex !== undefined && { sentence_index: u.sentenceIndex }),
          text: u.text,
        })),
        next_steps: [
          { tool: 'etl_extract_document', description: 'Extract records from the selected units' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle etl_extract_document - extract money and entity records from one text
 */
export async function handleExtractDocument(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractDocumentInput, params);
    const config = getConfig();

    const result = await runExtraction(
      [{ id: input.document_id, text: input.text }],
      getRunDependencies(),
      {
        ...runOptionsFromConfig(config),
        deduplicate: input.deduplicate,
        moneyPattern: input.money_pattern,
        entityPattern: input.entity_pattern,
      }
    );
    recordRun(result.summary);

    return formatResponse(
      successResult({
        money_records: result.moneyRecords,
        entity_records: result.entityRecords,
        summary: result.summary,
        next_steps: [
          { tool: 'etl_run_pipeline', description: 'Process a whole directory and write CSVs' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle etl_run_pipeline - discover call PDFs, extract, transform, write
 */
export async function handleRunPipeline(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(RunPipelineInput, params);
    const inputDir = sanitizePath(input.input_dir);
    const outputDir = sanitizePath(input.output_dir);
    const config = getConfig();

    const result = await runFromDirectory(inputDir, getRunDependencies(), {
      ...runOptionsFromConfig(config),
      deduplicate: input.deduplicate,
      outputDir,
    });
    recordRun(result.summary);

    const failedDocuments = result.summary.documents.filter((d) => d.error !== null);

    return formatResponse(
      successResult({
        input_dir: inputDir,
        files: result.files,
        money_rows: result.moneyTable.rows.length,
        entity_rows: result.entityTable.rows.length,
        duplicates_removed: result.summary.duplicatesRemoved,
        failed_documents: failedDocuments.map((d) => ({ document_id: d.documentId, error: d.error })),
        summary: result.summary,
        next_steps: [
          { tool: 'etl_config_set', description: 'Tune batch sizes or the dedup threshold' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extraction tools collection for MCP server registration
 */
export const extractionTools: Record<string, ToolDefinition> = {
  etl_segment_document: {
    description:
      '[ANALYSIS] Use to see how a call document splits into paragraphs and sentences. No model calls.',
    inputSchema: {
      text: z.string().min(1).describe('Raw document text'),
      paragraph_mode: ParagraphModeSchema.optional().describe(
        'empty_line (default) or newlines'
      ),
      include_sentences: z.boolean().default(false).describe('Include sentences per paragraph'),
    },
    handler: handleSegmentDocument,
  },
  etl_filter_units: {
    description:
      '[ANALYSIS] Use to preview which paragraphs or sentences a filter pattern sends to the model. No model calls.',
    inputSchema: {
      text: z.string().min(1).describe('Raw document text'),
      target: ExtractionTypeSchema.default('money').describe('Built-in pattern to use'),
      pattern: z.string().min(1).optional().describe('Custom regular expression'),
      reference_depth: ReferenceDepthSchema.optional().describe('paragraphs or sentences'),
      paragraph_mode: ParagraphModeSchema.optional().describe('empty_line or newlines'),
    },
    handler: handleFilterUnits,
  },
  etl_extract_document: {
    description:
      '[PROCESSING] Use to extract funding amounts and consortium requirements from one document text with the local Ollama models.',
    inputSchema: {
      text: z.string().min(1).describe('Raw document text'),
      document_id: z.string().min(1).default('document').describe('Identifier for the records'),
      deduplicate: z.boolean().default(true).describe('Remove semantic duplicate amounts'),
      money_pattern: z.string().min(1).optional().describe('Override the money filter'),
      entity_pattern: z.string().min(1).optional().describe('Override the entity filter'),
    },
    handler: handleExtractDocument,
  },
  etl_run_pipeline: {
    description:
      '[PROCESSING] Use to run the whole ETL over a directory of call-for-proposal PDFs. Writes JSON artifacts and CSV results to output_dir.',
    inputSchema: {
      input_dir: z.string().min(1).describe('Directory holding the call PDFs'),
      output_dir: z.string().min(1).describe('Directory for JSON and CSV output'),
      deduplicate: z.boolean().default(true).describe('Remove semantic duplicate amounts'),
    },
    handler: handleRunPipeline,
  },
};
