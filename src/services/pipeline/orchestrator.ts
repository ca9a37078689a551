/**
 * Orchestrator - one extraction run over a set of documents
 *
 * Documents are handled one at a time: segment, select money units and
 * extract them, select consortium units and extract them. A document that
 * cannot be read or segmented is recorded in the summary and the run goes
 * on. Once every document is done, money records are deduplicated per
 * document in a single pass.
 *
 * @module services/pipeline/orchestrator
 */

import { join } from 'path';
import { segment } from '../segmentation/segmenter.js';
import { BUILTIN_PATTERNS, compilePattern, selectUnits } from '../filtering/filter.js';
import { deduplicateByDocument, DEFAULT_DEDUP_THRESHOLD } from '../dedup/deduplicator.js';
import { findCallPdfs, documentIdFor } from '../ingest/discovery.js';
import { createEntityPipeline, createMoneyPipeline } from '../transform/presets.js';
import {
  OUTPUT_FILES,
  entityRecordsToTable,
  moneyRecordsToTable,
  writeCsv,
  writeJsonArtifact,
} from '../output/writers.js';
import { configurationError, validationError } from '../../server/errors.js';
import type { BatchExtractor } from '../extraction/batch-extractor.js';
import type { EmbeddingProvider } from '../embedding/ollama.js';
import type { TextExtractor } from '../ingest/text-extractor.js';
import type { Table } from '../transform/table.js';
import type { ParagraphSegmentationMode, ReferenceDepth } from '../../models/document.js';
import type {
  BatchExtractionResult,
  DocumentRunSummary,
  EntityRecord,
  ExtractedRecord,
  MoneyRecord,
  RunSummary,
  TargetSummary,
} from '../../models/extraction.js';

/**
 * A document to process. Text may be supplied up front or loaded when the
 * document's turn comes.
 */
export interface SourceDocument {
  id: string;
  text: string | (() => Promise<string>);
}

export interface RunDependencies {
  moneyExtractor: BatchExtractor;
  entityExtractor: BatchExtractor;
  /** Required unless deduplication is switched off */
  embedder?: EmbeddingProvider;
}

export interface RunOptions {
  referenceDepth?: ReferenceDepth;
  paragraphMode?: ParagraphSegmentationMode;
  moneyBatchSize?: number;
  entityBatchSize?: number;
  moneyPattern?: string;
  entityPattern?: string;
  moneySystemPrompt?: string;
  entitySystemPrompt?: string;
  dedupThreshold?: number;
  /** Default true */
  deduplicate?: boolean;
}

export interface RunResult {
  moneyRecords: MoneyRecord[];
  entityRecords: EntityRecord[];
  summary: RunSummary;
}

function summarize(result: BatchExtractionResult<ExtractedRecord>): TargetSummary {
  return {
    batchCount: result.batchCount,
    extractedBatches: result.extractedBatches,
    skippedBatches: result.skippedBatches,
    failedBatches: result.failedBatches,
    abandonedBatches: result.abandonedBatches,
    recordCount: result.records.length,
    aborted: result.aborted,
  };
}

export async function runExtraction(
  documents: readonly SourceDocument[],
  deps: RunDependencies,
  options: RunOptions = {}
): Promise<RunResult> {
  const startedAt = Date.now();
  const referenceDepth = options.referenceDepth ?? 'paragraphs';
  const deduplicate = options.deduplicate ?? true;

  // Bad patterns fail the run before any document is touched
  const moneyPattern = compilePattern(options.moneyPattern ?? BUILTIN_PATTERNS.money);
  const entityPattern = compilePattern(options.entityPattern ?? BUILTIN_PATTERNS.entity);
  if (deduplicate && !deps.embedder) {
    throw configurationError('Deduplication needs an embedding provider');
  }

  let moneyRecords: MoneyRecord[] = [];
  const entityRecords: EntityRecord[] = [];
  const summaries: DocumentRunSummary[] = [];

  for (const source of documents) {
    const summary: DocumentRunSummary = {
      documentId: source.id,
      money: null,
      entity: null,
      error: null,
      failures: [],
    };
    summaries.push(summary);

    try {
      const rawText = typeof source.text === 'string' ? source.text : await source.text();
      const document = segment(rawText, { documentId: source.id, mode: options.paragraphMode });
      console.error(
        `[Orchestrator] ${source.id}: ${document.paragraphs.length} paragraphs`
      );

      const money = await deps.moneyExtractor.extract({
        documentId: source.id,
        units: selectUnits(document, moneyPattern, referenceDepth),
        batchSize: options.moneyBatchSize ?? 3,
        target: 'money',
        systemPrompt: options.moneySystemPrompt,
      });
      moneyRecords.push(...money.records);
      summary.money = summarize(money);
      summary.failures.push(...money.failures);

      const entity = await deps.entityExtractor.extract({
        documentId: source.id,
        units: selectUnits(document, entityPattern, referenceDepth),
        batchSize: options.entityBatchSize ?? 1,
        target: 'entity',
        systemPrompt: options.entitySystemPrompt,
      });
      entityRecords.push(...entity.records);
      summary.entity = summarize(entity);
      summary.failures.push(...entity.failures);

      const aborted = [money, entity].filter((r) => r.aborted).length;
      if (aborted > 0) {
        summary.error = `Extraction abandoned after too many failed batches (${summary.failures.length} failures); partial results kept`;
      }
    } catch (error) {
      summary.error = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      console.error(`[Orchestrator] ${source.id} failed: ${summary.error}`);
    }
  }

  let duplicatesRemoved = 0;
  if (deduplicate && deps.embedder && moneyRecords.length > 0) {
    const dedup = await deduplicateByDocument(moneyRecords, {
      embedder: deps.embedder,
      threshold: options.dedupThreshold ?? DEFAULT_DEDUP_THRESHOLD,
    });
    moneyRecords = dedup.records;
    duplicatesRemoved = dedup.duplicatesRemoved;
  }

  const runSummary: RunSummary = {
    documents: summaries,
    totalMoneyRecords: moneyRecords.length,
    totalEntityRecords: entityRecords.length,
    duplicatesRemoved,
    durationMs: Date.now() - startedAt,
  };
  console.error(
    `[Orchestrator] Run finished: ${summaries.length} documents, ${moneyRecords.length} money, ` +
      `${entityRecords.length} entity records, ${duplicatesRemoved} duplicates removed`
  );
  return { moneyRecords, entityRecords, summary: runSummary };
}

export interface DirectoryRunDependencies extends RunDependencies {
  textExtractor: TextExtractor;
}

export interface DirectoryRunOptions extends RunOptions {
  outputDir: string;
}

/**
 * `moneyRecords` are the extracted records as written to the JSON artifact;
 * `moneyTable` is the filtered, deduplicated result.
 */
export interface DirectoryRunResult extends RunResult {
  moneyTable: Table;
  entityTable: Table;
  files: Record<keyof typeof OUTPUT_FILES, string>;
}

/**
 * Run the pipeline when there are rows to run it on; an empty table
 * passes through with its columns
 */
async function transformTable(
  table: Table,
  pipeline: { run(table: Table): Promise<Table> }
): Promise<Table> {
  return table.rows.length === 0 ? table : pipeline.run(table);
}

/**
 * Discover the call PDFs of a directory, extract, transform and write
 * the JSON artifacts and CSV results into outputDir. Semantic dedup is
 * the last money transformation, after the currency and context filters.
 */
export async function runFromDirectory(
  dir: string,
  deps: DirectoryRunDependencies,
  options: DirectoryRunOptions
): Promise<DirectoryRunResult> {
  const deduplicate = options.deduplicate ?? true;
  if (deduplicate && !deps.embedder) {
    throw configurationError('Deduplication needs an embedding provider');
  }

  const paths = await findCallPdfs(dir);
  if (paths.length === 0) {
    throw validationError(`No call-for-proposal PDF files found in ${dir}`, { dir });
  }

  const documents: SourceDocument[] = paths.map((path) => ({
    id: documentIdFor(path),
    text: () => deps.textExtractor.extract(path),
  }));

  const result = await runExtraction(documents, deps, { ...options, deduplicate: false });

  const files = {
    moneyJson: join(options.outputDir, OUTPUT_FILES.moneyJson),
    entityJson: join(options.outputDir, OUTPUT_FILES.entityJson),
    moneyCsv: join(options.outputDir, OUTPUT_FILES.moneyCsv),
    entityCsv: join(options.outputDir, OUTPUT_FILES.entityCsv),
  };
  await writeJsonArtifact(files.moneyJson, result.moneyRecords);
  await writeJsonArtifact(files.entityJson, result.entityRecords);

  let duplicatesRemoved = 0;
  const moneyPipeline = createMoneyPipeline(
    deduplicate && deps.embedder
      ? {
          embedder: deps.embedder,
          threshold: options.dedupThreshold ?? DEFAULT_DEDUP_THRESHOLD,
          onResult: (dedup) => {
            duplicatesRemoved = dedup.duplicatesRemoved;
          },
        }
      : undefined
  );
  const moneyTable = await transformTable(moneyRecordsToTable(result.moneyRecords), moneyPipeline);
  const entityTable = await transformTable(
    entityRecordsToTable(result.entityRecords),
    createEntityPipeline()
  );
  await writeCsv(files.moneyCsv, moneyTable);
  await writeCsv(files.entityCsv, entityTable);

  const summary: RunSummary = { ...result.summary, duplicatesRemoved };
  console.error(
    `[Orchestrator] ${dir}: ${moneyTable.rows.length} money and ${entityTable.rows.length} entity rows written, ` +
      `${duplicatesRemoved} duplicates removed`
  );
  return { ...result, summary, moneyTable, entityTable, files };
}
