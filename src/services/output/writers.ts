/**
 * Output writers - JSON artifacts and CSV results
 *
 * @module services/output/writers
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { Cell, Table } from '../transform/table.js';
import type { EntityRecord, ExtractedRecord, MoneyRecord } from '../../models/extraction.js';

export const OUTPUT_FILES = {
  moneyJson: 'money_result.json',
  entityJson: 'entity_result.json',
  moneyCsv: 'etl_money_result.csv',
  entityCsv: 'etl_entity_result.csv',
} as const;

export const MONEY_TABLE_COLUMNS = [
  'document_id',
  'value',
  'currency',
  'context',
  'original_sentence',
];

export const ENTITY_TABLE_COLUMNS = ['document_id', 'organization_type', 'min_entities'];

/** Separator for list cells in CSV output */
const LIST_SEPARATOR = ';';

export class OutputWriteError extends Error {
  public readonly code = 'FILE_WRITE_ERROR';

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OutputWriteError';
  }
}

export function moneyRecordsToTable(records: readonly MoneyRecord[]): Table {
  return {
    columns: [...MONEY_TABLE_COLUMNS],
    rows: records.map((r) => ({
      document_id: r.documentId,
      value: r.value,
      currency: r.currency,
      context: r.context,
      original_sentence: r.originalSentence,
    })),
  };
}

/**
 * One row per organization type of each record, all sharing the record's
 * min_entities list
 */
export function entityRecordsToTable(records: readonly EntityRecord[]): Table {
  return {
    columns: [...ENTITY_TABLE_COLUMNS],
    rows: records.flatMap((r) =>
      r.organizationTypes.map((organizationType) => ({
        document_id: r.documentId,
        organization_type: organizationType,
        min_entities: [...r.minEntities],
      }))
    ),
  };
}

/**
 * Escape a value for CSV
 * - Wrap in quotes if contains comma, quote, or newline
 * - Escape quotes by doubling them
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

function formatCell(cell: Cell | undefined): string {
  if (cell === undefined || cell === null) return '';
  if (Array.isArray(cell)) return Array.from(cell, String).join(LIST_SEPARATOR);
  return String(cell);
}

export function tableToCsv(table: Table): string {
  const lines = [table.columns.map(escapeCSV).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => escapeCSV(formatCell(row[column]))).join(','));
  }
  return lines.join('\n') + '\n';
}

async function writeText(outputPath: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');
  } catch (error) {
    throw new OutputWriteError(`Failed to write output file: ${outputPath}`, {
      outputPath,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Write records as a pretty-printed JSON array
 */
export async function writeJsonArtifact(
  outputPath: string,
  records: readonly ExtractedRecord[]
): Promise<void> {
  await writeText(outputPath, JSON.stringify(records, null, 2));
}

export async function writeCsv(outputPath: string, table: Table): Promise<void> {
  await writeText(outputPath, tableToCsv(table));
}
