/**
 * Transformation steps
 *
 * Every step returns a new table; input rows are never mutated.
 *
 * @module services/transform/transformations
 */

import { compilePattern } from '../filtering/filter.js';
import {
  deduplicateByDocument,
  type DedupOptions,
  type DedupResult,
} from '../dedup/deduplicator.js';
import { defineStep, type PipelineStep } from './pipeline.js';
import {
  TableValidationError,
  numberCell,
  requireColumns,
  requireNoMissing,
  stringCell,
  type Cell,
  type Row,
  type Table,
} from './table.js';
import type { MoneyRecord } from '../../models/extraction.js';

export function dropRowsWithNonPositiveValues(columns: readonly string[]): PipelineStep {
  return defineStep('dropRowsWithNonPositiveValues', (table) => {
    requireColumns(table, columns);
    columns.forEach((column) => requireNoMissing(table, column));
    const rows = table.rows.filter((row, i) =>
      columns.every((column) => numberCell(row, column, i) > 0)
    );
    return { columns: [...table.columns], rows };
  });
}

/**
 * Keep rows where every listed column matches the pattern
 */
export function dropRowsNotSatisfyingRegex(
  columns: readonly string[],
  pattern: string | RegExp
): PipelineStep {
  const regex = compilePattern(pattern);
  return defineStep('dropRowsNotSatisfyingRegex', (table) => {
    requireColumns(table, columns);
    columns.forEach((column) => requireNoMissing(table, column));
    const rows = table.rows.filter((row, i) =>
      columns.every((column) => regex.test(stringCell(row, column, i)))
    );
    return { columns: [...table.columns], rows };
  });
}

/**
 * Keep rows where at least one listed column matches the pattern.
 * Missing or non-string cells count as not matching.
 */
export function dropRowsIfNoColumnMatchesRegex(
  columns: readonly string[],
  pattern: string | RegExp
): PipelineStep {
  const regex = compilePattern(pattern);
  return defineStep('dropRowsIfNoColumnMatchesRegex', (table) => {
    requireColumns(table, columns);
    const rows = table.rows.filter((row) =>
      columns.some((column) => {
        const cell = row[column];
        return typeof cell === 'string' && regex.test(cell);
      })
    );
    return { columns: [...table.columns], rows };
  });
}

/**
 * Reduce each integer list to its distinct values, first occurrence order
 */
export function reduceListIntsToUnique(column = 'min_entities'): PipelineStep {
  return defineStep('reduceListIntsToUnique', (table) => {
    requireColumns(table, [column]);
    const rows = table.rows.map((row, i): Row => {
      const cell = row[column];
      if (cell === null) {
        return { ...row };
      }
      if (!Array.isArray(cell)) {
        throw new TableValidationError(`Row ${i}, column '${column}' is not a list`, {
          column,
          row: i,
        });
      }
      const unique: number[] = [];
      for (const element of cell) {
        if (typeof element !== 'number') {
          throw new TableValidationError(
            `Row ${i}, column '${column}' holds a non-integer element`,
            { column, row: i }
          );
        }
        if (!unique.includes(element)) unique.push(element);
      }
      return { ...row, [column]: unique };
    });
    return { columns: [...table.columns], rows };
  });
}

export interface GroupByDocumentOptions {
  targetColumn?: string;
  documentIdColumn?: string;
  minEntitiesColumn?: string;
}

/**
 * One row per document: the target column stacks the distinct values of
 * its rows, the min-entities column keeps the first row's list.
 */
export function groupByDocumentAndStackTypes(options: GroupByDocumentOptions = {}): PipelineStep {
  const targetColumn = options.targetColumn ?? 'organization_type';
  const documentIdColumn = options.documentIdColumn ?? 'document_id';
  const minEntitiesColumn = options.minEntitiesColumn ?? 'min_entities';

  return defineStep('groupByDocumentAndStackTypes', (table) => {
    requireColumns(table, [documentIdColumn, targetColumn, minEntitiesColumn]);

    const groups = new Map<string, { types: string[]; minEntities: Cell }>();
    table.rows.forEach((row, i) => {
      const documentId = stringCell(row, documentIdColumn, i);
      const target = row[targetColumn];
      const values = Array.isArray(target) ? Array.from(target, String) : [String(target)];
      const group = groups.get(documentId);
      if (group) {
        for (const v of values) {
          if (!group.types.includes(v)) group.types.push(v);
        }
      } else {
        groups.set(documentId, {
          types: [...new Set(values)],
          minEntities: row[minEntitiesColumn],
        });
      }
    });

    const rows = [...groups.entries()].map(
      ([documentId, group]): Row => ({
        [documentIdColumn]: documentId,
        [targetColumn]: group.types,
        [minEntitiesColumn]: group.minEntities,
      })
    );
    return { columns: [documentIdColumn, targetColumn, minEntitiesColumn], rows };
  });
}

const MONEY_COLUMNS = ['document_id', 'value', 'currency', 'context', 'original_sentence'];

export interface DedupStepOptions extends DedupOptions {
  /** Receives the dedup outcome each time the step runs */
  onResult?: (result: DedupResult) => void;
}

/**
 * The Deduplicator applied to a money table. Extra columns ride along
 * with their row.
 */
export function removeSemanticDuplicates(options: DedupStepOptions): PipelineStep {
  return defineStep('removeSemanticDuplicates', async (table) => {
    requireColumns(table, MONEY_COLUMNS);
    const records = table.rows.map(
      (row, i): MoneyRecord => ({
        type: 'money',
        id: String(i),
        documentId: stringCell(row, 'document_id', i),
        value: numberCell(row, 'value', i),
        currency: stringCell(row, 'currency', i),
        context: stringCell(row, 'context', i),
        originalSentence: stringCell(row, 'original_sentence', i),
      })
    );
    const result = await deduplicateByDocument(records, options);
    options.onResult?.(result);
    const rows = result.records.map((record) => ({ ...table.rows[Number(record.id)] }));
    return { columns: [...table.columns], rows };
  });
}
