/**
 * Validation steps
 *
 * A validation step returns its input unchanged or throws
 * TableValidationError. Regex checks search (not full-match) with
 * case-insensitive, dotall flags.
 *
 * @module services/transform/validations
 */

import { compilePattern } from '../filtering/filter.js';
import { defineStep, type PipelineStep } from './pipeline.js';
import {
  TableValidationError,
  describeCell,
  isMissing,
  numberCell,
  requireColumns,
  requireNoMissing,
  stringCell,
  type Table,
} from './table.js';

function requireRows(table: Table, column: string): void {
  if (table.rows.length === 0) {
    throw new TableValidationError(`Column '${column}' is empty`, { column });
  }
}

export const verifyNoMissingData: PipelineStep = defineStep('verifyNoMissingData', (table) => {
  for (const column of table.columns) {
    requireNoMissing(table, column);
  }
  return table;
});

export const verifyNoNegatives: PipelineStep = defineStep('verifyNoNegatives', (table) => {
  for (const column of table.columns) {
    const negative = table.rows.flatMap((row, i) => {
      const cell = row[column];
      return typeof cell === 'number' && cell < 0 ? [i] : [];
    });
    if (negative.length > 0) {
      throw new TableValidationError(
        `Found negative values in column '${column}' at rows: ${negative.join(', ')}`,
        { column, rows: negative }
      );
    }
  }
  return table;
});

export const verifyNoEmptyStrings: PipelineStep = defineStep('verifyNoEmptyStrings', (table) => {
  for (const column of table.columns) {
    const empty = table.rows.flatMap((row, i) => (row[column] === '' ? [i] : []));
    if (empty.length > 0) {
      throw new TableValidationError(
        `Found empty strings in column '${column}' at rows: ${empty.join(', ')}`,
        { column, rows: empty }
      );
    }
  }
  return table;
});

export function checkNumericColumns(columns: readonly string[]): PipelineStep {
  return defineStep('checkNumericColumns', (table) => {
    requireColumns(table, columns);
    for (const column of columns) {
      requireRows(table, column);
      requireNoMissing(table, column);
      table.rows.forEach((row, i) => numberCell(row, column, i));
    }
    return table;
  });
}

export function checkStringColumns(columns: readonly string[]): PipelineStep {
  return defineStep('checkStringColumns', (table) => {
    requireColumns(table, columns);
    for (const column of columns) {
      requireRows(table, column);
      requireNoMissing(table, column);
      table.rows.forEach((row, i) => stringCell(row, column, i));
    }
    return table;
  });
}

export function checkColumnsSatisfyRegex(
  columns: readonly string[],
  pattern: string | RegExp
): PipelineStep {
  const regex = compilePattern(pattern);
  return defineStep('checkColumnsSatisfyRegex', (table) => {
    requireColumns(table, columns);
    for (const column of columns) {
      requireRows(table, column);
      requireNoMissing(table, column);
      table.rows.forEach((row, i) => {
        const value = stringCell(row, column, i);
        if (!regex.test(value)) {
          throw new TableValidationError(
            `Row ${i}, column '${column}' does not satisfy /${regex.source}/`,
            { column, row: i, value }
          );
        }
      });
    }
    return table;
  });
}

export function verifyListColumnContainsOnlyInts(columns: readonly string[]): PipelineStep {
  return defineStep('verifyListColumnContainsOnlyInts', (table) => {
    requireColumns(table, columns);
    for (const column of columns) {
      table.rows.forEach((row, i) => {
        const cell = row[column];
        if (isMissing(cell) || !Array.isArray(cell)) {
          throw new TableValidationError(
            `Row ${i}, column '${column}' is not a list (found ${describeCell(cell)})`,
            { column, row: i }
          );
        }
        cell.forEach((element, j) => {
          if (typeof element !== 'number' || !Number.isInteger(element)) {
            throw new TableValidationError(
              `Element ${j} of the list at row ${i}, column '${column}' is not an integer`,
              { column, row: i, element }
            );
          }
        });
      });
    }
    return table;
  });
}
