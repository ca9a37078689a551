/**
 * Table model for the transformation stage
 *
 * @module services/transform/table
 */

export type Cell = string | number | boolean | null | string[] | number[];

export type Row = Record<string, Cell>;

export interface Table {
  columns: string[];
  rows: Row[];
}

export class TableValidationError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TableValidationError';
  }
}

export class PipelineStepError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineStepError';
  }
}

export function isTable(value: unknown): value is Table {
  if (typeof value !== 'object' || value === null) return false;
  if (!('columns' in value) || !('rows' in value)) return false;
  const { columns, rows } = value;
  return (
    Array.isArray(columns) &&
    columns.every((c) => typeof c === 'string') &&
    Array.isArray(rows) &&
    rows.every((r) => typeof r === 'object' && r !== null && !Array.isArray(r))
  );
}

export function isMissing(cell: Cell | undefined): boolean {
  return cell === undefined || cell === null || (typeof cell === 'number' && Number.isNaN(cell));
}

/**
 * @throws TableValidationError naming the first column the table lacks
 */
export function requireColumns(table: Table, columns: readonly string[]): void {
  for (const column of columns) {
    if (!table.columns.includes(column)) {
      throw new TableValidationError(`Column '${column}' not found in the table`, {
        column,
        columns: table.columns,
      });
    }
  }
}

/**
 * @throws TableValidationError when the column holds a missing value
 */
export function requireNoMissing(table: Table, column: string): void {
  const missing = table.rows.flatMap((row, i) => (isMissing(row[column]) ? [i] : []));
  if (missing.length > 0) {
    throw new TableValidationError(
      `Column '${column}' contains missing values at rows: ${missing.join(', ')}`,
      { column, rows: missing }
    );
  }
}

/**
 * Read a string cell, failing on anything else
 */
export function stringCell(row: Row, column: string, rowIndex: number): string {
  const cell = row[column];
  if (typeof cell !== 'string') {
    throw new TableValidationError(
      `Row ${rowIndex}, column '${column}' is not a string (found ${describeCell(cell)})`,
      { column, row: rowIndex }
    );
  }
  return cell;
}

export function numberCell(row: Row, column: string, rowIndex: number): number {
  const cell = row[column];
  if (typeof cell !== 'number' || !Number.isFinite(cell)) {
    throw new TableValidationError(
      `Row ${rowIndex}, column '${column}' is not a number (found ${describeCell(cell)})`,
      { column, row: rowIndex }
    );
  }
  return cell;
}

export function describeCell(cell: Cell | undefined): string {
  if (cell === undefined) return 'undefined';
  if (cell === null) return 'null';
  if (Array.isArray(cell)) return 'list';
  return typeof cell;
}
