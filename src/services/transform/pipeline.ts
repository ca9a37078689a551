/**
 * Transformation pipeline - an ordered list of table steps
 *
 * Each step takes a table and returns a table (or a promise of one). Steps
 * run one after another; the output of a step is checked before the next
 * one sees it.
 *
 * @module services/transform/pipeline
 */

import { isTable, PipelineStepError, TableValidationError, type Table } from './table.js';

export interface PipelineStep {
  name: string;
  run(table: Table): Table | Promise<Table>;
}

export function defineStep(name: string, run: (table: Table) => Table | Promise<Table>): PipelineStep {
  return { name, run };
}

export class Pipeline {
  private readonly steps: readonly PipelineStep[];

  /**
   * @throws PipelineStepError when no steps are given
   */
  constructor(steps: readonly PipelineStep[]) {
    if (steps.length === 0) {
      throw new PipelineStepError('A pipeline needs at least one step');
    }
    this.steps = [...steps];
  }

  get stepNames(): string[] {
    return this.steps.map((s) => s.name);
  }

  /**
   * @throws TableValidationError for an empty input table or a failed check
   * @throws PipelineStepError when a step does not return a table
   */
  async run(input: Table): Promise<Table> {
    if (input.rows.length === 0) {
      throw new TableValidationError('Pipeline input table has no rows');
    }

    let table = input;
    for (const [i, step] of this.steps.entries()) {
      const before = table.rows.length;
      const output: unknown = await step.run(table);
      if (!isTable(output)) {
        throw new PipelineStepError(`Step ${i} (${step.name}) did not return a table`, {
          step: step.name,
          index: i,
        });
      }
      table = output;
      console.error(`[Pipeline] ${step.name}: ${before} -> ${table.rows.length} rows`);
    }
    return table;
  }
}
