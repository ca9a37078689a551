/**
 * Default money and entity pipelines
 *
 * @module services/transform/presets
 */

import { Pipeline, type PipelineStep } from './pipeline.js';
import {
  checkColumnsSatisfyRegex,
  checkNumericColumns,
  checkStringColumns,
  verifyListColumnContainsOnlyInts,
  verifyNoEmptyStrings,
  verifyNoMissingData,
  verifyNoNegatives,
} from './validations.js';
import {
  dropRowsIfNoColumnMatchesRegex,
  dropRowsNotSatisfyingRegex,
  dropRowsWithNonPositiveValues,
  groupByDocumentAndStackTypes,
  reduceListIntsToUnique,
  removeSemanticDuplicates,
  type DedupStepOptions,
} from './transformations.js';

export const EURO_CURRENCY_PATTERN = String.raw`^(?:eur|euros|euro|€)$`;
export const FUNDING_CONTEXT_PATTERN = 'call|budget|grant|amif';

/**
 * Money pipeline. Semantic dedup runs last, on the rows the filters kept,
 * and is left out when no dedup options are given.
 */
export function createMoneyPipeline(dedup?: DedupStepOptions): Pipeline {
  const steps: PipelineStep[] = [
    verifyNoMissingData,
    verifyNoNegatives,
    verifyNoEmptyStrings,
    checkNumericColumns(['value']),
    checkStringColumns(['context', 'original_sentence', 'currency']),
    checkColumnsSatisfyRegex(['original_sentence'], String.raw`\d+`),
    dropRowsWithNonPositiveValues(['value']),
    dropRowsNotSatisfyingRegex(['currency'], EURO_CURRENCY_PATTERN),
    dropRowsIfNoColumnMatchesRegex(['original_sentence', 'context'], FUNDING_CONTEXT_PATTERN),
  ];
  if (dedup) {
    steps.push(removeSemanticDuplicates(dedup));
  }
  return new Pipeline(steps);
}

export function createEntityPipeline(): Pipeline {
  return new Pipeline([
    verifyNoMissingData,
    verifyNoNegatives,
    verifyNoEmptyStrings,
    checkStringColumns(['organization_type']),
    verifyListColumnContainsOnlyInts(['min_entities']),
    reduceListIntsToUnique('min_entities'),
    groupByDocumentAndStackTypes({ targetColumn: 'organization_type' }),
  ]);
}
