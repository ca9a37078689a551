/**
 * Unit Filter - select paragraphs or sentences relevant to an extraction target
 *
 * A unit is kept when the pattern matches anywhere in its text, compared
 * case-insensitively with '.' matching line breaks. Order is preserved and
 * nothing is deduplicated here.
 *
 * @module services/filtering/filter
 */

import { FilterConfigError } from '../extraction/errors.js';
import type { SegmentedDocument } from '../segmentation/segmenter.js';
import type { ReferenceDepth, TextUnit } from '../../models/document.js';

/**
 * Built-in pattern families. Patterns are plain strings so callers and the
 * config layer can swap them.
 */
export const BUILTIN_PATTERNS = {
  /** A digit and a euro currency token in the same unit */
  money: String.raw`^(?=.*\d)(?=.*(?:\beur\b|\beuro\b|\beuros\b|€)).*$`,
  /** The consortium composition table of a call document */
  entity: String.raw`(?=.*consortium composition)(?=.*entities)(?=.*coordinators)(?=.*beneficiaries).*`,
} as const;

export type BuiltinPatternName = keyof typeof BUILTIN_PATTERNS;

/**
 * Compile a pattern with the filter flags.
 *
 * @throws FilterConfigError on empty or syntactically invalid patterns
 */
export function compilePattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    // The caller's flags stay, except 'g' and 'y' whose lastIndex would leak between units
    const kept = pattern.flags.replace(/[gyis]/g, '');
    return compileSource(pattern.source, `is${kept}`);
  }
  return compileSource(pattern, 'is');
}

function compileSource(pattern: string, flags: string): RegExp {
  if (pattern.trim().length === 0) {
    throw new FilterConfigError('Filter pattern must not be empty', { pattern });
  }
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new FilterConfigError(
      `Invalid regular expression syntax: ${error instanceof Error ? error.message : String(error)}`,
      { pattern }
    );
  }
}

/**
 * Keep the units whose text matches the pattern, in source order.
 */
export function filterUnits<U extends { text: string }>(
  units: readonly U[],
  pattern: string | RegExp
): U[] {
  const regex = compilePattern(pattern);
  return units.filter((unit) => regex.test(unit.text));
}

/**
 * Turn a document into text units at the requested depth
 */
export function toUnits(document: SegmentedDocument, depth: ReferenceDepth): TextUnit[] {
  if (depth === 'paragraphs') {
    return document.paragraphs.map((p) => ({ text: p.text, paragraphIndex: p.index }));
  }
  return document.allSentences().map((s) => ({
    text: s.text,
    paragraphIndex: s.paragraphIndex,
    sentenceIndex: s.index,
  }));
}

/**
 * Select the units of a document that match a pattern at the given depth.
 */
export function selectUnits(
  document: SegmentedDocument,
  pattern: string | RegExp,
  depth: ReferenceDepth
): TextUnit[] {
  // Compile first so an invalid pattern fails before any sentence work
  const regex = compilePattern(pattern);
  return toUnits(document, depth).filter((unit) => regex.test(unit.text));
}
