/**
 * Text Normalizer
 *
 * Cleans pdftotext output before segmentation and sentence text before
 * embedding. Stored paragraph and sentence text keeps its original wording;
 * only line endings are unified.
 *
 * @module services/segmentation/text-normalizer
 */

/**
 * Leading line number pattern from PDF text output.
 *
 * Matches lines starting with one or more digits followed by 2+ spaces.
 * The 2+ space requirement avoids false positives with:
 * - Ordered lists: "1. Item" (dot after number)
 * - Section numbers: "1.2 Title" (dot separator)
 * - Amounts: "500 000 EUR" (single space)
 */
const LINE_NUMBER_REGEX = /^\d+ {2,}/gm;

const WHITESPACE_RUN_REGEX = /\s+/g;

/**
 * Unify line endings. pdftotext separates pages with a form feed,
 * which is treated as a paragraph break.
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/\f/g, '\n\n');
}

/**
 * Replace every line break with a space. Offsets are unchanged, so spans
 * found in the flattened text map one to one onto the original.
 */
export function flattenLineBreaks(text: string): string {
  return text.replace(/\n/g, ' ');
}

/**
 * Normalize text for embedding: strip leading line numbers and collapse
 * whitespace so wrapping differences do not move the vector.
 */
export function normalizeForEmbedding(text: string): string {
  if (text.length === 0) {
    return text;
  }
  return text.replace(LINE_NUMBER_REGEX, '').replace(WHITESPACE_RUN_REGEX, ' ').trim();
}
