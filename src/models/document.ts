/**
 * Document interfaces for the call-for-proposal ETL
 *
 * A document is segmented once into paragraphs; sentences are derived
 * per paragraph on first access.
 *
 * @module models/document
 */

/**
 * How raw text is cut into paragraphs.
 * - empty_line: runs of text separated by one or more blank lines
 * - newlines: every non-empty line is its own paragraph
 */
export type ParagraphSegmentationMode = 'empty_line' | 'newlines';

/**
 * Granularity scanned by the filter and sent to the model
 */
export type ReferenceDepth = 'paragraphs' | 'sentences';

export const REFERENCE_DEPTHS = ['paragraphs', 'sentences'] as const;

export const PARAGRAPH_SEGMENTATION_MODES = ['empty_line', 'newlines'] as const;

/**
 * A paragraph owned by its document
 */
export interface Paragraph {
  /** Zero-based position in the owning document */
  index: number;

  /** Trimmed, non-empty paragraph text */
  text: string;
}

/**
 * A sentence inside a paragraph.
 * paragraphIndex points into the owning document's paragraph list.
 */
export interface Sentence {
  /** Zero-based position inside the paragraph */
  index: number;

  paragraphIndex: number;

  text: string;
}

/**
 * A paragraph or sentence selected for extraction
 */
export interface TextUnit {
  text: string;
  paragraphIndex: number;
  /** Set only when the unit is a sentence */
  sentenceIndex?: number;
}

/**
 * Read-only view of a segmented document
 */
export interface Document {
  id: string;
  rawText: string | null;
  paragraphs: readonly Paragraph[];
}
