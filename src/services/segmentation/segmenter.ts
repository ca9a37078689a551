/**
 * Segmenter - raw document text to paragraphs and sentences
 *
 * Paragraphs are cut on blank lines (or on every line in 'newlines' mode).
 * Sentences are found per paragraph with the ICU sentence-break model
 * exposed by Intl.Segmenter, so a boundary never spans a paragraph break.
 * Sentence lists are computed on first access and cached on the document.
 *
 * @module services/segmentation/segmenter
 */

import { v4 as uuidv4 } from 'uuid';
import { SegmentationError } from '../extraction/errors.js';
import { normalizeLineEndings, flattenLineBreaks } from './text-normalizer.js';
import type {
  Document,
  Paragraph,
  ParagraphSegmentationMode,
  Sentence,
} from '../../models/document.js';

/** One or more fully blank lines */
const BLANK_LINE_SEPARATOR = /\n[ \t]*\n\s*/;

const SENTENCE_LOCALE = 'en';

let _sentenceSegmenter: Intl.Segmenter | null = null;

function getSentenceSegmenter(): Intl.Segmenter {
  if (!_sentenceSegmenter) {
    _sentenceSegmenter = new Intl.Segmenter(SENTENCE_LOCALE, { granularity: 'sentence' });
  }
  return _sentenceSegmenter;
}

/**
 * Split raw text into trimmed, non-empty paragraph strings.
 */
export function splitParagraphs(
  rawText: string,
  mode: ParagraphSegmentationMode = 'empty_line'
): string[] {
  const text = normalizeLineEndings(rawText);
  const pieces = mode === 'newlines' ? text.split('\n') : text.split(BLANK_LINE_SEPARATOR);
  return pieces.map((p) => p.trim()).filter((p) => p.length > 0);
}

/**
 * Split one paragraph into sentence strings.
 *
 * Line breaks inside the paragraph are PDF wrapping, not sentence ends, so
 * the text is flattened before the boundary model runs. A paragraph with
 * no detectable boundary comes back unchanged as its only sentence.
 */
export function splitSentences(paragraphText: string): string[] {
  const sentences: string[] = [];
  for (const { segment } of getSentenceSegmenter().segment(flattenLineBreaks(paragraphText))) {
    const trimmed = segment.trim();
    if (trimmed.length > 0) {
      sentences.push(trimmed);
    }
  }
  if (sentences.length <= 1) {
    const whole = paragraphText.trim();
    return whole.length > 0 ? [whole] : [];
  }
  return sentences;
}

/**
 * A segmented document. Paragraphs are fixed at construction (or by
 * resegment); sentences are derived per paragraph on demand.
 */
export class SegmentedDocument implements Document {
  readonly id: string;
  readonly rawText: string | null;
  private _mode: ParagraphSegmentationMode;
  private _paragraphs: Paragraph[];
  private readonly sentenceCache = new Map<number, Sentence[]>();

  constructor(
    id: string,
    rawText: string | null,
    paragraphs: string[],
    mode: ParagraphSegmentationMode
  ) {
    this.id = id;
    this.rawText = rawText;
    this._mode = mode;
    this._paragraphs = paragraphs.map((text, index) => ({ index, text }));
  }

  get paragraphs(): readonly Paragraph[] {
    return this._paragraphs;
  }

  get mode(): ParagraphSegmentationMode {
    return this._mode;
  }

  /**
   * Sentences of one paragraph. Repeated calls return equal lists.
   */
  sentences(paragraphIndex: number): readonly Sentence[] {
    const paragraph = this._paragraphs[paragraphIndex];
    if (!paragraph) {
      throw new RangeError(
        `Paragraph index ${paragraphIndex} out of range (document has ${this._paragraphs.length})`
      );
    }
    let cached = this.sentenceCache.get(paragraphIndex);
    if (!cached) {
      cached = splitSentences(paragraph.text).map((text, index) => ({
        index,
        paragraphIndex,
        text,
      }));
      this.sentenceCache.set(paragraphIndex, cached);
    }
    return cached;
  }

  /**
   * All sentences in document order
   */
  allSentences(): Sentence[] {
    const result: Sentence[] = [];
    for (const paragraph of this._paragraphs) {
      result.push(...this.sentences(paragraph.index));
    }
    return result;
  }

  /**
   * Re-derive paragraphs from the raw text with another mode.
   * Cached sentences belong to the old paragraphs and are dropped.
   */
  resegment(mode: ParagraphSegmentationMode): void {
    if (this.rawText === null) {
      throw new SegmentationError(`Document ${this.id} has no raw text to resegment`, {
        documentId: this.id,
      });
    }
    this._paragraphs = splitParagraphs(this.rawText, mode).map((text, index) => ({
      index,
      text,
    }));
    this._mode = mode;
    this.sentenceCache.clear();
  }
}

export interface SegmentOptions {
  documentId?: string;
  mode?: ParagraphSegmentationMode;
}

/**
 * Segment raw text into a document.
 *
 * @throws SegmentationError when the text is empty or whitespace only
 */
export function segment(rawText: string, options: SegmentOptions = {}): SegmentedDocument {
  const documentId = options.documentId ?? uuidv4();
  const mode = options.mode ?? 'empty_line';

  if (rawText.trim().length === 0) {
    throw new SegmentationError(`Document ${documentId} has no text to segment`, {
      documentId,
      rawLength: rawText.length,
    });
  }

  return new SegmentedDocument(documentId, rawText, splitParagraphs(rawText, mode), mode);
}

/**
 * Build a document from already split paragraphs (no raw text kept)
 */
export function fromParagraphs(
  paragraphs: string[],
  documentId: string = uuidv4()
): SegmentedDocument {
  const cleaned = paragraphs.map((p) => p.trim()).filter((p) => p.length > 0);
  if (cleaned.length === 0) {
    throw new SegmentationError(`Document ${documentId} has no non-empty paragraphs`, {
      documentId,
    });
  }
  return new SegmentedDocument(documentId, null, cleaned, 'empty_line');
}
