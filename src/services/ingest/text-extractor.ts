/**
 * Text extractors - raw text per document
 *
 * PDFs go through poppler's pdftotext (must be on PATH); plain-text files
 * are read as they are. A PDF without a text layer yields no text and is
 * reported as an extraction error, never retried.
 *
 * @module services/ingest/text-extractor
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { readFile } from 'fs/promises';
import { extname } from 'path';

const execFileAsync = promisify(execFile);

const PDFTOTEXT_TIMEOUT_MS = 120_000;
const PDFTOTEXT_MAX_BUFFER = 64 * 1024 * 1024;

type TextExtractionErrorCode = 'TOOL_NOT_FOUND' | 'EXTRACTION_FAILED' | 'NO_TEXT' | 'UNSUPPORTED_FILE';

export class TextExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: TextExtractionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TextExtractionError';
  }
}

export interface TextExtractor {
  extract(path: string): Promise<string>;
}

function requireText(text: string, path: string): string {
  if (text.trim().length === 0) {
    throw new TextExtractionError(
      `No text found in ${path}; the file may be a scan without a text layer`,
      'NO_TEXT',
      { path }
    );
  }
  return text;
}

export class PdfTextExtractor implements TextExtractor {
  constructor(private readonly binary: string = 'pdftotext') {}

  async extract(path: string): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.binary, ['-enc', 'UTF-8', path, '-'], {
        timeout: PDFTOTEXT_TIMEOUT_MS,
        maxBuffer: PDFTOTEXT_MAX_BUFFER,
        encoding: 'utf8',
      }));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      if (msg.includes('ENOENT')) {
        throw new TextExtractionError(
          `${this.binary} is not installed or not in PATH. Install poppler-utils.`,
          'TOOL_NOT_FOUND',
          { binary: this.binary }
        );
      }
      throw new TextExtractionError(`pdftotext failed for ${path}: ${msg}`, 'EXTRACTION_FAILED', {
        path,
      });
    }
    return requireText(stdout, path);
  }
}

export class PlainTextExtractor implements TextExtractor {
  async extract(path: string): Promise<string> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      throw new TextExtractionError(
        `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'EXTRACTION_FAILED',
        { path }
      );
    }
    return requireText(text, path);
  }
}

/**
 * Pick the extractor by file extension
 */
export class FileTextExtractor implements TextExtractor {
  constructor(
    private readonly pdf: TextExtractor = new PdfTextExtractor(),
    private readonly plain: TextExtractor = new PlainTextExtractor()
  ) {}

  extract(path: string): Promise<string> {
    const ext = extname(path).toLowerCase();
    if (ext === '.pdf') return this.pdf.extract(path);
    if (ext === '.txt' || ext === '.text') return this.plain.extract(path);
    return Promise.reject(
      new TextExtractionError(`Unsupported file type '${ext}' for ${path}`, 'UNSUPPORTED_FILE', {
        path,
      })
    );
  }
}
