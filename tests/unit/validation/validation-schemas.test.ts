/**
 * Unit tests for tool input schemas and path sanitization
 *
 * @module tests/unit/validation/validation-schemas
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import {
  ConfigSetInput,
  ExtractDocumentInput,
  FilterUnitsInput,
  RunPipelineInput,
  ValidationError,
  sanitizePath,
  validateInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('applies defaults', () => {
    expect(validateInput(FilterUnitsInput, { text: 'EUR 5' })).toEqual({
      text: 'EUR 5',
      target: 'money',
    });
    expect(validateInput(ExtractDocumentInput, { text: 'EUR 5' })).toEqual({
      text: 'EUR 5',
      document_id: 'document',
      deduplicate: true,
    });
  });

  it('lists every failing field', () => {
    expect(() => validateInput(RunPipelineInput, { input_dir: '', deduplicate: 'yes' })).toThrow(
      ValidationError
    );
    expect(() => validateInput(RunPipelineInput, { input_dir: '' })).toThrow(
      'input_dir: Input directory is required; output_dir: Required'
    );
  });

  it('rejects unknown enum values', () => {
    expect(() => validateInput(FilterUnitsInput, { text: 'x', reference_depth: 'words' })).toThrow(
      ValidationError
    );
    expect(() => validateInput(ConfigSetInput, { key: 'gpu_layers', value: 1 })).toThrow(
      ValidationError
    );
  });

  it('accepts null as a config value', () => {
    expect(validateInput(ConfigSetInput, { key: 'max_batch_failures', value: null })).toEqual({
      key: 'max_batch_failures',
      value: null,
    });
  });
});

describe('sanitizePath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('resolves paths inside an allowed directory', () => {
    expect(sanitizePath('/data/calls/../calls/2024', ['/data'])).toBe('/data/calls/2024');
    expect(sanitizePath('/data', ['/data'])).toBe('/data');
  });

  it('rejects paths outside the allowed directories', () => {
    expect(() => sanitizePath('/etc/passwd', ['/data'])).toThrow(ValidationError);
    expect(() => sanitizePath('/database', ['/data'])).toThrow(ValidationError);
  });

  it('rejects null bytes', () => {
    expect(() => sanitizePath('/data/a\0b', ['/data'])).toThrow('Path contains null bytes');
  });

  it('allows the temp directory and GRANT_ETL_ALLOWED_DIRS by default', () => {
    const inTmp = join(tmpdir(), 'calls');
    expect(sanitizePath(inTmp)).toBe(resolve(inTmp));

    vi.stubEnv('GRANT_ETL_ALLOWED_DIRS', ' /srv/etl-test-calls , ');
    expect(sanitizePath('/srv/etl-test-calls/2024')).toBe('/srv/etl-test-calls/2024');
  });
});
