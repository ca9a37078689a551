/**
 * Unit tests for MCP Server Error Handling
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  MCPError,
  formatErrorResponse,
  getRecoveryHint,
  validationError,
  configurationError,
  pathNotFoundError,
  pathNotDirectoryError,
} from '../../../src/server/errors.js';
import { BatchDispatchError, FilterConfigError, SegmentationError } from '../../../src/services/extraction/errors.js';
import { EmbeddingError } from '../../../src/services/embedding/ollama.js';
import { TableValidationError } from '../../../src/services/transform/table.js';
import { OutputWriteError } from '../../../src/services/output/writers.js';
import { ValidationError } from '../../../src/utils/validation.js';

describe('MCPError', () => {
  it('carries category, message and details', () => {
    const error = new MCPError('VALIDATION_ERROR', 'Invalid input', { field: 'text' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MCPError');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid input');
    expect(error.details).toEqual({ field: 'text' });
  });

  it('serializes to JSON', () => {
    const json = new MCPError('INTERNAL_ERROR', 'boom').toJSON();
    expect(json).toMatchObject({ name: 'MCPError', category: 'INTERNAL_ERROR', message: 'boom' });
  });

  describe('fromUnknown', () => {
    it('returns an MCPError unchanged', () => {
      const original = pathNotFoundError('/calls');
      expect(MCPError.fromUnknown(original)).toBe(original);
    });

    it('maps the pipeline error classes to categories', () => {
      const cases: Array<[Error, string]> = [
        [new ValidationError('bad'), 'VALIDATION_ERROR'],
        [new SegmentationError('empty'), 'SEGMENTATION_ERROR'],
        [new FilterConfigError('bad regex'), 'FILTER_CONFIG_ERROR'],
        [new BatchDispatchError('down', 'MODEL_NETWORK_ERROR'), 'MODEL_DISPATCH_ERROR'],
        [new EmbeddingError('no model', 'EMBEDDING_FAILED'), 'EMBEDDING_FAILED'],
        [new TableValidationError('negative'), 'TABLE_VALIDATION_FAILED'],
        [new OutputWriteError('read-only'), 'OUTPUT_WRITE_FAILED'],
        [new Error('plain'), 'INTERNAL_ERROR'],
      ];
      for (const [error, category] of cases) {
        expect(MCPError.fromUnknown(error).category).toBe(category);
      }
    });

    it('maps a ZodError to VALIDATION_ERROR', () => {
      const result = z.number().safeParse('x');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(MCPError.fromUnknown(result.error).category).toBe('VALIDATION_ERROR');
      }
    });

    it('keeps the code and details of custom errors', () => {
      const error = MCPError.fromUnknown(new FilterConfigError('Invalid regex', { pattern: '(' }));
      expect(error.message).toBe('Invalid regex');
      expect(error.details).toMatchObject({
        originalName: 'FilterConfigError',
        errorCode: 'INVALID_PATTERN',
        errorDetails: { pattern: '(' },
      });
    });

    it('wraps non-Error values', () => {
      const error = MCPError.fromUnknown('just a string', 'CONFIGURATION_ERROR');
      expect(error.category).toBe('CONFIGURATION_ERROR');
      expect(error.message).toBe('just a string');
      expect(error.details).toEqual({ originalValue: 'just a string' });
    });
  });
});

describe('formatErrorResponse', () => {
  it('adds the recovery hint of the category', () => {
    const response = formatErrorResponse(pathNotDirectoryError('/calls/a.pdf'));
    expect(response).toEqual({
      success: false,
      error: {
        category: 'PATH_NOT_DIRECTORY',
        message: 'Path is not a directory: /calls/a.pdf',
        recovery: { tool: 'etl_run_pipeline', hint: 'Provide a directory path, not a file path' },
        details: { path: '/calls/a.pdf' },
      },
    });
  });
});

describe('getRecoveryHint', () => {
  it('points filter errors at the filter preview tool', () => {
    expect(getRecoveryHint('FILTER_CONFIG_ERROR').tool).toBe('etl_filter_units');
    expect(getRecoveryHint('MODEL_UNAVAILABLE').tool).toBe('etl_config_get');
  });
});

describe('error factories', () => {
  it('build errors of the right category', () => {
    expect(validationError('x').category).toBe('VALIDATION_ERROR');
    expect(configurationError('x', { key: 'seed' })).toMatchObject({
      category: 'CONFIGURATION_ERROR',
      details: { key: 'seed' },
    });
    expect(pathNotFoundError('/missing')).toMatchObject({
      category: 'PATH_NOT_FOUND',
      message: 'Path does not exist: /missing',
    });
  });
});
