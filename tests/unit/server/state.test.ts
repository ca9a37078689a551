/**
 * Unit tests for MCP Server State Management
 *
 * @module tests/unit/server/state
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  state,
  getConfig,
  updateConfig,
  getRunDependencies,
  recordRun,
  resetState,
} from '../../../src/server/state.js';
import { BatchExtractor } from '../../../src/services/extraction/batch-extractor.js';
import { OllamaEmbeddingProvider } from '../../../src/services/embedding/ollama.js';
import type { RunSummary } from '../../../src/models/extraction.js';

const summary: RunSummary = {
  documents: [],
  totalMoneyRecords: 2,
  totalEntityRecords: 1,
  duplicatesRemoved: 1,
  durationMs: 12,
};

describe('server state', () => {
  beforeEach(() => {
    resetState();
  });

  it('hands out copies of the configuration', () => {
    const config = getConfig();
    config.moneyBatchSize = 99;
    config.retry.maxAttempts = 99;
    expect(state.config.moneyBatchSize).not.toBe(99);
    expect(state.config.retry.maxAttempts).not.toBe(99);
  });

  it('applies valid changes and drops the built dependencies', () => {
    const before = getRunDependencies();
    const config = updateConfig({ moneyBatchSize: 7, referenceDepth: 'sentences' });

    expect(config.moneyBatchSize).toBe(7);
    expect(config.referenceDepth).toBe('sentences');
    expect(state.dependencies).toBeNull();
    expect(getRunDependencies()).not.toBe(before);
  });

  it('rejects an invalid change and keeps the old configuration', () => {
    const before = getConfig();
    expect(() => updateConfig({ moneyBatchSize: 0 })).toThrow();
    expect(() => updateConfig({ referenceDepth: 'words' })).toThrow();
    expect(getConfig()).toEqual(before);
  });

  it('builds the run dependencies once', () => {
    const deps = getRunDependencies();
    expect(deps.moneyExtractor).toBeInstanceOf(BatchExtractor);
    expect(deps.entityExtractor).toBeInstanceOf(BatchExtractor);
    expect(deps.embedder).toBeInstanceOf(OllamaEmbeddingProvider);
    expect(getRunDependencies()).toBe(deps);
  });

  it('records the last run until reset', () => {
    recordRun(summary);
    expect(state.lastRun).toBe(summary);
    resetState();
    expect(state.lastRun).toBeNull();
  });
});
