/**
 * Unit Tests for Config MCP Tools
 *
 * Tools: etl_config_get, etl_config_set
 *
 * Uses the real server state; resetState() restores the environment
 * configuration before each test.
 *
 * @module tests/unit/tools/config
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { handleConfigGet, handleConfigSet, configTools } from '../../../src/tools/config.js';
import { state, resetState, getConfig, recordRun } from '../../../src/server/state.js';
import { ConfigKey } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL EXPORTS VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('configTools exports', () => {
  it('exports the 2 config tools', () => {
    expect(Object.keys(configTools)).toEqual(['etl_config_get', 'etl_config_set']);
  });

  it('each tool has description, inputSchema, and handler', () => {
    for (const [name, tool] of Object.entries(configTools)) {
      expect(typeof tool.description, `${name} missing description`).toBe('string');
      expect(tool.inputSchema, `${name} missing inputSchema`).toBeDefined();
      expect(typeof tool.handler).toBe('function');
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// handleConfigGet TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('handleConfigGet', () => {
  beforeEach(() => {
    resetState();
  });

  it('returns every key when none is given', async () => {
    const result = parseResponse(await handleConfigGet({}));

    expect(result.success).toBe(true);
    for (const key of ConfigKey.options) {
      expect(result.data, `missing ${key}`).toHaveProperty(key);
    }
    expect(result.data?.money_batch_size).toBe(state.config.moneyBatchSize);
    expect(result.data?.ollama_base_url).toBe(state.config.baseUrl);
    expect(result.data?.retry).toEqual(state.config.retry);
    expect(result.data?.last_run).toBeNull();
  });

  it('returns a single key', async () => {
    const result = parseResponse(await handleConfigGet({ key: 'money_model' }));
    expect(result.data).toMatchObject({ key: 'money_model', value: state.config.moneyModel });
  });

  it('summarizes the last run', async () => {
    recordRun({
      documents: [],
      totalMoneyRecords: 4,
      totalEntityRecords: 2,
      duplicatesRemoved: 1,
      durationMs: 30,
    });
    const result = parseResponse(await handleConfigGet({}));
    expect(result.data?.last_run).toEqual({
      documents: 0,
      money_records: 4,
      entity_records: 2,
      duplicates_removed: 1,
      duration_ms: 30,
    });
  });

  it('rejects an unknown key', async () => {
    const response = await handleConfigGet({ key: 'gpu_layers' });
    expect(response.isError).toBe(true);
    expect(parseResponse(response).error?.category).toBe('VALIDATION_ERROR');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// handleConfigSet TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('handleConfigSet', () => {
  beforeEach(() => {
    resetState();
  });

  it('updates a numeric setting', async () => {
    const result = parseResponse(await handleConfigSet({ key: 'money_batch_size', value: 5 }));

    expect(result.data).toMatchObject({ key: 'money_batch_size', value: 5, updated: true });
    expect(getConfig().moneyBatchSize).toBe(5);
  });

  it('updates an enum setting', async () => {
    await handleConfigSet({ key: 'reference_depth', value: 'sentences' });
    expect(getConfig().referenceDepth).toBe('sentences');
  });

  it('clears the failure threshold with null', async () => {
    await handleConfigSet({ key: 'max_batch_failures', value: 2 });
    const result = parseResponse(await handleConfigSet({ key: 'max_batch_failures', value: null }));
    expect(result.data?.value).toBeNull();
    expect(getConfig().maxBatchFailures).toBeNull();
  });

  it('rejects a value of the wrong type and keeps the old one', async () => {
    const before = getConfig().moneyBatchSize;
    const response = await handleConfigSet({ key: 'money_batch_size', value: 'five' });

    expect(response.isError).toBe(true);
    expect(parseResponse(response).error?.category).toBe('VALIDATION_ERROR');
    expect(getConfig().moneyBatchSize).toBe(before);
  });

  it('rejects an out-of-range threshold', async () => {
    const response = await handleConfigSet({ key: 'dedup_threshold', value: 3 });
    expect(parseResponse(response).error?.category).toBe('VALIDATION_ERROR');
  });
});
