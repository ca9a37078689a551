/**
 * Unit tests for tool registration
 *
 * @module tests/unit/server/register-tools
 */

import { describe, it, expect, vi } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools, getToolCount } from '../../../src/server/register-tools.js';

describe('registerAllTools', () => {
  it('registers every tool once on the server', () => {
    const server = new McpServer({ name: 'grant-call-etl-test', version: '0.0.0' });
    const spy = vi.spyOn(server, 'tool');

    expect(registerAllTools(server)).toBe(6);
    expect(spy.mock.calls.map((call) => call[0])).toEqual([
      'etl_segment_document',
      'etl_filter_units',
      'etl_extract_document',
      'etl_run_pipeline',
      'etl_config_get',
      'etl_config_set',
    ]);
  });

  it('counts tools without a server', () => {
    expect(getToolCount()).toBe(6);
  });
});
