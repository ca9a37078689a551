/**
 * Unit tests for MCP Server Type helpers
 *
 * @module tests/unit/server/types
 */

import { describe, it, expect } from 'vitest';
import { successResult } from '../../../src/server/types.js';

describe('successResult', () => {
  it('wraps data in a success envelope', () => {
    expect(successResult({ money_rows: 3 })).toEqual({ success: true, data: { money_rows: 3 } });
  });

  it('keeps falsy data as it is', () => {
    expect(successResult(null)).toEqual({ success: true, data: null });
    expect(successResult([])).toEqual({ success: true, data: [] });
  });
});
