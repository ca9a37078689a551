/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results and server state.
 *
 * @module server/types
 */

import type { PipelineConfig } from '../services/llm/config.js';
import type { DirectoryRunDependencies } from '../services/pipeline/orchestrator.js';
import type { RunSummary } from '../models/extraction.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Pipeline configuration, environment first, then etl_config_set changes */
  config: PipelineConfig;

  /** Ollama-backed dependencies, built on first use and dropped on config change */
  dependencies: DirectoryRunDependencies | null;

  /** Summary of the most recent extraction run */
  lastRun: RunSummary | null;
}
