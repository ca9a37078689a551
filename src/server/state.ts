/**
 * MCP Server State Management
 *
 * Holds the pipeline configuration, the lazily built Ollama dependencies and
 * the last run summary for the lifetime of the server process.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/state
 */

import { PipelineConfigSchema, loadPipelineConfig, type PipelineConfig } from '../services/llm/config.js';
import { createRunDependencies } from '../services/pipeline/dependencies.js';
import type { DirectoryRunDependencies } from '../services/pipeline/orchestrator.js';
import type { RunSummary } from '../models/extraction.js';
import type { ServerState } from './types.js';

export const state: ServerState = {
  config: loadPipelineConfig(),
  dependencies: null,
  lastRun: null,
};

/**
 * Get current configuration (copy)
 */
export function getConfig(): PipelineConfig {
  return structuredClone(state.config);
}

/**
 * Apply configuration changes. The merged config is validated as a whole
 * and nothing changes when it is rejected.
 *
 * @throws ZodError when a value is out of range
 */
export function updateConfig(changes: Partial<Record<keyof PipelineConfig, unknown>>): PipelineConfig {
  const next = PipelineConfigSchema.parse({ ...state.config, ...changes });
  state.config = next;
  // Clients hold the old model names and limits
  state.dependencies = null;
  console.error(`[State] Configuration updated: ${Object.keys(changes).join(', ')}`);
  return getConfig();
}

/**
 * Run dependencies for the current configuration
 */
export function getRunDependencies(): DirectoryRunDependencies {
  if (!state.dependencies) {
    state.dependencies = createRunDependencies(state.config);
  }
  return state.dependencies;
}

export function recordRun(summary: RunSummary): void {
  state.lastRun = summary;
}

/**
 * Reset state to the environment configuration (for testing)
 */
export function resetState(): void {
  state.config = loadPipelineConfig();
  state.dependencies = null;
  state.lastRun = null;
}
