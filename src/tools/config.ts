/**
 * Configuration Management MCP Tools
 *
 * Tools: etl_config_get, etl_config_set
 *
 * Changes live in memory for the lifetime of the server; the environment
 * (.env) supplies the starting values.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, updateConfig, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';
import type { PipelineConfig } from '../services/llm/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

type ConfigKeyName = z.infer<typeof ConfigKey>;

/** Map config keys to their pipeline config property names */
const CONFIG_KEY_MAP: Record<ConfigKeyName, keyof PipelineConfig> = {
  ollama_base_url: 'baseUrl',
  money_model: 'moneyModel',
  entity_model: 'entityModel',
  embedding_model: 'embeddingModel',
  temperature: 'temperature',
  top_p: 'topP',
  seed: 'seed',
  max_output_tokens: 'maxOutputTokens',
  request_timeout_ms: 'requestTimeoutMs',
  money_batch_size: 'moneyBatchSize',
  entity_batch_size: 'entityBatchSize',
  reference_depth: 'referenceDepth',
  paragraph_mode: 'paragraphMode',
  concurrency: 'concurrency',
  max_batch_failures: 'maxBatchFailures',
  requests_per_minute: 'requestsPerMinute',
  dedup_threshold: 'dedupThreshold',
};

function configSnapshot(config: PipelineConfig): Record<string, unknown> {
  return Object.fromEntries(ConfigKey.options.map((key) => [key, config[CONFIG_KEY_MAP[key]]]));
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const config = getConfig();

    const configNextSteps = [
      { tool: 'etl_config_set', description: 'Change a configuration setting' },
      { tool: 'etl_run_pipeline', description: 'Run the ETL over a directory of call PDFs' },
    ];

    if (input.key) {
      const value = config[CONFIG_KEY_MAP[input.key]];
      return formatResponse(successResult({ key: input.key, value, next_steps: configNextSteps }));
    }

    return formatResponse(
      successResult({
        ...configSnapshot(config),

        // Informational only
        retry: config.retry,
        circuit_breaker: config.circuitBreaker,
        last_run: state.lastRun
          ? {
              documents: state.lastRun.documents.length,
              money_records: state.lastRun.totalMoneyRecords,
              entity_records: state.lastRun.totalEntityRecords,
              duplicates_removed: state.lastRun.duplicatesRemoved,
              duration_ms: state.lastRun.durationMs,
            }
          : null,

        next_steps: configNextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);

    const changes: Partial<Record<keyof PipelineConfig, unknown>> = {};
    changes[CONFIG_KEY_MAP[input.key]] = input.value;
    const config = updateConfig(changes);

    return formatResponse(
      successResult({
        key: input.key,
        value: config[CONFIG_KEY_MAP[input.key]],
        updated: true,
        next_steps: [
          { tool: 'etl_config_get', description: 'Verify the updated configuration' },
          { tool: 'etl_run_pipeline', description: 'Run the ETL with the new settings' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  etl_config_get: {
    description:
      '[STATUS] Use to view the ETL configuration (Ollama URL, models, batch sizes, dedup threshold, rate limits). Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  etl_config_set: {
    description:
      '[SETUP] Use to change an ETL configuration setting (models, batch sizes, reference depth, dedup threshold). Returns the updated value.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z
        .union([z.string(), z.number(), z.boolean(), z.null()])
        .describe('New value (null clears max_batch_failures)'),
    },
    handler: handleConfigSet,
  },
};
