/**
 * MCP Server Error Handling
 *
 * Every failure surfaced by a tool is an MCPError with a category and a
 * recovery hint. Per-batch and per-document failures are recorded in the
 * run summary instead and never reach this layer.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Document errors
  | 'SEGMENTATION_ERROR'
  | 'TEXT_EXTRACTION_FAILED'

  // Filter errors
  | 'FILTER_CONFIG_ERROR'

  // Model errors
  | 'MODEL_DISPATCH_ERROR'
  | 'MODEL_OUTPUT_INVALID'
  | 'MODEL_UNAVAILABLE'

  // Embedding errors
  | 'EMBEDDING_FAILED'

  // Transformation errors
  | 'TABLE_VALIDATION_FAILED'
  | 'PIPELINE_STEP_FAILED'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'
  | 'OUTPUT_WRITE_FAILED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories, so clients can tell
 * a bad regex from an unreachable model from a broken PDF.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  SegmentationError: 'SEGMENTATION_ERROR',
  TextExtractionError: 'TEXT_EXTRACTION_FAILED',
  FilterConfigError: 'FILTER_CONFIG_ERROR',
  BatchDispatchError: 'MODEL_DISPATCH_ERROR',
  CircuitBreakerOpenError: 'MODEL_UNAVAILABLE',
  EmbeddingError: 'EMBEDDING_FAILED',
  TableValidationError: 'TABLE_VALIDATION_FAILED',
  PipelineStepError: 'PIPELINE_STEP_FAILED',
  OutputWriteError: 'OUTPUT_WRITE_FAILED',
  ZodError: 'VALIDATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;

      // Keep diagnostic properties from the custom error classes
      const customDetails = readDetails(error);
      const customCode = readCode(error);
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(customCode && { errorCode: customCode }),
        ...(customDetails && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

function readDetails(error: Error): Record<string, unknown> | undefined {
  if (!('details' in error)) return undefined;
  const details = error.details;
  if (details !== null && typeof details === 'object' && !Array.isArray(details)) {
    return { ...details };
  }
  return undefined;
}

function readCode(error: Error): string | undefined {
  if (!('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'etl_config_get', hint: 'Check parameter types and required fields' },
  SEGMENTATION_ERROR: {
    tool: 'etl_segment_document',
    hint: 'The document text is empty; check that the PDF is text-searchable',
  },
  TEXT_EXTRACTION_FAILED: {
    tool: 'etl_run_pipeline',
    hint: 'Check that pdftotext (poppler-utils) is installed and the PDF is not a scan',
  },
  FILTER_CONFIG_ERROR: {
    tool: 'etl_filter_units',
    hint: 'Fix the regular expression syntax of the filter pattern',
  },
  MODEL_DISPATCH_ERROR: {
    tool: 'etl_config_get',
    hint: 'Check that Ollama is running at OLLAMA_BASE_URL and the model is pulled',
  },
  MODEL_OUTPUT_INVALID: {
    tool: 'etl_config_set',
    hint: 'Lower the batch size or temperature so the model output matches the schema',
  },
  MODEL_UNAVAILABLE: {
    tool: 'etl_config_get',
    hint: 'Circuit breaker is open after repeated Ollama failures; wait for recovery',
  },
  EMBEDDING_FAILED: {
    tool: 'etl_config_get',
    hint: 'Check that the embedding model (ETL_EMBEDDING_MODEL) is pulled in Ollama',
  },
  TABLE_VALIDATION_FAILED: {
    tool: 'etl_run_pipeline',
    hint: 'Extracted records violate a pipeline check; inspect the JSON artifacts',
  },
  PIPELINE_STEP_FAILED: {
    tool: 'etl_run_pipeline',
    hint: 'A transformation step did not return a table',
  },
  PATH_NOT_FOUND: { tool: 'etl_run_pipeline', hint: 'Verify the path exists on the filesystem' },
  PATH_NOT_DIRECTORY: { tool: 'etl_run_pipeline', hint: 'Provide a directory path, not a file path' },
  OUTPUT_WRITE_FAILED: {
    tool: 'etl_run_pipeline',
    hint: 'Choose an output directory the server can write to',
  },
  CONFIGURATION_ERROR: {
    tool: 'etl_config_get',
    hint: 'Check environment variable configuration (OLLAMA_BASE_URL, ETL_* variables)',
  },
  INTERNAL_ERROR: { tool: 'etl_config_get', hint: 'Inspect the server log on stderr' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, {
    path,
  });
}
