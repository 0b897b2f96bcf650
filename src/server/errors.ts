/**
 * MCP Server Error Handling
 *
 * Every thrown value leaving a tool handler becomes an MCPError with a
 * category and a recovery hint, so a calling agent can decide what to do
 * next without parsing messages.
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
  | 'PROTECTED_NAME'

  // Database errors
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_ALREADY_EXISTS'
  | 'STORAGE_ERROR'

  // Record errors
  | 'PERSON_NOT_FOUND'

  // Upstream errors
  | 'DOCUMENT_FETCH_ERROR'
  | 'INFERENCE_ERROR'
  | 'INFERENCE_UNAVAILABLE'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  DatabaseError: 'STORAGE_ERROR',
  MigrationError: 'STORAGE_ERROR',
  DocumentFetchError: 'DOCUMENT_FETCH_ERROR',
  InferenceError: 'INFERENCE_ERROR',
  CircuitBreakerOpenError: 'INFERENCE_UNAVAILABLE',
};

/** DatabaseError codes with a more specific category than STORAGE_ERROR */
const DATABASE_CODE_TO_CATEGORY: Record<string, ErrorCategory> = {
  DATABASE_NOT_FOUND: 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS: 'DATABASE_ALREADY_EXISTS',
  INVALID_NAME: 'VALIDATION_ERROR',
};

function readStringProperty(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

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
      const code = readStringProperty(error, 'code');
      const byCode =
        error.name === 'DatabaseError' && code ? DATABASE_CODE_TO_CATEGORY[code] : undefined;
      const category = byCode ?? ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;

      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Suggested next tool and a human-readable hint
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'radar_stats', hint: 'Check parameter types and required fields' },
  PROTECTED_NAME: {
    tool: 'radar_review_queue',
    hint: 'Names matching the victim-protection lexicon are never stored; review diversions with kind="victim_diversion"',
  },
  DATABASE_NOT_FOUND: {
    tool: 'radar_stats',
    hint: 'Check CASEFILE_STORAGE_PATH and CASEFILE_DATABASE',
  },
  DATABASE_ALREADY_EXISTS: { tool: 'radar_stats', hint: 'Choose a unique database name' },
  STORAGE_ERROR: {
    tool: 'radar_stats',
    hint: 'The write was rolled back; check the database file and retry the document',
  },
  PERSON_NOT_FOUND: {
    tool: 'radar_stats',
    hint: 'No stored person matches this name; check spelling or process more documents',
  },
  DOCUMENT_FETCH_ERROR: {
    tool: 'radar_process_document',
    hint: 'Verify the URL is reachable and serves a PDF or HTML document',
  },
  INFERENCE_ERROR: {
    tool: 'radar_process_document',
    hint: 'Check that Ollama is running (CASEFILE_OLLAMA_URL) and the configured models are pulled',
  },
  INFERENCE_UNAVAILABLE: {
    tool: 'radar_process_document',
    hint: 'The inference circuit breaker is open after repeated failures; wait for the recovery window and retry',
  },
  CONFIGURATION_ERROR: {
    tool: 'radar_stats',
    hint: 'Check CASEFILE_* environment variables',
  },
  INTERNAL_ERROR: { tool: 'radar_stats', hint: 'Check server stderr for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response: category, message, recovery hint and
 * optional details.
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

/**
 * Refusal for a query on a protected name. The name itself is not echoed.
 */
export function protectedNameError(): MCPError {
  return new MCPError(
    'PROTECTED_NAME',
    'Query refused: the name matches the victim-protection lexicon and is never stored.'
  );
}

export function personNotFoundError(): MCPError {
  return new MCPError('PERSON_NOT_FOUND', 'No stored person matches this name');
}

export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
