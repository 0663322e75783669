/**
 * MCP Server Error Handling
 *
 * FAIL FAST: Every failure is an MCPError with a category, message and details.
 * Structural limit outcomes (capacity, depth, evidence) use their own
 * categories so the expansion loop can record them as skipped candidates.
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
  | 'EMPTY_QUERY'

  // Graph errors
  | 'NOT_FOUND'
  | 'CAPACITY_EXCEEDED'
  | 'DEPTH_EXCEEDED'
  | 'INSUFFICIENT_EVIDENCE'

  // Collaborator errors
  | 'FETCH_FAILED'
  | 'UMLS_API_ERROR'
  | 'PUBMED_API_ERROR'

  // Session errors
  | 'CONFIGURATION_ERROR'
  | 'EXPANSION_IN_PROGRESS'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Limit outcomes that expansion treats as expected, recoverable skips
 */
export const SKIPPABLE_CATEGORIES: ReadonlySet<ErrorCategory> = new Set<ErrorCategory>([
  'NOT_FOUND',
  'CAPACITY_EXCEEDED',
  'DEPTH_EXCEEDED',
  'INSUFFICIENT_EVIDENCE',
]);

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all tool and core failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category: ErrorCategory =
        error.name === 'ValidationError' ? 'VALIDATION_ERROR' : defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
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

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
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

export function nodeNotFoundError(nodeId: string): MCPError {
  return new MCPError('NOT_FOUND', `Node "${nodeId}" not found`, { nodeId });
}

export function conceptNotFoundError(conceptId: string): MCPError {
  return new MCPError('NOT_FOUND', `Concept "${conceptId}" not found`, { conceptId });
}

export function capacityExceededError(maxNodes: number, label?: string): MCPError {
  return new MCPError(
    'CAPACITY_EXCEEDED',
    `Graph is at its node limit (${maxNodes})${label ? `; cannot add "${label}"` : ''}`,
    { maxNodes, label }
  );
}

export function depthExceededError(
  nodeId: string,
  depth: number | null,
  maxDepth: number
): MCPError {
  return new MCPError(
    'DEPTH_EXCEEDED',
    depth === null
      ? `Node "${nodeId}" would not be within ${maxDepth} hops of any seed`
      : `Node "${nodeId}" would sit at depth ${depth}, beyond the limit of ${maxDepth}`,
    { nodeId, depth, maxDepth }
  );
}

export function insufficientEvidenceError(
  distinctSources: number,
  required: number,
  details?: Record<string, unknown>
): MCPError {
  return new MCPError(
    'INSUFFICIENT_EVIDENCE',
    `Edge has ${distinctSources} distinct evidence source(s); at least ${required} required`,
    { distinctSources, required, ...details }
  );
}

export function emptyQueryError(text: string): MCPError {
  return new MCPError('EMPTY_QUERY', 'Query text is empty after normalization', { text });
}

export function expansionInProgressError(): MCPError {
  return new MCPError(
    'EXPANSION_IN_PROGRESS',
    'An expansion is already running for this session. Wait for it to finish.'
  );
}
