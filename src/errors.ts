/**
 * Hustleflow Errors
 *
 * Every error the engine raises derives from HustleError and carries a
 * stable code plus a retry hint. Errors leave the engine with their
 * original class and message; nothing is re-wrapped on the way out.
 */

// ============================================================================
// Base
// ============================================================================

export class HustleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HustleError";
  }
}

// ============================================================================
// Taxonomy
// ============================================================================

/** A single contract violation, addressed by JSON pointer */
export interface ContractIssue {
  path: string;
  message: string;
}

/**
 * Input contract violated. Never retried.
 */
export class ValidationError extends HustleError {
  constructor(
    message: string,
    public readonly issues: ContractIssue[] = [],
    context?: Record<string, unknown>,
  ) {
    super(message, "VALIDATION_ERROR", false, { issues, ...context });
    this.name = "ValidationError";
  }
}

/**
 * Failure inside a task's execute step. Retried by the task's policy.
 */
export class ExecutionError extends HustleError {
  constructor(
    message: string,
    public readonly taskName?: string,
    public readonly attempts?: number,
    context?: Record<string, unknown>,
    retryable = true,
    code = "EXECUTION_ERROR",
  ) {
    super(message, code, retryable, {
      taskName,
      attempts,
      ...context,
    });
    this.name = "ExecutionError";
  }
}

/**
 * Graph construction problem: bad successor, missing entry task,
 * undeclared route.
 */
export class RoutingError extends HustleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ROUTING_ERROR", false, context);
    this.name = "RoutingError";
  }
}

/**
 * Malformed policy or provider configuration
 */
export class ConfigurationError extends HustleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", false, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Error from a chat-completion provider (HTTP failure, unreachable host).
 * Client errors other than 408 and 429 are not worth retrying.
 */
export class ProviderError extends ExecutionError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    context?: Record<string, unknown>,
  ) {
    super(
      message,
      undefined,
      undefined,
      { provider, status, ...context },
      status === undefined ||
        status >= 500 ||
        status === 408 ||
        status === 429,
      "PROVIDER_ERROR",
    );
    this.name = "ProviderError";
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Whether the retry policy should try again after this error.
 * Errors from outside the engine are treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HustleError) {
    return error.retryable;
  }
  return true;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
