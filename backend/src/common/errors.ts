/**
 * Application Errors
 *
 * AppError subclasses are rendered by the global Fastify error handler as
 * { ok: false, error: code, message }. Domain errors below never reach
 * HTTP: the core catches them and fails closed.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * A persisted rule that cannot be turned into a condition tree.
 */
export class RuleDefinitionError extends AppError {
  constructor(message: string, public readonly ruleId?: string) {
    super(ruleId ? `Rule ${ruleId}: ${message}` : message, 400, 'INVALID_RULE');
    this.name = 'RuleDefinitionError';
  }
}

/**
 * Leaf resolution or comparison failure. Always resolved to `false`.
 */
export class ConditionEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConditionEvaluationError';
  }
}

export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
