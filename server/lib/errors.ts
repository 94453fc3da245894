// =============================================================
// Error taxonomy shared by services and routes. Route handlers
// never build status codes themselves; the server error handler
// reads them from here.
// =============================================================

export const GENERIC_RETRY_MESSAGE = 'Something went wrong while saving. Please try again.';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }

  toResponse(): Record<string, unknown> {
    return { success: false, error: this.message, code: this.code };
  }
}

export class ValidationError extends AppError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.field = field;
  }

  override toResponse(): Record<string, unknown> {
    return { ...super.toResponse(), ...(this.field ? { field: this.field } : {}) };
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super(id ? `${entity} not found: ${id}` : `${entity} not found`, 404, 'NOT_FOUND');
  }
}

export class PolicyViolationError extends AppError {
  readonly rule: string;
  readonly deadline?: string;

  constructor(rule: string, message: string, deadline?: Date) {
    super(message, 409, 'POLICY_VIOLATION');
    this.rule = rule;
    this.deadline = deadline?.toISOString();
  }

  override toResponse(): Record<string, unknown> {
    return {
      ...super.toResponse(),
      rule: this.rule,
      ...(this.deadline ? { deadline: this.deadline } : {}),
    };
  }
}

export class ConcurrencyContentionError extends AppError {
  constructor(cause?: unknown) {
    super(GENERIC_RETRY_MESSAGE, 503, 'CONCURRENCY_CONTENTION');
    if (cause !== undefined) this.cause = cause;
  }
}
