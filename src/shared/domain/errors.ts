/**
 * Base class for domain errors.
 * Domain errors are classified failures: callers branch on `code`,
 * never on the message.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ INPUT ERRORS ============

export class InvalidEventError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(public readonly violations: string[]) {
    super(`Invalid notification event: ${violations.join('; ')}`);
  }
}

export class UnknownEventTypeError extends DomainError {
  readonly code = 'UNKNOWN_EVENT_TYPE';

  constructor(
    public readonly eventType: string,
    public readonly jobId: string | null = null,
  ) {
    super(`Unknown event type "${eventType}"`);
  }
}

// ============ TEMPLATE ERRORS ============

export class TemplateNotFoundError extends DomainError {
  readonly code = 'TEMPLATE_NOT_FOUND';

  constructor(
    public readonly eventType: string,
    public readonly locale: string,
  ) {
    super(`No template for event type "${eventType}" (locale: ${locale})`);
  }
}

export class MissingVariableError extends DomainError {
  readonly code = 'MISSING_VARIABLE';

  constructor(
    public readonly templateId: string,
    public readonly missing: string[],
  ) {
    super(
      `Template ${templateId} is missing variables: ${missing.join(', ')}`,
    );
  }
}

// ============ JOB ERRORS ============

export class InvalidStateTransitionError extends DomainError {
  readonly code = 'INVALID_STATE_TRANSITION';

  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Notification job cannot move from ${from} to ${to}`);
  }
}

// ============ INFRASTRUCTURE ERRORS ============

export class StoreUnavailableError extends DomainError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(
    public readonly operation: string,
    public readonly reason?: unknown,
  ) {
    super(
      `Store unavailable during ${operation}: ${reason instanceof Error ? reason.message : 'unknown cause'}`,
    );
  }
}
