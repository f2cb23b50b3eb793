import type { Scope } from './models';

export type MemoryErrorKind =
  | 'ScopeSchemaMismatch'
  | 'PolicyViolation'
  | 'CapabilityUnavailable'
  | 'CapabilityFailure'
  | 'TransientStoreError'
  | 'TransientCapabilityError'
  | 'ValidationError'
  | 'StoreIntegrityError'
  | 'NotFound'
  | 'NotProvisioned'
  | 'Cancelled'
  | 'InternalError';

export type ErrorContext = {
  scope?: Scope | null;
  stepId?: string | null;
  runId?: string | null;
  pipeline?: string | null;
};

export class MemoryEngineError extends Error {
  readonly kind: MemoryErrorKind;
  readonly retryable: boolean;
  readonly context: ErrorContext;

  constructor(kind: MemoryErrorKind, message: string, options: { retryable?: boolean; context?: ErrorContext; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = kind;
    this.kind = kind;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
  }

  withContext(context: ErrorContext): this {
    Object.assign(this.context, context);
    return this;
  }
}

export class ScopeSchemaMismatchError extends MemoryEngineError {
  constructor(message: string, context?: ErrorContext) {
    super('ScopeSchemaMismatch', message, { context });
  }
}

export class PolicyViolationError extends MemoryEngineError {
  readonly policies: string[];

  constructor(message: string, policies: string[]) {
    super('PolicyViolation', message);
    this.policies = policies;
  }
}

export class CapabilityUnavailableError extends MemoryEngineError {
  constructor(message: string, context?: ErrorContext) {
    super('CapabilityUnavailable', message, { context });
  }
}

export class CapabilityFailureError extends MemoryEngineError {
  constructor(message: string, context?: ErrorContext) {
    super('CapabilityFailure', message, { context });
  }
}

export class TransientStoreError extends MemoryEngineError {
  constructor(message: string, cause?: unknown) {
    super('TransientStoreError', message, { retryable: true, cause });
  }
}

export class TransientCapabilityError extends MemoryEngineError {
  constructor(message: string, cause?: unknown) {
    super('TransientCapabilityError', message, { retryable: true, cause });
  }
}

export class ValidationError extends MemoryEngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('ValidationError', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class StoreIntegrityError extends MemoryEngineError {
  constructor(message: string) {
    super('StoreIntegrityError', message);
  }
}

export class NotFoundError extends MemoryEngineError {
  constructor(message: string) {
    super('NotFound', message);
  }
}

export class NotProvisionedError extends MemoryEngineError {
  constructor() {
    super('NotProvisioned', 'Tenancy schema has not been provisioned for this deployment');
  }
}

export class CancelledError extends MemoryEngineError {
  constructor(message = 'Run was cancelled') {
    super('Cancelled', message);
  }
}

/** Throws a CancelledError once the signal has fired. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export class StepTimeoutError extends MemoryEngineError {
  constructor(stepId: string, timeoutMs: number) {
    super('TransientCapabilityError', `Step ${stepId} timed out after ${timeoutMs}ms`, {
      retryable: true,
      context: { stepId }
    });
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof MemoryEngineError && error.retryable;
}

export type StructuredError = {
  kind: MemoryErrorKind;
  message: string;
  runId: string | null;
  stepId: string | null;
  scope: Scope | null;
};

export function toStructuredError(error: unknown, runId: string | null): StructuredError {
  if (error instanceof MemoryEngineError) {
    return {
      kind: error.kind,
      message: error.message,
      runId: error.context.runId ?? runId,
      stepId: error.context.stepId ?? null,
      scope: error.context.scope ?? null
    };
  }
  return {
    kind: 'InternalError',
    message: 'Internal error while executing the operation',
    runId,
    stepId: null,
    scope: null
  };
}
