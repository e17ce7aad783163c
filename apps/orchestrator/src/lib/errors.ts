/**
 * Error taxonomy for orchestration commands.
 *
 * - structural: the stack description itself is wrong; fix it and resubmit.
 * - concurrency: another operation holds the environment; retry later.
 * - state: the stack's current mode does not allow the request.
 * - runtime: the container host failed while carrying out a step.
 */
export type ErrorKind = 'structural' | 'concurrency' | 'state' | 'runtime';

/** What the caller should do next. */
export type RetryHint = 'retry-now' | 'fix-input' | 'needs-operator';

export class EngineError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly statusCode: number;
  readonly retryHint: RetryHint;
  readonly details: string[];

  constructor(
    message: string,
    options: { code: string; kind: ErrorKind; statusCode: number; retryHint: RetryHint; details?: string[] }
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = options.code;
    this.kind = options.kind;
    this.statusCode = options.statusCode;
    this.retryHint = options.retryHint;
    this.details = options.details ?? [];
  }
}

export type PlanValidationCode =
  | 'DUPLICATE_SERVICE'
  | 'DEPENDENCY_MISSING'
  | 'DEPENDENCY_CYCLE'
  | 'INGRESS_NOT_FOUND'
  | 'INGRESS_DEPENDED_ON'
  | 'NETWORK_NOT_DECLARED'
  | 'INVALID_DESCRIPTION';

export class PlanValidationError extends EngineError {
  constructor(code: PlanValidationCode, message: string, details: string[] = []) {
    super(message, {
      code,
      kind: 'structural',
      statusCode: 400,
      retryHint: 'fix-input',
      details,
    });
    this.name = 'PlanValidationError';
  }
}

export class OperationInProgressError extends EngineError {
  readonly environmentId: string;
  readonly activeOperation: string;

  constructor(environmentId: string, activeOperation: string) {
    super(`Environment ${environmentId} is busy with ${activeOperation}`, {
      code: 'OPERATION_IN_PROGRESS',
      kind: 'concurrency',
      statusCode: 409,
      retryHint: 'retry-now',
    });
    this.name = 'OperationInProgressError';
    this.environmentId = environmentId;
    this.activeOperation = activeOperation;
  }
}

export type TransitionErrorCode =
  | 'INVALID_TRANSITION'
  | 'STACK_NOT_FOUND'
  | 'STACK_NOT_DEPLOYED'
  | 'ROLLBACK_DISABLED'
  | 'ROLLBACK_NOT_APPLICABLE'
  | 'NO_SNAPSHOT';

export class InvalidTransitionError extends EngineError {
  constructor(code: TransitionErrorCode, message: string) {
    super(message, {
      code,
      kind: 'state',
      statusCode: code === 'STACK_NOT_FOUND' ? 404 : 409,
      retryHint: code === 'STACK_NOT_FOUND' ? 'fix-input' : 'needs-operator',
    });
    this.name = 'InvalidTransitionError';
  }
}

export class EnvironmentNotFoundError extends EngineError {
  constructor(environmentId: string) {
    super(`Unknown environment: ${environmentId}`, {
      code: 'ENVIRONMENT_NOT_FOUND',
      kind: 'state',
      statusCode: 404,
      retryHint: 'fix-input',
    });
    this.name = 'EnvironmentNotFoundError';
  }
}

export class SelfUpdateUnavailableError extends EngineError {
  constructor() {
    super('Self-update is not configured for this orchestrator', {
      code: 'SELF_UPDATE_UNAVAILABLE',
      kind: 'state',
      statusCode: 409,
      retryHint: 'needs-operator',
    });
    this.name = 'SelfUpdateUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
