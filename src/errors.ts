export type OrchestratorErrorKind =
  | 'ValidationError'
  | 'InvalidTransition'
  | 'EngineUnreachable'
  | 'EngineRejected'
  | 'NotFound';

export abstract class OrchestratorError extends Error {
  abstract readonly kind: OrchestratorErrorKind;
  abstract readonly statusCode: number;
  public readonly taskId?: string;

  constructor(message: string, taskId?: string) {
    super(message);
    this.taskId = taskId;
  }
}

/**
 * Add payload is neither a torrent file nor a magnet URI.
 */
export class ValidationError extends OrchestratorError {
  readonly kind = 'ValidationError';
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InvalidTransition extends OrchestratorError {
  readonly kind = 'InvalidTransition';
  readonly statusCode = 409;

  constructor(message: string, taskId?: string) {
    super(message, taskId);
    this.name = 'InvalidTransition';
  }
}

/**
 * Transport failure: connection refused, timeout, no HTTP response.
 */
export class EngineUnreachable extends OrchestratorError {
  readonly kind = 'EngineUnreachable';
  readonly statusCode = 503;

  constructor(message: string, taskId?: string) {
    super(message, taskId);
    this.name = 'EngineUnreachable';
  }

  withTask(taskId: string): EngineUnreachable {
    return new EngineUnreachable(this.message, taskId);
  }
}

/**
 * The engine understood the call and refused it (unknown GID, bad torrent...).
 */
export class EngineRejected extends OrchestratorError {
  readonly kind = 'EngineRejected';
  readonly statusCode = 502;
  public readonly code?: number;

  constructor(message: string, code?: number, taskId?: string) {
    super(message, taskId);
    this.code = code;
    this.name = 'EngineRejected';
  }

  withTask(taskId: string): EngineRejected {
    return new EngineRejected(this.message, this.code, taskId);
  }
}

export class NotFound extends OrchestratorError {
  readonly kind = 'NotFound';
  readonly statusCode = 404;

  constructor(taskId: string) {
    super(`Task ${taskId} not found`, taskId);
    this.name = 'NotFound';
  }
}

export const isOrchestratorError = (
  value: unknown
): value is OrchestratorError => value instanceof OrchestratorError;

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === 'string' && error.length) {
    return error;
  }
  return String(error);
}
