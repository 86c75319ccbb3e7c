/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Request validation error (400)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Malformed or unsafe stream specification (400)
 */
export class InvalidSpecError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_SPEC', 400, details);
  }
}

/**
 * Authentication error (401)
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 'AUTHENTICATION_ERROR', 401);
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
  }
}

/**
 * Start rejected because the stream already has a live process (409)
 */
export class AlreadyRunningError extends AppError {
  constructor(public readonly streamId: string, public readonly pid?: number) {
    super(
      pid === undefined
        ? `Stream '${streamId}' is already running`
        : `Stream '${streamId}' is already running (PID: ${pid})`,
      'ALREADY_RUNNING',
      409,
      pid === undefined ? undefined : { pid }
    );
  }
}

export type LaunchFailureReason = 'executable_not_found' | 'spawn_failed';

/**
 * The transcoder could not be started
 */
export class LaunchError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly reason: LaunchFailureReason,
    details?: unknown
  ) {
    super(message, code, 500, details);
  }
}

export class ExecutableNotFoundError extends LaunchError {
  constructor(public readonly executable: string) {
    super(`Transcoder binary not found or not executable at ${executable}`, 'EXECUTABLE_NOT_FOUND', 'executable_not_found');
  }
}

export class SpawnFailedError extends LaunchError {
  constructor(message: string, public readonly osCode?: string) {
    super(message, 'SPAWN_FAILED', 'spawn_failed', osCode ? { osCode } : undefined);
  }
}

/**
 * Process survived both termination signals within the allotted time.
 * The entry stays in the stopping state for the reaper to reconcile.
 */
export class TerminationTimeoutError extends AppError {
  constructor(public readonly streamId: string, public readonly pid: number, timeoutMs: number) {
    super(
      `Stream '${streamId}' (PID: ${pid}) did not exit within ${timeoutMs}ms`,
      'TERMINATION_TIMEOUT',
      504,
      { pid, timeoutMs }
    );
  }
}

/**
 * Narrow an unknown thrown value to a Node system error.
 * AppError also carries a string code but is never a system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && !(error instanceof AppError) && 'code' in error && typeof error.code === 'string';
}
