export type MotionErrorCode =
  | 'CONNECTION'
  | 'STALL'
  | 'ABORTED'
  | 'BUSY'
  | 'PATTERN_NOT_FOUND'
  | 'INVALID_COMMAND'
  | 'INTERNAL';

/**
 * Base class for every failure the motion layer reports to its caller.
 * `code` lets an outer layer map failures without `instanceof` chains.
 */
export class MotionError extends Error {
  constructor(message: string, readonly code: MotionErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionError extends MotionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION', options);
  }
}

export class ProtocolStallError extends MotionError {
  constructor(readonly token: string, readonly timeoutMs: number) {
    super(`No ${token} from controller within ${timeoutMs} ms`, 'STALL');
  }
}

export class HandshakeAbortedError extends MotionError {
  constructor(readonly token: string) {
    super(`Wait for ${token} aborted`, 'ABORTED');
  }
}

export class ExecutionBusyError extends MotionError {
  constructor(activity: string) {
    super(`Controller is busy: ${activity}`, 'BUSY');
  }
}

export class PatternNotFoundError extends MotionError {
  constructor(readonly pattern: string) {
    super(`Pattern not found: ${pattern}`, 'PATTERN_NOT_FOUND');
  }
}

export class InvalidCommandError extends MotionError {
  constructor(readonly command: string, reason: string) {
    super(`Invalid command "${command}": ${reason}`, 'INVALID_COMMAND');
  }
}

// Anything unexpected thrown inside a run; `cause` holds the original error
export class InternalRunError extends MotionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INTERNAL', options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
