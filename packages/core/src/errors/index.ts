/**
 * Storyteller Error Codes
 */
export const ErrorCodes = {
  EXECUTION_FAILED: 'EXECUTION_FAILED',
  STREAM_NOT_FOUND: 'STREAM_NOT_FOUND',
  STREAM_EXISTS: 'STREAM_EXISTS',
  STREAM_CLOSED: 'STREAM_CLOSED',
  NO_REQUEST_SCOPE: 'NO_REQUEST_SCOPE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for Storyteller errors
 */
export class StorytellerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'StorytellerError';
  }

  toErrorMessage() {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

/**
 * Error: The agent process failed
 */
export class ExecutionFailedError extends StorytellerError {
  constructor(
    reason: string,
    public readonly processId?: string,
  ) {
    super(ErrorCodes.EXECUTION_FAILED, reason);
    this.name = 'ExecutionFailedError';
  }
}

/**
 * Error: No open stream with this ID
 */
export class StreamNotFoundError extends StorytellerError {
  constructor(public readonly streamId: string) {
    super(ErrorCodes.STREAM_NOT_FOUND, `Stream not found: ${streamId}`);
    this.name = 'StreamNotFoundError';
  }
}

/**
 * Error: A stream with this ID is already open
 */
export class StreamExistsError extends StorytellerError {
  constructor(public readonly streamId: string) {
    super(
      ErrorCodes.STREAM_EXISTS,
      `Stream already open: ${streamId}`,
      'Close the open stream before reusing its id',
    );
    this.name = 'StreamExistsError';
  }
}

/**
 * Error: Stream was closed before the event was sent
 */
export class StreamClosedError extends StorytellerError {
  constructor(public readonly streamId: string) {
    super(ErrorCodes.STREAM_CLOSED, `Stream closed: ${streamId}`);
    this.name = 'StreamClosedError';
  }
}

/**
 * Error: Request-local state touched outside a request scope
 */
export class NoRequestScopeError extends StorytellerError {
  constructor(operation: string) {
    super(
      ErrorCodes.NO_REQUEST_SCOPE,
      `${operation} called outside a request scope`,
      'Wrap request handling in runInRequestScope()',
    );
    this.name = 'NoRequestScopeError';
  }
}
