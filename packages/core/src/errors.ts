/**
 * @module errors
 * Error types raised for caller mistakes. The scheduler itself never throws
 * during normal operation.
 */

/** Base class for every error thrown by cmdtree. */
export class CommandError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'CommandError';
    this.code = code;
  }
}

/** Thrown when a group's callback is replaced while a cycle is still pending. */
export class CallbackOverwriteError extends CommandError {
  constructor(group: string) {
    super(
      'CALLBACK_OVERWRITE',
      `Cannot replace the completion callback of "${group}" while a cycle is pending`,
    );
    this.name = 'CallbackOverwriteError';
  }
}

/** Rejection reason used by {@link runCommand} when a group cycle is cancelled. */
export class CommandCancelledError extends CommandError {
  constructor(description: string) {
    super('CANCELLED', `"${description}" was cancelled before it completed`);
    this.name = 'CommandCancelledError';
  }
}
