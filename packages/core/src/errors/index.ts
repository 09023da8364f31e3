/**
 * Custom Error Classes
 */

import type { SessionState } from '../stateMachine.js';

/**
 * Base error class for all mediaconv errors
 */
export class MediaConvError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MediaConvError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The scanned directory holds nothing to convert
 */
export class NoMediaFilesError extends MediaConvError {
  constructor(directory: string) {
    super(
      'No media files found.',
      'NO_MEDIA_FILES',
      1,
      { directory }
    );
    this.name = 'NoMediaFilesError';
  }
}

/**
 * Ctrl+C while the session was waiting for input
 */
export class UserInterruptError extends MediaConvError {
  constructor() {
    super('Interrupted by user', 'USER_INTERRUPT', 0);
    this.name = 'UserInterruptError';
  }
}

/**
 * Input stream ended while a prompt was pending
 */
export class InputClosedError extends MediaConvError {
  constructor() {
    super('Input stream closed', 'INPUT_CLOSED', 0);
    this.name = 'InputClosedError';
  }
}

/**
 * State transition error for invalid menu flow
 */
export class StateTransitionError extends MediaConvError {
  constructor(
    fromState: SessionState,
    toState: SessionState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      1,
      { fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends MediaConvError {
  public readonly stderr: string;

  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `${command} exited with code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      1,
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
    this.stderr = stderr;
  }

  /**
   * Engine diagnostics when there are any, the exit status otherwise
   */
  get diagnostic(): string {
    const text = this.stderr.trim();
    return text.length > 0 ? text : this.message;
  }
}

/**
 * Output directory could not be created
 */
export class DirectoryCreationError extends MediaConvError {
  constructor(directory: string, cause: string) {
    super(
      cause,
      'DIRECTORY_CREATION_ERROR',
      1,
      { directory }
    );
    this.name = 'DirectoryCreationError';
  }
}
