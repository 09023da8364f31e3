/**
 * @mediaconv/core
 *
 * Core package containing:
 * - Format catalogs
 * - Session state machine
 * - Error handling
 * - Shared types
 */

// Format catalogs
export {
  VIDEO_EXTENSIONS,
  AUDIO_EXTENSIONS,
  IMAGE_EXTENSIONS,
  OTHER_MEDIA_EXTENSIONS,
  MEDIA_EXTENSIONS,
  COMMON_OUTPUT_FORMATS,
  isMediaExtension,
  type MediaExtension,
} from './formats.js';

// State machine
export {
  SESSION_STATES,
  SessionStateMachine,
  isValidTransition,
  getNextStates,
  type SessionState,
  type SessionStateTransition,
} from './stateMachine.js';

// Types
export type {
  MediaFile,
  FilesByExtension,
  ConversionJob,
  ConversionOutcome,
  ConversionResult,
} from './types.js';

// Errors
export {
  MediaConvError,
  NoMediaFilesError,
  UserInterruptError,
  InputClosedError,
  StateTransitionError,
  CommandExecutionError,
  DirectoryCreationError,
} from './errors/index.js';
