/**
 * Utilities export
 */

export { Logger, LogLevel, parseLogLevel } from './logger.js';
export {
  ErrorHandler,
  InspectionError,
  CorrelationGap,
  SampleReadFailure,
  ConflictError,
  RestoreStepFailure,
  OperationCancelledError,
} from './errors.js';
export { CommandRunner } from './command-runner.js';
