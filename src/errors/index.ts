/**
 * REASON errors
 *
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  ReasonError,
  StorageError,
  ConfigurationError,
  AnalysisError,
} from './reason-error.js';

export { ErrorHandler } from './error-handler.js';
