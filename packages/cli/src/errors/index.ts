/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  ServiceError,
  RetrievalError,
  AnalysisError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError, toCliError } from './handler.js';
