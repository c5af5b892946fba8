/**
 * Error handling utilities
 */

import { EngineError, EngineUnavailableError, EngineTerminatedError } from '@slipfinder/engine';
import {
  InvalidDateError,
  LichessError,
  RateLimitError,
  RetrievalExhaustedError,
  UnknownUserError,
} from '@slipfinder/lichess';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import {
  AnalysisError,
  CliError,
  ConfigError,
  InputError,
  RetrievalError,
  ServiceError,
} from './cli-errors.js';

/**
 * Map a package error to the CLI error shown to the user
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof CliError || error instanceof ConfigValidationError) {
    return error;
  }

  if (error instanceof EngineUnavailableError) {
    return new ServiceError(
      'Engine',
      error.message,
      'Install Stockfish or point --engine (or STOCKFISH_PATH) at the executable',
    );
  }
  if (error instanceof EngineTerminatedError) {
    return new ServiceError(
      'Engine',
      error.message,
      'The engine process died; try a smaller --hash-mb or --threads',
    );
  }
  if (error instanceof EngineError) {
    return new AnalysisError(error.message);
  }

  if (error instanceof UnknownUserError) {
    return new InputError(error.message, 'Check the spelling of --user');
  }
  if (error instanceof InvalidDateError) {
    return new ConfigError(error.message, 'Dates are written YYYY-MM-DD, e.g. 2024-01-31');
  }
  if (error instanceof RetrievalExhaustedError) {
    return new RetrievalError(
      error.message,
      error.reason === 'no-games'
        ? 'Widen the date range or drop the --perf filter'
        : 'Check your network connection and try again',
    );
  }
  if (error instanceof RateLimitError) {
    return new RetrievalError(error.message);
  }
  if (error instanceof LichessError) {
    return new RetrievalError(error.message, 'Check your network connection and try again');
  }

  return error;
}

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  const mapped = toCliError(error);

  if (mapped instanceof ConfigValidationError) {
    return chalk.red(mapped.format());
  }

  if (mapped instanceof CliError) {
    return chalk.red(mapped.format());
  }

  if (mapped instanceof Error) {
    return chalk.red(`Error: ${mapped.message}`);
  }

  return chalk.red(`Error: ${String(mapped)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  const mapped = toCliError(error);
  const exitCode = mapped instanceof CliError ? mapped.exitCode : 1;

  process.exit(exitCode);
}
