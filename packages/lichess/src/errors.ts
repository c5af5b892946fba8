/**
 * Error classes for Lichess operations
 */

import type { AttemptOutcome } from './types.js';

/**
 * Base error class for Lichess errors
 */
export class LichessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LichessError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LichessError);
    }
  }
}

/**
 * Error thrown when the account does not exist or cannot be read
 */
export class UnknownUserError extends LichessError {
  constructor(
    public readonly username: string,
    public readonly reason: 'not-found' | 'closed' = 'not-found',
  ) {
    super(
      reason === 'closed'
        ? `Lichess account "${username}" is closed or disabled`
        : `Player "${username}" not found on Lichess`,
    );
    this.name = 'UnknownUserError';
  }
}

/**
 * Error thrown when a request fails on the network or with an unexpected status
 */
export class TransportError extends LichessError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly url?: string,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Error thrown when Lichess answers 429
 */
export class RateLimitError extends TransportError {
  constructor(url: string) {
    super('Rate limited by Lichess. Please try again in a minute.', 429, url);
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when a date filter is not a real YYYY-MM-DD date
 */
export class InvalidDateError extends LichessError {
  constructor(public readonly value: string) {
    super(`Invalid date "${value}": expected YYYY-MM-DD`);
    this.name = 'InvalidDateError';
  }
}

export type ExhaustionReason = 'no-games' | 'transport-failure';

/**
 * Error thrown when every retrieval attempt came back without games
 */
export class RetrievalExhaustedError extends LichessError {
  constructor(
    public readonly username: string,
    public readonly reason: ExhaustionReason,
    public readonly attempts: AttemptOutcome[],
  ) {
    super(
      reason === 'no-games'
        ? `No games found for "${username}" with the given filters`
        : `Could not download games for "${username}": every request failed`,
    );
    this.name = 'RetrievalExhaustedError';
  }
}
