/**
 * @slipfinder/lichess - Lichess access for Slipfinder
 *
 * This package provides:
 * - An HTTP client for the user and game export endpoints
 * - Query building from date, speed and count filters
 * - Game retrieval that falls back across export formats and filters
 */

export const VERSION = '0.1.0';

export {
  LichessClient,
  DEFAULT_LICHESS_CONFIG,
  BaseHttpClient,
  type HttpClientConfig,
  type FetchLike,
  type FetchInit,
  type FetchResponse,
} from './clients/index.js';

export {
  GameRetriever,
  createDefaultStrategies,
  planAttempts,
  collectGames,
  type RetrievalStrategy,
  type GameRetrieverOptions,
} from './retrieval/retriever.js';
export {
  buildGameQuery,
  validateFilters,
  dateToEpochMs,
  endOfDayEpochMs,
} from './retrieval/query.js';

export { PERF_TYPES } from './types.js';
export type {
  PerfType,
  GameFilters,
  RetrievalStrategyName,
  FilterVariant,
  FetchAttempt,
  AttemptOutcome,
  RetrievalResult,
  LichessUser,
} from './types.js';

export {
  LichessError,
  UnknownUserError,
  TransportError,
  RateLimitError,
  InvalidDateError,
  RetrievalExhaustedError,
  type ExhaustionReason,
} from './errors.js';
