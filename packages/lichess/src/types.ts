/**
 * Lichess speed categories accepted by the game export
 */
export const PERF_TYPES = ['ultraBullet', 'bullet', 'blitz', 'rapid', 'classical', 'correspondence'] as const;

export type PerfType = (typeof PERF_TYPES)[number];

export interface GameFilters {
  /** Inclusive start date, YYYY-MM-DD (UTC) */
  since?: string;
  /** Inclusive end date, YYYY-MM-DD (UTC) */
  until?: string;
  perfTypes: PerfType[];
  /** Upper bound on games returned */
  max: number;
}

export type RetrievalStrategyName = 'structured-api' | 'raw-pgn';

/** `without-perf` is the same query with the speed filter dropped */
export type FilterVariant = 'full' | 'without-perf';

export interface FetchAttempt {
  strategy: RetrievalStrategyName;
  variant: FilterVariant;
}

export interface AttemptOutcome extends FetchAttempt {
  status: 'games' | 'empty' | 'failed';
  /** Games yielded by this attempt after splitting and de-duplication */
  count: number;
  error?: string;
}

export interface RetrievalResult {
  /** One PGN text per game, in the order Lichess returned them */
  games: string[];
  /** The attempt that produced the games */
  attempt: FetchAttempt;
  attempts: AttemptOutcome[];
}

export interface LichessUser {
  id: string;
  username: string;
  disabled?: boolean | undefined;
  closed?: boolean | undefined;
}
