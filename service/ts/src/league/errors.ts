export type LeagueErrorKind =
  | 'not_found'
  | 'invalid_state'
  | 'capacity_violation'
  | 'stale_edit'
  | 'validation_error';

export type LeagueEntity = 'season' | 'participant' | 'pool' | 'application' | 'session' | 'match';

export abstract class LeagueError extends Error {
  abstract readonly kind: LeagueErrorKind;

  constructor(message: string, public readonly code: string) {
    super(message);
  }
}

export class NotFoundError extends LeagueError {
  readonly kind = 'not_found' as const;

  constructor(public readonly entity: LeagueEntity, id: string | number) {
    super(`${entity} not found: ${id}`, `${entity}_not_found`);
    this.name = 'NotFoundError';
  }
}

export type InvalidStateCode =
  | 'already_finished'
  | 'already_member'
  | 'duplicate_season'
  | 'match_decided'
  | 'match_open'
  | 'no_decided_match'
  | 'no_open_match'
  | 'not_eligible'
  | 'not_finished'
  | 'pool_closed'
  | 'session_mismatch'
  | 'session_not_joinable'
  | 'session_not_playable';

export class InvalidStateError extends LeagueError {
  readonly kind = 'invalid_state' as const;

  constructor(message: string, public readonly code: InvalidStateCode) {
    super(message, code);
    this.name = 'InvalidStateError';
  }
}

export type CapacityViolationCode = 'invalid_party_kind' | 'invalid_team' | 'insufficient_players' | 'session_full';

export class CapacityViolationError extends LeagueError {
  readonly kind = 'capacity_violation' as const;

  constructor(
    message: string,
    public readonly code: CapacityViolationCode,
    public readonly context: { expected?: number; actual?: number } = {}
  ) {
    super(message, code);
    this.name = 'CapacityViolationError';
  }
}

export class StaleEditError extends LeagueError {
  readonly kind = 'stale_edit' as const;

  constructor(
    sessionId: string,
    public readonly blockingSessionIds: string[]
  ) {
    super(
      `Session ${sessionId} cannot be edited: later settlements exist in ${blockingSessionIds.join(', ')}`,
      'stale_edit'
    );
    this.name = 'StaleEditError';
  }
}

export class ValidationError extends LeagueError {
  readonly kind = 'validation_error' as const;

  constructor(
    message: string,
    code: 'invalid_winner' | 'invalid_season_config' | 'invalid_match_index' | 'invalid_participant'
  ) {
    super(message, code);
    this.name = 'ValidationError';
  }
}

export type LeagueFailure =
  | NotFoundError
  | InvalidStateError
  | CapacityViolationError
  | StaleEditError
  | ValidationError;

export type LeagueResult<T> = { ok: true; value: T } | { ok: false; error: LeagueFailure };

export const isLeagueFailure = (err: unknown): err is LeagueFailure =>
  err instanceof NotFoundError ||
  err instanceof InvalidStateError ||
  err instanceof CapacityViolationError ||
  err instanceof StaleEditError ||
  err instanceof ValidationError;

/**
 * Runs `work` and turns a thrown league failure into a failed result. Anything
 * else (store or programming errors) keeps propagating.
 */
export const guard = async <T>(work: () => Promise<T>): Promise<LeagueResult<T>> => {
  try {
    return { ok: true, value: await work() };
  } catch (err) {
    if (isLeagueFailure(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
};
