import { P } from '../engine/params.js';
import type { EnrollmentRecord, ParticipantRecord, SeasonRecord } from '../store/types.js';
import { loadParticipant, loadSeason, seasonScope, systemClock, type Clock } from './context.js';
import { guard, InvalidStateError, NotFoundError, ValidationError, type LeagueResult } from './errors.js';
import type { ScopedStore } from './settlement-ledger.js';

const SEASON_LENGTH_MS = 90 * 24 * 60 * 60 * 1000;

export interface SeasonDefaults {
  roomCapacity: number;
  winThreshold: number;
}

export interface CreateSeasonInput {
  name: string;
  roomCapacity?: number;
  winThreshold?: number;
  startsAt?: Date;
  endsAt?: Date;
}

export interface RegisterParticipantInput {
  displayName: string;
  experience?: number;
}

export interface EnrollResult {
  enrollment: EnrollmentRecord;
  created: boolean;
  seedRating: number;
}

export const validateSeasonConfig = (roomCapacity: number, winThreshold: number) => {
  if (!Number.isInteger(roomCapacity) || roomCapacity < 2 || roomCapacity > P.maxBalanceParty || roomCapacity % 2) {
    throw new ValidationError(
      `Room capacity must be an even number between 2 and ${P.maxBalanceParty}, got ${roomCapacity}`,
      'invalid_season_config'
    );
  }
  if (!Number.isInteger(winThreshold) || winThreshold < 1) {
    throw new ValidationError(`Win threshold must be a positive integer, got ${winThreshold}`, 'invalid_season_config');
  }
};

export class SeasonRegistry {
  constructor(
    private readonly store: ScopedStore,
    private readonly clock: Clock = systemClock,
    private readonly defaults: SeasonDefaults = P.defaults
  ) {}

  createSeason(input: CreateSeasonInput): Promise<LeagueResult<SeasonRecord>> {
    return guard(() =>
      this.store.transaction(['seasons'], async (tx) => {
        const name = input.name.trim();
        if (!name) {
          throw new ValidationError('Season name must not be empty', 'invalid_season_config');
        }
        const roomCapacity = input.roomCapacity ?? this.defaults.roomCapacity;
        const winThreshold = input.winThreshold ?? this.defaults.winThreshold;
        validateSeasonConfig(roomCapacity, winThreshold);

        const now = this.clock();
        const startsAt = input.startsAt ?? now;
        const endsAt = input.endsAt ?? new Date(startsAt.getTime() + SEASON_LENGTH_MS);
        if (endsAt.getTime() <= startsAt.getTime()) {
          throw new ValidationError('Season must end after it starts', 'invalid_season_config');
        }

        if (await tx.seasons.getByName(name)) {
          throw new InvalidStateError(`Season "${name}" already exists`, 'duplicate_season');
        }

        await tx.seasons.deactivateAll();
        return tx.seasons.create({ name, startsAt, endsAt, roomCapacity, winThreshold, createdAt: now });
      })
    );
  }

  findActiveSeason(): Promise<LeagueResult<SeasonRecord>> {
    return guard(() =>
      this.store.transaction([], async (tx) => {
        const season = await tx.seasons.findActive();
        if (!season) throw new NotFoundError('season', 'active');
        return season;
      })
    );
  }

  getSeason(seasonId: string): Promise<LeagueResult<SeasonRecord>> {
    return guard(() => this.store.transaction([], (tx) => loadSeason(tx, seasonId)));
  }

  findSeasonByName(name: string): Promise<LeagueResult<SeasonRecord>> {
    return guard(() =>
      this.store.transaction([], async (tx) => {
        const season = await tx.seasons.getByName(name.trim());
        if (!season) throw new NotFoundError('season', name);
        return season;
      })
    );
  }

  registerParticipant(input: RegisterParticipantInput): Promise<LeagueResult<ParticipantRecord>> {
    return guard(() =>
      this.store.transaction([], async (tx) => {
        const displayName = input.displayName.trim();
        if (!displayName) {
          throw new ValidationError('Display name must not be empty', 'invalid_participant');
        }
        const experience = input.experience ?? P.defaultExperience;
        if (!Number.isFinite(experience)) {
          throw new ValidationError(`Experience must be a finite number, got ${experience}`, 'invalid_participant');
        }
        return tx.participants.create({
          displayName,
          experience,
          createdAt: this.clock(),
        });
      })
    );
  }

  getParticipant(participantId: string): Promise<LeagueResult<ParticipantRecord>> {
    return guard(() => this.store.transaction([], (tx) => loadParticipant(tx, participantId)));
  }

  /** Enrolling twice is a no-op; the season standing is seeded on first enrollment. */
  enroll(seasonId: string, participantId: string): Promise<LeagueResult<EnrollResult>> {
    return guard(() =>
      this.store.transaction([seasonScope(seasonId)], async (tx, ledger) => {
        await loadSeason(tx, seasonId);
        await loadParticipant(tx, participantId);

        const enrollment: EnrollmentRecord = { seasonId, participantId, joinedAt: this.clock() };
        const created = await tx.seasons.enroll(enrollment);
        const standing = await ledger.ensureStanding(seasonId, participantId);
        return { enrollment, created, seedRating: standing.seedRating };
      })
    );
  }
}
