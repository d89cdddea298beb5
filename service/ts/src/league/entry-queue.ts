import { P } from '../engine/params.js';
import type {
  EntryApplicationRecord,
  EntryPoolRecord,
  LeagueScope,
  ParticipantRecord,
  SessionRecord,
} from '../store/types.js';
import { PENDING_ROOM_LABEL } from '../store/types.js';
import { loadParticipant, loadSeason, poolScope, seasonScope, systemClock, type Clock } from './context.js';
import { guard, InvalidStateError, NotFoundError, type LeagueResult } from './errors.js';
import type { ScheduledRoom, SessionLifecycle } from './session-lifecycle.js';
import type { BoundLedger, ScopedStore } from './settlement-ledger.js';

export interface OpenPoolResult {
  pool: EntryPoolRecord;
  placeholder: SessionRecord | null;
  created: boolean;
}

export interface ApplicationResult {
  application: EntryApplicationRecord;
  /** False when the request repeated the current state. */
  changed: boolean;
  entryPoints: number | null;
}

export interface ClosePoolResult {
  pool: EntryPoolRecord;
  admitted: string[];
  deferred: string[];
  rooms: ScheduledRoom[];
}

interface Candidate {
  participant: ParticipantRecord;
  application: EntryApplicationRecord;
}

/** Higher priority first, then earlier submission. */
const admissionOrder = (a: Candidate, b: Candidate) =>
  b.participant.priority - a.participant.priority ||
  a.application.submittedAt.getTime() - b.application.submittedAt.getTime() ||
  a.participant.participantId.localeCompare(b.participant.participantId);

const chunk = <T>(items: T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

export class EntryQueue {
  constructor(
    private readonly store: ScopedStore,
    private readonly sessions: SessionLifecycle,
    private readonly clock: Clock = systemClock
  ) {}

  open(seasonId: string, week: number): Promise<LeagueResult<OpenPoolResult>> {
    return guard(() =>
      this.store.transaction([seasonScope(seasonId)], async (tx) => {
        const season = await loadSeason(tx, seasonId);
        const existing = await tx.pools.find(seasonId, week);
        if (existing) {
          return { pool: existing, placeholder: await tx.sessions.findPlaceholder(existing.poolId), created: false };
        }

        const now = this.clock();
        const pool = await tx.pools.create({ seasonId, week, createdAt: now });
        const placeholder = await tx.sessions.create({
          seasonId,
          poolId: pool.poolId,
          week,
          roomLabel: PENDING_ROOM_LABEL,
          capacity: season.roomCapacity,
          status: 'pending',
          scheduledAt: now,
        });
        return { pool, placeholder, created: true };
      })
    );
  }

  apply(poolId: string, participantId: string): Promise<LeagueResult<ApplicationResult>> {
    return this.runOnPool(poolId, async (tx, ledger, pool) => {
      await loadParticipant(tx, participantId);
      if (!(await tx.seasons.isEnrolled(pool.seasonId, participantId))) {
        throw new InvalidStateError(`Participant ${participantId} is not enrolled in this season`, 'not_eligible');
      }

      const existing = await tx.pools.getApplication(poolId, participantId);
      if (existing?.status === 'confirmed') {
        return { application: existing, changed: false, entryPoints: null };
      }

      const now = this.clock();
      const application: EntryApplicationRecord = {
        poolId,
        participantId,
        status: 'confirmed',
        submittedAt: now,
        updatedAt: now,
      };
      await tx.pools.saveApplication(application);
      const entryPoints = await ledger.adjustEntryPoints(pool.seasonId, participantId, P.entryPoints);
      return { application, changed: true, entryPoints };
    });
  }

  withdraw(poolId: string, participantId: string): Promise<LeagueResult<ApplicationResult>> {
    return this.runOnPool(poolId, async (tx, ledger, pool) => {
      const existing = await tx.pools.getApplication(poolId, participantId);
      if (!existing) {
        throw new NotFoundError('application', `${participantId} in pool ${poolId}`);
      }
      if (existing.status === 'canceled') {
        return { application: existing, changed: false, entryPoints: null };
      }

      const application: EntryApplicationRecord = { ...existing, status: 'canceled', updatedAt: this.clock() };
      await tx.pools.saveApplication(application);
      const entryPoints = await ledger.adjustEntryPoints(pool.seasonId, participantId, -P.entryPoints);
      return { application, changed: true, entryPoints };
    });
  }

  /**
   * One-shot admission sweep. The largest prefix of the admission order that
   * fills whole rooms is admitted; everyone else confirmed is deferred with a
   * priority bump so they rank higher next week.
   */
  close(poolId: string): Promise<LeagueResult<ClosePoolResult>> {
    return this.runOnPool(poolId, async (tx, ledger, pool) => {
      const season = await loadSeason(tx, pool.seasonId);
      const confirmed = (await tx.pools.listApplications(poolId)).filter((a) => a.status === 'confirmed');
      const participants = await tx.participants.getMany(confirmed.map((a) => a.participantId));

      const candidates: Candidate[] = [];
      for (const application of confirmed) {
        const participant = participants.get(application.participantId);
        if (!participant) throw new NotFoundError('participant', application.participantId);
        candidates.push({ participant, application });
      }
      candidates.sort(admissionOrder);

      const capacity = season.roomCapacity;
      const admittedCount = Math.floor(candidates.length / capacity) * capacity;
      const admitted = candidates.slice(0, admittedCount);
      const deferred = candidates.slice(admittedCount);

      for (const { participant } of deferred) {
        await tx.participants.incrementPriority(participant.participantId);
      }

      if (!admitted.length) {
        const canceled = await tx.pools.setStatus(poolId, 'canceled', this.clock());
        await this.sessions.cancelPlaceholderWithin(tx, poolId);
        return {
          pool: canceled,
          admitted: [],
          deferred: deferred.map((c) => c.participant.participantId),
          rooms: [],
        };
      }

      for (const { participant } of admitted) {
        await tx.participants.setPriority(participant.participantId, 0);
      }

      const rooms: string[][] = [];
      for (const group of chunk(admitted, capacity)) {
        const rated = await Promise.all(
          group.map(async ({ participant }) => ({
            participantId: participant.participantId,
            rating: await ledger.currentRating(season.seasonId, participant.participantId),
          }))
        );
        rated.sort((a, b) => b.rating - a.rating || a.participantId.localeCompare(b.participantId));
        rooms.push(rated.map((r) => r.participantId));
      }

      const closed = await tx.pools.setStatus(poolId, 'closed', this.clock());
      const scheduled = await this.sessions.scheduleRoomsWithin(tx, closed, season, rooms);
      return {
        pool: closed,
        admitted: admitted.map((c) => c.participant.participantId),
        deferred: deferred.map((c) => c.participant.participantId),
        rooms: scheduled,
      };
    });
  }

  /** Raises admission priority, e.g. for members stranded by a canceled refill. */
  bumpPriority(participantIds: string[]): Promise<LeagueResult<ParticipantRecord[]>> {
    return guard(() =>
      this.store.transaction([], async (tx) => {
        const updated: ParticipantRecord[] = [];
        for (const participantId of new Set(participantIds)) {
          const participant = await loadParticipant(tx, participantId);
          const priority = await tx.participants.incrementPriority(participantId);
          updated.push({ ...participant, priority });
        }
        return updated;
      })
    );
  }

  private runOnPool<T>(
    poolId: string,
    work: (tx: LeagueScope, ledger: BoundLedger, pool: EntryPoolRecord) => Promise<T>
  ): Promise<LeagueResult<T>> {
    return guard(async () => {
      const located = await this.store.transaction([], (tx) => tx.pools.get(poolId));
      if (!located) throw new NotFoundError('pool', poolId);
      // Entry points live in season standings, so pool edits serialise with ledger writers.
      return this.store.transaction([seasonScope(located.seasonId), poolScope(poolId)], async (tx, ledger) => {
        const pool = await tx.pools.get(poolId);
        if (!pool) throw new NotFoundError('pool', poolId);
        if (pool.status !== 'open') {
          throw new InvalidStateError(`Pool ${poolId} is ${pool.status}`, 'pool_closed');
        }
        return work(tx, ledger, pool);
      });
    });
  }
}
