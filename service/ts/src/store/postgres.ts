import { randomUUID } from 'crypto';
import { and, asc, eq, inArray, sql, type SQL } from 'drizzle-orm';
import type { Pool } from 'pg';

import { createDb, getPool, type Database } from '../db/client.js';
import {
  entryApplications,
  entryPools,
  matches,
  participants,
  seasonEnrollments,
  seasonStandings,
  seasons,
  sessionMembers,
  sessionStats,
  sessions,
  settlementEntries,
} from '../db/schema.js';
import type {
  EntryApplicationRecord,
  EntryPoolRecord,
  LeagueStore,
  LeagueTransaction,
  MatchRecord,
  ParticipantRecord,
  SeasonRecord,
  SeasonStandingRecord,
  SessionMemberRecord,
  SessionRecord,
  SettlementEntryQuery,
  SettlementEntryRecord,
} from './types.js';
import { PENDING_ROOM_LABEL } from './types.js';

type Tx = Parameters<Parameters<Database['transaction']>[0]>[0];

type MatchRow = typeof matches.$inferSelect;

const toMatch = ({ matchIndex, ...row }: MatchRow): MatchRecord => ({ ...row, index: matchIndex });

const toSeason = (row: typeof seasons.$inferSelect): SeasonRecord => ({ ...row });
const toPool = (row: typeof entryPools.$inferSelect): EntryPoolRecord => ({ ...row });
const toSession = (row: typeof sessions.$inferSelect): SessionRecord => ({ ...row });
const toParticipant = (row: typeof participants.$inferSelect): ParticipantRecord => ({ ...row });

const expectRow = <T>(rows: T[], label: string): T => {
  const row = rows.at(0);
  if (row === undefined) {
    throw new Error(`${label} does not exist`);
  }
  return row;
};

const entryFilter = (query: SettlementEntryQuery): SQL | undefined => {
  const filters: SQL[] = [eq(settlementEntries.seasonId, query.seasonId)];
  if (query.sessionId !== undefined) filters.push(eq(settlementEntries.sessionId, query.sessionId));
  if (query.participantIds !== undefined) filters.push(inArray(settlementEntries.participantId, query.participantIds));
  return and(...filters);
};

const createPostgresTransaction = (tx: Tx): LeagueTransaction => ({
  seasons: {
    async create(input) {
      const rows = await tx
        .insert(seasons)
        .values({ seasonId: randomUUID(), isActive: true, ...input })
        .returning();
      return toSeason(expectRow(rows, 'season'));
    },
    async get(seasonId) {
      const rows = await tx.select().from(seasons).where(eq(seasons.seasonId, seasonId)).limit(1);
      const row = rows.at(0);
      return row ? toSeason(row) : null;
    },
    async getByName(name) {
      const rows = await tx.select().from(seasons).where(eq(seasons.name, name)).limit(1);
      const row = rows.at(0);
      return row ? toSeason(row) : null;
    },
    async findActive() {
      const rows = await tx
        .select()
        .from(seasons)
        .where(eq(seasons.isActive, true))
        .orderBy(asc(seasons.createdAt))
        .limit(1);
      const row = rows.at(0);
      return row ? toSeason(row) : null;
    },
    async deactivateAll() {
      await tx.update(seasons).set({ isActive: false }).where(eq(seasons.isActive, true));
    },
    async enroll(record) {
      const rows = await tx
        .insert(seasonEnrollments)
        .values(record)
        .onConflictDoNothing({ target: [seasonEnrollments.seasonId, seasonEnrollments.participantId] })
        .returning({ participantId: seasonEnrollments.participantId });
      return rows.length > 0;
    },
    async isEnrolled(seasonId, participantId) {
      const rows = await tx
        .select({ participantId: seasonEnrollments.participantId })
        .from(seasonEnrollments)
        .where(and(eq(seasonEnrollments.seasonId, seasonId), eq(seasonEnrollments.participantId, participantId)))
        .limit(1);
      return rows.length > 0;
    },
  },

  participants: {
    async create(input) {
      const rows = await tx
        .insert(participants)
        .values({ participantId: randomUUID(), priority: 0, ...input })
        .returning();
      return toParticipant(expectRow(rows, 'participant'));
    },
    async get(participantId) {
      const rows = await tx
        .select()
        .from(participants)
        .where(eq(participants.participantId, participantId))
        .limit(1);
      const row = rows.at(0);
      return row ? toParticipant(row) : null;
    },
    async getMany(participantIds) {
      const found = new Map<string, ParticipantRecord>();
      if (!participantIds.length) return found;
      const rows = await tx.select().from(participants).where(inArray(participants.participantId, participantIds));
      for (const row of rows) found.set(row.participantId, toParticipant(row));
      return found;
    },
    async setPriority(participantId, priority) {
      await tx.update(participants).set({ priority }).where(eq(participants.participantId, participantId));
    },
    async incrementPriority(participantId) {
      const rows = await tx
        .update(participants)
        .set({ priority: sql`${participants.priority} + 1` })
        .where(eq(participants.participantId, participantId))
        .returning({ priority: participants.priority });
      return expectRow(rows, `participant ${participantId}`).priority;
    },
  },

  pools: {
    async create(input) {
      const rows = await tx
        .insert(entryPools)
        .values({ poolId: randomUUID(), status: 'open', closedAt: null, ...input })
        .returning();
      return toPool(expectRow(rows, 'pool'));
    },
    async get(poolId) {
      const rows = await tx.select().from(entryPools).where(eq(entryPools.poolId, poolId)).limit(1);
      const row = rows.at(0);
      return row ? toPool(row) : null;
    },
    async find(seasonId, week) {
      const rows = await tx
        .select()
        .from(entryPools)
        .where(and(eq(entryPools.seasonId, seasonId), eq(entryPools.week, week)))
        .limit(1);
      const row = rows.at(0);
      return row ? toPool(row) : null;
    },
    async setStatus(poolId, status, at) {
      const rows = await tx
        .update(entryPools)
        .set({ status, closedAt: status === 'open' ? null : at })
        .where(eq(entryPools.poolId, poolId))
        .returning();
      return toPool(expectRow(rows, `pool ${poolId}`));
    },
    async getApplication(poolId, participantId) {
      const rows = await tx
        .select()
        .from(entryApplications)
        .where(and(eq(entryApplications.poolId, poolId), eq(entryApplications.participantId, participantId)))
        .limit(1);
      const row = rows.at(0);
      return row ? { ...row } : null;
    },
    async saveApplication(record: EntryApplicationRecord) {
      await tx
        .insert(entryApplications)
        .values(record)
        .onConflictDoUpdate({
          target: [entryApplications.poolId, entryApplications.participantId],
          set: { status: record.status, submittedAt: record.submittedAt, updatedAt: record.updatedAt },
        });
    },
    async listApplications(poolId) {
      const rows = await tx
        .select()
        .from(entryApplications)
        .where(eq(entryApplications.poolId, poolId))
        .orderBy(asc(entryApplications.submittedAt), asc(entryApplications.participantId));
      return rows.map((row) => ({ ...row }));
    },
  },

  sessions: {
    async create(input) {
      const rows = await tx
        .insert(sessions)
        .values({ sessionId: randomUUID(), startedAt: null, finishedAt: null, finishReason: null, ...input })
        .returning();
      return toSession(expectRow(rows, 'session'));
    },
    async get(sessionId) {
      const rows = await tx.select().from(sessions).where(eq(sessions.sessionId, sessionId)).limit(1);
      const row = rows.at(0);
      return row ? toSession(row) : null;
    },
    async findPlaceholder(poolId) {
      const rows = await tx
        .select()
        .from(sessions)
        .where(and(eq(sessions.poolId, poolId), eq(sessions.roomLabel, PENDING_ROOM_LABEL)))
        .limit(1);
      const row = rows.at(0);
      return row ? toSession(row) : null;
    },
    async listBySeason(seasonId) {
      const rows = await tx
        .select()
        .from(sessions)
        .where(eq(sessions.seasonId, seasonId))
        .orderBy(asc(sessions.scheduledAt), asc(sessions.sessionId));
      return rows.map(toSession);
    },
    async update(sessionId, input) {
      const rows = await tx.update(sessions).set(input).where(eq(sessions.sessionId, sessionId)).returning();
      return toSession(expectRow(rows, `session ${sessionId}`));
    },
    async listMembers(sessionId) {
      const rows = await tx
        .select()
        .from(sessionMembers)
        .where(eq(sessionMembers.sessionId, sessionId))
        .orderBy(asc(sessionMembers.seat));
      return rows.map((row): SessionMemberRecord => ({ ...row }));
    },
    async saveMember(record) {
      await tx
        .insert(sessionMembers)
        .values(record)
        .onConflictDoUpdate({
          target: [sessionMembers.sessionId, sessionMembers.participantId],
          set: { seat: record.seat, status: record.status, joinedAt: record.joinedAt },
        });
    },
  },

  matches: {
    async create({ index, ...input }) {
      const rows = await tx
        .insert(matches)
        .values({ matchId: randomUUID(), matchIndex: index, winner: null, stage: '', decidedAt: null, ...input })
        .returning();
      return toMatch(expectRow(rows, 'match'));
    },
    async listBySession(sessionId) {
      const rows = await tx
        .select()
        .from(matches)
        .where(eq(matches.sessionId, sessionId))
        .orderBy(asc(matches.matchIndex));
      return rows.map(toMatch);
    },
    async update(matchId, input) {
      const rows = await tx.update(matches).set(input).where(eq(matches.matchId, matchId)).returning();
      return toMatch(expectRow(rows, `match ${matchId}`));
    },
    async delete(matchId) {
      await tx.delete(matches).where(eq(matches.matchId, matchId));
    },
  },

  stats: {
    async list(sessionId) {
      const rows = await tx
        .select()
        .from(sessionStats)
        .where(eq(sessionStats.sessionId, sessionId))
        .orderBy(asc(sessionStats.participantId));
      return rows.map((row) => ({ ...row }));
    },
    async save(record) {
      await tx
        .insert(sessionStats)
        .values(record)
        .onConflictDoUpdate({
          target: [sessionStats.sessionId, sessionStats.participantId],
          set: { wins: record.wins },
        });
    },
    async delete(sessionId, participantId) {
      await tx
        .delete(sessionStats)
        .where(and(eq(sessionStats.sessionId, sessionId), eq(sessionStats.participantId, participantId)));
    },
  },

  standings: {
    async get(seasonId, participantId) {
      const rows = await tx
        .select()
        .from(seasonStandings)
        .where(and(eq(seasonStandings.seasonId, seasonId), eq(seasonStandings.participantId, participantId)))
        .limit(1);
      const row = rows.at(0);
      return row ? { ...row } : null;
    },
    async listBySeason(seasonId) {
      const rows = await tx
        .select()
        .from(seasonStandings)
        .where(eq(seasonStandings.seasonId, seasonId))
        .orderBy(asc(seasonStandings.participantId));
      return rows.map((row): SeasonStandingRecord => ({ ...row }));
    },
    async save(record) {
      await tx
        .insert(seasonStandings)
        .values(record)
        .onConflictDoUpdate({
          target: [seasonStandings.seasonId, seasonStandings.participantId],
          set: {
            rating: record.rating,
            winPoints: record.winPoints,
            entryPoints: record.entryPoints,
            updatedAt: record.updatedAt,
          },
        });
    },
    async listEntries(query) {
      if (query.participantIds !== undefined && !query.participantIds.length) return [];
      const rows = await tx
        .select()
        .from(settlementEntries)
        .where(entryFilter(query))
        .orderBy(asc(settlementEntries.sessionId), asc(settlementEntries.participantId));
      return rows.map((row): SettlementEntryRecord => ({ ...row }));
    },
    async insertEntries(records) {
      if (!records.length) return;
      await tx.insert(settlementEntries).values(records);
    },
    async deleteEntries(query) {
      const rows = await tx
        .delete(settlementEntries)
        .where(entryFilter(query))
        .returning({ participantId: settlementEntries.participantId });
      return rows.length;
    },
  },
});

/**
 * League persistence over node-postgres. Each transaction takes a
 * transaction-scoped advisory lock per scope key, in sorted order, before any
 * work runs.
 */
export class PostgresStore implements LeagueStore {
  private readonly db: Database;

  constructor(private readonly pool: Pool = getPool()) {
    this.db = createDb(pool);
  }

  transaction<T>(scopes: string[], work: (tx: LeagueTransaction) => Promise<T>): Promise<T> {
    const keys = [...new Set(scopes)].sort();
    return this.db.transaction(async (tx) => {
      for (const key of keys) {
        await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`);
      }
      return work(createPostgresTransaction(tx));
    });
  }

  async close() {
    await this.pool.end();
  }
}
