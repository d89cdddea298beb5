import {
  pgTable,
  text,
  timestamp,
  integer,
  boolean,
  doublePrecision,
  primaryKey,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

export const seasons = pgTable('seasons', {
  seasonId: text('season_id').primaryKey(),
  name: text('name').notNull().unique(),
  startsAt: timestamp('starts_at', { withTimezone: true }).notNull(),
  endsAt: timestamp('ends_at', { withTimezone: true }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
  roomCapacity: integer('room_capacity').notNull(),
  winThreshold: integer('win_threshold').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const participants = pgTable('participants', {
  participantId: text('participant_id').primaryKey(),
  displayName: text('display_name').notNull(),
  experience: doublePrecision('experience').notNull(),
  priority: integer('priority').notNull().default(0),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const seasonEnrollments = pgTable('season_enrollments', {
  seasonId: text('season_id').references(() => seasons.seasonId, {
    onDelete: 'cascade',
  }).notNull(),
  participantId: text('participant_id').references(() => participants.participantId, {
    onDelete: 'cascade',
  }).notNull(),
  joinedAt: timestamp('joined_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.seasonId, table.participantId] }),
}));

export const entryPools = pgTable('entry_pools', {
  poolId: text('pool_id').primaryKey(),
  seasonId: text('season_id').references(() => seasons.seasonId, {
    onDelete: 'cascade',
  }).notNull(),
  week: integer('week').notNull(),
  status: text('status', { enum: ['open', 'closed', 'canceled'] }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  closedAt: timestamp('closed_at', { withTimezone: true }),
}, (table) => ({
  seasonWeekIdx: uniqueIndex('entry_pools_season_week_idx').on(table.seasonId, table.week),
}));

export const entryApplications = pgTable('entry_applications', {
  poolId: text('pool_id').references(() => entryPools.poolId, {
    onDelete: 'cascade',
  }).notNull(),
  participantId: text('participant_id').references(() => participants.participantId, {
    onDelete: 'cascade',
  }).notNull(),
  status: text('status', { enum: ['confirmed', 'canceled'] }).notNull(),
  submittedAt: timestamp('submitted_at', { withTimezone: true }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.poolId, table.participantId] }),
}));

export const sessions = pgTable('sessions', {
  sessionId: text('session_id').primaryKey(),
  seasonId: text('season_id').references(() => seasons.seasonId, {
    onDelete: 'cascade',
  }).notNull(),
  poolId: text('pool_id').references(() => entryPools.poolId, {
    onDelete: 'set null',
  }),
  week: integer('week').notNull(),
  roomLabel: text('room_label').notNull(),
  capacity: integer('capacity').notNull(),
  status: text('status', { enum: ['pending', 'scheduled', 'live', 'canceled', 'finished'] }).notNull(),
  scheduledAt: timestamp('scheduled_at', { withTimezone: true }).notNull(),
  startedAt: timestamp('started_at', { withTimezone: true }),
  finishedAt: timestamp('finished_at', { withTimezone: true }),
  finishReason: text('finish_reason', { enum: ['threshold', 'manual'] }),
}, (table) => ({
  seasonScheduleIdx: index('sessions_season_schedule_idx').on(table.seasonId, table.scheduledAt),
  poolIdx: index('sessions_pool_idx').on(table.poolId),
}));

export const sessionMembers = pgTable('session_members', {
  sessionId: text('session_id').references(() => sessions.sessionId, {
    onDelete: 'cascade',
  }).notNull(),
  participantId: text('participant_id').references(() => participants.participantId, {
    onDelete: 'cascade',
  }).notNull(),
  seat: integer('seat').notNull(),
  status: text('status', { enum: ['confirmed', 'withdrawn'] }).notNull(),
  joinedAt: timestamp('joined_at', { withTimezone: true }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.sessionId, table.participantId] }),
}));

export const matches = pgTable('matches', {
  matchId: text('match_id').primaryKey(),
  sessionId: text('session_id').references(() => sessions.sessionId, {
    onDelete: 'cascade',
  }).notNull(),
  matchIndex: integer('match_index').notNull(),
  teamA: text('team_a').array().notNull(),
  teamB: text('team_b').array().notNull(),
  winner: text('winner', { enum: ['A', 'B'] }),
  stage: text('stage').notNull().default(''),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  decidedAt: timestamp('decided_at', { withTimezone: true }),
}, (table) => ({
  sessionIndexIdx: uniqueIndex('matches_session_index_idx').on(table.sessionId, table.matchIndex),
}));

export const sessionStats = pgTable('session_stats', {
  sessionId: text('session_id').references(() => sessions.sessionId, {
    onDelete: 'cascade',
  }).notNull(),
  participantId: text('participant_id').references(() => participants.participantId, {
    onDelete: 'cascade',
  }).notNull(),
  wins: integer('wins').notNull().default(0),
}, (table) => ({
  pk: primaryKey({ columns: [table.sessionId, table.participantId] }),
}));

export const seasonStandings = pgTable('season_standings', {
  seasonId: text('season_id').references(() => seasons.seasonId, {
    onDelete: 'cascade',
  }).notNull(),
  participantId: text('participant_id').references(() => participants.participantId, {
    onDelete: 'cascade',
  }).notNull(),
  seedRating: doublePrecision('seed_rating').notNull(),
  rating: doublePrecision('rating').notNull(),
  winPoints: integer('win_points').notNull().default(0),
  entryPoints: doublePrecision('entry_points').notNull().default(0),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.seasonId, table.participantId] }),
}));

export const settlementEntries = pgTable('settlement_entries', {
  seasonId: text('season_id').references(() => seasons.seasonId, {
    onDelete: 'cascade',
  }).notNull(),
  sessionId: text('session_id').references(() => sessions.sessionId, {
    onDelete: 'cascade',
  }).notNull(),
  participantId: text('participant_id').references(() => participants.participantId, {
    onDelete: 'cascade',
  }).notNull(),
  winDelta: integer('win_delta').notNull(),
  rateDelta: doublePrecision('rate_delta').notNull(),
  calculatedAt: timestamp('calculated_at', { withTimezone: true }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.seasonId, table.sessionId, table.participantId] }),
  participantIdx: index('settlement_entries_participant_idx').on(table.seasonId, table.participantId),
}));
