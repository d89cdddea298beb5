import type { Response } from 'express';

import type {
  LeagueFailure,
  RecomputeReport,
  RollbackReport,
  ScheduledRoom,
  SessionDetail,
  SettlementReport,
  StandingEntry,
} from '../../league/index.js';
import type {
  EntryApplicationRecord,
  EntryPoolRecord,
  MatchRecord,
  ParticipantRecord,
  SeasonRecord,
  SessionMemberRecord,
  SessionRecord,
  SessionStatRecord,
} from '../../store/index.js';

const failureStatus = (error: LeagueFailure) => {
  switch (error.kind) {
    case 'not_found':
      return 404;
    case 'validation_error':
      return 400;
    default:
      return 409;
  }
};

const failureContext = (error: LeagueFailure): Record<string, unknown> => {
  switch (error.kind) {
    case 'not_found':
      return { entity: error.entity };
    case 'capacity_violation':
      return {
        ...(error.context.expected !== undefined ? { expected: error.context.expected } : {}),
        ...(error.context.actual !== undefined ? { actual: error.context.actual } : {}),
      };
    case 'stale_edit':
      return { blocking_session_ids: error.blockingSessionIds };
    default:
      return {};
  }
};

export const sendFailure = (res: Response, error: LeagueFailure) =>
  res.status(failureStatus(error)).send({
    error: error.code,
    kind: error.kind,
    message: error.message,
    ...failureContext(error),
  });

export const toSeasonResponse = (season: SeasonRecord) => ({
  season_id: season.seasonId,
  name: season.name,
  starts_at: season.startsAt,
  ends_at: season.endsAt,
  is_active: season.isActive,
  room_capacity: season.roomCapacity,
  win_threshold: season.winThreshold,
  created_at: season.createdAt,
});

export const toParticipantResponse = (participant: ParticipantRecord) => ({
  participant_id: participant.participantId,
  display_name: participant.displayName,
  experience: participant.experience,
  priority: participant.priority,
  created_at: participant.createdAt,
});

export const toPoolResponse = (pool: EntryPoolRecord) => ({
  pool_id: pool.poolId,
  season_id: pool.seasonId,
  week: pool.week,
  status: pool.status,
  created_at: pool.createdAt,
  closed_at: pool.closedAt,
});

export const toApplicationResponse = (application: EntryApplicationRecord) => ({
  pool_id: application.poolId,
  participant_id: application.participantId,
  status: application.status,
  submitted_at: application.submittedAt,
  updated_at: application.updatedAt,
});

export const toSessionResponse = (session: SessionRecord) => ({
  session_id: session.sessionId,
  season_id: session.seasonId,
  pool_id: session.poolId,
  week: session.week,
  room_label: session.roomLabel,
  capacity: session.capacity,
  status: session.status,
  scheduled_at: session.scheduledAt,
  started_at: session.startedAt,
  finished_at: session.finishedAt,
  finish_reason: session.finishReason,
});

export const toMemberResponse = (member: SessionMemberRecord) => ({
  participant_id: member.participantId,
  seat: member.seat,
  status: member.status,
  joined_at: member.joinedAt,
});

export const toMatchResponse = (match: MatchRecord | null) =>
  match && {
    match_id: match.matchId,
    session_id: match.sessionId,
    index: match.index,
    team_a: match.teamA,
    team_b: match.teamB,
    winner: match.winner,
    stage: match.stage,
    created_at: match.createdAt,
    decided_at: match.decidedAt,
  };

const toStatResponse = (stat: SessionStatRecord) => ({
  participant_id: stat.participantId,
  wins: stat.wins,
});

export const toSessionDetailResponse = (detail: SessionDetail) => ({
  session: toSessionResponse(detail.session),
  members: detail.members.map(toMemberResponse),
  matches: detail.matches.map(toMatchResponse),
  stats: detail.stats.map(toStatResponse),
});

export const toSettlementResponse = (report: SettlementReport | null) =>
  report && {
    season_id: report.seasonId,
    session_id: report.sessionId,
    average_rating: report.averageRating,
    max_wins: report.maxWins,
    rolled_back: report.rolledBack,
    entries: report.entries.map((entry) => ({
      participant_id: entry.participantId,
      win_delta: entry.winDelta,
      rate_delta: entry.rateDelta,
      calculated_at: entry.calculatedAt,
    })),
  };

export const toRollbackResponse = (report: RollbackReport | null) =>
  report && {
    season_id: report.seasonId,
    session_id: report.sessionId,
    entries_removed: report.entriesRemoved,
    participants: report.participants,
  };

export const toRecomputeResponse = (report: RecomputeReport) => ({
  season_id: report.seasonId,
  sessions_replayed: report.sessionsReplayed,
  standings_reset: report.standingsReset,
  entries_written: report.entriesWritten,
  drifted_session_ids: report.driftedSessionIds,
  replay_from: report.replayFrom,
  replay_to: report.replayTo,
});

export const toStandingResponse = (entry: StandingEntry) => ({
  rank: entry.rank,
  participant_id: entry.participantId,
  display_name: entry.displayName,
  seed_rating: entry.seedRating,
  rating: entry.rating,
  win_points: entry.winPoints,
  entry_points: entry.entryPoints,
  total_points: entry.totalPoints,
});

export const toScheduledRoomResponse = (room: ScheduledRoom) => ({
  session: toSessionResponse(room.session),
  members: room.members,
  match: toMatchResponse(room.match),
});
