import type { Express, Response } from 'express';
import { z } from 'zod';

import type { League, LeagueResult, SessionDetail } from '../league/index.js';
import {
  sendFailure,
  toMatchResponse,
  toMemberResponse,
  toParticipantResponse,
  toRollbackResponse,
  toSessionDetailResponse,
  toSessionResponse,
  toSettlementResponse,
} from './helpers/responders.js';

const WinnerSchema = z.enum(['A', 'B']);

const ResultSubmitSchema = z
  .object({
    winner: WinnerSchema,
    match: z.union([z.literal('open'), z.number().int().min(1)]).default('open'),
    stage: z.string().max(64).default(''),
  })
  .strict();

const ResultCorrectSchema = z
  .object({
    winner: WinnerSchema,
    stage: z.string().max(64).optional(),
  })
  .strict();

const MatchIndexSchema = z.coerce.number().int().min(1);

const MemberSchema = z.object({
  participant_id: z.string().min(1),
});

/** Resolves the session first so ledger routes can name its season. */
const withSession = async (
  league: League,
  res: Response,
  sessionId: string,
  work: (detail: SessionDetail) => Promise<unknown>
) => {
  const located: LeagueResult<SessionDetail> = await league.sessions.getSession(sessionId);
  if (!located.ok) return sendFailure(res, located.error);
  return work(located.value);
};

export const registerSessionRoutes = (app: Express, league: League) => {
  app.get('/v1/sessions/:sessionId', async (req, res) => {
    try {
      const result = await league.sessions.getSession(req.params.sessionId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send(toSessionDetailResponse(result.value));
    } catch (err) {
      console.error('session_get_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/start', async (req, res) => {
    try {
      const result = await league.sessions.start(req.params.sessionId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        status: result.value.status,
        message: result.value.message,
        session: toSessionResponse(result.value.session),
      });
    } catch (err) {
      console.error('session_start_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/matches', async (req, res) => {
    try {
      const result = await league.sessions.createNextMatch(req.params.sessionId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.status(201).send(toMatchResponse(result.value));
    } catch (err) {
      console.error('match_create_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/results', async (req, res) => {
    const parsed = ResultSubmitSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const { winner, match, stage } = parsed.data;
      const result = await league.sessions.recordOutcome(req.params.sessionId, match, winner, stage);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        session: toSessionResponse(result.value.session),
        match: toMatchResponse(result.value.match),
        finished: result.value.finished,
        next_match: toMatchResponse(result.value.nextMatch),
        settlement: toSettlementResponse(result.value.settlement),
      });
    } catch (err) {
      console.error('result_record_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.put('/v1/sessions/:sessionId/matches/:matchIndex/result', async (req, res) => {
    const index = MatchIndexSchema.safeParse(req.params.matchIndex);
    const parsed = ResultCorrectSchema.safeParse(req.body);
    if (!index.success) {
      return res.status(400).send({ error: 'validation_error', details: index.error.flatten() });
    }
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const result = await league.sessions.correctOutcome(
        req.params.sessionId,
        index.data,
        parsed.data.winner,
        parsed.data.stage
      );
      if (!result.ok) return sendFailure(res, result.error);
      const outcome = result.value;
      return res.send({
        session: toSessionResponse(outcome.session),
        match: toMatchResponse(outcome.match),
        previous_winner: outcome.previousWinner,
        changed: outcome.changed,
        reopened: outcome.reopened,
        finished: outcome.finished,
        next_match: toMatchResponse(outcome.nextMatch),
        settlement: toSettlementResponse(outcome.settlement),
        rollback: toRollbackResponse(outcome.rollback),
      });
    } catch (err) {
      console.error('result_correct_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/undo', async (req, res) => {
    try {
      const result = await league.sessions.undoLastOutcome(req.params.sessionId);
      if (!result.ok) return sendFailure(res, result.error);
      const outcome = result.value;
      return res.send({
        session: toSessionResponse(outcome.session),
        match: toMatchResponse(outcome.match),
        discarded_match_indexes: outcome.discardedMatchIndexes,
        reopened: outcome.reopened,
        finished: outcome.finished,
        rollback: toRollbackResponse(outcome.rollback),
      });
    } catch (err) {
      console.error('result_undo_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/finish', async (req, res) => {
    try {
      const result = await league.sessions.finish(req.params.sessionId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        session: toSessionResponse(result.value.session),
        settlement: toSettlementResponse(result.value.settlement),
        discarded_match_indexes: result.value.discardedMatchIndexes,
      });
    } catch (err) {
      console.error('session_finish_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/members', async (req, res) => {
    const parsed = MemberSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const result = await league.sessions.refill(req.params.sessionId, parsed.data.participant_id);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        session: toSessionResponse(result.value.session),
        member: toMemberResponse(result.value.member),
        open_seats: result.value.openSeats,
        match: toMatchResponse(result.value.match),
      });
    } catch (err) {
      console.error('session_refill_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.delete('/v1/sessions/:sessionId/members/:participantId', async (req, res) => {
    try {
      const result = await league.sessions.leave(req.params.sessionId, req.params.participantId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        session: toSessionResponse(result.value.session),
        participant_id: result.value.participantId,
        open_seats: result.value.openSeats,
        discarded_match_indexes: result.value.discardedMatchIndexes,
      });
    } catch (err) {
      console.error('session_leave_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/cancel-refill', async (req, res) => {
    try {
      const result = await league.sessions.cancelRefill(req.params.sessionId);
      if (!result.ok) return sendFailure(res, result.error);

      const bumped = await league.entries.bumpPriority(result.value.priorityBumpIds);
      if (!bumped.ok) return sendFailure(res, bumped.error);

      return res.send({
        session: toSessionResponse(result.value.session),
        priority_bumped: bumped.value.map(toParticipantResponse),
      });
    } catch (err) {
      console.error('session_cancel_refill_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/settle', async (req, res) => {
    try {
      return await withSession(league, res, req.params.sessionId, async ({ session }) => {
        const result = await league.ledger.settle(session.seasonId, session.sessionId);
        if (!result.ok) return sendFailure(res, result.error);
        return res.send(toSettlementResponse(result.value));
      });
    } catch (err) {
      console.error('session_settle_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/sessions/:sessionId/rollback', async (req, res) => {
    try {
      return await withSession(league, res, req.params.sessionId, async ({ session }) => {
        const result = await league.ledger.rollback(session.seasonId, session.sessionId);
        if (!result.ok) return sendFailure(res, result.error);
        return res.send(toRollbackResponse(result.value));
      });
    } catch (err) {
      console.error('session_rollback_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });
};
