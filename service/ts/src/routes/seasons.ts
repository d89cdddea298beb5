import type { Express } from 'express';
import { z } from 'zod';

import type { League } from '../league/index.js';
import {
  sendFailure,
  toParticipantResponse,
  toRecomputeResponse,
  toSeasonResponse,
  toStandingResponse,
} from './helpers/responders.js';

const SeasonCreateSchema = z
  .object({
    name: z.string().trim().min(1),
    room_capacity: z.number().int().optional(),
    win_threshold: z.number().int().optional(),
    starts_at: z.string().datetime().optional(),
    ends_at: z.string().datetime().optional(),
  })
  .strict();

const ParticipantCreateSchema = z
  .object({
    display_name: z.string().trim().min(1),
    experience: z.number().finite().optional(),
  })
  .strict();

const EnrollmentSchema = z.object({
  participant_id: z.string().min(1),
});

const StandingsQuerySchema = z.object({
  season: z.string().trim().min(1).optional(),
});

const parseDate = (value?: string) => (value ? new Date(value) : undefined);

export const registerSeasonRoutes = (app: Express, league: League) => {
  app.post('/v1/seasons', async (req, res) => {
    const parsed = SeasonCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const result = await league.seasons.createSeason({
        name: parsed.data.name,
        roomCapacity: parsed.data.room_capacity,
        winThreshold: parsed.data.win_threshold,
        startsAt: parseDate(parsed.data.starts_at),
        endsAt: parseDate(parsed.data.ends_at),
      });
      if (!result.ok) return sendFailure(res, result.error);
      return res.status(201).send(toSeasonResponse(result.value));
    } catch (err) {
      console.error('season_create_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.get('/v1/seasons/active', async (_req, res) => {
    try {
      const result = await league.seasons.findActiveSeason();
      if (!result.ok) return sendFailure(res, result.error);
      return res.send(toSeasonResponse(result.value));
    } catch (err) {
      console.error('season_active_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  // Leaderboard by season name; without one it shows the active season.
  app.get('/v1/standings', async (req, res) => {
    const parsed = StandingsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const located = parsed.data.season
        ? await league.seasons.findSeasonByName(parsed.data.season)
        : await league.seasons.findActiveSeason();
      if (!located.ok) return sendFailure(res, located.error);

      const result = await league.ledger.standings(located.value.seasonId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        season_id: located.value.seasonId,
        season_name: located.value.name,
        standings: result.value.map(toStandingResponse),
      });
    } catch (err) {
      console.error('standings_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.get('/v1/seasons/:seasonId', async (req, res) => {
    try {
      const result = await league.seasons.getSeason(req.params.seasonId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send(toSeasonResponse(result.value));
    } catch (err) {
      console.error('season_get_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.get('/v1/seasons/:seasonId/standings', async (req, res) => {
    try {
      const result = await league.ledger.standings(req.params.seasonId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        season_id: req.params.seasonId,
        standings: result.value.map(toStandingResponse),
      });
    } catch (err) {
      console.error('standings_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/seasons/:seasonId/recompute', async (req, res) => {
    try {
      const result = await league.ledger.recomputeSeason(req.params.seasonId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send(toRecomputeResponse(result.value));
    } catch (err) {
      console.error('season_recompute_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/seasons/:seasonId/enrollments', async (req, res) => {
    const parsed = EnrollmentSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const result = await league.seasons.enroll(req.params.seasonId, parsed.data.participant_id);
      if (!result.ok) return sendFailure(res, result.error);
      const { enrollment, created, seedRating } = result.value;
      return res.status(created ? 201 : 200).send({
        season_id: enrollment.seasonId,
        participant_id: enrollment.participantId,
        created,
        seed_rating: seedRating,
      });
    } catch (err) {
      console.error('enrollment_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/participants', async (req, res) => {
    const parsed = ParticipantCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const result = await league.seasons.registerParticipant({
        displayName: parsed.data.display_name,
        experience: parsed.data.experience,
      });
      if (!result.ok) return sendFailure(res, result.error);
      return res.status(201).send(toParticipantResponse(result.value));
    } catch (err) {
      console.error('participant_create_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.get('/v1/participants/:participantId', async (req, res) => {
    try {
      const result = await league.seasons.getParticipant(req.params.participantId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send(toParticipantResponse(result.value));
    } catch (err) {
      console.error('participant_get_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });
};
