import type { Express } from 'express';
import { z } from 'zod';

import type { League } from '../league/index.js';
import {
  sendFailure,
  toApplicationResponse,
  toPoolResponse,
  toScheduledRoomResponse,
  toSessionResponse,
} from './helpers/responders.js';

const PoolOpenSchema = z.object({
  week: z.number().int().min(1),
});

const ApplicationSchema = z.object({
  participant_id: z.string().min(1),
});

export const registerPoolRoutes = (app: Express, league: League) => {
  app.post('/v1/seasons/:seasonId/pools', async (req, res) => {
    const parsed = PoolOpenSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const result = await league.entries.open(req.params.seasonId, parsed.data.week);
      if (!result.ok) return sendFailure(res, result.error);
      const { pool, placeholder, created } = result.value;
      return res.status(created ? 201 : 200).send({
        pool: toPoolResponse(pool),
        placeholder: placeholder ? toSessionResponse(placeholder) : null,
        created,
      });
    } catch (err) {
      console.error('pool_open_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/pools/:poolId/applications', async (req, res) => {
    const parsed = ApplicationSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const result = await league.entries.apply(req.params.poolId, parsed.data.participant_id);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        application: toApplicationResponse(result.value.application),
        changed: result.value.changed,
        entry_points: result.value.entryPoints,
      });
    } catch (err) {
      console.error('pool_apply_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.delete('/v1/pools/:poolId/applications/:participantId', async (req, res) => {
    try {
      const result = await league.entries.withdraw(req.params.poolId, req.params.participantId);
      if (!result.ok) return sendFailure(res, result.error);
      return res.send({
        application: toApplicationResponse(result.value.application),
        changed: result.value.changed,
        entry_points: result.value.entryPoints,
      });
    } catch (err) {
      console.error('pool_withdraw_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });

  app.post('/v1/pools/:poolId/close', async (req, res) => {
    try {
      const result = await league.entries.close(req.params.poolId);
      if (!result.ok) return sendFailure(res, result.error);
      const { pool, admitted, deferred, rooms } = result.value;
      return res.send({
        pool: toPoolResponse(pool),
        admitted,
        deferred,
        rooms: rooms.map(toScheduledRoomResponse),
      });
    } catch (err) {
      console.error('pool_close_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });
};
