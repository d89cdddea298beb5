import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import { createLeague, type League, type LeagueOptions } from './league/index.js';
import type { LeagueStore } from './store/index.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerSeasonRoutes } from './routes/seasons.js';
import { registerPoolRoutes } from './routes/pools.js';
import { registerSessionRoutes } from './routes/sessions.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof SyntaxError) {
    return res.status(400).send({ error: 'invalid_json', message: err.message });
  }

  console.error('unhandled_error', err);
  return res.status(500).send({ error: 'internal_error', message: 'Unexpected error' });
};

export const createApp = (store: LeagueStore, options: LeagueOptions = {}): Express => {
  const league: League = createLeague(store, options);
  const app = express();
  app.use(express.json());

  registerHealthRoutes(app);
  registerSeasonRoutes(app, league);
  registerPoolRoutes(app, league);
  registerSessionRoutes(app, league);

  app.use(errorHandler);

  return app;
};
