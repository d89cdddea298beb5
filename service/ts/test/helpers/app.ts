import { createApp } from '../../src/app.js';
import { MemoryStore } from '../../src/store/memory.js';
import type { LeagueOptions } from '../../src/league/index.js';
import { steppingClock } from './league.js';

export const createTestApp = (options: LeagueOptions = {}) => {
  const store = new MemoryStore();
  const app = createApp(store, { clock: steppingClock(), ...options });
  return { app, store };
};
