import dotenv from 'dotenv';
import { z } from 'zod';

import { validateSeasonConfig } from './league/seasons.js';
import { P } from './engine/params.js';

dotenv.config();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(8080),
  DATABASE_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  LEAGUE_ROOM_CAPACITY: positiveInt(P.defaults.roomCapacity),
  LEAGUE_WIN_THRESHOLD: positiveInt(P.defaults.winThreshold),
  DB_MIGRATE_RETRIES: positiveInt(10),
  DB_MIGRATE_RETRY_DELAY_MS: positiveInt(5_000),
});

export interface ServiceConfig {
  port: number;
  databaseUrl: string | undefined;
  seasonDefaults: { roomCapacity: number; winThreshold: number };
  migrate: { retries: number; retryDelayMs: number };
}

export class ConfigError extends Error {
  constructor(message: string, public readonly details: Record<string, string[] | undefined>) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', parsed.error.flatten().fieldErrors);
  }

  const { data } = parsed;
  try {
    validateSeasonConfig(data.LEAGUE_ROOM_CAPACITY, data.LEAGUE_WIN_THRESHOLD);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), {
      LEAGUE_ROOM_CAPACITY: [String(data.LEAGUE_ROOM_CAPACITY)],
    });
  }

  return {
    port: data.PORT,
    databaseUrl: data.DATABASE_URL,
    seasonDefaults: { roomCapacity: data.LEAGUE_ROOM_CAPACITY, winThreshold: data.LEAGUE_WIN_THRESHOLD },
    migrate: { retries: data.DB_MIGRATE_RETRIES, retryDelayMs: data.DB_MIGRATE_RETRY_DELAY_MS },
  };
};
