#!/usr/bin/env tsx
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from '../src/config.js';
import { createLeague, type League, type RecomputeReport } from '../src/league/index.js';
import { getStore } from '../src/store/index.js';

const printReport = (report: RecomputeReport) => {
  console.log(
    `Recomputed season ${report.seasonId}: ${report.sessionsReplayed} session(s) replayed, ${report.standingsReset} standing(s) reset, ${report.entriesWritten} entr${report.entriesWritten === 1 ? 'y' : 'ies'} written.`
  );
  console.log(`- replay window: from=${report.replayFrom ?? 'n/a'} to=${report.replayTo ?? 'n/a'}`);
  if (report.driftedSessionIds.length) {
    console.warn(
      `- ${report.driftedSessionIds.length} session(s) had win counters out of line with their match history: ${report.driftedSessionIds.join(', ')}`
    );
  }
};

const recompute = async (league: League, seasonId: string) => {
  const result = await league.ledger.recomputeSeason(seasonId);
  if (!result.ok) {
    console.error('recompute_failed', { seasonId, code: result.error.code, message: result.error.message });
    process.exitCode = 1;
    return;
  }
  printReport(result.value);
};

const config = loadConfig();
const store = getStore(config.databaseUrl);
const league = createLeague(store, { defaults: config.seasonDefaults });

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('recompute')
    .command(
      'season <seasonId>',
      'Rebuild the ratings and win points of one season from its match history',
      (cmd) =>
        cmd.positional('seasonId', {
          type: 'string',
          describe: 'Season identifier',
          demandOption: true,
        }),
      (argv) => recompute(league, argv.seasonId)
    )
    .command(
      'active',
      'Rebuild the active season',
      (cmd) => cmd,
      async () => {
        const active = await league.seasons.findActiveSeason();
        if (!active.ok) {
          console.error('recompute_failed', { code: active.error.code, message: active.error.message });
          process.exitCode = 1;
          return;
        }
        await recompute(league, active.value.seasonId);
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error('recompute_error', err);
    process.exitCode = 1;
  })
  .finally(async () => {
    try {
      await store.close();
    } catch (err) {
      console.error('store_close_error', err);
    }
  });
