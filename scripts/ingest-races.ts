#!/usr/bin/env tsx
/**
 * TROTLINE - Race Ingest
 *
 * Applies a JSON file of finished races (an array of race records, as the
 * card/result extraction step writes them) to the rating database and
 * prints what happened to each race. With --dry-run every race is rated
 * and reported but nothing is written.
 *
 * Usage:
 *   npx tsx scripts/ingest-races.ts [--dry-run] <races.json>
 *   npm run ingest -- data/sample-races.json
 *   npm run ingest -- --dry-run data/sample-races.json
 *
 * Environment variables (optional): see .env.example.
 * Exits with 1 when a race was invalid or failed outright.
 */

import 'dotenv/config';

import { loadConfig } from '../src/config';
import { SqliteRatingStore } from '../src/db/sqlite-store';
import { RatingEngine, RACE_STATUSES, type RaceStatus } from '../src/ranking/engine';
import { C, c, pad, readJsonFile, usage } from './lib/cli';

const STATUS_COLOR: Record<RaceStatus, keyof typeof C> = {
  applied: 'green',
  partial: 'yellow',
  refreshed: 'cyan',
  skipped: 'gray',
  duplicate: 'gray',
  rejected: 'yellow',
  invalid: 'red',
  failed: 'red',
};

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const [file] = args.filter((a) => a !== '--dry-run');
  if (!file) {
    usage(['Usage: tsx scripts/ingest-races.ts [--dry-run] <races.json>']);
  }

  const input = readJsonFile(file);
  if (!Array.isArray(input)) {
    throw new Error(`${file} must contain an array of races`);
  }

  const config = loadConfig();
  const store = new SqliteRatingStore(config.dbPath);

  try {
    const engine = new RatingEngine(store, config);
    const summary = await engine.ingestRaces(input, { dryRun });

    console.log('');
    console.log(
      summary.dryRun
        ? c('bold', `Dry run: ${summary.total} races checked, nothing written to ${config.dbPath}`)
        : c('bold', `Ingested ${summary.total} races into ${config.dbPath}`),
    );
    for (const result of summary.results) {
      const status = c(STATUS_COLOR[result.status], pad(result.status, 10));
      const counts = `${result.updated.horse}h ${result.updated.driver}d ${result.updated.trainer}t`;
      const detail = result.reason ? c('dim', ` ${result.reason}`) : '';
      console.log(`  ${status} ${pad(result.race, 32)} ${c('gray', counts)}${detail}`);
      for (const failure of result.failedClasses) {
        console.log(c('red', `      ${failure.entityClass}: ${failure.message}`));
      }
    }

    console.log('');
    console.log(
      RACE_STATUSES.filter((s) => summary.counts[s] > 0)
        .map((s) => c(STATUS_COLOR[s], `${summary.counts[s]} ${s}`))
        .join(c('gray', ' | ')),
    );

    if (summary.counts.invalid > 0 || summary.counts.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error(c('red', `Ingest failed: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
