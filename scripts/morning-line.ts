#!/usr/bin/env tsx
/**
 * TROTLINE - Morning Line
 *
 * Prints win probabilities and odds for one upcoming race card, priced
 * from the ratings in the database.
 *
 * Usage:
 *   npx tsx scripts/morning-line.ts <card.json> [asOf YYYY-MM-DD]
 *   npm run morning-line -- data/sample-card.json
 *
 * The card is a single race record; finishing positions are ignored.
 */

import 'dotenv/config';

import { loadConfig, formatIssues } from '../src/config';
import { SqliteRatingStore } from '../src/db/sqlite-store';
import { MorningLineService } from '../src/odds/morning-line';
import { formatDecimalOdds, formatOddsAgainst } from '../src/odds/odds';
import { RaceSchema } from '../src/races/schemas';
import { c, displayName, formatDate, pad, padLeft, readJsonFile, usage } from './lib/cli';

async function main(): Promise<void> {
  const [file, asOfArg] = process.argv.slice(2);
  if (!file) {
    usage(['Usage: tsx scripts/morning-line.ts <card.json> [asOf YYYY-MM-DD]']);
  }

  const parsed = RaceSchema.safeParse(readJsonFile(file));
  if (!parsed.success) {
    throw new Error(`${file} is not a valid race card: ${formatIssues(parsed.error)}`);
  }
  const card = parsed.data;

  const asOf = asOfArg ? new Date(asOfArg) : card.raceDate;
  if (Number.isNaN(asOf.getTime())) {
    throw new Error(`"${asOfArg}" is not a date`);
  }

  const config = loadConfig();
  const store = new SqliteRatingStore(config.dbPath);

  try {
    const service = new MorningLineService(store, config);
    const line = await service.build(card, asOf);

    console.log('');
    console.log(
      c('bold', `${card.venue} Race ${card.raceNumber}`) +
        c('gray', ` | ${formatDate(card.raceDate)} | ${card.discipline}` +
          (card.raceClass ? ` | ${card.raceClass}` : '')),
    );
    console.log(
      c('dim', `  ${pad('Horse', 24)} ${pad('Driver', 20)} ${padLeft('Fused', 7)} ${padLeft('Win %', 7)} ${padLeft('Odds', 7)} ${padLeft('ML', 6)}`),
    );

    line.forEach((entry, index) => {
      const name = displayName(entry.name);
      const driver = entry.driverName ? displayName(entry.driverName) : '-';
      const row =
        `  ${pad(name, 24)} ${pad(driver, 20)} ${padLeft(entry.fusedMu.toFixed(0), 7)} ` +
        `${padLeft((entry.winProbability * 100).toFixed(1), 7)} ` +
        `${padLeft(formatDecimalOdds(entry.decimalOdds), 7)} ${padLeft(formatOddsAgainst(entry.decimalOdds), 6)}`;
      console.log(index === 0 ? c('brightGreen', row) : row);
    });
    console.log('');
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error(c('red', `Morning line failed: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
