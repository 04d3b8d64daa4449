#!/usr/bin/env tsx
/**
 * TROTLINE - Entity Form
 *
 * Shows one horse, driver or trainer: current (decayed) rating and the
 * last few rated races with the rating change each caused. With --history,
 * every stored rating snapshot instead.
 *
 * Usage:
 *   npx tsx scripts/entity-form.ts [--history] <trot|pace> <horse|driver|trainer> <name...>
 *   npm run form -- pace driver "Ana Lindqvist"
 *   npm run form -- --history pace horse "Iron Creek"
 */

import 'dotenv/config';

import { loadConfig } from '../src/config';
import { SqliteRatingStore } from '../src/db/sqlite-store';
import type { HistoryRecord } from '../src/db/store';
import { DisciplineSchema, EntityClassSchema, normalizeName } from '../src/races/schemas';
import { RatingManager } from '../src/ranking/ratings';
import { conservativeRating } from '../src/ranking/trueskill';
import { c, displayName, formatDate, pad, padLeft, usage } from './lib/cli';

const FORM_LENGTH = 5;

function printHistory(history: HistoryRecord[]): void {
  console.log('');
  for (const entry of history) {
    const partner = entry.horseName ? c('gray', ` with ${displayName(entry.horseName)}`) : '';
    console.log(
      `  ${formatDate(entry.raceDate)} ${pad(`${entry.venue} R${entry.raceNumber}`, 20)} ` +
        `${padLeft(entry.finishPosition, 3)}  mu ${padLeft(entry.mu.toFixed(1), 7)}  ` +
        `sigma ${padLeft(entry.sigma.toFixed(1), 5)}${partner}`,
    );
  }
  console.log('');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const showHistory = args.includes('--history');
  const [disciplineArg, classArg, ...nameParts] = args.filter((a) => a !== '--history');
  const discipline = DisciplineSchema.safeParse(disciplineArg);
  const entityClass = EntityClassSchema.safeParse(classArg);
  const name = normalizeName(nameParts.join(' '));

  if (!discipline.success || !entityClass.success || name === '') {
    usage(['Usage: tsx scripts/entity-form.ts [--history] <trot|pace> <horse|driver|trainer> <name...>']);
  }

  const config = loadConfig();
  const store = new SqliteRatingStore(config.dbPath);

  try {
    const ratings = new RatingManager(store, config);
    const belief = await ratings.getBelief(discipline.data, entityClass.data, name);
    if (!belief) {
      console.log(c('yellow', `No ${discipline.data} ${entityClass.data} named "${displayName(name)}" on record.`));
      return;
    }

    console.log('');
    console.log(c('bold', `${displayName(name)} (${discipline.data} ${entityClass.data})`));
    console.log(
      `  mu ${belief.mu.toFixed(1)}` +
        (belief.mu !== belief.storedMu ? c('gray', ` (stored ${belief.storedMu.toFixed(1)})`) : '') +
        `  sigma ${belief.sigma.toFixed(1)}  conservative ${conservativeRating(belief).toFixed(1)}`,
    );
    console.log(
      c('gray', `  ${belief.racesCounted} rated races, last seen ${formatDate(belief.lastActive)}` +
        (belief.lastVenue ? ` at ${belief.lastVenue}` : '') +
        ` (${belief.daysInactive} days ago)`),
    );

    if (showHistory) {
      const history = await ratings.getHistory(discipline.data, entityClass.data, name);
      if (history.length === 0) {
        console.log(c('dim', '  No rated races yet.'));
        return;
      }
      printHistory(history);
      return;
    }

    const form = await ratings.getRecentForm(discipline.data, entityClass.data, name, FORM_LENGTH);
    if (form.length === 0) {
      console.log(c('dim', '  No rated races yet.'));
      return;
    }

    console.log('');
    for (const line of form) {
      const delta = line.delta >= 0 ? c('green', `+${line.delta.toFixed(1)}`) : c('red', line.delta.toFixed(1));
      const partner = line.horseName ? c('gray', ` with ${displayName(line.horseName)}`) : '';
      console.log(
        `  ${formatDate(line.raceDate)} ${pad(`${line.venue} R${line.raceNumber}`, 20)} ` +
          `${padLeft(line.finishPosition, 3)}  ${padLeft(line.muAfter.toFixed(1), 7)} ${padLeft(delta, 16)}${partner}`,
      );
    }
    console.log('');
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error(c('red', `Form lookup failed: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
