/**
 * TROTLINE - Race Rating Engine Tests
 *
 * Validates:
 *   - Rated races update all three entity classes
 *   - Idempotent re-ingest and chronology checks
 *   - Skipped races, dead heats, per-class failure and retries
 *   - Qualifiers and decay before an update
 *   - Overlapping applies of one race, on both stores
 *   - Batch ingest ordering, validation and dry runs
 *
 * Run: npx tsx --test tests/engine.test.ts
 */

import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createConfig } from '../src/config';
import { MemoryRatingStore } from '../src/db/memory-store';
import { SqliteRatingStore } from '../src/db/sqlite-store';
import type { BeliefRecord, RatingStore } from '../src/db/store';
import { silentLogger } from '../src/logger';
import {
  RaceSchema,
  type Discipline,
  type EntityClass,
  type Race,
  type RaceInput,
  type StarterInput,
} from '../src/races/schemas';
import { RatingEngine } from '../src/ranking/engine';
import { updateRanked } from '../src/ranking/trueskill';

// ─── Fixtures ────────────────────────────────────────────────────

const config = createConfig();
const drawConfig = createConfig({ drawProbability: 0.1 });

function starter(
  horseName: string,
  finishPosition: number | string | null,
  driverName: string | null = null,
  trainerName: string | null = null,
): StarterInput {
  return { horseName, driverName, trainerName, finishPosition };
}

function raceInput(overrides: Partial<RaceInput> = {}): RaceInput {
  return {
    discipline: 'Pace',
    raceDate: '2024-05-04',
    venue: 'Pinewood',
    raceNumber: 1,
    raceClass: 'NW2',
    starters: [],
    ...overrides,
  };
}

function race(overrides: Partial<RaceInput> = {}): Race {
  return RaceSchema.parse(raceInput(overrides));
}

async function beliefOf(
  store: RatingStore,
  entityClass: EntityClass,
  name: string,
  discipline: Discipline = 'pace',
): Promise<BeliefRecord> {
  const record = await store.getBelief({ discipline, entityClass, name });
  assert.ok(record, `no ${entityClass} belief for ${name}`);
  return record;
}

const DEFAULT_RATING = { mu: config.defaultMu, sigma: config.defaultSigma };

// ─── Rated Races ─────────────────────────────────────────────────

describe('RatingEngine.applyRace', () => {
  let store: MemoryRatingStore;
  let engine: RatingEngine;

  beforeEach(() => {
    store = new MemoryRatingStore();
    engine = new RatingEngine(store, config, silentLogger);
  });

  it('rates horses, drivers and trainers from a two-horse race', async () => {
    const result = await engine.applyRace(
      race({
        starters: [
          starter('Iron Creek', 1, 'Ana Lindqvist', 'Rolf Berg'),
          starter('Red Alder', 2, 'Tom Hale', 'Ida Crane'),
        ],
      }),
    );

    assert.deepEqual(result, {
      status: 'applied',
      race: '2024-05-04 Pinewood R1',
      updated: { horse: 2, driver: 2, trainer: 2 },
      failedClasses: [],
    });

    const expected = updateRanked(
      [
        { id: 'iron creek', rating: DEFAULT_RATING, rank: 1 },
        { id: 'red alder', rating: DEFAULT_RATING, rank: 2 },
      ],
      config,
    );
    const winner = await beliefOf(store, 'horse', 'iron creek');
    assert.deepEqual(winner, {
      discipline: 'pace',
      entityClass: 'horse',
      name: 'iron creek',
      mu: expected.get('iron creek')?.mu,
      sigma: expected.get('iron creek')?.sigma,
      lastActive: new Date('2024-05-04T00:00:00Z'),
      lastVenue: 'Pinewood',
      racesCounted: 1,
    });
    assert.ok(winner.mu > 1000);
    assert.ok((await beliefOf(store, 'horse', 'red alder')).mu < 1000);
    assert.ok((await beliefOf(store, 'driver', 'ana lindqvist')).mu > 1000);
    assert.ok((await beliefOf(store, 'trainer', 'ida crane')).mu < 1000);

    const history = await store.getHistory({ discipline: 'pace', entityClass: 'driver', name: 'ana lindqvist' });
    assert.equal(history.length, 1);
    assert.equal(history[0].finishPosition, '1');
    assert.equal(history[0].horseName, 'iron creek');
    assert.equal(history[0].raceClass, 'NW2');

    const horseHistory = await store.getHistory({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' });
    assert.equal(horseHistory[0].horseName, null);
  });

  it('treats a race it has already recorded as a duplicate', async () => {
    const card = race({ starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] });
    await engine.applyRace(card);
    const before = await beliefOf(store, 'horse', 'iron creek');

    const again = await engine.applyRace(card);

    assert.equal(again.status, 'duplicate');
    assert.deepEqual(await beliefOf(store, 'horse', 'iron creek'), before);
    const history = await store.getHistory({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' });
    assert.equal(history.length, 1);
  });

  it('skips a race with a single valid finisher and writes nothing', async () => {
    const card = race({
      starters: [
        starter('Iron Creek', 1, 'Ana Lindqvist'),
        starter('Red Alder', 'DNF', 'Tom Hale'),
        starter('Frost Meadow', null),
        { horseName: 'Blue Willow', finishPosition: 2, isScratched: true },
      ],
    });

    const result = await engine.applyRace(card);

    assert.equal(result.status, 'skipped');
    assert.equal(result.reason, 'only 1 valid finisher(s)');
    assert.equal(await store.getBelief({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' }), null);
    assert.equal(await store.hasRace({ raceDate: '2024-05-04T00:00:00.000Z', venue: 'Pinewood', raceNumber: 1 }), false);
  });

  it('leaves unreadable finishes out of the ranking but keeps them on record', async () => {
    const card = race({
      starters: [
        starter('Iron Creek', 1),
        starter('Red Alder', '2nd'),
        starter('Frost Meadow', 2),
        { horseName: 'Blue Willow', isScratched: true },
      ],
    });

    const result = await engine.applyRace(card);

    assert.deepEqual(result.updated, { horse: 2, driver: 0, trainer: 0 });
    assert.equal(await store.getBelief({ discipline: 'pace', entityClass: 'horse', name: 'red alder' }), null);

    const entries = await store.getRaceEntries({
      raceDate: '2024-05-04T00:00:00.000Z',
      venue: 'Pinewood',
      raceNumber: 1,
    });
    assert.deepEqual(
      entries.map((e) => [e.horseName, e.finishPosition]),
      [
        ['frost meadow', '2'],
        ['iron creek', '1'],
        ['red alder', '2nd'],
      ],
    );
  });

  it('rates a trainer with two horses once, at the better finish', async () => {
    const result = await engine.applyRace(
      race({
        starters: [
          starter('Iron Creek', 1, null, 'Rolf Berg'),
          starter('Red Alder', 2, null, 'Ida Crane'),
          starter('Frost Meadow', 3, null, 'Rolf Berg'),
        ],
      }),
    );

    assert.equal(result.updated.trainer, 2);
    const history = await store.getHistory({ discipline: 'pace', entityClass: 'trainer', name: 'rolf berg' });
    assert.equal(history.length, 1);
    assert.equal(history[0].finishPosition, '1');
    assert.equal(history[0].horseName, 'iron creek');
    assert.equal((await beliefOf(store, 'trainer', 'rolf berg')).racesCounted, 1);
  });

  it('fails only the classes with a dead heat when draws are disabled', async () => {
    const result = await engine.applyRace(
      race({
        starters: [
          starter('Iron Creek', 1, 'Ana Lindqvist', 'Rolf Berg'),
          starter('Red Alder', 1, 'Tom Hale', 'Rolf Berg'),
          starter('Frost Meadow', 3, 'Lena Moss', 'Ida Crane'),
        ],
      }),
    );

    assert.equal(result.status, 'partial');
    assert.deepEqual(result.failedClasses.map((f) => f.entityClass), ['horse', 'driver']);
    assert.deepEqual(result.updated, { horse: 0, driver: 0, trainer: 2 });
    assert.equal(await store.getBelief({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' }), null);
    assert.ok((await beliefOf(store, 'trainer', 'rolf berg')).mu > 1000);
    assert.equal(await store.hasRace({ raceDate: '2024-05-04T00:00:00.000Z', venue: 'Pinewood', raceNumber: 1 }), true);
  });

  it('rates a dead heat when a draw probability is configured', async () => {
    const drawEngine = new RatingEngine(store, drawConfig, silentLogger);
    const result = await drawEngine.applyRace(
      race({ starters: [starter('Iron Creek', 1), starter('Red Alder', 1), starter('Frost Meadow', 3)] }),
    );

    assert.equal(result.status, 'applied');
    const first = await beliefOf(store, 'horse', 'iron creek');
    const second = await beliefOf(store, 'horse', 'red alder');
    const third = await beliefOf(store, 'horse', 'frost meadow');
    assert.equal(first.mu, second.mu);
    assert.ok(first.mu > 1000);
    assert.ok(third.mu < 1000);
  });

  it('re-runs failed classes of a recorded race on request', async () => {
    const card = race({
      starters: [
        starter('Iron Creek', 1, null, 'Rolf Berg'),
        starter('Red Alder', 1, null, 'Ida Crane'),
        starter('Frost Meadow', 3, null, 'Lena Moss'),
      ],
    });
    const first = await engine.applyRace(card);
    assert.equal(first.status, 'partial');
    assert.deepEqual(first.failedClasses.map((f) => f.entityClass), ['horse', 'trainer']);

    const drawEngine = new RatingEngine(store, drawConfig, silentLogger);
    const retry = await drawEngine.applyRace(card, { retryClasses: ['horse'] });

    assert.deepEqual(retry, {
      status: 'applied',
      race: '2024-05-04 Pinewood R1',
      updated: { horse: 3, driver: 0, trainer: 0 },
      failedClasses: [],
    });
    assert.equal((await beliefOf(store, 'horse', 'frost meadow')).racesCounted, 1);
    assert.equal(await store.getBelief({ discipline: 'pace', entityClass: 'trainer', name: 'rolf berg' }), null);
  });

  it('does not re-rate a class that already committed for the race', async () => {
    const card = race({
      starters: [starter('Iron Creek', 1, 'Ana Lindqvist'), starter('Red Alder', 2, 'Tom Hale')],
    });
    assert.equal((await engine.applyRace(card)).status, 'applied');
    const before = await beliefOf(store, 'horse', 'iron creek');

    const retry = await engine.applyRace(card, { retryClasses: ['horse'] });

    assert.deepEqual(retry, {
      status: 'duplicate',
      race: '2024-05-04 Pinewood R1',
      updated: { horse: 0, driver: 0, trainer: 0 },
      failedClasses: [],
      reason: '2024-05-04 Pinewood R1 already has horse ratings',
    });
    assert.deepEqual(await beliefOf(store, 'horse', 'iron creek'), before);
    const history = await store.getHistory({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' });
    assert.equal(history.length, 1);
  });

  it('retries only the classes a partial race is still missing', async () => {
    const card = race({
      starters: [
        starter('Iron Creek', 1, 'Ana Lindqvist', 'Rolf Berg'),
        starter('Red Alder', 1, 'Tom Hale', 'Rolf Berg'),
        starter('Frost Meadow', 3, 'Lena Moss', 'Ida Crane'),
      ],
    });
    assert.equal((await engine.applyRace(card)).status, 'partial');
    const trainer = await beliefOf(store, 'trainer', 'rolf berg');

    const drawEngine = new RatingEngine(store, drawConfig, silentLogger);
    const retry = await drawEngine.applyRace(card, { retryClasses: ['horse', 'driver', 'trainer'] });

    assert.equal(retry.status, 'applied');
    assert.deepEqual(retry.updated, { horse: 3, driver: 3, trainer: 0 });
    assert.deepEqual(await beliefOf(store, 'trainer', 'rolf berg'), trainer);
    const history = await store.getHistory({ discipline: 'pace', entityClass: 'trainer', name: 'rolf berg' });
    assert.equal(history.length, 1);
  });

  it('will not retry a race that was never recorded', async () => {
    const result = await engine.applyRace(
      race({ starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] }),
      { retryClasses: ['horse'] },
    );
    assert.equal(result.status, 'skipped');
    assert.equal(result.reason, 'retry requested for a race that was never recorded');
  });

  it('refreshes activity for qualifier starters without touching ratings', async () => {
    await engine.applyRace(
      race({ starters: [starter('Iron Creek', 1, 'Ana Lindqvist'), starter('Red Alder', 2, 'Tom Hale')] }),
    );
    const before = await beliefOf(store, 'horse', 'iron creek');

    const result = await engine.applyRace(
      race({
        raceDate: '2024-05-11',
        venue: 'Kestrel Downs',
        raceNumber: 4,
        isQualifier: true,
        starters: [starter('Iron Creek', 2, 'Ana Lindqvist'), starter('Dune Runner', 1)],
      }),
    );

    assert.deepEqual(result, {
      status: 'refreshed',
      race: '2024-05-11 Kestrel Downs R4',
      updated: { horse: 2, driver: 1, trainer: 0 },
      failedClasses: [],
    });

    const after = await beliefOf(store, 'horse', 'iron creek');
    assert.equal(after.mu, before.mu);
    assert.equal(after.sigma, before.sigma);
    assert.equal(after.racesCounted, 1);
    assert.equal(after.lastVenue, 'Kestrel Downs');
    assert.equal(after.lastActive.toISOString(), '2024-05-11T00:00:00.000Z');

    const debut = await beliefOf(store, 'horse', 'dune runner');
    assert.equal(debut.mu, config.defaultMu);
    assert.equal(debut.sigma, config.defaultSigma);
    assert.equal(debut.racesCounted, 0);

    const history = await store.getHistory({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' });
    assert.equal(history.length, 1);
  });

  it('rejects a race dated before the latest applied race of its discipline', async () => {
    await engine.applyRace(
      race({ raceDate: '2024-05-10', starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] }),
    );

    const late = await engine.applyRace(
      race({ raceDate: '2024-05-01', starters: [starter('Iron Creek', 2), starter('Red Alder', 1)] }),
    );
    assert.equal(late.status, 'rejected');
    assert.equal(late.reason, '2024-05-01 Pinewood R1 is dated before the latest applied race (2024-05-10)');

    const sameDay = await engine.applyRace(
      race({ raceDate: '2024-05-10', raceNumber: 2, starters: [starter('Iron Creek', 2), starter('Red Alder', 1)] }),
    );
    assert.equal(sameDay.status, 'applied');

    const otherGait = await engine.applyRace(
      race({ discipline: 'Trot', raceDate: '2024-05-01', starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] }),
    );
    assert.equal(otherGait.status, 'applied');
  });

  it('reports a re-sent older race as a duplicate once later races are in', async () => {
    const card = race({ starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] });
    await engine.applyRace(card);
    await engine.applyRace(
      race({ raceDate: '2024-05-10', starters: [starter('Iron Creek', 2), starter('Red Alder', 1)] }),
    );

    const again = await engine.applyRace(card);

    assert.equal(again.status, 'duplicate');
    assert.equal(again.reason, undefined);
  });

  it('matches a race whose venue is spelled in a different case', async () => {
    await engine.applyRace(race({ starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] }));

    const shouted = await engine.applyRace(
      race({ venue: 'PINEWOOD', starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] }),
    );

    assert.equal(shouted.status, 'duplicate');
    assert.equal(shouted.race, '2024-05-04 Pinewood R1');
    assert.equal((await beliefOf(store, 'horse', 'iron creek')).racesCounted, 1);
  });

  it('decays an idle rating before applying the next race', async () => {
    await engine.applyRace(
      race({ raceDate: '2024-01-01', starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] }),
    );
    const idle = await beliefOf(store, 'horse', 'iron creek');

    await engine.applyRace(
      race({ raceDate: '2025-01-01', starters: [starter('Iron Creek', 1), starter('Dune Runner', 2)] }),
    );

    const expected = updateRanked(
      [
        { id: 'iron creek', rating: { mu: idle.mu * 0.5, sigma: idle.sigma }, rank: 1 },
        { id: 'dune runner', rating: DEFAULT_RATING, rank: 2 },
      ],
      config,
    );
    const after = await beliefOf(store, 'horse', 'iron creek');
    assert.equal(after.mu, expected.get('iron creek')?.mu);
    assert.equal(after.racesCounted, 2);
  });

  it('keeps trotters and pacers apart', async () => {
    await engine.applyRace(race({ starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] }));
    await engine.applyRace(
      race({ discipline: 'Trot', raceNumber: 2, starters: [starter('Iron Creek', 2), starter('Red Alder', 1)] }),
    );

    assert.ok((await beliefOf(store, 'horse', 'iron creek', 'pace')).mu > 1000);
    assert.ok((await beliefOf(store, 'horse', 'iron creek', 'trot')).mu < 1000);
  });
});

// ─── Overlapping Applies ─────────────────────────────────────────

const stores: Array<[string, () => RatingStore]> = [
  ['MemoryRatingStore', () => new MemoryRatingStore()],
  ['SqliteRatingStore', () => new SqliteRatingStore(':memory:')],
];

for (const [label, create] of stores) {
  describe(`RatingEngine on ${label}`, () => {
    it('commits two overlapping applies of one race once', async () => {
      const store = create();
      const engine = new RatingEngine(store, config, silentLogger);
      const card = race({
        starters: [starter('Iron Creek', 1, 'Ana Lindqvist'), starter('Red Alder', 2, 'Tom Hale')],
      });

      try {
        const results = await Promise.all([engine.applyRace(card), engine.applyRace(card)]);

        assert.deepEqual(results.map((r) => r.status).sort(), ['applied', 'duplicate']);
        const history = await store.getHistory({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' });
        assert.equal(history.length, 1);
        assert.equal((await beliefOf(store, 'horse', 'iron creek')).racesCounted, 1);
        assert.equal((await beliefOf(store, 'driver', 'tom hale')).racesCounted, 1);
      } finally {
        await store.close();
      }
    });

    it('commits two overlapping retries of one class once', async () => {
      const store = create();
      const card = race({
        starters: [starter('Iron Creek', 1), starter('Red Alder', 1), starter('Frost Meadow', 3)],
      });

      try {
        const first = await new RatingEngine(store, config, silentLogger).applyRace(card);
        assert.equal(first.status, 'partial');

        const drawEngine = new RatingEngine(store, drawConfig, silentLogger);
        const results = await Promise.all([
          drawEngine.applyRace(card, { retryClasses: ['horse'] }),
          drawEngine.applyRace(card, { retryClasses: ['horse'] }),
        ]);

        assert.deepEqual(results.map((r) => r.status).sort(), ['applied', 'duplicate']);
        const history = await store.getHistory({ discipline: 'pace', entityClass: 'horse', name: 'frost meadow' });
        assert.equal(history.length, 1);
      } finally {
        await store.close();
      }
    });
  });
}

// ─── Batch Ingest ────────────────────────────────────────────────

describe('RatingEngine.ingestRaces', () => {
  it('validates, orders and applies a batch', async () => {
    const store = new MemoryRatingStore();
    const engine = new RatingEngine(store, config, silentLogger);

    const later = raceInput({ raceDate: '2024-05-10', starters: [starter('Iron Creek', 1), starter('Red Alder', 2)] });
    const earlier = raceInput({ raceNumber: 2, starters: [starter('Iron Creek', 2), starter('Red Alder', 1)] });

    const summary = await engine.ingestRaces([later, { venue: 'Pinewood' }, earlier, earlier]);

    assert.equal(summary.dryRun, false);
    assert.equal(summary.total, 4);
    assert.deepEqual(
      summary.results.map((r) => [r.status, r.race]),
      [
        ['invalid', '#1'],
        ['applied', '2024-05-04 Pinewood R2'],
        ['duplicate', '2024-05-04 Pinewood R2'],
        ['applied', '2024-05-10 Pinewood R1'],
      ],
    );
    assert.deepEqual(summary.counts, {
      applied: 2,
      partial: 0,
      refreshed: 0,
      skipped: 0,
      duplicate: 1,
      rejected: 0,
      invalid: 1,
      failed: 0,
    });
    assert.ok(summary.results[0].reason);
    assert.equal((await beliefOf(store, 'horse', 'iron creek')).racesCounted, 2);
  });

  it('rates a batch without writing anything in a dry run', async () => {
    const store = new MemoryRatingStore();
    const engine = new RatingEngine(store, config, silentLogger);
    const card = raceInput({
      starters: [starter('Iron Creek', 1, 'Ana Lindqvist'), starter('Red Alder', 2, 'Tom Hale')],
    });
    const qualifier = raceInput({ raceNumber: 2, isQualifier: true, starters: [starter('Dune Runner', 1)] });

    const summary = await engine.ingestRaces([card, qualifier], { dryRun: true });

    assert.equal(summary.dryRun, true);
    assert.deepEqual(
      summary.results.map((r) => [r.status, r.race, r.updated]),
      [
        ['applied', '2024-05-04 Pinewood R1', { horse: 2, driver: 2, trainer: 0 }],
        ['refreshed', '2024-05-04 Pinewood R2', { horse: 1, driver: 0, trainer: 0 }],
      ],
    );
    assert.equal(await store.getBelief({ discipline: 'pace', entityClass: 'horse', name: 'iron creek' }), null);
    assert.equal(await store.getBelief({ discipline: 'pace', entityClass: 'horse', name: 'dune runner' }), null);
    assert.equal(await store.hasRace({ raceDate: '2024-05-04T00:00:00.000Z', venue: 'Pinewood', raceNumber: 1 }), false);
    assert.equal(await store.getLatestRaceDate('pace'), null);

    const real = await engine.ingestRaces([card]);
    assert.equal(real.results[0].status, 'applied');
  });
});
