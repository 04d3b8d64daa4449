/**
 * TROTLINE - Morning Line Tests
 *
 * Run: npx tsx --test tests/morning-line.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createConfig } from '../src/config';
import { MemoryRatingStore } from '../src/db/memory-store';
import type { BeliefRecord } from '../src/db/store';
import { emptyBatch } from '../src/db/store';
import { InvalidOddsInputError } from '../src/errors';
import { silentLogger } from '../src/logger';
import { MorningLineService } from '../src/odds/morning-line';
import { RaceSchema, type EntityClass, type StarterInput } from '../src/races/schemas';

const config = createConfig();
const CARD_DATE = new Date('2024-06-01T00:00:00Z');

function belief(entityClass: EntityClass, name: string, mu: number, sigma: number): BeliefRecord {
  return {
    discipline: 'pace',
    entityClass,
    name,
    mu,
    sigma,
    lastActive: CARD_DATE,
    lastVenue: 'Pinewood',
    racesCounted: 4,
  };
}

function card(starters: StarterInput[]) {
  return RaceSchema.parse({
    discipline: 'Pace',
    raceDate: '2024-06-01',
    venue: 'Pinewood',
    raceNumber: 5,
    starters,
  });
}

async function seededService(): Promise<MorningLineService> {
  const store = new MemoryRatingStore();
  await store.commit({
    ...emptyBatch(),
    beliefs: [
      belief('horse', 'copper lantern', 1200, 100),
      belief('driver', 'ana lindqvist', 1100, 200),
      belief('trainer', 'rolf berg', 900, 150),
    ],
  });
  return new MorningLineService(store, config, silentLogger);
}

function assertClose(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < tolerance, `expected ${expected}, got ${actual}`);
}

describe('MorningLineService', () => {
  it('fuses each starter and prices the field, favourite first', async () => {
    const service = await seededService();

    const line = await service.build(
      card([
        { horseName: 'Dune Runner' },
        { horseName: 'Copper Lantern', driverName: 'Ana Lindqvist', trainerName: 'Rolf Berg' },
        { horseName: 'Blue Willow', driverName: 'Ana Lindqvist', isScratched: true },
      ]),
    );

    assert.deepEqual(line.map((e) => e.name), ['copper lantern', 'dune runner']);

    const [favourite, outsider] = line;
    assertClose(favourite.fusedMu, 1130);
    assertClose(favourite.fusedSigma, 132.5);
    assert.equal(favourite.horseMu, 1200);
    assert.equal(favourite.driverMu, 1100);
    assert.equal(favourite.trainerMu, 900);
    assertClose(favourite.winProbability, 0.685848, 1e-6);
    assertClose(favourite.decimalOdds, 1 / favourite.winProbability);

    assert.equal(outsider.fusedMu, config.defaultMu);
    assert.equal(outsider.fusedSigma, config.defaultSigma);
    assert.equal(outsider.driverName, null);
    assert.equal(outsider.driverMu, null);
    assert.equal(outsider.trainerMu, null);
    assertClose(outsider.winProbability, 0.314152, 1e-6);
  });

  it('rates a named but unknown driver at the default', async () => {
    const service = await seededService();

    const fused = await service.fuseCard(
      card([
        { horseName: 'Copper Lantern', driverName: 'Sam Oduya' },
        { horseName: 'Dune Runner' },
      ]),
    );

    assert.equal(fused[0].driverMu, config.defaultMu);
    assert.equal(fused[0].trainerMu, null);
    assertClose(fused[0].fusedMu, 0.7 * 1200 + 0.3 * config.defaultMu);
  });

  it('decays ratings up to the requested date', async () => {
    const service = await seededService();

    const fused = await service.fuseCard(
      card([{ horseName: 'Copper Lantern' }, { horseName: 'Dune Runner' }]),
      new Date('2025-06-02T00:00:00Z'),
    );

    assert.equal(fused[0].horseMu, 600);
    assert.equal(fused[0].fusedMu, 600);
    assert.equal(fused[1].horseMu, config.defaultMu);
  });

  it('refuses to price a card with every starter scratched', async () => {
    const service = await seededService();

    await assert.rejects(
      service.build(card([{ horseName: 'Copper Lantern', isScratched: true }])),
      InvalidOddsInputError,
    );
  });
});
