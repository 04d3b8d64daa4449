/**
 * TROTLINE - Race Rating Engine
 *
 * Applies finished races to the rating store.
 *
 * For a rated race it:
 *   1. Checks whether the race was already recorded, then chronology
 *   2. Keeps starters with a numeric finish (fewer than two: skip the race)
 *   3. Runs one TrueSkill update per entity class (horse, driver, trainer),
 *      all ranked by the horse's finishing position
 *   4. Commits beliefs, history snapshots and race entries as one batch,
 *      re-checking the race inside the store's commit
 *
 * A failed update in one class is logged and reported; the other classes
 * of the race still commit. Qualifiers only refresh last-active date and
 * venue.
 */

import type { TrotlineConfig } from '../config';
import { formatIssues } from '../config';
import type {
  BeliefRecord,
  HistoryRecord,
  RaceEntryRecord,
  RaceWriteBatch,
  RatingStore,
} from '../db/store';
import { emptyBatch } from '../db/store';
import { OutOfOrderRaceError, RaceAlreadyRecordedError, RatingUpdateError } from '../errors';
import type { Logger } from '../logger';
import {
  ENTITY_CLASSES,
  RaceSchema,
  finishText,
  formatRaceKey,
  raceKeyOf,
  type EntityClass,
  type Race,
  type Starter,
} from '../races/schemas';
import { decayRating } from './decay';
import { updateRanked, type Rating } from './trueskill';

// ─── Result Types ─────────────────────────────────────────────────────────────

export type RaceStatus =
  | 'applied'    // every class with a field was rated
  | 'partial'    // at least one class failed, the rest committed
  | 'refreshed'  // qualifier: recency updated
  | 'skipped'    // fewer than two valid finishers
  | 'duplicate'  // already recorded (or the retried classes already rated)
  | 'rejected'   // dated before races already applied
  | 'invalid'    // failed validation
  | 'failed';    // unexpected error, nothing committed

export const RACE_STATUSES: readonly RaceStatus[] = [
  'applied',
  'partial',
  'refreshed',
  'skipped',
  'duplicate',
  'rejected',
  'invalid',
  'failed',
];

export interface ClassFailure {
  entityClass: EntityClass;
  message: string;
}

export interface RaceResult {
  status: RaceStatus;
  /** e.g. "2024-05-04 Pinewood R3", or "#4" for an input that did not validate. */
  race: string;
  updated: Record<EntityClass, number>;
  failedClasses: ClassFailure[];
  reason?: string;
}

export interface BatchSummary {
  /** Nothing was written: results show what a real run would have done. */
  dryRun: boolean;
  total: number;
  counts: Record<RaceStatus, number>;
  results: RaceResult[];
}

export interface IngestOptions {
  /** Rate every race but commit nothing. */
  dryRun?: boolean;
}

export interface ApplyOptions extends IngestOptions {
  /**
   * Re-run these classes for a race that is already recorded, e.g. after a
   * class failed. Classes that already have history for the race are left
   * alone, and race entries are left as they are.
   */
  retryClasses?: EntityClass[];
}

/** One entity's place in a race for its class. */
interface Participant {
  name: string;
  position: number;
  horseName: string;
}

interface ClassUpdate {
  beliefs: BeliefRecord[];
  history: HistoryRecord[];
}

function noUpdates(): Record<EntityClass, number> {
  return { horse: 0, driver: 0, trainer: 0 };
}

// ─── Engine ───────────────────────────────────────────────────────────────────

export class RatingEngine {
  constructor(
    private readonly store: RatingStore,
    private readonly config: TrotlineConfig,
    private readonly logger: Logger = console,
  ) {}

  /**
   * Validate and apply a batch of races. Races are reordered by date (then
   * race number) before they are applied; one race's problem never stops
   * the batch.
   *
   * In a dry run each race is rated against the store as it stands, so a
   * later race in the batch does not see an earlier one's updates.
   */
  async ingestRaces(inputs: unknown[], options: IngestOptions = {}): Promise<BatchSummary> {
    const dryRun = options.dryRun ?? false;
    const results: RaceResult[] = [];
    const races: Race[] = [];

    inputs.forEach((input, index) => {
      const parsed = RaceSchema.safeParse(input);
      if (parsed.success) {
        races.push(parsed.data);
        return;
      }
      const reason = formatIssues(parsed.error);
      this.logger.warn(`[Ingest] Race #${index} is invalid: ${reason}`);
      results.push({
        status: 'invalid',
        race: `#${index}`,
        updated: noUpdates(),
        failedClasses: [],
        reason,
      });
    });

    const ordered = [...races].sort(
      (a, b) => a.raceDate.getTime() - b.raceDate.getTime() || a.raceNumber - b.raceNumber,
    );

    for (const race of ordered) {
      try {
        results.push(await this.applyRace(race, { dryRun }));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        const label = formatRaceKey(raceKeyOf(race));
        this.logger.error(`[Ingest] ${label} failed: ${reason}`);
        results.push({
          status: 'failed',
          race: label,
          updated: noUpdates(),
          failedClasses: [],
          reason,
        });
      }
    }

    const counts: Record<RaceStatus, number> = {
      applied: 0,
      partial: 0,
      refreshed: 0,
      skipped: 0,
      duplicate: 0,
      rejected: 0,
      invalid: 0,
      failed: 0,
    };
    for (const result of results) counts[result.status]++;

    this.logger.log(
      `[Ingest] ${dryRun ? '(dry run) ' : ''}${results.length} races: ` +
        RACE_STATUSES.filter((s) => counts[s] > 0).map((s) => `${counts[s]} ${s}`).join(', '),
    );

    return { dryRun, total: results.length, counts, results };
  }

  /** Apply one validated race (rated or qualifier). */
  async applyRace(race: Race, options: ApplyOptions = {}): Promise<RaceResult> {
    const key = raceKeyOf(race);
    const label = formatRaceKey(key);
    const { retryClasses } = options;
    const dryRun = options.dryRun ?? false;

    const recorded = await this.store.hasRace(key);
    if (recorded && (retryClasses === undefined || race.isQualifier)) {
      this.logger.log(`[Ratings] ${label} already recorded, skipping`);
      return { status: 'duplicate', race: label, updated: noUpdates(), failedClasses: [] };
    }
    if (!recorded && retryClasses !== undefined) {
      const reason = 'retry requested for a race that was never recorded';
      return { status: 'skipped', race: label, updated: noUpdates(), failedClasses: [], reason };
    }

    const latest = await this.store.getLatestRaceDate(race.discipline);
    if (latest && race.raceDate.getTime() < latest.getTime()) {
      const reason = new OutOfOrderRaceError(label, latest).message;
      this.logger.warn(`[Ratings] ${reason}`);
      return { status: 'rejected', race: label, updated: noUpdates(), failedClasses: [], reason };
    }

    if (race.isQualifier) {
      return this.applyQualifier(race, label, dryRun);
    }
    if (retryClasses === undefined) {
      return this.applyRatedRace(race, label, ENTITY_CLASSES, false, dryRun);
    }

    const rated = await this.store.getRatedClasses(key);
    const pending = ENTITY_CLASSES.filter((c) => retryClasses.includes(c) && !rated.includes(c));
    const done = retryClasses.filter((c) => rated.includes(c));
    if (done.length > 0) {
      this.logger.log(`[Ratings] ${label}: ${done.join(', ')} already rated, not re-run`);
    }
    if (pending.length === 0) {
      const reason = new RaceAlreadyRecordedError(label, done).message;
      return { status: 'duplicate', race: label, updated: noUpdates(), failedClasses: [], reason };
    }

    return this.applyRatedRace(race, label, pending, true, dryRun);
  }

  /**
   * Commit a guarded batch. A guard that no longer holds (another apply of
   * the same race got there first) becomes a duplicate or rejected result.
   */
  private async commitBatch(batch: RaceWriteBatch, label: string): Promise<RaceResult | null> {
    try {
      await this.store.commit(batch);
      return null;
    } catch (err) {
      if (err instanceof RaceAlreadyRecordedError) {
        this.logger.log(`[Ratings] ${err.message}, nothing written`);
        return { status: 'duplicate', race: label, updated: noUpdates(), failedClasses: [], reason: err.message };
      }
      if (err instanceof OutOfOrderRaceError) {
        this.logger.warn(`[Ratings] ${err.message}`);
        return { status: 'rejected', race: label, updated: noUpdates(), failedClasses: [], reason: err.message };
      }
      throw err;
    }
  }

  // ─── Rated Races ──────────────────────────────────────────────────────────

  private async applyRatedRace(
    race: Race,
    label: string,
    classes: readonly EntityClass[],
    retry: boolean,
    dryRun: boolean,
  ): Promise<RaceResult> {
    const finishers: { starter: Starter; position: number }[] = [];
    for (const starter of race.starters) {
      if (starter.isScratched) continue;
      if (starter.finish.kind === 'placed') {
        finishers.push({ starter, position: starter.finish.position });
      } else if (starter.finish.kind === 'malformed') {
        this.logger.warn(
          `[Ratings] ${label}: "${starter.horseName}" has an unreadable finish "${starter.finish.raw}", not ranked`,
        );
      }
    }

    if (finishers.length < 2) {
      const reason = `only ${finishers.length} valid finisher(s)`;
      this.logger.warn(`[Ratings] ${label} has ${reason}. Skipping rating update.`);
      return { status: 'skipped', race: label, updated: noUpdates(), failedClasses: [], reason };
    }

    // Stable sort: equal positions keep card order.
    finishers.sort((a, b) => a.position - b.position);

    const batch: RaceWriteBatch = {
      ...emptyBatch(),
      guard: {
        race: raceKeyOf(race),
        discipline: race.discipline,
        retryClasses: retry ? classes : null,
      },
    };
    const updated = noUpdates();
    const failedClasses: ClassFailure[] = [];

    for (const entityClass of classes) {
      const participants = collectParticipants(finishers, entityClass);
      if (participants.length < 2) {
        if (participants.length === 1) {
          this.logger.log(`[Ratings] ${label}: only one ${entityClass} named, ${entityClass} ratings unchanged`);
        }
        continue;
      }

      try {
        const change = await this.rateClass(race, entityClass, participants);
        batch.beliefs.push(...change.beliefs);
        batch.history.push(...change.history);
        updated[entityClass] = change.beliefs.length;
      } catch (err) {
        if (!(err instanceof RatingUpdateError)) throw err;
        failedClasses.push({ entityClass, message: err.message });
        this.logger.error(`[Ratings] ${entityClass} update failed for ${label}: ${err.message}`);
      }
    }

    if (!retry) {
      batch.raceEntries.push(...raceEntriesOf(race));
    }

    if (!dryRun) {
      const refused = await this.commitBatch(batch, label);
      if (refused) return refused;
    }

    this.logger.log(
      `[Ratings] ${dryRun ? '(dry run) ' : ''}${label} (${race.discipline}): ` +
        `${updated.horse} horses, ${updated.driver} drivers, ${updated.trainer} trainers rated`,
    );

    return {
      status: failedClasses.length > 0 ? 'partial' : 'applied',
      race: label,
      updated,
      failedClasses,
    };
  }

  /** Run the skill update for one class and build its writes. */
  private async rateClass(
    race: Race,
    entityClass: EntityClass,
    participants: Participant[],
  ): Promise<ClassUpdate> {
    const names = participants.map((p) => p.name);
    const stored = await this.store.getBeliefs(race.discipline, entityClass, names);

    const before = new Map<string, Rating>();
    for (const name of names) {
      const record = stored.get(name);
      before.set(
        name,
        record
          ? decayRating(record, record.lastActive, race.raceDate, this.config)
          : { mu: this.config.defaultMu, sigma: this.config.defaultSigma },
      );
    }

    const after = updateRanked(
      participants.map((p) => ({
        id: p.name,
        rating: before.get(p.name) ?? { mu: this.config.defaultMu, sigma: this.config.defaultSigma },
        rank: p.position,
      })),
      this.config,
    );

    const beliefs: BeliefRecord[] = [];
    const history: HistoryRecord[] = [];

    for (const p of participants) {
      const rating = after.get(p.name);
      if (!rating) {
        throw new RatingUpdateError(`no updated rating for "${p.name}"`, entityClass);
      }

      beliefs.push({
        discipline: race.discipline,
        entityClass,
        name: p.name,
        mu: rating.mu,
        sigma: rating.sigma,
        lastActive: race.raceDate,
        lastVenue: race.venue,
        racesCounted: (stored.get(p.name)?.racesCounted ?? 0) + 1,
      });

      history.push({
        discipline: race.discipline,
        entityClass,
        name: p.name,
        mu: rating.mu,
        sigma: rating.sigma,
        raceDate: race.raceDate,
        venue: race.venue,
        raceNumber: race.raceNumber,
        finishPosition: String(p.position),
        raceClass: race.raceClass,
        horseName: entityClass === 'horse' ? null : p.horseName,
      });
    }

    return { beliefs, history };
  }

  // ─── Qualifiers ───────────────────────────────────────────────────────────

  /**
   * Qualifiers carry no rating signal. Every entity on a non-scratched
   * starter is created if new and has its last-active date and venue
   * moved to this race; stored mu and sigma are untouched.
   */
  private async applyQualifier(race: Race, label: string, dryRun: boolean): Promise<RaceResult> {
    const batch: RaceWriteBatch = {
      ...emptyBatch(),
      guard: { race: raceKeyOf(race), discipline: race.discipline, retryClasses: null },
    };
    const updated = noUpdates();
    const starters = race.starters.filter((s) => !s.isScratched);

    for (const entityClass of ENTITY_CLASSES) {
      const names = [...new Set(
        starters
          .map((s) => nameFor(s, entityClass))
          .filter((name): name is string => name !== null),
      )];
      if (names.length === 0) continue;

      const stored = await this.store.getBeliefs(race.discipline, entityClass, names);
      for (const name of names) {
        const existing = stored.get(name);
        batch.beliefs.push({
          discipline: race.discipline,
          entityClass,
          name,
          mu: existing?.mu ?? this.config.defaultMu,
          sigma: existing?.sigma ?? this.config.defaultSigma,
          lastActive: race.raceDate,
          lastVenue: race.venue,
          racesCounted: existing?.racesCounted ?? 0,
        });
      }
      updated[entityClass] = names.length;
    }

    batch.raceEntries.push(...raceEntriesOf(race));
    if (!dryRun) {
      const refused = await this.commitBatch(batch, label);
      if (refused) return refused;
    }

    this.logger.log(
      `[Qualifier] ${dryRun ? '(dry run) ' : ''}${label}: activity refreshed for ${updated.horse} horses, ` +
        `${updated.driver} drivers, ${updated.trainer} trainers`,
    );

    return { status: 'refreshed', race: label, updated, failedClasses: [] };
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function nameFor(starter: Starter, entityClass: EntityClass): string | null {
  switch (entityClass) {
    case 'horse':
      return starter.horseName;
    case 'driver':
      return starter.driverName;
    case 'trainer':
      return starter.trainerName;
  }
}

/**
 * Entities of one class in finishing order. A name that appears on more
 * than one starter (a trainer with two horses in the race) is rated once,
 * at its best finish.
 */
function collectParticipants(
  finishers: { starter: Starter; position: number }[],
  entityClass: EntityClass,
): Participant[] {
  const seen = new Set<string>();
  const participants: Participant[] = [];
  for (const { starter, position } of finishers) {
    const name = nameFor(starter, entityClass);
    if (name === null || seen.has(name)) continue;
    seen.add(name);
    participants.push({ name, position, horseName: starter.horseName });
  }
  return participants;
}

function raceEntriesOf(race: Race): RaceEntryRecord[] {
  return race.starters
    .filter((s) => !s.isScratched)
    .map((s) => ({
      raceDate: race.raceDate,
      venue: race.venue,
      raceNumber: race.raceNumber,
      horseName: s.horseName,
      driverName: s.driverName,
      trainerName: s.trainerName,
      finishPosition: finishText(s.finish),
      raceClass: race.raceClass,
      discipline: race.discipline,
      isQualifier: race.isQualifier,
    }));
}
