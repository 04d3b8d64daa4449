/**
 * TROTLINE - Rating Store contract
 *
 * Persists beliefs, the append-only rating history and the race entry audit
 * rows. Implemented by SqliteRatingStore (better-sqlite3) and
 * MemoryRatingStore. Every entity is keyed by (discipline, entityClass, name);
 * the two disciplines never share a record.
 */

import { OutOfOrderRaceError, RaceAlreadyRecordedError } from '../errors';
import { formatRaceKey, type Discipline, type EntityClass, type RaceKey } from '../races/schemas';

export interface EntityKey {
  discipline: Discipline;
  entityClass: EntityClass;
  name: string;
}

/** Stored belief. mu is as last written, before any read-time decay. */
export interface BeliefRecord extends EntityKey {
  mu: number;
  sigma: number;
  lastActive: Date;
  lastVenue: string | null;
  /** Rated (non-qualifier) races this entity has been updated by. */
  racesCounted: number;
}

/** Snapshot written after an entity's rating changed in a race. */
export interface HistoryRecord extends EntityKey {
  mu: number;
  sigma: number;
  raceDate: Date;
  venue: string;
  raceNumber: number;
  /** As printed: "1", "7", "DNF". */
  finishPosition: string;
  raceClass: string | null;
  /** Horse partnered, for driver and trainer entries. */
  horseName: string | null;
}

export interface RaceEntryRecord {
  raceDate: Date;
  venue: string;
  raceNumber: number;
  horseName: string;
  driverName: string | null;
  trainerName: string | null;
  finishPosition: string | null;
  raceClass: string | null;
  discipline: Discipline;
  isQualifier: boolean;
}

/**
 * What a race batch assumes about the store. Checked inside the commit, so
 * two overlapping applies of one race cannot both land.
 */
export interface CommitGuard {
  race: RaceKey;
  discipline: Discipline;
  /**
   * null when the race must not be recorded yet. Otherwise the classes being
   * re-run, none of which may already have history for the race.
   */
  retryClasses: readonly EntityClass[] | null;
}

/** All writes of one race, applied together or not at all. */
export interface RaceWriteBatch {
  guard?: CommitGuard;
  beliefs: BeliefRecord[];
  history: HistoryRecord[];
  raceEntries: RaceEntryRecord[];
}

/** Store state a guard is checked against, read in the same unit as the writes. */
export interface GuardState {
  recorded: boolean;
  ratedClasses: EntityClass[];
  latestRaceDate: Date | null;
}

export interface HistoryQuery {
  /** Only the most recent N entries (still returned oldest first). */
  limit?: number;
}

export interface RatingStore {
  /** Stored belief, or null when the entity has never been seen. */
  getBelief(key: EntityKey): Promise<BeliefRecord | null>;

  /** Stored beliefs for several names of one class; absent names are left out. */
  getBeliefs(
    discipline: Discipline,
    entityClass: EntityClass,
    names: string[],
  ): Promise<Map<string, BeliefRecord>>;

  listBeliefs(discipline: Discipline, entityClass: EntityClass): Promise<BeliefRecord[]>;

  /** True once any entry of this race has been recorded. */
  hasRace(key: RaceKey): Promise<boolean>;

  /** Date of the most recent recorded race in a discipline. */
  getLatestRaceDate(discipline: Discipline): Promise<Date | null>;

  /** Entity classes with a history entry for this race. */
  getRatedClasses(key: RaceKey): Promise<EntityClass[]>;

  /**
   * Apply a race's writes atomically. Race entries upsert on their natural
   * key. A batch whose guard no longer holds writes nothing and rejects with
   * RaceAlreadyRecordedError or OutOfOrderRaceError.
   */
  commit(batch: RaceWriteBatch): Promise<void>;

  /** History of one entity ordered by race date, oldest first. */
  getHistory(key: EntityKey, query?: HistoryQuery): Promise<HistoryRecord[]>;

  getRaceEntries(key: RaceKey): Promise<RaceEntryRecord[]>;

  close(): Promise<void>;
}

export function emptyBatch(): RaceWriteBatch {
  return { beliefs: [], history: [], raceEntries: [] };
}

/** Throws when a guarded batch does not fit the state it would be written over. */
export function checkCommitGuard(guard: CommitGuard, state: GuardState): void {
  const label = formatRaceKey(guard.race);

  if (guard.retryClasses === null) {
    if (state.recorded) throw new RaceAlreadyRecordedError(label);
  } else {
    const rated = guard.retryClasses.filter((c) => state.ratedClasses.includes(c));
    if (rated.length > 0) throw new RaceAlreadyRecordedError(label, rated);
  }

  const raceTime = new Date(guard.race.raceDate).getTime();
  if (state.latestRaceDate && raceTime < state.latestRaceDate.getTime()) {
    throw new OutOfOrderRaceError(label, state.latestRaceDate);
  }
}
