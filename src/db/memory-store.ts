/**
 * TROTLINE - In-memory Rating Store
 *
 * Map-backed RatingStore for embedding the engine without a database and for
 * tests. Records are copied on the way in and out so callers never hold a
 * reference into the store.
 */

import { ENTITY_CLASSES, type Discipline, type EntityClass, type RaceKey } from '../races/schemas';
import {
  checkCommitGuard,
  type BeliefRecord,
  type EntityKey,
  type HistoryQuery,
  type HistoryRecord,
  type RaceEntryRecord,
  type RaceWriteBatch,
  type RatingStore,
} from './store';

function entityId(key: EntityKey): string {
  return `${key.discipline}|${key.entityClass}|${key.name}`;
}

function raceId(key: RaceKey): string {
  return `${key.raceDate}|${key.venue}|${key.raceNumber}`;
}

function copyBelief(record: BeliefRecord): BeliefRecord {
  return { ...record, lastActive: new Date(record.lastActive) };
}

function copyHistory(record: HistoryRecord): HistoryRecord {
  return { ...record, raceDate: new Date(record.raceDate) };
}

function copyRaceEntry(record: RaceEntryRecord): RaceEntryRecord {
  return { ...record, raceDate: new Date(record.raceDate) };
}

export class MemoryRatingStore implements RatingStore {
  private beliefs = new Map<string, BeliefRecord>();
  private history = new Map<string, HistoryRecord[]>();
  /** race id -> horse name -> entry */
  private raceEntries = new Map<string, Map<string, RaceEntryRecord>>();

  async getBelief(key: EntityKey): Promise<BeliefRecord | null> {
    const record = this.beliefs.get(entityId(key));
    return record ? copyBelief(record) : null;
  }

  async getBeliefs(
    discipline: Discipline,
    entityClass: EntityClass,
    names: string[],
  ): Promise<Map<string, BeliefRecord>> {
    const result = new Map<string, BeliefRecord>();
    for (const name of names) {
      const record = this.beliefs.get(entityId({ discipline, entityClass, name }));
      if (record) result.set(name, copyBelief(record));
    }
    return result;
  }

  async listBeliefs(discipline: Discipline, entityClass: EntityClass): Promise<BeliefRecord[]> {
    return [...this.beliefs.values()]
      .filter((r) => r.discipline === discipline && r.entityClass === entityClass)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(copyBelief);
  }

  async hasRace(key: RaceKey): Promise<boolean> {
    return this.raceRecorded(key);
  }

  async getLatestRaceDate(discipline: Discipline): Promise<Date | null> {
    return this.latestRaceDate(discipline);
  }

  async getRatedClasses(key: RaceKey): Promise<EntityClass[]> {
    return this.ratedClasses(key);
  }

  async commit(batch: RaceWriteBatch): Promise<void> {
    // Nothing below awaits, so the guard sees the state the batch is written over.
    const { guard } = batch;
    if (guard) {
      checkCommitGuard(guard, {
        recorded: this.raceRecorded(guard.race),
        ratedClasses: guard.retryClasses === null ? [] : this.ratedClasses(guard.race),
        latestRaceDate: this.latestRaceDate(guard.discipline),
      });
    }

    for (const belief of batch.beliefs) {
      this.beliefs.set(entityId(belief), copyBelief(belief));
    }
    for (const entry of batch.history) {
      const id = entityId(entry);
      const list = this.history.get(id) ?? [];
      list.push(copyHistory(entry));
      // Stable: entries of the same date keep insertion order.
      list.sort((a, b) => a.raceDate.getTime() - b.raceDate.getTime());
      this.history.set(id, list);
    }
    for (const entry of batch.raceEntries) {
      const id = raceId({
        raceDate: entry.raceDate.toISOString(),
        venue: entry.venue,
        raceNumber: entry.raceNumber,
      });
      const entries = this.raceEntries.get(id) ?? new Map<string, RaceEntryRecord>();
      entries.set(entry.horseName, copyRaceEntry(entry));
      this.raceEntries.set(id, entries);
    }
  }

  async getHistory(key: EntityKey, query: HistoryQuery = {}): Promise<HistoryRecord[]> {
    const list = this.history.get(entityId(key)) ?? [];
    const window = query.limit === undefined
      ? list
      : query.limit <= 0 ? [] : list.slice(-query.limit);
    return window.map(copyHistory);
  }

  async getRaceEntries(key: RaceKey): Promise<RaceEntryRecord[]> {
    const entries = this.raceEntries.get(raceId(key));
    if (!entries) return [];
    return [...entries.values()]
      .sort((a, b) => a.horseName.localeCompare(b.horseName))
      .map(copyRaceEntry);
  }

  async close(): Promise<void> {
    this.beliefs.clear();
    this.history.clear();
    this.raceEntries.clear();
  }

  private raceRecorded(key: RaceKey): boolean {
    const entries = this.raceEntries.get(raceId(key));
    return entries !== undefined && entries.size > 0;
  }

  private ratedClasses(key: RaceKey): EntityClass[] {
    const time = new Date(key.raceDate).getTime();
    const rated = new Set<EntityClass>();
    for (const list of this.history.values()) {
      for (const entry of list) {
        if (
          entry.raceDate.getTime() === time &&
          entry.venue === key.venue &&
          entry.raceNumber === key.raceNumber
        ) {
          rated.add(entry.entityClass);
        }
      }
    }
    return ENTITY_CLASSES.filter((c) => rated.has(c));
  }

  private latestRaceDate(discipline: Discipline): Date | null {
    let latest: number | null = null;
    for (const entries of this.raceEntries.values()) {
      for (const entry of entries.values()) {
        if (entry.discipline !== discipline) continue;
        const time = entry.raceDate.getTime();
        if (latest === null || time > latest) latest = time;
      }
    }
    return latest === null ? null : new Date(latest);
  }
}
