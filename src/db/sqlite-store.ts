/**
 * TROTLINE - SQLite Rating Store
 *
 * better-sqlite3 backed RatingStore. One database file holds both
 * disciplines; rows are partitioned by their discipline column.
 * A race's writes go through a single SQLite transaction.
 */

import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';

import {
  ENTITY_CLASSES,
  EntityClassSchema,
  type Discipline,
  type EntityClass,
  type RaceKey,
} from '../races/schemas';
import {
  SCHEMA_SQL,
  beliefFromRow,
  beliefToRow,
  historyFromRow,
  historyToRow,
  raceEntryFromRow,
  raceEntryToRow,
  type EntityRatingRow,
  type RaceEntryRow,
  type RatingHistoryRow,
} from './schema';
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

export class SqliteRatingStore implements RatingStore {
  private readonly db: Database.Database;
  private readonly applyBatch: (batch: RaceWriteBatch) => void;

  /** @param filename Database file, or ":memory:". */
  constructor(filename: string = ':memory:') {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.ensureTables();

    const upsertBelief = this.db.prepare<EntityRatingRow>(
      `INSERT INTO entity_ratings (discipline, entity_class, name, mu, sigma, races_counted, last_active, last_venue)
       VALUES (@discipline, @entity_class, @name, @mu, @sigma, @races_counted, @last_active, @last_venue)
       ON CONFLICT(discipline, entity_class, name) DO UPDATE SET
         mu = excluded.mu,
         sigma = excluded.sigma,
         races_counted = excluded.races_counted,
         last_active = excluded.last_active,
         last_venue = excluded.last_venue`,
    );

    const insertHistory = this.db.prepare<RatingHistoryRow>(
      `INSERT INTO rating_history (id, discipline, entity_class, name, mu, sigma, race_date, venue, race_number, finish_position, race_class, horse_name, recorded_at)
       VALUES (@id, @discipline, @entity_class, @name, @mu, @sigma, @race_date, @venue, @race_number, @finish_position, @race_class, @horse_name, @recorded_at)`,
    );

    const upsertRaceEntry = this.db.prepare<RaceEntryRow>(
      `INSERT INTO race_entries (race_date, venue, race_number, horse_name, driver_name, trainer_name, finish_position, race_class, discipline, is_qualifier)
       VALUES (@race_date, @venue, @race_number, @horse_name, @driver_name, @trainer_name, @finish_position, @race_class, @discipline, @is_qualifier)
       ON CONFLICT(race_date, venue, race_number, horse_name) DO UPDATE SET
         driver_name = excluded.driver_name,
         trainer_name = excluded.trainer_name,
         finish_position = excluded.finish_position,
         race_class = excluded.race_class,
         discipline = excluded.discipline,
         is_qualifier = excluded.is_qualifier`,
    );

    this.applyBatch = this.db.transaction((batch: RaceWriteBatch) => {
      const { guard } = batch;
      if (guard) {
        checkCommitGuard(guard, {
          recorded: this.raceRecorded(guard.race),
          ratedClasses: guard.retryClasses === null ? [] : this.ratedClasses(guard.race),
          latestRaceDate: this.latestRaceDate(guard.discipline),
        });
      }

      const recordedAt = new Date().toISOString();
      for (const belief of batch.beliefs) {
        upsertBelief.run(beliefToRow(belief));
      }
      for (const entry of batch.history) {
        insertHistory.run(historyToRow(entry, randomUUID(), recordedAt));
      }
      for (const entry of batch.raceEntries) {
        upsertRaceEntry.run(raceEntryToRow(entry));
      }
    });
  }

  /**
   * Create tables and indexes if they do not exist.
   * Safe to call multiple times (idempotent).
   */
  ensureTables(): void {
    this.db.exec(SCHEMA_SQL);
  }

  // ─── Read Operations ──────────────────────────────────────────────────────

  async getBelief(key: EntityKey): Promise<BeliefRecord | null> {
    const row = this.db
      .prepare<[string, string, string], EntityRatingRow>(
        'SELECT * FROM entity_ratings WHERE discipline = ? AND entity_class = ? AND name = ?',
      )
      .get(key.discipline, key.entityClass, key.name);

    return row ? beliefFromRow(row) : null;
  }

  async getBeliefs(
    discipline: Discipline,
    entityClass: EntityClass,
    names: string[],
  ): Promise<Map<string, BeliefRecord>> {
    const beliefs = new Map<string, BeliefRecord>();
    if (names.length === 0) return beliefs;

    const unique = [...new Set(names)];
    const placeholders = unique.map(() => '?').join(', ');
    const rows = this.db
      .prepare<unknown[], EntityRatingRow>(
        `SELECT * FROM entity_ratings
         WHERE discipline = ? AND entity_class = ? AND name IN (${placeholders})`,
      )
      .all(discipline, entityClass, ...unique);

    for (const row of rows) {
      beliefs.set(row.name, beliefFromRow(row));
    }
    return beliefs;
  }

  async listBeliefs(discipline: Discipline, entityClass: EntityClass): Promise<BeliefRecord[]> {
    const rows = this.db
      .prepare<[string, string], EntityRatingRow>(
        'SELECT * FROM entity_ratings WHERE discipline = ? AND entity_class = ? ORDER BY name ASC',
      )
      .all(discipline, entityClass);

    return rows.map(beliefFromRow);
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

  async getHistory(key: EntityKey, query: HistoryQuery = {}): Promise<HistoryRecord[]> {
    if (query.limit !== undefined) {
      if (query.limit <= 0) return [];
      const rows = this.db
        .prepare<[string, string, string, number], RatingHistoryRow>(
          `SELECT * FROM (
             SELECT *, rowid AS seq FROM rating_history
             WHERE discipline = ? AND entity_class = ? AND name = ?
             ORDER BY race_date DESC, seq DESC
             LIMIT ?
           )
           ORDER BY race_date ASC, seq ASC`,
        )
        .all(key.discipline, key.entityClass, key.name, query.limit);
      return rows.map(historyFromRow);
    }

    const rows = this.db
      .prepare<[string, string, string], RatingHistoryRow>(
        `SELECT * FROM rating_history
         WHERE discipline = ? AND entity_class = ? AND name = ?
         ORDER BY race_date ASC, rowid ASC`,
      )
      .all(key.discipline, key.entityClass, key.name);
    return rows.map(historyFromRow);
  }

  async getRaceEntries(key: RaceKey): Promise<RaceEntryRecord[]> {
    const rows = this.db
      .prepare<[string, string, number], RaceEntryRow>(
        `SELECT * FROM race_entries
         WHERE race_date = ? AND venue = ? AND race_number = ?
         ORDER BY horse_name ASC`,
      )
      .all(key.raceDate, key.venue, key.raceNumber);

    return rows.map(raceEntryFromRow);
  }

  // ─── Write Operations ─────────────────────────────────────────────────────

  async commit(batch: RaceWriteBatch): Promise<void> {
    this.applyBatch(batch);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  // ─── Synchronous Reads (usable inside a transaction) ──────────────────────

  private raceRecorded(key: RaceKey): boolean {
    const row = this.db
      .prepare<[string, string, number], { found: number }>(
        `SELECT 1 AS found FROM race_entries
         WHERE race_date = ? AND venue = ? AND race_number = ?
         LIMIT 1`,
      )
      .get(key.raceDate, key.venue, key.raceNumber);

    return row !== undefined;
  }

  private latestRaceDate(discipline: Discipline): Date | null {
    const row = this.db
      .prepare<[string], { latest: string | null }>(
        'SELECT MAX(race_date) AS latest FROM race_entries WHERE discipline = ?',
      )
      .get(discipline);

    return row?.latest ? new Date(row.latest) : null;
  }

  private ratedClasses(key: RaceKey): EntityClass[] {
    const rows = this.db
      .prepare<[string, string, number], { entity_class: string }>(
        `SELECT DISTINCT entity_class FROM rating_history
         WHERE race_date = ? AND venue = ? AND race_number = ?`,
      )
      .all(key.raceDate, key.venue, key.raceNumber);

    const found = rows.map((row) => EntityClassSchema.parse(row.entity_class));
    return ENTITY_CLASSES.filter((c) => found.includes(c));
  }
}
