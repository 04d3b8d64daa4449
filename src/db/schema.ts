/**
 * TROTLINE - SQLite Schema & Row Mapping
 *
 * Row types mirror the tables one-to-one; dates are ISO strings and
 * booleans are 0/1, as SQLite stores them.
 *
 * Schema:
 *   entity_ratings(discipline, entity_class, name, mu, sigma, races_counted,
 *                  last_active, last_venue)
 *   rating_history(id, discipline, entity_class, name, mu, sigma, race_date, venue,
 *                  race_number, finish_position, race_class, horse_name, recorded_at)
 *   race_entries(race_date, venue, race_number, horse_name, driver_name, trainer_name,
 *                finish_position, race_class, discipline, is_qualifier)
 */

import {
  DisciplineSchema,
  EntityClassSchema,
} from '../races/schemas';
import type { BeliefRecord, HistoryRecord, RaceEntryRecord } from './store';

// ─── DDL ─────────────────────────────────────────────────────────

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS entity_ratings (
    discipline TEXT NOT NULL,
    entity_class TEXT NOT NULL,
    name TEXT NOT NULL,
    mu REAL NOT NULL,
    sigma REAL NOT NULL CHECK (sigma > 0),
    races_counted INTEGER NOT NULL DEFAULT 0,
    last_active TEXT NOT NULL,
    last_venue TEXT,
    PRIMARY KEY (discipline, entity_class, name)
  );

  CREATE TABLE IF NOT EXISTS rating_history (
    id TEXT NOT NULL PRIMARY KEY,
    discipline TEXT NOT NULL,
    entity_class TEXT NOT NULL,
    name TEXT NOT NULL,
    mu REAL NOT NULL,
    sigma REAL NOT NULL,
    race_date TEXT NOT NULL,
    venue TEXT NOT NULL,
    race_number INTEGER NOT NULL,
    finish_position TEXT NOT NULL,
    race_class TEXT,
    horse_name TEXT,
    recorded_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_rating_history_entity
  ON rating_history (discipline, entity_class, name, race_date);

  CREATE INDEX IF NOT EXISTS idx_rating_history_race
  ON rating_history (race_date, venue, race_number);

  CREATE TABLE IF NOT EXISTS race_entries (
    race_date TEXT NOT NULL,
    venue TEXT NOT NULL,
    race_number INTEGER NOT NULL,
    horse_name TEXT NOT NULL,
    driver_name TEXT,
    trainer_name TEXT,
    finish_position TEXT,
    race_class TEXT,
    discipline TEXT NOT NULL,
    is_qualifier INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (race_date, venue, race_number, horse_name)
  );

  CREATE INDEX IF NOT EXISTS idx_race_entries_discipline
  ON race_entries (discipline, race_date);
`;

// ─── Row Types ───────────────────────────────────────────────────

export interface EntityRatingRow {
  discipline: string;
  entity_class: string;
  name: string;
  mu: number;
  sigma: number;
  races_counted: number;
  last_active: string;
  last_venue: string | null;
}

export interface RatingHistoryRow {
  id: string;
  discipline: string;
  entity_class: string;
  name: string;
  mu: number;
  sigma: number;
  race_date: string;
  venue: string;
  race_number: number;
  finish_position: string;
  race_class: string | null;
  horse_name: string | null;
  recorded_at: string;
}

export interface RaceEntryRow {
  race_date: string;
  venue: string;
  race_number: number;
  horse_name: string;
  driver_name: string | null;
  trainer_name: string | null;
  finish_position: string | null;
  race_class: string | null;
  discipline: string;
  is_qualifier: number; // 0 or 1
}

// ─── Mapping ─────────────────────────────────────────────────────

export function beliefFromRow(row: EntityRatingRow): BeliefRecord {
  return {
    discipline: DisciplineSchema.parse(row.discipline),
    entityClass: EntityClassSchema.parse(row.entity_class),
    name: row.name,
    mu: row.mu,
    sigma: row.sigma,
    lastActive: new Date(row.last_active),
    lastVenue: row.last_venue,
    racesCounted: row.races_counted,
  };
}

export function beliefToRow(record: BeliefRecord): EntityRatingRow {
  return {
    discipline: record.discipline,
    entity_class: record.entityClass,
    name: record.name,
    mu: record.mu,
    sigma: record.sigma,
    races_counted: record.racesCounted,
    last_active: record.lastActive.toISOString(),
    last_venue: record.lastVenue,
  };
}

export function historyFromRow(row: RatingHistoryRow): HistoryRecord {
  return {
    discipline: DisciplineSchema.parse(row.discipline),
    entityClass: EntityClassSchema.parse(row.entity_class),
    name: row.name,
    mu: row.mu,
    sigma: row.sigma,
    raceDate: new Date(row.race_date),
    venue: row.venue,
    raceNumber: row.race_number,
    finishPosition: row.finish_position,
    raceClass: row.race_class,
    horseName: row.horse_name,
  };
}

export function historyToRow(record: HistoryRecord, id: string, recordedAt: string): RatingHistoryRow {
  return {
    id,
    discipline: record.discipline,
    entity_class: record.entityClass,
    name: record.name,
    mu: record.mu,
    sigma: record.sigma,
    race_date: record.raceDate.toISOString(),
    venue: record.venue,
    race_number: record.raceNumber,
    finish_position: record.finishPosition,
    race_class: record.raceClass,
    horse_name: record.horseName,
    recorded_at: recordedAt,
  };
}

export function raceEntryFromRow(row: RaceEntryRow): RaceEntryRecord {
  return {
    raceDate: new Date(row.race_date),
    venue: row.venue,
    raceNumber: row.race_number,
    horseName: row.horse_name,
    driverName: row.driver_name,
    trainerName: row.trainer_name,
    finishPosition: row.finish_position,
    raceClass: row.race_class,
    discipline: DisciplineSchema.parse(row.discipline),
    isQualifier: row.is_qualifier === 1,
  };
}

export function raceEntryToRow(record: RaceEntryRecord): RaceEntryRow {
  return {
    race_date: record.raceDate.toISOString(),
    venue: record.venue,
    race_number: record.raceNumber,
    horse_name: record.horseName,
    driver_name: record.driverName,
    trainer_name: record.trainerName,
    finish_position: record.finishPosition,
    race_class: record.raceClass,
    discipline: record.discipline,
    is_qualifier: record.isQualifier ? 1 : 0,
  };
}
