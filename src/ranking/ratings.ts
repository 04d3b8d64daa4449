/**
 * TROTLINE - Rating Manager
 *
 * Read side of the rating store: decayed belief lookups, recent form with
 * per-race deltas, and leaderboards. Decay is applied here, relative to the
 * date the caller asks about, and never written back.
 */

import type { TrotlineConfig } from '../config';
import type { BeliefRecord, HistoryRecord, RatingStore } from '../db/store';
import type { Discipline, EntityClass } from '../races/schemas';
import { daysBetween, decayMu } from './decay';
import { conservativeRating, type Rating } from './trueskill';

// ─── Response Types ───────────────────────────────────────────────────────────

export interface DecayedBelief {
  discipline: Discipline;
  entityClass: EntityClass;
  name: string;
  /** mu after decay as of the requested date. */
  mu: number;
  /** mu as stored. */
  storedMu: number;
  sigma: number;
  lastActive: Date;
  lastVenue: string | null;
  daysInactive: number;
  racesCounted: number;
}

export interface FormLine {
  raceDate: Date;
  venue: string;
  raceNumber: number;
  finishPosition: string;
  raceClass: string | null;
  horseName: string | null;
  /** mu going into the race (previous snapshot, or the default for a debut). */
  muBefore: number;
  muAfter: number;
  delta: number;
}

export interface LeaderboardEntry {
  rank: number;
  name: string;
  mu: number;
  sigma: number;
  conservative: number;
  racesCounted: number;
  lastActive: Date;
}

export interface LeaderboardOptions {
  limit?: number;
  minRaces?: number;
  asOf?: Date;
}

// ─── Rating Manager ───────────────────────────────────────────────────────────

export class RatingManager {
  constructor(
    private readonly store: RatingStore,
    private readonly config: TrotlineConfig,
  ) {}

  /** Rating for an entity never seen before. */
  defaultRating(): Rating {
    return { mu: this.config.defaultMu, sigma: this.config.defaultSigma };
  }

  decay(record: BeliefRecord, asOf: Date): DecayedBelief {
    const daysInactive = daysBetween(record.lastActive, asOf);
    return {
      discipline: record.discipline,
      entityClass: record.entityClass,
      name: record.name,
      mu: decayMu(record.mu, daysInactive, this.config),
      storedMu: record.mu,
      sigma: record.sigma,
      lastActive: record.lastActive,
      lastVenue: record.lastVenue,
      daysInactive,
      racesCounted: record.racesCounted,
    };
  }

  /** Decayed belief of one entity, or null if it has never been seen. */
  async getBelief(
    discipline: Discipline,
    entityClass: EntityClass,
    name: string,
    asOf: Date = new Date(),
  ): Promise<DecayedBelief | null> {
    const record = await this.store.getBelief({ discipline, entityClass, name });
    return record ? this.decay(record, asOf) : null;
  }

  /**
   * Decayed ratings for several names of one class.
   * Names that are not in the store get the default rating.
   */
  async getRatings(
    discipline: Discipline,
    entityClass: EntityClass,
    names: string[],
    asOf: Date,
  ): Promise<Map<string, Rating>> {
    const records = await this.store.getBeliefs(discipline, entityClass, names);
    const ratings = new Map<string, Rating>();
    for (const name of names) {
      const record = records.get(name);
      if (record) {
        const decayed = this.decay(record, asOf);
        ratings.set(name, { mu: decayed.mu, sigma: decayed.sigma });
      } else {
        ratings.set(name, this.defaultRating());
      }
    }
    return ratings;
  }

  // ─── History ────────────────────────────────────────────────────────────

  /** Rating snapshots of one entity, oldest first; `limit` keeps the most recent. */
  async getHistory(
    discipline: Discipline,
    entityClass: EntityClass,
    name: string,
    limit?: number,
  ): Promise<HistoryRecord[]> {
    return this.store.getHistory({ discipline, entityClass, name }, { limit });
  }

  /**
   * Last `count` rated races, newest first, each with the change in mu it
   * caused. The change compares consecutive history snapshots, so time
   * decay between races is folded into the delta.
   */
  async getRecentForm(
    discipline: Discipline,
    entityClass: EntityClass,
    name: string,
    count: number = 5,
  ): Promise<FormLine[]> {
    if (count <= 0) return [];

    // One extra snapshot supplies the "before" of the oldest line.
    const history = await this.getHistory(discipline, entityClass, name, count + 1);

    const lines: FormLine[] = [];
    const start = history.length > count ? 1 : 0;
    for (let i = start; i < history.length; i++) {
      const entry = history[i];
      const muBefore = i > 0 ? history[i - 1].mu : this.config.defaultMu;
      lines.push({
        raceDate: entry.raceDate,
        venue: entry.venue,
        raceNumber: entry.raceNumber,
        finishPosition: entry.finishPosition,
        raceClass: entry.raceClass,
        horseName: entry.horseName,
        muBefore,
        muAfter: entry.mu,
        delta: entry.mu - muBefore,
      });
    }

    return lines.reverse();
  }

  // ─── Leaderboard ──────────────────────────────────────────────────────────

  /**
   * Entities of one class ranked by decayed conservative estimate
   * (mu - 3 * sigma). Only includes entities with at least `minRaces` rated.
   */
  async getLeaderboard(
    discipline: Discipline,
    entityClass: EntityClass,
    options: LeaderboardOptions = {},
  ): Promise<LeaderboardEntry[]> {
    const { limit = 20, minRaces = 1, asOf = new Date() } = options;

    const records = await this.store.listBeliefs(discipline, entityClass);

    return records
      .filter((r) => r.racesCounted >= minRaces)
      .map((r) => {
        const decayed = this.decay(r, asOf);
        return {
          name: r.name,
          mu: decayed.mu,
          sigma: decayed.sigma,
          conservative: conservativeRating(decayed),
          racesCounted: r.racesCounted,
          lastActive: r.lastActive,
        };
      })
      .sort((a, b) => b.conservative - a.conservative)
      .slice(0, limit)
      .map((entry, index) => ({ rank: index + 1, ...entry }));
  }
}
