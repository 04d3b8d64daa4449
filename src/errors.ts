/**
 * TROTLINE - Error Types
 */

import type { EntityClass } from './races/schemas';

/** Invalid configuration, raised once at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * The skill update could not produce a usable result for one entity class
 * in one race (degenerate ranks, non-finite output). The engine contains it
 * to that class; the other classes of the race still go through.
 */
export class RatingUpdateError extends Error {
  entityClass: EntityClass | null;

  constructor(message: string, entityClass: EntityClass | null = null) {
    super(message);
    this.name = 'RatingUpdateError';
    this.entityClass = entityClass;
  }
}

/** A race dated before races already applied in its discipline. */
export class OutOfOrderRaceError extends Error {
  constructor(race: string, latestApplied: Date) {
    super(
      `${race} is dated before the latest applied race (${latestApplied.toISOString().slice(0, 10)})`,
    );
    this.name = 'OutOfOrderRaceError';
  }
}

/**
 * A guarded race batch found its race already written when it came to
 * commit: the race is recorded, or the classes being retried were already
 * rated for it.
 */
export class RaceAlreadyRecordedError extends Error {
  entityClasses: EntityClass[];

  constructor(race: string, entityClasses: EntityClass[] = []) {
    super(
      entityClasses.length > 0
        ? `${race} already has ${entityClasses.join(', ')} ratings`
        : `${race} is already recorded`,
    );
    this.name = 'RaceAlreadyRecordedError';
    this.entityClasses = entityClasses;
  }
}

/** Odds requested for an empty field or with unusable ratings. */
export class InvalidOddsInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOddsInputError';
  }
}
