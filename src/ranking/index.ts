/**
 * TROTLINE - Ranking Module
 *
 * TrueSkill-based ratings for the three entity classes of a harness race.
 *
 * Every race updates up to three independent fields, all ranked by the
 * horse's finishing position:
 *   - Horse: the horses themselves
 *   - Driver: the drivers in the sulky
 *   - Trainer: the trainers who sent the horses out
 *
 * Trotters and pacers are rated separately. Ratings decay with inactivity
 * when read, and are fused per starter for the morning line.
 */

// Core TrueSkill math
export {
  updateRanked,
  conservativeRating,
  drawMargin,
  CONSERVATIVE_FACTOR,
} from './trueskill';

export type { Rating, RankedPlayer, SkillParams } from './trueskill';

// Decay & fusion
export { decayMu, decayRating, daysBetween } from './decay';
export type { DecayConfig } from './decay';
export { fuseRatings, selectWeights } from './fusion';

// Race application
export { RatingEngine, RACE_STATUSES } from './engine';
export type {
  RaceStatus,
  RaceResult,
  BatchSummary,
  ClassFailure,
  ApplyOptions,
  IngestOptions,
} from './engine';

// Reads
export { RatingManager } from './ratings';
export type { DecayedBelief, FormLine, LeaderboardEntry, LeaderboardOptions } from './ratings';
