/**
 * TROTLINE - Inactivity Decay
 *
 * A dormant entity's mu shrinks toward zero on a log curve:
 *
 *   days <= minDaysNoDecay          -> unchanged
 *   x     = days - minDaysNoDecay + 1   (days capped at maxDaysDecay)
 *   ratio = ln(x) / ln(maxDaysDecay - minDaysNoDecay + 1)
 *   mu'   = mu * (1 - ratio * maxDecay)
 *
 * With the defaults an entity idle for a year or more keeps half its mu.
 * Decay is applied when a belief is read and is only persisted by the next
 * rating update; sigma never decays.
 */

import type { TrotlineConfig } from '../config';
import type { Rating } from './trueskill';

export type DecayConfig = Pick<TrotlineConfig, 'minDaysNoDecay' | 'maxDaysDecay' | 'maxDecay'>;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function decayMu(mu: number, daysInactive: number, config: DecayConfig): number {
  if (daysInactive <= config.minDaysNoDecay) return mu;

  const days = Math.min(daysInactive, config.maxDaysDecay);
  const x = Math.max(1, days - config.minDaysNoDecay + 1);
  const maxX = config.maxDaysDecay - config.minDaysNoDecay + 1;
  if (maxX <= 1) return mu;

  const ratio = Math.log(x) / Math.log(maxX);
  return mu * (1 - ratio * config.maxDecay);
}

/** Whole days elapsed from `from` to `to`; never negative. */
export function daysBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY));
}

/** Rating as seen on `asOf` for an entity last active on `lastActive`. */
export function decayRating(
  rating: Rating,
  lastActive: Date,
  asOf: Date,
  config: DecayConfig,
): Rating {
  return {
    mu: decayMu(rating.mu, daysBetween(lastActive, asOf), config),
    sigma: rating.sigma,
  };
}
