/**
 * TROTLINE - Rating Fusion
 *
 * Combines a starter's horse, driver and trainer ratings into one rating
 * for pricing. The weight row is picked by which of driver/trainer are known:
 *
 *   fused_mu    = w_h * mu_h    + w_d * mu_d    + w_t * mu_t
 *   fused_sigma = w_h * sigma_h + w_d * sigma_d + w_t * sigma_t
 *
 * Sigma is a weighted average, not a sum in quadrature.
 */

import type { ClassWeights, FusionWeightTable } from '../config';
import type { Rating } from './trueskill';

/** Pick the weight row for the components that are present. */
export function selectWeights(
  table: FusionWeightTable,
  hasDriver: boolean,
  hasTrainer: boolean,
): ClassWeights {
  if (hasDriver && hasTrainer) return table.both;
  if (hasDriver) return table.driverOnly;
  if (hasTrainer) return table.trainerOnly;
  return table.neither;
}

/**
 * Fuse the three ratings of one starter.
 *
 * A null driver or trainer is unknown: it selects the matching partial row
 * and never contributes to the result. With neither known the horse rating
 * comes back unchanged.
 */
export function fuseRatings(
  horse: Rating,
  driver: Rating | null,
  trainer: Rating | null,
  table: FusionWeightTable,
): Rating {
  const weights = selectWeights(table, driver !== null, trainer !== null);

  let mu = weights.horse * horse.mu;
  let sigma = weights.horse * horse.sigma;

  if (driver && weights.driver > 0) {
    mu += weights.driver * driver.mu;
    sigma += weights.driver * driver.sigma;
  }
  if (trainer && weights.trainer > 0) {
    mu += weights.trainer * trainer.mu;
    sigma += weights.trainer * trainer.sigma;
  }

  return { mu, sigma };
}
