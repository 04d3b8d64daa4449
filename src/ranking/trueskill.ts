/**
 * TROTLINE - TrueSkill Rating Engine
 *
 * Pure TypeScript implementation of Microsoft's TrueSkill ranking algorithm,
 * adapted for a race field where every starter is a team of one.
 *
 * TrueSkill models each entity's skill as a Gaussian distribution (mu, sigma)
 * where mu is the estimated skill and sigma is the uncertainty. After each race,
 * both are updated based on the finishing order.
 *
 * The N-starter race is decomposed into pairwise comparisons over the ranks:
 * a lower rank beat a higher one, equal ranks (dead heats) are draws.
 *
 * Reference: Herbrich, Minka & Graepel (2006) "TrueSkill: A Bayesian Skill Rating System"
 */

import { RatingUpdateError } from '../errors';

/** Number of sigma below mu for conservative rating estimate. */
export const CONSERVATIVE_FACTOR = 3;

// ─── Gaussian Helpers ─────────────────────────────────────────────────────────

/**
 * Standard normal probability density function.
 */
function normPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

/**
 * Standard normal cumulative distribution function.
 * Uses the rational approximation by Abramowitz & Stegun.
 */
function normCdf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  x = Math.abs(x) / Math.SQRT2;

  const t = 1.0 / (1.0 + p * x);
  const y = 1.0 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-x * x);

  return 0.5 * (1.0 + sign * y);
}

/**
 * Inverse of the standard normal CDF (Acklam's rational approximation).
 * Only used to turn a draw probability into a draw margin.
 */
function normInv(p: number): number {
  if (p <= 0) return -Infinity;
  if (p >= 1) return Infinity;

  const a = [-39.69683028665376, 220.9460984245205, -275.9285104469687, 138.357751867269, -30.66479806614716, 2.506628277459239];
  const b = [-54.47609879822406, 161.5858368580409, -155.6989798598866, 66.80131188771972, -13.28068155288572];
  const c = [-0.007784894002430293, -0.3223964580411365, -2.400758277161838, -2.549732539343734, 4.374664141464968, 2.938163982698783];
  const d = [0.007784695709041462, 0.3224671290700398, 2.445134137142996, 3.754408661907416];

  const pLow = 0.02425;

  if (p < pLow) {
    const q = Math.sqrt(-2 * Math.log(p));
    return (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1);
  }
  if (p > 1 - pLow) {
    const q = Math.sqrt(-2 * Math.log(1 - p));
    return -(((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1);
  }

  const q = p - 0.5;
  const r = q * q;
  return (((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q /
    (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1);
}

/**
 * v function (truncated Gaussian update factor for wins).
 * v(t, epsilon) = pdf(t - epsilon) / cdf(t - epsilon)
 *
 * For no-draw games (epsilon = 0): v(t) = pdf(t) / cdf(t)
 */
function vWin(t: number, epsilon: number = 0): number {
  const denom = normCdf(t - epsilon);
  if (denom < 1e-10) return -t + epsilon; // Limit behavior
  return normPdf(t - epsilon) / denom;
}

/**
 * w function (variance reduction factor for wins).
 * w(t, epsilon) = v(t, epsilon) * (v(t, epsilon) + t - epsilon)
 */
function wWin(t: number, epsilon: number = 0): number {
  const v = vWin(t, epsilon);
  return v * (v + t - epsilon);
}

/**
 * v function for draws. Signed: positive t (first entity stronger) pulls
 * the first entity down and the second up.
 */
function vDraw(t: number, epsilon: number): number {
  const absT = Math.abs(t);
  const a = epsilon - absT;
  const b = -epsilon - absT;
  const denom = normCdf(a) - normCdf(b);
  const v = denom > 1e-10 ? (normPdf(b) - normPdf(a)) / denom : a;
  return t < 0 ? -v : v;
}

/**
 * w function for draws. Throws when the draw interval has no mass,
 * which is always the case with a zero draw margin.
 */
function wDraw(t: number, epsilon: number): number {
  const absT = Math.abs(t);
  const a = epsilon - absT;
  const b = -epsilon - absT;
  const denom = normCdf(a) - normCdf(b);
  if (denom <= 1e-10) {
    throw new RatingUpdateError('draw factor is undefined: the draw interval has no probability mass');
  }
  const v = vDraw(absT, epsilon);
  return v * v + (a * normPdf(a) - b * normPdf(b)) / denom;
}

/**
 * Performance difference below which two starters count as a draw,
 * for a given draw probability.
 */
export function drawMargin(drawProbability: number, beta: number): number {
  if (drawProbability <= 0) return 0;
  return normInv((drawProbability + 1) / 2) * Math.SQRT2 * beta;
}

// ─── Rating Type ──────────────────────────────────────────────────────────────

/** A TrueSkill rating represented as a Gaussian distribution. */
export interface Rating {
  /** Estimated skill (mean of the Gaussian). */
  mu: number;
  /** Uncertainty (standard deviation of the Gaussian). */
  sigma: number;
}

/** Parameters of the update, taken from the engine config. */
export interface SkillParams {
  /** Performance variation factor. */
  beta: number;
  /** Dynamic factor (sigma increase per race). */
  tau: number;
  drawProbability: number;
}

/**
 * Conservative skill estimate: mu - k * sigma.
 * This is the "display" rating used for leaderboards.
 */
export function conservativeRating(rating: Rating, k: number = CONSERVATIVE_FACTOR): number {
  return rating.mu - k * rating.sigma;
}

// ─── Ranked Update ────────────────────────────────────────────────────────────

/** An entity's identity, pre-race rating and finishing rank. */
export interface RankedPlayer {
  id: string;
  rating: Rating;
  /** 1 = winner. Equal ranks are dead heats. */
  rank: number;
}

/**
 * Update ratings for one race from the finishing ranks.
 *
 * The race is decomposed into pairwise comparisons:
 * - every lower rank beat every higher rank,
 * - every pair sharing a rank drew.
 *
 * To prevent over-updating (since each entity participates in many pairwise
 * comparisons), the update magnitude is scaled by 1/(N-1) where N is the
 * number of entities.
 *
 * @throws RatingUpdateError on duplicate ids, a dead heat with a zero draw
 *   margin, or a non-finite result.
 * @returns Map of entity ID -> updated Rating.
 */
export function updateRanked(
  players: RankedPlayer[],
  params: SkillParams,
): Map<string, Rating> {
  const n = players.length;
  if (n < 2) {
    const result = new Map<string, Rating>();
    if (n === 1) result.set(players[0].id, players[0].rating);
    return result;
  }

  const epsilon = drawMargin(params.drawProbability, params.beta);

  // Apply dynamic factor: increase sigma slightly before update
  const dynamic = new Map<string, Rating>();
  for (const p of players) {
    if (dynamic.has(p.id)) {
      throw new RatingUpdateError(`"${p.id}" appears more than once in the field`);
    }
    const newSigma = Math.sqrt(p.rating.sigma * p.rating.sigma + params.tau * params.tau);
    dynamic.set(p.id, { mu: p.rating.mu, sigma: newSigma });
  }

  // Accumulate pairwise deltas
  const deltas = new Map<string, { muDelta: number; sigmaFactor: number }>();
  for (const p of players) {
    deltas.set(p.id, { muDelta: 0, sigmaFactor: 0 });
  }

  // Scale factor to prevent over-updating
  const scale = 1.0 / (n - 1);

  for (let i = 0; i < n - 1; i++) {
    for (let j = i + 1; j < n; j++) {
      const draw = players[i].rank === players[j].rank;
      const [first, second] = players[i].rank <= players[j].rank
        ? [players[i], players[j]]
        : [players[j], players[i]];

      const firstRating = ratingOf(dynamic, first.id);
      const secondRating = ratingOf(dynamic, second.id);

      const c = Math.sqrt(
        2 * params.beta * params.beta +
        firstRating.sigma * firstRating.sigma +
        secondRating.sigma * secondRating.sigma,
      );
      const t = (firstRating.mu - secondRating.mu) / c;

      let v: number;
      let w: number;
      if (draw) {
        if (epsilon <= 0) {
          throw new RatingUpdateError(
            `dead heat between "${first.id}" and "${second.id}" cannot be rated with a zero draw probability`,
          );
        }
        v = vDraw(t, epsilon / c);
        w = wDraw(t, epsilon / c);
      } else {
        v = vWin(t, epsilon / c);
        w = wWin(t, epsilon / c);
      }

      const firstDelta = deltaOf(deltas, first.id);
      const secondDelta = deltaOf(deltas, second.id);

      // Accumulate mu deltas (scaled)
      firstDelta.muDelta += scale * (firstRating.sigma * firstRating.sigma / c) * v;
      secondDelta.muDelta -= scale * (secondRating.sigma * secondRating.sigma / c) * v;

      // Accumulate sigma reduction factors (scaled)
      firstDelta.sigmaFactor += scale * (firstRating.sigma * firstRating.sigma / (c * c)) * w;
      secondDelta.sigmaFactor += scale * (secondRating.sigma * secondRating.sigma / (c * c)) * w;
    }
  }

  // Apply deltas
  const result = new Map<string, Rating>();
  for (const p of players) {
    const base = ratingOf(dynamic, p.id);
    const delta = deltaOf(deltas, p.id);

    const newMu = base.mu + delta.muDelta;
    const sigmaReduction = Math.min(delta.sigmaFactor, 0.95); // Cap at 95% to prevent collapse
    const newSigmaSq = base.sigma * base.sigma * (1 - sigmaReduction);
    const newSigma = Math.sqrt(Math.max(newSigmaSq, 1e-6));

    if (!Number.isFinite(newMu) || !Number.isFinite(newSigma)) {
      throw new RatingUpdateError(`update for "${p.id}" produced a non-finite rating`);
    }
    result.set(p.id, { mu: newMu, sigma: newSigma });
  }

  return result;
}

function ratingOf(ratings: Map<string, Rating>, id: string): Rating {
  const rating = ratings.get(id);
  if (!rating) throw new RatingUpdateError(`no rating for "${id}"`);
  return rating;
}

function deltaOf(
  deltas: Map<string, { muDelta: number; sigmaFactor: number }>,
  id: string,
): { muDelta: number; sigmaFactor: number } {
  const delta = deltas.get(id);
  if (!delta) throw new RatingUpdateError(`no delta for "${id}"`);
  return delta;
}
