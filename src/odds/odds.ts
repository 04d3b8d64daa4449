/**
 * TROTLINE - Win Odds
 *
 * Turns fused ratings into win probabilities with a log-sum-exp softmax:
 *
 *   score_i = exp((mu_i - max_mu) / beta)
 *   p_i     = score_i / sum(score)
 *   odds_i  = 1 / p_i
 *
 * Subtracting max_mu keeps every exponent <= 0 so nothing overflows.
 * Sigma plays no part: two starters with equal mu get equal odds however
 * uncertain either rating is.
 */

import { InvalidOddsInputError } from '../errors';

// ─── Types ───────────────────────────────────────────────────────

export interface WinOdds {
  /** Estimated win probability (0-1). */
  winProbability: number;
  /** Decimal odds (e.g. 2.5 means bet 1 win 2.5). */
  decimalOdds: number;
}

// ─── Core ────────────────────────────────────────────────────────

/**
 * Price every starter of one race.
 *
 * @param starters - Anything carrying a fused mu; extra fields pass through.
 * @returns Starters with odds, by descending probability. Equal
 *   probabilities keep their input order.
 * @throws InvalidOddsInputError for an empty field, a non-positive beta or
 *   a non-finite mu.
 */
export function calculateWinOdds<T extends { fusedMu: number }>(
  starters: T[],
  beta: number,
): Array<T & WinOdds> {
  if (starters.length === 0) {
    throw new InvalidOddsInputError('cannot price a race with no starters');
  }
  if (!Number.isFinite(beta) || beta <= 0) {
    throw new InvalidOddsInputError(`beta must be a positive number, got ${beta}`);
  }
  for (const s of starters) {
    if (!Number.isFinite(s.fusedMu)) {
      throw new InvalidOddsInputError(`fused mu must be finite, got ${s.fusedMu}`);
    }
  }

  const maxMu = Math.max(...starters.map((s) => s.fusedMu));
  const scores = starters.map((s) => Math.exp((s.fusedMu - maxMu) / beta));
  const total = scores.reduce((sum, score) => sum + score, 0);

  const priced = starters.map((s, i) => {
    const winProbability = scores[i] / total;
    const decimalOdds = winProbability > 0 ? 1 / winProbability : Infinity;
    return { ...s, winProbability, decimalOdds };
  });

  // Array.prototype.sort is stable.
  return priced.sort((a, b) => b.winProbability - a.winProbability);
}

// ─── Helpers ─────────────────────────────────────────────────────

/** Decimal odds for display, 2 dp ("3.45"); unbounded odds show as "-". */
export function formatDecimalOdds(decimalOdds: number): string {
  return Number.isFinite(decimalOdds) ? decimalOdds.toFixed(2) : '-';
}

/**
 * Morning-line style "N-1" text: the decimal odds minus the stake,
 * rounded to the nearest half point, never below "1-2".
 */
export function formatOddsAgainst(decimalOdds: number): string {
  if (!Number.isFinite(decimalOdds)) return '-';
  const against = Math.round((decimalOdds - 1) * 2) / 2;
  if (against < 1) return '1-2';
  return Number.isInteger(against) ? `${against}-1` : `${against * 2}-2`;
}
