/**
 * TROTLINE - Morning Line
 *
 * Prices an upcoming card from the rating store: decayed horse, driver and
 * trainer ratings as of the race date, fused per starter, then run through
 * the win-odds softmax. Names the store has never seen rate at the default.
 */

import type { TrotlineConfig } from '../config';
import type { RatingStore } from '../db/store';
import type { Logger } from '../logger';
import type { Race } from '../races/schemas';
import { fuseRatings } from '../ranking/fusion';
import { RatingManager } from '../ranking/ratings';
import type { Rating } from '../ranking/trueskill';
import { calculateWinOdds, type WinOdds } from './odds';

export interface FusedStarter {
  name: string;
  driverName: string | null;
  trainerName: string | null;
  fusedMu: number;
  fusedSigma: number;
  horseMu: number;
  /** null when no driver is named. */
  driverMu: number | null;
  /** null when no trainer is named. */
  trainerMu: number | null;
}

export type MorningLineEntry = FusedStarter & WinOdds;

export class MorningLineService {
  private readonly ratings: RatingManager;

  constructor(
    store: RatingStore,
    private readonly config: TrotlineConfig,
    private readonly logger: Logger = console,
  ) {
    this.ratings = new RatingManager(store, config);
  }

  /**
   * Fused ratings for every non-scratched starter of a card, in card order.
   * Decay is measured up to `asOf` (the race date by default).
   */
  async fuseCard(card: Race, asOf: Date = card.raceDate): Promise<FusedStarter[]> {
    const starters = card.starters.filter((s) => !s.isScratched);

    const names = (pick: (s: (typeof starters)[number]) => string | null): string[] =>
      starters.map(pick).filter((n): n is string => n !== null);

    const [horses, drivers, trainers] = await Promise.all([
      this.ratings.getRatings(card.discipline, 'horse', names((s) => s.horseName), asOf),
      this.ratings.getRatings(card.discipline, 'driver', names((s) => s.driverName), asOf),
      this.ratings.getRatings(card.discipline, 'trainer', names((s) => s.trainerName), asOf),
    ]);

    const lookup = (ratings: Map<string, Rating>, name: string | null): Rating | null =>
      name === null ? null : ratings.get(name) ?? this.ratings.defaultRating();

    return starters.map((s) => {
      const horse = lookup(horses, s.horseName) ?? this.ratings.defaultRating();
      const driver = lookup(drivers, s.driverName);
      const trainer = lookup(trainers, s.trainerName);
      const fused = fuseRatings(horse, driver, trainer, this.config.fusionWeights);

      return {
        name: s.horseName,
        driverName: s.driverName,
        trainerName: s.trainerName,
        fusedMu: fused.mu,
        fusedSigma: fused.sigma,
        horseMu: horse.mu,
        driverMu: driver?.mu ?? null,
        trainerMu: trainer?.mu ?? null,
      };
    });
  }

  /** Win probabilities and decimal odds for a card, favourite first. */
  async build(card: Race, asOf: Date = card.raceDate): Promise<MorningLineEntry[]> {
    const fused = await this.fuseCard(card, asOf);
    const line = calculateWinOdds(fused, this.config.oddsBeta);

    const favourite = line[0];
    this.logger.log(
      `[Odds] ${card.venue} R${card.raceNumber}: ${line.length} starters priced, ` +
        `favourite ${favourite.name} at ${favourite.decimalOdds.toFixed(2)}`,
    );

    return line;
  }
}
