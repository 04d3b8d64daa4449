/**
 * TROTLINE - Odds Module
 */

export { calculateWinOdds, formatDecimalOdds, formatOddsAgainst } from './odds';
export { MorningLineService } from './morning-line';

export type { WinOdds } from './odds';
export type { FusedStarter, MorningLineEntry } from './morning-line';
