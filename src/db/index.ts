/**
 * TROTLINE - Persistence Module
 */

export { SqliteRatingStore } from './sqlite-store';
export { MemoryRatingStore } from './memory-store';
export { checkCommitGuard, emptyBatch } from './store';

export type {
  RatingStore,
  EntityKey,
  BeliefRecord,
  HistoryRecord,
  RaceEntryRecord,
  RaceWriteBatch,
  CommitGuard,
  GuardState,
  HistoryQuery,
} from './store';
