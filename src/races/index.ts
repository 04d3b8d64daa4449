/**
 * TROTLINE - Races Module
 */

export {
  RaceSchema,
  StarterSchema,
  DisciplineSchema,
  EntityClassSchema,
  ENTITY_CLASSES,
  normalizeName,
  normalizeVenue,
  normalizeDiscipline,
  parseFinish,
  finishText,
  raceKeyOf,
  formatRaceKey,
} from './schemas';

export type {
  Discipline,
  EntityClass,
  Finish,
  Race,
  RaceInput,
  RaceKey,
  Starter,
  StarterInput,
} from './schemas';
