/**
 * TROTLINE - Race Schemas
 *
 * Runtime validation for the race records handed over by the card/result
 * extraction step. Everything downstream of RaceSchema works on the
 * normalized shape: lowercased names, a discipline instead of a raw gait
 * string, and a finish already classified.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const DisciplineSchema = z.enum(['trot', 'pace']);
export type Discipline = z.infer<typeof DisciplineSchema>;

export const EntityClassSchema = z.enum(['horse', 'driver', 'trainer']);
export type EntityClass = z.infer<typeof EntityClassSchema>;

export const ENTITY_CLASSES: readonly EntityClass[] = EntityClassSchema.options;

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/** Names are compared case-insensitively with collapsed whitespace. */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Venues keep word capitals for display but must compare across spellings:
 * " PINEWOOD " and "pinewood" both become "Pinewood".
 */
export function normalizeVenue(venue: string): string {
  return normalizeName(venue).replace(/(^|[\s-])(\p{L})/gu, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

function optionalName(name: string | null | undefined): string | null {
  if (name == null) return null;
  const normalized = normalizeName(name);
  return normalized === '' ? null : normalized;
}

/**
 * Map a gait label onto a discipline. "Galt" is a frequent scan misread of
 * "Trot"; every other non-trot gait rates with the pacers.
 */
export function normalizeDiscipline(gait: string): Discipline {
  const value = gait.trim().toLowerCase();
  if (value === 'trot' || value.startsWith('galt') || value.startsWith('trot')) return 'trot';
  return 'pace';
}

export type Finish =
  | { kind: 'placed'; position: number }
  | { kind: 'dnf' }
  | { kind: 'none' }
  | { kind: 'malformed'; raw: string };

/** Classify a finishing position as given on a result sheet. */
export function parseFinish(value: number | string | null | undefined): Finish {
  if (value == null) return { kind: 'none' };

  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0
      ? { kind: 'placed', position: value }
      : { kind: 'malformed', raw: String(value) };
  }

  const token = value.trim();
  if (token === '') return { kind: 'none' };
  if (/^dnf$/i.test(token)) return { kind: 'dnf' };
  if (/^\d+$/.test(token)) {
    const position = Number.parseInt(token, 10);
    if (position > 0) return { kind: 'placed', position };
  }
  return { kind: 'malformed', raw: token };
}

/** Text stored in history and audit rows for a finish. */
export function finishText(finish: Finish): string | null {
  switch (finish.kind) {
    case 'placed':
      return String(finish.position);
    case 'dnf':
      return 'DNF';
    case 'malformed':
      return finish.raw;
    case 'none':
      return null;
  }
}

// ---------------------------------------------------------------------------
// Starter / Race
// ---------------------------------------------------------------------------

export const StarterSchema = z
  .object({
    horseName: z.string().refine((s) => normalizeName(s) !== '', { message: 'horseName is empty' }),
    driverName: z.string().nullish(),
    trainerName: z.string().nullish(),
    finishPosition: z.union([z.number(), z.string()]).nullish(),
    isScratched: z.boolean().default(false),
    /** Odds as printed on the card; informational only. */
    oddsText: z.string().nullish(),
  })
  .transform((s) => ({
    horseName: normalizeName(s.horseName),
    driverName: optionalName(s.driverName),
    trainerName: optionalName(s.trainerName),
    finish: parseFinish(s.finishPosition),
    isScratched: s.isScratched,
    oddsText: s.oddsText ?? null,
  }));
export type StarterInput = z.input<typeof StarterSchema>;
export type Starter = z.output<typeof StarterSchema>;

export const RaceSchema = z
  .object({
    /** Gait as printed ("Trot", "Pace", ...). */
    discipline: z.string().min(1),
    /** ISO date ("2024-05-04") or timestamp. */
    raceDate: z.union([z.string(), z.date()]).pipe(z.coerce.date()),
    venue: z.string().refine((s) => normalizeName(s) !== '', { message: 'venue is empty' }),
    raceNumber: z.number().int().positive(),
    raceClass: z.string().nullish(),
    isQualifier: z.boolean().default(false),
    starters: z.array(StarterSchema),
  })
  .transform((r) => ({
    discipline: normalizeDiscipline(r.discipline),
    raceDate: r.raceDate,
    venue: normalizeVenue(r.venue),
    raceNumber: r.raceNumber,
    raceClass: r.raceClass?.trim() || null,
    isQualifier: r.isQualifier,
    starters: r.starters,
  }));
export type RaceInput = z.input<typeof RaceSchema>;
export type Race = z.output<typeof RaceSchema>;

// ---------------------------------------------------------------------------
// Race identity
// ---------------------------------------------------------------------------

/** Natural key of a race; RaceEntry rows add the horse name. */
export interface RaceKey {
  /** ISO timestamp of the race date. */
  raceDate: string;
  venue: string;
  raceNumber: number;
}

export function raceKeyOf(race: Pick<Race, 'raceDate' | 'venue' | 'raceNumber'>): RaceKey {
  return {
    raceDate: race.raceDate.toISOString(),
    venue: race.venue,
    raceNumber: race.raceNumber,
  };
}

/** Short human label, e.g. "2024-05-04 Pinewood R3". */
export function formatRaceKey(key: RaceKey): string {
  return `${key.raceDate.slice(0, 10)} ${key.venue} R${key.raceNumber}`;
}
