/**
 * TROTLINE - CLI helpers shared by the scripts.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Utilities (no dependencies needed)
// ═══════════════════════════════════════════════════════════════════════════════

export const C = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightWhite: '\x1b[97m',
} as const;

export function c(color: keyof typeof C, text: string): string {
  return `${C[color]}${text}${C.reset}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting
// ═══════════════════════════════════════════════════════════════════════════════

export function pad(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}

export function padLeft(text: string, width: number): string {
  return text.length >= width ? text : ' '.repeat(width - text.length) + text;
}

/** Title-case a normalized name for display ("pine ridge" -> "Pine Ridge"). */
export function displayName(name: string): string {
  return name.replace(/\b\w/g, (ch) => ch.toUpperCase());
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Input
// ═══════════════════════════════════════════════════════════════════════════════

/** Parse a JSON file given on the command line. */
export function readJsonFile(path: string): unknown {
  const fullPath = resolve(process.cwd(), path);
  let text: string;
  try {
    text = readFileSync(fullPath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read ${fullPath}: ${reason}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${fullPath} is not valid JSON: ${reason}`);
  }
}

export function usage(lines: string[]): never {
  console.error(lines.join('\n'));
  process.exit(2);
}
