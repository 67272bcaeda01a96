/**
 * Monogram glyph lookup
 */

import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export type MonogramSet = Record<string, string[]>;

const monogramSetSchema = z.record(z.string(), z.array(z.string()));

// Source tree (src/display) and build output (dist/src/display) sit at different depths
const DEFAULT_MONOGRAM_FILES = [
  fileURLToPath(new URL('../../assets/monograms.json', import.meta.url)),
  fileURLToPath(new URL('../../../assets/monograms.json', import.meta.url)),
];

/**
 * Read the glyph set. A missing or malformed file yields an empty set,
 * in which case every letter uses the block fallback.
 */
export function loadMonograms(files: string[] = DEFAULT_MONOGRAM_FILES): MonogramSet {
  for (const file of files) {
    if (!existsSync(file)) continue;
    try {
      const parsed = monogramSetSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')));
      if (parsed.success) return parsed.data;
    } catch {
      // unreadable, try the next location
    }
  }
  return {};
}

export function normalizeLetter(letter: string): string {
  const upper = letter.trim().toUpperCase();
  return /^[A-Z]$/.test(upper) ? upper : 'A';
}

export function fallbackGlyph(letter: string): string[] {
  const l = letter;
  return [`  ${l}  `, ` ${l}${l}${l} `, `${l}   ${l}`, `${l}${l}${l}${l}${l}`, `${l}   ${l}`];
}

export function glyphFor(letter: string, monograms: MonogramSet): string[] {
  const key = normalizeLetter(letter);
  return monograms[key] ?? fallbackGlyph(key);
}
