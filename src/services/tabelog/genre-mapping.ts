/**
 * Cuisine name ↔ Tabelog genre code (RC + 4 digits).
 * Lookups are exact and case-sensitive: ラーメン matches, らーめん does not.
 */

import { z } from 'zod';
import { loadDataFile } from '../../utils/data-file.js';

const GenreTableSchema = z.record(z.string().regex(/^RC\d{4}$/));

export const GENRE_CODE_MAPPING: Readonly<Record<string, string>> = Object.freeze(
  loadDataFile('genres.json', GenreTableSchema)
);

const NAME_BY_CODE = new Map(Object.entries(GENRE_CODE_MAPPING).map(([name, code]) => [code, name]));

export interface CuisineEntry {
  name: string;
  code: string;
}

export function getGenreCode(cuisine: string): string | null {
  if (!cuisine) return null;
  return GENRE_CODE_MAPPING[cuisine] ?? null;
}

export function getGenreNameByCode(code: string): string | null {
  return NAME_BY_CODE.get(code) ?? null;
}

/**
 * All cuisine names, sorted. Returns a fresh array on every call.
 */
export function getAllGenres(): string[] {
  return Object.keys(GENRE_CODE_MAPPING).sort();
}

export function listCuisineEntries(): CuisineEntry[] {
  return getAllGenres().map((name) => ({ name, code: GENRE_CODE_MAPPING[name] ?? '' }));
}
