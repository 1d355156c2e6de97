/**
 * Area name → URL slug mapping for the 47 prefectures.
 *
 * Accepted spellings for a prefecture:
 * - full name: 東京都, 大阪府, 三重県, 北海道
 * - name without its 都/府/県 suffix: 東京, 三重, 神奈川
 * - a major-city alias: 東京, 大阪, 京都, 北海道, 福岡 (also with a 市 suffix)
 *
 * Lookups are exact; callers trim user input first.
 */

import { z } from 'zod';
import { loadDataFile } from '../../utils/data-file.js';

const AreaTableSchema = z.object({
  prefectures: z.record(z.string().regex(/^[a-z]+$/)),
  cities: z.record(z.string().regex(/^[a-z]+$/)),
});

const table = loadDataFile('prefectures.json', AreaTableSchema);

export const PREFECTURE_MAPPING: Readonly<Record<string, string>> = Object.freeze(table.prefectures);
export const CITY_MAPPING: Readonly<Record<string, string>> = Object.freeze(table.cities);

const PREFECTURE_SUFFIXES = ['都', '府', '県'] as const;
const STRIPPABLE_SUFFIXES = ['都', '府', '県', '市'] as const;

function lookup(name: string): string | null {
  return PREFECTURE_MAPPING[name] ?? CITY_MAPPING[name] ?? null;
}

export function getAreaSlug(areaName: string): string | null {
  if (!areaName) return null;

  const direct = lookup(areaName);
  if (direct) return direct;

  for (const suffix of STRIPPABLE_SUFFIXES) {
    if (areaName.endsWith(suffix) && areaName.length > suffix.length) {
      const base = lookup(areaName.slice(0, -suffix.length));
      if (base) return base;
    }
  }

  for (const suffix of PREFECTURE_SUFFIXES) {
    const withSuffix = PREFECTURE_MAPPING[`${areaName}${suffix}`];
    if (withSuffix) return withSuffix;
  }

  return null;
}

/**
 * Prefecture names in table order (北海道 first, 沖縄県 last).
 */
export function getAllPrefectures(): string[] {
  return Object.keys(PREFECTURE_MAPPING);
}
