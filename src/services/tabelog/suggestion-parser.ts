/**
 * Autocomplete payload → SuggestionRecord[].
 * The endpoint answers with a JSON array of
 * `{ name, datatype, id_in_datatype, lat, lng, related_info }`.
 */

import { z } from 'zod';
import { parseError } from '../../lib/errors/gurume-error.js';
import type { SuggestEndpoint } from './query-builder.js';
import type { SuggestionKind, SuggestionRecord } from './types.js';

const SuggestionItemSchema = z.object({
  name: z.string().trim().min(1),
  datatype: z.string().nullish().catch(null),
  id_in_datatype: z.union([z.number(), z.string()]).nullish().catch(null),
  lat: z.number().nullish().catch(null),
  lng: z.number().nullish().catch(null),
});

const DATATYPE_KIND: Readonly<Record<string, SuggestionKind>> = {
  AddressMaster: 'area',
  RailroadStation: 'area',
  Genre2: 'cuisine',
  Restaurant: 'restaurant',
};

export interface SuggestionPage {
  suggestions: SuggestionRecord[];
  warnings: string[];
}

export function suggestionKind(datatype: string, endpoint: SuggestEndpoint): SuggestionKind {
  return DATATYPE_KIND[datatype] ?? (endpoint === 'area' ? 'area' : 'keyword');
}

export function parseSuggestions(json: string, endpoint: SuggestEndpoint, url?: string): SuggestionPage {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch {
    throw parseError('autocomplete response is not JSON', { url });
  }
  if (!Array.isArray(payload)) {
    throw parseError('autocomplete response is not a list', { url });
  }

  const suggestions: SuggestionRecord[] = [];
  const warnings: string[] = [];

  payload.forEach((item: unknown, index) => {
    const parsed = SuggestionItemSchema.safeParse(item);
    if (!parsed.success) {
      warnings.push(`skipped suggestion ${index + 1}: missing name`);
      return;
    }
    const datatype = parsed.data.datatype ?? '';
    suggestions.push({
      label: parsed.data.name,
      kind: suggestionKind(datatype, endpoint),
      datatype,
      id: parsed.data.id_in_datatype ?? null,
      lat: parsed.data.lat ?? null,
      lng: parsed.data.lng ?? null,
    });
  });

  return { suggestions, warnings };
}
