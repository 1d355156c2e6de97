import { readFileSync } from 'node:fs';
import type { z } from 'zod';

const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Load and validate a JSON table from the repository's data/ directory.
 * Tables are small and static, so they are read synchronously at module load.
 */
export function loadDataFile<T extends z.ZodTypeAny>(fileName: string, schema: T): z.infer<T> {
  const raw = readFileSync(new URL(fileName, DATA_DIR), 'utf8');
  return schema.parse(JSON.parse(raw));
}
