import type { ClientConfig } from '../../config/index.js';
import { MemoryCache } from './cache-manager.js';
import { FileCache } from './file-cache.js';
import type { ResponseCache } from './cache.types.js';

/**
 * Build the configured cache backend; `off` means no cache at all.
 */
export function createCache(config: ClientConfig['cache']): ResponseCache | null {
  switch (config.backend) {
    case 'memory':
      return new MemoryCache({ maxEntries: config.maxEntries });
    case 'file':
      return new FileCache({ dir: config.dir, maxEntries: config.maxEntries });
    case 'off':
      return null;
  }
}
