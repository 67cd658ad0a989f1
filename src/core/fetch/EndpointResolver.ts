// src/core/fetch/EndpointResolver.ts

import type { DatasetDescriptor, EndpointCandidate } from './types';

export interface EndpointResolverConfig {
  baseUrl: string;
  fallbackBaseUrls: readonly string[];
  /** An operator-pinned base URL disables base-URL fallback */
  baseUrlPinned: boolean;
}

/**
 * Orders the (base URL, path) pairs to try for a dataset. Alternate paths
 * on the primary base come before any fallback base, since a fallback base
 * is a different API version.
 */
export class EndpointResolver {
  constructor(private config: EndpointResolverConfig) {}

  candidates(descriptor: DatasetDescriptor): EndpointCandidate[] {
    const { baseUrl } = this.config;
    const pairs: Array<Omit<EndpointCandidate, 'index'>> = [
      { baseUrl, path: descriptor.primaryPath, source: 'primary' },
      ...descriptor.alternatePaths.map((path) => ({
        baseUrl,
        path,
        source: 'alternate' as const,
      })),
    ];

    if (!this.config.baseUrlPinned) {
      const fallbacks = this.config.fallbackBaseUrls.filter((url) => url !== baseUrl);
      for (const fallback of fallbacks) {
        pairs.push({ baseUrl: fallback, path: descriptor.primaryPath, source: 'fallback' });
      }
      for (const fallback of fallbacks) {
        for (const path of descriptor.alternatePaths) {
          pairs.push({ baseUrl: fallback, path, source: 'fallback' });
        }
      }
    }

    // Drop duplicates (an alternate equal to the primary path, say) keeping the first
    const seen = new Set<string>();
    return pairs
      .filter((pair) => {
        const key = joinUrl(pair.baseUrl, pair.path);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      })
      .map((pair, index) => ({ ...pair, index }));
  }
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
