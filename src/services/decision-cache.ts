/**
 * Decision Cache - TTL-bounded cache of authorization decisions
 *
 * Provides:
 * - Caching of (principal, action, resource) decisions
 * - Targeted invalidation by principal or resource
 * - Lazy purge of expired entries on lookup
 */

import { Clock, systemClock } from '../utils/clock';

/**
 * Cache configuration
 */
export interface DecisionCacheConfig {
  /** Entry lifetime in seconds */
  ttlSeconds: number;
}

const DEFAULT_CONFIG: DecisionCacheConfig = {
  ttlSeconds: 300
};

interface CacheEntry {
  principalId: string;
  resourceId: string;
  value: boolean;
  storedAt: number;
}

export interface CacheLookup {
  value: boolean;
  found: boolean;
}

export interface DecisionCacheStats {
  size: number;
  hits: number;
  misses: number;
}

function escapeKeyPart(part: string): string {
  return part.replace(/\\/g, '\\\\').replace(/:/g, '\\:');
}

/**
 * Generate cache key from principal, action and resource.
 * Backslashes and colons inside a part are escaped so distinct requests never share a key.
 */
export function generateDecisionKey(principalId: string, action: string, resourceId: string): string {
  return [principalId, action, resourceId].map(escapeKeyPart).join(':');
}

export class DecisionCache {
  private cache: Map<string, CacheEntry> = new Map();
  private config: DecisionCacheConfig;
  private clock: Clock;
  private hits = 0;
  private misses = 0;

  constructor(config?: Partial<DecisionCacheConfig>, clock: Clock = systemClock) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = clock;
  }

  /**
   * Look up a cached decision. Entries at or past the TTL are purged and reported as not found.
   */
  get(principalId: string, action: string, resourceId: string): CacheLookup {
    const key = generateDecisionKey(principalId, action, resourceId);
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return { value: false, found: false };
    }

    if (this.clock.now().getTime() - entry.storedAt >= this.config.ttlSeconds * 1000) {
      this.cache.delete(key);
      this.misses++;
      return { value: false, found: false };
    }

    this.hits++;
    return { value: entry.value, found: true };
  }

  put(principalId: string, action: string, resourceId: string, value: boolean): void {
    const key = generateDecisionKey(principalId, action, resourceId);
    this.cache.set(key, { principalId, resourceId, value, storedAt: this.clock.now().getTime() });
  }

  /**
   * Remove every entry cached for the principal
   */
  clearForPrincipal(principalId: string): void {
    for (const [key, entry] of Array.from(this.cache.entries())) {
      if (entry.principalId === principalId) {
        this.cache.delete(key);
      }
    }
  }

  /**
   * Remove every entry cached for the resource
   */
  clearForResource(resourceId: string): void {
    for (const [key, entry] of Array.from(this.cache.entries())) {
      if (entry.resourceId === resourceId) {
        this.cache.delete(key);
      }
    }
  }

  clearAll(): void {
    this.cache.clear();
  }

  getStats(): DecisionCacheStats {
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses
    };
  }
}
