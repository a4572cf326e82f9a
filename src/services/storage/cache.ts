// In-memory cache for loaded template definitions

import * as path from 'path';
import type { Template } from '../../models/template.js';

/**
 * Cache entry with TTL support
 */
interface CacheEntry<T> {
  data: T;
  timestamp: number;
  expiresAt: number;
}

/**
 * Cache configuration options
 */
export interface CacheConfig {
  /** Time-to-live in milliseconds (default: 5 minutes) */
  ttl: number;
  /** Maximum number of entries (default: 50) */
  maxEntries: number;
  /** Enable/disable cache (default: true) */
  enabled: boolean;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  enabled: boolean;
  ttl: number;
}

const DEFAULT_CONFIG: CacheConfig = {
  ttl: 300000,
  maxEntries: 50,
  enabled: true
};

/**
 * Template cache keyed by absolute definition path, with TTL and oldest-first eviction.
 * Concurrent loads of the same path share one promise.
 */
export class TemplateCache {
  private cache: Map<string, CacheEntry<Template>> = new Map();
  private inFlight: Map<string, Promise<Template>> = new Map();
  private config: CacheConfig;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private key(templatePath: string): string {
    return path.resolve(templatePath);
  }

  /**
   * Gets a cached template if available and not expired
   */
  get(templatePath: string): Template | null {
    if (!this.config.enabled) return null;

    const key = this.key(templatePath);
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.data;
  }

  set(templatePath: string, template: Template): void {
    if (!this.config.enabled) return;

    const key = this.key(templatePath);
    if (!this.cache.has(key) && this.cache.size >= this.config.maxEntries) {
      this.evictOldest();
    }

    const now = Date.now();
    this.cache.set(key, {
      data: template,
      timestamp: now,
      expiresAt: now + this.config.ttl
    });
  }

  /**
   * Returns the cached template or runs the loader once, however many callers are waiting
   */
  async getOrLoad(templatePath: string, loader: (absolutePath: string) => Promise<Template>): Promise<Template> {
    const key = this.key(templatePath);
    const cached = this.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }
    this.misses++;

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    // a load dropped by invalidate() or clear() while pending must not be stored
    const isCurrent = () => this.inFlight.get(key) === load;
    const load: Promise<Template> = loader(key)
      .then(template => {
        if (isCurrent()) {
          this.set(key, template);
        }
        return template;
      })
      .finally(() => {
        if (isCurrent()) {
          this.inFlight.delete(key);
        }
      });
    this.inFlight.set(key, load);
    return load;
  }

  invalidate(templatePath: string): void {
    const key = this.key(templatePath);
    this.cache.delete(key);
    this.inFlight.delete(key);
  }

  clear(): void {
    this.cache.clear();
    this.inFlight.clear();
    this.hits = 0;
    this.misses = 0;
  }

  private evictOldest(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of this.cache) {
      if (entry.timestamp < oldestTime) {
        oldestTime = entry.timestamp;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.cache.delete(oldestKey);
    }
  }

  getStats(): CacheStats {
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      enabled: this.config.enabled,
      ttl: this.config.ttl
    };
  }

  /**
   * Updates cache configuration
   */
  configure(config: Partial<CacheConfig>): void {
    this.config = { ...this.config, ...config };
    if (!this.config.enabled) {
      this.clear();
    }
  }
}
