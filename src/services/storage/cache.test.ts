// Cache tests

import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as path from 'path';
import { TemplateCache } from './cache.js';
import { validateTemplateDefinition } from '../../core/schemas.js';
import type { Template } from '../../models/template.js';

describe('TemplateCache', () => {
  let cache: TemplateCache;

  const template = validateTemplateDefinition({
    metadata: {
      name: 'Cached',
      description: 'Cached template',
      version: '1.0.0',
      category: 'script',
      author: 'tester'
    },
    structure: { root_directory: { name: 'app' } }
  });

  beforeEach(() => {
    cache = new TemplateCache();
  });

  describe('get/set', () => {
    it('should return null for empty cache', () => {
      expect(cache.get('templates/basic.yaml')).toBeNull();
    });

    it('should key entries by absolute path', () => {
      cache.set('templates/basic.yaml', template);
      expect(cache.get(path.resolve('templates/basic.yaml'))).toBe(template);
      expect(cache.get('templates/./basic.yaml')).toBe(template);
    });
  });

  describe('getOrLoad', () => {
    it('should share one load between concurrent callers', async () => {
      const loader = vi.fn(async () => template);

      const [first, second] = await Promise.all([
        cache.getOrLoad('a.yaml', loader),
        cache.getOrLoad('a.yaml', loader)
      ]);

      expect(first).toBe(template);
      expect(second).toBe(template);
      expect(loader).toHaveBeenCalledTimes(1);
      expect(loader).toHaveBeenCalledWith(path.resolve('a.yaml'));
    });

    it('should serve later calls from the cache', async () => {
      const loader = vi.fn(async () => template);
      await cache.getOrLoad('a.yaml', loader);
      await cache.getOrLoad('a.yaml', loader);

      expect(loader).toHaveBeenCalledTimes(1);
      expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
    });

    it('should not store a load that finishes after invalidate', async () => {
      let finish: (loaded: Template) => void = () => undefined;
      const slowLoader = vi.fn(() => new Promise<Template>(resolve => {
        finish = resolve;
      }));
      const pending = cache.getOrLoad('a.yaml', slowLoader);

      cache.invalidate('a.yaml');
      finish(template);

      await expect(pending).resolves.toBe(template);
      expect(cache.get('a.yaml')).toBeNull();
    });

    it('should start a fresh load for callers after clear', async () => {
      let finish: (loaded: Template) => void = () => undefined;
      const slowLoader = vi.fn(() => new Promise<Template>(resolve => {
        finish = resolve;
      }));
      const stale = cache.getOrLoad('a.yaml', slowLoader);

      cache.clear();
      const fresh = cache.getOrLoad('a.yaml', vi.fn(async () => template));
      finish(template);

      await Promise.all([stale, fresh]);
      expect(slowLoader).toHaveBeenCalledTimes(1);
      expect(cache.getStats().size).toBe(1);
    });

    it('should not cache a failed load', async () => {
      const loader = vi.fn()
        .mockRejectedValueOnce(new Error('read failed'))
        .mockResolvedValueOnce(template);

      await expect(cache.getOrLoad('a.yaml', loader)).rejects.toThrow('read failed');
      await expect(cache.getOrLoad('a.yaml', loader)).resolves.toBe(template);
      expect(loader).toHaveBeenCalledTimes(2);
    });
  });

  describe('TTL expiration', () => {
    it('should expire entries after TTL', async () => {
      cache = new TemplateCache({ ttl: 50 });
      cache.set('a.yaml', template);
      expect(cache.get('a.yaml')).not.toBeNull();

      await new Promise(resolve => setTimeout(resolve, 60));
      expect(cache.get('a.yaml')).toBeNull();
    });
  });

  describe('eviction', () => {
    it('should drop the oldest entry at capacity', () => {
      cache = new TemplateCache({ maxEntries: 2 });
      cache.set('a.yaml', template);
      cache.set('b.yaml', template);
      cache.set('c.yaml', template);

      expect(cache.getStats().size).toBe(2);
      expect(cache.get('a.yaml')).toBeNull();
      expect(cache.get('c.yaml')).toBe(template);
    });
  });

  describe('invalidate', () => {
    it('should drop a single entry', () => {
      cache.set('a.yaml', template);
      cache.set('b.yaml', template);
      cache.invalidate('a.yaml');
      expect(cache.get('a.yaml')).toBeNull();
      expect(cache.get('b.yaml')).toBe(template);
    });

    it('should clear all entries', () => {
      cache.set('a.yaml', template);
      cache.set('b.yaml', template);
      cache.clear();
      expect(cache.getStats().size).toBe(0);
    });
  });

  describe('disabled cache', () => {
    it('should not store when disabled', () => {
      cache = new TemplateCache({ enabled: false });
      cache.set('a.yaml', template);
      expect(cache.get('a.yaml')).toBeNull();
    });

    it('should load every time when disabled', async () => {
      cache = new TemplateCache({ enabled: false });
      const loader = vi.fn(async () => template);
      await cache.getOrLoad('a.yaml', loader);
      await cache.getOrLoad('a.yaml', loader);
      expect(loader).toHaveBeenCalledTimes(2);
    });
  });

  describe('getStats', () => {
    it('should return cache statistics', () => {
      cache.set('a.yaml', template);
      const stats = cache.getStats();
      expect(stats.size).toBe(1);
      expect(stats.enabled).toBe(true);
      expect(stats.ttl).toBe(300000);
    });
  });
});
