import { describe, it, expect } from 'vitest';
import { LRUCache, type CachedAST } from './cache.js';

function entry(filePath: string, version = '1.0'): CachedAST {
  return {
    version,
    hash: `hash-${filePath}`,
    ast: {
      language: 'cpp',
      content: '',
      hash: `hash-${filePath}`,
      version,
      parsedAt: new Date(0),
      filePath,
      root: {
        id: 'root',
        type: 'translation_unit',
        value: '',
        location: { filePath, line: 1, column: 1, endLine: 1, endColumn: 1 },
        children: [],
      },
    },
  };
}

describe('LRUCache', () => {
  it('should return stored entries for the matching version', () => {
    const cache = new LRUCache();
    const stored = entry('a.cpp');
    cache.set('a.cpp', stored);

    expect(cache.get('a.cpp', '1.0')).toBe(stored);
    expect(cache.get('a.cpp', '2.0')).toBeUndefined();
    expect(cache.get('b.cpp', '1.0')).toBeUndefined();
  });

  it('should count hits and misses', () => {
    const cache = new LRUCache();
    cache.set('a.cpp', entry('a.cpp'));

    cache.get('a.cpp', '1.0');
    cache.get('missing.cpp', '1.0');
    cache.get('a.cpp', '2.0');

    expect(cache.stats()).toEqual({ hits: 1, misses: 2, evictions: 0, size: 1, maxSize: 1000 });
  });

  it('should evict the least recently used entry', () => {
    const cache = new LRUCache({ maxSize: 2 });
    cache.set('a.cpp', entry('a.cpp'));
    cache.set('b.cpp', entry('b.cpp'));
    cache.get('a.cpp', '1.0');
    cache.set('c.cpp', entry('c.cpp'));

    expect(cache.has('a.cpp')).toBe(true);
    expect(cache.has('b.cpp')).toBe(false);
    expect(cache.has('c.cpp')).toBe(true);
    expect(cache.stats().evictions).toBe(1);
  });

  it('should break ties by insertion order', () => {
    const cache = new LRUCache({ maxSize: 2 });
    cache.set('a.cpp', entry('a.cpp'));
    cache.set('b.cpp', entry('b.cpp'));
    cache.set('c.cpp', entry('c.cpp'));

    expect(cache.has('a.cpp')).toBe(false);
    expect(cache.size()).toBe(2);
  });

  it('should expire entries after the TTL', () => {
    let clock = 1000;
    const cache = new LRUCache({ ttlMs: 50, now: () => clock });
    cache.set('a.cpp', entry('a.cpp'));

    clock = 1049;
    expect(cache.get('a.cpp', '1.0')).toBeDefined();

    clock = 1050;
    expect(cache.get('a.cpp', '1.0')).toBeUndefined();
    expect(cache.has('a.cpp')).toBe(false);
  });

  it('should invalidate unconditionally', () => {
    const cache = new LRUCache();
    cache.set('a.cpp', entry('a.cpp'));

    cache.invalidate('a.cpp');
    cache.invalidate('never-stored.cpp');

    expect(cache.has('a.cpp')).toBe(false);
  });

  it('should shrink when the max size is lowered', () => {
    const cache = new LRUCache();
    cache.set('a.cpp', entry('a.cpp'));
    cache.set('b.cpp', entry('b.cpp'));
    cache.set('c.cpp', entry('c.cpp'));

    cache.setMaxSize(1);

    expect(cache.size()).toBe(1);
    expect(cache.has('c.cpp')).toBe(true);
  });

  it('should ignore non-positive limits', () => {
    const cache = new LRUCache({ maxSize: 0, ttlMs: -1 });
    cache.setMaxSize(0);
    cache.setTTL(0);

    expect(cache.stats().maxSize).toBe(1000);
  });

  it('should clear all entries', () => {
    const cache = new LRUCache();
    cache.set('a.cpp', entry('a.cpp'));
    cache.clear();

    expect(cache.size()).toBe(0);
  });
});
