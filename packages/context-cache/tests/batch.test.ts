/**
 * Batch operations — per-key options given as records, arrays or single values.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ContextCache,
  getContextStore,
  resetContextStore,
  type CacheEntry,
} from '../src/index.js';

const NS = 'batch_test';
const NOW = 1577880000;

function createCache(): ContextCache {
  return new ContextCache({ namespace: NS, env: {} });
}

function findEntry(key: string): CacheEntry | undefined {
  return getContextStore(NS).get(key);
}

function storedKeys(): string[] {
  return [...getContextStore(NS).keys()];
}

function seed(key: string, attributes: Partial<CacheEntry>): void {
  getContextStore(NS).set(key, {
    value: undefined,
    version: null,
    expiresIn: null,
    createdAt: NOW,
    ...attributes,
  });
}

describe('ContextCache batch operations', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW * 1000);
    resetContextStore(NS);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('writeMulti', () => {
    const keysAndValues = {
      key1: null,
      key2: 'value2',
      key3: 'value3',
      key4: 'value4',
    };

    it('uses per-key options from records', () => {
      const result = createCache().writeMulti(keysAndValues, {
        version: { key1: null, key2: '2', key3: '3' },
        expiresIn: { key1: 60, key2: 180, key3: 240 },
        skipNil: { key1: true, key2: true, key3: false },
      });

      expect(result).toBe(keysAndValues);
      expect(storedKeys()).toEqual(['key2', 'key3', 'key4']);
      expect(findEntry('key2')).toEqual({ value: 'value2', version: '2', expiresIn: 180, createdAt: NOW });
      expect(findEntry('key3')).toEqual({ value: 'value3', version: '3', expiresIn: 240, createdAt: NOW });
      expect(findEntry('key4')).toEqual({ value: 'value4', version: null, expiresIn: 60, createdAt: NOW });
    });

    it('uses per-key options from arrays in key order', () => {
      createCache().writeMulti(keysAndValues, {
        version: [null, '2', '3'],
        expiresIn: [60, 180, 240],
        skipNil: [true, true, false],
      });

      expect(storedKeys()).toEqual(['key2', 'key3', 'key4']);
      expect(findEntry('key2')).toEqual({ value: 'value2', version: '2', expiresIn: 180, createdAt: NOW });
      expect(findEntry('key3')).toEqual({ value: 'value3', version: '3', expiresIn: 240, createdAt: NOW });
      expect(findEntry('key4')).toEqual({ value: 'value4', version: null, expiresIn: 60, createdAt: NOW });
    });

    it('ignores array elements past the last key and undefined holes', () => {
      createCache().writeMulti({ a: 1, b: 2 }, { expiresIn: [undefined, 20, 30, 40] });

      expect(findEntry('a')?.expiresIn).toBe(60);
      expect(findEntry('b')?.expiresIn).toBe(20);
      expect(storedKeys()).toEqual(['a', 'b']);
    });

    it('matches array options to the iteration order of a plain object', () => {
      createCache().writeMulti({ b: 'x', '2': 'y' }, { expiresIn: [5, 15] });

      expect(storedKeys()).toEqual(['2', 'b']);
      expect(findEntry('2')?.expiresIn).toBe(5);
      expect(findEntry('b')?.expiresIn).toBe(15);
    });

    it('applies single option values to every key', () => {
      createCache().writeMulti(keysAndValues, { version: '7', expiresIn: 90, skipNil: true });

      expect(storedKeys()).toEqual(['key2', 'key3', 'key4']);
      for (const key of ['key2', 'key3', 'key4']) {
        expect(findEntry(key)?.version).toBe('7');
        expect(findEntry(key)?.expiresIn).toBe(90);
      }
    });

    it('accepts a Map and keeps its order', () => {
      const entries = new Map<string, unknown>([
        ['z', 1],
        ['10', 2],
      ]);

      expect(createCache().writeMulti(entries, { expiresIn: [5, 15] })).toBe(entries);
      expect(storedKeys()).toEqual(['z', '10']);
      expect(findEntry('z')?.expiresIn).toBe(5);
      expect(findEntry('10')?.expiresIn).toBe(15);
    });
  });

  describe('readMulti', () => {
    beforeEach(() => {
      seed('key1', { value: 'value1', version: '1' });
      seed('key2', { value: 'value2', version: '2' });
      seed('key3', { value: 'value3', version: '3' });
    });

    it('uses versions from a record', () => {
      const result = createCache().readMulti(['key1', 'key2', 'key3', 'missing'], {
        version: { key1: '1', key2: 'other' },
      });

      expect(result).toEqual({ key1: 'value1', key2: null, key3: 'value3', missing: null });
      expect(storedKeys()).toEqual(['key1', 'key3']);
    });

    it('uses versions from an array in key order', () => {
      const result = createCache().readMulti(['key1', 'key2', 'key3'], { version: ['1', 'other'] });

      expect(result).toEqual({ key1: 'value1', key2: null, key3: 'value3' });
      expect(storedKeys()).toEqual(['key1', 'key3']);
    });

    it('uses a single version for every key', () => {
      const result = createCache().readMulti(['key1', 'key2', 'key3'], { version: '1' });

      expect(result).toEqual({ key1: 'value1', key2: null, key3: null });
      expect(storedKeys()).toEqual(['key1']);
    });

    it('drops expired entries', () => {
      seed('stale', { value: 'old', expiresIn: 5, createdAt: NOW - 5 });

      expect(createCache().readMulti(['stale', 'key1'])).toEqual({ stale: null, key1: 'value1' });
      expect(findEntry('stale')).toBeUndefined();
    });
  });

  describe('fetchMulti', () => {
    const producer = (key: string): string => `${key}-fresh`;

    beforeEach(() => {
      seed('key1', { value: 'value1', version: '1', expiresIn: 60 });
      seed('key2', { value: 'value2', expiresIn: 60, createdAt: NOW - 100 });
    });

    it('uses per-key options from records', () => {
      const spy = vi.fn(producer);

      const result = createCache().fetchMulti(
        ['key1', 'key2', 'key3'],
        {
          force: { key1: false },
          version: { key1: '1', key3: '3' },
          expiresIn: { key3: 30 },
        },
        spy,
      );

      expect(result).toEqual({ key1: 'value1', key2: 'key2-fresh', key3: 'key3-fresh' });
      expect(spy.mock.calls).toEqual([['key2'], ['key3']]);
      expect(findEntry('key2')).toEqual({ value: 'key2-fresh', version: null, expiresIn: 60, createdAt: NOW });
      expect(findEntry('key3')).toEqual({ value: 'key3-fresh', version: '3', expiresIn: 30, createdAt: NOW });
    });

    it('uses per-key options from arrays', () => {
      seed('key2', { value: 'value2', expiresIn: 60 });
      const spy = vi.fn(producer);

      const result = createCache().fetchMulti(['key1', 'key2'], { force: [true, false], version: ['5'] }, spy);

      expect(result).toEqual({ key1: 'key1-fresh', key2: 'value2' });
      expect(spy.mock.calls).toEqual([['key1']]);
      expect(findEntry('key1')?.version).toBe('5');
    });

    it('applies single option values to every key', () => {
      const result = createCache().fetchMulti(['key1', 'key2', 'key3'], { skipNil: true, force: true }, () => null);

      expect(result).toEqual({ key1: null, key2: null, key3: null });
      expect(findEntry('key1')?.value).toBe('value1');
      expect(findEntry('key2')?.value).toBe('value2');
      expect(findEntry('key3')).toBeUndefined();
    });

    it('accepts the producer as the second argument', () => {
      expect(createCache().fetchMulti(['key1', 'key3'], producer)).toEqual({
        key1: 'value1',
        key3: 'key3-fresh',
      });
    });
  });

  describe('deleteMulti', () => {
    it('returns whether each key existed', () => {
      seed('key1', { value: 'value1' });
      seed('key2', { value: 'value2' });

      expect(createCache().deleteMulti(['key1', 'some_nonexistent/key', 'key2'])).toEqual([true, false, true]);
      expect(storedKeys()).toEqual([]);
    });
  });
});
