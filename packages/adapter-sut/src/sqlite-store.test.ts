import { describe, it, expect } from 'vitest';
import { BrushDecodeError } from '@brushtex/core';
import { openSqliteStore, withBrushStore, type BrushStore } from './sqlite-store';
import { buildSut } from './test-helpers';

describe('openSqliteStore', () => {
  const bytes = buildSut({ materials: [new Uint8Array([1, 2, 3])], nodeName: 'Pencil' });

  it('should answer table and row queries', () => {
    withBrushStore(bytes, openSqliteStore, (store) => {
      expect(store.hasTable('MaterialFile')).toBe(true);
      expect(store.hasTable('Missing')).toBe(false);
      expect(store.firstRow('SELECT NodeName FROM Node')).toEqual({ NodeName: 'Pencil' });
      const rows = store.allRows('SELECT FileData FROM MaterialFile');
      expect(rows).toHaveLength(1);
      expect(rows[0].FileData).toEqual(Buffer.from([1, 2, 3]));
    });
  });

  it('should return undefined for an empty result', () => {
    const empty = buildSut({ materials: [] });
    withBrushStore(empty, openSqliteStore, (store) => {
      expect(store.firstRow('SELECT NodeName FROM Node')).toBeUndefined();
      expect(store.allRows('SELECT FileData FROM MaterialFile')).toEqual([]);
    });
  });

  it('should wrap query failures', () => {
    withBrushStore(bytes, openSqliteStore, (store) => {
      expect(() => store.allRows('SELECT * FROM Missing')).toThrow(BrushDecodeError);
    });
  });
});

describe('withBrushStore', () => {
  function trackingStore(): BrushStore & { closed: number } {
    return {
      closed: 0,
      hasTable: () => true,
      firstRow: () => undefined,
      allRows: () => [],
      close() {
        this.closed++;
      },
    };
  }

  it('should close the store after success', () => {
    const store = trackingStore();
    expect(withBrushStore(new Uint8Array(0), () => store, () => 42)).toBe(42);
    expect(store.closed).toBe(1);
  });

  it('should close the store when the callback throws', () => {
    const store = trackingStore();
    expect(() =>
      withBrushStore(new Uint8Array(0), () => store, () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(store.closed).toBe(1);
  });
});
