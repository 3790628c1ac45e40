import { describe, it, expect } from 'vitest';
import { BrushDecodeError, toRows } from '@brushtex/core';
import { decodeScanlineRle, maxRleSampleCount } from './scanline-rle';

/** One row: u16 byte count followed by the packed bytes. */
function singleRow(packed: number[]): Uint8Array {
  return new Uint8Array([(packed.length >> 8) & 0xff, packed.length & 0xff, ...packed]);
}

describe('decodeScanlineRle', () => {
  it.each([1, 3, 128])('should copy a literal run of %i samples', (k) => {
    const literal = Array.from({ length: k }, (_, i) => (i * 7) & 0xff);
    const { pixels, mismatchedRows } = decodeScanlineRle(singleRow([k - 1, ...literal]), 1, k, 1);
    expect(toRows(pixels)).toEqual([literal]);
    expect(mismatchedRows).toEqual([]);
  });

  it.each([2, 5, 128])('should repeat a sample %i times', (m) => {
    const { pixels } = decodeScanlineRle(singleRow([257 - m, 42]), 1, m, 1);
    expect(toRows(pixels)).toEqual([Array.from({ length: m }, () => 42)]);
  });

  it('should treat control byte 128 as a no-op', () => {
    const { pixels, mismatchedRows } = decodeScanlineRle(singleRow([128, 0, 7]), 1, 1, 1);
    expect(toRows(pixels)).toEqual([[7]]);
    expect(mismatchedRows).toEqual([]);
  });

  it('should carry the read position across rows', () => {
    const bytes = new Uint8Array([0, 2, 0, 3, 255, 9, 1, 3, 4]);
    const { pixels } = decodeScanlineRle(bytes, 2, 2, 1);
    expect(toRows(pixels)).toEqual([
      [9, 9],
      [3, 4],
    ]);
  });

  it('should decode 16-bit samples big-endian', () => {
    const { pixels } = decodeScanlineRle(singleRow([1, 0x01, 0x02, 0xff, 0xff]), 1, 2, 2);
    expect(pixels.data).toBeInstanceOf(Uint16Array);
    expect(toRows(pixels)).toEqual([[0x0102, 0xffff]]);
  });

  it('should decode 32-bit repeats', () => {
    const { pixels } = decodeScanlineRle(singleRow([255, 0x00, 0x01, 0x00, 0x00]), 1, 2, 4);
    expect(toRows(pixels)).toEqual([[65536, 65536]]);
  });

  it('should return an empty matrix for zero height', () => {
    const { pixels } = decodeScanlineRle(new Uint8Array(0), 0, 5, 1);
    expect(pixels.height).toBe(0);
    expect(pixels.data).toHaveLength(0);
  });

  it('should not read past the line-count table for zero width', () => {
    const { pixels, mismatchedRows } = decodeScanlineRle(new Uint8Array([0, 5, 0, 5]), 2, 0, 1);
    expect(pixels.height).toBe(2);
    expect(pixels.width).toBe(0);
    expect(mismatchedRows).toEqual([]);
  });

  it('should zero-fill a short row and flag it', () => {
    const { pixels, mismatchedRows } = decodeScanlineRle(singleRow([255, 5]), 1, 3, 1);
    expect(toRows(pixels)).toEqual([[5, 5, 0]]);
    expect(mismatchedRows).toEqual([0]);
  });

  it('should drop samples past the row end and flag it', () => {
    const { pixels, mismatchedRows } = decodeScanlineRle(singleRow([1, 8, 9]), 1, 1, 1);
    expect(toRows(pixels)).toEqual([[8]]);
    expect(mismatchedRows).toEqual([0]);
  });

  it('should fail on a truncated literal run', () => {
    expect(() => decodeScanlineRle(singleRow([3, 1]), 1, 4, 1)).toThrow(BrushDecodeError);
  });
});

describe('maxRleSampleCount', () => {
  it('should allow 128 samples per run of control byte and sample', () => {
    expect(maxRleSampleCount(2 + 4, 1, 1)).toBe(256);
    expect(maxRleSampleCount(2 + 5, 1, 2)).toBe(128);
  });

  it('should return -1 when the line-count table does not fit', () => {
    expect(maxRleSampleCount(3, 2, 1)).toBe(-1);
  });
});
