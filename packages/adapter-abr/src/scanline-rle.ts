/**
 * @module scanline-rle
 * Decoder for one packed run-length image plane.
 *
 * Layout: `height` big-endian u16 byte counts (one per scan line), then the
 * packed rows. Each row is a sequence of runs introduced by a control byte `n`:
 * - `n < 128`: copy the next `n + 1` samples
 * - `n > 128`: repeat the next sample `257 - n` times
 * - `n == 128`: no-op
 *
 * The read position runs on across rows; each row stops once the position
 * reaches the row start plus its declared byte count.
 */

import type { PixelMatrix, SampleWidth } from '@brushtex/types';
import { createPixelMatrix } from '@brushtex/core';
import { BinaryCursor } from './binary-cursor';

/** A decoded plane plus the rows whose runs did not produce exactly `width` samples. */
export interface RleDecodeResult {
  pixels: PixelMatrix;
  /** Row indices where the decoded sample count differed from the width. */
  mismatchedRows: number[];
}

/**
 * Upper bound on the samples `byteCount` bytes of packed rows can expand to.
 * The line-count table takes two bytes per row; every run after it is a
 * control byte plus at least one sample and yields at most 128 samples.
 * Returns -1 when the bytes cannot even hold the line-count table.
 */
export function maxRleSampleCount(byteCount: number, height: number, sampleWidth: SampleWidth): number {
  const runBytes = byteCount - 2 * height;
  if (runBytes < 0) return -1;
  return Math.floor(runBytes / (1 + sampleWidth)) * 128;
}

/**
 * Decode a run-length compressed plane.
 *
 * Samples that would land past the row end are dropped; columns a short
 * row leaves unwritten stay zero. Both cases are listed in `mismatchedRows`.
 *
 * @param bytes - Slice starting at the line-count table.
 * @param height - Plane height H.
 * @param width - Plane width W.
 * @param sampleWidth - Bytes per sample.
 * @throws BrushDecodeError (`OutOfBounds`) when a run reads past `bytes`.
 */
export function decodeScanlineRle(
  bytes: Uint8Array,
  height: number,
  width: number,
  sampleWidth: SampleWidth,
): RleDecodeResult {
  const pixels = createPixelMatrix(height, width, sampleWidth);
  const mismatchedRows: number[] = [];
  const cursor = new BinaryCursor(bytes);

  const lineByteCounts: number[] = [];
  for (let row = 0; row < height; row++) {
    lineByteCounts.push(cursor.readUint16());
  }
  if (height === 0 || width === 0) {
    return { pixels, mismatchedRows };
  }

  for (let row = 0; row < height; row++) {
    const rowEnd = cursor.offset + lineByteCounts[row];
    const rowBase = row * width;
    let column = 0;

    while (cursor.offset < rowEnd) {
      const n = cursor.readUint8();
      if (n === 128) continue;

      if (n < 128) {
        // Literal run of n + 1 samples
        const count = n + 1;
        for (let i = 0; i < count; i++) {
          const value = cursor.readFixed(sampleWidth, false);
          if (column + i < width) pixels.data[rowBase + column + i] = value;
        }
        column += count;
      } else {
        // One sample repeated 257 - n times
        const count = 257 - n;
        const value = cursor.readFixed(sampleWidth, false);
        const end = Math.min(column + count, width);
        if (end > column) pixels.data.fill(value, rowBase + column, rowBase + end);
        column += count;
      }
    }

    if (column !== width) {
      mismatchedRows.push(row);
    }
  }

  return { pixels, mismatchedRows };
}
