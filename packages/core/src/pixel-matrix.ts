/**
 * @module pixel-matrix
 * Construction and access helpers for {@link PixelMatrix}.
 */

import type { PixelBuffer, PixelMatrix, SampleWidth } from '@brushtex/types';
import { createDecodeError } from './errors';

/** Allocate the typed array matching a sample width. */
export function allocatePixelBuffer(sampleWidth: SampleWidth, length: number): PixelBuffer {
  switch (sampleWidth) {
    case 1:
      return new Uint8Array(length);
    case 2:
      return new Uint16Array(length);
    case 4:
      return new Uint32Array(length);
  }
}

/**
 * Convert a bit depth from a file header into a sample width.
 * @throws BrushDecodeError (`UnsupportedVersion`) for depths other than 8, 16 or 32.
 */
export function sampleWidthFromDepth(depthBits: number, offset?: number): SampleWidth {
  switch (depthBits) {
    case 8:
      return 1;
    case 16:
      return 2;
    case 32:
      return 4;
    default:
      throw createDecodeError('UnsupportedVersion', `Unsupported pixel depth ${depthBits}`, { offset });
  }
}

/** Create a zero-filled H×W (or H×W×C when `channels` is given) matrix. */
export function createPixelMatrix(
  height: number,
  width: number,
  sampleWidth: SampleWidth,
  channels?: number,
): PixelMatrix {
  const c = channels ?? 1;
  return {
    height,
    width,
    channels: c,
    rank: channels === undefined ? 2 : 3,
    sampleWidth,
    data: allocatePixelBuffer(sampleWidth, height * width * c),
  };
}

/**
 * Read `count` big-endian unsigned samples from `bytes` into `target`.
 */
export function readBigEndianSamples(
  bytes: Uint8Array,
  byteOffset: number,
  sampleWidth: SampleWidth,
  count: number,
  target: PixelBuffer,
  targetOffset = 0,
): void {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  for (let i = 0; i < count; i++) {
    const at = byteOffset + i * sampleWidth;
    switch (sampleWidth) {
      case 1:
        target[targetOffset + i] = view.getUint8(at);
        break;
      case 2:
        target[targetOffset + i] = view.getUint16(at, false);
        break;
      case 4:
        target[targetOffset + i] = view.getUint32(at, false);
        break;
    }
  }
}

/**
 * Nested-array view of a matrix: `rows[y][x]` for rank 2,
 * `rows[y][x][c]` for rank 3.
 */
export function toRows(matrix: PixelMatrix): number[][] | number[][][] {
  if (matrix.rank === 2) {
    const rows: number[][] = [];
    for (let y = 0; y < matrix.height; y++) {
      rows.push(Array.from(matrix.data.subarray(y * matrix.width, (y + 1) * matrix.width)));
    }
    return rows;
  }
  const rows: number[][][] = [];
  for (let y = 0; y < matrix.height; y++) {
    const row: number[][] = [];
    for (let x = 0; x < matrix.width; x++) {
      const start = (y * matrix.width + x) * matrix.channels;
      row.push(Array.from(matrix.data.subarray(start, start + matrix.channels)));
    }
    rows.push(row);
  }
  return rows;
}
