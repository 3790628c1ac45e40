/**
 * @module sample-plane
 * Bounding box + depth + compression header followed by one grayscale plane.
 * Shared by both tagged-format variants.
 */

import type { PixelMatrix } from '@brushtex/types';
import {
  createDecodeError,
  createPixelMatrix,
  isBrushDecodeError,
  readBigEndianSamples,
  sampleWidthFromDepth,
} from '@brushtex/core';
import type { BinaryCursor } from './binary-cursor';
import { decodeScanlineRle, maxRleSampleCount } from './scanline-rle';

/** Outcome of reading one plane. */
export type PlaneReadResult =
  | { kind: 'decoded'; pixels: PixelMatrix; mismatchedRows: number[] }
  | { kind: 'segmented'; height: number };

/**
 * Read a plane header and its pixels.
 *
 * @param cursor - Positioned at the bounding box.
 * @param planeEnd - Absolute end of the bytes that may belong to the plane;
 *   compressed data is decoded from the slice ending here.
 * @param segmentedHeightLimit - Taller planes are segmented and skipped.
 */
export function readSamplePlane(
  cursor: BinaryCursor,
  planeEnd: number,
  segmentedHeightLimit: number,
): PlaneReadResult {
  const boxOffset = cursor.offset;
  const top = cursor.readUint32();
  const left = cursor.readUint32();
  const bottom = cursor.readUint32();
  const right = cursor.readUint32();
  const depth = cursor.readUint16();
  const compression = cursor.readUint8();

  const height = bottom - top;
  const width = right - left;
  if (height < 0 || width < 0) {
    throw createDecodeError(
      'MalformedHeader',
      `Inverted bounding box (${top}, ${left}, ${bottom}, ${right})`,
      { offset: boxOffset },
    );
  }

  if (height > segmentedHeightLimit) {
    return { kind: 'segmented', height };
  }

  const sampleWidth = sampleWidthFromDepth(depth, boxOffset + 16);
  const start = cursor.offset;
  const end = Math.min(Math.max(planeEnd, start), cursor.length);
  const available = end - start;
  const count = height * width;

  if (compression === 0) {
    if (count * sampleWidth > available) {
      throw createDecodeError(
        'OutOfBounds',
        `Plane of ${height}x${width} samples needs ${count * sampleWidth} bytes, ${available} available`,
        { offset: start },
      );
    }
    const raw = cursor.readBytes(count * sampleWidth);
    const pixels = createPixelMatrix(height, width, sampleWidth);
    readBigEndianSamples(raw, 0, sampleWidth, count, pixels.data);
    return { kind: 'decoded', pixels, mismatchedRows: [] };
  }

  if (compression === 1) {
    if (count > maxRleSampleCount(available, height, sampleWidth)) {
      throw createDecodeError(
        'OutOfBounds',
        `Plane of ${height}x${width} samples cannot come from ${available} compressed bytes`,
        { offset: start },
      );
    }
    let decoded: ReturnType<typeof decodeScanlineRle>;
    try {
      decoded = decodeScanlineRle(cursor.buffer.subarray(start, end), height, width, sampleWidth);
    } catch (err) {
      if (!isBrushDecodeError(err)) throw err;
      throw createDecodeError(err.kind, 'Compressed plane runs past its declared length', {
        offset: start + (err.offset ?? 0),
        cause: err,
      });
    }
    cursor.seek(end);
    return { kind: 'decoded', pixels: decoded.pixels, mismatchedRows: decoded.mismatchedRows };
  }

  throw createDecodeError('UnsupportedVersion', `Unsupported compression mode ${compression}`, {
    offset: boxOffset + 18,
  });
}
