/**
 * @module boundary-scanner
 * Carves one embedded image out of an opaque blob by scanning for start and
 * end signatures.
 *
 * Database rows may hold stale or partial copies of an image ahead of the
 * valid one, so only the last start and the last end occurrence count.
 */

import { createDecodeError } from './errors';

/** Signatures and framing used to delimit an embedded image. */
export interface BoundarySignatures {
  /** Bytes whose last occurrence marks the image start. */
  start: Uint8Array;
  /** Bytes whose last occurrence marks the image end. */
  end: Uint8Array;
  /** Bytes included before the start match. */
  before: number;
  /** Bytes included after the beginning of the end match. */
  after: number;
}

/** `PNG` after the 0x89 lead byte, through the IEND chunk type and its CRC. */
export const PNG_BOUNDARY: BoundarySignatures = {
  start: new Uint8Array([0x50, 0x4e, 0x47]),
  end: new Uint8Array([0x49, 0x45, 0x4e, 0x44]),
  before: 1,
  after: 8,
};

/** Half-open byte range `[start, end)`. */
export interface ByteRange {
  start: number;
  end: number;
}

/** All offsets at which `needle` occurs in `haystack`, overlapping matches included. */
export function findAll(haystack: Uint8Array, needle: Uint8Array): number[] {
  const positions: number[] = [];
  if (needle.length === 0) return positions;
  const last = haystack.length - needle.length;
  outer: for (let i = 0; i <= last; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    positions.push(i);
  }
  return positions;
}

/**
 * Locate the valid embedded image range.
 * The range runs from `before` bytes ahead of the last start match to
 * `after` bytes past the last end match, clamped to the blob.
 * @throws BrushDecodeError (`NoImageFound`) when either signature is missing
 *   or the last end precedes the last start.
 */
export function findImageRange(blob: Uint8Array, signatures: BoundarySignatures = PNG_BOUNDARY): ByteRange {
  const starts = findAll(blob, signatures.start);
  const ends = findAll(blob, signatures.end);
  if (starts.length === 0 || ends.length === 0) {
    throw createDecodeError(
      'NoImageFound',
      `No embedded image found (${starts.length} start, ${ends.length} end signatures)`,
      { offset: 0 },
    );
  }
  const lastStart = starts[starts.length - 1];
  const lastEnd = ends[ends.length - 1];
  if (lastEnd < lastStart) {
    throw createDecodeError('NoImageFound', 'Last end signature precedes last start signature', {
      offset: lastEnd,
    });
  }
  return {
    start: Math.max(0, lastStart - signatures.before),
    end: Math.min(blob.length, lastEnd + signatures.after),
  };
}

/** Copy of the bytes delimited by {@link findImageRange}. */
export function extractEmbeddedImage(
  blob: Uint8Array,
  signatures: BoundarySignatures = PNG_BOUNDARY,
): Uint8Array {
  const range = findImageRange(blob, signatures);
  return blob.slice(range.start, range.end);
}
