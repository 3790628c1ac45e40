/**
 * @module pixels
 * Dense pixel storage shared by every decoder.
 */

/** Width of one stored sample in bytes (8, 16 or 32-bit depth). */
export type SampleWidth = 1 | 2 | 4;

/** Typed array backing a matrix; the element type follows the sample width. */
export type PixelBuffer = Uint8Array | Uint16Array | Uint32Array;

/**
 * Row-major pixel matrix.
 *
 * A rank-2 matrix is a single-channel H×W plane; a rank-3 matrix is H×W×C
 * with channels interleaved per pixel. A zero-area matrix is valid and
 * marks a degenerate sample.
 */
export interface PixelMatrix {
  /** Number of rows. */
  height: number;
  /** Number of columns. */
  width: number;
  /** Samples per pixel. Always 1 for rank-2 matrices. */
  channels: number;
  /** 2 for H×W, 3 for H×W×C. */
  rank: 2 | 3;
  /** Bytes per sample in the source data. */
  sampleWidth: SampleWidth;
  /** `height * width * channels` samples, unsigned, in row-major order. */
  data: PixelBuffer;
}

/** 8-bit RGBA image as produced by a bitmap decoder. */
export interface RgbaImage {
  /** RGBA pixel data. Length must be width * height * 4. */
  data: Uint8Array | Uint8ClampedArray;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
}
