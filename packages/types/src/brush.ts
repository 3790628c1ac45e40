/**
 * @module brush
 * Normalized output of every brush decoder.
 */

import type { ParameterMap } from './parameters';
import type { PixelMatrix } from './pixels';

/** File formats the importer understands. */
export type BrushFormat =
  | 'abr-legacy'
  | 'abr'
  | 'gbr'
  | 'gih'
  | 'brushset'
  | 'sut';

/** `(major, minor)` version pair read from a file header. */
export interface FormatVersion {
  major: number;
  minor: number;
}

/** One extracted brush tip. Never mutated once a decoder returns it. */
export interface BrushSample {
  /** Tip pixels at their native bit depth. */
  pixels: PixelMatrix;
  /** Display name, when the format stores one. */
  name?: string;
  /** Parameters recovered from a sibling structure. */
  parameters?: ParameterMap;
  /** True for a container's secondary "grain" texture. */
  isSecondaryTexture: boolean;
}

/** Result of decoding one brush file. */
export interface ParsedBrushFile {
  /** Format the file was decoded as. */
  format: BrushFormat;
  /** Version read from the header. */
  formatVersion: FormatVersion;
  /** Samples in file order. */
  samples: BrushSample[];
  /** Non-fatal findings, e.g. skipped members. */
  warnings: string[];
}
