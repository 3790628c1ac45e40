/**
 * @module decoder
 * Capability contract shared by all format decoders.
 */

import type { BrushFormat, ParsedBrushFile } from './brush';
import type { RgbaImage } from './pixels';

/**
 * A decoder bound to one input buffer.
 *
 * `check()` is a cheap header gate with no side effects; `parse()` must only
 * be called after `check()` returned true and may still throw on a malformed
 * body.
 */
export interface BrushDecoder {
  readonly format: BrushFormat;
  check(): boolean;
  parse(): ParsedBrushFile;
}

/**
 * Turns a complete image byte stream into pixels. The core never parses
 * image files itself; container decoders hand carved byte ranges here.
 */
export interface BitmapDecoder {
  decode(bytes: Uint8Array): RgbaImage;
}
