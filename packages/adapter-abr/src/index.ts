/**
 * @brushtex/adapter-abr
 *
 * ABR (Adobe Brush) decoders for both the legacy (v1-2) and the tagged
 * block (v6+) layouts, plus the big-endian cursor, the scan-line RLE codec
 * and the descriptor reader they are built on.
 *
 * @packageDocumentation
 */

export { AbrDecoder, indexPresets } from './parse-abr';
export type { PresetEntry } from './parse-abr';
export { LegacyAbrDecoder } from './parse-abr-legacy';
export { BinaryCursor, trimTrailingNul } from './binary-cursor';
export type { FixedWidth } from './binary-cursor';
export { decodeScanlineRle } from './scanline-rle';
export type { RleDecodeResult } from './scanline-rle';
export { readSamplePlane } from './sample-plane';
export type { PlaneReadResult } from './sample-plane';
export type { Descriptor } from './descriptor-reader';
export {
  getString,
  readCompactString,
  readDescriptor,
  readTypedValue,
} from './descriptor-reader';
export { DESCRIPTOR_KEYS, UNIT_TAGS } from './descriptor-keys';
