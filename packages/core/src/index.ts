/**
 * @brushtex/core
 *
 * Shared runtime for the brush decoders: error taxonomy, logging, options,
 * pixel-matrix helpers, the PNG bitmap decoder and the embedded-image
 * boundary scanner.
 *
 * @packageDocumentation
 */

export { BrushDecodeError, createDecodeError, isBrushDecodeError } from './errors';
export type { BrushErrorKind, DecodeErrorContext } from './errors';

export { createLogger } from './logger';
export type { Logger } from './logger';

export {
  DEFAULT_MAX_DESCRIPTOR_DEPTH,
  DEFAULT_SEGMENTED_HEIGHT_LIMIT,
  reportWarning,
  resolveDecoderOptions,
} from './options';
export type { DecoderOptions, ResolvedDecoderOptions } from './options';

export {
  allocatePixelBuffer,
  createPixelMatrix,
  readBigEndianSamples,
  sampleWidthFromDepth,
  toRows,
} from './pixel-matrix';

export { PNG_SIGNATURE, decodePng, encodePng, pngBitmapDecoder } from './png-codec';

export { PNG_BOUNDARY, extractEmbeddedImage, findAll, findImageRange } from './boundary-scanner';
export type { BoundarySignatures, ByteRange } from './boundary-scanner';
