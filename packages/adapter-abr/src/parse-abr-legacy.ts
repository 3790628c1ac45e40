/**
 * @module parse-abr-legacy
 * Decoder for ABR brush files, versions 1 and 2.
 *
 * Structure:
 * - Header: version (2 bytes) + brush count (2 bytes)
 * - Per brush: type (2 bytes) + length (4 bytes) + body
 *
 * Only sampled brushes (type 2) carry an image; computed brushes are skipped
 * by their declared length without being interpreted. Version 2 bodies carry
 * a UTF-16 brush name that is skipped.
 */

import type { BrushDecoder, BrushSample, ParsedBrushFile } from '@brushtex/types';
import {
  createDecodeError,
  isBrushDecodeError,
  reportWarning,
  resolveDecoderOptions,
  type DecoderOptions,
  type ResolvedDecoderOptions,
} from '@brushtex/core';
import { BinaryCursor } from './binary-cursor';
import { readSamplePlane } from './sample-plane';

/** Brush type code of a sampled (image) brush. */
const SAMPLED_BRUSH = 2;

/** Unknown bytes ahead of the optional name. */
const PRE_NAME_SKIP = 6;

/** Unknown bytes between the name and the bounding box. */
const POST_NAME_SKIP = 9;

/**
 * Decoder for ABR v1/v2 files.
 */
export class LegacyAbrDecoder implements BrushDecoder {
  readonly format = 'abr-legacy' as const;
  private readonly options: ResolvedDecoderOptions;

  constructor(
    private readonly bytes: Uint8Array,
    options?: DecoderOptions,
  ) {
    this.options = resolveDecoderOptions(options, 'abr-legacy');
  }

  /** The leading version must be 1 or 2. */
  check(): boolean {
    if (this.bytes.length < 4) return false;
    const version = (this.bytes[0] << 8) | this.bytes[1];
    return version === 1 || version === 2;
  }

  parse(): ParsedBrushFile {
    const { logger } = this.options;
    const cursor = new BinaryCursor(this.bytes);
    const warnings: string[] = [];
    const samples: BrushSample[] = [];

    const version = cursor.readUint16();
    const brushCount = cursor.readUint16();
    if (version !== 1 && version !== 2) {
      throw createDecodeError('UnsupportedVersion', `ABR version ${version} is not supported by this decoder`, {
        offset: 0,
      });
    }

    for (let i = 0; i < brushCount; i++) {
      const entryOffset = cursor.offset;
      const brushType = cursor.readUint16();
      const brushLength = cursor.readUint32();
      const nextOffset = cursor.offset + brushLength;

      if (brushType !== SAMPLED_BRUSH) {
        logger.debug({ offset: entryOffset, brushType }, 'Skipping non-sampled brush');
      } else {
        try {
          const sample = this.readSampledBrush(cursor, version, nextOffset, i, warnings);
          if (sample) samples.push(sample);
        } catch (err) {
          if (!isBrushDecodeError(err)) throw err;
          reportWarning(logger, warnings, `Brush ${i} could not be decoded: ${err.message}`, {
            offset: entryOffset,
          });
        }
      }

      if (nextOffset > cursor.length) {
        reportWarning(logger, warnings, `Brush ${i} extends beyond file end`, { offset: entryOffset });
        break;
      }
      cursor.seek(nextOffset);
    }

    logger.debug({ format: this.format, samples: samples.length }, 'Decoded legacy ABR file');
    return {
      format: this.format,
      formatVersion: { major: version, minor: 0 },
      samples,
      warnings,
    };
  }

  private readSampledBrush(
    cursor: BinaryCursor,
    version: number,
    entryEnd: number,
    index: number,
    warnings: string[],
  ): BrushSample | null {
    cursor.skip(PRE_NAME_SKIP);
    if (version === 2) {
      const nameLength = cursor.readUint32();
      cursor.skip(nameLength * 2);
    }
    cursor.skip(POST_NAME_SKIP);

    const plane = readSamplePlane(cursor, entryEnd, this.options.segmentedHeightLimit);
    if (plane.kind === 'segmented') {
      this.options.logger.debug({ index, height: plane.height }, 'Skipping segmented brush image');
      return null;
    }
    if (plane.mismatchedRows.length > 0) {
      reportWarning(
        this.options.logger,
        warnings,
        `Brush ${index}: ${plane.mismatchedRows.length} scan line(s) did not match the image width`,
      );
    }
    return { pixels: plane.pixels, isSecondaryTexture: false };
  }
}
