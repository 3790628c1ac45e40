/**
 * @module parse-gih
 * Decoder for GIMP image-pipe brushes (GIH).
 *
 * A GIH file is a two-line text preamble followed by GBR records laid end
 * to end with no padding:
 * - line 1: collection name
 * - line 2: brush count, then pipe parameters (ignored)
 *
 * Every sample is named after the collection; records carry no names of
 * their own that are used.
 *
 * @see https://developer.gimp.org/core/standards/gih/
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
import { gbrRecordEnd, readGbrHeader, readGbrPixels, type GbrHeader } from './parse-gbr';

const NEWLINE = 0x0a;

/** Parsed text preamble. */
export interface GihPreamble {
  name: string;
  count: number;
  /** Offset of the first record. */
  headerLength: number;
}

const utf8 = new TextDecoder('utf-8');

/**
 * Read the two preamble lines.
 * @throws BrushDecodeError (`MalformedHeader`) when there are fewer than two
 *   newline-terminated lines or the count is not a decimal number.
 */
export function readGihPreamble(bytes: Uint8Array): GihPreamble {
  const firstBreak = bytes.indexOf(NEWLINE);
  const secondBreak = firstBreak < 0 ? -1 : bytes.indexOf(NEWLINE, firstBreak + 1);
  if (secondBreak < 0) {
    throw createDecodeError('MalformedHeader', 'GIH preamble needs a name line and a count line', {
      offset: 0,
    });
  }

  const name = utf8.decode(bytes.subarray(0, firstBreak));
  const countLine = utf8.decode(bytes.subarray(firstBreak + 1, secondBreak));
  const countToken = countLine.split(' ')[0].trim();
  if (!/^\d+$/.test(countToken)) {
    throw createDecodeError('MalformedHeader', `Invalid GIH brush count "${countToken}"`, {
      offset: firstBreak + 1,
    });
  }

  return { name, count: Number.parseInt(countToken, 10), headerLength: secondBreak + 1 };
}

/**
 * Decoder for GIH brush collections.
 */
export class GihDecoder implements BrushDecoder {
  readonly format = 'gih' as const;
  private readonly options: ResolvedDecoderOptions;

  constructor(
    private readonly bytes: Uint8Array,
    options?: DecoderOptions,
  ) {
    this.options = resolveDecoderOptions(options, 'gih');
  }

  /** The preamble must hold a name and a numeric count. */
  check(): boolean {
    try {
      readGihPreamble(this.bytes);
      return true;
    } catch (err) {
      if (isBrushDecodeError(err)) return false;
      throw err;
    }
  }

  parse(): ParsedBrushFile {
    const { logger } = this.options;
    const preamble = readGihPreamble(this.bytes);
    const warnings: string[] = [];
    const samples: BrushSample[] = [];

    let offset = preamble.headerLength;
    for (let i = 0; i < preamble.count; i++) {
      let header: GbrHeader;
      try {
        header = readGbrHeader(this.bytes, offset);
      } catch (err) {
        if (!isBrushDecodeError(err)) throw err;
        reportWarning(logger, warnings, `Brush ${i} header could not be read: ${err.message}`, { offset });
        break;
      }

      try {
        samples.push({
          pixels: readGbrPixels(this.bytes, header),
          name: preamble.name,
          isSecondaryTexture: false,
        });
      } catch (err) {
        if (!isBrushDecodeError(err)) throw err;
        reportWarning(logger, warnings, `Brush ${i} could not be decoded: ${err.message}`, { offset });
      }

      offset = gbrRecordEnd(header);
      if (offset > this.bytes.length) {
        if (i < preamble.count - 1) {
          reportWarning(logger, warnings, `Brush count ${preamble.count} exceeds the ${i + 1} record(s) present`);
        }
        break;
      }
    }

    logger.debug({ format: this.format, samples: samples.length }, 'Decoded GIH brush collection');
    return {
      format: this.format,
      formatVersion: { major: 2, minor: 0 },
      samples,
      warnings,
    };
  }
}
