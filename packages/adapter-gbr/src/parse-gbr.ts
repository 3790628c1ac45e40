/**
 * @module parse-gbr
 * Decoder for single GIMP brushes (GBR version 2).
 *
 * Header (big-endian u32 unless noted):
 * - header size, version, width, height, channel count
 * - magic "GIMP" (4 ASCII bytes), brush spacing
 * - UTF-8 brush name, NUL-terminated, up to the header size
 *
 * Pixel data starts right after the header: width × height × channels raw
 * 8-bit samples, row-major, interleaved when there is more than one channel.
 *
 * @see https://developer.gimp.org/core/standards/gbr/
 */

import type { BrushDecoder, ParsedBrushFile, PixelMatrix } from '@brushtex/types';
import {
  createDecodeError,
  createPixelMatrix,
  isBrushDecodeError,
  resolveDecoderOptions,
  type DecoderOptions,
  type ResolvedDecoderOptions,
} from '@brushtex/core';
import { BinaryCursor, trimTrailingNul } from '@brushtex/adapter-abr';

const GBR_MAGIC = 'GIMP';
const GBR_VERSION = 2;

/** Bytes up to and including the magic. */
const FIXED_HEADER_SIZE = 24;

/** Bytes up to and including the spacing field. */
const SPACING_END = 28;

/** Fields of one brush record header. */
export interface GbrHeader {
  /** Absolute offset of the record. */
  offset: number;
  headerSize: number;
  version: number;
  width: number;
  height: number;
  channels: number;
  magic: string;
  spacing?: number;
  name?: string;
}

const utf8 = new TextDecoder('utf-8');

/**
 * Read the header of the record starting at `offset`. Nothing is validated
 * beyond the bounds of the fixed fields.
 */
export function readGbrHeader(bytes: Uint8Array, offset = 0): GbrHeader {
  const cursor = new BinaryCursor(bytes, offset);
  const header: GbrHeader = {
    offset,
    headerSize: cursor.readUint32(),
    version: cursor.readUint32(),
    width: cursor.readUint32(),
    height: cursor.readUint32(),
    channels: cursor.readUint32(),
    magic: cursor.readString(4),
  };

  const headerEnd = offset + header.headerSize;
  if (header.headerSize >= SPACING_END && headerEnd <= bytes.length) {
    header.spacing = cursor.readUint32();
    const name = trimTrailingNul(utf8.decode(bytes.subarray(offset + SPACING_END, headerEnd)));
    if (name.length > 0) header.name = name;
  }
  return header;
}

/** True when the header carries the supported version and magic. */
export function isSupportedGbrHeader(header: GbrHeader): boolean {
  return header.version === GBR_VERSION && header.magic === GBR_MAGIC;
}

/** Absolute offset of the byte after the record's pixel data. */
export function gbrRecordEnd(header: GbrHeader): number {
  return header.offset + header.headerSize + header.width * header.height * header.channels;
}

/**
 * Read the pixels of a record whose header has already been read.
 * One channel gives an H×W matrix, more give H×W×C.
 * @throws BrushDecodeError (`UnsupportedVersion`) for a wrong version or magic,
 *   (`MalformedHeader`) for a header shorter than its fixed fields,
 *   (`OutOfBounds`) for truncated pixel data.
 */
export function readGbrPixels(bytes: Uint8Array, header: GbrHeader): PixelMatrix {
  if (!isSupportedGbrHeader(header)) {
    throw createDecodeError(
      'UnsupportedVersion',
      `GBR version ${header.version} with magic "${header.magic}" is not supported`,
      { offset: header.offset + 4 },
    );
  }
  if (header.headerSize < FIXED_HEADER_SIZE || header.channels < 1) {
    throw createDecodeError(
      'MalformedHeader',
      `Invalid GBR header (size ${header.headerSize}, ${header.channels} channels)`,
      { offset: header.offset },
    );
  }

  const cursor = new BinaryCursor(bytes, Math.min(header.offset + header.headerSize, bytes.length));
  const raw = cursor.readBytes(header.width * header.height * header.channels);
  const pixels = createPixelMatrix(
    header.height,
    header.width,
    1,
    header.channels === 1 ? undefined : header.channels,
  );
  pixels.data.set(raw);
  return pixels;
}

/**
 * Decoder for a single-brush GBR file.
 */
export class GbrDecoder implements BrushDecoder {
  readonly format = 'gbr' as const;
  private readonly options: ResolvedDecoderOptions;

  constructor(
    private readonly bytes: Uint8Array,
    options?: DecoderOptions,
  ) {
    this.options = resolveDecoderOptions(options, 'gbr');
  }

  /** Version must be 2 and the magic "GIMP". */
  check(): boolean {
    try {
      return isSupportedGbrHeader(readGbrHeader(this.bytes));
    } catch (err) {
      if (isBrushDecodeError(err)) return false;
      throw err;
    }
  }

  parse(): ParsedBrushFile {
    const header = readGbrHeader(this.bytes);
    const pixels = readGbrPixels(this.bytes, header);

    this.options.logger.debug(
      { format: this.format, width: header.width, height: header.height, channels: header.channels },
      'Decoded GBR brush',
    );
    return {
      format: this.format,
      formatVersion: { major: header.version, minor: 0 },
      samples: [
        header.name !== undefined
          ? { pixels, name: header.name, isSecondaryTexture: false }
          : { pixels, isSecondaryTexture: false },
      ],
      warnings: [],
    };
  }
}
