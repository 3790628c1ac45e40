/**
 * @module parse-brushset
 * Decoder for zip-archived brush bundles (.brushset, .brush).
 *
 * Each brush is a folder in the archive holding `Shape.png`, optionally
 * `Grain.png`, and a keyed-archive property list `Brush.archive` with the
 * settings. Shape and grain images become separate samples; the grain is
 * flagged as a secondary texture. Members under a `Reset` folder are
 * factory-default copies and are ignored.
 */

import type {
  BitmapDecoder,
  BrushDecoder,
  BrushSample,
  ParsedBrushFile,
  PixelMatrix,
  RgbaImage,
} from '@brushtex/types';
import {
  createPixelMatrix,
  isBrushDecodeError,
  pngBitmapDecoder,
  reportWarning,
  resolveDecoderOptions,
  type DecoderOptions,
  type ResolvedDecoderOptions,
} from '@brushtex/core';
import { openZipArchive, type ArchiveReader } from './archive';
import {
  readArchivedBrushInfo,
  simplePlistReader,
  type ArchivedBrushInfo,
  type PropertyListReader,
} from './property-list';

const SHAPE_SUFFIX = 'Shape.png';
const GRAIN_SUFFIX = 'Grain.png';
const SETTINGS_FILE = 'Brush.archive';
const RESET_MARKER = 'Reset';

/** Options for {@link BrushsetDecoder}. */
export interface BrushsetDecoderOptions extends DecoderOptions {
  /** Opens the archive held in the input bytes (default: fflate). */
  openArchive?: (bytes: Uint8Array) => ArchiveReader;
  /** Reads `Brush.archive` files (default: simple-plist). */
  propertyListReader?: PropertyListReader;
  /** Decodes shape and grain images (default: built-in PNG decoder). */
  bitmapDecoder?: BitmapDecoder;
}

/** True when the bytes start with a zip local-file or end-of-directory record. */
export function isZipSignature(bytes: Uint8Array): boolean {
  if (bytes.length < 4 || bytes[0] !== 0x50 || bytes[1] !== 0x4b) return false;
  return (bytes[2] === 0x03 && bytes[3] === 0x04) || (bytes[2] === 0x05 && bytes[3] === 0x06);
}

/** First (red) channel of an RGBA image as an 8-bit H×W matrix. */
export function redChannel(image: RgbaImage): PixelMatrix {
  const pixels = createPixelMatrix(image.height, image.width, 1);
  for (let p = 0; p < pixels.data.length; p++) {
    pixels.data[p] = image.data[p * 4];
  }
  return pixels;
}

/**
 * Decoder for archived brush bundles.
 */
export class BrushsetDecoder implements BrushDecoder {
  readonly format = 'brushset' as const;
  private readonly options: ResolvedDecoderOptions;
  private readonly openArchive: (bytes: Uint8Array) => ArchiveReader;
  private readonly propertyListReader: PropertyListReader;
  private readonly bitmapDecoder: BitmapDecoder;

  constructor(
    private readonly bytes: Uint8Array,
    options: BrushsetDecoderOptions = {},
  ) {
    this.options = resolveDecoderOptions(options, 'brushset');
    this.openArchive = options.openArchive ?? openZipArchive;
    this.propertyListReader = options.propertyListReader ?? simplePlistReader;
    this.bitmapDecoder = options.bitmapDecoder ?? pngBitmapDecoder;
  }

  check(): boolean {
    return isZipSignature(this.bytes);
  }

  parse(): ParsedBrushFile {
    const { logger } = this.options;
    const archive = this.openArchive(this.bytes);
    const members = archive.entries();
    const available = new Set(members);
    const settingsCache = new Map<string, ArchivedBrushInfo>();
    const warnings: string[] = [];
    const samples: BrushSample[] = [];

    for (const member of members) {
      if (member.includes(RESET_MARKER)) continue;
      const isGrain = member.endsWith(GRAIN_SUFFIX);
      if (!isGrain && !member.endsWith(SHAPE_SUFFIX)) continue;

      // "<folder>/Shape.png" → folder "<folder>", settings "<folder>/Brush.archive"
      const folder = member.slice(0, -(SHAPE_SUFFIX.length + 1));
      const settingsPath = member.slice(0, -SHAPE_SUFFIX.length) + SETTINGS_FILE;

      try {
        const pixels = redChannel(this.bitmapDecoder.decode(archive.read(member)));
        const sample: BrushSample = { pixels, isSecondaryTexture: isGrain };

        if (available.has(settingsPath)) {
          let info = settingsCache.get(settingsPath);
          if (!info) {
            info = readArchivedBrushInfo(this.propertyListReader.read(archive.read(settingsPath)));
            settingsCache.set(settingsPath, info);
          }
          if (info.name !== undefined) sample.name = info.name;
          if (info.parameters) {
            sample.parameters = new Map(info.parameters);
            sample.parameters.set('identifier', { type: 'string', value: folder });
          }
        }
        samples.push(sample);
      } catch (err) {
        if (!isBrushDecodeError(err)) throw err;
        reportWarning(logger, warnings, `Member "${member}" could not be decoded: ${err.message}`, { member });
      }
    }

    logger.debug({ format: this.format, samples: samples.length }, 'Decoded brush archive');
    return {
      format: this.format,
      formatVersion: { major: 1, minor: 0 },
      samples,
      warnings,
    };
  }
}
