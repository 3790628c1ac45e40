/**
 * @module parse-abr
 * ABR (Adobe Brush) file decoder for versions 6 and later.
 *
 * ABR v6+ structure:
 * - Header: version (2 bytes) + subversion (2 bytes)
 * - Series of 8BIM blocks: signature (4) + key (4) + length (4) + data,
 *   padded to a multiple of 4
 * - Key "samp" → brush sample images, one length-prefixed record each
 * - Key "desc" → one descriptor holding the brush presets
 * - Other keys (e.g. "patt") are skipped
 *
 * Subversion 1 stores each sample plane inline; subversion 2 wraps it in a
 * virtual memory array list. Samples are matched to presets through the
 * identifier string each sample starts with, which presets reference as
 * `sampledData`.
 *
 * @see https://www.adobe.com/devnet-apps/photoshop/fileformatashtml/PhotoshopFileFormats.htm#VirtualMemoryArrayList
 */

import type {
  BrushDecoder,
  BrushSample,
  ParameterMap,
  ParsedBrushFile,
  PixelMatrix,
} from '@brushtex/types';
import {
  createDecodeError,
  isBrushDecodeError,
  reportWarning,
  resolveDecoderOptions,
  type DecoderOptions,
  type ResolvedDecoderOptions,
} from '@brushtex/core';
import { BinaryCursor } from './binary-cursor';
import { getString, readDescriptor } from './descriptor-reader';
import { readSamplePlane } from './sample-plane';

/** Signature for Photoshop resource blocks. */
const SIG_8BIM = '8BIM';
const KEY_SAMPLES = 'samp';
const KEY_DESCRIPTOR = 'desc';

/** Descriptor block version. */
const DESCRIPTOR_VERSION = 16;

/** Virtual memory array list version. */
const VMA_VERSION = 3;

/** Unknown bytes between the identifier and the inline plane. */
const INLINE_SKIP = 10;

/** Descriptor key holding the identifier of a preset's sample. */
const SAMPLE_REFERENCE_KEY = 'sampledData';

/** A decoded sample image before presets are attached. */
interface SampleImage {
  identifier: string;
  pixels: PixelMatrix;
}

/** Preset data attached to a sample. */
export interface PresetEntry {
  name?: string;
  parameters: ParameterMap;
}

function padToFour(length: number): number {
  return length % 4 === 0 ? length : length + (4 - (length % 4));
}

/**
 * Decoder for ABR v6+ files with subversion 1 or 2.
 */
export class AbrDecoder implements BrushDecoder {
  readonly format = 'abr' as const;
  private readonly options: ResolvedDecoderOptions;

  constructor(
    private readonly bytes: Uint8Array,
    options?: DecoderOptions,
  ) {
    this.options = resolveDecoderOptions(options, 'abr');
  }

  /** Subversion must be 1 or 2 and the first block must be `8BIM` `samp`. */
  check(): boolean {
    if (this.bytes.length < 12) return false;
    const cursor = new BinaryCursor(this.bytes);
    cursor.readUint16();
    const minor = cursor.readUint16();
    if (minor !== 1 && minor !== 2) return false;
    return cursor.peekString(8) === SIG_8BIM + KEY_SAMPLES;
  }

  parse(): ParsedBrushFile {
    const { logger } = this.options;
    const cursor = new BinaryCursor(this.bytes);
    const warnings: string[] = [];

    const major = cursor.readUint16();
    const minor = cursor.readUint16();
    if (minor !== 1 && minor !== 2) {
      throw createDecodeError('UnsupportedVersion', `ABR subversion ${minor} is not supported`, {
        offset: 2,
      });
    }

    const images: SampleImage[] = [];
    const presets = new Map<string, PresetEntry>();

    while (cursor.remaining > 0) {
      const blockOffset = cursor.offset;
      if (cursor.remaining < 12) {
        reportWarning(logger, warnings, `Ignoring ${cursor.remaining} trailing bytes`, { offset: blockOffset });
        break;
      }

      const sig = cursor.readString(4);
      if (sig !== SIG_8BIM) {
        reportWarning(logger, warnings, `Unexpected signature "${sig}" at offset ${blockOffset}`, {
          offset: blockOffset,
        });
        break;
      }

      const key = cursor.readString(4);
      const blockLength = cursor.readUint32();
      const blockStart = cursor.offset;
      const blockEnd = blockStart + blockLength;

      if (blockEnd > cursor.length) {
        reportWarning(logger, warnings, `Block "${key}" extends beyond file end`, { offset: blockOffset });
        break;
      }

      if (key === KEY_SAMPLES) {
        this.readSampleBlock(cursor, blockEnd, minor, images, warnings);
      } else if (key === KEY_DESCRIPTOR) {
        try {
          this.readDescriptorBlock(cursor, presets);
        } catch (err) {
          if (!isBrushDecodeError(err)) throw err;
          reportWarning(logger, warnings, `Brush descriptor block could not be decoded: ${err.message}`, {
            offset: blockOffset,
          });
        }
      } else {
        logger.debug({ offset: blockOffset, key }, 'Skipping block');
      }

      cursor.seek(Math.min(blockStart + padToFour(blockLength), cursor.length));
    }

    const samples: BrushSample[] = images.map((image) => {
      const preset = presets.get(image.identifier);
      const sample: BrushSample = { pixels: image.pixels, isSecondaryTexture: false };
      if (preset) {
        if (preset.name !== undefined) sample.name = preset.name;
        sample.parameters = preset.parameters;
      }
      return sample;
    });

    logger.debug({ format: this.format, samples: samples.length }, 'Decoded ABR file');
    return {
      format: this.format,
      formatVersion: { major, minor },
      samples,
      warnings,
    };
  }

  /**
   * Iterate the length-prefixed sample records of a "samp" block.
   * The next record offset never depends on whether the current one decoded.
   */
  private readSampleBlock(
    cursor: BinaryCursor,
    blockEnd: number,
    minor: number,
    images: SampleImage[],
    warnings: string[],
  ): void {
    const { logger } = this.options;
    for (let i = 0; cursor.offset + 4 <= blockEnd; i++) {
      const sampleOffset = cursor.offset;
      const sampleLength = cursor.readUint32();
      const sampleStart = cursor.offset;
      const sampleEnd = sampleStart + sampleLength;

      if (sampleEnd > blockEnd) {
        reportWarning(logger, warnings, `Sample ${i} extends beyond samp block`, { offset: sampleOffset });
        break;
      }

      try {
        const image = this.readSample(cursor, sampleEnd, minor, i, warnings);
        if (image) images.push(image);
      } catch (err) {
        if (!isBrushDecodeError(err)) throw err;
        reportWarning(logger, warnings, `Sample ${i} could not be decoded: ${err.message}`, {
          offset: sampleOffset,
        });
      }

      cursor.seek(Math.min(sampleStart + padToFour(sampleLength), blockEnd));
    }
  }

  private readSample(
    cursor: BinaryCursor,
    sampleEnd: number,
    minor: number,
    index: number,
    warnings: string[],
  ): SampleImage | null {
    const identifier = cursor.readPascalString();

    let pixels: PixelMatrix | null;
    if (minor === 1) {
      cursor.skip(INLINE_SKIP);
      pixels = this.readPlane(cursor, sampleEnd, `Sample ${index}`, warnings);
    } else {
      pixels = this.readVirtualMemoryArrayList(cursor, sampleEnd, index, warnings);
    }

    return pixels ? { identifier, pixels } : null;
  }

  /**
   * Read a virtual memory array list and keep the last channel that decoded.
   */
  private readVirtualMemoryArrayList(
    cursor: BinaryCursor,
    sampleEnd: number,
    index: number,
    warnings: string[],
  ): PixelMatrix | null {
    const { logger } = this.options;
    const listOffset = cursor.offset;
    const version = cursor.readUint32();
    if (version !== VMA_VERSION) {
      throw createDecodeError('UnsupportedVersion', `Virtual memory array list version ${version} is not supported`, {
        offset: listOffset,
      });
    }
    cursor.readUint32(); // list length
    cursor.skip(16); // bounding rectangle
    const channelCount = cursor.readUint32();

    let last: PixelMatrix | null = null;
    for (let c = 0; c < channelCount; c++) {
      const channelOffset = cursor.offset;
      const written = cursor.readUint32();
      if (written === 0) continue;

      const channelLength = cursor.readUint32();
      if (channelLength === 0) continue;
      const channelEnd = Math.min(cursor.offset + channelLength, sampleEnd);

      try {
        cursor.skip(4); // pixel depth, repeated below
        const pixels = this.readPlane(cursor, channelEnd, `Sample ${index} channel ${c}`, warnings);
        if (pixels) last = pixels;
      } catch (err) {
        if (!isBrushDecodeError(err)) throw err;
        reportWarning(logger, warnings, `Sample ${index} channel ${c} could not be decoded: ${err.message}`, {
          offset: channelOffset,
        });
      }
      cursor.seek(channelEnd);
    }

    if (!last) {
      reportWarning(logger, warnings, `Sample ${index} has no image data`, { offset: listOffset });
    }
    return last;
  }

  private readPlane(
    cursor: BinaryCursor,
    planeEnd: number,
    label: string,
    warnings: string[],
  ): PixelMatrix | null {
    const plane = readSamplePlane(cursor, planeEnd, this.options.segmentedHeightLimit);
    if (plane.kind === 'segmented') {
      this.options.logger.debug({ height: plane.height }, `${label}: skipping segmented image`);
      return null;
    }
    if (plane.mismatchedRows.length > 0) {
      reportWarning(
        this.options.logger,
        warnings,
        `${label}: ${plane.mismatchedRows.length} scan line(s) did not match the image width`,
      );
    }
    return plane.pixels;
  }

  /** Read the "desc" block and index presets by sample identifier. */
  private readDescriptorBlock(cursor: BinaryCursor, presets: Map<string, PresetEntry>): void {
    const versionOffset = cursor.offset;
    const version = cursor.readUint32();
    if (version !== DESCRIPTOR_VERSION) {
      throw createDecodeError('UnsupportedVersion', `Descriptor version ${version} is not supported`, {
        offset: versionOffset,
      });
    }
    const descriptor = readDescriptor(cursor, this.options.maxDescriptorDepth);
    for (const [identifier, entry] of indexPresets(descriptor.items)) {
      if (!presets.has(identifier)) presets.set(identifier, entry);
    }
  }
}

/**
 * Map each referenced sample identifier to the nearest enclosing map that
 * carries a `name`, or to the referencing map itself when none does.
 * Walks breadth-first with an explicit queue; the first reference wins.
 */
export function indexPresets(root: ParameterMap): Map<string, PresetEntry> {
  const index = new Map<string, PresetEntry>();
  const queue: Array<{ map: ParameterMap; owner: ParameterMap | null }> = [{ map: root, owner: null }];

  for (let head = 0; head < queue.length; head++) {
    const { map } = queue[head];
    const owner = getString(map, 'name') !== undefined ? map : queue[head].owner;

    const reference = getString(map, SAMPLE_REFERENCE_KEY);
    if (reference !== undefined && !index.has(reference)) {
      const presetMap = owner ?? map;
      const name = getString(presetMap, 'name');
      index.set(reference, name !== undefined ? { name, parameters: presetMap } : { parameters: presetMap });
    }

    for (const value of map.values()) {
      if (value.type === 'map') {
        queue.push({ map: value.entries, owner });
      } else if (value.type === 'list') {
        const pending = [...value.items];
        while (pending.length > 0) {
          const item = pending.shift();
          if (item?.type === 'map') queue.push({ map: item.entries, owner });
          else if (item?.type === 'list') pending.push(...item.items);
        }
      }
    }
  }

  return index;
}
