/**
 * @module parse-sut
 * Decoder for SQLite brush containers (.sut).
 *
 * Tables read:
 * - `Variant`: one row of brush settings, column name → value
 * - `Node`: `NodeName` holds the brush name
 * - `MaterialFile`: `FileData` blobs, each embedding one PNG texture
 *
 * A blob may hold stale partial copies ahead of the current image, so the
 * PNG is carved out by its last start and end signatures. All samples share
 * the brush name and settings.
 */

import type {
  BitmapDecoder,
  BrushDecoder,
  BrushSample,
  ParameterMap,
  ParameterValue,
  ParsedBrushFile,
  PixelMatrix,
  RgbaImage,
} from '@brushtex/types';
import {
  createDecodeError,
  createPixelMatrix,
  extractEmbeddedImage,
  isBrushDecodeError,
  pngBitmapDecoder,
  reportWarning,
  resolveDecoderOptions,
  type DecoderOptions,
  type ResolvedDecoderOptions,
} from '@brushtex/core';
import { openSqliteStore, withBrushStore, type BrushStore, type StoreOpener, type StoreRow } from './sqlite-store';

/** "SQLite format 3" followed by a NUL. */
const SQLITE_HEADER = 'SQLite format 3\u0000';

const MATERIAL_TABLE = 'MaterialFile';
const SETTINGS_TABLE = 'Variant';
const NODE_TABLE = 'Node';

/** Options for {@link SutDecoder}. */
export interface SutDecoderOptions extends DecoderOptions {
  /** Opens the database held in the input bytes (default: better-sqlite3). */
  openStore?: StoreOpener;
  /** Decodes the carved textures (default: built-in PNG decoder). */
  bitmapDecoder?: BitmapDecoder;
}

/** True when the bytes start with the SQLite file header. */
export function hasSqliteHeader(bytes: Uint8Array): boolean {
  if (bytes.length < SQLITE_HEADER.length) return false;
  for (let i = 0; i < SQLITE_HEADER.length; i++) {
    if (bytes[i] !== SQLITE_HEADER.charCodeAt(i)) return false;
  }
  return true;
}

/** Convert a column value; null and blob columns have no equivalent. */
export function columnValue(value: unknown): ParameterValue | undefined {
  if (typeof value === 'string') return { type: 'string', value };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { type: 'integer', value } : { type: 'double', value };
  }
  if (typeof value === 'bigint') return { type: 'integer', value: Number(value) };
  return undefined;
}

/** An RGBA image as an 8-bit H×W×4 matrix. */
export function rgbaMatrix(image: RgbaImage): PixelMatrix {
  const pixels = createPixelMatrix(image.height, image.width, 1, 4);
  pixels.data.set(image.data);
  return pixels;
}

/**
 * Decoder for SQLite brush containers.
 */
export class SutDecoder implements BrushDecoder {
  readonly format = 'sut' as const;
  private readonly options: ResolvedDecoderOptions;
  private readonly openStore: StoreOpener;
  private readonly bitmapDecoder: BitmapDecoder;

  constructor(
    private readonly bytes: Uint8Array,
    options: SutDecoderOptions = {},
  ) {
    this.options = resolveDecoderOptions(options, 'sut');
    this.openStore = options.openStore ?? openSqliteStore;
    this.bitmapDecoder = options.bitmapDecoder ?? pngBitmapDecoder;
  }

  /** SQLite header plus a texture table. */
  check(): boolean {
    if (!hasSqliteHeader(this.bytes)) return false;
    try {
      return withBrushStore(this.bytes, this.openStore, (store) => store.hasTable(MATERIAL_TABLE));
    } catch (err) {
      if (isBrushDecodeError(err)) return false;
      throw err;
    }
  }

  parse(): ParsedBrushFile {
    const { logger } = this.options;
    const warnings: string[] = [];

    const samples = withBrushStore(this.bytes, this.openStore, (store) => {
      const { name, parameters } = this.readSettings(store);
      const decoded: BrushSample[] = [];

      store.allRows(`SELECT FileData FROM ${MATERIAL_TABLE}`).forEach((row, i) => {
        try {
          const sample: BrushSample = {
            pixels: this.readMaterial(row),
            parameters: new Map(parameters),
            isSecondaryTexture: false,
          };
          if (name !== undefined) sample.name = name;
          decoded.push(sample);
        } catch (err) {
          if (!isBrushDecodeError(err)) throw err;
          reportWarning(logger, warnings, `Material ${i} could not be decoded: ${err.message}`, { row: i });
        }
      });
      return decoded;
    });

    logger.debug({ format: this.format, samples: samples.length }, 'Decoded SQLite brush container');
    return {
      format: this.format,
      formatVersion: { major: 1, minor: 0 },
      samples,
      warnings,
    };
  }

  /** Settings row with nulls dropped, plus the brush name as `BrushName`. */
  private readSettings(store: BrushStore): { name?: string; parameters: ParameterMap } {
    const parameters: ParameterMap = new Map();
    const settings = store.hasTable(SETTINGS_TABLE) ? store.firstRow(`SELECT * FROM ${SETTINGS_TABLE}`) : undefined;
    if (settings) {
      for (const [column, value] of Object.entries(settings)) {
        const converted = columnValue(value);
        if (converted) parameters.set(column, converted);
      }
    }

    const node = store.hasTable(NODE_TABLE) ? store.firstRow(`SELECT NodeName FROM ${NODE_TABLE}`) : undefined;
    const nodeName = node?.NodeName;
    const name = typeof nodeName === 'string' ? nodeName : undefined;
    if (name !== undefined) parameters.set('BrushName', { type: 'string', value: name });
    return name !== undefined ? { name, parameters } : { parameters };
  }

  private readMaterial(row: StoreRow): PixelMatrix {
    const blob = row.FileData;
    if (!(blob instanceof Uint8Array)) {
      throw createDecodeError('MalformedHeader', 'Material row has no file data');
    }
    return rgbaMatrix(this.bitmapDecoder.decode(extractEmbeddedImage(blob)));
  }
}
