/**
 * @module png-codec
 * Minimal PNG encoder/decoder using fflate for the zlib stream.
 * Pure JS, no browser APIs required.
 *
 * The decoder is the default bitmap decoder for the container formats.
 * It reads every standard PNG (any color type and bit depth, palette,
 * interlaced) and always returns 8-bit RGBA. The encoder writes 8-bit RGBA and is used to build fixtures.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { BitmapDecoder, RgbaImage } from '@brushtex/types';
import { createDecodeError } from './errors';

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ── Helpers ──

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(data, typeStart + 4);
  const dataEnd = typeStart + 4 + data.length;
  write32(out, dataEnd, crc32(out, typeStart, dataEnd));
  return dataEnd + 4;
}

// PNG signature: 8 bytes
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Samples per pixel for each color type. */
const CHANNELS_BY_COLOR_TYPE: Record<number, number> = {
  0: 1, // grayscale
  2: 3, // RGB
  3: 1, // palette index
  4: 2, // gray + alpha
  6: 4, // RGBA
};

/** Bit depths the format allows for each color type. */
const BIT_DEPTHS_BY_COLOR_TYPE: Record<number, readonly number[]> = {
  0: [1, 2, 4, 8, 16],
  2: [8, 16],
  3: [1, 2, 4, 8],
  4: [8, 16],
  6: [8, 16],
};

/**
 * Encodes an RGBA image as a PNG file.
 * Uses filter type 0 (None) for simplicity.
 *
 * @param image - The RGBA image to encode.
 * @returns PNG file data as Uint8Array.
 */
export function encodePng(image: RgbaImage): Uint8Array {
  const { data, width, height } = image;

  if (data.length !== width * height * 4) {
    throw new Error(
      `Image data length (${data.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  // Raw scanlines with filter byte 0 (None) prepended to each row
  const rowBytes = width * 4;
  const rawData = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    rawData[y * (1 + rowBytes)] = 0;
    rawData.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }
  const compressed = zlibSync(rawData);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // color type: RGBA

  const out = new Uint8Array(8 + 12 + ihdr.length + 12 + compressed.length + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = writeChunk(out, 8, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

/** IHDR fields the decoder acts on. */
interface PngHeader {
  width: number;
  height: number;
  bitDepth: number;
  colorType: number;
  interlace: number;
}

/** Adam7 passes as `[xStart, yStart, xStep, yStep]`. */
const ADAM7_PASSES: ReadonlyArray<readonly [number, number, number, number]> = [
  [0, 0, 8, 8],
  [4, 0, 8, 8],
  [0, 4, 4, 8],
  [2, 0, 4, 4],
  [0, 2, 2, 4],
  [1, 0, 2, 2],
  [0, 1, 1, 2],
];

const FULL_FRAME: ReadonlyArray<readonly [number, number, number, number]> = [[0, 0, 1, 1]];

/** One reduced image: the whole frame, or an Adam7 pass. */
interface ScanPass {
  xStart: number;
  yStart: number;
  xStep: number;
  yStep: number;
  columns: number;
  rows: number;
  rowBytes: number;
}

/**
 * Decodes a PNG file into RGBA image data.
 *
 * Handles every color type and bit depth the format defines, PLTE and
 * tRNS transparency, filter types 0-4 (None, Sub, Up, Average, Paeth) and
 * Adam7 interlacing. 16-bit samples keep their high byte; samples below
 * 8 bits are scaled to the full 0-255 range.
 *
 * @param png - PNG file data.
 * @returns Decoded RGBA image.
 * @throws BrushDecodeError on a bad signature, truncated data or an
 *   invalid bit depth / color type combination.
 */
export function decodePng(png: Uint8Array): RgbaImage {
  if (png.length < PNG_SIGNATURE.length) {
    throw createDecodeError('MalformedHeader', 'Invalid PNG signature', { offset: 0 });
  }
  for (let i = 0; i < 8; i++) {
    if (png[i] !== PNG_SIGNATURE[i]) {
      throw createDecodeError('MalformedHeader', 'Invalid PNG signature', { offset: 0 });
    }
  }

  let header: PngHeader | undefined;
  let palette: Uint8Array | undefined;
  let transparency: Uint8Array | undefined;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset < png.length) {
    if (offset + 8 > png.length) {
      throw createDecodeError('OutOfBounds', 'Truncated PNG chunk header', { offset });
    }
    const length = read32(png, offset);
    const typeStr = String.fromCharCode(png[offset + 4], png[offset + 5], png[offset + 6], png[offset + 7]);
    const dataStart = offset + 8;
    if (dataStart + length > png.length) {
      throw createDecodeError('OutOfBounds', 'PNG chunk extends beyond data end', {
        offset,
        tag: typeStr,
      });
    }
    const chunk = png.subarray(dataStart, dataStart + length);

    if (typeStr === 'IHDR') {
      header = readHeader(chunk, dataStart);
    } else if (typeStr === 'PLTE') {
      palette = chunk;
    } else if (typeStr === 'tRNS') {
      transparency = chunk;
    } else if (typeStr === 'IDAT') {
      idatChunks.push(chunk);
    } else if (typeStr === 'IEND') {
      break;
    }

    offset = dataStart + length + 4; // skip data + CRC
  }

  if (!header || header.width === 0 || header.height === 0) {
    throw createDecodeError('MalformedHeader', 'PNG missing IHDR chunk');
  }
  if (header.colorType === 3 && !palette) {
    throw createDecodeError('MalformedHeader', 'PNG palette image without a PLTE chunk', { tag: 'PLTE' });
  }

  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  let rawData: Uint8Array;
  try {
    rawData = unzlibSync(combined);
  } catch (err) {
    throw createDecodeError('MalformedHeader', 'PNG image data cannot be inflated', {
      cause: err instanceof Error ? err : undefined,
    });
  }

  const passes = scanPasses(header);
  let needed = 0;
  for (const pass of passes) needed += pass.rows * (1 + pass.rowBytes);
  if (rawData.length < needed) {
    throw createDecodeError('OutOfBounds', 'PNG image data shorter than declared dimensions');
  }

  const { width, height } = header;
  const out = new Uint8Array(width * height * 4);
  const toRgba = pixelExpander(header, palette, transparency);
  const channels = CHANNELS_BY_COLOR_TYPE[header.colorType];
  const bpp = Math.max(1, (channels * header.bitDepth) >> 3);

  let passOffset = 0;
  for (const pass of passes) {
    const rows = unfilterScanlines(rawData, passOffset, pass.rows, pass.rowBytes, bpp);
    for (let py = 0; py < pass.rows; py++) {
      const y = pass.yStart + py * pass.yStep;
      const rowStart = py * pass.rowBytes;
      for (let px = 0; px < pass.columns; px++) {
        const x = pass.xStart + px * pass.xStep;
        toRgba(rows, rowStart, px * channels, out, (y * width + x) * 4);
      }
    }
    passOffset += pass.rows * (1 + pass.rowBytes);
  }
  return { data: out, width, height };
}

function readHeader(ihdr: Uint8Array, offset: number): PngHeader {
  if (ihdr.length < 13) {
    throw createDecodeError('OutOfBounds', 'Truncated PNG IHDR chunk', { offset });
  }
  const header: PngHeader = {
    width: read32(ihdr, 0),
    height: read32(ihdr, 4),
    bitDepth: ihdr[8],
    colorType: ihdr[9],
    interlace: ihdr[12],
  };
  const allowed = BIT_DEPTHS_BY_COLOR_TYPE[header.colorType];
  if (!allowed || !allowed.includes(header.bitDepth) || header.interlace > 1) {
    throw createDecodeError(
      'UnsupportedVersion',
      `Unsupported PNG format: bitDepth=${header.bitDepth}, colorType=${header.colorType}, interlace=${header.interlace}`,
      { offset },
    );
  }
  return header;
}

/** The full frame, or the non-empty Adam7 reductions in stream order. */
function scanPasses(header: PngHeader): ScanPass[] {
  const bitsPerPixel = CHANNELS_BY_COLOR_TYPE[header.colorType] * header.bitDepth;
  const layout = header.interlace === 1 ? ADAM7_PASSES : FULL_FRAME;
  const passes: ScanPass[] = [];
  for (const [xStart, yStart, xStep, yStep] of layout) {
    const columns = Math.ceil(Math.max(0, header.width - xStart) / xStep);
    const rows = Math.ceil(Math.max(0, header.height - yStart) / yStep);
    if (columns === 0 || rows === 0) continue;
    passes.push({ xStart, yStart, xStep, yStep, columns, rows, rowBytes: Math.ceil((columns * bitsPerPixel) / 8) });
  }
  return passes;
}

/** Sample `index` of a packed row at the image's bit depth. */
function readPackedSample(rows: Uint8Array, rowStart: number, index: number, bitDepth: number): number {
  if (bitDepth === 8) return rows[rowStart + index];
  if (bitDepth === 16) return (rows[rowStart + index * 2] << 8) | rows[rowStart + index * 2 + 1];
  const bit = index * bitDepth;
  const shift = 8 - bitDepth - (bit & 7);
  return (rows[rowStart + (bit >> 3)] >> shift) & ((1 << bitDepth) - 1);
}

type PixelExpander = (rows: Uint8Array, rowStart: number, sampleIndex: number, out: Uint8Array, at: number) => void;

/** Build the per-pixel conversion from one color type and bit depth to 8-bit RGBA. */
function pixelExpander(
  header: PngHeader,
  palette: Uint8Array | undefined,
  transparency: Uint8Array | undefined,
): PixelExpander {
  const { bitDepth, colorType } = header;
  const sample = (rows: Uint8Array, rowStart: number, index: number): number =>
    readPackedSample(rows, rowStart, index, bitDepth);
  const to8 = (value: number): number =>
    bitDepth === 16 ? value >> 8 : bitDepth === 8 ? value : (value * 255) / ((1 << bitDepth) - 1);
  const key = (index: number): number | undefined =>
    transparency && transparency.length >= index * 2 + 2
      ? (transparency[index * 2] << 8) | transparency[index * 2 + 1]
      : undefined;

  switch (colorType) {
    case 0: {
      const grayKey = key(0);
      return (rows, rowStart, i, out, at) => {
        const v = sample(rows, rowStart, i);
        out[at] = out[at + 1] = out[at + 2] = to8(v);
        out[at + 3] = v === grayKey ? 0 : 255;
      };
    }
    case 2: {
      const [rKey, gKey, bKey] = [key(0), key(1), key(2)];
      return (rows, rowStart, i, out, at) => {
        const r = sample(rows, rowStart, i);
        const g = sample(rows, rowStart, i + 1);
        const b = sample(rows, rowStart, i + 2);
        out[at] = to8(r);
        out[at + 1] = to8(g);
        out[at + 2] = to8(b);
        out[at + 3] = r === rKey && g === gKey && b === bKey ? 0 : 255;
      };
    }
    case 3: {
      const entries = palette ?? new Uint8Array(0);
      return (rows, rowStart, i, out, at) => {
        const index = sample(rows, rowStart, i);
        if (index * 3 + 2 >= entries.length) {
          throw createDecodeError('MalformedHeader', `PNG palette index ${index} out of range`, { tag: 'PLTE' });
        }
        out[at] = entries[index * 3];
        out[at + 1] = entries[index * 3 + 1];
        out[at + 2] = entries[index * 3 + 2];
        out[at + 3] = transparency && index < transparency.length ? transparency[index] : 255;
      };
    }
    case 4:
      return (rows, rowStart, i, out, at) => {
        out[at] = out[at + 1] = out[at + 2] = to8(sample(rows, rowStart, i));
        out[at + 3] = to8(sample(rows, rowStart, i + 1));
      };
    default:
      return (rows, rowStart, i, out, at) => {
        for (let c = 0; c < 4; c++) out[at + c] = to8(sample(rows, rowStart, i + c));
      };
  }
}

/** Reverse per-scanline filters of one pass starting at `start` in the inflated stream. */
function unfilterScanlines(
  rawData: Uint8Array,
  start: number,
  height: number,
  rowBytes: number,
  bpp: number,
): Uint8Array {
  const data = new Uint8Array(height * rowBytes);

  for (let y = 0; y < height; y++) {
    const filterOffset = start + y * (1 + rowBytes);
    const filterType = rawData[filterOffset];
    const scanlineOffset = filterOffset + 1;
    const outOffset = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const raw = rawData[scanlineOffset + x];
      const a = x >= bpp ? data[outOffset + x - bpp] : 0; // left
      const b = y > 0 ? data[outOffset - rowBytes + x] : 0; // above
      const c = x >= bpp && y > 0 ? data[outOffset - rowBytes + x - bpp] : 0; // above-left

      let reconstructed: number;
      switch (filterType) {
        case 0: // None
          reconstructed = raw;
          break;
        case 1: // Sub
          reconstructed = (raw + a) & 0xff;
          break;
        case 2: // Up
          reconstructed = (raw + b) & 0xff;
          break;
        case 3: // Average
          reconstructed = (raw + ((a + b) >> 1)) & 0xff;
          break;
        case 4: // Paeth
          reconstructed = (raw + paethPredictor(a, b, c)) & 0xff;
          break;
        default:
          throw createDecodeError('MalformedHeader', `Unsupported PNG filter type: ${filterType}`, {
            offset: filterOffset,
          });
      }

      data[outOffset + x] = reconstructed;
    }
  }
  return data;
}

/**
 * Paeth predictor function used in PNG filter type 4.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

/** Default {@link BitmapDecoder} backed by {@link decodePng}. */
export const pngBitmapDecoder: BitmapDecoder = {
  decode: decodePng,
};
