/**
 * @module router
 * Format detection and decoder selection for brush files.
 *
 * Files are routed by extension first; unknown extensions fall back to
 * sniffing the leading bytes. Each file is decoded independently, so a
 * failure in one never affects its siblings in a batch.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { BrushDecoder, BrushFormat, ParsedBrushFile } from '@brushtex/types';
import { createDecodeError, createLogger, isBrushDecodeError, type DecoderOptions } from '@brushtex/core';
import { AbrDecoder, LegacyAbrDecoder } from '@brushtex/adapter-abr';
import { GbrDecoder, GihDecoder } from '@brushtex/adapter-gbr';
import { BrushsetDecoder, isZipSignature, type BrushsetDecoderOptions } from '@brushtex/adapter-brushset';
import { SutDecoder, hasSqliteHeader, type SutDecoderOptions } from '@brushtex/adapter-sut';

const log = createLogger('import');

/** Options accepted by every decoder, container collaborators included. */
export type ImportOptions = BrushsetDecoderOptions & SutDecoderOptions;

/** Highest main version of the legacy ABR layout. */
const LEGACY_ABR_MAX_VERSION = 5;

/** Outcome of decoding one file in a batch. */
export type BrushFileResult =
  | { fileName: string; ok: true; file: ParsedBrushFile }
  | { fileName: string; ok: false; error: Error };

/** One input of a batch. */
export interface BrushFileInput {
  fileName: string;
  bytes: Uint8Array;
}

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot < 0 ? '' : fileName.slice(dot + 1).toLowerCase();
}

function abrFormat(bytes: Uint8Array): BrushFormat {
  const version = bytes.length >= 2 ? (bytes[0] << 8) | bytes[1] : 0;
  return version > LEGACY_ABR_MAX_VERSION ? 'abr' : 'abr-legacy';
}

function sniffFormat(bytes: Uint8Array): BrushFormat | undefined {
  if (hasSqliteHeader(bytes)) return 'sut';
  if (isZipSignature(bytes)) return 'brushset';
  if (new GbrDecoder(bytes).check()) return 'gbr';
  if (new AbrDecoder(bytes).check()) return 'abr';
  if (new LegacyAbrDecoder(bytes).check()) return 'abr-legacy';
  if (new GihDecoder(bytes).check()) return 'gih';
  return undefined;
}

/**
 * Pick the format of a file from its name, or from its bytes when the
 * extension is not a brush extension.
 */
export function detectFormat(fileName: string, bytes: Uint8Array): BrushFormat | undefined {
  switch (extensionOf(fileName)) {
    case 'gbr':
      return 'gbr';
    case 'gih':
      return 'gih';
    case 'abr':
      return abrFormat(bytes);
    case 'brushset':
    case 'brush':
      return 'brushset';
    case 'sut':
      return 'sut';
    default:
      return sniffFormat(bytes);
  }
}

/** Construct the decoder for a format. */
export function createDecoder(format: BrushFormat, bytes: Uint8Array, options: ImportOptions = {}): BrushDecoder {
  switch (format) {
    case 'abr-legacy':
      return new LegacyAbrDecoder(bytes, options);
    case 'abr':
      return new AbrDecoder(bytes, options);
    case 'gbr':
      return new GbrDecoder(bytes, options);
    case 'gih':
      return new GihDecoder(bytes, options);
    case 'brushset':
      return new BrushsetDecoder(bytes, options);
    case 'sut':
      return new SutDecoder(bytes, options);
  }
}

/**
 * Detect, check and parse one file.
 * @throws BrushDecodeError (`UnsupportedFormat`) when no decoder accepts the
 *   file, or any error the decoder raises while parsing.
 */
export function decodeBrushFile(fileName: string, bytes: Uint8Array, options: ImportOptions = {}): ParsedBrushFile {
  const format = detectFormat(fileName, bytes);
  if (!format) {
    throw createDecodeError('UnsupportedFormat', `${fileName} is not a recognized brush file`);
  }
  const decoder = createDecoder(format, bytes, options);
  if (!decoder.check()) {
    throw createDecodeError('UnsupportedFormat', `${fileName} is not a valid ${format} file`, { offset: 0 });
  }

  const file = decoder.parse();
  (options.logger ?? log).info(
    { fileName, format, samples: file.samples.length, warnings: file.warnings.length },
    'Decoded brush file',
  );
  return file;
}

/**
 * Decode several files. Decode errors are returned per file; any other
 * error propagates.
 */
export function decodeBrushFiles(files: Iterable<BrushFileInput>, options: ImportOptions = {}): BrushFileResult[] {
  const results: BrushFileResult[] = [];
  for (const { fileName, bytes } of files) {
    try {
      results.push({ fileName, ok: true, file: decodeBrushFile(fileName, bytes, options) });
    } catch (err) {
      if (!isBrushDecodeError(err)) throw err;
      (options.logger ?? log).warn({ fileName, kind: err.kind }, err.message);
      results.push({ fileName, ok: false, error: err });
    }
  }
  return results;
}

/** Read a brush file from disk and decode it. */
export async function importBrushFile(path: string, options: ImportOptions = {}): Promise<ParsedBrushFile> {
  const bytes = await readFile(path);
  return decodeBrushFile(basename(path), new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength), options);
}
