/**
 * @module archive
 * In-memory zip access for archived brush bundles.
 */

import { unzipSync } from 'fflate';
import { createDecodeError } from '@brushtex/core';

/** Read-only view of the members of an archive. */
export interface ArchiveReader {
  /** Member paths in archive order. */
  entries(): string[];
  /** Bytes of one member. */
  read(name: string): Uint8Array;
}

/**
 * Unpack a zip archive held in memory.
 * @throws BrushDecodeError (`MalformedHeader`) when the archive cannot be read.
 */
export function openZipArchive(bytes: Uint8Array): ArchiveReader {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(bytes);
  } catch (err) {
    throw createDecodeError('MalformedHeader', 'Archive could not be unpacked', {
      offset: 0,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const names = Object.keys(files);
  return {
    entries: () => [...names],
    read: (name) => {
      const data = files[name];
      if (data === undefined) {
        throw createDecodeError('OutOfBounds', `Archive has no member "${name}"`);
      }
      return data;
    },
  };
}
