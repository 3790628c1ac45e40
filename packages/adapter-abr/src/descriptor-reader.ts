/**
 * @module descriptor-reader
 * Photoshop descriptor format reader.
 *
 * Descriptors are self-describing binary key-value structures: every value
 * is preceded by a 4-byte type tag. Descriptors nest through object and list
 * values, so nesting depth is bounded explicitly.
 *
 * @see https://www.adobe.com/devnet-apps/photoshop/fileformatashtml/#50577409_pgfId-1036735
 */

import type { ParameterMap, ParameterValue, UnitKind } from '@brushtex/types';
import { DEFAULT_MAX_DESCRIPTOR_DEPTH, createDecodeError } from '@brushtex/core';
import type { BinaryCursor } from './binary-cursor';
import { trimTrailingNul } from './binary-cursor';
import { DESCRIPTOR_KEYS, UNIT_TAGS } from './descriptor-keys';

/** A parsed descriptor: a class ID plus an ordered item map. */
export interface Descriptor {
  classId: string;
  items: ParameterMap;
}

type ValueReader = (cursor: BinaryCursor, depth: number, maxDepth: number) => ParameterValue;

/**
 * Read a compact string: 4-byte length; a zero length means a 4-char code
 * resolved through {@link DESCRIPTOR_KEYS}, otherwise that many ASCII bytes.
 */
export function readCompactString(cursor: BinaryCursor): string {
  const length = cursor.readUint32();
  if (length === 0) {
    const code = cursor.readString(4);
    return DESCRIPTOR_KEYS[code] ?? code;
  }
  return trimTrailingNul(cursor.readString(length));
}

/**
 * Read a descriptor body: Unicode name (discarded), class ID, item map.
 * @param cursor - Positioned at the Unicode name.
 * @param maxDepth - Maximum nesting of objects and lists.
 */
export function readDescriptor(cursor: BinaryCursor, maxDepth = DEFAULT_MAX_DESCRIPTOR_DEPTH): Descriptor {
  return readDescriptorAt(cursor, 0, maxDepth);
}

/**
 * Read one tagged value.
 * @throws BrushDecodeError (`UnrecognizedValueType`) for an unknown tag,
 *   (`DepthLimitExceeded`) when nesting passes `maxDepth`.
 */
export function readTypedValue(cursor: BinaryCursor, maxDepth = DEFAULT_MAX_DESCRIPTOR_DEPTH): ParameterValue {
  return readValueAt(cursor, 0, maxDepth);
}

function readDescriptorAt(cursor: BinaryCursor, depth: number, maxDepth: number): Descriptor {
  if (depth > maxDepth) {
    throw createDecodeError('DepthLimitExceeded', `Descriptor nesting exceeds ${maxDepth} levels`, {
      offset: cursor.offset,
    });
  }
  cursor.readUnicodeString();
  const classId = readCompactString(cursor);
  return { classId, items: readItemMap(cursor, depth, maxDepth) };
}

function readItemMap(cursor: BinaryCursor, depth: number, maxDepth: number): ParameterMap {
  const itemCount = cursor.readUint32();
  const items: ParameterMap = new Map();
  for (let i = 0; i < itemCount; i++) {
    const key = readCompactString(cursor);
    items.set(key, readValueAt(cursor, depth + 1, maxDepth));
  }
  return items;
}

function readValueAt(cursor: BinaryCursor, depth: number, maxDepth: number): ParameterValue {
  if (depth > maxDepth) {
    throw createDecodeError('DepthLimitExceeded', `Descriptor nesting exceeds ${maxDepth} levels`, {
      offset: cursor.offset,
    });
  }
  const tagOffset = cursor.offset;
  const osType = cursor.readString(4);
  const reader = VALUE_READERS[osType];
  if (!reader) {
    throw createDecodeError('UnrecognizedValueType', 'Unrecognized descriptor value type', {
      offset: tagOffset,
      tag: osType,
    });
  }
  return reader(cursor, depth, maxDepth);
}

function unitKind(tag: string): UnitKind {
  return UNIT_TAGS[tag] ?? 'unknown';
}

const readObject: ValueReader = (cursor, depth, maxDepth) => ({
  type: 'map',
  entries: readDescriptorAt(cursor, depth, maxDepth).items,
});

/** Type tag → value constructor. */
const VALUE_READERS: Readonly<Record<string, ValueReader>> = {
  long: (cursor) => ({ type: 'integer', value: cursor.readInt32() }),

  doub: (cursor) => ({ type: 'double', value: cursor.readFloat64() }),

  UntF: (cursor) => {
    const unitTag = cursor.readString(4);
    return { type: 'unitFloat', unit: unitKind(unitTag), unitTag, value: cursor.readFloat64() };
  },

  TEXT: (cursor) => ({ type: 'string', value: cursor.readUnicodeString() }),

  enum: (cursor) => {
    readCompactString(cursor); // enum type name
    return { type: 'string', value: readCompactString(cursor) };
  },

  bool: (cursor) => ({ type: 'boolean', value: cursor.readUint8() !== 0 }),

  Objc: readObject,
  GlbO: readObject,

  VlLs: (cursor, depth, maxDepth) => {
    const count = cursor.readUint32();
    const items: ParameterValue[] = [];
    for (let i = 0; i < count; i++) {
      items.push(readValueAt(cursor, depth + 1, maxDepth));
    }
    return { type: 'list', items };
  },
};

/** Helper to extract a string value from a descriptor item. */
export function getString(items: ParameterMap, key: string): string | undefined {
  const val = items.get(key);
  if (!val || val.type !== 'string') return undefined;
  return val.value;
}
