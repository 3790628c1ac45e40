/**
 * @module property-list
 * Property list reading and conversion into brush parameters.
 */

import plist from 'simple-plist';
import type { ParameterMap, ParameterValue } from '@brushtex/types';
import { createDecodeError } from '@brushtex/core';

/** Turns property-list bytes (binary or XML) into a plain value tree. */
export interface PropertyListReader {
  read(bytes: Uint8Array): unknown;
}

/** Default reader backed by simple-plist. */
export const simplePlistReader: PropertyListReader = {
  read(bytes) {
    try {
      const tree: unknown = plist.parse(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
      return tree;
    } catch (err) {
      throw createDecodeError('MalformedHeader', 'Property list could not be parsed', {
        offset: 0,
        cause: err instanceof Error ? err : undefined,
      });
    }
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

/**
 * Convert one property-list value. Returns undefined for null and for
 * values with no parameter equivalent (raw data).
 */
export function toParameterValue(value: unknown): ParameterValue | undefined {
  switch (typeof value) {
    case 'boolean':
      return { type: 'boolean', value };
    case 'string':
      return { type: 'string', value };
    case 'number':
      return Number.isInteger(value) ? { type: 'integer', value } : { type: 'double', value };
    case 'bigint':
      return { type: 'integer', value: Number(value) };
    default:
      break;
  }
  if (value instanceof Date) {
    return { type: 'string', value: value.toISOString() };
  }
  if (Array.isArray(value)) {
    const items: ParameterValue[] = [];
    for (const item of value) {
      const converted = toParameterValue(item);
      if (converted) items.push(converted);
    }
    return { type: 'list', items };
  }
  if (isRecord(value)) {
    return { type: 'map', entries: toParameterMap(value) };
  }
  return undefined;
}

/** Convert a dictionary, dropping null entries. */
export function toParameterMap(dict: Record<string, unknown>): ParameterMap {
  const entries: ParameterMap = new Map();
  for (const [key, value] of Object.entries(dict)) {
    const converted = toParameterValue(value);
    if (converted) entries.set(key, converted);
  }
  return entries;
}

/** Name and parameters recovered from a keyed archive. */
export interface ArchivedBrushInfo {
  name?: string;
  parameters?: ParameterMap;
}

const IMAGE_SUFFIXES = ['.png', '.jpg', '.jpeg'];

/** Key present only in the dictionary holding the brush settings. */
const SETTINGS_MARKER = 'paintSize';

/**
 * Pick the brush name and settings out of a keyed archive's `$objects`
 * table. The name is the first plain string (not a class or placeholder
 * marker, not an image file name); the settings are the last dictionary
 * holding `paintSize`.
 */
export function readArchivedBrushInfo(tree: unknown): ArchivedBrushInfo {
  if (!isRecord(tree)) return {};
  const objects = tree['$objects'];
  if (!Array.isArray(objects)) return {};

  let name: string | undefined;
  let settings: Record<string, unknown> | undefined;
  for (const item of objects) {
    if (
      name === undefined &&
      typeof item === 'string' &&
      !item.startsWith('$') &&
      !item.startsWith('{') &&
      !IMAGE_SUFFIXES.some((suffix) => item.endsWith(suffix))
    ) {
      name = item;
    }
    if (isRecord(item) && SETTINGS_MARKER in item) {
      settings = item;
    }
  }

  const info: ArchivedBrushInfo = {};
  if (name !== undefined) info.name = name;
  if (settings) info.parameters = toParameterMap(settings);
  return info;
}
