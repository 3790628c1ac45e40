import { describe, it, expect } from 'vitest';
import type { ParameterMap } from '@brushtex/types';
import { BrushDecodeError } from '@brushtex/core';
import { BinaryCursor } from './binary-cursor';
import { getString, readCompactString, readDescriptor, readTypedValue } from './descriptor-reader';
import { BinaryWriter } from './test-helpers';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('readCompactString', () => {
  it('should resolve known 4-char codes', () => {
    const cursor = new BinaryCursor(new BinaryWriter().writeKey('Dmtr').toUint8Array());
    expect(readCompactString(cursor)).toBe('diameter');
  });

  it('should keep unknown codes as written', () => {
    const cursor = new BinaryCursor(new BinaryWriter().writeKey('Qzzq').toUint8Array());
    expect(readCompactString(cursor)).toBe('Qzzq');
  });

  it('should read long strings and trim trailing NULs', () => {
    const cursor = new BinaryCursor(new BinaryWriter().writeKey('sampledData\u0000').toUint8Array());
    expect(readCompactString(cursor)).toBe('sampledData');
    expect(cursor.eof).toBe(true);
  });
});

describe('readDescriptor', () => {
  it('should read every scalar value type', () => {
    const bytes = new BinaryWriter()
      .writeUnicodeString('ignored')
      .writeKey('null')
      .writeUint32(6)
      .writeKey('Cnt ').writeString('long').writeInt32(-3)
      .writeKey('Opct').writeString('doub').writeFloat64(0.5)
      .writeKey('Angl').writeString('UntF').writeString('#Ang').writeFloat64(90)
      .writeKey('Nm  ').writeString('TEXT').writeUnicodeString('Chalk')
      .writeKey('Md  ').writeString('enum').writeKey('BlnM').writeKey('Mltp')
      .writeKey('Invr').writeString('bool').writeUint8(1)
      .toUint8Array();

    const cursor = new BinaryCursor(bytes);
    const descriptor = readDescriptor(cursor);

    expect(cursor.eof).toBe(true);
    expect(descriptor.classId).toBe('null');
    expect([...descriptor.items.keys()]).toEqual(['count', 'opacity', 'angle', 'name', 'mode', 'invert']);
    expect(descriptor.items.get('count')).toEqual({ type: 'integer', value: -3 });
    expect(descriptor.items.get('opacity')).toEqual({ type: 'double', value: 0.5 });
    expect(descriptor.items.get('angle')).toEqual({ type: 'unitFloat', unit: 'angle', unitTag: '#Ang', value: 90 });
    expect(descriptor.items.get('name')).toEqual({ type: 'string', value: 'Chalk' });
    expect(descriptor.items.get('mode')).toEqual({ type: 'string', value: 'Mltp' });
    expect(descriptor.items.get('invert')).toEqual({ type: 'boolean', value: true });
  });

  it('should keep unrecognized unit tags', () => {
    const bytes = new BinaryWriter().writeString('UntF').writeString('#Mlm').writeFloat64(2).toUint8Array();
    expect(readTypedValue(new BinaryCursor(bytes))).toEqual({
      type: 'unitFloat',
      unit: 'unknown',
      unitTag: '#Mlm',
      value: 2,
    });
  });

  it('should read nested objects and lists', () => {
    const bytes = new BinaryWriter()
      .writeUnicodeString('')
      .writeKey('null')
      .writeUint32(1)
      .writeKey('Brsh')
      .writeString('VlLs')
      .writeUint32(2)
      .writeString('Objc').writeUnicodeString('').writeKey('computedBrush').writeUint32(1)
      .writeKey('Dmtr').writeString('UntF').writeString('#Pxl').writeFloat64(30)
      .writeString('long').writeInt32(7)
      .toUint8Array();

    const { items } = readDescriptor(new BinaryCursor(bytes));
    const list = items.get('brush');
    expect(list?.type).toBe('list');
    if (list?.type !== 'list') return;
    expect(list.items).toHaveLength(2);
    const first = list.items[0];
    expect(first.type).toBe('map');
    if (first.type !== 'map') return;
    expect(first.entries.get('diameter')).toEqual({ type: 'unitFloat', unit: 'pixels', unitTag: '#Pxl', value: 30 });
    expect(list.items[1]).toEqual({ type: 'integer', value: 7 });
  });

  it('should report an unknown type tag with its offset', () => {
    const bytes = new BinaryWriter()
      .writeUnicodeString('')
      .writeKey('null')
      .writeUint32(1)
      .writeKey('Dmtr')
      .writeString('XXXX')
      .toUint8Array();

    const err = captureError(() => readDescriptor(new BinaryCursor(bytes)));
    expect(err).toBeInstanceOf(BrushDecodeError);
    expect(err).toMatchObject({ kind: 'UnrecognizedValueType', tag: 'XXXX', offset: 24 });
  });

  it('should stop at the nesting limit', () => {
    const bytes = new BinaryWriter()
      .writeString('VlLs').writeUint32(1)
      .writeString('VlLs').writeUint32(1)
      .writeString('long').writeInt32(1)
      .toUint8Array();

    expect(captureError(() => readTypedValue(new BinaryCursor(bytes), 1))).toMatchObject({
      kind: 'DepthLimitExceeded',
    });
    expect(readTypedValue(new BinaryCursor(bytes), 2)).toEqual({
      type: 'list',
      items: [{ type: 'list', items: [{ type: 'integer', value: 1 }] }],
    });
  });
});

describe('getString', () => {
  const items: ParameterMap = new Map();
  items.set('a', { type: 'integer', value: 1 });
  items.set('b', { type: 'string', value: 'x' });

  it('should return string values only', () => {
    expect(getString(items, 'a')).toBeUndefined();
    expect(getString(items, 'b')).toBe('x');
    expect(getString(items, 'missing')).toBeUndefined();
  });
});
