import { describe, it, expect } from 'vitest';
import type { ParameterMap } from '@brushtex/types';
import { toRows } from '@brushtex/core';
import { AbrDecoder, indexPresets } from './parse-abr';
import { getMap } from './descriptor-reader';
import { BinaryWriter } from './test-helpers';

interface PlaneFixture {
  height: number;
  width: number;
  data: number[];
}

function planeBytes(plane: PlaneFixture): BinaryWriter {
  return new BinaryWriter()
    .writeInt32(0)
    .writeInt32(0)
    .writeInt32(plane.height)
    .writeInt32(plane.width)
    .writeUint16(8)
    .writeUint8(0)
    .writeBytes(plane.data);
}

function pad(writer: BinaryWriter, length: number): BinaryWriter {
  const padding = (4 - (length % 4)) % 4;
  return writer.writeBytes(new Uint8Array(padding));
}

/** Length-prefixed record padded to 4 bytes. */
function writeRecord(writer: BinaryWriter, inner: BinaryWriter): BinaryWriter {
  const bytes = inner.toUint8Array();
  return pad(writer.writeUint32(bytes.length).writeBytes(bytes), bytes.length);
}

function writeTaggedBlock(writer: BinaryWriter, key: string, inner: BinaryWriter): BinaryWriter {
  return writeRecord(writer.writeString('8BIM').writeString(key), inner);
}

function inlineSample(identifier: string, plane: PlaneFixture): BinaryWriter {
  return new BinaryWriter()
    .writePascalString(identifier)
    .writeBytes(new Uint8Array(10))
    .writeBytes(planeBytes(plane).toUint8Array());
}

function listSample(identifier: string, channels: Array<PlaneFixture | null>, version = 3): BinaryWriter {
  const writer = new BinaryWriter()
    .writePascalString(identifier)
    .writeUint32(version)
    .writeUint32(0)
    .writeBytes(new Uint8Array(16))
    .writeUint32(channels.length);
  for (const channel of channels) {
    if (!channel) {
      writer.writeUint32(0);
      continue;
    }
    writer.writeUint32(1).writeBlock(new BinaryWriter().writeUint32(8).writeBytes(planeBytes(channel).toUint8Array()));
  }
  return writer;
}

function abrFile(minor: number, samples: BinaryWriter[], extraBlocks: Array<[string, BinaryWriter]> = []): Uint8Array {
  const samp = new BinaryWriter();
  for (const sample of samples) writeRecord(samp, sample);
  const writer = new BinaryWriter().writeUint16(6).writeUint16(minor);
  writeTaggedBlock(writer, 'samp', samp);
  for (const [key, inner] of extraBlocks) writeTaggedBlock(writer, key, inner);
  return writer.toUint8Array();
}

/** Preset list: one preset named `name` whose brush references `identifier`. */
function presetDescriptor(name: string, identifier: string): BinaryWriter {
  return new BinaryWriter()
    .writeUint32(16)
    .writeUnicodeString('')
    .writeKey('null')
    .writeUint32(1)
    .writeKey('Brsh')
    .writeString('VlLs')
    .writeUint32(1)
    .writeString('Objc').writeUnicodeString('').writeKey('brushPreset').writeUint32(2)
    .writeKey('Nm  ').writeString('TEXT').writeUnicodeString(name)
    .writeKey('Brsh').writeString('Objc').writeUnicodeString('').writeKey('sampledBrush').writeUint32(2)
    .writeKey('Dmtr').writeString('UntF').writeString('#Pxl').writeFloat64(25)
    .writeKey('sampledData').writeString('TEXT').writeUnicodeString(identifier);
}

describe('AbrDecoder', () => {
  describe('check', () => {
    it('should accept subversions 1 and 2 with a leading samp block', () => {
      expect(new AbrDecoder(abrFile(1, [])).check()).toBe(true);
      expect(new AbrDecoder(abrFile(2, [])).check()).toBe(true);
    });

    it('should reject other subversions', () => {
      expect(new AbrDecoder(abrFile(3, [])).check()).toBe(false);
    });

    it('should reject a different first block', () => {
      const bytes = new BinaryWriter().writeUint16(6).writeUint16(2).writeString('8BIMpatt').writeUint32(0);
      expect(new AbrDecoder(bytes.toUint8Array()).check()).toBe(false);
    });

    it('should reject short input', () => {
      expect(new AbrDecoder(new Uint8Array([0, 6, 0, 2])).check()).toBe(false);
    });
  });

  describe('parse', () => {
    it('should decode inline samples in subversion 1', () => {
      const bytes = abrFile(1, [
        inlineSample('$a', { height: 2, width: 2, data: [10, 20, 30, 40] }),
        inlineSample('$b', { height: 1, width: 3, data: [1, 2, 3] }),
      ]);
      const result = new AbrDecoder(bytes).parse();

      expect(result.format).toBe('abr');
      expect(result.formatVersion).toEqual({ major: 6, minor: 1 });
      expect(result.warnings).toEqual([]);
      expect(result.samples.map((s) => toRows(s.pixels))).toEqual([
        [
          [10, 20],
          [30, 40],
        ],
        [[1, 2, 3]],
      ]);
      expect(result.samples[0].name).toBeUndefined();
      expect(result.samples[0].parameters).toBeUndefined();
    });

    it('should decode samples wrapped in a virtual memory array list', () => {
      const bytes = abrFile(2, [listSample('$a', [null, { height: 1, width: 2, data: [5, 6] }])]);
      const result = new AbrDecoder(bytes).parse();
      expect(result.warnings).toEqual([]);
      expect(toRows(result.samples[0].pixels)).toEqual([[5, 6]]);
    });

    it('should keep the last decoded channel', () => {
      const bytes = abrFile(2, [
        listSample('$a', [
          { height: 1, width: 1, data: [1] },
          { height: 1, width: 1, data: [2] },
        ]),
      ]);
      const { samples } = new AbrDecoder(bytes).parse();
      expect(samples).toHaveLength(1);
      expect(Array.from(samples[0].pixels.data)).toEqual([2]);
    });

    it('should warn about a sample without image data', () => {
      const result = new AbrDecoder(abrFile(2, [listSample('$a', [null, null])])).parse();
      expect(result.samples).toEqual([]);
      expect(result.warnings).toEqual(['Sample 0 has no image data']);
    });

    it('should warn about an unsupported list version and keep going', () => {
      const bytes = abrFile(2, [
        listSample('$a', [{ height: 1, width: 1, data: [1] }], 2),
        listSample('$b', [{ height: 1, width: 1, data: [9] }]),
      ]);
      const result = new AbrDecoder(bytes).parse();
      expect(result.samples).toHaveLength(1);
      expect(Array.from(result.samples[0].pixels.data)).toEqual([9]);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toMatch(
        /^Sample 0 could not be decoded: Virtual memory array list version 2 is not supported/,
      );
    });

    it('should attach preset names and parameters from the descriptor block', () => {
      const bytes = abrFile(
        1,
        [inlineSample('$abc', { height: 1, width: 1, data: [255] })],
        [['desc', presetDescriptor('Soft Round', '$abc')]],
      );
      const result = new AbrDecoder(bytes).parse();
      expect(result.warnings).toEqual([]);

      const [sample] = result.samples;
      expect(sample.name).toBe('Soft Round');
      expect([...(sample.parameters?.keys() ?? [])]).toEqual(['name', 'brush']);
      const brush = sample.parameters && getMap(sample.parameters, 'brush');
      expect(brush?.get('diameter')).toEqual({ type: 'unitFloat', unit: 'pixels', unitTag: '#Pxl', value: 25 });
    });

    it('should leave samples unnamed when no preset references them', () => {
      const bytes = abrFile(
        1,
        [inlineSample('$abc', { height: 1, width: 1, data: [255] })],
        [['desc', presetDescriptor('Hard Round', '$other')]],
      );
      expect(new AbrDecoder(bytes).parse().samples[0].name).toBeUndefined();
    });

    it('should keep samples when the descriptor block is unreadable', () => {
      const desc = new BinaryWriter()
        .writeUint32(16)
        .writeUnicodeString('')
        .writeKey('null')
        .writeUint32(1)
        .writeKey('Dmtr')
        .writeString('XXXX');
      const bytes = abrFile(1, [inlineSample('$a', { height: 1, width: 1, data: [3] })], [['desc', desc]]);
      const result = new AbrDecoder(bytes).parse();
      expect(result.samples).toHaveLength(1);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toMatch(/^Brush descriptor block could not be decoded: Unrecognized descriptor value type \(tag: XXXX\)/);
    });

    it('should skip unrelated blocks', () => {
      const bytes = abrFile(
        1,
        [inlineSample('$a', { height: 1, width: 1, data: [3] })],
        [['patt', new BinaryWriter().writeBytes([1, 2, 3, 4, 5])]],
      );
      const result = new AbrDecoder(bytes).parse();
      expect(result.samples).toHaveLength(1);
      expect(result.warnings).toEqual([]);
    });

    it('should stop at an unexpected signature', () => {
      const writer = new BinaryWriter().writeUint16(6).writeUint16(1).writeString('XXXXsamp').writeUint32(0);
      const result = new AbrDecoder(writer.toUint8Array()).parse();
      expect(result.samples).toEqual([]);
      expect(result.warnings).toEqual(['Unexpected signature "XXXX" at offset 4']);
    });

    it('should stop at a block that runs past the end', () => {
      const writer = new BinaryWriter().writeUint16(6).writeUint16(1).writeString('8BIMsamp').writeUint32(100);
      const result = new AbrDecoder(writer.toUint8Array()).parse();
      expect(result.warnings).toEqual(['Block "samp" extends beyond file end']);
    });

    it('should return equal results on repeated parses', () => {
      const decoder = new AbrDecoder(abrFile(1, [inlineSample('$a', { height: 1, width: 2, data: [7, 8] })]));
      expect(decoder.parse()).toEqual(decoder.parse());
    });
  });
});

describe('indexPresets', () => {
  it('should fall back to the referencing map when no ancestor is named', () => {
    const entries: ParameterMap = new Map();
    entries.set('sampledData', { type: 'string', value: '$x' });
    const root: ParameterMap = new Map();
    root.set('brush', { type: 'map', entries });
    const index = indexPresets(root);
    expect(index.get('$x')).toEqual({ parameters: entries });
  });
});
