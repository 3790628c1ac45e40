import { describe, it, expect } from 'vitest';
import { BrushDecodeError, toRows } from '@brushtex/core';
import { GbrDecoder, readGbrHeader } from './parse-gbr';
import { buildGbrRecord } from './test-helpers';

describe('readGbrHeader', () => {
  it('should read the fixed fields, spacing and name', () => {
    const header = readGbrHeader(buildGbrRecord({ width: 3, height: 2, name: 'Pencil', spacing: 10, data: [] }));
    expect(header).toEqual({
      offset: 0,
      headerSize: 35,
      version: 2,
      width: 3,
      height: 2,
      channels: 1,
      magic: 'GIMP',
      spacing: 10,
      name: 'Pencil',
    });
  });

  it('should decode UTF-8 names', () => {
    const header = readGbrHeader(buildGbrRecord({ width: 0, height: 0, name: 'Pinsel ü', data: [] }));
    expect(header.name).toBe('Pinsel ü');
  });

  it('should fail on a truncated header', () => {
    expect(() => readGbrHeader(new Uint8Array(10))).toThrow(BrushDecodeError);
  });
});

describe('GbrDecoder', () => {
  describe('check', () => {
    it('should accept version 2 with the GIMP magic', () => {
      expect(new GbrDecoder(buildGbrRecord({ width: 1, height: 1, data: [0] })).check()).toBe(true);
    });

    it('should reject another version', () => {
      expect(new GbrDecoder(buildGbrRecord({ width: 1, height: 1, version: 1, data: [0] })).check()).toBe(false);
    });

    it('should reject a magic mismatch', () => {
      expect(new GbrDecoder(buildGbrRecord({ width: 1, height: 1, magic: 'GIMQ', data: [0] })).check()).toBe(false);
    });

    it('should reject short input', () => {
      expect(new GbrDecoder(new Uint8Array(8)).check()).toBe(false);
    });
  });

  describe('parse', () => {
    it('should decode a grayscale brush as H×W', () => {
      const bytes = buildGbrRecord({ width: 3, height: 2, name: 'Dots', data: [1, 2, 3, 4, 5, 6] });
      const result = new GbrDecoder(bytes).parse();

      expect(result.format).toBe('gbr');
      expect(result.formatVersion).toEqual({ major: 2, minor: 0 });
      expect(result.warnings).toEqual([]);
      expect(result.samples).toHaveLength(1);
      const [sample] = result.samples;
      expect(sample.name).toBe('Dots');
      expect(sample.parameters).toBeUndefined();
      expect(sample.pixels.rank).toBe(2);
      expect(toRows(sample.pixels)).toEqual([
        [1, 2, 3],
        [4, 5, 6],
      ]);
    });

    it('should decode an RGBA brush as H×W×4', () => {
      const bytes = buildGbrRecord({
        width: 2,
        height: 1,
        channels: 4,
        data: [255, 0, 0, 255, 0, 0, 255, 128],
      });
      const [sample] = new GbrDecoder(bytes).parse().samples;
      expect(sample.name).toBeUndefined();
      expect(sample.pixels.rank).toBe(3);
      expect(sample.pixels.channels).toBe(4);
      expect(toRows(sample.pixels)).toEqual([
        [
          [255, 0, 0, 255],
          [0, 0, 255, 128],
        ],
      ]);
    });

    it('should fail on truncated pixel data', () => {
      const bytes = buildGbrRecord({ width: 2, height: 2, data: [1, 2, 3] });
      expect(() => new GbrDecoder(bytes).parse()).toThrow(BrushDecodeError);
    });

    it('should fail with UnsupportedVersion on a wrong version', () => {
      const bytes = buildGbrRecord({ width: 1, height: 1, version: 3, data: [0] });
      let caught: unknown;
      try {
        new GbrDecoder(bytes).parse();
      } catch (err) {
        caught = err;
      }
      expect(caught).toMatchObject({ kind: 'UnsupportedVersion', offset: 4 });
    });

    it('should return equal results on repeated parses', () => {
      const bytes = buildGbrRecord({ width: 2, height: 1, data: [9, 8] });
      expect(new GbrDecoder(bytes).parse()).toEqual(new GbrDecoder(bytes).parse());
    });
  });
});
