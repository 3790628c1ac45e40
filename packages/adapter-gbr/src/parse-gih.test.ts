import { describe, it, expect } from 'vitest';
import { BrushDecodeError, toRows } from '@brushtex/core';
import { GihDecoder, readGihPreamble } from './parse-gih';
import { buildGbrRecord, buildGih } from './test-helpers';

describe('readGihPreamble', () => {
  it('should read the name, count and header length', () => {
    const bytes = buildGih('Leaves', '2 ncells:2 dim:1', []);
    expect(readGihPreamble(bytes)).toEqual({ name: 'Leaves', count: 2, headerLength: 24 });
  });

  it('should reject input with fewer than two lines', () => {
    expect(() => readGihPreamble(new TextEncoder().encode('Leaves\n2'))).toThrow(BrushDecodeError);
  });

  it('should reject a non-numeric count', () => {
    let caught: unknown;
    try {
      readGihPreamble(buildGih('Leaves', 'many', []));
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ kind: 'MalformedHeader', offset: 7 });
  });
});

describe('GihDecoder', () => {
  it('should check the preamble', () => {
    expect(new GihDecoder(buildGih('Leaves', '1', [])).check()).toBe(true);
    expect(new GihDecoder(new TextEncoder().encode('no preamble')).check()).toBe(false);
  });

  it('should decode back-to-back records named after the collection', () => {
    const bytes = buildGih('Leaves', '2 ncells:2', [
      buildGbrRecord({ width: 2, height: 1, name: 'first', data: [1, 2] }),
      buildGbrRecord({ width: 1, height: 2, name: 'second', data: [3, 4] }),
    ]);
    const result = new GihDecoder(bytes).parse();

    expect(result.format).toBe('gih');
    expect(result.warnings).toEqual([]);
    expect(result.samples.map((s) => s.name)).toEqual(['Leaves', 'Leaves']);
    expect(result.samples.map((s) => toRows(s.pixels))).toEqual([[[1, 2]], [[3], [4]]]);
    expect(result.samples.every((s) => s.parameters === undefined)).toBe(true);
  });

  it('should skip a bad record and continue with the next one', () => {
    const bytes = buildGih('Leaves', '2', [
      buildGbrRecord({ width: 1, height: 1, version: 1, data: [7] }),
      buildGbrRecord({ width: 1, height: 1, data: [8] }),
    ]);
    const result = new GihDecoder(bytes).parse();
    expect(result.samples).toHaveLength(1);
    expect(Array.from(result.samples[0].pixels.data)).toEqual([8]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^Brush 0 could not be decoded: GBR version 1/);
  });

  it('should warn when fewer records are present than announced', () => {
    const bytes = buildGih('Leaves', '3', [buildGbrRecord({ width: 1, height: 1, data: [5] })]);
    const result = new GihDecoder(bytes).parse();
    expect(result.samples).toHaveLength(1);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^Brush 1 header could not be read/);
  });

  it('should fail parse on a malformed preamble', () => {
    expect(() => new GihDecoder(new TextEncoder().encode('x\ny\n')).parse()).toThrow(BrushDecodeError);
  });
});
