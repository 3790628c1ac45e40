/**
 * @module test-helpers
 * Fixture builders for GIMP brush tests.
 */

export interface GbrRecordFixture {
  width: number;
  height: number;
  channels?: number;
  name?: string;
  spacing?: number;
  version?: number;
  magic?: string;
  data: number[];
}

/** Build one GBR record: 28-byte fixed header, NUL-terminated name, pixels. */
export function buildGbrRecord(fixture: GbrRecordFixture): Uint8Array {
  const name = new TextEncoder().encode(`${fixture.name ?? ''}\u0000`);
  const headerSize = 28 + name.length;
  const out = new Uint8Array(headerSize + fixture.data.length);
  const view = new DataView(out.buffer);
  view.setUint32(0, headerSize);
  view.setUint32(4, fixture.version ?? 2);
  view.setUint32(8, fixture.width);
  view.setUint32(12, fixture.height);
  view.setUint32(16, fixture.channels ?? 1);
  const magic = fixture.magic ?? 'GIMP';
  for (let i = 0; i < 4; i++) out[20 + i] = magic.charCodeAt(i);
  view.setUint32(24, fixture.spacing ?? 25);
  out.set(name, 28);
  out.set(fixture.data, headerSize);
  return out;
}

/** Concatenate byte arrays. */
export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/** Build a GIH file from its preamble lines and records. */
export function buildGih(name: string, countLine: string, records: Uint8Array[]): Uint8Array {
  return concat(new TextEncoder().encode(`${name}\n${countLine}\n`), ...records);
}
