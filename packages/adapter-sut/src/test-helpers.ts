/**
 * @module test-helpers
 * Builds SQLite brush containers in memory.
 */

import Database from 'better-sqlite3';

export interface SutFixture {
  materials: Uint8Array[];
  nodeName?: string;
  withVariant?: boolean;
  withMaterialTable?: boolean;
}

/** Serialized database with `Variant`, `Node` and `MaterialFile` tables. */
export function buildSut(fixture: SutFixture): Uint8Array {
  const db = new Database(':memory:');
  try {
    if (fixture.withVariant ?? true) {
      db.exec('CREATE TABLE Variant (VariantID INTEGER, BrushSize REAL, BrushHardness INTEGER, BrushPattern TEXT)');
      db.prepare('INSERT INTO Variant VALUES (?, ?, ?, ?)').run(1, 12.5, 80, null);
    }
    db.exec('CREATE TABLE Node (NodeName TEXT)');
    if (fixture.nodeName !== undefined) {
      db.prepare('INSERT INTO Node VALUES (?)').run(fixture.nodeName);
    }
    if (fixture.withMaterialTable ?? true) {
      db.exec('CREATE TABLE MaterialFile (FileData BLOB)');
      const insert = db.prepare('INSERT INTO MaterialFile VALUES (?)');
      for (const material of fixture.materials) insert.run(Buffer.from(material));
    }
    return new Uint8Array(db.serialize());
  } finally {
    db.close();
  }
}

/** Concatenate byte arrays. */
export function concat(...parts: ArrayLike<number>[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
