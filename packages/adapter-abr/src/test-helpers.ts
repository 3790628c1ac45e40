/**
 * @module test-helpers
 * Binary writer utility for constructing big-endian test buffers.
 */

/**
 * Simple binary writer for constructing big-endian byte buffers in tests.
 */
export class BinaryWriter {
  private chunks: Uint8Array[] = [];

  get length(): number {
    return this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  }

  writeUint8(value: number): this {
    this.chunks.push(new Uint8Array([value & 0xff]));
    return this;
  }

  writeUint16(value: number): this {
    this.chunks.push(new Uint8Array([(value >> 8) & 0xff, value & 0xff]));
    return this;
  }

  writeUint32(value: number): this {
    const buf = new Uint8Array(4);
    new DataView(buf.buffer).setUint32(0, value >>> 0);
    this.chunks.push(buf);
    return this;
  }

  writeInt32(value: number): this {
    const buf = new Uint8Array(4);
    new DataView(buf.buffer).setInt32(0, value);
    this.chunks.push(buf);
    return this;
  }

  writeFloat64(value: number): this {
    const buf = new Uint8Array(8);
    new DataView(buf.buffer).setFloat64(0, value);
    this.chunks.push(buf);
    return this;
  }

  writeString(str: string): this {
    const buf = new Uint8Array(str.length);
    for (let i = 0; i < str.length; i++) {
      buf[i] = str.charCodeAt(i);
    }
    this.chunks.push(buf);
    return this;
  }

  /** 1-byte length + ASCII. */
  writePascalString(str: string): this {
    return this.writeUint8(str.length).writeString(str);
  }

  /** 4-byte character count + UTF-16BE. */
  writeUnicodeString(str: string): this {
    this.writeUint32(str.length);
    for (let i = 0; i < str.length; i++) {
      this.writeUint16(str.charCodeAt(i));
    }
    return this;
  }

  /** Descriptor key: zero length + 4-char code, or length + ASCII. */
  writeKey(key: string): this {
    if (key.length === 4) {
      return this.writeUint32(0).writeString(key);
    }
    return this.writeUint32(key.length).writeString(key);
  }

  writeBytes(data: ArrayLike<number>): this {
    this.chunks.push(new Uint8Array(Array.from(data)));
    return this;
  }

  /** Append another writer's bytes prefixed by their 4-byte length. */
  writeBlock(inner: BinaryWriter): this {
    const bytes = inner.toUint8Array();
    return this.writeUint32(bytes.length).writeBytes(bytes);
  }

  toUint8Array(): Uint8Array {
    const result = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}
