/**
 * @module binary-cursor
 * Big-endian cursor over an immutable byte buffer.
 *
 * Every brush format handled here stores multi-byte numbers big-endian.
 * All reads are bounds-checked and fail with `OutOfBounds`.
 */

import { createDecodeError } from '@brushtex/core';

/** Width in bytes accepted by {@link BinaryCursor.readFixed}. */
export type FixedWidth = 1 | 2 | 4;

/**
 * Position-tracked reader wrapping a DataView.
 */
export class BinaryCursor {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private _offset: number;

  constructor(buffer: Uint8Array | ArrayBuffer, offset = 0) {
    this.bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
    this.view = new DataView(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength);
    this._offset = 0;
    this.seek(offset);
  }

  /** Current read position in the buffer. */
  get offset(): number {
    return this._offset;
  }

  /** Total byte length of the underlying buffer. */
  get length(): number {
    return this.bytes.byteLength;
  }

  /** Number of bytes remaining from current position. */
  get remaining(): number {
    return this.bytes.byteLength - this._offset;
  }

  /** Whether the current position is at or past the end. */
  get eof(): boolean {
    return this._offset >= this.bytes.byteLength;
  }

  /** The whole underlying buffer. */
  get buffer(): Uint8Array {
    return this.bytes;
  }

  /** Skip forward by a number of bytes. */
  skip(count: number): void {
    this.ensure(count);
    this._offset += count;
  }

  /** Set the read position to an absolute offset (at most the buffer length). */
  seek(offset: number): void {
    if (offset < 0 || offset > this.bytes.byteLength) {
      throw createDecodeError(
        'OutOfBounds',
        `Position ${offset} out of bounds (length ${this.bytes.byteLength})`,
        { offset },
      );
    }
    this._offset = offset;
  }

  /**
   * Read an integer of the given width.
   * @param width - 1, 2 or 4 bytes.
   * @param signed - Two's complement when true.
   * @param bigEndian - Byte order, big-endian unless stated otherwise.
   */
  readFixed(width: FixedWidth, signed: boolean, bigEndian = true): number {
    this.ensure(width);
    const at = this._offset;
    let val: number;
    if (width === 1) {
      val = signed ? this.view.getInt8(at) : this.view.getUint8(at);
    } else if (width === 2) {
      val = signed ? this.view.getInt16(at, !bigEndian) : this.view.getUint16(at, !bigEndian);
    } else {
      val = signed ? this.view.getInt32(at, !bigEndian) : this.view.getUint32(at, !bigEndian);
    }
    this._offset += width;
    return val;
  }

  /** Read an unsigned 8-bit integer. */
  readUint8(): number {
    return this.readFixed(1, false);
  }

  /** Read an unsigned 16-bit integer (big-endian). */
  readUint16(): number {
    return this.readFixed(2, false);
  }

  /** Read a signed 32-bit integer (big-endian). */
  readInt32(): number {
    return this.readFixed(4, true);
  }

  /** Read an unsigned 32-bit integer (big-endian). */
  readUint32(): number {
    return this.readFixed(4, false);
  }

  /** Read a 64-bit IEEE double (big-endian). */
  readFloat64(): number {
    this.ensure(8);
    const val = this.view.getFloat64(this._offset, false);
    this._offset += 8;
    return val;
  }

  /** Read raw bytes. The result is a view; the buffer is never written to. */
  readBytes(length: number): Uint8Array {
    const bytes = this.peekBytes(length);
    this._offset += length;
    return bytes;
  }

  /** Read raw bytes without advancing. */
  peekBytes(length: number): Uint8Array {
    this.ensure(length);
    return this.bytes.subarray(this._offset, this._offset + length);
  }

  /** Read a fixed-length ASCII string. */
  readString(length: number): string {
    const bytes = this.readBytes(length);
    let str = '';
    for (let i = 0; i < bytes.length; i++) {
      str += String.fromCharCode(bytes[i]);
    }
    return str;
  }

  /** Peek a fixed-length ASCII string without advancing. */
  peekString(length: number): string {
    const start = this._offset;
    const str = this.readString(length);
    this._offset = start;
    return str;
  }

  /** Read a Pascal string (1-byte length prefix, no padding). */
  readPascalString(): string {
    const len = this.readUint8();
    return this.readString(len);
  }

  /** Read a Unicode string (4-byte length prefix, UTF-16BE), trailing NULs trimmed. */
  readUnicodeString(): string {
    const charCount = this.readUint32();
    this.ensure(charCount * 2);
    let str = '';
    for (let i = 0; i < charCount; i++) {
      str += String.fromCharCode(this.readUint16());
    }
    return trimTrailingNul(str);
  }

  private ensure(count: number): void {
    if (count < 0 || this._offset + count > this.bytes.byteLength) {
      throw createDecodeError(
        'OutOfBounds',
        `Read of ${count} bytes beyond buffer end (length ${this.bytes.byteLength})`,
        { offset: this._offset },
      );
    }
  }
}

/** Strip trailing NUL characters. */
export function trimTrailingNul(str: string): string {
  let end = str.length;
  while (end > 0 && str.charCodeAt(end - 1) === 0) end--;
  return str.slice(0, end);
}
