import { TextDecoder, TextEncoder } from 'node:util';
import { CodecError } from './errors.js';

export interface ByteBufferOptions {
  initialCapacity?: number;
  textEncoder?: TextEncoder;
  textDecoder?: TextDecoder;
}

/**
 * ByteBuffer is a growable little-endian buffer with independent write and
 * read positions. Writes append at `position`; reads consume from
 * `readPosition` in the order the values were written.
 */
export class ByteBuffer {
  buffer: ArrayBuffer;
  view: DataView;
  position: number;
  readPosition: number;
  capacity: number;
  textEncoder: TextEncoder;
  textDecoder: TextDecoder;

  constructor(options: ByteBufferOptions = {}) {
    this.capacity = options.initialCapacity || 256;
    this.textEncoder = options.textEncoder || new TextEncoder();
    this.textDecoder = options.textDecoder || new TextDecoder();
    this.buffer = new ArrayBuffer(this.capacity);
    this.view = new DataView(this.buffer);
    this.position = 0;
    this.readPosition = 0;
  }

  /**
   * A buffer holding a copy of `bytes`, ready to be read from the start.
   */
  static from(bytes: Uint8Array, options: ByteBufferOptions = {}): ByteBuffer {
    const result = new ByteBuffer({ ...options, initialCapacity: Math.max(bytes.length, 1) });
    result.writeBytes(bytes);
    return result;
  }

  /**
   * Bytes written and not yet read.
   */
  get remaining(): number {
    return this.position - this.readPosition;
  }

  /**
   * Ensure the buffer has enough capacity for additional bytes.
   */
  private ensureCapacity(additionalBytes: number): void {
    const required = this.position + additionalBytes;
    if (required > this.capacity) {
      // Double capacity until it's enough
      while (this.capacity < required) {
        this.capacity *= 2;
      }
      const grown = new ArrayBuffer(this.capacity);
      new Uint8Array(grown).set(new Uint8Array(this.buffer, 0, this.position));
      this.buffer = grown;
      this.view = new DataView(this.buffer);
    }
  }

  /**
   * Claim `size` unread bytes and return the offset they start at.
   */
  private consume(size: number): number {
    if (this.readPosition + size > this.position) {
      throw new CodecError(`Unexpected end of buffer: need ${size} bytes, ${this.remaining} left`, {
        code: 'structural_mismatch',
        context: { offset: this.readPosition, size },
      });
    }
    const offset = this.readPosition;
    this.readPosition += size;
    return offset;
  }

  // === Writers (Little Endian) ===

  writeU8(value: number): number {
    const pos = this.position;
    this.ensureCapacity(1);
    this.view.setUint8(this.position++, value);
    return pos;
  }

  writeI8(value: number): number {
    const pos = this.position;
    this.ensureCapacity(1);
    this.view.setInt8(this.position++, value);
    return pos;
  }

  writeU16(value: number): number {
    const pos = this.position;
    this.ensureCapacity(2);
    this.view.setUint16(this.position, value, true);
    this.position += 2;
    return pos;
  }

  writeI16(value: number): number {
    const pos = this.position;
    this.ensureCapacity(2);
    this.view.setInt16(this.position, value, true);
    this.position += 2;
    return pos;
  }

  writeU32(value: number): number {
    const pos = this.position;
    this.ensureCapacity(4);
    this.view.setUint32(this.position, value, true);
    this.position += 4;
    return pos;
  }

  writeI32(value: number): number {
    const pos = this.position;
    this.ensureCapacity(4);
    this.view.setInt32(this.position, value, true);
    this.position += 4;
    return pos;
  }

  writeI64(value: bigint): number {
    const pos = this.position;
    this.ensureCapacity(8);
    this.view.setBigInt64(this.position, value, true);
    this.position += 8;
    return pos;
  }

  writeF32(value: number): number {
    const pos = this.position;
    this.ensureCapacity(4);
    this.view.setFloat32(this.position, value, true);
    this.position += 4;
    return pos;
  }

  writeF64(value: number): number {
    const pos = this.position;
    this.ensureCapacity(8);
    this.view.setFloat64(this.position, value, true);
    this.position += 8;
    return pos;
  }

  writeBool(value: boolean): number {
    return this.writeU8(value ? 1 : 0);
  }

  /**
   * Write raw bytes to the buffer.
   */
  writeBytes(bytes: Uint8Array): number {
    const pos = this.position;
    this.ensureCapacity(bytes.length);
    new Uint8Array(this.buffer, this.position, bytes.length).set(bytes);
    this.position += bytes.length;
    return pos;
  }

  /**
   * Write a u32 byte length followed by the UTF-8 bytes of `text`.
   */
  writeString(text: string): number {
    const bytes = this.textEncoder.encode(text);
    const pos = this.writeU32(bytes.length);
    this.writeBytes(bytes);
    return pos;
  }

  // === Readers (Little Endian) ===

  readU8(): number {
    return this.view.getUint8(this.consume(1));
  }

  readI8(): number {
    return this.view.getInt8(this.consume(1));
  }

  readU16(): number {
    return this.view.getUint16(this.consume(2), true);
  }

  readI16(): number {
    return this.view.getInt16(this.consume(2), true);
  }

  readU32(): number {
    return this.view.getUint32(this.consume(4), true);
  }

  readI32(): number {
    return this.view.getInt32(this.consume(4), true);
  }

  readI64(): bigint {
    return this.view.getBigInt64(this.consume(8), true);
  }

  readF32(): number {
    return this.view.getFloat32(this.consume(4), true);
  }

  readF64(): number {
    return this.view.getFloat64(this.consume(8), true);
  }

  readBool(): boolean {
    return this.readU8() !== 0;
  }

  /**
   * Read a raw byte slice from the buffer
   */
  readBytes(length: number): Uint8Array {
    return new Uint8Array(this.buffer, this.consume(length), length);
  }

  readString(): string {
    const length = this.readU32();
    return this.textDecoder.decode(this.readBytes(length));
  }

  /**
   * Get the bytes written so far.
   */
  finish(): Uint8Array {
    return new Uint8Array(this.buffer, 0, this.position);
  }

  /**
   * Reset both positions to reuse the buffer.
   */
  reset(): void {
    this.position = 0;
    this.readPosition = 0;
  }
}
