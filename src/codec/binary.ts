import { Buffer } from "node:buffer";

import { GraphFormatError } from "../graph/errors.js";

const INITIAL_CAPACITY = 256;

/**
 * Append-only big-endian writer backing the graph wire format. The buffer
 * grows geometrically; {@link toBuffer} returns a copy of the written bytes.
 */
export class BinaryWriter {
  private buffer: Buffer;
  private length = 0;

  constructor(initialCapacity = INITIAL_CAPACITY) {
    this.buffer = Buffer.alloc(Math.max(16, initialCapacity));
  }

  get byteLength(): number {
    return this.length;
  }

  writeUint8(value: number): this {
    this.ensure(1);
    this.buffer.writeUInt8(value, this.length);
    this.length += 1;
    return this;
  }

  writeUint16(value: number): this {
    this.ensure(2);
    this.buffer.writeUInt16BE(value, this.length);
    this.length += 2;
    return this;
  }

  writeInt32(value: number): this {
    this.ensure(4);
    this.buffer.writeInt32BE(value, this.length);
    this.length += 4;
    return this;
  }

  writeFloat64(value: number): this {
    this.ensure(8);
    this.buffer.writeDoubleBE(value, this.length);
    this.length += 8;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
    return this;
  }

  /** UTF-8 string prefixed by its int32 byte length. */
  writeString(value: string): this {
    const encoded = Buffer.from(value, "utf8");
    this.writeInt32(encoded.length);
    return this.writeBytes(encoded);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.length));
  }

  private ensure(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = Buffer.alloc(capacity);
    this.buffer.copy(next, 0, 0, this.length);
    this.buffer = next;
  }
}

/**
 * Sequential big-endian reader. Reading past the end raises a
 * {@link GraphFormatError} instead of a `RangeError`.
 */
export class BinaryReader {
  private readonly buffer: Buffer;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readUint8(): number {
    this.require(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint16(): number {
    this.require(2);
    const value = this.buffer.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  readInt32(): number {
    this.require(4);
    const value = this.buffer.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readFloat64(): number {
    this.require(8);
    const value = this.buffer.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  readBytes(length: number): Buffer {
    this.require(length);
    const slice = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  readString(): string {
    const length = this.readInt32();
    if (length < 0) {
      throw new GraphFormatError(`negative string length ${length}`, { offset: this.offset - 4 });
    }
    return this.readBytes(length).toString("utf8");
  }

  private require(count: number): void {
    if (this.offset + count > this.buffer.length) {
      throw new GraphFormatError("unexpected end of stream", {
        offset: this.offset,
        requested: count,
        available: this.buffer.length - this.offset,
      });
    }
  }
}
