import { BridgeError } from "@idbridge/shared";

export const U64_MAX = (1n << 64n) - 1n;
export const U32_MAX = 0xffffffff;

/**
 * Bounds-checked cursor over a byte buffer. Every read checks the remaining
 * length first, so a short buffer surfaces as `malformed_payload` and never as
 * a RangeError from Buffer.
 */
export class ByteReader {
  private readonly buf: Buffer;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position() {
    return this.offset;
  }

  remaining() {
    return this.buf.length - this.offset;
  }

  private need(count: number, field: string) {
    if (this.remaining() < count) {
      throw new BridgeError(
        "malformed_payload",
        `${field}: need ${count} bytes at offset ${this.offset}, have ${this.remaining()}`
      );
    }
  }

  u8(field: string) {
    this.need(1, field);
    const value = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  u16be(field: string) {
    this.need(2, field);
    const value = this.buf.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  u32le(field: string) {
    this.need(4, field);
    const value = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  u32be(field: string) {
    this.need(4, field);
    const value = this.buf.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  u64le(field: string) {
    this.need(8, field);
    const value = this.buf.readBigUInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  u64be(field: string) {
    this.need(8, field);
    const value = this.buf.readBigUInt64BE(this.offset);
    this.offset += 8;
    return value;
  }

  /** Strict boolean: only 0 and 1 are accepted. */
  bool(field: string) {
    const value = this.u8(field);
    if (value > 1) {
      throw new BridgeError("malformed_payload", `${field}: invalid bool ${value}`);
    }
    return value === 1;
  }

  bytes(count: number, field: string) {
    this.need(count, field);
    const value = new Uint8Array(this.buf.subarray(this.offset, this.offset + count));
    this.offset += count;
    return value;
  }

  /** u32 length prefix followed by that many bytes; the bound is checked before slicing. */
  lengthPrefixed(field: string, maxLength?: number) {
    const length = this.u32le(`${field}_len`);
    if (maxLength !== undefined && length > maxLength) {
      throw new BridgeError("field_too_long", `${field}: ${length} > ${maxLength}`);
    }
    return this.bytes(length, field);
  }

  rest() {
    return this.bytes(this.remaining(), "rest");
  }

  expectEnd(field: string) {
    if (this.remaining() !== 0) {
      throw new BridgeError(
        "malformed_payload",
        `${field}: ${this.remaining()} trailing bytes`
      );
    }
  }
}

export class ByteWriter {
  private readonly chunks: Buffer[] = [];

  u8(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new BridgeError("malformed_payload", `u8 out of range: ${value}`);
    }
    const chunk = Buffer.alloc(1);
    chunk.writeUInt8(value);
    this.chunks.push(chunk);
    return this;
  }

  u16be(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new BridgeError("malformed_payload", `u16 out of range: ${value}`);
    }
    const chunk = Buffer.alloc(2);
    chunk.writeUInt16BE(value);
    this.chunks.push(chunk);
    return this;
  }

  u32le(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
      throw new BridgeError("malformed_payload", `u32 out of range: ${value}`);
    }
    const chunk = Buffer.alloc(4);
    chunk.writeUInt32LE(value);
    this.chunks.push(chunk);
    return this;
  }

  u32be(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
      throw new BridgeError("malformed_payload", `u32 out of range: ${value}`);
    }
    const chunk = Buffer.alloc(4);
    chunk.writeUInt32BE(value);
    this.chunks.push(chunk);
    return this;
  }

  u64le(value: bigint) {
    assertU64(value);
    const chunk = Buffer.alloc(8);
    chunk.writeBigUInt64LE(value);
    this.chunks.push(chunk);
    return this;
  }

  u64be(value: bigint) {
    assertU64(value);
    const chunk = Buffer.alloc(8);
    chunk.writeBigUInt64BE(value);
    this.chunks.push(chunk);
    return this;
  }

  bool(value: boolean) {
    return this.u8(value ? 1 : 0);
  }

  fixed(bytes: Uint8Array, length: number, field: string) {
    if (bytes.length !== length) {
      throw new BridgeError("malformed_payload", `${field}: expected ${length} bytes`);
    }
    this.chunks.push(Buffer.from(bytes));
    return this;
  }

  raw(bytes: Uint8Array) {
    this.chunks.push(Buffer.from(bytes));
    return this;
  }

  lengthPrefixed(bytes: Uint8Array, field: string, maxLength?: number) {
    if (maxLength !== undefined && bytes.length > maxLength) {
      throw new BridgeError("field_too_long", `${field}: ${bytes.length} > ${maxLength}`);
    }
    this.u32le(bytes.length);
    this.chunks.push(Buffer.from(bytes));
    return this;
  }

  toBytes() {
    return new Uint8Array(Buffer.concat(this.chunks));
  }
}

export const assertU64 = (value: bigint) => {
  if (value < 0n || value > U64_MAX) {
    throw new BridgeError("malformed_payload", `u64 out of range: ${value}`);
  }
};

/** Canonical little-endian bytes of a u64, the input of reply message ids. */
export const u64le = (value: bigint) => new ByteWriter().u64le(value).toBytes();
