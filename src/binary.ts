import { DexError } from "./errors";

/**
 * Bounds-checked little-endian reads over an immutable byte buffer.
 * Every accessor fails with `OutOfBounds` instead of reading past the end.
 */
export class ByteReader {
  public readonly bytes: Uint8Array;
  private readonly view: DataView;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.length;
  }

  checkRange(off: number, len: number): void {
    if (!Number.isSafeInteger(off) || !Number.isSafeInteger(len) || off < 0 || len < 0) {
      throw new DexError("OutOfBounds", `invalid range: offset=${off} length=${len}`, { offset: off });
    }
    // off and len are both bounded by 2^53, so the sum cannot silently wrap
    if (off + len > this.bytes.length) {
      throw new DexError(
        "OutOfBounds",
        `read of ${len} bytes at offset ${off} exceeds buffer length ${this.bytes.length}`,
        { offset: off }
      );
    }
  }

  contains(off: number, len = 0): boolean {
    return Number.isSafeInteger(off) && Number.isSafeInteger(len) && off >= 0 && len >= 0 && off + len <= this.bytes.length;
  }

  u1(off: number): number {
    this.checkRange(off, 1);
    return this.view.getUint8(off);
  }

  s1(off: number): number {
    this.checkRange(off, 1);
    return this.view.getInt8(off);
  }

  u2(off: number): number {
    this.checkRange(off, 2);
    return this.view.getUint16(off, true);
  }

  s2(off: number): number {
    this.checkRange(off, 2);
    return this.view.getInt16(off, true);
  }

  u4(off: number): number {
    this.checkRange(off, 4);
    return this.view.getUint32(off, true);
  }

  s4(off: number): number {
    this.checkRange(off, 4);
    return this.view.getInt32(off, true);
  }

  u8(off: number): bigint {
    this.checkRange(off, 8);
    return this.view.getBigUint64(off, true);
  }

  slice(off: number, len: number): Uint8Array {
    this.checkRange(off, len);
    return this.bytes.subarray(off, off + len);
  }
}
