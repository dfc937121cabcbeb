import { describe, expect, it } from "vitest";
import { DexError } from "../src/errors";
import {
  encodeSleb128,
  encodeUleb128,
  encodeUleb128p1,
  readSleb128,
  readUleb128,
  readUleb128p1,
} from "../src/leb128";

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof DexError ? err.kind : "not a DexError";
  }
  return undefined;
}

describe("readUleb128", () => {
  it("decodes single and multi-byte values", () => {
    expect(readUleb128(Uint8Array.of(0x00), 0)).toEqual({ value: 0, nextOffset: 1 });
    expect(readUleb128(Uint8Array.of(0x7f), 0)).toEqual({ value: 127, nextOffset: 1 });
    expect(readUleb128(Uint8Array.of(0x80, 0x7f), 0)).toEqual({ value: 16256, nextOffset: 2 });
    expect(readUleb128(Uint8Array.of(0xe5, 0x8e, 0x26), 0)).toEqual({ value: 624485, nextOffset: 3 });
  });

  it("decodes the largest 32-bit value without going negative", () => {
    expect(readUleb128(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0x0f), 0)).toEqual({
      value: 0xffffffff,
      nextOffset: 5,
    });
  });

  it("starts at the given offset", () => {
    expect(readUleb128(Uint8Array.of(0xaa, 0xbb, 0x05), 2)).toEqual({ value: 5, nextOffset: 3 });
  });

  it("rejects a fifth byte with high bits or a continuation", () => {
    expect(kindOf(() => readUleb128(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0x10), 0))).toBe("MalformedLeb128");
    expect(kindOf(() => readUleb128(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x80, 0x00), 0))).toBe("MalformedLeb128");
  });

  it("fails with OutOfBounds when the buffer ends mid-value", () => {
    expect(kindOf(() => readUleb128(Uint8Array.of(0x80), 0))).toBe("OutOfBounds");
    expect(kindOf(() => readUleb128(new Uint8Array(0), 0))).toBe("OutOfBounds");
  });

  it("re-encodes minimal encodings to the same bytes", () => {
    const samples = [[0x00], [0x01], [0x7f], [0x80, 0x01], [0xe5, 0x8e, 0x26], [0xff, 0xff, 0xff, 0xff, 0x0f]];
    for (const sample of samples) {
      const bytes = Uint8Array.from(sample);
      expect(Array.from(encodeUleb128(readUleb128(bytes, 0).value))).toEqual(sample);
    }
  });

  it("collapses padded encodings to the minimal form", () => {
    const decoded = readUleb128(Uint8Array.of(0x80, 0x00), 0);
    expect(decoded).toEqual({ value: 0, nextOffset: 2 });
    expect(Array.from(encodeUleb128(decoded.value))).toEqual([0x00]);
  });
});

describe("readUleb128p1", () => {
  it("maps a stored zero to -1", () => {
    expect(readUleb128p1(Uint8Array.of(0x00), 0)).toEqual({ value: -1, nextOffset: 1 });
    expect(readUleb128p1(Uint8Array.of(0x05), 0)).toEqual({ value: 4, nextOffset: 1 });
    expect(Array.from(encodeUleb128p1(-1))).toEqual([0x00]);
  });
});

describe("readSleb128", () => {
  it("sign-extends from the last byte", () => {
    expect(readSleb128(Uint8Array.of(0x7f), 0)).toEqual({ value: -1, nextOffset: 1 });
    expect(readSleb128(Uint8Array.of(0x3f), 0)).toEqual({ value: 63, nextOffset: 1 });
    expect(readSleb128(Uint8Array.of(0x40), 0)).toEqual({ value: -64, nextOffset: 1 });
    expect(readSleb128(Uint8Array.of(0x80, 0x7f), 0)).toEqual({ value: -128, nextOffset: 2 });
  });

  it("covers both ends of the 32-bit range", () => {
    expect(readSleb128(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x78), 0).value).toBe(-0x80000000);
    expect(readSleb128(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0x07), 0).value).toBe(0x7fffffff);
  });

  it("rejects a fifth byte that is not a sign extension", () => {
    expect(kindOf(() => readSleb128(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x08), 0))).toBe("MalformedLeb128");
    expect(kindOf(() => readSleb128(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0x8f, 0x00), 0))).toBe("MalformedLeb128");
  });

  it("round-trips values sampled across the 32-bit range", () => {
    const values = [-0x80000000, -65, -64, -1, 0, 1, 63, 64, 0x7fffffff];
    for (let v = -0x80000000; v <= 0x7fffffff; v += 999_983) values.push(v);
    for (const v of values) {
      const encoded = encodeSleb128(v);
      expect(readSleb128(encoded, 0)).toEqual({ value: v, nextOffset: encoded.length });
    }
  });
});

describe("encoders", () => {
  it("reject values outside 32 bits", () => {
    expect(() => encodeUleb128(-1)).toThrow(RangeError);
    expect(() => encodeUleb128(2 ** 32)).toThrow(RangeError);
    expect(() => encodeSleb128(2 ** 31)).toThrow(RangeError);
  });

  it("produce the expected bytes", () => {
    expect(Array.from(encodeUleb128(300))).toEqual([0xac, 0x02]);
    expect(Array.from(encodeSleb128(-2))).toEqual([0x7e]);
    expect(Array.from(encodeSleb128(-129))).toEqual([0xff, 0x7e]);
  });
});
