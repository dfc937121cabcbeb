import { describe, expect, it } from "vitest";
import { isDexError } from "../src/errors";
import { decodeMutf8, encodeMutf8 } from "../src/mutf8";

function decodeError(bytes: number[], length: number): unknown {
  try {
    decodeMutf8(Uint8Array.from(bytes), 0, length);
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("decodeMutf8", () => {
  it("decodes ASCII up to the declared length", () => {
    const bytes = Uint8Array.of(0x68, 0x65, 0x6c, 0x6c, 0x6f, 0x00);
    expect(decodeMutf8(bytes, 0, 5)).toEqual({ value: "hello", nextOffset: 5 });
  });

  it("decodes two- and three-byte forms", () => {
    expect(decodeMutf8(Uint8Array.of(0xc3, 0xa9), 0, 1)).toEqual({ value: "é", nextOffset: 2 });
    expect(decodeMutf8(Uint8Array.of(0xe2, 0x82, 0xac), 0, 1)).toEqual({ value: "€", nextOffset: 3 });
  });

  it("decodes the two-byte NUL and a raw zero byte as U+0000", () => {
    expect(decodeMutf8(Uint8Array.of(0x61, 0xc0, 0x80, 0x62), 0, 3)).toEqual({ value: "a\u0000b", nextOffset: 4 });
    expect(decodeMutf8(Uint8Array.of(0x61, 0x00, 0x62), 0, 3)).toEqual({ value: "a\u0000b", nextOffset: 3 });
  });

  it("joins surrogate halves encoded as separate three-byte sequences", () => {
    const bytes = Uint8Array.of(0xed, 0xa0, 0xbd, 0xed, 0xb8, 0x80);
    const decoded = decodeMutf8(bytes, 0, 2);
    expect(decoded.value).toBe("\u{1F600}");
    expect(decoded.value.length).toBe(2);
    expect(decoded.nextOffset).toBe(6);
  });

  it("rejects a bad continuation byte", () => {
    expect(isDexError(decodeError([0xc3, 0x41], 1), "InvalidStringEncoding")).toBe(true);
  });

  it("rejects stray continuation bytes and four-byte leads", () => {
    expect(isDexError(decodeError([0x80], 1), "InvalidStringEncoding")).toBe(true);
    expect(isDexError(decodeError([0xf0, 0x9f, 0x98, 0x80], 1), "InvalidStringEncoding")).toBe(true);
  });

  it("rejects data that ends before the declared length", () => {
    expect(isDexError(decodeError([0xe2, 0x82], 1), "InvalidStringEncoding")).toBe(true);
    expect(isDexError(decodeError([0x41], 2), "InvalidStringEncoding")).toBe(true);
    expect(isDexError(decodeError([0xc3, 0xa9], 2), "InvalidStringEncoding")).toBe(true);
  });
});

describe("encodeMutf8", () => {
  it("uses the two-byte form for NUL", () => {
    expect(Array.from(encodeMutf8("\u0000"))).toEqual([0xc0, 0x80]);
  });

  it("encodes supplementary characters as two surrogate halves", () => {
    expect(Array.from(encodeMutf8("\u{1F600}"))).toEqual([0xed, 0xa0, 0xbd, 0xed, 0xb8, 0x80]);
  });

  it("keeps the declared length equal to the UTF-16 length", () => {
    for (const text of ["", "plain", "café", "€100", "a\u0000b", "x\u{1F600}y"]) {
      const bytes = encodeMutf8(text);
      expect(decodeMutf8(bytes, 0, text.length)).toEqual({ value: text, nextOffset: bytes.length });
    }
  });
});
