import { DexError } from "./errors";

export type Leb128Result = {
  value: number;
  nextOffset: number;
};

const MAX_LEB128_BYTES = 5;

function readByte(bytes: Uint8Array, cur: number, start: number): number {
  if (cur >= bytes.length) {
    throw new DexError("OutOfBounds", `LEB128 at offset ${start} runs past end of buffer`, { offset: start });
  }
  return bytes[cur];
}

export function readUleb128(bytes: Uint8Array, offset: number): Leb128Result {
  let result = 0;
  let cur = offset;
  let count = 0;

  while (true) {
    const b = readByte(bytes, cur++, offset);
    count++;

    if (count === MAX_LEB128_BYTES && (b & 0xf0) !== 0) {
      throw new DexError("MalformedLeb128", `ULEB128 at offset ${offset} overflows 32 bits`, { offset });
    }

    // multiply instead of shifting so bit 31 does not turn the value negative
    result += (b & 0x7f) * 2 ** (7 * (count - 1));

    if ((b & 0x80) === 0) {
      break;
    }
  }

  return { value: result, nextOffset: cur };
}

/** uleb128p1: the stored value minus one, so `-1` stands for "no index". */
export function readUleb128p1(bytes: Uint8Array, offset: number): Leb128Result {
  const r = readUleb128(bytes, offset);
  return { value: r.value - 1, nextOffset: r.nextOffset };
}

export function readSleb128(bytes: Uint8Array, offset: number): Leb128Result {
  let result = 0;
  let cur = offset;
  let shift = 0;
  let b = 0;

  while (true) {
    b = readByte(bytes, cur++, offset);

    if (shift === 28) {
      // bits 3..6 of the last byte are the sign extension of bit 31
      const ext = b & 0xf8;
      if (ext !== 0 && ext !== 0x78) {
        throw new DexError("MalformedLeb128", `SLEB128 at offset ${offset} overflows 32 bits`, { offset });
      }
    }

    result |= (b & 0x7f) << shift;
    shift += 7;

    if ((b & 0x80) === 0) {
      break;
    }
  }

  if (shift < 32 && (b & 0x40) !== 0) {
    result |= -1 << shift;
  }

  return { value: result | 0, nextOffset: cur };
}

export function encodeUleb128(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new RangeError(`ULEB128 value out of range: ${value}`);
  }

  const out: number[] = [];
  let rest = value;
  do {
    let b = rest % 0x80;
    rest = Math.floor(rest / 0x80);
    if (rest !== 0) b |= 0x80;
    out.push(b);
  } while (rest !== 0);
  return Uint8Array.from(out);
}

export function encodeUleb128p1(value: number): Uint8Array {
  return encodeUleb128(value + 1);
}

export function encodeSleb128(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
    throw new RangeError(`SLEB128 value out of range: ${value}`);
  }

  const out: number[] = [];
  let rest = value;
  while (true) {
    const b = rest & 0x7f;
    rest >>= 7;
    const done = (rest === 0 && (b & 0x40) === 0) || (rest === -1 && (b & 0x40) !== 0);
    out.push(done ? b : b | 0x80);
    if (done) break;
  }
  return Uint8Array.from(out);
}
