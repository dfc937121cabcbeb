import { DexError } from "./errors";

export type Mutf8Result = {
  value: string;
  nextOffset: number;
};

// String.fromCharCode takes its units as arguments; keep chunks below engine limits
const CHUNK = 0x2000;

function continuation(bytes: Uint8Array, pos: number, start: number): number {
  if (pos >= bytes.length) {
    throw new DexError("InvalidStringEncoding", `string at offset ${start} ends inside a multi-byte sequence`, {
      offset: start,
    });
  }
  const b = bytes[pos];
  if ((b & 0xc0) !== 0x80) {
    throw new DexError("InvalidStringEncoding", `bad continuation byte 0x${b.toString(16)} at offset ${pos}`, {
      offset: pos,
    });
  }
  return b & 0x3f;
}

/**
 * Decodes `utf16Length` UTF-16 code units of MUTF-8 starting at `offset`.
 * Supplementary characters arrive as two 3-byte surrogate halves.
 */
export function decodeMutf8(bytes: Uint8Array, offset: number, utf16Length: number): Mutf8Result {
  // every code unit takes at least one byte
  if (offset < 0 || offset > bytes.length || utf16Length > bytes.length - offset) {
    throw new DexError(
      "InvalidStringEncoding",
      `string at offset ${offset} declares ${utf16Length} code units but the buffer ends first`,
      { offset }
    );
  }

  const units = new Uint16Array(utf16Length);
  let cur = offset;
  for (let i = 0; i < utf16Length; i++) {
    if (cur >= bytes.length) {
      throw new DexError("InvalidStringEncoding", `string at offset ${offset} is truncated`, { offset });
    }
    const b = bytes[cur];
    if (b < 0x80) {
      units[i] = b;
      cur += 1;
    } else if ((b & 0xe0) === 0xc0) {
      units[i] = ((b & 0x1f) << 6) | continuation(bytes, cur + 1, offset);
      cur += 2;
    } else if ((b & 0xf0) === 0xe0) {
      units[i] = ((b & 0x0f) << 12) | (continuation(bytes, cur + 1, offset) << 6) | continuation(bytes, cur + 2, offset);
      cur += 3;
    } else {
      throw new DexError("InvalidStringEncoding", `invalid MUTF-8 lead byte 0x${b.toString(16)} at offset ${cur}`, {
        offset: cur,
      });
    }
  }

  let value = "";
  for (let i = 0; i < units.length; i += CHUNK) {
    value += String.fromCharCode(...units.subarray(i, i + CHUNK));
  }
  return { value, nextOffset: cur };
}

export function encodeMutf8(text: string): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    if (c !== 0 && c < 0x80) {
      out.push(c);
    } else if (c < 0x800) {
      out.push(0xc0 | (c >> 6), 0x80 | (c & 0x3f));
    } else {
      out.push(0xe0 | (c >> 12), 0x80 | ((c >> 6) & 0x3f), 0x80 | (c & 0x3f));
    }
  }
  return Uint8Array.from(out);
}
