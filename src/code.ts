import { ByteReader } from "./binary";
import { DexError } from "./errors";
import { readSleb128, readUleb128 } from "./leb128";

export type TypeAddrPair = {
  typeIdx: number;
  addr: number;
};

export type EncodedCatchHandler = {
  /** Byte offset from the start of the encoded_catch_handler_list. */
  offset: number;
  handlers: TypeAddrPair[];
  catchAllAddr?: number;
};

export type EncodedCatchHandlerList = {
  offset: number;
  handlers: EncodedCatchHandler[];
};

export type TryItem = {
  startAddr: number;
  insnCount: number;
  handlerOff: number;
  handler: EncodedCatchHandler;
};

export type CodeItem = {
  offset: number;
  registersSize: number;
  insSize: number;
  outsSize: number;
  triesSize: number;
  debugInfoOff?: number;
  insnsSize: number;
  /** Absolute offset of the first instruction word. */
  insnsOff: number;
  insns: Uint16Array;
  tries: TryItem[];
  /** Only present when the method has try blocks. */
  catchHandlers?: EncodedCatchHandlerList;
  byteLength: number;
};

const CODE_ITEM_HEADER_SIZE = 16;
const TRY_ITEM_SIZE = 8;

function malformed(off: number, message: string, cause?: unknown): DexError {
  return new DexError("MalformedCodeItem", `code_item at 0x${off.toString(16)}: ${message}`, { offset: off, cause });
}

export function parseCodeItem(r: ByteReader, off: number): CodeItem {
  r.checkRange(off, CODE_ITEM_HEADER_SIZE);

  const registersSize = r.u2(off);
  const insSize = r.u2(off + 2);
  const outsSize = r.u2(off + 4);
  const triesSize = r.u2(off + 6);
  const debugInfoOff = r.u4(off + 8);
  const insnsSize = r.u4(off + 12);

  if (insSize > registersSize) {
    throw malformed(off, `ins_size ${insSize} exceeds registers_size ${registersSize}`);
  }

  const insnsOff = off + CODE_ITEM_HEADER_SIZE;
  r.checkRange(insnsOff, insnsSize * 2);
  const insns = new Uint16Array(insnsSize);
  for (let i = 0; i < insnsSize; i++) {
    insns[i] = r.u2(insnsOff + i * 2);
  }

  let cur = insnsOff + insnsSize * 2;
  const tries: TryItem[] = [];
  let catchHandlers: EncodedCatchHandlerList | undefined;

  if (triesSize > 0) {
    // tries are 4-byte aligned
    if (insnsSize % 2 !== 0) {
      cur += 2;
    }
    r.checkRange(cur, triesSize * TRY_ITEM_SIZE);
    const raw: Omit<TryItem, "handler">[] = [];
    for (let i = 0; i < triesSize; i++) {
      const at = cur + i * TRY_ITEM_SIZE;
      raw.push({ startAddr: r.u4(at), insnCount: r.u2(at + 4), handlerOff: r.u2(at + 6) });
    }
    cur += triesSize * TRY_ITEM_SIZE;

    const parsed = parseCatchHandlerList(r, cur);
    catchHandlers = parsed.list;
    cur = parsed.end;

    for (const t of raw) {
      if (t.startAddr + t.insnCount > insnsSize) {
        throw malformed(off, `try block [${t.startAddr}, +${t.insnCount}) runs past ${insnsSize} code units`);
      }
      const handler = catchHandlers.handlers.find((h) => h.offset === t.handlerOff);
      if (handler === undefined) {
        throw malformed(off, `no catch handler at relative offset ${t.handlerOff}`);
      }
      tries.push({ ...t, handler });
    }
  }

  return {
    offset: off,
    registersSize,
    insSize,
    outsSize,
    triesSize,
    debugInfoOff: debugInfoOff === 0 ? undefined : debugInfoOff,
    insnsSize,
    insnsOff,
    insns,
    tries,
    catchHandlers,
    byteLength: cur - off,
  };
}

/**
 * encoded_catch_handler_list. A handler's SLEB128 size is the number of
 * typed catches; when it is not positive the negated value is used and a
 * catch-all address follows the pairs.
 */
export function parseCatchHandlerList(r: ByteReader, base: number): { list: EncodedCatchHandlerList; end: number } {
  const bytes = r.bytes;
  let cur = base;

  const size = readUleb128(bytes, cur);
  cur = size.nextOffset;
  // each handler takes at least one byte
  if (size.value > r.length - cur) {
    throw malformed(base, `catch handler list declares ${size.value} handlers past the end of the file`);
  }

  const handlers: EncodedCatchHandler[] = [];
  for (let i = 0; i < size.value; i++) {
    const offset = cur - base;
    const typed = readSleb128(bytes, cur);
    cur = typed.nextOffset;

    const hasCatchAll = typed.value <= 0;
    const count = Math.abs(typed.value);
    // each pair takes at least two bytes
    if (count > (r.length - cur) / 2) {
      throw malformed(base, `catch handler ${i} declares ${count} pairs past the end of the file`);
    }

    const pairs: TypeAddrPair[] = [];
    for (let j = 0; j < count; j++) {
      const typeIdx = readUleb128(bytes, cur);
      const addr = readUleb128(bytes, typeIdx.nextOffset);
      cur = addr.nextOffset;
      pairs.push({ typeIdx: typeIdx.value, addr: addr.value });
    }

    const handler: EncodedCatchHandler = { offset, handlers: pairs };
    if (hasCatchAll) {
      const addr = readUleb128(bytes, cur);
      cur = addr.nextOffset;
      handler.catchAllAddr = addr.value;
    }
    handlers.push(handler);
  }

  return { list: { offset: base, handlers }, end: cur };
}
