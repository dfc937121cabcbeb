import { ByteReader } from "./binary";
import { ClassDataGroup, DexError } from "./errors";
import { readUleb128 } from "./leb128";

export type EncodedField = {
  fieldIdx: number;
  accessFlags: number;
};

export type EncodedMethod = {
  methodIdx: number;
  accessFlags: number;
  /** Absent for abstract and native methods. */
  codeOff?: number;
};

export type ClassData = {
  offset: number;
  staticFields: EncodedField[];
  instanceFields: EncodedField[];
  directMethods: EncodedMethod[];
  virtualMethods: EncodedMethod[];
  /** Bytes consumed from `offset`. */
  byteLength: number;
};

export type ClassDataLimits = {
  maxEntries: number;
  /** field_ids count; resolved field indices must stay below it. */
  fieldCount?: number;
  methodCount?: number;
  /** When set, the item must end exactly this many bytes after its start. */
  expectedLength?: number;
};

const CODE_ITEM_HEADER_SIZE = 16;
const MAX_INDEX = 0xffffffff;

type Cursor = { pos: number };

function malformed(message: string, offset: number, group?: ClassDataGroup, index?: number, cause?: unknown): DexError {
  const where = group === undefined ? "" : index === undefined ? ` (${group})` : ` (${group}[${index}])`;
  return new DexError("MalformedClassData", `class_data_item at 0x${offset.toString(16)}${where}: ${message}`, {
    offset,
    group,
    index,
    cause,
  });
}

/** Reads `n` consecutive ULEB128 values, attributing any failure to the entry. */
function readValues(
  r: ByteReader,
  cur: Cursor,
  n: number,
  off: number,
  group: ClassDataGroup,
  index?: number
): number[] {
  const values: number[] = [];
  try {
    for (let k = 0; k < n; k++) {
      const res = readUleb128(r.bytes, cur.pos);
      cur.pos = res.nextOffset;
      values.push(res.value);
    }
  } catch (err) {
    const what = index === undefined ? "unreadable member count" : "truncated or malformed entry";
    throw malformed(what, off, group, index, err);
  }
  return values;
}

/**
 * Decodes a class_data_item. Member indices are diff-encoded per group: the
 * running index restarts at 0 for each of the four lists.
 */
export function parseClassData(r: ByteReader, off: number, limits: ClassDataLimits): ClassData {
  if (!r.contains(off, 4)) {
    throw malformed("offset is outside the file", off);
  }

  const cur: Cursor = { pos: off };
  const groups: ClassDataGroup[] = ["staticFields", "instanceFields", "directMethods", "virtualMethods"];
  const counts: number[] = [];
  for (const group of groups) {
    const [count] = readValues(r, cur, 1, off, group);
    if (count > limits.maxEntries) {
      throw malformed(`member count ${count} exceeds limit ${limits.maxEntries}`, off, group);
    }
    counts.push(count);
  }

  const [sfCount, ifCount, dmCount, vmCount] = counts;
  // smallest possible encodings: 2 bytes per field, 3 per method
  const minBytes = (sfCount + ifCount) * 2 + (dmCount + vmCount) * 3;
  if (minBytes > r.length - cur.pos) {
    throw malformed(`member counts need at least ${minBytes} bytes but only ${r.length - cur.pos} remain`, off);
  }

  const staticFields = decodeFields(r, cur, off, "staticFields", sfCount, limits.fieldCount);
  const instanceFields = decodeFields(r, cur, off, "instanceFields", ifCount, limits.fieldCount);
  const directMethods = decodeMethods(r, cur, off, "directMethods", dmCount, limits.methodCount);
  const virtualMethods = decodeMethods(r, cur, off, "virtualMethods", vmCount, limits.methodCount);

  const byteLength = cur.pos - off;
  if (limits.expectedLength !== undefined && byteLength !== limits.expectedLength) {
    throw malformed(`decoded ${byteLength} bytes but the item spans ${limits.expectedLength}`, off);
  }

  return { offset: off, staticFields, instanceFields, directMethods, virtualMethods, byteLength };
}

function advanceIndex(
  prev: number,
  delta: number,
  i: number,
  off: number,
  group: ClassDataGroup,
  poolCount: number | undefined
): number {
  if (i > 0 && delta === 0) {
    throw malformed(`index delta 0 repeats index ${prev}`, off, group, i);
  }
  const next = prev + delta;
  if (next > MAX_INDEX) {
    throw malformed(`index ${next} overflows 32 bits`, off, group, i);
  }
  if (poolCount !== undefined && next >= poolCount) {
    throw malformed(`index ${next} is beyond the ${poolCount}-entry id table`, off, group, i);
  }
  return next;
}

function decodeFields(
  r: ByteReader,
  cur: Cursor,
  off: number,
  group: ClassDataGroup,
  count: number,
  poolCount: number | undefined
): EncodedField[] {
  const out: EncodedField[] = [];
  let fieldIdx = 0;
  for (let i = 0; i < count; i++) {
    const [delta, accessFlags] = readValues(r, cur, 2, off, group, i);
    fieldIdx = advanceIndex(fieldIdx, delta, i, off, group, poolCount);
    out.push({ fieldIdx, accessFlags });
  }
  return out;
}

function decodeMethods(
  r: ByteReader,
  cur: Cursor,
  off: number,
  group: ClassDataGroup,
  count: number,
  poolCount: number | undefined
): EncodedMethod[] {
  const out: EncodedMethod[] = [];
  let methodIdx = 0;
  for (let i = 0; i < count; i++) {
    const [delta, accessFlags, codeOff] = readValues(r, cur, 3, off, group, i);
    methodIdx = advanceIndex(methodIdx, delta, i, off, group, poolCount);

    if (codeOff === 0) {
      out.push({ methodIdx, accessFlags });
      continue;
    }
    if (!r.contains(codeOff, CODE_ITEM_HEADER_SIZE)) {
      throw malformed(`code_off 0x${codeOff.toString(16)} is outside the file`, off, group, i);
    }
    out.push({ methodIdx, accessFlags, codeOff });
  }
  return out;
}
