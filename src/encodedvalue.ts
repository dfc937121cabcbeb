import { ByteReader } from "./binary";
import { DexError } from "./errors";
import { readUleb128 } from "./leb128";

export enum ValueType {
  Byte = 0x00,
  Short = 0x02,
  Char = 0x03,
  Int = 0x04,
  Long = 0x06,
  Float = 0x10,
  Double = 0x11,
  MethodType = 0x15,
  MethodHandle = 0x16,
  String = 0x17,
  Type = 0x18,
  Field = 0x19,
  Method = 0x1a,
  Enum = 0x1b,
  Array = 0x1c,
  Annotation = 0x1d,
  Null = 0x1e,
  Boolean = 0x1f,
}

export type AnnotationElement = {
  nameIdx: number;
  value: EncodedValue;
};

export type EncodedAnnotation = {
  typeIdx: number;
  elements: AnnotationElement[];
};

export type IndexValueType =
  | ValueType.MethodType
  | ValueType.MethodHandle
  | ValueType.String
  | ValueType.Type
  | ValueType.Field
  | ValueType.Method
  | ValueType.Enum;

/** Index-valued kinds carry the raw table index; callers resolve it. */
export type EncodedValue =
  | { type: ValueType.Byte | ValueType.Short | ValueType.Char | ValueType.Int; value: number }
  | { type: ValueType.Long; value: bigint }
  | { type: ValueType.Float | ValueType.Double; value: number }
  | { type: IndexValueType; index: number }
  | { type: ValueType.Array; values: EncodedValue[] }
  | { type: ValueType.Annotation; annotation: EncodedAnnotation }
  | { type: ValueType.Null }
  | { type: ValueType.Boolean; value: boolean };

export type Decoded<T> = { value: T; nextOffset: number };

const MAX_NESTING = 64;

const INDEX_KINDS = new Map<number, IndexValueType>([
  [ValueType.MethodType, ValueType.MethodType],
  [ValueType.MethodHandle, ValueType.MethodHandle],
  [ValueType.String, ValueType.String],
  [ValueType.Type, ValueType.Type],
  [ValueType.Field, ValueType.Field],
  [ValueType.Method, ValueType.Method],
  [ValueType.Enum, ValueType.Enum],
]);

function malformed(off: number, message: string): DexError {
  return new DexError("MalformedEncodedValue", `encoded_value at 0x${off.toString(16)}: ${message}`, { offset: off });
}

function checkArg(off: number, type: number, arg: number, max: number): void {
  if (arg > max) {
    throw malformed(off, `value_arg ${arg} is too large for ${ValueType[type]}`);
  }
}

function readSigned(r: ByteReader, off: number, size: number): number {
  let value = 0;
  for (let i = 0; i < size; i++) {
    value += r.u1(off + i) * 2 ** (8 * i);
  }
  const bits = 8 * size;
  if (value >= 2 ** (bits - 1)) {
    value -= 2 ** bits;
  }
  return value;
}

function readUnsigned(r: ByteReader, off: number, size: number): number {
  let value = 0;
  for (let i = 0; i < size; i++) {
    value += r.u1(off + i) * 2 ** (8 * i);
  }
  return value;
}

function readLong(r: ByteReader, off: number, size: number): bigint {
  let value = 0n;
  for (let i = 0; i < size; i++) {
    value |= BigInt(r.u1(off + i)) << BigInt(8 * i);
  }
  return BigInt.asIntN(8 * size, value);
}

/** Floating point values are right-zero-extended: the stored bytes are the high-order ones. */
function readFloating(r: ByteReader, off: number, size: number, width: 4 | 8): number {
  const buf = new Uint8Array(width);
  buf.set(r.slice(off, size), width - size);
  const view = new DataView(buf.buffer);
  return width === 4 ? view.getFloat32(0, true) : view.getFloat64(0, true);
}

export function readEncodedValue(r: ByteReader, off: number, depth = 0): Decoded<EncodedValue> {
  if (depth > MAX_NESTING) {
    throw malformed(off, `nesting deeper than ${MAX_NESTING}`);
  }

  const header = r.u1(off);
  const arg = header >> 5;
  const type = header & 0x1f;
  const body = off + 1;
  const size = arg + 1;
  const next = body + size;

  const indexKind = INDEX_KINDS.get(type);
  if (indexKind !== undefined) {
    checkArg(off, type, arg, 3);
    return { value: { type: indexKind, index: readUnsigned(r, body, size) }, nextOffset: next };
  }

  switch (type) {
    case ValueType.Byte:
      checkArg(off, type, arg, 0);
      return { value: { type: ValueType.Byte, value: r.s1(body) }, nextOffset: next };
    case ValueType.Short:
      checkArg(off, type, arg, 1);
      return { value: { type: ValueType.Short, value: readSigned(r, body, size) }, nextOffset: next };
    case ValueType.Char:
      checkArg(off, type, arg, 1);
      return { value: { type: ValueType.Char, value: readUnsigned(r, body, size) }, nextOffset: next };
    case ValueType.Int:
      checkArg(off, type, arg, 3);
      return { value: { type: ValueType.Int, value: readSigned(r, body, size) }, nextOffset: next };
    case ValueType.Long:
      checkArg(off, type, arg, 7);
      return { value: { type: ValueType.Long, value: readLong(r, body, size) }, nextOffset: next };
    case ValueType.Float:
      checkArg(off, type, arg, 3);
      return { value: { type: ValueType.Float, value: readFloating(r, body, size, 4) }, nextOffset: next };
    case ValueType.Double:
      checkArg(off, type, arg, 7);
      return { value: { type: ValueType.Double, value: readFloating(r, body, size, 8) }, nextOffset: next };
    case ValueType.Array: {
      checkArg(off, type, arg, 0);
      const arr = readEncodedArray(r, body, depth + 1);
      return { value: { type: ValueType.Array, values: arr.value }, nextOffset: arr.nextOffset };
    }
    case ValueType.Annotation: {
      checkArg(off, type, arg, 0);
      const ann = readEncodedAnnotation(r, body, depth + 1);
      return { value: { type: ValueType.Annotation, annotation: ann.value }, nextOffset: ann.nextOffset };
    }
    case ValueType.Null:
      checkArg(off, type, arg, 0);
      return { value: { type: ValueType.Null }, nextOffset: body };
    case ValueType.Boolean:
      checkArg(off, type, arg, 1);
      return { value: { type: ValueType.Boolean, value: arg === 1 }, nextOffset: body };
    default:
      throw malformed(off, `unknown value type 0x${type.toString(16)}`);
  }
}

export function readEncodedArray(r: ByteReader, off: number, depth = 0): Decoded<EncodedValue[]> {
  const size = readUleb128(r.bytes, off);
  let cur = size.nextOffset;
  // each value takes at least its header byte
  if (size.value > r.length - cur) {
    throw malformed(off, `encoded_array declares ${size.value} values past the end of the file`);
  }

  const values: EncodedValue[] = [];
  for (let i = 0; i < size.value; i++) {
    const v = readEncodedValue(r, cur, depth);
    values.push(v.value);
    cur = v.nextOffset;
  }
  return { value: values, nextOffset: cur };
}

export function readEncodedAnnotation(r: ByteReader, off: number, depth = 0): Decoded<EncodedAnnotation> {
  const typeIdx = readUleb128(r.bytes, off);
  const size = readUleb128(r.bytes, typeIdx.nextOffset);
  let cur = size.nextOffset;
  // name index plus value header
  if (size.value > (r.length - cur) / 2) {
    throw malformed(off, `encoded_annotation declares ${size.value} elements past the end of the file`);
  }

  const elements: AnnotationElement[] = [];
  for (let i = 0; i < size.value; i++) {
    const name = readUleb128(r.bytes, cur);
    const v = readEncodedValue(r, name.nextOffset, depth);
    elements.push({ nameIdx: name.value, value: v.value });
    cur = v.nextOffset;
  }
  return { value: { typeIdx: typeIdx.value, elements }, nextOffset: cur };
}
