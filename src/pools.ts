import { ByteReader } from "./binary";
import { DexError } from "./errors";
import { FIELD_ID_SIZE, METHOD_ID_SIZE, PROTO_ID_SIZE, STRING_ID_SIZE, TYPE_ID_SIZE } from "./header";
import { readUleb128 } from "./leb128";
import { decodeMutf8 } from "./mutf8";

export type ProtoId = {
  shortyIdx: number;
  returnTypeIdx: number;
  /** 0 when the prototype takes no parameters. */
  parametersOff: number;
};

export type FieldId = {
  classIdx: number;
  typeIdx: number;
  nameIdx: number;
};

export type MethodId = {
  classIdx: number;
  protoIdx: number;
  nameIdx: number;
};

/**
 * Fixed-stride table addressed by index. Entries are decoded on every call;
 * the pool keeps only its base offset and count.
 */
export abstract class IdPool<T> implements Iterable<T> {
  constructor(
    protected readonly reader: ByteReader,
    public readonly name: string,
    public readonly count: number,
    public readonly offset: number,
    public readonly stride: number
  ) {}

  protected abstract decodeAt(off: number, index: number): T;

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.count;
  }

  entryOffset(index: number): number {
    if (!this.has(index)) {
      throw new DexError("InvalidIndex", `${this.name} index out of range: ${index} (count ${this.count})`);
    }
    return this.offset + index * this.stride;
  }

  get(index: number): T {
    return this.decodeAt(this.entryOffset(index), index);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      yield this.get(i);
    }
  }

  toArray(): T[] {
    return Array.from(this);
  }
}

export class StringPool extends IdPool<string> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "string_ids", count, offset, STRING_ID_SIZE);
  }

  dataOffset(index: number): number {
    const dataOff = this.reader.u4(this.entryOffset(index));
    if (!this.reader.contains(dataOff, 1)) {
      throw new DexError("OutOfBounds", `string_data_off 0x${dataOff.toString(16)} of string ${index} is outside the file`, {
        offset: dataOff,
      });
    }
    return dataOff;
  }

  /** UTF-16 length stored in front of the string data. */
  declaredLength(index: number): number {
    return readUleb128(this.reader.bytes, this.dataOffset(index)).value;
  }

  protected decodeAt(_off: number, index: number): string {
    const head = readUleb128(this.reader.bytes, this.dataOffset(index));
    return decodeMutf8(this.reader.bytes, head.nextOffset, head.value).value;
  }

  /**
   * Binary search over the pool, which the format keeps sorted by UTF-16
   * code unit order. Returns -1 when absent.
   */
  indexOf(text: string): number {
    let lo = 0;
    let hi = this.count - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const s = this.get(mid);
      if (s === text) return mid;
      if (s < text) {
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return -1;
  }
}

export class TypePool extends IdPool<number> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "type_ids", count, offset, TYPE_ID_SIZE);
  }

  /** Resolves to the descriptor's string index. */
  protected decodeAt(off: number): number {
    return this.reader.u4(off);
  }
}

export class ProtoPool extends IdPool<ProtoId> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "proto_ids", count, offset, PROTO_ID_SIZE);
  }

  protected decodeAt(off: number): ProtoId {
    return {
      shortyIdx: this.reader.u4(off),
      returnTypeIdx: this.reader.u4(off + 4),
      parametersOff: this.reader.u4(off + 8),
    };
  }
}

export class FieldPool extends IdPool<FieldId> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "field_ids", count, offset, FIELD_ID_SIZE);
  }

  protected decodeAt(off: number): FieldId {
    return {
      classIdx: this.reader.u2(off),
      typeIdx: this.reader.u2(off + 2),
      nameIdx: this.reader.u4(off + 4),
    };
  }
}

export class MethodPool extends IdPool<MethodId> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "method_ids", count, offset, METHOD_ID_SIZE);
  }

  protected decodeAt(off: number): MethodId {
    return {
      classIdx: this.reader.u2(off),
      protoIdx: this.reader.u2(off + 2),
      nameIdx: this.reader.u4(off + 4),
    };
  }
}
