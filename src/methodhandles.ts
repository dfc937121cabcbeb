import { ByteReader } from "./binary";
import { IdPool } from "./pools";

export enum MethodHandleType {
  StaticPut = 0x00,
  StaticGet = 0x01,
  InstancePut = 0x02,
  InstanceGet = 0x03,
  InvokeStatic = 0x04,
  InvokeInstance = 0x05,
  InvokeConstructor = 0x06,
  InvokeDirect = 0x07,
  InvokeInterface = 0x08,
}

export type MethodHandleItem = {
  /** Raw method_handle_type; see {@link MethodHandleType}. */
  type: number;
  /** field_ids index for the accessor kinds, method_ids index otherwise. */
  fieldOrMethodIdx: number;
};

export function isFieldAccessor(type: number): boolean {
  return type <= MethodHandleType.InstanceGet;
}

export class MethodHandlePool extends IdPool<MethodHandleItem> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "method_handles", count, offset, 8);
  }

  protected decodeAt(off: number): MethodHandleItem {
    return { type: this.reader.u2(off), fieldOrMethodIdx: this.reader.u2(off + 4) };
  }
}

/** call_site_ids: each entry is the offset of an encoded_array_item. */
export class CallSitePool extends IdPool<number> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "call_site_ids", count, offset, 4);
  }

  protected decodeAt(off: number): number {
    return this.reader.u4(off);
  }
}
