import { ByteReader } from "./binary";
import { CLASS_DEF_SIZE, NO_INDEX } from "./header";
import { IdPool } from "./pools";

export type DexClassDef = {
  /** Position in the class_defs table. */
  index: number;
  classIdx: number;
  accessFlags: number;
  /** Absent only for java.lang.Object. */
  superclassIdx?: number;
  interfacesOff: number;
  sourceFileIdx?: number;
  annotationsOff: number;
  classDataOff: number;
  staticValuesOff: number;
};

function optionalIndex(value: number): number | undefined {
  return value === NO_INDEX ? undefined : value;
}

export class ClassDefPool extends IdPool<DexClassDef> {
  constructor(reader: ByteReader, count: number, offset: number) {
    super(reader, "class_defs", count, offset, CLASS_DEF_SIZE);
  }

  protected decodeAt(off: number, index: number): DexClassDef {
    const r = this.reader;
    return {
      index,
      classIdx: r.u4(off),
      accessFlags: r.u4(off + 4),
      superclassIdx: optionalIndex(r.u4(off + 8)),
      interfacesOff: r.u4(off + 12),
      sourceFileIdx: optionalIndex(r.u4(off + 16)),
      annotationsOff: r.u4(off + 20),
      classDataOff: r.u4(off + 24),
      staticValuesOff: r.u4(off + 28),
    };
  }
}
