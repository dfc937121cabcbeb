import { AnnotationItem, AnnotationsDirectory, readAnnotationSet, readAnnotationSetRefList, readAnnotationsDirectory } from "./annotations";
import { ByteReader } from "./binary";
import { ClassData, EncodedMethod, parseClassData } from "./classdata";
import { ClassDefPool, DexClassDef } from "./classdef";
import { CodeItem, parseCodeItem } from "./code";
import { DexFileOptions, ResolvedDexFileOptions, resolveOptions } from "./config";
import { DebugInfo, parseDebugInfo, positionTable } from "./debuginfo";
import { EncodedValue, readEncodedArray } from "./encodedvalue";
import { DexError, DexResult, attempt } from "./errors";
import { DexHeader, parseHeader } from "./header";
import { Instruction, decodeInstructions } from "./instructions";
import { MapItem, MapItemType, MapList, MapValidation, findMapItem, parseMapList, validateMapList } from "./maplist";
import { CallSitePool, MethodHandleItem, MethodHandlePool } from "./methodhandles";
import { FieldId, FieldPool, MethodId, MethodPool, ProtoId, ProtoPool, StringPool, TypePool } from "./pools";
import { readTypeList } from "./typelist";
import { DexUtils } from "./utils";

/** A class definition with its names resolved and its body decoded. */
export type DexClass = {
  def: DexClassDef;
  descriptor: string;
  superclass?: string;
  interfaces: string[];
  sourceFile?: string;
  /** Undefined for marker classes and interfaces without members. */
  classData?: ClassData;
};

type ClassDataSpan = {
  /** Bytes up to the next class_data_item, or to the next section for the last one. */
  span: number;
  /** Trailing alignment the last item may leave before the next section. */
  padding: number;
};

const MAX_SECTION_PADDING = 3;

export class DexFile {
  public readonly reader: ByteReader;
  public readonly header: DexHeader;
  public readonly options: ResolvedDexFileOptions;
  /** The map list, present only when it was parsed and passed validation. */
  public readonly mapList?: MapList;
  /** Outcome of map list validation; undefined when the map was not read. */
  public readonly mapValidation?: DexResult<MapValidation>;
  public readonly mapWarnings: string[] = [];

  public readonly strings: StringPool;
  public readonly types: TypePool;
  public readonly protos: ProtoPool;
  public readonly fields: FieldPool;
  public readonly methods: MethodPool;
  public readonly classDefs: ClassDefPool;
  public readonly methodHandles: MethodHandlePool;
  public readonly callSites: CallSitePool;

  private classDataSpans?: Map<number, ClassDataSpan>;
  private classDefsByType?: Map<number, number>;

  constructor(bytes: Uint8Array, options?: DexFileOptions) {
    this.options = resolveOptions(options);
    this.reader = new ByteReader(bytes);
    this.header = parseHeader(this.reader, this.options);

    const h = this.header;
    const r = this.reader;
    this.strings = new StringPool(r, h.stringIdsSize, h.stringIdsOff);
    this.types = new TypePool(r, h.typeIdsSize, h.typeIdsOff);
    this.protos = new ProtoPool(r, h.protoIdsSize, h.protoIdsOff);
    this.fields = new FieldPool(r, h.fieldIdsSize, h.fieldIdsOff);
    this.methods = new MethodPool(r, h.methodIdsSize, h.methodIdsOff);
    this.classDefs = new ClassDefPool(r, h.classDefsSize, h.classDefsOff);

    if (this.options.validateMap && h.mapOff !== 0) {
      const checked = attempt(() => {
        const map = parseMapList(r, h.mapOff);
        return { map, validation: validateMapList(h, map, r.length) };
      });
      if (checked.ok) {
        this.mapList = checked.value.map;
        this.mapValidation = { ok: true, value: checked.value.validation };
        for (const warning of checked.value.validation.warnings) {
          this.mapWarnings.push(warning);
          this.options.logger.warn(warning);
        }
      } else {
        this.mapValidation = checked;
        this.options.logger.warn(`map_list ignored: ${checked.error.message}`);
      }
    }

    const handles = this.getMapItem(MapItemType.MethodHandleItem);
    this.methodHandles = new MethodHandlePool(r, handles?.size ?? 0, handles?.offset ?? 0);
    const callSites = this.getMapItem(MapItemType.CallSiteIdItem);
    this.callSites = new CallSitePool(r, callSites?.size ?? 0, callSites?.offset ?? 0);
    if (handles !== undefined) r.checkRange(handles.offset, handles.size * this.methodHandles.stride);
    if (callSites !== undefined) r.checkRange(callSites.offset, callSites.size * this.callSites.stride);
  }

  static from(bytes: Uint8Array, options?: DexFileOptions): DexFile {
    return new DexFile(bytes, options);
  }

  getMapItem(type: MapItemType): MapItem | undefined {
    return this.mapList === undefined ? undefined : findMapItem(this.mapList, type);
  }

  getString(stringIdx: number): string {
    return this.strings.get(stringIdx);
  }

  tryGetString(stringIdx: number): DexResult<string> {
    return attempt(() => this.strings.get(stringIdx));
  }

  getTypeDescriptor(typeIdx: number): string {
    return this.getString(this.types.get(typeIdx));
  }

  getProtoId(protoIdx: number): ProtoId {
    return this.protos.get(protoIdx);
  }

  getFieldId(fieldIdx: number): FieldId {
    return this.fields.get(fieldIdx);
  }

  getMethodId(methodIdx: number): MethodId {
    return this.methods.get(methodIdx);
  }

  getClassDef(classDefIdx: number): DexClassDef {
    return this.classDefs.get(classDefIdx);
  }

  /** Parameter type indices of a prototype. */
  getProtoParameters(protoIdx: number): number[] {
    return readTypeList(this.reader, this.getProtoId(protoIdx).parametersOff);
  }

  /** `(ILjava/lang/String;)V` */
  getMethodDescriptor(protoIdx: number): string {
    const proto = this.getProtoId(protoIdx);
    const params = this.getProtoParameters(protoIdx).map((t) => this.getTypeDescriptor(t));
    return DexUtils.methodDescriptor(this.getTypeDescriptor(proto.returnTypeIdx), params);
  }

  getInterfaces(def: DexClassDef): number[] {
    return readTypeList(this.reader, def.interfacesOff);
  }

  getClassDescriptor(classDefIdx: number): string {
    return this.getTypeDescriptor(this.getClassDef(classDefIdx).classIdx);
  }

  /** Looks a type up by descriptor. type_ids are sorted by string index, string_ids by content. */
  findTypeIndex(descriptor: string): number {
    const stringIdx = this.strings.indexOf(descriptor);
    if (stringIdx < 0) return -1;

    let lo = 0;
    let hi = this.types.count - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const s = this.types.get(mid);
      if (s === stringIdx) return mid;
      if (s < stringIdx) {
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return -1;
  }

  findClassDef(descriptor: string): DexClassDef | undefined {
    const typeIdx = this.findTypeIndex(descriptor);
    if (typeIdx < 0) return undefined;

    if (this.classDefsByType === undefined) {
      const byType = new Map<number, number>();
      for (let i = 0; i < this.classDefs.count; i++) {
        const classIdx = this.reader.u4(this.classDefs.entryOffset(i));
        if (!byType.has(classIdx)) byType.set(classIdx, i);
      }
      this.classDefsByType = byType;
    }

    const defIdx = this.classDefsByType.get(typeIdx);
    return defIdx === undefined ? undefined : this.getClassDef(defIdx);
  }

  getClassData(def: DexClassDef): ClassData | undefined {
    if (def.classDataOff === 0) return undefined;

    const bounds = this.getClassDataSpans().get(def.classDataOff);
    const limits = {
      maxEntries: this.options.maxClassDataEntries,
      fieldCount: this.fields.count,
      methodCount: this.methods.count,
    };
    if (bounds === undefined || bounds.padding === 0) {
      return parseClassData(this.reader, def.classDataOff, { ...limits, expectedLength: bounds?.span });
    }

    const data = parseClassData(this.reader, def.classDataOff, limits);
    const slack = bounds.span - data.byteLength;
    if (slack < 0 || slack > bounds.padding) {
      throw new DexError(
        "MalformedClassData",
        `class_data_item at 0x${def.classDataOff.toString(16)}: decoded ${data.byteLength} bytes but the item spans ${bounds.span}`,
        { offset: def.classDataOff }
      );
    }
    return data;
  }

  /**
   * Byte spans of every class_data_item, derived from the sorted set of
   * class data offsets. Only available when the map list describes a class
   * data section that these offsets fill exactly.
   */
  private getClassDataSpans(): Map<number, ClassDataSpan> {
    if (this.classDataSpans !== undefined) return this.classDataSpans;

    const spans = new Map<number, ClassDataSpan>();
    this.classDataSpans = spans;

    const section = this.getMapItem(MapItemType.ClassDataItem);
    if (this.mapList === undefined || section === undefined) return spans;

    const offsets = new Set<number>();
    for (let i = 0; i < this.classDefs.count; i++) {
      const off = this.reader.u4(this.classDefs.entryOffset(i) + 24);
      if (off !== 0) offsets.add(off);
    }
    const sorted = [...offsets].sort((a, b) => a - b);
    if (sorted.length !== section.size || sorted[0] !== section.offset) {
      this.options.logger.debug(
        `class data offsets do not fill the class_data_item section (${sorted.length} of ${section.size}); lengths are not enforced`
      );
      return spans;
    }

    const next = this.mapList.items
      .filter((item) => item.size > 0 && item.offset > section.offset)
      .reduce((min, item) => Math.min(min, item.offset), this.reader.length);

    for (let i = 0; i < sorted.length; i++) {
      const last = i === sorted.length - 1;
      const end = last ? next : sorted[i + 1];
      spans.set(sorted[i], { span: end - sorted[i], padding: last ? MAX_SECTION_PADDING : 0 });
    }
    return spans;
  }

  getCodeItem(codeOff: number): CodeItem {
    return parseCodeItem(this.reader, codeOff);
  }

  /** Code of a method from class data, or undefined for abstract and native methods. */
  getMethodCode(method: EncodedMethod): CodeItem | undefined {
    return method.codeOff === undefined ? undefined : this.getCodeItem(method.codeOff);
  }

  getInstructions(code: CodeItem): Instruction[] {
    return Array.from(decodeInstructions(code.insns));
  }

  getDebugInfo(code: CodeItem): DebugInfo | undefined {
    return code.debugInfoOff === undefined ? undefined : parseDebugInfo(this.reader, code.debugInfoOff);
  }

  /** (address, line) pairs emitted by the method's debug program. */
  getPositions(code: CodeItem): { address: number; line: number }[] {
    const info = this.getDebugInfo(code);
    return info === undefined ? [] : positionTable(info);
  }

  getStaticValues(def: DexClassDef): EncodedValue[] {
    if (def.staticValuesOff === 0) return [];
    return readEncodedArray(this.reader, def.staticValuesOff).value;
  }

  getAnnotationsDirectory(def: DexClassDef): AnnotationsDirectory | undefined {
    if (def.annotationsOff === 0) return undefined;
    return readAnnotationsDirectory(this.reader, def.annotationsOff);
  }

  getAnnotationSet(off: number): AnnotationItem[] {
    return readAnnotationSet(this.reader, off);
  }

  getAnnotationSetRefList(off: number): AnnotationItem[][] {
    if (off === 0) return [];
    return readAnnotationSetRefList(this.reader, off);
  }

  getMethodHandle(index: number): MethodHandleItem {
    return this.methodHandles.get(index);
  }

  /** Bootstrap arguments of a call site: method handle, name, method type, then extras. */
  getCallSite(index: number): EncodedValue[] {
    return readEncodedArray(this.reader, this.callSites.get(index)).value;
  }

  getClass(classDefIdx: number): DexClass {
    const def = this.getClassDef(classDefIdx);
    const descriptor = this.getTypeDescriptor(def.classIdx);
    this.options.logger.debug(`decoding class ${descriptor}`);

    const classData = this.getClassData(def);
    if (classData !== undefined) {
      this.options.logger.debug(
        `${descriptor}: ${classData.staticFields.length} static fields, ${classData.instanceFields.length} instance fields, ` +
          `${classData.directMethods.length} direct methods, ${classData.virtualMethods.length} virtual methods`
      );
    }

    return {
      def,
      descriptor,
      superclass: def.superclassIdx === undefined ? undefined : this.getTypeDescriptor(def.superclassIdx),
      interfaces: this.getInterfaces(def).map((t) => this.getTypeDescriptor(t)),
      sourceFile: def.sourceFileIdx === undefined ? undefined : this.getString(def.sourceFileIdx),
      classData,
    };
  }

  tryGetClass(classDefIdx: number): DexResult<DexClass> {
    return attempt(() => this.getClass(classDefIdx));
  }

  /** One result per class def; a malformed class does not stop the walk. */
  *classes(): Generator<DexResult<DexClass>, void, undefined> {
    for (let i = 0; i < this.classDefs.count; i++) {
      yield this.tryGetClass(i);
    }
  }
}
