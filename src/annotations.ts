import { ByteReader } from "./binary";
import { DexError } from "./errors";
import { EncodedAnnotation, readEncodedAnnotation } from "./encodedvalue";

export enum Visibility {
  Build = 0x00,
  Runtime = 0x01,
  System = 0x02,
}

export type AnnotationItem = {
  visibility: Visibility;
  annotation: EncodedAnnotation;
};

export type MemberAnnotations = {
  /** field_idx for field annotations, method_idx otherwise. */
  memberIdx: number;
  annotationsOff: number;
};

export type AnnotationsDirectory = {
  classAnnotationsOff: number;
  fieldAnnotations: MemberAnnotations[];
  methodAnnotations: MemberAnnotations[];
  parameterAnnotations: MemberAnnotations[];
};

function readMemberList(r: ByteReader, off: number, count: number): MemberAnnotations[] {
  r.checkRange(off, count * 8);
  const out: MemberAnnotations[] = [];
  for (let i = 0; i < count; i++) {
    out.push({ memberIdx: r.u4(off + i * 8), annotationsOff: r.u4(off + i * 8 + 4) });
  }
  return out;
}

export function readAnnotationsDirectory(r: ByteReader, off: number): AnnotationsDirectory {
  const classAnnotationsOff = r.u4(off);
  const fieldsSize = r.u4(off + 4);
  const methodsSize = r.u4(off + 8);
  const parametersSize = r.u4(off + 12);

  let cur = off + 16;
  const fieldAnnotations = readMemberList(r, cur, fieldsSize);
  cur += fieldsSize * 8;
  const methodAnnotations = readMemberList(r, cur, methodsSize);
  cur += methodsSize * 8;
  const parameterAnnotations = readMemberList(r, cur, parametersSize);

  return { classAnnotationsOff, fieldAnnotations, methodAnnotations, parameterAnnotations };
}

export function readAnnotationItem(r: ByteReader, off: number): AnnotationItem {
  const visibility = r.u1(off);
  if (Visibility[visibility] === undefined) {
    throw new DexError("MalformedEncodedValue", `annotation_item at 0x${off.toString(16)} has visibility ${visibility}`, {
      offset: off,
    });
  }
  return { visibility, annotation: readEncodedAnnotation(r, off + 1).value };
}

/** annotation_set_item: offsets of annotation items. Offset 0 yields an empty set. */
export function readAnnotationSet(r: ByteReader, off: number): AnnotationItem[] {
  if (off === 0) return [];
  const size = r.u4(off);
  r.checkRange(off + 4, size * 4);
  const out: AnnotationItem[] = [];
  for (let i = 0; i < size; i++) {
    out.push(readAnnotationItem(r, r.u4(off + 4 + i * 4)));
  }
  return out;
}

/** annotation_set_ref_list: one annotation set per parameter. */
export function readAnnotationSetRefList(r: ByteReader, off: number): AnnotationItem[][] {
  const size = r.u4(off);
  r.checkRange(off + 4, size * 4);
  const out: AnnotationItem[][] = [];
  for (let i = 0; i < size; i++) {
    out.push(readAnnotationSet(r, r.u4(off + 4 + i * 4)));
  }
  return out;
}
