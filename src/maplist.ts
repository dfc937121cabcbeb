import { ByteReader } from "./binary";
import { DexError } from "./errors";
import {
  CLASS_DEF_SIZE,
  DexHeader,
  FIELD_ID_SIZE,
  HEADER_SIZE,
  METHOD_ID_SIZE,
  PROTO_ID_SIZE,
  STRING_ID_SIZE,
  TYPE_ID_SIZE,
} from "./header";

export enum MapItemType {
  Header = 0x0000,
  StringIdItem = 0x0001,
  TypeIdItem = 0x0002,
  ProtoIdItem = 0x0003,
  FieldIdItem = 0x0004,
  MethodIdItem = 0x0005,
  ClassDefItem = 0x0006,
  CallSiteIdItem = 0x0007,
  MethodHandleItem = 0x0008,
  MapList = 0x1000,
  TypeList = 0x1001,
  AnnotationSetRefList = 0x1002,
  AnnotationSetItem = 0x1003,
  ClassDataItem = 0x2000,
  CodeItem = 0x2001,
  StringDataItem = 0x2002,
  DebugInfoItem = 0x2003,
  AnnotationItem = 0x2004,
  EncodedArrayItem = 0x2005,
  AnnotationsDirectoryItem = 0x2006,
  HiddenapiClassDataItem = 0xf000,
}

export type MapItem = {
  /** Raw type code; may be a value outside {@link MapItemType}. */
  type: number;
  typeName: string;
  size: number;
  offset: number;
};

export type MapList = {
  offset: number;
  items: MapItem[];
};

export type MapValidation = {
  warnings: string[];
};

const MAP_ITEM_SIZE = 12;

const FIXED_STRIDES = new Map<number, number>([
  [MapItemType.Header, HEADER_SIZE],
  [MapItemType.StringIdItem, STRING_ID_SIZE],
  [MapItemType.TypeIdItem, TYPE_ID_SIZE],
  [MapItemType.ProtoIdItem, PROTO_ID_SIZE],
  [MapItemType.FieldIdItem, FIELD_ID_SIZE],
  [MapItemType.MethodIdItem, METHOD_ID_SIZE],
  [MapItemType.ClassDefItem, CLASS_DEF_SIZE],
  [MapItemType.CallSiteIdItem, 4],
  [MapItemType.MethodHandleItem, 8],
]);

export function mapItemTypeName(type: number): string {
  const name: string | undefined = MapItemType[type];
  return name ?? `unknown(0x${type.toString(16)})`;
}

function isKnownType(type: number): boolean {
  return MapItemType[type] !== undefined;
}

export function parseMapList(r: ByteReader, off: number): MapList {
  const size = r.u4(off);
  r.checkRange(off + 4, size * MAP_ITEM_SIZE);

  const items: MapItem[] = [];
  for (let i = 0; i < size; i++) {
    const at = off + 4 + i * MAP_ITEM_SIZE;
    const type = r.u2(at);
    items.push({ type, typeName: mapItemTypeName(type), size: r.u4(at + 4), offset: r.u4(at + 8) });
  }
  return { offset: off, items };
}

export function findMapItem(map: MapList, type: MapItemType): MapItem | undefined {
  return map.items.find((item) => item.type === type);
}

type Region = { item: MapItem; start: number; end: number };

function computeRegions(map: MapList, fileLength: number): Region[] {
  const sorted = map.items.filter((item) => item.size > 0).sort((a, b) => a.offset - b.offset);
  return sorted.map((item, i) => {
    const stride = FIXED_STRIDES.get(item.type);
    let end: number;
    if (stride !== undefined) {
      end = item.offset + item.size * stride;
    } else if (item.type === MapItemType.MapList) {
      end = item.offset + 4 + map.items.length * MAP_ITEM_SIZE;
    } else {
      // variable-sized items run up to the next section that starts after them
      const next = sorted.slice(i + 1).find((other) => other.offset > item.offset);
      end = next === undefined ? fileLength : next.offset;
    }
    return { item, start: item.offset, end };
  });
}

function describe(region: Region): string {
  return `${region.item.typeName} [${region.start}, ${region.end})`;
}

/**
 * Cross-checks the map list against the header and itself. Overlaps,
 * duplicated types and header tables missing from the map are fatal;
 * anything merely unexpected is returned as a warning.
 */
export function validateMapList(header: DexHeader, map: MapList, fileLength: number): MapValidation {
  const warnings: string[] = [];

  const seen = new Set<number>();
  for (const item of map.items) {
    if (seen.has(item.type)) {
      throw new DexError("OverlappingSection", `map_list declares ${item.typeName} more than once`, {
        offset: map.offset,
      });
    }
    seen.add(item.type);
    if (!isKnownType(item.type)) {
      warnings.push(`map_list contains ${item.typeName} at 0x${item.offset.toString(16)}`);
    }
  }

  const regions = computeRegions(map, fileLength);
  for (let i = 0; i < regions.length; i++) {
    const cur = regions[i];
    if (cur.end > fileLength) {
      throw new DexError("OutOfBounds", `map_list section ${describe(cur)} runs past end of file`, {
        offset: cur.start,
      });
    }
    if (i === 0) continue;
    const prev = regions[i - 1];
    if (prev.start === cur.start || prev.end > cur.start) {
      throw new DexError("OverlappingSection", `sections overlap: ${describe(prev)} and ${describe(cur)}`, {
        offset: cur.start,
      });
    }
  }

  const expected: [MapItemType, number, number][] = [
    [MapItemType.StringIdItem, header.stringIdsSize, header.stringIdsOff],
    [MapItemType.TypeIdItem, header.typeIdsSize, header.typeIdsOff],
    [MapItemType.ProtoIdItem, header.protoIdsSize, header.protoIdsOff],
    [MapItemType.FieldIdItem, header.fieldIdsSize, header.fieldIdsOff],
    [MapItemType.MethodIdItem, header.methodIdsSize, header.methodIdsOff],
    [MapItemType.ClassDefItem, header.classDefsSize, header.classDefsOff],
  ];
  for (const [type, size, offset] of expected) {
    const item = findMapItem(map, type);
    if (size === 0) {
      if (item !== undefined && item.size > 0) {
        warnings.push(`map_list declares ${item.typeName} but the header does not reference it`);
      }
      continue;
    }
    if (item === undefined) {
      throw new DexError("MissingSection", `header references ${mapItemTypeName(type)} but map_list omits it`);
    }
    if (item.size !== size || item.offset !== offset) {
      throw new DexError(
        "MissingSection",
        `map_list ${item.typeName} (${item.size} @ 0x${item.offset.toString(16)}) disagrees with header (${size} @ 0x${offset.toString(16)})`,
        { offset: item.offset }
      );
    }
  }

  const headerItem = findMapItem(map, MapItemType.Header);
  if (headerItem === undefined || headerItem.offset !== 0) {
    throw new DexError("MissingSection", "map_list does not place the header at offset 0");
  }
  const self = findMapItem(map, MapItemType.MapList);
  if (self === undefined || self.offset !== map.offset) {
    throw new DexError("MissingSection", "map_list does not list itself", { offset: map.offset });
  }

  if (header.dataSize > 0) {
    const dataEnd = header.dataOff + header.dataSize;
    for (const region of regions) {
      if (region.item.type < MapItemType.MapList) continue;
      if (region.start < header.dataOff || region.end > dataEnd) {
        warnings.push(`${describe(region)} lies outside the data section`);
      }
    }
  }

  return { warnings };
}
