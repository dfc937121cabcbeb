import { describe, expect, it } from "vitest";
import { DexFile } from "../src/DexFile";
import { ByteReader } from "../src/binary";
import { DexLogger, silentLogger } from "../src/config";
import { DexErrorKind, isDexError } from "../src/errors";
import { DexHeader, parseHeader } from "../src/header";
import { MapItem, MapItemType, mapItemTypeName, parseMapList, validateMapList } from "../src/maplist";
import { blankImage, DexImageBuilder, writeU4 } from "./support/DexImageBuilder";

const FILE_SIZE = 1200;
const MAP_OFF = 1100;

function header(overrides: Partial<DexHeader> = {}): DexHeader {
  return { ...parseHeader(new ByteReader(blankImage(FILE_SIZE))), ...overrides };
}

function item(type: number, size: number, offset: number): MapItem {
  return { type, typeName: mapItemTypeName(type), size, offset };
}

function mapOf(...extra: MapItem[]) {
  return {
    offset: MAP_OFF,
    items: [item(MapItemType.Header, 1, 0), ...extra, item(MapItemType.MapList, 1, MAP_OFF)],
  };
}

function failure(fn: () => unknown): DexErrorKind | undefined {
  try {
    fn();
  } catch (err) {
    if (isDexError(err)) return err.kind;
    throw err;
  }
  return undefined;
}

describe("parseMapList", () => {
  it("reads the items in file order", () => {
    const image = new DexImageBuilder().addString("a", "b").build();
    const map = parseMapList(new ByteReader(image.bytes), image.mapOff);
    expect(map.offset).toBe(image.mapOff);
    expect(map.items.map((i) => i.typeName)).toEqual(["Header", "StringIdItem", "StringDataItem", "MapList"]);
    expect(map.items[1]).toEqual({ type: 0x0001, typeName: "StringIdItem", size: 2, offset: 0x70 });
  });

  it("rejects an item count past the end of the file", () => {
    const bytes = blankImage(FILE_SIZE);
    writeU4(bytes, MAP_OFF, 50);
    expect(failure(() => parseMapList(new ByteReader(bytes), MAP_OFF))).toBe("OutOfBounds");
  });

  it("names unknown types", () => {
    expect(mapItemTypeName(0x2006)).toBe("AnnotationsDirectoryItem");
    expect(mapItemTypeName(0x7777)).toBe("unknown(0x7777)");
  });
});

describe("validateMapList", () => {
  it("accepts a minimal map", () => {
    expect(validateMapList(header(), mapOf(), FILE_SIZE)).toEqual({ warnings: [] });
  });

  it("rejects sections that share a start offset", () => {
    const map = mapOf(item(MapItemType.CodeItem, 1, 1000), item(MapItemType.DebugInfoItem, 1, 1000));
    expect(failure(() => validateMapList(header(), map, FILE_SIZE))).toBe("OverlappingSection");
  });

  it("extends both sections of a shared start up to the next section", () => {
    const map = mapOf(item(MapItemType.CodeItem, 1, 1000), item(MapItemType.DebugInfoItem, 1, 1000));
    expect(() => validateMapList(header(), map, FILE_SIZE)).toThrow(
      "sections overlap: CodeItem [1000, 1100) and DebugInfoItem [1000, 1100)"
    );
  });

  it("rejects fixed-size tables that run into the next section", () => {
    const h = header({ stringIdsSize: 25, stringIdsOff: 1000, typeIdsSize: 1, typeIdsOff: 1096 });
    const map = mapOf(item(MapItemType.StringIdItem, 25, 1000), item(MapItemType.TypeIdItem, 1, 1096));
    expect(failure(() => validateMapList(h, map, FILE_SIZE))).toBe("OverlappingSection");
  });

  it("rejects a type listed twice", () => {
    const map = mapOf(item(MapItemType.StringDataItem, 1, 500), item(MapItemType.StringDataItem, 1, 600));
    expect(failure(() => validateMapList(header(), map, FILE_SIZE))).toBe("OverlappingSection");
  });

  it("rejects a header table the map leaves out", () => {
    const h = header({ stringIdsSize: 1, stringIdsOff: 200 });
    expect(failure(() => validateMapList(h, mapOf(), FILE_SIZE))).toBe("MissingSection");
  });

  it("rejects a header table the map places elsewhere", () => {
    const h = header({ stringIdsSize: 1, stringIdsOff: 200 });
    const map = mapOf(item(MapItemType.StringIdItem, 2, 200));
    expect(failure(() => validateMapList(h, map, FILE_SIZE))).toBe("MissingSection");
  });

  it("requires the map to list the header and itself", () => {
    const noSelf = { offset: MAP_OFF, items: [item(MapItemType.Header, 1, 0)] };
    expect(failure(() => validateMapList(header(), noSelf, FILE_SIZE))).toBe("MissingSection");

    const noHeader = { offset: MAP_OFF, items: [item(MapItemType.MapList, 1, MAP_OFF)] };
    expect(failure(() => validateMapList(header(), noHeader, FILE_SIZE))).toBe("MissingSection");
  });

  it("rejects sections past the end of the file", () => {
    const map = mapOf(item(MapItemType.FieldIdItem, 10, 1150));
    expect(failure(() => validateMapList(header(), map, FILE_SIZE))).toBe("OutOfBounds");
  });

  it("warns about unknown types", () => {
    const map = mapOf(item(0x7777, 1, 900));
    expect(validateMapList(header(), map, FILE_SIZE).warnings).toEqual(["map_list contains unknown(0x7777) at 0x384"]);
  });

  it("warns about tables the header does not reference", () => {
    const map = mapOf(item(MapItemType.StringIdItem, 1, 200));
    expect(validateMapList(header(), map, FILE_SIZE).warnings).toEqual([
      "map_list declares StringIdItem but the header does not reference it",
    ]);
  });

  it("warns about data items outside the data section", () => {
    const h = header({ dataSize: 200, dataOff: 1000 });
    const map = mapOf(item(MapItemType.StringDataItem, 1, 500));
    expect(validateMapList(h, map, FILE_SIZE).warnings).toEqual(["StringDataItem [500, 1100) lies outside the data section"]);
  });
});

describe("map validation in DexFile", () => {
  function writeMap(bytes: Uint8Array, items: [number, number, number][]): void {
    writeU4(bytes, 52, MAP_OFF);
    writeU4(bytes, MAP_OFF, items.length);
    items.forEach(([type, size, offset], i) => {
      const at = MAP_OFF + 4 + i * 12;
      writeU4(bytes, at, type);
      writeU4(bytes, at + 4, size);
      writeU4(bytes, at + 8, offset);
    });
  }

  function withUnknownSection(): Uint8Array {
    const bytes = blankImage(FILE_SIZE);
    writeMap(bytes, [
      [MapItemType.Header, 1, 0],
      [0x7777, 1, 900],
      [MapItemType.MapList, 1, MAP_OFF],
    ]);
    return bytes;
  }

  function withOverlappingSections(): Uint8Array {
    // one string id at 112 pointing at "hello" at 200; code and debug info both claim 1000
    const bytes = blankImage(FILE_SIZE);
    writeU4(bytes, 56, 1);
    writeU4(bytes, 60, 112);
    writeU4(bytes, 112, 200);
    bytes.set([0x05, 0x68, 0x65, 0x6c, 0x6c, 0x6f], 200);
    writeMap(bytes, [
      [MapItemType.Header, 1, 0],
      [MapItemType.StringIdItem, 1, 112],
      [MapItemType.CodeItem, 1, 1000],
      [MapItemType.DebugInfoItem, 1, 1000],
      [MapItemType.MapList, 1, MAP_OFF],
    ]);
    return bytes;
  }

  it("reports warnings through the logger", () => {
    const warned: string[] = [];
    const logger: DexLogger = { warn: (m) => warned.push(m), debug: () => {} };
    const dex = new DexFile(withUnknownSection(), { logger });
    expect(dex.mapWarnings).toEqual(["map_list contains unknown(0x7777) at 0x384"]);
    expect(warned).toEqual(dex.mapWarnings);
    expect(dex.mapList?.items).toHaveLength(3);
  });

  it("skips the map when validation is off", () => {
    const dex = new DexFile(withUnknownSection(), { validateMap: false });
    expect(dex.mapList).toBeUndefined();
    expect(dex.mapValidation).toBeUndefined();
    expect(dex.mapWarnings).toEqual([]);
  });

  it("keeps the file usable when the map is rejected", () => {
    const warned: string[] = [];
    const logger: DexLogger = { warn: (m) => warned.push(m), debug: () => {} };
    const dex = new DexFile(withOverlappingSections(), { logger });

    expect(dex.getString(0)).toBe("hello");
    expect(dex.mapList).toBeUndefined();
    expect(dex.mapWarnings).toEqual([]);
    expect(dex.getMapItem(MapItemType.CodeItem)).toBeUndefined();
    expect(dex.methodHandles.count).toBe(0);
    expect(dex.callSites.count).toBe(0);

    const validation = dex.mapValidation;
    expect(validation?.ok).toBe(false);
    if (validation === undefined || validation.ok) return;
    expect(validation.error.kind).toBe("OverlappingSection");
    expect(warned).toEqual([
      "map_list ignored: sections overlap: CodeItem [1000, 1100) and DebugInfoItem [1000, 1100)",
    ]);
  });

  it("records a successful validation", () => {
    const dex = new DexFile(withUnknownSection(), { logger: silentLogger });
    expect(dex.mapValidation).toEqual({ ok: true, value: { warnings: ["map_list contains unknown(0x7777) at 0x384"] } });
  });
});
