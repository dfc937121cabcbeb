import { describe, expect, it } from "vitest";
import { DexFile } from "../src/DexFile";
import { ByteReader } from "../src/binary";
import { parseClassData } from "../src/classdata";
import { silentLogger } from "../src/config";
import { DexError, isDexError } from "../src/errors";
import { DexImageBuilder } from "./support/DexImageBuilder";

function reader(data: number[], size = 64): ByteReader {
  const bytes = new Uint8Array(size);
  bytes.set(data);
  return new ByteReader(bytes);
}

function classDataError(fn: () => unknown): DexError {
  try {
    fn();
  } catch (err) {
    if (isDexError(err, "MalformedClassData")) return err;
    throw err;
  }
  throw new Error("expected MalformedClassData");
}

const limits = { maxEntries: 100 };

describe("parseClassData", () => {
  // 1 static, 1 instance, 1 direct (flags 0x10001, code at 32), 1 virtual (flags 0x401, no code)
  const sample = [1, 1, 1, 1, 2, 8, 0, 2, 1, 0x81, 0x80, 0x04, 0x20, 3, 0x81, 0x08, 0];

  it("decodes all four groups", () => {
    const data = parseClassData(reader(sample), 0, limits);
    expect(data.staticFields).toEqual([{ fieldIdx: 2, accessFlags: 0x8 }]);
    expect(data.instanceFields).toEqual([{ fieldIdx: 0, accessFlags: 0x2 }]);
    expect(data.directMethods).toEqual([{ methodIdx: 1, accessFlags: 0x10001, codeOff: 32 }]);
    expect(data.virtualMethods).toEqual([{ methodIdx: 3, accessFlags: 0x401 }]);
    expect(data.byteLength).toBe(17);
  });

  it("restarts the running index for each group", () => {
    const data = parseClassData(reader([2, 1, 0, 0, 1, 8, 2, 8, 0, 2]), 0, limits);
    expect(data.staticFields.map((f) => f.fieldIdx)).toEqual([1, 3]);
    expect(data.instanceFields.map((f) => f.fieldIdx)).toEqual([0]);
  });

  it("rejects a repeated index", () => {
    const err = classDataError(() => parseClassData(reader([2, 0, 0, 0, 1, 8, 0, 8]), 0, limits));
    expect(err.group).toBe("staticFields");
    expect(err.index).toBe(1);
  });

  it("rejects member counts above the configured limit", () => {
    const err = classDataError(() => parseClassData(reader([5, 0, 0, 0]), 0, { maxEntries: 4 }));
    expect(err.group).toBe("staticFields");
    expect(err.offset).toBe(0);
  });

  it("rejects member counts the remaining bytes cannot hold", () => {
    classDataError(() => parseClassData(reader([0, 0, 0, 30], 40), 0, limits));
  });

  it("checks the decoded length when one is expected", () => {
    expect(parseClassData(reader(sample), 0, { ...limits, expectedLength: 17 }).byteLength).toBe(17);
    classDataError(() => parseClassData(reader(sample), 0, { ...limits, expectedLength: 18 }));
  });

  it("rejects code offsets outside the file", () => {
    const err = classDataError(() => parseClassData(reader([0, 0, 1, 0, 0, 1, 0x7f]), 0, limits));
    expect(err.group).toBe("directMethods");
    expect(err.index).toBe(0);
  });

  it("rejects indices beyond the id table", () => {
    const err = classDataError(() => parseClassData(reader([1, 0, 0, 0, 2, 8]), 0, { ...limits, fieldCount: 2 }));
    expect(err.group).toBe("staticFields");
    expect(err.index).toBe(0);
    expect(parseClassData(reader([1, 0, 0, 0, 1, 8]), 0, { ...limits, fieldCount: 2 }).staticFields).toEqual([
      { fieldIdx: 1, accessFlags: 8 },
    ]);
  });

  it("wraps a truncated entry with its cause", () => {
    const bytes = Uint8Array.from([0, 0, 1, 0, 5, 0x80, 0x80]);
    const err = classDataError(() => parseClassData(new ByteReader(bytes), 0, limits));
    expect(err.group).toBe("directMethods");
    expect(err.index).toBe(0);
    expect(err.cause).toBeInstanceOf(DexError);
  });

  it("rejects an offset outside the file", () => {
    classDataError(() => parseClassData(reader([]), 62, limits));
  });
});

describe("class data boundaries", () => {
  function build(aData: number[]): DexFile {
    const image = new DexImageBuilder()
      .addClass({ descriptor: "LA;", staticFields: [{ name: "x", type: "I", accessFlags: 0x8 }], classData: aData })
      .addClass({ descriptor: "LB;", classData: [0, 0, 0, 0] })
      .build();
    return new DexFile(image.bytes, { logger: silentLogger });
  }

  it("accepts items that fill their span", () => {
    const dex = build([1, 0, 0, 0, 0, 8]);
    const a = dex.getClass(0);
    expect(a.descriptor).toBe("LA;");
    expect(a.classData?.staticFields).toEqual([{ fieldIdx: 0, accessFlags: 8 }]);
    expect(a.classData?.byteLength).toBe(6);
    expect(dex.getClass(1).classData?.byteLength).toBe(4);
  });

  it("rejects an item followed by unused bytes", () => {
    const dex = build([1, 0, 0, 0, 0, 8, 0]);
    const results = [...dex.classes()];
    expect(results.map((r) => r.ok)).toEqual([false, true]);
    const first = results[0];
    if (!first.ok) expect(first.error.kind).toBe("MalformedClassData");
  });

  it("rejects an item that reads into the next one", () => {
    const dex = build([1, 0, 0, 0, 0]);
    const a = dex.tryGetClass(0);
    expect(a.ok).toBe(false);
    if (!a.ok) expect(a.error.kind).toBe("MalformedClassData");
    expect(dex.tryGetClass(1).ok).toBe(true);
  });

  it("does not enforce spans without a map list", () => {
    const image = new DexImageBuilder()
      .addClass({ descriptor: "LA;", staticFields: [{ name: "x", type: "I" }], classData: [1, 0, 0, 0, 0, 8, 0] })
      .addClass({ descriptor: "LB;", classData: [0, 0, 0, 0] })
      .build();
    const dex = new DexFile(image.bytes, { validateMap: false, logger: silentLogger });
    expect(dex.mapList).toBeUndefined();
    expect(dex.getClass(0).classData?.byteLength).toBe(6);
  });
});
