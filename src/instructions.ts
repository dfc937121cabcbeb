import { z } from "zod";
import { DexError } from "./errors";
import opcodeData from "./opcodes.json";

const FORMATS = [
  "10x", "12x", "11n", "11x", "10t", "20t", "22x", "21t", "21s", "21h", "21c", "23x", "22b",
  "22t", "22s", "22c", "32x", "30t", "31t", "31i", "31c", "35c", "3rc", "45cc", "4rcc", "51l",
] as const;

const INDEX_KINDS = ["none", "string", "type", "field", "method", "proto", "call-site", "method-handle"] as const;

export type OpcodeFormat = (typeof FORMATS)[number];
export type IndexKind = (typeof INDEX_KINDS)[number];

const opcodeTableSchema = z
  .array(
    z.object({
      opcode: z.number().int(),
      name: z.string(),
      format: z.enum(FORMATS),
      index: z.enum(INDEX_KINDS),
    })
  )
  .length(256)
  .refine((table) => table.every((entry, i) => entry.opcode === i), "opcode table must be ordered by opcode");

export type OpcodeInfo = z.infer<typeof opcodeTableSchema>[number];

export const OPCODES: readonly OpcodeInfo[] = opcodeTableSchema.parse(opcodeData);

const FORMAT_WIDTHS: Record<OpcodeFormat, number> = {
  "10x": 1, "12x": 1, "11n": 1, "11x": 1, "10t": 1,
  "20t": 2, "22x": 2, "21t": 2, "21s": 2, "21h": 2, "21c": 2, "23x": 2, "22b": 2, "22t": 2, "22s": 2, "22c": 2,
  "32x": 3, "30t": 3, "31t": 3, "31i": 3, "31c": 3, "35c": 3, "3rc": 3,
  "45cc": 4, "4rcc": 4,
  "51l": 5,
};

const PACKED_SWITCH_IDENT = 0x0100;
const SPARSE_SWITCH_IDENT = 0x0200;
const FILL_ARRAY_DATA_IDENT = 0x0300;

export type Operands = {
  registers: number[];
  literal?: number | bigint;
  /** Branch target as an absolute code-unit address. */
  target?: number;
  index?: number;
  /** Prototype index carried by invoke-polymorphic. */
  protoIndex?: number;
};

/** Switch targets stay relative to the switch instruction that references the payload. */
export type Payload =
  | { kind: "packed-switch"; firstKey: number; targets: number[] }
  | { kind: "sparse-switch"; keys: number[]; targets: number[] }
  | { kind: "fill-array-data"; elementWidth: number; size: number; data: Uint8Array };

export type Instruction = {
  /** Offset in 16-bit code units from the start of insns. */
  address: number;
  opcode: number;
  name: string;
  format: OpcodeFormat | "payload";
  /** Length in code units. */
  width: number;
  indexKind: IndexKind;
  operands: Operands;
  payload?: Payload;
};

function s4(v: number): number {
  return (v << 28) >> 28;
}

function s8(v: number): number {
  return (v << 24) >> 24;
}

function s16(v: number): number {
  return (v << 16) >> 16;
}

function s32(lo: number, hi: number): number {
  return (lo | (hi << 16)) | 0;
}

function u32(lo: number, hi: number): number {
  return (lo | (hi << 16)) >>> 0;
}

function truncated(address: number, what: string, width: number, available: number): DexError {
  return new DexError(
    "MalformedCodeItem",
    `${what} at code address ${address} needs ${width} code units but only ${available} remain`
  );
}

function need(insns: Uint16Array, address: number, width: number, what: string): void {
  if (address + width > insns.length) {
    throw truncated(address, what, width, insns.length - address);
  }
}

function decodePayload(insns: Uint16Array, address: number, ident: number): Instruction {
  need(insns, address, 2, "payload header");
  const w = (i: number): number => insns[address + i];

  let width: number;
  let name: string;
  let payload: Payload;
  switch (ident) {
    case PACKED_SWITCH_IDENT: {
      const size = w(1);
      width = 4 + size * 2;
      name = "packed-switch-payload";
      need(insns, address, width, name);
      const targets: number[] = [];
      for (let i = 0; i < size; i++) {
        targets.push(s32(w(4 + i * 2), w(5 + i * 2)));
      }
      payload = { kind: "packed-switch", firstKey: s32(w(2), w(3)), targets };
      break;
    }
    case SPARSE_SWITCH_IDENT: {
      const size = w(1);
      width = 2 + size * 4;
      name = "sparse-switch-payload";
      need(insns, address, width, name);
      const keys: number[] = [];
      const targets: number[] = [];
      for (let i = 0; i < size; i++) {
        keys.push(s32(w(2 + i * 2), w(3 + i * 2)));
        targets.push(s32(w(2 + size * 2 + i * 2), w(3 + size * 2 + i * 2)));
      }
      payload = { kind: "sparse-switch", keys, targets };
      break;
    }
    default: {
      name = "fill-array-data-payload";
      need(insns, address, 4, name);
      const elementWidth = w(1);
      const size = u32(w(2), w(3));
      const byteCount = elementWidth * size;
      width = 4 + Math.ceil(byteCount / 2);
      need(insns, address, width, name);
      const data = new Uint8Array(byteCount);
      for (let k = 0; k < byteCount; k++) {
        const word = w(4 + (k >> 1));
        data[k] = k % 2 === 0 ? word & 0xff : word >> 8;
      }
      payload = { kind: "fill-array-data", elementWidth, size, data };
      break;
    }
  }

  return { address, opcode: 0, name, format: "payload", width, indexKind: "none", operands: { registers: [] }, payload };
}

function decodeOperands(info: OpcodeInfo, insns: Uint16Array, address: number): Operands {
  const w0 = insns[address];
  const w = (i: number): number => insns[address + i];
  const aa = w0 >> 8;
  const a = (w0 >> 8) & 0xf;
  const b = w0 >> 12;

  switch (info.format) {
    case "10x":
      return { registers: [] };
    case "12x":
      return { registers: [a, b] };
    case "11n":
      return { registers: [a], literal: s4(b) };
    case "11x":
      return { registers: [aa] };
    case "10t":
      return { registers: [], target: address + s8(aa) };
    case "20t":
      return { registers: [], target: address + s16(w(1)) };
    case "22x":
      return { registers: [aa, w(1)] };
    case "21t":
      return { registers: [aa], target: address + s16(w(1)) };
    case "21s":
      return { registers: [aa], literal: s16(w(1)) };
    case "21h":
      // const/high16 fills the top 16 bits of 32; const-wide/high16 the top of 64
      return info.name === "const-wide/high16"
        ? { registers: [aa], literal: BigInt.asIntN(64, BigInt(w(1)) << 48n) }
        : { registers: [aa], literal: (w(1) << 16) | 0 };
    case "21c":
      return { registers: [aa], index: w(1) };
    case "23x":
      return { registers: [aa, w(1) & 0xff, w(1) >> 8] };
    case "22b":
      return { registers: [aa, w(1) & 0xff], literal: s8(w(1) >> 8) };
    case "22t":
      return { registers: [a, b], target: address + s16(w(1)) };
    case "22s":
      return { registers: [a, b], literal: s16(w(1)) };
    case "22c":
      return { registers: [a, b], index: w(1) };
    case "32x":
      return { registers: [w(1), w(2)] };
    case "30t":
      return { registers: [], target: address + s32(w(1), w(2)) };
    case "31t":
      return { registers: [aa], target: address + s32(w(1), w(2)) };
    case "31i":
      return { registers: [aa], literal: s32(w(1), w(2)) };
    case "31c":
      return { registers: [aa], index: u32(w(1), w(2)) };
    case "35c":
    case "45cc": {
      if (b > 5) {
        throw new DexError("MalformedCodeItem", `${info.name} at code address ${address} passes ${b} registers`);
      }
      const regs = w(2);
      const all = [regs & 0xf, (regs >> 4) & 0xf, (regs >> 8) & 0xf, regs >> 12, a];
      const operands: Operands = { registers: all.slice(0, b), index: w(1) };
      if (info.format === "45cc") {
        operands.protoIndex = w(3);
      }
      return operands;
    }
    case "3rc":
    case "4rcc": {
      const first = w(2);
      const registers: number[] = [];
      for (let i = 0; i < aa; i++) {
        registers.push(first + i);
      }
      const operands: Operands = { registers, index: w(1) };
      if (info.format === "4rcc") {
        operands.protoIndex = w(3);
      }
      return operands;
    }
    case "51l": {
      let value = 0n;
      for (let i = 4; i >= 1; i--) {
        value = (value << 16n) | BigInt(w(i));
      }
      return { registers: [aa], literal: BigInt.asIntN(64, value) };
    }
  }
}

/** Decodes the instruction starting at `address`. */
export function decodeInstruction(insns: Uint16Array, address: number): Instruction {
  need(insns, address, 1, "instruction");
  const w0 = insns[address];
  const opcode = w0 & 0xff;

  if (opcode === 0 && (w0 === PACKED_SWITCH_IDENT || w0 === SPARSE_SWITCH_IDENT || w0 === FILL_ARRAY_DATA_IDENT)) {
    return decodePayload(insns, address, w0);
  }

  const info = OPCODES[opcode];
  const width = FORMAT_WIDTHS[info.format];
  need(insns, address, width, info.name);
  return {
    address,
    opcode,
    name: info.name,
    format: info.format,
    width,
    indexKind: info.index,
    operands: decodeOperands(info, insns, address),
  };
}

/**
 * Walks the instruction stream in order, payload pseudo-instructions
 * included. A stream that ends inside an instruction is `MalformedCodeItem`.
 */
export function* decodeInstructions(insns: Uint16Array): Generator<Instruction, void, undefined> {
  let address = 0;
  while (address < insns.length) {
    const insn = decodeInstruction(insns, address);
    yield insn;
    address += insn.width;
  }
}
