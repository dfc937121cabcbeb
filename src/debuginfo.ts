import { ByteReader } from "./binary";
import { DexError, isDexError } from "./errors";
import { readSleb128, readUleb128, readUleb128p1 } from "./leb128";

export enum DebugOp {
  EndSequence = 0x00,
  AdvancePc = 0x01,
  AdvanceLine = 0x02,
  StartLocal = 0x03,
  StartLocalExtended = 0x04,
  EndLocal = 0x05,
  RestartLocal = 0x06,
  SetPrologueEnd = 0x07,
  SetEpilogueBegin = 0x08,
  SetFile = 0x09,
  FirstSpecial = 0x0a,
}

const LINE_BASE = -4;
const LINE_RANGE = 15;

export type DebugOpcode =
  | { op: DebugOp.EndSequence }
  | { op: DebugOp.AdvancePc; addrDiff: number }
  | { op: DebugOp.AdvanceLine; lineDiff: number }
  | { op: DebugOp.StartLocal; register: number; nameIdx?: number; typeIdx?: number }
  | { op: DebugOp.StartLocalExtended; register: number; nameIdx?: number; typeIdx?: number; sigIdx?: number }
  | { op: DebugOp.EndLocal; register: number }
  | { op: DebugOp.RestartLocal; register: number }
  | { op: DebugOp.SetPrologueEnd }
  | { op: DebugOp.SetEpilogueBegin }
  | { op: DebugOp.SetFile; nameIdx?: number }
  | { op: DebugOp.FirstSpecial; opcode: number; lineOff: number; addrOff: number };

export type DebugInfo = {
  offset: number;
  lineStart: number;
  /** String indices of parameter names; undefined where the name is absent. */
  parameterNames: (number | undefined)[];
  opcodes: DebugOpcode[];
  byteLength: number;
};

type EventBase = { address: number; line: number };

export type DebugEvent =
  | (EventBase & { kind: "position" })
  | (EventBase & { kind: "startLocal"; register: number; nameIdx?: number; typeIdx?: number; sigIdx?: number })
  | (EventBase & { kind: "endLocal"; register: number })
  | (EventBase & { kind: "restartLocal"; register: number })
  | (EventBase & { kind: "prologueEnd" })
  | (EventBase & { kind: "epilogueBegin" })
  | (EventBase & { kind: "setFile"; nameIdx?: number });

function optional(value: number): number | undefined {
  return value === -1 ? undefined : value;
}

/** Decodes the special opcode formula: one byte advancing both line and address. */
export function decodeSpecial(opcode: number): { lineOff: number; addrOff: number } {
  const adjusted = opcode - DebugOp.FirstSpecial;
  return {
    lineOff: LINE_BASE + (adjusted % LINE_RANGE),
    addrOff: Math.floor(adjusted / LINE_RANGE),
  };
}

export function parseDebugInfo(r: ByteReader, off: number): DebugInfo {
  const bytes = r.bytes;
  let cur = off;

  const uleb = (): number => {
    const res = readUleb128(bytes, cur);
    cur = res.nextOffset;
    return res.value;
  };
  const sleb = (): number => {
    const res = readSleb128(bytes, cur);
    cur = res.nextOffset;
    return res.value;
  };
  const ulebp1 = (): number | undefined => {
    const res = readUleb128p1(bytes, cur);
    cur = res.nextOffset;
    return optional(res.value);
  };

  const lineStart = uleb();
  const parametersSize = uleb();
  if (parametersSize > r.length - cur) {
    throw new DexError("OutOfBounds", `debug_info_item at 0x${off.toString(16)} declares ${parametersSize} parameters`, {
      offset: off,
    });
  }
  const parameterNames: (number | undefined)[] = [];
  for (let i = 0; i < parametersSize; i++) {
    parameterNames.push(ulebp1());
  }

  const opcodes: DebugOpcode[] = [];
  try {
    while (true) {
      if (cur >= bytes.length) {
        throw new DexError("UnterminatedDebugProgram", `debug program at 0x${off.toString(16)} has no end sequence`, {
          offset: off,
        });
      }
      const opcode = bytes[cur++];
      switch (opcode) {
        case DebugOp.EndSequence:
          opcodes.push({ op: DebugOp.EndSequence });
          return { offset: off, lineStart, parameterNames, opcodes, byteLength: cur - off };
        case DebugOp.AdvancePc:
          opcodes.push({ op: DebugOp.AdvancePc, addrDiff: uleb() });
          break;
        case DebugOp.AdvanceLine:
          opcodes.push({ op: DebugOp.AdvanceLine, lineDiff: sleb() });
          break;
        case DebugOp.StartLocal:
          opcodes.push({ op: DebugOp.StartLocal, register: uleb(), nameIdx: ulebp1(), typeIdx: ulebp1() });
          break;
        case DebugOp.StartLocalExtended:
          opcodes.push({
            op: DebugOp.StartLocalExtended,
            register: uleb(),
            nameIdx: ulebp1(),
            typeIdx: ulebp1(),
            sigIdx: ulebp1(),
          });
          break;
        case DebugOp.EndLocal:
          opcodes.push({ op: DebugOp.EndLocal, register: uleb() });
          break;
        case DebugOp.RestartLocal:
          opcodes.push({ op: DebugOp.RestartLocal, register: uleb() });
          break;
        case DebugOp.SetPrologueEnd:
          opcodes.push({ op: DebugOp.SetPrologueEnd });
          break;
        case DebugOp.SetEpilogueBegin:
          opcodes.push({ op: DebugOp.SetEpilogueBegin });
          break;
        case DebugOp.SetFile:
          opcodes.push({ op: DebugOp.SetFile, nameIdx: ulebp1() });
          break;
        default:
          opcodes.push({ op: DebugOp.FirstSpecial, opcode, ...decodeSpecial(opcode) });
      }
    }
  } catch (err) {
    // an operand cut off by the end of the buffer means the program never terminated
    if (isDexError(err, "OutOfBounds")) {
      throw new DexError("UnterminatedDebugProgram", `debug program at 0x${off.toString(16)} is truncated`, {
        offset: off,
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Runs the debug state machine from the start, yielding events tagged with
 * the address and line registers as they stand after each opcode.
 */
export function* runDebugProgram(info: DebugInfo): Generator<DebugEvent, void, undefined> {
  let address = 0;
  let line = info.lineStart;

  for (const o of info.opcodes) {
    switch (o.op) {
      case DebugOp.EndSequence:
        return;
      case DebugOp.AdvancePc:
        address += o.addrDiff;
        break;
      case DebugOp.AdvanceLine:
        line += o.lineDiff;
        break;
      case DebugOp.StartLocal:
        yield { kind: "startLocal", address, line, register: o.register, nameIdx: o.nameIdx, typeIdx: o.typeIdx };
        break;
      case DebugOp.StartLocalExtended:
        yield {
          kind: "startLocal",
          address,
          line,
          register: o.register,
          nameIdx: o.nameIdx,
          typeIdx: o.typeIdx,
          sigIdx: o.sigIdx,
        };
        break;
      case DebugOp.EndLocal:
        yield { kind: "endLocal", address, line, register: o.register };
        break;
      case DebugOp.RestartLocal:
        yield { kind: "restartLocal", address, line, register: o.register };
        break;
      case DebugOp.SetPrologueEnd:
        yield { kind: "prologueEnd", address, line };
        break;
      case DebugOp.SetEpilogueBegin:
        yield { kind: "epilogueBegin", address, line };
        break;
      case DebugOp.SetFile:
        yield { kind: "setFile", address, line, nameIdx: o.nameIdx };
        break;
      case DebugOp.FirstSpecial:
        address += o.addrOff;
        line += o.lineOff;
        yield { kind: "position", address, line };
        break;
    }
  }
}

/** The (address, line) table of a method. */
export function positionTable(info: DebugInfo): { address: number; line: number }[] {
  const out: { address: number; line: number }[] = [];
  for (const ev of runDebugProgram(info)) {
    if (ev.kind === "position") {
      out.push({ address: ev.address, line: ev.line });
    }
  }
  return out;
}
