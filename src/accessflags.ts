// Access flag bits shared by classes, fields and methods.
// 0x40 and 0x80 mean different things for fields and methods.
export enum DexAccessFlag {
  Public = 0x1,
  Private = 0x2,
  Protected = 0x4,
  Static = 0x8,
  Final = 0x10,
  Synchronized = 0x20,
  Volatile = 0x40,
  Bridge = 0x40,
  Transient = 0x80,
  Varargs = 0x80,
  Native = 0x100,
  Interface = 0x200,
  Abstract = 0x400,
  Strict = 0x800,
  Synthetic = 0x1000,
  Annotation = 0x2000,
  Enum = 0x4000,
  Constructor = 0x10000,
  DeclaredSynchronized = 0x20000,
}

export type AccessFlagKind = "class" | "field" | "method";

export function hasFlag(flags: number, flag: DexAccessFlag): boolean {
  return (flags & flag) !== 0;
}
