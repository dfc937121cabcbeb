export type DexErrorKind =
  | "OutOfBounds"
  | "InvalidMagic"
  | "InvalidEndianTag"
  | "InvalidHeader"
  | "MalformedLeb128"
  | "InvalidStringEncoding"
  | "InvalidIndex"
  | "MalformedClassData"
  | "MalformedCodeItem"
  | "MalformedEncodedValue"
  | "OverlappingSection"
  | "MissingSection"
  | "UnterminatedDebugProgram"
  | "InvalidOptions";

export type ClassDataGroup = "staticFields" | "instanceFields" | "directMethods" | "virtualMethods";

export interface DexErrorOptions extends ErrorOptions {
  /** Absolute file offset the failure was detected at, when known. */
  offset?: number;
  group?: ClassDataGroup;
  /** Position of the failing entry within its group. */
  index?: number;
}

export class DexError extends Error {
  readonly kind: DexErrorKind;
  readonly offset?: number;
  readonly group?: ClassDataGroup;
  readonly index?: number;

  constructor(kind: DexErrorKind, message: string, options: DexErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DexError";
    this.kind = kind;
    this.offset = options.offset;
    this.group = options.group;
    this.index = options.index;
  }
}

export function isDexError(err: unknown, kind?: DexErrorKind): err is DexError {
  return err instanceof DexError && (kind === undefined || err.kind === kind);
}

export type DexResult<T> = { ok: true; value: T } | { ok: false; error: DexError };

/**
 * Runs `fn` and captures a thrown `DexError` as a failed result. Anything
 * else is a programming error and is rethrown.
 */
export function attempt<T>(fn: () => T): DexResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof DexError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
