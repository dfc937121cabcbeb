import { z } from "zod";
import { DexError } from "./errors";

export interface DexLogger {
  warn(message: string): void;
  debug(message: string): void;
}

export const consoleLogger: DexLogger = {
  warn: (message) => console.warn(`[dexlens] ${message}`),
  debug: () => {},
};

export const silentLogger: DexLogger = {
  warn: () => {},
  debug: () => {},
};

const optionsSchema = z
  .object({
    verifyFileSize: z.boolean().default(true).describe("Require header file_size to equal the buffer length"),
    validateMap: z.boolean().default(true).describe("Parse and cross-check the map list at construction"),
    maxClassDataEntries: z
      .number()
      .int()
      .positive()
      .default(65536)
      .describe("Upper bound on each class_data_item group count"),
  })
  .strict();

export type DexFileOptions = z.input<typeof optionsSchema> & { logger?: DexLogger };

export type ResolvedDexFileOptions = z.output<typeof optionsSchema> & { logger: DexLogger };

export function resolveOptions(options: DexFileOptions = {}): ResolvedDexFileOptions {
  const { logger, ...rest } = options;
  const parsed = optionsSchema.safeParse(rest);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`).join("; ");
    throw new DexError("InvalidOptions", `invalid DexFile options: ${detail}`, { cause: parsed.error });
  }
  return { ...parsed.data, logger: logger ?? consoleLogger };
}
