import { readFileSync } from "fs";
import { resolve } from "path";

import { FatalConfigError } from "@shared/errors";
import { symbolsFileSchema, type SymbolConfig } from "@shared/schemas";

/**
 * Load the instrument list once at startup.
 * The result is frozen and passed explicitly to whoever needs it.
 */
export function loadSymbolConfig(file: string): readonly SymbolConfig[] {
  const path = resolve(file);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new FatalConfigError(`Cannot read symbols file ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  return parseSymbolConfig(raw);
}

export function parseSymbolConfig(raw: unknown): readonly SymbolConfig[] {
  const result = symbolsFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new FatalConfigError(`Invalid symbols file: ${issues}`);
  }

  return Object.freeze(result.data.map((entry) => Object.freeze({ ...entry })));
}
