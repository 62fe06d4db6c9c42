import { z } from "zod";

import { TIMEFRAMES } from "./types/market";

export const symbolConfigSchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .max(32)
    .regex(/^[A-Za-z0-9^=.\-]+$/, "Invalid symbol format"),
  destination: z.string().regex(/^\d{5,25}$/, "Destination must be a channel id"),
  timeframe: z.enum(TIMEFRAMES),
});

export type SymbolConfig = Readonly<z.infer<typeof symbolConfigSchema>>;

export const symbolsFileSchema = z
  .array(symbolConfigSchema)
  .min(1, "At least one symbol must be configured")
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      const key = entry.symbol.toUpperCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "symbol"],
          message: `Duplicate symbol ${entry.symbol}`,
        });
      }
      seen.add(key);
    });
  });
