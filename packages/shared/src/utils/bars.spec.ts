import { describe, it, expect } from "vitest";

import type { OhlcBar } from "../types";
import { isStrictlyIncreasing, normalizeBars } from "./bars";

function bar(timestamp: number, close: number): OhlcBar {
  return { timestamp, open: close, high: close + 1, low: close - 1, close, volume: 100 };
}

describe("normalizeBars", () => {
  it("sorts rows by timestamp", () => {
    const out = normalizeBars([bar(3000, 3), bar(1000, 1), bar(2000, 2)]);
    expect(out.map((b) => b.timestamp)).toEqual([1000, 2000, 3000]);
  });

  it("keeps the later row for a repeated timestamp", () => {
    const out = normalizeBars([bar(1000, 1), bar(2000, 2), bar(2000, 2.5)]);
    expect(out).toHaveLength(2);
    expect(out[1]?.close).toBe(2.5);
  });

  it("drops rows without a finite close", () => {
    const out = normalizeBars([bar(1000, 1), bar(2000, NaN), bar(3000, 3)]);
    expect(out.map((b) => b.close)).toEqual([1, 3]);
  });

  it("returns frozen bars", () => {
    const [first] = normalizeBars([bar(1000, 1)]);
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe("isStrictlyIncreasing", () => {
  it("accepts an ordered series", () => {
    expect(isStrictlyIncreasing([bar(1, 1), bar(2, 1), bar(3, 1)])).toBe(true);
  });

  it("rejects duplicates", () => {
    expect(isStrictlyIncreasing([bar(1, 1), bar(1, 1)])).toBe(false);
  });

  it("accepts empty and single-bar series", () => {
    expect(isStrictlyIncreasing([])).toBe(true);
    expect(isStrictlyIncreasing([bar(1, 1)])).toBe(true);
  });
});
