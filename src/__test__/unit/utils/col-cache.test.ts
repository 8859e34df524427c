import { describe, it, expect } from "vitest";
import { colCache } from "../../../utils/col-cache.js";

describe("colCache", () => {
  it("should convert letters to 1-based numbers", () => {
    expect(colCache.l2n("A")).toBe(1);
    expect(colCache.l2n("Z")).toBe(26);
    expect(colCache.l2n("AA")).toBe(27);
    expect(colCache.l2n("XFD")).toBe(16384);
    expect(colCache.l2n("A1")).toBeUndefined();
  });

  it("should convert 1-based numbers to letters", () => {
    expect(colCache.n2l(1)).toBe("A");
    expect(colCache.n2l(27)).toBe("AA");
    expect(colCache.n2l(16384)).toBe("XFD");
    expect(() => colCache.n2l(0)).toThrow(RangeError);
    expect(() => colCache.n2l(16385)).toThrow(RangeError);
    expect(() => colCache.n2l(1.5)).toThrow(RangeError);
  });

  it("should decode addresses", () => {
    expect(colCache.decodeAddress("B12")).toEqual({ address: "B12", col: 2, row: 12 });
    expect(colCache.decodeAddress("$b$3")).toEqual({ address: "B3", col: 2, row: 3 });
    expect(colCache.decodeAddress("A1048576")).toEqual({ address: "A1048576", col: 1, row: 1048576 });
    expect(colCache.decodeAddress("A1048577")).toBeUndefined();
    expect(colCache.decodeAddress("B")).toBeUndefined();
    expect(colCache.decodeAddress("12")).toBeUndefined();
    expect(colCache.decodeAddress("B01")).toBeUndefined();
  });

  it("should encode addresses", () => {
    expect(colCache.encodeAddress(5, 3)).toBe("C5");
  });
});
