import { describe, it, expect } from "vitest";
import {
  addressSortKey,
  columnToIndex,
  compareAddresses,
  formatAddress,
  indexToColumn,
  isValidAddress,
  offsetAddress,
  resolveAddress,
  sortAddresses,
} from "../../server/excel/cellAddress";
import { InvalidAddressError } from "../../server/utils/errors";

describe("cell addresses", () => {
  describe("resolveAddress", () => {
    it("splits relative and absolute forms alike", () => {
      expect(resolveAddress("B15")).toEqual({ column: "B", row: 15 });
      expect(resolveAddress("$B$15")).toEqual({ column: "B", row: 15 });
      expect(resolveAddress("$AA$1")).toEqual({ column: "AA", row: 1 });
      expect(resolveAddress("B$7")).toEqual({ column: "B", row: 7 });
    });

    it("upper-cases column letters", () => {
      expect(resolveAddress("d20")).toEqual({ column: "D", row: 20 });
    });

    it("rejects malformed addresses", () => {
      for (const bad of ["", "15", "B", "B-1", "1B", "B 15"]) {
        expect(() => resolveAddress(bad)).toThrow(InvalidAddressError);
      }
    });

    it("rejects row zero and rows past the sheet limit", () => {
      expect(() => resolveAddress("A0")).toThrow("row must be 1 or greater");
      expect(() => resolveAddress("A1048577")).toThrow("row exceeds 1048576");
    });

    it("rejects columns past XFD", () => {
      expect(resolveAddress("XFD1")).toEqual({ column: "XFD", row: 1 });
      expect(() => resolveAddress("XFE1")).toThrow("column exceeds XFD");
    });

    it("carries the offending address on the error", () => {
      try {
        resolveAddress("$$B15");
        expect.fail("expected an InvalidAddressError");
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidAddressError);
        if (error instanceof InvalidAddressError) {
          expect(error.address).toBe("$$B15");
          expect(error.code).toBe("INVALID_CELL_REFERENCE");
        }
      }
    });
  });

  it("isValidAddress mirrors resolveAddress", () => {
    expect(isValidAddress("$D$22")).toBe(true);
    expect(isValidAddress("D0")).toBe(false);
  });

  it("converts between column letters and indexes", () => {
    expect(columnToIndex("A")).toBe(1);
    expect(columnToIndex("Z")).toBe(26);
    expect(columnToIndex("AA")).toBe(27);
    expect(columnToIndex("XFD")).toBe(16384);
    expect(indexToColumn(1)).toBe("A");
    expect(indexToColumn(26)).toBe("Z");
    expect(indexToColumn(27)).toBe("AA");
    expect(indexToColumn(702)).toBe("ZZ");
    expect(indexToColumn(703)).toBe("AAA");
    expect(() => indexToColumn(0)).toThrow(InvalidAddressError);
  });

  it("formats resolved addresses back", () => {
    expect(formatAddress({ column: "AA", row: 1 })).toBe("AA1");
    expect(formatAddress({ column: "c", row: 9 }, { absolute: true })).toBe("$C$9");
    expect(formatAddress(resolveAddress("$B$15"))).toBe("B15");
  });

  it("exposes sort keys by row or column", () => {
    expect(addressSortKey("$C$18", "row")).toBe(18);
    expect(addressSortKey("$C$18", "column")).toBe("C");
  });

  it("orders columns by rank so that Z comes before AA", () => {
    expect(compareAddresses("Z1", "AA1", "column")).toBeLessThan(0);
    expect(sortAddresses(["AA1", "B2", "Z1"], "column")).toEqual(["B2", "Z1", "AA1"]);
  });

  it("orders by row number rather than text", () => {
    expect(sortAddresses(["A10", "A9", "B1"], "row")).toEqual(["B1", "A9", "A10"]);
  });

  it("offsets within the sheet", () => {
    expect(offsetAddress("$B$15", 0, 1)).toBe("C15");
    expect(offsetAddress("Z3", 1, 1)).toBe("AA4");
    expect(() => offsetAddress("A1", -1, 0)).toThrow(InvalidAddressError);
  });
});
