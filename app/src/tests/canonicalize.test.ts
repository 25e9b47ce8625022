import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  canonicalizeColumnName,
  canonicalizeHeaders,
  canonicalizeRawTable
} from "../lib/import/canonicalize";

describe("column name canonicalization", () => {
  it("trims, lowercases and replaces spaces with underscores", () => {
    expect(canonicalizeColumnName("  Total Sales ")).toBe("total_sales");
    expect(canonicalizeColumnName("Unit  Price")).toBe("unit__price");
    expect(canonicalizeColumnName("already_clean")).toBe("already_clean");
  });

  it("suffixes names that collide after canonicalization", () => {
    expect(canonicalizeHeaders(["Region", "region", "REGION ", "Sales"])).toEqual([
      "region",
      "region_2",
      "region_3",
      "sales"
    ]);
  });

  it("is idempotent for any name", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 40 }), (name) => {
        const once = canonicalizeColumnName(name);
        expect(canonicalizeColumnName(once)).toBe(once);
      })
    );
  });

  it("leaves already canonical header lists unchanged", () => {
    fc.assert(
      fc.property(fc.array(fc.string({ maxLength: 12 }), { maxLength: 8 }), (headers) => {
        const once = canonicalizeHeaders(headers);
        expect(canonicalizeHeaders(once)).toEqual(once);
        expect(new Set(once).size).toBe(once.length);
      })
    );
  });

  it("keeps rows untouched", () => {
    const raw = { headers: ["First Name"], rows: [["Ada"], [null]] };

    expect(canonicalizeRawTable(raw)).toEqual({
      headers: ["first_name"],
      rows: [["Ada"], [null]]
    });
  });
});
