import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  aggregate,
  applyFilter,
  compareGroupKeys,
  defaultAggregate,
  defaultFilter,
  filterOptions,
  PipelineError,
  runPipeline
} from "../lib/explore/pipeline";
import type { CellValue, Table } from "../lib/import/types";

const sales: Table = {
  columns: [
    { name: "region", kind: "text", values: ["north", "south", "north", null, "east"] },
    { name: "units", kind: "integer", values: [10, 20, 30, 40, null] },
    { name: "price", kind: "float", values: [1.5, 2.5, 3.5, 4.5, 5.5] }
  ],
  rowCount: 5
};

const emptySales: Table = {
  columns: [
    { name: "region", kind: "null", values: [] },
    { name: "units", kind: "null", values: [] }
  ],
  rowCount: 0
};

const measured = (values: (number | null)[]): Table => ({
  columns: [
    {
      name: "label",
      kind: "text",
      values: values.map((_, index) => (index % 2 === 0 ? "even" : "odd"))
    },
    {
      name: "value",
      kind: values.some((value) => value !== null) ? "integer" : "null",
      values
    }
  ],
  rowCount: values.length
});

const cells = fc.array(fc.option(fc.integer({ min: -50, max: 50 }), { nil: null }), {
  maxLength: 30
});

describe("filter options", () => {
  it("offers the observed range for numeric columns", () => {
    expect(filterOptions(sales, "units")).toEqual({ kind: "range", min: 10, max: 40 });
  });

  it("offers distinct non-null values in first-seen order otherwise", () => {
    expect(filterOptions(sales, "region")).toEqual({
      kind: "set",
      values: ["north", "south", "east"]
    });
  });

  it("defaults to the full range or every value", () => {
    expect(defaultFilter(sales, "price")).toEqual({
      kind: "range",
      column: "price",
      min: 1.5,
      max: 5.5
    });
    expect(applyFilter(sales, defaultFilter(sales, "region")).rowCount).toBe(4);
  });
});

describe("applyFilter", () => {
  it("keeps rows inside an inclusive range", () => {
    const filtered = applyFilter(sales, { kind: "range", column: "units", min: 20, max: 30 });

    expect(filtered.rowCount).toBe(2);
    expect(filtered.columns[0].values).toEqual(["south", "north"]);
    expect(filtered.columns[2].values).toEqual([2.5, 3.5]);
  });

  it("falls back to the observed bounds and drops nulls", () => {
    const filtered = applyFilter(sales, { kind: "range", column: "units", min: 25 });

    expect(filtered.columns[1].values).toEqual([30, 40]);
  });

  it("keeps rows whose value is selected", () => {
    const filtered = applyFilter(sales, { kind: "set", column: "region", values: ["north"] });

    expect(filtered.columns[1].values).toEqual([10, 30]);
  });

  it("keeps null rows only when null is selected", () => {
    const filtered = applyFilter(sales, { kind: "set", column: "region", values: [null, "east"] });

    expect(filtered.columns[0].values).toEqual([null, "east"]);
  });

  it("returns no rows for a range over an all-null column", () => {
    const table: Table = {
      columns: [
        { name: "blank", kind: "null", values: [null, null] },
        { name: "id", kind: "integer", values: [1, 2] }
      ],
      rowCount: 2
    };

    const filtered = applyFilter(table, { kind: "range", column: "blank" });

    expect(filtered.rowCount).toBe(0);
    expect(filtered.columns[1].values).toEqual([]);
  });

  it("yields an empty table for an empty input", () => {
    expect(applyFilter(emptySales, { kind: "range", column: "units" })).toEqual(emptySales);
  });

  it("rejects filters that do not fit the column", () => {
    expect(() => applyFilter(sales, { kind: "range", column: "region" })).toThrow(
      'Column "region" is not numeric; use a value filter.'
    );
    expect(() => applyFilter(sales, { kind: "set", column: "units", values: [10] })).toThrow(
      PipelineError
    );
    expect(() => applyFilter(sales, { kind: "set", column: "nope", values: [] })).toThrow(
      'Unknown column "nope".'
    );
  });

  it("preserves row order and never adds rows", () => {
    const filtered = applyFilter(sales, { kind: "range", column: "price", min: 2, max: 5 });

    expect(filtered.rowCount).toBeLessThanOrEqual(sales.rowCount);
    expect(filtered.columns[2].values).toEqual([2.5, 3.5, 4.5]);
  });
});

describe("filter properties", () => {
  it("filtering twice equals filtering once", () => {
    fc.assert(
      fc.property(
        cells,
        fc.option(fc.integer({ min: -60, max: 60 }), { nil: undefined }),
        fc.option(fc.integer({ min: -60, max: 60 }), { nil: undefined }),
        (values, min, max) => {
          const table = measured(values);
          const spec = { kind: "range", column: "value", min, max } as const;
          const once = applyFilter(table, spec);
          expect(applyFilter(once, spec)).toEqual(once);
        }
      )
    );
    fc.assert(
      fc.property(cells, fc.subarray<CellValue>(["even", "odd", null]), (values, selected) => {
        const table = measured(values);
        const spec = { kind: "set", column: "label", values: selected } as const;
        const once = applyFilter(table, spec);
        expect(applyFilter(once, spec)).toEqual(once);
      })
    );
  });

  it("keeps every non-null row for the full observed range", () => {
    fc.assert(
      fc.property(cells, (values) => {
        const present = values.filter((value): value is number => value !== null);
        fc.pre(present.length > 0);
        const filtered = applyFilter(measured(values), {
          kind: "range",
          column: "value",
          min: Math.min(...present),
          max: Math.max(...present)
        });
        expect(filtered.columns[1].values).toEqual(present);
      })
    );
  });

  it("keeps nothing for an empty selection", () => {
    expect(applyFilter(sales, { kind: "set", column: "region", values: [] }).rowCount).toBe(0);
    fc.assert(
      fc.property(cells, (values) => {
        const filtered = applyFilter(measured(values), { kind: "set", column: "label", values: [] });
        expect(filtered.rowCount).toBe(0);
      })
    );
  });
});

describe("aggregate", () => {
  it("sums, counts and takes the maximum of a small grouping", () => {
    const table: Table = {
      columns: [
        { name: "g", kind: "text", values: ["a", "a", "b"] },
        { name: "v", kind: "integer", values: [1, 3, 5] }
      ],
      rowCount: 3
    };
    const spec = { groupBy: "g", target: "v" } as const;

    expect(aggregate(table, { ...spec, fn: "sum" })?.columns).toEqual([
      { name: "g", kind: "text", values: ["a", "b"] },
      { name: "v", kind: "integer", values: [4, 5] }
    ]);
    expect(aggregate(table, { ...spec, fn: "count" })?.columns[1].values).toEqual([2, 1]);
    expect(aggregate(table, { ...spec, fn: "max" })?.columns[1].values).toEqual([3, 5]);
  });

  it("sums per group in ascending key order with the null group last", () => {
    const grouped = aggregate(sales, { groupBy: "region", target: "units", fn: "sum" });

    expect(grouped).toEqual({
      columns: [
        { name: "region", kind: "text", values: ["east", "north", "south", null] },
        { name: "units", kind: "integer", values: [0, 40, 20, 40] }
      ],
      rowCount: 4
    });
  });

  it("ignores nulls in mean, max, min and count", () => {
    const spec = { groupBy: "region", target: "units" } as const;

    expect(aggregate(sales, { ...spec, fn: "mean" })?.columns[1]).toEqual({
      name: "units",
      kind: "float",
      values: [null, 20, 20, 40]
    });
    expect(aggregate(sales, { ...spec, fn: "max" })?.columns[1].values).toEqual([null, 30, 20, 40]);
    expect(aggregate(sales, { ...spec, fn: "min" })?.columns[1].values).toEqual([null, 10, 20, 40]);
    expect(aggregate(sales, { ...spec, fn: "count" })?.columns[1]).toEqual({
      name: "units",
      kind: "integer",
      values: [0, 2, 1, 1]
    });
  });

  it("does not double-count when grouping by the aggregated column", () => {
    const grouped = aggregate(sales, { groupBy: "units", target: "units", fn: "count" });

    expect(grouped?.columns.map((column) => column.name)).toEqual(["units", "units_count"]);
    expect(grouped?.columns[0].values).toEqual([10, 20, 30, 40, null]);
    expect(grouped?.columns[1].values).toEqual([1, 1, 1, 1, 0]);
  });

  it("skips aggregation for a non-numeric target", () => {
    expect(aggregate(sales, { groupBy: "units", target: "region", fn: "sum" })).toBeNull();
  });

  it("yields an empty grouping for an empty table", () => {
    const table: Table = {
      columns: [
        { name: "region", kind: "text", values: [] },
        { name: "units", kind: "integer", values: [] }
      ],
      rowCount: 0
    };

    expect(aggregate(table, { groupBy: "region", target: "units", fn: "sum" })?.rowCount).toBe(0);
  });

  it("orders mixed keys deterministically", () => {
    expect([3, null, 1, 2].sort(compareGroupKeys)).toEqual([1, 2, 3, null]);
    expect([true, false].sort(compareGroupKeys)).toEqual([false, true]);
    expect(["b", "B", "a"].sort(compareGroupKeys)).toEqual(["B", "a", "b"]);
  });
});

describe("runPipeline", () => {
  it("aggregates the filtered rows", () => {
    const result = runPipeline(
      sales,
      { kind: "set", column: "region", values: ["north", "south"] },
      { groupBy: "region", target: "price", fn: "sum" }
    );

    expect(result.filtered.rowCount).toBe(3);
    expect(result.grouped?.columns).toEqual([
      { name: "region", kind: "text", values: ["north", "south"] },
      { name: "price", kind: "float", values: [5, 2.5] }
    ]);
  });

  it("counts every non-null target exactly once across groups", () => {
    const result = runPipeline(
      sales,
      { kind: "range", column: "price" },
      { groupBy: "region", target: "units", fn: "count" }
    );
    const counts = result.grouped?.columns[1].values ?? [];
    const total = counts.reduce<number>((sum, value) => sum + (typeof value === "number" ? value : 0), 0);

    expect(total).toBe(4);
  });

  it("leaves grouping empty without an aggregate spec", () => {
    expect(runPipeline(sales, { kind: "range", column: "units" }).grouped).toBeNull();
  });

  it("suggests grouping by the first column over the first numeric one", () => {
    expect(defaultAggregate(sales)).toEqual({ groupBy: "region", target: "units", fn: "sum" });
    expect(defaultAggregate({ columns: [], rowCount: 0 })).toBeNull();
  });
});
