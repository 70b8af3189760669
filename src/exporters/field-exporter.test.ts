import { describe, it, expect } from "vitest";
import { FieldExporter, fieldHeader } from "./field-exporter";

describe("FieldExporter", () => {
  it("should export the named fields as columns", () => {
    const exporter = new FieldExporter(
      ["a", "b", "c"],
      [{ a: 5, b: 10, c: 15 }],
    );

    expect(exporter.toList()).toEqual([
      ["a", "b", "c"],
      ["5", "10", "15"],
    ]);
  });

  it("should render null and missing values as empty cells", () => {
    const exporter = new FieldExporter(
      ["a", "b", "c"],
      [
        { a: 5, b: null, c: 15 },
        { a: 1, b: 2 },
      ],
    );

    expect(exporter.toList()).toEqual([
      ["a", "b", "c"],
      ["5", "", "15"],
      ["1", "2", ""],
    ]);
  });

  it("should keep falsy values that are present", () => {
    const exporter = new FieldExporter(
      ["count", "active", "note"],
      [{ count: 0, active: false, note: "" }],
    );

    expect(exporter.toList()[1]).toEqual(["0", "false", ""]);
  });

  it("should ignore keys that are not listed as fields", () => {
    const exporter = new FieldExporter(["a"], [{ a: "x", extra: "y" }]);

    expect(exporter.toList()).toEqual([["a"], ["x"]]);
  });

  it("should not read inherited properties", () => {
    const exporter = new FieldExporter(["toString"], [{}]);

    expect(exporter.toList()).toEqual([["toString"], [""]]);
  });

  it("should apply the header order by field name", () => {
    const exporter = new FieldExporter(
      ["a", "b", "c"],
      [{ a: 1, b: 2, c: 3 }],
      { headerOrder: ["c"] },
    );

    expect(exporter.toList()).toEqual([
      ["c", "a", "b"],
      ["3", "1", "2"],
    ]);
  });

  it("should repeat columns for repeated field names", () => {
    const exporter = new FieldExporter(["a", "a"], [{ a: 7 }]);

    expect(exporter.toList()).toEqual([
      ["a", "a"],
      ["7", "7"],
    ]);
  });

  it("should yield the same rows lazily", () => {
    const exporter = new FieldExporter(["a", "b"], [{ a: 1 }, { b: 2 }]);

    expect(Array.from(exporter.iterRows())).toEqual(exporter.toList());
  });

  it("should not be affected by later changes to the field list", () => {
    const fields = ["a"];
    const exporter = new FieldExporter(fields, [{ a: 1, b: 2 }]);

    fields.push("b");

    expect(exporter.getHeaderLabels()).toEqual(["a"]);
  });

  it("should not be affected by later changes to the record list", () => {
    const records = [{ a: 1 }];
    const exporter = new FieldExporter(["a"], records);

    records.push({ a: 2 });

    expect(exporter.toList()).toEqual([["a"], ["1"]]);
  });
});

describe("fieldHeader", () => {
  it("should label the column with the field name", () => {
    const header = fieldHeader("qty");

    expect(header.label).toBe("qty");
    expect(header.extract({ qty: 12 })).toBe("12");
    expect(header.extract({})).toBe("");
  });
});
