import { describe, it, expect } from "vitest";
import { PassthroughExporter } from "./passthrough-exporter";

describe("PassthroughExporter", () => {
  it("should re-emit every row unchanged", () => {
    const exporter = new PassthroughExporter([
      ["a", "b", "c"],
      ["1", "2", "3"],
      ["2", "3", "4"],
    ]);

    expect(exporter.toList()).toEqual([
      ["a", "b", "c"],
      ["1", "2", "3"],
      ["2", "3", "4"],
    ]);
  });

  it("should keep empty and short rows as they are", () => {
    const exporter = new PassthroughExporter([
      ["a", "b", "c"],
      [],
      ["d", "e", "f"],
      ["g"],
    ]);

    expect(exporter.toList()).toEqual([["a", "b", "c"], [], ["d", "e", "f"], ["g"]]);
  });

  it("should ignore a header order preference", () => {
    const exporter = new PassthroughExporter(
      [
        ["a", "b"],
        ["1", "2"],
      ],
      { headerOrder: ["b", "a"] },
    );

    expect(exporter.toList()).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
  });

  it("should produce an empty export from an empty table", () => {
    expect(new PassthroughExporter([]).toList()).toEqual([]);
  });

  it("should not be affected by later changes to the input table", () => {
    const table = [["a"], ["1"]];
    const exporter = new PassthroughExporter(table);

    table[1].push("2");
    table.push(["3"]);

    expect(exporter.toList()).toEqual([["a"], ["1"]]);
  });

  it("should yield the same rows lazily", () => {
    const exporter = new PassthroughExporter([["a"], [], ["b"]]);

    expect(Array.from(exporter.iterRows())).toEqual(exporter.toList());
  });
});
