import { describe, it, expect } from "vitest";
import { Header, renderCell } from "./header";

describe("Header", () => {
  it("should expose its label and extractor", () => {
    const header = new Header<{ name: string }>("Name", (record) => record.name);

    expect(header.label).toBe("Name");
    expect(header.extract({ name: "Ada" })).toBe("Ada");
  });

  it("should be frozen", () => {
    const header = new Header<string>("word", (word) => word);

    expect(Object.isFrozen(header)).toBe(true);
  });
});

describe("renderCell", () => {
  it("should render absent values as empty strings", () => {
    expect(renderCell(undefined)).toBe("");
    expect(renderCell(null)).toBe("");
  });

  it("should render other values with their default text", () => {
    expect(renderCell(5)).toBe("5");
    expect(renderCell(2.5)).toBe("2.5");
    expect(renderCell(0)).toBe("0");
    expect(renderCell(false)).toBe("false");
    expect(renderCell("")).toBe("");
    expect(renderCell("text")).toBe("text");
    expect(renderCell(["x", "y"])).toBe("x,y");
  });
});
