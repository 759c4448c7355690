import { describe, it, expect } from "vitest";
import { formatTable } from "./table.js";

describe("formatTable", () => {
  it("pads columns and rules off the header", () => {
    expect(
      formatTable([
        ["Address", "Status"],
        ["192.168.0.1", "online"],
        ["192.168.0.20", "unreachable"],
      ])
    ).toEqual([
      "Address       Status",
      "------------  -----------",
      "192.168.0.1   online",
      "192.168.0.20  unreachable",
    ]);
  });

  it("treats missing cells as empty", () => {
    expect(formatTable([["A", "B"], ["1"]])).toEqual(["A  B", "-  -", "1"]);
  });

  it("returns nothing for no rows", () => {
    expect(formatTable([])).toEqual([]);
  });
});
