import { describe, it, expect } from "vitest";
import { InFlightRegistry } from "./in-flight.js";
import { InvariantViolation } from "../utils/invariant.js";

describe("InFlightRegistry", () => {
  it("numbers dispatches from 1", () => {
    const registry = new InFlightRegistry();
    expect(registry.begin("capture", ["A", "B"])).toBe(1);
    expect(registry.begin("identify", ["C"])).toBe(2);
    expect(registry.pending()).toEqual(
      new Map([
        ["A", "capture"],
        ["B", "capture"],
        ["C", "identify"],
      ])
    );
    expect(registry.openDispatches).toBe(2);
  });

  it("refuses to mark a busy server twice", () => {
    const registry = new InFlightRegistry();
    registry.begin("capture", ["A"]);
    expect(() => registry.begin("identify", ["B", "A"])).toThrow(InvariantViolation);
  });

  it("settles a dispatch once", () => {
    const registry = new InFlightRegistry();
    const id = registry.begin("capture", ["A", "B"]);

    expect(registry.actionFor(id)).toBe("capture");
    expect(registry.settle(id)).toEqual(["A", "B"]);
    expect(registry.has("A")).toBe(false);
    expect(registry.settle(id)).toBeNull();
    expect(registry.actionFor(id)).toBeUndefined();
  });

  it("detaches forgotten servers but keeps the dispatch open", () => {
    const registry = new InFlightRegistry();
    const id = registry.begin("capture", ["A", "B"]);

    expect(registry.forget(["A", "Z"])).toBe(true);
    expect(registry.has("A")).toBe(false);
    expect(registry.openDispatches).toBe(1);
    expect(registry.settle(id)).toEqual(["B"]);
  });

  it("lists open actions, including dispatches that hold no server", () => {
    const registry = new InFlightRegistry();
    const exportId = registry.begin("export", []);
    registry.begin("capture", ["A"]);
    registry.forget(["A"]);

    expect(registry.openActions()).toEqual(new Set(["export", "capture"]));
    registry.settle(exportId);
    expect(registry.openActions()).toEqual(new Set(["capture"]));
  });

  it("reports no change when forgetting idle servers", () => {
    const registry = new InFlightRegistry();
    expect(registry.forget(["A"])).toBe(false);
  });
});
