import { describe, it, expect } from "vitest";
import {
  actionTargets,
  computeActionState,
  disabledReason,
  enabledActions,
  type EnablementInput,
} from "./action-enablement.js";
import type { ActionName } from "../schema.js";

function input(overrides: Partial<EnablementInput> = {}): EnablementInput {
  return {
    fleet: ["A", "B", "C"],
    selection: new Set<string>(),
    inFlight: new Map<string, ActionName>(),
    imageOwners: [],
    openActions: new Set<ActionName>(),
    ...overrides,
  };
}

describe("computeActionState", () => {
  it("enables only the unconditional actions on an empty fleet", () => {
    const state = computeActionState(input({ fleet: [] }));
    expect(enabledActions(state)).toEqual(["find", "add", "refresh", "quit"]);
  });

  it("enables selection actions once something is selected", () => {
    const state = computeActionState(input({ selection: new Set(["B"]) }));
    expect(enabledActions(state)).toEqual([
      "find",
      "add",
      "remove",
      "moveTop",
      "moveUp",
      "moveDown",
      "moveBottom",
      "identify",
      "configure",
      "reference",
      "capture",
      "copy",
      "clear",
      "refresh",
      "quit",
    ]);
  });

  it("keeps unconditional actions enabled while everything is busy", () => {
    const state = computeActionState(
      input({
        selection: new Set(["A", "B", "C"]),
        inFlight: new Map<string, ActionName>([
          ["A", "capture"],
          ["B", "capture"],
          ["C", "capture"],
        ]),
      })
    );
    expect(enabledActions(state)).toEqual(["find", "add", "refresh", "quit"]);
  });
});

describe("reference", () => {
  it("is disabled for a single-server fleet", () => {
    expect(disabledReason("reference", input({ fleet: ["A"], selection: new Set(["A"]) }))).toBe(
      "there are no other servers to copy settings to"
    );
  });

  it("is enabled with two servers and one selected", () => {
    expect(disabledReason("reference", input({ fleet: ["A", "B"], selection: new Set(["B"]) }))).toBeNull();
  });

  it("needs exactly one source", () => {
    expect(disabledReason("reference", input({ selection: new Set(["A", "B"]) }))).toBe(
      "select exactly one server to copy settings from"
    );
  });

  it("conflicts with work pending on any server it copies to", () => {
    expect(
      disabledReason(
        "reference",
        input({ selection: new Set(["A"]), inFlight: new Map<string, ActionName>([["C", "identify"]]) })
      )
    ).toBe("C is busy with identify");
  });

  it("targets the source first, then the rest in fleet order", () => {
    expect(actionTargets("reference", input({ selection: new Set(["B"]) }))).toEqual(["B", "A", "C"]);
  });
});

describe("moves", () => {
  it("reports a selection already at the top", () => {
    const state = input({ selection: new Set(["A", "B"]) });
    expect(disabledReason("moveUp", state)).toBe("selection is already at the top");
    expect(disabledReason("moveTop", state)).toBe("selection is already at the top");
    expect(disabledReason("moveDown", state)).toBeNull();
  });

  it("reports a selection already at the bottom", () => {
    const state = input({ selection: new Set(["C"]) });
    expect(disabledReason("moveDown", state)).toBe("selection is already at the bottom");
    expect(disabledReason("moveBottom", state)).toBe("selection is already at the bottom");
  });

  it("is disabled while a selected server is busy", () => {
    expect(
      disabledReason(
        "moveUp",
        input({ selection: new Set(["C"]), inFlight: new Map<string, ActionName>([["C", "capture"]]) })
      )
    ).toBe("C is busy with capture");
  });
});

describe("conflict rule", () => {
  it("allows an action on a selection disjoint from the busy servers", () => {
    const state = input({ selection: new Set(["A"]), inFlight: new Map<string, ActionName>([["B", "capture"]]) });
    expect(disabledReason("remove", state)).toBeNull();
    expect(disabledReason("identify", state)).toBeNull();
  });

  it("rejects an action overlapping a busy server", () => {
    const state = input({
      selection: new Set(["A", "B"]),
      inFlight: new Map<string, ActionName>([["B", "capture"]]),
    });
    expect(disabledReason("capture", state)).toBe("B is busy with capture");
  });
});

describe("images", () => {
  it("disables export without images", () => {
    expect(disabledReason("export", input())).toBe("there are no images");
  });

  it("exports regardless of selection", () => {
    expect(disabledReason("export", input({ imageOwners: ["B"] }))).toBeNull();
  });

  it("targets only owners still in the fleet", () => {
    expect(actionTargets("export", input({ imageOwners: ["X", "C", "A"] }))).toEqual(["A", "C"]);
  });

  it("waits for a busy owner before exporting", () => {
    expect(
      disabledReason(
        "export",
        input({ imageOwners: ["A"], inFlight: new Map<string, ActionName>([["A", "capture"]]) })
      )
    ).toBe("A is busy with capture");
  });

  it("exports orphans even when every owner has been removed", () => {
    expect(disabledReason("export", input({ fleet: [], imageOwners: ["X"] }))).toBeNull();
  });

  it("blocks a second export while one is open, even for orphans only", () => {
    const state = input({ fleet: [], imageOwners: ["X"], openActions: new Set<ActionName>(["export"]) });
    expect(disabledReason("export", state)).toBe("an export is already in flight");
  });

  it("needs a selection to clear", () => {
    expect(disabledReason("clear", input({ imageOwners: ["A"] }))).toBe("no servers selected");
  });
});
