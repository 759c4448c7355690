/**
 * Property tests for fleet reordering and selection identity.
 *
 * Invariants under test:
 *   1. Every move returns a permutation of its input.
 *   2. Every move keeps the relative order of selected entries and of
 *      unselected entries.
 *   3. moveTop then moveBottom restores the complement's order; the
 *      selection ends as a contiguous block at the top, then the bottom.
 *   4. moveTop is idempotent.
 *   5. canMoveUp/canMoveDown are false exactly when the move changes nothing.
 *   6. Reorders through the dispatcher never change which ids are selected.
 *   7. Removal leaves no selected or in-flight id outside the fleet.
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { applyMove, canMoveDown, canMoveUp, moveBottom, moveTop, type MoveDirection } from "./reorder.js";
import { createTestDispatcher } from "../test-utils/fleet-helpers.js";

const fleetWithSelection = fc
  .uniqueArray(fc.nat(99), { minLength: 1, maxLength: 20 })
  .chain((numbers) => {
    const ids = numbers.map((n) => `S${n}`);
    return fc.tuple(fc.constant(ids), fc.subarray(ids));
  });

const direction = fc.constantFrom<MoveDirection>("top", "up", "down", "bottom");

const MOVE_ACTIONS = {
  top: "moveTop",
  up: "moveUp",
  down: "moveDown",
  bottom: "moveBottom",
} as const;

function sorted(ids: readonly string[]): string[] {
  return [...ids].sort();
}

describe("reorder properties", () => {
  it("returns a permutation that keeps both groups in relative order", () => {
    fc.assert(
      fc.property(fleetWithSelection, direction, ([ids, picked], dir) => {
        const selected = new Set(picked);
        const out = applyMove(dir, ids, selected);

        expect(sorted(out)).toEqual(sorted(ids));
        expect(out.filter((id) => selected.has(id))).toEqual(ids.filter((id) => selected.has(id)));
        expect(out.filter((id) => !selected.has(id))).toEqual(ids.filter((id) => !selected.has(id)));
      })
    );
  });

  it("moveTop then moveBottom restores the complement and keeps the block contiguous", () => {
    fc.assert(
      fc.property(fleetWithSelection, ([ids, picked]) => {
        const selected = new Set(picked);
        const complement = ids.filter((id) => !selected.has(id));

        const top = moveTop(ids, selected);
        expect(top.slice(0, picked.length).every((id) => selected.has(id))).toBe(true);

        const bottom = moveBottom(top, selected);
        expect(bottom.slice(ids.length - picked.length).every((id) => selected.has(id))).toBe(true);
        expect(bottom.slice(0, ids.length - picked.length)).toEqual(complement);
      })
    );
  });

  it("moveTop is idempotent", () => {
    fc.assert(
      fc.property(fleetWithSelection, ([ids, picked]) => {
        const selected = new Set(picked);
        const once = moveTop(ids, selected);
        expect(moveTop(once, selected)).toEqual(once);
      })
    );
  });

  it("canMoveUp and canMoveDown predict whether a step changes anything", () => {
    fc.assert(
      fc.property(fleetWithSelection, ([ids, picked]) => {
        const selected = new Set(picked);
        expect(canMoveUp(ids, selected)).toBe(applyMove("up", ids, selected).join() !== ids.join());
        expect(canMoveDown(ids, selected)).toBe(applyMove("down", ids, selected).join() !== ids.join());
      })
    );
  });

  it("keeps the same selected ids through any sequence of reorders", () => {
    fc.assert(
      fc.property(fleetWithSelection, fc.array(direction, { maxLength: 10 }), ([ids, picked], moves) => {
        const { dispatcher } = createTestDispatcher(ids);
        dispatcher.select(picked);

        for (const dir of moves) {
          const action = MOVE_ACTIONS[dir];
          if (dispatcher.isEnabled(action)) dispatcher.invoke(action);
        }

        expect(sorted(dispatcher.getSelection())).toEqual(sorted(picked));
        expect(sorted(dispatcher.getFleet().map((entry) => entry.id))).toEqual(sorted(ids));
      })
    );
  });

  it("leaves no reference to a removed id", () => {
    fc.assert(
      fc.property(fleetWithSelection, fc.subarray([0, 1, 2, 3, 4, 5]), ([ids, picked], victims) => {
        const { dispatcher } = createTestDispatcher(ids);
        dispatcher.select(picked);
        if (dispatcher.isEnabled("capture")) dispatcher.invoke("capture");

        dispatcher.remove(victims.filter((index) => index < ids.length).map((index) => ids[index]));

        const fleet = new Set(dispatcher.getFleet().map((entry) => entry.id));
        expect(dispatcher.getSelection().every((id) => fleet.has(id))).toBe(true);
        expect(Array.from(dispatcher.getInFlight().keys()).every((id) => fleet.has(id))).toBe(true);
      })
    );
  });
});
