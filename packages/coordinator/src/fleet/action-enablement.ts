/**
 * Action Enablement Engine - which actions are valid right now.
 *
 * Pure function of (fleet order, selection, in-flight record, image owners).
 * Each action is judged on its own by two checks:
 *
 * 1. Its base rule (selection size, position of the selection, images).
 * 2. The conflict rule: an action is disabled while any server it would
 *    target already has an action in flight. An open export also blocks
 *    the next export, even when every image it carries is orphaned.
 *
 * find, add, refresh and quit are always enabled and never conflict.
 */

import { ACTION_NAMES, type ActionName } from "../schema.js";
import { canMoveDown, canMoveUp } from "./reorder.js";
import type { ActionState } from "./types.js";

export interface EnablementInput {
  fleet: readonly string[];
  selection: ReadonlySet<string>;
  /** Server id -> action pending against it */
  inFlight: ReadonlyMap<string, ActionName>;
  /** Distinct owners of the images in the collection, orphans included */
  imageOwners: readonly string[];
  /** Actions with a dispatch still open, whatever servers it holds */
  openActions: ReadonlySet<ActionName>;
}

export const UNCONDITIONAL_ACTIONS: ReadonlySet<ActionName> = new Set<ActionName>([
  "find",
  "add",
  "refresh",
  "quit",
]);

/**
 * Servers an action would act on, in fleet order. `reference` lists its
 * source first, then every other server it copies to. `export` covers the
 * image owners still in the fleet.
 */
export function actionTargets(action: ActionName, input: EnablementInput): string[] {
  switch (action) {
    case "find":
    case "add":
    case "refresh":
    case "quit":
      return [];
    case "reference": {
      const source = input.fleet.filter((id) => input.selection.has(id));
      return [...source, ...input.fleet.filter((id) => !input.selection.has(id))];
    }
    case "export": {
      const owners = new Set(input.imageOwners);
      return input.fleet.filter((id) => owners.has(id));
    }
    default:
      return input.fleet.filter((id) => input.selection.has(id));
  }
}

function baseRule(action: ActionName, input: EnablementInput): string | null {
  const { fleet, selection } = input;
  const nothingSelected = selection.size === 0 ? "no servers selected" : null;

  switch (action) {
    case "remove":
    case "identify":
    case "configure":
    case "capture":
    case "copy":
    case "clear":
      return nothingSelected;
    case "reference":
      if (selection.size !== 1) return "select exactly one server to copy settings from";
      if (fleet.length < 2) return "there are no other servers to copy settings to";
      return null;
    case "moveTop":
    case "moveUp":
      if (nothingSelected) return nothingSelected;
      return canMoveUp(fleet, selection) ? null : "selection is already at the top";
    case "moveBottom":
    case "moveDown":
      if (nothingSelected) return nothingSelected;
      return canMoveDown(fleet, selection) ? null : "selection is already at the bottom";
    case "export":
      return input.imageOwners.length === 0 ? "there are no images" : null;
    case "find":
    case "add":
    case "refresh":
    case "quit":
      return null;
  }
}

/**
 * Why an action is disabled, or null when it is enabled.
 */
export function disabledReason(action: ActionName, input: EnablementInput): string | null {
  const reason = baseRule(action, input);
  if (reason !== null || UNCONDITIONAL_ACTIONS.has(action)) {
    return reason;
  }

  const busy = actionTargets(action, input).find((id) => input.inFlight.has(id));
  if (busy !== undefined) {
    return `${busy} is busy with ${input.inFlight.get(busy)}`;
  }
  // export hands over the whole collection, orphans included
  if (action === "export" && input.openActions.has("export")) {
    return "an export is already in flight";
  }
  return null;
}

export function computeActionState(input: EnablementInput): ActionState {
  const enabled = (action: ActionName): boolean => disabledReason(action, input) === null;
  return {
    find: enabled("find"),
    add: enabled("add"),
    remove: enabled("remove"),
    moveTop: enabled("moveTop"),
    moveUp: enabled("moveUp"),
    moveDown: enabled("moveDown"),
    moveBottom: enabled("moveBottom"),
    identify: enabled("identify"),
    configure: enabled("configure"),
    reference: enabled("reference"),
    capture: enabled("capture"),
    copy: enabled("copy"),
    export: enabled("export"),
    clear: enabled("clear"),
    refresh: enabled("refresh"),
    quit: enabled("quit"),
  };
}

export function actionStatesEqual(a: ActionState, b: ActionState): boolean {
  return ACTION_NAMES.every((action) => a[action] === b[action]);
}

/**
 * Names of the enabled actions, in toolbar order.
 */
export function enabledActions(state: ActionState): ActionName[] {
  return ACTION_NAMES.filter((action) => state[action]);
}
