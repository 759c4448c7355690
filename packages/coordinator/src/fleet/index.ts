/**
 * Fleet coordination barrel exports.
 */

export { CommandDispatcher, type CommandDispatcherOptions, type CoordinatorSnapshot, type InboundEvent, type InvokeOptions } from "./command-dispatcher.js";
export { EntityStore, type EntityStoreEvent, type EntityStoreOptions } from "./entity-store.js";
export { SelectionTracker } from "./selection-tracker.js";
export { InFlightRegistry } from "./in-flight.js";
export {
  actionTargets,
  actionStatesEqual,
  computeActionState,
  disabledReason,
  enabledActions,
  UNCONDITIONAL_ACTIONS,
  type EnablementInput,
} from "./action-enablement.js";
export {
  applyMove,
  canMoveDown,
  canMoveUp,
  moveBottom,
  moveDown,
  moveTop,
  moveUp,
  type MoveDirection,
} from "./reorder.js";
export type * from "./types.js";
