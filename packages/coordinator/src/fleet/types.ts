/**
 * Shared coordinator types: derived action state, notifications and the
 * collaborator contracts the coordinator talks to.
 */

import type {
  ActionName,
  ActionOutcome,
  ActionResult,
  CameraSettings,
  ImageActionName,
  ImageRecord,
  ServerActionName,
  ServerEntry,
  ServerEntryInput,
  ServerReportInput,
  StatusUpdate,
} from "../schema.js";

// =============================================================================
// Derived state
// =============================================================================

/** Enabled flag per action. Always derived, never set directly. */
export type ActionState = Record<ActionName, boolean>;

/** Read-only view of fleet order, shared with the selection tracker. */
export interface FleetOrder {
  ids(): string[];
  has(id: string): boolean;
  indexOf(id: string): number;
}

// =============================================================================
// Notifications (each carries a full snapshot, never a diff)
// =============================================================================

export interface FleetChangedEvent {
  type: "fleet.changed";
  fleet: ServerEntry[];
}

export interface SelectionChangedEvent {
  type: "selection.changed";
  /** Selected ids in fleet order */
  selection: string[];
}

export interface ImagesChangedEvent {
  type: "images.changed";
  images: ImageRecord[];
}

export interface ActionStateChangedEvent {
  type: "actions.changed";
  actions: ActionState;
}

export interface ActionCompletedEvent {
  type: "action.completed";
  dispatchId: number;
  action: ActionName;
  /** Outcomes exactly as the collaborator reported them */
  outcomes: ActionOutcome[];
}

export type CoordinatorEvent =
  | FleetChangedEvent
  | SelectionChangedEvent
  | ImagesChangedEvent
  | ActionStateChangedEvent
  | ActionCompletedEvent;

export type CoordinatorListener = (event: CoordinatorEvent) => void;

// =============================================================================
// Collaborators
// =============================================================================

export interface ServerActionRequest {
  dispatchId: number;
  action: ServerActionName;
  /** Every server the batch targets */
  ids: string[];
  /** `configure` only */
  settings?: CameraSettings;
  /** `reference` only: the server whose settings are copied to the others */
  sourceId?: string;
}

export interface ImageActionRequest {
  dispatchId: number;
  action: ImageActionName;
  /** Owners whose images are affected, orphaned owners included */
  ids: string[];
  images: ImageRecord[];
}

/** Runs batch actions on the servers. */
export interface ActionExecutor {
  execute(request: ServerActionRequest): Promise<ActionResult>;
}

/** Locates servers and polls their status. */
export interface DiscoveryService {
  discover(): Promise<ServerEntryInput[]>;
  refresh(ids: string[]): Promise<StatusUpdate[]>;
  /** Settings and clock of every server that answers; silent servers are left out */
  status(ids: string[]): Promise<ServerReportInput[]>;
}

/** Exports and clears captured images. */
export interface ImagePipeline {
  export(request: ImageActionRequest): Promise<ActionResult>;
  clear(request: ImageActionRequest): Promise<ActionResult>;
}

/** Returned by a successful `invoke`. */
export interface DispatchReceipt {
  action: ActionName;
  /** Ids the action targeted (and, for async actions, marked in flight) */
  ids: string[];
  /** Present when the action was handed to a collaborator */
  dispatchId?: number;
}
