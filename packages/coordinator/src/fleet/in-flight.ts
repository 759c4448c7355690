/**
 * In-flight bookkeeping: which server has which action pending, grouped by
 * the dispatch that started it.
 */

import type { ActionName } from "../schema.js";
import { invariant } from "../utils/invariant.js";

interface PendingDispatch {
  action: ActionName;
  ids: Set<string>;
}

export class InFlightRegistry {
  private byServer = new Map<string, { dispatchId: number; action: ActionName }>();
  private dispatches = new Map<number, PendingDispatch>();
  private nextDispatchId = 1;

  /**
   * Mark servers as busy with a new dispatch.
   * @returns The dispatch id
   */
  begin(action: ActionName, ids: readonly string[]): number {
    for (const id of ids) {
      invariant(!this.byServer.has(id), `${id} already has an action in flight`);
    }
    const dispatchId = this.nextDispatchId++;
    this.dispatches.set(dispatchId, { action, ids: new Set(ids) });
    for (const id of ids) {
      this.byServer.set(id, { dispatchId, action });
    }
    return dispatchId;
  }

  /**
   * Close a dispatch.
   * @returns The ids it still held (removed servers are already detached),
   *   or null when the dispatch is unknown or already settled
   */
  settle(dispatchId: number): string[] | null {
    const dispatch = this.dispatches.get(dispatchId);
    if (!dispatch) return null;

    this.dispatches.delete(dispatchId);
    for (const id of dispatch.ids) {
      this.byServer.delete(id);
    }
    return Array.from(dispatch.ids);
  }

  /**
   * Detach servers from whatever they were waiting on. The dispatch itself
   * stays open so its completion is still recognised.
   */
  forget(ids: Iterable<string>): boolean {
    let changed = false;
    for (const id of ids) {
      const entry = this.byServer.get(id);
      if (!entry) continue;
      this.byServer.delete(id);
      this.dispatches.get(entry.dispatchId)?.ids.delete(id);
      changed = true;
    }
    return changed;
  }

  actionFor(dispatchId: number): ActionName | undefined {
    return this.dispatches.get(dispatchId)?.action;
  }

  has(id: string): boolean {
    return this.byServer.has(id);
  }

  /**
   * Server id -> pending action.
   */
  pending(): Map<string, ActionName> {
    const result = new Map<string, ActionName>();
    for (const [id, { action }] of this.byServer) {
      result.set(id, action);
    }
    return result;
  }

  /**
   * Actions with at least one open dispatch, including dispatches whose
   * servers were all detached or that never held a server.
   */
  openActions(): Set<ActionName> {
    return new Set(Array.from(this.dispatches.values(), (dispatch) => dispatch.action));
  }

  get openDispatches(): number {
    return this.dispatches.size;
  }
}
