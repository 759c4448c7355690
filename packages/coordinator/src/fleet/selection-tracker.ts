/**
 * Selection Tracker - the set of selected fleet ids plus the range anchor.
 *
 * Stores ids, never positions, so reorders leave it untouched. Reads fleet
 * order through a FleetOrder view; every mutation goes through `replace`,
 * which clamps to ids present in the fleet.
 */

import { invariant } from "../utils/invariant.js";
import type { FleetOrder, SelectionChangedEvent } from "./types.js";

export class SelectionTracker {
  private selected = new Set<string>();
  private anchorId: string | null = null;
  private listeners = new Set<(event: SelectionChangedEvent) => void>();

  constructor(private readonly fleet: FleetOrder) {}

  /**
   * Replace the selection. Unknown ids are dropped silently; the anchor moves
   * to the last known id given (or clears when there is none).
   * @returns true if the selected set changed
   */
  setSelection(ids: Iterable<string>): boolean {
    const known = Array.from(ids).filter((id) => this.fleet.has(id));
    this.anchorId = known.length > 0 ? known[known.length - 1] : null;
    return this.replace(new Set(known));
  }

  /**
   * Flip one id in or out of the selection and anchor on it.
   */
  toggle(id: string): boolean {
    if (!this.fleet.has(id)) return false;

    const next = new Set(this.selected);
    if (next.has(id)) {
      next.delete(id);
    } else {
      next.add(id);
    }
    this.anchorId = id;
    return this.replace(next);
  }

  /**
   * Select the contiguous block of fleet positions between the anchor and
   * `id`, inclusive. The anchor stays where it was. Without an anchor this is
   * a plain single selection.
   */
  extendRangeTo(id: string): boolean {
    if (!this.fleet.has(id)) return false;
    if (this.anchorId === null || !this.fleet.has(this.anchorId)) {
      return this.setSelection([id]);
    }

    const from = this.fleet.indexOf(this.anchorId);
    const to = this.fleet.indexOf(id);
    const [start, end] = from <= to ? [from, to] : [to, from];
    return this.replace(new Set(this.fleet.ids().slice(start, end + 1)));
  }

  selectAll(): boolean {
    return this.setSelection(this.fleet.ids());
  }

  clear(): boolean {
    return this.setSelection([]);
  }

  /**
   * Drop ids that have left the fleet. Called after removals.
   */
  prune(): boolean {
    if (this.anchorId !== null && !this.fleet.has(this.anchorId)) {
      this.anchorId = null;
    }
    const kept = Array.from(this.selected).filter((id) => this.fleet.has(id));
    return this.replace(new Set(kept));
  }

  /**
   * Selected ids in fleet order.
   */
  selection(): string[] {
    return this.fleet.ids().filter((id) => this.selected.has(id));
  }

  has(id: string): boolean {
    return this.selected.has(id);
  }

  get size(): number {
    return this.selected.size;
  }

  get anchor(): string | null {
    return this.anchorId;
  }

  subscribe(listener: (event: SelectionChangedEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private replace(next: Set<string>): boolean {
    for (const id of next) {
      invariant(this.fleet.has(id), `selection refers to unknown id ${id}`);
    }
    if (next.size === this.selected.size && Array.from(next).every((id) => this.selected.has(id))) {
      return false;
    }

    this.selected = next;
    const event: SelectionChangedEvent = { type: "selection.changed", selection: this.selection() };
    for (const listener of this.listeners) {
      listener(event);
    }
    return true;
  }
}
