/**
 * Entity Store - owns the ordered fleet list and the image collection.
 *
 * Fleet order is the only notion of position: entries live in a map keyed
 * by id and `order` lists the ids. Images keep a weak reference to their
 * owner and survive its removal as orphans until the owner comes back.
 */

import type { ImageRecord, ServerEntry, ServerStatus } from "../schema.js";
import { DuplicateIdentifierError, UnknownOwnerError } from "../utils/errors.js";
import { invariant } from "../utils/invariant.js";
import type { FleetChangedEvent, FleetOrder, ImagesChangedEvent } from "./types.js";

export type EntityStoreEvent = FleetChangedEvent | ImagesChangedEvent;

export interface EntityStoreOptions {
  /** Reject images whose owner is not in the fleet */
  strictImages?: boolean;
}

export class EntityStore implements FleetOrder {
  private order: string[] = [];
  private entries = new Map<string, ServerEntry>();
  private imageList: ImageRecord[] = [];
  private listeners = new Set<(event: EntityStoreEvent) => void>();
  private readonly strictImages: boolean;

  constructor(options: EntityStoreOptions = {}) {
    this.strictImages = options.strictImages ?? false;
  }

  // ===========================================================================
  // Fleet
  // ===========================================================================

  /**
   * Append a server to the end of the fleet. Images it owned before a
   * removal stop being orphans.
   * @throws DuplicateIdentifierError if the id is already present
   */
  add(entry: ServerEntry): void {
    if (this.entries.has(entry.id)) {
      throw new DuplicateIdentifierError(entry.id);
    }
    this.entries.set(entry.id, { ...entry });
    this.order.push(entry.id);
    this.emitFleet();

    if (this.imageList.some((image) => image.ownerId === entry.id && image.orphaned)) {
      this.imageList = this.imageList.map((image) =>
        image.ownerId === entry.id ? { ...image, orphaned: false } : image
      );
      this.emitImages();
    }
  }

  /**
   * Remove servers by id. Unknown ids are ignored. Images owned by removed
   * servers are marked orphaned, not deleted.
   * @returns Ids that were actually removed, in former fleet order
   */
  remove(ids: Iterable<string>): string[] {
    const targets = new Set(ids);
    const removed = this.order.filter((id) => targets.has(id));
    if (removed.length === 0) return [];

    for (const id of removed) {
      this.entries.delete(id);
    }
    this.order = this.order.filter((id) => this.entries.has(id));
    this.emitFleet();

    const gone = new Set(removed);
    let orphaned = false;
    this.imageList = this.imageList.map((image) => {
      if (!image.orphaned && gone.has(image.ownerId)) {
        orphaned = true;
        return { ...image, orphaned: true };
      }
      return image;
    });
    if (orphaned) this.emitImages();

    return removed;
  }

  /**
   * Record a status report. No-op for unknown ids or unchanged status.
   */
  updateStatus(id: string, status: ServerStatus): boolean {
    const entry = this.entries.get(id);
    if (!entry || entry.status === status) return false;

    this.entries.set(id, { ...entry, status });
    this.emitFleet();
    return true;
  }

  /**
   * Replace fleet order with a permutation of the current ids.
   * @returns false when the order is unchanged
   */
  replaceOrder(ids: readonly string[]): boolean {
    invariant(
      ids.length === this.order.length && ids.every((id) => this.entries.has(id)) && new Set(ids).size === ids.length,
      "reorder must be a permutation of the fleet"
    );
    if (ids.every((id, index) => this.order[index] === id)) return false;

    this.order = [...ids];
    this.emitFleet();
    return true;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): ServerEntry | undefined {
    return this.entries.get(id);
  }

  indexOf(id: string): number {
    return this.order.indexOf(id);
  }

  ids(): string[] {
    return [...this.order];
  }

  list(): ServerEntry[] {
    return this.order.map((id) => {
      const entry = this.entries.get(id);
      invariant(entry, `fleet order lists unknown id ${id}`);
      return entry;
    });
  }

  get size(): number {
    return this.order.length;
  }

  // ===========================================================================
  // Images
  // ===========================================================================

  /**
   * Append an image. Its orphaned flag is derived from the fleet.
   * @throws DuplicateIdentifierError if an image with the same id exists
   * @throws UnknownOwnerError in strict mode when the owner is not in the fleet
   */
  addImage(record: ImageRecord): void {
    if (this.imageList.some((image) => image.id === record.id)) {
      throw new DuplicateIdentifierError(record.id, "image");
    }
    const ownerPresent = this.entries.has(record.ownerId);
    if (!ownerPresent && this.strictImages) {
      throw new UnknownOwnerError(record.id, record.ownerId);
    }
    this.imageList.push({ ...record, orphaned: !ownerPresent });
    this.emitImages();
  }

  /**
   * Drop every image owned by the given servers, orphans included.
   * @returns The removed records
   */
  removeImages(ownerIds: Iterable<string>): ImageRecord[] {
    const owners = new Set(ownerIds);
    const removed = this.imageList.filter((image) => owners.has(image.ownerId));
    if (removed.length === 0) return [];

    this.imageList = this.imageList.filter((image) => !owners.has(image.ownerId));
    this.emitImages();
    return removed;
  }

  images(): ImageRecord[] {
    return [...this.imageList];
  }

  /**
   * Distinct image owners, in order of first capture.
   */
  imageOwners(): string[] {
    return Array.from(new Set(this.imageList.map((image) => image.ownerId)));
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  subscribe(listener: (event: EntityStoreEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emitFleet(): void {
    this.emit({ type: "fleet.changed", fleet: this.list() });
  }

  private emitImages(): void {
    this.emit({ type: "images.changed", images: this.images() });
  }

  private emit(event: EntityStoreEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
