import { describe, it, expect, beforeEach } from "vitest";
import { EntityStore, type EntityStoreEvent } from "./entity-store.js";
import { DuplicateIdentifierError, UnknownOwnerError } from "../utils/errors.js";
import { InvariantViolation } from "../utils/invariant.js";
import type { ImageRecord } from "../schema.js";

function entry(id: string) {
  return { id, label: `cam ${id}`, status: "unknown" as const };
}

function image(id: string, ownerId: string): ImageRecord {
  return { id, ownerId, capturedAt: "2026-01-01T00:00:00.000Z", handle: `mem://${id}`, orphaned: false };
}

describe("EntityStore", () => {
  let store: EntityStore;
  let events: EntityStoreEvent[];

  beforeEach(() => {
    store = new EntityStore();
    for (const id of ["A", "B", "C"]) store.add(entry(id));
    events = [];
    store.subscribe((event) => events.push(event));
  });

  describe("add", () => {
    it("appends in insertion order", () => {
      store.add(entry("D"));
      expect(store.ids()).toEqual(["A", "B", "C", "D"]);
      expect(events).toEqual([{ type: "fleet.changed", fleet: store.list() }]);
    });

    it("rejects a duplicate id and leaves the fleet unchanged", () => {
      expect(() => store.add(entry("B"))).toThrow(DuplicateIdentifierError);
      expect(() => store.add(entry("B"))).toThrow('Duplicate server identifier "B"');
      expect(store.size).toBe(3);
      expect(events).toEqual([]);
    });
  });

  describe("remove", () => {
    it("returns removed ids in fleet order and ignores unknown ones", () => {
      expect(store.remove(["C", "X", "A"])).toEqual(["A", "C"]);
      expect(store.ids()).toEqual(["B"]);
    });

    it("emits nothing when no id is known", () => {
      expect(store.remove(["X"])).toEqual([]);
      expect(events).toEqual([]);
    });

    it("orphans images of removed owners instead of deleting them", () => {
      store.addImage(image("img-1", "A"));
      store.addImage(image("img-2", "B"));
      events = [];

      store.remove(["A"]);

      expect(store.images().map((record) => [record.id, record.orphaned])).toEqual([
        ["img-1", true],
        ["img-2", false],
      ]);
      expect(events.map((event) => event.type)).toEqual(["fleet.changed", "images.changed"]);
    });

    it("reclaims orphaned images when the owner is added again", () => {
      store.addImage(image("img-1", "A"));
      store.remove(["A"]);
      events = [];

      store.add(entry("A"));

      expect(store.images().map((record) => [record.id, record.orphaned])).toEqual([["img-1", false]]);
      expect(events.map((event) => event.type)).toEqual(["fleet.changed", "images.changed"]);
    });
  });

  describe("updateStatus", () => {
    it("records a new status", () => {
      expect(store.updateStatus("B", "online")).toBe(true);
      expect(store.get("B")?.status).toBe("online");
    });

    it("is a no-op for unknown ids and unchanged status", () => {
      expect(store.updateStatus("X", "online")).toBe(false);
      expect(store.updateStatus("A", "unknown")).toBe(false);
      expect(events).toEqual([]);
    });
  });

  describe("replaceOrder", () => {
    it("applies a permutation", () => {
      expect(store.replaceOrder(["C", "A", "B"])).toBe(true);
      expect(store.ids()).toEqual(["C", "A", "B"]);
      expect(store.indexOf("A")).toBe(1);
    });

    it("reports an identical order as unchanged", () => {
      expect(store.replaceOrder(["A", "B", "C"])).toBe(false);
      expect(events).toEqual([]);
    });

    it("refuses anything that is not a permutation", () => {
      expect(() => store.replaceOrder(["A", "B"])).toThrow(InvariantViolation);
      expect(() => store.replaceOrder(["A", "A", "B"])).toThrow(InvariantViolation);
      expect(() => store.replaceOrder(["A", "B", "X"])).toThrow(InvariantViolation);
    });
  });

  describe("images", () => {
    it("rejects a duplicate image id", () => {
      store.addImage(image("img-1", "A"));
      expect(() => store.addImage(image("img-1", "B"))).toThrow('Duplicate image identifier "img-1"');
    });

    it("stores an image of an unknown owner as orphaned", () => {
      store.addImage(image("img-1", "X"));
      expect(store.images()[0].orphaned).toBe(true);
    });

    it("rejects an unknown owner in strict mode", () => {
      const strict = new EntityStore({ strictImages: true });
      expect(() => strict.addImage(image("img-1", "X"))).toThrow(UnknownOwnerError);
      expect(strict.images()).toEqual([]);
    });

    it("lists distinct owners in order of first capture", () => {
      store.addImage(image("img-1", "C"));
      store.addImage(image("img-2", "A"));
      store.addImage(image("img-3", "C"));
      expect(store.imageOwners()).toEqual(["C", "A"]);
    });

    it("removes every image of the given owners", () => {
      store.addImage(image("img-1", "C"));
      store.addImage(image("img-2", "A"));
      store.addImage(image("img-3", "C"));

      expect(store.removeImages(["C"]).map((record) => record.id)).toEqual(["img-1", "img-3"]);
      expect(store.images().map((record) => record.id)).toEqual(["img-2"]);
    });
  });
});
