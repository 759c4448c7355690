import { describe, it, expect, beforeEach } from "vitest";
import { SimulatedFleet } from "./simulated-fleet.js";
import { silentLogger } from "../utils/logger.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

describe("SimulatedFleet", () => {
  let fleet: SimulatedFleet;

  beforeEach(() => {
    fleet = new SimulatedFleet({ now: () => NOW, logger: silentLogger });
    fleet.addServer("10.0.0.1");
    fleet.addServer("10.0.0.2", { label: "left", resolution: "1920x1080", framerate: "25" });
    fleet.addServer("10.0.0.3", { status: "unreachable" });
  });

  it("discovers every reachable server", async () => {
    expect(await fleet.discover()).toEqual([
      { id: "10.0.0.1", label: "10.0.0.1", status: "online" },
      { id: "10.0.0.2", label: "left", status: "online" },
    ]);
  });

  it("reports missing servers as unreachable on refresh", async () => {
    fleet.removeServer("10.0.0.1");
    fleet.setStatus("10.0.0.2", "busy");
    expect(await fleet.refresh(["10.0.0.1", "10.0.0.2"])).toEqual([
      { id: "10.0.0.1", status: "unreachable" },
      { id: "10.0.0.2", status: "busy" },
    ]);
  });

  it("reports settings and clock for servers that answer", async () => {
    expect(await fleet.status(["10.0.0.2", "10.0.0.3", "10.0.0.9"])).toEqual([
      { id: "10.0.0.2", resolution: "1920x1080", framerate: "25", timestamp: "2026-03-01T12:00:00.000Z" },
    ]);
  });

  it("answers each server of a batch on its own", async () => {
    fleet.failOn("10.0.0.2", "shutter stuck");
    const result = await fleet.execute({ dispatchId: 4, action: "identify", ids: ["10.0.0.1", "10.0.0.2", "10.0.0.3"] });

    expect(result).toEqual({
      dispatchId: 4,
      action: "identify",
      outcomes: [
        { id: "10.0.0.1", ok: true },
        { id: "10.0.0.2", ok: false, reason: "shutter stuck" },
        { id: "10.0.0.3", ok: false, reason: "No response" },
      ],
    });
    expect(fleet.identified).toEqual(["10.0.0.1"]);
  });

  it("recovers from a scripted failure", async () => {
    fleet.failOn("10.0.0.1");
    fleet.recover("10.0.0.1");
    const result = await fleet.execute({ dispatchId: 1, action: "copy", ids: ["10.0.0.1"] });
    expect(result.outcomes).toEqual([{ id: "10.0.0.1", ok: true }]);
  });

  it("applies configure settings", async () => {
    await fleet.execute({
      dispatchId: 1,
      action: "configure",
      ids: ["10.0.0.1"],
      settings: { resolution: "640x480", framerate: 15 },
    });
    expect(fleet.settingsOf("10.0.0.1")).toEqual({ resolution: "640x480", framerate: "15" });
  });

  it("copies the source settings for reference", async () => {
    const result = await fleet.execute({
      dispatchId: 2,
      action: "reference",
      ids: ["10.0.0.2", "10.0.0.1"],
      sourceId: "10.0.0.2",
    });
    expect(result.outcomes.every((outcome) => outcome.ok)).toBe(true);
    expect(fleet.settingsOf("10.0.0.1")).toEqual({ resolution: "1920x1080", framerate: "25" });
  });

  it("captures one image per server", async () => {
    const result = await fleet.execute({ dispatchId: 3, action: "capture", ids: ["10.0.0.1", "10.0.0.2"] });
    expect(result.outcomes.map((outcome) => outcome.images)).toEqual([
      [
        {
          id: "10.0.0.1#1",
          ownerId: "10.0.0.1",
          capturedAt: "2026-03-01T12:00:00.000Z",
          handle: "sim://10.0.0.1/1",
          orphaned: false,
        },
      ],
      [
        {
          id: "10.0.0.2#2",
          ownerId: "10.0.0.2",
          capturedAt: "2026-03-01T12:00:00.000Z",
          handle: "sim://10.0.0.2/2",
          orphaned: false,
        },
      ],
    ]);
  });

  it("keeps exported images", async () => {
    const images = [
      { id: "a#1", ownerId: "a", capturedAt: NOW.toISOString(), handle: "sim://a/1", orphaned: true },
    ];
    const result = await fleet.export({ dispatchId: 5, action: "export", ids: ["a"], images });
    expect(result.outcomes).toEqual([{ id: "a", ok: true }]);
    expect(fleet.exported).toEqual(images);
  });
});
