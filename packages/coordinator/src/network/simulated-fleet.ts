/**
 * Simulated Fleet - an in-process stand-in for the camera network.
 *
 * Implements the executor, discovery and image pipeline contracts against a
 * table of fake servers. Used by the console and by tests; real transport is
 * outside this project.
 */

import { setTimeout as delay } from "node:timers/promises";
import type {
  ActionOutcome,
  ActionResult,
  ImageRecord,
  ServerEntryInput,
  ServerReportInput,
  ServerStatus,
  StatusUpdate,
} from "../schema.js";
import type {
  ActionExecutor,
  DiscoveryService,
  ImageActionRequest,
  ImagePipeline,
  ServerActionRequest,
} from "../fleet/types.js";
import { createLogger, type Logger } from "../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

export interface SimulatedServerOptions {
  label?: string;
  status?: ServerStatus;
  resolution?: string;
  framerate?: string;
}

interface SimulatedServer {
  address: string;
  label: string;
  status: ServerStatus;
  resolution: string;
  framerate: string;
}

export interface SimulatedFleetOptions {
  /** Delay before every reply */
  latencyMs?: number;
  now?: () => Date;
  logger?: Logger;
}

const DEFAULT_RESOLUTION = "1280x720";
const DEFAULT_FRAMERATE = "30";

// =============================================================================
// SimulatedFleet
// =============================================================================

export class SimulatedFleet implements ActionExecutor, DiscoveryService, ImagePipeline {
  private servers = new Map<string, SimulatedServer>();
  private failures = new Map<string, string>();
  private exportedImages: ImageRecord[] = [];
  private identifyLog: string[] = [];
  private shots = 0;
  private readonly latencyMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: SimulatedFleetOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("SIM");
  }

  // ===========================================================================
  // Scenario control
  // ===========================================================================

  addServer(address: string, options: SimulatedServerOptions = {}): void {
    this.servers.set(address, {
      address,
      label: options.label ?? address,
      status: options.status ?? "online",
      resolution: options.resolution ?? DEFAULT_RESOLUTION,
      framerate: options.framerate ?? DEFAULT_FRAMERATE,
    });
  }

  removeServer(address: string): void {
    this.servers.delete(address);
  }

  setStatus(address: string, status: ServerStatus): void {
    const server = this.servers.get(address);
    if (server) server.status = status;
  }

  /**
   * Make every following action on `address` fail with `reason`.
   */
  failOn(address: string, reason = "Simulated failure"): void {
    this.failures.set(address, reason);
  }

  recover(address: string): void {
    this.failures.delete(address);
  }

  settingsOf(address: string): { resolution: string; framerate: string } | undefined {
    const server = this.servers.get(address);
    return server ? { resolution: server.resolution, framerate: server.framerate } : undefined;
  }

  /** Images handed to `export`, in order */
  get exported(): ImageRecord[] {
    return [...this.exportedImages];
  }

  /** Servers that blinked for `identify`, in order */
  get identified(): string[] {
    return [...this.identifyLog];
  }

  // ===========================================================================
  // DiscoveryService
  // ===========================================================================

  async discover(): Promise<ServerEntryInput[]> {
    await this.wait();
    return Array.from(this.servers.values())
      .filter((server) => server.status !== "unreachable")
      .map((server) => ({ id: server.address, label: server.label, status: server.status }));
  }

  async refresh(ids: string[]): Promise<StatusUpdate[]> {
    await this.wait();
    return ids.map((id) => ({ id, status: this.servers.get(id)?.status ?? "unreachable" }));
  }

  async status(ids: string[]): Promise<ServerReportInput[]> {
    await this.wait();
    const timestamp = this.now().toISOString();
    return ids.flatMap((id) => {
      const server = this.servers.get(id);
      if (!server || server.status === "unreachable") return [];
      return [{ id, resolution: server.resolution, framerate: server.framerate, timestamp }];
    });
  }

  // ===========================================================================
  // ActionExecutor
  // ===========================================================================

  async execute(request: ServerActionRequest): Promise<ActionResult> {
    await this.wait();
    const outcomes = request.ids.map((id) => this.perform(request, id));
    this.logger.debug(`${request.action} #${request.dispatchId} answered by ${outcomes.length} server(s)`);
    return { dispatchId: request.dispatchId, action: request.action, outcomes };
  }

  // ===========================================================================
  // ImagePipeline
  // ===========================================================================

  async export(request: ImageActionRequest): Promise<ActionResult> {
    await this.wait();
    this.exportedImages.push(...request.images);
    return {
      dispatchId: request.dispatchId,
      action: request.action,
      outcomes: request.ids.map((id) => ({ id, ok: true })),
    };
  }

  async clear(request: ImageActionRequest): Promise<ActionResult> {
    await this.wait();
    return {
      dispatchId: request.dispatchId,
      action: request.action,
      outcomes: request.ids.map((id) => ({ id, ok: true })),
    };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private perform(request: ServerActionRequest, id: string): ActionOutcome {
    const server = this.servers.get(id);
    if (!server || server.status === "unreachable") {
      return { id, ok: false, reason: "No response" };
    }
    const failure = this.failures.get(id);
    if (failure !== undefined) {
      return { id, ok: false, reason: failure };
    }

    switch (request.action) {
      case "identify":
        this.identifyLog.push(id);
        return { id, ok: true };

      case "configure":
        if (request.settings?.resolution) server.resolution = request.settings.resolution;
        if (request.settings?.framerate !== undefined) server.framerate = String(request.settings.framerate);
        return { id, ok: true };

      case "reference": {
        if (id === request.sourceId) return { id, ok: true };
        const source = request.sourceId ? this.servers.get(request.sourceId) : undefined;
        if (!source) {
          return { id, ok: false, reason: "Reference server did not respond" };
        }
        server.resolution = source.resolution;
        server.framerate = source.framerate;
        return { id, ok: true };
      }

      case "capture": {
        this.shots++;
        const image: ImageRecord = {
          id: `${id}#${this.shots}`,
          ownerId: id,
          capturedAt: this.now().toISOString(),
          handle: `sim://${id}/${this.shots}`,
          orphaned: false,
        };
        return { id, ok: true, images: [image] };
      }

      case "copy":
        return { id, ok: true };
    }
  }

  private async wait(): Promise<void> {
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }
  }
}
