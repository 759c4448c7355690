/**
 * Command Dispatcher - the coordinator's public facade.
 *
 * Single writer for the fleet, the selection and the in-flight record:
 * - User intents (select, move, invoke, add, remove) apply synchronously.
 * - Network events (discovered servers, status reports, completions) are
 *   funnelled through a serial queue so they never run alongside an intent.
 *
 * Every public mutation runs inside `commit`, which collects the component
 * events, recomputes the action state once, and emits coalesced snapshots in
 * a fixed order: fleet, selection, images, actions, completions.
 */

import fastq from "fastq";
import type { queueAsPromised } from "fastq";
import type { ZodError } from "zod";
import {
  ActionResultSchema,
  CameraSettingsSchema,
  ImageRecordSchema,
  ServerEntrySchema,
  ServerReportSchema,
  StatusUpdateSchema,
  type ActionName,
  type ActionResult,
  type ActionResultInput,
  type CameraSettingsInput,
  type ImageActionName,
  type ImageRecord,
  type ImageRecordInput,
  type ServerActionName,
  type ServerEntry,
  type ServerEntryInput,
  type ServerReport,
  type ServerStatus,
} from "../schema.js";
import { DEFAULT_DISPATCH_TIMEOUT_MS } from "../config/coordinator.js";
import { ActionNotPermittedError, getErrorMessage, isCoordinatorError } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { addFleetAttributes, withSpanSync } from "../telemetry/spans.js";
import {
  recordDispatch,
  recordFleetShape,
  recordOutcome,
  recordRejection,
} from "../telemetry/metrics.js";
import {
  actionStatesEqual,
  actionTargets,
  computeActionState,
  disabledReason,
  type EnablementInput,
} from "./action-enablement.js";
import { EntityStore, type EntityStoreEvent } from "./entity-store.js";
import { InFlightRegistry } from "./in-flight.js";
import { applyMove, type MoveDirection } from "./reorder.js";
import { SelectionTracker } from "./selection-tracker.js";
import type {
  ActionCompletedEvent,
  ActionExecutor,
  ActionState,
  CoordinatorEvent,
  CoordinatorListener,
  DiscoveryService,
  DispatchReceipt,
  FleetChangedEvent,
  ImageActionRequest,
  ImagePipeline,
  ImagesChangedEvent,
  SelectionChangedEvent,
  ServerActionRequest,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Events the network layer hands to the coordinator. Discovery and status
 * entries are validated one by one; a bad entry never drops its batch.
 */
export type InboundEvent =
  | { type: "discovered"; entries: unknown[] }
  | { type: "status"; updates: unknown[] }
  | { type: "completed"; result: ActionResultInput };

export interface CommandDispatcherOptions {
  executor: ActionExecutor;
  discovery: DiscoveryService;
  images: ImagePipeline;
  /** Reject images whose owner is not in the fleet */
  strictImages?: boolean;
  /** Drop exported images once the pipeline confirms them */
  consumeOnExport?: boolean;
  /** Time limit per dispatch; 0 disables it */
  dispatchTimeoutMs?: number;
  logger?: Logger;
}

export interface InvokeOptions {
  /** Required by `configure` */
  settings?: CameraSettingsInput;
}

export interface CoordinatorSnapshot {
  fleet: ServerEntry[];
  selection: string[];
  anchor: string | null;
  actions: ActionState;
  images: ImageRecord[];
  inFlight: Map<string, ActionName>;
}

interface PendingEvents {
  fleet?: FleetChangedEvent;
  selection?: SelectionChangedEvent;
  images?: ImagesChangedEvent;
  completed: ActionCompletedEvent[];
}

const MOVE_DIRECTIONS: Record<"moveTop" | "moveUp" | "moveDown" | "moveBottom", MoveDirection> = {
  moveTop: "top",
  moveUp: "up",
  moveDown: "down",
  moveBottom: "bottom",
};

// =============================================================================
// CommandDispatcher
// =============================================================================

export class CommandDispatcher {
  private readonly store: EntityStore;
  private readonly selection: SelectionTracker;
  private readonly inFlight = new InFlightRegistry();
  private readonly inbound: queueAsPromised<InboundEvent, void>;
  private readonly outstanding = new Set<Promise<void>>();
  private readonly listeners = new Set<CoordinatorListener>();
  private readonly logger: Logger;
  private readonly consumeOnExport: boolean;
  private readonly dispatchTimeoutMs: number;
  private pending: PendingEvents = { completed: [] };
  private actionState: ActionState;
  private depth = 0;
  private emitting = false;
  private flushRequested = false;

  constructor(private readonly options: CommandDispatcherOptions) {
    this.logger = options.logger ?? createLogger("FLEET");
    this.consumeOnExport = options.consumeOnExport ?? false;
    this.dispatchTimeoutMs = options.dispatchTimeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS;

    this.store = new EntityStore({ strictImages: options.strictImages });
    this.selection = new SelectionTracker(this.store);
    this.store.subscribe((event) => this.collect(event));
    this.selection.subscribe((event) => this.collect(event));

    this.actionState = computeActionState(this.enablementInput());
    this.inbound = fastq.promise((event: InboundEvent) => this.handleInbound(event), 1);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getFleet(): ServerEntry[] {
    return this.store.list();
  }

  /** Selected ids in fleet order */
  getSelection(): string[] {
    return this.selection.selection();
  }

  getActionState(): ActionState {
    return { ...this.actionState };
  }

  getImages(): ImageRecord[] {
    return this.store.images();
  }

  getInFlight(): Map<string, ActionName> {
    return this.inFlight.pending();
  }

  isEnabled(action: ActionName): boolean {
    return this.actionState[action];
  }

  /**
   * Why an action is disabled, or null when it is enabled.
   */
  whyDisabled(action: ActionName): string | null {
    return disabledReason(action, this.enablementInput());
  }

  snapshot(): CoordinatorSnapshot {
    return {
      fleet: this.getFleet(),
      selection: this.getSelection(),
      anchor: this.selection.anchor,
      actions: this.getActionState(),
      images: this.getImages(),
      inFlight: this.getInFlight(),
    };
  }

  /**
   * Ask servers for their camera settings and clock. Defaults to the whole
   * fleet and skips ids outside it. A server that stays silent, or answers
   * with a malformed report, is missing from the result.
   * @returns Reports in fleet order
   */
  async queryStatus(ids?: Iterable<string>): Promise<ServerReport[]> {
    const fleet = this.store.ids();
    const wanted = new Set(ids ?? fleet);
    const targets = fleet.filter((id) => wanted.has(id));
    if (targets.length === 0) return [];

    const replies = await withTimeout(
      this.options.discovery.status(targets),
      this.dispatchTimeoutMs,
      "status query timed out"
    );

    const reports = new Map<string, ServerReport>();
    for (const reply of replies) {
      const parsed = ServerReportSchema.safeParse(reply);
      if (!parsed.success) {
        this.logger.warn(`Ignoring malformed status report: ${describeIssues(parsed.error)}`);
        continue;
      }
      reports.set(parsed.data.id, parsed.data);
    }
    return targets.flatMap((id) => {
      const report = reports.get(id);
      return report ? [report] : [];
    });
  }

  subscribe(listener: CoordinatorListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ===========================================================================
  // Fleet intents
  // ===========================================================================

  /**
   * Append a server to the fleet.
   * @throws DuplicateIdentifierError if the id is already present
   */
  add(input: ServerEntryInput): ServerEntry {
    const entry = ServerEntrySchema.parse(input);
    this.commit(() => this.store.add(entry));
    return entry;
  }

  /**
   * Remove servers without consulting action state. Unknown ids are ignored.
   * Pending actions on removed servers are detached, not cancelled.
   * @returns Ids actually removed
   */
  remove(ids: Iterable<string>): string[] {
    return this.commit(() => this.removeServers(ids));
  }

  updateStatus(id: string, status: ServerStatus): void {
    this.commit(() => this.store.updateStatus(id, status));
  }

  /**
   * @throws UnknownOwnerError in strict mode when the owner is not in the fleet
   */
  addImage(input: ImageRecordInput): ImageRecord {
    const record = ImageRecordSchema.parse(input);
    this.commit(() => this.store.addImage(record));
    return record;
  }

  // ===========================================================================
  // Selection intents
  // ===========================================================================

  select(ids: Iterable<string>): void {
    this.commit(() => this.selection.setSelection(ids));
  }

  toggle(id: string): void {
    this.commit(() => this.selection.toggle(id));
  }

  extendRangeTo(id: string): void {
    this.commit(() => this.selection.extendRangeTo(id));
  }

  selectAll(): void {
    this.commit(() => this.selection.selectAll());
  }

  clearSelection(): void {
    this.commit(() => this.selection.clear());
  }

  // ===========================================================================
  // Reorder intents
  // ===========================================================================

  moveTop(): DispatchReceipt {
    return this.invoke("moveTop");
  }

  moveUp(): DispatchReceipt {
    return this.invoke("moveUp");
  }

  moveDown(): DispatchReceipt {
    return this.invoke("moveDown");
  }

  moveBottom(): DispatchReceipt {
    return this.invoke("moveBottom");
  }

  // ===========================================================================
  // Actions
  // ===========================================================================

  /**
   * Run an action against the current selection. Returns as soon as the
   * action is applied (local actions) or handed to its collaborator.
   * @throws ActionNotPermittedError if the action is disabled; nothing changes
   */
  invoke(action: ActionName, options: InvokeOptions = {}): DispatchReceipt {
    return withSpanSync(
      "fleet.invoke",
      (span) =>
        this.commit(() => {
          const input = this.enablementInput();
          addFleetAttributes(span, {
            size: input.fleet.length,
            selected: input.selection.size,
            inFlight: input.inFlight.size,
          });

          const reason = disabledReason(action, input);
          if (reason !== null) {
            recordRejection(action);
            throw new ActionNotPermittedError(action, reason);
          }
          return this.perform(action, input, options);
        }),
      { "fleet.action": action }
    );
  }

  /**
   * Apply a completion report. Completions for settled or unknown dispatches
   * are ignored; outcomes for servers removed meanwhile change nothing but
   * are still reported.
   */
  complete(input: ActionResultInput): void {
    const result = ActionResultSchema.parse(input);
    this.commit(() => this.applyCompletion(result));
  }

  /**
   * Hand a network event to the serial inbound queue.
   */
  enqueue(event: InboundEvent): Promise<void> {
    return this.inbound.push(event);
  }

  /**
   * Resolve once every collaborator call has reported back and the inbound
   * queue is empty.
   */
  async idle(): Promise<void> {
    while (this.outstanding.size > 0) {
      await Promise.all(Array.from(this.outstanding));
    }
    await this.inbound.drained();
  }

  /**
   * Stop processing inbound events and drop listeners.
   */
  dispose(): void {
    this.inbound.kill();
    this.listeners.clear();
  }

  // ===========================================================================
  // Private - action handling
  // ===========================================================================

  private perform(action: ActionName, input: EnablementInput, options: InvokeOptions): DispatchReceipt {
    switch (action) {
      case "find":
        this.track(
          this.options.discovery.discover().then((entries) => this.enqueue({ type: "discovered", entries }))
        );
        return { action, ids: [] };

      case "refresh": {
        const ids = this.store.ids();
        this.track(
          this.options.discovery.refresh(ids).then((updates) => this.enqueue({ type: "status", updates }))
        );
        return { action, ids };
      }

      case "add":
      case "quit":
        // Presentation-level intents; nothing to coordinate
        return { action, ids: [] };

      case "remove": {
        const ids = this.selection.selection();
        this.removeServers(ids);
        this.logger.info(`Removed ${ids.length} server(s)`);
        return { action, ids };
      }

      case "moveTop":
      case "moveUp":
      case "moveDown":
      case "moveBottom": {
        const ids = this.selection.selection();
        this.store.replaceOrder(applyMove(MOVE_DIRECTIONS[action], this.store.ids(), new Set(ids)));
        return { action, ids };
      }

      case "identify":
      case "configure":
      case "reference":
      case "capture":
      case "copy":
        return this.dispatchToServers(action, input, options);

      case "export":
      case "clear":
        return this.dispatchToImages(action, input);
    }
  }

  private dispatchToServers(
    action: ServerActionName,
    input: EnablementInput,
    options: InvokeOptions
  ): DispatchReceipt {
    // Validate before anything is marked in flight
    const settings = action === "configure" ? CameraSettingsSchema.parse(options.settings ?? {}) : undefined;
    const ids = actionTargets(action, input);

    const dispatchId = this.inFlight.begin(action, ids);
    const request: ServerActionRequest = { dispatchId, action, ids };
    if (settings) request.settings = settings;
    if (action === "reference") request.sourceId = ids[0];

    recordDispatch(action, ids.length);
    this.logger.info(`${action} dispatched to ${ids.length} server(s) (#${dispatchId})`);
    this.track(this.runCollaborator(dispatchId, action, ids, () => this.options.executor.execute(request)));
    return { action, ids, dispatchId };
  }

  private dispatchToImages(action: ImageActionName, input: EnablementInput): DispatchReceipt {
    const busy = actionTargets(action, input);
    const ids = action === "export" ? this.store.imageOwners() : busy;
    const owners = new Set(ids);
    const images = this.store.images().filter((image) => owners.has(image.ownerId));

    const dispatchId = this.inFlight.begin(action, busy);
    const request: ImageActionRequest = { dispatchId, action, ids, images };

    recordDispatch(action, ids.length);
    this.logger.info(`${action} of ${images.length} image(s) dispatched (#${dispatchId})`);
    this.track(
      this.runCollaborator(dispatchId, action, ids, () =>
        action === "export" ? this.options.images.export(request) : this.options.images.clear(request)
      )
    );
    return { action, ids, dispatchId };
  }

  /**
   * Call a collaborator and route its report (or its failure) back through
   * the inbound queue. Rejections and malformed reports become per-server
   * failures so the dispatch always settles.
   */
  private runCollaborator(
    dispatchId: number,
    action: ActionName,
    ids: string[],
    call: () => Promise<ActionResultInput>
  ): Promise<void> {
    const failAll = (reason: string): ActionResultInput => ({
      dispatchId,
      action,
      outcomes: ids.map((id) => ({ id, ok: false, reason })),
    });

    let pending: Promise<ActionResultInput>;
    try {
      pending = call();
    } catch (error) {
      pending = Promise.reject(error);
    }

    return withTimeout(pending, this.dispatchTimeoutMs, `${action} dispatch #${dispatchId} timed out`)
      .then((raw): ActionResultInput => {
        const parsed = ActionResultSchema.safeParse(raw);
        if (!parsed.success) {
          this.logger.error(`Malformed report for ${action} dispatch #${dispatchId}`, parsed.error);
          return failAll("Malformed report from collaborator");
        }
        return { ...parsed.data, dispatchId, action };
      })
      .catch((error: unknown) => {
        this.logger.error(`${action} dispatch #${dispatchId} failed`, error);
        return failAll(getErrorMessage(error));
      })
      .then((result) => this.enqueue({ type: "completed", result }));
  }

  private applyCompletion(result: ActionResult): void {
    const action = this.inFlight.actionFor(result.dispatchId);
    const settled = this.inFlight.settle(result.dispatchId);
    if (action === undefined || settled === null) {
      this.logger.warn(`Ignoring completion for unknown dispatch #${result.dispatchId}`);
      return;
    }

    const succeeded: string[] = [];
    for (const outcome of result.outcomes) {
      recordOutcome(action, outcome.ok);
      if (outcome.ok) {
        succeeded.push(outcome.id);
      } else {
        this.logger.warn(`${action} failed on ${outcome.id}: ${outcome.reason ?? "no reason given"}`);
      }
    }

    if (action === "capture") {
      for (const outcome of result.outcomes) {
        if (!outcome.ok) continue;
        for (const image of outcome.images ?? []) {
          this.storeImage(image);
        }
      }
    }

    if (action === "clear" || (action === "export" && this.consumeOnExport)) {
      this.store.removeImages(succeeded);
    }

    this.pending.completed.push({
      type: "action.completed",
      dispatchId: result.dispatchId,
      action,
      outcomes: result.outcomes,
    });
  }

  private storeImage(image: ImageRecord): void {
    try {
      this.store.addImage(image);
    } catch (error) {
      if (!isCoordinatorError(error)) throw error;
      this.logger.warn(`Dropped image ${image.id}: ${error.message}`);
    }
  }

  // ===========================================================================
  // Private - inbound queue
  // ===========================================================================

  private async handleInbound(event: InboundEvent): Promise<void> {
    switch (event.type) {
      case "discovered":
        this.commit(() => this.mergeDiscovered(event.entries));
        break;
      case "status":
        this.commit(() => {
          for (const update of event.updates) {
            const parsed = StatusUpdateSchema.safeParse(update);
            if (parsed.success) {
              this.store.updateStatus(parsed.data.id, parsed.data.status);
            } else {
              this.logger.warn(`Ignoring malformed status update: ${describeIssues(parsed.error)}`);
            }
          }
        });
        break;
      case "completed":
        this.complete(event.result);
        break;
    }
  }

  private mergeDiscovered(candidates: unknown[]): void {
    let added = 0;
    for (const candidate of candidates) {
      const parsed = ServerEntrySchema.safeParse(candidate);
      if (!parsed.success) {
        this.logger.warn(`Ignoring malformed discovery candidate: ${describeIssues(parsed.error)}`);
        continue;
      }
      if (this.store.has(parsed.data.id)) {
        // Only a status the candidate actually reports overrides the known one
        const reported = StatusUpdateSchema.safeParse(candidate);
        if (reported.success) {
          this.store.updateStatus(parsed.data.id, reported.data.status);
        }
        continue;
      }
      this.store.add(parsed.data);
      added++;
    }
    this.logger.info(`Discovery found ${candidates.length} server(s), ${added} new`);
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((error: unknown) => {
        this.logger.error("Collaborator call failed", error);
      })
      .finally(() => {
        this.outstanding.delete(tracked);
      });
    this.outstanding.add(tracked);
  }

  // ===========================================================================
  // Private - state and notifications
  // ===========================================================================

  private removeServers(ids: Iterable<string>): string[] {
    const removed = this.store.remove(ids);
    if (removed.length > 0) {
      this.selection.prune();
      this.inFlight.forget(removed);
    }
    return removed;
  }

  private enablementInput(): EnablementInput {
    return {
      fleet: this.store.ids(),
      selection: new Set(this.selection.selection()),
      inFlight: this.inFlight.pending(),
      imageOwners: this.store.imageOwners(),
      openActions: this.inFlight.openActions(),
    };
  }

  private collect(event: EntityStoreEvent | SelectionChangedEvent): void {
    switch (event.type) {
      case "fleet.changed":
        this.pending.fleet = event;
        break;
      case "images.changed":
        this.pending.images = event;
        break;
      case "selection.changed":
        this.pending.selection = event;
        break;
    }
  }

  private commit<T>(fn: () => T): T {
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
      if (this.depth === 0) this.flush();
    }
  }

  /**
   * Emit what the outermost commit collected. A commit made by a listener
   * while events are going out is flushed after the current round, so the
   * last snapshot a listener sees is always the current one.
   */
  private flush(): void {
    if (this.emitting) {
      this.flushRequested = true;
      return;
    }

    this.emitting = true;
    try {
      do {
        this.flushRequested = false;
        this.flushRound();
      } while (this.flushRequested);
    } finally {
      this.emitting = false;
    }
  }

  private flushRound(): void {
    const { fleet, selection, images, completed } = this.pending;
    this.pending = { completed: [] };

    const events: CoordinatorEvent[] = [];
    if (fleet) events.push(fleet);
    if (selection) events.push(selection);
    if (images) events.push(images);

    const actions = computeActionState(this.enablementInput());
    if (!actionStatesEqual(actions, this.actionState)) {
      this.actionState = actions;
      events.push({ type: "actions.changed", actions: { ...actions } });
    }
    events.push(...completed);

    recordFleetShape(this.store.size, this.inFlight.pending().size);
    for (const event of events) {
      this.emit(event);
    }
  }

  private emit(event: CoordinatorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(`Listener error on ${event.type}`, error);
      }
    }
  }
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
