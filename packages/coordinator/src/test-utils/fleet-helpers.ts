/**
 * Coordinator test helpers.
 *
 * Provides collaborators whose replies the test releases by hand, and a
 * dispatcher wired to them with a silent logger.
 */

import type { ActionResult, ServerEntryInput, ServerReportInput, ServerStatus, StatusUpdate } from "../schema.js";
import { CommandDispatcher, type CommandDispatcherOptions } from "../fleet/command-dispatcher.js";
import type {
  ActionExecutor,
  CoordinatorEvent,
  DiscoveryService,
  ImageActionRequest,
  ImagePipeline,
  ServerActionRequest,
} from "../fleet/types.js";
import { silentLogger } from "../utils/logger.js";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/**
 * Create a deferred promise that can be resolved/rejected externally.
 */
export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

export interface PendingCall<R> {
  request: R;
  reply: Deferred<ActionResult>;
}

/**
 * Executor, discovery and image pipeline in one. Batch calls stay pending
 * until the test settles them; discovery answers straight away.
 */
export class ControlledCollaborators implements ActionExecutor, DiscoveryService, ImagePipeline {
  readonly serverCalls: Array<PendingCall<ServerActionRequest>> = [];
  readonly imageCalls: Array<PendingCall<ImageActionRequest>> = [];
  discovered: ServerEntryInput[] = [];
  statuses = new Map<string, ServerStatus>();
  /** Status query replies by server; servers without one stay silent */
  reports = new Map<string, ServerReportInput>();
  readonly statusQueries: string[][] = [];

  execute(request: ServerActionRequest): Promise<ActionResult> {
    return this.pend(this.serverCalls, request);
  }

  export(request: ImageActionRequest): Promise<ActionResult> {
    return this.pend(this.imageCalls, request);
  }

  clear(request: ImageActionRequest): Promise<ActionResult> {
    return this.pend(this.imageCalls, request);
  }

  discover(): Promise<ServerEntryInput[]> {
    return Promise.resolve(this.discovered);
  }

  refresh(ids: string[]): Promise<StatusUpdate[]> {
    return Promise.resolve(ids.map((id) => ({ id, status: this.statuses.get(id) ?? "online" })));
  }

  status(ids: string[]): Promise<ServerReportInput[]> {
    this.statusQueries.push([...ids]);
    return Promise.resolve(
      ids.flatMap((id) => {
        const report = this.reports.get(id);
        return report ? [report] : [];
      })
    );
  }

  /**
   * Answer a pending call with success for every id it targeted.
   */
  succeed(call: PendingCall<ServerActionRequest | ImageActionRequest>): void {
    call.reply.resolve({
      dispatchId: call.request.dispatchId,
      action: call.request.action,
      outcomes: call.request.ids.map((id) => ({ id, ok: true })),
    });
  }

  private pend<R>(calls: Array<PendingCall<R>>, request: R): Promise<ActionResult> {
    const reply = createDeferred<ActionResult>();
    calls.push({ request, reply });
    return reply.promise;
  }
}

export interface TestDispatcher {
  dispatcher: CommandDispatcher;
  collaborators: ControlledCollaborators;
  events: CoordinatorEvent[];
}

/**
 * A dispatcher over controlled collaborators, pre-filled with `ids`, that
 * records every event emitted after setup. No dispatch time limit unless
 * `options` sets one.
 */
export function createTestDispatcher(
  ids: string[] = [],
  options: Partial<Omit<CommandDispatcherOptions, "executor" | "discovery" | "images">> = {}
): TestDispatcher {
  const collaborators = new ControlledCollaborators();
  const dispatcher = new CommandDispatcher({
    executor: collaborators,
    discovery: collaborators,
    images: collaborators,
    logger: silentLogger,
    dispatchTimeoutMs: 0,
    ...options,
  });
  for (const id of ids) {
    dispatcher.add({ id, label: id });
  }

  const events: CoordinatorEvent[] = [];
  dispatcher.subscribe((event) => events.push(event));
  return { dispatcher, collaborators, events };
}

/**
 * Event types in emission order.
 */
export function eventTypes(events: CoordinatorEvent[]): string[] {
  return events.map((event) => event.type);
}
