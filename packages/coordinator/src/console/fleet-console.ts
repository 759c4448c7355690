/**
 * Fleet Console - line-oriented commands over the Command Dispatcher.
 *
 * Each call to `execute` handles one line and returns the text to print.
 * Batch actions wait for the dispatcher to go idle so their per-server
 * outcomes can be reported in the same reply.
 */

import { ZodError } from "zod";
import { ACTION_NAMES, type ActionName, type CameraSettingsInput } from "../schema.js";
import { describeSettings, type Settings } from "../config/validation.js";
import type { CommandDispatcher, InvokeOptions } from "../fleet/command-dispatcher.js";
import type { ActionCompletedEvent } from "../fleet/types.js";
import type { AddressParser } from "../network/address.js";
import { paint, type ColorKey } from "../utils/colors.js";
import { DuplicateIdentifierError, getErrorMessage } from "../utils/errors.js";
import { formatTable } from "./table.js";

// =============================================================================
// Types
// =============================================================================

export interface FleetConsoleOptions {
  dispatcher: CommandDispatcher;
  parser: AddressParser;
  settings: Settings;
  /** Use ANSI colors in replies */
  color?: boolean;
}

export interface ConsoleReply {
  lines: string[];
  /** True once the user asked to leave */
  quit: boolean;
}

interface ConsoleCommand {
  syntax: string;
  summary: string;
  run: (args: string) => Promise<string[]> | string[];
  quits?: boolean;
}

const MOVES: Record<string, ActionName> = {
  top: "moveTop",
  up: "moveUp",
  down: "moveDown",
  bottom: "moveBottom",
};

// =============================================================================
// FleetConsole
// =============================================================================

export class FleetConsole {
  private readonly dispatcher: CommandDispatcher;
  private readonly parser: AddressParser;
  private readonly settings: Settings;
  private readonly color: boolean;
  private readonly commands: Map<string, ConsoleCommand>;
  private completions: ActionCompletedEvent[] = [];

  constructor(options: FleetConsoleOptions) {
    this.dispatcher = options.dispatcher;
    this.parser = options.parser;
    this.settings = options.settings;
    this.color = options.color ?? false;
    this.commands = this.buildCommands();

    this.dispatcher.subscribe((event) => {
      if (event.type === "action.completed") {
        this.completions.push(event);
      }
    });
  }

  /**
   * Run one input line.
   */
  async execute(line: string): Promise<ConsoleReply> {
    const trimmed = line.trim();
    if (trimmed === "") return { lines: [], quit: false };

    const [name, ...rest] = trimmed.split(/\s+/);
    const command = this.commands.get(name.toLowerCase());
    if (!command) {
      return { lines: [`Unknown command "${name}" (try "help")`], quit: false };
    }

    try {
      const lines = await command.run(rest.join(" "));
      return { lines, quit: command.quits ?? false };
    } catch (error) {
      return { lines: [`${this.paint("red", "Error:")} ${describeError(error)}`], quit: false };
    }
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private buildCommands(): Map<string, ConsoleCommand> {
    const commands: Array<[string, ConsoleCommand]> = [
      ["help", { syntax: "help [command]", summary: "Show commands", run: (args) => this.help(args) }],
      ["config", { syntax: "config", summary: "Show client settings", run: () => this.config() }],
      ["servers", { syntax: "servers", summary: "List the fleet in order", run: () => this.servers() }],
      ["find", { syntax: "find", summary: "Discover servers on the network", run: () => this.find() }],
      ["add", { syntax: "add <addresses>", summary: "Add servers by address", run: (args) => this.add(args) }],
      [
        "remove",
        {
          syntax: "remove [addresses]",
          summary: "Remove the given servers, or the selection",
          run: (args) => this.remove(args),
        },
      ],
      [
        "select",
        {
          syntax: "select <addresses|all|none>",
          summary: "Replace the selection",
          run: (args) => this.select(args),
        },
      ],
      ["toggle", { syntax: "toggle <address>", summary: "Flip one server in or out", run: (args) => this.toggle(args) }],
      [
        "extend",
        {
          syntax: "extend <address>",
          summary: "Select from the anchor to a server",
          run: (args) => this.extend(args),
        },
      ],
      ["move", { syntax: "move <top|up|down|bottom>", summary: "Reorder the selection", run: (args) => this.move(args) }],
      [
        "status",
        {
          syntax: "status [addresses]",
          summary: "Query resolution, framerate and clock from servers",
          run: (args) => this.status(args),
        },
      ],
      ["refresh", { syntax: "refresh", summary: "Poll every server for its status", run: () => this.refresh() }],
      ["actions", { syntax: "actions", summary: "Show which actions are available", run: () => this.actions() }],
      ["images", { syntax: "images", summary: "List captured images", run: () => this.images() }],
      ["identify", { syntax: "identify", summary: "Blink the selected servers", run: () => this.batch("identify") }],
      [
        "configure",
        {
          syntax: "configure <WxH> [framerate]",
          summary: "Set resolution and/or framerate on the selection",
          run: (args) => this.configure(args),
        },
      ],
      [
        "reference",
        {
          syntax: "reference",
          summary: "Copy the selected server's settings to all others",
          run: () => this.batch("reference"),
        },
      ],
      ["capture", { syntax: "capture", summary: "Capture an image on the selection", run: () => this.batch("capture") }],
      ["copy", { syntax: "copy", summary: "Copy images off the selection", run: () => this.batch("copy") }],
      ["clear", { syntax: "clear", summary: "Discard the selection's images", run: () => this.batch("clear") }],
      ["export", { syntax: "export", summary: "Export every captured image", run: () => this.batch("export") }],
      ["quit", { syntax: "quit", summary: "Leave the console", run: () => this.quit(), quits: true }],
    ];
    return new Map(commands);
  }

  private help(args: string): string[] {
    const name = args.trim().toLowerCase();
    if (name) {
      const command = this.commands.get(name);
      if (!command) throw new Error(`Unknown command "${name}"`);
      return [`Syntax: ${command.syntax}`, command.summary];
    }
    const width = Math.max(...Array.from(this.commands.values(), (command) => command.syntax.length));
    return Array.from(this.commands.values(), (command) => `${command.syntax.padEnd(width)}  ${command.summary}`);
  }

  private config(): string[] {
    return formatTable([["Setting", "Value"], ...describeSettings(this.settings)]);
  }

  private servers(): string[] {
    const fleet = this.dispatcher.getFleet();
    if (fleet.length === 0) return ["No servers are defined"];

    const selected = new Set(this.dispatcher.getSelection());
    const inFlight = this.dispatcher.getInFlight();
    return formatTable([
      ["#", "Address", "Label", "Status", "Sel", "Busy"],
      ...fleet.map((entry, index) => [
        String(index + 1),
        entry.id,
        entry.label,
        entry.status,
        selected.has(entry.id) ? "*" : "",
        inFlight.get(entry.id) ?? "",
      ]),
    ]);
  }

  private async find(): Promise<string[]> {
    this.dispatcher.invoke("find");
    await this.dispatcher.idle();
    const count = this.dispatcher.getFleet().length;
    if (count === 0) throw new Error("Failed to find any servers");
    return [`Found ${count} servers`];
  }

  private add(args: string): string[] {
    if (!args.trim()) throw new Error("You must specify address(es) to add");

    let added = 0;
    let skipped = 0;
    for (const address of this.parser.parseAddressList(args)) {
      try {
        this.dispatcher.add({ id: address, label: address });
        added++;
      } catch (error) {
        if (!(error instanceof DuplicateIdentifierError)) throw error;
        skipped++;
      }
    }
    const lines = [`Added ${added} server(s)`];
    if (skipped > 0) lines.push(`Skipped ${skipped} already defined`);
    return lines;
  }

  private remove(args: string): string[] {
    if (args.trim()) {
      const removed = this.dispatcher.remove(this.parser.parseAddressList(args));
      return [`Removed ${removed.length} server(s)`];
    }
    this.requireServers();
    const receipt = this.dispatcher.invoke("remove");
    return [`Removed ${receipt.ids.length} server(s)`];
  }

  private select(args: string): string[] {
    const target = args.trim().toLowerCase();
    if (!target) throw new Error("You must specify address(es), all or none");

    if (target === "all") {
      this.dispatcher.selectAll();
    } else if (target === "none") {
      this.dispatcher.clearSelection();
    } else {
      this.dispatcher.select(this.parser.parseAddressList(args));
    }
    return [this.selectionSummary()];
  }

  private toggle(args: string): string[] {
    this.dispatcher.toggle(this.parser.parseAddress(args));
    return [this.selectionSummary()];
  }

  private extend(args: string): string[] {
    this.dispatcher.extendRangeTo(this.parser.parseAddress(args));
    return [this.selectionSummary()];
  }

  private move(args: string): string[] {
    const direction = args.trim().toLowerCase();
    const action = MOVES[direction];
    if (!action) throw new Error("Expected one of top, up, down, bottom");

    const receipt = this.dispatcher.invoke(action);
    return [`Moved ${receipt.ids.length} server(s) ${direction}`];
  }

  private async status(args: string): Promise<string[]> {
    this.requireServers();
    const fleet = this.dispatcher.getFleet().map((entry) => entry.id);
    const wanted = new Set(args.trim() ? this.parser.parseAddressList(args) : fleet);
    const targets = fleet.filter((id) => wanted.has(id));
    if (targets.length === 0) throw new Error("None of those servers are defined");

    const reports = await this.dispatcher.queryStatus(targets);
    const lines =
      reports.length > 0
        ? formatTable([
            ["Address", "Resolution", "Framerate", "Timestamp"],
            ...reports.map((report) => [report.id, report.resolution, `${report.framerate}fps`, report.timestamp]),
          ])
        : [];

    const answered = new Set(reports.map((report) => report.id));
    for (const id of targets) {
      if (!answered.has(id)) lines.push(`${id}: ${this.paint("red", "no response")}`);
    }
    return lines;
  }

  private async refresh(): Promise<string[]> {
    this.requireServers();
    const receipt = this.dispatcher.invoke("refresh");
    await this.dispatcher.idle();
    return [`Refreshed ${receipt.ids.length} server(s)`];
  }

  private actions(): string[] {
    return ACTION_NAMES.map((action) => {
      const reason = this.dispatcher.whyDisabled(action);
      return reason === null
        ? `${action.padEnd(10)}  ${this.paint("green", "enabled")}`
        : `${action.padEnd(10)}  ${this.paint("gray", `disabled (${reason})`)}`;
    });
  }

  private images(): string[] {
    const images = this.dispatcher.getImages();
    if (images.length === 0) return ["No images captured"];

    return formatTable([
      ["Image", "Server", "Captured", "Orphaned"],
      ...images.map((image) => [image.id, image.ownerId, image.capturedAt, image.orphaned ? "yes" : ""]),
    ]);
  }

  private configure(args: string): Promise<string[]> {
    const settings: CameraSettingsInput = {};
    for (const token of args.split(/\s+/).filter(Boolean)) {
      if (token.toLowerCase().includes("x")) {
        settings.resolution = token;
      } else {
        settings.framerate = token;
      }
    }
    if (settings.resolution === undefined && settings.framerate === undefined) {
      throw new Error("You must specify a resolution and/or framerate");
    }
    return this.batch("configure", { settings });
  }

  private quit(): string[] {
    this.dispatcher.invoke("quit");
    return [];
  }

  /**
   * Invoke a batch action, wait for its report and list the outcomes.
   */
  private async batch(action: ActionName, options: InvokeOptions = {}): Promise<string[]> {
    if (action !== "export") this.requireServers();

    const receipt = this.dispatcher.invoke(action, options);
    await this.dispatcher.idle();

    const index = this.completions.findIndex((event) => event.dispatchId === receipt.dispatchId);
    if (index < 0) return [`${action}: no report received`];
    const [report] = this.completions.splice(index, 1);

    const succeeded = report.outcomes.filter((outcome) => outcome.ok).length;
    return [
      `${action}: ${succeeded}/${report.outcomes.length} succeeded`,
      ...report.outcomes.map((outcome) =>
        outcome.ok
          ? `  ${outcome.id}: ok`
          : `  ${outcome.id}: ${this.paint("red", `failed (${outcome.reason ?? "no reason given"})`)}`
      ),
    ];
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private requireServers(): void {
    if (this.dispatcher.getFleet().length === 0) {
      throw new Error("You must define servers first (see help for 'find' and 'add')");
    }
  }

  private selectionSummary(): string {
    return `${this.dispatcher.getSelection().length} server(s) selected`;
  }

  private paint(color: ColorKey, text: string): string {
    return paint(text, color, this.color);
  }
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => issue.message).join("; ");
  }
  return getErrorMessage(error);
}
