#!/usr/bin/env node
/**
 * camfleet console
 *
 * Interactive shell over the coordinator, backed by a simulated fleet of
 * camera servers on the configured network.
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { existsSync } from "node:fs";
import { createInterface } from "node:readline";
import { initTelemetry, shutdownTelemetry } from "./telemetry/index.js";
import { loadSettings, validateConfigOrThrow, parsePositiveInt } from "./config/index.js";
import { CommandDispatcher } from "./fleet/command-dispatcher.js";
import { AddressParser, intToIpv4 } from "./network/address.js";
import { SimulatedFleet } from "./network/simulated-fleet.js";
import { FleetConsole } from "./console/fleet-console.js";
import { colors } from "./utils/colors.js";
import { getErrorMessage } from "./utils/errors.js";

const PROMPT = "camfleet> ";
const DEFAULT_SIMULATED_SERVERS = 4;

// Load .env from project root (handles both src and dist execution)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envPaths = [
  path.resolve(__dirname, "../../../.env"), // from packages/coordinator/src/
  path.resolve(__dirname, "../../../../.env"), // from dist/packages/coordinator/src/
  path.resolve(process.cwd(), ".env"),
];
for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

async function main(): Promise<void> {
  initTelemetry();

  const settings = loadSettings();
  validateConfigOrThrow(settings);

  const parser = new AddressParser(settings.network.network);
  const simulated = new SimulatedFleet({ latencyMs: 50 });
  const count = parsePositiveInt(process.env.CAMFLEET_SIMULATED_SERVERS, DEFAULT_SIMULATED_SERVERS, 0);
  for (let i = 1; i <= count; i++) {
    simulated.addServer(intToIpv4(parser.network.base + i));
  }

  const dispatcher = new CommandDispatcher({
    executor: simulated,
    discovery: simulated,
    images: simulated,
    strictImages: settings.coordinator.strictImages,
    consumeOnExport: settings.coordinator.consumeOnExport,
    dispatchTimeoutMs: settings.coordinator.dispatchTimeoutMs,
  });
  const shell = new FleetConsole({
    dispatcher,
    parser,
    settings,
    color: process.stdout.isTTY,
  });

  console.log(`${colors.bold}camfleet${colors.reset} on ${parser.network.cidr} (${count} simulated servers)`);
  console.log(`Type "help" for commands.`);

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: PROMPT });
  rl.prompt();
  for await (const line of rl) {
    const reply = await shell.execute(line);
    for (const text of reply.lines) {
      console.log(text);
    }
    if (reply.quit) break;
    rl.prompt();
  }
  rl.close();

  await dispatcher.idle();
  dispatcher.dispose();
  await shutdownTelemetry();
}

main().catch((error: unknown) => {
  console.error(`${colors.red}Fatal error:${colors.reset} ${getErrorMessage(error)}`);
  process.exit(1);
});
