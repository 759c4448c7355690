/**
 * Configuration validation - checks settings and the output directory on startup.
 * Fails fast with clear error messages rather than silent runtime failures.
 */

import fs from "node:fs";
import { z } from "zod";
import { parseNetwork } from "../network/address.js";
import { networkSettingsFromEnv, type NetworkSettings } from "./network.js";
import { coordinatorSettingsFromEnv, type CoordinatorSettings } from "./coordinator.js";

export interface ConfigError {
  field: string;
  message: string;
}

export interface Settings {
  network: NetworkSettings;
  coordinator: CoordinatorSettings;
}

const PortSchema = z.number().int().min(1).max(65535);

const NetworkSettingsSchema = z.object({
  network: z.string().superRefine((value, ctx) => {
    try {
      parseNetwork(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }),
  serverPort: PortSchema,
  clientPort: PortSchema,
  timeoutMs: z.number().int().positive(),
  outputDir: z.string().min(1),
});

const FIELD_NAMES: Record<string, string> = {
  network: "CAMFLEET_NETWORK",
  serverPort: "CAMFLEET_SERVER_PORT",
  clientPort: "CAMFLEET_CLIENT_PORT",
  timeoutMs: "CAMFLEET_TIMEOUT_MS",
  outputDir: "CAMFLEET_OUTPUT_DIR",
};

/**
 * Read every setting from the environment.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    network: networkSettingsFromEnv(env),
    coordinator: coordinatorSettingsFromEnv(env),
  };
}

/**
 * Verify a directory exists and is writable.
 * @returns Error if it does not, undefined if fine
 */
function checkDirectory(dirPath: string, fieldName: string): ConfigError | undefined {
  try {
    const stat = fs.statSync(dirPath);
    if (!stat.isDirectory()) {
      return { field: fieldName, message: `Path exists but is not a directory: ${dirPath}` };
    }
    fs.accessSync(dirPath, fs.constants.W_OK);
    return undefined;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { field: fieldName, message: `Cannot access directory ${dirPath}: ${message}` };
  }
}

/**
 * Validate settings.
 * @returns Array of configuration errors (empty if valid)
 */
export function validateConfig(settings: Settings): ConfigError[] {
  const errors: ConfigError[] = [];

  const parsed = NetworkSettingsSchema.safeParse(settings.network);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const key = String(issue.path[0] ?? "");
      errors.push({ field: FIELD_NAMES[key] ?? key, message: issue.message });
    }
  }

  const outputError = checkDirectory(settings.network.outputDir, "CAMFLEET_OUTPUT_DIR");
  if (outputError) errors.push(outputError);

  return errors;
}

/**
 * Validate configuration or throw with detailed error message.
 * Call this early in startup to fail fast.
 */
export function validateConfigOrThrow(settings: Settings): void {
  const errors = validateConfig(settings);
  if (errors.length > 0) {
    const messages = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Configuration validation failed:\n${messages}`);
  }
}

/**
 * Settings as name/value rows, in the order the console prints them.
 */
export function describeSettings(settings: Settings): Array<[string, string]> {
  return [
    ["network", settings.network.network],
    ["timeout", `${settings.network.timeoutMs}ms`],
    ["client_port", String(settings.network.clientPort)],
    ["server_port", String(settings.network.serverPort)],
    ["path", settings.network.outputDir],
    ["strict_images", String(settings.coordinator.strictImages)],
    ["consume_on_export", String(settings.coordinator.consumeOnExport)],
    ["dispatch_timeout", `${settings.coordinator.dispatchTimeoutMs}ms`],
  ];
}
