/**
 * Centralized configuration for the coordinator and the console.
 *
 * This module re-exports from domain-specific config files:
 * - network.ts: camera network, ports, response timeout, output directory
 * - coordinator.ts: image and dispatch policy
 * - telemetry.ts: OpenTelemetry export
 * - validation.ts: loading and startup validation
 */

export { parsePositiveInt, parseBoolean } from "./helpers.js";

export {
  DEFAULT_NETWORK,
  DEFAULT_SERVER_PORT,
  DEFAULT_CLIENT_PORT,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  DEFAULT_OUTPUT_DIR,
  networkSettingsFromEnv,
  type NetworkSettings,
} from "./network.js";

export {
  DEFAULT_DISPATCH_TIMEOUT_MS,
  coordinatorSettingsFromEnv,
  type CoordinatorSettings,
} from "./coordinator.js";

export { TELEMETRY_CONFIG } from "./telemetry.js";

export {
  loadSettings,
  validateConfig,
  validateConfigOrThrow,
  describeSettings,
  type ConfigError,
  type Settings,
} from "./validation.js";
