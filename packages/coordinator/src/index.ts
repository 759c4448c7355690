/**
 * @camfleet/coordinator public API.
 */

export * from "./schema.js";
export * from "./fleet/index.js";
export * from "./config/index.js";
export {
  AddressParser,
  MAX_RANGE_SIZE,
  intToIpv4,
  ipv4ToInt,
  networkContains,
  parseNetwork,
  type Ipv4Network,
} from "./network/address.js";
export {
  SimulatedFleet,
  type SimulatedFleetOptions,
  type SimulatedServerOptions,
} from "./network/simulated-fleet.js";
export { FleetConsole, type ConsoleReply, type FleetConsoleOptions } from "./console/fleet-console.js";
export { formatTable } from "./console/table.js";
export { initTelemetry, shutdownTelemetry, isTelemetryEnabled } from "./telemetry/index.js";
export {
  CoordinatorError,
  DuplicateIdentifierError,
  ActionNotPermittedError,
  UnknownOwnerError,
  AddressSyntaxError,
  InvariantViolation,
  TimeoutError,
  createLogger,
  silentLogger,
  type CoordinatorErrorCode,
  type Logger,
  type LogSink,
} from "./utils/index.js";
