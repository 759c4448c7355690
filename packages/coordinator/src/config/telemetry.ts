/**
 * Telemetry configuration for OpenTelemetry export.
 *
 * Export is off unless CAMFLEET_OTLP_ENDPOINT points at a collector.
 */

export const TELEMETRY_CONFIG = {
  /** Service name reported to the collector */
  serviceName: "camfleet-coordinator",

  /** Environment variable holding the OTLP/HTTP base URL */
  endpointEnvVar: "CAMFLEET_OTLP_ENDPOINT",

  /** Get the collector base URL from environment */
  getEndpoint: (): string | undefined => process.env.CAMFLEET_OTLP_ENDPOINT,

  /** Get deployment environment name */
  getEnvironment: (): string => process.env.NODE_ENV || "local",

  /** Metric collection interval (ms) */
  metricsIntervalMs: 60000,
} as const;
