/**
 * OpenTelemetry SDK initialization for the camfleet console.
 *
 * Exports traces and metrics over OTLP/HTTP when CAMFLEET_OTLP_ENDPOINT is
 * set. Call initTelemetry before constructing the coordinator.
 */

import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-proto";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";
import { createLogger } from "../utils/logger.js";
// Use string literals for semantic conventions to avoid version incompatibilities
const ATTR_SERVICE_NAME = "service.name";
const ATTR_DEPLOYMENT_ENVIRONMENT = "deployment.environment";
const ATTR_SERVICE_VERSION = "service.version";

const logger = createLogger("TELEMETRY");

let sdk: NodeSDK | null = null;
let initialized = false;

export function initTelemetry(): void {
  if (initialized) {
    logger.debug("Telemetry already initialized");
    return;
  }
  initialized = true;

  const endpoint = TELEMETRY_CONFIG.getEndpoint();
  if (!endpoint) {
    logger.debug(`Telemetry disabled (${TELEMETRY_CONFIG.endpointEnvVar} not set)`);
    return;
  }

  const base = endpoint.replace(/\/+$/, "");

  const metricReader = new PeriodicExportingMetricReader({
    exporter: new OTLPMetricExporter({ url: `${base}/v1/metrics` }),
    exportIntervalMillis: TELEMETRY_CONFIG.metricsIntervalMs,
  });

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: TELEMETRY_CONFIG.serviceName,
    [ATTR_DEPLOYMENT_ENVIRONMENT]: TELEMETRY_CONFIG.getEnvironment(),
    [ATTR_SERVICE_VERSION]: process.env.npm_package_version || "0.0.0",
  });

  sdk = new NodeSDK({
    resource,
    traceExporter: new OTLPTraceExporter({ url: `${base}/v1/traces` }),
    metricReader,
  });

  sdk.start();
  logger.info(
    `Telemetry initialized for service: ${TELEMETRY_CONFIG.serviceName} (${TELEMETRY_CONFIG.getEnvironment()})`
  );
}

/**
 * Flush and stop the SDK. Safe to call when telemetry never started.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (!sdk) {
    return;
  }

  try {
    await sdk.shutdown();
    logger.info("Telemetry shutdown complete");
  } catch (error) {
    logger.error("Error shutting down telemetry", error);
  } finally {
    sdk = null;
  }
}

export function isTelemetryEnabled(): boolean {
  return sdk !== null;
}

export { withSpanSync, recordError, addFleetAttributes } from "./spans.js";
export {
  getMetrics,
  recordFleetShape,
  recordDispatch,
  recordOutcome,
  recordRejection,
} from "./metrics.js";
