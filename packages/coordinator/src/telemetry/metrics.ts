/**
 * Coordinator metrics: dispatch counts, per-server failures and rejections.
 */

import { metrics, type Counter, type Meter } from "@opentelemetry/api";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";

let meter: Meter | null = null;

// Metric instruments (lazily initialized)
let dispatchCounter: Counter | null = null;
let outcomeCounter: Counter | null = null;
let rejectionCounter: Counter | null = null;

// Observable values (updated externally)
let fleetSize = 0;
let inFlightCount = 0;

/**
 * Get or create the metrics instance.
 */
export function getMetrics(): Meter {
  if (!meter) {
    meter = metrics.getMeter(TELEMETRY_CONFIG.serviceName);
    initializeMetrics(meter);
  }
  return meter;
}

function initializeMetrics(m: Meter): void {
  m.createObservableGauge("camfleet.fleet.size", {
    description: "Number of servers in the fleet list",
    unit: "{servers}",
  }).addCallback((result) => {
    result.observe(fleetSize);
  });

  m.createObservableGauge("camfleet.fleet.in_flight", {
    description: "Number of servers with an action in flight",
    unit: "{servers}",
  }).addCallback((result) => {
    result.observe(inFlightCount);
  });

  dispatchCounter = m.createCounter("camfleet.dispatches", {
    description: "Batch actions handed to a collaborator",
    unit: "{dispatches}",
  });

  outcomeCounter = m.createCounter("camfleet.outcomes", {
    description: "Per-server outcomes of completed batch actions",
    unit: "{outcomes}",
  });

  rejectionCounter = m.createCounter("camfleet.rejections", {
    description: "Invocations rejected because the action was disabled",
    unit: "{rejections}",
  });
}

export function recordFleetShape(size: number, inFlight: number): void {
  getMetrics();
  fleetSize = size;
  inFlightCount = inFlight;
}

export function recordDispatch(action: string, targets: number): void {
  getMetrics();
  dispatchCounter?.add(1, { action, targets });
}

export function recordOutcome(action: string, ok: boolean): void {
  getMetrics();
  outcomeCounter?.add(1, { action, ok });
}

export function recordRejection(action: string): void {
  getMetrics();
  rejectionCounter?.add(1, { action });
}
