/**
 * Coordinator policy switches.
 */

import { parseBoolean, parsePositiveInt } from "./helpers.js";

/** Time limit for a dispatched batch before it is reported as failed (30 seconds) */
export const DEFAULT_DISPATCH_TIMEOUT_MS = 30 * 1000;

export interface CoordinatorSettings {
  /** Reject images whose owner is not in the fleet instead of storing them orphaned */
  strictImages: boolean;
  /** Drop exported images from the collection once the pipeline confirms them */
  consumeOnExport: boolean;
  dispatchTimeoutMs: number;
}

export function coordinatorSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): CoordinatorSettings {
  return {
    strictImages: parseBoolean(env.CAMFLEET_STRICT_IMAGES, false),
    consumeOnExport: parseBoolean(env.CAMFLEET_CONSUME_ON_EXPORT, false),
    dispatchTimeoutMs: parsePositiveInt(env.CAMFLEET_DISPATCH_TIMEOUT_MS, DEFAULT_DISPATCH_TIMEOUT_MS, 0),
  };
}
