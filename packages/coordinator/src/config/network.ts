/**
 * Network settings for reaching the camera servers.
 * Mirrors what the console prints for `config`.
 */

import { parsePositiveInt } from "./helpers.js";

/** Network the camera servers live on */
export const DEFAULT_NETWORK = "192.168.0.0/16";

/** UDP port the servers listen on */
export const DEFAULT_SERVER_PORT = 8000;

/** UDP port the client listens on for responses */
export const DEFAULT_CLIENT_PORT = 8000;

/** Time to wait for server responses (5 seconds) */
export const DEFAULT_RESPONSE_TIMEOUT_MS = 5 * 1000;

/** Where exported images are written */
export const DEFAULT_OUTPUT_DIR = "/tmp";

export interface NetworkSettings {
  network: string;
  serverPort: number;
  clientPort: number;
  timeoutMs: number;
  outputDir: string;
}

export function networkSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): NetworkSettings {
  return {
    network: env.CAMFLEET_NETWORK?.trim() || DEFAULT_NETWORK,
    serverPort: parsePositiveInt(env.CAMFLEET_SERVER_PORT, DEFAULT_SERVER_PORT),
    clientPort: parsePositiveInt(env.CAMFLEET_CLIENT_PORT, DEFAULT_CLIENT_PORT),
    timeoutMs: parsePositiveInt(env.CAMFLEET_TIMEOUT_MS, DEFAULT_RESPONSE_TIMEOUT_MS),
    outputDir: env.CAMFLEET_OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
  };
}
