import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describeSettings, loadSettings, validateConfig, validateConfigOrThrow } from "./validation.js";
import { parseBoolean, parsePositiveInt } from "./helpers.js";

describe("config helpers", () => {
  it("parses positive integers with a floor", () => {
    expect(parsePositiveInt("42", 7)).toBe(42);
    expect(parsePositiveInt("0", 7)).toBe(7);
    expect(parsePositiveInt("0", 7, 0)).toBe(0);
    expect(parsePositiveInt("soon", 7)).toBe(7);
    expect(parsePositiveInt(undefined, 7)).toBe(7);
  });

  it("parses flags", () => {
    expect(parseBoolean("YES", false)).toBe(true);
    expect(parseBoolean(" off ", true)).toBe(false);
    expect(parseBoolean("maybe", true)).toBe(true);
  });
});

describe("loadSettings", () => {
  it("falls back to defaults", () => {
    expect(loadSettings({})).toEqual({
      network: {
        network: "192.168.0.0/16",
        serverPort: 8000,
        clientPort: 8000,
        timeoutMs: 5000,
        outputDir: "/tmp",
      },
      coordinator: { strictImages: false, consumeOnExport: false, dispatchTimeoutMs: 30000 },
    });
  });

  it("reads the environment", () => {
    const settings = loadSettings({
      CAMFLEET_NETWORK: "10.0.0.0/24",
      CAMFLEET_SERVER_PORT: "9100",
      CAMFLEET_STRICT_IMAGES: "1",
      CAMFLEET_DISPATCH_TIMEOUT_MS: "0",
    });
    expect(settings.network.network).toBe("10.0.0.0/24");
    expect(settings.network.serverPort).toBe(9100);
    expect(settings.coordinator.strictImages).toBe(true);
    expect(settings.coordinator.dispatchTimeoutMs).toBe(0);
  });
});

describe("validateConfig", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "camfleet-config-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("accepts valid settings", () => {
    expect(validateConfig(loadSettings({ CAMFLEET_OUTPUT_DIR: dir }))).toEqual([]);
  });

  it("names the environment variable of each bad field", () => {
    const settings = loadSettings({ CAMFLEET_NETWORK: "10.0.0.0/40", CAMFLEET_OUTPUT_DIR: dir });
    settings.network.clientPort = 70000;

    expect(validateConfig(settings)).toEqual([
      { field: "CAMFLEET_NETWORK", message: 'Invalid network "10.0.0.0/40"' },
      { field: "CAMFLEET_CLIENT_PORT", message: "Number must be less than or equal to 65535" },
    ]);
  });

  it("rejects an output path that is a file", () => {
    const file = join(dir, "not-a-dir");
    writeFileSync(file, "");
    expect(validateConfig(loadSettings({ CAMFLEET_OUTPUT_DIR: file }))).toEqual([
      { field: "CAMFLEET_OUTPUT_DIR", message: `Path exists but is not a directory: ${file}` },
    ]);
  });

  it("throws with every problem listed", () => {
    const settings = loadSettings({ CAMFLEET_NETWORK: "nowhere", CAMFLEET_OUTPUT_DIR: dir });
    expect(() => validateConfigOrThrow(settings)).toThrow(
      'Configuration validation failed:\n  - CAMFLEET_NETWORK: Invalid network "nowhere"'
    );
  });
});

describe("describeSettings", () => {
  it("lists settings in display order", () => {
    expect(describeSettings(loadSettings({}))).toEqual([
      ["network", "192.168.0.0/16"],
      ["timeout", "5000ms"],
      ["client_port", "8000"],
      ["server_port", "8000"],
      ["path", "/tmp"],
      ["strict_images", "false"],
      ["consume_on_export", "false"],
      ["dispatch_timeout", "30000ms"],
    ]);
  });
});
