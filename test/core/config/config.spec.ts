// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Create a fresh copy
    process.env = { ...originalEnv };
    delete process.env.SKETCH_PORT;
    delete process.env.SKETCH_HOST;
    delete process.env.SKETCH_LOG_LEVEL;
    delete process.env.SKETCH_PROMPT;
    delete process.env.SKETCH_DEDUPE;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_CONFIG);
  });

  it("reads server settings", () => {
    process.env.SKETCH_PORT = "8080";
    process.env.SKETCH_HOST = "localhost";
    const config = configFromEnv();
    expect(config.server).toEqual({ port: 8080, host: "localhost" });
  });

  it("ignores a non-numeric port", () => {
    process.env.SKETCH_PORT = "eighty";
    expect(configFromEnv().server.port).toBe(DEFAULT_CONFIG.server.port);
  });

  it("reads the log level only when it is a known level", () => {
    process.env.SKETCH_LOG_LEVEL = "debug";
    expect(configFromEnv().log.level).toBe("debug");
    process.env.SKETCH_LOG_LEVEL = "loud";
    expect(configFromEnv().log.level).toBe("warn");
  });

  it("reads REPL settings", () => {
    process.env.SKETCH_PROMPT = "> ";
    process.env.SKETCH_DEDUPE = "false";
    expect(configFromEnv().repl).toEqual({ prompt: "> ", dedupe: false });
  });

  it("supports a custom prefix", () => {
    process.env.DRAW_PORT = "9000";
    expect(configFromEnv("DRAW").server.port).toBe(9000);
  });
});

describe("configFromObject", () => {
  it("picks recognised fields", () => {
    expect(configFromObject({ server: { port: 1234 }, log: { level: "info" }, repl: { dedupe: false } })).toEqual({
      server: { port: 1234 },
      log: { level: "info" },
      repl: { dedupe: false },
    });
  });

  it("drops unknown keys and wrongly typed values", () => {
    expect(configFromObject({ server: { port: "1234", extra: true }, log: { level: "loud" }, other: 1 })).toEqual({
      server: {},
      log: {},
      repl: {},
    });
  });
});

describe("configFromFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sketch-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads a JSON file", () => {
    const file = path.join(dir, "sketch.config.json");
    fs.writeFileSync(file, JSON.stringify({ server: { host: "0.0.0.0" }, repl: { prompt: "$ " } }));
    expect(configFromFile(file)).toEqual({ server: { host: "0.0.0.0" }, log: {}, repl: { prompt: "$ " } });
  });

  it("rejects missing files, other formats and non-object JSON", () => {
    expect(() => configFromFile(path.join(dir, "missing.json"))).toThrow("Config file not found");

    const yaml = path.join(dir, "sketch.yaml");
    fs.writeFileSync(yaml, "server: {}");
    expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");

    const list = path.join(dir, "list.json");
    fs.writeFileSync(list, "[1, 2]");
    expect(() => configFromFile(list)).toThrow("Config file must contain a JSON object");
  });

  it("is layered by loadConfig under explicit overrides", () => {
    const file = path.join(dir, "custom.json");
    fs.writeFileSync(file, JSON.stringify({ server: { port: 5000, host: "localhost" } }));
    const config = loadConfig({ configFile: file, overrides: { server: { port: 6000 } } });
    expect(config.server).toEqual({ port: 6000, host: "localhost" });
  });
});

describe("mergeConfigs", () => {
  it("overrides section by section, later configs winning", () => {
    const merged = mergeConfigs(DEFAULT_CONFIG, { server: { port: 1 } }, { server: { port: 2 }, repl: { prompt: "# " } });
    expect(merged.server).toEqual({ port: 2, host: "127.0.0.1" });
    expect(merged.repl).toEqual({ prompt: "# ", dedupe: true });
    expect(merged.log).toEqual(DEFAULT_CONFIG.log);
  });

  it("does not mutate the base", () => {
    mergeConfigs(DEFAULT_CONFIG, { server: { port: 1 } });
    expect(DEFAULT_CONFIG.server.port).toBe(3456);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects an out-of-range port and an empty host", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { server: { port: 70000, host: "" } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "server.port must be an integer between 0 and 65535, got 70000",
      "server.host must not be empty",
    ]);
  });

  it("warns about binding every interface", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { server: { host: "0.0.0.0" } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(1);
  });
});
