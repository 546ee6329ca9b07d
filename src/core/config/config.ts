// src/core/config/config.ts
// Configuration system for sketchlang

import * as fs from "fs";
import * as path from "path";
import { type LogLevel, isLogLevel } from "../log";

// =========================================================================
// Configuration Types
// =========================================================================

export type ServerConfig = {
  /** Port for the HTTP/WebSocket server (0 picks a free port) */
  port: number;
  /** Interface to bind */
  host: string;
};

export type LogConfig = {
  level: LogLevel;
};

export type ReplConfig = {
  /** Prompt shown by the interactive terminal */
  prompt: string;
  /** Skip drawables whose repr is already on the figure */
  dedupe: boolean;
};

export type SketchConfig = {
  server: ServerConfig;
  log: LogConfig;
  repl: ReplConfig;
};

export type PartialSketchConfig = {
  server?: Partial<ServerConfig>;
  log?: Partial<LogConfig>;
  repl?: Partial<ReplConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3456,
  host: "127.0.0.1",
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_REPL_CONFIG: ReplConfig = {
  prompt: "sketch> ",
  dedupe: true,
};

export const DEFAULT_CONFIG: SketchConfig = {
  server: DEFAULT_SERVER_CONFIG,
  log: DEFAULT_LOG_CONFIG,
  repl: DEFAULT_REPL_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["sketch.config.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function envInt(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "SKETCH"): SketchConfig {
  const level = process.env[`${prefix}_LOG_LEVEL`];
  return {
    server: {
      port: envInt(process.env[`${prefix}_PORT`]) ?? DEFAULT_SERVER_CONFIG.port,
      host: process.env[`${prefix}_HOST`] || DEFAULT_SERVER_CONFIG.host,
    },
    log: {
      level: level && isLogLevel(level) ? level : DEFAULT_LOG_CONFIG.level,
    },
    repl: {
      prompt: process.env[`${prefix}_PROMPT`] || DEFAULT_REPL_CONFIG.prompt,
      dedupe: envBool(process.env[`${prefix}_DEDUPE`]) ?? DEFAULT_REPL_CONFIG.dedupe,
    },
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialSketchConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = data[key];
  return isRecord(v) ? v : {};
}

/**
 * Pick the recognised fields out of a plain object (e.g. parsed JSON).
 * Unknown keys and values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): PartialSketchConfig {
  const server = section(data, "server");
  const log = section(data, "log");
  const repl = section(data, "repl");

  const out: PartialSketchConfig = { server: {}, log: {}, repl: {} };
  if (typeof server.port === "number") out.server = { ...out.server, port: server.port };
  if (typeof server.host === "string") out.server = { ...out.server, host: server.host };
  if (typeof log.level === "string" && isLogLevel(log.level)) out.log = { level: log.level };
  if (typeof repl.prompt === "string") out.repl = { ...out.repl, prompt: repl.prompt };
  if (typeof repl.dedupe === "boolean") out.repl = { ...out.repl, dedupe: repl.dedupe };
  return out;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: SketchConfig, ...configs: PartialSketchConfig[]): SketchConfig {
  let result: SketchConfig = { ...base };

  for (const cfg of configs) {
    if (cfg.server) {
      result = { ...result, server: { ...result.server, ...cfg.server } };
    }
    if (cfg.log) {
      result = { ...result, log: { ...result.log, ...cfg.log } };
    }
    if (cfg.repl) {
      result = { ...result, repl: { ...result.repl, ...cfg.repl } };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialSketchConfig;
}): SketchConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: SketchConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const { port, host } = config.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    errors.push(`server.port must be an integer between 0 and 65535, got ${port}`);
  }
  if (!host) {
    errors.push("server.host must not be empty");
  } else if (host === "0.0.0.0") {
    warnings.push("server.host 0.0.0.0 exposes the command server on every interface");
  }
  if (!config.repl.prompt) {
    warnings.push("repl.prompt is empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
