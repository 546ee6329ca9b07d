#!/usr/bin/env node
// bin/sketch.ts
// sketch CLI - interactive terminal, one-shot evaluation and command server
//
// Run:  npx tsx bin/sketch.ts [options]

import * as readline from "readline";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  evalToLines,
  createReplState,
  handleReplLine,
  type CliConfig,
} from "./sketch-cli-lib";
import { loadConfig, validateConfig, type SketchConfig, type PartialSketchConfig } from "../src/core/config";
import { defaultRegistries } from "../src/core/patterns/builtins";
import { createLogger } from "../src/core/log";
import { startCommandServer } from "../src/server";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  const cli = buildConfig(cliArgs);
  const config = resolveConfig(cli);

  const check = validateConfig(config);
  for (const w of check.warnings) console.warn(`warning: ${w}`);
  if (!check.valid) {
    for (const e of check.errors) console.error(`config error: ${e}`);
    process.exit(1);
  }

  if (cli.mode === "exec") {
    executeMode(cli, config);
  } else if (cli.mode === "serve") {
    await serveMode(config);
  } else {
    await replMode(config);
  }
}

function resolveConfig(cli: CliConfig): SketchConfig {
  const overrides: PartialSketchConfig = {};
  if (cli.port !== undefined) overrides.server = { port: cli.port };
  if (cli.verbose) overrides.log = { level: "debug" };
  return loadConfig({ configFile: cli.configFile, overrides });
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (--eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(cli: CliConfig, config: SketchConfig): void {
  if (cli.code === undefined || cli.code.trim() === "") {
    console.error("Error: No command specified");
    process.exit(1);
  }

  const log = createLogger("eval", config.log.level);
  const { ok, lines } = evalToLines(cli.code, defaultRegistries(), log);
  for (const line of lines) {
    if (ok) console.log(line);
    else console.error(line);
  }
  process.exit(ok ? 0 : 1);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVE MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function serveMode(config: SketchConfig): Promise<void> {
  const { server, port } = await startCommandServer(defaultRegistries(), config);
  console.log(`sketch server listening on http://${config.server.host}:${port}`);

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("Error during shutdown:", e);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function replMode(config: SketchConfig): Promise<void> {
  const state = createReplState(defaultRegistries(), {
    dedupe: config.repl.dedupe,
    log: createLogger("repl", config.log.level),
  });

  console.log(`${getVersion()} - type :help for commands`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: config.repl.prompt,
  });

  rl.prompt();
  for await (const line of rl) {
    const out = handleReplLine(state, line);
    for (const l of out.lines) console.log(l);
    if (out.quit) break;
    rl.prompt();
  }
  rl.close();
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
