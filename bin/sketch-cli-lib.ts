// bin/sketch-cli-lib.ts
// Shared CLI utilities for the sketch command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { PatternRegistries } from "../src/core/patterns/registry";
import { evaluateCommand, runCommand } from "../src/core/pipeline/runCommand";
import { astToString } from "../src/core/ast/ast";
import { formatError } from "../src/core/errors";
import { RecordingBackend } from "../src/core/figures/shapes";
import { renderDrawables, type Drawable } from "../src/core/figures/drawable";
import { match } from "../src/outcome/matchers";
import { silentLogger, type Logger } from "../src/core/log";
import { CommandSession } from "../src/server/commandSession";
import type { SerializedError } from "../src/server/protocol";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "repl" | "exec" | "serve";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  serve?: boolean;
  port?: number;
  config?: string;
  verbose?: boolean;
  mode?: CliMode;
};

export type CliConfig = {
  mode: CliMode;
  verbose: boolean;
  code?: string;
  port?: number;
  configFile?: string;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--serve") {
      result.serve = true;
      result.mode = result.mode ?? "serve";
    } else if (arg === "--port" || arg === "-p") {
      const n = parseInt(args[++i] ?? "", 10);
      if (!Number.isNaN(n)) result.port = n;
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    }
    // Ignore unknown flags
  }

  if (!result.mode) {
    result.mode = "repl";
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
sketch - figure command language

USAGE:
  sketch [options]                    Start the interactive terminal
  sketch --eval <command>             Run one command and print what it draws
  sketch --serve [--port <n>]         Start the HTTP/WebSocket command server

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <command>               Run a command and exit
  --serve                            Start the command server
  -p, --port <n>                     Server port (default 3456)
  -c, --config <file>                Load configuration from a JSON file
  --verbose                          Log every pipeline stage

${getReplHelpText()}

EXAMPLES:
  sketch --eval "point(3, 5)"
  sketch --eval "point(1, add(2)(3))"
  sketch --serve --port 8080
`.trim();
}

export function getReplHelpText(): string {
  return `REPL COMMANDS:
  <command>                          Run a command, e.g. point(3, 5)
  :help, :h                          Show this help
  :quit, :q                          Exit
  :patterns                          List registered patterns
  :ast <command>                     Show the parsed and reduced syntax tree
  :shapes <command>                  Show the primitive shapes a command draws
  :figure                            List everything drawn so far
  :clear                             Empty the figure`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  // bin/ when run from sources, dist/bin/ when built
  for (const up of ["..", path.join("..", "..")]) {
    const pkgPath = path.join(__dirname, up, "package.json");
    if (!fs.existsSync(pkgPath)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `sketchlang v${pkg.version}`;
    }
  }
  return "sketchlang v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): CliMode {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval !== undefined) {
    return "exec";
  }
  if (args.serve) {
    return "serve";
  }
  return "repl";
}

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const config: CliConfig = {
    mode: detectMode(args),
    verbose: args.verbose || false,
  };

  if (args.eval !== undefined) config.code = args.eval;
  if (args.port !== undefined) config.port = args.port;
  if (args.config) config.configFile = args.config;

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/** Error message plus, for positioned errors, the command with a caret under the offending char. */
export function formatCommandError(text: string, error: SerializedError): string[] {
  return caretLines(text, error.message, error.position);
}

function caretLines(text: string, message: string, position: number | undefined): string[] {
  const lines = [`error: ${message}`];
  if (position !== undefined) {
    lines.push(`  ${text}`);
    lines.push(`  ${" ".repeat(position)}^`);
  }
  return lines;
}

export type EvalLines = { ok: boolean; lines: string[] };

/** One-shot evaluation used by --eval: reprs on success, the error otherwise. */
export function evalToLines(text: string, registries: PatternRegistries, log: Logger = silentLogger): EvalLines {
  return match<Drawable[], EvalLines>(runCommand(text, registries, log), {
    done: d => ({ ok: true, lines: d.value.map(x => x.repr()) }),
    fail: f => ({ ok: false, lines: caretLines(text, f.failure.message, f.meta.span?.start) }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL
// ═══════════════════════════════════════════════════════════════════════════════

export type ReplState = {
  registries: PatternRegistries;
  session: CommandSession;
  log: Logger;
};

export type ReplOutput = {
  lines: string[];
  quit?: boolean;
};

export function createReplState(registries: PatternRegistries, options: { dedupe: boolean; log?: Logger }): ReplState {
  const log = options.log ?? silentLogger;
  return {
    registries,
    session: new CommandSession("repl", registries, { dedupe: options.dedupe, log }),
    log,
  };
}

export function handleReplLine(state: ReplState, raw: string): ReplOutput {
  const line = raw.trim();
  if (line === "") return { lines: [] };

  if (!line.startsWith(":")) return runLine(state, line);

  const space = line.indexOf(" ");
  const cmd = space < 0 ? line : line.slice(0, space);
  const rest = space < 0 ? "" : line.slice(space + 1).trim();

  switch (cmd) {
    case ":help":
    case ":h":
      return { lines: getReplHelpText().split("\n") };

    case ":quit":
    case ":q":
      return { lines: [], quit: true };

    case ":patterns":
      return {
        lines: [...state.registries.pure.describe(), ...state.registries.drawing.describe()]
          .map(p => `${p.kind.padEnd(7)} ${p.template}`),
      };

    case ":ast": {
      const r = evaluateCommand(rest, state.registries, state.log);
      if (!r.ok) return { lines: [`error: ${formatError(r.error)}`] };
      return { lines: [`ast:     ${astToString(r.ast)}`, `reduced: ${astToString(r.reduced)}`] };
    }

    case ":shapes": {
      const r = evaluateCommand(rest, state.registries, state.log);
      if (!r.ok) return { lines: [`error: ${formatError(r.error)}`] };
      const backend = new RecordingBackend();
      renderDrawables(r.drawables, backend);
      return { lines: backend.shapes.map(s => JSON.stringify(s)) };
    }

    case ":figure": {
      const figure = state.session.getFigure();
      if (figure.length === 0) return { lines: ["(figure is empty)"] };
      return { lines: figure.map((d, i) => `${i}: ${d.repr}`) };
    }

    case ":clear":
      state.session.clear();
      return { lines: ["figure cleared"] };

    default:
      return { lines: [`unknown command ${cmd} (try :help)`] };
  }
}

function runLine(state: ReplState, text: string): ReplOutput {
  const reply = state.session.run(text);
  if (!reply.ok) return { lines: formatCommandError(text, reply.error) };

  const lines = reply.drawables.map(d => `+ ${d.repr}`);
  if (reply.skipped > 0) lines.push(`(${reply.skipped} already on the figure)`);
  if (lines.length === 0) lines.push("(nothing to draw)");
  return { lines };
}
