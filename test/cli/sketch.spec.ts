// test/cli/sketch.spec.ts
// Tests for the sketch CLI helpers and REPL commands

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
  evalToLines,
  formatCommandError,
  createReplState,
  handleReplLine,
} from "../../bin/sketch-cli-lib";
import { defaultRegistries } from "../../src/core/patterns/builtins";

describe("sketch CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and -h", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-h"]).help).toBe(true);
    });

    it("should parse --version flag", () => {
      expect(parseCliArgs(["--version"]).version).toBe(true);
    });

    it("should parse --eval with a command", () => {
      const parsed = parseCliArgs(["--eval", "point(3, 5)"]);
      expect(parsed.eval).toBe("point(3, 5)");
      expect(parsed.mode).toBe("exec");
    });

    it("should parse --serve with a port", () => {
      const parsed = parseCliArgs(["--serve", "--port", "8080"]);
      expect(parsed.serve).toBe(true);
      expect(parsed.port).toBe(8080);
      expect(parsed.mode).toBe("serve");
    });

    it("should ignore a non-numeric port", () => {
      expect(parseCliArgs(["--port", "abc"]).port).toBeUndefined();
    });

    it("should parse --config and --verbose", () => {
      const parsed = parseCliArgs(["-c", "my.json", "--verbose"]);
      expect(parsed.config).toBe("my.json");
      expect(parsed.verbose).toBe(true);
    });

    it("should default to REPL mode with no arguments", () => {
      expect(parseCliArgs([]).mode).toBe("repl");
    });

    it("should ignore unknown flags", () => {
      expect(parseCliArgs(["--unknown-flag"]).mode).toBe("repl");
    });
  });

  describe("Help and version", () => {
    it("should list the options and REPL commands", () => {
      const help = getHelpText();
      expect(help).toContain("--eval");
      expect(help).toContain("--serve");
      expect(help).toContain(":patterns");
    });

    it("should return a version string", () => {
      expect(getVersion()).toMatch(/^sketchlang v\d+\.\d+\.\d+/);
    });
  });

  describe("Configuration building", () => {
    it("should detect the mode from the flags", () => {
      expect(detectMode({ eval: "point(1, 2)" })).toBe("exec");
      expect(detectMode({ serve: true })).toBe("serve");
      expect(detectMode({})).toBe("repl");
      expect(detectMode({ mode: "serve", eval: "x" })).toBe("serve");
    });

    it("should build a config for exec mode", () => {
      expect(buildConfig({ eval: "neg(1)", verbose: true })).toEqual({ mode: "exec", verbose: true, code: "neg(1)" });
    });

    it("should carry port and config file", () => {
      expect(buildConfig({ serve: true, port: 9000, config: "c.json" })).toEqual({
        mode: "serve",
        verbose: false,
        port: 9000,
        configFile: "c.json",
      });
    });
  });
});

describe("evalToLines", () => {
  const registries = defaultRegistries();

  it("prints one repr per drawable", () => {
    expect(evalToLines("point(1, add(2)(3)), circle((0, 0), 1)", registries)).toEqual({
      ok: true,
      lines: ["point(1, 5)", "circle((0, 0), 1)"],
    });
  });

  it("points at the character a parse error refers to", () => {
    expect(evalToLines("point(3, x y)", registries)).toEqual({
      ok: false,
      lines: [
        "error: Parse error: InvalidSyntax - failed to match any known pattern - got (x y) (char 9)",
        "  point(3, x y)",
        "           ^",
      ],
    });
  });

  it("prints evaluation errors without a caret", () => {
    expect(evalToLines("div(1, 0)", registries)).toEqual({
      ok: false,
      lines: ["error: Evaluation error in div: Cannot divide by zero"],
    });
  });
});

describe("formatCommandError", () => {
  it("omits the caret when there is no position", () => {
    expect(formatCommandError("f(1)", { kind: "NoMatch", message: "m" })).toEqual(["error: m"]);
  });
});

describe("REPL", () => {
  const fresh = () => createReplState(defaultRegistries(), { dedupe: true });

  it("draws commands and skips duplicates", () => {
    const state = fresh();
    expect(handleReplLine(state, "point(1, 2)").lines).toEqual(["+ point(1, 2)"]);
    expect(handleReplLine(state, "point(1, 2), point(2, 3)").lines).toEqual([
      "+ point(2, 3)",
      "(1 already on the figure)",
    ]);
    expect(handleReplLine(state, ":figure").lines).toEqual(["0: point(1, 2)", "1: point(2, 3)"]);
  });

  it("reports pure commands as drawing nothing", () => {
    expect(handleReplLine(fresh(), "add(1, 2)").lines).toEqual(["(nothing to draw)"]);
  });

  it("ignores blank lines", () => {
    expect(handleReplLine(fresh(), "   ")).toEqual({ lines: [] });
  });

  it("quits on :quit and :q", () => {
    expect(handleReplLine(fresh(), ":quit").quit).toBe(true);
    expect(handleReplLine(fresh(), ":q").quit).toBe(true);
  });

  it("shows the parsed and reduced tree", () => {
    expect(handleReplLine(fresh(), ":ast point(1, add(2)(3))").lines).toEqual([
      "ast:     point(1, add(2)(3))",
      "reduced: point(1, 5)",
    ]);
  });

  it("shows primitive shapes without touching the figure", () => {
    const state = fresh();
    expect(handleReplLine(state, ":shapes line((0, 0), (1, 1))").lines).toEqual([
      '{"kind":"segment","from":{"x":0,"y":0},"to":{"x":1,"y":1}}',
    ]);
    expect(handleReplLine(state, ":figure").lines).toEqual(["(figure is empty)"]);
  });

  it("lists patterns with their kind", () => {
    const lines = handleReplLine(fresh(), ":patterns").lines;
    expect(lines[0]).toBe("pure    add({})({})");
    expect(lines).toContain("drawing point({}, {})");
  });

  it("clears the figure", () => {
    const state = fresh();
    handleReplLine(state, "point(1, 2)");
    expect(handleReplLine(state, ":clear").lines).toEqual(["figure cleared"]);
    expect(handleReplLine(state, ":figure").lines).toEqual(["(figure is empty)"]);
    expect(handleReplLine(state, "point(1, 2)").lines).toEqual(["+ point(1, 2)"]);
  });

  it("rejects unknown colon commands", () => {
    expect(handleReplLine(fresh(), ":draw").lines).toEqual(["unknown command :draw (try :help)"]);
  });

  it("prints errors with a caret", () => {
    expect(handleReplLine(fresh(), "point(1, 2").lines).toEqual([
      "error: Parse error: BracketNotClosed - '(' is never closed (char 5)",
      "  point(1, 2",
      "       ^",
    ]);
  });
});
