// test/core/log.spec.ts

import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, isLogLevel } from "../../src/core/log";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    createLogger("repl", "warn").warn("careful", 1);
    expect(warn).toHaveBeenCalledWith("[repl]", "careful", 1);
  });

  it("drops messages below the level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = createLogger("server", "info");
    log.debug("hidden");
    log.info("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
  });

  it("says nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("x", "silent").error("quiet");
    expect(error).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("recognises the known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
