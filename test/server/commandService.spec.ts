// test/server/commandService.spec.ts

import { describe, it, expect } from "vitest";
import { CommandService } from "../../src/server/commandService";
import { parseClientCommand, serializeError } from "../../src/server/protocol";
import { defaultRegistries } from "../../src/core/patterns/builtins";

function sequentialIds(): () => string {
  let n = 0;
  return () => `s${++n}`;
}

describe("CommandService", () => {
  const make = (dedupe = true) => new CommandService(defaultRegistries(), { dedupe, newId: sequentialIds() });

  it("creates, lists and closes sessions", () => {
    const service = make();
    const a = service.createSession();
    const b = service.createSession();
    expect([a, b]).toEqual(["s1", "s2"]);
    expect(service.listSessions().map(s => s.id)).toEqual(["s1", "s2"]);

    service.closeSession(a);
    expect(service.hasSession(a)).toBe(false);
    expect(service.sessionCount).toBe(1);
    expect(() => service.closeSession(a)).toThrow("Session not found: s1");
  });

  it("runs commands and accumulates the figure", () => {
    const service = make();
    const id = service.createSession();

    const reply = service.runCommand(id, "point(3, 5)");
    expect(reply).toEqual({
      ok: true,
      drawables: [{ repr: "point(3, 5)", shapes: [{ kind: "point", at: { x: 3, y: 5 } }] }],
      skipped: 0,
    });

    service.runCommand(id, "circle((0, 0), 1)");
    expect(service.getFigure(id).map(d => d.repr)).toEqual(["point(3, 5)", "circle((0, 0), 1)"]);
  });

  it("skips drawables already on the figure", () => {
    const service = make();
    const id = service.createSession();
    service.runCommand(id, "point(1, 1)");
    const reply = service.runCommand(id, "point(1, 1), point(add(1, 1), 1)");
    expect(reply.ok).toBe(true);
    if (reply.ok) {
      expect(reply.drawables.map(d => d.repr)).toEqual(["point(2, 1)"]);
      expect(reply.skipped).toBe(1);
    }
  });

  it("skips repeats within a single command", () => {
    const service = make();
    const id = service.createSession();
    const reply = service.runCommand(id, "point(0, 1), point(0, 1), point(1, 0)");
    expect(reply.ok && reply.drawables.map(d => d.repr)).toEqual(["point(0, 1)", "point(1, 0)"]);
    expect(reply.ok && reply.skipped).toBe(1);
    expect(service.getFigure(id)).toHaveLength(2);
  });

  it("keeps duplicates when dedupe is off", () => {
    const service = make(false);
    const id = service.createSession();
    service.runCommand(id, "point(1, 1)");
    service.runCommand(id, "point(1, 1)");
    expect(service.getFigure(id)).toHaveLength(2);
  });

  it("returns serialized errors and records them in the history", () => {
    const service = make();
    const id = service.createSession();
    expect(service.runCommand(id, "point(1, 2")).toEqual({
      ok: false,
      error: {
        kind: "BracketNotClosed",
        message: "Parse error: BracketNotClosed - '(' is never closed (char 5)",
        position: 5,
      },
    });
    service.runCommand(id, "neg(1)");
    expect(service.getHistory(id)).toEqual([
      { index: 0, text: "point(1, 2", ok: false },
      { index: 1, text: "neg(1)", ok: true },
    ]);
    expect(service.getSession(id)).toMatchObject({ id, commands: 2, drawables: 0 });
  });

  it("keeps sessions isolated", () => {
    const service = make();
    const a = service.createSession();
    const b = service.createSession();
    service.runCommand(a, "point(1, 1)");
    expect(service.getFigure(b)).toEqual([]);
  });

  it("lists pure patterns before drawing patterns", () => {
    const patterns = make().listPatterns();
    expect(patterns[0]).toEqual({ kind: "pure", name: "add", template: "add({})({})", arity: 2 });
    expect(patterns[patterns.length - 1]).toEqual({ kind: "drawing", name: "circle", template: "circle(({}, {}), {})", arity: 3 });
  });

  it("throws for unknown sessions", () => {
    expect(() => make().runCommand("nope", "point(1, 1)")).toThrow("Session not found: nope");
  });
});

describe("protocol", () => {
  it("parses client commands", () => {
    expect(parseClientCommand('{"type":"command","text":"point(1, 2)"}')).toEqual({ type: "command", text: "point(1, 2)" });
    expect(parseClientCommand('{"type":"figure"}')).toEqual({ type: "figure" });
  });

  it("rejects malformed client commands", () => {
    expect(() => parseClientCommand("[]")).toThrow("Malformed client command");
    expect(() => parseClientCommand('{"type":"draw"}')).toThrow("Unknown client command: draw");
    expect(() => parseClientCommand('{"type":"command"}')).toThrow("Unknown client command: command");
  });

  it("leaves the position off non-parse errors", () => {
    expect(serializeError({ kind: "NoMatch", name: "f", message: "m" })).toEqual({
      kind: "NoMatch",
      message: "No matching pattern: m",
    });
  });
});
