// test/core/errors.spec.ts

import { describe, it, expect } from "vitest";
import { formatError, errorPosition, isParseError, parseError } from "../../src/core/errors";

describe("formatError", () => {
  it("formats each error family", () => {
    expect(formatError(parseError("InvalidSyntax", 3, "got (x y)"))).toBe("Parse error: InvalidSyntax - got (x y) (char 3)");
    expect(formatError({ kind: "NoMatch", name: "f", message: "no f" })).toBe("No matching pattern: no f");
    expect(
      formatError({ kind: "ASTMatchError", detail: { kind: "VarOnLeftExpr", message: "m" }, message: "m" })
    ).toBe("Invalid syntax: VarOnLeftExpr - m");
    expect(formatError({ kind: "FunctionEvaluateError", name: "div", message: "zero" })).toBe("Evaluation error in div: zero");
    expect(formatError({ kind: "UnsupportedBinding", message: "m" })).toBe("Match error: UnsupportedBinding - m");
  });
});

describe("errorPosition", () => {
  it("is defined for parse errors only", () => {
    const e = parseError("ExtraRightBracket", 6, "no matching '('");
    expect(isParseError(e)).toBe(true);
    expect(errorPosition(e)).toBe(6);
    expect(errorPosition({ kind: "NoMatch", name: "f", message: "m" })).toBeUndefined();
  });
});
