// src/core/reader/parse.ts
// Structural parser: command text -> AST
//
// The parser works on whole substrings rather than a token stream. Each call
// classifies its (trimmed) input, and bracketed or comma-separated input is
// spliced into pieces that are parsed recursively. Every recursive call gets
// the absolute offset of its first character, so error positions always point
// into the original command.

import type { AST, ASTNode } from "../ast/ast";
import { num, ident, expr, fn, variable } from "../ast/ast";
import { type ParseError, type Result, parseError, okResult, errResult } from "../errors";

export type ParseResult = Result<ASTNode, ParseError>;

/** "template" accepts the `{}` / `{..}` wildcards; "command" rejects them. */
export type ParseMode = "template" | "command";

export const IS_NUMBER = /^-?\d+\.?\d*$/;
export const IS_IDENT = /^[A-Za-z_][A-Za-z_0-9]*$/;

export const NUMBER_MARKER = "{}";
export const TUPLE_MARKER = "{..}";

export function parse(text: string, offset = 0, mode: ParseMode = "template"): ParseResult {
  return parseNode(text, offset, mode);
}

export function parseCommand(text: string): ParseResult {
  return parseNode(text, 0, "command");
}

export function parseTemplate(text: string): ParseResult {
  return parseNode(text, 0, "template");
}

export function parseAst(text: string, mode: ParseMode = "command"): Result<AST, ParseError> {
  const r = parseNode(text, 0, mode);
  return r.ok ? okResult({ root: r.value }) : r;
}

function parseNode(raw: string, offset: number, mode: ParseMode): ParseResult {
  const s = raw.trim();
  const base = offset + (raw.length - raw.trimStart().length);

  if (s === NUMBER_MARKER || s === TUPLE_MARKER) {
    if (mode === "command") {
      return errResult(parseError("InvalidSyntax", base, `wildcard ${s} is only allowed in patterns`));
    }
    return okResult(variable(s === NUMBER_MARKER ? "number" : "tuple"));
  }

  if (IS_NUMBER.test(s)) {
    const n = Number(s);
    if (!Number.isFinite(n)) {
      return errResult(parseError("ParseNumberFail", base, `got ${s}`));
    }
    return okResult(num(n));
  }

  if (IS_IDENT.test(s)) return okResult(ident(s));

  if (s.startsWith("(") && matchingClose(s, 0) === s.length - 1) {
    return parseNode(s.slice(1, -1), base + 1, mode);
  }

  if (s.includes("(") || s.includes(",")) return splice(s, base, mode);

  const stray = s.indexOf(")");
  if (stray >= 0) {
    return errResult(parseError("ExtraRightBracket", base + stray, "no matching '('"));
  }

  const detail = s.length === 0 ? "empty expression" : `failed to match any known pattern - got (${s})`;
  return errResult(parseError("InvalidSyntax", base, detail));
}

/** Index of the ')' closing the '(' at `open`, or -1 if it is never closed. */
function matchingClose(s: string, open: number): number {
  let depth = 0;
  for (let i = open; i < s.length; i++) {
    if (s[i] === "(") depth++;
    else if (s[i] === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

// Pass 1: split at top-level commas.
function splice(s: string, base: number, mode: ParseMode): ParseResult {
  const segments: Array<{ text: string; at: number }> = [];
  let depth = 0;
  let segStart = 0;

  for (let i = 0; i < s.length; i++) {
    const c = s[i];
    if (c === "(") {
      depth++;
    } else if (c === ")") {
      depth--;
      if (depth < 0) return errResult(parseError("ExtraRightBracket", base + i, "no matching '('"));
    } else if (c === "," && depth === 0) {
      segments.push({ text: s.slice(segStart, i), at: base + segStart });
      segStart = i + 1;
    }
  }

  if (segments.length === 0) return spliceCall(s, base, mode);

  segments.push({ text: s.slice(segStart), at: base + segStart });

  const items: ASTNode[] = [];
  for (const seg of segments) {
    const r = parseNode(seg.text, seg.at, mode);
    if (!r.ok) return r;
    items.push(r.value);
  }
  return okResult(expr(items));
}

// Pass 2: name(group1)(group2)...(groupN), one argument per top-level group.
function spliceCall(s: string, base: number, mode: ParseMode): ParseResult {
  const first = s.indexOf("(");
  if (first < 0) return errResult(parseError("InvalidSyntax", base, `expected a call - got (${s})`));

  const groups: Array<{ text: string; at: number }> = [];
  let depth = 0;
  let groupStart = first;
  let stray = -1;

  for (let i = first; i < s.length; i++) {
    const c = s[i];
    if (c === "(") {
      if (depth === 0) groupStart = i;
      depth++;
    } else if (c === ")") {
      depth--;
      if (depth === 0) groups.push({ text: s.slice(groupStart + 1, i), at: base + groupStart + 1 });
    } else if (depth === 0 && stray < 0 && c.trim() !== "") {
      stray = i;
    }
  }

  if (depth > 0) {
    return errResult(parseError("BracketNotClosed", base + groupStart, "'(' is never closed"));
  }

  const name = s.slice(0, first).trim();
  if (!IS_IDENT.test(name)) {
    const got = name.length === 0 ? "nothing" : `'${name}'`;
    return errResult(parseError("InvalidSyntax", base, `expected a function name before '(' - got ${got}`));
  }

  if (stray >= 0) {
    return errResult(parseError("InvalidSyntax", base + stray, `unexpected '${s[stray]}' after argument list`));
  }

  const args: ASTNode[] = [];
  for (const g of groups) {
    const r = parseNode(g.text, g.at, mode);
    if (!r.ok) return r;
    args.push(r.value);
  }
  return okResult(fn(name, args));
}
