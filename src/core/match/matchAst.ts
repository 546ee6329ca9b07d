// src/core/match/matchAst.ts
// Structural matcher: input AST against a template AST with wildcards
//
// Captures are collected in pre-order over the template; pattern behaviours
// bind their arguments positionally in that order.

import type { ASTNode } from "../ast/ast";
import { astToString } from "../ast/ast";
import type { MatchError } from "../errors";
import type { VariablePayload } from "./payload";

export type AstMatchResult =
  | { readonly tag: "Match"; readonly captures: VariablePayload[] }
  | { readonly tag: "NoMatch" }
  | { readonly tag: "Error"; readonly error: MatchError };

const NO_MATCH: AstMatchResult = { tag: "NoMatch" };

/** Raised inside the walk to abort it; never escapes this module. */
class MatchAbort {
  constructor(readonly error: MatchError) {}
}

export function matchAst(input: ASTNode, template: ASTNode): AstMatchResult {
  const captures: VariablePayload[] = [];
  try {
    return matchNode(input, template, captures) ? { tag: "Match", captures } : NO_MATCH;
  } catch (e) {
    if (e instanceof MatchAbort) return { tag: "Error", error: e.error };
    throw e;
  }
}

function matchNode(input: ASTNode, tmpl: ASTNode, out: VariablePayload[]): boolean {
  if (input.tag === "Variable") {
    throw new MatchAbort({
      kind: "VarOnLeftExpr",
      message: `wildcard found in input while matching against ${astToString(tmpl)}`,
    });
  }

  if (tmpl.tag === "Variable") {
    if (input.tag === "Identifier") {
      throw new MatchAbort({
        kind: "UnsupportedBinding",
        message: `cannot bind identifier '${input.name}' to a wildcard; only numbers can be captured`,
      });
    }
    if (tmpl.kind === "number") {
      if (input.tag !== "Number") return false;
      out.push(input.value);
      return true;
    }
    const tuple = numberTuple(input);
    if (!tuple) return false;
    out.push(tuple);
    return true;
  }

  switch (tmpl.tag) {
    case "Number":
      return input.tag === "Number" && input.value === tmpl.value;
    case "Identifier":
      return input.tag === "Identifier" && input.name === tmpl.name;
    case "Expression":
      return input.tag === "Expression" && matchList(input.items, tmpl.items, out);
    case "Function":
      return input.tag === "Function" && input.name === tmpl.name && matchList(input.args, tmpl.args, out);
  }
}

function matchList(xs: readonly ASTNode[], ys: readonly ASTNode[], out: VariablePayload[]): boolean {
  if (xs.length !== ys.length) return false;
  for (let i = 0; i < xs.length; i++) {
    if (!matchNode(xs[i], ys[i], out)) return false;
  }
  return true;
}

function numberTuple(input: ASTNode): number[] | null {
  if (input.tag !== "Expression") return null;
  const values: number[] = [];
  for (const item of input.items) {
    if (item.tag !== "Number") return null;
    values.push(item.value);
  }
  return values;
}
