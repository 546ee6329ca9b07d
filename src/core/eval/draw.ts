// src/core/eval/draw.ts
// Drawing evaluation: collect drawables from a purely-reduced AST, post-order

import type { ASTNode } from "../ast/ast";
import { astToString } from "../ast/ast";
import { FunctionEvaluateFailure, okResult, errResult } from "../errors";
import type { Drawable } from "../figures/drawable";
import type { PatternRegistries } from "../patterns/registry";
import type { EvalResult } from "./pure";

export function collectDrawables(node: ASTNode, registries: PatternRegistries): EvalResult<Drawable[]> {
  const out: Drawable[] = [];
  const r = collectInto(node, registries, out);
  return r.ok ? okResult(out) : r;
}

function collectInto(node: ASTNode, registries: PatternRegistries, out: Drawable[]): EvalResult<null> {
  if (node.tag === "Expression") {
    for (const item of node.items) {
      const r = collectInto(item, registries, out);
      if (!r.ok) return r;
    }
    return okResult(null);
  }

  // Leaves draw nothing.
  if (node.tag !== "Function") return okResult(null);

  // Arguments are already reduced, so the call is matched as a whole.
  const found = registries.drawing.lookup(node);
  switch (found.tag) {
    case "Error":
      return errResult({ kind: "ASTMatchError", detail: found.error, message: found.error.message });
    case "NoMatch":
      return errResult({
        kind: "NoMatch",
        name: node.name,
        message: `no drawing pattern matches ${astToString(node)}`,
      });
    case "Match":
      try {
        out.push(found.pattern.behavior(found.captures));
        return okResult(null);
      } catch (e) {
        if (e instanceof FunctionEvaluateFailure) {
          return errResult({ kind: "FunctionEvaluateError", name: node.name, message: e.message });
        }
        throw e;
      }
  }
}
