// src/core/eval/pure.ts
// Pure evaluation: bottom-up rewrite of matched calls into their results

import type { ASTNode } from "../ast/ast";
import { fn, expr, astToString } from "../ast/ast";
import { type EvalError, type Result, FunctionEvaluateFailure, okResult, errResult } from "../errors";
import type { PatternRegistries } from "../patterns/registry";

export type EvalResult<T> = Result<T, EvalError>;

/**
 * Calls to drawing patterns are left in place (with evaluated arguments) for
 * the drawing pass. Every other call must match a pure pattern.
 */
export function evaluatePure(node: ASTNode, registries: PatternRegistries): EvalResult<ASTNode> {
  switch (node.tag) {
    case "Number":
    case "Identifier":
    case "Variable":
      return okResult(node);

    case "Expression": {
      const items = evaluateAll(node.items, registries);
      return items.ok ? okResult(expr(items.value)) : items;
    }

    case "Function": {
      const args = evaluateAll(node.args, registries);
      if (!args.ok) return args;
      const call = fn(node.name, args.value);

      if (registries.drawing.isRegistered(call.name)) return okResult(call);

      if (!registries.pure.isRegistered(call.name)) {
        return errResult({ kind: "NoMatch", name: call.name, message: `unknown function '${call.name}' in ${astToString(call)}` });
      }

      const found = registries.pure.lookup(call);
      switch (found.tag) {
        case "Error":
          return errResult({ kind: "ASTMatchError", detail: found.error, message: found.error.message });
        case "NoMatch":
          return errResult({
            kind: "FunctionEvaluateError",
            name: call.name,
            message: `Function does not match any known patterns: ${astToString(call)}`,
          });
        case "Match":
          try {
            return okResult(found.pattern.behavior(found.captures));
          } catch (e) {
            if (e instanceof FunctionEvaluateFailure) {
              return errResult({ kind: "FunctionEvaluateError", name: call.name, message: e.message });
            }
            throw e;
          }
      }
    }
  }
}

function evaluateAll(nodes: readonly ASTNode[], registries: PatternRegistries): EvalResult<ASTNode[]> {
  const out: ASTNode[] = [];
  for (const n of nodes) {
    const r = evaluatePure(n, registries);
    if (!r.ok) return r;
    out.push(r.value);
  }
  return okResult(out);
}
