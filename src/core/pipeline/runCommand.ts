// src/core/pipeline/runCommand.ts
// Command pipeline: text -> AST -> pure-reduced AST -> drawables
//
// Each stage runs once; the first error aborts the command.

import type { ASTNode } from "../ast/ast";
import { astToString } from "../ast/ast";
import { parseCommand } from "../reader/parse";
import { evaluatePure } from "../eval/pure";
import { collectDrawables } from "../eval/draw";
import type { SketchError } from "../errors";
import { formatError, isParseError } from "../errors";
import type { Drawable } from "../figures/drawable";
import type { PatternRegistries } from "../patterns/registry";
import { type Logger, silentLogger } from "../log";
import type { Outcome, Fail } from "../../outcome/outcome";
import { done, fail } from "../../outcome/constructors";
import { failure, type FailureReason } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";

export type CommandStage = "parse" | "pure" | "draw";

export type CommandResult =
  | {
      readonly ok: true;
      readonly ast: ASTNode;
      readonly reduced: ASTNode;
      readonly drawables: Drawable[];
    }
  | { readonly ok: false; readonly stage: CommandStage; readonly error: SketchError };

export function evaluateCommand(
  text: string,
  registries: PatternRegistries,
  log: Logger = silentLogger
): CommandResult {
  const parsed = parseCommand(text);
  if (!parsed.ok) {
    log.debug(`parse failed: ${formatError(parsed.error)}`);
    return { ok: false, stage: "parse", error: parsed.error };
  }
  log.debug(`parsed: ${astToString(parsed.value)}`);

  const reduced = evaluatePure(parsed.value, registries);
  if (!reduced.ok) {
    log.debug(`pure evaluation failed: ${formatError(reduced.error)}`);
    return { ok: false, stage: "pure", error: reduced.error };
  }
  log.debug(`reduced: ${astToString(reduced.value)}`);

  const drawn = collectDrawables(reduced.value, registries);
  if (!drawn.ok) {
    log.debug(`drawing failed: ${formatError(drawn.error)}`);
    return { ok: false, stage: "draw", error: drawn.error };
  }
  log.debug(`drew ${drawn.value.length} object(s)`);

  return { ok: true, ast: parsed.value, reduced: reduced.value, drawables: drawn.value };
}

/** Runs one command; Done carries the drawables in draw order (possibly none). */
export function runCommand(
  text: string,
  registries: PatternRegistries,
  log: Logger = silentLogger
): Outcome<Drawable[]> {
  const start = Date.now();
  const r = evaluateCommand(text, registries, log);
  const durationMs = Date.now() - start;
  if (r.ok) return done(r.drawables, { source: text, durationMs });
  return commandFailure(r.error, r.stage, text, durationMs);
}

function commandFailure(error: SketchError, stage: CommandStage, text: string, durationMs: number): Fail {
  const span = isParseError(error) ? { start: error.position, end: error.position + 1 } : undefined;
  return fail(
    failure(failureReason(error), formatError(error), {
      diagnostics: [diagnosticFor(error, span)],
      context: { error, stage },
      recoverable: true,
    }),
    { source: text, durationMs, span }
  );
}

function failureReason(error: SketchError): FailureReason {
  switch (error.kind) {
    case "BracketNotClosed":
    case "ExtraRightBracket":
    case "ParseNumberFail":
    case "InvalidSyntax":
      return "parse-error";
    case "VarOnLeftExpr":
    case "UnsupportedBinding":
    case "ASTMatchError":
      return "pattern-error";
    case "NoMatch":
      return "no-match";
    case "FunctionEvaluateError":
      return "evaluation-error";
  }
}

function diagnosticFor(error: SketchError, span: { start: number; end: number } | undefined): Diagnostic {
  switch (error.kind) {
    case "BracketNotClosed":
    case "ExtraRightBracket":
      return makeDiagnostic("E0002", undefined, span);
    case "ParseNumberFail":
      return makeDiagnostic("E0004", undefined, span);
    case "InvalidSyntax":
      return makeDiagnostic("E0001", undefined, span);
    case "VarOnLeftExpr":
    case "UnsupportedBinding":
      return makeDiagnostic("E0100", { detail: error.kind });
    case "ASTMatchError":
      return makeDiagnostic("E0100", { detail: error.detail.kind });
    case "NoMatch":
      return makeDiagnostic("E0103", { name: error.name });
    case "FunctionEvaluateError":
      return makeDiagnostic("E0200", { name: error.name });
  }
}
