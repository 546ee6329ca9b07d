// src/core/errors.ts
// Typed error taxonomy for the command pipeline

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function okResult<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function errResult<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

// ----- Parse errors -----

export type ParseErrorKind =
  | "BracketNotClosed"
  | "ExtraRightBracket"
  | "ParseNumberFail"
  | "InvalidSyntax";

export interface ParseError {
  readonly kind: ParseErrorKind;
  /** Offset into the original command string. */
  readonly position: number;
  readonly message: string;
}

export function parseError(kind: ParseErrorKind, position: number, message: string): ParseError {
  return { kind, position, message };
}

// ----- Match errors -----

export type MatchErrorKind = "VarOnLeftExpr" | "UnsupportedBinding";

export interface MatchError {
  readonly kind: MatchErrorKind;
  readonly message: string;
}

// ----- Evaluation errors -----

export type EvalError =
  | { readonly kind: "NoMatch"; readonly name: string; readonly message: string }
  | { readonly kind: "ASTMatchError"; readonly detail: MatchError; readonly message: string }
  | { readonly kind: "FunctionEvaluateError"; readonly name: string; readonly message: string };

export type SketchError = ParseError | MatchError | EvalError;

export type SketchErrorKind = SketchError["kind"];

export function isParseError(e: SketchError): e is ParseError {
  return (
    e.kind === "BracketNotClosed" ||
    e.kind === "ExtraRightBracket" ||
    e.kind === "ParseNumberFail" ||
    e.kind === "InvalidSyntax"
  );
}

export function errorPosition(e: SketchError): number | undefined {
  return isParseError(e) ? e.position : undefined;
}

/** One-line human message, as shown in the terminal. */
export function formatError(e: SketchError): string {
  if (isParseError(e)) {
    return `Parse error: ${e.kind} - ${e.message} (char ${e.position})`;
  }
  switch (e.kind) {
    case "NoMatch":
      return `No matching pattern: ${e.message}`;
    case "ASTMatchError":
      return `Invalid syntax: ${e.detail.kind} - ${e.detail.message}`;
    case "FunctionEvaluateError":
      return `Evaluation error in ${e.name}: ${e.message}`;
    case "VarOnLeftExpr":
    case "UnsupportedBinding":
      return `Match error: ${e.kind} - ${e.message}`;
  }
}

/**
 * Thrown by pattern behaviours (and payload accessors) to report a failed
 * evaluation. The evaluators turn it into a FunctionEvaluateError value;
 * any other exception from a behaviour propagates untouched.
 */
export class FunctionEvaluateFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FunctionEvaluateFailure";
  }
}

/** Startup fault: a pattern could not be registered. */
export class RegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistrationError";
  }
}
