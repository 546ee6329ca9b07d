// src/index.ts
// sketchlang - Public API
//
// Parse, reduce and draw figure commands; embed the command server.

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTAX
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/ast";
export {
  parse,
  parseCommand,
  parseTemplate,
  parseAst,
  type ParseResult,
  type ParseMode,
} from "./core/reader/parse";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Result,
  type ParseError,
  type ParseErrorKind,
  type MatchError,
  type MatchErrorKind,
  type EvalError,
  type SketchError,
  type SketchErrorKind,
  isParseError,
  errorPosition,
  formatError,
  FunctionEvaluateFailure,
  RegistrationError,
} from "./core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// PATTERNS
// ═══════════════════════════════════════════════════════════════════════════════

export { matchAst, type AstMatchResult } from "./core/match/matchAst";
export {
  type VariablePayload,
  isTuplePayload,
  payloadNumber,
  payloadTuple,
  payloadToString,
} from "./core/match/payload";
export {
  PatternRegistryBuilder,
  PatternTable,
  type PatternRegistries,
  type Pattern,
  type PatternInfo,
  type PatternKind,
  type PatternLookup,
  type PureBehavior,
  type DrawingBehavior,
} from "./core/patterns/registry";
export { defaultRegistries, registerArithmetic, registerShapes, EPS } from "./core/patterns/builtins";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

export { evaluatePure, type EvalResult } from "./core/eval/pure";
export { collectDrawables } from "./core/eval/draw";
export {
  evaluateCommand,
  runCommand,
  type CommandResult,
  type CommandStage,
} from "./core/pipeline/runCommand";

// ═══════════════════════════════════════════════════════════════════════════════
// FIGURES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/figures";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export type { Failure, FailureReason } from "./outcome/failure";
export type { Diagnostic, Span } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode } from "./outcome/codes";
export { match } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./core/log";

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./server";
