// src/core/match/payload.ts
// Values captured by template wildcards

import { FunctionEvaluateFailure } from "../errors";

/** `{}` captures a number, `{..}` a tuple of numbers. */
export type VariablePayload = number | number[];

export function isTuplePayload(p: VariablePayload): p is number[] {
  return Array.isArray(p);
}

export function payloadNumber(args: readonly VariablePayload[], index: number): number {
  const p = args[index];
  if (p === undefined) {
    throw new FunctionEvaluateFailure(`missing argument ${index}`);
  }
  if (isTuplePayload(p)) {
    throw new FunctionEvaluateFailure(`argument ${index}: expected a number, got a tuple`);
  }
  return p;
}

export function payloadTuple(args: readonly VariablePayload[], index: number): number[] {
  const p = args[index];
  if (p === undefined) {
    throw new FunctionEvaluateFailure(`missing argument ${index}`);
  }
  if (!isTuplePayload(p)) {
    throw new FunctionEvaluateFailure(`argument ${index}: expected a tuple, got a number`);
  }
  return p;
}

export function payloadToString(p: VariablePayload): string {
  return isTuplePayload(p) ? `(${p.join(", ")})` : String(p);
}
