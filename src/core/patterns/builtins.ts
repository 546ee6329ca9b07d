// src/core/patterns/builtins.ts
// Built-in arithmetic rewrites and drawing commands

import { num } from "../ast/ast";
import { FunctionEvaluateFailure } from "../errors";
import { payloadNumber, type VariablePayload } from "../match/payload";
import { coords } from "../figures/coordinates";
import { PointDrawable, LineDrawable, CircleDrawable } from "../figures/drawables";
import { PatternRegistryBuilder, type PatternRegistries, type PureBehavior } from "./registry";

export const EPS = 1e-10;

export function isZero(x: number): boolean {
  return Math.abs(x) < EPS;
}

function binary(op: (a: number, b: number) => number): PureBehavior {
  return (v: VariablePayload[]) => num(op(payloadNumber(v, 0), payloadNumber(v, 1)));
}

const add = binary((a, b) => a + b);
const sub = binary((a, b) => a - b);
const mul = binary((a, b) => a * b);
const div = binary((a, b) => {
  if (isZero(b)) throw new FunctionEvaluateFailure("Cannot divide by zero");
  return a / b;
});

export function registerArithmetic(b: PatternRegistryBuilder): PatternRegistryBuilder {
  return b
    .pure("add({})({})", add)
    .pure("sub({})({})", sub)
    .pure("mul({})({})", mul)
    .pure("div({})({})", div)
    .pure("add({}, {})", add)
    .pure("sub({}, {})", sub)
    .pure("mul({}, {})", mul)
    .pure("div({}, {})", div)
    .pure("neg({})", v => num(-payloadNumber(v, 0)));
}

export function registerShapes(b: PatternRegistryBuilder): PatternRegistryBuilder {
  return b
    .drawing("point({}, {})", v => new PointDrawable(coords(payloadNumber(v, 0), payloadNumber(v, 1))))
    .drawing("line(({}, {}), ({}, {}))", v =>
      new LineDrawable(
        coords(payloadNumber(v, 0), payloadNumber(v, 1)),
        coords(payloadNumber(v, 2), payloadNumber(v, 3)),
      ))
    .drawing("circle(({}, {}), {})", v => {
      const radius = payloadNumber(v, 2);
      if (!(radius > 0)) throw new FunctionEvaluateFailure(`radius must be positive, got ${radius}`);
      return new CircleDrawable(coords(payloadNumber(v, 0), payloadNumber(v, 1)), radius);
    });
}

export function defaultRegistries(): PatternRegistries {
  return registerShapes(registerArithmetic(new PatternRegistryBuilder())).build();
}
