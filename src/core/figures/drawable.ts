// src/core/figures/drawable.ts

import type { Shape, RenderBackend } from "./shapes";

/** The evaluator's output unit. */
export interface Drawable {
  /** Primitive shapes for the rendering backend. */
  draw(): Shape[];
  /** Canonical string; two drawables with equal reprs are the same object. */
  repr(): string;
}

export function renderDrawables(drawables: readonly Drawable[], backend: RenderBackend): void {
  for (const d of drawables) {
    for (const shape of d.draw()) backend.drawShape(shape);
  }
}

/** Keeps the first drawable of each repr, in order. */
export function dedupeDrawables<D extends Drawable>(drawables: readonly D[]): D[] {
  const seen = new Set<string>();
  const out: D[] = [];
  for (const d of drawables) {
    const key = d.repr();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }
  return out;
}
