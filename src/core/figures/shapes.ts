// src/core/figures/shapes.ts
// Primitive shapes handed to a rendering backend

import type { Coordinates } from "./coordinates";

export type Shape =
  | { readonly kind: "point"; readonly at: Coordinates }
  | { readonly kind: "segment"; readonly from: Coordinates; readonly to: Coordinates }
  | { readonly kind: "circle"; readonly center: Coordinates; readonly radius: number };

/**
 * Anything that can put primitive shapes on a target (canvas, SVG, TikZ...).
 * Backends live outside this package.
 */
export interface RenderBackend {
  drawShape(shape: Shape): void;
}

/** Collects shapes in draw order. Used by the REPL and the server. */
export class RecordingBackend implements RenderBackend {
  readonly shapes: Shape[] = [];

  drawShape(shape: Shape): void {
    this.shapes.push(shape);
  }
}
