// src/core/figures/index.ts

export { type Coordinates, coords, coordsToString, coordsEq } from "./coordinates";
export { type Shape, type RenderBackend, RecordingBackend } from "./shapes";
export { type Drawable, renderDrawables, dedupeDrawables } from "./drawable";
export { PointDrawable, LineDrawable, CircleDrawable } from "./drawables";
