// src/core/figures/drawables.ts
// Built-in drawable objects

import type { Coordinates } from "./coordinates";
import { coordsToString } from "./coordinates";
import type { Drawable } from "./drawable";
import type { Shape } from "./shapes";

export class PointDrawable implements Drawable {
  constructor(readonly at: Coordinates) {}

  draw(): Shape[] {
    return [{ kind: "point", at: this.at }];
  }

  repr(): string {
    return `point${coordsToString(this.at)}`;
  }
}

export class LineDrawable implements Drawable {
  constructor(readonly from: Coordinates, readonly to: Coordinates) {}

  draw(): Shape[] {
    return [{ kind: "segment", from: this.from, to: this.to }];
  }

  repr(): string {
    return `line(${coordsToString(this.from)}, ${coordsToString(this.to)})`;
  }
}

export class CircleDrawable implements Drawable {
  constructor(readonly center: Coordinates, readonly radius: number) {}

  draw(): Shape[] {
    return [{ kind: "circle", center: this.center, radius: this.radius }];
  }

  repr(): string {
    return `circle(${coordsToString(this.center)}, ${this.radius})`;
  }
}
