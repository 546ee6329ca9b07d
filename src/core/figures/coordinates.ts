// src/core/figures/coordinates.ts

export type Coordinates = { readonly x: number; readonly y: number };

export function coords(x: number, y: number): Coordinates {
  return { x, y };
}

export function coordsToString(c: Coordinates): string {
  return `(${c.x}, ${c.y})`;
}

export function coordsEq(a: Coordinates, b: Coordinates): boolean {
  return a.x === b.x && a.y === b.y;
}
