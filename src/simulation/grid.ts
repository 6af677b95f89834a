import { clamp } from "./math";
import type { Vec2 } from "./math";

export interface Cell {
  cx: number;
  cy: number;
}

/** Grid cell containing a world position, clamped into the grid. */
export function cellOf(size: number, pos: Vec2): Cell {
  return {
    cx: clamp(Math.floor(pos.x), 0, size - 1),
    cy: clamp(Math.floor(pos.y), 0, size - 1),
  };
}

export function inGrid(size: number, cx: number, cy: number): boolean {
  return cx >= 0 && cy >= 0 && cx < size && cy < size;
}

/**
 * 3x3 Sobel gradient of a row-major grid at a cell. Border cells have no full
 * neighbourhood and report a zero gradient.
 */
export function sobel(values: Float64Array, size: number, cx: number, cy: number): Vec2 {
  if (cx < 1 || cy < 1 || cx > size - 2 || cy > size - 2) {
    return { x: 0, y: 0 };
  }
  const at = (x: number, y: number): number => values[y * size + x];
  const gx =
    at(cx + 1, cy - 1) + 2 * at(cx + 1, cy) + at(cx + 1, cy + 1) -
    (at(cx - 1, cy - 1) + 2 * at(cx - 1, cy) + at(cx - 1, cy + 1));
  const gy =
    at(cx - 1, cy + 1) + 2 * at(cx, cy + 1) + at(cx + 1, cy + 1) -
    (at(cx - 1, cy - 1) + 2 * at(cx, cy - 1) + at(cx + 1, cy - 1));
  return { x: gx, y: gy };
}
