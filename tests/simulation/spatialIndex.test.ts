import { describe, it, expect } from "vitest";
import { Rng } from "../../src/simulation/random";
import { SpatialIndex } from "../../src/simulation/spatialIndex";
import type { Vec2 } from "../../src/simulation/math";

function scatter(count: number, size: number, seed: number): Vec2[] {
  const rng = new Rng(seed);
  return Array.from({ length: count }, () => ({ x: rng.range(0, size), y: rng.range(0, size) }));
}

function bruteForce(points: Vec2[], x: number, y: number, radius: number): number[] {
  const found: number[] = [];
  points.forEach((p, i) => {
    const dx = p.x - x;
    const dy = p.y - y;
    if (dx * dx + dy * dy <= radius * radius) found.push(i);
  });
  return found;
}

const sorted = (values: number[]): number[] => [...values].sort((a, b) => a - b);

describe("SpatialIndex", () => {
  const points = scatter(300, 50, 3);
  const index = new SpatialIndex(50, 4);
  index.rebuild(points);

  it("matches a brute-force radius search", () => {
    const queries: Array<[number, number, number]> = [
      [25, 25, 3],
      [0, 0, 6],
      [49.9, 12, 10],
      [10, 40, 0.5],
      [30, 30, 25],
    ];
    for (const [x, y, r] of queries) {
      expect(sorted(index.neighbors(x, y, r))).toEqual(bruteForce(points, x, y, r));
    }
  });

  it("records every point", () => {
    expect(index.size).toBe(300);
  });

  it("finds the nearest point and honours skip", () => {
    const target = points[17];
    expect(index.nearest(target.x, target.y, 5)).toBe(17);

    const others = bruteForce(points, target.x, target.y, 50).filter((i) => i !== 17);
    const closest = others.reduce((best, i) => {
      const d = Math.hypot(points[i].x - target.x, points[i].y - target.y);
      const bestD = Math.hypot(points[best].x - target.x, points[best].y - target.y);
      return d < bestD ? i : best;
    });
    expect(index.nearest(target.x, target.y, 50, 17)).toBe(closest);
  });

  it("returns -1 when nothing is in range", () => {
    const sparse = new SpatialIndex(50, 4);
    sparse.rebuild([{ x: 1, y: 1 }]);
    expect(sparse.nearest(40, 40, 5)).toBe(-1);
  });

  it("leaves excluded points out but keeps their indices", () => {
    const filtered = new SpatialIndex(50, 4);
    const items = [
      { x: 10, y: 10, keep: true },
      { x: 10.5, y: 10, keep: false },
      { x: 11, y: 10, keep: true },
    ];
    filtered.rebuild(items, (item) => item.keep);
    expect(sorted(filtered.neighbors(10, 10, 2))).toEqual([0, 2]);
    expect(filtered.size).toBe(3);
  });

  it("forgets points from the previous rebuild", () => {
    const reused = new SpatialIndex(50, 4);
    reused.rebuild([{ x: 5, y: 5 }]);
    reused.rebuild([{ x: 45, y: 45 }]);
    expect(reused.neighbors(5, 5, 1)).toEqual([]);
    expect(reused.neighbors(45, 45, 1)).toEqual([0]);
  });
});
