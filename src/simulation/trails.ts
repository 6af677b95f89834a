import type { Segment } from "./types";

/** Growth trail left behind by moving agents. */
export class Trails {
  segments: Segment[] = [];

  add(fromX: number, fromY: number, toX: number, toY: number): void {
    this.segments.push({ fromX, fromY, toX, toY, age: 0 });
  }

  /** Age every segment by one tick, drop expired ones, then keep the newest `maxSegments`. */
  age(maxAge: number, maxSegments: number): void {
    const kept: Segment[] = [];
    for (const segment of this.segments) {
      segment.age += 1;
      if (segment.age < maxAge) kept.push(segment);
    }
    if (kept.length > maxSegments) {
      kept.splice(0, kept.length - maxSegments);
    }
    this.segments = kept;
  }

  clear(): void {
    this.segments = [];
  }
}
