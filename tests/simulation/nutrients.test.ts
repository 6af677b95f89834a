import { describe, it, expect } from "vitest";
import { defaultConfig } from "../../src/simulation/config";
import { MemoryField } from "../../src/simulation/memory";
import { NutrientField } from "../../src/simulation/nutrients";
import type { NutrientFieldOptions } from "../../src/simulation/nutrients";
import { Rng } from "../../src/simulation/random";
import { NutrientKind } from "../../src/simulation/types";

function field(overrides: Partial<NutrientFieldOptions> = {}): NutrientField {
  return new NutrientField({ ...defaultConfig, gridSize: 10, ...overrides });
}

const cell = (size: number, cx: number, cy: number): number => cy * size + cx;

// ---------------------------------------------------------------------------
// Consumption
// ---------------------------------------------------------------------------

describe("Consumption", () => {
  it("splits the amount taken by weighted availability", () => {
    const f = field();
    f.addCell(3, 3, NutrientKind.Sugar, 0.4);
    f.addCell(3, 3, NutrientKind.Nitrogen, 0.2);

    // available = 0.4 + 0.5 * 0.2 = 0.5
    const taken = f.consume({ x: 3.5, y: 3.5 }, 0, 0.1, null);
    expect(taken.carbon).toBeCloseTo(0.08, 12);
    expect(taken.nitrogen).toBeCloseTo(0.02, 12);
    expect(f.sugar[cell(10, 3, 3)]).toBeCloseTo(0.32, 12);
    expect(f.nitrogen[cell(10, 3, 3)]).toBeCloseTo(0.18, 12);
  });

  it("takes no more than is there", () => {
    const f = field();
    f.addCell(3, 3, NutrientKind.Sugar, 0.05);
    const taken = f.consume({ x: 3.5, y: 3.5 }, 0, 0.1, null);
    expect(taken.carbon).toBeCloseTo(0.05, 12);
    expect(taken.nitrogen).toBe(0);
    expect(f.sugar[cell(10, 3, 3)]).toBeCloseTo(0, 12);
  });

  it("ignores traces below the minimum", () => {
    const f = field();
    f.addCell(3, 3, NutrientKind.Sugar, 0.0005);
    expect(f.consume({ x: 3.5, y: 3.5 }, 0, 0.1, null)).toEqual({ carbon: 0, nitrogen: 0 });
    expect(f.sugar[cell(10, 3, 3)]).toBe(0.0005);
  });

  it("draws from neighbouring cells inside the uptake radius", () => {
    const f = field();
    f.addCell(4, 3, NutrientKind.Sugar, 0.3);
    const taken = f.consume({ x: 3.5, y: 3.5 }, 1, 0.1, null);
    expect(taken.carbon).toBeCloseTo(0.1, 12);
    expect(f.sugar[cell(10, 4, 3)]).toBeCloseTo(0.2, 12);
  });

  it("records what was found in memory once committed", () => {
    const f = field();
    const memory = new MemoryField(10, 1, 0.5);
    f.addCell(3, 3, NutrientKind.Sugar, 0.5);
    f.consume({ x: 3.5, y: 3.5 }, 0, 0.1, memory);

    expect(memory.at({ x: 3.5, y: 3.5 })).toBe(0);
    memory.commit();
    expect(memory.at({ x: 3.5, y: 3.5 })).toBeCloseTo(0.05, 12);
  });
});

// ---------------------------------------------------------------------------
// Diffusion
// ---------------------------------------------------------------------------

describe("Diffusion", () => {
  it("conserves the grid total and stays within [0, nutrientMax]", () => {
    const f = field({ diffusionRate: 0.2, flowStrength: 0.5 });
    f.addPatch({ x: 5, y: 5 }, 2, NutrientKind.Sugar, 0.9);
    f.addCell(0, 0, NutrientKind.Nitrogen, 1);
    f.flowAngle = 0.7;
    const before = f.total();

    for (let i = 0; i < 50; i++) f.diffuse(1, { multiplier: 1, rain: 1 });

    expect(f.total()).toBeCloseTo(before, 10);
    for (let i = 0; i < f.sugar.length; i++) {
      expect(f.sugar[i]).toBeGreaterThanOrEqual(0);
      expect(f.sugar[i]).toBeLessThanOrEqual(1);
      expect(f.nitrogen[i]).toBeGreaterThanOrEqual(0);
    }
  });

  it("is symmetric without rain", () => {
    const f = field({ diffusionRate: 0.2, flowStrength: 1 });
    f.addCell(5, 5, NutrientKind.Sugar, 1);
    f.diffuse(1, { multiplier: 1, rain: 0 });

    // k = 0.2 / 4 per edge
    expect(f.sugar[cell(10, 5, 5)]).toBeCloseTo(0.8, 12);
    expect(f.sugar[cell(10, 6, 5)]).toBeCloseTo(0.05, 12);
    expect(f.sugar[cell(10, 4, 5)]).toBeCloseTo(0.05, 12);
    expect(f.sugar[cell(10, 5, 6)]).toBeCloseTo(0.05, 12);
    expect(f.sugar[cell(10, 5, 4)]).toBeCloseTo(0.05, 12);
  });

  it("pushes nutrient downstream under full rain", () => {
    const f = field({ diffusionRate: 0.2, flowStrength: 1 });
    f.addCell(5, 5, NutrientKind.Sugar, 1);
    f.flowAngle = 0; // toward +x
    f.diffuse(1, { multiplier: 1, rain: 1 });

    expect(f.sugar[cell(10, 6, 5)]).toBeCloseTo(0.1, 12);
    expect(f.sugar[cell(10, 4, 5)]).toBeCloseTo(0, 12);
    expect(f.sugar[cell(10, 5, 6)]).toBeCloseTo(0.05, 12);
    expect(f.sugar[cell(10, 5, 5)]).toBeCloseTo(0.8, 12);
  });

  it("stays conservative on a nearly saturated field under rain", () => {
    const f = field({ diffusionRate: 0.2, flowStrength: 1 });
    f.sugar.fill(0.99);
    f.flowAngle = 0; // toward +x
    f.diffuse(1, { multiplier: 1, rain: 1 });

    // Each x edge would carry 0.099 but the receiver has only 0.01 of room: a quarter of it moves.
    expect(f.total()).toBeCloseTo(99, 10);
    expect(f.sugar[cell(10, 0, 5)]).toBeCloseTo(0.9875, 12);
    expect(f.sugar[cell(10, 5, 5)]).toBeCloseTo(0.99, 12);
    expect(f.sugar[cell(10, 9, 5)]).toBeCloseTo(0.9925, 12);
    expect(Math.max(...f.sugar)).toBeLessThanOrEqual(1);
  });

  it("does nothing at a zero rate", () => {
    const f = field({ diffusionRate: 0 });
    f.addCell(5, 5, NutrientKind.Sugar, 1);
    f.diffuse(1, { multiplier: 1, rain: 0 });
    expect(f.sugar[cell(10, 5, 5)]).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Gradient
// ---------------------------------------------------------------------------

describe("Gradient", () => {
  it("points toward richer cells", () => {
    const f = field();
    for (let y = 0; y < 10; y++) f.addCell(5, y, NutrientKind.Sugar, 1);
    expect(f.gradient({ x: 4.5, y: 4.5 })).toEqual({ x: 4, y: 0 });
    expect(f.gradient({ x: 6.5, y: 4.5 })).toEqual({ x: -4, y: 0 });
  });

  it("weights nitrogen at half", () => {
    const f = field();
    for (let x = 0; x < 10; x++) f.addCell(x, 6, NutrientKind.Nitrogen, 1);
    expect(f.gradient({ x: 4.5, y: 5.5 })).toEqual({ x: 0, y: 2 });
  });

  it("is zero on the border", () => {
    const f = field();
    f.addCell(1, 4, NutrientKind.Sugar, 1);
    expect(f.gradient({ x: 0.5, y: 4.5 })).toEqual({ x: 0, y: 0 });
  });
});

// ---------------------------------------------------------------------------
// Patches, deposits and regrowth
// ---------------------------------------------------------------------------

describe("Patches and regrowth", () => {
  it("fills a disc of cells and clamps at nutrientMax", () => {
    const f = field();
    f.addPatch({ x: 5.2, y: 5.7 }, 1, NutrientKind.Sugar, 0.7);
    f.addPatch({ x: 5.2, y: 5.7 }, 1, NutrientKind.Sugar, 0.7);

    expect(f.sugar[cell(10, 5, 5)]).toBe(1);
    expect(f.sugar[cell(10, 4, 5)]).toBe(1);
    expect(f.sugar[cell(10, 5, 6)]).toBe(1);
    expect(f.sugar[cell(10, 6, 6)]).toBe(0);
    expect(f.total()).toBe(5);
  });

  it("caps an oversized patch at the grid", () => {
    const f = field();
    f.addPatch({ x: 5, y: 5 }, 1e9, NutrientKind.Sugar, 0.1);
    expect(f.total()).toBeCloseTo(10, 10);
  });

  it("returns deposited reserves to the cell", () => {
    const f = field();
    expect(f.deposit({ x: 2.5, y: 7.1 }, { carbon: 0.3, nitrogen: 0.1 })).toEqual({ carbon: 0, nitrogen: 0 });
    expect(f.sugar[cell(10, 2, 7)]).toBe(0.3);
    expect(f.nitrogen[cell(10, 2, 7)]).toBe(0.1);
  });

  it("spills a deposit that overfills its cell into the ring around it", () => {
    const f = field();
    f.addCell(2, 7, NutrientKind.Sugar, 1);
    expect(f.deposit({ x: 2.5, y: 7.1 }, { carbon: 2.5, nitrogen: 0 })).toEqual({ carbon: 0, nitrogen: 0 });

    expect(f.sugar[cell(10, 2, 7)]).toBe(1);
    expect(f.sugar[cell(10, 1, 6)]).toBe(1);
    expect(f.sugar[cell(10, 2, 6)]).toBe(1);
    expect(f.sugar[cell(10, 3, 6)]).toBe(0.5);
    expect(f.total()).toBeCloseTo(3.5, 12);
  });

  it("hands back what a saturated grid cannot take", () => {
    const f = field();
    f.sugar.fill(1);
    const unplaced = f.deposit({ x: 2.5, y: 7.1 }, { carbon: 0.4, nitrogen: 0.1 });

    expect(unplaced).toEqual({ carbon: 0.4, nitrogen: 0 });
    expect(f.nitrogen[cell(10, 2, 7)]).toBe(0.1);
    expect(f.total()).toBeCloseTo(100.1, 10);
  });

  it("regrows only up to the floor", () => {
    const f = field({ regenRate: 0.01, regenFloor: 0.05, regenSamples: 500 });
    const rng = new Rng(5);
    for (let i = 0; i < 20; i++) f.regenerate(rng, 1);

    expect(f.total()).toBeGreaterThan(0);
    expect(Math.max(...f.sugar)).toBeLessThanOrEqual(0.05);
    expect(Math.max(...f.nitrogen)).toBeLessThanOrEqual(0.03 + 1e-12);
  });

  it("leaves cells above the floor alone", () => {
    const f = field({ regenRate: 0.01, regenFloor: 0.05, regenSamples: 500 });
    f.sugar.fill(0.5);
    f.nitrogen.fill(0.5);
    f.regenerate(new Rng(5), 1);
    expect(f.total()).toBeCloseTo(100, 10);
  });
});

// ---------------------------------------------------------------------------
// Memory
// ---------------------------------------------------------------------------

describe("Memory", () => {
  it("decays before new discoveries are applied", () => {
    const memory = new MemoryField(10, 0.5, 1);
    const pos = { x: 2.5, y: 2.5 };
    memory.recordDiscovery(pos, 0.4);
    memory.commit();
    expect(memory.at(pos)).toBeCloseTo(0.4, 12);

    memory.recordDiscovery(pos, 0.2);
    memory.commit();
    expect(memory.at(pos)).toBeCloseTo(0.4, 12);

    memory.commit();
    expect(memory.at(pos)).toBeCloseTo(0.2, 12);
  });

  it("caps at 1", () => {
    const memory = new MemoryField(10, 1, 1);
    memory.recordDiscovery({ x: 1, y: 1 }, 3);
    memory.commit();
    expect(memory.at({ x: 1, y: 1 })).toBe(1);
  });
});
