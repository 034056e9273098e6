import { describe, expect, it } from "vitest";
import {
  createBoundingBox,
  formatBoundingBox,
  intersection,
  intersects,
  union,
} from "../src/bbox.js";

describe("createBoundingBox", () => {
  it("keeps the coordinates in (minx, maxx, miny, maxy, mint, maxt) order", () => {
    expect(createBoundingBox(0, 1, 2, 3, 4, 5)).toEqual({
      minx: 0,
      maxx: 1,
      miny: 2,
      maxy: 3,
      mint: 4,
      maxt: 5,
    });
  });

  it("allows a point in time", () => {
    const b = createBoundingBox(0, 1, 0, 1, 1000, 1000);
    expect(b.mint).toBe(b.maxt);
  });

  it("rejects inverted intervals", () => {
    expect(() => createBoundingBox(1, 0, 0, 1, 0, 1)).toThrow(RangeError);
    expect(() => createBoundingBox(0, 1, 1, 0, 0, 1)).toThrow(/miny=1 > maxy=0/);
    expect(() => createBoundingBox(0, 1, 0, 1, 2, 1)).toThrow(/mint=2 > maxt=1/);
  });

  it("rejects NaN", () => {
    expect(() => createBoundingBox(0, Number.NaN, 0, 1, 0, 1)).toThrow(/NaN/);
  });

  it("returns a frozen box", () => {
    expect(Object.isFrozen(createBoundingBox(0, 1, 0, 1, 0, 1))).toBe(true);
  });
});

describe("intersects", () => {
  const a = createBoundingBox(0, 100, 0, 100, 1000, 1000);

  it("is true for overlapping boxes", () => {
    expect(intersects(a, createBoundingBox(50, 150, 50, 150, 0, 2000))).toBe(true);
  });

  it("counts touching edges", () => {
    expect(intersects(a, createBoundingBox(100, 200, 100, 200, 1000, 1000))).toBe(
      true,
    );
  });

  it("needs overlap on every axis", () => {
    expect(intersects(a, createBoundingBox(101, 200, 0, 100, 1000, 1000))).toBe(
      false,
    );
    expect(intersects(a, createBoundingBox(0, 100, -10, -1, 1000, 1000))).toBe(
      false,
    );
    expect(intersects(a, createBoundingBox(0, 100, 0, 100, 1001, 2000))).toBe(
      false,
    );
  });
});

describe("union and intersection", () => {
  const a = createBoundingBox(0, 100, 0, 100, 1000, 1000);
  const b = createBoundingBox(50, 150, 50, 150, 2000, 2000);

  it("union covers both boxes", () => {
    expect(union(a, b)).toEqual(createBoundingBox(0, 150, 0, 150, 1000, 2000));
  });

  it("intersection is null without time overlap", () => {
    expect(intersection(a, b)).toBeNull();
  });

  it("intersection is the shared region", () => {
    const c = createBoundingBox(50, 150, 50, 150, 0, 5000);
    expect(intersection(a, c)).toEqual(
      createBoundingBox(50, 100, 50, 100, 1000, 1000),
    );
  });
});

describe("formatBoundingBox", () => {
  it("names every coordinate", () => {
    expect(formatBoundingBox(createBoundingBox(0, 1, 2, 3, 4, 5))).toBe(
      "BoundingBox(minx=0, maxx=1, miny=2, maxy=3, mint=4, maxt=5)",
    );
  });
});
