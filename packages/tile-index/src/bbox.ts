/**
 * Axis-aligned box in x, y and time.
 *
 * x and y are in the projected units of the scenes' CRS; time is Unix epoch
 * seconds. All intervals are closed.
 */
export type BoundingBox = Readonly<{
  minx: number;
  maxx: number;
  miny: number;
  maxy: number;
  mint: number;
  maxt: number;
}>;

/** Create a BoundingBox, validating that every interval is ordered. */
export function createBoundingBox(
  minx: number,
  maxx: number,
  miny: number,
  maxy: number,
  mint: number,
  maxt: number,
): BoundingBox {
  const values = [minx, maxx, miny, maxy, mint, maxt];
  if (values.some(Number.isNaN)) {
    throw new RangeError(`Bounding box contains NaN: [${values.join(", ")}]`);
  }
  if (minx > maxx) {
    throw new RangeError(`Bounding box has minx=${minx} > maxx=${maxx}`);
  }
  if (miny > maxy) {
    throw new RangeError(`Bounding box has miny=${miny} > maxy=${maxy}`);
  }
  if (mint > maxt) {
    throw new RangeError(`Bounding box has mint=${mint} > maxt=${maxt}`);
  }

  return Object.freeze({ minx, maxx, miny, maxy, mint, maxt });
}

/** Whether the boxes overlap on all three axes. Touching counts. */
export function intersects(a: BoundingBox, b: BoundingBox): boolean {
  return (
    a.minx <= b.maxx &&
    b.minx <= a.maxx &&
    a.miny <= b.maxy &&
    b.miny <= a.maxy &&
    a.mint <= b.maxt &&
    b.mint <= a.maxt
  );
}

/** Smallest box containing both. */
export function union(a: BoundingBox, b: BoundingBox): BoundingBox {
  return createBoundingBox(
    Math.min(a.minx, b.minx),
    Math.max(a.maxx, b.maxx),
    Math.min(a.miny, b.miny),
    Math.max(a.maxy, b.maxy),
    Math.min(a.mint, b.mint),
    Math.max(a.maxt, b.maxt),
  );
}

/** The shared region of both boxes, or null when they do not intersect. */
export function intersection(
  a: BoundingBox,
  b: BoundingBox,
): BoundingBox | null {
  if (!intersects(a, b)) {
    return null;
  }
  return createBoundingBox(
    Math.max(a.minx, b.minx),
    Math.min(a.maxx, b.maxx),
    Math.max(a.miny, b.miny),
    Math.min(a.maxy, b.maxy),
    Math.max(a.mint, b.mint),
    Math.min(a.maxt, b.maxt),
  );
}

export function formatBoundingBox(b: BoundingBox): string {
  return (
    `BoundingBox(minx=${b.minx}, maxx=${b.maxx}, miny=${b.miny}, ` +
    `maxy=${b.maxy}, mint=${b.mint}, maxt=${b.maxt})`
  );
}
