import { describe, expect, it } from "vitest";
import type { RasterArray } from "../src/array.js";
import { toInt32 } from "../src/array.js";

function raster(data: RasterArray["data"]): RasterArray {
  return {
    data,
    width: data.length,
    height: 1,
    transform: [1, 0, 0, 0, -1, 0],
    nodata: null,
  };
}

describe("toInt32", () => {
  it("widens unsigned 16-bit samples", () => {
    const out = toInt32(raster(new Uint16Array([0, 1, 65535])));
    expect(out.data).toBeInstanceOf(Int32Array);
    expect(Array.from(out.data)).toEqual([0, 1, 65535]);
  });

  it("truncates floats toward zero", () => {
    const out = toInt32(raster(new Float32Array([1.9, -1.9, 0.25])));
    expect(Array.from(out.data)).toEqual([1, -1, 0]);
  });

  it("returns Int32 data unchanged", () => {
    const data = new Int32Array([7, -7]);
    expect(toInt32(raster(data)).data).toBe(data);
  });

  it("keeps the window metadata", () => {
    const out = toInt32(raster(new Uint8Array([1, 2])));
    expect(out.width).toBe(2);
    expect(out.height).toBe(1);
    expect(out.transform).toEqual([1, 0, 0, 0, -1, 0]);
  });
});
