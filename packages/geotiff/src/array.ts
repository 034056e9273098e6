import type { Affine } from "@scene-index/affine";

/** Typed arrays supported for raster sample storage. */
export type RasterTypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

/** Single-band pixel data read from a window of a raster. */
export type RasterArray<T extends RasterTypedArray = RasterTypedArray> = {
  /** Row-major samples. Length = height * width. */
  data: T;

  /** Height in pixels. */
  height: number;

  /** Width in pixels. */
  width: number;

  /**
   * Affine geotransform of the window's own pixel grid, so pixel (0, 0) is
   * the window's upper-left pixel.
   */
  transform: Affine;

  /** The NoData value, or null if not set. */
  nodata: number | null;
};

/**
 * Cast samples to signed 32-bit integers.
 *
 * Fractional values truncate toward zero and out-of-range values wrap, the
 * same as any Int32Array store. NaN becomes 0.
 */
export function toInt32(array: RasterArray): RasterArray<Int32Array> {
  const data =
    array.data instanceof Int32Array
      ? array.data
      : Int32Array.from(array.data);

  return { ...array, data };
}
