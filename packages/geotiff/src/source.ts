import type { Affine } from "@scene-index/affine";
import type { RasterArray } from "./array.js";
import type { Window } from "./window.js";

/** Bounding box [minX, minY, maxX, maxY] in the raster's CRS. */
export type RasterBounds = [
  minX: number,
  minY: number,
  maxX: number,
  maxY: number,
];

/** An open raster file. Must be closed once the caller is done with it. */
export interface RasterHandle {
  /** Path the handle was opened from. */
  readonly path: string;

  /** Spatial extent of the full-resolution image. */
  readonly bounds: RasterBounds;

  /** Geotransform of the full-resolution image. */
  readonly transform: Affine;

  /** Image width in pixels. */
  readonly width: number;

  /** Image height in pixels. */
  readonly height: number;

  /** Number of bands (samples per pixel). */
  readonly count: number;

  /**
   * Read one band inside a pixel window.
   *
   * @param band  1-based band index.
   */
  read(band: number, window: Window): Promise<RasterArray>;

  close(): Promise<void>;
}

/** Opens raster files by path. */
export interface RasterSource {
  /** Rejects when the file is missing or cannot be decoded. */
  open(path: string): Promise<RasterHandle>;
}

/**
 * Open `path`, hand the handle to `fn` and close it afterwards, whether or not
 * `fn` succeeds.
 */
export async function withRaster<T>(
  source: RasterSource,
  path: string,
  fn: (handle: RasterHandle) => Promise<T>,
): Promise<T> {
  const handle = await source.open(path);
  try {
    return await fn(handle);
  } finally {
    await handle.close();
  }
}
