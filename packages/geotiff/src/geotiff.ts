import type { Affine } from "@scene-index/affine";
import { compose, translation } from "@scene-index/affine";
import type {
  GeoTIFFImage,
  TypedArrayWithDimensions,
  GeoTIFF as UpstreamGeoTIFF,
} from "geotiff";
import { fromFile } from "geotiff";
import type { RasterArray } from "./array.js";
import type { RasterBounds, RasterHandle, RasterSource } from "./source.js";
import type { Window } from "./window.js";
import { windowEdges } from "./window.js";

/** Reads local GeoTIFF files through geotiff.js. */
export class GeoTIFFSource implements RasterSource {
  async open(path: string): Promise<GeoTIFFHandle> {
    return await GeoTIFFHandle.open(path);
  }
}

/**
 * An open GeoTIFF, exposing the full-resolution image only. Overviews and
 * mask IFDs are ignored.
 */
export class GeoTIFFHandle implements RasterHandle {
  readonly path: string;

  /** The underlying geotiff.js instance. */
  readonly tiff: UpstreamGeoTIFF;

  /** The primary (full-resolution) image. */
  readonly image: GeoTIFFImage;

  readonly transform: Affine;

  readonly bounds: RasterBounds;

  private constructor(path: string, tiff: UpstreamGeoTIFF, image: GeoTIFFImage) {
    this.path = path;
    this.tiff = tiff;
    this.image = image;
    this.transform = extractGeotransform(image);
    this.bounds = extractBounds(image);
  }

  /** Open a file and parse the georeferencing of its first IFD. */
  static async open(path: string): Promise<GeoTIFFHandle> {
    const tiff = await fromFile(path);
    try {
      const imageCount = await tiff.getImageCount();
      if (imageCount === 0) {
        throw new Error("TIFF does not contain any IFDs");
      }
      const image = await tiff.getImage(0);
      return new GeoTIFFHandle(path, tiff, image);
    } catch (error) {
      await tiff.close();
      throw error;
    }
  }

  /** Image width in pixels. */
  get width(): number {
    return this.image.getWidth();
  }

  /** Image height in pixels. */
  get height(): number {
    return this.image.getHeight();
  }

  /** Number of bands (samples per pixel). */
  get count(): number {
    return this.image.getSamplesPerPixel();
  }

  /** The NoData value, or null if not set. */
  get nodata(): number | null {
    return this.image.getGDALNoData();
  }

  async read(band: number, window: Window): Promise<RasterArray> {
    if (!Number.isInteger(band) || band < 1 || band > this.count) {
      throw new Error(
        `Band ${band} is out of range for ${this.count} band(s) in ${this.path}`,
      );
    }

    const [left, top, right, bottom] = windowEdges(window);

    if (right > this.width || bottom > this.height) {
      throw new Error(
        `Window extends outside image bounds. ` +
          `Window: cols=${left}:${right}, rows=${top}:${bottom}. ` +
          `Image size: ${this.height}x${this.width}`,
      );
    }

    // geotiff.js window: [left, top, right, bottom]; samples are 0-based
    const data = (await this.image.readRasters({
      window: [left, top, right, bottom],
      samples: [band - 1],
      interleave: true,
    })) as TypedArrayWithDimensions;

    return {
      data,
      height: data.height,
      width: data.width,
      transform: compose(this.transform, translation(left, top)),
      nodata: this.nodata,
    };
  }

  async close(): Promise<void> {
    await this.tiff.close();
  }
}

/** The parts of a GeoTIFFImage that carry its georeferencing. */
export type GeoreferencedImage = {
  getOrigin(): number[];
  getResolution(): number[];
  getFileDirectory(): unknown;
};

/**
 * Extract the affine geotransform of a GeoTIFF image.
 *
 * Returns [a, b, c, d, e, f] where:
 * - x = a * col + b * row + c
 * - y = d * col + e * row + f
 */
export function extractGeotransform(image: GeoreferencedImage): Affine {
  const [originX, originY] = image.getOrigin();
  const [resX, resY] = image.getResolution();

  if (
    originX === undefined ||
    originY === undefined ||
    resX === undefined ||
    resY === undefined
  ) {
    throw new Error("GeoTIFF has no origin or resolution");
  }

  // ModelTransformation is a 4x4 row-major matrix, parsed by geotiff.js into
  // a Float64Array:
  // [a  b  0  c]
  // [d  e  0  f]
  // [0  0  1  0]
  // [0  0  0  1]
  const fd = image.getFileDirectory();
  const modelTransformation =
    typeof fd === "object" && fd !== null && "ModelTransformation" in fd
      ? fd.ModelTransformation
      : undefined;

  let b = 0; // row rotation
  let d = 0; // column rotation

  if (isNumberArray(modelTransformation) && modelTransformation.length >= 16) {
    b = modelTransformation[1] ?? 0;
    d = modelTransformation[4] ?? 0;
  }

  return [resX, b, originX, d, resY, originY];
}

function isNumberArray(value: unknown): value is ArrayLike<number> {
  return (
    Array.isArray(value) ||
    (ArrayBuffer.isView(value) && !(value instanceof DataView))
  );
}

function extractBounds(image: GeoTIFFImage): RasterBounds {
  const [minX, minY, maxX, maxY] = image.getBoundingBox();
  if (
    minX === undefined ||
    minY === undefined ||
    maxX === undefined ||
    maxY === undefined
  ) {
    throw new Error("GeoTIFF has no bounding box");
  }
  return [minX, minY, maxX, maxY];
}
