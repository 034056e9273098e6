import type { Affine } from "@scene-index/affine";
import type {
  RasterArray,
  RasterHandle,
  RasterSource,
  Window,
} from "@scene-index/geotiff";
import {
  boundsToWindow,
  createWindow,
  toInt32,
  withRaster,
} from "@scene-index/geotiff";
import type { BoundingBox } from "./bbox.js";
import { formatBoundingBox, intersects } from "./bbox.js";
import type { TileRecord } from "./catalog.js";
import {
  NoTileError,
  OutOfRangeQueryError,
  SceneIndexError,
  SourceReadError,
  WindowError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { consoleLogger } from "./logger.js";
import type { IndexEntry, SpatialTemporalIndex } from "./spatial-index.js";

/**
 * How a scene is picked when several intersect the query.
 *
 * - `"first"`: the first hit in index order (insertion order). Overlapping
 *   scenes are never merged.
 * - `"nearest-time"`: the hit acquired closest to the middle of the query's
 *   time range; ties go to the earlier hit in index order.
 */
export type SelectionPolicy = "first" | "nearest-time";

/**
 * How the query's x/y are turned into a pixel window.
 *
 * - `"pixel"`: x and y are taken as column and row positions on the
 *   selected scene's own grid, without any georeferencing.
 * - `"world"`: x and y are projected coordinates, mapped to pixels through
 *   the scene's geotransform and clipped to the image.
 */
export type WindowMode = "pixel" | "world";

export type ResolverOptions = {
  source: RasterSource;
  selection?: SelectionPolicy;
  windowMode?: WindowMode;
  /** 1-based band to read. */
  band?: number;
  logger?: Logger;
};

/** Pixels read for one query plus where they came from. */
export type QueryResult = {
  /** Samples of the selected band, cast to signed 32-bit integers. */
  image: RasterArray<Int32Array>;
  /** Pixel window that was read from the scene. */
  window: Window;
  /** Path of the scene file that was read. */
  path: string;
  /** Acquisition time of that scene, Unix epoch seconds. */
  timestamp: number;
  /** Extent of that scene. */
  bbox: BoundingBox;
  /** Geotransform of the returned image. */
  transform: Affine;
};

/** Answers bounding-box queries against an index of scenes. */
export class QueryResolver {
  private readonly index: SpatialTemporalIndex<TileRecord>;
  private readonly source: RasterSource;
  private readonly logger: Logger;
  readonly selection: SelectionPolicy;
  readonly windowMode: WindowMode;
  readonly band: number;

  constructor(
    index: SpatialTemporalIndex<TileRecord>,
    {
      source,
      selection = "first",
      windowMode = "pixel",
      band = 1,
      logger = consoleLogger,
    }: ResolverOptions,
  ) {
    this.index = index;
    this.source = source;
    this.selection = selection;
    this.windowMode = windowMode;
    this.band = band;
    this.logger = logger;
  }

  /**
   * Pick the scene that answers `query`.
   *
   * @throws OutOfRangeQueryError if `query` misses the dataset bounds.
   * @throws NoTileError if `query` is in bounds but over no scene.
   */
  select(query: BoundingBox): TileRecord {
    const bounds = this.index.bounds;
    if (bounds === null || !intersects(query, bounds)) {
      throw new OutOfRangeQueryError(query, bounds);
    }

    const record = selectTile(
      this.index.intersect(query),
      query,
      this.selection,
    );
    if (record === undefined) {
      throw new NoTileError(query);
    }
    return record;
  }

  /**
   * Read the pixels covering `query` from the selected scene.
   *
   * The file is opened for this call only and closed before returning.
   *
   * @throws SourceReadError if the scene cannot be opened or read.
   * @throws WindowError if the query does not map onto the scene's pixels.
   */
  async resolve(query: BoundingBox): Promise<QueryResult> {
    const record = this.select(query);
    this.logger.debug(`Resolving ${formatBoundingBox(query)}`, {
      path: record.path,
      selection: this.selection,
      windowMode: this.windowMode,
    });

    try {
      return await withRaster(this.source, record.path, async (handle) => {
        const window = this.windowFor(query, handle);
        const array = await handle.read(this.band, window);
        const image = toInt32(array);

        return {
          image,
          window,
          path: record.path,
          timestamp: record.timestamp,
          bbox: record.bbox,
          transform: image.transform,
        };
      });
    } catch (error) {
      if (error instanceof SceneIndexError) {
        throw error;
      }
      throw new SourceReadError(record.path, { cause: error });
    }
  }

  private windowFor(query: BoundingBox, handle: RasterHandle): Window {
    if (this.windowMode === "world") {
      const window = boundsToWindow(
        handle.transform,
        [query.minx, query.miny, query.maxx, query.maxy],
        handle.width,
        handle.height,
      );
      if (window === null) {
        throw new WindowError(
          handle.path,
          `query ${formatBoundingBox(query)} covers no whole pixel of the scene`,
        );
      }
      return window;
    }

    let window: Window;
    try {
      window = pixelWindow(query);
    } catch (error) {
      throw new WindowError(
        handle.path,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    }

    if (
      window.colOff + window.width > handle.width ||
      window.rowOff + window.height > handle.height
    ) {
      throw new WindowError(
        handle.path,
        `window cols=${window.colOff}:${window.colOff + window.width}, ` +
          `rows=${window.rowOff}:${window.rowOff + window.height} ` +
          `extends outside the ${handle.height}x${handle.width} image`,
      );
    }
    return window;
  }
}

/**
 * Window that uses the query's x/y directly as pixel positions:
 * `colOff = minx`, `rowOff = miny`, `width = maxx - minx`,
 * `height = maxy - miny`. Fractional edges are widened to whole pixels.
 */
export function pixelWindow(query: BoundingBox): Window {
  const colOff = Math.floor(query.minx);
  const rowOff = Math.floor(query.miny);
  return createWindow(
    colOff,
    rowOff,
    Math.ceil(query.maxx) - colOff,
    Math.ceil(query.maxy) - rowOff,
  );
}

/** Apply a selection policy to index hits, in index order. */
export function selectTile(
  hits: Iterable<IndexEntry<TileRecord>>,
  query: BoundingBox,
  policy: SelectionPolicy,
): TileRecord | undefined {
  if (policy === "first") {
    for (const hit of hits) {
      return hit.payload;
    }
    return undefined;
  }

  const target = (query.mint + query.maxt) / 2;
  let best: TileRecord | undefined;
  let bestDelta = Infinity;
  for (const { payload } of hits) {
    const delta = timeDistance(payload.bbox, target);
    if (delta < bestDelta) {
      best = payload;
      bestDelta = delta;
    }
  }
  return best;
}

function timeDistance(bbox: BoundingBox, t: number): number {
  if (t < bbox.mint) return bbox.mint - t;
  if (t > bbox.maxt) return t - bbox.maxt;
  return 0;
}
