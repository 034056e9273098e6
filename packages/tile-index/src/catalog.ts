import { readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import type { RasterSource } from "@scene-index/geotiff";
import { withRaster } from "@scene-index/geotiff";
import type { BoundingBox } from "./bbox.js";
import { createBoundingBox } from "./bbox.js";
import type { ScanWarning } from "./errors.js";
import {
  MalformedFilenameError,
  MissingFolderError,
  UnreadableTileError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { consoleLogger } from "./logger.js";

/** One scene discovered on disk. */
export type TileRecord = Readonly<{
  /** Spatial extent and acquisition instant (`mint === maxt`). */
  bbox: BoundingBox;
  /** Path of the representative band file. */
  path: string;
  /** Acquisition time, Unix epoch seconds. */
  timestamp: number;
  /** Band marker the file was selected by. */
  band: string;
}>;

export type ScanOptions = {
  /** Dataset root directory. */
  root: string;
  /** Sensor subdirectory below `root`. */
  folder: string;
  /** Band whose file stands in for the whole scene, e.g. "B1". */
  band: string;
  source: RasterSource;
  logger?: Logger;
  /** Maximum number of files open at once. Defaults to 16. */
  concurrency?: number;
};

export type ScanResult = {
  /** Valid scenes, in filename order. */
  records: TileRecord[];
  /** Files (or the folder) that were skipped. */
  warnings: ScanWarning[];
};

const DEFAULT_SCAN_CONCURRENCY = 16;

/**
 * Parse the acquisition date of a scene filename.
 *
 * Scene IDs are `_`-delimited and carry the acquisition date as `YYYYMMDD` in
 * the fourth field, e.g. `LC08_L1TP_140041_20210407_20210416_02_T1_B1.TIF`.
 * The date is read as midnight UTC.
 *
 * https://www.usgs.gov/faqs/what-naming-convention-landsat-collection-2-level-1-and-level-2-scenes
 *
 * @returns Unix epoch seconds.
 */
export function parseAcquisitionTime(filename: string): number {
  const token = basename(filename).split("_")[3];

  if (token === undefined || !/^\d{8}$/.test(token)) {
    const found = token === undefined ? "nothing" : `"${token}"`;
    throw new MalformedFilenameError(
      filename,
      `expected a YYYYMMDD acquisition date in field 4, got ${found}`,
    );
  }

  const year = Number(token.slice(0, 4));
  const month = Number(token.slice(4, 6));
  const day = Number(token.slice(6, 8));

  // setUTCFullYear, unlike Date.UTC, does not remap years 0-99
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new MalformedFilenameError(
      filename,
      `"${token}" is not a calendar date`,
    );
  }

  return date.getTime() / 1000;
}

/**
 * List the scenes of one sensor folder.
 *
 * Only files named `*_<band>.TIF` are considered, so each scene contributes a
 * single record no matter how many band files it has. Bounds are read
 * concurrently, at most `concurrency` files at a time. A file that cannot be
 * parsed or opened is skipped and reported as a warning.
 */
export async function scanTiles(options: ScanOptions): Promise<ScanResult> {
  const {
    root,
    folder,
    band,
    source,
    logger = consoleLogger,
    concurrency = DEFAULT_SCAN_CONCURRENCY,
  } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Scan concurrency must be a positive integer, got ${concurrency}`,
    );
  }
  const dir = join(root, folder);
  const suffix = `_${band}.TIF`;

  let names: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(suffix))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    const warning = new MissingFolderError(dir, { cause: error });
    logger.warn(warning.message);
    return { records: [], warnings: [warning] };
  }

  const outcomes = await mapConcurrent(names, concurrency, (name) =>
    readTile(join(dir, name), band, source),
  );

  const records: TileRecord[] = [];
  const warnings: ScanWarning[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      records.push(outcome.record);
    } else {
      logger.warn(outcome.warning.message);
      warnings.push(outcome.warning);
    }
  }

  logger.info(`Indexed ${records.length} scene(s) from ${dir}`, {
    skipped: warnings.length,
  });

  return { records, warnings };
}

/**
 * Like `Promise.all(items.map(fn))`, but with at most `limit` calls pending.
 * Results keep the order of `items`.
 */
async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  // Workers pull from one shared iterator, so each item is taken once
  const queue = items.entries();
  const worker = async (): Promise<void> => {
    for (const [i, item] of queue) {
      results[i] = await fn(item);
    }
  };
  await Promise.all(
    Array.from({ length: Math.min(limit, items.length) }, worker),
  );
  return results;
}

type TileOutcome =
  | { ok: true; record: TileRecord }
  | { ok: false; warning: ScanWarning };

async function readTile(
  path: string,
  band: string,
  source: RasterSource,
): Promise<TileOutcome> {
  let timestamp: number;
  try {
    timestamp = parseAcquisitionTime(path);
  } catch (error) {
    if (error instanceof MalformedFilenameError) {
      return { ok: false, warning: error };
    }
    throw error;
  }

  let bbox: BoundingBox;
  try {
    const [minx, miny, maxx, maxy] = await withRaster(
      source,
      path,
      async (handle) => handle.bounds,
    );
    bbox = createBoundingBox(minx, maxx, miny, maxy, timestamp, timestamp);
  } catch (error) {
    const warning = new UnreadableTileError(path, { cause: error });
    return { ok: false, warning };
  }

  return { ok: true, record: Object.freeze({ bbox, path, timestamp, band }) };
}
