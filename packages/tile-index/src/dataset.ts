import type { RasterSource } from "@scene-index/geotiff";
import { GeoTIFFSource } from "@scene-index/geotiff";
import type { BoundingBox } from "./bbox.js";
import type { TileRecord } from "./catalog.js";
import { scanTiles } from "./catalog.js";
import type { ScanWarning } from "./errors.js";
import { UnknownBandError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import type {
  QueryResult,
  SelectionPolicy,
  WindowMode,
} from "./resolver.js";
import { QueryResolver } from "./resolver.js";
import type { SensorName } from "./sensors.js";
import { getSensor } from "./sensors.js";
import { SpatialTemporalIndex } from "./spatial-index.js";

/** Post-processing applied to every query result before it is returned. */
export type SampleTransform = (sample: QueryResult) => QueryResult;

export type TileDatasetOptions = {
  /** Dataset root; the sensor folder is looked up below it. Defaults to "data". */
  root?: string;
  sensor: SensorName;
  /**
   * Bands the dataset advertises. Defaults to all of the sensor's bands. The
   * first one selects which file of each scene is indexed.
   */
  bands?: readonly string[];
  /** Defaults to a GeoTIFFSource. */
  source?: RasterSource;
  /** Defaults to a console logger, printing debug output when `verbose` is set. */
  logger?: Logger;
  verbose?: boolean;
  /** Maximum number of files opened at once while scanning. */
  concurrency?: number;
  selection?: SelectionPolicy;
  windowMode?: WindowMode;
  transform?: SampleTransform;
};

const DEFAULT_ROOT = "data";

/**
 * A directory of scenes from one sensor, indexed by extent and acquisition
 * time.
 *
 * The index is built once by `open` and never changes afterwards.
 *
 * @example
 * ```typescript
 * const dataset = await TileDataset.open({ root: "data", sensor: "landsat8" });
 * const sample = await dataset.get(
 *   createBoundingBox(0, 256, 0, 256, t0, t1),
 * );
 * ```
 */
export class TileDataset {
  readonly root: string;
  readonly sensor: SensorName;
  readonly bands: readonly string[];
  /** Indexed scenes, in filename order. */
  readonly records: readonly TileRecord[];
  /** Files skipped while scanning. */
  readonly warnings: readonly ScanWarning[];

  private readonly index: SpatialTemporalIndex<TileRecord>;
  private readonly resolver: QueryResolver;
  private readonly transform: SampleTransform | undefined;

  private constructor(
    root: string,
    sensor: SensorName,
    bands: readonly string[],
    records: readonly TileRecord[],
    warnings: readonly ScanWarning[],
    index: SpatialTemporalIndex<TileRecord>,
    resolver: QueryResolver,
    transform: SampleTransform | undefined,
  ) {
    this.root = root;
    this.sensor = sensor;
    this.bands = bands;
    this.records = records;
    this.warnings = warnings;
    this.index = index;
    this.resolver = resolver;
    this.transform = transform;
  }

  /** Scan the sensor folder and build the index. */
  static async open(options: TileDatasetOptions): Promise<TileDataset> {
    const {
      root = DEFAULT_ROOT,
      sensor,
      source = new GeoTIFFSource(),
      verbose = false,
      logger = createConsoleLogger({ verbose }),
      concurrency,
      selection,
      windowMode,
      transform,
    } = options;
    const config = getSensor(sensor);
    const bands = resolveBands(options.bands, sensor, config.bands);
    const [marker] = bands;
    if (marker === undefined) {
      throw new UnknownBandError("(none)", sensor, config.bands);
    }

    const { records, warnings } = await scanTiles({
      root,
      folder: config.folder,
      band: marker,
      source,
      logger,
      concurrency,
    });

    const index = new SpatialTemporalIndex<TileRecord>();
    index.load(records.map((record) => ({ bbox: record.bbox, payload: record })));

    const resolver = new QueryResolver(index, {
      source,
      selection,
      windowMode,
      logger,
    });

    return new TileDataset(
      root,
      sensor,
      bands,
      records,
      warnings,
      index,
      resolver,
      transform,
    );
  }

  /** Union of all scene extents, or null when no scene was found. */
  get bounds(): BoundingBox | null {
    return this.index.bounds;
  }

  /** Number of indexed scenes. */
  get size(): number {
    return this.index.size;
  }

  /** Scenes intersecting `query`, in index order. */
  intersect(query: BoundingBox): TileRecord[] {
    return Array.from(this.index.intersect(query), (entry) => entry.payload);
  }

  /**
   * Read the first band of the scene selected for `query`.
   *
   * @throws OutOfRangeQueryError if `query` misses the dataset bounds.
   */
  async get(query: BoundingBox): Promise<QueryResult> {
    const sample = await this.resolver.resolve(query);
    return this.transform === undefined ? sample : this.transform(sample);
  }
}

function resolveBands(
  requested: readonly string[] | undefined,
  sensor: SensorName,
  available: readonly string[],
): readonly string[] {
  if (requested === undefined || requested.length === 0) {
    return available;
  }
  for (const band of requested) {
    if (!available.includes(band)) {
      throw new UnknownBandError(band, sensor, available);
    }
  }
  return requested;
}
