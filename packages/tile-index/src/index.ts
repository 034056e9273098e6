export type { BoundingBox } from "./bbox.js";
export {
  createBoundingBox,
  formatBoundingBox,
  intersection,
  intersects,
  union,
} from "./bbox.js";
export type { ScanOptions, ScanResult, TileRecord } from "./catalog.js";
export { parseAcquisitionTime, scanTiles } from "./catalog.js";
export type { SampleTransform, TileDatasetOptions } from "./dataset.js";
export { TileDataset } from "./dataset.js";
export {
  MalformedFilenameError,
  MissingFolderError,
  NoTileError,
  OutOfRangeQueryError,
  ScanWarning,
  SceneIndexError,
  SourceReadError,
  UnknownBandError,
  UnknownSensorError,
  UnreadableTileError,
  WindowError,
} from "./errors.js";
export type { Logger } from "./logger.js";
export { consoleLogger, createConsoleLogger, silentLogger } from "./logger.js";
export type {
  QueryResult,
  ResolverOptions,
  SelectionPolicy,
  WindowMode,
} from "./resolver.js";
export { pixelWindow, QueryResolver, selectTile } from "./resolver.js";
export type { SensorConfig, SensorName } from "./sensors.js";
export { getSensor, isSensorName, SENSORS } from "./sensors.js";
export type { IndexEntry } from "./spatial-index.js";
export { SpatialTemporalIndex } from "./spatial-index.js";
