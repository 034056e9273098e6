import type { BoundingBox } from "./bbox.js";
import { formatBoundingBox } from "./bbox.js";

/** Base class for every error raised by this package. */
export class SceneIndexError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A scene file skipped while building the catalog.
 *
 * Warnings are collected and logged; they never abort the scan.
 */
export class ScanWarning extends SceneIndexError {
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`Skipping ${path}: ${reason}`, options);
    this.path = path;
  }
}

/** The filename does not carry a YYYYMMDD acquisition date in field 4. */
export class MalformedFilenameError extends ScanWarning {}

/** The file could not be opened or has no georeferencing. */
export class UnreadableTileError extends ScanWarning {
  constructor(path: string, options?: ErrorOptions) {
    super(path, `cannot read raster bounds (${describeCause(options)})`, options);
  }
}

/** The sensor folder does not exist or cannot be listed. */
export class MissingFolderError extends ScanWarning {
  constructor(path: string, options?: ErrorOptions) {
    super(path, `cannot list scene folder (${describeCause(options)})`, options);
  }
}

/** The query does not intersect the dataset bounds. */
export class OutOfRangeQueryError extends SceneIndexError {
  readonly query: BoundingBox;
  readonly bounds: BoundingBox | null;

  constructor(query: BoundingBox, bounds: BoundingBox | null) {
    super(
      `query: ${formatBoundingBox(query)} is not within bounds of the index: ` +
        (bounds === null ? "(empty index)" : formatBoundingBox(bounds)),
    );
    this.query = query;
    this.bounds = bounds;
  }
}

/** The query lies inside the dataset bounds but over no scene. */
export class NoTileError extends SceneIndexError {
  readonly query: BoundingBox;

  constructor(query: BoundingBox) {
    super(`No scene intersects query: ${formatBoundingBox(query)}`);
    this.query = query;
  }
}

/** The query cannot be turned into a pixel window on the selected scene. */
export class WindowError extends SceneIndexError {
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`Cannot read ${path}: ${reason}`, options);
    this.path = path;
  }
}

/** The selected scene could not be opened or read at query time. */
export class SourceReadError extends SceneIndexError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Failed to read ${path} (${describeCause(options)})`, options);
    this.path = path;
  }
}

export class UnknownSensorError extends SceneIndexError {
  constructor(sensor: string, known: readonly string[]) {
    super(`Unknown sensor "${sensor}", expected one of: ${known.join(", ")}`);
  }
}

export class UnknownBandError extends SceneIndexError {
  constructor(band: string, sensor: string, known: readonly string[]) {
    super(
      `Band "${band}" is not provided by ${sensor}, expected one of: ${known.join(", ")}`,
    );
  }
}

function describeCause(options: ErrorOptions | undefined): string {
  const cause = options?.cause;
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}
