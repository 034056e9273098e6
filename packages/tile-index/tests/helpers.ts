import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Affine } from "@scene-index/affine";
import { compose, translation } from "@scene-index/affine";
import type {
  RasterBounds,
  RasterHandle,
  RasterSource,
  Window,
} from "@scene-index/geotiff";
import { windowEdges } from "@scene-index/geotiff";
import type { BoundingBox } from "../src/bbox.js";
import { createBoundingBox } from "../src/bbox.js";
import type { TileRecord } from "../src/catalog.js";
import type { Logger } from "../src/logger.js";

/** A scene held in memory. Samples default to `row * width + col`. */
export type MemoryScene = {
  bounds: RasterBounds;
  width: number;
  height: number;
  data?: ArrayLike<number>;
};

/**
 * In-process stand-in for a RasterSource, keyed by path.
 *
 * Records every open and close so tests can check handles are released, and
 * the largest number of handles open at the same time.
 */
export class MemoryRasterSource implements RasterSource {
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  maxOpen = 0;
  private readonly scenes = new Map<string, MemoryScene>();

  constructor(scenes: Record<string, MemoryScene> = {}) {
    for (const [path, scene] of Object.entries(scenes)) {
      this.scenes.set(path, scene);
    }
  }

  set(path: string, scene: MemoryScene): void {
    this.scenes.set(path, scene);
  }

  delete(path: string): void {
    this.scenes.delete(path);
  }

  async open(path: string): Promise<RasterHandle> {
    const scene = this.scenes.get(path);
    if (scene === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    this.opened.push(path);
    this.maxOpen = Math.max(
      this.maxOpen,
      this.opened.length - this.closed.length,
    );

    const { bounds, width, height } = scene;
    const data =
      scene.data ?? Array.from({ length: width * height }, (_, i) => i);
    const transform = fromBounds(bounds, width, height);

    return {
      path,
      bounds,
      transform,
      width,
      height,
      count: 1,
      read: async (band: number, window: Window) => {
        if (band !== 1) {
          throw new Error(`Band ${band} is out of range for 1 band(s)`);
        }
        const [left, top, right, bottom] = windowEdges(window);
        if (right > width || bottom > height) {
          throw new Error("Window extends outside image bounds");
        }
        const out = new Float64Array(window.width * window.height);
        for (let row = top; row < bottom; row++) {
          for (let col = left; col < right; col++) {
            out[(row - top) * window.width + (col - left)] =
              data[row * width + col] ?? 0;
          }
        }
        return {
          data: out,
          width: window.width,
          height: window.height,
          transform: compose(transform, translation(left, top)),
          nodata: null,
        };
      },
      close: async () => {
        this.closed.push(path);
      },
    };
  }
}

/** North-up transform of a `width` x `height` raster covering `bounds`. */
export function fromBounds(
  [minX, minY, maxX, maxY]: RasterBounds,
  width: number,
  height: number,
): Affine {
  return [
    (maxX - minX) / width,
    0,
    minX,
    0,
    -(maxY - minY) / height,
    maxY,
  ];
}

/** A Logger that keeps every message it is given. */
export function recordingLogger(): Logger & {
  messages: { level: string; message: string }[];
} {
  const messages: { level: string; message: string }[] = [];
  const record = (level: string) => (message: string) => {
    messages.push({ level, message });
  };
  return {
    messages,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

/** Create an empty dataset root with `files` touched under `folder`. */
export async function makeSceneDir(
  folder: string,
  files: readonly string[],
): Promise<{ root: string; dir: string }> {
  const root = await mkdtemp(join(tmpdir(), "scene-index-"));
  const dir = join(root, folder);
  await mkdir(dir, { recursive: true });
  await Promise.all(files.map((name) => writeFile(join(dir, name), "")));
  return { root, dir };
}

/** Shorthand for a TileRecord whose bbox comes from six numbers. */
export function record(
  path: string,
  ...coords: [number, number, number, number, number, number]
): TileRecord {
  const bbox: BoundingBox = createBoundingBox(...coords);
  return { bbox, path, timestamp: bbox.mint, band: "B1" };
}
