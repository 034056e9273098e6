import { describe, expect, it } from "vitest";
import type { RasterHandle, RasterSource } from "../src/source.js";
import { withRaster } from "../src/source.js";

function trackingSource(): { source: RasterSource; closed: string[] } {
  const closed: string[] = [];
  const source: RasterSource = {
    async open(path) {
      if (path.endsWith("missing.TIF")) {
        throw new Error(`ENOENT: ${path}`);
      }
      const handle: RasterHandle = {
        path,
        bounds: [0, 0, 10, 10],
        transform: [1, 0, 0, 0, -1, 10],
        width: 10,
        height: 10,
        count: 1,
        read: async () => {
          throw new Error("read failed");
        },
        close: async () => {
          closed.push(path);
        },
      };
      return handle;
    },
  };
  return { source, closed };
}

describe("withRaster", () => {
  it("returns the callback's value and closes the handle", async () => {
    const { source, closed } = trackingSource();
    const bounds = await withRaster(source, "a.TIF", async (h) => h.bounds);
    expect(bounds).toEqual([0, 0, 10, 10]);
    expect(closed).toEqual(["a.TIF"]);
  });

  it("closes the handle when the callback throws", async () => {
    const { source, closed } = trackingSource();
    await expect(
      withRaster(source, "b.TIF", (h) =>
        h.read(1, { colOff: 0, rowOff: 0, width: 1, height: 1 }),
      ),
    ).rejects.toThrow("read failed");
    expect(closed).toEqual(["b.TIF"]);
  });

  it("propagates open failures without a handle to close", async () => {
    const { source, closed } = trackingSource();
    await expect(
      withRaster(source, "missing.TIF", async () => 1),
    ).rejects.toThrow(/ENOENT/);
    expect(closed).toEqual([]);
  });
});
