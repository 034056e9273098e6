import type { Affine } from "@scene-index/affine";
import { apply, invert } from "@scene-index/affine";
import type { Window } from "./window.js";
import { createWindow, intersectWindows } from "./window.js";

/**
 * Pixel window of a raster covering the world rectangle
 * `[minX, minY, maxX, maxY]`.
 *
 * All four corners go through the inverse geotransform, so north-up,
 * south-up and rotated grids are handled alike. Partially covered pixels
 * are included. The result is clipped to the `width` x `height` image and
 * is null when nothing of the rectangle falls on the image.
 */
export function boundsToWindow(
  transform: Affine,
  [minX, minY, maxX, maxY]: readonly [number, number, number, number],
  width: number,
  height: number,
): Window | null {
  const inv = invert(transform);
  const corners = [
    apply(inv, minX, minY),
    apply(inv, minX, maxY),
    apply(inv, maxX, minY),
    apply(inv, maxX, maxY),
  ];

  const cols = corners.map(([col]) => col);
  const rows = corners.map(([, row]) => row);

  // Snap values within float noise of a pixel edge before rounding outward.
  const colStart = Math.floor(snap(Math.min(...cols)));
  const rowStart = Math.floor(snap(Math.min(...rows)));
  const colStop = Math.ceil(snap(Math.max(...cols)));
  const rowStop = Math.ceil(snap(Math.max(...rows)));

  const requested: Window = {
    colOff: colStart,
    rowOff: rowStart,
    width: colStop - colStart,
    height: rowStop - rowStart,
  };

  return intersectWindows(requested, createWindow(0, 0, width, height));
}

function snap(value: number, epsilon = 1e-9): number {
  const rounded = Math.round(value);
  return Math.abs(value - rounded) < epsilon ? rounded : value;
}
