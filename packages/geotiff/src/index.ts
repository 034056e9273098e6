export type { RasterArray, RasterTypedArray } from "./array.js";
export { toInt32 } from "./array.js";
export type { GeoreferencedImage } from "./geotiff.js";
export {
  extractGeotransform,
  GeoTIFFHandle,
  GeoTIFFSource,
} from "./geotiff.js";
export type { RasterBounds, RasterHandle, RasterSource } from "./source.js";
export { withRaster } from "./source.js";
export { boundsToWindow } from "./transform.js";
export type { Window } from "./window.js";
export { createWindow, intersectWindows, windowEdges } from "./window.js";
