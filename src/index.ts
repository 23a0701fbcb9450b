/**
 * Marsgrid - WGS-84 / GCJ-02 / BD-09 datum conversion and map tile addressing
 */

export const VERSION = "0.1.0";

export * from "./datum";
export * from "./projection";
export * from "./tiles";
export {
  mapPositions,
  convertPosition,
  convertGeometry,
  convertFeature,
} from "./geojson/convertGeometry";
