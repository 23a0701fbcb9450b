/**
 * Projection Module
 *
 * Web Mercator and Baidu Mercator projections, and standard tile indexing.
 */

export type {
  WorldCoord,
  MercatorPoint,
  TileAddress,
  TileBounds,
} from "./types";

export { coordToWorld, worldToCoord, MAX_LATITUDE } from "./mercator";

export { llToMc, mcToLl, MAX_BAIDU_LATITUDE } from "./baiduMercator";

export {
  tilesPerAxis,
  coordToTile,
  tileToCoord,
  tileToBBox,
  tmsConvertY,
  tilesEqual,
  tileToString,
  parseTileAddress,
} from "./tileCoord";
