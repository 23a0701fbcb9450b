/**
 * Datum Module
 *
 * Datum-tagged coordinates, input normalization and WGS-84 / GCJ-02 / BD-09
 * conversion.
 */

export type {
  Datum,
  LatLon,
  Coordinate,
  Wgs84Coordinate,
  Gcj02Coordinate,
  Bd09Coordinate,
} from "./types";
export { coordinate, wgs84, gcj02, bd09 } from "./types";

export { normalize } from "./normalize";
export { CHINA_BOUNDS, sanityInChina } from "./bounds";
export { distance, EARTH_RADIUS } from "./distance";
export { format, hash } from "./fingerprint";

export {
  solveInverse,
  PRECISE_EPSILON,
  MAX_ITERATIONS,
  type InverseSolution,
} from "./iterate";

export {
  wgsToGcj,
  gcjToWgs,
  gcjToBd,
  bdToGcj,
  bdToWgs,
  wgsToBd,
  gcjToWgsPrecise,
  bdToGcjPrecise,
  bdToWgsPrecise,
  convert,
  type ConvertOptions,
} from "./transform";
