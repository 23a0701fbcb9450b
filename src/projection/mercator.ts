/**
 * Web Mercator Projection
 *
 * Functions for converting between geographic coordinates and normalized
 * Web Mercator world coordinates (0-1 range). WGS-84 and GCJ-02 share this
 * grid; only the content drawn on it differs.
 */

import type { LatLon } from "../datum/types";
import type { WorldCoord } from "./types";

/** Degrees to radians conversion factor */
const DEG_TO_RAD = Math.PI / 180;

/** Radians to degrees conversion factor */
const RAD_TO_DEG = 180 / Math.PI;

/** Maximum latitude for Web Mercator projection (~85.05 degrees) */
export const MAX_LATITUDE = 85.051128779806604;

/**
 * Convert a geographic coordinate to normalized Web Mercator.
 *
 * The output coordinates are in the range [0, 1] where:
 * - x=0 is 180°W, x=1 is 180°E, x=0.5 is the prime meridian
 * - y=0 is ~85°N, y=1 is ~85°S, y=0.5 is the equator
 *
 * Latitude is not clamped; beyond ±MAX_LATITUDE y leaves [0, 1].
 */
export function coordToWorld(coord: LatLon): WorldCoord {
  const x = (coord.lon + 180) / 360;
  const latRad = coord.lat * DEG_TO_RAD;
  const y = (1 - Math.asinh(Math.tan(latRad)) / Math.PI) / 2;
  return { x, y };
}

/**
 * Convert normalized Web Mercator coordinates back to longitude/latitude.
 *
 * @param x - World X coordinate (0-1)
 * @param y - World Y coordinate (0-1)
 */
export function worldToCoord(x: number, y: number): LatLon {
  const lon = x * 360 - 180;
  const lat = RAD_TO_DEG * Math.atan(Math.sinh(Math.PI * (1 - 2 * y)));
  return { lat, lon };
}
