/**
 * Great-circle distance.
 */

import type { Coordinate, Datum } from "./types";

/** Degrees to radians conversion factor */
const DEG_TO_RAD = Math.PI / 180;

/** Mean Earth radius in meters */
export const EARTH_RADIUS = 6_371_000;

function haversine(theta: number): number {
  return Math.pow(Math.sin(theta / 2), 2);
}

/**
 * Haversine distance between two coordinates of the same datum.
 *
 * @returns Distance in meters
 */
export function distance<D extends Datum>(
  a: Coordinate<D>,
  b: Coordinate<D>
): number {
  const lat1 = a.lat * DEG_TO_RAD;
  const lat2 = b.lat * DEG_TO_RAD;
  const deltaLat = (a.lat - b.lat) * DEG_TO_RAD;
  const deltaLon = (a.lon - b.lon) * DEG_TO_RAD;

  const h =
    haversine(deltaLat) + Math.cos(lat1) * Math.cos(lat2) * haversine(deltaLon);

  return 2 * EARTH_RADIUS * Math.asin(Math.sqrt(h));
}
