/**
 * China bounds gate.
 *
 * A coarse rectangle around mainland China. Obfuscated datums are only ever
 * applied to points inside it; points over open sea within the box still pass.
 */

import type { LatLon } from "./types";

export const CHINA_BOUNDS = {
  minLat: 0.8293,
  maxLat: 55.8271,
  minLon: 72.004,
  maxLon: 137.8347,
} as const;

/** True when the point lies inside the (inclusive) China rectangle. */
export function sanityInChina(coord: LatLon): boolean {
  return (
    coord.lat >= CHINA_BOUNDS.minLat &&
    coord.lat <= CHINA_BOUNDS.maxLat &&
    coord.lon >= CHINA_BOUNDS.minLon &&
    coord.lon <= CHINA_BOUNDS.maxLon
  );
}
