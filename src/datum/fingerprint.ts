/**
 * Rendering and fingerprinting of coordinates for response payloads.
 */

import { Decimal } from "decimal.js";
import type { Coordinate, Datum, LatLon } from "./types";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function round(value: number, precision: number): number {
  return new Decimal(value)
    .toDecimalPlaces(precision, Decimal.ROUND_HALF_UP)
    .toNumber();
}

/**
 * Round both axes to `precision` decimal places (half away from zero).
 *
 * Halves are judged on the shortest decimal form of each double, the one
 * `String(value)` prints, not on its exact binary value: 1.005 rounds to
 * 1.01 although the stored double is slightly below 1.005.
 */
export function format<D extends Datum>(
  coord: Coordinate<D>,
  precision = 6
): Coordinate<D> {
  return {
    ...coord,
    lat: round(coord.lat, precision),
    lon: round(coord.lon, precision),
  };
}

/**
 * Deterministic 32-bit fingerprint of a coordinate.
 *
 * FNV-1a over the big-endian IEEE-754 bytes of lat then lon, so the value is
 * stable across processes and platforms. Not suitable for security use.
 *
 * @returns Unsigned 32-bit integer
 */
export function hash(coord: LatLon): number {
  const view = new DataView(new ArrayBuffer(16));
  view.setFloat64(0, coord.lat);
  view.setFloat64(8, coord.lon);

  let h = FNV_OFFSET_BASIS;
  for (let i = 0; i < view.byteLength; i++) {
    h ^= view.getUint8(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}
