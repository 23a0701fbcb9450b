/**
 * Datum Transforms
 *
 * Conversions between WGS-84, GCJ-02 and BD-09.
 *
 * WGS-84 -> GCJ-02 adds an empirical distortion (in meters) and converts it
 * to degrees on the Krasovsky 1940 ellipsoid. GCJ-02 -> BD-09 perturbs the
 * polar form of (lon, lat) and adds a fixed offset. Directions without a
 * closed form have an approximate one-step inverse and a precise iterative one.
 */

import { sanityInChina } from "./bounds";
import { solveInverse } from "./iterate";
import {
  bd09,
  coordinate,
  gcj02,
  wgs84,
  type Bd09Coordinate,
  type Coordinate,
  type Datum,
  type Gcj02Coordinate,
  type LatLon,
  type Wgs84Coordinate,
} from "./types";

const PI = Math.PI;

/** Krasovsky 1940 semi-major axis */
const GCJ_A = 6378245;

/** Krasovsky 1940 eccentricity squared (f = 1/298.3, e^2 = 2f - f^2) */
const GCJ_EE = 0.00669342162296594323;

/** Baidu's fixed offsets in degrees */
const BD_DLAT = 0.006;
const BD_DLON = 0.0065;

/** Angular frequency of Baidu's polar perturbation */
const BD_FACTOR = (PI * 3000) / 180;

/**
 * Distortion in meters at (x = lon - 105, y = lat - 35).
 */
function distortion(x: number, y: number): { dLat: number; dLon: number } {
  const dLat =
    -100 +
    2 * x +
    3 * y +
    0.2 * y * y +
    0.1 * x * y +
    0.2 * Math.sqrt(Math.abs(x)) +
    ((2 * Math.sin(x * 6 * PI) +
      2 * Math.sin(x * 2 * PI) +
      2 * Math.sin(y * PI) +
      4 * Math.sin((y / 3) * PI) +
      16 * Math.sin((y / 12) * PI) +
      32 * Math.sin((y / 30) * PI)) *
      20) /
      3;

  const dLon =
    300 +
    x +
    2 * y +
    0.1 * x * x +
    0.1 * x * y +
    0.1 * Math.sqrt(Math.abs(x)) +
    ((2 * Math.sin(x * 6 * PI) +
      2 * Math.sin(x * 2 * PI) +
      2 * Math.sin(x * PI) +
      4 * Math.sin((x / 3) * PI) +
      15 * Math.sin((x / 12) * PI) +
      30 * Math.sin((x / 30) * PI)) *
      20) /
      3;

  return { dLat, dLon };
}

function offsetToGcj(p: LatLon, checkChina: boolean): LatLon {
  if (checkChina && !sanityInChina(p)) {
    return { lat: p.lat, lon: p.lon };
  }

  const { dLat, dLon } = distortion(p.lon - 105, p.lat - 35);

  const radLat = (p.lat / 180) * PI;
  const magic = 1 - GCJ_EE * Math.pow(Math.sin(radLat), 2);

  // Length of one degree of latitude / longitude at this latitude, in meters
  const latDegArc = ((PI / 180) * (GCJ_A * (1 - GCJ_EE))) / Math.pow(magic, 1.5);
  const lonDegArc = (PI / 180) * ((GCJ_A * Math.cos(radLat)) / Math.sqrt(magic));

  return {
    lat: p.lat + dLat / latDegArc,
    lon: p.lon + dLon / lonDegArc,
  };
}

function approxFromGcj(p: LatLon, checkChina: boolean): LatLon {
  const shifted = offsetToGcj(p, checkChina);
  return {
    lat: p.lat - (shifted.lat - p.lat),
    lon: p.lon - (shifted.lon - p.lon),
  };
}

function perturbToBd(p: LatLon): LatLon {
  const x = p.lon;
  const y = p.lat;

  const r = Math.sqrt(x * x + y * y) + 0.00002 * Math.sin(y * BD_FACTOR);
  const theta = Math.atan2(y, x) + 0.000003 * Math.cos(x * BD_FACTOR);

  return {
    lat: r * Math.sin(theta) + BD_DLAT,
    lon: r * Math.cos(theta) + BD_DLON,
  };
}

function unperturbFromBd(p: LatLon): LatLon {
  const x = p.lon - BD_DLON;
  const y = p.lat - BD_DLAT;

  const r = Math.sqrt(x * x + y * y) - 0.00002 * Math.sin(y * BD_FACTOR);
  const theta = Math.atan2(y, x) - 0.000003 * Math.cos(x * BD_FACTOR);

  return {
    lat: r * Math.sin(theta),
    lon: r * Math.cos(theta),
  };
}

/**
 * Convert WGS-84 to GCJ-02.
 *
 * @param checkChina - When true, points outside China are returned unchanged
 */
export function wgsToGcj(wgs: Wgs84Coordinate, checkChina = true): Gcj02Coordinate {
  const p = offsetToGcj(wgs, checkChina);
  return gcj02(p.lat, p.lon);
}

/**
 * Convert GCJ-02 to WGS-84 with a single correction step (~1-2 m error).
 */
export function gcjToWgs(gcj: Gcj02Coordinate, checkChina = true): Wgs84Coordinate {
  const p = approxFromGcj(gcj, checkChina);
  return wgs84(p.lat, p.lon);
}

/** Convert GCJ-02 to BD-09. Applied everywhere, there is no China check. */
export function gcjToBd(gcj: Gcj02Coordinate): Bd09Coordinate {
  const p = perturbToBd(gcj);
  return bd09(p.lat, p.lon);
}

/** Convert BD-09 to GCJ-02 (algebraic inverse of {@link gcjToBd}). */
export function bdToGcj(bd: Bd09Coordinate): Gcj02Coordinate {
  const p = unperturbFromBd(bd);
  return gcj02(p.lat, p.lon);
}

export function bdToWgs(bd: Bd09Coordinate, checkChina = true): Wgs84Coordinate {
  return gcjToWgs(bdToGcj(bd), checkChina);
}

export function wgsToBd(wgs: Wgs84Coordinate, checkChina = true): Bd09Coordinate {
  return gcjToBd(wgsToGcj(wgs, checkChina));
}

/**
 * Convert GCJ-02 to WGS-84 by fixed-point iteration.
 * Typically converges in 3-4 rounds to sub-millimeter accuracy.
 */
export function gcjToWgsPrecise(
  gcj: Gcj02Coordinate,
  checkChina = true
): Wgs84Coordinate {
  const { coord } = solveInverse(
    (estimate) => offsetToGcj(estimate, checkChina),
    gcj,
    approxFromGcj(gcj, checkChina)
  );
  return wgs84(coord.lat, coord.lon);
}

/** Convert BD-09 to GCJ-02 by fixed-point iteration. */
export function bdToGcjPrecise(bd: Bd09Coordinate): Gcj02Coordinate {
  const { coord } = solveInverse(perturbToBd, bd, unperturbFromBd(bd));
  return gcj02(coord.lat, coord.lon);
}

/** Convert BD-09 to WGS-84 by fixed-point iteration over the full chain. */
export function bdToWgsPrecise(
  bd: Bd09Coordinate,
  checkChina = true
): Wgs84Coordinate {
  const { coord } = solveInverse(
    (estimate) => perturbToBd(offsetToGcj(estimate, checkChina)),
    bd,
    approxFromGcj(unperturbFromBd(bd), checkChina)
  );
  return wgs84(coord.lat, coord.lon);
}

export interface ConvertOptions {
  /** Use the iterative inverse where one exists (default false) */
  precise?: boolean;
  /** Skip obfuscation outside China (default true) */
  checkChina?: boolean;
}

/**
 * Convert an untagged point between datums chosen at runtime.
 *
 * Prefer the typed functions above when the datums are known statically.
 */
export function convert<T extends Datum>(
  from: Datum,
  to: T,
  p: LatLon,
  options: ConvertOptions = {}
): Coordinate<T> {
  const { precise = false, checkChina = true } = options;
  let result: LatLon;

  if (from === to) {
    result = { lat: p.lat, lon: p.lon };
  } else if (from === "WGS84" && to === "GCJ02") {
    result = offsetToGcj(p, checkChina);
  } else if (from === "WGS84" && to === "BD09") {
    result = perturbToBd(offsetToGcj(p, checkChina));
  } else if (from === "GCJ02" && to === "BD09") {
    result = perturbToBd(p);
  } else if (from === "GCJ02") {
    result = precise
      ? gcjToWgsPrecise(gcj02(p.lat, p.lon), checkChina)
      : approxFromGcj(p, checkChina);
  } else if (to === "GCJ02") {
    result = precise ? bdToGcjPrecise(bd09(p.lat, p.lon)) : unperturbFromBd(p);
  } else {
    result = precise
      ? bdToWgsPrecise(bd09(p.lat, p.lon), checkChina)
      : approxFromGcj(unperturbFromBd(p), checkChina);
  }

  return coordinate(to, result.lat, result.lon);
}
