/**
 * Coordinate Normalization
 *
 * Turns loosely typed latitude/longitude input (query strings, JSON numbers,
 * database decimals) into a validated coordinate. Invalid input yields null.
 */

import { Decimal } from "decimal.js";
import { z } from "zod";
import { coordinate, type Coordinate, type Datum } from "./types";

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

const latLonSchema = z.object({ lat: latitude, lon: longitude });

/** Plain decimal number, optionally signed, with an optional exponent */
const NUMERIC_STRING = /^[+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

type InputKind = "number" | "bigint" | "string" | "decimal";

function kindOf(value: unknown): InputKind | null {
  if (typeof value === "number") return "number";
  if (typeof value === "bigint") return "bigint";
  if (typeof value === "string") return "string";
  if (Decimal.isDecimal(value)) return "decimal";
  return null;
}

function parseNumericString(value: string): number | null {
  if (!NUMERIC_STRING.test(value)) return null;
  return Number(value);
}

function decimalInRange(value: Decimal, limit: number): boolean {
  return value.isFinite() && value.gte(-limit) && value.lte(limit);
}

function toNumbers(lat: unknown, lon: unknown): [number, number] | null {
  const kind = kindOf(lat);
  if (kind === null || kind !== kindOf(lon)) return null;

  if (typeof lat === "number" && typeof lon === "number") {
    return [lat, lon];
  }
  if (typeof lat === "bigint" && typeof lon === "bigint") {
    return [Number(lat), Number(lon)];
  }
  if (typeof lat === "string" && typeof lon === "string") {
    const parsedLat = parseNumericString(lat);
    const parsedLon = parseNumericString(lon);
    if (parsedLat === null || parsedLon === null) return null;
    return [parsedLat, parsedLon];
  }
  if (Decimal.isDecimal(lat) && Decimal.isDecimal(lon)) {
    // Exact comparison first: 90.00000000000000001 rounds to 90 as a double.
    if (!decimalInRange(lat, 90) || !decimalInRange(lon, 180)) return null;
    return [lat.toNumber(), lon.toNumber()];
  }
  return null;
}

/**
 * Normalize raw latitude/longitude into a coordinate.
 *
 * Both values must be the same kind: numbers, bigints, numeric strings or
 * decimal.js decimals. Strings must contain only the number (no whitespace).
 * Latitude must lie in [-90, 90] and longitude in [-180, 180], inclusive.
 *
 * @returns The coordinate tagged with `datum` (WGS-84 by default), or null
 */
export function normalize(lat: unknown, lon: unknown): Coordinate<"WGS84"> | null;
export function normalize<D extends Datum>(
  lat: unknown,
  lon: unknown,
  datum: D
): Coordinate<D> | null;
export function normalize(
  lat: unknown,
  lon: unknown,
  datum: Datum = "WGS84"
): Coordinate<Datum> | null {
  const numbers = toNumbers(lat, lon);
  if (numbers === null) return null;

  const result = latLonSchema.safeParse({ lat: numbers[0], lon: numbers[1] });
  if (!result.success) return null;

  return coordinate(datum, result.data.lat, result.data.lon);
}
