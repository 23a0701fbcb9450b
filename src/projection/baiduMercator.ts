/**
 * Baidu Mercator Projection
 *
 * Functions for converting between BD-09 (lng/lat) and BD09MC planar meters.
 *
 * BD09MC is not a true Mercator: each latitude band carries its own
 * polynomial fit. The coefficient table is reference data and lives in
 * bd09mc.json.
 */

import { z } from "zod";
import { bd09, type Bd09Coordinate } from "../datum/types";
import type { MercatorPoint } from "./types";
import table from "./bd09mc.json";

/** Latitude range covered by BD09MC; input beyond it is clamped */
export const MAX_BAIDU_LATITUDE = 74;

const c = z.number();

/**
 * One band's coefficients: [offset, scale, p0 ... p6, divisor].
 * The first axis is linear, the second a degree-6 polynomial in |v| / divisor.
 */
const rowSchema = z
  .tuple([c, c, c, c, c, c, c, c, c, c])
  .transform(([offset, scale, p0, p1, p2, p3, p4, p5, p6, divisor]) => ({
    offset,
    scale,
    polynomial: [p0, p1, p2, p3, p4, p5, p6] as const,
    divisor,
  }));

type BandRow = z.infer<typeof rowSchema>;

interface Band {
  /** Lower bound of |latitude| or |y| for this band */
  limit: number;
  row: BandRow;
}

const tableSchema = z
  .object({
    mercatorBands: z.array(z.number()),
    latitudeBands: z.array(z.number()),
    mercatorToLatLng: z.array(rowSchema),
    latLngToMercator: z.array(rowSchema),
  })
  .refine(
    (t) =>
      t.mercatorBands.length === t.mercatorToLatLng.length &&
      t.latitudeBands.length === t.latLngToMercator.length,
    "band limits and coefficient rows differ in length"
  );

function zipBands(limits: number[], rows: BandRow[]): [Band, ...Band[]] {
  const bands = limits.flatMap((limit, i) => {
    const row = rows[i];
    return row ? [{ limit, row }] : [];
  });
  const [first, ...rest] = bands;
  if (!first) {
    throw new Error("BD09MC coefficient table has no bands");
  }
  return [first, ...rest];
}

function loadBands(): { toLatLng: [Band, ...Band[]]; toMercator: [Band, ...Band[]] } {
  const parsed = tableSchema.safeParse(table);
  if (!parsed.success) {
    throw new Error(`Invalid BD09MC coefficient table: ${parsed.error.message}`);
  }
  return {
    toLatLng: zipBands(parsed.data.mercatorBands, parsed.data.mercatorToLatLng),
    toMercator: zipBands(parsed.data.latitudeBands, parsed.data.latLngToMercator),
  };
}

const BANDS = loadBands();

/** First band whose limit the magnitude reaches; bands are in descending order */
function selectBand(bands: [Band, ...Band[]], magnitude: number): BandRow {
  for (const band of bands) {
    if (magnitude >= band.limit) return band.row;
  }
  return (bands[bands.length - 1] ?? bands[0]).row;
}

/**
 * Magnitude carrying the sign of `of`. Zero input maps to exactly zero
 * rather than the band's constant term (at most 1.6 mm), so the origin
 * projects to (0, 0) both ways.
 */
function signed(magnitude: number, of: number): number {
  if (of > 0) return magnitude;
  if (of < 0) return -magnitude;
  return 0;
}

function applyRow(row: BandRow, a: number, b: number): [number, number] {
  const linear = row.offset + row.scale * Math.abs(a);

  const t = Math.abs(b) / row.divisor;
  const p = row.polynomial;
  const curved = p[0] + t * (p[1] + t * (p[2] + t * (p[3] + t * (p[4] + t * (p[5] + t * p[6])))));

  return [signed(linear, a), signed(curved, b)];
}

function wrapLongitude(lng: number): number {
  let wrapped = lng;
  while (wrapped > 180) wrapped -= 360;
  while (wrapped < -180) wrapped += 360;
  return wrapped;
}

/**
 * Convert BD-09 longitude/latitude to BD09MC meters.
 *
 * Longitude is wrapped into [-180, 180] and latitude clamped to ±74°.
 *
 * @param lng - BD-09 longitude in degrees
 * @param lat - BD-09 latitude in degrees
 */
export function llToMc(lng: number, lat: number): MercatorPoint {
  const lon = wrapLongitude(lng);
  const clamped = Math.max(-MAX_BAIDU_LATITUDE, Math.min(MAX_BAIDU_LATITUDE, lat));

  const row = selectBand(BANDS.toMercator, Math.abs(clamped));
  const [x, y] = applyRow(row, lon, clamped);
  return { x, y };
}

/**
 * Convert BD09MC meters back to BD-09 longitude/latitude.
 *
 * @param x - BD09MC easting in meters
 * @param y - BD09MC northing in meters
 */
export function mcToLl(x: number, y: number): Bd09Coordinate {
  const row = selectBand(BANDS.toLatLng, Math.abs(y));
  const [lon, lat] = applyRow(row, x, y);
  return bd09(lat, lon);
}
