/**
 * Datum Types
 *
 * Coordinates are tagged with the datum they are expressed in, so a GCJ-02
 * value cannot be passed where WGS-84 is expected. The tag is a phantom
 * brand: it exists only in the type system and erases at compile time.
 */

/** Geodetic datums handled by this library */
export type Datum = "WGS84" | "GCJ02" | "BD09";

declare const DatumBrand: unique symbol;

/** Untagged latitude/longitude pair in degrees */
export interface LatLon {
  readonly lat: number;
  readonly lon: number;
}

/** Latitude/longitude in degrees, tagged with its datum */
export type Coordinate<D extends Datum> = LatLon & {
  readonly [DatumBrand]: D;
};

/** GPS coordinate */
export type Wgs84Coordinate = Coordinate<"WGS84">;

/** "Mars" coordinate used by maps published inside China */
export type Gcj02Coordinate = Coordinate<"GCJ02">;

/** Baidu coordinate */
export type Bd09Coordinate = Coordinate<"BD09">;

/**
 * Tag a latitude/longitude pair with a datum.
 *
 * The datum argument only drives inference; nothing is stored at runtime.
 */
export function coordinate<D extends Datum>(
  _datum: D,
  lat: number,
  lon: number
): Coordinate<D> {
  return { lat, lon } as Coordinate<D>;
}

export function wgs84(lat: number, lon: number): Wgs84Coordinate {
  return coordinate("WGS84", lat, lon);
}

export function gcj02(lat: number, lon: number): Gcj02Coordinate {
  return coordinate("GCJ02", lat, lon);
}

export function bd09(lat: number, lon: number): Bd09Coordinate {
  return coordinate("BD09", lat, lon);
}
