/**
 * GeoJSON datum conversion.
 * Rebuilds geometries with every position converted; input is left untouched.
 */

import type { Feature, Geometry, GeometryCollection, Position } from "geojson";
import { convert, type ConvertOptions } from "../datum/transform";
import type { Datum } from "../datum/types";

/**
 * Map every position of a geometry through `fn`.
 */
export function mapPositions<G extends Geometry>(
  geometry: G,
  fn: (position: Position) => Position
): G;
export function mapPositions(
  geometry: Geometry,
  fn: (position: Position) => Position
): Geometry {
  switch (geometry.type) {
    case "Point":
      return { ...geometry, coordinates: fn(geometry.coordinates) };
    case "MultiPoint":
    case "LineString":
      return { ...geometry, coordinates: geometry.coordinates.map(fn) };
    case "MultiLineString":
    case "Polygon":
      return {
        ...geometry,
        coordinates: geometry.coordinates.map((line) => line.map(fn)),
      };
    case "MultiPolygon":
      return {
        ...geometry,
        coordinates: geometry.coordinates.map((polygon) =>
          polygon.map((ring) => ring.map(fn))
        ),
      };
    case "GeometryCollection":
      return mapCollection(geometry, fn);
  }
}

function mapCollection(
  collection: GeometryCollection,
  fn: (position: Position) => Position
): GeometryCollection {
  return {
    ...collection,
    geometries: collection.geometries.map((child) => mapPositions(child, fn)),
  };
}

/**
 * Convert a [lon, lat, ...rest] position between datums, keeping altitude.
 */
export function convertPosition(
  position: Position,
  from: Datum,
  to: Datum,
  options?: ConvertOptions
): Position {
  const [lon = 0, lat = 0, ...rest] = position;
  const converted = convert(from, to, { lat, lon }, options);
  return [converted.lon, converted.lat, ...rest];
}

/**
 * Convert a geometry between datums.
 */
export function convertGeometry<G extends Geometry>(
  geometry: G,
  from: Datum,
  to: Datum,
  options?: ConvertOptions
): G {
  return mapPositions(geometry, (position) =>
    convertPosition(position, from, to, options)
  );
}

/**
 * Convert a feature's geometry between datums. Properties are shared, not copied.
 */
export function convertFeature<G extends Geometry, P>(
  feature: Feature<G, P>,
  from: Datum,
  to: Datum,
  options?: ConvertOptions
): Feature<G, P> {
  return {
    ...feature,
    geometry: convertGeometry(feature.geometry, from, to, options),
  };
}
