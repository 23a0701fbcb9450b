/**
 * Datum-aware tile conversion.
 *
 * Maps tile requests between the standard grid (shared by WGS-84 and
 * GCJ-02) and Baidu's grid, which counts 256px tiles of BD09MC meters from
 * the projection origin with zoom 18 as the 1 m/px reference.
 */

import { llToMc, mcToLl } from "../projection/baiduMercator";
import { coordToTile, tileToCoord } from "../projection/tileCoord";
import type { TileAddress } from "../projection/types";
import { wgsToBd } from "../datum/transform";
import { wgs84, type Bd09Coordinate } from "../datum/types";

/** Tile edge in pixels */
export const TILE_SIZE = 256;

/** Baidu zoom level at which one pixel is one BD09MC meter */
export const BAIDU_REFERENCE_ZOOM = 18;

function baiduResolution(zoom: number): number {
  return Math.pow(2, zoom - BAIDU_REFERENCE_ZOOM);
}

/**
 * Get the Baidu tile containing a BD-09 coordinate.
 *
 * Rows grow northwards. At low zoom the floor can yield -1.
 */
export function baiduCoordToTile(zoom: number, coord: Bd09Coordinate): TileAddress {
  const mercator = llToMc(coord.lon, coord.lat);
  const resolution = baiduResolution(zoom);
  return {
    zoom,
    x: Math.floor((mercator.x * resolution) / TILE_SIZE),
    y: Math.floor((mercator.y * resolution) / TILE_SIZE),
  };
}

/**
 * Get the BD-09 coordinate of a Baidu tile's origin (southwest) corner.
 */
export function baiduTileToCoord(zoom: number, x: number, y: number): Bd09Coordinate {
  const resolution = baiduResolution(zoom);
  return mcToLl((x * TILE_SIZE) / resolution, (y * TILE_SIZE) / resolution);
}

/** GCJ-02 tiles share the WGS-84 grid, so the address is unchanged. */
export function wgsToGcjTile(zoom: number, x: number, y: number): TileAddress {
  return { zoom, x, y };
}

/** GCJ-02 tiles share the WGS-84 grid, so the address is unchanged. */
export function gcjToWgsTile(zoom: number, x: number, y: number): TileAddress {
  return { zoom, x, y };
}

/**
 * Get the Baidu tile covering the northwest corner of a standard tile.
 */
export function wgsToBdTile(zoom: number, x: number, y: number): TileAddress {
  const corner = tileToCoord(zoom, x, y);
  return baiduCoordToTile(zoom, wgsToBd(wgs84(corner.lat, corner.lon)));
}

/**
 * Get the standard tile under the origin corner of a Baidu tile.
 *
 * The BD-09 corner is placed on the standard grid as is, without a datum
 * shift, so this is not an exact inverse of {@link wgsToBdTile}. Corners of
 * tiles far from the origin can leave the Web Mercator range.
 */
export function bdToWgsTile(zoom: number, x: number, y: number): TileAddress {
  return coordToTile(zoom, baiduTileToCoord(zoom, x, y));
}
