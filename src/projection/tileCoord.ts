/**
 * Tile Coordinate Utilities
 *
 * Functions for converting between geographic coordinates and standard
 * (slippy map) tile indices, plus TMS row flipping and tile key helpers.
 */

import type { LatLon } from "../datum/types";
import type { TileAddress, TileBounds } from "./types";
import { coordToWorld, worldToCoord } from "./mercator";

/**
 * Number of tiles along one axis at a zoom level.
 *
 * @param zoom - Zoom level
 * @returns 2^zoom
 */
export function tilesPerAxis(zoom: number): number {
  return Math.pow(2, zoom);
}

/**
 * Get the standard tile containing a coordinate.
 *
 * Indices are not clamped: latitudes beyond the Web Mercator limit produce
 * rows outside the pyramid.
 *
 * @param zoom - Zoom level
 * @param coord - WGS-84 or GCJ-02 coordinate (both share the grid)
 */
export function coordToTile(zoom: number, coord: LatLon): TileAddress {
  const n = tilesPerAxis(zoom);
  const world = coordToWorld(coord);
  return {
    zoom,
    x: Math.floor(world.x * n),
    y: Math.floor(world.y * n),
  };
}

/**
 * Get the northwest corner of a tile.
 *
 * @param zoom - Zoom level
 * @param x - Tile column
 * @param y - Tile row
 */
export function tileToCoord(zoom: number, x: number, y: number): LatLon {
  const n = tilesPerAxis(zoom);
  return worldToCoord(x / n, y / n);
}

/**
 * Get the geographic bounds of a tile.
 *
 * @param zoom - Zoom level
 * @param x - Tile column
 * @param y - Tile row
 */
export function tileToBBox(zoom: number, x: number, y: number): TileBounds {
  const northwest = tileToCoord(zoom, x, y);
  const southeast = tileToCoord(zoom, x + 1, y + 1);
  return {
    west: northwest.lon,
    south: southeast.lat,
    east: southeast.lon,
    north: northwest.lat,
  };
}

/**
 * Flip a tile row between the standard (top-down) and TMS (bottom-up) order.
 * The conversion is its own inverse.
 *
 * @param zoom - Zoom level
 * @param y - Tile row in either order
 */
export function tmsConvertY(zoom: number, y: number): number {
  return tilesPerAxis(zoom) - 1 - y;
}

/**
 * Check if two tile addresses are equal.
 */
export function tilesEqual(a: TileAddress, b: TileAddress): boolean {
  return a.zoom === b.zoom && a.x === b.x && a.y === b.y;
}

/**
 * Get a string key for a tile, useful for Map/Set operations.
 *
 * @returns String representation "z/x/y"
 */
export function tileToString(tile: TileAddress): string {
  return `${tile.zoom}/${tile.x}/${tile.y}`;
}

const TILE_KEY = /^(\d+)\/(-?\d+)\/(-?\d+)$/;

/**
 * Parse a "z/x/y" key back to a tile address.
 *
 * @throws Error when the key is not three integers separated by slashes
 */
export function parseTileAddress(key: string): TileAddress {
  const match = TILE_KEY.exec(key);
  if (!match) {
    throw new Error(`Invalid tile key "${key}": expected "z/x/y"`);
  }
  const [, zoom, x, y] = match;
  return { zoom: Number(zoom), x: Number(x), y: Number(y) };
}
