/**
 * Projection Types
 *
 * Planar and tile coordinate shapes shared by the projections.
 */

/** Normalized Web Mercator world coordinate (0-1 range for in-range input) */
export interface WorldCoord {
  x: number;
  y: number;
}

/** BD09MC planar coordinate in meters (unbounded) */
export interface MercatorPoint {
  x: number;
  y: number;
}

/**
 * Tile pyramid index.
 *
 * Standard schemes keep 0 <= x, y < 2^zoom. Baidu tiles count from the
 * projection origin and can be negative.
 */
export interface TileAddress {
  zoom: number;
  x: number;
  y: number;
}

/** Geographic extent of a tile in degrees */
export interface TileBounds {
  west: number;
  south: number;
  east: number;
  north: number;
}
