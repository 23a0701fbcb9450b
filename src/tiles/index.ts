export {
  TILE_SIZE,
  BAIDU_REFERENCE_ZOOM,
  baiduCoordToTile,
  baiduTileToCoord,
  wgsToGcjTile,
  gcjToWgsTile,
  wgsToBdTile,
  bdToWgsTile,
} from "./tileConverter";

export {
  TILE_PROVIDERS,
  DEFAULT_TILE_SOURCE,
  TILE_SOURCE_ENV,
  resolveTileSource,
  providerTile,
  tileUrl,
  type TileProvider,
  type TileUrlOptions,
} from "./tileSource";
