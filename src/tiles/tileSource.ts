/**
 * Tile sources
 *
 * URL templates for upstream tile providers and the remapping of a standard
 * WGS-84 tile request onto each provider's native grid. Fetching is left to
 * the caller.
 */

import { z } from "zod";
import { tmsConvertY } from "../projection/tileCoord";
import type { TileAddress } from "../projection/types";
import { wgsToBdTile, wgsToGcjTile } from "./tileConverter";

export const TILE_PROVIDERS = [
  "Amap",
  "Baidu",
  "Google",
  "OpenStreetMap",
  "Tencent",
] as const;

export type TileProvider = (typeof TILE_PROVIDERS)[number];

const providerSchema = z.enum(TILE_PROVIDERS);

export const DEFAULT_TILE_SOURCE: TileProvider = "OpenStreetMap";

/** Environment variable naming the provider when a request names none */
export const TILE_SOURCE_ENV = "MAP_TILE_SOURCE";

/**
 * `{z}`, `{x}`, `{y}` are the provider-native tile, `{-y}` its TMS row and
 * `{s}` a load-balancing subdomain.
 */
const TEMPLATES: Record<TileProvider, string> = {
  Amap: "https://webrd0{s}.is.autonavi.com/appmaptile?z={z}&x={x}&y={y}&lang=zh_cn&size=1&scale=1&style=7",
  Baidu: "https://maponline{s}.bdimg.com/tile/?qt=vtile&z={z}&x={x}&y={y}&styles=pl&scaler=1",
  Google: "https://mt{s}.google.com/vt/?lyrs=m&hl=zh&gl=cn&z={z}&x={x}&y={y}",
  OpenStreetMap: "https://{s}.tile.osm.org/{z}/{x}/{y}.png",
  Tencent: "https://rt{s}.map.gtimg.com/tile?z={z}&x={x}&y={-y}&type=vector&styleid=1",
};

const SUBDOMAINS: Record<TileProvider, readonly string[]> = {
  Amap: ["1", "2", "3", "4"],
  Baidu: ["0", "1", "2", "3"],
  Google: ["0", "1", "2", "3"],
  OpenStreetMap: ["a", "b", "c"],
  Tencent: ["0", "1", "2", "3"],
};

/** Providers whose imagery is drawn in GCJ-02 */
const GCJ02_PROVIDERS: ReadonlySet<TileProvider> = new Set<TileProvider>([
  "Amap",
  "Google",
  "Tencent",
]);

export interface TileUrlOptions {
  /** Choose a subdomain; defaults to a uniformly random pick */
  pickSubdomain?: (choices: readonly string[]) => string;
}

function randomSubdomain(choices: readonly string[]): string {
  return choices[Math.floor(Math.random() * choices.length)] ?? "";
}

/**
 * Decide which provider serves a request.
 *
 * A non-empty `requested` name wins, then MAP_TILE_SOURCE, then the default.
 * Unknown names fall back to the default.
 */
export function resolveTileSource(
  requested?: string,
  env: NodeJS.ProcessEnv = process.env
): TileProvider {
  const name = requested ? requested : (env[TILE_SOURCE_ENV] ?? DEFAULT_TILE_SOURCE);

  const parsed = providerSchema.safeParse(name);
  if (!parsed.success) {
    console.warn(
      `[TileSource] Unknown tile source "${name}", using ${DEFAULT_TILE_SOURCE}`
    );
    return DEFAULT_TILE_SOURCE;
  }
  return parsed.data;
}

/**
 * Remap a standard WGS-84 tile onto the provider's native grid.
 */
export function providerTile(provider: TileProvider, tile: TileAddress): TileAddress {
  if (provider === "Baidu") {
    return wgsToBdTile(tile.zoom, tile.x, tile.y);
  }
  if (GCJ02_PROVIDERS.has(provider)) {
    return wgsToGcjTile(tile.zoom, tile.x, tile.y);
  }
  return { ...tile };
}

/**
 * Build the upstream URL for a standard WGS-84 tile request.
 */
export function tileUrl(
  provider: TileProvider,
  tile: TileAddress,
  options: TileUrlOptions = {}
): string {
  const pick = options.pickSubdomain ?? randomSubdomain;
  const native = providerTile(provider, tile);

  const replacements: Record<string, string> = {
    "{z}": String(native.zoom),
    "{x}": String(native.x),
    "{y}": String(native.y),
    "{-y}": String(tmsConvertY(native.zoom, native.y)),
    "{s}": pick(SUBDOMAINS[provider]),
  };

  let url = TEMPLATES[provider];
  for (const [pattern, value] of Object.entries(replacements)) {
    url = url.replaceAll(pattern, value);
  }
  return url;
}
