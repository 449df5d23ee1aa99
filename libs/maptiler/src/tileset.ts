export const BUILT_IN_TILESETS = [
  'Contours',
  'Countries',
  'Hillshading',
  'Land',
  'Landcover',
  'MaptilerPlanet',
  'MaptilerPlanetLite',
  'OpenMapTiles',
  'OpenMapTilesWGS84',
  'Outdoor',
  'Satellite',
  'SatelliteMediumRes2016',
  'SatelliteMediumRes2018',
  'Terrain3D',
  'TerrainRGB',
] as const;

export type BuiltInTileSet = (typeof BUILT_IN_TILESETS)[number];

export interface CustomTileSet {
  readonly endpoint: string;
  readonly extension: string;
}

/**
 * A MapTiler Cloud tileset: one of the built-in layers, or a custom
 * endpoint/extension pair for layers not listed here.
 */
export type TileSet = BuiltInTileSet | CustomTileSet;

interface TileSetMetadata {
  endpoint: string;
  extension: string;
  minZoom: number;
  maxZoom: number;
}

export interface TileSetDescription extends TileSetMetadata {
  name: string;
}

const TILESET_METADATA: Record<BuiltInTileSet, TileSetMetadata> = {
  Contours: { endpoint: 'contours', extension: 'pbf', minZoom: 9, maxZoom: 14 },
  Countries: { endpoint: 'countries', extension: 'pbf', minZoom: 0, maxZoom: 11 },
  Hillshading: { endpoint: 'hillshades', extension: 'png', minZoom: 0, maxZoom: 12 },
  Land: { endpoint: 'land', extension: 'pbf', minZoom: 0, maxZoom: 14 },
  Landcover: { endpoint: 'landcover', extension: 'pbf', minZoom: 0, maxZoom: 9 },
  MaptilerPlanet: { endpoint: 'v3', extension: 'pbf', minZoom: 0, maxZoom: 14 },
  MaptilerPlanetLite: { endpoint: 'v3-lite', extension: 'pbf', minZoom: 0, maxZoom: 10 },
  OpenMapTiles: { endpoint: 'v3-openmaptiles', extension: 'pbf', minZoom: 0, maxZoom: 14 },
  OpenMapTilesWGS84: { endpoint: 'v3-4326', extension: 'pbf', minZoom: 0, maxZoom: 13 },
  Outdoor: { endpoint: 'outdoor', extension: 'pbf', minZoom: 5, maxZoom: 14 },
  Satellite: { endpoint: 'satellite', extension: 'jpg', minZoom: 0, maxZoom: 20 },
  SatelliteMediumRes2016: { endpoint: 'satellite-mediumres', extension: 'jpg', minZoom: 0, maxZoom: 13 },
  SatelliteMediumRes2018: { endpoint: 'satellite-mediumres-2018', extension: 'jpg', minZoom: 0, maxZoom: 13 },
  Terrain3D: { endpoint: 'terrain-quantized-mesh', extension: 'quantized-mesh-1.0', minZoom: 0, maxZoom: 13 },
  // height = -10000 + ((R * 256 * 256 + G * 256 + B) * 0.1)
  TerrainRGB: { endpoint: 'terrain-rgb', extension: 'png', minZoom: 0, maxZoom: 12 },
};

/**
 * Custom tilesets may support a narrower range than this; the API rejects
 * those requests instead.
 */
const CUSTOM_MIN_ZOOM = 0;
const CUSTOM_MAX_ZOOM = 20;

const CONTENT_TYPES: Record<string, string> = {
  pbf: 'application/x-protobuf',
  png: 'image/png',
  jpg: 'image/jpeg',
  'quantized-mesh-1.0': 'application/vnd.quantized-mesh',
};

export function customTileSet(endpoint: string, extension: string): CustomTileSet {
  return Object.freeze({ endpoint, extension });
}

export function isCustomTileSet(tileSet: TileSet): tileSet is CustomTileSet {
  return typeof tileSet !== 'string';
}

/**
 * Path segment of the tile URL, e.g. "satellite" for {@link BuiltInTileSet} `Satellite`.
 */
export function getEndpoint(tileSet: TileSet): string {
  return isCustomTileSet(tileSet) ? tileSet.endpoint : TILESET_METADATA[tileSet].endpoint;
}

/**
 * File extension of the returned tiles: "png", "jpg", "pbf", ...
 */
export function getFileExtension(tileSet: TileSet): string {
  return isCustomTileSet(tileSet) ? tileSet.extension : TILESET_METADATA[tileSet].extension;
}

export function getMinZoom(tileSet: TileSet): number {
  return isCustomTileSet(tileSet) ? CUSTOM_MIN_ZOOM : TILESET_METADATA[tileSet].minZoom;
}

export function getMaxZoom(tileSet: TileSet): number {
  return isCustomTileSet(tileSet) ? CUSTOM_MAX_ZOOM : TILESET_METADATA[tileSet].maxZoom;
}

export function getDisplayName(tileSet: TileSet): string {
  return isCustomTileSet(tileSet) ? tileSet.endpoint : tileSet;
}

export function describeTileSet(tileSet: TileSet): TileSetDescription {
  return {
    name: getDisplayName(tileSet),
    endpoint: getEndpoint(tileSet),
    extension: getFileExtension(tileSet),
    minZoom: getMinZoom(tileSet),
    maxZoom: getMaxZoom(tileSet),
  };
}

/**
 * Looks a tileset up by identifier (case-insensitive) or by endpoint.
 * When an extension is given the name is taken as a custom endpoint.
 */
export function resolveTileSet(name: string, extension?: string): TileSet | undefined {
  if (extension) {
    return customTileSet(name, extension);
  }

  const lowered = name.toLowerCase();
  return BUILT_IN_TILESETS.find(
    (tileSet) => tileSet.toLowerCase() === lowered || TILESET_METADATA[tileSet].endpoint === name,
  );
}

export function contentTypeForExtension(extension: string): string {
  return CONTENT_TYPES[extension] ?? 'application/octet-stream';
}
