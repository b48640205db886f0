// src/config/types.ts
// TypeScript types for editor configuration files

import type { Extent } from '../store/map-events';

/**
 * Supported map adapter types.
 */
export type MapAdapterType = 'openlayers';

/**
 * Map configuration - the view and the tile cache grid.
 */
export interface MapConfig {
  /** Display label for the map */
  label?: string;
  /** Map adapter/library to use */
  type: MapAdapterType;
  /** Projection code of the view and of the vector data */
  projection: string;
  /** Extent of the tile cache, [minX, minY, maxX, maxY] */
  extent: Extent;
  /** Extent shown on start */
  initialExtent?: Extent;
  /** Resolutions of the tile cache grid, largest first */
  resolutions?: number[];
}

/**
 * Where the spatial services live and how their features are named.
 */
export interface ServicesConfig {
  /** Host (or full origin) of the GeoServer instance, e.g. "maps.example.org" */
  mapServer: string;
  /** Path of the WFS endpoint on the map server */
  wfsPath?: string;
  /** Path of the cached WMS endpoint on the map server */
  wmsPath?: string;
  featureNS: string;
  featurePrefix: string;
  srsName?: string;
  geometryName?: string;
  /** Prefix of the plan server hosting the assign endpoint, '' for same origin */
  assignBaseUrl?: string;
  csrfToken?: string;
}

export interface BaseLayerConfig {
  /** WMS layer name */
  name: string;
  title?: string;
}

export interface SnapLayerConfig {
  /** WFS feature type the selection tools query */
  featureType: string;
  label: string;
}

export interface LayersConfig {
  base: BaseLayerConfig[];
  /** Base layer shown on start; defaults to the first */
  defaultBase?: string;
  /** WFS feature type holding the district geometries */
  districtFeatureType: string;
  snap: SnapLayerConfig[];
  /** Snap layer selected on start; defaults to the first */
  defaultSnap?: string;
}

export interface ChoiceConfig {
  value: string;
  label: string;
}

/**
 * Thematic base layers, named after a boundary and a "show by" attribute.
 */
export interface ThematicConfig {
  boundaries: ChoiceConfig[];
  showBy: ChoiceConfig[];
  /** Layer name pattern with {boundary} and {showBy} placeholders */
  pattern?: string;
}

export interface ToolConfig {
  enabled: boolean;
}

export interface PointSelectToolConfig extends ToolConfig {
  /** Click tolerance in pixels */
  clickTolerance?: number;
}

export interface ToolsConfig {
  pointSelect?: PointSelectToolConfig;
  boxSelect?: ToolConfig;
  polygonSelect?: ToolConfig;
}

export interface PlanConfig {
  id?: string | number;
}

/**
 * Root configuration file structure.
 */
export interface AppConfig {
  map: MapConfig;
  services: ServicesConfig;
  layers: LayersConfig;
  thematic?: ThematicConfig;
  tools?: ToolsConfig;
  plan?: PlanConfig;
}
