// src/config/types.ts
// Option types for each widget backend

import type { StyleSpecification } from 'maplibre-gl';
import type { StyleSpecification as MapboxStyleSpecification } from 'mapbox-gl';
import type { LatLng, QueueOptions } from '../store/IState.js';
import type { CesiumTerrainRecord, PotreeBackground } from '../store/backend-traits.js';

export type BackendName = 'maplibre' | 'mapbox' | 'leaflet' | 'openlayers' | 'deckgl' | 'cesium' | 'potree';

export const BACKEND_NAMES: readonly BackendName[] = [
  'maplibre', 'mapbox', 'leaflet', 'openlayers', 'deckgl', 'cesium', 'potree',
];

/** Options every widget takes */
export interface BaseWidgetOptions {
  /** CSS width of the map container (e.g. "100%", "800px") */
  width?: string;
  /** CSS height of the map container */
  height?: string;
  /** Limits for the call and event queues */
  queue?: Partial<QueueOptions>;
}

export interface MapViewOptions extends BaseWidgetOptions {
  /** Initial center as [latitude, longitude] */
  center?: LatLng;
  zoom?: number;
}

export type GlProjectionName = 'mercator' | 'globe';

export interface MapLibreOptions extends MapViewOptions {
  /** Named style (e.g. "dark-matter"), basemap name, style URL or inline style */
  style?: string | StyleSpecification;
  bearing?: number;
  pitch?: number;
  antialias?: boolean;
  /** Add the default navigation, fullscreen, scale and globe controls */
  controls?: boolean;
  projection?: GlProjectionName;
}

export type DeckGLOptions = MapLibreOptions;

export interface MapboxOptions extends MapViewOptions {
  style?: string | MapboxStyleSpecification;
  bearing?: number;
  pitch?: number;
  antialias?: boolean;
  controls?: boolean;
  /** Falls back to the MAPBOX_TOKEN environment variable */
  accessToken?: string;
  projection?: string;
}

export interface LeafletOptions extends MapViewOptions {
  /** Basemap provider name or XYZ URL template */
  tileLayer?: string;
  attribution?: string;
  /** Passed through to L.map() */
  mapOptions?: Record<string, unknown>;
}

export interface OpenLayersOptions extends MapViewOptions {
  /** Basemap provider name, "OpenStreetMap" or XYZ URL template */
  basemap?: string;
  projection?: string;
  rotation?: number;
  controls?: boolean;
}

export interface CesiumOptions extends MapViewOptions {
  /** Camera height in meters; derived from zoom when omitted */
  cameraHeight?: number;
  heading?: number;
  pitch?: number;
  roll?: number;
  /** Cesium ion token, falls back to the CESIUM_TOKEN environment variable */
  accessToken?: string;
  terrain?: CesiumTerrainRecord | null;
}

export interface PotreeOptions extends BaseWidgetOptions {
  /** URL of a Potree build, falls back to the POTREE_LIBS_DIR environment variable */
  potreeLibsDir?: string;
  pointCloudUrl?: string;
  description?: string;
  pointBudget?: number;
  fov?: number;
  edlEnabled?: boolean;
  background?: PotreeBackground;
}

export interface BackendOptionsMap {
  maplibre: MapLibreOptions;
  mapbox: MapboxOptions;
  leaflet: LeafletOptions;
  openlayers: OpenLayersOptions;
  deckgl: DeckGLOptions;
  cesium: CesiumOptions;
  potree: PotreeOptions;
}

/** Root structure of a widget config file: one optional section per backend. */
export type WidgetConfigFile = {
  [B in BackendName]?: BackendOptionsMap[B];
};
