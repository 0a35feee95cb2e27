// src/config/index.ts
// Public exports for widget configuration

export type {
  BackendName,
  BackendOptionsMap,
  BaseWidgetOptions,
  CesiumOptions,
  DeckGLOptions,
  GlProjectionName,
  LeafletOptions,
  MapboxOptions,
  MapLibreOptions,
  MapViewOptions,
  OpenLayersOptions,
  PotreeOptions,
  WidgetConfigFile,
} from './types.js';
export { BACKEND_NAMES } from './types.js';

export type {
  ConfigFileValidationResult,
  ValidationMessage,
  ValidationResult,
  ValidationSeverity,
} from './validator.js';
export { formatValidationMessages, validateWidgetConfigFile, validateWidgetOptions } from './validator.js';

export {
  DEFAULT_CESIUM_OPTIONS,
  DEFAULT_LEAFLET_OPTIONS,
  DEFAULT_MAPBOX_OPTIONS,
  DEFAULT_MAPLIBRE_OPTIONS,
  DEFAULT_OPENLAYERS_OPTIONS,
  DEFAULT_POTREE_OPTIONS,
  clearConfigCache,
  loadBackendOptions,
  loadWidgetConfig,
  mergeWidgetOptions,
  readEnv,
} from './loader.js';

export type { BasemapProvider } from './basemaps.js';
export { availableBasemaps, availableMapStyles, requireBasemap, requireTileUrl, resolveBasemap, resolveStyleUrl } from './basemaps.js';
export type { AssetBundle } from './cdn.js';
export { CDN_ASSETS, CDN_VERSIONS, cesiumAssetUrl, potreeAssets, potreeAssetUrl } from './cdn.js';
