// src/config/cdn.ts
// Pinned CDN assets. Views load these at render time; exported HTML links them.

import potreeLibs from './data/potree-libs.json';

export const CDN_VERSIONS = {
  maplibre: '5.6.1',
  mapbox: '3.9.0',
  leaflet: '1.9.4',
  openlayers: '10.2.1',
  deckgl: '9.1.0',
  cesium: '1.120',
  pmtiles: '3.2.0',
  cogProtocol: '0.4.0',
  mapboxDraw: '1.5.0',
  geocoder: '1.5.0',
  georaster: '1.6.0',
  georasterLayer: '2.0.2',
  terraDraw: '1.0.1',
} as const;

const UNPKG = 'https://unpkg.com';

export interface AssetBundle {
  styles: string[];
  scripts: string[];
}

export const CDN_ASSETS = {
  maplibreCss: `${UNPKG}/maplibre-gl@${CDN_VERSIONS.maplibre}/dist/maplibre-gl.css`,
  maplibreJs: `${UNPKG}/maplibre-gl@${CDN_VERSIONS.maplibre}/dist/maplibre-gl.js`,
  mapboxCss: `https://api.mapbox.com/mapbox-gl-js/v${CDN_VERSIONS.mapbox}/mapbox-gl.css`,
  mapboxJs: `https://api.mapbox.com/mapbox-gl-js/v${CDN_VERSIONS.mapbox}/mapbox-gl.js`,
  leafletCss: `${UNPKG}/leaflet@${CDN_VERSIONS.leaflet}/dist/leaflet.css`,
  leafletJs: `${UNPKG}/leaflet@${CDN_VERSIONS.leaflet}/dist/leaflet.js`,
  openlayersCss: `${UNPKG}/ol@${CDN_VERSIONS.openlayers}/ol.css`,
  openlayersJs: `https://cdn.jsdelivr.net/npm/ol@${CDN_VERSIONS.openlayers}/dist/ol.js`,
  deckglJs: `${UNPKG}/deck.gl@${CDN_VERSIONS.deckgl}/dist.min.js`,
  cesiumBase: `https://cesium.com/downloads/cesiumjs/releases/${CDN_VERSIONS.cesium}/Build/Cesium/`,
  pmtilesJs: `${UNPKG}/pmtiles@${CDN_VERSIONS.pmtiles}/dist/pmtiles.js`,
  cogProtocolJs: `${UNPKG}/@geomatico/maplibre-cog-protocol@${CDN_VERSIONS.cogProtocol}/dist/index.js`,
  mapboxDrawCss: `${UNPKG}/@mapbox/mapbox-gl-draw@${CDN_VERSIONS.mapboxDraw}/dist/mapbox-gl-draw.css`,
  mapboxDrawJs: `${UNPKG}/@mapbox/mapbox-gl-draw@${CDN_VERSIONS.mapboxDraw}/dist/mapbox-gl-draw.js`,
  geocoderCss: `${UNPKG}/@maplibre/maplibre-gl-geocoder@${CDN_VERSIONS.geocoder}/dist/maplibre-gl-geocoder.css`,
  georasterJs: `${UNPKG}/georaster@${CDN_VERSIONS.georaster}/dist/georaster.browser.bundle.min.js`,
  terraDrawCss: `https://cdn.jsdelivr.net/npm/@watergis/maplibre-gl-terradraw@${CDN_VERSIONS.terraDraw}/dist/maplibre-gl-terradraw.css`,
  terraDrawJs: `https://cdn.jsdelivr.net/npm/@watergis/maplibre-gl-terradraw@${CDN_VERSIONS.terraDraw}/dist/maplibre-gl-terradraw.umd.js`,
  georasterLayerJs: `${UNPKG}/georaster-layer-for-leaflet@${CDN_VERSIONS.georasterLayer}/dist/georaster-layer-for-leaflet.min.js`,
} as const;

export function cesiumAssetUrl(path: string): string {
  return `${CDN_ASSETS.cesiumBase}${path.replace(/^\/+/, '')}`;
}

/** Joins a Potree build directory and a path inside it. */
export function potreeAssetUrl(libsDir: string, path: string): string {
  return `${libsDir.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/** Stylesheets and scripts of a Potree build, scripts in load order. */
export function potreeAssets(libsDir: string): AssetBundle {
  return {
    styles: potreeLibs.styles.map(path => potreeAssetUrl(libsDir, path)),
    scripts: potreeLibs.scripts.map(path => potreeAssetUrl(libsDir, path)),
  };
}
