// src/config/basemaps.ts
// Named XYZ basemaps and MapLibre styles, read from the JSON tables beside this file.

import basemapTable from './data/basemaps.json';
import styleTable from './data/maplibre-styles.json';
import { WidgetConfigError } from '../utils/errors.js';

export interface BasemapProvider {
  url: string;
  attribution: string;
  maxZoom: number;
}

const PROVIDERS: Record<string, BasemapProvider> = basemapTable.providers;
const ALIASES: Record<string, string> = basemapTable.aliases;
const MAPLIBRE_STYLES: Record<string, string> = styleTable;

export function availableBasemaps(): string[] {
  return Object.keys(PROVIDERS);
}

/** Looks a provider up by name or alias, case-sensitively first, then ignoring case. */
export function resolveBasemap(name: string): BasemapProvider | null {
  const key = ALIASES[name] ?? name;
  const direct = PROVIDERS[key];
  if (direct) return direct;
  const lower = key.toLowerCase();
  const match = Object.keys(PROVIDERS).find(candidate => candidate.toLowerCase() === lower);
  return match ? PROVIDERS[match] : null;
}

/** Like resolveBasemap, but an unknown name throws and lists the known ones. */
export function requireBasemap(name: string): BasemapProvider {
  const provider = resolveBasemap(name);
  if (!provider) {
    throw new WidgetConfigError(`Basemap "${name}" not found. Available basemaps: ${availableBasemaps().join(', ')}`);
  }
  return provider;
}

/** The base tile layer as URL and attribution; a URL template passes through. */
export function requireTileUrl(tileLayer: string): { url: string; attribution: string } {
  if (tileLayer.includes('{z}')) {
    return { url: tileLayer, attribution: '' };
  }
  const provider = requireBasemap(tileLayer);
  return { url: provider.url, attribution: provider.attribution };
}

export function availableMapStyles(): string[] {
  return Object.keys(MAPLIBRE_STYLES);
}

export function isUrlLike(value: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(value) || value.startsWith('/') || value.startsWith('./') || value.endsWith('.json');
}

/** Resolves a named style to its URL. URLs and unknown names pass through unchanged. */
export function resolveStyleUrl(style: string): string {
  if (isUrlLike(style)) return style;
  return MAPLIBRE_STYLES[style.toLowerCase()] ?? style;
}
