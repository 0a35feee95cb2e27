// src/config/loader.ts
// Defaults per backend, option merging and config file loading

import { readFile } from 'node:fs/promises';
import type {
  BackendName,
  CesiumOptions,
  LeafletOptions,
  MapboxOptions,
  MapLibreOptions,
  OpenLayersOptions,
  PotreeOptions,
  WidgetConfigFile,
} from './types.js';
import { validateWidgetConfigFile } from './validator.js';
import { DEFAULT_QUEUE_OPTIONS } from '../store/bounded-queue.js';

export const DEFAULT_MAPLIBRE_OPTIONS: Required<MapLibreOptions> = {
  center: [0, 20],
  zoom: 1,
  style: 'dark-matter',
  bearing: 0,
  pitch: 0,
  width: '100%',
  height: '600px',
  antialias: true,
  controls: true,
  projection: 'mercator',
  queue: DEFAULT_QUEUE_OPTIONS,
};

export const DEFAULT_MAPBOX_OPTIONS: Required<MapboxOptions> = {
  center: [0, 20],
  zoom: 1,
  style: 'mapbox://styles/mapbox/streets-v12',
  bearing: 0,
  pitch: 0,
  width: '100%',
  height: '600px',
  antialias: true,
  controls: true,
  accessToken: '',
  projection: 'mercator',
  queue: DEFAULT_QUEUE_OPTIONS,
};

export const DEFAULT_LEAFLET_OPTIONS: Required<LeafletOptions> = {
  center: [51.505, -0.09],
  zoom: 13,
  tileLayer: 'OpenStreetMap',
  attribution: '',
  mapOptions: {},
  width: '100%',
  height: '600px',
  queue: DEFAULT_QUEUE_OPTIONS,
};

export const DEFAULT_OPENLAYERS_OPTIONS: Required<OpenLayersOptions> = {
  center: [0, 0],
  zoom: 2,
  basemap: 'OpenStreetMap',
  projection: 'EPSG:3857',
  rotation: 0,
  controls: true,
  width: '100%',
  height: '600px',
  queue: DEFAULT_QUEUE_OPTIONS,
};

export const DEFAULT_CESIUM_OPTIONS: Required<CesiumOptions> = {
  center: [0, 0],
  zoom: 2,
  cameraHeight: 10_000_000,
  heading: 0,
  pitch: -90,
  roll: 0,
  accessToken: '',
  terrain: null,
  width: '100%',
  height: '600px',
  queue: DEFAULT_QUEUE_OPTIONS,
};

export const DEFAULT_POTREE_OPTIONS: Required<PotreeOptions> = {
  potreeLibsDir: '',
  pointCloudUrl: '',
  description: '',
  pointBudget: 1_000_000,
  fov: 60,
  edlEnabled: true,
  background: 'gradient',
  width: '100%',
  height: '600px',
  queue: DEFAULT_QUEUE_OPTIONS,
};

/** Cache for loaded config files to avoid duplicate reads */
const configCache = new Map<string, WidgetConfigFile>();

/**
 * Merges option objects over defaults (later sources override earlier).
 * Only defined properties override.
 */
export function mergeWidgetOptions<T extends object>(defaults: T, ...partials: Array<Partial<T> | undefined>): T {
  const result: T = { ...defaults };

  for (const partial of partials) {
    if (!partial) continue;
    for (const key in partial) {
      const value: T[typeof key] | undefined = partial[key];
      if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  return result;
}

/**
 * Reads an environment variable on the host. Returns undefined in a browser
 * or when the variable is empty.
 */
export function readEnv(name: string): string | undefined {
  if (typeof process === 'undefined' || !process.env) return undefined;
  const value = process.env[name];
  return value ? value : undefined;
}

async function readConfigSource(source: string): Promise<unknown> {
  if (/^https?:\/\//i.test(source)) {
    const response = await fetch(source);
    if (!response.ok) {
      throw new Error(`Failed to load config from "${source}": ${response.status} ${response.statusText}`);
    }
    return response.json();
  }
  const text = await readFile(source, 'utf8');
  return JSON.parse(text);
}

/**
 * Loads and validates a widget config file from a path or http(s) URL.
 * Uses cache to avoid duplicate reads.
 */
export async function loadWidgetConfig(source: string): Promise<WidgetConfigFile> {
  const cached = configCache.get(source);
  if (cached) {
    return cached;
  }

  const raw = await readConfigSource(source);

  const result = validateWidgetConfigFile(raw);
  if (!result.valid) {
    const errorMessages = result.errors.map(e => `  ${e.path}: ${e.message}`).join('\n');
    throw new Error(`Invalid config from "${source}":\n${errorMessages}`);
  }

  if (result.warnings.length > 0) {
    console.warn(`[config] Warnings for "${source}":`);
    result.warnings.forEach(w => console.warn(`  ${w.path}: ${w.message}`));
  }

  configCache.set(source, result.config);
  console.log(`[config] Loaded widget config from "${source}"`);
  return result.config;
}

/**
 * Picks one backend's section out of a config file.
 */
export async function loadBackendOptions<B extends BackendName>(
  source: string,
  backend: B
): Promise<WidgetConfigFile[B]> {
  const config = await loadWidgetConfig(source);
  return config[backend];
}

/**
 * Clears the config cache (useful for testing or hot reload).
 */
export function clearConfigCache(): void {
  configCache.clear();
}
