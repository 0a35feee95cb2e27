import type { BackendName } from '../config/types';
import type { MapViewModule } from './IMapAdapter';

export type MapViewLoader<B extends BackendName> = () => Promise<MapViewModule<B>>;

type ViewLoaders = { [B in BackendName]: MapViewLoader<B> };

// Views are imported on first use so a page only loads the libraries it renders.
const loaders: ViewLoaders = {
  maplibre: () => import('./maplibre-adapter'),
  mapbox: () => import('./mapbox-adapter'),
  leaflet: () => import('./leaflet-adapter'),
  openlayers: () => import('./openlayers-adapter'),
  deckgl: () => import('./deckgl-adapter'),
  cesium: () => import('./cesium-adapter'),
  potree: () => import('./potree-adapter'),
};

const aliases = new Map<string, BackendName>([
  ['maplibre', 'maplibre'],
  ['mapbox', 'mapbox'],
  ['leaflet', 'leaflet'],
  ['l', 'leaflet'],
  ['openlayers', 'openlayers'],
  ['ol', 'openlayers'],
  ['deckgl', 'deckgl'],
  ['deck', 'deckgl'],
  ['cesium', 'cesium'],
  ['c', 'cesium'],
  ['potree', 'potree'],
]);

export const DEFAULT_ADAPTER_NAME: BackendName = 'maplibre';

export function registerAdapterAlias(alias: string, backend: BackendName): void {
  if (!alias || typeof alias !== 'string') {
    console.error('[adapter-registry] Alias must be a non-empty string.');
    return;
  }
  aliases.set(alias.toLowerCase(), backend);
}

export function resolveBackendName(requestedName?: string): BackendName | null {
  return aliases.get((requestedName ?? DEFAULT_ADAPTER_NAME).toLowerCase()) ?? null;
}

export function getRegisteredAdapters(): string[] {
  return Array.from(aliases.keys());
}

export async function loadMapView<B extends BackendName>(backend: B): Promise<MapViewModule<B> | null> {
  const loader: MapViewLoader<B> = loaders[backend];
  try {
    return await loader();
  } catch (error) {
    console.error(`[adapter-registry] Failed to load view "${backend}".`, error);
    return null;
  }
}

/** Resolves a backend name or alias and loads its view module. */
export async function createMapAdapter(requestedName?: string): Promise<MapViewModule<BackendName> | null> {
  const backend = resolveBackendName(requestedName);
  if (!backend) {
    console.error(`[adapter-registry] No adapter registered under "${requestedName ?? DEFAULT_ADAPTER_NAME}".`);
    return null;
  }
  return loadMapView(backend);
}
