// src/widgets/gl-layer-builders.ts
// Source and layer objects the GL widgets build for their convenience methods.
// The shapes satisfy both MapLibre's and Mapbox's style specification.

import type { GeoJSON } from 'geojson';
import type { BasemapProvider } from '../config/basemaps';
import { availableMapStyles, isUrlLike, resolveBasemap, resolveStyleUrl } from '../config/basemaps';

export interface RasterSourceOptions {
    attribution?: string;
    minzoom?: number;
    maxzoom?: number;
}

/** Image corners: top-left, top-right, bottom-right, bottom-left, each [lng, lat]. */
export type ImageCorners = [[number, number], [number, number], [number, number], [number, number]];

export function sourceIdFor(layerId: string): string {
    return `${layerId}_source`;
}

export function rasterTileSource(url: string, options: RasterSourceOptions = {}) {
    return {
        type: 'raster' as const,
        tiles: [url],
        tileSize: 256,
        ...(options.attribution ? { attribution: options.attribution } : {}),
        ...(options.minzoom !== undefined ? { minzoom: options.minzoom } : {}),
        ...(options.maxzoom !== undefined ? { maxzoom: options.maxzoom } : {}),
    };
}

/** A raster source backed by a TileJSON-style URL, e.g. cog:// */
export function rasterUrlSource(url: string) {
    return { type: 'raster' as const, url, tileSize: 256 };
}

export function rasterLayer(id: string, source: string) {
    return { id, type: 'raster' as const, source };
}

export function geojsonSource(data: GeoJSON | string) {
    return { type: 'geojson' as const, data };
}

export function vectorUrlSource(url: string, attribution?: string) {
    return attribution ? { type: 'vector' as const, url, attribution } : { type: 'vector' as const, url };
}

export function imageSource(url: string, coordinates: ImageCorners) {
    return { type: 'image' as const, url, coordinates };
}

export function demSource(url: string, tileSize = 256) {
    return { type: 'raster-dem' as const, url, tileSize };
}

/** A one-layer raster style around an XYZ provider. */
export function basemapStyle(name: string, provider: BasemapProvider) {
    return {
        version: 8 as const,
        sources: {
            [name]: rasterTileSource(provider.url, { attribution: provider.attribution, maxzoom: provider.maxZoom }),
        },
        layers: [rasterLayer(name, name)],
    };
}

export type BasemapStyle = ReturnType<typeof basemapStyle>;

/**
 * Resolves a style string: a named vector style becomes its URL, a basemap
 * provider name becomes a raster style, anything else passes through.
 */
export function resolveGlStyle(style: string): string | BasemapStyle {
    if (isUrlLike(style) || availableMapStyles().includes(style.toLowerCase())) {
        return resolveStyleUrl(style);
    }
    const provider = resolveBasemap(style);
    return provider ? basemapStyle(style, provider) : style;
}
