// src/map/leaflet-services/MapCoreService.ts

import * as L from 'leaflet';
import 'leaflet/dist/leaflet.css';
import type { LatLng, LatLngBounds, LngLatTuple } from '../../store/IState';
import type { LeafletTraits } from '../../store/backend-traits';
import type { Pixel } from '../../store/map-events';
import type { WidgetModel } from '../../store/trait-store';
import { isBoolean, isFiniteNumber } from '../../protocol/guards';
import { requireTileUrl } from '../../config/basemaps';
import { injectStyle } from '../../utils/asset-loader';

const DEFAULT_TILE_URL = 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png';
const DEFAULT_ATTRIBUTION = '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors';

const BOOLEAN_MAP_OPTIONS = [
    'zoomControl',
    'attributionControl',
    'dragging',
    'scrollWheelZoom',
    'doubleClickZoom',
    'boxZoom',
    'keyboard',
    'touchZoom',
    'worldCopyJump',
] as const;

const NUMBER_MAP_OPTIONS = ['minZoom', 'maxZoom', 'zoomSnap', 'zoomDelta'] as const;

/**
 * The `map_options` trait as Leaflet MapOptions. Keys Leaflet would not
 * understand, or values of the wrong type, are dropped with a warning.
 */
export function leafletMapOptions(raw: Record<string, unknown>): L.MapOptions {
    const options: L.MapOptions = {};
    const ignored: string[] = [];
    for (const [key, value] of Object.entries(raw)) {
        const booleanKey = BOOLEAN_MAP_OPTIONS.find(name => name === key);
        const numberKey = NUMBER_MAP_OPTIONS.find(name => name === key);
        if (booleanKey && isBoolean(value)) {
            options[booleanKey] = value;
        } else if (numberKey && isFiniteNumber(value)) {
            options[numberKey] = value;
        } else {
            ignored.push(key);
        }
    }
    if (ignored.length > 0) {
        console.warn(`[CORE SERVICE] leaflet: ignoring map options ${ignored.join(', ')}.`);
    }
    return options;
}

/** Resolves the `tile_layer` trait; an unknown name falls back to OpenStreetMap. */
export function baseTileLayer(tileLayer: string, attribution: string): { url: string; attribution: string } {
    try {
        const resolved = requireTileUrl(tileLayer);
        return { url: resolved.url, attribution: attribution || resolved.attribution };
    } catch (error) {
        console.warn(`[CORE SERVICE] leaflet: ${error instanceof Error ? error.message : String(error)}; using OpenStreetMap.`);
        return { url: DEFAULT_TILE_URL, attribution: attribution || DEFAULT_ATTRIBUTION };
    }
}

/**
 * Owns the Leaflet map: creation from the traits, the base tile layer and
 * the camera.
 */
export class MapCoreService {
    public readonly map: L.Map;
    private baseLayer: L.TileLayer | null = null;

    constructor(container: HTMLElement, private readonly model: WidgetModel<LeafletTraits>) {
        this.applyZIndexIsolation(container);
        this.injectLeafletCSSFixes();
        console.log(`[CORE SERVICE] Initializing Leaflet instance at zoom ${model.get('zoom')}`);
        this.map = L.map(container, {
            ...leafletMapOptions(model.get('map_options')),
            center: model.get('center'),
            zoom: model.get('zoom'),
        });
        this.setBaseLayer();
    }

    // Leaflet panes use z-indexes up to 1000; keep them inside the widget.
    private applyZIndexIsolation(container: HTMLElement): void {
        container.style.isolation = 'isolate';
        container.style.zIndex = '0';
    }

    private injectLeafletCSSFixes(): void {
        injectStyle('anymap-leaflet-fixes', `
            .anymap-leaflet .leaflet-container { background: #f2efe9; }
            .anymap-leaflet img.leaflet-tile { mix-blend-mode: normal; max-width: none; }
        `);
    }

    /** (Re)creates the base tile layer from `tile_layer` and `attribution`. */
    public setBaseLayer(): void {
        const { url, attribution } = baseTileLayer(this.model.get('tile_layer'), this.model.get('attribution'));
        if (this.baseLayer) this.map.removeLayer(this.baseLayer);
        this.baseLayer = L.tileLayer(url, { attribution, maxZoom: 19 }).addTo(this.map);
        this.baseLayer.bringToBack();
    }

    public onReady(callback: () => void): void {
        this.map.whenReady(callback);
    }

    public onClick(handler: (lngLat: LngLatTuple, point: Pixel) => void): () => void {
        const listener = (event: L.LeafletMouseEvent): void =>
            handler([event.latlng.lng, event.latlng.lat], [event.containerPoint.x, event.containerPoint.y]);
        this.map.on('click', listener);
        return () => this.map.off('click', listener);
    }

    public on(type: 'moveend' | 'zoomend', handler: () => void): () => void {
        this.map.on(type, handler);
        return () => this.map.off(type, handler);
    }

    public getCamera(): { center: LatLng; zoom: number } {
        const center = this.map.getCenter();
        return { center: [center.lat, center.lng], zoom: this.map.getZoom() };
    }

    /** Moves only when the requested view differs, so trait echoes do not loop. */
    public syncView(center: LatLng, zoom: number): void {
        const current = this.getCamera();
        if (current.center[0] === center[0] && current.center[1] === center[1] && current.zoom === zoom) return;
        this.map.setView(center, zoom);
    }

    public setView(center: LatLng, zoom?: number): void {
        this.map.setView(center, zoom ?? this.map.getZoom());
    }

    /** `duration` is in milliseconds, like the GL backends; Leaflet takes seconds. */
    public flyTo(center: LatLng, zoom?: number, duration?: number): void {
        this.map.flyTo(center, zoom ?? this.map.getZoom(), duration === undefined ? {} : { duration: duration / 1000 });
    }

    public panTo(center: LatLng): void {
        this.map.panTo(center);
    }

    public fitBounds(bounds: LatLngBounds, padding?: number): void {
        this.map.fitBounds(bounds, padding === undefined ? {} : { padding: [padding, padding] });
    }

    public zoomIn(delta: number): void {
        this.map.zoomIn(delta);
    }

    public zoomOut(delta: number): void {
        this.map.zoomOut(delta);
    }

    public invalidateSize(): void {
        this.map.invalidateSize();
    }

    public remove(): void {
        this.map.remove();
    }
}
