// src/widgets/LeafletMap.ts
// Leaflet host API. Layers live only in the `_layers` trait; views diff it
// against what is on the map, so no layer call is queued.

import type { GeoJSON } from 'geojson';
import type { LatLng, LatLngBounds } from '../store/IState';
import type {
    LeafletLayerRecord,
    LeafletTraits,
    MarkerIconOptions,
    PathStyle,
    TooltipOptions,
} from '../store/backend-traits';
import { resolveQueueOptions } from '../store/bounded-queue';
import type { LeafletCommand } from '../protocol/leaflet-commands';
import { encodeLeafletCommand } from '../protocol/leaflet-commands';
import { isGeoJson } from '../protocol/guards';
import type { LeafletOptions } from '../config/types';
import { DEFAULT_LEAFLET_OPTIONS, mergeWidgetOptions } from '../config/loader';
import { requireBasemap, requireTileUrl } from '../config/basemaps';
import { CDN_ASSETS } from '../config/cdn';
import type { ExportDocument } from '../export/html-document';
import { LEAFLET_INIT_SCRIPT } from '../export/leaflet-template';
import { withoutQueues } from '../export/html-document';
import { WidgetConfigError } from '../utils/errors';
import { MapWidget } from './MapWidget';
import { assertValidOptions } from './options';

export interface LeafletMarkerOptions {
    popup?: string;
    tooltip?: string;
    tooltipOptions?: TooltipOptions;
    draggable?: boolean;
    icon?: MarkerIconOptions;
}

export interface LeafletTileOptions {
    attribution?: string;
    layerId?: string;
    minZoom?: number;
    maxZoom?: number;
    opacity?: number;
}

export interface GeotiffOptions {
    layerId?: string;
    /** Fit the map to the raster once it has loaded. Defaults to true. */
    fitBounds?: boolean;
    opacity?: number;
    /** Sampling resolution in pixels per tile side */
    resolution?: number;
}

const DEFAULT_PATH_STYLE: PathStyle = { color: 'blue', fillColor: 'blue', fillOpacity: 0.2 };

function buildTraits(options: LeafletOptions): LeafletTraits {
    const o = mergeWidgetOptions(DEFAULT_LEAFLET_OPTIONS, options);
    return {
        center: o.center,
        zoom: o.zoom,
        width: o.width,
        height: o.height,
        tile_layer: o.tileLayer,
        attribution: o.attribution,
        map_options: o.mapOptions,
        _js_calls: [],
        _js_events: [],
        _queue: resolveQueueOptions(o.queue),
        _widget_id: '',
        _layers: {},
        _sources: {},
    };
}

function parseGeoJson(data: GeoJSON | string): GeoJSON {
    if (typeof data !== 'string') return data;
    let parsed: unknown;
    try {
        parsed = JSON.parse(data);
    } catch (error) {
        throw new WidgetConfigError(`GeoJSON string could not be parsed: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isGeoJson(parsed)) {
        throw new WidgetConfigError('GeoJSON string does not hold a GeoJSON object');
    }
    return parsed;
}

export class LeafletMap extends MapWidget<LeafletTraits> {
    public readonly backend = 'leaflet';

    constructor(options: LeafletOptions = {}) {
        assertValidOptions('leaflet', options);
        super(buildTraits(options), 'leaflet');
    }

    private send(command: LeafletCommand): void {
        this.enqueue(encodeLeafletCommand(command));
    }

    /** Stores the record under `id`, replacing any layer already there. */
    public addLayer(id: string, layer: LeafletLayerRecord): string {
        this.model.set('_layers', { ...this.model.get('_layers'), [id]: layer });
        return id;
    }

    public removeLayer(id: string): void {
        const layers = { ...this.model.get('_layers') };
        delete layers[id];
        this.model.set('_layers', layers);
    }

    public clearLayers(): void {
        this.model.set('_layers', {});
    }

    public setTileLayer(tileLayer: string): void {
        this.model.set('tile_layer', tileLayer);
    }

    public addTileLayer(url: string, options: LeafletTileOptions = {}): string {
        const tileOptions: { minZoom?: number; maxZoom?: number; opacity?: number } = {};
        if (options.minZoom !== undefined) tileOptions.minZoom = options.minZoom;
        if (options.maxZoom !== undefined) tileOptions.maxZoom = options.maxZoom;
        if (options.opacity !== undefined) tileOptions.opacity = options.opacity;
        return this.addLayer(options.layerId ?? this.nextLayerId('tile_layer'), {
            type: 'tile',
            url,
            attribution: options.attribution ?? '',
            options: tileOptions,
        });
    }

    /** Adds a named XYZ provider as a tile layer. Unknown names throw. */
    public addBasemap(name: string, layerId = name): string {
        const provider = requireBasemap(name);
        return this.addTileLayer(provider.url, { attribution: provider.attribution, maxZoom: provider.maxZoom, layerId });
    }

    public addMarker(latlng: LatLng, options: LeafletMarkerOptions = {}): string {
        const layer: LeafletLayerRecord = { type: 'marker', latlng, draggable: options.draggable ?? false };
        if (options.popup) layer.popup = options.popup;
        if (options.tooltip) layer.tooltip = options.tooltip;
        if (options.tooltipOptions) layer.tooltip_options = options.tooltipOptions;
        if (options.icon) layer.icon = options.icon;
        return this.addLayer(this.nextLayerId('marker'), layer);
    }

    /** `radius` is in meters. */
    public addCircle(latlng: LatLng, radius: number, style: PathStyle = {}, popup?: string): string {
        const layer: LeafletLayerRecord = { type: 'circle', latlng, radius, style: { ...DEFAULT_PATH_STYLE, ...style } };
        if (popup) layer.popup = popup;
        return this.addLayer(this.nextLayerId('circle'), layer);
    }

    public addPolygon(latlngs: LatLng[], style: PathStyle = {}, popup?: string): string {
        const layer: LeafletLayerRecord = { type: 'polygon', latlngs, style: { ...DEFAULT_PATH_STYLE, ...style } };
        if (popup) layer.popup = popup;
        return this.addLayer(this.nextLayerId('polygon'), layer);
    }

    public addPolyline(latlngs: LatLng[], style: PathStyle = {}, popup?: string): string {
        const layer: LeafletLayerRecord = { type: 'polyline', latlngs, style: { color: 'blue', weight: 3, ...style } };
        if (popup) layer.popup = popup;
        return this.addLayer(this.nextLayerId('polyline'), layer);
    }

    /** `popupProperty` names the feature property shown in each feature's popup. */
    public addGeojson(data: GeoJSON | string, style: PathStyle = {}, popupProperty?: string): string {
        const layer: LeafletLayerRecord = { type: 'geojson', data: parseGeoJson(data), style };
        if (popupProperty) layer.popup_property = popupProperty;
        return this.addLayer(this.nextLayerId('geojson'), layer);
    }

    /** A Cloud Optimized GeoTIFF rendered in the browser. */
    public addGeotiff(url: string, options: GeotiffOptions = {}): string {
        return this.addLayer(options.layerId ?? this.nextLayerId('geotiff'), {
            type: 'geotiff',
            url,
            fit_bounds: options.fitBounds ?? true,
            opacity: options.opacity ?? 1,
            resolution: options.resolution ?? 256,
        });
    }

    public flyTo(lat: number, lng: number, zoom?: number, duration?: number): void {
        this.send({ kind: 'flyTo', center: [lat, lng], zoom, duration });
    }

    public panTo(lat: number, lng: number): void {
        this.send({ kind: 'panTo', center: [lat, lng] });
    }

    /** Bounds are [[south, west], [north, east]]. */
    public fitBounds(bounds: LatLngBounds, padding?: number): void {
        this.send({ kind: 'fitBounds', bounds, padding });
    }

    public zoomIn(delta = 1): void {
        this.send({ kind: 'zoomIn', delta });
    }

    public zoomOut(delta = 1): void {
        this.send({ kind: 'zoomOut', delta });
    }

    protected exportDocument(): ExportDocument {
        const traits: LeafletTraits = this.model.snapshot();
        const usesGeotiff = Object.values(traits._layers).some(layer => layer.type === 'geotiff');
        const basemap = requireTileUrl(traits.tile_layer);
        return {
            assets: {
                styles: [CDN_ASSETS.leafletCss],
                scripts: usesGeotiff
                    ? [CDN_ASSETS.leafletJs, CDN_ASSETS.georasterJs, CDN_ASSETS.georasterLayerJs]
                    : [CDN_ASSETS.leafletJs],
            },
            state: { ...withoutQueues(traits), tile_url: basemap.url, tile_attribution: traits.attribution || basemap.attribution },
            initScript: LEAFLET_INIT_SCRIPT,
        };
    }
}
