// src/widgets/OpenLayersMap.ts

import type { GeoJSON } from 'geojson';
import type { LatLngBounds } from '../store/IState';
import type { OlVectorStyle, OpenLayersLayerRecord, OpenLayersTraits } from '../store/backend-traits';
import { resolveQueueOptions } from '../store/bounded-queue';
import type { OpenLayersCommand, OpenLayersControlType } from '../protocol/openlayers-commands';
import { encodeOpenLayersCommand } from '../protocol/openlayers-commands';
import type { OpenLayersOptions } from '../config/types';
import { DEFAULT_OPENLAYERS_OPTIONS, mergeWidgetOptions } from '../config/loader';
import { requireBasemap } from '../config/basemaps';
import { CDN_ASSETS } from '../config/cdn';
import type { ExportDocument } from '../export/html-document';
import { withoutQueues } from '../export/html-document';
import { OPENLAYERS_INIT_SCRIPT } from '../export/openlayers-template';
import { MapWidget } from './MapWidget';
import { assertValidOptions } from './options';

export interface OlLayerOptions {
    layerId?: string;
    opacity?: number;
    visible?: boolean;
}

export const DEFAULT_VECTOR_STYLE: OlVectorStyle = {
    fillColor: 'rgba(51, 136, 255, 0.4)',
    strokeColor: '#3388ff',
    strokeWidth: 2,
    circleRadius: 5,
};

function buildTraits(options: OpenLayersOptions): OpenLayersTraits {
    const o = mergeWidgetOptions(DEFAULT_OPENLAYERS_OPTIONS, options);
    return {
        center: o.center,
        zoom: o.zoom,
        width: o.width,
        height: o.height,
        basemap: o.basemap,
        projection: o.projection,
        rotation: o.rotation,
        _js_calls: [],
        _js_events: [],
        _queue: resolveQueueOptions(o.queue),
        _widget_id: '',
        _layers: {},
        _sources: {},
        _controls: o.controls ? { zoom: {}, rotate: {}, attribution: {} } : {},
    };
}

export class OpenLayersMap extends MapWidget<OpenLayersTraits> {
    public readonly backend = 'openlayers';

    constructor(options: OpenLayersOptions = {}) {
        assertValidOptions('openlayers', options);
        super(buildTraits(options), 'openlayers');
    }

    private send(command: OpenLayersCommand): void {
        this.enqueue(encodeOpenLayersCommand(command));
    }

    /** Persists and sends the record; an existing layer under `id` is replaced. */
    public addLayer(id: string, layer: OpenLayersLayerRecord): string {
        this.model.set('_layers', { ...this.model.get('_layers'), [id]: layer });
        this.send({ kind: 'addLayer', id, layer });
        return id;
    }

    public removeLayer(id: string): void {
        const layers = { ...this.model.get('_layers') };
        delete layers[id];
        this.model.set('_layers', layers);
        this.send({ kind: 'removeLayer', id });
    }

    public setLayerVisibility(id: string, visible: boolean): void {
        const layer = this.model.get('_layers')[id];
        if (layer) {
            this.model.set('_layers', { ...this.model.get('_layers'), [id]: { ...layer, visible } });
        }
        this.send({ kind: 'setLayerVisibility', id, visible });
    }

    public setLayerOpacity(id: string, opacity: number): void {
        const value = Math.min(1, Math.max(0, opacity));
        const layer = this.model.get('_layers')[id];
        if (layer) {
            this.model.set('_layers', { ...this.model.get('_layers'), [id]: { ...layer, opacity: value } });
        }
        this.send({ kind: 'setLayerOpacity', id, opacity: value });
    }

    /** XYZ tiles from a URL template. */
    public addTileLayer(url: string, options: OlLayerOptions & { attribution?: string } = {}): string {
        const layer: OpenLayersLayerRecord = { type: 'tile', url, opacity: options.opacity ?? 1, visible: options.visible ?? true };
        if (options.attribution) layer.attribution = options.attribution;
        return this.addLayer(options.layerId ?? this.nextLayerId('tile'), layer);
    }

    public addBasemap(name: string, options: OlLayerOptions = {}): string {
        const provider = requireBasemap(name);
        return this.addTileLayer(provider.url, { layerId: name, ...options, attribution: provider.attribution });
    }

    /** A WMS layer; `params` must name at least LAYERS. */
    public addWmsLayer(url: string, params: Record<string, string | number | boolean>, options: OlLayerOptions = {}): string {
        return this.addLayer(options.layerId ?? this.nextLayerId('wms'), {
            type: 'wms',
            url,
            params,
            opacity: options.opacity ?? 1,
            visible: options.visible ?? true,
        });
    }

    /** GeoJSON given inline or as a URL to fetch. */
    public addGeojsonLayer(data: GeoJSON | string, style: Partial<OlVectorStyle> = {}, options: OlLayerOptions = {}): string {
        return this.addLayer(options.layerId ?? this.nextLayerId('geojson'), {
            type: 'geojson',
            data,
            style: { ...DEFAULT_VECTOR_STYLE, ...style },
            opacity: options.opacity ?? 1,
            visible: options.visible ?? true,
        });
    }

    /**
     * Vector tiles styled by a Mapbox GL style document. `source` picks one
     * source of the style when it has several.
     */
    public addVectorLayer(styleUrl: string, options: OlLayerOptions & { source?: string } = {}): string {
        const layer: OpenLayersLayerRecord = {
            type: 'mvt-style',
            url: styleUrl,
            opacity: options.opacity ?? 1,
            visible: options.visible ?? true,
        };
        if (options.source) layer.source = options.source;
        return this.addLayer(options.layerId ?? this.nextLayerId('vector'), layer);
    }

    public addMarker(lat: number, lng: number, options: { popup?: string; color?: string; layerId?: string } = {}): string {
        const layer: OpenLayersLayerRecord = {
            type: 'marker',
            coordinates: [lng, lat],
            color: options.color ?? '#3388ff',
            opacity: 1,
            visible: true,
        };
        if (options.popup) layer.popup = options.popup;
        return this.addLayer(options.layerId ?? this.nextLayerId('marker'), layer);
    }

    public addControl(type: OpenLayersControlType, options: Record<string, unknown> = {}): void {
        this.model.set('_controls', { ...this.model.get('_controls'), [type]: options });
        this.send({ kind: 'addControl', controlType: type, options });
    }

    public removeControl(type: OpenLayersControlType): void {
        const controls = { ...this.model.get('_controls') };
        delete controls[type];
        this.model.set('_controls', controls);
        this.send({ kind: 'removeControl', controlType: type });
    }

    /** Rotation in radians. */
    public setRotation(rotation: number): void {
        this.model.set('rotation', rotation);
    }

    public setBasemap(name: string): void {
        this.model.set('basemap', name);
    }

    public flyTo(lat: number, lng: number, zoom?: number, duration = 1000): void {
        this.send({ kind: 'flyTo', center: [lat, lng], zoom, duration });
    }

    /** Bounds are [[south, west], [north, east]]. */
    public fitBounds(bounds: LatLngBounds, padding = 50): void {
        this.send({ kind: 'fitBounds', bounds, padding });
    }

    protected exportDocument(): ExportDocument {
        const traits: OpenLayersTraits = this.model.snapshot();
        const basemap = traits.basemap.includes('{z}') ? null : requireBasemap(traits.basemap);
        return {
            assets: { styles: [CDN_ASSETS.openlayersCss], scripts: [CDN_ASSETS.openlayersJs] },
            state: { ...withoutQueues(traits), basemap_url: basemap ? basemap.url : traits.basemap },
            initScript: OPENLAYERS_INIT_SCRIPT,
        };
    }
}
