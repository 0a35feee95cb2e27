// src/widgets/MapboxMap.ts

import type { GeoJSON } from 'geojson';
import type { LayerSpecification, StyleSpecification } from 'mapbox-gl';
import type { ControlPosition, ControlRecord } from '../store/IState';
import { controlKey } from '../store/IState';
import type { MapboxProjection, MapboxSpecTypes, MapboxTraits } from '../store/backend-traits';
import { resolveQueueOptions } from '../store/bounded-queue';
import { emptyFeatureCollection } from '../protocol/guards';
import type { MapboxOptions } from '../config/types';
import { DEFAULT_MAPBOX_OPTIONS, mergeWidgetOptions, readEnv } from '../config/loader';
import { requireBasemap } from '../config/basemaps';
import { CDN_ASSETS } from '../config/cdn';
import type { ExportDocument } from '../export/html-document';
import { withoutQueues } from '../export/html-document';
import { glInitScript, hasControl, layersInReplayOrder } from '../export/gl-template';
import type { AddLayerOptions } from './GlMapWidget';
import { GlMapWidget } from './GlMapWidget';
import type { ImageCorners, RasterSourceOptions } from './gl-layer-builders';
import {
    demSource,
    geojsonSource,
    imageSource,
    rasterLayer,
    rasterTileSource,
    resolveGlStyle,
    sourceIdFor,
    vectorUrlSource,
} from './gl-layer-builders';
import { assertValidOptions } from './options';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type DataLayer = Extract<LayerSpecification, { type: 'fill' | 'line' | 'circle' | 'symbol' | 'fill-extrusion' | 'heatmap' }>;

export type MapboxDataLayerStyle = DistributiveOmit<DataLayer, 'id' | 'source' | 'source-layer'>;

export const MAPBOX_DEM_URL = 'mapbox://mapbox.mapbox-terrain-dem-v1';

const DEFAULT_GEOJSON_STYLE: MapboxDataLayerStyle = {
    type: 'fill',
    paint: { 'fill-color': '#3388ff', 'fill-opacity': 0.5 },
};

export interface MapboxTerrainOptions {
    url?: string;
    exaggeration?: number;
    sourceId?: string;
}

function defaultControls(): Record<string, ControlRecord> {
    const entries: Array<[string, ControlPosition]> = [
        ['navigation', 'top-right'],
        ['fullscreen', 'top-right'],
        ['scale', 'bottom-left'],
    ];
    const records: Record<string, ControlRecord> = {};
    entries.forEach(([type, position]) => {
        records[controlKey(type, position)] = { type, position, options: {} };
    });
    return records;
}

function buildTraits(options: MapboxOptions): MapboxTraits {
    const o = mergeWidgetOptions(DEFAULT_MAPBOX_OPTIONS, options);
    const accessToken = o.accessToken || readEnv('MAPBOX_TOKEN') || '';
    if (!accessToken) {
        console.warn('[config] mapbox: no access token; pass accessToken or set MAPBOX_TOKEN.');
    }
    return {
        center: o.center,
        zoom: o.zoom,
        width: o.width,
        height: o.height,
        style: typeof o.style === 'string' ? resolveGlStyle(o.style) : o.style,
        bearing: o.bearing,
        pitch: o.pitch,
        antialias: o.antialias,
        access_token: accessToken,
        _js_calls: [],
        _js_events: [],
        _queue: resolveQueueOptions(o.queue),
        _widget_id: '',
        _layers: {},
        _before_ids: {},
        _sources: {},
        _controls: o.controls ? defaultControls() : {},
        _markers: {},
        _draw_data: emptyFeatureCollection(),
        _terra_draw_data: emptyFeatureCollection(),
        _layer_dict: {},
        _projection: o.projection === 'mercator' ? null : { name: o.projection },
        _terrain: null,
    };
}

export class MapboxMap extends GlMapWidget<MapboxSpecTypes, MapboxTraits> {
    public readonly backend = 'mapbox';

    constructor(options: MapboxOptions = {}) {
        assertValidOptions('mapbox', options);
        super(buildTraits(options), 'mapbox');
    }

    public get accessToken(): string {
        return this.model.get('access_token');
    }

    public setAccessToken(token: string): void {
        this.model.set('access_token', token);
    }

    protected resolveStyle(style: string | StyleSpecification): string | StyleSpecification {
        return typeof style === 'string' ? resolveGlStyle(style) : style;
    }

    public addGeojsonLayer(id: string, data: GeoJSON | string, style: MapboxDataLayerStyle = DEFAULT_GEOJSON_STYLE, options: AddLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, geojsonSource(data));
        this.addLayer(id, { ...style, id, source }, options);
    }

    public addVectorLayer(id: string, url: string, sourceLayer: string, style: MapboxDataLayerStyle, options: AddLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, vectorUrlSource(url));
        this.addLayer(id, { ...style, id, source, 'source-layer': sourceLayer }, options);
    }

    public addTileLayer(id: string, url: string, options: AddLayerOptions & RasterSourceOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, rasterTileSource(url, options));
        this.addLayer(id, rasterLayer(id, source), options);
    }

    public addImageLayer(id: string, url: string, coordinates: ImageCorners, options: AddLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, imageSource(url, coordinates));
        this.addLayer(id, rasterLayer(id, source), options);
    }

    public addBasemap(name: string, options: AddLayerOptions & { layerId?: string } = {}): void {
        const provider = requireBasemap(name);
        this.addTileLayer(options.layerId ?? name, provider.url, {
            ...options,
            attribution: provider.attribution,
            maxzoom: provider.maxZoom,
        });
    }

    /** Accepts a projection name such as 'globe' or 'albers', or a full projection object. */
    public setProjection(projection: MapboxProjection | string | null): void {
        super.setProjection(typeof projection === 'string' ? { name: projection } : projection);
    }

    public setTerrain(options: MapboxTerrainOptions | null = {}): void {
        if (options === null) {
            this.gl.set('_terrain', null);
            this.send({ kind: 'setTerrain', terrain: null });
            return;
        }
        const sourceId = options.sourceId ?? 'mapbox-dem';
        this.addSource(sourceId, demSource(options.url ?? MAPBOX_DEM_URL, 512));
        const terrain = { source: sourceId, exaggeration: options.exaggeration ?? 1 };
        this.gl.set('_terrain', terrain);
        this.send({ kind: 'setTerrain', terrain });
    }

    protected exportDocument(): ExportDocument {
        const traits: MapboxTraits = this.model.snapshot();
        const styles: string[] = [CDN_ASSETS.mapboxCss];
        const scripts: string[] = [CDN_ASSETS.mapboxJs];
        if (hasControl(traits, 'draw')) {
            styles.push(CDN_ASSETS.mapboxDrawCss);
            scripts.push(CDN_ASSETS.mapboxDrawJs);
        }
        return {
            assets: { styles, scripts },
            state: withoutQueues({ ...traits, _layers: layersInReplayOrder(traits._layers, traits._before_ids) }),
            initScript: glInitScript('mapboxgl'),
        };
    }
}
