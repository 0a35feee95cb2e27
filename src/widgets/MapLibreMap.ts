// src/widgets/MapLibreMap.ts

import type { Feature, FeatureCollection, GeoJSON } from 'geojson';
import type {
    LayerSpecification,
    ProjectionSpecification,
    RasterLayerSpecification,
    StyleSpecification,
} from 'maplibre-gl';
import type { ControlPosition, ControlRecord } from '../store/IState';
import { controlKey } from '../store/IState';
import type { MapLibreSpecTypes, MapLibreTraits } from '../store/backend-traits';
import { resolveQueueOptions } from '../store/bounded-queue';
import { emptyFeatureCollection, isFeature, isFeatureCollection } from '../protocol/guards';
import { WidgetConfigError } from '../utils/errors';
import type { GlProjectionName, MapLibreOptions } from '../config/types';
import { DEFAULT_MAPLIBRE_OPTIONS, mergeWidgetOptions } from '../config/loader';
import { requireBasemap } from '../config/basemaps';
import { CDN_ASSETS } from '../config/cdn';
import type { ExportDocument } from '../export/html-document';
import { withoutQueues } from '../export/html-document';
import { glInitScript, hasControl, layersInReplayOrder, usesProtocol } from '../export/gl-template';
import type { AddLayerOptions } from './GlMapWidget';
import { GlMapWidget } from './GlMapWidget';
import type { ImageCorners, RasterSourceOptions } from './gl-layer-builders';
import {
    demSource,
    geojsonSource,
    imageSource,
    rasterLayer,
    rasterTileSource,
    rasterUrlSource,
    resolveGlStyle,
    sourceIdFor,
    vectorUrlSource,
} from './gl-layer-builders';
import { assertValidOptions } from './options';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type LayerOfType<K extends LayerSpecification['type']> = Extract<LayerSpecification, { type: K }>;
type DataLayer = LayerOfType<'fill' | 'line' | 'circle' | 'symbol' | 'fill-extrusion' | 'heatmap'>;

/** A layer definition without the id and source the convenience methods fill in. */
export type DataLayerStyle = DistributiveOmit<DataLayer, 'id' | 'source' | 'source-layer'>;

export const GLOBE_PROJECTION: ProjectionSpecification = {
    type: ['interpolate', ['linear'], ['zoom'], 10, 'vertical-perspective', 12, 'mercator'],
};

export const DEFAULT_DEM_URL = 'https://demotiles.maplibre.org/terrain-tiles/tiles.json';

const DEFAULT_GEOJSON_STYLE: DataLayerStyle = {
    type: 'fill',
    paint: { 'fill-color': '#3388ff', 'fill-opacity': 0.5 },
};

export interface TileLayerOptions extends AddLayerOptions, RasterSourceOptions {}

export interface TerraDrawOptions {
    /** Toolbar modes; every drawing mode when left out */
    modes?: string[];
    /** Whether the toolbar starts expanded. Defaults to true. */
    open?: boolean;
}

function toFeatureCollection(data: FeatureCollection | Feature | string): FeatureCollection {
    let parsed: unknown = data;
    if (typeof data === 'string') {
        try {
            parsed = JSON.parse(data);
        } catch (error) {
            throw new WidgetConfigError(`Drawing data could not be parsed: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
    if (isFeatureCollection(parsed)) return parsed;
    if (isFeature(parsed)) return { type: 'FeatureCollection', features: [parsed] };
    throw new WidgetConfigError('Drawing data must be a GeoJSON Feature or FeatureCollection');
}

export interface CogLayerOptions extends AddLayerOptions {
    /** Raster paint properties such as raster-contrast or raster-hue-rotate */
    paint?: RasterLayerSpecification['paint'];
}

export interface PmtilesOptions extends AddLayerOptions {
    /** Prefix for source and layer ids; the file name without extension by default */
    layerId?: string;
    layers?: LayerSpecification[];
}

export interface TerrainOptions {
    /** raster-dem TileJSON URL */
    url?: string;
    exaggeration?: number;
    sourceId?: string;
}

export interface GeocoderOptions {
    placeholder?: string;
    collapsed?: boolean;
    limit?: number;
}

function controlRecords(entries: Array<[string, ControlPosition]>): Record<string, ControlRecord> {
    const records: Record<string, ControlRecord> = {};
    entries.forEach(([type, position]) => {
        records[controlKey(type, position)] = { type, position, options: {} };
    });
    return records;
}

function projectionFor(name: GlProjectionName): ProjectionSpecification | null {
    return name === 'globe' ? GLOBE_PROJECTION : null;
}

export function buildMapLibreTraits(options: MapLibreOptions): MapLibreTraits {
    const o = mergeWidgetOptions(DEFAULT_MAPLIBRE_OPTIONS, options);
    return {
        center: o.center,
        zoom: o.zoom,
        width: o.width,
        height: o.height,
        style: typeof o.style === 'string' ? resolveGlStyle(o.style) : o.style,
        bearing: o.bearing,
        pitch: o.pitch,
        antialias: o.antialias,
        _js_calls: [],
        _js_events: [],
        _queue: resolveQueueOptions(o.queue),
        _widget_id: '',
        _layers: {},
        _before_ids: {},
        _sources: {},
        _controls: o.controls
            ? controlRecords([
                ['navigation', 'top-right'],
                ['fullscreen', 'top-right'],
                ['globe', 'top-right'],
                ['scale', 'bottom-left'],
            ])
            : {},
        _markers: {},
        _draw_data: emptyFeatureCollection(),
        _terra_draw_data: emptyFeatureCollection(),
        _layer_dict: {},
        _projection: projectionFor(o.projection),
        _terrain: null,
    };
}

/**
 * MapLibre host API. Shared with the deck.gl widget, which draws on a
 * MapLibre base map.
 */
export abstract class MapLibreWidget<T extends MapLibreTraits> extends GlMapWidget<MapLibreSpecTypes, T> {
    protected resolveStyle(style: string | StyleSpecification): string | StyleSpecification {
        return typeof style === 'string' ? resolveGlStyle(style) : style;
    }

    public addGeojsonLayer(id: string, data: GeoJSON | string, style: DataLayerStyle = DEFAULT_GEOJSON_STYLE, options: AddLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, geojsonSource(data));
        this.addLayer(id, { ...style, id, source }, options);
    }

    public addVectorLayer(id: string, url: string, sourceLayer: string, style: DataLayerStyle, options: AddLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, vectorUrlSource(url));
        this.addLayer(id, { ...style, id, source, 'source-layer': sourceLayer }, options);
    }

    /** XYZ raster tiles, 256 px. */
    public addTileLayer(id: string, url: string, options: TileLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, rasterTileSource(url, options));
        this.addLayer(id, rasterLayer(id, source), options);
    }

    public addImageLayer(id: string, url: string, coordinates: ImageCorners, options: AddLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, imageSource(url, coordinates));
        this.addLayer(id, rasterLayer(id, source), options);
    }

    /** A Cloud Optimized GeoTIFF, read through the cog:// protocol. */
    public addCogLayer(id: string, url: string, options: CogLayerOptions = {}): void {
        const source = sourceIdFor(id);
        this.addSource(source, rasterUrlSource(`cog://${url}`));
        const layer: RasterLayerSpecification = rasterLayer(id, source);
        if (options.paint) layer.paint = options.paint;
        this.addLayer(id, layer, options);
    }

    /**
     * Vector tiles from a PMTiles archive. Without `layers`, four styled layers
     * read the landuse, roads, buildings and water source layers.
     */
    public addPmtiles(url: string, options: PmtilesOptions = {}): void {
        const layerId = options.layerId ?? (url.split('/').pop() ?? url).replace('.pmtiles', '');
        const source = sourceIdFor(layerId);
        this.addSource(source, vectorUrlSource(`pmtiles://${url}`, 'PMTiles'));

        const layers: LayerSpecification[] = options.layers ?? [
            { id: `${layerId}_landuse`, source, 'source-layer': 'landuse', type: 'fill', paint: { 'fill-color': 'steelblue', 'fill-opacity': 0.5 } },
            { id: `${layerId}_roads`, source, 'source-layer': 'roads', type: 'line', paint: { 'line-color': 'black', 'line-width': 1 } },
            { id: `${layerId}_buildings`, source, 'source-layer': 'buildings', type: 'fill', paint: { 'fill-color': 'gray', 'fill-opacity': 0.7 } },
            { id: `${layerId}_water`, source, 'source-layer': 'water', type: 'fill', paint: { 'fill-color': 'lightblue', 'fill-opacity': 0.8 } },
        ];
        layers.forEach(layer => this.addLayer(layer.id, layer, options));
    }

    /** Adds a named XYZ provider as a raster layer. Unknown names throw. */
    public addBasemap(name: string, options: AddLayerOptions & { layerId?: string } = {}): void {
        const provider = requireBasemap(name);
        this.addTileLayer(options.layerId ?? name, provider.url, {
            ...options,
            attribution: provider.attribution,
            maxzoom: provider.maxZoom,
        });
    }

    /** 'globe' and 'mercator' are accepted as shorthands. */
    public setProjection(projection: ProjectionSpecification | GlProjectionName | null): void {
        if (projection === 'globe' || projection === 'mercator') {
            super.setProjection(projection === 'globe' ? GLOBE_PROJECTION : { type: 'mercator' });
            return;
        }
        super.setProjection(projection);
    }

    /** Adds a raster-dem source and drapes the map over it. `null` turns terrain off. */
    public setTerrain(options: TerrainOptions | null = {}): void {
        if (options === null) {
            this.gl.set('_terrain', null);
            this.send({ kind: 'setTerrain', terrain: null });
            return;
        }
        const sourceId = options.sourceId ?? 'terrain-dem';
        this.addSource(sourceId, demSource(options.url ?? DEFAULT_DEM_URL));
        const terrain = { source: sourceId, exaggeration: options.exaggeration ?? 1 };
        this.gl.set('_terrain', terrain);
        this.send({ kind: 'setTerrain', terrain });
    }

    /** Place search backed by Nominatim. */
    public addGeocoderControl(position: ControlPosition = 'top-left', options: GeocoderOptions = {}): void {
        this.addControl('geocoder', position, {
            placeholder: options.placeholder ?? 'Search places',
            collapsed: options.collapsed ?? false,
            limit: options.limit ?? 5,
        });
    }

    /**
     * A Terra Draw toolbar. Only one per map; the drawn features are kept in
     * `_terra_draw_data` as views report them.
     */
    public addTerraDraw(position: ControlPosition = 'top-left', options: TerraDrawOptions = {}): void {
        const control: ControlRecord = { type: 'terra_draw', position, options: { ...options } };
        this.gl.set('_controls', { ...this.gl.get('_controls'), [controlKey('terra_draw', position)]: control });
        this.send({ kind: 'addTerraDrawControl', control });
    }

    public loadTerraDrawData(data: FeatureCollection | Feature | string): void {
        const collection = toFeatureCollection(data);
        this.gl.set('_terra_draw_data', collection);
        this.send({ kind: 'loadTerraDrawData', data: collection });
    }

    /** Asks open views for their features when none have been reported yet. */
    public getTerraDrawData(): FeatureCollection {
        if (this.gl.get('_terra_draw_data').features.length === 0) {
            this.send({ kind: 'getTerraDrawData' });
        }
        return structuredClone(this.gl.get('_terra_draw_data'));
    }

    public clearTerraDrawData(): void {
        this.gl.set('_terra_draw_data', emptyFeatureCollection());
        this.send({ kind: 'clearTerraDrawData' });
    }

    protected glExport(extraScripts: string[] = [], extraInit = ''): ExportDocument {
        const traits: MapLibreTraits = this.model.snapshot();
        const styles: string[] = [CDN_ASSETS.maplibreCss];
        const scripts: string[] = [CDN_ASSETS.maplibreJs];
        if (usesProtocol(traits, 'pmtiles')) scripts.push(CDN_ASSETS.pmtilesJs);
        if (usesProtocol(traits, 'cog')) scripts.push(CDN_ASSETS.cogProtocolJs);
        if (hasControl(traits, 'draw')) {
            styles.push(CDN_ASSETS.mapboxDrawCss);
            scripts.push(CDN_ASSETS.mapboxDrawJs);
        }
        if (hasControl(traits, 'terra_draw')) {
            styles.push(CDN_ASSETS.terraDrawCss);
            scripts.push(CDN_ASSETS.terraDrawJs);
        }
        return {
            assets: { styles, scripts: [...scripts, ...extraScripts] },
            state: withoutQueues({ ...traits, _layers: layersInReplayOrder(traits._layers, traits._before_ids) }),
            initScript: glInitScript('maplibregl', extraInit),
        };
    }
}

export class MapLibreMap extends MapLibreWidget<MapLibreTraits> {
    public readonly backend = 'maplibre';

    constructor(options: MapLibreOptions = {}) {
        assertValidOptions('maplibre', options);
        super(buildMapLibreTraits(options), 'maplibre');
    }

    protected exportDocument(): ExportDocument {
        return this.glExport();
    }
}
