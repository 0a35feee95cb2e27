// src/store/backend-traits.ts
// Trait sets per backend. Host widgets own a TraitStore of one of these and
// render functions receive a WidgetModel of the same shape.

import type {
    LayerSpecification,
    ProjectionSpecification,
    SourceSpecification,
    StyleSpecification,
    TerrainSpecification,
} from 'maplibre-gl';
import type {
    LayerSpecification as MapboxLayerSpecification,
    SourceSpecification as MapboxSourceSpecification,
    StyleSpecification as MapboxStyleSpecification,
} from 'mapbox-gl';
import type { FeatureCollection, GeoJSON } from 'geojson';
import type { ControlRecord, CoreTraits, LatLng, LngLatTuple } from './IState';

export interface MarkerRecord {
    coordinates: LngLatTuple;
    popup?: string;
    color?: string;
    draggable?: boolean;
}

/** Layer-state key that stands for every layer of the base style. */
export const BACKGROUND_LAYER = 'Background';

/** Entry of the layer control's state, keyed by layer id. */
export interface LayerState {
    name: string;
    visible: boolean;
    opacity: number;
}

/**
 * Layer ids in the order a replay adds them. A layer drawn beneath another
 * of its own map's layers comes after that layer, otherwise insertion order
 * holds; ids that wait on each other in a cycle go last.
 */
export function layerReplayOrder(ids: string[], beforeIds: Record<string, string>): string[] {
    const own = new Set(ids);
    const order: string[] = [];
    const placed = new Set<string>();
    let pending = ids;
    while (pending.length > 0) {
        const waiting: string[] = [];
        for (const id of pending) {
            const before = beforeIds[id];
            if (before !== undefined && own.has(before) && !placed.has(before)) {
                waiting.push(id);
            } else {
                order.push(id);
                placed.add(id);
            }
        }
        if (waiting.length === pending.length) {
            order.push(...waiting);
            break;
        }
        pending = waiting;
    }
    return order;
}

/** The style-spec types one GL library uses. */
export interface GlSpecTypes {
    layer: { id: string; type: string };
    source: { type: string };
    style: unknown;
    projection: unknown;
    terrain: unknown;
}

export interface MapboxProjection {
    name: string;
    center?: [number, number];
    parallels?: [number, number];
}

export interface MapboxTerrain {
    source: string;
    exaggeration?: number;
}

export interface MapLibreSpecTypes {
    layer: LayerSpecification;
    source: SourceSpecification;
    style: StyleSpecification;
    projection: ProjectionSpecification;
    terrain: TerrainSpecification;
}

export interface MapboxSpecTypes {
    layer: MapboxLayerSpecification;
    source: MapboxSourceSpecification;
    style: MapboxStyleSpecification;
    projection: MapboxProjection;
    terrain: MapboxTerrain;
}

/** Traits shared by the GL backends, parameterised by the library's spec types. */
export interface GlTraits<S extends GlSpecTypes> extends CoreTraits {
    style: string | S['style'];
    bearing: number;
    pitch: number;
    antialias: boolean;
    _layers: Record<string, S['layer']>;
    /** Layer id to the layer it is drawn beneath, for layers added with a beforeId. */
    _before_ids: Record<string, string>;
    _sources: Record<string, S['source']>;
    _controls: Record<string, ControlRecord>;
    _markers: Record<string, MarkerRecord>;
    _draw_data: FeatureCollection;
    /** Features of the Terra Draw control; MapLibre only, empty elsewhere. */
    _terra_draw_data: FeatureCollection;
    _layer_dict: Record<string, LayerState>;
    _projection: S['projection'] | null;
    _terrain: S['terrain'] | null;
}

export type MapLibreTraits = GlTraits<MapLibreSpecTypes>;

export interface MapboxTraits extends GlTraits<MapboxSpecTypes> {
    access_token: string;
}

// deck.gl

export const DECK_LAYER_TYPES = [
    'ScatterplotLayer',
    'GeoJsonLayer',
    'ArcLayer',
    'PathLayer',
    'LineLayer',
    'PolygonLayer',
    'TextLayer',
    'IconLayer',
    'ColumnLayer',
    'HexagonLayer',
    'HeatmapLayer',
    'GridLayer',
] as const;

export type DeckLayerType = typeof DECK_LAYER_TYPES[number];

export interface DeckLayerRecord {
    id: string;
    type: DeckLayerType;
    props: Record<string, unknown>;
}

export interface DeckGLTraits extends MapLibreTraits {
    _deck_layers: Record<string, DeckLayerRecord>;
}

// Leaflet

export interface PathStyle {
    color?: string;
    weight?: number;
    opacity?: number;
    fillColor?: string;
    fillOpacity?: number;
    dashArray?: string;
}

export interface MarkerIconOptions {
    iconUrl: string;
    iconSize?: [number, number];
    iconAnchor?: [number, number];
    popupAnchor?: [number, number];
}

export interface TooltipOptions {
    permanent?: boolean;
    direction?: 'auto' | 'top' | 'bottom' | 'left' | 'right' | 'center';
    offset?: [number, number];
}

export type LeafletLayerRecord =
    | { type: 'tile'; url: string; attribution: string; options: { minZoom?: number; maxZoom?: number; opacity?: number } }
    | {
        type: 'marker';
        latlng: LatLng;
        popup?: string;
        tooltip?: string;
        tooltip_options?: TooltipOptions;
        draggable: boolean;
        icon?: MarkerIconOptions;
    }
    | { type: 'circle'; latlng: LatLng; radius: number; style: PathStyle; popup?: string }
    | { type: 'polygon'; latlngs: LatLng[]; style: PathStyle; popup?: string }
    | { type: 'polyline'; latlngs: LatLng[]; style: PathStyle; popup?: string }
    | { type: 'geojson'; data: GeoJSON; style: PathStyle; popup_property?: string }
    | { type: 'geotiff'; url: string; fit_bounds: boolean; opacity: number; resolution: number };

export interface LeafletTraits extends CoreTraits {
    tile_layer: string;
    attribution: string;
    map_options: Record<string, unknown>;
    _layers: Record<string, LeafletLayerRecord>;
    _sources: Record<string, never>;
}

// OpenLayers

export interface OlVectorStyle {
    fillColor: string;
    strokeColor: string;
    strokeWidth: number;
    circleRadius: number;
}

export type OpenLayersLayerRecord =
    | { type: 'tile'; url: string; attribution?: string; opacity: number; visible: boolean }
    | { type: 'wms'; url: string; params: Record<string, string | number | boolean>; opacity: number; visible: boolean }
    | { type: 'geojson'; data: GeoJSON | string; style: OlVectorStyle; opacity: number; visible: boolean }
    | { type: 'mvt-style'; url: string; source?: string; opacity: number; visible: boolean }
    | { type: 'marker'; coordinates: LngLatTuple; popup?: string; color: string; opacity: number; visible: boolean };

export interface OpenLayersTraits extends CoreTraits {
    basemap: string;
    projection: string;
    rotation: number;
    _layers: Record<string, OpenLayersLayerRecord>;
    _sources: Record<string, never>;
    /** Control options keyed by control type */
    _controls: Record<string, Record<string, unknown>>;
}

// Cesium

export type CesiumLayerRecord =
    | { type: 'imagery'; url: string; credit?: string; alpha: number }
    | { type: 'geojson'; data: GeoJSON | string; stroke: string; fill: string; strokeWidth: number; clampToGround: boolean }
    | { type: '3dtiles'; url: string; maximumScreenSpaceError: number };

export type CesiumTerrainRecord =
    | { type: 'ellipsoid' }
    | { type: 'world' }
    | { type: 'url'; url: string };

export interface CesiumTraits extends CoreTraits {
    camera_height: number;
    heading: number;
    pitch: number;
    roll: number;
    access_token: string;
    _layers: Record<string, CesiumLayerRecord>;
    _sources: Record<string, never>;
    _terrain: CesiumTerrainRecord | null;
}

// Potree

export type PotreeBackground = 'gradient' | 'black' | 'white' | 'skybox';

export interface PointCloudRecord {
    url: string;
    name: string;
    pointSize: number;
}

export interface PotreeTraits extends CoreTraits {
    potree_libs_dir: string;
    point_cloud_url: string;
    description: string;
    point_budget: number;
    fov: number;
    edl_enabled: boolean;
    background: PotreeBackground;
    _layers: Record<string, PointCloudRecord>;
    _sources: Record<string, never>;
}

/** Trait set of each backend, keyed by backend name. */
export interface BackendTraitsMap {
    maplibre: MapLibreTraits;
    mapbox: MapboxTraits;
    leaflet: LeafletTraits;
    openlayers: OpenLayersTraits;
    deckgl: DeckGLTraits;
    cesium: CesiumTraits;
    potree: PotreeTraits;
}
