// src/widgets/GlMapWidget.ts
// Host API shared by the GL backends. Every side effect is persisted into a
// trait (so a view opened later can replay it) and queued as a call (so views
// already open apply it now).

import type { Feature, FeatureCollection } from 'geojson';
import type { CallRecord, ControlPosition, LatLngBounds } from '../store/IState';
import { controlKey } from '../store/IState';
import type { WidgetModel } from '../store/trait-store';
import type { GlSpecTypes, GlTraits, LayerState, MarkerRecord } from '../store/backend-traits';
import { BACKGROUND_LAYER } from '../store/backend-traits';
import type { CameraOptions, GlCommand } from '../protocol/gl-commands';
import { encodeGlCommand } from '../protocol/gl-commands';
import type { DynamicCall } from '../protocol/dynamic-call';
import { emptyFeatureCollection } from '../protocol/guards';
import { MapWidget } from './MapWidget';

export interface AddLayerOptions {
    beforeId?: string;
    /** 0..1, defaults to 1 */
    opacity?: number;
    /** defaults to true */
    visible?: boolean;
}

export interface CameraMoveOptions {
    bearing?: number;
    pitch?: number;
    /** Animation length in milliseconds */
    duration?: number;
}

export interface MarkerOptions {
    popup?: string;
    color?: string;
    draggable?: boolean;
    /** Marker id; generated when omitted */
    id?: string;
}

export interface LayerControlOptions {
    collapsed?: boolean;
    /** Layer ids to list. All layers plus "Background" when omitted. */
    layers?: string[];
}

export interface DrawControlOptions {
    controls?: {
        point?: boolean;
        line_string?: boolean;
        polygon?: boolean;
        trash?: boolean;
    };
    defaultMode?: string;
    keybindings?: boolean;
    touchEnabled?: boolean;
}

export { BACKGROUND_LAYER };

function clampOpacity(opacity: number): number {
    return Math.min(1, Math.max(0, opacity));
}

export abstract class GlMapWidget<S extends GlSpecTypes, T extends GlTraits<S>> extends MapWidget<T> {
    private markerCount = 0;

    protected get gl(): WidgetModel<GlTraits<S>> {
        return this.model;
    }

    protected send(command: GlCommand<S> | DynamicCall): CallRecord {
        return this.enqueue(encodeGlCommand(command));
    }

    // Camera

    public flyTo(lat: number, lng: number, zoom?: number, options: CameraMoveOptions = {}): void {
        const camera: CameraOptions = { center: [lat, lng], ...options };
        if (zoom !== undefined) camera.zoom = zoom;
        this.send({ kind: 'flyTo', camera });
    }

    public jumpTo(lat: number, lng: number, zoom?: number): void {
        this.send({ kind: 'jumpTo', camera: zoom === undefined ? { center: [lat, lng] } : { center: [lat, lng], zoom } });
    }

    /** Bounds are [[south, west], [north, east]]. */
    public fitBounds(bounds: LatLngBounds, padding = 50, duration?: number): void {
        this.send({ kind: 'fitBounds', bounds, padding, duration });
    }

    public setBearing(bearing: number): void {
        this.gl.set('bearing', bearing);
    }

    public setPitch(pitch: number): void {
        this.gl.set('pitch', pitch);
    }

    public get bearing(): number {
        return this.gl.get('bearing');
    }

    public get pitch(): number {
        return this.gl.get('pitch');
    }

    // Sources and layers

    public addSource(id: string, source: S['source']): void {
        this.gl.set('_sources', { ...this.gl.get('_sources'), [id]: source });
        this.send({ kind: 'addSource', id, source });
    }

    /** Layers drawn from the source go with it. */
    public removeSource(id: string): void {
        Object.values(this.gl.get('_layers'))
            .filter(layer => Reflect.get(layer, 'source') === id)
            .forEach(layer => this.removeLayer(layer.id));

        const sources = { ...this.gl.get('_sources') };
        delete sources[id];
        this.gl.set('_sources', sources);
        this.send({ kind: 'removeSource', id });
    }

    public addLayer(id: string, layer: S['layer'], options: AddLayerOptions = {}): void {
        const spec: S['layer'] = { ...layer, id };
        const visible = options.visible ?? true;
        const opacity = clampOpacity(options.opacity ?? 1);

        this.gl.set('_layers', { ...this.gl.get('_layers'), [id]: spec });
        const beforeIds = { ...this.gl.get('_before_ids') };
        if (options.beforeId) {
            beforeIds[id] = options.beforeId;
        } else {
            delete beforeIds[id];
        }
        this.gl.set('_before_ids', beforeIds);
        this.writeLayerState(id, { name: id, visible, opacity });

        this.send({ kind: 'addLayer', layer: spec, beforeId: options.beforeId });
        if (!visible) {
            this.send({ kind: 'setVisibility', layerId: id, visible });
        }
        if (opacity !== 1) {
            this.send({ kind: 'setOpacity', layerId: id, opacity });
        }
    }

    public removeLayer(id: string): void {
        const layers = { ...this.gl.get('_layers') };
        delete layers[id];
        this.gl.set('_layers', layers);

        const beforeIds = { ...this.gl.get('_before_ids') };
        delete beforeIds[id];
        this.gl.set('_before_ids', beforeIds);

        const states = { ...this.gl.get('_layer_dict') };
        delete states[id];
        this.gl.set('_layer_dict', states);

        this.send({ kind: 'removeLayer', id });
    }

    /** "Background" toggles every layer of the base style. */
    public setVisibility(layerId: string, visible: boolean): void {
        this.updateLayerState(layerId, { visible });
        this.send({ kind: 'setVisibility', layerId, visible });
    }

    public setOpacity(layerId: string, opacity: number): void {
        const value = clampOpacity(opacity);
        this.updateLayerState(layerId, { opacity: value });
        this.send({ kind: 'setOpacity', layerId, opacity: value });
    }

    public setLayoutProperty(layerId: string, name: string, value: unknown): void {
        this.send({ kind: 'setLayoutProperty', layerId, name, value });
    }

    public setPaintProperty(layerId: string, name: string, value: unknown): void {
        this.send({ kind: 'setPaintProperty', layerId, name, value });
    }

    public getLayerType(layerId: string): string | null {
        return this.gl.get('_layers')[layerId]?.type ?? null;
    }

    public get layerStates(): Record<string, LayerState> {
        return structuredClone(this.gl.get('_layer_dict'));
    }

    private writeLayerState(layerId: string, state: LayerState): void {
        this.gl.set('_layer_dict', { ...this.gl.get('_layer_dict'), [layerId]: state });
    }

    private updateLayerState(layerId: string, change: Partial<LayerState>): void {
        const current: Partial<LayerState> = this.gl.get('_layer_dict')[layerId];
        if (!current && layerId !== BACKGROUND_LAYER && !(layerId in this.gl.get('_layers'))) return;
        this.writeLayerState(layerId, { name: layerId, visible: true, opacity: 1, ...current, ...change });
    }

    // Style

    public setStyle(style: string | S['style']): void {
        this.gl.set('style', this.resolveStyle(style));
    }

    /** Maps a style name to what the library loads. Identity by default. */
    protected resolveStyle(style: string | S['style']): string | S['style'] {
        return style;
    }

    public setProjection(projection: S['projection'] | null): void {
        this.gl.set('_projection', projection);
        if (projection !== null) {
            this.send({ kind: 'setProjection', projection });
        }
    }

    // Markers

    /** Returns the marker id. */
    public addMarker(lat: number, lng: number, options: MarkerOptions = {}): string {
        const id = options.id ?? `marker_${this.markerCount++}`;
        const marker: MarkerRecord = { coordinates: [lng, lat] };
        if (options.popup !== undefined) marker.popup = options.popup;
        if (options.color !== undefined) marker.color = options.color;
        if (options.draggable !== undefined) marker.draggable = options.draggable;

        this.gl.set('_markers', { ...this.gl.get('_markers'), [id]: marker });
        this.send({ kind: 'addMarker', id, marker });
        return id;
    }

    public removeMarker(id: string): void {
        const markers = { ...this.gl.get('_markers') };
        delete markers[id];
        this.gl.set('_markers', markers);
        this.send({ kind: 'removeMarker', id });
    }

    // Controls

    public addControl(type: string, position: ControlPosition = 'top-right', options: Record<string, unknown> = {}): void {
        const control = { type, position, options };
        this.gl.set('_controls', { ...this.gl.get('_controls'), [controlKey(type, position)]: control });
        this.send({ kind: 'addControl', control });
    }

    public removeControl(type: string, position: ControlPosition = 'top-right'): void {
        const controls = { ...this.gl.get('_controls') };
        delete controls[controlKey(type, position)];
        this.gl.set('_controls', controls);
        this.send({ kind: 'removeControl', controlType: type, position });
    }

    /**
     * Adds the collapsible visibility/opacity panel. Its rows come from the
     * layer states, which always carry a "Background" entry for the base style.
     */
    public addLayerControl(position: ControlPosition = 'top-right', options: LayerControlOptions = {}): void {
        const states = this.gl.get('_layer_dict');
        if (!states[BACKGROUND_LAYER]) {
            this.writeLayerState(BACKGROUND_LAYER, { name: BACKGROUND_LAYER, visible: true, opacity: 1 });
        }
        this.addControl('layer_control', position, {
            collapsed: options.collapsed ?? true,
            layers: options.layers ?? null,
        });
    }

    // Drawing

    public addDrawControl(position: ControlPosition = 'top-left', options: DrawControlOptions = {}): void {
        this.addControl('draw', position, {
            displayControlsDefault: false,
            controls: {
                point: options.controls?.point ?? true,
                line_string: options.controls?.line_string ?? true,
                polygon: options.controls?.polygon ?? true,
                trash: options.controls?.trash ?? true,
            },
            defaultMode: options.defaultMode ?? 'simple_select',
            keybindings: options.keybindings ?? true,
            touchEnabled: options.touchEnabled ?? true,
        });
    }

    public loadDrawData(data: FeatureCollection | Feature): void {
        const collection: FeatureCollection = data.type === 'FeatureCollection'
            ? data
            : { type: 'FeatureCollection', features: [data] };
        this.gl.set('_draw_data', collection);
        this.send({ kind: 'loadDrawData', data: collection });
    }

    /**
     * The drawn features as last reported by a view. When nothing has been
     * reported yet, open views are asked first; they answer synchronously.
     */
    public getDrawData(): FeatureCollection {
        if (this.gl.get('_draw_data').features.length === 0) {
            this.send({ kind: 'getDrawData' });
        }
        return structuredClone(this.gl.get('_draw_data'));
    }

    public clearDrawData(): void {
        this.gl.set('_draw_data', emptyFeatureCollection());
        this.send({ kind: 'clearDrawData' });
    }

    public deleteDrawFeatures(ids: string[]): void {
        const current = this.gl.get('_draw_data');
        this.gl.set('_draw_data', {
            ...current,
            features: current.features.filter(f => f.id === undefined || !ids.includes(String(f.id))),
        });
        this.send({ kind: 'deleteDrawFeatures', ids });
    }

    /** Modes: simple_select, direct_select (needs featureId), draw_point, draw_line_string, draw_polygon. */
    public setDrawMode(mode: string, featureId?: string): void {
        this.send({ kind: 'setDrawMode', mode, featureId });
    }
}
