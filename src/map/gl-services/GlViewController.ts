// src/map/gl-services/GlViewController.ts
// View logic shared by the MapLibre, Mapbox and deck.gl renderers. Talks to
// the map only through a GlMapPort, so the same replay, commands and event
// wiring serve every GL library.

import MapboxDraw from '@mapbox/mapbox-gl-draw';
import isEqual from 'lodash/isEqual';
import type { Feature, FeatureCollection } from 'geojson';
import type { ControlRecord, LngLatTuple } from '../../store/IState';
import { controlKey } from '../../store/IState';
import type { WidgetModel } from '../../store/trait-store';
import type { GlSpecTypes, GlTraits, LayerState, MarkerRecord } from '../../store/backend-traits';
import { BACKGROUND_LAYER, layerReplayOrder } from '../../store/backend-traits';
import type { GlCommand, GlCommandKind } from '../../protocol/gl-commands';
import type { DynamicCall } from '../../protocol/dynamic-call';
import { isFeature, isRecord, isStringArray } from '../../protocol/guards';
import drawStyles from '../../config/data/draw-styles.json';
import {
    AnymapLayerControl,
    LAYER_OPACITY_EVENT,
    LAYER_VISIBILITY_EVENT,
    readOpacityDetail,
    readVisibilityDetail,
} from '../../components/modules/anymap-layer-control';
import type { LayerControlRow } from '../../components/modules/anymap-layer-control';
import type { GlMapPort, Removable, TerraDrawHandle } from '../IMapInterfaces';
import type { ViewSession } from '../view-support';
import { cameraSync } from '../view-support';

/** Paint properties that carry a layer's opacity, by layer type. */
export const OPACITY_PROPERTIES: Readonly<Record<string, readonly string[]>> = {
    fill: ['fill-opacity'],
    line: ['line-opacity'],
    circle: ['circle-opacity'],
    raster: ['raster-opacity'],
    'fill-extrusion': ['fill-extrusion-opacity'],
    heatmap: ['heatmap-opacity'],
    background: ['background-opacity'],
    symbol: ['icon-opacity', 'text-opacity'],
};

// Commands whose effect lives in a trait the view replays on first render.
const REPLAYED_KINDS: ReadonlySet<string> = new Set<GlCommandKind>([
    'addSource',
    'removeSource',
    'addLayer',
    'removeLayer',
    'setStyle',
    'setProjection',
    'setTerrain',
    'setVisibility',
    'setOpacity',
    'addMarker',
    'removeMarker',
    'addControl',
    'removeControl',
    'loadDrawData',
    'clearDrawData',
    'deleteDrawFeatures',
    'addTerraDrawControl',
    'loadTerraDrawData',
    'clearTerraDrawData',
]);

const DRAW_CHANGE_EVENTS = ['draw.create', 'draw.update', 'draw.delete'] as const;

/** True for a queued command that the trait replay has already applied. */
export function isReplayedGlCommand(command: { kind: string }): boolean {
    return REPLAYED_KINDS.has(command.kind);
}

/** Layers the draw control puts in the style; they never count as base layers. */
export function isDrawLayer(id: string): boolean {
    return id.startsWith('gl-draw-') || id.startsWith('anymap-draw-');
}

function eventFeatures(event: unknown): Feature[] {
    if (!isRecord(event) || !Array.isArray(event.features)) return [];
    return event.features.filter(isFeature);
}

function drawOptions(options: Record<string, unknown>): MapboxDraw.MapboxDrawOptions {
    const result: MapboxDraw.MapboxDrawOptions = { styles: drawStyles };
    if (typeof options.displayControlsDefault === 'boolean') result.displayControlsDefault = options.displayControlsDefault;
    if (typeof options.keybindings === 'boolean') result.keybindings = options.keybindings;
    if (typeof options.touchEnabled === 'boolean') result.touchEnabled = options.touchEnabled;
    if (typeof options.boxSelect === 'boolean') result.boxSelect = options.boxSelect;
    if (typeof options.defaultMode === 'string') result.defaultMode = options.defaultMode;
    const controls = options.controls;
    if (isRecord(controls)) {
        const enabled: MapboxDraw.MapboxDrawControls = {};
        for (const name of ['point', 'line_string', 'polygon', 'trash', 'combine_features', 'uncombine_features'] as const) {
            const value = controls[name];
            if (typeof value === 'boolean') enabled[name] = value;
        }
        result.controls = enabled;
    }
    return result;
}

interface LayerControlHandle {
    element: AnymapLayerControl;
    /** Layer ids to list; every layer state when null */
    filter: string[] | null;
}

export class GlViewController<S extends GlSpecTypes> {
    private readonly markers = new Map<string, Removable>();
    private readonly controls = new Map<string, Removable>();
    private draw: MapboxDraw | null = null;
    private terraDraw: TerraDrawHandle | null = null;
    private drawPrepared = false;
    private layerControl: LayerControlHandle | null = null;
    private appliedStates: Record<string, LayerState> = {};

    constructor(
        private readonly port: GlMapPort<S>,
        private readonly model: WidgetModel<GlTraits<S>>,
        private readonly session: ViewSession
    ) {}

    /**
     * Wires the camera traits now and, once the map has loaded, replays the
     * persisted state, attaches the map events and calls `onReady`, which is
     * where the renderer starts its call dispatcher.
     */
    public start(onReady: () => void): void {
        this.watchCamera();
        this.port.onLoad(() => {
            this.replay();
            this.watchState();
            this.attachEvents();
            onReady();
            this.session.events.send('load');
        });
    }

    public execute(command: GlCommand<S> | DynamicCall): void {
        const { port } = this;
        switch (command.kind) {
            case 'dynamic':
                port.invoke(command);
                return;
            case 'flyTo':
                port.flyTo(command.camera);
                return;
            case 'jumpTo':
                port.jumpTo(command.camera);
                return;
            case 'fitBounds':
                port.fitBounds(command.bounds, command.padding, command.duration);
                return;
            case 'addSource':
                this.addSource(command.id, command.source);
                return;
            case 'removeSource':
                this.removeSource(command.id);
                return;
            case 'addLayer':
                this.addLayer(command.layer, command.beforeId);
                return;
            case 'removeLayer':
                if (port.hasLayer(command.id)) port.removeLayer(command.id);
                delete this.appliedStates[command.id];
                this.refreshLayerControl();
                return;
            case 'setStyle':
                this.applyStyle(command.style);
                return;
            case 'setProjection':
                port.setProjection(command.projection);
                return;
            case 'setTerrain':
                port.setTerrain(command.terrain);
                return;
            case 'setLayoutProperty':
                port.setLayoutProperty(command.layerId, command.name, command.value);
                return;
            case 'setPaintProperty':
                port.setPaintProperty(command.layerId, command.name, command.value);
                return;
            case 'setVisibility':
                this.targetLayers(command.layerId).forEach(id => this.setLayerVisibility(id, command.visible));
                return;
            case 'setOpacity':
                this.targetLayers(command.layerId).forEach(id => this.setLayerOpacity(id, command.opacity));
                return;
            case 'addMarker':
                this.addMarker(command.id, command.marker);
                return;
            case 'removeMarker':
                this.markers.get(command.id)?.remove();
                this.markers.delete(command.id);
                return;
            case 'addControl':
                this.addControl(command.control);
                return;
            case 'removeControl':
                this.removeControl(controlKey(command.controlType, command.position));
                return;
            case 'loadDrawData':
                this.withDraw(command.kind, draw => {
                    draw.deleteAll();
                    draw.set(command.data);
                });
                return;
            case 'getDrawData':
                this.withDraw(command.kind, () => this.publishDrawData());
                return;
            case 'clearDrawData':
                this.withDraw(command.kind, draw => {
                    draw.deleteAll();
                    this.publishDrawData();
                });
                return;
            case 'deleteDrawFeatures':
                this.withDraw(command.kind, draw => {
                    draw.delete(command.ids);
                    this.publishDrawData();
                });
                return;
            case 'setDrawMode':
                this.withDraw(command.kind, draw => {
                    if (command.mode === 'direct_select') {
                        if (!command.featureId) throw new Error('direct_select needs a featureId');
                        draw.changeMode('direct_select', { featureId: command.featureId });
                    } else {
                        draw.changeMode(command.mode);
                    }
                });
                return;
            case 'addTerraDrawControl':
                this.addControl(command.control);
                return;
            case 'loadTerraDrawData':
                this.withTerraDraw(command.kind, terraDraw => {
                    this.loadTerraDraw(terraDraw, command.data);
                    this.publishTerraDrawData();
                });
                return;
            case 'getTerraDrawData':
                this.withTerraDraw(command.kind, () => this.publishTerraDrawData());
                return;
            case 'clearTerraDrawData':
                this.withTerraDraw(command.kind, terraDraw => {
                    terraDraw.clear();
                    this.publishTerraDrawData();
                });
                return;
        }
    }

    public dispose(): void {
        this.markers.forEach(marker => marker.remove());
        this.markers.clear();
        this.controls.forEach(control => control.remove());
        this.controls.clear();
        this.draw = null;
        this.terraDraw = null;
        this.layerControl = null;
    }

    // Replay

    private replay(): void {
        const { model, session } = this;
        this.replayStyleContent();
        Object.entries(model.get('_markers')).forEach(([id, marker]) =>
            session.guard(`replay marker ${id}`, () => this.addMarker(id, marker)));
        Object.values(model.get('_controls')).forEach(control =>
            session.guard(`replay control ${control.type}`, () => this.addControl(control)));
        this.replayProjectionAndTerrain();
    }

    /** Everything a style change wipes: sources, layers and their states. */
    private replayStyleContent(): void {
        const { model, session } = this;
        Object.entries(model.get('_sources')).forEach(([id, source]) =>
            session.guard(`replay source ${id}`, () => this.addSource(id, source)));
        const layers = model.get('_layers');
        const beforeIds = model.get('_before_ids');
        layerReplayOrder(Object.keys(layers), beforeIds).forEach(id => {
            const layer = layers[id];
            if (layer) session.guard(`replay layer ${id}`, () => this.addLayer(layer, beforeIds[id]));
        });
        this.appliedStates = {};
        this.applyLayerStates();
    }

    private replayProjectionAndTerrain(): void {
        const { model, port, session } = this;
        const projection = model.get('_projection');
        if (projection !== null) session.guard('replay projection', () => port.setProjection(projection));
        const terrain = model.get('_terrain');
        if (terrain !== null) session.guard('replay terrain', () => port.setTerrain(terrain));
    }

    // Trait watches

    private watchCamera(): void {
        const { model, port, session } = this;
        session.watch(model, 'center', () => port.jumpTo({ center: model.get('center') }));
        session.watch(model, 'zoom', () => port.jumpTo({ zoom: model.get('zoom') }));
        session.watch(model, 'bearing', () => port.jumpTo({ bearing: model.get('bearing') }));
        session.watch(model, 'pitch', () => port.jumpTo({ pitch: model.get('pitch') }));
    }

    private watchState(): void {
        const { model, session } = this;
        session.watch(model, 'style', () => session.guard('setStyle', () => this.applyStyle(model.get('style'))));
        session.watch(model, '_layer_dict', () => session.guard('layer states', () => this.applyLayerStates()));
        session.watch(model, '_draw_data', () => {
            const draw = this.draw;
            const data = model.get('_draw_data');
            if (draw && !isEqual(draw.getAll(), data)) {
                session.guard('draw data', () => draw.set(data));
            }
        });
        session.watch(model, '_terra_draw_data', () => {
            const terraDraw = this.terraDraw;
            const data = model.get('_terra_draw_data');
            if (terraDraw && !isEqual(terraDraw.snapshot(), data)) {
                session.guard('Terra Draw data', () => this.loadTerraDraw(terraDraw, data));
            }
        });
    }

    private applyStyle(style: string | S['style']): void {
        this.port.setStyle(style);
        this.port.onceStyleLoad(() => {
            this.replayStyleContent();
            this.replayProjectionAndTerrain();
        });
    }

    // Sources and layers

    private addSource(id: string, source: S['source']): void {
        const { port } = this;
        if (!port.hasSource(id)) {
            port.addSource(id, source);
            return;
        }
        // Same id again replaces the source; its layers come back on top of it.
        const dependents = this.layersOnSource(id).filter(layer => port.hasLayer(layer.id));
        dependents.forEach(layer => port.removeLayer(layer.id));
        port.removeSource(id);
        port.addSource(id, source);
        dependents.forEach(layer => port.addLayer(layer));
    }

    private removeSource(id: string): void {
        const { port } = this;
        this.layersOnSource(id).forEach(layer => {
            if (port.hasLayer(layer.id)) port.removeLayer(layer.id);
        });
        if (port.hasSource(id)) port.removeSource(id);
    }

    private layersOnSource(sourceId: string): Array<S['layer']> {
        return Object.values(this.model.get('_layers')).filter(layer => Reflect.get(layer, 'source') === sourceId);
    }

    private addLayer(layer: S['layer'], beforeId?: string): void {
        const { port } = this;
        if (port.hasLayer(layer.id)) port.removeLayer(layer.id);
        if (beforeId && !port.hasLayer(beforeId)) {
            console.warn(`[LAYER SERVICE] ${port.library}: layer "${beforeId}" not found, adding "${layer.id}" on top.`);
            port.addLayer(layer);
        } else {
            port.addLayer(layer, beforeId);
        }
        this.refreshLayerControl();
    }

    /** The style layers a layer-state key stands for. */
    private targetLayers(layerId: string): string[] {
        if (layerId !== BACKGROUND_LAYER) return this.port.hasLayer(layerId) ? [layerId] : [];
        const own = this.model.get('_layers');
        return this.port.styleLayerIds().filter(id => !(id in own) && !isDrawLayer(id));
    }

    private setLayerVisibility(id: string, visible: boolean): void {
        this.port.setLayoutProperty(id, 'visibility', visible ? 'visible' : 'none');
    }

    private setLayerOpacity(id: string, opacity: number): void {
        const type = this.port.layerType(id);
        const properties = type === undefined ? undefined : OPACITY_PROPERTIES[type];
        properties?.forEach(name => this.port.setPaintProperty(id, name, opacity));
    }

    private applyLayerStates(): void {
        const states = this.model.get('_layer_dict');
        Object.entries(states).forEach(([id, state]) => {
            if (isEqual(this.appliedStates[id], state)) return;
            this.targetLayers(id).forEach(target => {
                this.setLayerVisibility(target, state.visible);
                this.setLayerOpacity(target, state.opacity);
            });
        });
        this.appliedStates = structuredClone(states);
        this.refreshLayerControl();
    }

    // Markers

    private addMarker(id: string, marker: MarkerRecord): void {
        this.markers.get(id)?.remove();
        this.markers.set(id, this.port.addMarker(marker, lngLat => this.onMarkerMoved(id, lngLat)));
    }

    private onMarkerMoved(id: string, lngLat: LngLatTuple): void {
        const markers = this.model.get('_markers');
        const current = markers[id];
        if (current) {
            this.model.set('_markers', { ...markers, [id]: { ...current, coordinates: lngLat } });
        }
        this.session.events.send('marker_dragend', { id, lngLat });
    }

    // Controls

    private addControl(control: ControlRecord): void {
        const key = controlKey(control.type, control.position);
        if (this.controls.has(key)) {
            console.warn(`[CORE SERVICE] ${this.port.library}: control "${key}" is already on the map.`);
            return;
        }
        const handle = this.createControl(control);
        if (handle) this.controls.set(key, handle);
    }

    private createControl(control: ControlRecord): Removable | null {
        switch (control.type) {
            case 'draw':
                return this.addDrawControl(control);
            case 'layer_control':
                return this.addLayerControl(control);
            case 'terra_draw':
                return this.addTerraDrawControl(control);
            default: {
                const handle = this.port.addLibraryControl(control);
                if (!handle) {
                    console.warn(`[CORE SERVICE] ${this.port.library}: unknown control type "${control.type}", skipped.`);
                }
                return handle;
            }
        }
    }

    private removeControl(key: string): void {
        const handle = this.controls.get(key);
        if (!handle) return;
        handle.remove();
        this.controls.delete(key);
    }

    private addDrawControl(control: ControlRecord): Removable | null {
        if (this.draw) {
            console.warn(`[CORE SERVICE] ${this.port.library}: only one draw control per map.`);
            return null;
        }
        if (!this.drawPrepared) {
            this.port.prepareDraw();
            this.drawPrepared = true;
        }
        const draw = new MapboxDraw(drawOptions(control.options));
        const handle = this.port.addDrawControl(draw, control.position);
        this.draw = draw;
        const data = this.model.get('_draw_data');
        if (data.features.length > 0) draw.set(data);
        return {
            remove: () => {
                handle.remove();
                if (this.draw === draw) this.draw = null;
            },
        };
    }

    private withDraw(method: string, action: (draw: MapboxDraw) => void): void {
        if (!this.draw) {
            console.warn(`[CORE SERVICE] ${this.port.library}: ${method} needs a draw control.`);
            return;
        }
        action(this.draw);
    }

    /** Writes what the draw control holds to `_draw_data`. */
    private publishDrawData(): FeatureCollection | null {
        if (!this.draw) return null;
        const data = this.draw.getAll();
        this.model.set('_draw_data', data);
        this.model.save_changes();
        return data;
    }

    private addTerraDrawControl(control: ControlRecord): Removable | null {
        const { port } = this;
        if (!port.addTerraDrawControl) {
            console.warn(`[CORE SERVICE] ${port.library}: Terra Draw is not available on this map.`);
            return null;
        }
        if (this.terraDraw) {
            console.warn(`[CORE SERVICE] ${port.library}: only one Terra Draw control per map.`);
            return null;
        }
        const terraDraw = port.addTerraDrawControl(control.options, control.position);
        this.terraDraw = terraDraw;
        const data = this.model.get('_terra_draw_data');
        if (data.features.length > 0) this.loadTerraDraw(terraDraw, data);
        const unsubscribe = terraDraw.onChange(() => {
            const allData = this.publishTerraDrawData();
            if (allData) this.session.events.send('terra_draw.change', { allData });
        });
        return {
            remove: () => {
                unsubscribe();
                terraDraw.remove();
                if (this.terraDraw === terraDraw) this.terraDraw = null;
            },
        };
    }

    private loadTerraDraw(terraDraw: TerraDrawHandle, data: FeatureCollection): void {
        const rejected = terraDraw.load(data);
        if (rejected.length > 0) {
            console.warn(`[CORE SERVICE] ${this.port.library}: Terra Draw rejected features ${rejected.join(', ')}.`);
        }
    }

    private withTerraDraw(method: string, action: (terraDraw: TerraDrawHandle) => void): void {
        if (!this.terraDraw) {
            console.warn(`[CORE SERVICE] ${this.port.library}: ${method} needs a Terra Draw control.`);
            return;
        }
        action(this.terraDraw);
    }

    /** Writes what the Terra Draw control holds to `_terra_draw_data`. */
    private publishTerraDrawData(): FeatureCollection | null {
        if (!this.terraDraw) return null;
        const data = this.terraDraw.snapshot();
        this.model.set('_terra_draw_data', data);
        this.model.save_changes();
        return data;
    }

    private addLayerControl(control: ControlRecord): Removable {
        const element = new AnymapLayerControl();
        element.collapsed = control.options.collapsed !== false;
        const layers = control.options.layers;

        const onVisibility = (event: Event): void => {
            const detail = readVisibilityDetail(event);
            if (detail) this.changeLayerState(detail.layerId, { visible: detail.visible }, 'layer_visibility');
        };
        const onOpacity = (event: Event): void => {
            const detail = readOpacityDetail(event);
            if (detail) this.changeLayerState(detail.layerId, { opacity: detail.opacity }, 'layer_opacity');
        };
        element.addEventListener(LAYER_VISIBILITY_EVENT, onVisibility);
        element.addEventListener(LAYER_OPACITY_EVENT, onOpacity);

        this.layerControl = { element, filter: isStringArray(layers) ? layers : null };
        this.refreshLayerControl();
        const handle = this.port.addElementControl(element, control.position);
        return {
            remove: () => {
                element.removeEventListener(LAYER_VISIBILITY_EVENT, onVisibility);
                element.removeEventListener(LAYER_OPACITY_EVENT, onOpacity);
                handle.remove();
                if (this.layerControl?.element === element) this.layerControl = null;
            },
        };
    }

    private refreshLayerControl(): void {
        if (!this.layerControl) return;
        const { element, filter } = this.layerControl;
        const states = this.model.get('_layer_dict');
        const ids = filter ?? Object.keys(states);
        element.layers = ids.flatMap((id): LayerControlRow[] => {
            const state = states[id];
            return state ? [{ id, name: state.name, visible: state.visible, opacity: state.opacity }] : [];
        });
    }

    /** A change made in the layer control: persisted first, applied by the `_layer_dict` watch. */
    private changeLayerState(layerId: string, change: Partial<LayerState>, eventType: string): void {
        const states = this.model.get('_layer_dict');
        const current: Partial<LayerState> = states[layerId];
        const next: LayerState = { name: layerId, visible: true, opacity: 1, ...current, ...change };
        this.model.set('_layer_dict', { ...states, [layerId]: next });
        this.model.save_changes();
        this.session.events.send(eventType, { layerId, ...change });
    }

    // Map events

    private attachEvents(): void {
        const { port, session, model } = this;
        const { events, disposables } = session;
        disposables.add(port.onClick((lngLat, point) => events.send('click', { lngLat, point })));

        const pushCamera = cameraSync(model, () => port.getCamera(), disposables);
        disposables.add(port.on('moveend', () => {
            const camera = port.getCamera();
            events.send('moveend', {
                center: camera.center,
                zoom: camera.zoom,
                bearing: camera.bearing,
                pitch: camera.pitch,
            });
            pushCamera();
        }));
        disposables.add(port.on('zoomend', () => events.send('zoomend', { zoom: port.getCamera().zoom })));

        DRAW_CHANGE_EVENTS.forEach(type => {
            disposables.add(port.on(type, event => {
                const allData = this.publishDrawData();
                if (allData) events.send(type, { features: eventFeatures(event), allData });
            }));
        });
        disposables.add(port.on('draw.selectionchange', event =>
            events.send('draw.selectionchange', { features: eventFeatures(event) })));
    }
}
