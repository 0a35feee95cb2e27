// src/protocol/gl-commands.ts
// Commands understood by the GL views (MapLibre, Mapbox and the deck.gl base map).
// The command kinds double as wire method names.

import type { FeatureCollection } from 'geojson';
import type { CallRecord, ControlPosition, ControlRecord, LatLng, LatLngBounds } from '../store/IState';
import type { GlSpecTypes, MarkerRecord } from '../store/backend-traits';
import type { CallRequest } from './call-queue';
import type { DynamicCall } from './dynamic-call';
import { toDynamicCall } from './dynamic-call';
import { CallArgs, isBoolean, isControlPosition, isFeatureCollection, isFiniteNumber, isLatLng, isRecord, isString, isStringArray, pick } from './guards';

export type { GlSpecTypes };

/** Structural checks that admit a wire value as one of the library's spec types. */
export interface GlSpecGuards<S extends GlSpecTypes> {
    isLayer(value: unknown): value is S['layer'];
    isSource(value: unknown): value is S['source'];
    isStyle(value: unknown): value is S['style'];
    isProjection(value: unknown): value is S['projection'];
    isTerrain(value: unknown): value is S['terrain'];
}

export interface CameraOptions {
    center?: LatLng;
    zoom?: number;
    bearing?: number;
    pitch?: number;
    duration?: number;
}

export type GlCommand<S extends GlSpecTypes> =
    | { kind: 'flyTo'; camera: CameraOptions }
    | { kind: 'jumpTo'; camera: CameraOptions }
    | { kind: 'fitBounds'; bounds: LatLngBounds; padding: number; duration?: number }
    | { kind: 'addSource'; id: string; source: S['source'] }
    | { kind: 'removeSource'; id: string }
    | { kind: 'addLayer'; layer: S['layer']; beforeId?: string }
    | { kind: 'removeLayer'; id: string }
    | { kind: 'setStyle'; style: string | S['style'] }
    | { kind: 'setProjection'; projection: S['projection'] }
    | { kind: 'setTerrain'; terrain: S['terrain'] | null }
    | { kind: 'setLayoutProperty'; layerId: string; name: string; value: unknown }
    | { kind: 'setPaintProperty'; layerId: string; name: string; value: unknown }
    | { kind: 'setVisibility'; layerId: string; visible: boolean }
    | { kind: 'setOpacity'; layerId: string; opacity: number }
    | { kind: 'addMarker'; id: string; marker: MarkerRecord }
    | { kind: 'removeMarker'; id: string }
    | { kind: 'addControl'; control: ControlRecord }
    | { kind: 'removeControl'; controlType: string; position: ControlPosition }
    | { kind: 'loadDrawData'; data: FeatureCollection }
    | { kind: 'getDrawData' }
    | { kind: 'clearDrawData' }
    | { kind: 'deleteDrawFeatures'; ids: string[] }
    | { kind: 'setDrawMode'; mode: string; featureId?: string }
    | { kind: 'addTerraDrawControl'; control: ControlRecord }
    | { kind: 'loadTerraDrawData'; data: FeatureCollection }
    | { kind: 'getTerraDrawData' }
    | { kind: 'clearTerraDrawData' };

export type GlCommandKind = GlCommand<GlSpecTypes>['kind'];

function cameraArgs(camera: CameraOptions): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    if (camera.center) out.center = camera.center;
    if (camera.zoom !== undefined) out.zoom = camera.zoom;
    if (camera.bearing !== undefined) out.bearing = camera.bearing;
    if (camera.pitch !== undefined) out.pitch = camera.pitch;
    if (camera.duration !== undefined) out.duration = camera.duration;
    return out;
}

function request(method: string, ...args: unknown[]): CallRequest {
    return { method, args, kwargs: {} };
}

export function encodeGlCommand<S extends GlSpecTypes>(command: GlCommand<S> | DynamicCall): CallRequest {
    switch (command.kind) {
        case 'dynamic':
            return { method: command.method, args: command.args, kwargs: command.kwargs };
        case 'flyTo':
        case 'jumpTo':
            return request(command.kind, cameraArgs(command.camera));
        case 'fitBounds':
            return request('fitBounds', command.bounds,
                command.duration === undefined
                    ? { padding: command.padding }
                    : { padding: command.padding, duration: command.duration });
        case 'addSource':
            return request('addSource', command.id, command.source);
        case 'removeSource':
        case 'removeLayer':
        case 'removeMarker':
            return request(command.kind, command.id);
        case 'addLayer':
            return command.beforeId ? request('addLayer', command.layer, command.beforeId) : request('addLayer', command.layer);
        case 'setStyle':
            return request('setStyle', command.style);
        case 'setProjection':
            return request('setProjection', command.projection);
        case 'setTerrain':
            return request('setTerrain', command.terrain);
        case 'setLayoutProperty':
        case 'setPaintProperty':
            return request(command.kind, command.layerId, command.name, command.value);
        case 'setVisibility':
            return request('setVisibility', command.layerId, command.visible);
        case 'setOpacity':
            return request('setOpacity', command.layerId, command.opacity);
        case 'addMarker':
            return request('addMarker', command.id, command.marker);
        case 'addControl':
            return request('addControl', command.control.type, command.control.position, command.control.options);
        case 'removeControl':
            return request('removeControl', command.controlType, command.position);
        case 'loadDrawData':
            return request('loadDrawData', command.data);
        case 'getDrawData':
        case 'clearDrawData':
            return request(command.kind);
        case 'deleteDrawFeatures':
            return request('deleteDrawFeatures', command.ids);
        case 'setDrawMode':
            return command.featureId ? request('setDrawMode', command.mode, command.featureId) : request('setDrawMode', command.mode);
        case 'addTerraDrawControl':
            return request('addTerraDrawControl', { ...command.control.options, position: command.control.position });
        case 'loadTerraDrawData':
            return request('loadTerraDrawData', command.data);
        case 'getTerraDrawData':
        case 'clearTerraDrawData':
            return request(command.kind);
    }
}

function readCamera(options: Record<string, unknown>): CameraOptions {
    return {
        center: pick(options, 'center', isLatLng),
        zoom: pick(options, 'zoom', isFiniteNumber),
        bearing: pick(options, 'bearing', isFiniteNumber),
        pitch: pick(options, 'pitch', isFiniteNumber),
        duration: pick(options, 'duration', isFiniteNumber),
    };
}

function isMarkerRecord(value: unknown): value is MarkerRecord {
    if (!isRecord(value)) return false;
    const c = value.coordinates;
    return Array.isArray(c) && c.length === 2 && isFiniteNumber(c[0]) && isFiniteNumber(c[1]) &&
        (value.popup === undefined || isString(value.popup)) &&
        (value.color === undefined || isString(value.color)) &&
        (value.draggable === undefined || isBoolean(value.draggable));
}

/**
 * Turns a call record into a command. Methods outside the command set become
 * a DynamicCall; a known method with unusable arguments throws.
 */
export function decodeGlCommand<S extends GlSpecTypes>(record: CallRecord, guards: GlSpecGuards<S>): GlCommand<S> | DynamicCall {
    const a = new CallArgs(record);
    switch (record.method) {
        case 'flyTo':
        case 'jumpTo': {
            const camera = readCamera(a.optionalObject(0, 'options'));
            return record.method === 'flyTo' ? { kind: 'flyTo', camera } : { kind: 'jumpTo', camera };
        }
        case 'fitBounds': {
            const options = a.optionalObject(1, 'options');
            return {
                kind: 'fitBounds',
                bounds: a.bounds(0, 'bounds'),
                padding: pick(options, 'padding', isFiniteNumber) ?? 50,
                duration: pick(options, 'duration', isFiniteNumber),
            };
        }
        case 'addSource':
            return { kind: 'addSource', id: a.string(0, 'id'), source: a.matching(1, 'source', guards.isSource, 'a source specification') };
        case 'removeSource':
            return { kind: 'removeSource', id: a.string(0, 'id') };
        case 'addLayer':
            return {
                kind: 'addLayer',
                layer: a.matching(0, 'layer', guards.isLayer, 'a layer specification with id and type'),
                beforeId: a.optionalString(1, 'beforeId'),
            };
        case 'removeLayer':
            return { kind: 'removeLayer', id: a.string(0, 'id') };
        case 'setStyle': {
            const style = a.value(0, 'style');
            if (typeof style === 'string' && style.length > 0) return { kind: 'setStyle', style };
            return { kind: 'setStyle', style: a.matching(0, 'style', guards.isStyle, 'a style URL or style object') };
        }
        case 'setProjection':
            return { kind: 'setProjection', projection: a.matching(0, 'projection', guards.isProjection, 'a projection specification') };
        case 'setTerrain':
            return {
                kind: 'setTerrain',
                terrain: a.has(0, 'terrain') ? a.matching(0, 'terrain', guards.isTerrain, 'a terrain specification') : null,
            };
        case 'setLayoutProperty':
        case 'setPaintProperty': {
            const layerId = a.string(0, 'layerId');
            const name = a.string(1, 'name');
            const value = a.value(2, 'value');
            return record.method === 'setLayoutProperty'
                ? { kind: 'setLayoutProperty', layerId, name, value }
                : { kind: 'setPaintProperty', layerId, name, value };
        }
        case 'setVisibility':
            return { kind: 'setVisibility', layerId: a.string(0, 'layerId'), visible: a.boolean(1, 'visible') };
        case 'setOpacity':
            return { kind: 'setOpacity', layerId: a.string(0, 'layerId'), opacity: a.number(1, 'opacity') };
        case 'addMarker':
            return { kind: 'addMarker', id: a.string(0, 'id'), marker: a.matching(1, 'marker', isMarkerRecord, 'a marker with [lng, lat] coordinates') };
        case 'removeMarker':
            return { kind: 'removeMarker', id: a.string(0, 'id') };
        case 'addControl':
            return {
                kind: 'addControl',
                control: {
                    type: a.string(0, 'type'),
                    position: a.position(1, 'position', 'top-right'),
                    options: a.optionalObject(2, 'options'),
                },
            };
        case 'removeControl':
            return { kind: 'removeControl', controlType: a.string(0, 'type'), position: a.position(1, 'position', 'top-right') };
        case 'loadDrawData':
            return { kind: 'loadDrawData', data: a.matching(0, 'data', isFeatureCollection, 'a GeoJSON FeatureCollection') };
        case 'getDrawData':
            return { kind: 'getDrawData' };
        case 'clearDrawData':
            return { kind: 'clearDrawData' };
        case 'deleteDrawFeatures':
            return { kind: 'deleteDrawFeatures', ids: a.matching(0, 'ids', isStringArray, 'a list of feature ids') };
        case 'setDrawMode':
            return { kind: 'setDrawMode', mode: a.string(0, 'mode'), featureId: a.optionalString(1, 'featureId') };
        case 'addTerraDrawControl': {
            const { position, ...options } = a.optionalObject(0, 'options');
            return {
                kind: 'addTerraDrawControl',
                control: { type: 'terra_draw', position: isControlPosition(position) ? position : 'top-left', options },
            };
        }
        case 'loadTerraDrawData':
            return { kind: 'loadTerraDrawData', data: a.matching(0, 'data', isFeatureCollection, 'a GeoJSON FeatureCollection') };
        case 'getTerraDrawData':
            return { kind: 'getTerraDrawData' };
        case 'clearTerraDrawData':
            return { kind: 'clearTerraDrawData' };
        default:
            return toDynamicCall(record);
    }
}
