// src/protocol/openlayers-commands.ts

import type { CallRecord, LatLng, LatLngBounds } from '../store/IState';
import type { OlVectorStyle, OpenLayersLayerRecord } from '../store/backend-traits';
import type { CallRequest } from './call-queue';
import type { DynamicCall } from './dynamic-call';
import { toDynamicCall } from './dynamic-call';
import { CallArgs, isBoolean, isFiniteNumber, isGeoJson, isRecord, isString } from './guards';

export const OPENLAYERS_CONTROL_TYPES = [
    'zoom', 'rotate', 'attribution', 'scaleline', 'fullscreen', 'mouseposition', 'overviewmap',
] as const;

export type OpenLayersControlType = typeof OPENLAYERS_CONTROL_TYPES[number];

export type OpenLayersCommand =
    | { kind: 'flyTo'; center: LatLng; zoom?: number; duration: number }
    | { kind: 'fitBounds'; bounds: LatLngBounds; padding: number }
    | { kind: 'addLayer'; id: string; layer: OpenLayersLayerRecord }
    | { kind: 'removeLayer'; id: string }
    | { kind: 'setLayerVisibility'; id: string; visible: boolean }
    | { kind: 'setLayerOpacity'; id: string; opacity: number }
    | { kind: 'addControl'; controlType: OpenLayersControlType; options: Record<string, unknown> }
    | { kind: 'removeControl'; controlType: OpenLayersControlType };

export function isOpenLayersControlType(value: unknown): value is OpenLayersControlType {
    return OPENLAYERS_CONTROL_TYPES.some(type => type === value);
}

function isVectorStyle(value: unknown): value is OlVectorStyle {
    return isRecord(value) && isString(value.fillColor) && isString(value.strokeColor) &&
        isFiniteNumber(value.strokeWidth) && isFiniteNumber(value.circleRadius);
}

export function isOpenLayersLayerRecord(value: unknown): value is OpenLayersLayerRecord {
    if (!isRecord(value) || !isFiniteNumber(value.opacity) || !isBoolean(value.visible)) return false;
    switch (value.type) {
        case 'tile':
            return isString(value.url);
        case 'wms':
            return isString(value.url) && isRecord(value.params);
        case 'geojson':
            return (isString(value.data) || isGeoJson(value.data)) && isVectorStyle(value.style);
        case 'mvt-style':
            return isString(value.url);
        case 'marker':
            return Array.isArray(value.coordinates) && value.coordinates.length === 2 &&
                value.coordinates.every(isFiniteNumber) && isString(value.color);
        default:
            return false;
    }
}

export function encodeOpenLayersCommand(command: OpenLayersCommand | DynamicCall): CallRequest {
    switch (command.kind) {
        case 'dynamic':
            return { method: command.method, args: command.args, kwargs: command.kwargs };
        case 'flyTo':
            return {
                method: 'flyTo',
                args: command.zoom === undefined ? [command.center] : [command.center, command.zoom],
                kwargs: { duration: command.duration },
            };
        case 'fitBounds':
            return { method: 'fitBounds', args: [command.bounds], kwargs: { padding: command.padding } };
        case 'addLayer':
            return { method: 'addLayer', args: [command.id, command.layer], kwargs: {} };
        case 'removeLayer':
            return { method: 'removeLayer', args: [command.id], kwargs: {} };
        case 'setLayerVisibility':
            return { method: 'setLayerVisibility', args: [command.id, command.visible], kwargs: {} };
        case 'setLayerOpacity':
            return { method: 'setLayerOpacity', args: [command.id, command.opacity], kwargs: {} };
        case 'addControl':
            return { method: 'addControl', args: [command.controlType, command.options], kwargs: {} };
        case 'removeControl':
            return { method: 'removeControl', args: [command.controlType], kwargs: {} };
    }
}

export function decodeOpenLayersCommand(record: CallRecord): OpenLayersCommand | DynamicCall {
    const a = new CallArgs(record);
    switch (record.method) {
        case 'flyTo':
            return {
                kind: 'flyTo',
                center: a.latLng(0, 'center'),
                zoom: a.optionalNumber(1, 'zoom'),
                duration: a.optionalNumber(2, 'duration') ?? 1000,
            };
        case 'fitBounds':
            return { kind: 'fitBounds', bounds: a.bounds(0, 'bounds'), padding: a.optionalNumber(1, 'padding') ?? 50 };
        case 'addLayer':
            return { kind: 'addLayer', id: a.string(0, 'id'), layer: a.matching(1, 'layer', isOpenLayersLayerRecord, 'an OpenLayers layer record') };
        case 'removeLayer':
            return { kind: 'removeLayer', id: a.string(0, 'id') };
        case 'setLayerVisibility':
            return { kind: 'setLayerVisibility', id: a.string(0, 'id'), visible: a.boolean(1, 'visible') };
        case 'setLayerOpacity':
            return { kind: 'setLayerOpacity', id: a.string(0, 'id'), opacity: a.number(1, 'opacity') };
        case 'addControl':
            return {
                kind: 'addControl',
                controlType: a.matching(0, 'type', isOpenLayersControlType, `one of ${OPENLAYERS_CONTROL_TYPES.join(', ')}`),
                options: a.optionalObject(1, 'options'),
            };
        case 'removeControl':
            return { kind: 'removeControl', controlType: a.matching(0, 'type', isOpenLayersControlType, `one of ${OPENLAYERS_CONTROL_TYPES.join(', ')}`) };
        default:
            return toDynamicCall(record);
    }
}
