// src/protocol/leaflet-commands.ts

import type { CallRecord, LatLng, LatLngBounds } from '../store/IState';
import type { LeafletLayerRecord, PathStyle } from '../store/backend-traits';
import type { CallRequest } from './call-queue';
import type { DynamicCall } from './dynamic-call';
import { toDynamicCall } from './dynamic-call';
import { CallArgs, isBoolean, isFiniteNumber, isGeoJson, isLatLng, isRecord, isString, pick } from './guards';

export type LeafletCommand =
    | { kind: 'flyTo'; center: LatLng; zoom?: number; duration?: number }
    | { kind: 'setView'; center: LatLng; zoom?: number }
    | { kind: 'panTo'; center: LatLng }
    | { kind: 'fitBounds'; bounds: LatLngBounds; padding?: number }
    | { kind: 'zoomIn'; delta: number }
    | { kind: 'zoomOut'; delta: number }
    | { kind: 'addLayer'; id: string; layer: LeafletLayerRecord }
    | { kind: 'removeLayer'; id: string };

export function encodeLeafletCommand(command: LeafletCommand | DynamicCall): CallRequest {
    switch (command.kind) {
        case 'dynamic':
            return { method: command.method, args: command.args, kwargs: command.kwargs };
        case 'flyTo':
            return {
                method: 'flyTo',
                args: command.zoom === undefined ? [command.center] : [command.center, command.zoom],
                kwargs: command.duration === undefined ? {} : { duration: command.duration },
            };
        case 'setView':
            return { method: 'setView', args: command.zoom === undefined ? [command.center] : [command.center, command.zoom], kwargs: {} };
        case 'panTo':
            return { method: 'panTo', args: [command.center], kwargs: {} };
        case 'fitBounds':
            return { method: 'fitBounds', args: [command.bounds], kwargs: command.padding === undefined ? {} : { padding: command.padding } };
        case 'zoomIn':
        case 'zoomOut':
            return { method: command.kind, args: [command.delta], kwargs: {} };
        case 'addLayer':
            return { method: 'addLayer', args: [command.id, command.layer], kwargs: {} };
        case 'removeLayer':
            return { method: 'removeLayer', args: [command.id], kwargs: {} };
    }
}

function isPathStyle(value: unknown): value is PathStyle {
    if (!isRecord(value)) return false;
    return (value.color === undefined || isString(value.color)) &&
        (value.fillColor === undefined || isString(value.fillColor)) &&
        (value.weight === undefined || isFiniteNumber(value.weight)) &&
        (value.opacity === undefined || isFiniteNumber(value.opacity)) &&
        (value.fillOpacity === undefined || isFiniteNumber(value.fillOpacity));
}

function isLatLngList(value: unknown): value is LatLng[] {
    return Array.isArray(value) && value.length > 0 && value.every(isLatLng);
}

/** Validates a layer record arriving in `_layers` or an addLayer call. */
export function isLeafletLayerRecord(value: unknown): value is LeafletLayerRecord {
    if (!isRecord(value)) return false;
    switch (value.type) {
        case 'tile':
            return isString(value.url) && isString(value.attribution) && isRecord(value.options);
        case 'marker':
            return isLatLng(value.latlng) && isBoolean(value.draggable) &&
                (value.popup === undefined || isString(value.popup)) &&
                (value.tooltip === undefined || isString(value.tooltip)) &&
                (value.icon === undefined || (isRecord(value.icon) && isString(value.icon.iconUrl)));
        case 'circle':
            return isLatLng(value.latlng) && isFiniteNumber(value.radius) && isPathStyle(value.style);
        case 'polygon':
        case 'polyline':
            return isLatLngList(value.latlngs) && isPathStyle(value.style);
        case 'geojson':
            return isGeoJson(value.data) && isPathStyle(value.style) &&
                (value.popup_property === undefined || isString(value.popup_property));
        case 'geotiff':
            return isString(value.url) && isBoolean(value.fit_bounds) &&
                isFiniteNumber(value.opacity) && isFiniteNumber(value.resolution);
        default:
            return false;
    }
}

export function decodeLeafletCommand(record: CallRecord): LeafletCommand | DynamicCall {
    const a = new CallArgs(record);
    switch (record.method) {
        case 'flyTo':
            return {
                kind: 'flyTo',
                center: a.latLng(0, 'center'),
                zoom: a.optionalNumber(1, 'zoom'),
                duration: pick(record.kwargs, 'duration', isFiniteNumber),
            };
        case 'setView':
            return { kind: 'setView', center: a.latLng(0, 'center'), zoom: a.optionalNumber(1, 'zoom') };
        case 'panTo':
            return { kind: 'panTo', center: a.latLng(0, 'center') };
        case 'fitBounds':
            return { kind: 'fitBounds', bounds: a.bounds(0, 'bounds'), padding: pick(record.kwargs, 'padding', isFiniteNumber) };
        case 'zoomIn':
            return { kind: 'zoomIn', delta: a.optionalNumber(0, 'delta') ?? 1 };
        case 'zoomOut':
            return { kind: 'zoomOut', delta: a.optionalNumber(0, 'delta') ?? 1 };
        case 'addLayer':
            return { kind: 'addLayer', id: a.string(0, 'id'), layer: a.matching(1, 'layer', isLeafletLayerRecord, 'a Leaflet layer record') };
        case 'removeLayer':
            return { kind: 'removeLayer', id: a.string(0, 'id') };
        default:
            return toDynamicCall(record);
    }
}
