// src/protocol/cesium-commands.ts

import type { CallRecord } from '../store/IState';
import type { CesiumLayerRecord, CesiumTerrainRecord } from '../store/backend-traits';
import type { CallRequest } from './call-queue';
import type { DynamicCall } from './dynamic-call';
import { toDynamicCall } from './dynamic-call';
import { CallArgs, isBoolean, isFiniteNumber, isGeoJson, isRecord, isString } from './guards';

export interface CesiumCameraTarget {
    lat: number;
    lng: number;
    height: number;
    heading: number;
    pitch: number;
    duration: number;
}

export type CesiumCommand =
    | { kind: 'flyTo'; target: CesiumCameraTarget }
    | { kind: 'addLayer'; id: string; layer: CesiumLayerRecord }
    | { kind: 'removeLayer'; id: string }
    | { kind: 'setTerrain'; terrain: CesiumTerrainRecord | null }
    | { kind: 'homeView' };

export function isCesiumLayerRecord(value: unknown): value is CesiumLayerRecord {
    if (!isRecord(value)) return false;
    switch (value.type) {
        case 'imagery':
            return isString(value.url) && isFiniteNumber(value.alpha);
        case 'geojson':
            return (isString(value.data) || isGeoJson(value.data)) && isString(value.stroke) &&
                isString(value.fill) && isFiniteNumber(value.strokeWidth) && isBoolean(value.clampToGround);
        case '3dtiles':
            return isString(value.url) && isFiniteNumber(value.maximumScreenSpaceError);
        default:
            return false;
    }
}

export function isCesiumTerrainRecord(value: unknown): value is CesiumTerrainRecord {
    if (!isRecord(value)) return false;
    return value.type === 'ellipsoid' || value.type === 'world' || (value.type === 'url' && isString(value.url));
}

export function encodeCesiumCommand(command: CesiumCommand | DynamicCall): CallRequest {
    switch (command.kind) {
        case 'dynamic':
            return { method: command.method, args: command.args, kwargs: command.kwargs };
        case 'flyTo':
            return { method: 'flyTo', args: [command.target], kwargs: {} };
        case 'addLayer':
            return { method: 'addLayer', args: [command.id, command.layer], kwargs: {} };
        case 'removeLayer':
            return { method: 'removeLayer', args: [command.id], kwargs: {} };
        case 'setTerrain':
            return { method: 'setTerrain', args: [command.terrain], kwargs: {} };
        case 'homeView':
            return { method: 'homeView', args: [], kwargs: {} };
    }
}

export function decodeCesiumCommand(record: CallRecord): CesiumCommand | DynamicCall {
    const a = new CallArgs(record);
    switch (record.method) {
        case 'flyTo': {
            const t = a.object(0, 'target');
            if (!isFiniteNumber(t.lat) || !isFiniteNumber(t.lng) || !isFiniteNumber(t.height)) {
                throw a.fail('"target" needs numeric lat, lng and height');
            }
            return {
                kind: 'flyTo',
                target: {
                    lat: t.lat,
                    lng: t.lng,
                    height: t.height,
                    heading: isFiniteNumber(t.heading) ? t.heading : 0,
                    pitch: isFiniteNumber(t.pitch) ? t.pitch : -90,
                    duration: isFiniteNumber(t.duration) ? t.duration : 3,
                },
            };
        }
        case 'addLayer':
            return { kind: 'addLayer', id: a.string(0, 'id'), layer: a.matching(1, 'layer', isCesiumLayerRecord, 'a Cesium layer record') };
        case 'removeLayer':
            return { kind: 'removeLayer', id: a.string(0, 'id') };
        case 'setTerrain':
            return {
                kind: 'setTerrain',
                terrain: a.has(0, 'terrain') ? a.matching(0, 'terrain', isCesiumTerrainRecord, 'a terrain record') : null,
            };
        case 'homeView':
            return { kind: 'homeView' };
        default:
            return toDynamicCall(record);
    }
}
