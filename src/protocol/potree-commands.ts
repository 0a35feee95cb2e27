// src/protocol/potree-commands.ts

import type { CallRecord } from '../store/IState';
import type { CallRequest } from './call-queue';
import type { DynamicCall } from './dynamic-call';
import { toDynamicCall } from './dynamic-call';
import { CallArgs } from './guards';

export type PotreeCommand =
    | { kind: 'loadPointCloud'; url: string; name: string }
    | { kind: 'removePointCloud'; name: string }
    | { kind: 'fitToScreen' }
    | { kind: 'setCameraPosition'; position: [number, number, number]; target?: [number, number, number] };

function isTriple(value: unknown): value is [number, number, number] {
    return Array.isArray(value) && value.length === 3 && value.every(v => typeof v === 'number' && Number.isFinite(v));
}

export function encodePotreeCommand(command: PotreeCommand | DynamicCall): CallRequest {
    switch (command.kind) {
        case 'dynamic':
            return { method: command.method, args: command.args, kwargs: command.kwargs };
        case 'loadPointCloud':
            return { method: 'loadPointCloud', args: [command.url, command.name], kwargs: {} };
        case 'removePointCloud':
            return { method: 'removePointCloud', args: [command.name], kwargs: {} };
        case 'fitToScreen':
            return { method: 'fitToScreen', args: [], kwargs: {} };
        case 'setCameraPosition':
            return {
                method: 'setCameraPosition',
                args: command.target ? [command.position, command.target] : [command.position],
                kwargs: {},
            };
    }
}

export function decodePotreeCommand(record: CallRecord): PotreeCommand | DynamicCall {
    const a = new CallArgs(record);
    switch (record.method) {
        case 'loadPointCloud':
            return { kind: 'loadPointCloud', url: a.string(0, 'url'), name: a.string(1, 'name') };
        case 'removePointCloud':
            return { kind: 'removePointCloud', name: a.string(0, 'name') };
        case 'fitToScreen':
            return { kind: 'fitToScreen' };
        case 'setCameraPosition':
            return {
                kind: 'setCameraPosition',
                position: a.matching(0, 'position', isTriple, 'an [x, y, z] triple'),
                target: a.has(1, 'target') ? a.matching(1, 'target', isTriple, 'an [x, y, z] triple') : undefined,
            };
        default:
            return toDynamicCall(record);
    }
}
