// src/protocol/guards.ts
// Narrowing helpers for values that arrive over the wire as unknown.

import type { Feature, FeatureCollection, GeoJSON } from 'geojson';
import type { CallRecord, ControlPosition, LatLng, LatLngBounds } from '../store/IState';
import { CONTROL_POSITIONS } from '../store/IState';
import { CommandDecodeError } from '../utils/errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

export function isLatLng(value: unknown): value is LatLng {
    return Array.isArray(value) && value.length === 2 && isFiniteNumber(value[0]) && isFiniteNumber(value[1]);
}

export function isLatLngBounds(value: unknown): value is LatLngBounds {
    return Array.isArray(value) && value.length === 2 && isLatLng(value[0]) && isLatLng(value[1]);
}

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function isControlPosition(value: unknown): value is ControlPosition {
    return CONTROL_POSITIONS.some(position => position === value);
}

export function isGeoJson(value: unknown): value is GeoJSON {
    return isRecord(value) && typeof value.type === 'string';
}

export function isFeature(value: unknown): value is Feature {
    return isRecord(value) && value.type === 'Feature' && 'geometry' in value;
}

export function isFeatureCollection(value: unknown): value is FeatureCollection {
    return isRecord(value) && value.type === 'FeatureCollection' && Array.isArray(value.features);
}

export function emptyFeatureCollection(): FeatureCollection {
    return { type: 'FeatureCollection', features: [] };
}

/**
 * Reads call arguments by position, falling back to the keyword of the same
 * meaning. Every failed read throws CommandDecodeError naming the method.
 */
export class CallArgs {
    constructor(private readonly record: CallRecord) {}

    public get method(): string {
        return this.record.method;
    }

    public value(index: number, keyword?: string): unknown {
        if (index < this.record.args.length) {
            return this.record.args[index];
        }
        return keyword === undefined ? undefined : this.record.kwargs[keyword];
    }

    public has(index: number, keyword?: string): boolean {
        const value = this.value(index, keyword);
        return value !== undefined && value !== null;
    }

    public string(index: number, keyword: string): string {
        const value = this.value(index, keyword);
        if (typeof value !== 'string' || value.length === 0) {
            throw this.fail(`"${keyword}" must be a non-empty string`);
        }
        return value;
    }

    public optionalString(index: number, keyword: string): string | undefined {
        return this.has(index, keyword) ? this.string(index, keyword) : undefined;
    }

    public number(index: number, keyword: string): number {
        const value = this.value(index, keyword);
        if (!isFiniteNumber(value)) {
            throw this.fail(`"${keyword}" must be a finite number`);
        }
        return value;
    }

    public optionalNumber(index: number, keyword: string): number | undefined {
        return this.has(index, keyword) ? this.number(index, keyword) : undefined;
    }

    public boolean(index: number, keyword: string): boolean {
        const value = this.value(index, keyword);
        if (typeof value !== 'boolean') {
            throw this.fail(`"${keyword}" must be a boolean`);
        }
        return value;
    }

    public latLng(index: number, keyword: string): LatLng {
        const value = this.value(index, keyword);
        if (!isLatLng(value)) {
            throw this.fail(`"${keyword}" must be a [lat, lng] pair`);
        }
        return value;
    }

    public bounds(index: number, keyword: string): LatLngBounds {
        const value = this.value(index, keyword);
        if (!isLatLngBounds(value)) {
            throw this.fail(`"${keyword}" must be [[south, west], [north, east]]`);
        }
        return value;
    }

    public object(index: number, keyword: string): Record<string, unknown> {
        const value = this.value(index, keyword);
        if (!isRecord(value)) {
            throw this.fail(`"${keyword}" must be an object`);
        }
        return value;
    }

    public optionalObject(index: number, keyword: string): Record<string, unknown> {
        return this.has(index, keyword) ? this.object(index, keyword) : {};
    }

    public position(index: number, keyword: string, fallback: ControlPosition): ControlPosition {
        const value = this.value(index, keyword);
        if (value === undefined || value === null) return fallback;
        if (!isControlPosition(value)) {
            throw this.fail(`"${keyword}" must be one of ${CONTROL_POSITIONS.join(', ')}`);
        }
        return value;
    }

    public matching<V>(index: number, keyword: string, guard: (value: unknown) => value is V, expected: string): V {
        const value = this.value(index, keyword);
        if (!guard(value)) {
            throw this.fail(`"${keyword}" must be ${expected}`);
        }
        return value;
    }

    public fail(reason: string): CommandDecodeError {
        return new CommandDecodeError(this.record.method, reason);
    }
}

/** Reads an optional field of an options object, keeping it only when the guard accepts it. */
export function pick<V>(source: Record<string, unknown>, key: string, guard: (value: unknown) => value is V): V | undefined {
    const value = source[key];
    return guard(value) ? value : undefined;
}

export function isString(value: unknown): value is string {
    return typeof value === 'string';
}

export function isBoolean(value: unknown): value is boolean {
    return typeof value === 'boolean';
}
