// src/store/IState.ts
// Wire records and the trait set every widget carries.
// Trait names are the contract between host and view; keep them stable.

/** [latitude, longitude], the order the host API speaks. */
export type LatLng = [number, number];

/** [longitude, latitude], the order GL libraries and GeoJSON speak. */
export type LngLatTuple = [number, number];

/** [[south, west], [north, east]] as two LatLng corners. */
export type LatLngBounds = [LatLng, LatLng];

export type ControlPosition = 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right';

export const CONTROL_POSITIONS: readonly ControlPosition[] = ['top-left', 'top-right', 'bottom-left', 'bottom-right'];

export interface CallRecord {
    id: number;
    method: string;
    args: unknown[];
    kwargs: Record<string, unknown>;
}

export interface MapEventRecord {
    type: string;
    [field: string]: unknown;
}

export interface ControlRecord {
    type: string;
    position: ControlPosition;
    options: Record<string, unknown>;
}

export type OverflowPolicy = 'drop-oldest' | 'drop-newest' | 'error';

export interface QueueOptions {
    capacity: number;
    overflow: OverflowPolicy;
}

/** Traits that carry the host/view wiring rather than map state. */
export interface QueueTraits {
    _js_calls: CallRecord[];
    _js_events: MapEventRecord[];
    _queue: QueueOptions;
    /** Id of the host widget, set by the host when it is created. */
    _widget_id: string;
}

export interface CoreTraits extends QueueTraits {
    center: LatLng;
    zoom: number;
    width: string;
    height: string;
    _layers: Record<string, unknown>;
    _sources: Record<string, unknown>;
}

export function controlKey(type: string, position: ControlPosition): string {
    return `${type}_${position}`;
}
