// src/store/map-events.ts
// Event records pushed by views onto `_js_events`, and the host-side bus that
// hands them to callbacks registered with onMapEvent().

import type { Feature, FeatureCollection } from 'geojson';
import type { LatLng, LngLatTuple, MapEventRecord } from './IState';

export type Pixel = [number, number];   // [x, y] screen coordinates

/**
 * Click on the map surface.
 */
export interface ClickEvent extends MapEventRecord {
    type: 'click';
    lngLat: LngLatTuple;
    point: Pixel;
}

/**
 * Emitted once the view has settled after a pan, zoom or rotate.
 */
export interface MoveEndEvent extends MapEventRecord {
    type: 'moveend';
    center: LatLng;
    zoom: number;
    bearing: number;
    pitch: number;
}

export interface ZoomEndEvent extends MapEventRecord {
    type: 'zoomend';
    zoom: number;
}

/**
 * A queued call that threw inside the view.
 */
export interface CallErrorEvent extends MapEventRecord {
    type: 'error';
    method: string;
    error: string;
}

export interface DrawChangeEvent extends MapEventRecord {
    type: 'draw.create' | 'draw.update' | 'draw.delete';
    features: Feature[];
    allData: FeatureCollection;
}

export type MapEventHandler = (event: MapEventRecord) => void;

function isPair(value: unknown): value is [number, number] {
    return Array.isArray(value) && value.length === 2 &&
        typeof value[0] === 'number' && typeof value[1] === 'number';
}

export function isClickEvent(event: MapEventRecord): event is ClickEvent {
    return event.type === 'click' && isPair(event.lngLat) && isPair(event.point);
}

export function isMoveEndEvent(event: MapEventRecord): event is MoveEndEvent {
    return event.type === 'moveend' && isPair(event.center) && typeof event.zoom === 'number';
}

export function isCallErrorEvent(event: MapEventRecord): event is CallErrorEvent {
    return event.type === 'error' && typeof event.method === 'string' && typeof event.error === 'string';
}

export function isDrawChangeEvent(event: MapEventRecord): event is DrawChangeEvent {
    return (event.type === 'draw.create' || event.type === 'draw.update' || event.type === 'draw.delete') &&
        Array.isArray(event.features);
}

/**
 * MapEventBus - dispatches view events to host callbacks by event type.
 *
 * Handlers run synchronously in registration order. A handler that throws is
 * logged and the remaining handlers still run.
 *
 * @example
 * const unsubscribe = bus.on('click', (e) => {
 *     if (isClickEvent(e)) console.log(`Clicked ${e.lngLat[0]}, ${e.lngLat[1]}`);
 * });
 */
export class MapEventBus {
    private listeners: Map<string, Set<MapEventHandler>> = new Map();

    /**
     * @returns Unsubscribe function
     */
    on(eventType: string, handler: MapEventHandler): () => void {
        let handlers = this.listeners.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.listeners.set(eventType, handlers);
        }
        handlers.add(handler);
        return () => this.off(eventType, handler);
    }

    once(eventType: string, handler: MapEventHandler): () => void {
        const wrapped: MapEventHandler = (event) => {
            this.off(eventType, wrapped);
            handler(event);
        };
        return this.on(eventType, wrapped);
    }

    off(eventType: string, handler?: MapEventHandler): void {
        if (!handler) {
            this.listeners.delete(eventType);
            return;
        }
        this.listeners.get(eventType)?.delete(handler);
    }

    emit(event: MapEventRecord): void {
        const handlers = this.listeners.get(event.type);
        if (!handlers) return;
        [...handlers].forEach(handler => {
            try {
                handler(event);
            } catch (err) {
                console.error(`[MapEventBus] Error in listener for "${event.type}":`, err);
            }
        });
    }

    listenerCount(eventType: string): number {
        return this.listeners.get(eventType)?.size ?? 0;
    }

    clear(eventType?: string): void {
        if (eventType) {
            this.listeners.delete(eventType);
        } else {
            this.listeners.clear();
        }
    }
}
