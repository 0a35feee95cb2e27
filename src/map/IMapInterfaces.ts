// src/map/IMapInterfaces.ts

import type MapboxDraw from '@mapbox/mapbox-gl-draw';
import type { FeatureCollection } from 'geojson';
import type { ControlPosition, ControlRecord, LatLng, LatLngBounds, LngLatTuple } from '../store/IState';
import type { GlSpecTypes, MarkerRecord } from '../store/backend-traits';
import type { Pixel } from '../store/map-events';
import type { CameraOptions } from '../protocol/gl-commands';
import type { DynamicCall } from '../protocol/dynamic-call';

/**
 * Camera as the host speaks it: center in [lat, lng] order.
 */
export interface CameraState {
    center: LatLng;
    zoom: number;
    bearing: number;
    pitch: number;
}

/** Something placed on the map that can be taken off again. */
export interface Removable {
    remove(): void;
}

/** A Terra Draw control on the map and the features it holds. */
export interface TerraDrawHandle extends Removable {
    snapshot(): FeatureCollection;
    /** Replaces the drawn features. Returns the ids of features the store rejected. */
    load(data: FeatureCollection): string[];
    clear(): void;
    /** Calls the listener after every edit; returns the unsubscribe. */
    onChange(listener: () => void): () => void;
}

export type ClickHandler = (lngLat: LngLatTuple, point: Pixel) => void;

/**
 * The slice of a GL map (MapLibre or Mapbox) the shared GL view logic needs.
 * Each library implements it in its MapCoreService; the shared controller
 * never touches the library object directly.
 */
export interface GlMapPort<S extends GlSpecTypes> {
    /** Library name used in log messages. */
    readonly library: string;

    /** Runs the callback once the first style has loaded, or now if it has. */
    onLoad(callback: () => void): void;
    /** Runs the callback after the next completed style load. */
    onceStyleLoad(callback: () => void): void;
    onClick(handler: ClickHandler): () => void;
    /** Any library event by name; the payload is passed on unread. */
    on(type: string, handler: (event: unknown) => void): () => void;

    getCamera(): CameraState;
    jumpTo(camera: CameraOptions): void;
    flyTo(camera: CameraOptions): void;
    fitBounds(bounds: LatLngBounds, padding: number, duration?: number): void;

    setStyle(style: string | S['style']): void;
    /** Ids of every layer in the current style, in draw order. */
    styleLayerIds(): string[];

    hasSource(id: string): boolean;
    addSource(id: string, source: S['source']): void;
    removeSource(id: string): void;

    hasLayer(id: string): boolean;
    addLayer(layer: S['layer'], beforeId?: string): void;
    removeLayer(id: string): void;
    layerType(id: string): string | undefined;
    setLayoutProperty(layerId: string, name: string, value: unknown): void;
    setPaintProperty(layerId: string, name: string, value: unknown): void;

    setProjection(projection: S['projection']): void;
    setTerrain(terrain: S['terrain'] | null): void;

    addMarker(marker: MarkerRecord, onDragEnd: (lngLat: LngLatTuple) => void): Removable;

    /** Built-in controls of the library. Returns null for a type it does not have. */
    addLibraryControl(control: ControlRecord): Removable | null;
    /** Wraps a DOM element as a map control. */
    addElementControl(element: HTMLElement, position: ControlPosition): Removable;
    addDrawControl(draw: MapboxDraw, position: ControlPosition): Removable;
    /** Called once before the first draw control is built on this library. */
    prepareDraw(): void;
    /** Libraries without a Terra Draw adapter leave this out. */
    addTerraDrawControl?(options: Record<string, unknown>, position: ControlPosition): TerraDrawHandle;

    invoke(call: DynamicCall): void;
    remove(): void;
}
