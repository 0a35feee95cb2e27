// src/map/leaflet-services/MapLayerService.ts

import * as L from 'leaflet';
import isEqual from 'lodash/isEqual';
import type { LatLng } from '../../store/IState';
import type { LeafletLayerRecord } from '../../store/backend-traits';
import { isLeafletLayerRecord } from '../../protocol/leaflet-commands';
import { LeafletLayerFactory } from './LeafletLayerFactory';
import { layerBounds, loadGeotiffLayer } from './georaster';

export interface LayerServiceHooks {
    /** A draggable marker was dropped; the record in `_layers` should follow. */
    onMarkerMoved(id: string, record: LeafletLayerRecord, latlng: LatLng): void;
    onError(method: string, error: unknown): void;
}

/**
 * Keeps the Leaflet layers in step with the `_layers` trait. Each sync
 * removes ids that are gone, adds new ids and rebuilds ids whose record
 * changed.
 */
export class MapLayerService {
    private readonly layers = new Map<string, L.Layer>();
    private readonly records = new Map<string, LeafletLayerRecord>();

    constructor(
        private readonly map: L.Map,
        private readonly hooks: LayerServiceHooks
    ) {}

    public sync(desired: Record<string, unknown>): void {
        for (const id of [...this.records.keys()]) {
            if (!(id in desired)) this.removeLayer(id);
        }
        for (const [id, record] of Object.entries(desired)) {
            if (!isLeafletLayerRecord(record)) {
                console.warn(`[LAYER SERVICE] Layer "${id}" has an unknown or invalid record; skipped.`);
                continue;
            }
            const current = this.records.get(id);
            if (current && isEqual(current, record)) continue;
            if (current) this.removeLayer(id);
            this.addLayer(id, record);
        }
    }

    public layerIds(): string[] {
        return [...this.records.keys()];
    }

    /** The native layer, once it is on the map. */
    public getLayer(id: string): L.Layer | undefined {
        return this.layers.get(id);
    }

    private addLayer(id: string, record: LeafletLayerRecord): void {
        this.records.set(id, record);
        if (record.type === 'geotiff') {
            loadGeotiffLayer(record)
                .then(layer => this.placeGeotiff(id, record, layer))
                .catch(error => {
                    console.warn(`[LAYER SERVICE] GeoTIFF "${record.url}" could not be loaded.`, error);
                    this.hooks.onError(`addGeotiff ${id}`, error);
                });
            return;
        }
        const layer = LeafletLayerFactory.create(record, latlng => this.markerMoved(id, latlng));
        layer.addTo(this.map);
        this.layers.set(id, layer);
        console.log(`[LAYER SERVICE] Added ${record.type} layer "${id}".`);
    }

    private placeGeotiff(id: string, record: LeafletLayerRecord, layer: L.Layer): void {
        // The record may have been removed or replaced while the raster loaded.
        if (this.records.get(id) !== record) return;
        layer.addTo(this.map);
        this.layers.set(id, layer);
        console.log(`[LAYER SERVICE] Added geotiff layer "${id}".`);
        if (record.type === 'geotiff' && record.fit_bounds) {
            const bounds = layerBounds(layer);
            if (bounds) this.map.fitBounds(bounds);
        }
    }

    private markerMoved(id: string, latlng: LatLng): void {
        const record = this.records.get(id);
        if (!record || record.type !== 'marker') return;
        const moved: LeafletLayerRecord = { ...record, latlng };
        // Recorded first so the trait write that follows is not seen as a change.
        this.records.set(id, moved);
        this.hooks.onMarkerMoved(id, moved, latlng);
    }

    public removeLayer(id: string): void {
        const layer = this.layers.get(id);
        if (layer) this.map.removeLayer(layer);
        this.layers.delete(id);
        this.records.delete(id);
    }

    public clear(): void {
        this.layerIds().forEach(id => this.removeLayer(id));
    }
}
