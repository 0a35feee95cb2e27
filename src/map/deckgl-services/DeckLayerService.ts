// src/map/deckgl-services/DeckLayerService.ts

import { MapboxOverlay } from '@deck.gl/mapbox';
import type { Layer } from '@deck.gl/core';
import type * as maplibregl from 'maplibre-gl';
import type { DeckLayerRecord } from '../../store/backend-traits';
import type { DeckCommand } from '../../protocol/deck-commands';
import { DeckLayerFactory } from './DeckLayerFactory';

export interface DeckPick {
    layerId: string;
    /** Index of the picked datum in the layer's data */
    index: number;
    coordinate: number[] | null;
}

/**
 * Keeps the deck.gl overlay on a MapLibre map in step with the deck layer
 * records. Layers keep their insertion order; re-adding an id replaces the
 * layer in place.
 */
export class DeckLayerService {
    private readonly overlay: MapboxOverlay;
    private readonly layers = new Map<string, Layer>();

    constructor(private readonly map: maplibregl.Map, onPick?: (pick: DeckPick) => void) {
        this.overlay = new MapboxOverlay({
            interleaved: false,
            layers: [],
            onClick: info => {
                if (!onPick || !info.layer || info.index < 0) return;
                onPick({ layerId: info.layer.id, index: info.index, coordinate: info.coordinate ?? null });
            },
        });
        // MapboxOverlay is typed against Mapbox's IControl; MapLibre takes the same onAdd/onRemove shape.
        this.map.addControl(this.overlay as unknown as maplibregl.IControl);
    }

    public execute(command: DeckCommand): void {
        switch (command.kind) {
            case 'addDeckLayer':
                this.put(command.layer);
                break;
            case 'removeDeckLayer':
                this.layers.delete(command.id);
                break;
            case 'clearDeckLayers':
                this.layers.clear();
                break;
        }
        this.flush();
    }

    public get layerIds(): string[] {
        return Array.from(this.layers.keys());
    }

    public remove(): void {
        this.map.removeControl(this.overlay as unknown as maplibregl.IControl);
        this.layers.clear();
    }

    private put(record: DeckLayerRecord): void {
        this.layers.set(record.id, DeckLayerFactory.create(record));
        console.log(`[LAYER SERVICE] deck layer "${record.id}" (${record.type}) set.`);
    }

    private flush(): void {
        this.overlay.setProps({ layers: Array.from(this.layers.values()) });
    }
}
