// src/widgets/DeckGLMap.ts
// deck.gl layers over a MapLibre base map. Deck layers travel as plain
// records; accessor props (get*) name a data field or hold a constant.

import type { DeckGLTraits, DeckLayerRecord, DeckLayerType } from '../store/backend-traits';
import type { DeckCommand } from '../protocol/deck-commands';
import { encodeDeckCommand } from '../protocol/deck-commands';
import type { DeckGLOptions } from '../config/types';
import { CDN_ASSETS } from '../config/cdn';
import type { ExportDocument } from '../export/html-document';
import { DECK_INIT_SCRIPT } from '../export/deck-template';
import { MapLibreWidget, buildMapLibreTraits } from './MapLibreMap';
import { assertValidOptions } from './options';

/** Layer data: an array of records or a URL the layer fetches. */
export type DeckData = unknown[] | string;

/** A field name read from each datum, or a constant. */
export type Accessor<V> = string | V;

export type RGBA = [number, number, number] | [number, number, number, number];

export interface ScatterplotOptions {
    getPosition?: Accessor<[number, number]>;
    getRadius?: Accessor<number>;
    getFillColor?: Accessor<RGBA>;
    radiusScale?: number;
    radiusMinPixels?: number;
    pickable?: boolean;
}

export interface ArcOptions {
    getSourcePosition?: Accessor<[number, number]>;
    getTargetPosition?: Accessor<[number, number]>;
    getSourceColor?: Accessor<RGBA>;
    getTargetColor?: Accessor<RGBA>;
    getWidth?: Accessor<number>;
    pickable?: boolean;
}

export interface HexagonOptions {
    getPosition?: Accessor<[number, number]>;
    radius?: number;
    elevationScale?: number;
    extruded?: boolean;
    coverage?: number;
    pickable?: boolean;
}

export interface HeatmapOptions {
    getPosition?: Accessor<[number, number]>;
    getWeight?: Accessor<number>;
    radiusPixels?: number;
    intensity?: number;
}

export class DeckGLMap extends MapLibreWidget<DeckGLTraits> {
    public readonly backend = 'deckgl';

    constructor(options: DeckGLOptions = {}) {
        assertValidOptions('deckgl', options);
        super({ ...buildMapLibreTraits(options), _deck_layers: {} }, 'deckgl');
    }

    private sendDeck(command: DeckCommand): void {
        this.enqueue(encodeDeckCommand(command));
    }

    public addDeckLayer(id: string, type: DeckLayerType, props: Record<string, unknown>): void {
        const layer: DeckLayerRecord = { id, type, props: { ...props, id } };
        this.model.set('_deck_layers', { ...this.model.get('_deck_layers'), [id]: layer });
        this.sendDeck({ kind: 'addDeckLayer', layer });
    }

    public removeDeckLayer(id: string): void {
        const layers = { ...this.model.get('_deck_layers') };
        delete layers[id];
        this.model.set('_deck_layers', layers);
        this.sendDeck({ kind: 'removeDeckLayer', id });
    }

    public clearDeckLayers(): void {
        this.model.set('_deck_layers', {});
        this.sendDeck({ kind: 'clearDeckLayers' });
    }

    public getDeckLayers(): Record<string, DeckLayerRecord> {
        return structuredClone(this.model.get('_deck_layers'));
    }

    public addScatterplotLayer(id: string, data: DeckData, options: ScatterplotOptions = {}): void {
        this.addDeckLayer(id, 'ScatterplotLayer', {
            data,
            getPosition: options.getPosition ?? 'coordinates',
            getRadius: options.getRadius ?? 100,
            getFillColor: options.getFillColor ?? [255, 0, 0, 200],
            radiusScale: options.radiusScale ?? 1,
            radiusMinPixels: options.radiusMinPixels ?? 1,
            pickable: options.pickable ?? true,
        });
    }

    public addArcLayer(id: string, data: DeckData, options: ArcOptions = {}): void {
        this.addDeckLayer(id, 'ArcLayer', {
            data,
            getSourcePosition: options.getSourcePosition ?? 'source',
            getTargetPosition: options.getTargetPosition ?? 'target',
            getSourceColor: options.getSourceColor ?? [0, 128, 255],
            getTargetColor: options.getTargetColor ?? [255, 0, 128],
            getWidth: options.getWidth ?? 1,
            pickable: options.pickable ?? true,
        });
    }

    public addHexagonLayer(id: string, data: DeckData, options: HexagonOptions = {}): void {
        this.addDeckLayer(id, 'HexagonLayer', {
            data,
            getPosition: options.getPosition ?? 'coordinates',
            radius: options.radius ?? 1000,
            elevationScale: options.elevationScale ?? 4,
            extruded: options.extruded ?? true,
            coverage: options.coverage ?? 1,
            pickable: options.pickable ?? true,
        });
    }

    public addHeatmapLayer(id: string, data: DeckData, options: HeatmapOptions = {}): void {
        this.addDeckLayer(id, 'HeatmapLayer', {
            data,
            getPosition: options.getPosition ?? 'coordinates',
            getWeight: options.getWeight ?? 1,
            radiusPixels: options.radiusPixels ?? 30,
            intensity: options.intensity ?? 1,
        });
    }

    protected exportDocument(): ExportDocument {
        return this.glExport([CDN_ASSETS.deckglJs], DECK_INIT_SCRIPT);
    }
}
