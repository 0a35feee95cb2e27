// src/map/deckgl-services/DeckLayerFactory.ts

import type { Layer } from '@deck.gl/core';
import {
    ArcLayer,
    ColumnLayer,
    GeoJsonLayer,
    IconLayer,
    LineLayer,
    PathLayer,
    PolygonLayer,
    ScatterplotLayer,
    TextLayer,
} from '@deck.gl/layers';
import { GridLayer, HeatmapLayer, HexagonLayer } from '@deck.gl/aggregation-layers';
import type { DeckLayerRecord, DeckLayerType } from '../../store/backend-traits';
import { isRecord } from '../../protocol/guards';

type DeckLayerClass = new (props: Record<string, unknown>) => Layer;

const LAYER_CLASSES: Record<DeckLayerType, DeckLayerClass> = {
    ScatterplotLayer,
    GeoJsonLayer,
    ArcLayer,
    PathLayer,
    LineLayer,
    PolygonLayer,
    TextLayer,
    IconLayer,
    ColumnLayer,
    HexagonLayer,
    HeatmapLayer,
    GridLayer,
};

/**
 * Reads a field from a datum, or from its GeoJSON properties when the datum
 * is a feature.
 */
export function fieldAccessor(field: string): (datum: unknown) => unknown {
    return (datum: unknown) => {
        if (!isRecord(datum)) return undefined;
        if (datum[field] !== undefined) return datum[field];
        return isRecord(datum.properties) ? datum.properties[field] : undefined;
    };
}

/** Layer props with every `get*` field name replaced by its accessor. */
export function resolveDeckProps(record: DeckLayerRecord): Record<string, unknown> {
    const props: Record<string, unknown> = {};
    Object.entries(record.props).forEach(([key, value]) => {
        props[key] = key.startsWith('get') && typeof value === 'string' ? fieldAccessor(value) : value;
    });
    props.id = record.id;
    return props;
}

/**
 * Factory from wire records to deck.gl layers. deck.gl checks props at
 * runtime; the record only has to name a known layer class.
 */
export class DeckLayerFactory {
    static create(record: DeckLayerRecord): Layer {
        const LayerClass = LAYER_CLASSES[record.type];
        return new LayerClass(resolveDeckProps(record));
    }
}
