// src/protocol/gl-spec-guards.ts
// Shape checks for style-spec values arriving over the wire. They check what
// the views read before handing the value to the library, which validates
// the rest itself.

import type {
    LayerSpecification,
    ProjectionSpecification,
    SourceSpecification,
    StyleSpecification,
    TerrainSpecification,
} from 'maplibre-gl';
import type {
    LayerSpecification as MapboxLayerSpecification,
    SourceSpecification as MapboxSourceSpecification,
    StyleSpecification as MapboxStyleSpecification,
} from 'mapbox-gl';
import type { MapboxProjection, MapboxSpecTypes, MapboxTerrain, MapLibreSpecTypes } from '../store/backend-traits';
import type { GlSpecGuards } from './gl-commands';
import { isFiniteNumber, isRecord } from './guards';

function hasStringField(value: unknown, field: string): value is Record<string, unknown> {
    return isRecord(value) && typeof value[field] === 'string' && value[field] !== '';
}

function isLayerShape(value: unknown): boolean {
    return hasStringField(value, 'id') && hasStringField(value, 'type');
}

function isStyleShape(value: unknown): boolean {
    return isRecord(value) && value.version === 8 && isRecord(value.sources) && Array.isArray(value.layers);
}

function isTerrainShape(value: unknown): boolean {
    return hasStringField(value, 'source') &&
        (value.exaggeration === undefined || isFiniteNumber(value.exaggeration));
}

export const MAPLIBRE_SPEC_GUARDS: GlSpecGuards<MapLibreSpecTypes> = {
    isLayer: (value): value is LayerSpecification => isLayerShape(value),
    isSource: (value): value is SourceSpecification => hasStringField(value, 'type'),
    isStyle: (value): value is StyleSpecification => isStyleShape(value),
    isProjection: (value): value is ProjectionSpecification => isRecord(value) && 'type' in value,
    isTerrain: (value): value is TerrainSpecification => isTerrainShape(value),
};

export const MAPBOX_SPEC_GUARDS: GlSpecGuards<MapboxSpecTypes> = {
    isLayer: (value): value is MapboxLayerSpecification => isLayerShape(value),
    isSource: (value): value is MapboxSourceSpecification => hasStringField(value, 'type'),
    isStyle: (value): value is MapboxStyleSpecification => isStyleShape(value),
    isProjection: (value): value is MapboxProjection => hasStringField(value, 'name'),
    isTerrain: (value): value is MapboxTerrain => isTerrainShape(value),
};
