// src/map/maplibre-services/terra-draw.ts

import type * as maplibregl from 'maplibre-gl';
import { MaplibreTerradrawControl } from '@watergis/maplibre-gl-terradraw';
import '@watergis/maplibre-gl-terradraw/dist/maplibre-gl-terradraw.css';
import type { FeatureCollection } from 'geojson';
import type { ControlPosition } from '../../store/IState';
import { isBoolean, isFeature, isRecord, pick } from '../../protocol/guards';
import type { TerraDrawHandle } from '../IMapInterfaces';

type TerraDrawControlOptions = NonNullable<ConstructorParameters<typeof MaplibreTerradrawControl>[0]>;
type TerraDrawMode = NonNullable<TerraDrawControlOptions['modes']>[number];
type TerraDraw = NonNullable<ReturnType<MaplibreTerradrawControl['getTerraDrawInstance']>>;
type StoreFeature = Parameters<TerraDraw['addFeatures']>[0][number];

export const TERRA_DRAW_MODES: readonly string[] = [
    'render',
    'point',
    'linestring',
    'polygon',
    'rectangle',
    'circle',
    'freehand',
    'angled-rectangle',
    'sensor',
    'sector',
    'select',
    'delete-selection',
    'delete',
    'download',
];

/** Every mode but 'render', which only displays features. */
export const DEFAULT_TERRA_DRAW_MODES: readonly string[] = TERRA_DRAW_MODES.filter(mode => mode !== 'render');

// Drawing mode that owns a feature of each geometry type when none is recorded.
const MODE_BY_GEOMETRY: Readonly<Record<string, string>> = {
    Point: 'point',
    LineString: 'linestring',
    Polygon: 'polygon',
};

function isTerraDrawMode(value: unknown): value is TerraDrawMode {
    return typeof value === 'string' && TERRA_DRAW_MODES.includes(value);
}

function isStoreFeature(value: unknown): value is StoreFeature {
    return isFeature(value) &&
        value.geometry !== null &&
        value.geometry.type in MODE_BY_GEOMETRY &&
        isRecord(value.properties) &&
        typeof value.properties.mode === 'string';
}

export function terraDrawOptions(options: Record<string, unknown>): TerraDrawControlOptions {
    const modes = Array.isArray(options.modes) ? options.modes.filter(isTerraDrawMode) : DEFAULT_TERRA_DRAW_MODES.filter(isTerraDrawMode);
    return { modes, open: pick(options, 'open', isBoolean) ?? true };
}

function featureLabel(id: string | number | undefined): string {
    return id === undefined ? '(no id)' : String(id);
}

/**
 * Splits features into those Terra Draw can hold and the ids of the rest. A
 * feature without a `mode` property gets the drawing mode of its geometry.
 */
export function toStoreFeatures(data: FeatureCollection): { features: StoreFeature[]; skipped: string[] } {
    const features: StoreFeature[] = [];
    const skipped: string[] = [];
    data.features.forEach(feature => {
        const geometryType = feature.geometry?.type;
        const mode = geometryType === undefined ? undefined : MODE_BY_GEOMETRY[geometryType];
        const candidate = { ...feature, properties: { mode, ...feature.properties } };
        if (isStoreFeature(candidate)) {
            features.push(candidate);
        } else {
            skipped.push(featureLabel(feature.id));
        }
    });
    return { features, skipped };
}

/** Adds a Terra Draw control to a MapLibre map. */
export function addTerraDraw(map: maplibregl.Map, options: Record<string, unknown>, position: ControlPosition): TerraDrawHandle {
    const control = new MaplibreTerradrawControl(terraDrawOptions(options));
    map.addControl(control, position);
    const terraDraw = control.getTerraDrawInstance();
    if (!terraDraw) {
        map.removeControl(control);
        throw new Error('Terra Draw did not start on this map');
    }

    return {
        snapshot: (): FeatureCollection => ({ type: 'FeatureCollection', features: terraDraw.getSnapshot() }),
        load: (data: FeatureCollection): string[] => {
            const { features, skipped } = toStoreFeatures(data);
            terraDraw.clear();
            const rejected = terraDraw.addFeatures(features)
                .filter(result => !result.valid)
                .map(result => featureLabel(result.id));
            return [...skipped, ...rejected];
        },
        clear: () => terraDraw.clear(),
        onChange: (listener: () => void) => {
            terraDraw.on('change', listener);
            return () => terraDraw.off('change', listener);
        },
        remove: () => map.removeControl(control),
    };
}
