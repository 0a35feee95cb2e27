// src/map/gl-services/control-options.ts
// Control options arrive as loose records; these keep the keys both GL
// libraries understand and drop the rest.

import { isBoolean, isFiniteNumber, isRecord, isString, pick } from '../../protocol/guards';

export type ScaleUnit = 'imperial' | 'metric' | 'nautical';

function isScaleUnit(value: unknown): value is ScaleUnit {
    return value === 'imperial' || value === 'metric' || value === 'nautical';
}

export function navigationOptions(o: Record<string, unknown>): { showCompass?: boolean; showZoom?: boolean; visualizePitch?: boolean } {
    return {
        showCompass: pick(o, 'showCompass', isBoolean),
        showZoom: pick(o, 'showZoom', isBoolean),
        visualizePitch: pick(o, 'visualizePitch', isBoolean),
    };
}

export function scaleOptions(o: Record<string, unknown>): { maxWidth?: number; unit?: ScaleUnit } {
    return {
        maxWidth: pick(o, 'maxWidth', isFiniteNumber),
        unit: pick(o, 'unit', isScaleUnit),
    };
}

export function geolocateOptions(o: Record<string, unknown>): {
    positionOptions: PositionOptions;
    trackUserLocation?: boolean;
    showUserLocation?: boolean;
} {
    const position = isRecord(o.positionOptions) ? o.positionOptions : {};
    return {
        positionOptions: { enableHighAccuracy: pick(position, 'enableHighAccuracy', isBoolean) ?? true },
        trackUserLocation: pick(o, 'trackUserLocation', isBoolean),
        showUserLocation: pick(o, 'showUserLocation', isBoolean),
    };
}

export function attributionOptions(o: Record<string, unknown>): { compact?: boolean; customAttribution?: string } {
    return {
        compact: pick(o, 'compact', isBoolean),
        customAttribution: pick(o, 'customAttribution', isString),
    };
}
