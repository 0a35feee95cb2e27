// src/map/gl-services/draw-classes.ts

import MapboxDraw from '@mapbox/mapbox-gl-draw';
import { isRecord } from '../../protocol/guards';

/**
 * The draw control finds the map canvas and control corners by class name,
 * with Mapbox names built in. Renaming them lets it run on MapLibre. The
 * constants are module-wide, so the last map to create a draw control wins.
 */
export function setDrawClassPrefix(prefix: 'maplibregl' | 'mapboxgl'): void {
    const constants: unknown = Reflect.get(MapboxDraw, 'constants');
    const classes: unknown = isRecord(constants) ? constants.classes : undefined;
    if (!isRecord(classes)) {
        console.warn('[CORE SERVICE] Draw control class names not found; left as they are.');
        return;
    }
    classes.CANVAS = `${prefix}-canvas`;
    classes.CONTROL_BASE = `${prefix}-ctrl`;
    classes.CONTROL_PREFIX = `${prefix}-ctrl-`;
    classes.CONTROL_GROUP = `${prefix}-ctrl-group`;
    classes.ATTRIBUTION = `${prefix}-ctrl-attrib`;
}
