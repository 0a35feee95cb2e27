// src/map/openlayers-services/controls.ts

import type Control from 'ol/control/Control';
import Attribution from 'ol/control/Attribution';
import FullScreen from 'ol/control/FullScreen';
import MousePosition from 'ol/control/MousePosition';
import OverviewMap from 'ol/control/OverviewMap';
import Rotate from 'ol/control/Rotate';
import ScaleLine from 'ol/control/ScaleLine';
import type { Units } from 'ol/control/ScaleLine';
import Zoom from 'ol/control/Zoom';
import { createStringXY } from 'ol/coordinate';
import TileLayer from 'ol/layer/Tile';
import OSM from 'ol/source/OSM';
import type { OpenLayersControlType } from '../../protocol/openlayers-commands';
import { isBoolean, isFiniteNumber, isString, pick } from '../../protocol/guards';

const SCALE_UNITS: readonly Units[] = ['degrees', 'imperial', 'nautical', 'metric', 'us'];

function isScaleUnit(value: unknown): value is Units {
    return SCALE_UNITS.some(unit => unit === value);
}

/** Builds each control type from its options in `_controls`. */
export const CONTROL_FACTORIES: Record<OpenLayersControlType, (options: Record<string, unknown>) => Control> = {
    zoom: options => new Zoom({ delta: pick(options, 'delta', isFiniteNumber) }),
    rotate: options => new Rotate({ autoHide: pick(options, 'autoHide', isBoolean) ?? true }),
    attribution: options => new Attribution({
        collapsible: pick(options, 'collapsible', isBoolean) ?? true,
        collapsed: pick(options, 'collapsed', isBoolean) ?? true,
    }),
    scaleline: options => new ScaleLine({
        units: pick(options, 'units', isScaleUnit) ?? 'metric',
        bar: pick(options, 'bar', isBoolean) ?? false,
    }),
    fullscreen: () => new FullScreen(),
    mouseposition: options => new MousePosition({
        projection: pick(options, 'projection', isString) ?? 'EPSG:4326',
        coordinateFormat: createStringXY(pick(options, 'digits', isFiniteNumber) ?? 4),
    }),
    overviewmap: options => new OverviewMap({
        collapsed: pick(options, 'collapsed', isBoolean) ?? true,
        layers: [new TileLayer({ source: new OSM() })],
    }),
};
