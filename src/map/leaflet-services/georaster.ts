// src/map/leaflet-services/georaster.ts
// GeoTIFF rendering through georaster and georaster-layer-for-leaflet. Both
// are UMD builds that read the global `L`, so they load from the CDN.

import * as L from 'leaflet';
import { CDN_ASSETS } from '../../config/cdn';
import { isFiniteNumber, isRecord } from '../../protocol/guards';
import { loadScriptsInOrder } from '../../utils/asset-loader';
import type { GeotiffRecord } from './LeafletLayerFactory';
import { grayscaleColorFn } from './LeafletLayerFactory';

function georasterGlobals(): { parse: unknown; layerClass: unknown } {
    return {
        parse: Reflect.get(globalThis, 'parseGeoraster'),
        layerClass: Reflect.get(globalThis, 'GeoRasterLayer'),
    };
}

function georasterReady(): boolean {
    const { parse, layerClass } = georasterGlobals();
    return typeof parse === 'function' && typeof layerClass === 'function';
}

async function ensureGeoraster(): Promise<void> {
    if (georasterReady()) return;
    await loadScriptsInOrder([CDN_ASSETS.georasterJs, CDN_ASSETS.georasterLayerJs]);
    if (!georasterReady()) {
        throw new Error('georaster scripts loaded but parseGeoraster/GeoRasterLayer are not defined');
    }
}

function firstNumber(value: unknown): number | undefined {
    return Array.isArray(value) && isFiniteNumber(value[0]) ? value[0] : undefined;
}

/**
 * Layer options for a parsed raster. A single band with known statistics
 * gets a grayscale ramp; multi-band rasters use the layer's own coloring.
 */
export function georasterLayerOptions(record: GeotiffRecord, georaster: unknown): Record<string, unknown> {
    const options: Record<string, unknown> = { georaster, opacity: record.opacity, resolution: record.resolution };
    if (!isRecord(georaster)) return options;
    const bands = isFiniteNumber(georaster.numberOfRasters) ? georaster.numberOfRasters : 1;
    const min = firstNumber(georaster.mins);
    const max = firstNumber(georaster.maxs);
    if (bands === 1 && min !== undefined && max !== undefined) {
        options.pixelValuesToColorFn = grayscaleColorFn(min, max, record.opacity);
    }
    return options;
}

/** Bounds of a GeoRasterLayer, when it reports them. */
export function layerBounds(layer: L.Layer): L.LatLngBounds | null {
    const getBounds: unknown = Reflect.get(layer, 'getBounds');
    if (typeof getBounds !== 'function') return null;
    const bounds: unknown = Reflect.apply(getBounds, layer, []);
    return bounds instanceof L.LatLngBounds && bounds.isValid() ? bounds : null;
}

/** Loads the scripts on first use, parses the raster and builds its layer. */
export async function loadGeotiffLayer(record: GeotiffRecord): Promise<L.Layer> {
    await ensureGeoraster();
    const { parse, layerClass } = georasterGlobals();
    if (typeof parse !== 'function' || typeof layerClass !== 'function') {
        throw new Error('georaster is not available');
    }
    const georaster: unknown = await Reflect.apply(parse, undefined, [record.url]);
    const layer: unknown = Reflect.construct(layerClass, [georasterLayerOptions(record, georaster)]);
    if (!(layer instanceof L.Layer)) {
        throw new Error('GeoRasterLayer did not produce a Leaflet layer');
    }
    return layer;
}
