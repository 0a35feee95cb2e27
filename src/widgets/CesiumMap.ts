// src/widgets/CesiumMap.ts

import type { GeoJSON } from 'geojson';
import type { CesiumLayerRecord, CesiumTerrainRecord, CesiumTraits } from '../store/backend-traits';
import { resolveQueueOptions } from '../store/bounded-queue';
import type { CesiumCommand } from '../protocol/cesium-commands';
import { encodeCesiumCommand } from '../protocol/cesium-commands';
import type { CesiumOptions } from '../config/types';
import { DEFAULT_CESIUM_OPTIONS, mergeWidgetOptions, readEnv } from '../config/loader';
import { cesiumAssetUrl } from '../config/cdn';
import type { ExportDocument } from '../export/html-document';
import { withoutQueues } from '../export/html-document';
import { CESIUM_INIT_SCRIPT } from '../export/cesium-template';
import { MapWidget } from './MapWidget';
import { assertValidOptions } from './options';

export interface CesiumFlyOptions {
    heading?: number;
    pitch?: number;
    /** Seconds */
    duration?: number;
}

export interface CesiumGeojsonOptions {
    layerId?: string;
    stroke?: string;
    fill?: string;
    strokeWidth?: number;
    clampToGround?: boolean;
}

/** Camera height in meters that roughly matches a web-map zoom level. */
export function heightForZoom(zoom: number): number {
    return Math.round(40_000_000 / Math.pow(2, zoom));
}

function buildTraits(options: CesiumOptions): CesiumTraits {
    const o = mergeWidgetOptions(DEFAULT_CESIUM_OPTIONS, options);
    const cameraHeight = options.cameraHeight === undefined && options.zoom !== undefined
        ? heightForZoom(options.zoom)
        : o.cameraHeight;
    return {
        center: o.center,
        zoom: o.zoom,
        width: o.width,
        height: o.height,
        camera_height: cameraHeight,
        heading: o.heading,
        pitch: o.pitch,
        roll: o.roll,
        access_token: o.accessToken || readEnv('CESIUM_TOKEN') || '',
        _js_calls: [],
        _js_events: [],
        _queue: resolveQueueOptions(o.queue),
        _widget_id: '',
        _layers: {},
        _sources: {},
        _terrain: o.terrain,
    };
}

export class CesiumMap extends MapWidget<CesiumTraits> {
    public readonly backend = 'cesium';

    constructor(options: CesiumOptions = {}) {
        assertValidOptions('cesium', options);
        super(buildTraits(options), 'cesium');
    }

    private send(command: CesiumCommand): void {
        this.enqueue(encodeCesiumCommand(command));
    }

    public get cameraHeight(): number {
        return this.model.get('camera_height');
    }

    public setCameraHeight(height: number): void {
        this.model.set('camera_height', height);
    }

    /** Angles in degrees. */
    public setCameraOrientation(heading: number, pitch: number, roll = 0): void {
        this.model.set('heading', heading);
        this.model.set('pitch', pitch);
        this.model.set('roll', roll);
    }

    /** The third argument is the camera height in meters, not a zoom level. */
    public flyTo(lat: number, lng: number, height?: number, options: CesiumFlyOptions = {}): void {
        this.send({
            kind: 'flyTo',
            target: {
                lat,
                lng,
                height: height ?? this.cameraHeight,
                heading: options.heading ?? 0,
                pitch: options.pitch ?? -90,
                duration: options.duration ?? 3,
            },
        });
    }

    public homeView(): void {
        this.send({ kind: 'homeView' });
    }

    public addLayer(id: string, layer: CesiumLayerRecord): string {
        this.model.set('_layers', { ...this.model.get('_layers'), [id]: layer });
        this.send({ kind: 'addLayer', id, layer });
        return id;
    }

    public removeLayer(id: string): void {
        const layers = { ...this.model.get('_layers') };
        delete layers[id];
        this.model.set('_layers', layers);
        this.send({ kind: 'removeLayer', id });
    }

    /** Imagery from an XYZ URL template. */
    public addImageryLayer(url: string, options: { layerId?: string; credit?: string; alpha?: number } = {}): string {
        const layer: CesiumLayerRecord = { type: 'imagery', url, alpha: options.alpha ?? 1 };
        if (options.credit) layer.credit = options.credit;
        return this.addLayer(options.layerId ?? this.nextLayerId('imagery'), layer);
    }

    public addGeojson(data: GeoJSON | string, options: CesiumGeojsonOptions = {}): string {
        return this.addLayer(options.layerId ?? this.nextLayerId('geojson'), {
            type: 'geojson',
            data,
            stroke: options.stroke ?? '#ffff00',
            fill: options.fill ?? 'rgba(255, 255, 0, 0.4)',
            strokeWidth: options.strokeWidth ?? 2,
            clampToGround: options.clampToGround ?? false,
        });
    }

    public add3dTileset(url: string, options: { layerId?: string; maximumScreenSpaceError?: number } = {}): string {
        return this.addLayer(options.layerId ?? this.nextLayerId('tileset'), {
            type: '3dtiles',
            url,
            maximumScreenSpaceError: options.maximumScreenSpaceError ?? 16,
        });
    }

    /** 'world' is Cesium World Terrain and needs an ion token. */
    public setTerrain(terrain: CesiumTerrainRecord | null): void {
        if (terrain?.type === 'world' && !this.model.get('access_token')) {
            console.warn('[config] cesium: world terrain needs an ion token; pass accessToken or set CESIUM_TOKEN.');
        }
        this.model.set('_terrain', terrain);
        this.send({ kind: 'setTerrain', terrain });
    }

    protected exportDocument(): ExportDocument {
        const traits: CesiumTraits = this.model.snapshot();
        return {
            assets: {
                styles: [cesiumAssetUrl('Widgets/widgets.css')],
                scripts: [cesiumAssetUrl('Cesium.js')],
            },
            state: withoutQueues(traits),
            initScript: CESIUM_INIT_SCRIPT,
        };
    }
}
