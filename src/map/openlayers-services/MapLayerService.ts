// src/map/openlayers-services/MapLayerService.ts

import type OLMap from 'ol/Map';
import Feature from 'ol/Feature';
import Point from 'ol/geom/Point';
import GeoJSON from 'ol/format/GeoJSON';
import type BaseLayer from 'ol/layer/Base';
import LayerGroup from 'ol/layer/Group';
import TileLayer from 'ol/layer/Tile';
import VectorLayer from 'ol/layer/Vector';
import VectorTileLayer from 'ol/layer/VectorTile';
import { fromLonLat } from 'ol/proj';
import TileWMS from 'ol/source/TileWMS';
import VectorSource from 'ol/source/Vector';
import XYZ from 'ol/source/XYZ';
import { Circle as CircleStyle, Fill, Stroke, Style } from 'ol/style';
import { apply, applyStyle } from 'ol-mapbox-style';
import type { OlVectorStyle, OpenLayersLayerRecord } from '../../store/backend-traits';

/** Feature property holding a marker's popup HTML. */
export const POPUP_PROPERTY = 'anymap_popup';

export function createVectorStyle(style: OlVectorStyle): Style {
    const fill = new Fill({ color: style.fillColor });
    const stroke = new Stroke({ color: style.strokeColor, width: style.strokeWidth });
    return new Style({
        fill,
        stroke,
        image: new CircleStyle({ radius: style.circleRadius, fill, stroke }),
    });
}

function createMarkerStyle(color: string): Style {
    return new Style({
        image: new CircleStyle({
            radius: 7,
            fill: new Fill({ color }),
            stroke: new Stroke({ color: '#ffffff', width: 2 }),
        }),
    });
}

/**
 * OpenLayers layers keyed by the ids of `_layers`. Adding an id that is
 * already on the map replaces it.
 */
export class MapLayerService {
    private readonly layers = new Map<string, BaseLayer>();

    constructor(
        private readonly map: OLMap,
        private readonly projection: string,
        private readonly onError: (method: string, error: unknown) => void
    ) {}

    public addLayer(id: string, record: OpenLayersLayerRecord): void {
        if (this.layers.has(id)) this.removeLayer(id);
        const layer = this.createLayer(id, record);
        layer.setOpacity(record.opacity);
        layer.setVisible(record.visible);
        layer.set('anymapId', id);
        this.map.addLayer(layer);
        this.layers.set(id, layer);
        console.log(`[LAYER SERVICE] Added ${record.type} layer "${id}".`);
    }

    private createLayer(id: string, record: OpenLayersLayerRecord): BaseLayer {
        switch (record.type) {
            case 'tile':
                return new TileLayer({ source: new XYZ({ url: record.url, attributions: record.attribution }) });
            case 'wms':
                return new TileLayer({ source: new TileWMS({ url: record.url, params: record.params }) });
            case 'geojson': {
                const source = typeof record.data === 'string'
                    ? new VectorSource({ url: record.data, format: new GeoJSON() })
                    : new VectorSource({
                        features: new GeoJSON().readFeatures(record.data, { featureProjection: this.projection }),
                    });
                return new VectorLayer({ source, style: createVectorStyle(record.style) });
            }
            case 'mvt-style':
                return this.createStyledLayer(id, record.url, record.source);
            case 'marker': {
                const feature = new Feature({ geometry: new Point(fromLonLat(record.coordinates, this.projection)) });
                if (record.popup) feature.set(POPUP_PROPERTY, record.popup);
                return new VectorLayer({
                    source: new VectorSource({ features: [feature] }),
                    style: createMarkerStyle(record.color),
                });
            }
        }
    }

    /**
     * A layer styled by a Mapbox GL style document. With `source` only that
     * source is rendered, as vector tiles; otherwise the whole style is
     * applied into a layer group.
     */
    private createStyledLayer(id: string, styleUrl: string, source?: string): BaseLayer {
        const report = (error: unknown): void => {
            console.warn(`[LAYER SERVICE] Style "${styleUrl}" for layer "${id}" could not be applied.`, error);
            this.onError(`addVectorLayer ${id}`, error);
        };
        if (source) {
            const layer = new VectorTileLayer({ declutter: true });
            applyStyle(layer, styleUrl, source).catch(report);
            return layer;
        }
        const group = new LayerGroup();
        apply(group, styleUrl).catch(report);
        return group;
    }

    public removeLayer(id: string): void {
        const layer = this.layers.get(id);
        if (!layer) return;
        this.map.removeLayer(layer);
        this.layers.delete(id);
    }

    public setVisibility(id: string, visible: boolean): void {
        this.require(id, 'setLayerVisibility')?.setVisible(visible);
    }

    public setOpacity(id: string, opacity: number): void {
        this.require(id, 'setLayerOpacity')?.setOpacity(opacity);
    }

    public layerIds(): string[] {
        return [...this.layers.keys()];
    }

    private require(id: string, method: string): BaseLayer | undefined {
        const layer = this.layers.get(id);
        if (!layer) console.warn(`[LAYER SERVICE] ${method}: no layer "${id}".`);
        return layer;
    }
}
