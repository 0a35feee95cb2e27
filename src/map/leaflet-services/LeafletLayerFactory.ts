// src/map/leaflet-services/LeafletLayerFactory.ts

import * as L from 'leaflet';
import type { LatLng } from '../../store/IState';
import type { LeafletLayerRecord } from '../../store/backend-traits';
import { isRecord } from '../../protocol/guards';

export type SyncLayerRecord = Exclude<LeafletLayerRecord, { type: 'geotiff' }>;
export type GeotiffRecord = Extract<LeafletLayerRecord, { type: 'geotiff' }>;

function bindText<T extends L.Layer>(layer: T, popup?: string, tooltip?: string, tooltipOptions?: L.TooltipOptions): T {
    if (popup) layer.bindPopup(popup);
    if (tooltip) layer.bindTooltip(tooltip, tooltipOptions ?? {});
    return layer;
}

/**
 * Builds Leaflet layers from the records in `_layers`. GeoTIFF records load
 * asynchronously and are handled by MapLayerService.
 */
export class LeafletLayerFactory {
    static create(record: SyncLayerRecord, onMarkerDragEnd: (latlng: LatLng) => void): L.Layer {
        switch (record.type) {
            case 'tile':
                return L.tileLayer(record.url, { attribution: record.attribution, ...record.options });
            case 'marker':
                return LeafletLayerFactory.createMarker(record, onMarkerDragEnd);
            case 'circle':
                return bindText(L.circle(record.latlng, { radius: record.radius, ...record.style }), record.popup);
            case 'polygon':
                return bindText(L.polygon(record.latlngs, record.style), record.popup);
            case 'polyline':
                return bindText(L.polyline(record.latlngs, record.style), record.popup);
            case 'geojson':
                return LeafletLayerFactory.createGeoJSONLayer(record);
        }
    }

    static createMarker(
        record: Extract<LeafletLayerRecord, { type: 'marker' }>,
        onDragEnd: (latlng: LatLng) => void
    ): L.Marker {
        const options: L.MarkerOptions = { draggable: record.draggable };
        if (record.icon) options.icon = L.icon(record.icon);
        const marker = bindText(L.marker(record.latlng, options), record.popup, record.tooltip, record.tooltip_options);
        marker.on('dragend', () => {
            const { lat, lng } = marker.getLatLng();
            onDragEnd([lat, lng]);
        });
        return marker;
    }

    /** `popup_property` names the feature property shown in each feature's popup. */
    static createGeoJSONLayer(record: Extract<LeafletLayerRecord, { type: 'geojson' }>): L.GeoJSON {
        const key = record.popup_property;
        return L.geoJSON(record.data, {
            style: () => record.style,
            onEachFeature: (feature, layer) => {
                const properties: unknown = feature.properties;
                if (!key || !isRecord(properties) || properties[key] === undefined) return;
                layer.bindPopup(String(properties[key]));
            },
        });
    }
}

/**
 * Grayscale ramp for a single-band raster, stretched between the band's
 * minimum and maximum. No-data pixels are left transparent.
 */
export function grayscaleColorFn(min: number, max: number, opacity: number): (values: Array<number | null>) => string | null {
    const range = max - min;
    return values => {
        const value = values[0];
        if (value === undefined || value === null || Number.isNaN(value)) return null;
        const t = range === 0 ? 0 : Math.max(0, Math.min(1, (value - min) / range));
        const gray = Math.round(255 * t);
        return `rgba(${gray},${gray},${gray},${opacity})`;
    };
}
