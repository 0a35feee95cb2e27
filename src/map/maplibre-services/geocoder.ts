// src/map/maplibre-services/geocoder.ts

import * as maplibregl from 'maplibre-gl';
import MaplibreGeocoder from '@maplibre/maplibre-gl-geocoder';
import type {
    CarmenGeojsonFeature,
    MaplibreGeocoderApi,
    MaplibreGeocoderApiConfig,
    MaplibreGeocoderFeatureResults,
} from '@maplibre/maplibre-gl-geocoder';
import '@maplibre/maplibre-gl-geocoder/dist/maplibre-gl-geocoder.css';
import type { Feature } from 'geojson';
import { isBoolean, isFiniteNumber, isString, pick } from '../../protocol/guards';
import { bboxCenter, placeName, searchPlaces } from '../gl-services/nominatim';

const DEFAULT_LIMIT = 5;

function pointCenter(feature: Feature): [number, number] | null {
    const geometry = feature.geometry;
    if (geometry?.type !== 'Point') return null;
    const [lng, lat] = geometry.coordinates;
    return [lng, lat];
}

/** A Nominatim result in the shape the geocoder lists and flies to. */
export function toCarmenFeature(feature: Feature, index: number): CarmenGeojsonFeature | null {
    const center = bboxCenter(feature) ?? pointCenter(feature);
    if (!center) return null;
    const name = placeName(feature);
    return {
        type: 'Feature',
        id: String(feature.id ?? `place-${index}`),
        text: name,
        place_name: name,
        place_type: ['place'],
        center,
        geometry: { type: 'Point', coordinates: center },
        properties: feature.properties ?? {},
    };
}

const nominatimApi: MaplibreGeocoderApi = {
    forwardGeocode: async (config: MaplibreGeocoderApiConfig): Promise<MaplibreGeocoderFeatureResults> => {
        const query = typeof config.query === 'string' ? config.query : String(config.query ?? '');
        const results = await searchPlaces(query, config.limit ?? DEFAULT_LIMIT);
        return {
            type: 'FeatureCollection',
            features: results.features.flatMap((feature, index) => {
                const carmen = toCarmenFeature(feature, index);
                return carmen ? [carmen] : [];
            }),
        };
    },
};

export function createGeocoder(options: Record<string, unknown>): MaplibreGeocoder {
    return new MaplibreGeocoder(nominatimApi, {
        maplibregl,
        placeholder: pick(options, 'placeholder', isString) ?? 'Search places',
        collapsed: pick(options, 'collapsed', isBoolean) ?? false,
        limit: pick(options, 'limit', isFiniteNumber) ?? DEFAULT_LIMIT,
    });
}
