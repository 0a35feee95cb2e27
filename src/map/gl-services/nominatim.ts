// src/map/gl-services/nominatim.ts

import type { Feature, FeatureCollection } from 'geojson';
import { isFeatureCollection } from '../../protocol/guards';

export const NOMINATIM_ENDPOINT = 'https://nominatim.openstreetmap.org/search';

const params = { format: 'geojson', polygon_geojson: 1, addressdetails: 1 };

export function nominatimUrl(query: string, limit: number): string {
    const search = new URLSearchParams();
    Object.entries(params).forEach(([k, v]) => search.set(k, String(v)));
    search.set('q', query);
    search.set('limit', String(limit));
    return `${NOMINATIM_ENDPOINT}?${search.toString()}`;
}

/** Free-text place search. Failures are logged and give an empty collection. */
export async function searchPlaces(query: string, limit: number): Promise<FeatureCollection> {
    const empty: FeatureCollection = { type: 'FeatureCollection', features: [] };
    if (!query.trim()) return empty;
    try {
        const res = await fetch(nominatimUrl(query.trim(), limit));
        if (!res.ok) {
            console.error('[geocoder] Search failed:', res.statusText);
            return empty;
        }
        const body: unknown = await res.json();
        return isFeatureCollection(body) ? body : empty;
    } catch (error) {
        console.error('[geocoder] Search error:', error);
        return empty;
    }
}

export function placeName(feature: Feature): string {
    const name: unknown = feature.properties?.display_name ?? feature.properties?.name;
    return typeof name === 'string' ? name : '';
}

/** Center of the feature's bbox as [lng, lat], or null without one. */
export function bboxCenter(feature: Feature): [number, number] | null {
    const bbox = feature.bbox;
    if (!bbox || bbox.length < 4) return null;
    const [west, south, east, north] = bbox.length === 6 ? [bbox[0], bbox[1], bbox[3], bbox[4]] : bbox;
    return [(west + east) / 2, (south + north) / 2];
}
