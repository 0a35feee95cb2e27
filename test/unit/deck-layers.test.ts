import type { Feature } from 'geojson';
import { describe, expect, it, vi } from 'vitest';
import { DeckLayerFactory, fieldAccessor, resolveDeckProps } from '../../src/map/deckgl-services/DeckLayerFactory';
import { bboxCenter, nominatimUrl, placeName } from '../../src/map/gl-services/nominatim';
import { DECK_LAYER_TYPES } from '../../src/store/backend-traits';

const fakes = vi.hoisted(() => {
    class FakeLayer {
        constructor(public readonly props: Record<string, unknown>) {}
    }
    const layerClass = (name: string) => ({ [name]: class extends FakeLayer {} })[name];
    return { FakeLayer, layerClass };
});

vi.mock('@deck.gl/core', () => ({ Layer: fakes.FakeLayer }));

vi.mock('@deck.gl/layers', () => Object.fromEntries(
    ['ArcLayer', 'ColumnLayer', 'GeoJsonLayer', 'IconLayer', 'LineLayer', 'PathLayer', 'PolygonLayer', 'ScatterplotLayer', 'TextLayer']
        .map(name => [name, fakes.layerClass(name)])
));

vi.mock('@deck.gl/aggregation-layers', () => Object.fromEntries(
    ['GridLayer', 'HeatmapLayer', 'HexagonLayer'].map(name => [name, fakes.layerClass(name)])
));

describe('fieldAccessor', () => {
    it('reads the datum first, then its properties', () => {
        const weight = fieldAccessor('weight');

        expect(weight({ weight: 3, properties: { weight: 9 } })).toBe(3);
        expect(weight({ type: 'Feature', properties: { weight: 9 } })).toBe(9);
        expect(weight({ type: 'Feature' })).toBeUndefined();
        expect(weight(42)).toBeUndefined();
    });
});

describe('resolveDeckProps', () => {
    it('turns get* field names into accessors and keeps the rest', () => {
        const props = resolveDeckProps({
            id: 'stations',
            type: 'ScatterplotLayer',
            props: { getRadius: 'size', getFillColor: [255, 0, 0], radiusScale: 10, id: 'ignored' },
        });

        expect(props.id).toBe('stations');
        expect(props.getFillColor).toEqual([255, 0, 0]);
        expect(props.radiusScale).toBe(10);
        expect(typeof props.getRadius).toBe('function');
    });
});

describe('DeckLayerFactory', () => {
    it('builds the named layer class with resolved props', () => {
        const layer = DeckLayerFactory.create({ id: 'heat', type: 'HeatmapLayer', props: { getWeight: 'count' } });

        expect(layer.constructor.name).toBe('HeatmapLayer');
        expect(layer).toBeInstanceOf(fakes.FakeLayer);
        expect(Reflect.get(layer, 'props')).toMatchObject({ id: 'heat' });
    });

    it('has a layer class for every layer type', () => {
        DECK_LAYER_TYPES.forEach(type => {
            const layer = DeckLayerFactory.create({ id: type, type, props: {} });
            expect(layer.constructor.name).toBe(type);
            expect(Reflect.get(layer, 'props')).toEqual({ id: type });
        });
    });
});

describe('nominatim helpers', () => {
    it('builds a geojson search url', () => {
        expect(nominatimUrl('Den Haag', 3)).toBe(
            'https://nominatim.openstreetmap.org/search?format=geojson&polygon_geojson=1&addressdetails=1&q=Den+Haag&limit=3'
        );
    });

    it('centers on the bbox in 2D and 3D', () => {
        const feature: Feature = { type: 'Feature', geometry: { type: 'Point', coordinates: [2, 15] }, properties: {} };
        expect(bboxCenter({ ...feature, bbox: [0, 10, 4, 20] })).toEqual([2, 15]);
        expect(bboxCenter({ ...feature, bbox: [0, 10, 0, 4, 20, 100] })).toEqual([2, 15]);
        expect(bboxCenter(feature)).toBeNull();
    });

    it('prefers display_name for the label', () => {
        const point: Feature = { type: 'Feature', geometry: { type: 'Point', coordinates: [5.1, 52.1] }, properties: null };
        expect(placeName({ ...point, properties: { display_name: 'Utrecht, NL', name: 'Utrecht' } })).toBe('Utrecht, NL');
        expect(placeName(point)).toBe('');
    });
});
