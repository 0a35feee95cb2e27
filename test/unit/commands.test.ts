import { describe, expect, it } from 'vitest';
import type { CallRecord } from '../../src/store/IState';
import { decodeGlCommand, encodeGlCommand } from '../../src/protocol/gl-commands';
import { MAPBOX_SPEC_GUARDS, MAPLIBRE_SPEC_GUARDS } from '../../src/protocol/gl-spec-guards';
import { decodeLeafletCommand, isLeafletLayerRecord } from '../../src/protocol/leaflet-commands';
import { decodeOpenLayersCommand, encodeOpenLayersCommand } from '../../src/protocol/openlayers-commands';
import { decodeDeckCommand } from '../../src/protocol/deck-commands';
import { decodeCesiumCommand, isCesiumTerrainRecord } from '../../src/protocol/cesium-commands';
import { decodePotreeCommand, encodePotreeCommand } from '../../src/protocol/potree-commands';
import { CommandDecodeError } from '../../src/utils/errors';

function record(method: string, args: unknown[] = [], kwargs: Record<string, unknown> = {}): CallRecord {
    return { id: 1, method, args, kwargs };
}

describe('GL commands', () => {
    const decode = (r: CallRecord) => decodeGlCommand(r, MAPLIBRE_SPEC_GUARDS);

    it('reads camera options and drops fields of the wrong type', () => {
        expect(decode(record('flyTo', [{ center: [52.37, 4.89], zoom: 10, bearing: 'north' }]))).toEqual({
            kind: 'flyTo',
            camera: { center: [52.37, 4.89], zoom: 10 },
        });
    });

    it('defaults fitBounds padding to 50', () => {
        expect(decode(record('fitBounds', [[[50, 3], [54, 7]]]))).toEqual({
            kind: 'fitBounds',
            bounds: [[50, 3], [54, 7]],
            padding: 50,
        });
    });

    it('falls back to keyword arguments', () => {
        expect(decode(record('setOpacity', [], { layerId: 'roads', opacity: 0.4 }))).toEqual({
            kind: 'setOpacity',
            layerId: 'roads',
            opacity: 0.4,
        });
    });

    it('rejects a layer without id and type', () => {
        expect(() => decode(record('addLayer', [{ id: 'x' }])))
            .toThrow(new CommandDecodeError('addLayer', '"layer" must be a layer specification with id and type'));
    });

    it('accepts a style URL or a version 8 style object', () => {
        expect(decode(record('setStyle', ['https://tiles.example.com/style.json'])))
            .toEqual({ kind: 'setStyle', style: 'https://tiles.example.com/style.json' });
        const style = { version: 8, sources: {}, layers: [] };
        expect(decode(record('setStyle', [style]))).toEqual({ kind: 'setStyle', style });
        expect(() => decode(record('setStyle', [{ version: 7 }]))).toThrow(CommandDecodeError);
    });

    it('treats a missing terrain as removal', () => {
        expect(decode(record('setTerrain', [null]))).toEqual({ kind: 'setTerrain', terrain: null });
    });

    it('defaults control positions to top-right and rejects unknown ones', () => {
        expect(decode(record('addControl', ['navigation']))).toEqual({
            kind: 'addControl',
            control: { type: 'navigation', position: 'top-right', options: {} },
        });
        expect(() => decode(record('addControl', ['navigation', 'middle']))).toThrow(CommandDecodeError);
    });

    it('passes unknown methods through as dynamic calls', () => {
        expect(decode(record('setBearing', [45], { duration: 0 }))).toEqual({
            kind: 'dynamic',
            method: 'setBearing',
            args: [45],
            kwargs: { duration: 0 },
        });
    });

    it('encodes commands into the call shape it decodes', () => {
        const request = encodeGlCommand({ kind: 'fitBounds', bounds: [[1, 2], [3, 4]], padding: 20 });
        expect(request).toEqual({ method: 'fitBounds', args: [[[1, 2], [3, 4]], { padding: 20 }], kwargs: {} });
        expect(decode({ id: 2, ...request })).toEqual({ kind: 'fitBounds', bounds: [[1, 2], [3, 4]], padding: 20 });
    });

    it('carries Terra Draw options and position in one object', () => {
        const control = { type: 'terra_draw', position: 'bottom-right' as const, options: { modes: ['point'], open: false } };
        const request = encodeGlCommand({ kind: 'addTerraDrawControl', control });
        expect(request).toEqual({
            method: 'addTerraDrawControl',
            args: [{ modes: ['point'], open: false, position: 'bottom-right' }],
            kwargs: {},
        });
        expect(decode({ id: 3, ...request })).toEqual({ kind: 'addTerraDrawControl', control });
    });

    it('places a Terra Draw control top-left by default', () => {
        expect(decode(record('addTerraDrawControl'))).toEqual({
            kind: 'addTerraDrawControl',
            control: { type: 'terra_draw', position: 'top-left', options: {} },
        });
    });

    it('requires a FeatureCollection for Terra Draw data', () => {
        const data = { type: 'FeatureCollection', features: [] };
        expect(decode(record('loadTerraDrawData', [data]))).toEqual({ kind: 'loadTerraDrawData', data });
        expect(() => decode(record('loadTerraDrawData', [{ type: 'Point', coordinates: [0, 0] }]))).toThrow(CommandDecodeError);
    });

    it('reads Mapbox projections by name', () => {
        expect(decodeGlCommand(record('setProjection', [{ name: 'globe' }]), MAPBOX_SPEC_GUARDS))
            .toEqual({ kind: 'setProjection', projection: { name: 'globe' } });
        expect(() => decodeGlCommand(record('setProjection', [{ type: 'globe' }]), MAPBOX_SPEC_GUARDS))
            .toThrow(CommandDecodeError);
    });
});

describe('Leaflet commands', () => {
    it('reads flyTo duration from keyword arguments', () => {
        expect(decodeLeafletCommand(record('flyTo', [[48.85, 2.35], 12], { duration: 2000 }))).toEqual({
            kind: 'flyTo',
            center: [48.85, 2.35],
            zoom: 12,
            duration: 2000,
        });
    });

    it('defaults zoom deltas to one', () => {
        expect(decodeLeafletCommand(record('zoomIn'))).toEqual({ kind: 'zoomIn', delta: 1 });
    });

    it('validates layer records by type', () => {
        expect(isLeafletLayerRecord({ type: 'circle', latlng: [1, 2], radius: 100, style: { color: 'red' } })).toBe(true);
        expect(isLeafletLayerRecord({ type: 'circle', latlng: [1, 2], radius: '100', style: {} })).toBe(false);
        expect(isLeafletLayerRecord({ type: 'polygon', latlngs: [], style: {} })).toBe(false);
        expect(isLeafletLayerRecord({ type: 'heatmap' })).toBe(false);
    });
});

describe('OpenLayers commands', () => {
    it('defaults flyTo duration and fitBounds padding', () => {
        expect(decodeOpenLayersCommand(record('flyTo', [[40, -3]]))).toEqual({ kind: 'flyTo', center: [40, -3], duration: 1000 });
        expect(decodeOpenLayersCommand(record('fitBounds', [[[1, 2], [3, 4]]])))
            .toEqual({ kind: 'fitBounds', bounds: [[1, 2], [3, 4]], padding: 50 });
    });

    it('accepts only the known control types', () => {
        expect(decodeOpenLayersCommand(record('addControl', ['scaleline', { units: 'metric' }])))
            .toEqual({ kind: 'addControl', controlType: 'scaleline', options: { units: 'metric' } });
        expect(() => decodeOpenLayersCommand(record('addControl', ['compass']))).toThrow(
            '"type" must be one of zoom, rotate, attribution, scaleline, fullscreen, mouseposition, overviewmap'
        );
    });

    it('encodes duration and padding as keyword arguments', () => {
        expect(encodeOpenLayersCommand({ kind: 'flyTo', center: [1, 2], zoom: 5, duration: 500 }))
            .toEqual({ method: 'flyTo', args: [[1, 2], 5], kwargs: { duration: 500 } });
    });
});

describe('deck commands', () => {
    it('returns null for methods owned by the base map', () => {
        expect(decodeDeckCommand(record('flyTo', [{}]))).toBeNull();
    });

    it('validates the layer type', () => {
        const layer = { id: 'points', type: 'ScatterplotLayer', props: { data: [] } };
        expect(decodeDeckCommand(record('addDeckLayer', [layer]))).toEqual({ kind: 'addDeckLayer', layer });
        expect(() => decodeDeckCommand(record('addDeckLayer', [{ ...layer, type: 'PointCloudLayer' }])))
            .toThrow(CommandDecodeError);
    });
});

describe('Cesium commands', () => {
    it('fills flyTo orientation defaults', () => {
        expect(decodeCesiumCommand(record('flyTo', [{ lat: 45, lng: 7, height: 5000 }]))).toEqual({
            kind: 'flyTo',
            target: { lat: 45, lng: 7, height: 5000, heading: 0, pitch: -90, duration: 3 },
        });
    });

    it('requires numeric coordinates', () => {
        expect(() => decodeCesiumCommand(record('flyTo', [{ lat: 45 }])))
            .toThrow('Invalid arguments for "flyTo": "target" needs numeric lat, lng and height');
    });

    it('recognises terrain records', () => {
        expect(isCesiumTerrainRecord({ type: 'world' })).toBe(true);
        expect(isCesiumTerrainRecord({ type: 'url' })).toBe(false);
        expect(decodeCesiumCommand(record('setTerrain'))).toEqual({ kind: 'setTerrain', terrain: null });
    });
});

describe('Potree commands', () => {
    it('reads camera triples', () => {
        expect(decodePotreeCommand(record('setCameraPosition', [[1, 2, 3], [4, 5, 6]]))).toEqual({
            kind: 'setCameraPosition',
            position: [1, 2, 3],
            target: [4, 5, 6],
        });
        expect(() => decodePotreeCommand(record('setCameraPosition', [[1, 2]]))).toThrow(CommandDecodeError);
    });

    it('omits a missing camera target when encoding', () => {
        expect(encodePotreeCommand({ kind: 'setCameraPosition', position: [1, 2, 3] }))
            .toEqual({ method: 'setCameraPosition', args: [[1, 2, 3]], kwargs: {} });
    });
});
