import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    clearConfigCache,
    formatValidationMessages,
    loadBackendOptions,
    loadWidgetConfig,
    mergeWidgetOptions,
    validateWidgetConfigFile,
    validateWidgetOptions,
} from '../../src/config/index';
import { requireBasemap, requireTileUrl, resolveBasemap, resolveStyleUrl } from '../../src/config/basemaps';
import { potreeAssetUrl } from '../../src/config/cdn';
import { resolveGlStyle } from '../../src/widgets/gl-layer-builders';

describe('validateWidgetOptions', () => {
    it('accepts valid options', () => {
        const result = validateWidgetOptions('maplibre', { center: [52.37, 4.89], zoom: 10, style: 'positron' });
        expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('reports out-of-range values with their path', () => {
        const result = validateWidgetOptions('leaflet', { center: [120, 0], zoom: 30 });
        expect(result.valid).toBe(false);
        expect(formatValidationMessages(result.errors)).toEqual([
            'center: "center" must be [latitude, longitude] array with valid values',
            'zoom: "zoom" must be a number between 0 and 24',
        ]);
    });

    it('warns about unknown keys without failing', () => {
        const result = validateWidgetOptions('openlayers', { basemap: 'OSM', colour: 'red' });
        expect(result.valid).toBe(true);
        expect(formatValidationMessages(result.warnings)).toEqual(['colour: Unknown property "colour" will be ignored']);
    });

    it('checks nested queue options', () => {
        const result = validateWidgetOptions('cesium', { queue: { capacity: 0, overflow: 'block' } });
        expect(formatValidationMessages(result.errors)).toEqual([
            'queue.capacity: "capacity" must be a positive integer',
            'queue.overflow: "overflow" must be one of: drop-oldest, drop-newest, error',
        ]);
    });

    it('rejects non-objects', () => {
        expect(validateWidgetOptions('potree', 'fast').errors).toEqual([
            { severity: 'error', path: '', message: 'Options must be an object' },
        ]);
    });
});

describe('validateWidgetConfigFile', () => {
    it('keeps only values that passed', () => {
        const result = validateWidgetConfigFile({ leaflet: { zoom: 5, tileLayer: 7 }, potree: { fov: 75 } });
        expect(result.valid).toBe(false);
        expect(result.config).toEqual({ leaflet: { zoom: 5 }, potree: { fov: 75 } });
    });

    it('warns about unknown backends', () => {
        const result = validateWidgetConfigFile({ googlemaps: {} });
        expect(formatValidationMessages(result.warnings)).toEqual(['googlemaps: Unknown property "googlemaps" will be ignored']);
    });
});

describe('mergeWidgetOptions', () => {
    it('overrides only defined values, later sources winning', () => {
        const merged = mergeWidgetOptions({ zoom: 1, width: '100%' }, { zoom: 4 }, { zoom: undefined, width: '50%' });
        expect(merged).toEqual({ zoom: 4, width: '50%' });
    });
});

describe('loadWidgetConfig', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'widget-config-'));
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        clearConfigCache();
        await rm(dir, { recursive: true, force: true });
    });

    it('reads a backend section from a file', async () => {
        const file = join(dir, 'maps.json');
        await writeFile(file, JSON.stringify({ openlayers: { zoom: 6, basemap: 'Topo' } }), 'utf8');

        const options = await loadBackendOptions(file, 'openlayers');

        expect(options?.zoom).toBe(6);
        expect(options?.basemap).toBe('Topo');
    });

    it('caches by source', async () => {
        const file = join(dir, 'maps.json');
        await writeFile(file, JSON.stringify({ cesium: { heading: 10 } }), 'utf8');
        const first = await loadWidgetConfig(file);
        await writeFile(file, JSON.stringify({ cesium: { heading: 20 } }), 'utf8');

        expect(await loadWidgetConfig(file)).toBe(first);
    });

    it('rejects invalid files', async () => {
        const file = join(dir, 'bad.json');
        await writeFile(file, JSON.stringify({ mapbox: { pitch: 90 } }), 'utf8');

        await expect(loadWidgetConfig(file)).rejects.toThrow(
            `Invalid config from "${file}":\n  mapbox.pitch: "pitch" must be a number between 0 and 85`
        );
    });
});

describe('basemaps', () => {
    it('resolves aliases and ignores case', () => {
        expect(resolveBasemap('OSM')?.url).toBe('https://tile.openstreetmap.org/{z}/{x}/{y}.png');
        expect(resolveBasemap('cartodb.positron')?.url).toBe('https://a.basemaps.cartocdn.com/light_all/{z}/{x}/{y}.png');
        expect(resolveBasemap('Nowhere')).toBeNull();
    });

    it('throws for unknown names', () => {
        expect(() => requireBasemap('Nowhere')).toThrow(/^Basemap "Nowhere" not found\. Available basemaps: OpenStreetMap\.Mapnik, /);
    });

    it('passes URL templates through requireTileUrl', () => {
        expect(requireTileUrl('https://tiles.example.com/{z}/{x}/{y}.png'))
            .toEqual({ url: 'https://tiles.example.com/{z}/{x}/{y}.png', attribution: '' });
        expect(requireTileUrl('OpenStreetMap'))
            .toEqual({ url: 'https://tile.openstreetmap.org/{z}/{x}/{y}.png', attribution: '&copy; OpenStreetMap contributors' });
    });

    it('resolves named styles and leaves URLs alone', () => {
        expect(resolveStyleUrl('Positron')).toBe('https://basemaps.cartocdn.com/gl/positron-gl-style/style.json');
        expect(resolveStyleUrl('https://tiles.example.com/style.json')).toBe('https://tiles.example.com/style.json');
    });

    it('turns provider names into one-layer raster styles', () => {
        expect(resolveGlStyle('OpenTopoMap')).toEqual({
            version: 8,
            sources: {
                OpenTopoMap: {
                    type: 'raster',
                    tiles: ['https://a.tile.opentopomap.org/{z}/{x}/{y}.png'],
                    tileSize: 256,
                    attribution: resolveBasemap('OpenTopoMap')?.attribution,
                    maxzoom: resolveBasemap('OpenTopoMap')?.maxZoom,
                },
            },
            layers: [{ id: 'OpenTopoMap', type: 'raster', source: 'OpenTopoMap' }],
        });
    });

    it('joins Potree asset paths without doubled slashes', () => {
        expect(potreeAssetUrl('https://cdn.example.com/potree/', '/build/potree.js'))
            .toBe('https://cdn.example.com/potree/build/potree.js');
    });
});
