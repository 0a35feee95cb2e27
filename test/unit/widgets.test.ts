import { afterEach, describe, expect, it, vi } from 'vitest';
import { LeafletMap } from '../../src/widgets/LeafletMap';
import { OpenLayersMap } from '../../src/widgets/OpenLayersMap';
import { CesiumMap, heightForZoom } from '../../src/widgets/CesiumMap';
import { PotreeViewer, pointCloudName } from '../../src/widgets/PotreeViewer';
import { WidgetConfigError } from '../../src/utils/errors';

afterEach(() => {
    vi.unstubAllEnvs();
});

describe('LeafletMap', () => {
    it('keeps layers in the trait without queueing calls', () => {
        const map = new LeafletMap();
        const marker = map.addMarker([51.5, -0.1], { popup: 'London', draggable: true });
        const circle = map.addCircle([51.5, -0.1], 500, { color: 'red' });

        expect(marker).toBe('marker_0');
        expect(circle).toBe('circle_1');
        expect(map.getLayers()).toEqual({
            marker_0: { type: 'marker', latlng: [51.5, -0.1], draggable: true, popup: 'London' },
            circle_1: { type: 'circle', latlng: [51.5, -0.1], radius: 500, style: { color: 'red', fillColor: 'blue', fillOpacity: 0.2 } },
        });
        expect(map.traits._js_calls).toEqual([]);
    });

    it('does not reuse a generated id after a layer is removed', () => {
        const map = new LeafletMap();
        map.addMarker([51.5, -0.1]);
        const first = map.addCircle([51.5, -0.1], 100);
        map.removeLayer('marker_0');
        const second = map.addCircle([51.6, -0.2], 200);

        expect(first).toBe('circle_1');
        expect(second).toBe('circle_2');
        expect(Object.keys(map.getLayers())).toEqual(['circle_1', 'circle_2']);
    });

    it('parses GeoJSON strings and rejects non-GeoJSON', () => {
        const map = new LeafletMap();
        const id = map.addGeojson('{"type":"Point","coordinates":[1,2]}', {}, 'name');

        expect(map.getLayers()[id]).toEqual({
            type: 'geojson',
            data: { type: 'Point', coordinates: [1, 2] },
            style: {},
            popup_property: 'name',
        });
        expect(() => map.addGeojson('[1, 2]')).toThrow(new WidgetConfigError('GeoJSON string does not hold a GeoJSON object'));
        expect(() => map.addGeojson('{')).toThrow(/^GeoJSON string could not be parsed: /);
    });

    it('defaults GeoTIFF options', () => {
        const map = new LeafletMap();
        map.addGeotiff('https://data.example.com/dem.tif', { layerId: 'dem' });

        expect(map.getLayers().dem).toEqual({
            type: 'geotiff',
            url: 'https://data.example.com/dem.tif',
            fit_bounds: true,
            opacity: 1,
            resolution: 256,
        });
    });

    it('adds named basemaps as tile layers', () => {
        const map = new LeafletMap();
        map.addBasemap('OSM');

        expect(map.getLayers().OSM).toEqual({
            type: 'tile',
            url: 'https://tile.openstreetmap.org/{z}/{x}/{y}.png',
            attribution: '&copy; OpenStreetMap contributors',
            options: { maxZoom: 19 },
        });
    });

    it('queues camera moves with duration as a keyword', () => {
        const map = new LeafletMap();
        map.flyTo(48.85, 2.35, 12, 2000);
        map.zoomOut();

        expect(map.traits._js_calls).toEqual([
            { id: 1, method: 'flyTo', args: [[48.85, 2.35], 12], kwargs: { duration: 2000 } },
            { id: 2, method: 'zoomOut', args: [1], kwargs: {} },
        ]);
    });
});

describe('OpenLayersMap', () => {
    it('starts with the default controls', () => {
        expect(new OpenLayersMap().traits._controls).toEqual({ zoom: {}, rotate: {}, attribution: {} });
        expect(new OpenLayersMap({ controls: false }).traits._controls).toEqual({});
    });

    it('updates the stored record when opacity or visibility change', () => {
        const map = new OpenLayersMap();
        const id = map.addTileLayer('https://tiles.example.com/{z}/{x}/{y}.png');
        map.setLayerOpacity(id, -1);
        map.setLayerVisibility(id, false);

        expect(map.getLayers()[id]).toEqual({
            type: 'tile',
            url: 'https://tiles.example.com/{z}/{x}/{y}.png',
            opacity: 0,
            visible: false,
        });
        expect(map.traits._js_calls.map(call => call.method)).toEqual(['addLayer', 'setLayerOpacity', 'setLayerVisibility']);
    });

    it('persists controls by type', () => {
        const map = new OpenLayersMap({ controls: false });
        map.addControl('scaleline', { units: 'metric' });
        map.addControl('fullscreen');
        map.removeControl('fullscreen');

        expect(map.traits._controls).toEqual({ scaleline: { units: 'metric' } });
    });

    it('skips generated ids that are still in use', () => {
        const map = new OpenLayersMap();
        map.addMarker(40.4, -3.7);
        map.addTileLayer('https://tiles.example.com/a/{z}/{x}/{y}.png');
        map.removeLayer('marker_0');

        expect(map.addTileLayer('https://tiles.example.com/b/{z}/{x}/{y}.png')).toBe('tile_2');
        expect(Object.keys(map.getLayers())).toEqual(['tile_1', 'tile_2']);
    });

    it('stores markers as [lng, lat]', () => {
        const map = new OpenLayersMap();
        map.addMarker(40.4, -3.7, { popup: 'Madrid', layerId: 'madrid' });

        expect(map.getLayers().madrid).toEqual({
            type: 'marker',
            coordinates: [-3.7, 40.4],
            color: '#3388ff',
            opacity: 1,
            visible: true,
            popup: 'Madrid',
        });
    });
});

describe('CesiumMap', () => {
    it('derives the camera height from zoom', () => {
        vi.stubEnv('CESIUM_TOKEN', '');
        expect(heightForZoom(3)).toBe(5_000_000);
        expect(new CesiumMap({ zoom: 3 }).cameraHeight).toBe(5_000_000);
        expect(new CesiumMap({ zoom: 3, cameraHeight: 1200 }).cameraHeight).toBe(1200);
    });

    it('flies at the current height unless told otherwise', () => {
        const map = new CesiumMap({ cameraHeight: 8000 });
        map.flyTo(45, 7);

        expect(map.traits._js_calls[0]).toEqual({
            id: 1,
            method: 'flyTo',
            args: [{ lat: 45, lng: 7, height: 8000, heading: 0, pitch: -90, duration: 3 }],
            kwargs: {},
        });
    });

    it('warns when world terrain is set without a token', () => {
        vi.stubEnv('CESIUM_TOKEN', '');
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const map = new CesiumMap();

        map.setTerrain({ type: 'world' });

        expect(map.traits._terrain).toEqual({ type: 'world' });
        expect(warn).toHaveBeenCalledWith('[config] cesium: world terrain needs an ion token; pass accessToken or set CESIUM_TOKEN.');
    });

    it('numbers new layers past the ones still present', () => {
        vi.stubEnv('CESIUM_TOKEN', 'test-token');
        const map = new CesiumMap();
        const point = { type: 'Point' as const, coordinates: [7, 45] };
        map.addImageryLayer('https://tiles.example.com/{z}/{x}/{y}.png');
        map.addGeojson(point);
        map.removeLayer('imagery_0');

        expect(map.addGeojson(point)).toBe('geojson_2');
        expect(Object.keys(map.getLayers())).toEqual(['geojson_1', 'geojson_2']);
    });

    it('reads the token from the environment', () => {
        vi.stubEnv('CESIUM_TOKEN', 'test-token');
        expect(new CesiumMap().traits.access_token).toBe('test-token');
    });
});

describe('PotreeViewer', () => {
    it('names point clouds after their file', () => {
        expect(pointCloudName('https://data.example.com/clouds/lion.las')).toBe('lion');
        expect(pointCloudName('https://data.example.com/clouds/lion/metadata.json')).toBe('pointcloud');
    });

    it('stores the initial point cloud as a layer', () => {
        vi.stubEnv('POTREE_LIBS_DIR', 'https://cdn.example.com/potree/');
        const viewer = new PotreeViewer({ pointCloudUrl: 'https://data.example.com/lion.las' });

        expect(viewer.getLayers()).toEqual({ lion: { url: 'https://data.example.com/lion.las', name: 'lion', pointSize: 1 } });
        expect(viewer.traits.potree_libs_dir).toBe('https://cdn.example.com/potree/');
    });

    it('warns when no Potree build is configured', () => {
        vi.stubEnv('POTREE_LIBS_DIR', '');
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        new PotreeViewer();

        expect(warn).toHaveBeenCalledWith('[config] potree: no Potree build configured; pass potreeLibsDir or set POTREE_LIBS_DIR.');
    });

    it('fits to screen instead of flying', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const viewer = new PotreeViewer({ potreeLibsDir: 'https://cdn.example.com/potree' });
        viewer.flyTo();

        expect(viewer.traits._js_calls.map(call => call.method)).toEqual(['fitToScreen']);
    });
});
