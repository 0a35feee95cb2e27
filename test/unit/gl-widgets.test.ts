import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_DEM_URL, GLOBE_PROJECTION, MapLibreMap } from '../../src/widgets/MapLibreMap';
import { MapboxMap } from '../../src/widgets/MapboxMap';
import { DeckGLMap } from '../../src/widgets/DeckGLMap';
import { EventSink } from '../../src/protocol/event-sink';
import { isClickEvent } from '../../src/store/map-events';
import type { MapEventRecord } from '../../src/store/IState';
import { WidgetConfigError } from '../../src/utils/errors';

const methods = (map: { traits: { _js_calls: Array<{ method: string }> } }) => map.traits._js_calls.map(call => call.method);

describe('MapLibreMap', () => {
    it('starts from the default traits', () => {
        const map = new MapLibreMap();
        const traits = map.traits;

        expect(traits.center).toEqual([0, 20]);
        expect(traits.style).toBe('https://basemaps.cartocdn.com/gl/dark-matter-gl-style/style.json');
        expect(Object.keys(traits._controls)).toEqual([
            'navigation_top-right',
            'fullscreen_top-right',
            'globe_top-right',
            'scale_bottom-left',
        ]);
        expect(traits._widget_id).toBe(map.widgetId);
        expect(map.widgetId.startsWith('maplibre-')).toBe(true);
    });

    it('rejects invalid options', () => {
        expect(() => new MapLibreMap({ zoom: 40 })).toThrow(
            new WidgetConfigError('Invalid maplibre widget options', ['zoom: "zoom" must be a number between 0 and 24'])
        );
    });

    it('persists and queues a GeoJSON layer with its source', () => {
        const map = new MapLibreMap({ controls: false });
        const data = { type: 'FeatureCollection' as const, features: [] };

        map.addGeojsonLayer('parks', data);

        expect(map.getSources()).toEqual({ parks_source: { type: 'geojson', data } });
        expect(map.getLayers()).toEqual({
            parks: { type: 'fill', paint: { 'fill-color': '#3388ff', 'fill-opacity': 0.5 }, id: 'parks', source: 'parks_source' },
        });
        expect(map.layerStates).toEqual({ parks: { name: 'parks', visible: true, opacity: 1 } });
        expect(methods(map)).toEqual(['addSource', 'addLayer']);
    });

    it('follows a hidden, translucent layer with visibility and opacity calls', () => {
        const map = new MapLibreMap();

        map.addTileLayer('tiles', 'https://tiles.example.com/{z}/{x}/{y}.png', { visible: false, opacity: 0.25 });

        expect(methods(map)).toEqual(['addSource', 'addLayer', 'setVisibility', 'setOpacity']);
        expect(map.layerStates.tiles).toEqual({ name: 'tiles', visible: false, opacity: 0.25 });
        expect(map.getSources().tiles_source).toEqual({
            type: 'raster',
            tiles: ['https://tiles.example.com/{z}/{x}/{y}.png'],
            tileSize: 256,
        });
    });

    it('replaces a layer added again under the same id', () => {
        const map = new MapLibreMap();
        map.addLayer('dots', { id: 'dots', type: 'circle', source: 'a' });
        map.addLayer('dots', { id: 'dots', type: 'circle', source: 'b' });

        expect(map.getLayers()).toEqual({ dots: { id: 'dots', type: 'circle', source: 'b' } });
    });

    it('clamps opacity and removes layer state with the layer', () => {
        const map = new MapLibreMap();
        map.addLayer('dots', { id: 'dots', type: 'circle', source: 'a' });

        map.setOpacity('dots', 1.5);
        expect(map.layerStates.dots.opacity).toBe(1);

        map.removeLayer('dots');
        expect(map.getLayers()).toEqual({});
        expect(map.layerStates).toEqual({});
        expect(methods(map).slice(-2)).toEqual(['setOpacity', 'removeLayer']);
    });

    it('takes the layers drawn from a source away with it', () => {
        const map = new MapLibreMap({ controls: false });
        map.addGeojsonLayer('a', { type: 'FeatureCollection', features: [] });
        map.addLayer('a_outline', { id: 'a_outline', type: 'line', source: 'a_source' });
        map.addLayer('other', { id: 'other', type: 'circle', source: 'b_source' });

        map.removeSource('a_source');

        expect(Object.keys(map.getLayers())).toEqual(['other']);
        expect(Object.keys(map.layerStates)).toEqual(['other']);
        expect(map.getSources()).toEqual({});
        expect(methods(map).slice(-3)).toEqual(['removeLayer', 'removeLayer', 'removeSource']);
    });

    it('keeps exactly the layers added and not removed', () => {
        const map = new MapLibreMap();
        const layer = (id: string) => ({ id, type: 'circle' as const, source: 'points' });
        const kept = new Set<string>();
        const steps: Array<[string, 'add' | 'remove']> = [
            ['a', 'add'], ['b', 'add'], ['a', 'remove'], ['c', 'add'],
            ['a', 'add'], ['b', 'remove'], ['d', 'add'], ['d', 'remove'], ['b', 'add'],
        ];

        steps.forEach(([id, step]) => {
            if (step === 'add') {
                map.addLayer(id, layer(id));
                kept.add(id);
            } else {
                map.removeLayer(id);
                kept.delete(id);
            }
        });

        expect(Object.keys(map.getLayers()).sort()).toEqual([...kept].sort());
        expect(Object.keys(map.layerStates).sort()).toEqual(['a', 'b', 'c']);
    });

    it('remembers which layer a layer was placed beneath', () => {
        const map = new MapLibreMap();
        map.addLayer('roads', { id: 'roads', type: 'line', source: 'osm' });
        map.addLayer('labels', { id: 'labels', type: 'symbol', source: 'osm' }, { beforeId: 'roads' });
        map.addLayer('water', { id: 'water', type: 'fill', source: 'osm' }, { beforeId: 'roads' });
        expect(map.traits._before_ids).toEqual({ labels: 'roads', water: 'roads' });

        map.addLayer('labels', { id: 'labels', type: 'symbol', source: 'osm' });
        map.removeLayer('water');

        expect(map.traits._before_ids).toEqual({});
        expect(map.traits._js_calls[1]).toEqual({
            id: 2,
            method: 'addLayer',
            args: [{ id: 'labels', type: 'symbol', source: 'osm' }, 'roads'],
            kwargs: {},
        });
    });

    it('puts paint properties on a COG layer', () => {
        const map = new MapLibreMap();
        map.addCogLayer('dem', 'https://data.example.com/dem.tif', { paint: { 'raster-contrast': 0.3 }, opacity: 0.8 });

        expect(map.getLayers().dem).toEqual({ id: 'dem', type: 'raster', source: 'dem_source', paint: { 'raster-contrast': 0.3 } });
        expect(map.getSources().dem_source).toEqual({ type: 'raster', url: 'cog://https://data.example.com/dem.tif', tileSize: 256 });
        expect(map.layerStates.dem).toEqual({ name: 'dem', visible: true, opacity: 0.8 });
    });

    it('adds a Background row for the layer control', () => {
        const map = new MapLibreMap();
        map.addLayerControl('top-left', { collapsed: false });

        expect(map.layerStates).toEqual({ Background: { name: 'Background', visible: true, opacity: 1 } });
        expect(map.traits._controls['layer_control_top-left']).toEqual({
            type: 'layer_control',
            position: 'top-left',
            options: { collapsed: false, layers: null },
        });
    });

    it('stores markers with [lng, lat] coordinates', () => {
        const map = new MapLibreMap();
        const id = map.addMarker(52.1, 5.1, { popup: 'Utrecht' });

        expect(id).toBe('marker_0');
        expect(map.traits._markers).toEqual({ marker_0: { coordinates: [5.1, 52.1], popup: 'Utrecht' } });
    });

    it('keeps draw data in step with deletions', () => {
        const map = new MapLibreMap();
        map.loadDrawData({ type: 'Feature', id: 'a', properties: {}, geometry: { type: 'Point', coordinates: [0, 0] } });
        map.loadDrawData({
            type: 'FeatureCollection',
            features: [
                { type: 'Feature', id: 'a', properties: {}, geometry: { type: 'Point', coordinates: [0, 0] } },
                { type: 'Feature', id: 'b', properties: {}, geometry: { type: 'Point', coordinates: [1, 1] } },
            ],
        });

        map.deleteDrawFeatures(['a']);

        expect(map.getDrawData().features.map(feature => feature.id)).toEqual(['b']);
    });

    it('asks open views for draw data only when none is stored', () => {
        const map = new MapLibreMap();
        map.getDrawData();
        expect(methods(map)).toEqual(['getDrawData']);
    });

    it('records a Terra Draw control and the features loaded into it', () => {
        const map = new MapLibreMap({ controls: false });
        const flag = { type: 'Feature', id: 'flag', properties: {}, geometry: { type: 'Point', coordinates: [4.9, 52.4] } };

        map.addTerraDraw('top-right', { modes: ['point', 'polygon'] });
        map.loadTerraDrawData(JSON.stringify(flag));

        expect(map.traits._controls['terra_draw_top-right']).toEqual({
            type: 'terra_draw',
            position: 'top-right',
            options: { modes: ['point', 'polygon'] },
        });
        expect(map.getTerraDrawData()).toEqual({ type: 'FeatureCollection', features: [flag] });
        expect(methods(map)).toEqual(['addTerraDrawControl', 'loadTerraDrawData']);

        map.clearTerraDrawData();
        expect(map.traits._terra_draw_data.features).toEqual([]);
        expect(methods(map).at(-1)).toBe('clearTerraDrawData');
    });

    it('asks open views for Terra Draw data only when none is stored', () => {
        const map = new MapLibreMap({ controls: false });
        map.getTerraDrawData();
        expect(methods(map)).toEqual(['getTerraDrawData']);
    });

    it('rejects Terra Draw data that is not a feature or collection', () => {
        const map = new MapLibreMap();
        expect(() => map.loadTerraDrawData('{"type":"Point","coordinates":[0,0]}'))
            .toThrow(new WidgetConfigError('Drawing data must be a GeoJSON Feature or FeatureCollection'));
        expect(() => map.loadTerraDrawData('{')).toThrow(WidgetConfigError);
    });

    it('expands projection and terrain shorthands', () => {
        const map = new MapLibreMap();
        map.setProjection('globe');
        map.setTerrain();

        const traits = map.traits;
        expect(traits._projection).toEqual(GLOBE_PROJECTION);
        expect(traits._sources['terrain-dem']).toEqual({ type: 'raster-dem', url: DEFAULT_DEM_URL, tileSize: 256 });
        expect(traits._terrain).toEqual({ source: 'terrain-dem', exaggeration: 1 });
        expect(methods(map)).toEqual(['setProjection', 'addSource', 'setTerrain']);
    });

    it('adds four styled layers for a PMTiles archive', () => {
        const map = new MapLibreMap();
        map.addPmtiles('https://data.example.com/city.pmtiles');

        expect(map.getSources()).toEqual({
            city_source: { type: 'vector', url: 'pmtiles://https://data.example.com/city.pmtiles', attribution: 'PMTiles' },
        });
        expect(Object.keys(map.getLayers())).toEqual(['city_landuse', 'city_roads', 'city_buildings', 'city_water']);
    });

    it('queues dynamic calls with keyword arguments', () => {
        const map = new MapLibreMap();
        const record = map.callWithOptions('easeTo', [], { zoom: 4 });

        expect(record).toEqual({ id: 1, method: 'easeTo', args: [], kwargs: { zoom: 4 } });
    });

    it('delivers view events to handlers and empties the event queue', () => {
        const map = new MapLibreMap();
        const view = map.createView();
        const received: MapEventRecord[] = [];
        map.onMapEvent('click', event => received.push(event));

        new EventSink(view).send('click', { lngLat: [4.9, 52.4], point: [100, 50] });

        expect(received).toEqual([{ type: 'click', lngLat: [4.9, 52.4], point: [100, 50] }]);
        expect(isClickEvent(received[0])).toBe(true);
        expect(map.traits._js_events).toEqual([]);
        expect(view.get('_js_events')).toEqual([]);
    });

    it('syncs camera writes from a view back to the host', () => {
        const map = new MapLibreMap();
        const view = map.createView();

        view.set('zoom', 7);
        view.set('center', [48.2, 16.4]);
        view.save_changes();

        expect(map.zoom).toBe(7);
        expect(map.center).toEqual([48.2, 16.4]);

        map.releaseView(view);
        expect(map.viewCount).toBe(0);
    });

    it('brings a linked view to the center and zoom set on the host', () => {
        const map = new MapLibreMap();
        const view = map.createView();

        map.setCenter(40.7128, -74.0060);
        map.setZoom(10);

        expect(view.get('center')).toEqual([40.7128, -74.006]);
        expect(view.get('zoom')).toBe(10);
        expect(map.center).toEqual(view.get('center'));
    });
});

describe('MapboxMap', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('reads the token from the environment', () => {
        vi.stubEnv('MAPBOX_TOKEN', 'test-token');
        const map = new MapboxMap();

        expect(map.accessToken).toBe('test-token');
        expect(map.traits.style).toBe('mapbox://styles/mapbox/streets-v12');
    });

    it('warns when no token is available', () => {
        vi.stubEnv('MAPBOX_TOKEN', '');
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        new MapboxMap();

        expect(warn).toHaveBeenCalledWith('[config] mapbox: no access token; pass accessToken or set MAPBOX_TOKEN.');
    });

    it('wraps projection names and uses 512 px terrain tiles', () => {
        const map = new MapboxMap({ accessToken: 'test-token' });
        map.setProjection('albers');
        map.setTerrain({ exaggeration: 1.5 });

        const traits = map.traits;
        expect(traits._projection).toEqual({ name: 'albers' });
        expect(traits._sources['mapbox-dem']).toEqual({ type: 'raster-dem', url: 'mapbox://mapbox.mapbox-terrain-dem-v1', tileSize: 512 });
        expect(traits._terrain).toEqual({ source: 'mapbox-dem', exaggeration: 1.5 });
    });
});

describe('DeckGLMap', () => {
    let map: DeckGLMap;

    beforeEach(() => {
        map = new DeckGLMap();
    });

    it('persists deck layers with their id in the props', () => {
        map.addScatterplotLayer('cities', [{ coordinates: [4.9, 52.4] }], { getRadius: 'population' });

        expect(map.getDeckLayers()).toEqual({
            cities: {
                id: 'cities',
                type: 'ScatterplotLayer',
                props: {
                    data: [{ coordinates: [4.9, 52.4] }],
                    getPosition: 'coordinates',
                    getRadius: 'population',
                    getFillColor: [255, 0, 0, 200],
                    radiusScale: 1,
                    radiusMinPixels: 1,
                    pickable: true,
                    id: 'cities',
                },
            },
        });
        expect(methods(map)).toEqual(['addDeckLayer']);
    });

    it('removes and clears deck layers', () => {
        map.addHeatmapLayer('heat', 'https://data.example.com/points.json');
        map.addArcLayer('arcs', []);
        map.removeDeckLayer('heat');
        expect(Object.keys(map.getDeckLayers())).toEqual(['arcs']);

        map.clearDeckLayers();
        expect(map.getDeckLayers()).toEqual({});
        expect(methods(map)).toEqual(['addDeckLayer', 'addDeckLayer', 'removeDeckLayer', 'clearDeckLayers']);
    });
});
