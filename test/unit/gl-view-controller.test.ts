import { beforeEach, describe, expect, it, vi } from 'vitest';
import type MapboxDraw from '@mapbox/mapbox-gl-draw';
import type { Feature, FeatureCollection } from 'geojson';
import type { ControlPosition, ControlRecord, LngLatTuple } from '../../src/store/IState';
import type { GlSpecTypes, GlTraits, MarkerRecord } from '../../src/store/backend-traits';
import { layerReplayOrder } from '../../src/store/backend-traits';
import { TraitStore } from '../../src/store/trait-store';
import type { CameraOptions } from '../../src/protocol/gl-commands';
import type { CameraState, ClickHandler, GlMapPort, Removable, TerraDrawHandle } from '../../src/map/IMapInterfaces';
import { GlViewController, isDrawLayer, isReplayedGlCommand } from '../../src/map/gl-services/GlViewController';
import { ViewSession } from '../../src/map/view-support';

vi.mock('@mapbox/mapbox-gl-draw', () => ({
    default: class {
        private data: FeatureCollection = { type: 'FeatureCollection', features: [] };
        set(data: FeatureCollection): string[] {
            this.data = structuredClone(data);
            return [];
        }
        getAll(): FeatureCollection {
            return structuredClone(this.data);
        }
        deleteAll(): this {
            this.data = { type: 'FeatureCollection', features: [] };
            return this;
        }
    },
}));

vi.mock('../../src/components/modules/anymap-layer-control', () => ({
    AnymapLayerControl: class {},
    LAYER_OPACITY_EVENT: 'layer-opacity',
    LAYER_VISIBILITY_EVENT: 'layer-visibility',
    readOpacityDetail: () => null,
    readVisibilityDetail: () => null,
}));

interface TestSpec extends GlSpecTypes {
    layer: { id: string; type: string; source?: string };
    source: { type: string };
}

type TestLayer = TestSpec['layer'];

class FakePort implements GlMapPort<TestSpec> {
    public readonly library = 'test-gl';
    public readonly ops: string[] = [];
    public readonly layers: TestLayer[] = [{ id: 'water', type: 'fill' }, { id: 'gl-draw-point', type: 'circle' }];
    public readonly sources = new Set<string>();
    public readonly dragHandlers = new Map<string, (lngLat: LngLatTuple) => void>();
    private readonly handlers = new Map<string, (event: unknown) => void>();

    onLoad(callback: () => void): void {
        callback();
    }
    onceStyleLoad(callback: () => void): void {
        callback();
    }
    onClick(_handler: ClickHandler): () => void {
        return () => undefined;
    }
    on(type: string, handler: (event: unknown) => void): () => void {
        this.handlers.set(type, handler);
        return () => this.handlers.delete(type);
    }
    fire(type: string, event: unknown): void {
        this.handlers.get(type)?.(event);
    }
    getCamera(): CameraState {
        return { center: [0, 0], zoom: 1, bearing: 0, pitch: 0 };
    }
    jumpTo(camera: CameraOptions): void {
        this.ops.push(`jumpTo ${JSON.stringify(camera)}`);
    }
    flyTo(camera: CameraOptions): void {
        this.ops.push(`flyTo ${JSON.stringify(camera)}`);
    }
    fitBounds(): void {
        this.ops.push('fitBounds');
    }
    setStyle(): void {
        this.ops.push('setStyle');
    }
    styleLayerIds(): string[] {
        return this.layers.map(layer => layer.id);
    }
    hasSource(id: string): boolean {
        return this.sources.has(id);
    }
    addSource(id: string): void {
        this.sources.add(id);
        this.ops.push(`addSource ${id}`);
    }
    removeSource(id: string): void {
        this.sources.delete(id);
        this.ops.push(`removeSource ${id}`);
    }
    hasLayer(id: string): boolean {
        return this.layers.some(layer => layer.id === id);
    }
    addLayer(layer: TestLayer, beforeId?: string): void {
        this.layers.push(layer);
        this.ops.push(beforeId ? `addLayer ${layer.id} before ${beforeId}` : `addLayer ${layer.id}`);
    }
    removeLayer(id: string): void {
        this.layers.splice(this.layers.findIndex(layer => layer.id === id), 1);
        this.ops.push(`removeLayer ${id}`);
    }
    layerType(id: string): string | undefined {
        return this.layers.find(layer => layer.id === id)?.type;
    }
    setLayoutProperty(layerId: string, name: string, value: unknown): void {
        this.ops.push(`layout ${layerId} ${name} ${String(value)}`);
    }
    setPaintProperty(layerId: string, name: string, value: unknown): void {
        this.ops.push(`paint ${layerId} ${name} ${String(value)}`);
    }
    setProjection(projection: unknown): void {
        this.ops.push(`setProjection ${String(projection)}`);
    }
    setTerrain(): void {
        this.ops.push('setTerrain');
    }
    addMarker(marker: MarkerRecord, onDragEnd: (lngLat: LngLatTuple) => void): Removable {
        this.dragHandlers.set(marker.coordinates.join(','), onDragEnd);
        this.ops.push(`addMarker ${marker.coordinates.join(',')}`);
        return { remove: () => this.ops.push('removeMarker') };
    }
    addLibraryControl(control: ControlRecord): Removable | null {
        if (control.type !== 'navigation') return null;
        this.ops.push(`addControl ${control.type}`);
        return { remove: () => this.ops.push(`removeControl ${control.type}`) };
    }
    addElementControl(_element: HTMLElement, position: ControlPosition): Removable {
        this.ops.push(`addElementControl ${position}`);
        return { remove: () => undefined };
    }
    addDrawControl(_draw: MapboxDraw, position: ControlPosition): Removable {
        this.ops.push(`addDrawControl ${position}`);
        return { remove: () => this.ops.push('removeDrawControl') };
    }
    prepareDraw(): void {
        this.ops.push('prepareDraw');
    }
    invoke(): void {
        this.ops.push('invoke');
    }
    remove(): void {
        this.ops.push('remove');
    }
}

class FakeTerraDraw implements TerraDrawHandle {
    public features: Feature[] = [];
    public removed = false;
    private readonly listeners = new Set<() => void>();

    snapshot(): FeatureCollection {
        return { type: 'FeatureCollection', features: structuredClone(this.features) };
    }
    load(data: FeatureCollection): string[] {
        this.features = data.features.filter(feature => feature.geometry.type === 'Point');
        return data.features.filter(feature => feature.geometry.type !== 'Point').map(feature => String(feature.id));
    }
    clear(): void {
        this.features = [];
    }
    onChange(listener: () => void): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }
    draw(feature: Feature): void {
        this.features.push(feature);
        this.listeners.forEach(listener => listener());
    }
    remove(): void {
        this.removed = true;
    }
}

class TerraDrawPort extends FakePort {
    public readonly terraDraw = new FakeTerraDraw();

    addTerraDrawControl(options: Record<string, unknown>, position: ControlPosition): TerraDrawHandle {
        this.ops.push(`addTerraDrawControl ${position} ${JSON.stringify(options)}`);
        return this.terraDraw;
    }
}

function traits(): GlTraits<TestSpec> {
    return {
        center: [52, 4],
        zoom: 6,
        width: '100%',
        height: '400px',
        style: 'https://tiles.example.com/style.json',
        bearing: 0,
        pitch: 0,
        antialias: false,
        _layers: { roads: { id: 'roads', type: 'line', source: 'roads-src' } },
        _sources: { 'roads-src': { type: 'geojson' } },
        _controls: {},
        _markers: { m1: { coordinates: [4, 52] } },
        _draw_data: { type: 'FeatureCollection', features: [] },
        _terra_draw_data: { type: 'FeatureCollection', features: [] },
        _before_ids: {},
        _layer_dict: {},
        _projection: 'globe',
        _terrain: null,
        _js_calls: [],
        _js_events: [],
        _queue: { capacity: 50, overflow: 'drop-oldest' },
        _widget_id: 'gl-test',
    };
}

const point: Feature = { type: 'Feature', id: 'p1', geometry: { type: 'Point', coordinates: [4, 52] }, properties: {} };
const square: Feature = {
    type: 'Feature',
    id: 'sq',
    geometry: { type: 'Polygon', coordinates: [[[4, 52], [5, 52], [5, 53], [4, 52]]] },
    properties: {},
};
const terraDrawControl: ControlRecord = { type: 'terra_draw', position: 'top-left', options: { open: false } };

describe('GlViewController', () => {
    let port: FakePort;
    let model: TraitStore<GlTraits<TestSpec>>;
    let controller: GlViewController<TestSpec>;
    let ready: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        port = new FakePort();
        model = new TraitStore(traits());
        controller = new GlViewController(port, model, new ViewSession(model));
        ready = vi.fn();
        controller.start(ready);
    });

    it('replays the persisted state once the map has loaded', () => {
        expect(port.ops).toEqual(['addSource roads-src', 'addLayer roads', 'addMarker 4,52', 'setProjection globe']);
        expect(ready).toHaveBeenCalledTimes(1);
        expect(model.get('_js_events')).toEqual([{ type: 'load' }]);
    });

    it('moves the camera when the camera traits change', () => {
        port.ops.length = 0;
        model.set('zoom', 9);
        expect(port.ops).toEqual(['jumpTo {"zoom":9}']);
    });

    it('re-adds dependent layers when a source is replaced', () => {
        port.ops.length = 0;
        controller.execute({ kind: 'addSource', id: 'roads-src', source: { type: 'vector' } });
        expect(port.ops).toEqual(['removeLayer roads', 'removeSource roads-src', 'addSource roads-src', 'addLayer roads']);
    });

    it('adds on top when the beforeId layer is missing', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        port.ops.length = 0;
        controller.execute({ kind: 'addLayer', layer: { id: 'labels', type: 'symbol' }, beforeId: 'nope' });

        expect(port.ops).toEqual(['addLayer labels']);
        expect(warn).toHaveBeenCalledWith('[LAYER SERVICE] test-gl: layer "nope" not found, adding "labels" on top.');
    });

    it('applies Background opacity to base style layers only', () => {
        port.ops.length = 0;
        controller.execute({ kind: 'setOpacity', layerId: 'Background', opacity: 0.5 });
        expect(port.ops).toEqual(['paint water fill-opacity 0.5']);
    });

    it('applies layer states written to _layer_dict', () => {
        port.ops.length = 0;
        model.set('_layer_dict', { roads: { name: 'Roads', visible: false, opacity: 0.25 } });
        expect(port.ops).toEqual(['layout roads visibility none', 'paint roads line-opacity 0.25']);
    });

    it('writes a dragged marker back to _markers', () => {
        port.dragHandlers.get('4,52')?.([5, 53]);

        expect(model.get('_markers').m1.coordinates).toEqual([5, 53]);
        expect(model.get('_js_events').at(-1)).toEqual({ type: 'marker_dragend', id: 'm1', lngLat: [5, 53] });
    });

    it('refuses a second control at the same position', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const control: ControlRecord = { type: 'navigation', position: 'top-right', options: {} };
        port.ops.length = 0;

        controller.execute({ kind: 'addControl', control });
        controller.execute({ kind: 'addControl', control });
        controller.execute({ kind: 'removeControl', controlType: 'navigation', position: 'top-right' });

        expect(port.ops).toEqual(['addControl navigation', 'removeControl navigation']);
        expect(warn).toHaveBeenCalledWith('[CORE SERVICE] test-gl: control "navigation_top-right" is already on the map.');
    });

    it('publishes draw changes to _draw_data and as events', () => {
        const data: FeatureCollection = { type: 'FeatureCollection', features: [point] };
        port.ops.length = 0;
        controller.execute({ kind: 'addControl', control: { type: 'draw', position: 'top-left', options: {} } });
        controller.execute({ kind: 'loadDrawData', data });
        port.fire('draw.create', { features: [point] });

        expect(port.ops).toEqual(['prepareDraw', 'addDrawControl top-left']);
        expect(model.get('_draw_data')).toEqual(data);
        expect(model.get('_js_events').at(-1)).toEqual({ type: 'draw.create', features: [point], allData: data });
    });

    it('warns when a draw call arrives without a draw control', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        controller.execute({ kind: 'getDrawData' });
        expect(warn).toHaveBeenCalledWith('[CORE SERVICE] test-gl: getDrawData needs a draw control.');
    });

    it('warns when the map has no Terra Draw', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        controller.execute({ kind: 'addTerraDrawControl', control: terraDrawControl });
        controller.execute({ kind: 'getTerraDrawData' });

        expect(warn).toHaveBeenCalledWith('[CORE SERVICE] test-gl: Terra Draw is not available on this map.');
        expect(warn).toHaveBeenCalledWith('[CORE SERVICE] test-gl: getTerraDrawData needs a Terra Draw control.');
    });

    it('removes markers and controls on dispose', () => {
        port.ops.length = 0;
        controller.dispose();
        expect(port.ops).toEqual(['removeMarker']);
    });
});

describe('GlViewController layer order', () => {
    it('replays each layer beneath the layer it was placed under', () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const port = new FakePort();
        const model = new TraitStore<GlTraits<TestSpec>>({
            ...traits(),
            _layers: {
                labels: { id: 'labels', type: 'symbol', source: 'roads-src' },
                roads: { id: 'roads', type: 'line', source: 'roads-src' },
            },
            _before_ids: { labels: 'roads' },
            _markers: {},
            _projection: null,
        });
        new GlViewController(port, model, new ViewSession(model)).start(vi.fn());

        expect(port.ops).toEqual(['addSource roads-src', 'addLayer roads', 'addLayer labels before roads']);
    });
});

describe('GlViewController Terra Draw', () => {
    let port: TerraDrawPort;
    let model: TraitStore<GlTraits<TestSpec>>;
    let controller: GlViewController<TestSpec>;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        port = new TerraDrawPort();
        model = new TraitStore<GlTraits<TestSpec>>({ ...traits(), _terra_draw_data: { type: 'FeatureCollection', features: [point] } });
        controller = new GlViewController(port, model, new ViewSession(model));
        controller.start(vi.fn());
        controller.execute({ kind: 'addTerraDrawControl', control: terraDrawControl });
    });

    it('loads the saved features into a new control', () => {
        expect(port.ops.at(-1)).toBe('addTerraDrawControl top-left {"open":false}');
        expect(port.terraDraw.features).toEqual([point]);
    });

    it('publishes drawing changes to _terra_draw_data and as events', () => {
        const second: Feature = { ...point, id: 'p2' };
        port.terraDraw.draw(second);

        const allData: FeatureCollection = { type: 'FeatureCollection', features: [point, second] };
        expect(model.get('_terra_draw_data')).toEqual(allData);
        expect(model.get('_js_events').at(-1)).toEqual({ type: 'terra_draw.change', allData });
    });

    it('names the features Terra Draw rejects', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        controller.execute({ kind: 'loadTerraDrawData', data: { type: 'FeatureCollection', features: [point, square] } });

        expect(warn).toHaveBeenCalledWith('[CORE SERVICE] test-gl: Terra Draw rejected features sq.');
        expect(model.get('_terra_draw_data')).toEqual({ type: 'FeatureCollection', features: [point] });
    });

    it('clears the control and the stored features', () => {
        controller.execute({ kind: 'clearTerraDrawData' });

        expect(port.terraDraw.features).toEqual([]);
        expect(model.get('_terra_draw_data')).toEqual({ type: 'FeatureCollection', features: [] });
    });

    it('keeps a single Terra Draw control per map', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        controller.execute({ kind: 'addTerraDrawControl', control: { ...terraDrawControl, position: 'bottom-left' } });

        expect(warn).toHaveBeenCalledWith('[CORE SERVICE] test-gl: only one Terra Draw control per map.');
    });

    it('reloads the control when the host replaces the features', () => {
        model.set('_terra_draw_data', { type: 'FeatureCollection', features: [] });
        expect(port.terraDraw.features).toEqual([]);
    });

    it('takes the control off the map on dispose', () => {
        controller.dispose();
        expect(port.terraDraw.removed).toBe(true);
    });
});

describe('GL command helpers', () => {
    it('knows which commands the replay covers', () => {
        expect(isReplayedGlCommand({ kind: 'addLayer' })).toBe(true);
        expect(isReplayedGlCommand({ kind: 'flyTo' })).toBe(false);
        expect(isReplayedGlCommand({ kind: 'dynamic' })).toBe(false);
    });

    it('orders layers after the layers they sit beneath', () => {
        expect(layerReplayOrder(['labels', 'roads', 'hills'], { labels: 'roads', roads: 'hills' }))
            .toEqual(['hills', 'roads', 'labels']);
    });

    it('keeps insertion order for layers placed beneath style layers', () => {
        expect(layerReplayOrder(['a', 'b'], { a: 'water' })).toEqual(['a', 'b']);
    });

    it('puts layers that wait on each other last', () => {
        expect(layerReplayOrder(['a', 'b', 'c'], { a: 'b', b: 'a' })).toEqual(['c', 'a', 'b']);
    });

    it('recognises draw layers by prefix', () => {
        expect(isDrawLayer('gl-draw-polygon-fill')).toBe(true);
        expect(isDrawLayer('anymap-draw-line')).toBe(true);
        expect(isDrawLayer('roads')).toBe(false);
    });
});
