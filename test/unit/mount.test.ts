// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MapEventRecord } from '../../src/store/IState';
import { mount } from '../../src/map/mount';
import { instanceRegistry } from '../../src/map/instance-registry';
import { LeafletMap } from '../../src/widgets/LeafletMap';
import { PotreeViewer } from '../../src/widgets/PotreeViewer';

const leafletRender = vi.hoisted(() => vi.fn());

vi.mock('../../src/map/leaflet-adapter', () => ({
    render: leafletRender,
    default: { render: leafletRender },
}));

vi.mock('../../src/utils/asset-loader', async importOriginal => ({
    ...await importOriginal<typeof import('../../src/utils/asset-loader')>(),
    loadStyle: vi.fn(),
    loadScriptsInOrder: vi.fn(() => Promise.resolve()),
}));

class FakePotreeViewer {
    scene = {
        pointclouds: [],
        scenePointCloud: { remove: vi.fn() },
        view: { position: { set: vi.fn() }, lookAt: vi.fn() },
        addPointCloud: vi.fn(),
    };
    setEDLEnabled = vi.fn();
    setFOV = vi.fn();
    setPointBudget = vi.fn();
    setDescription = vi.fn();
    setBackground = vi.fn();
    fitToScreen = vi.fn();
    loadGUI = vi.fn();
    setLanguage = vi.fn();
}

describe('mount', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.stubEnv('POTREE_LIBS_DIR', '');
        leafletRender.mockReset();
        instanceRegistry.clear();
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        vi.unstubAllGlobals();
    });

    it('renders a linked view and unlinks it on teardown', async () => {
        const teardownView = vi.fn();
        leafletRender.mockResolvedValue(teardownView);
        const map = new LeafletMap();
        const el = document.createElement('div');

        const teardown = await mount(map, el);
        expect(map.viewCount).toBe(1);
        expect(leafletRender.mock.calls[0][0].el).toBe(el);

        teardown();
        expect(teardownView).toHaveBeenCalledTimes(1);
        expect(map.viewCount).toBe(0);
    });

    it('unlinks the view when render fails', async () => {
        leafletRender.mockRejectedValue(new Error('no canvas'));
        const map = new LeafletMap();

        await expect(mount(map, document.createElement('div'))).rejects.toThrow('no canvas');
        expect(map.viewCount).toBe(0);
    });

    it('shows a warning when Potree has no build configured', async () => {
        const viewer = new PotreeViewer();
        const el = document.createElement('div');

        const teardown = await mount(viewer, el);

        expect(el.querySelector('.anymap-message-warning')?.textContent).toBe(
            'No Potree build configured. Pass potreeLibsDir or set POTREE_LIBS_DIR to the URL of a Potree build.'
        );
        expect(instanceRegistry.activeWidget('potree')).toBe(viewer.widgetId);
        teardown();
        expect(instanceRegistry.activeWidget('potree')).toBeNull();
    });

    it('loads the initial point cloud once', async () => {
        const loadPointCloud = vi.fn();
        vi.stubGlobal('Potree', { Viewer: FakePotreeViewer, loadPointCloud, PointSizeType: { ADAPTIVE: 2 } });
        const viewer = new PotreeViewer({
            pointCloudUrl: 'https://data.example.com/lion.las',
            potreeLibsDir: 'https://cdn.example.com/potree',
        });

        const teardown = await mount(viewer, document.createElement('div'));

        expect(loadPointCloud).toHaveBeenCalledTimes(1);
        expect(loadPointCloud).toHaveBeenCalledWith('https://data.example.com/lion.las', 'lion', expect.any(Function));
        teardown();
    });

    it('refuses a second Potree widget while one is shown', async () => {
        const first = new PotreeViewer();
        const second = new PotreeViewer();
        const errors: MapEventRecord[] = [];
        second.onMapEvent('error', event => errors.push(event));
        const el = document.createElement('div');

        const teardownFirst = await mount(first, document.createElement('div'));
        await mount(second, el);

        const message = `Only one potree view can be active at a time (widget "${first.widgetId}" is active, ` +
            `"${second.widgetId}" was requested). Close the other view first.`;
        expect(el.querySelector('.anymap-message-error')?.textContent).toBe(message);
        expect(errors).toEqual([{ type: 'error', method: 'render', error: message }]);
        teardownFirst();
    });
});
