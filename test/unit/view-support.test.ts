// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CoreTraits } from '../../src/store/IState';
import { TraitStore } from '../../src/store/trait-store';
import {
    CAMERA_SYNC_INTERVAL,
    Disposables,
    ViewSession,
    cameraSync,
    createContainer,
    renderMessageBox,
} from '../../src/map/view-support';

function coreTraits(): CoreTraits {
    return {
        center: [0, 0],
        zoom: 1,
        width: '100%',
        height: '400px',
        _layers: {},
        _sources: {},
        _js_calls: [],
        _js_events: [],
        _queue: { capacity: 10, overflow: 'drop-oldest' },
        _widget_id: 'w-1',
    };
}

describe('createContainer', () => {
    it('sizes the container from the traits and follows changes', () => {
        const model = new TraitStore(coreTraits());
        const el = document.createElement('div');
        const { container, dispose } = createContainer(el, model, 'anymap-test');

        expect(container.className).toBe('anymap-container anymap-test');
        expect(container.style.height).toBe('400px');

        model.set('height', '250px');
        expect(container.style.height).toBe('250px');

        dispose();
        expect(el.children.length).toBe(0);
        expect(model.listenerCount('change:height')).toBe(0);
    });
});

describe('renderMessageBox', () => {
    it('adds a message box that teardown removes', () => {
        const el = document.createElement('div');
        const remove = renderMessageBox(el, 'Nothing to show', 'warning');
        const box = el.querySelector('.anymap-message-warning');

        expect(box?.textContent).toBe('Nothing to show');
        remove();
        expect(el.children.length).toBe(0);
    });
});

describe('Disposables', () => {
    it('runs cleanups in reverse order and survives failures', () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const order: string[] = [];
        const disposables = new Disposables();
        disposables.add(() => order.push('first'));
        disposables.add(() => {
            throw new Error('broken');
        });
        disposables.add(() => order.push('last'));

        disposables.run();
        disposables.run();

        expect(order).toEqual(['last', 'first']);
    });
});

describe('ViewSession', () => {
    it('turns a failing step into an error event', () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const model = new TraitStore(coreTraits());
        const session = new ViewSession(model);

        session.guard('replay layer roads', () => {
            throw new Error('source missing');
        });

        expect(model.get('_js_events')).toEqual([{ type: 'error', method: 'replay layer roads', error: 'source missing' }]);
    });

    it('reports rejected steps', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const model = new TraitStore(coreTraits());
        new ViewSession(model).report('addLayer dem')('timeout');

        expect(model.get('_js_events')).toEqual([{ type: 'error', method: 'addLayer dem', error: 'timeout' }]);
    });

    it('stops watching traits after dispose', () => {
        const model = new TraitStore(coreTraits());
        const session = new ViewSession(model);
        const onZoom = vi.fn();
        session.watch(model, 'zoom', onZoom);

        model.set('zoom', 2);
        session.dispose();
        model.set('zoom', 3);

        expect(onZoom).toHaveBeenCalledTimes(1);
    });
});

describe('cameraSync', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('pushes the camera at most once per interval', () => {
        const host = new TraitStore(coreTraits());
        const view = new TraitStore(coreTraits(), { autoSave: false });
        host.link(view);
        let camera = { center: [10, 10] as [number, number], zoom: 4 };
        const disposables = new Disposables();
        const sync = cameraSync(view, () => camera, disposables);

        sync();
        expect(host.get('zoom')).toBe(4);

        camera = { center: [20, 20], zoom: 6 };
        sync();
        expect(host.get('zoom')).toBe(4);

        vi.advanceTimersByTime(CAMERA_SYNC_INTERVAL);
        expect(host.get('zoom')).toBe(6);
        expect(host.get('center')).toEqual([20, 20]);
    });

    it('drops a pending push on dispose', () => {
        const model = new TraitStore(coreTraits());
        let zoom = 2;
        const disposables = new Disposables();
        const sync = cameraSync(model, () => ({ center: [0, 0], zoom }), disposables);

        sync();
        zoom = 9;
        sync();
        disposables.run();
        vi.advanceTimersByTime(CAMERA_SYNC_INTERVAL * 2);

        expect(model.get('zoom')).toBe(2);
    });
});
