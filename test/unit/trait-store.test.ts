import { describe, expect, it, vi } from 'vitest';
import { TraitStore, onTrait } from '../../src/store/trait-store';

interface Traits {
    zoom: number;
    center: [number, number];
    label: string;
}

const initial = (): Traits => ({ zoom: 2, center: [0, 0], label: 'a' });

describe('TraitStore', () => {
    it('notifies change listeners for the written trait only', () => {
        const store = new TraitStore(initial());
        const onZoom = vi.fn();
        const onLabel = vi.fn();
        store.on('change:zoom', onZoom);
        store.on('change:label', onLabel);

        store.set('zoom', 5);

        expect(store.get('zoom')).toBe(5);
        expect(onZoom).toHaveBeenCalledTimes(1);
        expect(onLabel).not.toHaveBeenCalled();
    });

    it('ignores writes that are deeply equal to the current value', () => {
        const store = new TraitStore(initial());
        const onCenter = vi.fn();
        store.on('change:center', onCenter);

        store.set('center', [0, 0]);

        expect(onCenter).not.toHaveBeenCalled();
    });

    it('pushes host writes to linked views immediately', () => {
        const host = new TraitStore(initial());
        const view = new TraitStore(initial(), { autoSave: false });
        host.link(view);
        const onZoom = vi.fn();
        view.on('change:zoom', onZoom);

        host.set('zoom', 7);

        expect(view.get('zoom')).toBe(7);
        expect(onZoom).toHaveBeenCalledTimes(1);
        expect(host.peerCount).toBe(1);
    });

    it('buffers view writes until save_changes', () => {
        const host = new TraitStore(initial());
        const view = new TraitStore(initial(), { autoSave: false });
        host.link(view);

        view.set('label', 'moved');
        expect(host.get('label')).toBe('a');

        view.save_changes();
        expect(host.get('label')).toBe('moved');
    });

    it('forwards a view write to the other views through the host', () => {
        const host = new TraitStore(initial());
        const first = new TraitStore(initial(), { autoSave: false });
        const second = new TraitStore(initial(), { autoSave: false });
        host.link(first);
        host.link(second);

        first.set('center', [10, 20]);
        first.save_changes();

        expect(host.get('center')).toEqual([10, 20]);
        expect(second.get('center')).toEqual([10, 20]);
    });

    it('stops syncing after unlink', () => {
        const host = new TraitStore(initial());
        const view = new TraitStore(initial(), { autoSave: false });
        host.link(view);
        host.unlink(view);

        host.set('zoom', 9);

        expect(view.get('zoom')).toBe(2);
        expect(host.peerCount).toBe(0);
    });

    it('keeps notifying after a listener throws', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const store = new TraitStore(initial());
        const after = vi.fn();
        store.on('change:zoom', () => {
            throw new Error('boom');
        });
        store.on('change:zoom', after);

        store.set('zoom', 3);

        expect(after).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('removes every listener of an event when off is given no callback', () => {
        const store = new TraitStore(initial());
        store.on('change:zoom', vi.fn());
        store.on('change:zoom', vi.fn());

        store.off('change:zoom');

        expect(store.listenerCount('change:zoom')).toBe(0);
    });

    it('returns snapshots that do not share state with the store', () => {
        const store = new TraitStore(initial());
        const copy = store.snapshot();
        copy.center[0] = 99;

        expect(store.get('center')).toEqual([0, 0]);
    });
});

describe('onTrait', () => {
    it('returns an unsubscribe function', () => {
        const store = new TraitStore(initial());
        const callback = vi.fn();
        const unsubscribe = onTrait(store, 'zoom', callback);

        store.set('zoom', 4);
        unsubscribe();
        store.set('zoom', 6);

        expect(callback).toHaveBeenCalledTimes(1);
        expect(store.listenerCount('change:zoom')).toBe(0);
    });
});
