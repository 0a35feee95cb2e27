import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InstanceRegistry } from '../../src/map/instance-registry';
import { InstanceConflictError } from '../../src/utils/errors';

describe('InstanceRegistry', () => {
    let registry: InstanceRegistry;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        registry = new InstanceRegistry();
    });

    it('lets one widget hold several views of an exclusive backend', () => {
        registry.acquire('potree', 'w-1', { exclusive: true });
        registry.acquire('potree', 'w-1', { exclusive: true });

        registry.release('w-1');
        expect(registry.isActive('w-1')).toBe(true);
        expect(registry.activeWidget('potree')).toBe('w-1');

        registry.release('w-1');
        expect(registry.isActive('w-1')).toBe(false);
        expect(registry.activeWidget('potree')).toBeNull();
    });

    it('refuses a second widget on an exclusive backend', () => {
        registry.acquire('potree', 'w-1', { exclusive: true });

        expect(() => registry.acquire('potree', 'w-2', { exclusive: true })).toThrow(
            new InstanceConflictError('potree', 'w-1', 'w-2')
        );
        expect(registry.size).toBe(1);
    });

    it('frees the exclusive slot for the next widget', () => {
        registry.acquire('potree', 'w-1', { exclusive: true });
        registry.release('w-1');

        registry.acquire('potree', 'w-2', { exclusive: true });
        expect(registry.activeWidget('potree')).toBe('w-2');
    });

    it('allows any number of widgets on shared backends', () => {
        registry.acquire('leaflet', 'a');
        registry.acquire('leaflet', 'b');
        expect(registry.size).toBe(2);
    });

    it('warns when releasing an unknown widget', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        registry.release('ghost');
        expect(warn).toHaveBeenCalledWith('[instance-registry] No active view for ghost.');
    });

    it('names both widgets in the conflict message', () => {
        expect(new InstanceConflictError('potree', 'w-1', 'w-2').message).toBe(
            'Only one potree view can be active at a time (widget "w-1" is active, "w-2" was requested). Close the other view first.'
        );
    });
});
