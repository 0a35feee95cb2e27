// src/map/instance-registry.ts
// Live views keyed by widget id. Backends that keep global state (Potree
// owns the page's render area) take an exclusive slot.

import { InstanceConflictError } from '../utils/errors';

export interface AcquireOptions {
    /** At most one widget of this backend may hold a view at a time. */
    exclusive?: boolean;
}

interface Slot {
    backend: string;
    views: number;
}

export class InstanceRegistry {
    private readonly slots = new Map<string, Slot>();
    private readonly exclusiveOwners = new Map<string, string>();

    /**
     * Registers one view of a widget. A widget may hold several views; an
     * exclusive backend refuses a second widget while one is active.
     *
     * @throws InstanceConflictError
     */
    public acquire(backend: string, widgetId: string, options: AcquireOptions = {}): void {
        if (options.exclusive) {
            const owner = this.exclusiveOwners.get(backend);
            if (owner !== undefined && owner !== widgetId) {
                throw new InstanceConflictError(backend, owner, widgetId);
            }
            this.exclusiveOwners.set(backend, widgetId);
        }
        const slot = this.slots.get(widgetId);
        if (slot) {
            slot.views += 1;
        } else {
            this.slots.set(widgetId, { backend, views: 1 });
        }
        console.log(`[instance-registry] ${backend} view acquired for ${widgetId}.`);
    }

    /** Frees one view of a widget. The last one frees its exclusive slot. */
    public release(widgetId: string): void {
        const slot = this.slots.get(widgetId);
        if (!slot) {
            console.warn(`[instance-registry] No active view for ${widgetId}.`);
            return;
        }
        slot.views -= 1;
        if (slot.views > 0) return;
        this.slots.delete(widgetId);
        if (this.exclusiveOwners.get(slot.backend) === widgetId) {
            this.exclusiveOwners.delete(slot.backend);
        }
    }

    public isActive(widgetId: string): boolean {
        return this.slots.has(widgetId);
    }

    public activeWidget(backend: string): string | null {
        return this.exclusiveOwners.get(backend) ?? null;
    }

    public get size(): number {
        return this.slots.size;
    }

    public clear(): void {
        this.slots.clear();
        this.exclusiveOwners.clear();
    }
}

/** The registry the bundled views use. */
export const instanceRegistry = new InstanceRegistry();
