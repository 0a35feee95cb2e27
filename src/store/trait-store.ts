// src/store/trait-store.ts
// Observable trait holder shared by host widgets and their views.
// A host store saves on every write; a view store buffers writes until
// save_changes(), the way a notebook front end does.

import isEqual from 'lodash/isEqual';

export type ChangeCallback = () => void;

/**
 * The model handed to render functions. Matches the subset of anywidget's
 * AnyModel the views use, so a real notebook model can be passed in unchanged.
 */
export interface WidgetModel<T extends object> {
    get<K extends keyof T>(name: K): T[K];
    set<K extends keyof T>(name: K, value: T[K]): void;
    on(eventName: string, callback: ChangeCallback): void;
    off(eventName?: string | null, callback?: ChangeCallback | null): void;
    save_changes(): void;
}

export interface TraitStoreOptions {
    /** Push every write to linked stores immediately. Hosts do, views don't. */
    autoSave?: boolean;
}

type TraitPatch<T> = Map<keyof T, T[keyof T]>;

export class TraitStore<T extends object> implements WidgetModel<T> {
    private state: T;
    private readonly listeners = new Map<string, Set<ChangeCallback>>();
    private readonly dirty = new Set<keyof T>();
    private readonly peers = new Set<TraitStore<T>>();
    private readonly autoSave: boolean;

    constructor(initial: T, options: TraitStoreOptions = {}) {
        this.state = { ...initial };
        this.autoSave = options.autoSave ?? true;
    }

    public get<K extends keyof T>(name: K): T[K] {
        return this.state[name];
    }

    public set<K extends keyof T>(name: K, value: T[K]): void {
        if (isEqual(this.state[name], value)) return;
        const next = { ...this.state };
        next[name] = value;
        this.state = next;
        this.dirty.add(name);
        this.notify(name);
        if (this.autoSave) {
            this.save_changes();
        }
    }

    public on(eventName: string, callback: ChangeCallback): void {
        let callbacks = this.listeners.get(eventName);
        if (!callbacks) {
            callbacks = new Set();
            this.listeners.set(eventName, callbacks);
        }
        callbacks.add(callback);
    }

    public off(eventName?: string | null, callback?: ChangeCallback | null): void {
        if (!eventName) {
            if (!callback) {
                this.listeners.clear();
                return;
            }
            this.listeners.forEach(callbacks => callbacks.delete(callback));
            return;
        }
        if (!callback) {
            this.listeners.delete(eventName);
            return;
        }
        this.listeners.get(eventName)?.delete(callback);
    }

    public save_changes(): void {
        if (this.dirty.size === 0) return;
        // Values are captured now: a peer reacting to this save may write again
        // before the remaining peers are reached.
        const patch: TraitPatch<T> = new Map();
        this.dirty.forEach(name => patch.set(name, this.state[name]));
        this.dirty.clear();
        for (const peer of this.peers) {
            peer.receive(this, patch);
        }
    }

    /** Connects a view store. Writes flow both ways from here on. */
    public link(peer: TraitStore<T>): void {
        if (peer === this) return;
        this.peers.add(peer);
        peer.peers.add(this);
    }

    public unlink(peer: TraitStore<T>): void {
        this.peers.delete(peer);
        peer.peers.delete(this);
    }

    public get peerCount(): number {
        return this.peers.size;
    }

    /** A deep copy of every trait, suitable for seeding a new view or exporting. */
    public snapshot(): T {
        return structuredClone(this.state);
    }

    public listenerCount(eventName: string): number {
        return this.listeners.get(eventName)?.size ?? 0;
    }

    private receive(source: TraitStore<T>, patch: TraitPatch<T>): void {
        const applied: Array<keyof T> = [];
        patch.forEach((incoming, name) => {
            if (isEqual(this.state[name], incoming)) return;
            const next = { ...this.state };
            next[name] = structuredClone(incoming);
            this.state = next;
            applied.push(name);
        });
        if (applied.length === 0) return;

        applied.forEach(name => this.notify(name));

        // Forward what this store holds now, which may already reflect a
        // listener's reaction to the incoming values.
        const forward: TraitPatch<T> = new Map();
        applied.forEach(name => forward.set(name, this.state[name]));
        for (const peer of this.peers) {
            if (peer !== source) {
                peer.receive(this, forward);
            }
        }
    }

    private notify(name: keyof T): void {
        const callbacks = this.listeners.get(`change:${String(name)}`);
        if (!callbacks) return;
        [...callbacks].forEach(callback => {
            try {
                callback();
            } catch (err) {
                console.error(`[TraitStore] Listener for "${String(name)}" failed:`, err);
            }
        });
    }
}

/**
 * Subscribes to one trait and returns the matching unsubscribe call,
 * which keeps view teardown a flat list of functions.
 */
export function onTrait<T extends object>(
    model: WidgetModel<T>,
    name: keyof T & string,
    callback: ChangeCallback
): () => void {
    const eventName = `change:${name}`;
    model.on(eventName, callback);
    return () => model.off(eventName, callback);
}
