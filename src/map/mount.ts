// src/map/mount.ts

import type { BackendName } from '../config/types';
import type { BackendTraitsMap } from '../store/backend-traits';
import type { TraitStore } from '../store/trait-store';
import { loadMapView } from './adapter-registry';
import type { Teardown } from './IMapAdapter';
import { renderMessageBox } from './view-support';

/** The part of a host widget mount() needs. Every MapWidget subclass fits. */
export interface MountableWidget<B extends BackendName> {
    readonly backend: B;
    createView(): TraitStore<BackendTraitsMap[B]>;
    releaseView(view: TraitStore<BackendTraitsMap[B]>): void;
}

/**
 * Renders a host widget into an element in the same page: links a fresh view
 * model to the widget and runs the backend's render function on it.
 * The returned teardown disposes the map and unlinks the view.
 *
 * @example
 * const map = new MapLibreMap({ center: [52.37, 4.89], zoom: 10 });
 * const teardown = await mount(map, document.getElementById('map')!);
 */
export async function mount<B extends BackendName>(widget: MountableWidget<B>, el: HTMLElement): Promise<Teardown> {
    const view = widget.createView();
    const module = await loadMapView(widget.backend);
    if (!module) {
        widget.releaseView(view);
        return renderMessageBox(el, `The ${widget.backend} view could not be loaded.`, 'error');
    }

    let teardown: Teardown;
    try {
        teardown = await module.render({ model: view, el });
    } catch (error) {
        widget.releaseView(view);
        throw error;
    }
    return () => {
        teardown();
        widget.releaseView(view);
    };
}
