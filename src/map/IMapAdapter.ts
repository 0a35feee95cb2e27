import type { BackendName } from '../config/types';
import type { BackendTraitsMap } from '../store/backend-traits';
import type { WidgetModel } from '../store/trait-store';

/** What a notebook front end hands to a widget's render function. */
export interface RenderProps<T extends object> {
  model: WidgetModel<T>;
  el: HTMLElement;
}

/** Undoes everything a render did: listeners, observers, markers and the map itself. */
export type Teardown = () => void;

export type RenderFunction<T extends object> = (props: RenderProps<T>) => Promise<Teardown>;

/**
 * A backend view module. Each `*-adapter.ts` exports `render` and
 * `export default { render }`, the shape anywidget loads.
 *
 * @example
 * const { render } = await import('./maplibre-adapter');
 * const teardown = await render({ model: widget.createView(), el });
 */
export interface MapViewModule<B extends BackendName> {
  render: RenderFunction<BackendTraitsMap[B]>;
}
