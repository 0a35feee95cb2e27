// src/map/openlayers-adapter.ts

import type { OpenLayersTraits } from '../store/backend-traits';
import type { OpenLayersCommand } from '../protocol/openlayers-commands';
import { decodeOpenLayersCommand, isOpenLayersLayerRecord } from '../protocol/openlayers-commands';
import type { DynamicCall } from '../protocol/dynamic-call';
import { invokeDynamic } from '../protocol/dynamic-call';
import type { RenderProps, Teardown } from './IMapAdapter';
import { MapCoreService } from './openlayers-services/MapCoreService';
import { MapLayerService } from './openlayers-services/MapLayerService';
import { ViewSession, cameraSync, createContainer } from './view-support';

const PERSISTED_KINDS: ReadonlySet<string> = new Set<OpenLayersCommand['kind']>([
    'addLayer', 'removeLayer', 'setLayerVisibility', 'setLayerOpacity', 'addControl', 'removeControl',
]);

/** Calls whose effect `_layers` and `_controls` already carry. */
export function isReplayedOpenLayersCommand(command: OpenLayersCommand | DynamicCall): boolean {
    return PERSISTED_KINDS.has(command.kind);
}

/**
 * Renders an OpenLayers widget. Controls and layers are rebuilt from
 * `_controls` and `_layers`; later changes arrive as calls.
 */
export async function render({ model, el }: RenderProps<OpenLayersTraits>): Promise<Teardown> {
    const session = new ViewSession(model);
    const { container, dispose } = createContainer(el, model, 'anymap-openlayers');
    session.disposables.add(dispose);

    const core = new MapCoreService(container, model);
    session.disposables.add(() => core.remove());
    const layers = new MapLayerService(core.map, core.projection, (method, error) => session.report(method)(error));

    Object.entries(model.get('_controls')).forEach(([type, options]) =>
        session.guard(`replay control ${type}`, () => core.addControl(type, options)));
    Object.entries(model.get('_layers')).forEach(([id, record]) =>
        session.guard(`replay layer ${id}`, () => {
            if (!isOpenLayersLayerRecord(record)) {
                console.warn(`[LAYER SERVICE] Layer "${id}" has an unknown or invalid record; skipped.`);
                return;
            }
            layers.addLayer(id, record);
        }));

    const execute = (command: OpenLayersCommand | DynamicCall): void => {
        switch (command.kind) {
            case 'flyTo':
                core.flyTo(command.center, command.zoom, command.duration);
                break;
            case 'fitBounds':
                core.fitBounds(command.bounds, command.padding);
                break;
            case 'addLayer':
                layers.addLayer(command.id, command.layer);
                break;
            case 'removeLayer':
                layers.removeLayer(command.id);
                break;
            case 'setLayerVisibility':
                layers.setVisibility(command.id, command.visible);
                break;
            case 'setLayerOpacity':
                layers.setOpacity(command.id, command.opacity);
                break;
            case 'addControl':
                core.addControl(command.controlType, command.options);
                break;
            case 'removeControl':
                core.removeControl(command.controlType);
                break;
            case 'dynamic':
                invokeDynamic(core.map, command, 'OpenLayers map');
                break;
        }
    };

    const syncView = (): void => core.syncView(model.get('center'), model.get('zoom'), model.get('rotation'));
    session.watch(model, 'center', syncView);
    session.watch(model, 'zoom', syncView);
    session.watch(model, 'rotation', syncView);
    session.watch(model, 'basemap', () => core.setBasemap(model.get('basemap')));
    session.watch(model, 'width', () => core.updateSize());
    session.watch(model, 'height', () => core.updateSize());

    const pushCamera = cameraSync(model, () => core.getCamera(), session.disposables);
    session.disposables.add(core.onClick((lngLat, point) => session.events.send('click', { lngLat, point })));
    session.disposables.add(core.onMoveEnd(() => {
        session.events.send('moveend', { ...core.getCamera() });
        pushCamera();
    }));

    session.startCalls(decodeOpenLayersCommand, execute, isReplayedOpenLayersCommand);
    session.events.send('load');

    return () => session.dispose();
}

export default { render };
