// src/map/leaflet-adapter.ts

import type { LeafletTraits } from '../store/backend-traits';
import type { LeafletCommand } from '../protocol/leaflet-commands';
import { decodeLeafletCommand } from '../protocol/leaflet-commands';
import type { DynamicCall } from '../protocol/dynamic-call';
import { invokeDynamic } from '../protocol/dynamic-call';
import type { WidgetModel } from '../store/trait-store';
import type { RenderProps, Teardown } from './IMapAdapter';
import { MapCoreService } from './leaflet-services/MapCoreService';
import { MapLayerService } from './leaflet-services/MapLayerService';
import { ViewSession, cameraSync, createContainer } from './view-support';

/** Layer calls only mirror `_layers`, which the view has already drawn. */
export function isReplayedLeafletCommand(command: LeafletCommand | DynamicCall): boolean {
    return command.kind === 'addLayer' || command.kind === 'removeLayer';
}

function writeLayers(model: WidgetModel<LeafletTraits>, update: (layers: LeafletTraits['_layers']) => void): void {
    const layers = { ...model.get('_layers') };
    update(layers);
    model.set('_layers', layers);
    model.save_changes();
}

function execute(
    command: LeafletCommand | DynamicCall,
    core: MapCoreService,
    model: WidgetModel<LeafletTraits>
): void {
    switch (command.kind) {
        case 'flyTo':
            core.flyTo(command.center, command.zoom, command.duration);
            break;
        case 'setView':
            core.setView(command.center, command.zoom);
            break;
        case 'panTo':
            core.panTo(command.center);
            break;
        case 'fitBounds':
            core.fitBounds(command.bounds, command.padding);
            break;
        case 'zoomIn':
            core.zoomIn(command.delta);
            break;
        case 'zoomOut':
            core.zoomOut(command.delta);
            break;
        case 'addLayer':
            writeLayers(model, layers => {
                layers[command.id] = command.layer;
            });
            break;
        case 'removeLayer':
            writeLayers(model, layers => {
                delete layers[command.id];
            });
            break;
        case 'dynamic':
            invokeDynamic(core.map, command, 'Leaflet map');
            break;
    }
}

/**
 * Renders a Leaflet widget. Layers follow the `_layers` trait by diffing;
 * the camera flows both ways, view to host through the throttled sync.
 */
export async function render({ model, el }: RenderProps<LeafletTraits>): Promise<Teardown> {
    const session = new ViewSession(model);
    const { container, dispose } = createContainer(el, model, 'anymap-leaflet');
    session.disposables.add(dispose);

    const core = new MapCoreService(container, model);
    session.disposables.add(() => core.remove());

    const layers = new MapLayerService(core.map, {
        onMarkerMoved: (id, record, latlng) => {
            writeLayers(model, current => {
                current[id] = record;
            });
            session.events.send('marker_dragend', { id, latlng });
        },
        onError: (method, error) => session.report(method)(error),
    });
    session.disposables.add(() => layers.clear());
    session.guard('replay layers', () => layers.sync(model.get('_layers')));

    session.watch(model, '_layers', () => session.guard('sync layers', () => layers.sync(model.get('_layers'))));
    session.watch(model, 'tile_layer', () => session.guard('setTileLayer', () => core.setBaseLayer()));
    session.watch(model, 'attribution', () => session.guard('setTileLayer', () => core.setBaseLayer()));
    session.watch(model, 'center', () => core.syncView(model.get('center'), model.get('zoom')));
    session.watch(model, 'zoom', () => core.syncView(model.get('center'), model.get('zoom')));
    session.watch(model, 'width', () => core.invalidateSize());
    session.watch(model, 'height', () => core.invalidateSize());

    const pushCamera = cameraSync(model, () => core.getCamera(), session.disposables);
    session.disposables.add(core.onClick((lngLat, point) => session.events.send('click', { lngLat, point })));
    session.disposables.add(core.on('moveend', () => {
        session.events.send('moveend', { ...core.getCamera() });
        pushCamera();
    }));
    session.disposables.add(core.on('zoomend', () => session.events.send('zoomend', { zoom: core.map.getZoom() })));

    core.onReady(() => {
        session.startCalls(decodeLeafletCommand, command => execute(command, core, model), isReplayedLeafletCommand);
        session.events.send('load');
    });

    return () => session.dispose();
}

export default { render };
