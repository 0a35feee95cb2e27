// src/map/cesium-adapter.ts

import type { CesiumTraits } from '../store/backend-traits';
import type { CesiumCommand } from '../protocol/cesium-commands';
import { decodeCesiumCommand, isCesiumLayerRecord } from '../protocol/cesium-commands';
import type { DynamicCall } from '../protocol/dynamic-call';
import { invokeDynamic } from '../protocol/dynamic-call';
import { throttle } from '../utils/throttle';
import type { RenderProps, Teardown } from './IMapAdapter';
import { MapCoreService, cameraFromTraits } from './cesium-services/MapCoreService';
import { MapLayerService } from './cesium-services/MapLayerService';
import { CAMERA_SYNC_INTERVAL, ViewSession, createContainer } from './view-support';

const PERSISTED_KINDS: ReadonlySet<string> = new Set<CesiumCommand['kind']>(['addLayer', 'removeLayer', 'setTerrain']);

/** Calls whose effect `_layers` and `_terrain` already carry. */
export function isReplayedCesiumCommand(command: CesiumCommand | DynamicCall): boolean {
    return PERSISTED_KINDS.has(command.kind);
}

/**
 * Renders a Cesium globe. Layers and terrain are rebuilt from the traits;
 * the camera flows both ways in degrees and meters.
 */
export async function render({ model, el }: RenderProps<CesiumTraits>): Promise<Teardown> {
    const session = new ViewSession(model);
    const { container, dispose } = createContainer(el, model, 'anymap-cesium');
    session.disposables.add(dispose);

    const core = new MapCoreService(container, model);
    session.disposables.add(() => core.remove());
    const layers = new MapLayerService(core.viewer, (method, error) => session.report(method)(error));

    const terrain = model.get('_terrain');
    if (terrain) layers.setTerrain(terrain);
    Object.entries(model.get('_layers')).forEach(([id, record]) =>
        session.guard(`replay layer ${id}`, () => {
            if (!isCesiumLayerRecord(record)) {
                console.warn(`[LAYER SERVICE] Layer "${id}" has an unknown or invalid record; skipped.`);
                return;
            }
            layers.addLayer(id, record);
        }));

    const execute = (command: CesiumCommand | DynamicCall): void => {
        switch (command.kind) {
            case 'flyTo':
                core.flyTo(command.target);
                break;
            case 'homeView':
                core.homeView();
                break;
            case 'addLayer':
                layers.addLayer(command.id, command.layer);
                break;
            case 'removeLayer':
                layers.removeLayer(command.id);
                break;
            case 'setTerrain':
                layers.setTerrain(command.terrain);
                break;
            case 'dynamic':
                invokeDynamic(core.viewer, command, 'Cesium viewer');
                break;
        }
    };

    const syncCamera = (): void => core.syncCamera(cameraFromTraits(model));
    (['center', 'camera_height', 'heading', 'pitch', 'roll'] as const).forEach(name => session.watch(model, name, syncCamera));
    session.watch(model, 'width', () => core.resize());
    session.watch(model, 'height', () => core.resize());

    const pushCamera = throttle(() => {
        const camera = core.getCamera();
        model.set('center', camera.center);
        model.set('camera_height', camera.height);
        model.set('heading', camera.heading);
        model.set('pitch', camera.pitch);
        model.set('roll', camera.roll);
        model.save_changes();
    }, CAMERA_SYNC_INTERVAL);
    session.disposables.add(() => pushCamera.cancel());

    session.disposables.add(core.onClick((lngLat, point) => session.events.send('click', { lngLat, point })));
    session.disposables.add(core.onMoveEnd(() => {
        session.events.send('moveend', { ...core.getCamera() });
        pushCamera();
    }));

    session.startCalls(decodeCesiumCommand, execute, isReplayedCesiumCommand);
    session.events.send('load');

    return () => session.dispose();
}

export default { render };
