// src/map/potree-adapter.ts

import type { PotreeTraits } from '../store/backend-traits';
import type { PotreeCommand } from '../protocol/potree-commands';
import { decodePotreeCommand } from '../protocol/potree-commands';
import type { DynamicCall } from '../protocol/dynamic-call';
import { invokeDynamic } from '../protocol/dynamic-call';
import { EventSink } from '../protocol/event-sink';
import { potreeAssets } from '../config/cdn';
import { loadScriptsInOrder, loadStyle } from '../utils/asset-loader';
import { describeError } from '../utils/errors';
import type { RenderProps, Teardown } from './IMapAdapter';
import { instanceRegistry } from './instance-registry';
import { MapCoreService, potreeGlobal } from './potree-services/MapCoreService';
import { ViewSession, createContainer, renderMessageBox } from './view-support';

// Potree's GUI looks these ids up in the page.
const RENDER_AREA_ID = 'potree_render_area';
const SIDEBAR_ID = 'potree_sidebar_container';

/** Calls whose effect `_layers` already carries. */
export function isReplayedPotreeCommand(command: PotreeCommand | DynamicCall): boolean {
    return command.kind === 'loadPointCloud' || command.kind === 'removePointCloud';
}

/**
 * Renders a Potree viewer. Potree drives a page-wide render area, so only
 * one widget may hold a Potree view at a time; a second widget gets an
 * error box and an `error` event instead.
 */
export async function render({ model, el }: RenderProps<PotreeTraits>): Promise<Teardown> {
    const widgetId = model.get('_widget_id');
    try {
        instanceRegistry.acquire('potree', widgetId, { exclusive: true });
    } catch (error) {
        console.error('[CORE SERVICE] potree: view refused.', error);
        new EventSink(model).send('error', { method: 'render', error: describeError(error) });
        return renderMessageBox(el, describeError(error), 'error');
    }

    const session = new ViewSession(model);
    session.disposables.add(() => instanceRegistry.release(widgetId));

    const libsDir = model.get('potree_libs_dir');
    if (!libsDir) {
        session.disposables.add(renderMessageBox(
            el,
            'No Potree build configured. Pass potreeLibsDir or set POTREE_LIBS_DIR to the URL of a Potree build.',
            'warning'
        ));
        return () => session.dispose();
    }

    const assets = potreeAssets(libsDir);
    assets.styles.forEach(href => loadStyle(href));
    try {
        await loadScriptsInOrder(assets.scripts);
    } catch (error) {
        session.report('load Potree')(error);
        session.disposables.add(renderMessageBox(el, `Potree could not be loaded from ${libsDir}.`, 'error'));
        return () => session.dispose();
    }
    const potree = potreeGlobal();
    if (!potree) {
        session.report('load Potree')(new Error('Potree scripts loaded but window.Potree is missing'));
        session.disposables.add(renderMessageBox(el, `The Potree build at ${libsDir} did not define Potree.`, 'error'));
        return () => session.dispose();
    }

    const { container, dispose } = createContainer(el, model, 'anymap-potree');
    session.disposables.add(dispose);
    container.style.background = '#111';
    const renderArea = document.createElement('div');
    renderArea.id = RENDER_AREA_ID;
    renderArea.style.cssText = 'position:absolute;inset:0;';
    const sidebar = document.createElement('div');
    sidebar.id = SIDEBAR_ID;
    container.append(renderArea, sidebar);

    const core = new MapCoreService(potree, renderArea, model);
    const report = session.report('loadPointCloud');

    // The host stores `point_cloud_url` in `_layers` too, so `_layers` alone is replayed.

    Object.values(model.get('_layers')).forEach(record =>
        session.guard(`replay point cloud ${record.name}`, () => core.loadPointCloud(record, report)));

    const execute = (command: PotreeCommand | DynamicCall): void => {
        switch (command.kind) {
            case 'loadPointCloud': {
                const stored = model.get('_layers')[command.name];
                core.loadPointCloud({ url: command.url, name: command.name, pointSize: stored?.pointSize ?? 1 }, report);
                break;
            }
            case 'removePointCloud':
                core.removePointCloud(command.name);
                break;
            case 'fitToScreen':
                core.fitToScreen();
                break;
            case 'setCameraPosition':
                core.setCameraPosition(command.position, command.target);
                break;
            case 'dynamic':
                invokeDynamic(core.target, command, 'Potree viewer');
                break;
        }
    };

    session.watch(model, 'description', () => core.setDescription(model.get('description')));
    session.watch(model, 'point_budget', () => core.setPointBudget(model.get('point_budget')));
    session.watch(model, 'fov', () => core.setFov(model.get('fov')));
    session.watch(model, 'edl_enabled', () => core.setEdlEnabled(model.get('edl_enabled')));
    session.watch(model, 'background', () => core.setBackground(model.get('background')));

    session.startCalls(decodePotreeCommand, execute, isReplayedPotreeCommand);
    session.events.send('load');

    return () => session.dispose();
}

export default { render };
