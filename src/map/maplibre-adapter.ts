// src/map/maplibre-adapter.ts

import type { MapLibreTraits } from '../store/backend-traits';
import { decodeGlCommand } from '../protocol/gl-commands';
import { MAPLIBRE_SPEC_GUARDS } from '../protocol/gl-spec-guards';
import type { RenderProps, Teardown } from './IMapAdapter';
import { GlViewController, isReplayedGlCommand } from './gl-services/GlViewController';
import { MapCoreService } from './maplibre-services/MapCoreService';
import { registerProtocols } from './maplibre-services/protocols';
import { ViewSession, createContainer } from './view-support';

/**
 * Renders a MapLibre widget: builds the map from the traits, replays the
 * persisted layers and controls once it has loaded, then follows the call
 * queue.
 */
export async function render({ model, el }: RenderProps<MapLibreTraits>): Promise<Teardown> {
    registerProtocols();
    const session = new ViewSession(model);
    const { container, dispose } = createContainer(el, model, 'anymap-maplibre');
    session.disposables.add(dispose);

    const core = new MapCoreService(container, model);
    session.disposables.add(() => core.remove());
    session.watch(model, 'width', () => core.map.resize());
    session.watch(model, 'height', () => core.map.resize());

    const controller = new GlViewController(core, model, session);
    session.disposables.add(() => controller.dispose());
    controller.start(() => session.startCalls(
        record => decodeGlCommand(record, MAPLIBRE_SPEC_GUARDS),
        command => controller.execute(command),
        isReplayedGlCommand
    ));

    return () => session.dispose();
}

export default { render };
