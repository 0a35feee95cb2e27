// src/map/mapbox-adapter.ts

import type { MapboxTraits } from '../store/backend-traits';
import { decodeGlCommand } from '../protocol/gl-commands';
import { MAPBOX_SPEC_GUARDS } from '../protocol/gl-spec-guards';
import type { RenderProps, Teardown } from './IMapAdapter';
import { GlViewController, isReplayedGlCommand } from './gl-services/GlViewController';
import { MapCoreService } from './mapbox-services/MapCoreService';
import { ViewSession, createContainer } from './view-support';

/** Renders a Mapbox GL widget. Same lifecycle as the MapLibre view. */
export async function render({ model, el }: RenderProps<MapboxTraits>): Promise<Teardown> {
    const session = new ViewSession(model);
    const { container, dispose } = createContainer(el, model, 'anymap-mapbox');
    session.disposables.add(dispose);

    const core = new MapCoreService(container, model);
    session.disposables.add(() => core.remove());
    session.watch(model, 'width', () => core.map.resize());
    session.watch(model, 'height', () => core.map.resize());

    const controller = new GlViewController(core, model, session);
    session.disposables.add(() => controller.dispose());
    controller.start(() => session.startCalls(
        record => decodeGlCommand(record, MAPBOX_SPEC_GUARDS),
        command => controller.execute(command),
        isReplayedGlCommand
    ));

    return () => session.dispose();
}

export default { render };
