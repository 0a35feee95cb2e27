// src/map/deckgl-adapter.ts

import type { DeckGLTraits } from '../store/backend-traits';
import type { DeckCommand } from '../protocol/deck-commands';
import { decodeDeckCommand } from '../protocol/deck-commands';
import type { GlCommand } from '../protocol/gl-commands';
import { decodeGlCommand } from '../protocol/gl-commands';
import { MAPLIBRE_SPEC_GUARDS } from '../protocol/gl-spec-guards';
import type { DynamicCall } from '../protocol/dynamic-call';
import type { MapLibreSpecTypes } from '../store/backend-traits';
import type { RenderProps, Teardown } from './IMapAdapter';
import { GlViewController, isReplayedGlCommand } from './gl-services/GlViewController';
import { MapCoreService } from './maplibre-services/MapCoreService';
import { registerProtocols } from './maplibre-services/protocols';
import { DeckLayerService } from './deckgl-services/DeckLayerService';
import { ViewSession, createContainer } from './view-support';

type DeckViewCommand = DeckCommand | GlCommand<MapLibreSpecTypes>;

const DECK_KINDS: ReadonlySet<string> = new Set<DeckCommand['kind']>(['addDeckLayer', 'removeDeckLayer', 'clearDeckLayers']);

function isDeckCommand(command: DeckViewCommand | DynamicCall): command is DeckCommand {
    return DECK_KINDS.has(command.kind);
}

/**
 * Renders a deck.gl widget: the MapLibre view with a deck.gl overlay on top.
 * Deck commands go to the overlay, everything else to the base map.
 */
export async function render({ model, el }: RenderProps<DeckGLTraits>): Promise<Teardown> {
    registerProtocols();
    const session = new ViewSession(model);
    const { container, dispose } = createContainer(el, model, 'anymap-deckgl');
    session.disposables.add(dispose);

    const core = new MapCoreService(container, model);
    session.disposables.add(() => core.remove());
    session.watch(model, 'width', () => core.map.resize());
    session.watch(model, 'height', () => core.map.resize());

    const controller = new GlViewController(core, model, session);
    session.disposables.add(() => controller.dispose());

    controller.start(() => {
        const deck = new DeckLayerService(core.map, pick => session.events.send('deck_click', { ...pick }));
        session.disposables.add(() => deck.remove());
        Object.values(model.get('_deck_layers')).forEach(layer =>
            session.guard(`replay deck layer ${layer.id}`, () => deck.execute({ kind: 'addDeckLayer', layer })));

        session.startCalls<DeckViewCommand>(
            record => decodeDeckCommand(record) ?? decodeGlCommand(record, MAPLIBRE_SPEC_GUARDS),
            command => (isDeckCommand(command) ? deck.execute(command) : controller.execute(command)),
            command => isDeckCommand(command) || isReplayedGlCommand(command)
        );
    });

    return () => session.dispose();
}

export default { render };
