// src/protocol/deck-commands.ts
// deck.gl overlay commands. Anything else falls through to the GL base map.

import type { CallRecord } from '../store/IState';
import type { DeckLayerRecord, DeckLayerType } from '../store/backend-traits';
import { DECK_LAYER_TYPES } from '../store/backend-traits';
import type { CallRequest } from './call-queue';
import { CallArgs, isRecord, isString } from './guards';

export type DeckCommand =
    | { kind: 'addDeckLayer'; layer: DeckLayerRecord }
    | { kind: 'removeDeckLayer'; id: string }
    | { kind: 'clearDeckLayers' };

export function isDeckLayerType(value: unknown): value is DeckLayerType {
    return DECK_LAYER_TYPES.some(type => type === value);
}

export function isDeckLayerRecord(value: unknown): value is DeckLayerRecord {
    return isRecord(value) && isString(value.id) && isDeckLayerType(value.type) && isRecord(value.props);
}

export function encodeDeckCommand(command: DeckCommand): CallRequest {
    switch (command.kind) {
        case 'addDeckLayer':
            return { method: 'addDeckLayer', args: [command.layer], kwargs: {} };
        case 'removeDeckLayer':
            return { method: 'removeDeckLayer', args: [command.id], kwargs: {} };
        case 'clearDeckLayers':
            return { method: 'clearDeckLayers', args: [], kwargs: {} };
    }
}

/** Returns null for methods the deck overlay does not own. */
export function decodeDeckCommand(record: CallRecord): DeckCommand | null {
    const a = new CallArgs(record);
    switch (record.method) {
        case 'addDeckLayer':
            return { kind: 'addDeckLayer', layer: a.matching(0, 'layer', isDeckLayerRecord, 'a deck layer record with id, type and props') };
        case 'removeDeckLayer':
            return { kind: 'removeDeckLayer', id: a.string(0, 'id') };
        case 'clearDeckLayers':
            return { kind: 'clearDeckLayers' };
        default:
            return null;
    }
}
