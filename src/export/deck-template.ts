// src/export/deck-template.ts
// Appended to the GL page script, whose `guard` it uses: rebuilds the deck.gl
// overlay from `_deck_layers`.

export const DECK_INIT_SCRIPT = `
function deckAccessor(value) {
    if (typeof value !== 'string') return value;
    return function (d) {
        if (d && d[value] !== undefined) return d[value];
        if (d && d.properties && d.properties[value] !== undefined) return d.properties[value];
        return undefined;
    };
}

function deckLayer(record) {
    const props = {};
    Object.keys(record.props).forEach(function (key) {
        const value = record.props[key];
        props[key] = key.indexOf('get') === 0 ? deckAccessor(value) : value;
    });
    props.id = record.id;
    const LayerClass = deck[record.type];
    if (!LayerClass) {
        console.warn('Unknown deck.gl layer type "' + record.type + '"');
        return null;
    }
    return new LayerClass(props);
}

const deckLayers = [];
Object.keys(mapState._deck_layers).forEach(function (id) {
    guard('deck.gl layer ' + id, function () {
        const layer = deckLayer(mapState._deck_layers[id]);
        if (layer) deckLayers.push(layer);
    });
});

const overlay = new deck.MapboxOverlay({ interleaved: false, layers: deckLayers });
map.addControl(overlay);
`;
