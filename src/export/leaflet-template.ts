// src/export/leaflet-template.ts

import { REPLAY_GUARD_SCRIPT } from './replay-guard';

export const LEAFLET_INIT_SCRIPT = `
const map = L.map(container, Object.assign({}, mapState.map_options)).setView(mapState.center, mapState.zoom);
L.tileLayer(mapState.tile_url, { attribution: mapState.tile_attribution }).addTo(map);

function bindText(layer, record) {
    if (record.popup) layer.bindPopup(record.popup);
    if (record.tooltip) layer.bindTooltip(record.tooltip, record.tooltip_options || {});
    return layer;
}

function createLayer(record) {
    switch (record.type) {
        case 'tile':
            return L.tileLayer(record.url, Object.assign({ attribution: record.attribution }, record.options));
        case 'marker': {
            const options = { draggable: record.draggable };
            if (record.icon) options.icon = L.icon(record.icon);
            return bindText(L.marker(record.latlng, options), record);
        }
        case 'circle':
            return bindText(L.circle(record.latlng, Object.assign({ radius: record.radius }, record.style)), record);
        case 'polygon':
            return bindText(L.polygon(record.latlngs, record.style), record);
        case 'polyline':
            return bindText(L.polyline(record.latlngs, record.style), record);
        case 'geojson':
            return L.geoJSON(record.data, {
                style: function () { return record.style; },
                onEachFeature: function (feature, layer) {
                    const key = record.popup_property;
                    if (key && feature.properties && feature.properties[key] !== undefined) {
                        layer.bindPopup(String(feature.properties[key]));
                    }
                }
            });
        case 'geotiff':
            if (window.parseGeoraster && window.GeoRasterLayer) {
                fetch(record.url)
                    .then(function (response) { return response.arrayBuffer(); })
                    .then(function (buffer) { return parseGeoraster(buffer); })
                    .then(function (georaster) {
                        const layer = new GeoRasterLayer({ georaster: georaster, opacity: record.opacity, resolution: record.resolution });
                        layer.addTo(map);
                        if (record.fit_bounds) map.fitBounds(layer.getBounds());
                    })
                    .catch(function (error) { console.warn('GeoTIFF "' + record.url + '" could not be loaded', error); });
            }
            return null;
        default:
            console.warn('Unknown layer type "' + record.type + '"');
            return null;
    }
}

${REPLAY_GUARD_SCRIPT}
Object.keys(mapState._layers).forEach(function (id) {
    guard('layer ' + id, function () {
        const layer = createLayer(mapState._layers[id]);
        if (layer) layer.addTo(map);
    });
});
`;
