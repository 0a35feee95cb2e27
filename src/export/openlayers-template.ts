// src/export/openlayers-template.ts

import { REPLAY_GUARD_SCRIPT } from './replay-guard';

export const OPENLAYERS_INIT_SCRIPT = `
function vectorStyle(s) {
    return new ol.style.Style({
        fill: new ol.style.Fill({ color: s.fillColor }),
        stroke: new ol.style.Stroke({ color: s.strokeColor, width: s.strokeWidth }),
        image: new ol.style.Circle({
            radius: s.circleRadius,
            fill: new ol.style.Fill({ color: s.fillColor }),
            stroke: new ol.style.Stroke({ color: s.strokeColor, width: s.strokeWidth })
        })
    });
}

function createLayer(record) {
    let layer = null;
    switch (record.type) {
        case 'tile':
            layer = new ol.layer.Tile({ source: new ol.source.XYZ({ url: record.url, attributions: record.attribution }) });
            break;
        case 'wms':
            layer = new ol.layer.Tile({ source: new ol.source.TileWMS({ url: record.url, params: record.params }) });
            break;
        case 'geojson': {
            const source = typeof record.data === 'string'
                ? new ol.source.Vector({ url: record.data, format: new ol.format.GeoJSON() })
                : new ol.source.Vector({
                    features: new ol.format.GeoJSON().readFeatures(record.data, { featureProjection: mapState.projection })
                });
            layer = new ol.layer.Vector({ source: source, style: vectorStyle(record.style) });
            break;
        }
        case 'marker': {
            const feature = new ol.Feature({ geometry: new ol.geom.Point(ol.proj.fromLonLat(record.coordinates, mapState.projection)) });
            layer = new ol.layer.Vector({
                source: new ol.source.Vector({ features: [feature] }),
                style: new ol.style.Style({
                    image: new ol.style.Circle({ radius: 7, fill: new ol.style.Fill({ color: record.color }), stroke: new ol.style.Stroke({ color: '#fff', width: 2 }) })
                })
            });
            break;
        }
        default:
            console.warn('Layer type "' + record.type + '" is not available in exported maps.');
            return null;
    }
    layer.setOpacity(record.opacity);
    layer.setVisible(record.visible);
    return layer;
}

const CONTROLS = {
    zoom: function (o) { return new ol.control.Zoom(o); },
    rotate: function (o) { return new ol.control.Rotate(o); },
    attribution: function (o) { return new ol.control.Attribution(o); },
    scaleline: function (o) { return new ol.control.ScaleLine(o); },
    fullscreen: function (o) { return new ol.control.FullScreen(o); },
    mouseposition: function (o) { return new ol.control.MousePosition(o); },
    overviewmap: function (o) {
        return new ol.control.OverviewMap(Object.assign({ layers: [new ol.layer.Tile({ source: new ol.source.OSM() })] }, o));
    }
};

const basemap = mapState.basemap === 'OpenStreetMap'
    ? new ol.layer.Tile({ source: new ol.source.OSM() })
    : new ol.layer.Tile({ source: new ol.source.XYZ({ url: mapState.basemap_url }) });

const map = new ol.Map({
    target: container,
    layers: [basemap],
    controls: Object.keys(mapState._controls)
        .filter(function (type) { return CONTROLS[type]; })
        .map(function (type) { return CONTROLS[type](mapState._controls[type]); }),
    view: new ol.View({
        center: ol.proj.fromLonLat([mapState.center[1], mapState.center[0]], mapState.projection),
        zoom: mapState.zoom,
        rotation: mapState.rotation,
        projection: mapState.projection
    })
});

${REPLAY_GUARD_SCRIPT}
Object.keys(mapState._layers).forEach(function (id) {
    guard('layer ' + id, function () {
        const layer = createLayer(mapState._layers[id]);
        if (layer) map.addLayer(layer);
    });
});
`;
