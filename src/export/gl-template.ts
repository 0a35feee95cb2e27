// src/export/gl-template.ts
// Page script for exported MapLibre, Mapbox and deck.gl maps. Replays the
// persisted state in the same order the live view does.

import type { GlSpecTypes, GlTraits } from '../store/backend-traits';
import { layerReplayOrder } from '../store/backend-traits';
import { REPLAY_GUARD_SCRIPT } from './replay-guard';

export type GlGlobal = 'maplibregl' | 'mapboxgl';

/** Whether any persisted source loads through the given URL scheme. */
export function usesProtocol<S extends GlSpecTypes>(traits: GlTraits<S>, scheme: string): boolean {
    return Object.values(traits._sources).some(source => {
        const url: unknown = Reflect.get(source, 'url');
        return typeof url === 'string' && url.startsWith(`${scheme}://`);
    });
}

export function hasControl<S extends GlSpecTypes>(traits: GlTraits<S>, type: string): boolean {
    return Object.values(traits._controls).some(control => control.type === type);
}

/** `_layers` rebuilt in replay order; the page script adds them in key order. */
export function layersInReplayOrder<L>(layers: Record<string, L>, beforeIds: Record<string, string>): Record<string, L> {
    const ordered: Record<string, L> = {};
    layerReplayOrder(Object.keys(layers), beforeIds).forEach(id => {
        ordered[id] = layers[id];
    });
    return ordered;
}

export function glInitScript(lib: GlGlobal, extra = ''): string {
    return `
${lib === 'mapboxgl' ? 'mapboxgl.accessToken = mapState.access_token;' : ''}
if (window.pmtiles) {
    const protocol = new pmtiles.Protocol();
    maplibregl.addProtocol('pmtiles', protocol.tile);
}
if (window.MaplibreCOGProtocol) {
    maplibregl.addProtocol('cog', MaplibreCOGProtocol.cogProtocol);
}
const map = new ${lib}.Map({
    container: container,
    style: mapState.style,
    center: [mapState.center[1], mapState.center[0]],
    zoom: mapState.zoom,
    bearing: mapState.bearing,
    pitch: mapState.pitch,
    antialias: mapState.antialias
});

const OPACITY_TYPES = ['fill', 'line', 'circle', 'raster', 'fill-extrusion', 'heatmap', 'background'];

function styleLayerIds() {
    const own = mapState._layers;
    return map.getStyle().layers.map(function (l) { return l.id; }).filter(function (id) { return !own[id]; });
}

function setOpacity(layerId, opacity) {
    const layer = map.getLayer(layerId);
    if (!layer) return;
    if (layer.type === 'symbol') {
        map.setPaintProperty(layerId, 'icon-opacity', opacity);
        map.setPaintProperty(layerId, 'text-opacity', opacity);
    } else if (OPACITY_TYPES.indexOf(layer.type) >= 0) {
        map.setPaintProperty(layerId, layer.type + '-opacity', opacity);
    }
}

function applyLayerState(layerId, state) {
    const targets = layerId === 'Background' ? styleLayerIds() : [layerId];
    targets.forEach(function (id) {
        if (!map.getLayer(id)) return;
        map.setLayoutProperty(id, 'visibility', state.visible ? 'visible' : 'none');
        setOpacity(id, state.opacity);
    });
}

function addControl(control) {
    const o = control.options || {};
    switch (control.type) {
        case 'navigation':
            map.addControl(new ${lib}.NavigationControl(o), control.position);
            break;
        case 'scale':
            map.addControl(new ${lib}.ScaleControl(o), control.position);
            break;
        case 'fullscreen':
            map.addControl(new ${lib}.FullscreenControl(o), control.position);
            break;
        case 'geolocate':
            map.addControl(new ${lib}.GeolocateControl(o), control.position);
            break;
        case 'attribution':
            map.addControl(new ${lib}.AttributionControl(o), control.position);
            break;
        case 'globe':
            if (${lib}.GlobeControl) map.addControl(new ${lib}.GlobeControl(), control.position);
            break;
        case 'draw':
            if (window.MapboxDraw) {
                window.anymapDraw = new MapboxDraw(o);
                map.addControl(window.anymapDraw, control.position);
            }
            break;
        case 'terra_draw':
            if (window.MaplibreTerradrawControl) {
                window.anymapTerraDraw = new window.MaplibreTerradrawControl.MaplibreTerradrawControl(o);
                map.addControl(window.anymapTerraDraw, control.position);
            }
            break;
        default:
            console.warn('Control "' + control.type + '" is not available in exported maps.');
    }
}

${REPLAY_GUARD_SCRIPT}
map.on('load', function () {
    const beforeIds = mapState._before_ids || {};
    Object.keys(mapState._sources).forEach(function (id) {
        guard('source ' + id, function () { map.addSource(id, mapState._sources[id]); });
    });
    Object.keys(mapState._layers).forEach(function (id) {
        guard('layer ' + id, function () {
            const beforeId = beforeIds[id];
            map.addLayer(mapState._layers[id], beforeId && map.getLayer(beforeId) ? beforeId : undefined);
        });
    });
    Object.keys(mapState._layer_dict).forEach(function (id) {
        guard('layer state ' + id, function () { applyLayerState(id, mapState._layer_dict[id]); });
    });
    Object.keys(mapState._markers).forEach(function (id) {
        guard('marker ' + id, function () {
            const m = mapState._markers[id];
            const options = { draggable: !!m.draggable };
            if (m.color) options.color = m.color;
            const marker = new ${lib}.Marker(options).setLngLat(m.coordinates);
            if (m.popup) marker.setPopup(new ${lib}.Popup().setHTML(m.popup));
            marker.addTo(map);
        });
    });
    Object.keys(mapState._controls).forEach(function (key) {
        guard('control ' + key, function () { addControl(mapState._controls[key]); });
    });
    if (mapState._projection) guard('projection', function () { map.setProjection(mapState._projection); });
    if (mapState._terrain) guard('terrain', function () { map.setTerrain(mapState._terrain); });
    if (window.anymapDraw && mapState._draw_data.features.length > 0) {
        guard('draw data', function () { window.anymapDraw.add(mapState._draw_data); });
    }
    const terraDraw = window.anymapTerraDraw && window.anymapTerraDraw.getTerraDrawInstance();
    if (terraDraw && mapState._terra_draw_data && mapState._terra_draw_data.features.length > 0) {
        guard('Terra Draw data', function () {
            const modes = { Point: 'point', LineString: 'linestring', Polygon: 'polygon' };
            terraDraw.addFeatures(mapState._terra_draw_data.features.map(function (f) {
                return Object.assign({}, f, { properties: Object.assign({ mode: modes[f.geometry.type] }, f.properties) });
            }));
        });
    }
});
${extra}
`;
}
