// src/export/cesium-template.ts

import { REPLAY_GUARD_SCRIPT } from './replay-guard';

export const CESIUM_INIT_SCRIPT = `
if (mapState.access_token) Cesium.Ion.defaultAccessToken = mapState.access_token;

const viewer = new Cesium.Viewer(container, {
    baseLayerPicker: false,
    geocoder: false,
    timeline: false,
    animation: false
});

function cameraDestination() {
    return {
        destination: Cesium.Cartesian3.fromDegrees(mapState.center[1], mapState.center[0], mapState.camera_height),
        orientation: {
            heading: Cesium.Math.toRadians(mapState.heading),
            pitch: Cesium.Math.toRadians(mapState.pitch),
            roll: Cesium.Math.toRadians(mapState.roll)
        }
    };
}

async function applyTerrain(terrain) {
    if (!terrain || terrain.type === 'ellipsoid') {
        viewer.terrainProvider = new Cesium.EllipsoidTerrainProvider();
    } else if (terrain.type === 'world') {
        viewer.terrainProvider = await Cesium.createWorldTerrainAsync();
    } else {
        viewer.terrainProvider = await Cesium.CesiumTerrainProvider.fromUrl(terrain.url);
    }
}

async function addLayer(record) {
    switch (record.type) {
        case 'imagery': {
            const layer = viewer.imageryLayers.addImageryProvider(
                new Cesium.UrlTemplateImageryProvider({ url: record.url, credit: record.credit })
            );
            layer.alpha = record.alpha;
            break;
        }
        case 'geojson': {
            const source = await Cesium.GeoJsonDataSource.load(record.data, {
                stroke: Cesium.Color.fromCssColorString(record.stroke),
                fill: Cesium.Color.fromCssColorString(record.fill),
                strokeWidth: record.strokeWidth,
                clampToGround: record.clampToGround
            });
            await viewer.dataSources.add(source);
            break;
        }
        case '3dtiles': {
            const tileset = await Cesium.Cesium3DTileset.fromUrl(record.url, {
                maximumScreenSpaceError: record.maximumScreenSpaceError
            });
            viewer.scene.primitives.add(tileset);
            break;
        }
    }
}

${REPLAY_GUARD_SCRIPT}
guard('camera', function () { viewer.camera.setView(cameraDestination()); });
applyTerrain(mapState._terrain).catch(function (error) { console.warn('Terrain could not be loaded', error); });
Object.keys(mapState._layers).forEach(function (id) {
    addLayer(mapState._layers[id]).catch(function (error) { console.warn('Layer "' + id + '" could not be loaded', error); });
});
`;
