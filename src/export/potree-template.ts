// src/export/potree-template.ts
// Potree wants its render area and sidebar under fixed element ids.

import { REPLAY_GUARD_SCRIPT } from './replay-guard';

export const POTREE_SIDEBAR_MARKUP = '<div id="potree_sidebar_container"></div>';

export const POTREE_PAGE_CSS = '#potree_sidebar_container { position: absolute; left: 0; top: 0; }';

export const POTREE_INIT_SCRIPT = `
container.id = 'potree_render_area';
const viewer = new Potree.Viewer(container);
viewer.setEDLEnabled(mapState.edl_enabled);
viewer.setFOV(mapState.fov);
viewer.setPointBudget(mapState.point_budget);
viewer.setBackground(mapState.background);
if (mapState.description) viewer.setDescription(mapState.description);
viewer.loadGUI(function () {
    viewer.setLanguage('en');
});

${REPLAY_GUARD_SCRIPT}
Object.keys(mapState._layers).forEach(function (name) {
    const record = mapState._layers[name];
    guard('point cloud ' + name, function () {
        Potree.loadPointCloud(record.url, record.name, function (e) {
            viewer.scene.addPointCloud(e.pointcloud);
            e.pointcloud.material.size = record.pointSize;
            e.pointcloud.material.pointSizeType = Potree.PointSizeType.ADAPTIVE;
            viewer.fitToScreen();
        });
    });
});
`;

export const POTREE_MISSING_LIBS_SCRIPT = `
container.textContent = 'Potree libraries are not configured for this page.';
container.style.padding = '16px';
`;
