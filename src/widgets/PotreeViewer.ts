// src/widgets/PotreeViewer.ts
// Point cloud viewer. Potree is loaded from a build directory the user points
// at; only one Potree view can be open at a time.

import type { PointCloudRecord, PotreeBackground, PotreeTraits } from '../store/backend-traits';
import { resolveQueueOptions } from '../store/bounded-queue';
import type { PotreeCommand } from '../protocol/potree-commands';
import { encodePotreeCommand } from '../protocol/potree-commands';
import type { PotreeOptions } from '../config/types';
import { DEFAULT_POTREE_OPTIONS, mergeWidgetOptions, readEnv } from '../config/loader';
import { potreeAssets } from '../config/cdn';
import type { ExportDocument } from '../export/html-document';
import { withoutQueues } from '../export/html-document';
import { POTREE_INIT_SCRIPT, POTREE_MISSING_LIBS_SCRIPT, POTREE_PAGE_CSS, POTREE_SIDEBAR_MARKUP } from '../export/potree-template';
import { MapWidget } from './MapWidget';
import { assertValidOptions } from './options';

export type Vec3 = [number, number, number];

/** Name a point cloud gets when none is given: the file name without extension. */
export function pointCloudName(url: string): string {
    const file = url.split('/').filter(part => part.length > 0).pop() ?? url;
    const stem = file.replace(/\.[^.]+$/, '');
    return stem === 'metadata' || stem === 'cloud' ? 'pointcloud' : stem;
}

function buildTraits(options: PotreeOptions): PotreeTraits {
    const o = mergeWidgetOptions(DEFAULT_POTREE_OPTIONS, options);
    const libsDir = o.potreeLibsDir || readEnv('POTREE_LIBS_DIR') || '';
    const layers: Record<string, PointCloudRecord> = {};
    if (o.pointCloudUrl) {
        const name = pointCloudName(o.pointCloudUrl);
        layers[name] = { url: o.pointCloudUrl, name, pointSize: 1 };
    }
    return {
        center: [0, 0],
        zoom: 0,
        width: o.width,
        height: o.height,
        potree_libs_dir: libsDir,
        point_cloud_url: o.pointCloudUrl,
        description: o.description,
        point_budget: o.pointBudget,
        fov: o.fov,
        edl_enabled: o.edlEnabled,
        background: o.background,
        _js_calls: [],
        _js_events: [],
        _queue: resolveQueueOptions(o.queue),
        _widget_id: '',
        _layers: layers,
        _sources: {},
    };
}

export class PotreeViewer extends MapWidget<PotreeTraits> {
    public readonly backend = 'potree';

    constructor(options: PotreeOptions = {}) {
        assertValidOptions('potree', options);
        super(buildTraits(options), 'potree');
        if (!this.model.get('potree_libs_dir')) {
            console.warn('[config] potree: no Potree build configured; pass potreeLibsDir or set POTREE_LIBS_DIR.');
        }
    }

    private send(command: PotreeCommand): void {
        this.enqueue(encodePotreeCommand(command));
    }

    public loadPointCloud(url: string, name = pointCloudName(url), pointSize = 1): string {
        const record: PointCloudRecord = { url, name, pointSize };
        this.model.set('_layers', { ...this.model.get('_layers'), [name]: record });
        this.send({ kind: 'loadPointCloud', url, name });
        return name;
    }

    public removePointCloud(name: string): void {
        const layers = { ...this.model.get('_layers') };
        delete layers[name];
        this.model.set('_layers', layers);
        this.send({ kind: 'removePointCloud', name });
    }

    public fitToScreen(): void {
        this.send({ kind: 'fitToScreen' });
    }

    /** Scene coordinates of the camera and, optionally, the point it looks at. */
    public setCameraPosition(position: Vec3, target?: Vec3): void {
        this.send({ kind: 'setCameraPosition', position, target });
    }

    /** Point clouds have no geographic camera; this frames the loaded clouds instead. */
    public flyTo(): void {
        console.warn('[CORE SERVICE] potree: flyTo is not supported, fitting the point clouds to the screen instead.');
        this.fitToScreen();
    }

    public setPointBudget(budget: number): void {
        this.model.set('point_budget', budget);
    }

    public setFov(fov: number): void {
        this.model.set('fov', fov);
    }

    public setEdlEnabled(enabled: boolean): void {
        this.model.set('edl_enabled', enabled);
    }

    public setBackground(background: PotreeBackground): void {
        this.model.set('background', background);
    }

    public setDescription(description: string): void {
        this.model.set('description', description);
    }

    protected exportDocument(): ExportDocument {
        const traits: PotreeTraits = this.model.snapshot();
        if (!traits.potree_libs_dir) {
            return {
                assets: { styles: [], scripts: [] },
                state: withoutQueues(traits),
                initScript: POTREE_MISSING_LIBS_SCRIPT,
            };
        }
        return {
            assets: potreeAssets(traits.potree_libs_dir),
            state: withoutQueues(traits),
            initScript: POTREE_INIT_SCRIPT,
            bodyPrefix: POTREE_SIDEBAR_MARKUP,
            css: POTREE_PAGE_CSS,
        };
    }
}
