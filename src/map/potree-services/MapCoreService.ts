// src/map/potree-services/MapCoreService.ts
// Potree ships as a classic script that defines `window.Potree`. The
// interfaces below cover the part of its API the view calls; the guards
// check the global before anything is built from it.

import type { PointCloudRecord, PotreeBackground, PotreeTraits } from '../../store/backend-traits';
import type { WidgetModel } from '../../store/trait-store';
import { isRecord } from '../../protocol/guards';

type Vec3 = [number, number, number];

interface PotreePointCloud {
    name: string;
    material: { size: number; pointSizeType: number };
}

interface PotreeScene {
    pointclouds: PotreePointCloud[];
    scenePointCloud: { remove(object: PotreePointCloud): void };
    view: { position: { set(x: number, y: number, z: number): void }; lookAt(x: number, y: number, z: number): void };
    addPointCloud(pointCloud: PotreePointCloud): void;
}

interface PotreeViewer {
    scene: PotreeScene;
    setEDLEnabled(enabled: boolean): void;
    setFOV(fov: number): void;
    setPointBudget(budget: number): void;
    setDescription(description: string): void;
    setBackground(background: PotreeBackground): void;
    fitToScreen(): void;
    loadGUI(callback: () => void): void;
    setLanguage(language: string): void;
}

export interface PotreeGlobal {
    Viewer: new (container: HTMLElement) => unknown;
    loadPointCloud(url: string, name: string, callback: (event: unknown) => void): void;
    PointSizeType: { ADAPTIVE: number };
}

function hasFunctions(value: unknown, names: string[]): value is Record<string, unknown> {
    return isRecord(value) && names.every(name => typeof value[name] === 'function');
}

export function isPotreeGlobal(value: unknown): value is PotreeGlobal {
    return hasFunctions(value, ['Viewer', 'loadPointCloud']) &&
        isRecord(value.PointSizeType) && typeof value.PointSizeType.ADAPTIVE === 'number';
}

function isPotreeViewer(value: unknown): value is PotreeViewer {
    return hasFunctions(value, [
        'setEDLEnabled', 'setFOV', 'setPointBudget', 'setDescription', 'setBackground', 'fitToScreen', 'loadGUI', 'setLanguage',
    ]) && hasFunctions(value.scene, ['addPointCloud']) && Array.isArray(value.scene.pointclouds);
}

function isPointCloud(value: unknown): value is PotreePointCloud {
    return isRecord(value) && typeof value.name === 'string' && isRecord(value.material);
}

/** The page's Potree global, or null when the build has not loaded. */
export function potreeGlobal(): PotreeGlobal | null {
    const potree: unknown = Reflect.get(globalThis, 'Potree');
    return isPotreeGlobal(potree) ? potree : null;
}

/**
 * One Potree viewer on the fixed render area. Point clouds are keyed by
 * name; loading a name that is already shown replaces it.
 */
export class MapCoreService {
    private readonly viewer: PotreeViewer;

    constructor(
        private readonly potree: PotreeGlobal,
        container: HTMLElement,
        model: WidgetModel<PotreeTraits>
    ) {
        const viewer: unknown = new potree.Viewer(container);
        if (!isPotreeViewer(viewer)) {
            throw new Error('Potree.Viewer does not expose the expected viewer API');
        }
        this.viewer = viewer;
        console.log(`[CORE SERVICE] Initializing Potree viewer with point budget ${model.get('point_budget')}`);
        this.viewer.setEDLEnabled(model.get('edl_enabled'));
        this.viewer.setFOV(model.get('fov'));
        this.viewer.setPointBudget(model.get('point_budget'));
        this.viewer.setBackground(model.get('background'));
        this.viewer.setDescription(model.get('description'));
        this.viewer.loadGUI(() => this.viewer.setLanguage('en'));
    }

    public loadPointCloud(record: PointCloudRecord, onError: (error: unknown) => void): void {
        this.removePointCloud(record.name);
        this.potree.loadPointCloud(record.url, record.name, event => {
            const pointCloud: unknown = isRecord(event) ? event.pointcloud : undefined;
            if (!isPointCloud(pointCloud)) {
                onError(new Error(`Point cloud "${record.url}" did not load`));
                return;
            }
            pointCloud.name = record.name;
            pointCloud.material.size = record.pointSize;
            pointCloud.material.pointSizeType = this.potree.PointSizeType.ADAPTIVE;
            this.viewer.scene.addPointCloud(pointCloud);
            this.viewer.fitToScreen();
            console.log(`[LAYER SERVICE] Added point cloud "${record.name}".`);
        });
    }

    public removePointCloud(name: string): void {
        const scene = this.viewer.scene;
        const index = scene.pointclouds.findIndex(pointCloud => pointCloud.name === name);
        if (index < 0) return;
        const [pointCloud] = scene.pointclouds.splice(index, 1);
        scene.scenePointCloud.remove(pointCloud);
    }

    public pointCloudNames(): string[] {
        return this.viewer.scene.pointclouds.map(pointCloud => pointCloud.name);
    }

    public fitToScreen(): void {
        this.viewer.fitToScreen();
    }

    public setCameraPosition(position: Vec3, target?: Vec3): void {
        this.viewer.scene.view.position.set(...position);
        if (target) this.viewer.scene.view.lookAt(...target);
    }

    public setEdlEnabled(enabled: boolean): void {
        this.viewer.setEDLEnabled(enabled);
    }

    public setFov(fov: number): void {
        this.viewer.setFOV(fov);
    }

    public setPointBudget(budget: number): void {
        this.viewer.setPointBudget(budget);
    }

    public setBackground(background: PotreeBackground): void {
        this.viewer.setBackground(background);
    }

    public setDescription(description: string): void {
        this.viewer.setDescription(description);
    }

    /** The viewer itself, for calls the host passes through by name. */
    public get target(): object {
        return this.viewer;
    }
}
