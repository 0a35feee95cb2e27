// src/map/cesium-services/MapCoreService.ts

import {
    Cartesian2,
    Cartesian3,
    Cartographic,
    ImageryLayer,
    Ion,
    Math as CesiumMath,
    OpenStreetMapImageryProvider,
    ScreenSpaceEventHandler,
    ScreenSpaceEventType,
    Viewer,
} from 'cesium';
import 'cesium/Build/Cesium/Widgets/widgets.css';
import type { LatLng, LngLatTuple } from '../../store/IState';
import type { CesiumTraits } from '../../store/backend-traits';
import type { Pixel } from '../../store/map-events';
import type { WidgetModel } from '../../store/trait-store';
import type { CesiumCameraTarget } from '../../protocol/cesium-commands';
import { CDN_ASSETS } from '../../config/cdn';

/** Camera as the host stores it: degrees and meters. */
export interface CesiumCameraState {
    center: LatLng;
    height: number;
    heading: number;
    pitch: number;
    roll: number;
}

const ANGLE_EPSILON = 1e-6;
const HEIGHT_EPSILON = 0.5;

/** True when two camera states differ by more than rounding. */
export function cameraDiffers(a: CesiumCameraState, b: CesiumCameraState): boolean {
    return Math.abs(a.center[0] - b.center[0]) > ANGLE_EPSILON ||
        Math.abs(a.center[1] - b.center[1]) > ANGLE_EPSILON ||
        Math.abs(a.height - b.height) > HEIGHT_EPSILON ||
        Math.abs(a.heading - b.heading) > ANGLE_EPSILON ||
        Math.abs(a.pitch - b.pitch) > ANGLE_EPSILON ||
        Math.abs(a.roll - b.roll) > ANGLE_EPSILON;
}

export function cameraFromTraits(model: WidgetModel<CesiumTraits>): CesiumCameraState {
    return {
        center: model.get('center'),
        height: model.get('camera_height'),
        heading: model.get('heading'),
        pitch: model.get('pitch'),
        roll: model.get('roll'),
    };
}

/**
 * Cesium workers and static assets are served from the CDN build of the
 * same release; the npm package only supplies the modules.
 */
function configureCesium(accessToken: string): void {
    Reflect.set(globalThis, 'CESIUM_BASE_URL', CDN_ASSETS.cesiumBase);
    if (accessToken) {
        Ion.defaultAccessToken = accessToken;
    }
}

/**
 * Owns the Cesium viewer: a bare globe with OpenStreetMap imagery, the
 * camera in degrees and the click handler.
 */
export class MapCoreService {
    public readonly viewer: Viewer;

    constructor(container: HTMLElement, model: WidgetModel<CesiumTraits>) {
        configureCesium(model.get('access_token'));
        console.log(`[CORE SERVICE] Initializing Cesium viewer at height ${model.get('camera_height')} m`);
        this.viewer = new Viewer(container, {
            animation: false,
            baseLayerPicker: false,
            fullscreenButton: false,
            geocoder: false,
            homeButton: false,
            infoBox: true,
            sceneModePicker: false,
            selectionIndicator: false,
            timeline: false,
            navigationHelpButton: false,
            baseLayer: new ImageryLayer(new OpenStreetMapImageryProvider({ url: 'https://tile.openstreetmap.org/' })),
        });
        this.setCamera(cameraFromTraits(model));
    }

    public getCamera(): CesiumCameraState {
        const camera = this.viewer.camera;
        const position = camera.positionCartographic;
        return {
            center: [CesiumMath.toDegrees(position.latitude), CesiumMath.toDegrees(position.longitude)],
            height: position.height,
            heading: CesiumMath.toDegrees(camera.heading),
            pitch: CesiumMath.toDegrees(camera.pitch),
            roll: CesiumMath.toDegrees(camera.roll),
        };
    }

    public setCamera(state: CesiumCameraState): void {
        const [lat, lng] = state.center;
        this.viewer.camera.setView({
            destination: Cartesian3.fromDegrees(lng, lat, state.height),
            orientation: {
                heading: CesiumMath.toRadians(state.heading),
                pitch: CesiumMath.toRadians(state.pitch),
                roll: CesiumMath.toRadians(state.roll),
            },
        });
    }

    /** Applies host camera traits unless the view is already there. */
    public syncCamera(state: CesiumCameraState): void {
        if (cameraDiffers(this.getCamera(), state)) this.setCamera(state);
    }

    /** `duration` is in seconds. */
    public flyTo(target: CesiumCameraTarget): void {
        this.viewer.camera.flyTo({
            destination: Cartesian3.fromDegrees(target.lng, target.lat, target.height),
            orientation: {
                heading: CesiumMath.toRadians(target.heading),
                pitch: CesiumMath.toRadians(target.pitch),
                roll: 0,
            },
            duration: target.duration,
        });
    }

    public homeView(): void {
        this.viewer.camera.flyHome();
    }

    /** Clicks that hit the globe report the picked position. */
    public onClick(handler: (lngLat: LngLatTuple, point: Pixel) => void): () => void {
        const events = new ScreenSpaceEventHandler(this.viewer.scene.canvas);
        events.setInputAction((event: { position: Cartesian2 }) => {
            const picked = this.viewer.camera.pickEllipsoid(event.position, this.viewer.scene.globe.ellipsoid);
            if (!picked) return;
            const carto = Cartographic.fromCartesian(picked);
            handler(
                [CesiumMath.toDegrees(carto.longitude), CesiumMath.toDegrees(carto.latitude)],
                [event.position.x, event.position.y]
            );
        }, ScreenSpaceEventType.LEFT_CLICK);
        return () => events.destroy();
    }

    public onMoveEnd(handler: () => void): () => void {
        return this.viewer.camera.moveEnd.addEventListener(handler);
    }

    public resize(): void {
        this.viewer.resize();
    }

    public remove(): void {
        if (!this.viewer.isDestroyed()) this.viewer.destroy();
    }
}
