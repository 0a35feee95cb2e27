// src/map/gl-services/gl-camera.ts
// The host speaks [lat, lng]; GL libraries speak [lng, lat].

import type { LatLng, LatLngBounds, LngLatTuple } from '../../store/IState';
import type { CameraOptions } from '../../protocol/gl-commands';

export function toLngLat([lat, lng]: LatLng): LngLatTuple {
    return [lng, lat];
}

export function toLatLng([lng, lat]: LngLatTuple): LatLng {
    return [lat, lng];
}

/** [[west, south], [east, north]] */
export function toLngLatBounds([[south, west], [north, east]]: LatLngBounds): [LngLatTuple, LngLatTuple] {
    return [[west, south], [east, north]];
}

export interface GlCameraOptions {
    center?: LngLatTuple;
    zoom?: number;
    bearing?: number;
    pitch?: number;
}

/** Camera options in library order, without the keys the caller left out. */
export function glCamera(camera: CameraOptions): GlCameraOptions {
    const out: GlCameraOptions = {};
    if (camera.center) out.center = toLngLat(camera.center);
    if (camera.zoom !== undefined) out.zoom = camera.zoom;
    if (camera.bearing !== undefined) out.bearing = camera.bearing;
    if (camera.pitch !== undefined) out.pitch = camera.pitch;
    return out;
}
