// src/view.ts
// Browser side: the render functions, in-page mounting and the layer control.

export type { MapViewModule, RenderFunction, RenderProps, Teardown } from './map/IMapAdapter';
export {
    DEFAULT_ADAPTER_NAME,
    createMapAdapter,
    getRegisteredAdapters,
    loadMapView,
    registerAdapterAlias,
    resolveBackendName,
} from './map/adapter-registry';
export { mount } from './map/mount';
export type { MountableWidget } from './map/mount';
export { InstanceRegistry, instanceRegistry } from './map/instance-registry';
export type { AcquireOptions } from './map/instance-registry';
export {
    AnymapLayerControl,
    LAYER_OPACITY_EVENT,
    LAYER_VISIBILITY_EVENT,
} from './components/modules/anymap-layer-control';
export type {
    LayerControlRow,
    LayerOpacityDetail,
    LayerVisibilityDetail,
} from './components/modules/anymap-layer-control';
