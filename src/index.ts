// src/index.ts
// Host side: widget classes, configuration, the wire protocol and errors.
// Render functions live in ./view.

export { MapWidget } from './widgets/MapWidget';
export { GlMapWidget, BACKGROUND_LAYER } from './widgets/GlMapWidget';
export type {
    AddLayerOptions,
    CameraMoveOptions,
    DrawControlOptions,
    LayerControlOptions,
    MarkerOptions,
} from './widgets/GlMapWidget';
export { MapLibreMap, MapLibreWidget, GLOBE_PROJECTION, DEFAULT_DEM_URL } from './widgets/MapLibreMap';
export type { DataLayerStyle, GeocoderOptions, PmtilesOptions, TerrainOptions, TileLayerOptions } from './widgets/MapLibreMap';
export { MapboxMap, MAPBOX_DEM_URL } from './widgets/MapboxMap';
export type { MapboxDataLayerStyle, MapboxTerrainOptions } from './widgets/MapboxMap';
export { LeafletMap } from './widgets/LeafletMap';
export type { GeotiffOptions, LeafletMarkerOptions, LeafletTileOptions } from './widgets/LeafletMap';
export { OpenLayersMap, DEFAULT_VECTOR_STYLE } from './widgets/OpenLayersMap';
export type { OlLayerOptions } from './widgets/OpenLayersMap';
export { DeckGLMap } from './widgets/DeckGLMap';
export type { Accessor, ArcOptions, DeckData, HeatmapOptions, HexagonOptions, RGBA, ScatterplotOptions } from './widgets/DeckGLMap';
export { CesiumMap, heightForZoom } from './widgets/CesiumMap';
export type { CesiumFlyOptions, CesiumGeojsonOptions } from './widgets/CesiumMap';
export { PotreeViewer, pointCloudName } from './widgets/PotreeViewer';
export type { Vec3 } from './widgets/PotreeViewer';

export * from './config/index';

export type {
    CallRecord,
    ControlPosition,
    ControlRecord,
    CoreTraits,
    LatLng,
    LatLngBounds,
    LngLatTuple,
    MapEventRecord,
    OverflowPolicy,
    QueueOptions,
    QueueTraits,
} from './store/IState';
export type * from './store/backend-traits';
export { TraitStore, onTrait } from './store/trait-store';
export type { ChangeCallback, TraitStoreOptions, WidgetModel } from './store/trait-store';
export { MapEventBus, isCallErrorEvent, isClickEvent, isDrawChangeEvent, isMoveEndEvent } from './store/map-events';
export type { CallErrorEvent, ClickEvent, DrawChangeEvent, MapEventHandler, MoveEndEvent, Pixel, ZoomEndEvent } from './store/map-events';

export type { CallRequest } from './protocol/call-queue';
export type { DynamicCall } from './protocol/dynamic-call';
export type { CameraOptions, GlCommand } from './protocol/gl-commands';
export type { LeafletCommand } from './protocol/leaflet-commands';
export type { OpenLayersCommand, OpenLayersControlType } from './protocol/openlayers-commands';
export type { DeckCommand } from './protocol/deck-commands';
export type { CesiumCameraTarget, CesiumCommand } from './protocol/cesium-commands';
export type { PotreeCommand } from './protocol/potree-commands';

export type { HtmlExportOptions } from './export/html-document';
export {
    AnymapError,
    CommandDecodeError,
    InstanceConflictError,
    QueueOverflowError,
    WidgetConfigError,
    describeError,
} from './utils/errors';
