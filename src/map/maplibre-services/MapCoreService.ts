// src/map/maplibre-services/MapCoreService.ts

import * as maplibregl from 'maplibre-gl';
import 'maplibre-gl/dist/maplibre-gl.css';
import type MapboxDraw from '@mapbox/mapbox-gl-draw';
import type { ControlPosition, ControlRecord, LatLngBounds, LngLatTuple } from '../../store/IState';
import type { MapLibreSpecTypes, MapLibreTraits, MarkerRecord } from '../../store/backend-traits';
import type { WidgetModel } from '../../store/trait-store';
import type { CameraOptions } from '../../protocol/gl-commands';
import type { DynamicCall } from '../../protocol/dynamic-call';
import { invokeDynamic } from '../../protocol/dynamic-call';
import { isFiniteNumber, isString, pick } from '../../protocol/guards';
import type { CameraState, ClickHandler, GlMapPort, Removable, TerraDrawHandle } from '../IMapInterfaces';
import { glCamera, toLatLng, toLngLat, toLngLatBounds } from '../gl-services/gl-camera';
import { attributionOptions, geolocateOptions, navigationOptions, scaleOptions } from '../gl-services/control-options';
import { ElementControl } from '../gl-services/ElementControl';
import { setDrawClassPrefix } from '../gl-services/draw-classes';
import { createGeocoder } from './geocoder';
import { addTerraDraw } from './terra-draw';

/**
 * GlMapPort over a maplibregl.Map. Thin wrapper: translates the host's
 * [lat, lng] camera and the wire records to MapLibre calls.
 */
export class MapCoreService implements GlMapPort<MapLibreSpecTypes> {
    public readonly library = 'maplibre';
    public readonly map: maplibregl.Map;

    constructor(container: HTMLElement, model: WidgetModel<MapLibreTraits>) {
        console.log(`[CORE SERVICE] Initializing MapLibre instance at zoom ${model.get('zoom')}`);
        this.map = new maplibregl.Map({
            container,
            style: model.get('style'),
            center: toLngLat(model.get('center')),
            zoom: model.get('zoom'),
            bearing: model.get('bearing'),
            pitch: model.get('pitch'),
            canvasContextAttributes: { antialias: model.get('antialias') },
        });
    }

    public onLoad(callback: () => void): void {
        if (this.map.loaded()) {
            callback();
            return;
        }
        this.map.once('load', () => callback());
    }

    public onceStyleLoad(callback: () => void): void {
        this.map.once('style.load', () => callback());
    }

    public onClick(handler: ClickHandler): () => void {
        const listener = (event: maplibregl.MapMouseEvent): void =>
            handler([event.lngLat.lng, event.lngLat.lat], [event.point.x, event.point.y]);
        this.map.on('click', listener);
        return () => this.map.off('click', listener);
    }

    public on(type: string, handler: (event: unknown) => void): () => void {
        this.map.on(type, handler);
        return () => this.map.off(type, handler);
    }

    public getCamera(): CameraState {
        const center = this.map.getCenter();
        return {
            center: toLatLng([center.lng, center.lat]),
            zoom: this.map.getZoom(),
            bearing: this.map.getBearing(),
            pitch: this.map.getPitch(),
        };
    }

    public jumpTo(camera: CameraOptions): void {
        this.map.jumpTo(glCamera(camera));
    }

    public flyTo(camera: CameraOptions): void {
        const options: maplibregl.FlyToOptions = glCamera(camera);
        if (camera.duration !== undefined) options.duration = camera.duration;
        this.map.flyTo(options);
    }

    public fitBounds(bounds: LatLngBounds, padding: number, duration?: number): void {
        this.map.fitBounds(toLngLatBounds(bounds), duration === undefined ? { padding } : { padding, duration });
    }

    public setStyle(style: string | maplibregl.StyleSpecification): void {
        this.map.setStyle(style);
    }

    public styleLayerIds(): string[] {
        return this.map.getStyle()?.layers.map(layer => layer.id) ?? [];
    }

    public hasSource(id: string): boolean {
        return this.map.getSource(id) !== undefined;
    }

    public addSource(id: string, source: maplibregl.SourceSpecification): void {
        this.map.addSource(id, source);
    }

    public removeSource(id: string): void {
        this.map.removeSource(id);
    }

    public hasLayer(id: string): boolean {
        return this.map.getLayer(id) !== undefined;
    }

    public addLayer(layer: maplibregl.LayerSpecification, beforeId?: string): void {
        this.map.addLayer(layer, beforeId);
    }

    public removeLayer(id: string): void {
        this.map.removeLayer(id);
    }

    public layerType(id: string): string | undefined {
        return this.map.getLayer(id)?.type;
    }

    public setLayoutProperty(layerId: string, name: string, value: unknown): void {
        this.map.setLayoutProperty(layerId, name, value);
    }

    public setPaintProperty(layerId: string, name: string, value: unknown): void {
        this.map.setPaintProperty(layerId, name, value);
    }

    public setProjection(projection: maplibregl.ProjectionSpecification): void {
        this.map.setProjection(projection);
    }

    public setTerrain(terrain: maplibregl.TerrainSpecification | null): void {
        this.map.setTerrain(terrain);
    }

    public addMarker(record: MarkerRecord, onDragEnd: (lngLat: LngLatTuple) => void): Removable {
        const marker = new maplibregl.Marker({ color: record.color, draggable: record.draggable ?? false })
            .setLngLat(record.coordinates);
        if (record.popup) {
            marker.setPopup(new maplibregl.Popup().setHTML(record.popup));
        }
        marker.on('dragend', () => {
            const { lng, lat } = marker.getLngLat();
            onDragEnd([lng, lat]);
        });
        marker.addTo(this.map);
        return marker;
    }

    public addLibraryControl(control: ControlRecord): Removable | null {
        const built = this.buildControl(control);
        if (!built) return null;
        this.map.addControl(built, control.position);
        return { remove: () => this.map.removeControl(built) };
    }

    private buildControl({ type, options }: ControlRecord): maplibregl.IControl | null {
        switch (type) {
            case 'navigation':
                return new maplibregl.NavigationControl(navigationOptions(options));
            case 'scale':
                return new maplibregl.ScaleControl(scaleOptions(options));
            case 'fullscreen':
                return new maplibregl.FullscreenControl({});
            case 'geolocate':
                return new maplibregl.GeolocateControl(geolocateOptions(options));
            case 'attribution':
                return new maplibregl.AttributionControl(attributionOptions(options));
            case 'globe':
                return new maplibregl.GlobeControl();
            case 'terrain': {
                const source = pick(options, 'source', isString);
                if (!source) {
                    console.warn('[CORE SERVICE] maplibre: terrain control needs a raster-dem "source".');
                    return null;
                }
                return new maplibregl.TerrainControl({ source, exaggeration: pick(options, 'exaggeration', isFiniteNumber) });
            }
            case 'geocoder':
                return createGeocoder(options);
            default:
                return null;
        }
    }

    public addElementControl(element: HTMLElement, position: ControlPosition): Removable {
        const control = new ElementControl(element, 'maplibregl');
        this.map.addControl(control, position);
        return { remove: () => this.map.removeControl(control) };
    }

    public addDrawControl(draw: MapboxDraw, position: ControlPosition): Removable {
        // The draw control is typed against Mapbox's IControl; at runtime it only needs onAdd/onRemove.
        const control = draw as unknown as maplibregl.IControl;
        this.map.addControl(control, position);
        return { remove: () => this.map.removeControl(control) };
    }

    public prepareDraw(): void {
        setDrawClassPrefix('maplibregl');
    }

    public addTerraDrawControl(options: Record<string, unknown>, position: ControlPosition): TerraDrawHandle {
        return addTerraDraw(this.map, options, position);
    }

    public invoke(call: DynamicCall): void {
        invokeDynamic(this.map, call, 'MapLibre map');
    }

    public remove(): void {
        this.map.remove();
    }
}
