// src/map/mapbox-services/MapCoreService.ts

import mapboxgl from 'mapbox-gl';
import type {
    EasingOptions,
    IControl,
    LayerSpecification,
    Map as MapboxMapInstance,
    MapMouseEvent,
    SourceSpecification,
    StyleSpecification,
} from 'mapbox-gl';
import 'mapbox-gl/dist/mapbox-gl.css';
import type MapboxDraw from '@mapbox/mapbox-gl-draw';
import type { ControlPosition, ControlRecord, LatLngBounds, LngLatTuple } from '../../store/IState';
import type { MapboxProjection, MapboxSpecTypes, MapboxTerrain, MapboxTraits, MarkerRecord } from '../../store/backend-traits';
import type { WidgetModel } from '../../store/trait-store';
import type { CameraOptions } from '../../protocol/gl-commands';
import type { DynamicCall } from '../../protocol/dynamic-call';
import { invokeDynamic } from '../../protocol/dynamic-call';
import type { CameraState, ClickHandler, GlMapPort, Removable } from '../IMapInterfaces';
import { glCamera, toLatLng, toLngLat, toLngLatBounds } from '../gl-services/gl-camera';
import { attributionOptions, geolocateOptions, navigationOptions, scaleOptions } from '../gl-services/control-options';
import { ElementControl } from '../gl-services/ElementControl';
import { setDrawClassPrefix } from '../gl-services/draw-classes';

/**
 * GlMapPort over a Mapbox GL map. Style properties and projections are
 * passed through by name; Mapbox types them as literal unions, the wire
 * carries plain strings.
 */
export class MapCoreService implements GlMapPort<MapboxSpecTypes> {
    public readonly library = 'mapbox';
    public readonly map: MapboxMapInstance;

    constructor(container: HTMLElement, model: WidgetModel<MapboxTraits>) {
        const accessToken = model.get('access_token');
        if (!accessToken) {
            console.warn('[CORE SERVICE] mapbox: no access token; Mapbox styles and tiles will not load.');
        }
        console.log(`[CORE SERVICE] Initializing Mapbox instance at zoom ${model.get('zoom')}`);
        this.map = new mapboxgl.Map({
            container,
            accessToken,
            style: model.get('style'),
            center: toLngLat(model.get('center')),
            zoom: model.get('zoom'),
            bearing: model.get('bearing'),
            pitch: model.get('pitch'),
            antialias: model.get('antialias'),
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
        const listener = (event: MapMouseEvent): void =>
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
        const options: EasingOptions = glCamera(camera);
        if (camera.duration !== undefined) options.duration = camera.duration;
        this.map.flyTo(options);
    }

    public fitBounds(bounds: LatLngBounds, padding: number, duration?: number): void {
        this.map.fitBounds(toLngLatBounds(bounds), duration === undefined ? { padding } : { padding, duration });
    }

    public setStyle(style: string | StyleSpecification): void {
        this.map.setStyle(style);
    }

    public styleLayerIds(): string[] {
        return this.map.getStyle()?.layers?.map(layer => layer.id) ?? [];
    }

    public hasSource(id: string): boolean {
        return this.map.getSource(id) !== undefined;
    }

    public addSource(id: string, source: SourceSpecification): void {
        this.map.addSource(id, source);
    }

    public removeSource(id: string): void {
        this.map.removeSource(id);
    }

    public hasLayer(id: string): boolean {
        return this.map.getLayer(id) !== undefined;
    }

    public addLayer(layer: LayerSpecification, beforeId?: string): void {
        this.map.addLayer(layer, beforeId);
    }

    public removeLayer(id: string): void {
        this.map.removeLayer(id);
    }

    public layerType(id: string): string | undefined {
        return this.map.getLayer(id)?.type;
    }

    public setLayoutProperty(layerId: string, name: string, value: unknown): void {
        Reflect.apply(this.map.setLayoutProperty, this.map, [layerId, name, value]);
    }

    public setPaintProperty(layerId: string, name: string, value: unknown): void {
        Reflect.apply(this.map.setPaintProperty, this.map, [layerId, name, value]);
    }

    public setProjection(projection: MapboxProjection): void {
        Reflect.apply(this.map.setProjection, this.map, [projection]);
    }

    public setTerrain(terrain: MapboxTerrain | null): void {
        this.map.setTerrain(terrain);
    }

    public addMarker(record: MarkerRecord, onDragEnd: (lngLat: LngLatTuple) => void): Removable {
        const marker = new mapboxgl.Marker({ color: record.color, draggable: record.draggable ?? false })
            .setLngLat(record.coordinates);
        if (record.popup) {
            marker.setPopup(new mapboxgl.Popup().setHTML(record.popup));
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

    private buildControl({ type, options }: ControlRecord): IControl | null {
        switch (type) {
            case 'navigation':
                return new mapboxgl.NavigationControl(navigationOptions(options));
            case 'scale':
                return new mapboxgl.ScaleControl(scaleOptions(options));
            case 'fullscreen':
                return new mapboxgl.FullscreenControl({});
            case 'geolocate':
                return new mapboxgl.GeolocateControl(geolocateOptions(options));
            case 'attribution':
                return new mapboxgl.AttributionControl(attributionOptions(options));
            default:
                return null;
        }
    }

    public addElementControl(element: HTMLElement, position: ControlPosition): Removable {
        const control = new ElementControl(element, 'mapboxgl');
        this.map.addControl(control, position);
        return { remove: () => this.map.removeControl(control) };
    }

    public addDrawControl(draw: MapboxDraw, position: ControlPosition): Removable {
        this.map.addControl(draw, position);
        return { remove: () => this.map.removeControl(draw) };
    }

    public prepareDraw(): void {
        setDrawClassPrefix('mapboxgl');
    }

    public invoke(call: DynamicCall): void {
        invokeDynamic(this.map, call, 'Mapbox map');
    }

    public remove(): void {
        this.map.remove();
    }
}
