// src/map/openlayers-services/MapCoreService.ts

import OLMap from 'ol/Map';
import View from 'ol/View';
import Overlay from 'ol/Overlay';
import type Control from 'ol/control/Control';
import type { Coordinate } from 'ol/coordinate';
import type { EventsKey } from 'ol/events';
import TileLayer from 'ol/layer/Tile';
import { unByKey } from 'ol/Observable';
import { fromLonLat, toLonLat, transformExtent } from 'ol/proj';
import OSM from 'ol/source/OSM';
import XYZ from 'ol/source/XYZ';
import 'ol/ol.css';
import type { LatLng, LatLngBounds, LngLatTuple } from '../../store/IState';
import type { OpenLayersTraits } from '../../store/backend-traits';
import type { Pixel } from '../../store/map-events';
import type { WidgetModel } from '../../store/trait-store';
import type { OpenLayersControlType } from '../../protocol/openlayers-commands';
import { isOpenLayersControlType } from '../../protocol/openlayers-commands';
import { requireBasemap } from '../../config/basemaps';
import { CONTROL_FACTORIES } from './controls';
import { POPUP_PROPERTY } from './MapLayerService';

/** Tile source for the `basemap` trait: OSM, a URL template or a named provider. */
export function basemapSource(basemap: string): XYZ {
    if (basemap === 'OpenStreetMap') return new OSM();
    if (basemap.includes('{z}')) return new XYZ({ url: basemap });
    try {
        const provider = requireBasemap(basemap);
        return new XYZ({ url: provider.url, attributions: provider.attribution, maxZoom: provider.maxZoom });
    } catch (error) {
        console.warn(`[CORE SERVICE] openlayers: ${error instanceof Error ? error.message : String(error)}; using OpenStreetMap.`);
        return new OSM();
    }
}

/**
 * Owns the OpenLayers map: the view in the widget's projection, the base
 * layer, the controls and a popup overlay for markers.
 */
export class MapCoreService {
    public readonly map: OLMap;
    public readonly projection: string;
    private readonly baseLayer: TileLayer<XYZ>;
    private readonly controls = new Map<OpenLayersControlType, Control>();
    private readonly popup: Overlay;
    private readonly popupElement: HTMLDivElement;

    constructor(container: HTMLElement, model: WidgetModel<OpenLayersTraits>) {
        this.projection = model.get('projection');
        const [lat, lng] = model.get('center');
        console.log(`[CORE SERVICE] Initializing OpenLayers instance at zoom ${model.get('zoom')}`);
        this.baseLayer = new TileLayer({ source: basemapSource(model.get('basemap')) });
        this.map = new OLMap({
            target: container,
            layers: [this.baseLayer],
            controls: [],
            view: new View({
                projection: this.projection,
                center: fromLonLat([lng, lat], this.projection),
                zoom: model.get('zoom'),
                rotation: model.get('rotation'),
            }),
        });

        this.popupElement = document.createElement('div');
        this.popupElement.className = 'anymap-ol-popup';
        this.popupElement.style.cssText = 'background:#fff;padding:6px 8px;border-radius:4px;box-shadow:0 1px 4px rgba(0,0,0,.3);';
        this.popup = new Overlay({ element: this.popupElement, positioning: 'bottom-center', offset: [0, -10] });
        this.map.addOverlay(this.popup);
    }

    public setBasemap(basemap: string): void {
        this.baseLayer.setSource(basemapSource(basemap));
    }

    /** Adds a control, replacing one of the same type. Unknown types warn. */
    public addControl(type: string, options: Record<string, unknown>): void {
        if (!isOpenLayersControlType(type)) {
            console.warn(`[CORE SERVICE] openlayers: unknown control type "${type}"; skipped.`);
            return;
        }
        if (this.controls.has(type)) {
            console.warn(`[CORE SERVICE] openlayers: control "${type}" already present; replacing it.`);
            this.removeControl(type);
        }
        const control = CONTROL_FACTORIES[type](options);
        this.map.addControl(control);
        this.controls.set(type, control);
    }

    public removeControl(type: OpenLayersControlType): void {
        const control = this.controls.get(type);
        if (!control) return;
        this.map.removeControl(control);
        this.controls.delete(type);
    }

    public controlTypes(): OpenLayersControlType[] {
        return [...this.controls.keys()];
    }

    public getCamera(): { center: LatLng; zoom: number; rotation: number } {
        const view = this.map.getView();
        const [lng, lat] = toLonLat(view.getCenter() ?? [0, 0], this.projection);
        return { center: [lat, lng], zoom: view.getZoom() ?? 0, rotation: view.getRotation() };
    }

    /** Moves only when the requested view differs, so trait echoes do not loop. */
    public syncView(center: LatLng, zoom: number, rotation: number): void {
        const current = this.getCamera();
        const view = this.map.getView();
        if (current.center[0] !== center[0] || current.center[1] !== center[1]) {
            view.setCenter(fromLonLat([center[1], center[0]], this.projection));
        }
        if (current.zoom !== zoom) view.setZoom(zoom);
        if (current.rotation !== rotation) view.setRotation(rotation);
    }

    public flyTo(center: LatLng, zoom: number | undefined, duration: number): void {
        const target = fromLonLat([center[1], center[0]], this.projection);
        const view = this.map.getView();
        if (zoom === undefined) {
            view.animate({ center: target, duration });
        } else {
            view.animate({ center: target, zoom, duration });
        }
    }

    /** Bounds are [[south, west], [north, east]]. */
    public fitBounds(bounds: LatLngBounds, padding: number): void {
        const [[south, west], [north, east]] = bounds;
        const extent = transformExtent([west, south, east, north], 'EPSG:4326', this.projection);
        this.map.getView().fit(extent, { padding: [padding, padding, padding, padding], duration: 500 });
    }

    public onClick(handler: (lngLat: LngLatTuple, point: Pixel) => void): () => void {
        const key: EventsKey = this.map.on('click', event => {
            const [lng, lat] = toLonLat(event.coordinate, this.projection);
            handler([lng, lat], [event.pixel[0], event.pixel[1]]);
            this.showPopupAt(event.pixel, event.coordinate);
        });
        return () => unByKey(key);
    }

    public onMoveEnd(handler: () => void): () => void {
        const key: EventsKey = this.map.on('moveend', () => handler());
        return () => unByKey(key);
    }

    /** Opens the popup of the first marker under the pixel, or closes it. */
    private showPopupAt(pixel: number[], coordinate: Coordinate): void {
        const text = this.map.forEachFeatureAtPixel(pixel, feature => {
            const value: unknown = feature.get(POPUP_PROPERTY);
            return typeof value === 'string' ? value : undefined;
        });
        if (text === undefined) {
            this.popup.setPosition(undefined);
            return;
        }
        this.popupElement.innerHTML = text;
        this.popup.setPosition(coordinate);
    }

    public updateSize(): void {
        this.map.updateSize();
    }

    public remove(): void {
        this.map.setTarget(undefined);
        this.map.dispose();
    }
}
