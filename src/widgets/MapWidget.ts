// src/widgets/MapWidget.ts
// Host side of every map widget: owns the traits, numbers outgoing calls and
// hands incoming view events to registered handlers.

import { writeFile } from 'node:fs/promises';
import type { BackendName } from '../config/types';
import type { CallRecord, CoreTraits, LatLng } from '../store/IState';
import { TraitStore, onTrait } from '../store/trait-store';
import type { WidgetModel } from '../store/trait-store';
import { MapEventBus } from '../store/map-events';
import type { MapEventHandler } from '../store/map-events';
import { CallQueue } from '../protocol/call-queue';
import type { CallRequest } from '../protocol/call-queue';
import { cssSize, renderHtmlDocument } from '../export/html-document';
import type { ExportDocument, HtmlExportOptions } from '../export/html-document';
import { generateWidgetId } from '../utils/widget-id';

export abstract class MapWidget<T extends CoreTraits> {
    public abstract readonly backend: BackendName;
    public readonly widgetId: string;

    protected readonly model: TraitStore<T>;
    protected readonly calls: CallQueue;
    protected readonly events = new MapEventBus();

    protected constructor(initial: T, idPrefix: string) {
        this.widgetId = generateWidgetId(idPrefix);
        this.model = new TraitStore(initial);
        this.calls = new CallQueue(this.model);
        this.core.set('_widget_id', this.widgetId);
        onTrait(this.model, '_js_events', () => this.drainEvents());
    }

    /** The traits every backend shares, typed for writing from generic code. */
    protected get core(): WidgetModel<CoreTraits> {
        return this.model;
    }

    public get center(): LatLng {
        return this.core.get('center');
    }

    public get zoom(): number {
        return this.core.get('zoom');
    }

    public get width(): string {
        return this.core.get('width');
    }

    public get height(): string {
        return this.core.get('height');
    }

    public get traits(): T {
        return this.model.snapshot();
    }

    public setCenter(lat: number, lng: number): void {
        this.core.set('center', [lat, lng]);
    }

    public setZoom(zoom: number): void {
        this.core.set('zoom', zoom);
    }

    public abstract flyTo(lat: number, lng: number, zoom?: number): void;

    /** Queues a library method call by name. The view invokes it if the map has it. */
    public call(method: string, ...args: unknown[]): CallRecord {
        return this.calls.push({ method, args, kwargs: {} });
    }

    public callWithOptions(method: string, args: unknown[], kwargs: Record<string, unknown>): CallRecord {
        return this.calls.push({ method, args, kwargs });
    }

    protected enqueue(request: CallRequest): CallRecord {
        return this.calls.push(request);
    }

    public onMapEvent(type: string, handler: MapEventHandler): () => void {
        return this.events.on(type, handler);
    }

    public offMapEvent(type: string, handler?: MapEventHandler): void {
        this.events.off(type, handler);
    }

    /** `${kind}_${n}`, n starting at the layer count and raised past ids already taken. */
    protected nextLayerId(kind: string): string {
        const layers = this.model.get('_layers');
        let n = Object.keys(layers).length;
        while (`${kind}_${n}` in layers) n++;
        return `${kind}_${n}`;
    }

    public getLayers(): T['_layers'] {
        return structuredClone(this.model.get('_layers'));
    }

    public getSources(): T['_sources'] {
        return structuredClone(this.model.get('_sources'));
    }

    /**
     * A view-side model linked to this widget. Writes made by the view reach
     * the host on save_changes(), host writes reach the view immediately.
     */
    public createView(): TraitStore<T> {
        const view = new TraitStore(this.model.snapshot(), { autoSave: false });
        this.model.link(view);
        return view;
    }

    public releaseView(view: TraitStore<T>): void {
        this.model.unlink(view);
    }

    public get viewCount(): number {
        return this.model.peerCount;
    }

    public toHtml(options: HtmlExportOptions = {}): string {
        return renderHtmlDocument(
            {
                title: options.title ?? `${this.backend} map`,
                width: cssSize(options.width, cssSize(this.width, '100%')),
                height: cssSize(options.height, cssSize(this.height, '600px')),
            },
            this.exportDocument()
        );
    }

    /** Writes the exported page to `filename` and resolves to its contents. */
    public async saveHtml(filename: string, options: HtmlExportOptions = {}): Promise<string> {
        const html = this.toHtml(options);
        await writeFile(filename, html, 'utf8');
        return html;
    }

    protected abstract exportDocument(): ExportDocument;

    private drainEvents(): void {
        const pending = this.core.get('_js_events');
        if (pending.length === 0) return;
        this.core.set('_js_events', []);
        pending.forEach(record => this.events.emit(record));
    }
}
