// src/protocol/event-sink.ts

import type { MapEventRecord, QueueOptions, QueueTraits } from '../store/IState';
import type { WidgetModel } from '../store/trait-store';
import { enqueueBounded } from '../store/bounded-queue';

/**
 * View side of `_js_events`. Appends, never replaces, so events raised
 * between two host observations all arrive.
 */
export class EventSink {
    constructor(private readonly model: WidgetModel<QueueTraits>) {}

    public send(type: string, payload: Record<string, unknown> = {}): void {
        const configured = this.model.get('_queue');
        // A view must not throw into the library's event loop.
        const policy: QueueOptions = configured.overflow === 'error'
            ? { ...configured, overflow: 'drop-newest' }
            : configured;
        const event: MapEventRecord = { ...payload, type };
        const { items, dropped } = enqueueBounded(this.model.get('_js_events'), event, policy, '_js_events');
        if (dropped.length > 0) {
            const message = `[EventSink] Event queue full, dropped ${dropped.length} event(s).`;
            if (configured.overflow === 'error') {
                console.error(message);
            } else {
                console.warn(message);
            }
        }
        this.model.set('_js_events', items);
        this.model.save_changes();
    }
}
