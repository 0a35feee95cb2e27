// src/protocol/call-queue.ts

import type { CallRecord, QueueTraits } from '../store/IState';
import type { WidgetModel } from '../store/trait-store';
import { enqueueBounded } from '../store/bounded-queue';

/** A call before it is numbered and queued. */
export interface CallRequest {
    method: string;
    args: unknown[];
    kwargs: Record<string, unknown>;
}

/**
 * Host side of `_js_calls`. Each record gets an id one higher than the last,
 * which views use to skip records they already ran.
 */
export class CallQueue {
    private nextId = 1;

    constructor(private readonly model: WidgetModel<QueueTraits>) {}

    public push(request: CallRequest): CallRecord {
        const record: CallRecord = {
            id: this.nextId++,
            method: request.method,
            args: request.args,
            kwargs: request.kwargs,
        };
        const { items, dropped } = enqueueBounded(
            this.model.get('_js_calls'),
            record,
            this.model.get('_queue'),
            '_js_calls'
        );
        if (dropped.length > 0) {
            console.warn(`[CallQueue] Queue full, dropped ${dropped.length} call(s): ${dropped.map(d => d.method).join(', ')}`);
        }
        this.model.set('_js_calls', items);
        this.model.save_changes();
        return record;
    }

    public get pending(): number {
        return this.model.get('_js_calls').length;
    }
}
