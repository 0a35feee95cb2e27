// src/protocol/call-dispatcher.ts

import type { CallRecord, QueueTraits } from '../store/IState';
import type { WidgetModel } from '../store/trait-store';
import { onTrait } from '../store/trait-store';
import type { DynamicCall } from './dynamic-call';
import type { EventSink } from './event-sink';
import { describeError } from '../utils/errors';

export type CommandDecoder<C> = (record: CallRecord) => C | DynamicCall;
export type CommandExecutor<C> = (command: C | DynamicCall) => void;

/**
 * View side of `_js_calls`. Drains the queue in arrival order, runs each
 * decoded command in isolation and reports failures as `error` events.
 * The queue is emptied once the drain completes.
 */
export class CallDispatcher<C> {
    private lastHandledId = 0;
    private draining = false;
    private rerun = false;
    private unsubscribe: (() => void) | null = null;
    private replayed: ((command: C | DynamicCall) => boolean) | null = null;

    constructor(
        private readonly model: WidgetModel<QueueTraits>,
        private readonly decode: CommandDecoder<C>,
        private readonly execute: CommandExecutor<C>,
        private readonly events: EventSink
    ) {}

    /** Starts reacting to queue changes. Calls already queued wait for drain(). */
    public attach(): void {
        if (this.unsubscribe) return;
        this.unsubscribe = onTrait(this.model, '_js_calls', () => this.drain());
    }

    public detach(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;
    }

    /**
     * First drain of a freshly rendered view. Queued commands whose effect the
     * replayed traits already carry are marked handled without running; the
     * rest (camera moves, dynamic calls) run as usual.
     */
    public drainAfterReplay(isReplayed: (command: C | DynamicCall) => boolean): void {
        this.replayed = isReplayed;
        try {
            this.drain();
        } finally {
            this.replayed = null;
        }
    }

    public drain(): void {
        if (this.draining) {
            this.rerun = true;
            return;
        }
        this.draining = true;
        try {
            do {
                this.rerun = false;
                for (const record of this.model.get('_js_calls')) {
                    if (record.id <= this.lastHandledId) continue;
                    this.lastHandledId = record.id;
                    this.run(record);
                }
            } while (this.rerun);

            if (this.model.get('_js_calls').length > 0) {
                this.model.set('_js_calls', []);
                this.model.save_changes();
            }
        } finally {
            this.draining = false;
        }
    }

    private run(record: CallRecord): void {
        try {
            const command = this.decode(record);
            if (this.replayed?.(command)) return;
            this.execute(command);
        } catch (error) {
            console.error(`[CallDispatcher] Error executing "${record.method}":`, error);
            this.events.send('error', { method: record.method, error: describeError(error) });
        }
    }
}
