// src/map/view-support.ts
// Pieces every render function shares: the sized container, the teardown
// list, the call dispatcher and the view-to-host camera sync.

import type { CoreTraits, LatLng, QueueTraits } from '../store/IState';
import type { WidgetModel } from '../store/trait-store';
import { onTrait } from '../store/trait-store';
import { CallDispatcher } from '../protocol/call-dispatcher';
import type { CommandDecoder, CommandExecutor } from '../protocol/call-dispatcher';
import type { DynamicCall } from '../protocol/dynamic-call';
import { EventSink } from '../protocol/event-sink';
import { describeError } from '../utils/errors';
import { throttle } from '../utils/throttle';
import type { Teardown } from './IMapAdapter';

/** View-to-host camera updates are collapsed to one per interval (ms). */
export const CAMERA_SYNC_INTERVAL = 150;

/**
 * Creates the map container inside the widget element, sized by the width
 * and height traits and resized when they change.
 */
export function createContainer(el: HTMLElement, model: WidgetModel<CoreTraits>, className: string): {
    container: HTMLDivElement;
    dispose: Teardown;
} {
    const container = document.createElement('div');
    container.className = `anymap-container ${className}`;
    container.style.position = 'relative';
    const applySize = (): void => {
        container.style.width = model.get('width');
        container.style.height = model.get('height');
    };
    applySize();
    el.appendChild(container);

    const offWidth = onTrait(model, 'width', applySize);
    const offHeight = onTrait(model, 'height', applySize);
    return {
        container,
        dispose: () => {
            offWidth();
            offHeight();
            container.remove();
        },
    };
}

/** Renders a plain message box in place of a map. */
export function renderMessageBox(el: HTMLElement, message: string, tone: 'warning' | 'error'): Teardown {
    const box = document.createElement('div');
    box.className = `anymap-message anymap-message-${tone}`;
    box.style.padding = '16px';
    box.style.border = tone === 'error' ? '1px solid #d9534f' : '1px solid #f0ad4e';
    box.style.borderRadius = '4px';
    box.textContent = message;
    el.appendChild(box);
    return () => box.remove();
}

/**
 * Ordered list of cleanups. Runs in reverse order of registration; a cleanup
 * that throws is logged and the rest still run.
 */
export class Disposables {
    private readonly items: Teardown[] = [];

    public add(cleanup: Teardown): void {
        this.items.push(cleanup);
    }

    public run(): void {
        const pending = this.items.splice(0).reverse();
        pending.forEach(cleanup => {
            try {
                cleanup();
            } catch (error) {
                console.error('[CORE SERVICE] Teardown step failed.', error);
            }
        });
    }
}

/**
 * Per-render wiring shared by all backends: the event sink, the call
 * dispatcher and the teardown list.
 */
export class ViewSession {
    public readonly events: EventSink;
    public readonly disposables = new Disposables();

    constructor(private readonly model: WidgetModel<QueueTraits>) {
        this.events = new EventSink(model);
    }

    /**
     * Runs what is queued, skipping commands the replay already applied, and
     * then follows the queue until teardown.
     */
    public startCalls<C>(
        decode: CommandDecoder<C>,
        execute: CommandExecutor<C>,
        isReplayed: (command: C | DynamicCall) => boolean
    ): void {
        const dispatcher = new CallDispatcher(this.model, decode, execute, this.events);
        this.disposables.add(() => dispatcher.detach());
        dispatcher.drainAfterReplay(isReplayed);
        dispatcher.attach();
    }

    /** Subscribes to a trait for the lifetime of the view. */
    public watch<T extends object>(model: WidgetModel<T>, name: keyof T & string, callback: () => void): void {
        this.disposables.add(onTrait(model, name, callback));
    }

    /** Runs a view step, turning a failure into a log line and an `error` event. */
    public guard(method: string, step: () => void): void {
        try {
            step();
        } catch (error) {
            console.error(`[CORE SERVICE] ${method} failed:`, error);
            this.events.send('error', { method, error: describeError(error) });
        }
    }

    /** Reports a rejected async step the same way guard() reports a throw. */
    public report(method: string): (error: unknown) => void {
        return (error: unknown) => {
            console.warn(`[CORE SERVICE] ${method} failed:`, error);
            this.events.send('error', { method, error: describeError(error) });
        };
    }

    public dispose(): void {
        this.disposables.run();
    }
}

/**
 * Pushes the view's camera to the host's center and zoom traits, at most once
 * per CAMERA_SYNC_INTERVAL. Returns the trigger to call on every move.
 */
export function cameraSync(
    model: WidgetModel<CoreTraits>,
    read: () => { center: LatLng; zoom: number },
    disposables: Disposables
): () => void {
    const push = throttle(() => {
        const { center, zoom } = read();
        model.set('center', center);
        model.set('zoom', zoom);
        model.save_changes();
    }, CAMERA_SYNC_INTERVAL);
    disposables.add(() => push.cancel());
    return () => push();
}
