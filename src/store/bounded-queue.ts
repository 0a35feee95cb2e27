// src/store/bounded-queue.ts

import type { QueueOptions } from './IState';
import { QueueOverflowError } from '../utils/errors';

export const DEFAULT_QUEUE_OPTIONS: QueueOptions = {
    capacity: 1000,
    overflow: 'drop-oldest',
};

export interface EnqueueResult<T> {
    items: T[];
    dropped: T[];
}

/**
 * Appends to an immutable queue, applying the overflow policy once the
 * queue holds `capacity` items. 'error' throws instead of dropping.
 */
export function enqueueBounded<T>(
    items: readonly T[],
    item: T,
    options: QueueOptions,
    queueName = 'queue'
): EnqueueResult<T> {
    const capacity = Math.max(1, Math.floor(options.capacity));
    if (items.length < capacity) {
        return { items: [...items, item], dropped: [] };
    }

    switch (options.overflow) {
        case 'drop-newest':
            return { items: [...items], dropped: [item] };
        case 'error':
            throw new QueueOverflowError(queueName, capacity);
        case 'drop-oldest': {
            const next = [...items, item];
            const dropped = next.splice(0, next.length - capacity);
            return { items: next, dropped };
        }
    }
}

export function resolveQueueOptions(partial?: Partial<QueueOptions>): QueueOptions {
    return {
        capacity: partial?.capacity ?? DEFAULT_QUEUE_OPTIONS.capacity,
        overflow: partial?.overflow ?? DEFAULT_QUEUE_OPTIONS.overflow,
    };
}
