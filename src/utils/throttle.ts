// src/utils/throttle.ts

export interface Throttled<A extends unknown[]> {
    (...args: A): void;
    /** Drops a trailing call that has not fired yet. */
    cancel(): void;
}

/**
 * Ensures a function is called at most once per `limit` milliseconds.
 * The first call runs immediately; calls inside the window collapse into one
 * trailing call with the latest arguments.
 */
export function throttle<A extends unknown[]>(func: (...args: A) => void, limit: number): Throttled<A> {
    let timer: ReturnType<typeof setTimeout> | null = null;
    let lastRan: number | null = null;

    const throttled = (...args: A): void => {
        const now = Date.now();
        if (lastRan === null || now - lastRan >= limit) {
            if (timer) {
                clearTimeout(timer);
                timer = null;
            }
            lastRan = now;
            func(...args);
            return;
        }
        if (timer) {
            clearTimeout(timer);
        }
        timer = setTimeout(() => {
            timer = null;
            lastRan = Date.now();
            func(...args);
        }, limit - (now - lastRan));
    };

    return Object.assign(throttled, {
        cancel: () => {
            if (timer) {
                clearTimeout(timer);
                timer = null;
            }
        },
    });
}
