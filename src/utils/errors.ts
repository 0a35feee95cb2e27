// src/utils/errors.ts

/** Base class for every error raised by the widget layer. */
export class AnymapError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Widget options or a config file failed validation. */
export class WidgetConfigError extends AnymapError {
    constructor(message: string, public readonly details: string[] = []) {
        super(details.length > 0 ? `${message}\n${details.map(d => `  ${d}`).join('\n')}` : message);
    }
}

/** A call record named a known method but carried arguments of the wrong shape. */
export class CommandDecodeError extends AnymapError {
    constructor(public readonly method: string, reason: string) {
        super(`Invalid arguments for "${method}": ${reason}`);
    }
}

/** A bounded queue was full and its overflow policy is 'error'. */
export class QueueOverflowError extends AnymapError {
    constructor(public readonly queue: string, public readonly capacity: number) {
        super(`Queue "${queue}" is full (capacity ${capacity})`);
    }
}

/** An exclusive backend already has another active view. */
export class InstanceConflictError extends AnymapError {
    constructor(
        public readonly backend: string,
        public readonly activeWidgetId: string,
        public readonly requestedWidgetId: string
    ) {
        super(
            `Only one ${backend} view can be active at a time ` +
            `(widget "${activeWidgetId}" is active, "${requestedWidgetId}" was requested). ` +
            `Close the other view first.`
        );
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
