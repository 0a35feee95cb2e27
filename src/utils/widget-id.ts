// src/utils/widget-id.ts

let counter = 0;

/** Generates an id unique within this process, e.g. "maplibre-3-9f2c1a". */
export function generateWidgetId(prefix: string): string {
    counter += 1;
    const suffix = Math.random().toString(16).slice(2, 8).padEnd(6, '0');
    return `${prefix}-${counter}-${suffix}`;
}
