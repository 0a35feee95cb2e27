// src/map/gl-services/ElementControl.ts

/**
 * Hosts a DOM element in a GL map's control corner. Fits the IControl shape
 * of both MapLibre and Mapbox.
 */
export class ElementControl {
    private container: HTMLDivElement | null = null;

    constructor(
        private readonly element: HTMLElement,
        private readonly classPrefix: 'maplibregl' | 'mapboxgl'
    ) {}

    public onAdd(): HTMLElement {
        const container = document.createElement('div');
        container.className = `${this.classPrefix}-ctrl ${this.classPrefix}-ctrl-group anymap-element-ctrl`;
        container.appendChild(this.element);
        this.container = container;
        return container;
    }

    public onRemove(): void {
        this.container?.remove();
        this.container = null;
    }
}
