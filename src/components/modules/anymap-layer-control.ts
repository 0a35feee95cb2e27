import { LitElement, html, css, nothing } from 'lit';
import { customElement, property } from 'lit/decorators.js';

import '@shoelace-style/shoelace/dist/components/checkbox/checkbox.js';
import '@shoelace-style/shoelace/dist/components/range/range.js';

export interface LayerControlRow {
    id: string;
    name: string;
    visible: boolean;
    /** 0..1 */
    opacity: number;
}

export interface LayerVisibilityDetail {
    layerId: string;
    visible: boolean;
}

export interface LayerOpacityDetail {
    layerId: string;
    opacity: number;
}

export const LAYER_VISIBILITY_EVENT = 'anymap-layer-visibility';
export const LAYER_OPACITY_EVENT = 'anymap-layer-opacity';

function detailField(event: Event, name: string): unknown {
    if (!(event instanceof CustomEvent)) return undefined;
    const detail: unknown = event.detail;
    return typeof detail === 'object' && detail !== null ? Reflect.get(detail, name) : undefined;
}

export function readVisibilityDetail(event: Event): LayerVisibilityDetail | null {
    const layerId = detailField(event, 'layerId');
    const visible = detailField(event, 'visible');
    return typeof layerId === 'string' && typeof visible === 'boolean' ? { layerId, visible } : null;
}

export function readOpacityDetail(event: Event): LayerOpacityDetail | null {
    const layerId = detailField(event, 'layerId');
    const opacity = detailField(event, 'opacity');
    return typeof layerId === 'string' && typeof opacity === 'number' ? { layerId, opacity } : null;
}

/**
 * Collapsible panel with one row per layer: a visibility checkbox and an
 * opacity slider. It owns no map state; the view listens for the events it
 * dispatches and feeds the resulting states back through `layers`.
 */
@customElement('anymap-layer-control')
export class AnymapLayerControl extends LitElement {
    @property({ type: Array }) layers: LayerControlRow[] = [];

    @property({ type: Boolean, reflect: true }) collapsed = true;

    static styles = css`
        :host {
            display: block;
            background: #fff;
            border-radius: 4px;
            box-shadow: 0 0 0 2px rgba(0, 0, 0, 0.1);
            font: 12px/1.4 sans-serif;
        }
        .toggle {
            width: 29px;
            height: 29px;
            border: 0;
            background: transparent;
            cursor: pointer;
            font-size: 16px;
        }
        .panel {
            min-width: 180px;
            max-height: 320px;
            overflow-y: auto;
            padding: 4px 8px 8px;
        }
        .row {
            padding: 4px 0;
            border-bottom: 1px solid #eee;
        }
        .row:last-child {
            border-bottom: 0;
        }
        sl-range {
            --track-height: 4px;
            --thumb-size: 12px;
        }
    `;

    render() {
        return html`
            <button
                class="toggle"
                title="Layers"
                aria-expanded=${String(!this.collapsed)}
                @click=${this.toggle}
            >&#9776;</button>
            ${this.collapsed ? nothing : html`
                <div class="panel">
                    ${this.layers.map(row => this.renderRow(row))}
                </div>
            `}
        `;
    }

    private renderRow(row: LayerControlRow) {
        return html`
            <div class="row" data-layer-id=${row.id}>
                <sl-checkbox
                    size="small"
                    ?checked=${row.visible}
                    @sl-change=${(e: Event) => this.handleVisibility(row.id, e)}
                >${row.name}</sl-checkbox>
                <sl-range
                    min="0"
                    max="1"
                    step="0.05"
                    .value=${row.opacity}
                    @sl-input=${(e: Event) => this.handleOpacity(row.id, e)}
                ></sl-range>
            </div>
        `;
    }

    private toggle(): void {
        this.collapsed = !this.collapsed;
    }

    private handleVisibility(layerId: string, event: Event): void {
        const checked: unknown = event.target ? Reflect.get(event.target, 'checked') : undefined;
        if (typeof checked !== 'boolean') return;
        this.updateRow(layerId, { visible: checked });
        this.emit<LayerVisibilityDetail>(LAYER_VISIBILITY_EVENT, { layerId, visible: checked });
    }

    private handleOpacity(layerId: string, event: Event): void {
        const value: unknown = event.target ? Reflect.get(event.target, 'value') : undefined;
        const opacity = typeof value === 'string' ? Number(value) : value;
        if (typeof opacity !== 'number' || !Number.isFinite(opacity)) return;
        this.updateRow(layerId, { opacity });
        this.emit<LayerOpacityDetail>(LAYER_OPACITY_EVENT, { layerId, opacity });
    }

    private updateRow(layerId: string, change: Partial<LayerControlRow>): void {
        this.layers = this.layers.map(row => (row.id === layerId ? { ...row, ...change } : row));
    }

    private emit<D>(type: string, detail: D): void {
        this.dispatchEvent(new CustomEvent<D>(type, {
            detail,
            bubbles: true,
            composed: true,
        }));
    }
}

declare global {
    interface HTMLElementTagNameMap {
        'anymap-layer-control': AnymapLayerControl;
    }
}
