// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
    AnymapLayerControl,
    LAYER_OPACITY_EVENT,
    LAYER_VISIBILITY_EVENT,
    readOpacityDetail,
    readVisibilityDetail,
} from '../../src/components/modules/anymap-layer-control';

vi.mock('@shoelace-style/shoelace/dist/components/checkbox/checkbox.js', () => ({}));
vi.mock('@shoelace-style/shoelace/dist/components/range/range.js', () => ({}));

async function renderControl(): Promise<AnymapLayerControl> {
    const control = new AnymapLayerControl();
    control.layers = [
        { id: 'Background', name: 'Background', visible: true, opacity: 1 },
        { id: 'roads', name: 'Roads', visible: true, opacity: 0.8 },
    ];
    control.collapsed = false;
    document.body.append(control);
    await control.updateComplete;
    return control;
}

function row(control: AnymapLayerControl, id: string): Element | null {
    return control.shadowRoot?.querySelector(`[data-layer-id="${id}"]`) ?? null;
}

describe('anymap-layer-control', () => {
    afterEach(() => {
        document.body.innerHTML = '';
    });

    it('renders one row per layer when expanded', async () => {
        const control = await renderControl();

        expect(control.shadowRoot?.querySelectorAll('.row').length).toBe(2);
        expect(row(control, 'roads')?.querySelector('sl-checkbox')?.textContent).toBe('Roads');
    });

    it('toggles the panel from its button', async () => {
        const control = await renderControl();
        control.shadowRoot?.querySelector('button')?.click();
        await control.updateComplete;

        expect(control.collapsed).toBe(true);
        expect(control.hasAttribute('collapsed')).toBe(true);
        expect(control.shadowRoot?.querySelector('.panel')).toBeNull();
    });

    it('reports a visibility change', async () => {
        const control = await renderControl();
        const seen: unknown[] = [];
        control.addEventListener(LAYER_VISIBILITY_EVENT, event => seen.push(readVisibilityDetail(event)));
        const checkbox = row(control, 'roads')?.querySelector('sl-checkbox');
        if (!checkbox) throw new Error('checkbox not rendered');

        Reflect.set(checkbox, 'checked', false);
        checkbox.dispatchEvent(new Event('sl-change'));

        expect(seen).toEqual([{ layerId: 'roads', visible: false }]);
        expect(control.layers[1].visible).toBe(false);
    });

    it('reports an opacity change from the slider value', async () => {
        const control = await renderControl();
        const seen: unknown[] = [];
        control.addEventListener(LAYER_OPACITY_EVENT, event => seen.push(readOpacityDetail(event)));
        const range = row(control, 'Background')?.querySelector('sl-range');
        if (!range) throw new Error('range not rendered');

        Reflect.set(range, 'value', '0.4');
        range.dispatchEvent(new Event('sl-input'));

        expect(seen).toEqual([{ layerId: 'Background', opacity: 0.4 }]);
        expect(control.layers[0].opacity).toBe(0.4);
    });
});

describe('layer control event details', () => {
    it('rejects events without a usable detail', () => {
        expect(readVisibilityDetail(new Event(LAYER_VISIBILITY_EVENT))).toBeNull();
        expect(readOpacityDetail(new CustomEvent(LAYER_OPACITY_EVENT, { detail: { layerId: 'roads', opacity: '1' } }))).toBeNull();
        expect(readOpacityDetail(new CustomEvent(LAYER_OPACITY_EVENT, { detail: { layerId: 'roads', opacity: 1 } })))
            .toEqual({ layerId: 'roads', opacity: 1 });
    });
});
