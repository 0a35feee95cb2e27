import { describe, expect, it, vi } from 'vitest';
import { CONTROL_FACTORIES } from '../../src/map/openlayers-services/controls';

const fakes = vi.hoisted(() => {
    class Recorded {
        constructor(public readonly options: Record<string, unknown> = {}) {}
    }
    const recorder = (name: string) => ({ [name]: class extends Recorded {} })[name];
    return { recorder, createStringXY: vi.fn((digits: number) => `xy-${digits}`) };
});

vi.mock('ol/control/Attribution', () => ({ default: fakes.recorder('Attribution') }));
vi.mock('ol/control/FullScreen', () => ({ default: fakes.recorder('FullScreen') }));
vi.mock('ol/control/MousePosition', () => ({ default: fakes.recorder('MousePosition') }));
vi.mock('ol/control/OverviewMap', () => ({ default: fakes.recorder('OverviewMap') }));
vi.mock('ol/control/Rotate', () => ({ default: fakes.recorder('Rotate') }));
vi.mock('ol/control/ScaleLine', () => ({ default: fakes.recorder('ScaleLine') }));
vi.mock('ol/control/Zoom', () => ({ default: fakes.recorder('Zoom') }));
vi.mock('ol/coordinate', () => ({ createStringXY: fakes.createStringXY }));
vi.mock('ol/layer/Tile', () => ({ default: fakes.recorder('TileLayer') }));
vi.mock('ol/source/OSM', () => ({ default: fakes.recorder('OSM') }));

function optionsOf(control: object): unknown {
    return Reflect.get(control, 'options');
}

describe('OpenLayers control factories', () => {
    it('applies defaults for omitted options', () => {
        expect(optionsOf(CONTROL_FACTORIES.scaleline({}))).toEqual({ units: 'metric', bar: false });
        expect(optionsOf(CONTROL_FACTORIES.rotate({}))).toEqual({ autoHide: true });
        expect(optionsOf(CONTROL_FACTORIES.attribution({ collapsed: false }))).toEqual({ collapsible: true, collapsed: false });
    });

    it('ignores a scale unit OpenLayers does not have', () => {
        expect(optionsOf(CONTROL_FACTORIES.scaleline({ units: 'furlong', bar: true }))).toEqual({ units: 'metric', bar: true });
        expect(optionsOf(CONTROL_FACTORIES.scaleline({ units: 'nautical' }))).toEqual({ units: 'nautical', bar: false });
    });

    it('formats mouse coordinates with the requested digits', () => {
        const control = CONTROL_FACTORIES.mouseposition({ digits: 2 });

        expect(fakes.createStringXY).toHaveBeenCalledWith(2);
        expect(optionsOf(control)).toEqual({ projection: 'EPSG:4326', coordinateFormat: 'xy-2' });
    });

    it('gives the overview map its own OSM layer', () => {
        const control = CONTROL_FACTORIES.overviewmap({});

        expect(control.constructor.name).toBe('OverviewMap');
        expect(optionsOf(control)).toMatchObject({ collapsed: true, layers: [expect.any(Object)] });
    });
});
