import { createPointRenderData, createRenderList } from '../src/renderers/pointRenderData';
import { PointRegistry } from '../src/points/PointRegistry';
import { makeInput, silenceConsole } from './helpers';

describe('createPointRenderData', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('derives the outer circle from diameter and scale', () => {
    const registry = new PointRegistry();
    const point = registry.add(
      makeInput(40, 60, { label: 'Spot', diameter: 20, scale: 2.5, colour: '#00ff00' }, 10)
    );

    expect(createPointRenderData(point)).toEqual({
      id: 10,
      center: { x: 40, y: 60 },
      outerRadius: 25,
      outerStrokeWidth: 4,
      innerRadius: 0.5,
      labelText: '10_Spot',
      labelPosition: { x: 40, y: 60 },
      color: '#00ff00',
      isReference: false,
      point,
    });
  });

  it('keeps registry order and marks reference points', () => {
    const registry = new PointRegistry();
    registry.add(makeInput(0, 0, { label: 'Spot' }));
    registry.add(makeInput(5, 5, { label: 'RefMark' }));

    const list = createRenderList(registry.getAll(), { outerStrokeWidth: 2, innerRadius: 1 });
    expect(list.map((r) => [r.labelText, r.isReference, r.outerStrokeWidth])).toEqual([
      ['1_Spot', false, 2],
      ['2_RefMark', true, 2],
    ]);
  });
});
