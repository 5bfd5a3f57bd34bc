import { calculateScale, lineLength } from '../src/utils/scale';

describe('calculateScale', () => {
  it('divides the line length by the distance', () => {
    expect(lineLength({ x: 0, y: 0 }, { x: 300, y: 400 })).toBe(500);
    expect(calculateScale({ x: 0, y: 0 }, { x: 300, y: 400 }, 250)).toBe(2);
  });

  it('rounds to three decimals', () => {
    expect(calculateScale({ x: 0, y: 0 }, { x: 10, y: 0 }, 3)).toBe(3.333);
  });

  it('rejects a zero-length line', () => {
    expect(() => calculateScale({ x: 4, y: 4 }, { x: 4, y: 4 }, 100)).toThrow(
      'The scale line has zero length: pick two different points'
    );
  });

  it.each([0, -5, Number.NaN])('rejects distance %p', (distance) => {
    expect(() => calculateScale({ x: 0, y: 0 }, { x: 1, y: 0 }, distance)).toThrow(
      `Distance must be a positive number, got ${distance}`
    );
  });
});
