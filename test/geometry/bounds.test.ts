import { describe, it, expect } from 'vitest';
import { computeBoundingBox, resolveProfileBounds } from '../../src/geometry/bounds.js';

describe('resolveProfileBounds', () => {
  describe('rectangle profiles', () => {
    it('returns the profile dimensions unchanged', () => {
      expect(resolveProfileBounds({ kind: 'rectangle', xDim: 3, yDim: 4 })).toEqual({
        width: 3,
        depth: 4,
        degenerate: false,
      });
    });

    it('rounds dimensions to 3 decimals', () => {
      const bounds = resolveProfileBounds({ kind: 'rectangle', xDim: 3.14159, yDim: 2.71828 });
      expect(bounds.width).toBe(3.142);
      expect(bounds.depth).toBe(2.718);
    });
  });

  describe('polygon profiles', () => {
    const lShape: [number, number][] = [
      [0, 0],
      [5, 0],
      [5, 2],
      [2, 2],
      [2, 4.5],
      [0, 4.5],
    ];

    it('measures the bounding box of an L-shaped room', () => {
      expect(resolveProfileBounds({ kind: 'polygon', points: lShape })).toEqual({
        width: 5,
        depth: 4.5,
        degenerate: false,
      });
    });

    it('handles profiles away from the origin', () => {
      const points: [number, number][] = [
        [-2, 1],
        [1.5, 1],
        [1.5, 3.25],
        [-2, 3.25],
      ];
      const bounds = resolveProfileBounds({ kind: 'polygon', points });
      expect(bounds.width).toBe(3.5);
      expect(bounds.depth).toBe(2.25);
    });

    it('is invariant under permutation of the points', () => {
      const reversed = [...lShape].reverse();
      const rotated = [...lShape.slice(3), ...lShape.slice(0, 3)];
      const shuffled = [lShape[4], lShape[1], lShape[5], lShape[0], lShape[3], lShape[2]];

      const expected = resolveProfileBounds({ kind: 'polygon', points: lShape });
      for (const points of [reversed, rotated, shuffled]) {
        expect(resolveProfileBounds({ kind: 'polygon', points })).toEqual(expected);
      }
    });

    it('flags a single-point polygon as degenerate instead of failing', () => {
      expect(resolveProfileBounds({ kind: 'polygon', points: [[2, 3]] })).toEqual({
        width: 0,
        depth: 0,
        degenerate: true,
      });
    });

    it('flags an empty polygon as degenerate', () => {
      expect(resolveProfileBounds({ kind: 'polygon', points: [] })).toEqual({
        width: 0,
        depth: 0,
        degenerate: true,
      });
    });
  });
});

describe('computeBoundingBox', () => {
  it('returns undefined for no points', () => {
    expect(computeBoundingBox([])).toBeUndefined();
  });

  it('returns min and max corners', () => {
    expect(
      computeBoundingBox([
        { x: 1, y: 5 },
        { x: -3, y: 2 },
        { x: 4, y: -1 },
      ])
    ).toEqual({ minX: -3, minY: -1, maxX: 4, maxY: 5 });
  });
});
