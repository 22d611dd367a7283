import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/config/index.js';
import { buildModelIndex } from '../../src/reconcile/model-index.js';
import {
  isExternalOpening,
  locateSupportingWall,
  resolveWallLength,
  wallPlaneDistance,
} from '../../src/reconcile/locator.js';
import { box, createBedroomModel, createWall, findWall, pset } from '../__fixtures__/model.js';

function windowById(id: string) {
  const model = createBedroomModel();
  const window = model.windows.find((w) => w.id === id);
  if (!window) throw new Error(`No window ${id} in fixture`);
  return { model, window };
}

describe('wallPlaneDistance', () => {
  it('measures across the thickness of a wall running along y', () => {
    expect(wallPlaneDistance(box([-0.1, -0.1, 0], [0.1, 4.1, 2.5]), [0.25, 3, 1])).toBe(0.25);
  });

  it('measures across the thickness of a wall running along x', () => {
    expect(wallPlaneDistance(box([-0.1, -0.1, 0], [3.1, 0.1, 2.5]), [1, 0.5, 1])).toBe(0.5);
  });
});

describe('resolveWallLength', () => {
  it('prefers the declared length', () => {
    const wall = createWall('W', box([0, 0, 0], [2, 0.2, 2.5]), { length: 2.4 });
    expect(resolveWallLength(wall, 'PSet_Revit_Dimensions.Length')).toBe(2.4);
  });

  it('falls back to the longer plan extent', () => {
    const wall = createWall('W', box([0, 0, 0], [0.5, 6, 2.5]));
    expect(resolveWallLength(wall, 'PSet_Revit_Dimensions.Length')).toBe(6);
  });
});

describe('locateSupportingWall', () => {
  it('finds the only wall around a window', () => {
    const { model, window } = windowById('W1');
    const match = locateSupportingWall(window, buildModelIndex(model), resolveConfig());

    expect(match?.wall.id).toBe('WS');
    expect(match?.wallLength).toBe(3.2);
    expect(match?.orientation).toBe('front');
    expect(match?.distance).toBe(0);
  });

  it('picks the wall whose plane passes through the window near a corner', () => {
    const { model, window } = windowById('W2');
    const match = locateSupportingWall(window, buildModelIndex(model), resolveConfig());

    expect(match?.wall.id).toBe('WW');
    expect(match?.orientation).toBe('left');
    expect(match?.wallLength).toBe(4.2);
  });

  it('takes the last queried wall under last-candidate selection', () => {
    const { model, window } = windowById('W2');
    const match = locateSupportingWall(
      window,
      buildModelIndex(model),
      resolveConfig({ wallSelection: 'last-candidate' })
    );

    expect(match?.wall.id).toBe('WS');
    expect(match?.orientation).toBe('front');
  });

  it('accepts a wall whose plane passes through the centroid at zero tolerance', () => {
    const { model, window } = windowById('W2');
    const match = locateSupportingWall(window, buildModelIndex(model), resolveConfig({ wallPlaneTolerance: 0 }));

    expect(match?.wall.id).toBe('WW');
  });

  it('returns undefined when no wall is nearby', () => {
    const { model, window } = windowById('W1');
    model.walls = model.walls.filter((w) => w.id !== 'WS');
    expect(locateSupportingWall(window, buildModelIndex(model), resolveConfig())).toBeUndefined();
  });

  it('classifies orientation with the configured tolerance', () => {
    const { model, window } = windowById('W1');
    // About 2.9 degrees off the +y axis
    findWall(model, 'WS').refDirection = [0.05, 1, 0];
    const index = buildModelIndex(model);
    const strict = locateSupportingWall(window, index, resolveConfig({ orientationToleranceDeg: 0 }));
    const lenient = locateSupportingWall(window, index, resolveConfig({ orientationToleranceDeg: 5 }));

    expect(strict?.orientation).toBe('unknown');
    expect(lenient?.orientation).toBe('left');
  });
});

describe('isExternalOpening', () => {
  it('reads the flag from any property set', () => {
    expect(isExternalOpening({ propertySets: [pset('Pset_DoorCommon', { IsExternal: true })] })).toBe(true);
    expect(isExternalOpening({ propertySets: [pset('Custom', { IsExternal: false })] })).toBe(false);
  });

  it('treats an opening without the flag as internal', () => {
    expect(isExternalOpening({})).toBe(false);
    expect(isExternalOpening({ propertySets: [pset('Pset_DoorCommon', { IsExternal: 'yes' })] })).toBe(false);
  });
});
