/**
 * Shared test fixtures for model snapshots.
 *
 * The standard model is a 3 x 4 m bedroom (A203) with walls on all four
 * sides, and a 2 x 4 m hallway (H101) east of it:
 *
 *        y=4  +---- WN (back) ----+-----------+
 *             |                   |           |
 *        WW   |      A203         WE   H101   WHE
 *      (left) |    Bedroom     (right) Hallway (right)
 *             |                   |           |
 *        y=0  +---- WS (front) ---+-----------+
 *            x=0                 x=3         x=5
 */

import type { Box3, Vec3 } from '../../src/geometry/types.js';
import type {
  DoorEntity,
  ModelSnapshot,
  PropertySet,
  PropertyValue,
  SpaceEntity,
  WallEntity,
  WindowEntity,
} from '../../src/model/schema.js';

// ============ Helper Functions ============

export function box(min: Vec3, max: Vec3): Box3 {
  return { min, max };
}

export function pset(name: string, properties: Record<string, PropertyValue>): PropertySet {
  return { name, properties };
}

/**
 * Create a rectangular space. `height` goes into the default height property.
 */
export function createSpace(
  code: string,
  longName: string,
  bounds: Box3,
  options: Partial<SpaceEntity> & { height?: number | null } = {}
): SpaceEntity {
  const { height = 2.5, ...rest } = options;
  return {
    id: `space-${code}`,
    name: code,
    longName,
    bounds,
    profile: {
      kind: 'rectangle',
      xDim: bounds.max[0] - bounds.min[0],
      yDim: bounds.max[1] - bounds.min[1],
    },
    propertySets: height === null ? [] : [pset('PSet_Revit_Dimensions', { 'Unbounded Height': height })],
    ...rest,
  };
}

export function createWall(
  id: string,
  bounds: Box3,
  options: Partial<WallEntity> & { length?: number; isExternal?: boolean } = {}
): WallEntity {
  const { length, isExternal, ...rest } = options;
  const propertySets: PropertySet[] = [];
  if (length !== undefined) {
    propertySets.push(pset('PSet_Revit_Dimensions', { Length: length }));
  }
  if (isExternal !== undefined) {
    propertySets.push(pset('Pset_WallCommon', { IsExternal: isExternal }));
  }
  return {
    id,
    name: `Basic Wall:${id}`,
    tag: id,
    bounds,
    propertySets,
    ...rest,
  };
}

export function createWindow(
  id: string,
  bounds: Box3,
  location: Vec3,
  dims: { width?: number; height?: number; sill?: number } = {}
): WindowEntity {
  const typeDims: Record<string, PropertyValue> = {};
  if (dims.width !== undefined) typeDims.Width = dims.width;
  if (dims.height !== undefined) typeDims.Height = dims.height;
  const propertySets = [pset('PSet_Revit_Type_Dimensions', typeDims)];
  if (dims.sill !== undefined) {
    propertySets.push(pset('PSet_Revit_Constraints', { 'Sill Height': dims.sill }));
  }
  return {
    id,
    name: `Window ${id}`,
    tag: id,
    bounds,
    location,
    propertySets,
  };
}

export function createDoor(
  id: string,
  name: string,
  bounds: Box3,
  options: { width: number; height: number; isExternal?: boolean }
): DoorEntity {
  return {
    id,
    name,
    tag: id,
    bounds,
    overallWidth: options.width,
    overallHeight: options.height,
    propertySets:
      options.isExternal === undefined ? [] : [pset('Pset_DoorCommon', { IsExternal: options.isExternal })],
  };
}

// ============ Standard Model ============

export function bedroomWalls(): WallEntity[] {
  return [
    createWall('WW', box([-0.1, -0.1, 0], [0.1, 4.1, 2.5]), {
      refDirection: [0, 1, 0],
      length: 4.2,
      isExternal: true,
      materialLayers: [
        { material: 'Brick', thickness: 0.1 },
        { material: 'Insulation', thickness: 0.05 },
      ],
    }),
    createWall('WS', box([-0.1, -0.1, 0], [3.1, 0.1, 2.5]), {
      length: 3.2,
      isExternal: true,
      materialLayers: [{ material: 'Brick', thickness: 0.1 }],
    }),
    createWall('WN', box([-0.1, 3.9, 0], [3.1, 4.1, 2.5]), {
      refDirection: [-1, 0, 0],
      length: 3.2,
      isExternal: true,
    }),
    createWall('WE', box([2.9, -0.1, 0], [3.1, 4.1, 2.5]), {
      refDirection: [0, -1, 0],
      length: 4.2,
      isExternal: false,
    }),
    createWall('WHE', box([4.9, -0.1, 0], [5.1, 4.1, 2.5]), {
      refDirection: [0, -1, 0],
      length: 4.2,
      isExternal: true,
    }),
  ];
}

export function createBedroomModel(): ModelSnapshot {
  return {
    name: 'Test Duplex',
    spaces: [
      createSpace('A203', 'Bedroom', box([0, 0, 0], [3, 4, 2.5]), { boundedBy: ['WS', 'WW', 'WN', 'WE'] }),
      createSpace('H101', 'Hallway', box([3, 0, 0], [5, 4, 2.5]), { boundedBy: ['WE', 'WHE'] }),
    ],
    walls: bedroomWalls(),
    windows: [
      // South wall, well inside the room
      createWindow('W1', box([1.0, -0.1, 0.9], [2.2, 0.1, 2.1]), [1.0, 0, 0.9], { width: 1.2, height: 1.2, sill: 0.9 }),
      // West wall, close enough to the south-west corner that WS is also a candidate
      createWindow('W2', box([-0.1, 0.3, 0.9], [0.1, 1.3, 2.1]), [0.3, 0, 0.9], { width: 1.0, height: 1.2 }),
      // Hallway east wall
      createWindow('W3', box([4.9, 1, 0.9], [5.1, 2, 2.1]), [1.0, 0, 0.9], { width: 1.0, height: 1.2, sill: 0.9 }),
    ],
    doors: [
      createDoor('D1', 'Exterior Glass Door', box([1, 3.9, 0], [2, 4.1, 2.1]), {
        width: 0.9144,
        height: 2.134,
        isExternal: true,
      }),
      createDoor('D2', 'Interior Door', box([2.9, 2, 0], [3.1, 3, 2.1]), {
        width: 0.8,
        height: 2.0,
        isExternal: false,
      }),
    ],
  };
}

export function findWall(model: ModelSnapshot, id: string): WallEntity {
  const wall = model.walls.find((w) => w.id === id);
  if (!wall) throw new Error(`No wall ${id} in fixture`);
  return wall;
}
