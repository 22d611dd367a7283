import { BoxSpatialIndex, type SpatialIndex } from '../geometry/spatial-index.js';
import type { DoorEntity, ModelSnapshot, SpaceEntity, WallEntity, WindowEntity } from '../model/schema.js';

export type ModelIndexEntry =
  | { id: string; kind: 'space'; bounds: SpaceEntity['bounds']; entity: SpaceEntity }
  | { id: string; kind: 'wall'; bounds: WallEntity['bounds']; entity: WallEntity }
  | { id: string; kind: 'window'; bounds: WindowEntity['bounds']; entity: WindowEntity }
  | { id: string; kind: 'door'; bounds: DoorEntity['bounds']; entity: DoorEntity };

export type ModelIndex = SpatialIndex<ModelIndexEntry>;

/**
 * Index every element of a snapshot. Walls go in first, then windows, doors
 * and spaces, each in snapshot order; queries return that order.
 */
export function buildModelIndex(snapshot: ModelSnapshot): BoxSpatialIndex<ModelIndexEntry> {
  const index = new BoxSpatialIndex<ModelIndexEntry>();

  for (const entity of snapshot.walls) {
    index.add({ id: entity.id, kind: 'wall', bounds: entity.bounds, entity });
  }
  for (const entity of snapshot.windows) {
    index.add({ id: entity.id, kind: 'window', bounds: entity.bounds, entity });
  }
  for (const entity of snapshot.doors ?? []) {
    index.add({ id: entity.id, kind: 'door', bounds: entity.bounds, entity });
  }
  for (const entity of snapshot.spaces) {
    index.add({ id: entity.id, kind: 'space', bounds: entity.bounds, entity });
  }

  return index;
}
