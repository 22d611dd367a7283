/**
 * Finding the wall an opening is set into.
 */

import type { Box3, Orientation, Vec3 } from '../geometry/types.js';
import { boxCenter, boxExtent } from '../geometry/utils.js';
import { classifyWallOrientation } from '../geometry/orientation.js';
import { findBooleanProperty, getNumericProperty } from '../model/properties.js';
import type { WallEntity } from '../model/schema.js';
import type { ReconcileConfig } from '../config/index.js';
import type { ModelIndex } from './model-index.js';

export interface WallMatch {
  wall: WallEntity;
  wallLength: number;
  orientation: Orientation;
  /** Perpendicular distance from the opening centroid to the wall centre plane */
  distance: number;
}

export interface LocateOptions {
  debug?: boolean;
}

/**
 * Distance from a point to the centre plane of an axis-aligned wall.
 * The wall runs along its longer plan extent; its plane sits halfway
 * through the thickness.
 */
export function wallPlaneDistance(wallBounds: Box3, point: Vec3): number {
  const [ex, ey] = boxExtent(wallBounds);
  const [cx, cy] = boxCenter(wallBounds);
  return ex <= ey ? Math.abs(point[0] - cx) : Math.abs(point[1] - cy);
}

/**
 * Wall length from its property set, falling back to the longer plan
 * extent of its bounding volume.
 */
export function resolveWallLength(wall: WallEntity, lengthPath: string): number {
  const declared = getNumericProperty(wall, lengthPath);
  if (declared !== undefined) {
    return declared;
  }
  const [ex, ey] = boxExtent(wall.bounds);
  return Math.max(ex, ey);
}

/**
 * Locate the supporting wall of an opening.
 *
 * Walls are searched for inside the opening's bounding volume grown by
 * `wallSearchMargin`. With 'nearest-plane' selection the wall whose centre
 * plane is closest to the opening centroid wins (ties go to the first one
 * returned), and walls farther than `wallPlaneTolerance` are not accepted.
 * With 'last-candidate' the last wall returned by the query wins.
 *
 * Returns undefined when no wall qualifies.
 */
export function locateSupportingWall(
  opening: { id: string; bounds: Box3 },
  index: ModelIndex,
  config: ReconcileConfig,
  options: LocateOptions = {}
): WallMatch | undefined {
  const centroid = boxCenter(opening.bounds);
  const candidates: WallEntity[] = [];
  for (const entry of index.selectBox(opening.bounds, config.wallSearchMargin)) {
    if (entry.kind === 'wall') {
      candidates.push(entry.entity);
    }
  }

  if (options.debug) {
    console.log(`Opening ${opening.id}: ${candidates.length} wall candidate(s) [${candidates.map((w) => w.id).join(', ')}]`);
  }

  let chosen: WallEntity | undefined;
  let chosenDistance = Infinity;

  if (config.wallSelection === 'last-candidate') {
    chosen = candidates[candidates.length - 1];
    chosenDistance = chosen ? wallPlaneDistance(chosen.bounds, centroid) : Infinity;
  } else {
    for (const wall of candidates) {
      const d = wallPlaneDistance(wall.bounds, centroid);
      if (d <= config.wallPlaneTolerance && d < chosenDistance) {
        chosen = wall;
        chosenDistance = d;
      }
    }
  }

  if (!chosen) {
    return undefined;
  }

  if (options.debug) {
    console.log(`  -> ${chosen.id} (distance ${chosenDistance.toFixed(3)})`);
  }

  return {
    wall: chosen,
    wallLength: resolveWallLength(chosen, config.properties.wallLength),
    orientation: classifyWallOrientation(chosen.refDirection, config.orientationToleranceDeg),
    distance: chosenDistance,
  };
}

/**
 * Whether an opening is flagged external. The flag may sit in any property
 * set; an opening without one is treated as internal.
 */
export function isExternalOpening(opening: { propertySets?: WallEntity['propertySets'] }): boolean {
  return findBooleanProperty(opening, 'IsExternal') ?? false;
}
