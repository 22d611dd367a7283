import type { Profile } from '../model/schema.js';
import type { BoundingBox, Point2D, ProfileBounds } from './types.js';
import { round3 } from './utils.js';

/**
 * Axis-aligned bounding box of a point set. Returns undefined for an empty set.
 */
export function computeBoundingBox(points: Point2D[]): BoundingBox | undefined {
  if (points.length === 0) {
    return undefined;
  }

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  return { minX, minY, maxX, maxY };
}

/**
 * Plan width (x) and depth (y) of a room profile.
 *
 * Rectangles report their own dimensions. Arbitrary polygons are measured by
 * their bounding box, so an L-shaped room is analyzed as the rectangle that
 * encloses it. A polygon with at most one vertex has no extent and comes back
 * as 0 x 0 with `degenerate` set.
 */
export function resolveProfileBounds(profile: Profile): ProfileBounds {
  if (profile.kind === 'rectangle') {
    return {
      width: round3(profile.xDim),
      depth: round3(profile.yDim),
      degenerate: false,
    };
  }

  const points = profile.points.map(([x, y]) => ({ x, y }));
  const box = computeBoundingBox(points);

  if (!box || points.length <= 1) {
    return { width: 0, depth: 0, degenerate: true };
  }

  return {
    width: round3(box.maxX - box.minX),
    depth: round3(box.maxY - box.minY),
    degenerate: false,
  };
}
