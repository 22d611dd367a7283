import type { Orientation, Vec3 } from './types.js';
import { dot, vectorLength } from './utils.js';

/**
 * Reference directions of the three non-front walls. The front wall keeps the
 * model's default placement axis, so its direction is absent (the zero vector).
 * Front is assumed to face north.
 */
export const CANONICAL_DIRECTIONS: ReadonlyArray<{ orientation: Exclude<Orientation, 'front' | 'unknown'>; direction: Vec3 }> = [
  { orientation: 'right', direction: [0, -1, 0] },
  { orientation: 'left', direction: [0, 1, 0] },
  { orientation: 'back', direction: [-1, 0, 0] },
];

const ZERO_EPSILON = 1e-9;

/**
 * Map a wall's local reference direction to a cardinal label.
 *
 * A direction matches an axis when the angle between them is within
 * `toleranceDeg`, whatever its length. With a tolerance of 0 the vector must
 * equal the unit axis component for component. Anything else, including
 * the +x axis, is 'unknown'.
 */
export function classifyWallOrientation(direction: Vec3 | undefined, toleranceDeg = 1): Orientation {
  const v: Vec3 = direction ?? [0, 0, 0];
  const length = vectorLength(v);

  if (length < ZERO_EPSILON) {
    return 'front';
  }

  if (toleranceDeg === 0) {
    const exact = CANONICAL_DIRECTIONS.find(({ direction: axis }) => axis.every((c, i) => c === v[i]));
    return exact ? exact.orientation : 'unknown';
  }

  const minCosine = Math.cos((toleranceDeg * Math.PI) / 180);

  for (const { orientation, direction: axis } of CANONICAL_DIRECTIONS) {
    const cosine = dot(v, axis) / length;
    if (cosine >= minCosine) {
      return orientation;
    }
  }

  return 'unknown';
}
