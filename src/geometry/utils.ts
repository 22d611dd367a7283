import type { Box3, Vec3 } from './types.js';

// ============================================================================
// Geometry Utilities
// ============================================================================

/** Round to the 3-decimal precision used for all reported dimensions */
export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function vectorLength(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function expandBox(box: Box3, margin: number): Box3 {
  return {
    min: [box.min[0] - margin, box.min[1] - margin, box.min[2] - margin],
    max: [box.max[0] + margin, box.max[1] + margin, box.max[2] + margin],
  };
}

/** Closed-interval overlap on all three axes (touching counts) */
export function boxesIntersect(a: Box3, b: Box3): boolean {
  for (let axis = 0; axis < 3; axis++) {
    if (a.max[axis] < b.min[axis] || b.max[axis] < a.min[axis]) {
      return false;
    }
  }
  return true;
}

export function boxCenter(box: Box3): Vec3 {
  return [
    (box.min[0] + box.max[0]) / 2,
    (box.min[1] + box.max[1]) / 2,
    (box.min[2] + box.max[2]) / 2,
  ];
}

export function boxExtent(box: Box3): Vec3 {
  return [box.max[0] - box.min[0], box.max[1] - box.min[1], box.max[2] - box.min[2]];
}
