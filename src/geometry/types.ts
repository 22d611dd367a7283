// ============================================================================
// Geometry Types
// ============================================================================

export interface Point2D {
  x: number;
  y: number;
}

export type Vec3 = [number, number, number];

/** Axis-aligned plan rectangle */
export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** Axis-aligned bounding volume */
export interface Box3 {
  min: Vec3;
  max: Vec3;
}

export type Orientation = 'front' | 'back' | 'left' | 'right' | 'unknown';

/** Plan dimensions of a room */
export interface ProfileBounds {
  width: number;
  depth: number;
  /** True when the profile had too few vertices to span an area */
  degenerate: boolean;
}
