export * from './types.js';
export * from './utils.js';
export { resolveProfileBounds, computeBoundingBox } from './bounds.js';
export { classifyWallOrientation, CANONICAL_DIRECTIONS } from './orientation.js';
export { BoxSpatialIndex, type SpatialIndex, type IndexedElement, type ElementKind } from './spatial-index.js';
