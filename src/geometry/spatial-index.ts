import type { Box3 } from './types.js';
import { boxesIntersect, expandBox } from './utils.js';

export type ElementKind = 'space' | 'wall' | 'window' | 'door';

export interface IndexedElement {
  id: string;
  kind: ElementKind;
  bounds: Box3;
}

/**
 * Query structure over building elements.
 * Results come back in a stable traversal order.
 */
export interface SpatialIndex<T extends IndexedElement = IndexedElement> {
  /** Elements whose bounds intersect `box` grown by `margin` on every side */
  selectBox(box: Box3, margin?: number): T[];
  get(id: string): T | undefined;
  readonly size: number;
}

/**
 * In-memory index that tests every element against the query volume.
 * Traversal order is insertion order.
 */
export class BoxSpatialIndex<T extends IndexedElement = IndexedElement> implements SpatialIndex<T> {
  private readonly elements: T[] = [];
  private readonly byId = new Map<string, T>();

  constructor(elements: Iterable<T> = []) {
    for (const element of elements) {
      this.add(element);
    }
  }

  add(element: T): void {
    if (this.byId.has(element.id)) {
      throw new Error(`Element "${element.id}" is already indexed`);
    }
    this.elements.push(element);
    this.byId.set(element.id, element);
  }

  get(id: string): T | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.elements.length;
  }

  selectBox(box: Box3, margin = 0): T[] {
    const query = margin > 0 ? expandBox(box, margin) : box;
    return this.elements.filter((element) => boxesIntersect(element.bounds, query));
  }
}
