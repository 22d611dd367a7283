/**
 * Simulation geometry for a room and its windows.
 */

import type { Orientation, Vec3 } from '../geometry/types.js';
import type { Room, Window } from '../reconcile/types.js';

export type WallSide = Exclude<Orientation, 'unknown'>;

export interface GlazingSurface {
  /** Window tag */
  name: string;
  wall: WallSide;
  /**
   * Corners in the wall-local frame, counter-clockwise from bottom-left.
   * y is the wall's depth axis and is always 0.
   */
  points: [Vec3, Vec3, Vec3, Vec3];
}

export interface SkippedWindow {
  tag: string;
  reason: 'orientation-unresolved' | 'placement-out-of-range';
}

export interface SimulationRoom {
  code: string;
  name: string;
  origin: Vec3;
  width: number;
  depth: number;
  height: number;
  /** Glazing grouped by the wall it is set into */
  walls: Record<WallSide, GlazingSurface[]>;
  skipped: SkippedWindow[];
}

export function glazingPoints(window: Pick<Window, 'locationX' | 'locationY' | 'width' | 'height'>): GlazingSurface['points'] {
  const { locationX: x, locationY: y, width: w, height: h } = window;
  return [
    [x, 0, y],
    [x + w, 0, y],
    [x + w, 0, y + h],
    [x, 0, y + h],
  ];
}

/**
 * Describe a room as an axis-aligned box at the origin, no rotation, with
 * its windows as glazing on the matching walls. Windows whose wall could
 * not be resolved, or whose placement is off the wall, are listed in
 * `skipped` instead.
 */
export function buildSimulationRoom(room: Room): SimulationRoom {
  const walls: Record<WallSide, GlazingSurface[]> = { front: [], back: [], left: [], right: [] };
  const skipped: SkippedWindow[] = [];

  for (const window of room.windows) {
    if (window.wallOrientation === 'unknown') {
      skipped.push({ tag: window.tag, reason: 'orientation-unresolved' });
      continue;
    }
    if (!window.inRange) {
      skipped.push({ tag: window.tag, reason: 'placement-out-of-range' });
      continue;
    }
    walls[window.wallOrientation].push({
      name: window.tag,
      wall: window.wallOrientation,
      points: glazingPoints(window),
    });
  }

  return {
    code: room.code,
    name: room.displayName,
    origin: [0, 0, 0],
    width: room.width,
    depth: room.depth,
    height: room.height,
    walls,
    skipped,
  };
}
