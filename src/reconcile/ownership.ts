/**
 * Assigning each window to the one room it belongs to.
 */

import type { Box3 } from '../geometry/types.js';
import { boxCenter } from '../geometry/utils.js';
import type { ModelSnapshot, SpaceEntity, WindowEntity } from '../model/schema.js';
import type { ReconcileConfig } from '../config/index.js';
import { DiagnosticCodes, type Diagnostic } from './diagnostics.js';
import type { WallMatch } from './locator.js';
import type { ModelIndex } from './model-index.js';

export interface WindowOwnership {
  /** Window id to the id of the space that owns it */
  owners: Map<string, string>;
  diagnostics: Diagnostic[];
}

export interface OwnershipOptions {
  /** Supporting wall of a window, used to break ties between rooms */
  supportingWall: (window: WindowEntity) => WallMatch | undefined;
  isExcluded: (space: SpaceEntity) => boolean;
}

function planContains(bounds: Box3, x: number, y: number): boolean {
  return x >= bounds.min[0] && x <= bounds.max[0] && y >= bounds.min[1] && y <= bounds.max[1];
}

/** Keep the candidates passing `test`, unless none would be left */
function narrow(candidates: SpaceEntity[], test: (space: SpaceEntity) => boolean): SpaceEntity[] {
  const kept = candidates.filter(test);
  return kept.length > 0 ? kept : candidates;
}

/**
 * Give every window found by a room search to exactly one space.
 *
 * A window near a shared corner or on a party wall falls inside the search
 * volume of several rooms. Candidates are narrowed, in turn, to rooms whose
 * plan contains the window centroid, rooms bounded by its supporting wall,
 * and rooms that are analyzed. If more than one is left, the first in
 * snapshot order wins and W402 is reported.
 */
export function assignWindowOwners(
  snapshot: ModelSnapshot,
  index: ModelIndex,
  config: ReconcileConfig,
  options: OwnershipOptions
): WindowOwnership {
  const candidatesByWindow = new Map<string, { window: WindowEntity; spaces: SpaceEntity[] }>();

  for (const space of snapshot.spaces) {
    for (const entry of index.selectBox(space.bounds, config.roomSearchMargin)) {
      if (entry.kind !== 'window') continue;
      const found = candidatesByWindow.get(entry.id);
      if (found) {
        found.spaces.push(space);
      } else {
        candidatesByWindow.set(entry.id, { window: entry.entity, spaces: [space] });
      }
    }
  }

  const owners = new Map<string, string>();
  const diagnostics: Diagnostic[] = [];

  for (const [id, { window, spaces }] of candidatesByWindow) {
    let remaining = spaces;
    if (remaining.length > 1) {
      const [cx, cy] = boxCenter(window.bounds);
      remaining = narrow(remaining, (space) => planContains(space.bounds, cx, cy));
    }
    if (remaining.length > 1) {
      const wallId = options.supportingWall(window)?.wall.id;
      if (wallId !== undefined) {
        remaining = narrow(remaining, (space) => (space.boundedBy ?? []).includes(wallId));
      }
    }
    if (remaining.length > 1) {
      remaining = narrow(remaining, (space) => !options.isExcluded(space));
    }

    const [owner] = remaining;
    owners.set(id, owner.id);

    if (remaining.length > 1) {
      const codes = remaining.map((space) => space.name);
      diagnostics.push({
        code: DiagnosticCodes.AMBIGUOUS_WINDOW_OWNER,
        message: `window belongs equally to rooms ${codes.join(', ')}; assigned to ${owner.name}`,
        room: owner.name,
        element: window.tag ?? window.id,
        details: { candidates: codes },
      });
    }
  }

  return { owners, diagnostics };
}
