/**
 * Extraction of flat room, window, door and wall records from a model snapshot.
 */

import { resolveProfileBounds } from '../geometry/bounds.js';
import { round3 } from '../geometry/utils.js';
import type { ProfileBounds } from '../geometry/types.js';
import { findBooleanProperty, getNumericProperty } from '../model/properties.js';
import type { DoorEntity, ModelSnapshot, SpaceEntity, WindowEntity } from '../model/schema.js';
import type { ReconcileConfig } from '../config/index.js';
import { DiagnosticCodes, type Diagnostic } from './diagnostics.js';
import { buildModelIndex, type ModelIndex } from './model-index.js';
import { isExternalOpening, locateSupportingWall, type WallMatch } from './locator.js';
import { assignWindowOwners } from './ownership.js';
import { correctPlacement } from './placement.js';
import type { DoorRecord, RoomRecord, WallRecord, WindowRecord } from './types.js';

export interface ExtractOptions {
  /** Prebuilt index over the snapshot's elements */
  index?: ModelIndex;
  debug?: boolean;
}

export interface ExtractionResult {
  rooms: RoomRecord[];
  windows: WindowRecord[];
  doors: DoorRecord[];
  walls: WallRecord[];
  diagnostics: Diagnostic[];
}

interface SpaceContext {
  space: SpaceEntity;
  bounds: ProfileBounds;
  config: ReconcileConfig;
  index: ModelIndex;
  diagnostics: Diagnostic[];
  debug: boolean;
  supportingWall: (window: WindowEntity) => WallMatch | undefined;
}

export function isExcludedRoom(space: SpaceEntity, config: ReconcileConfig): boolean {
  return config.excludedRoomNames.includes(space.longName);
}

// ============================================================================
// Rooms
// ============================================================================

function extractRoom(ctx: SpaceContext): RoomRecord | undefined {
  const { space, bounds, config, diagnostics } = ctx;

  if (bounds.degenerate) {
    diagnostics.push({
      code: DiagnosticCodes.DEGENERATE_PROFILE,
      message: 'profile has fewer than two vertices; room is sized 0 x 0',
      room: space.name,
    });
  }

  const height = getNumericProperty(space, config.properties.roomHeight);
  if (height === undefined) {
    diagnostics.push({
      code: DiagnosticCodes.MISSING_ROOM_HEIGHT,
      message: `no "${config.properties.roomHeight}" property; room skipped`,
      room: space.name,
    });
    return undefined;
  }

  return {
    code: space.name,
    displayName: space.longName,
    width: bounds.width,
    depth: bounds.depth,
    height: round3(height),
  };
}

// ============================================================================
// Windows
// ============================================================================

function extractWindow(ctx: SpaceContext, window: WindowEntity): WindowRecord | undefined {
  const { space, bounds, config, diagnostics } = ctx;
  const tag = window.tag ?? window.id;

  const width = getNumericProperty(window, config.properties.windowWidth);
  const height = getNumericProperty(window, config.properties.windowHeight);
  if (width === undefined || height === undefined) {
    const missing = width === undefined ? config.properties.windowWidth : config.properties.windowHeight;
    diagnostics.push({
      code: DiagnosticCodes.MISSING_WINDOW_DIMENSION,
      message: `no "${missing}" property; window skipped`,
      room: space.name,
      element: tag,
    });
    return undefined;
  }

  const match = ctx.supportingWall(window);
  if (!match) {
    diagnostics.push({
      code: DiagnosticCodes.NO_SUPPORTING_WALL,
      message: 'no wall found around the window; window omitted',
      room: space.name,
      element: tag,
    });
    return undefined;
  }

  if (match.orientation === 'unknown') {
    diagnostics.push({
      code: DiagnosticCodes.ORIENTATION_UNRESOLVED,
      message: `wall ${match.wall.id} direction matches no cardinal axis; window cannot be placed in simulation`,
      room: space.name,
      element: tag,
      details: { refDirection: match.wall.refDirection },
    });
  }

  const sill = getNumericProperty(window, config.properties.sillHeight);
  const roundedWidth = round3(width);
  const placement = correctPlacement({
    rawX: window.location[0],
    rawY: window.location[2],
    wallLength: match.wallLength,
    width: roundedWidth,
    roomWidth: bounds.width,
    roomDepth: bounds.depth,
    frameHint: match.wall.placementFrame,
  });

  if (!placement.inRange) {
    diagnostics.push({
      code: DiagnosticCodes.PLACEMENT_OUT_OF_RANGE,
      message: `corrected location ${placement.locationX} lies outside wall ${match.wall.id} (length ${match.wallLength})`,
      room: space.name,
      element: tag,
      details: { rawX: window.location[0], frame: placement.frame, frameSource: placement.source },
    });
  }

  return {
    roomCode: space.name,
    roomName: space.longName,
    name: window.name,
    tag,
    width: roundedWidth,
    height: round3(height),
    sillHeight: sill === undefined ? config.defaultSillHeight : round3(sill),
    wallId: match.wall.id,
    wallOrientation: match.orientation,
    wallLength: match.wallLength,
    locationX: placement.locationX,
    locationY: placement.locationY,
    frame: placement.frame,
    inRange: placement.inRange,
  };
}

// ============================================================================
// Doors and Walls
// ============================================================================

function extractDoor(ctx: SpaceContext, door: DoorEntity): DoorRecord | undefined {
  if (!isExternalOpening(door)) {
    return undefined;
  }
  return {
    roomCode: ctx.space.name,
    roomName: ctx.space.longName,
    name: door.name,
    tag: door.tag ?? door.id,
    kind: door.name.includes('Glass') ? 'glass' : 'solid',
    height: round3(door.overallHeight),
    width: round3(door.overallWidth),
  };
}

function extractWalls(ctx: SpaceContext): WallRecord[] {
  const { space, index, diagnostics } = ctx;
  const walls: WallRecord[] = [];

  for (const id of space.boundedBy ?? []) {
    const entry = index.get(id);
    if (!entry) {
      diagnostics.push({
        code: DiagnosticCodes.UNKNOWN_BOUNDING_WALL,
        message: `bounding element "${id}" is not in the model`,
        room: space.name,
        element: id,
      });
      continue;
    }
    if (entry.kind !== 'wall') continue;

    const wall = entry.entity;
    const isExternal = findBooleanProperty(wall, 'IsExternal');
    walls.push({
      roomCode: space.name,
      roomName: space.longName,
      id: wall.id,
      name: wall.name,
      tag: wall.tag ?? wall.id,
      ...(isExternal !== undefined ? { isExternal } : {}),
      // Roof-named walls carry no layer breakdown
      layers: wall.name.includes('Roof') ? [] : (wall.materialLayers ?? []).map((l) => ({ ...l })),
    });
  }

  return walls;
}

// ============================================================================
// Main Extraction
// ============================================================================

/**
 * Produce flat per-entity records for every space in the snapshot.
 *
 * Every window goes to exactly one space (see assignWindowOwners). Rooms
 * named in `excludedRoomNames` get no room, door or wall records, but the
 * windows they own are still extracted so that assembly reports them as
 * unmatched rather than losing them.
 */
export function extractRecords(
  snapshot: ModelSnapshot,
  config: ReconcileConfig,
  options: ExtractOptions = {}
): ExtractionResult {
  const index = options.index ?? buildModelIndex(snapshot);
  const debug = options.debug ?? false;
  const result: ExtractionResult = { rooms: [], windows: [], doors: [], walls: [], diagnostics: [] };

  const wallMatches = new Map<string, WallMatch | undefined>();
  const supportingWall = (window: WindowEntity): WallMatch | undefined => {
    if (!wallMatches.has(window.id)) {
      wallMatches.set(window.id, locateSupportingWall(window, index, config, { debug }));
    }
    return wallMatches.get(window.id);
  };

  const ownership = assignWindowOwners(snapshot, index, config, {
    supportingWall,
    isExcluded: (space) => isExcludedRoom(space, config),
  });
  result.diagnostics.push(...ownership.diagnostics);

  for (const space of snapshot.spaces) {
    const ctx: SpaceContext = {
      space,
      bounds: resolveProfileBounds(space.profile),
      config,
      index,
      diagnostics: result.diagnostics,
      debug,
      supportingWall,
    };
    const excluded = isExcludedRoom(space, config);

    if (debug) {
      console.log(
        `Space ${space.name} (${space.longName}): ${ctx.bounds.width} x ${ctx.bounds.depth}${excluded ? ' [excluded]' : ''}`
      );
    }

    if (!excluded) {
      const room = extractRoom(ctx);
      if (room) result.rooms.push(room);
    }

    for (const entry of index.selectBox(space.bounds, config.roomSearchMargin)) {
      if (entry.kind === 'window') {
        if (ownership.owners.get(entry.id) !== space.id) continue;
        const window = extractWindow(ctx, entry.entity);
        if (window) result.windows.push(window);
      } else if (entry.kind === 'door' && !excluded) {
        const door = extractDoor(ctx, entry.entity);
        if (door) result.doors.push(door);
      }
    }

    if (!excluded) {
      result.walls.push(...extractWalls(ctx));
    }
  }

  return result;
}
