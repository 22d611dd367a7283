import { resolveConfig, type ReconcileConfig, type ReconcileConfigInput } from '../config/index.js';
import type { ModelSnapshot } from '../model/schema.js';
import { assembleRooms } from './assemble.js';
import { countByCode, DiagnosticCodes, type Diagnostic, type DiagnosticCode } from './diagnostics.js';
import { extractRecords } from './extract.js';
import type { ModelIndex } from './model-index.js';
import type { DoorRecord, Room, WallRecord, WindowRecord } from './types.js';

export * from './types.js';
export * from './diagnostics.js';
export { assembleRooms, type AssemblyResult } from './assemble.js';
export { extractRecords, isExcludedRoom, type ExtractionResult, type ExtractOptions } from './extract.js';
export { buildModelIndex, type ModelIndex, type ModelIndexEntry } from './model-index.js';
export { assignWindowOwners, type WindowOwnership, type OwnershipOptions } from './ownership.js';
export {
  locateSupportingWall,
  isExternalOpening,
  resolveWallLength,
  wallPlaneDistance,
  type WallMatch,
} from './locator.js';
export {
  correctPlacement,
  resolveCoordinateFrame,
  type CoordinateFrame,
  type CorrectedPlacement,
  type PlacementInput,
} from './placement.js';

// ============================================================================
// Reconcile Options & Result
// ============================================================================

export interface ReconcileOptions {
  /** Settings; partial settings are completed with defaults */
  config?: ReconcileConfig | ReconcileConfigInput;
  /** Prebuilt spatial index over the snapshot */
  index?: ModelIndex;
  /** Trace decisions to the console */
  debug?: boolean;
}

export interface ReconcileSummary {
  rooms: number;
  windows: number;
  doors: number;
  walls: number;
  unmatchedWindows: number;
  warnings: Partial<Record<DiagnosticCode, number>>;
}

export interface ReconcileResult {
  rooms: Room[];
  doors: DoorRecord[];
  walls: WallRecord[];
  unmatchedWindows: WindowRecord[];
  diagnostics: Diagnostic[];
  summary: ReconcileSummary;
  config: ReconcileConfig;
}

// ============================================================================
// Reconciler
// ============================================================================

/**
 * Run extraction and assembly over a whole snapshot.
 *
 * Recoverable anomalies never stop the run; they are collected in
 * `diagnostics`. An invalid configuration throws ConfigError.
 */
export function reconcile(snapshot: ModelSnapshot, options: ReconcileOptions = {}): ReconcileResult {
  const config = resolveConfig(options.config ?? {});
  const extraction = extractRecords(snapshot, config, { index: options.index, debug: options.debug });
  const { rooms, unmatched } = assembleRooms(extraction.rooms, extraction.windows);

  const diagnostics = [...extraction.diagnostics];
  for (const window of unmatched) {
    diagnostics.push({
      code: DiagnosticCodes.UNMATCHED_WINDOW,
      message: `room "${window.roomCode}" is not in the analyzed room set; window dropped`,
      room: window.roomCode,
      element: window.tag,
    });
  }

  if (options.debug) {
    console.log(`Assembled ${rooms.length} room(s); ${unmatched.length} unmatched window(s)`);
  }

  return {
    rooms,
    doors: extraction.doors,
    walls: extraction.walls,
    unmatchedWindows: unmatched,
    diagnostics,
    summary: {
      rooms: rooms.length,
      windows: rooms.reduce((n, r) => n + r.windows.length, 0),
      doors: extraction.doors.length,
      walls: extraction.walls.length,
      unmatchedWindows: unmatched.length,
      warnings: countByCode(diagnostics),
    },
    config,
  };
}
