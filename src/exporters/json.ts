import type { Diagnostic } from '../reconcile/diagnostics.js';
import type { DoorRecord, Room, WallRecord, WindowRecord } from '../reconcile/types.js';
import type { ReconcileResult } from '../reconcile/index.js';

// ============================================================================
// JSON Export Options
// ============================================================================

export interface JSONExportOptions {
  pretty?: boolean;
  includeDiagnostics?: boolean;
  includeWalls?: boolean;
}

// ============================================================================
// JSON Export Result
// ============================================================================

export interface JSONExportResult {
  version: string;
  rooms: Room[];
  doors: DoorRecord[];
  walls?: WallRecord[];
  unmatchedWindows: WindowRecord[];
  diagnostics?: Diagnostic[];
}

// ============================================================================
// Main Export Function
// ============================================================================

export function exportJSON(result: ReconcileResult, options: JSONExportOptions = {}): string {
  const out: JSONExportResult = {
    version: '1.0.0',
    rooms: result.rooms,
    doors: result.doors,
    unmatchedWindows: result.unmatchedWindows,
  };

  if (options.includeWalls) {
    out.walls = result.walls;
  }

  if (options.includeDiagnostics) {
    out.diagnostics = result.diagnostics;
  }

  if (options.pretty) {
    return JSON.stringify(out, null, 2);
  }

  return JSON.stringify(out);
}
