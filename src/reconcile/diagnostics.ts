// ============================================================================
// Diagnostics
// ============================================================================

/**
 * A recoverable anomaly found during a run. The run carries on; every
 * diagnostic is returned alongside the result.
 */
export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  room?: string;
  element?: string;
  details?: Record<string, unknown>;
}

export const DiagnosticCodes = {
  DEGENERATE_PROFILE: 'W101',
  MISSING_ROOM_HEIGHT: 'W102',
  MISSING_WINDOW_DIMENSION: 'W103',
  ORIENTATION_UNRESOLVED: 'W201',
  NO_SUPPORTING_WALL: 'W202',
  UNKNOWN_BOUNDING_WALL: 'W203',
  PLACEMENT_OUT_OF_RANGE: 'W301',
  UNMATCHED_WINDOW: 'W401',
  AMBIGUOUS_WINDOW_OWNER: 'W402',
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

export function countByCode(diagnostics: Diagnostic[]): Partial<Record<DiagnosticCode, number>> {
  const counts: Partial<Record<DiagnosticCode, number>> = {};
  for (const d of diagnostics) {
    counts[d.code] = (counts[d.code] ?? 0) + 1;
  }
  return counts;
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = [d.room, d.element].filter((part): part is string => Boolean(part)).join('/');
  return where ? `warning[${d.code}]: ${where}: ${d.message}` : `warning[${d.code}]: ${d.message}`;
}
