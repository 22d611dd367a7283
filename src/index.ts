// ============================================================================
// roomgeo - Room geometry reconciliation for daylight analysis
// ============================================================================

// Model snapshot
export * from './model/index.js';

// Configuration
export {
  resolveConfig,
  parseConfig,
  ConfigError,
  DEFAULT_CONFIG,
  ReconcileConfigSchema,
  type ReconcileConfig,
  type ReconcileConfigInput,
  type PropertyPaths,
  type WallSelection,
} from './config/index.js';

// Geometry
export * from './geometry/index.js';

// Reconciliation (full pipeline)
export * from './reconcile/index.js';

// Exporters
export { exportJSON, type JSONExportOptions, type JSONExportResult } from './exporters/json.js';
export {
  buildReport,
  exportReport,
  writeSheet,
  renderCSV,
  ReportError,
  UNRESOLVED_ORIENTATION,
  type Cell,
  type CellStyle,
  type CellValue,
  type RawRow,
  type SheetSpec,
  type SheetGrid,
  type ReportInput,
} from './exporters/report.js';

// Simulation
export {
  buildSimulationRoom,
  glazingPoints,
  type SimulationRoom,
  type GlazingSurface,
  type SkippedWindow,
  type WallSide,
} from './simulation/glazing.js';
export {
  summarizeDaylight,
  toResultGrid,
  daylightFactor,
  DEFAULT_DAYLIGHT_OPTIONS,
  type DaylightOptions,
  type DaylightSummary,
} from './simulation/daylight.js';

// Formatting
export { formatRoomInfo, formatDaylightSummary } from './format.js';
