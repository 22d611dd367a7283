/**
 * Post-processing of grid-based illuminance results.
 */

export interface DaylightOptions {
  /** Illuminance of the overcast sky the simulation ran under (lux) */
  skyIlluminance?: number;
  /** Daylight factor (%) a point needs to count as daylit */
  targetDaylightFactor?: number;
  /** Share of daylit points (%) a room needs to pass */
  passAreaPercent?: number;
}

export interface DaylightSummary {
  points: number;
  daylitPoints: number;
  /** Share of points at or above the target daylight factor (%) */
  areaPercent: number;
  /** Lux level matching the target daylight factor */
  thresholdLux: number;
  passes: boolean;
}

export const DEFAULT_DAYLIGHT_OPTIONS: Required<DaylightOptions> = {
  skyIlluminance: 10000,
  targetDaylightFactor: 2.1,
  passAreaPercent: 50,
};

export function daylightFactor(lux: number, skyIlluminance = DEFAULT_DAYLIGHT_OPTIONS.skyIlluminance): number {
  return (lux / skyIlluminance) * 100;
}

export function summarizeDaylight(illuminances: number[], options: DaylightOptions = {}): DaylightSummary {
  const skyIlluminance = options.skyIlluminance ?? DEFAULT_DAYLIGHT_OPTIONS.skyIlluminance;
  const targetDaylightFactor = options.targetDaylightFactor ?? DEFAULT_DAYLIGHT_OPTIONS.targetDaylightFactor;
  const passAreaPercent = options.passAreaPercent ?? DEFAULT_DAYLIGHT_OPTIONS.passAreaPercent;

  if (illuminances.length === 0) {
    throw new Error('No analysis points to summarize');
  }

  const daylitPoints = illuminances.filter((lux) => daylightFactor(lux, skyIlluminance) >= targetDaylightFactor).length;
  const areaPercent = (daylitPoints / illuminances.length) * 100;

  return {
    points: illuminances.length,
    daylitPoints,
    areaPercent,
    thresholdLux: (targetDaylightFactor / 100) * skyIlluminance,
    passes: areaPercent >= passAreaPercent,
  };
}

/**
 * Reshape a flat list of grid results into rows of floor(roomWidth / gridSize)
 * points. The last row may be short.
 */
export function toResultGrid(values: number[], roomWidth: number, gridSize: number): number[][] {
  const perRow = Math.floor(roomWidth / gridSize);
  if (perRow < 1) {
    throw new Error(`Grid size ${gridSize} does not fit room width ${roomWidth}`);
  }
  const rows: number[][] = [];
  for (let i = 0; i < values.length; i += perRow) {
    rows.push(values.slice(i, i + perRow));
  }
  return rows;
}
