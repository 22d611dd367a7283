import type { Room } from './reconcile/types.js';
import type { DaylightSummary } from './simulation/daylight.js';

/**
 * Human-readable description of a room and its windows.
 */
export function formatRoomInfo(room: Room): string {
  const lines: string[] = [];
  lines.push(
    `Room ${room.code} (${room.displayName}) | Width: ${room.width.toFixed(2)} | Depth: ${room.depth.toFixed(2)} | Height: ${room.height.toFixed(1)}`
  );

  if (room.windows.length === 0) {
    lines.push('  No windows');
  }

  for (const w of room.windows) {
    const orientation = w.wallOrientation === 'unknown' ? 'unresolved' : w.wallOrientation;
    lines.push(
      `  Window ${w.tag} | Width: ${w.width.toFixed(2)} | Height: ${w.height.toFixed(2)} | Sill height: ${w.sillHeight.toFixed(2)}`
    );
    lines.push(
      `    Wall: ${orientation} (length ${w.wallLength.toFixed(2)}) | Location: x ${w.locationX.toFixed(2)}, y ${w.locationY.toFixed(2)}${w.inRange ? '' : ' [out of range]'}`
    );
  }

  return lines.join('\n');
}

export function formatDaylightSummary(code: string, summary: DaylightSummary, targetDaylightFactor: number): string {
  const verdict = summary.passes
    ? `passes the ${targetDaylightFactor}% daylight factor requirement`
    : `does not reach a ${targetDaylightFactor}% daylight factor in enough of its area`;
  return [
    `Daylight results for ${code}:`,
    `  ${summary.areaPercent.toFixed(2)}% of the room has at least ${Math.round(summary.thresholdLux)} lux (${summary.daylitPoints}/${summary.points} points)`,
    `  This room ${verdict}.`,
  ].join('\n');
}
