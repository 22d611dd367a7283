import { describe, it, expect } from 'vitest';
import { formatDaylightSummary, formatRoomInfo } from '../src/format.js';
import type { Room } from '../src/reconcile/types.js';

describe('formatRoomInfo', () => {
  const base: Room = { code: 'A203', displayName: 'Bedroom', width: 3, depth: 4, height: 2.5, windows: [] };

  it('describes a room without windows', () => {
    expect(formatRoomInfo(base)).toBe(
      'Room A203 (Bedroom) | Width: 3.00 | Depth: 4.00 | Height: 2.5\n  No windows'
    );
  });

  it('describes each window and its wall', () => {
    const room: Room = {
      ...base,
      windows: [
        {
          name: 'Window W1',
          tag: 'W1',
          width: 1.25,
          height: 1.5,
          sillHeight: 0.75,
          wallId: 'WS',
          wallOrientation: 'unknown',
          wallLength: 3.5,
          locationX: -0.5,
          locationY: 0.75,
          frame: 'mirrored-along-wall-axis',
          inRange: false,
        },
      ],
    };

    expect(formatRoomInfo(room).split('\n')).toEqual([
      'Room A203 (Bedroom) | Width: 3.00 | Depth: 4.00 | Height: 2.5',
      '  Window W1 | Width: 1.25 | Height: 1.50 | Sill height: 0.75',
      '    Wall: unresolved (length 3.50) | Location: x -0.50, y 0.75 [out of range]',
    ]);
  });
});

describe('formatDaylightSummary', () => {
  it('reports the share of daylit points and the verdict', () => {
    const text = formatDaylightSummary(
      'A203',
      { points: 4, daylitPoints: 2, areaPercent: 50, thresholdLux: 210.00000000000003, passes: true },
      2.1
    );
    expect(text).toBe(
      'Daylight results for A203:\n' +
        '  50.00% of the room has at least 210 lux (2/4 points)\n' +
        '  This room passes the 2.1% daylight factor requirement.'
    );
  });

  it('reports a failing room', () => {
    const text = formatDaylightSummary(
      'A203',
      { points: 4, daylitPoints: 1, areaPercent: 25, thresholdLux: 200, passes: false },
      2
    );
    expect(text.split('\n')[2]).toBe('  This room does not reach a 2% daylight factor in enough of its area.');
  });
});
