import { describe, it, expect } from 'vitest';
import { assembleRooms } from '../../src/reconcile/assemble.js';
import type { RoomRecord, WindowRecord } from '../../src/reconcile/types.js';

function windowRecord(roomCode: string, tag: string, overrides: Partial<WindowRecord> = {}): WindowRecord {
  return {
    roomCode,
    roomName: 'Room',
    name: `Window ${tag}`,
    tag,
    width: 1,
    height: 1.2,
    sillHeight: 0.9,
    wallId: 'wall-1',
    wallOrientation: 'front',
    wallLength: 3,
    locationX: 1,
    locationY: 0.9,
    frame: 'as-given',
    inRange: true,
    ...overrides,
  };
}

const bedroom: RoomRecord = { code: 'A203', displayName: 'Bedroom', width: 3.0, depth: 4.0, height: 2.5 };
const kitchen: RoomRecord = { code: 'A101', displayName: 'Kitchen', width: 4.0, depth: 3.5, height: 2.5 };

describe('assembleRooms', () => {
  it('nests matching windows and reports the unmatched one', () => {
    const { rooms, unmatched } = assembleRooms([bedroom], [windowRecord('A203', 'W1'), windowRecord('B101', 'W2')]);

    expect(rooms).toHaveLength(1);
    expect(rooms[0].code).toBe('A203');
    expect(rooms[0].windows.map((w) => w.tag)).toEqual(['W1']);
    expect(unmatched.map((w) => w.tag)).toEqual(['W2']);
  });

  it('keeps window input order within each room', () => {
    const windows = [
      windowRecord('A203', 'W3', { locationX: 2.5 }),
      windowRecord('A101', 'K1'),
      windowRecord('A203', 'W1', { locationX: 0.2 }),
      windowRecord('A203', 'W2', { locationX: 1.1 }),
    ];
    const { rooms } = assembleRooms([bedroom, kitchen], windows);

    expect(rooms.map((r) => r.code)).toEqual(['A203', 'A101']);
    expect(rooms[0].windows.map((w) => w.tag)).toEqual(['W3', 'W1', 'W2']);
    expect(rooms[1].windows.map((w) => w.tag)).toEqual(['K1']);
  });

  it('drops the room fields from nested windows', () => {
    const { rooms } = assembleRooms([bedroom], [windowRecord('A203', 'W1')]);
    expect(rooms[0].windows[0]).toEqual({
      name: 'Window W1',
      tag: 'W1',
      width: 1,
      height: 1.2,
      sillHeight: 0.9,
      wallId: 'wall-1',
      wallOrientation: 'front',
      wallLength: 3,
      locationX: 1,
      locationY: 0.9,
      frame: 'as-given',
      inRange: true,
    });
  });

  it('copies room records and gives rooms without windows an empty list', () => {
    const { rooms, unmatched } = assembleRooms([bedroom, kitchen], []);
    expect(rooms[1]).toEqual({ ...kitchen, windows: [] });
    expect(rooms[0]).not.toBe(bedroom);
    expect(unmatched).toEqual([]);
  });

  it('reports every window when there are no rooms', () => {
    const windows = [windowRecord('A203', 'W1'), windowRecord('A203', 'W2')];
    const { rooms, unmatched } = assembleRooms([], windows);
    expect(rooms).toEqual([]);
    expect(unmatched).toEqual(windows);
  });
});
