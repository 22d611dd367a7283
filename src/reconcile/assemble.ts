import type { Room, RoomRecord, Window, WindowRecord } from './types.js';

export interface AssemblyResult {
  rooms: Room[];
  /** Window records whose room code matched no room, in input order */
  unmatched: WindowRecord[];
}

function toWindow(record: WindowRecord): Window {
  const { roomCode: _roomCode, roomName: _roomName, ...window } = record;
  return window;
}

/**
 * Nest window records under the room with the same code.
 *
 * Each room's windows keep the order of the input window list. Rooms come
 * back in input order, each with its own windows array.
 */
export function assembleRooms(rooms: RoomRecord[], windows: WindowRecord[]): AssemblyResult {
  const byRoom = new Map<string, WindowRecord[]>();
  for (const record of windows) {
    const group = byRoom.get(record.roomCode);
    if (group) {
      group.push(record);
    } else {
      byRoom.set(record.roomCode, [record]);
    }
  }

  const known = new Set(rooms.map((r) => r.code));
  const unmatched = windows.filter((w) => !known.has(w.roomCode));

  return {
    rooms: rooms.map((room) => ({
      ...room,
      windows: (byRoom.get(room.code) ?? []).map(toWindow),
    })),
    unmatched,
  };
}
