import type { Orientation } from '../geometry/types.js';
import type { PlacementFrame } from '../model/schema.js';

// ============================================================================
// Flat Extraction Records
// ============================================================================

export interface RoomRecord {
  /** Unique room code (e.g. "A203") */
  code: string;
  /** Descriptive name (e.g. "Bedroom") */
  displayName: string;
  width: number;
  depth: number;
  height: number;
}

export interface WindowRecord {
  /** Code of the room whose search volume found this window */
  roomCode: string;
  roomName: string;
  name: string;
  tag: string;
  width: number;
  height: number;
  sillHeight: number;
  wallId: string;
  wallOrientation: Orientation;
  wallLength: number;
  locationX: number;
  locationY: number;
  frame: PlacementFrame;
  /** False when the corrected locationX falls outside [0, wallLength] */
  inRange: boolean;
}

export interface DoorRecord {
  roomCode: string;
  roomName: string;
  name: string;
  tag: string;
  kind: 'glass' | 'solid';
  height: number;
  width: number;
}

export interface WallLayer {
  material: string;
  thickness: number;
}

export interface WallRecord {
  roomCode: string;
  roomName: string;
  id: string;
  name: string;
  tag: string;
  isExternal?: boolean;
  layers: WallLayer[];
}

// ============================================================================
// Assembled Model
// ============================================================================

export type Window = Omit<WindowRecord, 'roomCode' | 'roomName'>;

export interface Room extends RoomRecord {
  windows: Window[];
}
