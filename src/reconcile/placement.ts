import type { PlacementFrame } from '../model/schema.js';

export type CoordinateFrame = PlacementFrame;

export interface PlacementInput {
  /** First component of the opening's local placement origin */
  rawX: number;
  /** Third (vertical) component of the opening's local placement origin */
  rawY: number;
  wallLength: number;
  /** Opening width */
  width: number;
  roomWidth: number;
  roomDepth: number;
  /** Frame declared by the host wall, when the model states it */
  frameHint?: CoordinateFrame;
}

export interface FrameDecision {
  frame: CoordinateFrame;
  source: 'hint' | 'inferred';
}

export interface CorrectedPlacement {
  locationX: number;
  locationY: number;
  frame: CoordinateFrame;
  source: FrameDecision['source'];
  /** 0 <= locationX <= wallLength */
  inRange: boolean;
}

/**
 * Decide whether a placement was measured from the wall's drawing-start
 * corner or from its far end.
 *
 * A wall-declared frame always wins. Otherwise a placement larger than both
 * room dimensions cannot lie inside the room when measured from the start
 * corner, and is taken to be measured from the far end. Host walls often run
 * past the room, so this can misfire in large rooms.
 */
export function resolveCoordinateFrame(input: PlacementInput): FrameDecision {
  if (input.frameHint) {
    return { frame: input.frameHint, source: 'hint' };
  }
  const mirrored = input.rawX > input.roomWidth && input.rawX > input.roomDepth;
  return { frame: mirrored ? 'mirrored-along-wall-axis' : 'as-given', source: 'inferred' };
}

/**
 * Bring a raw opening placement into the wall-local, bottom-left-origin frame.
 * Only the along-wall coordinate is mirrored; the vertical one is kept.
 */
export function correctPlacement(input: PlacementInput): CorrectedPlacement {
  const { frame, source } = resolveCoordinateFrame(input);

  const locationX = frame === 'mirrored-along-wall-axis' ? input.wallLength - input.rawX - input.width : input.rawX;
  const locationY = input.rawY;

  return {
    locationX,
    locationY,
    frame,
    source,
    inRange: locationX >= 0 && locationX <= input.wallLength,
  };
}
