/**
 * Tabular report of rooms, windows, external doors and walls.
 *
 * Sheets are built as rows of positioned cells, `[column, value]` or
 * `[column, value, style]`, laid out into a grid and rendered as CSV.
 */

import type { DoorRecord, Room, WallRecord } from '../reconcile/types.js';

// ============================================================================
// Cells & Sheets
// ============================================================================

export type CellValue = string | number | boolean;
export type CellStyle = 'header' | 'highlight';
export type Cell = [column: number, value: CellValue] | [column: number, value: CellValue, style: CellStyle];

/** A row as handed to the writer; null rows are skipped */
export type RawRow = ReadonlyArray<readonly unknown[]> | null;

export interface SheetSpec {
  name: string;
  header: Cell[];
  rows: RawRow[];
}

export interface GridCell {
  value: CellValue;
  style?: CellStyle;
}

export interface SheetGrid {
  name: string;
  /** Header first; sparse cells are undefined */
  rows: (GridCell | undefined)[][];
}

export class ReportError extends Error {
  constructor(
    message: string,
    public sheet?: string,
    public row?: number
  ) {
    super(message);
    this.name = 'ReportError';
  }
}

const CELL_STYLES: readonly string[] = ['header', 'highlight'];

function isCellValue(value: unknown): value is CellValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isCellStyle(value: unknown): value is CellStyle {
  return typeof value === 'string' && CELL_STYLES.includes(value);
}

/**
 * Check a raw cell against the record contract between extraction and
 * the writer. Any violation aborts the report.
 */
export function toCell(raw: readonly unknown[], sheet: string, row: number): GridCell & { column: number } {
  if (raw.length !== 2 && raw.length !== 3) {
    throw new ReportError(`${sheet} row ${row}: cell must have 2 or 3 fields, got ${raw.length}`, sheet, row);
  }
  const [column, value, style] = raw;
  if (typeof column !== 'number' || !Number.isInteger(column) || column < 0) {
    throw new ReportError(`${sheet} row ${row}: column must be a non-negative integer`, sheet, row);
  }
  if (!isCellValue(value)) {
    throw new ReportError(`${sheet} row ${row}: column ${column} has no printable value`, sheet, row);
  }
  if (raw.length === 3 && !isCellStyle(style)) {
    throw new ReportError(`${sheet} row ${row}: unknown cell style ${String(style)}`, sheet, row);
  }
  return isCellStyle(style) ? { column, value, style } : { column, value };
}

/**
 * Lay out a sheet into a grid. Null rows are dropped without leaving a gap.
 */
export function writeSheet(sheet: SheetSpec): SheetGrid {
  const rows: (GridCell | undefined)[][] = [];
  const all: ReadonlyArray<readonly unknown[]>[] = [sheet.header];
  for (const row of sheet.rows) {
    if (row !== null) all.push(row);
  }

  all.forEach((row, r) => {
    const line: (GridCell | undefined)[] = [];
    for (const raw of row) {
      const { column, ...cell } = toCell(raw, sheet.name, r);
      while (line.length < column) line.push(undefined);
      line[column] = cell;
    }
    rows.push(line);
  });

  return { name: sheet.name, rows };
}

// ============================================================================
// CSV Rendering
// ============================================================================

function escapeCSV(value: CellValue): string {
  const text = typeof value === 'number' ? String(value) : typeof value === 'boolean' ? (value ? 'yes' : 'no') : value;
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCSV(grid: SheetGrid): string {
  const width = Math.max(0, ...grid.rows.map((r) => r.length));
  return grid.rows
    .map((row) => {
      const fields: string[] = [];
      for (let c = 0; c < width; c++) {
        const cell = row[c];
        fields.push(cell ? escapeCSV(cell.value) : '');
      }
      return fields.join(',');
    })
    .join('\n')
    .concat('\n');
}

// ============================================================================
// Sheet Builders
// ============================================================================

function headerRow(titles: string[]): Cell[] {
  return titles.map((title, i): Cell => [i, title, 'header']);
}

function roomRow(name: string, code: string): Cell[] {
  return [
    [0, name, 'highlight'],
    [1, code, 'highlight'],
  ];
}

export const UNRESOLVED_ORIENTATION = 'unresolved';

export function buildSpacesSheet(rooms: Room[]): SheetSpec {
  return {
    name: 'Spaces',
    header: headerRow(['Space Name', 'Space Code', 'X Dimension', 'Y Dimension', 'Height']),
    rows: rooms.map((room) => [
      [0, room.displayName],
      [1, room.code],
      [2, room.width],
      [3, room.depth],
      [4, room.height],
    ]),
  };
}

export function buildWindowsSheet(rooms: Room[]): SheetSpec {
  const rows: Cell[][] = [];
  for (const room of rooms) {
    rows.push(roomRow(room.displayName, room.code));
    for (const w of room.windows) {
      rows.push([
        [2, w.name],
        [3, w.tag],
        [4, w.height],
        [5, w.width],
        [6, w.sillHeight],
        [7, w.wallOrientation === 'unknown' ? UNRESOLVED_ORIENTATION : w.wallOrientation],
        [8, w.wallLength],
        [9, w.locationX],
        [10, w.locationY],
        [11, w.inRange ? 'ok' : 'out of range'],
      ]);
    }
  }
  return {
    name: 'Windows',
    header: headerRow([
      'Space Name',
      'Space Code',
      'Window Name',
      'Window Tag',
      'Height',
      'Width',
      'Sill Height',
      'Orientation',
      'Wall Length',
      'Location X',
      'Location Y',
      'Placement',
    ]),
    rows,
  };
}

/** Records grouped by room code, groups in order of first appearance */
function groupByRoom<T extends { roomCode: string; roomName: string }>(records: T[]): { code: string; name: string; items: T[] }[] {
  const groups = new Map<string, { code: string; name: string; items: T[] }>();
  for (const record of records) {
    const group = groups.get(record.roomCode);
    if (group) {
      group.items.push(record);
    } else {
      groups.set(record.roomCode, { code: record.roomCode, name: record.roomName, items: [record] });
    }
  }
  return [...groups.values()];
}

export function buildDoorsSheet(doors: DoorRecord[]): SheetSpec {
  const rows: Cell[][] = [];
  for (const group of groupByRoom(doors)) {
    rows.push(roomRow(group.name, group.code));
    for (const d of group.items) {
      rows.push([
        [2, d.name],
        [3, d.tag],
        [4, d.kind === 'glass' ? 'External Glass Door' : 'External No-glass Door'],
        [5, d.height],
        [6, d.width],
      ]);
    }
  }
  return {
    name: 'External Doors',
    header: headerRow(['Space Name', 'Space Code', 'External Door Name', 'Door Tag', 'Type', 'Height', 'Width']),
    rows,
  };
}

export function buildWallsSheet(walls: WallRecord[]): SheetSpec {
  const mostLayers = walls.reduce((n, w) => Math.max(n, w.layers.length), 0);
  const titles = ['Space Name', 'Space Code', 'Wall Name', 'Wall Tag', 'Is external?', '# layers'];
  for (let i = 1; i <= mostLayers; i++) {
    titles.push(`Material ${i}`, 'Thickness');
  }

  const rows: Cell[][] = [];
  for (const group of groupByRoom(walls)) {
    rows.push(roomRow(group.name, group.code));
    for (const wall of group.items) {
      const row: Cell[] = [
        [2, wall.name],
        [3, wall.tag],
        [4, wall.isExternal === undefined ? '' : wall.isExternal],
        [5, wall.layers.length],
      ];
      wall.layers.forEach((layer, i) => {
        row.push([6 + i * 2, layer.material], [7 + i * 2, layer.thickness]);
      });
      rows.push(row);
    }
  }

  return { name: 'Walls', header: headerRow(titles), rows };
}

export interface ReportInput {
  rooms: Room[];
  doors: DoorRecord[];
  walls: WallRecord[];
}

export function buildReport(input: ReportInput): SheetSpec[] {
  return [
    buildSpacesSheet(input.rooms),
    buildWindowsSheet(input.rooms),
    buildDoorsSheet(input.doors),
    buildWallsSheet(input.walls),
  ];
}

/**
 * Render every sheet to CSV, keyed by sheet name.
 */
export function exportReport(input: ReportInput): Map<string, string> {
  const out = new Map<string, string>();
  for (const sheet of buildReport(input)) {
    out.set(sheet.name, renderCSV(writeSheet(sheet)));
  }
  return out;
}
