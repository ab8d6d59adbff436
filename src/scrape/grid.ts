/**
 * grid.ts
 *
 * Parses the weekly timetable grid. Each weekday row starts with the day
 * label; every following cell that holds a class lists its fields one per
 * line (or comma separated):
 *
 *   [0] course code   e.g. "CS101"
 *   [1] section       e.g. "G1"            (not used)
 *   [2] room code     e.g. "S-101"
 *   [3] time range    e.g. "(09:00-12:00)"
 *
 * Only field order is guaranteed by the portal, so the list is decoded into
 * a GridEntry right here and nothing downstream indexes raw tokens.
 */

import { cellLines, cellText } from './markup';
import type { GridEntry, GridRow } from './types';

// Rows 3..11 (1-based) of the grid table hold the weekdays; the rest are headers.
export const GRID_ROW_SPAN = { first: 3, last: 11 } as const;

export const PLACEHOLDER = '-';

export function selectWeekdayRows<T>(rows: T[]): T[] {
  return rows.slice(GRID_ROW_SPAN.first - 1, GRID_ROW_SPAN.last);
}

export function cellTokens(html: string): string[] {
  return cellLines(html)
    .flatMap((line) => line.split(','))
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parseGridRows(rows: string[][]): GridRow[] {
  const out: GridRow[] = [];

  for (const cells of rows) {
    if (cells.length === 0) continue;

    // blank label = spacer/header row, its cells are not scanned
    const day = cellText(cells[0]).trim();
    if (!day) continue;

    const columns: string[][] = [];
    for (const cell of cells.slice(1)) {
      const tokens = cellTokens(cell);
      if (tokens.length > 0) columns.push(tokens);
    }
    out.push({ day, columns });
  }

  return out;
}

export function decodeGridEntry(tokens: readonly string[]): GridEntry {
  return {
    code: tokens[0] ?? '',
    room: tokens[2] ?? PLACEHOLDER,
    time: (tokens[3] ?? PLACEHOLDER).replace(/[()]/g, ''),
  };
}
