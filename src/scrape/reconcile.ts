/**
 * reconcile.ts
 *
 * Joins grid entries against the legend and groups them into courses.
 * - dedup key is code|day|time|room, scoped to one call
 * - codes missing from the legend are dropped (inner join)
 * - courses come out in the order their code was first seen,
 *   rows top to bottom, columns left to right
 */

import { decodeGridEntry } from './grid';
import type { Course, GridRow, LegendMap, RoomDetails, ScheduleSession } from './types';

export type RoomEnricher = (roomCode: string) => RoomDetails;

const noEnrichment: RoomEnricher = () => ({ building: '', map_image: '' });

export function sessionKey(code: string, day: string, time: string, room: string): string {
  return `${code}|${day}|${time}|${room}`;
}

export function reconcile(legend: LegendMap, gridRows: GridRow[], enrich: RoomEnricher = noEnrichment): Course[] {
  const seen = new Set<string>();
  const grouped = new Map<string, ScheduleSession[]>();

  for (const row of gridRows) {
    for (const tokens of row.columns) {
      const { code, room, time } = decodeGridEntry(tokens);
      if (!code) continue;

      const key = sessionKey(code, row.day, time, room);
      if (seen.has(key)) continue;
      seen.add(key);

      if (!legend.has(code)) continue;

      let sessions = grouped.get(code);
      if (!sessions) {
        sessions = [];
        grouped.set(code, sessions);
      }
      // per session, not per course: one course can meet in several rooms
      const { building, map_image } = enrich(room);
      sessions.push({ day: row.day, time, room, building, map_image });
    }
  }

  const courses: Course[] = [];
  for (const [code, sessions] of grouped) {
    const entry = legend.get(code);
    if (!entry) continue;
    courses.push({ code, name_en: entry.name_en, name_th: entry.name_th, sessions });
  }
  return courses;
}
