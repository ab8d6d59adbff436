/**
 * rooms.ts
 *
 * Maps a raw room code (e.g. "S-101", "QS2-305", "ARR") to
 * - the building it sits in
 * - a campus map image served from <staticDir>/maps, when one exists
 */

import fs from 'node:fs';
import path from 'node:path';
import type { RoomDetails } from './types';

export const ONLINE_LABEL = 'เรียนออนไลน์จ้า';

const BUILDINGS: Readonly<Record<string, string>> = {
  S: 'ตึก 100 ปี (สมเด็จพระเทพฯ)',
  P: 'อาคารวิทยาศาสตร์ (P)',
  L: 'อาคารเรียนรวม (L)',
  QS2: 'อาคารภูมิราชนครินทร์ (QS2)',
  KB: 'อาคารเคบี (KB)',
  SC: 'อาคารวิทยาศาสตร์ (SC)',
  EN: 'คณะวิศวกรรมศาสตร์',
};

// tried in this order; the first existing file wins
export const MAP_EXTENSIONS = ['.jpg', '.png', '.jpeg', '.JPG', '.PNG'] as const;

export type RoomLookupOptions = {
  mapsDir: string;
  publicBaseUrl: string;
};

export function roomPrefix(roomCode: string): string {
  return roomCode.split('-')[0].trim().toUpperCase();
}

// Arranged ("ARR") and online classes have to be caught before the prefix table,
// otherwise "S-ONLINE" would resolve to a physical building.
export function buildingFor(roomCode: string): string {
  const prefix = roomPrefix(roomCode);
  if (prefix === 'ARR' || roomCode.toUpperCase().includes('ONLINE')) return ONLINE_LABEL;
  return BUILDINGS[prefix] ?? `Building ${prefix}`;
}

export function mapImageFor(roomCode: string, opts: RoomLookupOptions): string {
  // the code comes from the portal and ends up in a filesystem path
  if (!roomCode || /[\\/]/.test(roomCode)) return '';
  for (const ext of MAP_EXTENSIONS) {
    const filename = `${roomCode}${ext}`;
    if (fs.existsSync(path.join(opts.mapsDir, filename))) {
      return `${opts.publicBaseUrl}/static/maps/${encodeURIComponent(filename)}`;
    }
  }
  return '';
}

export function resolveRoom(roomCode: string, opts: RoomLookupOptions): RoomDetails {
  const code = roomCode.trim();
  return { building: buildingFor(code), map_image: mapImageFor(code, opts) };
}
