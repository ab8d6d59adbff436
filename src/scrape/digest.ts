/**
 * digest.ts
 *
 * Builds the "today's classes" payload the daily notification job sends:
 * one entry per user that has a notification token and at least one class
 * on the given weekday.
 */

import type { UserStore } from './io';
import type { DailyDigest, DigestClass, DigestEntry, UserRecord } from './types';

// indexed by Date#getDay(), Sunday first
export const THAI_DAYS = ['อาทิตย์', 'จันทร์', 'อังคาร', 'พุธ', 'พฤหัสบดี', 'ศุกร์', 'เสาร์'] as const;

export function thaiDayName(date: Date): string {
  return THAI_DAYS[date.getDay()];
}

// minutes since midnight of the range start ("09:00-12:00" -> 540), Infinity if unreadable
export function startMinutes(time: string): number {
  const m = time.trim().match(/^(\d{1,2})[:.](\d{2})/);
  if (!m) return Number.POSITIVE_INFINITY;
  return Number(m[1]) * 60 + Number(m[2]);
}

export function classesOn(record: UserRecord, day: string): DigestClass[] {
  const classes: DigestClass[] = [];
  for (const course of record.schedule) {
    for (const s of course.sessions) {
      if (s.day !== day) continue;
      classes.push({
        code: course.code,
        name_en: course.name_en,
        name_th: course.name_th,
        time: s.time,
        room: s.room,
        building: s.building,
        map_image: s.map_image,
      });
    }
  }
  // Array#sort is stable, equal start times keep schedule order
  return classes.sort((a, b) => {
    const ma = startMinutes(a.time);
    const mb = startMinutes(b.time);
    if (ma === mb) return 0;
    return ma < mb ? -1 : 1;
  });
}

export function buildDailyDigest(records: UserRecord[], date: Date = new Date()): DailyDigest {
  const day = thaiDayName(date);
  const data: DigestEntry[] = [];

  for (const record of records) {
    const token = record.notification_token;
    if (!token) continue;

    const classes = classesOn(record, day);
    if (classes.length === 0) continue;

    data.push({ username: record.username, notification_token: token, day, classes });
  }

  return { count: data.length, data };
}

export async function loadDailyDigest(store: UserStore, date: Date = new Date()): Promise<DailyDigest> {
  return buildDailyDigest(await store.listWithNotificationToken(), date);
}
