export { getDefaultConfig, getPaths } from './config';
export { describeFailure, isWrongPassword } from './errors';
export { buildDailyDigest, loadDailyDigest, thaiDayName } from './digest';
export { decodeGridEntry, parseGridRows } from './grid';
export { createUserStore, JsonFileStore, MemoryStore } from './io';
export type { UserStore } from './io';
export { parseLegendRows } from './legend';
export { navigateToTimetable, PORTAL } from './navigator';
export { reconcile } from './reconcile';
export type { RoomEnricher } from './reconcile';
export { resolveRoom } from './rooms';
export { extractStudentSchedule, scrapeTimetable, syncTimetable } from './run';
export type { ScrapeDeps } from './run';
export { launchPortalSession } from './session';
export type { PortalSession } from './session';
export type * from './types';
