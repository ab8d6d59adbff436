/**
 * run.ts
 *
 * Runs one end-to-end timetable scrape:
 * - launches a browser session and logs into the portal
 * - reads the legend and grid tables from the timetable view
 * - joins, dedups and groups them into courses, enriching every session's room
 * - closes the browser on every exit path
 *
 * syncTimetable additionally stores the result; a failed scrape stores nothing.
 * The config is resolved once by the caller (getDefaultConfig at startup) and passed in.
 */

import { getPaths } from './config';
import { errorMessage } from './errors';
import { parseGridRows } from './grid';
import type { UserStore } from './io';
import { parseLegendRows } from './legend';
import { navigateToTimetable } from './navigator';
import type { StateListener } from './navigator';
import { reconcile } from './reconcile';
import type { RoomEnricher } from './reconcile';
import { resolveRoom } from './rooms';
import { launchPortalSession } from './session';
import type { PortalSession } from './session';
import type { Course, Credentials, ScrapeConfig, ScrapeResult } from './types';

export type ScrapeDeps = {
  launch?: (cfg: ScrapeConfig) => Promise<PortalSession>;
  enrich?: RoomEnricher;
  onState?: StateListener;
};

export function defaultRoomEnricher(cfg: ScrapeConfig): RoomEnricher {
  const { mapsDir } = getPaths(cfg);
  return (room) => resolveRoom(room, { mapsDir, publicBaseUrl: cfg.publicBaseUrl });
}

async function release(session: PortalSession, username: string) {
  try {
    await session.close();
  } catch (err) {
    console.error(`Failed to close browser for ${username}: ${errorMessage(err)}`);
  }
}

export async function scrapeTimetable(
  credentials: Credentials,
  cfg: ScrapeConfig,
  deps: ScrapeDeps = {},
): Promise<ScrapeResult> {
  const launch = deps.launch ?? launchPortalSession;
  const enrich = deps.enrich ?? defaultRoomEnricher(cfg);
  const { username } = credentials;

  console.log(`Scraping timetable for ${username}`);

  let session: PortalSession | undefined;
  try {
    session = await launch(cfg);

    const nav = await navigateToTimetable(session, credentials, cfg, deps.onState);
    if (!nav.ok) {
      console.log(`Scrape failed for ${username}: ${nav.failure} (${nav.message})`);
      return nav;
    }

    const legend = parseLegendRows(nav.legendRows);
    const grid = parseGridRows(nav.gridRows);
    const courses = reconcile(legend, grid, enrich);

    const sessionCount = courses.reduce((n, c) => n + c.sessions.length, 0);
    console.log(`Done. ${username}: courses=${courses.length}, sessions=${sessionCount}`);
    return { ok: true, courses };
  } catch (err) {
    console.error(`Scrape error for ${username}: ${errorMessage(err)}`);
    return { ok: false, failure: 'UnclassifiedScrapeError', message: errorMessage(err) };
  } finally {
    if (session) await release(session, username);
  }
}

// Scrape, then replace the user's stored schedule. Store errors reach the caller.
export async function syncTimetable(
  credentials: Credentials,
  store: UserStore,
  cfg: ScrapeConfig,
  deps: ScrapeDeps = {},
): Promise<ScrapeResult> {
  const result = await scrapeTimetable(credentials, cfg, deps);
  if (!result.ok) return result;

  const mapped = result.courses.reduce(
    (n, c) => n + c.sessions.filter((s) => s.map_image).length,
    0,
  );
  await store.saveSchedule(credentials.username, result.courses);
  console.log(`Saved schedule for ${credentials.username} (map images: ${mapped})`);
  return result;
}

/**
 * @deprecated Collapses every failure into an empty list, so bad credentials
 * look the same as a student with no classes. Use scrapeTimetable.
 */
export async function extractStudentSchedule(
  credentials: Credentials,
  cfg: ScrapeConfig,
  deps: ScrapeDeps = {},
): Promise<Course[]> {
  const result = await scrapeTimetable(credentials, cfg, deps);
  return result.ok ? result.courses : [];
}
