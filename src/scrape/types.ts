/**
 * types.ts
 *
 * Shared TypeScript types used across the scraper modules.
 *
 */

export type StorageBackend = 'json' | 'memory';

export type Timeouts = {
    navigationMs: number;
    loginFormMs: number;
    actionMs: number;
    settleMs: number;
    gridMs: number;
  };

export type ScrapeConfig = {
    portalUrl: string;
    publicBaseUrl: string;
    dataDir: string;
    staticDir: string;
    storage: StorageBackend;
    headless: boolean;
    timeouts: Timeouts;
  };

  export type Paths = {
    dbPath: string;
    mapsDir: string;
  };

  export type Credentials = {
    username: string;
    password: string;
  };

  export type LegendEntry = {
    code: string;
    name_en: string;
    name_th: string;
  };

  export type LegendMap = Map<string, LegendEntry>;

  // One weekday row of the grid: the day label plus the token list of every non-empty cell.
  export type GridRow = {
    day: string;
    columns: string[][];
  };

  export type GridEntry = {
    code: string;
    room: string;
    time: string;
  };

  export type RoomDetails = {
    building: string;
    map_image: string;
  };

  export type ScheduleSession = {
    day: string;
    time: string;
    room: string;
    building: string;
    map_image: string;
  };

  export type Course = {
    code: string;
    name_en: string;
    name_th: string;
    sessions: ScheduleSession[];
  };

  export type UserRecord = {
    username: string;
    notification_token?: string;
    schedule: Course[];
    last_updated: string | null;
  };

  export type ScrapeFailure =
    | 'WrongPassword'
    | 'LoginFailedGeneric'
    | 'GridTimeout'
    | 'UnclassifiedScrapeError';

  export type NavigatorState =
    | 'Start'
    | 'PortalLoaded'
    | 'LoginFormReady'
    | 'CredentialsSubmitted'
    | 'MenuVisible'
    | 'LoginRejected'
    | 'LoginFailedGeneric'
    | 'TimetableViewLoaded'
    | 'GridReady'
    | 'GridTimeout'
    | 'Extracted';

  // Raw rows are cell inner HTML, one string per <td>.
  export type NavigationResult =
    | { ok: true; legendRows: string[][]; gridRows: string[][] }
    | { ok: false; failure: ScrapeFailure; message: string };

  export type ScrapeResult =
    | { ok: true; courses: Course[] }
    | { ok: false; failure: ScrapeFailure; message: string };

  export type DigestClass = {
    code: string;
    name_en: string;
    name_th: string;
    time: string;
    room: string;
    building: string;
    map_image: string;
  };

  export type DigestEntry = {
    username: string;
    notification_token: string;
    day: string;
    classes: DigestClass[];
  };

  export type DailyDigest = {
    count: number;
    data: DigestEntry[];
  };
