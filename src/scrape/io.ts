/**
 * io.ts
 *
 * Per-user persistence
 * - JsonFileStore: every user in one JSON object keyed by username
 * - MemoryStore: same contract, nothing on disk (tests, dry runs)
 *
 * Saving a schedule replaces the previous one outright; saving a
 * notification token never touches the schedule. Write errors are thrown
 * to the caller, nothing here retries.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { getPaths } from './config';
import type { Course, ScrapeConfig, UserRecord } from './types';

export interface UserStore {
  get(username: string): Promise<UserRecord | undefined>;
  saveSchedule(username: string, schedule: Course[], updatedAt?: Date): Promise<UserRecord>;
  saveNotificationToken(username: string, token: string): Promise<UserRecord>;
  listWithNotificationToken(): Promise<UserRecord[]>;
}

type UserTable = Record<string, UserRecord>;

function emptyRecord(username: string): UserRecord {
  return { username, schedule: [], last_updated: null };
}

function withSchedule(existing: UserRecord | undefined, username: string, schedule: Course[], updatedAt: Date): UserRecord {
  return { ...(existing ?? emptyRecord(username)), username, schedule, last_updated: updatedAt.toISOString() };
}

function withToken(existing: UserRecord | undefined, username: string, token: string): UserRecord {
  return { ...(existing ?? emptyRecord(username)), username, notification_token: token };
}

function hasToken(record: UserRecord): boolean {
  return Boolean(record.notification_token);
}

function isUserTable(value: unknown): value is UserTable {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (rec: unknown) => typeof rec === 'object' && rec !== null && 'schedule' in rec && Array.isArray(rec.schedule),
  );
}

export class JsonFileStore implements UserStore {
  // every read and read-modify-write goes through this chain, one at a time
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly dbPath: string) {}

  private async load(): Promise<UserTable> {
    let raw: string;
    try {
      raw = await fs.readFile(this.dbPath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isUserTable(parsed)) {
      throw new Error(`${this.dbPath} is not a user table.`);
    }
    return parsed;
  }

  // write beside the target, then rename over it: the db file is either old or new, never partial
  private async save(table: UserTable) {
    await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
    const tmpPath = `${this.dbPath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(table, null, 4), 'utf8');
    await fs.rename(tmpPath, this.dbPath);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private update(username: string, change: (existing: UserRecord | undefined) => UserRecord): Promise<UserRecord> {
    return this.enqueue(async () => {
      const table = await this.load();
      const record = change(table[username]);
      table[username] = record;
      await this.save(table);
      return record;
    });
  }

  get(username: string) {
    return this.enqueue(async () => {
      const table = await this.load();
      return table[username];
    });
  }

  saveSchedule(username: string, schedule: Course[], updatedAt: Date = new Date()) {
    return this.update(username, (existing) => withSchedule(existing, username, schedule, updatedAt));
  }

  saveNotificationToken(username: string, token: string) {
    return this.update(username, (existing) => withToken(existing, username, token));
  }

  listWithNotificationToken() {
    return this.enqueue(async () => {
      const table = await this.load();
      return Object.values(table).filter(hasToken);
    });
  }
}

export class MemoryStore implements UserStore {
  private readonly users = new Map<string, UserRecord>();

  async get(username: string) {
    return this.users.get(username);
  }

  async saveSchedule(username: string, schedule: Course[], updatedAt: Date = new Date()) {
    const record = withSchedule(this.users.get(username), username, schedule, updatedAt);
    this.users.set(username, record);
    return record;
  }

  async saveNotificationToken(username: string, token: string) {
    const record = withToken(this.users.get(username), username, token);
    this.users.set(username, record);
    return record;
  }

  async listWithNotificationToken() {
    return [...this.users.values()].filter(hasToken);
  }
}

export function createUserStore(cfg: ScrapeConfig): UserStore {
  switch (cfg.storage) {
    case 'json':
      return new JsonFileStore(getPaths(cfg).dbPath);
    case 'memory':
      return new MemoryStore();
  }
}
