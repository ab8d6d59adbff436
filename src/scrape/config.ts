/**
 * Config.ts
 * Config for scraping, resolved once when the process starts
 */

import path from 'node:path';
import type { Paths, ScrapeConfig, StorageBackend } from './types';

const STORAGE_BACKENDS: readonly StorageBackend[] = ['json', 'memory'];

function parseStorageBackend(raw: string | undefined): StorageBackend {
  const value = (raw ?? 'json').trim().toLowerCase();
  const backend = STORAGE_BACKENDS.find((b) => b === value);
  if (!backend) {
    throw new Error(`Unknown STORAGE_BACKEND "${raw}" (expected one of: ${STORAGE_BACKENDS.join(', ')}).`);
  }
  return backend;
}

// returns scrape settings; env is only inspected here
export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): ScrapeConfig {
  return {
    portalUrl: 'https://reg.buu.ac.th/',
    publicBaseUrl: (env.PUBLIC_BASE_URL || 'http://localhost:8080').replace(/\/+$/, ''),
    dataDir: env.DATA_DIR || path.join(process.cwd(), 'data'),
    staticDir: env.STATIC_DIR || path.join(process.cwd(), 'static'),
    storage: parseStorageBackend(env.STORAGE_BACKEND),
    headless: env.HEADLESS !== '0',
    timeouts: {
      navigationMs: 60_000,
      loginFormMs: 10_000,
      actionMs: 15_000,
      settleMs: 3_000, // portal gives no signal when the login POST has finished
      gridMs: 15_000,
    },
  };
}
// Computes abs paths derived from config
// users live in <dataDir>/users_db.json, map images in <staticDir>/maps/<room><ext>
export function getPaths(cfg: ScrapeConfig): Paths {
  const dbPath = path.join(cfg.dataDir, 'users_db.json');
  const mapsDir = path.join(cfg.staticDir, 'maps');
  return { dbPath, mapsDir };
}
