import { defineConfig } from '@playwright/test';

// Unit specs drive a scripted PortalSession and never open a browser.
// tests/live_scrape.spec.ts launches Chromium itself when credentials are set.
export default defineConfig({
  testDir: './tests',
  fullyParallel: true,
  timeout: 30_000,
  retries: process.env.CI ? 1 : 0,
});
