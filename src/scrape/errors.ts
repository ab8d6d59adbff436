/**
 * errors.ts
 *
 * Centralizes error detection and classification
 * - detecting the portal's wrong-credentials message
 * - recognising Playwright timeouts
 * - caller-facing text for each classified failure
 */

import type { ScrapeFailure } from './types';

// detects the portal's explicit rejection of username/password
// only rejection phrases; the login page itself carries a "forgot ID or password" hint
export function isWrongPassword(pageText: string): boolean {
  return /รหัสผ่าน\s*ไม่ถูกต้อง|incorrect\s+password|invalid\s+password/i.test(pageText);
}

// Playwright throws errors named TimeoutError from waits and actions
export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeFailure(failure: ScrapeFailure): string {
  switch (failure) {
    case 'WrongPassword':
      return 'The portal rejected the username or password.';
    case 'LoginFailedGeneric':
      return 'Login did not reach the student menu.';
    case 'GridTimeout':
      return 'The timetable grid did not render in time.';
    case 'UnclassifiedScrapeError':
      return 'Unexpected error while reading the timetable.';
  }
}
