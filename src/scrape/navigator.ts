/**
 * navigator.ts
 *
 * Drives the registration portal from its landing page to the timetable view:
 *
 *   Start -> PortalLoaded -> LoginFormReady -> CredentialsSubmitted
 *     -> MenuVisible | LoginRejected | LoginFailedGeneric
 *     -> TimetableViewLoaded -> GridReady | GridTimeout -> Extracted
 *
 * and hands back the raw legend and grid rows. The session is not closed
 * here; whoever launched it closes it.
 */

import { describeFailure, isWrongPassword } from './errors';
import { selectWeekdayRows } from './grid';
import type { PortalSession } from './session';
import type { Credentials, NavigationResult, NavigatorState, ScrapeConfig, ScrapeFailure } from './types';

// Field names, marker texts and table paths of the portal as it renders today.
export const PORTAL = {
  loginLink: 'text=เข้าสู่ระบบ',
  usernameField: "input[name='f_uid']",
  passwordField: "input[name='f_pwd']",
  submitButton: "input[type='submit']",
  timetableMenu: 'text=ตารางเรียน/สอบ',
  pageBody: 'body',
  legendRows: "xpath=//*[@id='myTable']/tbody/tr",
  gridTable: "xpath=//*[@id='page']/table[3]/tbody/tr/td[2]/table[3]/tbody/tr/td/table",
  gridRows: "xpath=//*[@id='page']/table[3]/tbody/tr/td[2]/table[3]/tbody/tr/td/table/tbody/tr",
} as const;

export type StateListener = (state: NavigatorState) => void;

function failed(failure: ScrapeFailure): NavigationResult {
  return { ok: false, failure, message: describeFailure(failure) };
}

// The form is sometimes behind a "เข้าสู่ระบบ" link. If neither the form nor
// the link is there, reload once and look again.
async function openLoginForm(session: PortalSession, cfg: ScrapeConfig): Promise<boolean> {
  for (let attempt = 0; attempt < 2; attempt++) {
    if ((await session.count(PORTAL.usernameField)) > 0) return true;

    if ((await session.count(PORTAL.loginLink)) > 0) {
      await session.click(PORTAL.loginLink);
      return session.waitFor(PORTAL.usernameField, cfg.timeouts.loginFormMs);
    }

    if (attempt === 0) await session.reload(cfg.timeouts.navigationMs);
  }
  return false;
}

export async function navigateToTimetable(
  session: PortalSession,
  credentials: Credentials,
  cfg: ScrapeConfig,
  onState?: StateListener,
): Promise<NavigationResult> {
  const enter = (state: NavigatorState) => onState?.(state);

  enter('Start');
  await session.goto(cfg.portalUrl, cfg.timeouts.navigationMs);
  enter('PortalLoaded');

  if (!(await openLoginForm(session, cfg))) {
    throw new Error('Login form not found on the portal page.');
  }
  enter('LoginFormReady');

  await session.fill(PORTAL.usernameField, credentials.username);
  await session.fill(PORTAL.passwordField, credentials.password);
  await session.click(PORTAL.submitButton, { force: true });
  await session.settle(cfg.timeouts.settleMs);
  enter('CredentialsSubmitted');

  if ((await session.count(PORTAL.timetableMenu)) === 0) {
    const pageText = await session.text(PORTAL.pageBody);
    if (isWrongPassword(pageText)) {
      enter('LoginRejected');
      return failed('WrongPassword');
    }
    enter('LoginFailedGeneric');
    return failed('LoginFailedGeneric');
  }
  enter('MenuVisible');

  await session.click(PORTAL.timetableMenu);
  enter('TimetableViewLoaded');

  if (!(await session.waitFor(PORTAL.gridTable, cfg.timeouts.gridMs))) {
    enter('GridTimeout');
    return failed('GridTimeout');
  }
  enter('GridReady');

  const legendRows = await session.readRows(PORTAL.legendRows);
  const gridRows = selectWeekdayRows(await session.readRows(PORTAL.gridRows));
  enter('Extracted');

  return { ok: true, legendRows, gridRows };
}
