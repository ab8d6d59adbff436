import { test, expect } from '@playwright/test';
import { describeFailure, errorMessage, isTimeoutError, isWrongPassword } from '../src/scrape/errors';

test.describe('wrong-password detection', () => {
  test('matches explicit rejection messages', () => {
    expect(isWrongPassword('ชื่อผู้ใช้หรือรหัสผ่านไม่ถูกต้อง')).toBe(true);
    expect(isWrongPassword('รหัสผ่าน ไม่ถูกต้อง กรุณาลองใหม่')).toBe(true);
    expect(isWrongPassword('Incorrect password')).toBe(true);
    expect(isWrongPassword('Invalid password, try again')).toBe(true);
  });

  test('ignores login-page hints that only mention the password', () => {
    expect(isWrongPassword('เข้าสู่ระบบ\nลืมรหัสประจำตัวหรือรหัสผ่าน?')).toBe(false);
    expect(isWrongPassword('Read the invalid user guide before logging in')).toBe(false);
    expect(isWrongPassword('กรุณาเข้าสู่ระบบ')).toBe(false);
  });
});

test.describe('error helpers', () => {
  test('recognises Playwright timeouts by name', () => {
    const timeout = new Error('Timeout 15000ms exceeded.');
    timeout.name = 'TimeoutError';

    expect(isTimeoutError(timeout)).toBe(true);
    expect(isTimeoutError(new Error('Timeout'))).toBe(false);
    expect(isTimeoutError('TimeoutError')).toBe(false);
  });

  test('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });

  test('every failure has its own message', () => {
    const messages = (['WrongPassword', 'LoginFailedGeneric', 'GridTimeout', 'UnclassifiedScrapeError'] as const).map(describeFailure);
    expect(new Set(messages).size).toBe(4);
  });
});
