/**
 * RMB-01: Remember Policy
 *
 * A checked box keeps the cookie for one year; an unchecked box re-issues it
 * with an expiry five minutes in the past. A disabled feature emits nothing.
 */

import { describe, it, expect } from 'vitest';
import { serializeCookie } from '@sso-login/shared';
import {
  buildRememberCookie,
  decideRemember,
  isChecked,
  rememberFieldCookie,
} from '@sso-login/auth-userpass';
import { TEST_NOW } from '../fixtures';

describe('RMB-01: Remember Policy', () => {
  it('should do nothing when the feature is disabled', () => {
    expect(decideRemember(false, true, TEST_NOW)).toEqual({ shouldSet: false });
  });

  it('should expire one year out when checked', () => {
    expect(decideRemember(true, true, TEST_NOW)).toEqual({
      shouldSet: true,
      expiresAt: new Date(TEST_NOW + 31536000 * 1000),
    });
  });

  it('should expire in the past when unchecked', () => {
    const decision = decideRemember(true, false, TEST_NOW);
    expect(decision).toEqual({ shouldSet: true, expiresAt: new Date(TEST_NOW - 300 * 1000) });
  });

  it('should only count the literal value Yes as checked', () => {
    const form = new Map([
      ['a', 'Yes'],
      ['b', 'yes'],
      ['c', 'on'],
    ]);
    expect(isChecked(form, 'a')).toBe(true);
    expect(isChecked(form, 'b')).toBe(false);
    expect(isChecked(form, 'c')).toBe(false);
    expect(isChecked(form, 'missing')).toBe(false);
  });

  it('should emit SameSite=None only when the transport supports it', () => {
    const expires = new Date(TEST_NOW);
    expect(buildRememberCookie('n', 'v', expires, { secure: true, sameSiteNone: true }).attributes).toEqual({
      expires,
      path: '/',
      secure: true,
      httpOnly: true,
      sameSite: 'None',
    });
    expect(
      buildRememberCookie('n', 'v', expires, { secure: false, sameSiteNone: false }).attributes.sameSite
    ).toBeUndefined();
  });

  it('should serialize a kept username cookie', () => {
    const cookie = rememberFieldCookie({
      authId: 'src1',
      field: 'username',
      value: 'alice',
      featureEnabled: true,
      checked: true,
      transport: { secure: true, sameSiteNone: true },
      now: TEST_NOW,
    });

    expect(cookie).not.toBeNull();
    expect(cookie && serializeCookie(cookie, TEST_NOW)).toBe(
      'src1-username=alice; Expires=Wed, 15 Jan 2031 12:00:00 GMT; Max-Age=31536000; Path=/; Secure; HttpOnly; SameSite=None'
    );
  });

  it('should serialize a cleared username cookie with Max-Age 0', () => {
    const cookie = rememberFieldCookie({
      authId: 'src1',
      field: 'username',
      value: 'alice',
      featureEnabled: true,
      checked: false,
      transport: { secure: false, sameSiteNone: false },
      now: TEST_NOW,
    });

    expect(cookie && serializeCookie(cookie, TEST_NOW)).toBe(
      'src1-username=alice; Expires=Tue, 15 Jan 2030 11:55:00 GMT; Max-Age=0; Path=/; HttpOnly'
    );
  });

  it('should not build a cookie for a disabled feature', () => {
    expect(
      rememberFieldCookie({
        authId: 'src1',
        field: 'organization',
        value: 'acme',
        featureEnabled: false,
        checked: true,
        transport: { secure: true, sameSiteNone: true },
        now: TEST_NOW,
      })
    ).toBeNull();
  });
});
