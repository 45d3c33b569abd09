/**
 * CRD-01: Credential Extraction
 *
 * Username and organization resolve from the submitted form first, then the
 * remember cookie (only when that feature is enabled), then the value cached
 * in the state. The password only ever comes from the form.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { AuthStages, STATE_VERSION, type UserPassOrgState, type UserPassState } from '@sso-login/shared';
import {
  extractCredential,
  getOrganizationFromRequest,
  getPasswordFromRequest,
  getUsernameFromRequest,
  rememberCookieName,
  type StaticUserPassOrgSource,
  type StaticUserPassSource,
} from '@sso-login/auth-userpass';
import { createOrgSource, createUserPassSource, makeRequest } from '../support/harness';

const userPassState: UserPassState = {
  stage: AuthStages.USERPASS,
  version: STATE_VERSION,
  authSourceId: 'src1',
  cachedUsername: 'cached-user',
};

const orgState: UserPassOrgState = {
  stage: AuthStages.USERPASS_ORG,
  version: STATE_VERSION,
  authSourceId: 'org1',
  cachedOrganization: 'globex',
};

describe('CRD-01: Credential Extraction', () => {
  describe('extractCredential', () => {
    it('should prefer a submitted value over cookie and cache', () => {
      expect(
        extractCredential({ submitted: 'form', cookie: 'cookie', rememberEnabled: true, cached: 'cache' })
      ).toBe('form');
    });

    it('should treat an empty submitted value as present', () => {
      expect(
        extractCredential({ submitted: '', cookie: 'cookie', rememberEnabled: true, cached: 'cache' })
      ).toBe('');
    });

    it('should use the cookie when nothing was submitted and remembering is enabled', () => {
      expect(
        extractCredential({ submitted: undefined, cookie: 'cookie', rememberEnabled: true, cached: 'cache' })
      ).toBe('cookie');
    });

    it('should ignore the cookie when remembering is disabled', () => {
      expect(
        extractCredential({ submitted: undefined, cookie: 'cookie', rememberEnabled: false, cached: 'cache' })
      ).toBe('cache');
    });

    it('should fall back to the empty string', () => {
      expect(
        extractCredential({ submitted: undefined, cookie: undefined, rememberEnabled: true, cached: undefined })
      ).toBe('');
    });
  });

  describe('request helpers', () => {
    let source: StaticUserPassSource;
    let orgSource: StaticUserPassOrgSource;

    beforeAll(async () => {
      source = await createUserPassSource();
      orgSource = await createOrgSource();
    });

    it('should name remember cookies after the auth source', () => {
      expect(rememberCookieName('src1', 'username')).toBe('src1-username');
      expect(rememberCookieName('org1', 'organization')).toBe('org1-organization');
    });

    it('should read the username from the remember cookie on a GET', () => {
      const request = makeRequest({ authState: '_x', cookies: { 'src1-username': 'bob' } });
      expect(getUsernameFromRequest(request, source, userPassState)).toBe('bob');
    });

    it('should read the cached username when there is no cookie', () => {
      const request = makeRequest({ authState: '_x' });
      expect(getUsernameFromRequest(request, source, userPassState)).toBe('cached-user');
    });

    it('should ignore cookies of another auth source', () => {
      const request = makeRequest({ authState: '_x', cookies: { 'other-username': 'bob' } });
      expect(getUsernameFromRequest(request, source, userPassState)).toBe('cached-user');
    });

    it('should default the password to the empty string', () => {
      expect(getPasswordFromRequest(makeRequest({ authState: '_x' }))).toBe('');
      expect(getPasswordFromRequest(makeRequest({ authState: '_x', form: { password: 'pw' } }))).toBe('pw');
    });

    it('should resolve the organization from form, cookie, then cache', () => {
      expect(
        getOrganizationFromRequest(
          makeRequest({ authState: '_x', form: { organization: 'acme' }, cookies: { 'org1-organization': 'globex' } }),
          orgSource,
          orgState
        )
      ).toBe('acme');
      expect(
        getOrganizationFromRequest(
          makeRequest({ authState: '_x', cookies: { 'org1-organization': 'acme' } }),
          orgSource,
          orgState
        )
      ).toBe('acme');
      expect(getOrganizationFromRequest(makeRequest({ authState: '_x' }), orgSource, orgState)).toBe('globex');
    });
  });
});
