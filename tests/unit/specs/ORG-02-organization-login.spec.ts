/**
 * ORG-02: Organization Login
 *
 * With an organization chosen, username, password and organization are
 * verified together. The organization form has no remember-me; both the
 * username and the organization can be remembered in cookies.
 */

import { describe, it, expect } from 'vitest';
import { AuthStages, serializeCookie } from '@sso-login/shared';
import { loginUserPassOrg } from '@sso-login/auth-userpass';
import { SOURCE_IDS, TEST_NOW, TEST_PASSWORDS } from '../fixtures';
import {
  completedStateId,
  createHarness,
  createOrgSource,
  locationOf,
  makeRequest,
  seedOrgState,
} from '../support/harness';

describe('ORG-02: Organization Login', () => {
  it('should complete with the chosen organization', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedOrgState(store);

    const outcome = await loginUserPassOrg(
      ctx,
      makeRequest({
        authState,
        form: { username: 'carol', password: TEST_PASSWORDS.carol, organization: 'acme', remember_me: 'Yes' },
      })
    );
    if (outcome.kind !== 'completed') throw new Error('expected a completed login');

    const stateId = completedStateId(outcome.response);
    expect(locationOf(outcome.response)).toBe(`/authorize/callback?AuthState=${stateId}`);
    expect(store.size).toBe(2);

    const authenticated = await store.load(stateId, AuthStages.AUTHENTICATED);
    expect(authenticated).toEqual({
      stage: 'AUTHENTICATED',
      version: 1,
      authSourceId: 'org1',
      loginStage: 'USERPASS_ORG',
      username: 'carol',
      organization: 'acme',
      attributes: { uid: ['carol'] },
      authenticatedAt: '2030-01-15T12:00:00.000Z',
      rememberMe: false,
    });
  });

  it('should reject an organization the user does not belong to', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedOrgState(store);

    const outcome = await loginUserPassOrg(
      ctx,
      makeRequest({ authState, form: { username: 'carol', password: TEST_PASSWORDS.carol, organization: 'globex' } })
    );

    expect(outcome.kind).toBe('form');
    if (outcome.kind !== 'form') return;
    expect(outcome.view.errorCode).toBe('WRONGUSERPASS');
    expect(outcome.view.selectedOrg).toBe('globex');
    expect(outcome.view.queryParams).toEqual({ AuthState: outcome.view.authState });

    const saved = await store.load(outcome.view.authState, AuthStages.USERPASS_ORG);
    expect(saved.error).toEqual({ code: 'WRONGUSERPASS', params: {} });
  });

  it('should reject an organization that is not configured', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedOrgState(store);

    const outcome = await loginUserPassOrg(
      ctx,
      makeRequest({ authState, form: { username: 'carol', password: TEST_PASSWORDS.carol, organization: 'initech' } })
    );

    expect(outcome.kind === 'form' && outcome.view.errorCode).toBe('WRONGUSERPASS');
  });

  it('should set the username and organization cookies', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedOrgState(store);

    const outcome = await loginUserPassOrg(
      ctx,
      makeRequest({
        authState,
        form: {
          username: 'dave',
          password: 'wrong',
          organization: 'globex',
          remember_username: 'Yes',
          remember_organization: 'Yes',
        },
      })
    );

    expect(outcome.cookies.map(cookie => serializeCookie(cookie, TEST_NOW))).toEqual([
      'org1-username=dave; Expires=Wed, 15 Jan 2031 12:00:00 GMT; Max-Age=31536000; Path=/; Secure; HttpOnly; SameSite=None',
      'org1-organization=globex; Expires=Wed, 15 Jan 2031 12:00:00 GMT; Max-Age=31536000; Path=/; Secure; HttpOnly; SameSite=None',
    ]);
  });

  it('should clear unchecked remember cookies', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedOrgState(store);

    const outcome = await loginUserPassOrg(
      ctx,
      makeRequest({
        authState,
        form: { username: 'dave', password: TEST_PASSWORDS.dave, organization: 'globex' },
        transport: { secure: false, sameSiteNone: false },
      })
    );

    expect(outcome.kind).toBe('completed');
    expect(outcome.cookies.map(cookie => serializeCookie(cookie, TEST_NOW))).toEqual([
      'org1-username=dave; Expires=Tue, 15 Jan 2030 11:55:00 GMT; Max-Age=0; Path=/; HttpOnly',
      'org1-organization=globex; Expires=Tue, 15 Jan 2030 11:55:00 GMT; Max-Age=0; Path=/; HttpOnly',
    ]);
  });

  it('should use the remembered organization when none is submitted', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedOrgState(store);

    const outcome = await loginUserPassOrg(
      ctx,
      makeRequest({
        authState,
        form: { username: 'carol', password: TEST_PASSWORDS.carol },
        cookies: { 'org1-organization': 'acme' },
      })
    );
    if (outcome.kind !== 'completed') throw new Error('expected a completed login');

    const authenticated = await store.load(completedStateId(outcome.response), AuthStages.AUTHENTICATED);
    expect(authenticated.organization).toBe('acme');
  });

  it('should log in without an organization when none is required', async () => {
    const { ctx, store, sources } = await createHarness();
    sources.register(await createOrgSource({ authId: SOURCE_IDS.optionalOrg, requireOrganization: false }));
    const authState = await seedOrgState(store, { authSourceId: SOURCE_IDS.optionalOrg });

    const outcome = await loginUserPassOrg(
      ctx,
      makeRequest({ authState, form: { username: 'dave', password: TEST_PASSWORDS.dave } })
    );
    if (outcome.kind !== 'completed') throw new Error('expected a completed login');

    const authenticated = await store.load(completedStateId(outcome.response), AuthStages.AUTHENTICATED);
    expect(authenticated.authSourceId).toBe('org2');
    expect(authenticated.organization).toBe('globex');
  });

  it('should show the stored error when the form is reloaded', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedOrgState(store, { error: { code: 'WRONGUSERPASS', params: {} } });

    const outcome = await loginUserPassOrg(ctx, makeRequest({ authState }));

    expect(outcome.kind).toBe('form');
    if (outcome.kind !== 'form') return;
    expect(outcome.view.errorCode).toBe('WRONGUSERPASS');
    expect(outcome.view.queryParams).toEqual({ AuthState: authState });
  });
});
