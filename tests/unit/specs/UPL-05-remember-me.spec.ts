/**
 * UPL-05: Remember Me
 *
 * A checked remember-me box is persisted on the state before verification, so
 * it survives a failed attempt. Once set it stays set for the rest of the
 * login.
 */

import { describe, it, expect, vi } from 'vitest';
import { AuthStages } from '@sso-login/shared';
import { loginUserPass } from '@sso-login/auth-userpass';
import { TEST_PASSWORDS } from '../fixtures';
import { completedStateId, createHarness, makeRequest, seedUserPassState } from '../support/harness';

describe('UPL-05: Remember Me', () => {
  it('should save the flag under a new id before verifying', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedUserPassState(store);
    const stateSaved = vi.spyOn(ctx.audit, 'stateSaved');

    const outcome = await loginUserPass(
      ctx,
      makeRequest({ authState, form: { username: 'alice', password: TEST_PASSWORDS.alice, remember_me: 'Yes' } })
    );
    if (outcome.kind !== 'completed') throw new Error('expected a completed login');

    expect(store.size).toBe(3);
    expect(stateSaved.mock.calls.map(([details]) => details.reason)).toEqual(['remember_me', 'authenticated']);

    const authenticated = await store.load(completedStateId(outcome.response), AuthStages.AUTHENTICATED);
    expect(authenticated.rememberMe).toBe(true);
  });

  it('should ignore the box when the backend does not offer it', async () => {
    const { ctx, store } = await createHarness({ userpass: { rememberMeEnabled: false } });
    const authState = await seedUserPassState(store);

    const outcome = await loginUserPass(
      ctx,
      makeRequest({ authState, form: { username: 'alice', password: TEST_PASSWORDS.alice, remember_me: 'Yes' } })
    );
    if (outcome.kind !== 'completed') throw new Error('expected a completed login');

    expect(store.size).toBe(2);
    const authenticated = await store.load(completedStateId(outcome.response), AuthStages.AUTHENTICATED);
    expect(authenticated.rememberMe).toBe(false);
  });

  it('should only accept the value Yes', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedUserPassState(store);

    const outcome = await loginUserPass(
      ctx,
      makeRequest({ authState, form: { username: 'alice', password: TEST_PASSWORDS.alice, remember_me: 'on' } })
    );
    if (outcome.kind !== 'completed') throw new Error('expected a completed login');

    const authenticated = await store.load(completedStateId(outcome.response), AuthStages.AUTHENTICATED);
    expect(authenticated.rememberMe).toBe(false);
  });

  it('should survive a failed attempt', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedUserPassState(store);

    const failed = await loginUserPass(
      ctx,
      makeRequest({ authState, form: { username: 'alice', password: 'wrong', remember_me: 'Yes' } })
    );
    if (failed.kind !== 'form') throw new Error('expected the form');

    expect(store.size).toBe(3);
    const saved = await store.load(failed.view.authState, AuthStages.USERPASS);
    expect(saved.rememberMe).toBe(true);
    expect(saved.error).toEqual({ code: 'WRONGUSERPASS', params: {} });

    const retried = await loginUserPass(
      ctx,
      makeRequest({ authState: failed.view.authState, form: { username: 'alice', password: TEST_PASSWORDS.alice } })
    );
    if (retried.kind !== 'completed') throw new Error('expected a completed login');

    const authenticated = await store.load(completedStateId(retried.response), AuthStages.AUTHENTICATED);
    expect(authenticated.rememberMe).toBe(true);
  });

  it('should not be cleared by an unchecked box', async () => {
    const { ctx, store } = await createHarness();
    const authState = await seedUserPassState(store, { rememberMe: true });

    const outcome = await loginUserPass(
      ctx,
      makeRequest({ authState, form: { username: 'bob', password: TEST_PASSWORDS.bob } })
    );
    if (outcome.kind !== 'completed') throw new Error('expected a completed login');

    expect(store.size).toBe(2);
    const authenticated = await store.load(completedStateId(outcome.response), AuthStages.AUTHENTICATED);
    expect(authenticated.rememberMe).toBe(true);
  });
});
