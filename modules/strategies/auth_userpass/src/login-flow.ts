/**
 * SSO Login - Backend Verification
 *
 * The step behind a submitted form: load the state, let the configured backend
 * verify the credentials and, on success, persist the authenticated state and
 * hand it to the completion continuation.
 *
 * A rejected login surfaces as the backend's AuthenticationError; the caller
 * decides how to display it. Nothing is saved on failure here.
 */

import {
    AUTH_STATE_PARAM,
    AuthMethods,
    AuthStages,
    AuthenticationError,
    STATE_VERSION,
    type AuthMethod,
    type AuthenticatedState,
} from '@sso-login/shared';
import { redirect } from './responses';
import { resolveUserPassOrgSource, resolveUserPassSource } from './source-registry';
import type { LambdaResponse, LoginCompletion, LoginContext, Organization, VerifiedUser } from './types';

// =============================================================================
// Verification
// =============================================================================

/**
 * Verify username/password for a USERPASS state.
 *
 * @returns the completion response
 * @throws AuthenticationError when the backend rejects the credentials
 */
export async function handleLogin(
    ctx: LoginContext,
    stateId: string,
    username: string,
    password: string
): Promise<LambdaResponse> {
    const state = await ctx.store.load(stateId, AuthStages.USERPASS);
    const source = resolveUserPassSource(ctx.sources, state.authSourceId);

    const verified = await verify(ctx, AuthMethods.USERPASS, source.authId, username, undefined, () =>
        source.login(username, password)
    );

    return completeLogin(ctx, AuthMethods.USERPASS, stateId, {
        stage: AuthStages.AUTHENTICATED,
        version: STATE_VERSION,
        authSourceId: source.authId,
        loginStage: AuthStages.USERPASS,
        username,
        organization: verified.organization,
        attributes: verified.attributes,
        authenticatedAt: new Date(ctx.now()).toISOString(),
        rememberMe: state.rememberMe === true,
        spMetadata: state.spMetadata,
        returnUrl: state.returnUrl,
    });
}

/**
 * Verify username/password/organization for a USERPASS_ORG state.
 *
 * @throws AuthenticationError when the backend rejects the credentials
 */
export async function handleOrgLogin(
    ctx: LoginContext,
    stateId: string,
    username: string,
    password: string,
    organization: string
): Promise<LambdaResponse> {
    const state = await ctx.store.load(stateId, AuthStages.USERPASS_ORG);
    const source = resolveUserPassOrgSource(ctx.sources, state.authSourceId);

    const verified = await verify(ctx, AuthMethods.USERPASS_ORG, source.authId, username, organization, () =>
        source.login(username, password, organization)
    );

    return completeLogin(ctx, AuthMethods.USERPASS_ORG, stateId, {
        stage: AuthStages.AUTHENTICATED,
        version: STATE_VERSION,
        authSourceId: source.authId,
        loginStage: AuthStages.USERPASS_ORG,
        username,
        organization: verified.organization,
        attributes: verified.attributes,
        authenticatedAt: new Date(ctx.now()).toISOString(),
        rememberMe: false,
        spMetadata: state.spMetadata,
        returnUrl: state.returnUrl,
    });
}

/**
 * Organizations the user may pick from for a USERPASS_ORG state, or `null`
 * when no selection is required.
 */
export async function listOrganizations(ctx: LoginContext, stateId: string): Promise<Organization[] | null> {
    const state = await ctx.store.load(stateId, AuthStages.USERPASS_ORG);
    const source = resolveUserPassOrgSource(ctx.sources, state.authSourceId);
    return source.getOrganizations();
}

async function verify(
    ctx: LoginContext,
    method: AuthMethod,
    authSourceId: string,
    username: string,
    organization: string | undefined,
    login: () => Promise<VerifiedUser>
): Promise<VerifiedUser> {
    try {
        return await login();
    } catch (err) {
        if (err instanceof AuthenticationError) {
            ctx.audit.loginFailure({ method, authSourceId, username, organization, reason: err.code });
            ctx.log.warn('Credential verification failed', { authSourceId, code: err.code });
        }
        throw err;
    }
}

async function completeLogin(
    ctx: LoginContext,
    method: AuthMethod,
    previousStateId: string,
    authenticated: AuthenticatedState
): Promise<LambdaResponse> {
    const stateId = await ctx.store.save(authenticated, AuthStages.AUTHENTICATED);

    ctx.audit.stateSaved({
        stage: AuthStages.AUTHENTICATED,
        previousStateId,
        stateId,
        reason: 'authenticated',
    });
    ctx.audit.loginSuccess(
        { username: authenticated.username, authSourceId: authenticated.authSourceId },
        { method, organization: authenticated.organization, rememberMe: authenticated.rememberMe }
    );
    ctx.log.info('Login successful', { authSourceId: authenticated.authSourceId, stateId });

    return ctx.completion.complete(stateId, authenticated);
}

// =============================================================================
// Completion
// =============================================================================

/**
 * Completion continuation that redirects to the state's return URL (or the
 * configured callback) with the authenticated state id appended.
 */
export function createRedirectCompletion(callbackUrl: string): LoginCompletion {
    return {
        complete(stateId: string, state: AuthenticatedState): LambdaResponse {
            const target = state.returnUrl ?? callbackUrl;
            const separator = target.includes('?') ? '&' : '?';
            return redirect(`${target}${separator}${AUTH_STATE_PARAM}=${encodeURIComponent(stateId)}`);
        },
    };
}
