/**
 * SSO Login - Username/Password Login Controller
 *
 * One request of the username/password flow:
 *
 * 1. Load the USERPASS state named by the AuthState query parameter
 * 2. Resolve the auth source the state belongs to
 * 3. Without submitted credentials, render the form (no save, no cookie)
 * 4. With submitted credentials:
 *    - apply the forced username, if the state carries one
 *    - set or clear the remember-username cookie
 *    - persist the remember-me flag (new state id)
 *    - verify through handleLogin; on failure attach the error to a new state
 *      and render the form again
 */

import {
    AUTH_STATE_PARAM,
    AuthStages,
    AuthenticationError,
    BadRequestError,
    FormFields,
    RememberedFields,
    getAllErrorCodeMessages,
    type AuthStateError,
    type SetCookie,
    type UserPassState,
} from '@sso-login/shared';
import { getPasswordFromRequest, getUsernameFromRequest, rememberCookieName } from './credentials';
import { handleLogin } from './login-flow';
import { isChecked, rememberFieldCookie } from './remember-policy';
import { resolveUserPassSource } from './source-registry';
import type { LoginContext, LoginOutcome, LoginRequest, UserPassSource, UserPassView } from './types';

export async function loginUserPass(
    ctx: LoginContext,
    request: LoginRequest
): Promise<LoginOutcome<UserPassView>> {
    const requestedStateId = request.query[AUTH_STATE_PARAM];
    if (requestedStateId === undefined) {
        throw new BadRequestError('Missing AuthState parameter.');
    }
    let authStateId = requestedStateId;

    let state = await ctx.store.load(authStateId, AuthStages.USERPASS);
    const source = resolveUserPassSource(ctx.sources, state.authSourceId);

    let username = getUsernameFromRequest(request, source, state);
    const password = getPasswordFromRequest(request);

    let error: AuthStateError | null = state.error ?? null;
    let queryParams: Record<string, string> | undefined = error
        ? { [AUTH_STATE_PARAM]: authStateId }
        : undefined;
    const cookies: SetCookie[] = [];

    const submittedUsername = request.form.get(FormFields.USERNAME) ?? '';
    if (submittedUsername !== '' || password !== '') {
        // A new attempt starts without the previous round's error
        state = { ...state, error: undefined };

        if (state.forcedUsername !== undefined) {
            username = state.forcedUsername;
        }

        const usernameCookie = rememberFieldCookie({
            authId: source.authId,
            field: RememberedFields.USERNAME,
            value: username,
            featureEnabled: source.rememberUsernameEnabled,
            checked: isChecked(request.form, FormFields.REMEMBER_USERNAME),
            transport: request.transport,
            now: ctx.now(),
        });
        if (usernameCookie) {
            cookies.push(usernameCookie);
        }

        if (source.rememberMeEnabled && isChecked(request.form, FormFields.REMEMBER_ME)) {
            state = { ...state, rememberMe: true };
            const previousStateId = authStateId;
            authStateId = await ctx.store.save(state, AuthStages.USERPASS);
            ctx.audit.stateSaved({
                stage: AuthStages.USERPASS,
                previousStateId,
                stateId: authStateId,
                reason: 'remember_me',
            });
        }

        try {
            const response = await handleLogin(ctx, authStateId, username, password);
            return { kind: 'completed', response, cookies };
        } catch (err) {
            if (!(err instanceof AuthenticationError)) {
                throw err;
            }

            const failure: AuthStateError = { code: err.code, params: err.params };
            error = failure;
            const previousStateId = authStateId;
            authStateId = await ctx.store.save({ ...state, error: failure }, AuthStages.USERPASS);
            ctx.audit.stateSaved({
                stage: AuthStages.USERPASS,
                previousStateId,
                stateId: authStateId,
                reason: 'login_failed',
            });
            queryParams = { [AUTH_STATE_PARAM]: authStateId };
        }
    }

    return {
        kind: 'form',
        view: buildView({ request, source, state, authStateId, username, error, queryParams }),
        cookies,
    };
}

function buildView(params: {
    request: LoginRequest;
    source: UserPassSource;
    state: UserPassState;
    authStateId: string;
    username: string;
    error: AuthStateError | null;
    queryParams: Record<string, string> | undefined;
}): UserPassView {
    const { request, source, state } = params;

    const view: UserPassView = {
        variant: 'userpass',
        authState: params.authStateId,
        username: params.username,
        forceUsername: false,
        rememberUsernameEnabled: source.rememberUsernameEnabled,
        rememberUsernameChecked: source.rememberUsernameChecked,
        rememberMeEnabled: source.rememberMeEnabled,
        rememberMeChecked: source.rememberMeChecked,
        links: source.loginLinks,
        errorCode: params.error?.code ?? null,
        errorParams: params.error?.params ?? null,
        errorCodes: getAllErrorCodeMessages(),
        spMetadata: state.spMetadata ?? null,
    };

    if (state.forcedUsername !== undefined) {
        view.username = state.forcedUsername;
        view.forceUsername = true;
        view.rememberUsernameEnabled = false;
        view.rememberUsernameChecked = false;
    } else if (request.cookies.has(rememberCookieName(source.authId, RememberedFields.USERNAME))) {
        view.rememberUsernameChecked = true;
    }

    if (params.queryParams) {
        view.queryParams = params.queryParams;
    }

    return view;
}
