/**
 * SSO Login - Username/Password/Organization Login Controller
 *
 * Same round trip as the username/password controller, with an organization
 * selection step. Credentials are only verified once an organization has been
 * chosen, unless the backend requires none (organization list is null).
 * This variant has no forced username and no remember-me.
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
    type UserPassOrgState,
} from '@sso-login/shared';
import {
    getOrganizationFromRequest,
    getPasswordFromRequest,
    getUsernameFromRequest,
    rememberCookieName,
} from './credentials';
import { handleOrgLogin, listOrganizations } from './login-flow';
import { isChecked, rememberFieldCookie } from './remember-policy';
import { resolveUserPassOrgSource } from './source-registry';
import type {
    LoginContext,
    LoginOutcome,
    LoginRequest,
    Organization,
    UserPassOrgSource,
    UserPassOrgView,
} from './types';

export async function loginUserPassOrg(
    ctx: LoginContext,
    request: LoginRequest
): Promise<LoginOutcome<UserPassOrgView>> {
    const requestedStateId = request.query[AUTH_STATE_PARAM];
    if (requestedStateId === undefined) {
        throw new BadRequestError('Missing AuthState parameter.');
    }
    let authStateId = requestedStateId;

    let state = await ctx.store.load(authStateId, AuthStages.USERPASS_ORG);
    const source = resolveUserPassOrgSource(ctx.sources, state.authSourceId);

    const organizations = await listOrganizations(ctx, authStateId);
    const username = getUsernameFromRequest(request, source, state);
    const password = getPasswordFromRequest(request);
    const organization = getOrganizationFromRequest(request, source, state);

    let error: AuthStateError | null = state.error ?? null;
    let queryParams: Record<string, string> | undefined = error
        ? { [AUTH_STATE_PARAM]: authStateId }
        : undefined;
    const cookies: SetCookie[] = [];

    const submittedUsername = request.form.get(FormFields.USERNAME) ?? '';
    const organizationResolved = organizations === null || organization !== '';

    if (organizationResolved && (submittedUsername !== '' || password !== '')) {
        state = { ...state, error: undefined };
        const now = ctx.now();

        const usernameCookie = rememberFieldCookie({
            authId: source.authId,
            field: RememberedFields.USERNAME,
            value: username,
            featureEnabled: source.rememberUsernameEnabled,
            checked: isChecked(request.form, FormFields.REMEMBER_USERNAME),
            transport: request.transport,
            now,
        });
        if (usernameCookie) {
            cookies.push(usernameCookie);
        }

        const organizationCookie = rememberFieldCookie({
            authId: source.authId,
            field: RememberedFields.ORGANIZATION,
            value: organization,
            featureEnabled: source.rememberOrganizationEnabled,
            checked: isChecked(request.form, FormFields.REMEMBER_ORGANIZATION),
            transport: request.transport,
            now,
        });
        if (organizationCookie) {
            cookies.push(organizationCookie);
        }

        try {
            const response = await handleOrgLogin(ctx, authStateId, username, password, organization);
            return { kind: 'completed', response, cookies };
        } catch (err) {
            if (!(err instanceof AuthenticationError)) {
                throw err;
            }

            const failure: AuthStateError = { code: err.code, params: err.params };
            error = failure;
            const previousStateId = authStateId;
            authStateId = await ctx.store.save({ ...state, error: failure }, AuthStages.USERPASS_ORG);
            ctx.audit.stateSaved({
                stage: AuthStages.USERPASS_ORG,
                previousStateId,
                stateId: authStateId,
                reason: 'login_failed',
            });
            queryParams = { [AUTH_STATE_PARAM]: authStateId };
        }
    } else if (!organizationResolved) {
        ctx.log.debug('Organization not selected yet', { authSourceId: source.authId });
    }

    return {
        kind: 'form',
        view: buildView({
            request,
            source,
            state,
            authStateId,
            username,
            organization,
            organizations,
            error,
            queryParams,
        }),
        cookies,
    };
}

function buildView(params: {
    request: LoginRequest;
    source: UserPassOrgSource;
    state: UserPassOrgState;
    authStateId: string;
    username: string;
    organization: string;
    organizations: Organization[] | null;
    error: AuthStateError | null;
    queryParams: Record<string, string> | undefined;
}): UserPassOrgView {
    const { request, source } = params;

    const view: UserPassOrgView = {
        variant: 'userpass_org',
        authState: params.authStateId,
        username: params.username,
        rememberUsernameEnabled: source.rememberUsernameEnabled,
        rememberUsernameChecked:
            source.rememberUsernameChecked ||
            request.cookies.has(rememberCookieName(source.authId, RememberedFields.USERNAME)),
        rememberOrganizationEnabled: source.rememberOrganizationEnabled,
        rememberOrganizationChecked:
            source.rememberOrganizationChecked ||
            request.cookies.has(rememberCookieName(source.authId, RememberedFields.ORGANIZATION)),
        links: source.loginLinks,
        errorCode: params.error?.code ?? null,
        errorParams: params.error?.params ?? null,
        errorCodes: getAllErrorCodeMessages(),
        spMetadata: params.state.spMetadata ?? null,
    };

    if (params.queryParams) {
        view.queryParams = params.queryParams;
    }

    if (params.organizations !== null) {
        view.organizations = params.organizations;
        view.selectedOrg = params.organization;
    }

    return view;
}
