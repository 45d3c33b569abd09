/**
 * SSO Login - Credential Extraction
 *
 * Resolves the effective username and organization for a request from three
 * ranked sources. First match wins:
 *
 *   1. the submitted form field, when present (even if empty)
 *   2. the remember cookie `{authId}-{field}`, when that feature is enabled
 *   3. the value cached in the authentication state
 *
 * Passwords only ever come from the submitted form.
 */

import { FormFields, RememberedFields, type LoginState, type RememberedField, type UserPassOrgState } from '@sso-login/shared';
import type { CredentialSource, LoginRequest, UserPassOrgSource } from './types';

export interface CredentialCandidates {
    submitted: string | undefined;
    cookie: string | undefined;
    rememberEnabled: boolean;
    cached: string | undefined;
}

/**
 * Name of the cookie remembering `field` for an auth source.
 */
export function rememberCookieName(authId: string, field: RememberedField): string {
    return `${authId}-${field}`;
}

export function extractCredential(candidates: CredentialCandidates): string {
    if (candidates.submitted !== undefined) {
        return candidates.submitted;
    }
    if (candidates.rememberEnabled && candidates.cookie !== undefined) {
        return candidates.cookie;
    }
    return candidates.cached ?? '';
}

export function getUsernameFromRequest(
    request: LoginRequest,
    source: CredentialSource,
    state: LoginState
): string {
    return extractCredential({
        submitted: request.form.get(FormFields.USERNAME),
        cookie: request.cookies.get(rememberCookieName(source.authId, RememberedFields.USERNAME)),
        rememberEnabled: source.rememberUsernameEnabled,
        cached: state.cachedUsername,
    });
}

export function getPasswordFromRequest(request: LoginRequest): string {
    return request.form.get(FormFields.PASSWORD) ?? '';
}

export function getOrganizationFromRequest(
    request: LoginRequest,
    source: UserPassOrgSource,
    state: UserPassOrgState
): string {
    return extractCredential({
        submitted: request.form.get(FormFields.ORGANIZATION),
        cookie: request.cookies.get(rememberCookieName(source.authId, RememberedFields.ORGANIZATION)),
        rememberEnabled: source.rememberOrganizationEnabled,
        cached: state.cachedOrganization,
    });
}
