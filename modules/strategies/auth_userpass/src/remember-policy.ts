/**
 * SSO Login - Remember Policy
 *
 * Decides, per remembered field, whether this round sets or clears the
 * `{authId}-{field}` cookie. Clearing is done by re-issuing the cookie with an
 * expiry in the past.
 */

import { CHECKBOX_CHECKED, CookieLifetimes, type CookieTransport, type RememberedField, type SetCookie } from '@sso-login/shared';
import { rememberCookieName } from './credentials';

export type RememberDecision =
    | { shouldSet: false }
    | { shouldSet: true; expiresAt: Date };

/**
 * A checkbox counts as checked only when it was submitted with the value "Yes".
 */
export function isChecked(form: ReadonlyMap<string, string>, field: string): boolean {
    return form.get(field) === CHECKBOX_CHECKED;
}

/**
 * @param now - epoch milliseconds
 */
export function decideRemember(featureEnabled: boolean, checked: boolean, now: number): RememberDecision {
    if (!featureEnabled) {
        return { shouldSet: false };
    }

    const offsetSeconds = checked
        ? CookieLifetimes.REMEMBER_SECONDS
        : CookieLifetimes.EXPIRED_OFFSET_SECONDS;

    return { shouldSet: true, expiresAt: new Date(now + offsetSeconds * 1000) };
}

export function buildRememberCookie(
    name: string,
    value: string,
    expiresAt: Date,
    transport: CookieTransport
): SetCookie {
    return {
        name,
        value,
        attributes: {
            expires: expiresAt,
            path: '/',
            secure: transport.secure,
            httpOnly: true,
            sameSite: transport.sameSiteNone ? 'None' : undefined,
        },
    };
}

/**
 * Apply the policy for one remembered field. Returns the cookie to emit, if any.
 */
export function rememberFieldCookie(params: {
    authId: string;
    field: RememberedField;
    value: string;
    featureEnabled: boolean;
    checked: boolean;
    transport: CookieTransport;
    now: number;
}): SetCookie | null {
    const decision = decideRemember(params.featureEnabled, params.checked, params.now);
    if (!decision.shouldSet) {
        return null;
    }

    return buildRememberCookie(
        rememberCookieName(params.authId, params.field),
        params.value,
        decision.expiresAt,
        params.transport
    );
}
