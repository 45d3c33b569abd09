/**
 * SSO Login - Cookie Helpers
 *
 * Request cookie parsing and Set-Cookie serialization for API Gateway HTTP API v2.
 * v2 delivers request cookies in `event.cookies` and accepts response cookies in
 * the result's `cookies` array.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';

// =============================================================================
// Types
// =============================================================================

export type SameSite = 'None' | 'Lax' | 'Strict';

export interface CookieAttributes {
    /** Absolute expiry; a past date deletes the cookie in the browser */
    expires: Date;
    path: string;
    domain?: string;
    secure: boolean;
    httpOnly: boolean;
    /** Omitted from the header when undefined */
    sameSite?: SameSite;
}

export interface SetCookie {
    name: string;
    value: string;
    attributes: CookieAttributes;
}

/**
 * What the serving transport can do for the current request.
 */
export interface CookieTransport {
    /** Whether cookies get the Secure flag */
    secure: boolean;
    /** Whether `SameSite=None` may be emitted for this client */
    sameSiteNone: boolean;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse cookies from a Cookie header. Values are URL-decoded; a value that is
 * not valid percent-encoding is kept as sent.
 */
export function parseCookies(cookieHeader: string | undefined): Map<string, string> {
    const cookies = new Map<string, string>();
    if (!cookieHeader) return cookies;

    for (const pair of cookieHeader.split(';')) {
        const [name, ...valueParts] = pair.trim().split('=');
        if (name) {
            cookies.set(name, decodeCookieValue(valueParts.join('=')));
        }
    }
    return cookies;
}

function decodeCookieValue(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

/**
 * Collect the request cookies of an HTTP API v2 event.
 */
export function getRequestCookies(event: APIGatewayProxyEventV2): Map<string, string> {
    const cookieHeader = event.cookies?.join('; ') || event.headers?.cookie;
    return parseCookies(cookieHeader);
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Build a Set-Cookie header value. The value is URL-encoded.
 * Both Expires and Max-Age are written; Max-Age is clamped at 0 for
 * cookies that expire in the past.
 */
export function serializeCookie(cookie: SetCookie, now: number = Date.now()): string {
    const { attributes } = cookie;
    const maxAge = Math.max(0, Math.floor((attributes.expires.getTime() - now) / 1000));

    const parts = [
        `${cookie.name}=${encodeURIComponent(cookie.value)}`,
        `Expires=${attributes.expires.toUTCString()}`,
        `Max-Age=${maxAge}`,
        `Path=${attributes.path}`,
    ];

    if (attributes.domain) {
        parts.push(`Domain=${attributes.domain}`);
    }
    if (attributes.secure) {
        parts.push('Secure');
    }
    if (attributes.httpOnly) {
        parts.push('HttpOnly');
    }
    if (attributes.sameSite) {
        parts.push(`SameSite=${attributes.sameSite}`);
    }

    return parts.join('; ');
}

// =============================================================================
// SameSite=None Capability
// =============================================================================

/**
 * User agents known to reject or misinterpret `SameSite=None`.
 *
 * @see https://www.chromium.org/updates/same-site/incompatible-clients
 */
const SAMESITE_NONE_INCOMPATIBLE = [
    // Chrome 51-66 reject cookies carrying SameSite=None
    /Chrom(e|ium)\/(5[1-9]|6[0-6])\./,
    // iOS 12 WebKit treats None as Strict
    /\(iP(hone|ad|od).*OS 12_\d/,
    // macOS 10.14 Safari and embedded browsers treat None as Strict
    /\(Macintosh;.*Mac OS X 10_14(_\d+)?\).*AppleWebKit\/[\d.]+ \(KHTML, like Gecko\)(?!.*Chrom)/,
    // UC Browser before 12.13
    /UCBrowser\/(\d|1[0-1]|12\.(\d|1[0-2]))\./,
];

/**
 * Whether `SameSite=None` can be set for this client. Requires a secure
 * transport, since browsers drop `SameSite=None` cookies without `Secure`.
 */
export function canSetSameSiteNone(userAgent: string | undefined, secure: boolean): boolean {
    if (!secure) {
        return false;
    }
    if (!userAgent) {
        return true;
    }
    return !SAMESITE_NONE_INCOMPATIBLE.some(pattern => pattern.test(userAgent));
}
