/**
 * SSO Login - HTTP Response Helpers
 *
 * Standardized response formatting for the login forms.
 *
 * Security Headers:
 * - Cache-Control/Pragma: Prevent caching of authentication pages
 * - X-Content-Type-Options: Prevent MIME type sniffing
 * - X-Frame-Options: Prevent clickjacking attacks
 * - Referrer-Policy: Limit referrer information leakage
 * - Content-Security-Policy: Restrict resource loading
 *
 * @see https://owasp.org/www-project-secure-headers/
 */

import { HttpStatus } from '@sso-login/shared';
import type { LambdaResponse } from './types';

// =============================================================================
// Response Headers
// =============================================================================

const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

const HTML_HEADERS = {
    'Content-Type': 'text/html; charset=utf-8',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
    'Content-Security-Policy': "default-src 'self'; style-src 'unsafe-inline'; frame-ancestors 'none'",
} as const;

const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

const REDIRECT_HEADERS = {
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
} as const;

// =============================================================================
// Response Builders
// =============================================================================

export function htmlResponse(body: string, statusCode: number = HttpStatus.OK): LambdaResponse {
    return {
        statusCode,
        headers: { ...HTML_HEADERS },
        body,
    };
}

/**
 * Return a JSON error response: `{ error, error_description }`.
 */
export function errorResponse(
    statusCode: number,
    error: string,
    description: string,
    extraHeaders: Record<string, string> = {}
): LambdaResponse {
    return {
        statusCode,
        headers: { ...JSON_HEADERS, ...extraHeaders },
        body: JSON.stringify({
            error,
            error_description: description,
        }),
    };
}

/**
 * Return an HTTP 303 See Other redirect response.
 * Uses 303 to ensure the browser performs a GET request to the target URL.
 */
export function redirect(url: string): LambdaResponse {
    return {
        statusCode: HttpStatus.SEE_OTHER,
        headers: {
            ...REDIRECT_HEADERS,
            Location: url,
        },
        body: '',
    };
}

/**
 * Attach serialized Set-Cookie values. Cookies already on the response are kept.
 */
export function withCookies(response: LambdaResponse, cookies: string[]): LambdaResponse {
    if (cookies.length === 0) {
        return response;
    }
    return {
        ...response,
        cookies: [...(response.cookies ?? []), ...cookies],
    };
}
