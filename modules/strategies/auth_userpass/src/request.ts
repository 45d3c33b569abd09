/**
 * SSO Login - Login Request Adapter
 *
 * Builds a LoginRequest from an API Gateway HTTP API v2 event.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { canSetSameSiteNone, getRequestCookies } from '@sso-login/shared';
import { parseFormBody } from './form-parser';
import type { LoginRequest } from './types';

export function buildLoginRequest(event: APIGatewayProxyEventV2, cookieSecure: boolean): LoginRequest {
    const method = event.requestContext.http.method.toUpperCase();
    const userAgent = event.headers?.['user-agent'];

    return {
        query: event.queryStringParameters ?? {},
        form: method === 'POST' ? parseFormBody(event.body, event.isBase64Encoded) : new Map(),
        cookies: getRequestCookies(event),
        transport: {
            secure: cookieSecure,
            sameSiteNone: canSetSameSiteNone(userAgent, cookieSecure),
        },
    };
}
