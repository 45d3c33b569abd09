/**
 * SSO Login - Login Form Handlers
 *
 * Lambda handlers for
 *   GET|POST /login/userpass      (username/password)
 *   GET|POST /login/userpass-org  (username/password/organization)
 *
 * Flow:
 * 1. Build a LoginRequest (query, form body, cookies, cookie transport)
 * 2. Run the controller for the variant
 * 3. Render the form, or return the completion redirect
 * 4. Attach remember cookies through the HTTP API v2 `cookies` array
 *
 * Fatal flow errors (missing or unknown AuthState, wrong stage, unknown auth
 * source) become JSON errors and are never rendered inline.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    HttpStatus,
    LoginFlowError,
    createLogger,
    serializeCookie,
    withContext,
} from '@sso-login/shared';
import { getLoginConfig } from './config';
import { getLoginServices } from './dependencies';
import { buildLoginRequest } from './request';
import { errorResponse, htmlResponse, withCookies } from './responses';
import { renderLoginPage } from './template';
import type {
    LambdaResponse,
    LoginContext,
    LoginEnvConfig,
    LoginOutcome,
    LoginRequest,
    LoginServices,
    LoginView,
    UserPassOrgView,
    UserPassView,
} from './types';
import { loginUserPass } from './userpass-controller';
import { loginUserPassOrg } from './userpass-org-controller';

// =============================================================================
// Handler Factory
// =============================================================================

export type LoginController<V extends LoginView> = (
    ctx: LoginContext,
    request: LoginRequest
) => Promise<LoginOutcome<V>>;

export type LoginHandler = (event: APIGatewayProxyEventV2, context: Context) => Promise<LambdaResponse>;

export interface HandlerDependencies {
    services: () => LoginServices;
    config: () => Pick<LoginEnvConfig, 'brandName' | 'cookieSecure'>;
}

const defaultDependencies: HandlerDependencies = {
    services: getLoginServices,
    config: getLoginConfig,
};

const ALLOWED_METHODS = ['GET', 'POST'];

function createLoginHandler<V extends LoginView>(
    controller: LoginController<V>,
    deps: HandlerDependencies
): LoginHandler {
    return async (event, context) => {
        const log = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            const method = event.requestContext.http.method.toUpperCase();
            log.info('Login page requested', { path: event.requestContext.http.path, method });

            if (!ALLOWED_METHODS.includes(method)) {
                return errorResponse(
                    HttpStatus.METHOD_NOT_ALLOWED,
                    'invalid_request',
                    `Method ${method} is not allowed`,
                    { Allow: ALLOWED_METHODS.join(', ') }
                );
            }

            const config = deps.config();
            const services = deps.services();
            const request = buildLoginRequest(event, config.cookieSecure);

            const outcome = await controller({ ...services, log, audit }, request);

            const now = services.now();
            const cookies = outcome.cookies.map(cookie => serializeCookie(cookie, now));

            if (outcome.kind === 'completed') {
                return withCookies(outcome.response, cookies);
            }

            log.info('Rendering login form', {
                authState: outcome.view.authState,
                errorCode: outcome.view.errorCode,
            });
            return withCookies(htmlResponse(renderLoginPage(outcome.view, config.brandName)), cookies);
        } catch (err) {
            if (err instanceof LoginFlowError) {
                log.warn('Login flow rejected', { error: err.name, message: err.message });
                return errorResponse(err.statusCode, err.error, err.message);
            }

            const error = err instanceof Error ? err : new Error(String(err));
            log.error('Login handler error', { error: error.message, stack: error.stack });
            return errorResponse(HttpStatus.INTERNAL_SERVER_ERROR, 'server_error', 'An unexpected error occurred');
        }
    };
}

// =============================================================================
// Lambda Handlers
// =============================================================================

export function createUserPassHandler(deps: HandlerDependencies = defaultDependencies): LoginHandler {
    return createLoginHandler<UserPassView>(loginUserPass, deps);
}

export function createUserPassOrgHandler(deps: HandlerDependencies = defaultDependencies): LoginHandler {
    return createLoginHandler<UserPassOrgView>(loginUserPassOrg, deps);
}

export const userPassHandler = createUserPassHandler();
export const userPassOrgHandler = createUserPassOrgHandler();
