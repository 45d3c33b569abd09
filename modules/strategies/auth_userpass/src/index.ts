/**
 * SSO Login - Username/Password Strategy
 *
 * Module exports for the username/password and username/password/organization
 * login flows.
 *
 * Note: State stores, logging and cookie utilities are provided by @sso-login/shared.
 */

// Types
export type {
    LambdaResponse,
    LoginLink,
    Organization,
    VerifiedUser,
    UserPassSource,
    UserPassOrgSource,
    CredentialSource,
    LoginRequest,
    UserPassView,
    UserPassOrgView,
    LoginView,
    LoginOutcome,
    LoginCompletion,
    LoginServices,
    LoginContext,
    LoginEnvConfig,
    StateBackendConfig,
} from './types';

// Configuration
export { getLoginConfig, clearConfigCache } from './config';
export { getLoginServices, clearServicesCache } from './dependencies';
export { loadAuthSources, parseAuthSources, AuthSourceConfigError } from './auth-sources';

// Request
export { parseFormBody } from './form-parser';
export { buildLoginRequest } from './request';

// Credentials and remember policy
export {
    rememberCookieName,
    extractCredential,
    getUsernameFromRequest,
    getPasswordFromRequest,
    getOrganizationFromRequest,
} from './credentials';
export type { CredentialCandidates } from './credentials';
export { decideRemember, isChecked, buildRememberCookie, rememberFieldCookie } from './remember-policy';
export type { RememberDecision } from './remember-policy';

// Auth sources
export { AuthSourceRegistry, resolveUserPassSource, resolveUserPassOrgSource } from './source-registry';
export { StaticUserPassSource, indexUsers } from './backends/static-userpass';
export { verifyPassword } from './backends/password';
export type { StaticUser, StaticUserPassConfig } from './backends/static-userpass';
export { StaticUserPassOrgSource } from './backends/static-userpass-org';
export type { StaticUserPassOrgConfig } from './backends/static-userpass-org';

// Flow
export { handleLogin, handleOrgLogin, listOrganizations, createRedirectCompletion } from './login-flow';
export { loginUserPass } from './userpass-controller';
export { loginUserPassOrg } from './userpass-org-controller';

// Rendering and responses
export { renderLoginPage, toTemplateData, formActionFor } from './template';
export type { LoginTemplateData } from './template';
export { htmlResponse, errorResponse, redirect, withCookies } from './responses';

// Handlers
export {
    createUserPassHandler,
    createUserPassOrgHandler,
    userPassHandler,
    userPassOrgHandler,
} from './login-handler';
export type { HandlerDependencies, LoginController, LoginHandler } from './login-handler';
