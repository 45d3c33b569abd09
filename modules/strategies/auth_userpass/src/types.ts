/**
 * SSO Login - Username/Password Strategy Types
 *
 * Type definitions for the username/password and username/password/organization
 * login flows.
 *
 * Note: State, audit and cookie types are provided by @sso-login/shared.
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import type {
    AuditLogger,
    AuthenticatedState,
    CookieTransport,
    ErrorCodeCatalog,
    Logger,
    SetCookie,
    StateStore,
    UserAttributes,
} from '@sso-login/shared';
import type { AuthSourceRegistry } from './source-registry';

// =============================================================================
// Response Type
// =============================================================================

export type LambdaResponse = APIGatewayProxyStructuredResultV2;

// =============================================================================
// Credential Sources
// =============================================================================

/**
 * Alternate login link shown under the form.
 */
export interface LoginLink {
    href: string;
    text: string;
}

export interface Organization {
    id: string;
    displayName: string;
}

/**
 * What a backend reports for verified credentials.
 */
export interface VerifiedUser {
    attributes: UserAttributes;
    /** Organization the user authenticated in, when the backend knows it */
    organization?: string;
}

interface CredentialSourceBase {
    /** Configured id; also the prefix of the remember cookies */
    authId: string;
    rememberUsernameEnabled: boolean;
    /** Default state of the remember-username checkbox */
    rememberUsernameChecked: boolean;
    loginLinks: LoginLink[];
}

export interface UserPassSource extends CredentialSourceBase {
    kind: 'userpass';
    rememberMeEnabled: boolean;
    rememberMeChecked: boolean;
    /**
     * @throws AuthenticationError when the credentials are rejected
     */
    login(username: string, password: string): Promise<VerifiedUser>;
}

export interface UserPassOrgSource extends CredentialSourceBase {
    kind: 'userpass_org';
    rememberOrganizationEnabled: boolean;
    rememberOrganizationChecked: boolean;
    /** `null` when the user does not have to pick an organization */
    getOrganizations(): Promise<Organization[] | null>;
    /**
     * @throws AuthenticationError when the credentials are rejected
     */
    login(username: string, password: string, organization: string): Promise<VerifiedUser>;
}

export type CredentialSource = UserPassSource | UserPassOrgSource;

// =============================================================================
// Request
// =============================================================================

/**
 * Transport-neutral view of one inbound login request.
 */
export interface LoginRequest {
    query: Readonly<Record<string, string | undefined>>;
    /** Parsed POST body; empty for GET */
    form: ReadonlyMap<string, string>;
    cookies: ReadonlyMap<string, string>;
    transport: CookieTransport;
}

// =============================================================================
// View Models
// =============================================================================

interface LoginViewBase {
    authState: string;
    username: string;
    rememberUsernameEnabled: boolean;
    rememberUsernameChecked: boolean;
    links: LoginLink[];
    errorCode: string | null;
    errorParams: Record<string, string> | null;
    errorCodes: ErrorCodeCatalog;
    /** Present only when an error is shown */
    queryParams?: Record<string, string>;
    spMetadata: unknown;
}

export interface UserPassView extends LoginViewBase {
    variant: 'userpass';
    forceUsername: boolean;
    rememberMeEnabled: boolean;
    rememberMeChecked: boolean;
}

export interface UserPassOrgView extends LoginViewBase {
    variant: 'userpass_org';
    rememberOrganizationEnabled: boolean;
    rememberOrganizationChecked: boolean;
    /** Present only when an organization must be selected */
    organizations?: Organization[];
    selectedOrg?: string;
}

export type LoginView = UserPassView | UserPassOrgView;

/**
 * Result of one controller run.
 */
export type LoginOutcome<V extends LoginView> =
    | { kind: 'form'; view: V; cookies: SetCookie[] }
    | { kind: 'completed'; response: LambdaResponse; cookies: SetCookie[] };

// =============================================================================
// Services
// =============================================================================

/**
 * Hands a verified login back to the protocol layer.
 */
export interface LoginCompletion {
    complete(stateId: string, state: AuthenticatedState): LambdaResponse;
}

export interface LoginServices {
    store: StateStore;
    sources: AuthSourceRegistry;
    completion: LoginCompletion;
    /** Clock, in epoch milliseconds */
    now: () => number;
}

export interface LoginContext extends LoginServices {
    log: Logger;
    audit: AuditLogger;
}

// =============================================================================
// Configuration
// =============================================================================

export type StateBackendConfig =
    | { backend: 'dynamodb'; tableName: string }
    | { backend: 'memory' };

/**
 * Environment configuration for the login handlers.
 */
export interface LoginEnvConfig {
    state: StateBackendConfig;
    stateTtlSeconds: number;
    /** Path of the JSON file describing the auth sources */
    authSourcesFile: string;
    callbackUrl: string;
    brandName: string;
    cookieSecure: boolean;
}
