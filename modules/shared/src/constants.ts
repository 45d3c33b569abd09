/**
 * SSO Login - Constants
 *
 * Protocol-level constants shared by the login strategies.
 * Runtime configuration (TTLs, URLs, table names) comes from environment variables.
 */

// =============================================================================
// Authentication Stages
// =============================================================================

/**
 * Stage tags stamped on every persisted authentication state.
 * A state saved under one stage can only be loaded by a flow expecting that stage.
 */
export const AuthStages = {
    /** Username/password form */
    USERPASS: 'USERPASS',
    /** Username/password/organization form */
    USERPASS_ORG: 'USERPASS_ORG',
    /** Credentials verified, waiting for the protocol layer */
    AUTHENTICATED: 'AUTHENTICATED',
} as const;

export type AuthStage = typeof AuthStages[keyof typeof AuthStages];

/** Current format of persisted state records */
export const STATE_VERSION = 1;

// =============================================================================
// DynamoDB Key Patterns
// =============================================================================

export const KeyPrefixes = {
    STATE: 'STATE#',
} as const;

export const EntityTypes = {
    AUTH_STATE: 'AUTH_STATE',
} as const;

// =============================================================================
// Inbound Parameters
// =============================================================================

/** Query parameter carrying the state identifier */
export const AUTH_STATE_PARAM = 'AuthState';

export const FormFields = {
    USERNAME: 'username',
    PASSWORD: 'password',
    ORGANIZATION: 'organization',
    REMEMBER_USERNAME: 'remember_username',
    REMEMBER_ME: 'remember_me',
    REMEMBER_ORGANIZATION: 'remember_organization',
} as const;

/** Literal value a checked checkbox submits */
export const CHECKBOX_CHECKED = 'Yes';

// =============================================================================
// Remembered Fields
// =============================================================================

/**
 * Fields whose value may be cached in a `{authSourceId}-{field}` cookie.
 */
export const RememberedFields = {
    USERNAME: 'username',
    ORGANIZATION: 'organization',
} as const;

export type RememberedField = typeof RememberedFields[keyof typeof RememberedFields];

export const CookieLifetimes = {
    /** Lifetime of a remember cookie the user opted into */
    REMEMBER_SECONDS: 31536000, // 365 days
    /** Offset used to expire a cookie the user opted out of */
    EXPIRED_OFFSET_SECONDS: -300,
} as const;

// =============================================================================
// Authentication Methods
// =============================================================================

export const AuthMethods = {
    USERPASS: 'userpass',
    USERPASS_ORG: 'userpass_org',
} as const;

export type AuthMethod = typeof AuthMethods[keyof typeof AuthMethods];
