/**
 * SSO Login - Shared Utilities
 *
 * Central export for the modules shared by the login strategies.
 *
 * Modules:
 * - State: stage-tagged authentication state and its stores (DynamoDB, memory)
 * - Audit Logger: structured JSON logging to CloudWatch
 * - Cookies: request cookie parsing and Set-Cookie serialization
 * - Errors: fatal flow errors, credential errors and the error code catalog
 * - Crypto: state identifier generation
 * - Constants: stages, form fields, cookie lifetimes
 */

// =============================================================================
// Authentication State
// =============================================================================

export {
    MemoryStateStore,
    DynamoStateStore,
    DEFAULT_STATE_TTL_SECONDS,
    toStateItem,
    fromStateItem,
    isUserPassState,
    isUserPassOrgState,
    isAuthenticatedState,
    isStateForStage,
    isStateItem,
    withRetry,
    isRetryableError,
    calculateDelay,
    DEFAULT_RETRY_CONFIG,
} from './state';

export type {
    StateStore,
    MemoryStateStoreOptions,
    DynamoStateStoreConfig,
    AuthStateError,
    UserPassState,
    UserPassOrgState,
    LoginState,
    AuthenticatedState,
    AuthenticationState,
    StateForStage,
    StateItem,
    UserAttributes,
    RetryConfig,
} from './state';

// =============================================================================
// Audit Logger
// =============================================================================

export { AuditLogger, Logger, withContext, createLogger } from './audit-logger';

export type { AuditAction, AuditActor, AuditContext, AuditLogEntry, LogLevel } from './audit-logger';

// =============================================================================
// Cookies
// =============================================================================

export {
    parseCookies,
    getRequestCookies,
    serializeCookie,
    canSetSameSiteNone,
} from './cookies';

export type { SetCookie, CookieAttributes, CookieTransport, SameSite } from './cookies';

// =============================================================================
// Errors
// =============================================================================

export {
    HttpStatus,
    ErrorCodes,
    getAllErrorCodeMessages,
    getErrorCodeMessage,
    LoginFlowError,
    BadRequestError,
    NoStateError,
    StageMismatchError,
    UnknownAuthSourceError,
    AuthenticationError,
} from './errors';

export type { HttpStatusCode, ErrorCodeMessage, ErrorCodeCatalog, KnownErrorCode } from './errors';

// =============================================================================
// Cryptographic Utilities
// =============================================================================

export { generateStateId, isValidStateId } from './crypto';

// =============================================================================
// Constants
// =============================================================================

export {
    AuthStages,
    STATE_VERSION,
    KeyPrefixes,
    EntityTypes,
    AUTH_STATE_PARAM,
    FormFields,
    CHECKBOX_CHECKED,
    RememberedFields,
    CookieLifetimes,
    AuthMethods,
} from './constants';

export type { AuthStage, RememberedField, AuthMethod } from './constants';
