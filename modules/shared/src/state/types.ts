/**
 * SSO Login - Authentication State Types
 *
 * Authentication state is a tagged, versioned record: each stage has its own
 * explicit fields, and the `stage` discriminator ties a record to the one flow
 * allowed to load it.
 *
 * Lifecycle:
 *   1. Created by the SSO protocol layer (USERPASS or USERPASS_ORG)
 *   2. Re-saved by the login flow on failure (error attached) or on a
 *      remember-me upgrade. Every save issues a new id.
 *   3. Saved as AUTHENTICATED once credentials are verified
 *   4. Expired by the store's TTL, never deleted by the login flow
 */

import type { AuthStages } from '../constants';

// =============================================================================
// Shared Fields
// =============================================================================

/**
 * Failure from the previous verification attempt, kept for display.
 */
export interface AuthStateError {
    /** Opaque backend error code (e.g. WRONGUSERPASS) */
    code: string;
    params: Record<string, string>;
}

interface LoginStateBase {
    /** Record format version */
    version: 1;
    /** Configured id of the backend governing this attempt */
    authSourceId: string;
    /** Username carried over from a prior round or the SSO request */
    cachedUsername?: string;
    error?: AuthStateError;
    /** Passthrough display data about the relying party */
    spMetadata?: unknown;
    /** Where the completion continuation sends the browser */
    returnUrl?: string;
}

// =============================================================================
// Stage Records
// =============================================================================

export interface UserPassState extends LoginStateBase {
    stage: typeof AuthStages.USERPASS;
    /** Username fixed by policy; the form does not let the user edit it */
    forcedUsername?: string;
    /** Sticky once set: the eventual session outlives the normal lifetime */
    rememberMe?: boolean;
}

export interface UserPassOrgState extends LoginStateBase {
    stage: typeof AuthStages.USERPASS_ORG;
    cachedOrganization?: string;
}

export type LoginState = UserPassState | UserPassOrgState;

export type UserAttributes = Record<string, string[]>;

/**
 * State handed to the protocol layer once credentials are verified.
 */
export interface AuthenticatedState {
    stage: typeof AuthStages.AUTHENTICATED;
    version: 1;
    authSourceId: string;
    /** Stage the credentials were collected in */
    loginStage: LoginState['stage'];
    username: string;
    organization?: string;
    attributes: UserAttributes;
    /** ISO 8601 timestamp of verification */
    authenticatedAt: string;
    rememberMe: boolean;
    spMetadata?: unknown;
    returnUrl?: string;
}

export type AuthenticationState = LoginState | AuthenticatedState;

/**
 * The record type stored under a given stage.
 */
export type StateForStage<S extends AuthenticationState['stage']> = Extract<AuthenticationState, { stage: S }>;

// =============================================================================
// DynamoDB Item
// =============================================================================

/**
 * Persisted state item.
 * Key Pattern: PK=STATE#<state_id>, SK=METADATA
 */
export interface StateItem {
    PK: `STATE#${string}`;
    SK: 'METADATA';
    entityType: 'AUTH_STATE';
    stateId: string;
    stage: AuthenticationState['stage'];
    payload: AuthenticationState;
    /** TTL for automatic DynamoDB expiration (Unix epoch seconds) */
    ttl: number;
    /** ISO 8601 creation timestamp */
    createdAt: string;
}
