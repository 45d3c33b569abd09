/**
 * SSO Login - State Type Guards
 *
 * Runtime validation of records read back from a state store. A record that
 * fails its guard is treated exactly like an unknown state id.
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import { AuthStages, EntityTypes, KeyPrefixes, STATE_VERSION, type AuthStage } from '../constants';
import type {
    AuthStateError,
    AuthenticatedState,
    StateForStage,
    StateItem,
    UserPassOrgState,
    UserPassState,
} from './types';

// =============================================================================
// Primitive Guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
    return value === undefined || typeof value === 'string';
}

function isStringRecord(value: unknown): value is Record<string, string> {
    return isRecord(value) && Object.values(value).every(entry => typeof entry === 'string');
}

function isStringListRecord(value: unknown): value is Record<string, string[]> {
    return (
        isRecord(value) &&
        Object.values(value).every(
            entry => Array.isArray(entry) && entry.every(item => typeof item === 'string')
        )
    );
}

function isAuthStateError(value: unknown): value is AuthStateError {
    return isRecord(value) && typeof value.code === 'string' && isStringRecord(value.params);
}

// =============================================================================
// Stage Record Guards
// =============================================================================

/**
 * Fields every login-stage record carries.
 */
function hasLoginStateBase(value: Record<string, unknown>): boolean {
    return (
        value.version === STATE_VERSION &&
        typeof value.authSourceId === 'string' &&
        isOptionalString(value.cachedUsername) &&
        isOptionalString(value.returnUrl) &&
        (value.error === undefined || isAuthStateError(value.error))
    );
}

export function isUserPassState(value: unknown): value is UserPassState {
    return (
        isRecord(value) &&
        value.stage === AuthStages.USERPASS &&
        hasLoginStateBase(value) &&
        isOptionalString(value.forcedUsername) &&
        (value.rememberMe === undefined || typeof value.rememberMe === 'boolean')
    );
}

export function isUserPassOrgState(value: unknown): value is UserPassOrgState {
    return (
        isRecord(value) &&
        value.stage === AuthStages.USERPASS_ORG &&
        hasLoginStateBase(value) &&
        isOptionalString(value.cachedOrganization)
    );
}

export function isAuthenticatedState(value: unknown): value is AuthenticatedState {
    return (
        isRecord(value) &&
        value.stage === AuthStages.AUTHENTICATED &&
        value.version === STATE_VERSION &&
        typeof value.authSourceId === 'string' &&
        (value.loginStage === AuthStages.USERPASS || value.loginStage === AuthStages.USERPASS_ORG) &&
        typeof value.username === 'string' &&
        isOptionalString(value.organization) &&
        isStringListRecord(value.attributes) &&
        typeof value.authenticatedAt === 'string' &&
        typeof value.rememberMe === 'boolean' &&
        isOptionalString(value.returnUrl)
    );
}

/**
 * Check that a value is a well-formed record of the given stage.
 */
export function isStateForStage<S extends AuthStage>(value: unknown, stage: S): value is StateForStage<S> {
    switch (stage) {
        case AuthStages.USERPASS:
            return isUserPassState(value);
        case AuthStages.USERPASS_ORG:
            return isUserPassOrgState(value);
        case AuthStages.AUTHENTICATED:
            return isAuthenticatedState(value);
        default:
            return false;
    }
}

// =============================================================================
// Item Guard
// =============================================================================

/**
 * Check if a DynamoDB item is a state item.
 * Key Pattern: PK=STATE#<state_id>, SK=METADATA
 */
export function isStateItem(item: unknown): item is StateItem {
    return (
        isRecord(item) &&
        item.entityType === EntityTypes.AUTH_STATE &&
        typeof item.PK === 'string' &&
        item.PK.startsWith(KeyPrefixes.STATE) &&
        item.SK === 'METADATA' &&
        typeof item.stateId === 'string' &&
        typeof item.stage === 'string' &&
        typeof item.ttl === 'number' &&
        isRecord(item.payload)
    );
}
