/**
 * SSO Login - State Module
 *
 * @module state
 */

export type {
    AuthStateError,
    UserPassState,
    UserPassOrgState,
    LoginState,
    AuthenticatedState,
    AuthenticationState,
    StateForStage,
    StateItem,
    UserAttributes,
} from './types';

export type { StateStore } from './state-store';
export { DEFAULT_STATE_TTL_SECONDS } from './state-store';

export { MemoryStateStore } from './memory-state-store';
export type { MemoryStateStoreOptions } from './memory-state-store';

export { DynamoStateStore, toStateItem, fromStateItem } from './dynamo-state-store';
export type { DynamoStateStoreConfig } from './dynamo-state-store';

export {
    isUserPassState,
    isUserPassOrgState,
    isAuthenticatedState,
    isStateForStage,
    isStateItem,
} from './type-guards';

export { withRetry, isRetryableError, calculateDelay, DEFAULT_RETRY_CONFIG } from './retry';
export type { RetryConfig } from './retry';
