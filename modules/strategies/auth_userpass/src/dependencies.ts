/**
 * SSO Login - Service Wiring
 *
 * Builds the state store, auth source registry and completion continuation from
 * the environment configuration. Built once per container and reused across
 * warm invocations.
 */

import { DynamoStateStore, Logger, MemoryStateStore, type StateStore } from '@sso-login/shared';
import { loadAuthSources } from './auth-sources';
import { getLoginConfig } from './config';
import { createRedirectCompletion } from './login-flow';
import type { LoginEnvConfig, LoginServices } from './types';

let servicesCache: LoginServices | null = null;

function createStateStore(config: LoginEnvConfig): StateStore {
    if (config.state.backend === 'dynamodb') {
        return new DynamoStateStore({
            tableName: config.state.tableName,
            ttlSeconds: config.stateTtlSeconds,
        });
    }
    return new MemoryStateStore({ ttlSeconds: config.stateTtlSeconds });
}

export function getLoginServices(): LoginServices {
    if (servicesCache) {
        return servicesCache;
    }

    const config = getLoginConfig();
    const log = new Logger('init');

    const sources = loadAuthSources(config.authSourcesFile, log);
    log.info('Auth sources loaded', { ids: sources.ids(), stateBackend: config.state.backend });

    servicesCache = {
        store: createStateStore(config),
        sources,
        completion: createRedirectCompletion(config.callbackUrl),
        now: Date.now,
    };
    return servicesCache;
}

/**
 * Clear cached services (useful for testing).
 */
export function clearServicesCache(): void {
    servicesCache = null;
}
