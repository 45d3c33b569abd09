/**
 * SSO Login - Username/Password Strategy Configuration
 *
 * Centralized environment configuration with validation.
 * All configuration values are injected via Terraform environment variables.
 */

import { DEFAULT_STATE_TTL_SECONDS } from '@sso-login/shared';
import type { LoginEnvConfig, StateBackendConfig } from './types';

// =============================================================================
// Configuration Defaults
// =============================================================================

const DEFAULTS = {
    STATE_BACKEND: 'dynamodb',
    STATE_TTL_SECONDS: DEFAULT_STATE_TTL_SECONDS,
    CALLBACK_URL: '/authorize/callback',
    BRAND_NAME: 'SSO Login',
} as const;

// =============================================================================
// Environment Validation
// =============================================================================

/**
 * Validates that a required environment variable is present.
 * @throws Error if the variable is missing
 */
function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

function optionalNumericEnv(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed <= 0) {
        throw new Error(`Invalid numeric value for ${name}: ${value}`);
    }
    return parsed;
}

/**
 * Boolean flag: only the literal 'false' turns a default-on flag off.
 */
function optionalFlagEnv(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    return value !== 'false';
}

function stateBackendFromEnv(): StateBackendConfig {
    const backend = optionalEnv('STATE_BACKEND', DEFAULTS.STATE_BACKEND);
    switch (backend) {
        case 'dynamodb':
            return { backend: 'dynamodb', tableName: requireEnv('TABLE_NAME') };
        case 'memory':
            return { backend: 'memory' };
        default:
            throw new Error(`Invalid value for STATE_BACKEND: ${backend}`);
    }
}

// =============================================================================
// Configuration Loader
// =============================================================================

let loginConfigCache: LoginEnvConfig | null = null;

/**
 * Load and validate configuration for the login handlers.
 * Configuration is cached after first load for Lambda warm starts.
 */
export function getLoginConfig(): LoginEnvConfig {
    if (loginConfigCache) {
        return loginConfigCache;
    }

    loginConfigCache = {
        state: stateBackendFromEnv(),
        stateTtlSeconds: optionalNumericEnv('STATE_TTL_SECONDS', DEFAULTS.STATE_TTL_SECONDS),
        authSourcesFile: requireEnv('AUTH_SOURCES_FILE'),
        callbackUrl: optionalEnv('CALLBACK_URL', DEFAULTS.CALLBACK_URL),
        brandName: optionalEnv('BRAND_NAME', DEFAULTS.BRAND_NAME),
        cookieSecure: optionalFlagEnv('COOKIE_SECURE', true),
    };

    return loginConfigCache;
}

/**
 * Clear configuration cache (useful for testing).
 */
export function clearConfigCache(): void {
    loginConfigCache = null;
}
