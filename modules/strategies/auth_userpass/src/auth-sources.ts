/**
 * SSO Login - Auth Source Configuration
 *
 * Loads the static credential backends from the JSON file named by
 * AUTH_SOURCES_FILE and registers them.
 *
 * File format:
 * {
 *   "sources": [
 *     { "id": "staff", "kind": "userpass", "users": [...], ... },
 *     { "id": "partners", "kind": "userpass_org", "organizations": [...], "users": [...], ... }
 *   ]
 * }
 *
 * Remember flags default to false, `loginLinks` to [] and
 * `requireOrganization` to true.
 */

import { readFileSync } from 'node:fs';
import type { Logger, UserAttributes } from '@sso-login/shared';
import { StaticUserPassOrgSource } from './backends/static-userpass-org';
import { StaticUserPassSource, type StaticUser } from './backends/static-userpass';
import { AuthSourceRegistry } from './source-registry';
import type { CredentialSource, LoginLink, Organization } from './types';

export class AuthSourceConfigError extends Error {
    constructor(path: string, problem: string) {
        super(`Invalid auth source configuration at ${path}: ${problem}`);
        this.name = 'AuthSourceConfigError';
    }
}

// =============================================================================
// Field Readers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, key: string, path: string): string {
    const value = obj[key];
    if (typeof value !== 'string' || value === '') {
        throw new AuthSourceConfigError(`${path}.${key}`, 'expected a non-empty string');
    }
    return value;
}

function readOptionalString(obj: Record<string, unknown>, key: string, path: string): string | undefined {
    const value = obj[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new AuthSourceConfigError(`${path}.${key}`, 'expected a string');
    }
    return value;
}

function readFlag(obj: Record<string, unknown>, key: string, path: string, defaultValue: boolean): boolean {
    const value = obj[key];
    if (value === undefined) {
        return defaultValue;
    }
    if (typeof value !== 'boolean') {
        throw new AuthSourceConfigError(`${path}.${key}`, 'expected a boolean');
    }
    return value;
}

function readList<T>(
    obj: Record<string, unknown>,
    key: string,
    path: string,
    readItem: (item: Record<string, unknown>, itemPath: string) => T
): T[] {
    const value = obj[key];
    if (value === undefined) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new AuthSourceConfigError(`${path}.${key}`, 'expected an array');
    }
    return value.map((item: unknown, index) => {
        const itemPath = `${path}.${key}[${index}]`;
        if (!isRecord(item)) {
            throw new AuthSourceConfigError(itemPath, 'expected an object');
        }
        return readItem(item, itemPath);
    });
}

function readAttributes(value: unknown, path: string): UserAttributes {
    if (value === undefined) {
        return {};
    }
    if (!isRecord(value)) {
        throw new AuthSourceConfigError(path, 'expected an object of string arrays');
    }

    const attributes: UserAttributes = {};
    for (const [name, values] of Object.entries(value)) {
        if (!Array.isArray(values) || !values.every((entry: unknown) => typeof entry === 'string')) {
            throw new AuthSourceConfigError(`${path}.${name}`, 'expected an array of strings');
        }
        attributes[name] = values.map(String);
    }
    return attributes;
}

function readLink(item: Record<string, unknown>, path: string): LoginLink {
    return { href: readString(item, 'href', path), text: readString(item, 'text', path) };
}

function readOrganization(item: Record<string, unknown>, path: string): Organization {
    return { id: readString(item, 'id', path), displayName: readString(item, 'displayName', path) };
}

function readUser(item: Record<string, unknown>, path: string): StaticUser {
    return {
        username: readString(item, 'username', path),
        passwordHash: readString(item, 'passwordHash', path),
        attributes: readAttributes(item.attributes, `${path}.attributes`),
        organization: readOptionalString(item, 'organization', path),
    };
}

// =============================================================================
// Source Parsing
// =============================================================================

function parseSource(item: Record<string, unknown>, path: string, log: Logger): CredentialSource {
    const authId = readString(item, 'id', path);
    const common = {
        authId,
        rememberUsernameEnabled: readFlag(item, 'rememberUsernameEnabled', path, false),
        rememberUsernameChecked: readFlag(item, 'rememberUsernameChecked', path, false),
        loginLinks: readList(item, 'loginLinks', path, readLink),
        users: readList(item, 'users', path, readUser),
    };

    const kind = readString(item, 'kind', path);
    switch (kind) {
        case 'userpass':
            return new StaticUserPassSource(
                {
                    ...common,
                    rememberMeEnabled: readFlag(item, 'rememberMeEnabled', path, false),
                    rememberMeChecked: readFlag(item, 'rememberMeChecked', path, false),
                },
                log
            );
        case 'userpass_org': {
            const requireOrganization = readFlag(item, 'requireOrganization', path, true);
            const organizations = readList(item, 'organizations', path, readOrganization);
            if (requireOrganization && organizations.length === 0) {
                throw new AuthSourceConfigError(
                    `${path}.organizations`,
                    'expected at least one organization when requireOrganization is true'
                );
            }
            return new StaticUserPassOrgSource(
                {
                    ...common,
                    rememberOrganizationEnabled: readFlag(item, 'rememberOrganizationEnabled', path, false),
                    rememberOrganizationChecked: readFlag(item, 'rememberOrganizationChecked', path, false),
                    requireOrganization,
                    organizations,
                },
                log
            );
        }
        default:
            throw new AuthSourceConfigError(`${path}.kind`, `unknown kind '${kind}'`);
    }
}

/**
 * Build the registry from an already-parsed configuration document.
 */
export function parseAuthSources(document: unknown, log: Logger): AuthSourceRegistry {
    if (!isRecord(document)) {
        throw new AuthSourceConfigError('$', 'expected an object');
    }

    const registry = new AuthSourceRegistry();
    for (const source of readList(document, 'sources', '$', (item, path) => parseSource(item, path, log))) {
        registry.register(source);
    }
    return registry;
}

export function loadAuthSources(filePath: string, log: Logger): AuthSourceRegistry {
    const document: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    return parseAuthSources(document, log);
}
