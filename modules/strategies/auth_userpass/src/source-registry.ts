/**
 * SSO Login - Auth Source Registry
 *
 * Resolves configured credential backends by id. A state names its backend by
 * id, so a backend removed or replaced between rounds surfaces here as an
 * UnknownAuthSourceError.
 */

import { UnknownAuthSourceError } from '@sso-login/shared';
import type { CredentialSource, UserPassOrgSource, UserPassSource } from './types';

export class AuthSourceRegistry {
    private readonly sources = new Map<string, CredentialSource>();

    constructor(sources: Iterable<CredentialSource> = []) {
        for (const source of sources) {
            this.register(source);
        }
    }

    register(source: CredentialSource): void {
        if (this.sources.has(source.authId)) {
            throw new Error(`Duplicate authentication source id: ${source.authId}`);
        }
        this.sources.set(source.authId, source);
    }

    getById(authId: string): CredentialSource | null {
        return this.sources.get(authId) ?? null;
    }

    ids(): string[] {
        return [...this.sources.keys()];
    }
}

export function resolveUserPassSource(registry: AuthSourceRegistry, authId: string): UserPassSource {
    const source = registry.getById(authId);
    if (source === null) {
        throw new UnknownAuthSourceError(authId);
    }
    if (source.kind !== 'userpass') {
        throw new UnknownAuthSourceError(authId, 'Not a username/password authentication source');
    }
    return source;
}

export function resolveUserPassOrgSource(registry: AuthSourceRegistry, authId: string): UserPassOrgSource {
    const source = registry.getById(authId);
    if (source === null) {
        throw new UnknownAuthSourceError(authId);
    }
    if (source.kind !== 'userpass_org') {
        throw new UnknownAuthSourceError(authId, 'Not a username/password/organization authentication source');
    }
    return source;
}
