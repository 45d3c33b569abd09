/**
 * SSO Login - Static Username/Password/Organization Backend
 *
 * Users belong to at most one configured organization. With
 * `requireOrganization` the form must offer the organization list and the
 * chosen organization must be the user's own. Without it no list is offered,
 * and an organization is only checked when one was still submitted.
 */

import { AuthenticationError, type Logger } from '@sso-login/shared';
import type { LoginLink, Organization, UserPassOrgSource, VerifiedUser } from '../types';
import { verifyPassword } from './password';
import { indexUsers, type RememberOptions, type StaticUser } from './static-userpass';

export interface StaticUserPassOrgConfig extends RememberOptions {
    authId: string;
    rememberOrganizationEnabled: boolean;
    rememberOrganizationChecked: boolean;
    requireOrganization: boolean;
    organizations: Organization[];
    users: StaticUser[];
}

export class StaticUserPassOrgSource implements UserPassOrgSource {
    readonly kind = 'userpass_org' as const;
    readonly authId: string;
    readonly rememberUsernameEnabled: boolean;
    readonly rememberUsernameChecked: boolean;
    readonly rememberOrganizationEnabled: boolean;
    readonly rememberOrganizationChecked: boolean;
    readonly loginLinks: LoginLink[];

    private readonly requireOrganization: boolean;
    private readonly organizations: Organization[];
    private readonly users: Map<string, StaticUser>;
    private readonly log: Logger;

    constructor(config: StaticUserPassOrgConfig, log: Logger) {
        this.authId = config.authId;
        this.rememberUsernameEnabled = config.rememberUsernameEnabled;
        this.rememberUsernameChecked = config.rememberUsernameChecked;
        this.rememberOrganizationEnabled = config.rememberOrganizationEnabled;
        this.rememberOrganizationChecked = config.rememberOrganizationChecked;
        this.loginLinks = config.loginLinks;
        this.requireOrganization = config.requireOrganization;
        this.organizations = config.organizations;
        this.users = indexUsers(config.users);
        this.log = log;
    }

    async getOrganizations(): Promise<Organization[] | null> {
        if (!this.requireOrganization) {
            return null;
        }
        return this.organizations.map(org => ({ ...org }));
    }

    async login(username: string, password: string, organization: string): Promise<VerifiedUser> {
        const user = this.users.get(username);
        if (!user || !(await verifyPassword(password, user.passwordHash, this.log))) {
            throw new AuthenticationError('WRONGUSERPASS');
        }

        if (this.requireOrganization || organization !== '') {
            const known = this.organizations.some(org => org.id === organization);
            if (!known || user.organization !== organization) {
                throw new AuthenticationError('WRONGUSERPASS');
            }
        }

        return {
            attributes: structuredClone(user.attributes),
            organization: organization !== '' ? organization : user.organization,
        };
    }
}
