/**
 * SSO Login - Static Username/Password Backend
 *
 * Verifies credentials against users listed in the auth sources file.
 * An unknown user and a wrong password fail the same way (WRONGUSERPASS).
 */

import { AuthenticationError, type Logger, type UserAttributes } from '@sso-login/shared';
import type { LoginLink, UserPassSource, VerifiedUser } from '../types';
import { verifyPassword } from './password';

export interface StaticUser {
    username: string;
    /** Argon2id encoded hash */
    passwordHash: string;
    attributes: UserAttributes;
    /** Organization id the user belongs to */
    organization?: string;
}

export interface RememberOptions {
    rememberUsernameEnabled: boolean;
    rememberUsernameChecked: boolean;
    loginLinks: LoginLink[];
}

export interface StaticUserPassConfig extends RememberOptions {
    authId: string;
    rememberMeEnabled: boolean;
    rememberMeChecked: boolean;
    users: StaticUser[];
}

/**
 * Index users by username. Later entries do not override earlier ones.
 */
export function indexUsers(users: StaticUser[]): Map<string, StaticUser> {
    const index = new Map<string, StaticUser>();
    for (const user of users) {
        if (!index.has(user.username)) {
            index.set(user.username, user);
        }
    }
    return index;
}

export class StaticUserPassSource implements UserPassSource {
    readonly kind = 'userpass' as const;
    readonly authId: string;
    readonly rememberUsernameEnabled: boolean;
    readonly rememberUsernameChecked: boolean;
    readonly rememberMeEnabled: boolean;
    readonly rememberMeChecked: boolean;
    readonly loginLinks: LoginLink[];

    private readonly users: Map<string, StaticUser>;
    private readonly log: Logger;

    constructor(config: StaticUserPassConfig, log: Logger) {
        this.authId = config.authId;
        this.rememberUsernameEnabled = config.rememberUsernameEnabled;
        this.rememberUsernameChecked = config.rememberUsernameChecked;
        this.rememberMeEnabled = config.rememberMeEnabled;
        this.rememberMeChecked = config.rememberMeChecked;
        this.loginLinks = config.loginLinks;
        this.users = indexUsers(config.users);
        this.log = log;
    }

    async login(username: string, password: string): Promise<VerifiedUser> {
        const user = this.users.get(username);
        if (!user || !(await verifyPassword(password, user.passwordHash, this.log))) {
            throw new AuthenticationError('WRONGUSERPASS');
        }

        return {
            attributes: structuredClone(user.attributes),
            organization: user.organization,
        };
    }
}
