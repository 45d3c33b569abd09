/**
 * SSO Login - Password Verification
 *
 * Argon2id verification of an encoded hash (`$argon2id$v=19$...`).
 */

import { argon2Verify } from 'hash-wasm';
import type { Logger } from '@sso-login/shared';

/**
 * A malformed hash counts as a failed verification; the error is logged.
 */
export async function verifyPassword(password: string, passwordHash: string, log: Logger): Promise<boolean> {
    try {
        return await argon2Verify({ password, hash: passwordHash });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error('Argon2 verification error', { error: message });
        return false;
    }
}
