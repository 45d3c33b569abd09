/**
 * Test Fixtures
 */

import { argon2id } from 'hash-wasm';

/** Fixed clock for every test: Tue, 15 Jan 2030 12:00:00 GMT */
export const TEST_NOW = Date.UTC(2030, 0, 15, 12, 0, 0);

export const TEST_PASSWORDS = {
  alice: 'test-password-alice',
  bob: 'test-password-bob',
  carol: 'test-password-carol',
  dave: 'test-password-dave',
};

export const SOURCE_IDS = {
  userpass: 'src1',
  org: 'org1',
  optionalOrg: 'org2',
};

export const ORGANIZATIONS = [
  { id: 'acme', displayName: 'Acme Corporation' },
  { id: 'globex', displayName: 'Globex' },
];

const hashCache = new Map<string, Promise<string>>();

/**
 * Argon2id encoded hash with minimal cost parameters, cached per password.
 */
export function hashPassword(password: string): Promise<string> {
  let hash = hashCache.get(password);
  if (!hash) {
    hash = argon2id({
      password,
      salt: 'test-salt-0001',
      parallelism: 1,
      iterations: 1,
      memorySize: 64,
      hashLength: 32,
      outputType: 'encoded',
    });
    hashCache.set(password, hash);
  }
  return hash;
}

export const TEST_USERS = {
  alice: { username: 'alice', attributes: { uid: ['alice'], mail: ['alice@example.test'] } },
  bob: { username: 'bob', attributes: { uid: ['bob'] } },
  carol: { username: 'carol', organization: 'acme', attributes: { uid: ['carol'] } },
  dave: { username: 'dave', organization: 'globex', attributes: { uid: ['dave'] } },
};

/** Desktop browser that accepts SameSite=None */
export const MODERN_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Chrome 60 rejects cookies carrying SameSite=None */
export const LEGACY_CHROME_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/60.0.3112.113 Safari/537.36';

/** iOS 12 WebKit treats SameSite=None as Strict */
export const IOS12_USER_AGENT =
  'Mozilla/5.0 (iPhone; CPU iPhone OS 12_1 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/12.0 Mobile/15E148 Safari/604.1';
