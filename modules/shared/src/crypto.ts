/**
 * SSO Login - Cryptographic Utilities
 *
 * Random identifier generation for authentication state.
 * Uses the Node.js CSPRNG (backed by OS entropy).
 */

import { randomBytes } from 'node:crypto';

// =============================================================================
// Constants
// =============================================================================

/** Entropy bytes in a state identifier (40 hex characters) */
const STATE_ID_ENTROPY_BYTES = 20;

const STATE_ID_PATTERN = /^_[0-9a-f]{40}$/;

// =============================================================================
// State Identifiers
// =============================================================================

/**
 * Generate an opaque state identifier.
 * Format: an underscore followed by 40 lowercase hex characters, so the id is
 * never mistaken for a number and is safe in URLs without encoding.
 */
export function generateStateId(): string {
    return `_${randomBytes(STATE_ID_ENTROPY_BYTES).toString('hex')}`;
}

/**
 * Check that a value has the shape of a state identifier.
 */
export function isValidStateId(value: string): boolean {
    return STATE_ID_PATTERN.test(value);
}
