/**
 * SSO Login - In-Memory State Store
 *
 * Process-local StateStore for local runs and tests. Records are deep-copied on
 * the way in and out so callers can never mutate a stored state.
 */

import type { AuthStage } from '../constants';
import { generateStateId, isValidStateId } from '../crypto';
import { NoStateError, StageMismatchError } from '../errors';
import { DEFAULT_STATE_TTL_SECONDS, assertSaveStage, type StateStore } from './state-store';
import { isStateForStage } from './type-guards';
import type { AuthenticationState, StateForStage } from './types';

interface MemoryEntry {
    stage: AuthStage;
    state: AuthenticationState;
    /** Epoch milliseconds */
    expiresAt: number;
}

export interface MemoryStateStoreOptions {
    ttlSeconds?: number;
    /** Clock, in epoch milliseconds */
    now?: () => number;
}

export class MemoryStateStore implements StateStore {
    private readonly entries = new Map<string, MemoryEntry>();
    private readonly ttlSeconds: number;
    private readonly now: () => number;

    constructor(options: MemoryStateStoreOptions = {}) {
        this.ttlSeconds = options.ttlSeconds ?? DEFAULT_STATE_TTL_SECONDS;
        this.now = options.now ?? Date.now;
    }

    async save<S extends AuthStage>(state: StateForStage<S>, stage: S): Promise<string> {
        assertSaveStage(state, stage);
        this.purgeExpired();

        let stateId = generateStateId();
        while (this.entries.has(stateId)) {
            stateId = generateStateId();
        }

        this.entries.set(stateId, {
            stage,
            state: structuredClone(state),
            expiresAt: this.now() + this.ttlSeconds * 1000,
        });
        return stateId;
    }

    async load<S extends AuthStage>(stateId: string, stage: S): Promise<StateForStage<S>> {
        if (!isValidStateId(stateId)) {
            throw new NoStateError(stateId);
        }

        const entry = this.entries.get(stateId);
        if (!entry) {
            throw new NoStateError(stateId);
        }
        if (entry.expiresAt <= this.now()) {
            this.entries.delete(stateId);
            throw new NoStateError(stateId);
        }
        if (entry.stage !== stage) {
            throw new StageMismatchError(stateId, entry.stage, stage);
        }

        const copy: unknown = structuredClone(entry.state);
        if (!isStateForStage(copy, stage)) {
            throw new NoStateError(stateId);
        }
        return copy;
    }

    /** Number of stored records, including expired ones not yet purged */
    get size(): number {
        return this.entries.size;
    }

    private purgeExpired(): void {
        const now = this.now();
        for (const [stateId, entry] of this.entries) {
            if (entry.expiresAt <= now) {
                this.entries.delete(stateId);
            }
        }
    }
}
