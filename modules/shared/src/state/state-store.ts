/**
 * SSO Login - State Store Port
 *
 * Durable, TTL-bound mapping from opaque state id to a stage-tagged record.
 *
 * Contract:
 * - save() always creates a new id; a stored record is never updated in place
 * - load() fails with NoStateError for an unknown, malformed or expired id and
 *   with StageMismatchError when the record was saved under another stage
 */

import type { AuthStage } from '../constants';
import { StageMismatchError } from '../errors';
import type { StateForStage } from './types';

export interface StateStore {
    save<S extends AuthStage>(state: StateForStage<S>, stage: S): Promise<string>;
    load<S extends AuthStage>(stateId: string, stage: S): Promise<StateForStage<S>>;
}

/** Default state lifetime: one hour */
export const DEFAULT_STATE_TTL_SECONDS = 3600;

/**
 * Reject a save whose record does not carry the stage it is saved under.
 */
export function assertSaveStage(state: { stage: AuthStage }, stage: AuthStage): void {
    if (state.stage !== stage) {
        throw new StageMismatchError('(unsaved)', state.stage, stage);
    }
}
