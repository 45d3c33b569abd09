/**
 * STA-02: DynamoDB State Item Mapping
 *
 * Items follow the single-table key pattern PK=STATE#<id>, SK=METADATA.
 * A read-back item is checked for shape, id, TTL and stage before its payload
 * is returned, since DynamoDB TTL deletion lags.
 */

import { describe, it, expect } from 'vitest';
import {
  AuthStages,
  NoStateError,
  STATE_VERSION,
  StageMismatchError,
  fromStateItem,
  toStateItem,
  type UserPassOrgState,
} from '@sso-login/shared';
import { TEST_NOW } from '../fixtures';

const STATE_ID = `_${'ab'.repeat(20)}`;

const state: UserPassOrgState = {
  stage: AuthStages.USERPASS_ORG,
  version: STATE_VERSION,
  authSourceId: 'org1',
  cachedOrganization: 'acme',
};

function storedItem(): Record<string, unknown> {
  return { ...toStateItem(STATE_ID, state, 3600, TEST_NOW) };
}

describe('STA-02: DynamoDB State Item Mapping', () => {
  it('should build the single-table item', () => {
    expect(toStateItem(STATE_ID, state, 3600, TEST_NOW)).toEqual({
      PK: `STATE#${STATE_ID}`,
      SK: 'METADATA',
      entityType: 'AUTH_STATE',
      stateId: STATE_ID,
      stage: 'USERPASS_ORG',
      payload: state,
      ttl: TEST_NOW / 1000 + 3600,
      createdAt: '2030-01-15T12:00:00.000Z',
    });
  });

  it('should return the payload of a live item', () => {
    expect(fromStateItem(storedItem(), STATE_ID, AuthStages.USERPASS_ORG, TEST_NOW)).toEqual(state);
  });

  it('should treat a missing item as no state', () => {
    expect(() => fromStateItem(undefined, STATE_ID, AuthStages.USERPASS_ORG, TEST_NOW)).toThrow(NoStateError);
  });

  it('should treat an item past its TTL as no state', () => {
    const expiredAt = TEST_NOW + 3600 * 1000;
    expect(() => fromStateItem(storedItem(), STATE_ID, AuthStages.USERPASS_ORG, expiredAt)).toThrow(NoStateError);
  });

  it('should reject an item stored for another id', () => {
    const otherId = `_${'cd'.repeat(20)}`;
    expect(() => fromStateItem(storedItem(), otherId, AuthStages.USERPASS_ORG, TEST_NOW)).toThrow(NoStateError);
  });

  it('should report a stage mismatch', () => {
    expect(() => fromStateItem(storedItem(), STATE_ID, AuthStages.USERPASS, TEST_NOW)).toThrow(StageMismatchError);
  });

  it('should reject a payload that fails validation', () => {
    const item = { ...storedItem(), payload: { ...state, version: 2 } };
    expect(() => fromStateItem(item, STATE_ID, AuthStages.USERPASS_ORG, TEST_NOW)).toThrow(NoStateError);
  });
});
