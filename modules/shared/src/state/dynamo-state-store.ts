/**
 * SSO Login - DynamoDB State Store
 *
 * Single Table Design storage for authentication state.
 *
 * Key Pattern:
 *   PK: STATE#<state_id>
 *   SK: METADATA
 *
 * Every save is a conditional put (attribute_not_exists(PK)), so two requests
 * racing on the same predecessor state each create their own successor and no
 * record is ever overwritten. DynamoDB TTL deletion can lag by up to 48 hours,
 * so load() also checks `ttl` itself.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { EntityTypes, KeyPrefixes, type AuthStage } from '../constants';
import { generateStateId, isValidStateId } from '../crypto';
import { NoStateError, StageMismatchError } from '../errors';
import { withRetry } from './retry';
import { DEFAULT_STATE_TTL_SECONDS, assertSaveStage, type StateStore } from './state-store';
import { isStateForStage, isStateItem } from './type-guards';
import type { AuthenticationState, StateForStage, StateItem } from './types';

// =============================================================================
// Configuration
// =============================================================================

export interface DynamoStateStoreConfig {
    /** DynamoDB table name (injected from environment) */
    tableName: string;
    ttlSeconds?: number;
    /** AWS region (optional, defaults to environment) */
    region?: string;
}

// =============================================================================
// Item Mapping
// =============================================================================

/**
 * Build the item stored for a state.
 */
export function toStateItem(
    stateId: string,
    state: AuthenticationState,
    ttlSeconds: number,
    now: number = Date.now()
): StateItem {
    return {
        PK: `${KeyPrefixes.STATE}${stateId}`,
        SK: 'METADATA',
        entityType: EntityTypes.AUTH_STATE,
        stateId,
        stage: state.stage,
        payload: state,
        ttl: Math.floor(now / 1000) + ttlSeconds,
        createdAt: new Date(now).toISOString(),
    };
}

/**
 * Validate an item read back for `stateId` and return its record.
 *
 * @throws NoStateError when the item is missing, malformed or expired
 * @throws StageMismatchError when the item was saved under another stage
 */
export function fromStateItem<S extends AuthStage>(
    item: Record<string, unknown> | undefined,
    stateId: string,
    stage: S,
    now: number = Date.now()
): StateForStage<S> {
    if (!isStateItem(item) || item.stateId !== stateId) {
        throw new NoStateError(stateId);
    }
    if (item.ttl <= Math.floor(now / 1000)) {
        throw new NoStateError(stateId);
    }
    if (item.stage !== stage) {
        throw new StageMismatchError(stateId, item.stage, stage);
    }

    const payload: unknown = item.payload;
    if (!isStateForStage(payload, stage)) {
        throw new NoStateError(stateId);
    }
    return payload;
}

// =============================================================================
// Store
// =============================================================================

export class DynamoStateStore implements StateStore {
    private readonly client: DynamoDBDocumentClient;
    private readonly tableName: string;
    private readonly ttlSeconds: number;

    constructor(config: DynamoStateStoreConfig) {
        this.tableName = config.tableName;
        this.ttlSeconds = config.ttlSeconds ?? DEFAULT_STATE_TTL_SECONDS;

        const dynamoClient = new DynamoDBClient({
            region: config.region,
        });

        this.client = DynamoDBDocumentClient.from(dynamoClient, {
            marshallOptions: {
                removeUndefinedValues: true,
            },
        });
    }

    async save<S extends AuthStage>(state: StateForStage<S>, stage: S): Promise<string> {
        assertSaveStage(state, stage);

        const stateId = generateStateId();
        const item = toStateItem(stateId, state, this.ttlSeconds);

        await withRetry(async () => {
            return this.client.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: { ...item },
                    ConditionExpression: 'attribute_not_exists(PK)',
                })
            );
        });

        return stateId;
    }

    async load<S extends AuthStage>(stateId: string, stage: S): Promise<StateForStage<S>> {
        if (!isValidStateId(stateId)) {
            throw new NoStateError(stateId);
        }

        const result = await withRetry(async () => {
            return this.client.send(
                new GetCommand({
                    TableName: this.tableName,
                    Key: {
                        PK: `${KeyPrefixes.STATE}${stateId}`,
                        SK: 'METADATA',
                    },
                    ConsistentRead: true,
                })
            );
        });

        return fromStateItem(result.Item, stateId, stage);
    }
}
