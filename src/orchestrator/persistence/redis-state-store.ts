/**
 * Redis persistence for orchestrator snapshots
 */

import { createClient } from 'redis';
import { StateStore } from '../interfaces/state-store';
import { OrchestratorSnapshot } from '../interfaces/types';
import { StructuredLogger, errorFields } from '../metrics/logger';
import { deserializeSnapshot, serializeSnapshot } from './serialization';

/**
 * Persistence configuration
 */
export interface RedisStateStoreConfig {
  redisUrl: string;
  stateKey: string;
}

export const DEFAULT_STATE_KEY = 'orchestrator:state';

type RedisClient = ReturnType<typeof createClient>;

/**
 * RedisStateStore saves the latest snapshot as one JSON document
 */
export class RedisStateStore implements StateStore {
  private client: RedisClient | null = null;
  private config: RedisStateStoreConfig;
  private logger: StructuredLogger;
  private connected: boolean = false;

  constructor(
    config: Partial<RedisStateStoreConfig> & { redisUrl: string },
    logger: StructuredLogger = new StructuredLogger()
  ) {
    this.config = {
      stateKey: DEFAULT_STATE_KEY,
      ...config,
    };
    this.logger = logger;
  }

  /**
   * Connect to Redis
   */
  async connect(): Promise<void> {
    if (this.connected) return;

    this.client = createClient({ url: this.config.redisUrl });

    this.client.on('error', (err: unknown) => {
      this.logger.error('redis_state_store_error', errorFields(err));
    });

    await this.client.connect();
    this.connected = true;
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.client && this.connected) {
      await this.client.disconnect();
      this.connected = false;
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  async save(snapshot: OrchestratorSnapshot): Promise<void> {
    if (!this.client || !this.connected) {
      throw new Error('Cannot save snapshot: not connected to Redis');
    }

    await this.client.set(this.config.stateKey, serializeSnapshot(snapshot));
  }

  /**
   * Load the stored snapshot; unreadable documents are logged and ignored
   */
  async load(): Promise<OrchestratorSnapshot | null> {
    if (!this.client || !this.connected) {
      this.logger.warn('snapshot_load_skipped', { reason: 'not connected to Redis' });
      return null;
    }

    const data = await this.client.get(this.config.stateKey);
    if (!data) {
      return null;
    }

    try {
      return deserializeSnapshot(data);
    } catch (err) {
      this.logger.error('snapshot_parse_failed', {
        stateKey: this.config.stateKey,
        ...errorFields(err),
      });
      return null;
    }
  }
}
