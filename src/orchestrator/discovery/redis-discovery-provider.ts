/**
 * Redis Discovery Provider - Reads self-announced workers from a Redis hash
 */

import Redis from 'ioredis';
import { DiscoveryProvider } from '../interfaces/discovery';
import { WorkerDescriptor } from '../interfaces/types';
import { StructuredLogger, errorFields } from '../metrics/logger';

/**
 * Configuration for RedisDiscoveryProvider
 */
export interface RedisDiscoveryConfig {
  redisUrl: string;
  discoveryKey: string;
}

export const DEFAULT_DISCOVERY_KEY = 'orchestrator:workers';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one hash entry. The hash field doubles as the id when the
 * payload does not carry one.
 */
export function parseDescriptor(field: string, value: string): WorkerDescriptor {
  const raw: unknown = JSON.parse(value);
  if (!isRecord(raw)) {
    throw new Error('descriptor is not an object');
  }

  const id = typeof raw.id === 'string' && raw.id ? raw.id : field;

  if (typeof raw.resourceContext !== 'string') {
    throw new Error('resourceContext must be a string');
  }

  let lastActivity: Date;
  if (typeof raw.lastActivityTimestamp === 'string' || typeof raw.lastActivityTimestamp === 'number') {
    lastActivity = new Date(raw.lastActivityTimestamp);
  } else {
    throw new Error('lastActivityTimestamp must be an ISO string or epoch milliseconds');
  }
  if (Number.isNaN(lastActivity.getTime())) {
    throw new Error('lastActivityTimestamp is not a valid date');
  }

  const descriptor: WorkerDescriptor = {
    id,
    resourceContext: raw.resourceContext,
    sessionRef: typeof raw.sessionRef === 'string' ? raw.sessionRef : '',
    lastActivityTimestamp: lastActivity,
    recentExecutorActivity: raw.recentExecutorActivity === true,
  };
  if (typeof raw.name === 'string') {
    descriptor.name = raw.name;
  }
  if (typeof raw.kind === 'string') {
    descriptor.kind = raw.kind;
  }
  return descriptor;
}

/**
 * RedisDiscoveryProvider lists workers from HGETALL <discoveryKey>.
 * Entries that fail to parse are logged and left out of the batch.
 */
export class RedisDiscoveryProvider implements DiscoveryProvider {
  private redis: Redis | null = null;
  private config: RedisDiscoveryConfig;
  private logger: StructuredLogger;

  constructor(
    config: Partial<RedisDiscoveryConfig> & { redisUrl: string },
    logger: StructuredLogger = new StructuredLogger()
  ) {
    this.config = {
      discoveryKey: DEFAULT_DISCOVERY_KEY,
      ...config,
    };
    this.logger = logger;
  }

  /**
   * Connect to Redis
   */
  async connect(): Promise<void> {
    this.redis = new Redis(this.config.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) {
          return null; // Stop retrying
        }
        return Math.min(times * 100, 3000);
      },
    });

    await this.redis.ping();
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.redis) {
      await this.redis.quit();
      this.redis = null;
    }
  }

  async discoverAll(): Promise<WorkerDescriptor[]> {
    if (!this.redis) {
      throw new Error('Not connected to Redis. Call connect() first.');
    }

    const entries = await this.redis.hgetall(this.config.discoveryKey);
    const descriptors: WorkerDescriptor[] = [];

    for (const [field, value] of Object.entries(entries)) {
      try {
        descriptors.push(parseDescriptor(field, value));
      } catch (err) {
        this.logger.warn('discovery_entry_unreadable', {
          field,
          ...errorFields(err),
        });
      }
    }

    return descriptors;
  }
}
