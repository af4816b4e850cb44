/**
 * Discovery provider interface for finding running workers
 */

import { WorkerDescriptor } from './types';

/**
 * Interface for worker discovery implementations.
 *
 * This allows dependency injection of different discovery sources:
 * - Redis hash of self-announced workers
 * - Session files on disk
 * - Heartbeat channels
 * - Mock/test implementations
 */
export interface DiscoveryProvider {
  /**
   * Produces descriptors for every worker currently visible to the source.
   * May be slow; never called while the registry or engine is mid-operation.
   */
  discoverAll(): Promise<WorkerDescriptor[]>;

  /**
   * Optional: Open connections to the discovery source
   */
  connect?(): Promise<void>;

  /**
   * Optional: Release connections to the discovery source
   */
  disconnect?(): Promise<void>;
}
