/**
 * State store interface for snapshot persistence
 */

import { OrchestratorSnapshot } from './types';

/**
 * Persists orchestrator snapshots for crash recovery.
 * Storage medium and format belong to the implementation.
 */
export interface StateStore {
  save(snapshot: OrchestratorSnapshot): Promise<void>;

  /**
   * @returns The last saved snapshot, or null when nothing usable is stored
   */
  load(): Promise<OrchestratorSnapshot | null>;

  connect?(): Promise<void>;

  disconnect?(): Promise<void>;
}
