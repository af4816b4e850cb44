/**
 * In-memory state store, used when no Redis URL is configured
 */

import { StateStore } from '../interfaces/state-store';
import { OrchestratorSnapshot } from '../interfaces/types';
import { deserializeSnapshot, serializeSnapshot } from './serialization';

export class InMemoryStateStore implements StateStore {
  private data: string | null = null;
  private saves: number = 0;

  async save(snapshot: OrchestratorSnapshot): Promise<void> {
    this.data = serializeSnapshot(snapshot);
    this.saves++;
  }

  async load(): Promise<OrchestratorSnapshot | null> {
    return this.data ? deserializeSnapshot(this.data) : null;
  }

  /**
   * Number of completed saves
   */
  getSaveCount(): number {
    return this.saves;
  }
}
