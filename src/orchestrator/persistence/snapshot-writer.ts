/**
 * Snapshot Writer - Serializes saves to a state store
 */

import { StateStore } from '../interfaces/state-store';
import { OrchestratorSnapshot } from '../interfaces/types';
import { StructuredLogger, errorFields } from '../metrics/logger';

/**
 * SnapshotWriter keeps at most one save in flight.
 * Snapshots scheduled while a save runs are coalesced; only the latest is written.
 */
export class SnapshotWriter {
  private store: StateStore;
  private logger: StructuredLogger;
  private latest: OrchestratorSnapshot | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(store: StateStore, logger: StructuredLogger = new StructuredLogger()) {
    this.store = store;
    this.logger = logger;
  }

  schedule(snapshot: OrchestratorSnapshot): void {
    this.latest = snapshot;
    if (this.inFlight) {
      return;
    }

    this.inFlight = this.drain().finally(() => {
      this.inFlight = null;
      if (this.latest) {
        this.schedule(this.latest);
      }
    });
  }

  /**
   * Wait until every scheduled snapshot has been written
   */
  async flush(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private async drain(): Promise<void> {
    while (this.latest) {
      const snapshot = this.latest;
      this.latest = null;

      try {
        await this.store.save(snapshot);
      } catch (err) {
        this.logger.error('snapshot_save_failed', {
          tasks: snapshot.tasks.length,
          workers: snapshot.workers.length,
          ...errorFields(err),
        });
      }
    }
  }
}
