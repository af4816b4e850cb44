/**
 * Resource context helpers - path normalization and per-repository grouping
 */

import { RepositorySummary, Worker } from '../interfaces/types';

/**
 * Normalize a resource context for comparison.
 * Backslashes become forward slashes, trailing separators are dropped
 * and the result is lower-cased, so `C:\repo\` and `c:/repo` compare equal.
 */
export function normalizeContext(context: string): string {
  return context.trim().replace(/\\/g, '/').replace(/\/+$/, '').toLowerCase();
}

/**
 * Check whether two resource contexts refer to the same repository
 */
export function contextsMatch(a: string, b: string): boolean {
  return normalizeContext(a) === normalizeContext(b);
}

/**
 * Last path segment of a context, used as the repository display name
 */
export function contextName(context: string): string {
  const segments = context.trim().replace(/\\/g, '/').replace(/\/+$/, '').split('/');
  return segments[segments.length - 1] || context;
}

/**
 * Group workers by normalized resource context.
 * The first worker seen for a context supplies the displayed path.
 */
export function summarizeByContext(workers: Worker[]): RepositorySummary[] {
  const groups = new Map<string, RepositorySummary>();

  for (const worker of workers) {
    const key = normalizeContext(worker.resourceContext);
    let summary = groups.get(key);
    if (!summary) {
      summary = {
        name: contextName(worker.resourceContext),
        path: worker.resourceContext,
        workers: [],
        idleCount: 0,
        busyCount: 0,
        errorCount: 0,
        offlineCount: 0,
      };
      groups.set(key, summary);
    }

    summary.workers.push(worker);
    switch (worker.status) {
      case 'idle':
        summary.idleCount++;
        break;
      case 'busy':
        summary.busyCount++;
        break;
      case 'error':
        summary.errorCount++;
        break;
      case 'offline':
        summary.offlineCount++;
        break;
    }
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([, summary]) => summary);
}
