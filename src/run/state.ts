/**
 * In-memory store for the published job snapshot
 * Written only by the orchestrator, read by the query facade
 */

import type { JobSnapshot, ReportArtifact, RunSummary } from '@/types/job';

export const INITIAL_SNAPSHOT: Readonly<JobSnapshot> = Object.freeze({
  version: 0,
  status: 'never_run',
  lastSuccessAt: null,
  lastAttemptAt: null,
  lastError: null,
  runningSince: null,
  summary: null,
  artifact: null,
});

function freezeEach<T extends object>(items: readonly T[]): void {
  items.forEach((item) => Object.freeze(item));
  Object.freeze(items);
}

/** Readers get the summary by reference, so rows and arrays are frozen as well */
function freezeSummary(summary: RunSummary): void {
  freezeEach(summary.records);
  freezeEach(summary.top);
  freezeEach(summary.indicators);
  freezeEach(summary.macro);
  Object.freeze(summary.degradedSymbols);
  Object.freeze(summary);
}

function freezeSnapshot(snapshot: JobSnapshot): Readonly<JobSnapshot> {
  if (snapshot.summary) {
    freezeSummary(snapshot.summary);
  }
  if (snapshot.artifact) {
    Object.freeze(snapshot.artifact);
  }
  return Object.freeze(snapshot);
}

export class JobStateStore {
  private current: Readonly<JobSnapshot> = INITIAL_SNAPSHOT;

  get(): Readonly<JobSnapshot> {
    return this.current;
  }

  /**
   * Swap in a new snapshot derived from the current one. Readers holding the
   * previous reference keep a complete, unchanged view.
   */
  private publish(update: Omit<Partial<JobSnapshot>, 'version'>): Readonly<JobSnapshot> {
    const next = freezeSnapshot({ ...this.current, ...update, version: this.current.version + 1 });
    this.current = next;
    return next;
  }

  markRunning(startedAt: string): Readonly<JobSnapshot> {
    return this.publish({ status: 'running', runningSince: startedAt, lastAttemptAt: startedAt });
  }

  markReady(summary: RunSummary, artifact: ReportArtifact, completedAt: string): Readonly<JobSnapshot> {
    return this.publish({
      status: 'ready',
      summary,
      artifact,
      lastSuccessAt: completedAt,
      lastError: null,
      runningSince: null,
    });
  }

  /** Keeps the previous summary, artifact and lastSuccessAt visible */
  markFailed(error: string): Readonly<JobSnapshot> {
    return this.publish({ status: 'failed', lastError: error, runningSince: null });
  }
}
