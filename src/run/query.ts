/**
 * Read-only projection of the published job snapshot for external callers.
 * Never fetches and never waits on an in-flight run.
 */

import { existsSync } from 'fs';
import { downloadFileName } from './files';
import type { JobStatus, RunOutcome, RunSummary } from '@/types/job';
import type { JobStateStore } from './state';

export type SummaryView =
  | {
      kind: 'ready';
      status: JobStatus;
      version: number;
      lastSuccessAt: string;
      lastError: string | null;
      summary: RunSummary;
    }
  | {
      kind: 'no_data';
      status: JobStatus;
      lastError: string | null;
    };

export type ArtifactView =
  | { available: true; filePath: string; fileName: string; downloadName: string }
  | { available: false; reason: string };

export interface RefreshTrigger {
  trigger(reason: 'manual'): Promise<RunOutcome>;
}

export class QueryFacade {
  constructor(
    private readonly store: JobStateStore,
    private readonly orchestrator: RefreshTrigger,
    private readonly timeZone: string
  ) {}

  getSummary(): SummaryView {
    const snapshot = this.store.get();
    if (!snapshot.summary || !snapshot.lastSuccessAt) {
      return { kind: 'no_data', status: snapshot.status, lastError: snapshot.lastError };
    }
    return {
      kind: 'ready',
      status: snapshot.status,
      version: snapshot.version,
      lastSuccessAt: snapshot.lastSuccessAt,
      lastError: snapshot.lastError,
      summary: snapshot.summary,
    };
  }

  triggerRefresh(): Promise<RunOutcome> {
    return this.orchestrator.trigger('manual');
  }

  getArtifact(): ArtifactView {
    const { artifact } = this.store.get();
    if (!artifact) {
      return { available: false, reason: 'No report has been generated yet' };
    }
    if (!existsSync(artifact.latestPath)) {
      return { available: false, reason: 'Latest report file is missing' };
    }
    return {
      available: true,
      filePath: artifact.latestPath,
      fileName: artifact.fileName,
      downloadName: downloadFileName(new Date(artifact.generatedAt), this.timeZone),
    };
  }
}
