import type { IndicatorReading, MacroContext, Verdict } from './market';
import type { RankedRow } from './report';

export type JobStatus = 'never_run' | 'running' | 'ready' | 'failed';

export type TriggerReason = 'manual' | 'scheduled' | 'warmup';

export interface ReportArtifact {
  /** Timestamped archival file name */
  fileName: string;
  filePath: string;
  /** Stable alias that always holds the most recent successful render */
  latestPath: string;
  generatedAt: string;
  byteLength: number;
}

export interface RunSummary {
  runId: string;
  generatedAt: string;
  generatedLabel: string;
  verdict: Verdict;
  positiveCount: number;
  indicatorCount: number;
  indicators: IndicatorReading[];
  macro: MacroContext;
  top: RankedRow[];
  records: RankedRow[];
  degradedSymbols: string[];
}

export interface JobSnapshot {
  version: number;
  status: JobStatus;
  lastSuccessAt: string | null;
  lastAttemptAt: string | null;
  lastError: string | null;
  runningSince: string | null;
  summary: RunSummary | null;
  artifact: ReportArtifact | null;
}

export type RunOutcome =
  | {
      status: 'completed';
      runId: string;
      generatedAt: string;
      artifact: ReportArtifact;
      degradedCount: number;
    }
  | {
      status: 'busy';
      runningSince: string;
      inFlight: TriggerReason;
    }
  | {
      status: 'failed';
      reason: string;
    };
