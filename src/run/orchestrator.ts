/**
 * Job orchestrator
 *
 * Drives fetch -> normalize -> score -> assemble -> promote -> notify -> publish for one
 * run at a time. A trigger that arrives while a run is in flight gets a
 * `busy` outcome; it is neither queued nor allowed to cancel the active run.
 */

import { formatArtifactStamp } from '@/core/time';
import {
  fetchBenchmarkReadings,
  placeholderReading,
} from '@/lib/marketContext';
import { buildReportDocument, HIGHLIGHT_RANKS } from '@/lib/report/model';
import { renderWorkbook } from '@/lib/report/excelExport';
import { readRankedSection, verifyRankedSection } from '@/lib/report/excelImport';
import type { Notifier } from '@/lib/mailer';
import type { MarketDataSource } from '@/providers/types';
import { scoreInstruments } from '@/scoring/engine';
import { describeError, failedBatch, fetchInstrumentBatch } from '@/scoring/fetch';
import { rankRecords, selectTopK } from '@/scoring/topk';
import type { Benchmark, IndicatorReading, Instrument, MacroContext } from '@/types/market';
import type { ReportDocument } from '@/types/report';
import type { ReportArtifact, RunOutcome, RunSummary, TriggerReason } from '@/types/job';
import { contentDigest } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import type { ArtifactStore } from './files';
import type { JobStateStore } from './state';

const logger = createChildLogger('orchestrator');

export interface OrchestratorDeps {
  source: MarketDataSource;
  store: JobStateStore;
  artifacts: ArtifactStore;
  instruments: readonly Instrument[];
  benchmarks: readonly Benchmark[];
  macro: MacroContext;
  timeZone: string;
  notifier?: Notifier | null;
  /** false disables the notification step entirely */
  notify?: boolean;
  now?: () => Date;
  fetch?: { minIntervalMs?: number; timeoutMs?: number };
  render?: (doc: ReportDocument) => Promise<Buffer>;
}

interface InflightRun {
  promise: Promise<RunOutcome>;
  reason: TriggerReason;
  startedAt: string;
}

export class JobOrchestrator {
  private inflight: InflightRun | null = null;
  private readonly now: () => Date;
  private readonly render: (doc: ReportDocument) => Promise<Buffer>;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.render = deps.render ?? renderWorkbook;
  }

  isRunning(): boolean {
    return this.inflight !== null;
  }

  /** Resolves once the in-flight run (if any) has settled */
  async whenIdle(): Promise<void> {
    if (this.inflight) {
      await this.inflight.promise;
    }
  }

  trigger(reason: TriggerReason): Promise<RunOutcome> {
    if (this.inflight) {
      logger.info({ reason, inFlight: this.inflight.reason }, 'Run already in progress, trigger rejected');
      const busy: RunOutcome = {
        status: 'busy',
        runningSince: this.inflight.startedAt,
        inFlight: this.inflight.reason,
      };
      return Promise.resolve(busy);
    }

    const startedAt = this.now().toISOString();
    this.deps.store.markRunning(startedAt);

    const promise = this.execute(reason, startedAt).finally(() => {
      this.inflight = null;
    });
    this.inflight = { promise, reason, startedAt };
    return promise;
  }

  /** Fire-and-forget run at process start */
  warmUp(): void {
    this.trigger('warmup')
      .then((outcome) => {
        logger.info({ status: outcome.status }, 'Warm-up run finished');
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Warm-up run crashed');
      });
  }

  private async execute(reason: TriggerReason, startedAt: string): Promise<RunOutcome> {
    const { instruments, benchmarks } = this.deps;
    logger.info({ reason, startedAt, instruments: instruments.length }, 'Run started');

    try {
      const fetchOptions = { now: new Date(startedAt), ...this.deps.fetch };
      const [fetched, readings] = await Promise.all([
        fetchInstrumentBatch(instruments, this.deps.source, fetchOptions).catch((error: unknown) => {
          logger.error({ err: error }, 'Instrument batch failed, every record degraded');
          return failedBatch(instruments, error);
        }),
        fetchBenchmarkReadings(benchmarks, this.deps.source, this.deps.fetch).catch(
          (error: unknown): IndicatorReading[] => {
            logger.error({ err: error }, 'Benchmark batch failed, using placeholders');
            return benchmarks.map(placeholderReading);
          }
        ),
      ]);

      const generatedAt = this.now();
      const ranked = rankRecords(scoreInstruments(fetched));
      const document = buildReportDocument({
        generatedAt,
        timeZone: this.deps.timeZone,
        indicators: readings,
        macro: this.deps.macro,
        records: ranked,
      });

      const buffer = await this.render(document);
      const section = await readRankedSection(buffer);
      verifyRankedSection(section, instruments.length);

      const artifact = this.deps.artifacts.writeArchive(buffer, generatedAt);
      const summary: RunSummary = {
        runId: `${formatArtifactStamp(generatedAt, this.deps.timeZone)}__${contentDigest(section.rows)}`,
        generatedAt: document.generatedAt,
        generatedLabel: document.generatedLabel,
        verdict: document.overview.verdict,
        positiveCount: document.overview.positiveCount,
        indicatorCount: document.overview.indicatorCount,
        indicators: document.overview.indicators,
        macro: document.overview.macro,
        top: selectTopK(section.rows, HIGHLIGHT_RANKS),
        records: section.rows,
        degradedSymbols: ranked.filter((r) => r.snapshot.degraded).map((r) => r.instrument.symbol),
      };

      this.deps.artifacts.promoteLatest(artifact);
      // Only a fully published run is announced
      await this.notify(summary, artifact, generatedAt);
      this.deps.store.markReady(summary, artifact, generatedAt.toISOString());

      logger.info(
        { runId: summary.runId, file: artifact.fileName, degraded: summary.degradedSymbols.length },
        'Run completed'
      );
      return {
        status: 'completed',
        runId: summary.runId,
        generatedAt: summary.generatedAt,
        artifact,
        degradedCount: summary.degradedSymbols.length,
      };
    } catch (error) {
      const message = describeError(error);
      logger.error({ err: error, reason }, 'Run failed, previous report stays published');
      this.deps.store.markFailed(message);
      return { status: 'failed', reason: message };
    }
  }

  private async notify(summary: RunSummary, artifact: ReportArtifact, generatedAt: Date): Promise<void> {
    const { notifier } = this.deps;
    if (this.deps.notify === false || !notifier) {
      logger.info('Email skipped');
      return;
    }
    try {
      await notifier.send({ summary, artifact, generatedAt });
    } catch (error) {
      logger.error({ err: error }, 'Email failed');
    }
  }
}
