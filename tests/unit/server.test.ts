import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '@/api/server';
import { QueryFacade } from '@/run/query';
import { JobStateStore } from '@/run/state';
import type { ReportArtifact, RunOutcome, RunSummary } from '@/types/job';

const TZ = 'America/Chicago';

const summary: RunSummary = {
  runId: '20261019_0930__abcd1234',
  generatedAt: '2026-10-19T14:30:00.000Z',
  generatedLabel: 'October 19, 2026 at 09:30 AM CDT',
  verdict: 'mixed',
  positiveCount: 3,
  indicatorCount: 7,
  indicators: [],
  macro: [],
  top: [],
  records: [],
  degradedSymbols: [],
};

let tempDir: string;
let store: JobStateStore;
let nextOutcome: RunOutcome;
let app: FastifyInstance;

function artifactIn(dir: string): ReportArtifact {
  return {
    fileName: 'opportunity_report_20261019_0930.xlsx',
    filePath: join(dir, 'opportunity_report_20261019_0930.xlsx'),
    latestPath: join(dir, 'latest.xlsx'),
    generatedAt: '2026-10-19T14:30:00.000Z',
    byteLength: 9,
  };
}

beforeEach(async () => {
  tempDir = mkdtempSync(join(tmpdir(), 'server-'));
  store = new JobStateStore();
  nextOutcome = { status: 'failed', reason: 'quote feed down' };
  const facade = new QueryFacade(store, { trigger: async () => nextOutcome }, TZ);
  app = buildServer(facade);
  await app.ready();
});

afterEach(async () => {
  await app.close();
  rmSync(tempDir, { recursive: true, force: true });
});

describe('GET /health', () => {
  it('answers ok', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok' });
  });
});

describe('GET /api/summary', () => {
  it('explains that no report exists yet', async () => {
    store.markRunning('2026-10-19T14:30:00.000Z');

    const response = await app.inject({ method: 'GET', url: '/api/summary' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      error: 'No data yet. Report is being generated, check back shortly.',
      status: 'running',
      lastError: null,
    });
  });

  it('returns the published summary', async () => {
    store.markReady(summary, artifactIn(tempDir), '2026-10-19T14:31:00.000Z');

    const response = await app.inject({ method: 'GET', url: '/api/summary' });

    expect(response.json()).toEqual({
      kind: 'ready',
      status: 'ready',
      version: 1,
      lastSuccessAt: '2026-10-19T14:31:00.000Z',
      lastError: null,
      summary,
    });
  });
});

describe('/api/refresh', () => {
  it('maps a busy outcome to 409', async () => {
    nextOutcome = { status: 'busy', runningSince: '2026-10-19T14:30:00.000Z', inFlight: 'scheduled' };

    const response = await app.inject({ method: 'POST', url: '/api/refresh' });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual(nextOutcome);
  });

  it('maps a failed outcome to 500', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/refresh' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ status: 'failed', reason: 'quote feed down' });
  });

  it('maps a completed outcome to 200', async () => {
    nextOutcome = {
      status: 'completed',
      runId: summary.runId,
      generatedAt: summary.generatedAt,
      artifact: artifactIn(tempDir),
      degradedCount: 0,
    };

    const response = await app.inject({ method: 'POST', url: '/api/refresh' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'completed', runId: '20261019_0930__abcd1234' });
  });
});

describe('GET /download', () => {
  it('returns 404 before any report exists', async () => {
    const response = await app.inject({ method: 'GET', url: '/download' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'No report has been generated yet' });
  });

  it('streams the latest workbook as a dated attachment', async () => {
    const artifact = artifactIn(tempDir);
    writeFileSync(artifact.latestPath, 'workbook!');
    store.markReady(summary, artifact, '2026-10-19T14:31:00.000Z');

    const response = await app.inject({ method: 'GET', url: '/download' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe('attachment; filename="opportunity_report_20261019.xlsx"');
    expect(response.headers['content-type']).toBe(
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
    );
    expect(response.body).toBe('workbook!');
  });
});
