import { describe, expect, it } from 'vitest';
import type { SendMailOptions } from 'nodemailer';
import { buildBody, buildSubject, SmtpNotifier, type MailTransport } from '@/lib/mailer';
import { ENV_DEFAULTS, type EnvConfig } from '@/core/env';
import type { ReportArtifact, RunSummary } from '@/types/job';
import type { RankedRow } from '@/types/report';

const generatedAt = new Date('2026-10-19T14:30:00Z');

function row(rank: number, ticker: string, compositeScore: number): RankedRow {
  return {
    rank,
    ticker,
    company: ticker,
    sector: 'Software',
    currentPrice: 100,
    previousClose: 99,
    historicalPrice: 80,
    dailyChangePct: 0.0101,
    threeMonthChangePct: 0.25,
    marketCapBillions: 10,
    averageVolumeMillions: 5,
    compositeScore,
    volatilityScore: 0,
    momentumScore: 0,
    liquidityScore: compositeScore,
    range52Week: '$60.00 – $150.00',
    highlight: rank <= 3,
  };
}

const records = [row(1, 'CCC', 77), row(2, 'AAA', 55), row(3, 'BBB', 55), row(4, 'DDD', 0)];

const summary: RunSummary = {
  runId: '20261019_0930__abcd1234',
  generatedAt: generatedAt.toISOString(),
  generatedLabel: 'October 19, 2026 at 09:30 AM CDT',
  verdict: 'positive',
  positiveCount: 5,
  indicatorCount: 7,
  indicators: [],
  macro: [],
  top: records.slice(0, 3),
  records,
  degradedSymbols: ['DDD'],
};

const artifact: ReportArtifact = {
  fileName: 'opportunity_report_20261019_0930.xlsx',
  filePath: '/srv/output/opportunity_report_20261019_0930.xlsx',
  latestPath: '/srv/output/latest.xlsx',
  generatedAt: generatedAt.toISOString(),
  byteLength: 2048,
};

function envWith(overrides: Partial<EnvConfig> = {}): EnvConfig {
  return {
    ...ENV_DEFAULTS,
    emailTo: 'desk@example.com',
    smtpUser: 'mailer@example.com',
    smtpPassword: 'test-secret',
    logLevel: 'silent',
    nodeEnv: 'test',
    ...overrides,
  };
}

class RecordingTransport implements MailTransport {
  sent: SendMailOptions[] = [];

  async sendMail(options: SendMailOptions): Promise<unknown> {
    this.sent.push(options);
    return { messageId: 'test-message' };
  }
}

describe('buildSubject', () => {
  it('stamps the zoned time and date', () => {
    expect(buildSubject(generatedAt, 'America/Chicago')).toBe('Opportunity Report — 09:30 AM CDT on Oct 19, 2026');
  });
});

describe('buildBody', () => {
  it('lists the verdict, the top rows and degraded symbols', () => {
    const body = buildBody(summary, '09:30 AM CDT on Oct 19, 2026').split('\n');

    expect(body[0]).toBe('Your opportunity report has been refreshed as of 09:30 AM CDT on Oct 19, 2026.');
    expect(body[2]).toBe('Futures verdict: BULLISH (5/7 indicators positive)');
    expect(body.slice(4, 8)).toEqual(['Top opportunities:', '1. CCC (score 77)', '2. AAA (score 55)', '3. BBB (score 55)']);
    expect(body).toContain('- Top 4 opportunities with composite, volatility, momentum and liquidity scores');
    expect(body[body.length - 1]).toBe('Incomplete data for: DDD');
  });
});

describe('SmtpNotifier', () => {
  it('sends one message with the workbook attached', async () => {
    const transport = new RecordingTransport();
    const notifier = new SmtpNotifier(envWith(), transport);

    await expect(notifier.send({ summary, artifact, generatedAt })).resolves.toBe('sent');

    expect(transport.sent).toHaveLength(1);
    const [message] = transport.sent;
    expect(message.from).toBe('mailer@example.com');
    expect(message.to).toBe('desk@example.com');
    expect(message.subject).toBe('Opportunity Report — 09:30 AM CDT on Oct 19, 2026');
    expect(message.attachments).toEqual([
      {
        filename: 'opportunity_report_20261019_0930.xlsx',
        path: '/srv/output/opportunity_report_20261019_0930.xlsx',
        contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      },
    ]);
  });

  it('skips sending without SMTP credentials', async () => {
    const notifier = new SmtpNotifier(envWith({ smtpUser: '', smtpPassword: '' }));

    await expect(notifier.send({ summary, artifact, generatedAt })).resolves.toBe('skipped');
  });

  it('propagates transport errors to the caller', async () => {
    const transport: MailTransport = {
      sendMail: async () => {
        throw new Error('535 authentication failed');
      },
    };
    const notifier = new SmtpNotifier(envWith(), transport);

    await expect(notifier.send({ summary, artifact, generatedAt })).rejects.toThrow('535 authentication failed');
  });
});
