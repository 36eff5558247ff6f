/**
 * Report notification over SMTP
 *
 * One message per successful run with the workbook attached. Missing
 * credentials skip the send; transport errors propagate to the caller,
 * which logs them without failing the run.
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';
import { formatSubjectTimestamp } from '@/core/time';
import { hasSmtpCredentials, type EnvConfig } from '@/core/env';
import { VERDICT_LABELS } from '@/types/market';
import type { ReportArtifact, RunSummary } from '@/types/job';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('mailer');

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface NotificationPayload {
  summary: RunSummary;
  artifact: ReportArtifact;
  generatedAt: Date;
}

export type NotifyResult = 'sent' | 'skipped';

export interface Notifier {
  send(payload: NotificationPayload): Promise<NotifyResult>;
}

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface MailSettings {
  from: string;
  to: string;
  timeZone: string;
}

export function buildSubject(generatedAt: Date, timeZone: string): string {
  return `Opportunity Report — ${formatSubjectTimestamp(generatedAt, timeZone)}`;
}

export function buildBody(summary: RunSummary, stamp: string): string {
  const top = summary.top.map((row) => `${row.rank}. ${row.ticker} (score ${row.compositeScore})`);
  const lines = [
    `Your opportunity report has been refreshed as of ${stamp}.`,
    '',
    `Futures verdict: ${VERDICT_LABELS[summary.verdict]} (${summary.positiveCount}/${summary.indicatorCount} indicators positive)`,
    '',
    'Top opportunities:',
    ...top,
    '',
    'The attached workbook contains:',
    '- Pre-market futures & macro indicators',
    '- Overall market & Federal Reserve status',
    `- Top ${summary.records.length} opportunities with composite, volatility, momentum and liquidity scores`,
  ];
  if (summary.degradedSymbols.length > 0) {
    lines.push('', `Incomplete data for: ${summary.degradedSymbols.join(', ')}`);
  }
  return lines.join('\n');
}

export function buildNotification(payload: NotificationPayload, settings: MailSettings): SendMailOptions {
  const stamp = formatSubjectTimestamp(payload.generatedAt, settings.timeZone);
  return {
    from: settings.from,
    to: settings.to,
    subject: buildSubject(payload.generatedAt, settings.timeZone),
    text: buildBody(payload.summary, stamp),
    attachments: [
      {
        filename: payload.artifact.fileName,
        path: payload.artifact.filePath,
        contentType: XLSX_CONTENT_TYPE,
      },
    ],
  };
}

export class SmtpNotifier implements Notifier {
  private readonly transport: MailTransport | null;

  constructor(
    private readonly env: EnvConfig,
    transport?: MailTransport
  ) {
    if (transport) {
      this.transport = transport;
    } else if (hasSmtpCredentials(env)) {
      this.transport = nodemailer.createTransport({
        host: env.smtpHost,
        port: env.smtpPort,
        secure: env.smtpPort === 465,
        auth: { user: env.smtpUser, pass: env.smtpPassword },
      });
    } else {
      this.transport = null;
    }
  }

  async send(payload: NotificationPayload): Promise<NotifyResult> {
    if (!this.transport) {
      logger.warn('SMTP credentials not set, skipping email. Set SMTP_USER and SMTP_PASSWORD.');
      return 'skipped';
    }

    const message = buildNotification(payload, {
      from: this.env.smtpUser || this.env.emailTo,
      to: this.env.emailTo,
      timeZone: this.env.timeZone,
    });
    await this.transport.sendMail(message);
    logger.info({ to: this.env.emailTo, attachment: payload.artifact.fileName }, 'Email sent');
    return 'sent';
  }
}
