/**
 * Report artifact files
 *
 * Every successful render is archived under a timestamped name that is never
 * reused. `latest.xlsx` is the stable alias, replaced by rename so readers
 * see either the old or the new workbook.
 */

import { copyFileSync, existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { formatArtifactStamp, formatDateStamp } from '@/core/time';
import { ReportAssemblyError } from '@/lib/report/excelExport';
import { createChildLogger } from '@/utils/logger';
import type { ReportArtifact } from '@/types/job';

const logger = createChildLogger('artifact_store');

export const ARTIFACT_PREFIX = 'opportunity_report';
export const LATEST_FILE_NAME = 'latest.xlsx';

export function archiveFileName(generatedAt: Date, timeZone: string, attempt: number = 1): string {
  const suffix = attempt > 1 ? `_${attempt}` : '';
  return `${ARTIFACT_PREFIX}_${formatArtifactStamp(generatedAt, timeZone)}${suffix}.xlsx`;
}

export function downloadFileName(generatedAt: Date, timeZone: string): string {
  return `${ARTIFACT_PREFIX}_${formatDateStamp(generatedAt, timeZone)}.xlsx`;
}

function asAssemblyError(message: string, error: unknown): ReportAssemblyError {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ReportAssemblyError(`${message}: ${cause.message}`, cause);
}

export class ArtifactStore {
  readonly outputDir: string;

  constructor(
    outputDir: string,
    private readonly timeZone: string
  ) {
    this.outputDir = isAbsolute(outputDir) ? outputDir : resolve(process.cwd(), outputDir);
  }

  get latestPath(): string {
    return join(this.outputDir, LATEST_FILE_NAME);
  }

  private ensureDirectory(): void {
    if (!existsSync(this.outputDir)) {
      mkdirSync(this.outputDir, { recursive: true });
    }
  }

  writeArchive(buffer: Buffer, generatedAt: Date): ReportArtifact {
    try {
      this.ensureDirectory();

      let attempt = 1;
      let fileName = archiveFileName(generatedAt, this.timeZone, attempt);
      while (existsSync(join(this.outputDir, fileName))) {
        attempt++;
        fileName = archiveFileName(generatedAt, this.timeZone, attempt);
      }

      const filePath = join(this.outputDir, fileName);
      // 'wx' fails instead of clobbering a file that appeared since the check
      writeFileSync(filePath, buffer, { flag: 'wx' });
      logger.info({ filePath, bytes: buffer.byteLength }, 'Report archived');

      return {
        fileName,
        filePath,
        latestPath: this.latestPath,
        generatedAt: generatedAt.toISOString(),
        byteLength: buffer.byteLength,
      };
    } catch (error) {
      throw asAssemblyError('Could not write report archive', error);
    }
  }

  promoteLatest(artifact: ReportArtifact): void {
    const tempPath = join(this.outputDir, `.${LATEST_FILE_NAME}.${process.pid}.tmp`);
    try {
      copyFileSync(artifact.filePath, tempPath);
      renameSync(tempPath, this.latestPath);
      logger.debug({ latestPath: this.latestPath, source: artifact.fileName }, 'Latest alias updated');
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw asAssemblyError('Could not promote latest report', error);
    }
  }

  getLatest(): string | null {
    return existsSync(this.latestPath) ? this.latestPath : null;
  }
}
