import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { LogStoreService } from '@risk-router/persistence/log-store';
import { getErrorMessage, ValidationError } from '@risk-router/shared/utils';

export interface SaveReportInput {
  content: string;
  conversationId: string;
  sessionId?: string;
  reportType?: string;
}

export interface SavedReport {
  filename: string;
  blob_url: string;
  report_id: string;
  recorded: boolean;
}

export const REPORT_TYPE_PATTERN = /^[A-Za-z0-9_-]+$/;

const pad = (value: number): string => String(value).padStart(2, '0');

export function reportTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Writes generated reports to the reports directory and records them in fact_risk_report
 */
@Injectable()
export class ReportWriterService {
  private readonly logger = new Logger(ReportWriterService.name);
  private readonly reportsDir: string;

  constructor(
    configService: ConfigService,
    private readonly logStore: LogStoreService
  ) {
    this.reportsDir = resolve(configService.get<string>('reports.dir') ?? 'reports');
  }

  async saveReport(input: SaveReportInput, now: Date = new Date()): Promise<SavedReport> {
    const reportType = input.reportType ?? 'comprehensive';
    if (!REPORT_TYPE_PATTERN.test(reportType)) {
      throw new ValidationError(`Invalid report type: ${reportType}`, { field: 'report_type' });
    }
    const filename = `risk_report_${reportType}_${reportTimestamp(now)}_${input.conversationId.slice(0, 8)}.md`;
    const path = join(this.reportsDir, filename);
    // Conversation ids come from the model too
    if (dirname(path) !== this.reportsDir) {
      throw new ValidationError(`Report path escapes the reports directory: ${filename}`, { field: 'conversation_id' });
    }

    await mkdir(this.reportsDir, { recursive: true });
    await writeFile(path, input.content, 'utf8');
    this.logger.log(`[${input.conversationId}] Report written to ${path}`);

    const report: SavedReport = {
      filename,
      blob_url: path,
      report_id: randomUUID(),
      recorded: true,
    };

    try {
      await this.logStore.insertReport({
        conversationId: input.conversationId,
        sessionId: input.sessionId,
        filename,
        blobUrl: path,
        reportType,
      });
    } catch (error) {
      this.logger.warn(`[${input.conversationId}] Report record not stored: ${getErrorMessage(error)}`);
      report.recorded = false;
    }

    return report;
  }
}
