/**
 * ReportWriterService Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LogTable } from '@risk-router/shared/types';
import { LOG_STORE_CLIENT, LogStoreService } from '@risk-router/persistence/log-store';
import { InMemoryLogStoreClient } from '../../../../../persistence/log-store/src/lib/test-utils/in-memory-log-store.client';
import { ReportWriterService, reportTimestamp } from './report-writer.service';

describe('ReportWriterService', () => {
  let service: ReportWriterService;
  let client: InMemoryLogStoreClient;
  let reportsDir: string;

  beforeEach(async () => {
    reportsDir = await mkdtemp(join(tmpdir(), 'risk-reports-'));
    client = new InMemoryLogStoreClient();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportWriterService,
        LogStoreService,
        { provide: LOG_STORE_CLIENT, useValue: client },
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(reportsDir) } },
      ],
    }).compile();

    service = module.get<ReportWriterService>(ReportWriterService);
    module.get<LogStoreService>(LogStoreService).setRetryDelay(0);
  });

  afterEach(async () => {
    await rm(reportsDir, { recursive: true, force: true });
  });

  it('formats timestamps as yyyyMMdd_HHmmss in UTC', () => {
    expect(reportTimestamp(new Date('2025-03-04T05:06:07.000Z'))).toBe('20250304_050607');
  });

  it('writes the report and records it', async () => {
    const saved = await service.saveReport(
      { content: '# Risk Report', conversationId: 'abcdef123456', sessionId: 'session-1' },
      new Date('2025-03-04T05:06:07.000Z')
    );

    expect(saved.filename).toBe('risk_report_comprehensive_20250304_050607_abcdef12.md');
    expect(saved.blob_url).toBe(join(reportsDir, saved.filename));
    expect(saved.recorded).toBe(true);
    await expect(readFile(saved.blob_url, 'utf8')).resolves.toBe('# Risk Report');
    expect(client.rows(LogTable.REPORT)[0]).toMatchObject({
      filename: saved.filename,
      session_id: 'session-1',
      conversation_id: 'abcdef123456',
      report_type: 'comprehensive',
    });
  });

  it('keeps reports inside the reports directory', async () => {
    await expect(
      service.saveReport({ content: 'body', conversationId: 'conv-123', reportType: '../../../escaped' })
    ).rejects.toThrow('Invalid report type: ../../../escaped');
    await expect(
      service.saveReport({ content: 'body', conversationId: '../../x', reportType: 'weekly' })
    ).rejects.toThrow('Report path escapes the reports directory');

    expect(client.rows(LogTable.REPORT)).toHaveLength(0);
    await expect(readdir(reportsDir)).resolves.toEqual([]);
  });

  it('keeps the file when the report record cannot be stored', async () => {
    client.failNext(3);

    const saved = await service.saveReport({ content: 'body', conversationId: 'conv-2' });

    expect(saved.recorded).toBe(false);
    await expect(readFile(saved.blob_url, 'utf8')).resolves.toBe('body');
  });
});
