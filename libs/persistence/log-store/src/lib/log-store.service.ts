import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  EventLogInsert,
  LogRecordByTable,
  LogRpc,
  LogStoreLimits,
  LogTable,
  ReportInsert,
  ThinkingLogInsert,
  ThinkingStatus,
} from '@risk-router/shared/types';
import { getErrorMessage, truncateValue, truncateText, withRetry } from '@risk-router/shared/utils';
import { ILogStoreClient, LOG_STORE_CLIENT, LogQuery } from './interfaces/log-store-client.interface';

export interface ThinkingEntry {
  agentName: string;
  thinkingStage: string;
  thoughtContent: string;
  conversationId: string;
  sessionId?: string;
  thinkingStageOutput?: unknown;
  agentOutput?: unknown;
  agentId?: string;
  modelDeploymentName?: string;
  threadId?: string;
  userQuery?: string;
  status?: ThinkingStatus;
}

export interface EventEntry {
  agentName: string;
  action: string;
  resultSummary: string;
  conversationId: string;
  sessionId?: string;
  userQuery?: string;
  agentOutput?: string;
}

export interface ReportEntry {
  conversationId: string;
  sessionId?: string;
  filename: string;
  blobUrl: string;
  reportType?: string;
}

/**
 * LogStoreService
 * Retrying append/read access to the three audit tables.
 *
 * Every call makes up to MAX_ATTEMPTS attempts with a fixed delay and rethrows
 * the last error. Callers that log on behalf of a stage catch and warn.
 */
@Injectable()
export class LogStoreService {
  private readonly logger = new Logger(LogStoreService.name);
  private retryDelayMs: number = LogStoreLimits.RETRY_DELAY_MS;

  constructor(@Inject(LOG_STORE_CLIENT) private readonly client: ILogStoreClient) {}

  /**
   * Override the delay between attempts (tests run with 0)
   */
  setRetryDelay(ms: number): void {
    this.retryDelayMs = ms;
  }

  async insertThinking(entry: ThinkingEntry): Promise<void> {
    const row: ThinkingLogInsert = {
      agent_name: entry.agentName,
      thinking_stage: entry.thinkingStage,
      thought_content: truncateText(entry.thoughtContent),
      thinking_stage_output: truncateValue(entry.thinkingStageOutput),
      agent_output: truncateValue(entry.agentOutput),
      conversation_id: entry.conversationId,
      session_id: entry.sessionId ?? null,
      agent_id: entry.agentId ?? null,
      model_deployment_name: entry.modelDeploymentName ?? null,
      thread_id: entry.threadId ?? null,
      user_query: entry.userQuery ?? null,
      status: entry.status ?? ThinkingStatus.SUCCESS,
    };
    await this.insert(LogTable.THINKING, row);
  }

  async insertEvent(entry: EventEntry): Promise<string> {
    const row: EventLogInsert = {
      event_id: randomUUID(),
      agent_name: entry.agentName,
      action: entry.action,
      result_summary: entry.resultSummary,
      conversation_id: entry.conversationId,
      session_id: entry.sessionId ?? null,
      user_query: entry.userQuery ?? null,
      agent_output: entry.agentOutput ?? null,
      event_time: new Date().toISOString(),
    };
    await this.insert(LogTable.EVENT, row);
    return row.event_id;
  }

  async insertReport(entry: ReportEntry): Promise<void> {
    const row: ReportInsert = {
      conversation_id: entry.conversationId,
      session_id: entry.sessionId ?? null,
      filename: entry.filename,
      blob_url: entry.blobUrl,
      report_type: entry.reportType ?? 'comprehensive',
    };
    await this.insert(LogTable.REPORT, row);
  }

  async insert<K extends LogTable>(table: K, row: LogRecordByTable[K]): Promise<void> {
    await this.retry(`insert ${table}`, () => this.client.insert(table, row));
    this.logger.debug(`Inserted row into ${table} (conversation ${row.conversation_id})`);
  }

  async query(table: LogTable, query: LogQuery): Promise<Record<string, unknown>[]> {
    const rows = await this.retry(`select ${table}`, () => this.client.select(table, query));
    return rows.filter(isRecord);
  }

  async rpc(name: LogRpc, params: Record<string, unknown> = {}): Promise<unknown> {
    return this.retry(`rpc ${name}`, () => this.client.rpc(name, params));
  }

  private retry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, {
      delayMs: this.retryDelayMs,
      onRetry: (error, attempt) => {
        this.logger.warn(
          `${label} failed (attempt ${attempt}/${LogStoreLimits.MAX_ATTEMPTS}): ${getErrorMessage(error)}`
        );
      },
    });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
