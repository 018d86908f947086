import { Controller, Get, Logger, NotFoundException, Param, Query } from '@nestjs/common';
import {
  ConversationMessageView,
  HeatmapView,
  LogQueryService,
  ReportView,
  SessionIdView,
  SessionView,
  ThinkingLogIdView,
  ThinkingSessionView,
} from '@risk-router/persistence/log-store';
import { getErrorMessage, ValidationError } from '@risk-router/shared/utils';
import { HeatmapQuerySchema, RecentConversationsQuerySchema } from './dto/history.dto';
import { toHttpException } from './http-errors';

/**
 * History Controller - read-only projections of the audit tables
 */
@Controller('api')
export class HistoryController {
  private readonly logger = new Logger(HistoryController.name);

  constructor(private logQuery: LogQueryService) {}

  @Get('sessions')
  listSessions(): Promise<SessionView[]> {
    return this.read('sessions', () => this.logQuery.listSessions());
  }

  @Get('sessions/:sessionId')
  async getSession(@Param('sessionId') sessionId: string): Promise<SessionView> {
    const session = await this.read(`session ${sessionId}`, () => this.logQuery.getSession(sessionId));
    if (!session) {
      throw new NotFoundException({ status: 'error', error: `No history for session ${sessionId}`, sessionId });
    }
    return session;
  }

  @Get('session-ids')
  listSessionIds(): Promise<SessionIdView[]> {
    return this.read('session ids', () => this.logQuery.listSessionIds());
  }

  @Get('thinking-logs')
  listThinkingLogs(): Promise<ThinkingSessionView[]> {
    return this.read('thinking logs', () => this.logQuery.listThinkingLogs());
  }

  @Get('thinking-logs/:sessionId')
  getThinkingLogs(@Param('sessionId') sessionId: string): Promise<ThinkingSessionView> {
    return this.read(`thinking logs ${sessionId}`, () => this.logQuery.getThinkingLogs(sessionId));
  }

  @Get('thinking-log-ids')
  listThinkingLogIds(): Promise<ThinkingLogIdView[]> {
    return this.read('thinking log ids', () => this.logQuery.listThinkingLogIds());
  }

  @Get('conversations/recent')
  getRecentConversations(@Query() query: unknown): Promise<unknown[]> {
    const parsed = RecentConversationsQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw toHttpException(new ValidationError('limit must be an integer between 1 and 100', { field: 'limit' }));
    }
    return this.read('recent conversations', () => this.logQuery.getRecentConversations(parsed.data.limit));
  }

  @Get('conversations/:conversationId')
  getConversation(@Param('conversationId') conversationId: string): Promise<ConversationMessageView[]> {
    return this.read(`conversation ${conversationId}`, () => this.logQuery.getConversationEvents(conversationId));
  }

  @Get('heatmap')
  getHeatmap(@Query() query: unknown): Promise<HeatmapView[]> {
    const parsed = HeatmapQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw toHttpException(new ValidationError('conversationId and sessionId must be non-empty strings'));
    }
    return this.read('heatmap', () => this.logQuery.getHeatmap(parsed.data));
  }

  @Get('reports')
  listReports(): Promise<ReportView[]> {
    return this.read('reports', () => this.logQuery.listReports());
  }

  private async read<T>(what: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      this.logger.error(`Failed to read ${what}: ${getErrorMessage(error)}`);
      throw toHttpException(error);
    }
  }
}
