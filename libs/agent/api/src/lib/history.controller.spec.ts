/**
 * HistoryController Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { HttpException } from '@nestjs/common';
import { LogQueryService } from '@risk-router/persistence/log-store';
import { LogStoreError } from '@risk-router/shared/utils';
import { HistoryController } from './history.controller';

describe('HistoryController', () => {
  let controller: HistoryController;
  let logQuery: Record<string, jest.Mock>;

  async function captureHttpError(promise: Promise<unknown>): Promise<HttpException> {
    try {
      await promise;
    } catch (error) {
      if (error instanceof HttpException) {
        return error;
      }
      throw error;
    }
    throw new Error('expected an HttpException');
  }

  beforeEach(async () => {
    logQuery = {
      listSessions: jest.fn().mockResolvedValue([]),
      getSession: jest.fn().mockResolvedValue(null),
      listSessionIds: jest.fn().mockResolvedValue([]),
      listThinkingLogs: jest.fn().mockResolvedValue([]),
      getThinkingLogs: jest.fn(),
      listThinkingLogIds: jest.fn().mockResolvedValue([]),
      getConversationEvents: jest.fn().mockResolvedValue([]),
      getRecentConversations: jest.fn().mockResolvedValue([]),
      getHeatmap: jest.fn().mockResolvedValue([]),
      listReports: jest.fn().mockResolvedValue([]),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HistoryController],
      providers: [{ provide: LogQueryService, useValue: logQuery }],
    }).compile();

    controller = module.get<HistoryController>(HistoryController);
  });

  it('returns a session with history', async () => {
    const session = { session_id: 'token-1', conversations: [] };
    logQuery.getSession.mockResolvedValueOnce(session);

    await expect(controller.getSession('token-1')).resolves.toBe(session);
  });

  it('answers 404 for a session without history', async () => {
    const error = await captureHttpError(controller.getSession('missing'));

    expect(error.getStatus()).toBe(404);
    expect(error.getResponse()).toEqual({
      status: 'error',
      error: 'No history for session missing',
      sessionId: 'missing',
    });
  });

  it('parses the recent conversations limit from the query string', async () => {
    await controller.getRecentConversations({ limit: '3' });

    expect(logQuery.getRecentConversations).toHaveBeenCalledWith(3);
  });

  it('uses the default limit when none is given', async () => {
    await controller.getRecentConversations({});

    expect(logQuery.getRecentConversations).toHaveBeenCalledWith(undefined);
  });

  it('rejects a non-numeric limit with 400', () => {
    let status: number | undefined;
    try {
      controller.getRecentConversations({ limit: 'many' });
    } catch (error) {
      status = error instanceof HttpException ? error.getStatus() : undefined;
    }

    expect(status).toBe(400);
    expect(logQuery.getRecentConversations).not.toHaveBeenCalled();
  });

  it('passes heatmap filters through', async () => {
    await controller.getHeatmap({ conversationId: 'conv-1' });

    expect(logQuery.getHeatmap).toHaveBeenCalledWith({ conversationId: 'conv-1' });
  });

  it('maps a log store failure to 500', async () => {
    logQuery.listReports.mockRejectedValueOnce(new LogStoreError('connection refused', 'select'));

    const error = await captureHttpError(controller.listReports());

    expect(error.getStatus()).toBe(500);
    expect(error.getResponse()).toEqual({ status: 'error', error: 'connection refused', sessionId: undefined });
  });
});
