/**
 * ChatService Tests
 * Turn boundary: timeout, teardown on failure and append on success
 */

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  assistantMessage,
  StageName,
  StreamEventType,
  Transcript,
  TurnContext,
  TurnResult,
} from '@risk-router/shared/types';
import { SessionBusyError, TurnTimeoutError } from '@risk-router/shared/utils';
import { PipelineService, TurnOptions } from '@risk-router/agent/core';
import { InMemorySessionRepository, SESSION_REPOSITORY, SessionManagerService } from '@risk-router/agent/session';
import { ChatService } from './chat.service';

const assistantTurn = (content: string): TurnResult => ({
  messages: [assistantMessage(content, StageName.ASSISTANT)],
  response: content,
  visited: [StageName.ASSISTANT],
});

describe('ChatService', () => {
  let service: ChatService;
  let sessions: SessionManagerService;
  let runTurn: jest.Mock;
  let eventEmitter: { emit: jest.Mock };

  beforeEach(async () => {
    runTurn = jest.fn().mockResolvedValue(assistantTurn('ASSISTANT_AGENT > hi'));
    eventEmitter = { emit: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        SessionManagerService,
        { provide: SESSION_REPOSITORY, useClass: InMemorySessionRepository },
        { provide: PipelineService, useValue: { runTurn } },
        { provide: EventEmitter2, useValue: eventEmitter },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => (key === 'pipeline.turnTimeoutMs' ? 20 : undefined)) },
        },
      ],
    }).compile();

    service = module.get<ChatService>(ChatService);
    sessions = module.get<SessionManagerService>(SessionManagerService);
  });

  it('runs the turn and appends the user and assistant messages', async () => {
    const result = await service.chat('token-1', 'hello');

    const session = sessions.get('token-1');
    expect(result).toEqual({
      sessionId: 'token-1',
      conversationId: session?.conversationId,
      response: 'ASSISTANT_AGENT > hi',
      visited: [StageName.ASSISTANT],
    });
    expect(session?.transcript.map((m) => m.content)).toEqual(['hello', 'ASSISTANT_AGENT > hi']);
    expect(runTurn).toHaveBeenCalledWith(
      { sessionId: 'token-1', conversationId: session?.conversationId },
      [],
      'hello',
      { signal: expect.any(AbortSignal) }
    );
  });

  it('passes the previous turns as history and keeps the conversation id', async () => {
    const first = await service.chat('token-1', 'hello');
    runTurn.mockResolvedValueOnce(assistantTurn('ASSISTANT_AGENT > again'));

    const second = await service.chat('token-1', 'hello again');

    expect(second.conversationId).toBe(first.conversationId);
    expect(runTurn.mock.calls[1][1]).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'ASSISTANT_AGENT > hi', stage: StageName.ASSISTANT },
    ]);
  });

  it('discards the session and emits an error event when the turn fails', async () => {
    runTurn.mockRejectedValueOnce(new Error('model down'));

    await expect(service.chat('token-1', 'hello')).rejects.toThrow('model down');

    expect(sessions.get('token-1')).toBeNull();
    expect(eventEmitter.emit).toHaveBeenCalledWith(
      'pipeline.token-1',
      expect.objectContaining({ type: StreamEventType.ERROR, sessionId: 'token-1', message: 'model down' })
    );
  });

  it('times out, aborts the turn and gives the token a new conversation', async () => {
    const first = await service.chat('token-1', 'hello');
    let signal: AbortSignal | undefined;
    runTurn.mockImplementationOnce(
      (_context: TurnContext, _history: Transcript, _message: string, options: TurnOptions) => {
        signal = options.signal;
        return new Promise<TurnResult>(() => undefined);
      }
    );

    await expect(service.chat('token-1', 'political risk')).rejects.toBeInstanceOf(TurnTimeoutError);
    expect(signal?.aborted).toBe(true);
    expect(sessions.get('token-1')).toBeNull();

    const next = await service.chat('token-1', 'hello');
    expect(next.conversationId).not.toBe(first.conversationId);
    expect(sessions.get('token-1')?.transcript).toHaveLength(2);
  });

  it('rejects a second message while the session has a turn running', async () => {
    let finish: (result: TurnResult) => void = () => undefined;
    runTurn.mockImplementationOnce(
      () =>
        new Promise<TurnResult>((resolve) => {
          finish = resolve;
        })
    );

    const running = service.chat('token-1', 'hello');
    expect(service.isBusy('token-1')).toBe(true);
    await expect(service.chat('token-1', 'again')).rejects.toBeInstanceOf(SessionBusyError);

    finish(assistantTurn('ASSISTANT_AGENT > hi'));
    await running;
    expect(service.isBusy('token-1')).toBe(false);
    expect(sessions.get('token-1')?.transcript).toHaveLength(2);
  });

  it('returns the result of a turn that finished after its session was cleared', async () => {
    let finish: (result: TurnResult) => void = () => undefined;
    runTurn.mockImplementationOnce(
      () =>
        new Promise<TurnResult>((resolve) => {
          finish = resolve;
        })
    );

    const running = service.chat('token-1', 'hello');
    expect(service.clearSessions()).toBe(1);
    finish(assistantTurn('ASSISTANT_AGENT > hi'));

    await expect(running).resolves.toMatchObject({ sessionId: 'token-1', response: 'ASSISTANT_AGENT > hi' });
    expect(sessions.get('token-1')).toBeNull();
    expect(eventEmitter.emit).not.toHaveBeenCalled();
  });

  it('clears every session', async () => {
    await service.chat('a', 'hello');
    await service.chat('b', 'hello');

    expect(service.clearSessions()).toBe(2);
  });
});
