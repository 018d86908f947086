/**
 * SessionManagerService Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { assistantMessage, StageName, userMessage } from '@risk-router/shared/types';
import { SESSION_REPOSITORY } from './interfaces';
import { InMemorySessionRepository } from './repositories/in-memory-session.repository';
import { SessionManagerService } from './session-manager.service';

describe('SessionManagerService', () => {
  let service: SessionManagerService;
  let repository: InMemorySessionRepository;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [SessionManagerService, { provide: SESSION_REPOSITORY, useClass: InMemorySessionRepository }],
    }).compile();

    service = module.get<SessionManagerService>(SessionManagerService);
    repository = module.get<InMemorySessionRepository>(SESSION_REPOSITORY);
  });

  describe('getOrCreate', () => {
    it('creates a session with a UUID conversation id and an empty transcript', () => {
      const session = service.getOrCreate('token-1');

      expect(session.sessionId).toBe('token-1');
      expect(session.conversationId).toMatch(/^[0-9a-f-]{36}$/);
      expect(session.transcript).toEqual([]);
      expect(session.turns).toBe(0);
    });

    it('returns the same conversation id for the same token', () => {
      const first = service.getOrCreate('token-1');
      const second = service.getOrCreate('token-1');

      expect(second.conversationId).toBe(first.conversationId);
      expect(service.count()).toBe(1);
    });

    it('gives different tokens different conversations', () => {
      expect(service.getOrCreate('a').conversationId).not.toBe(service.getOrCreate('b').conversationId);
    });
  });

  describe('has', () => {
    it('reports whether the token currently has a session', () => {
      expect(service.has('token-1')).toBe(false);
      service.getOrCreate('token-1');
      expect(service.has('token-1')).toBe(true);
      service.discard('token-1');
      expect(service.has('token-1')).toBe(false);
    });
  });

  describe('appendTurn', () => {
    it('appends the user message followed by the assistant messages in order', () => {
      service.getOrCreate('token-1');

      const session = service.appendTurn('token-1', userMessage('political risk'), [
        assistantMessage('SCHEDULER_AGENT > a', StageName.SCHEDULER),
        assistantMessage('POLITICAL_RISK_AGENT > b', StageName.POLITICAL),
      ]);

      expect(session.transcript.map((m) => m.content)).toEqual([
        'political risk',
        'SCHEDULER_AGENT > a',
        'POLITICAL_RISK_AGENT > b',
      ]);
      expect(session.turns).toBe(1);
    });

    it('does not let a snapshot change the stored transcript', () => {
      const snapshot = service.getOrCreate('token-1');
      service.appendTurn('token-1', userMessage('hello'), [assistantMessage('hi', StageName.ASSISTANT)]);

      expect(snapshot.transcript).toEqual([]);
      expect(service.get('token-1')?.transcript).toHaveLength(2);
    });

    it('rejects a turn for an unknown session', () => {
      expect(() => service.appendTurn('missing', userMessage('hello'), [])).toThrow('No session missing');
    });
  });

  describe('discard and clearAll', () => {
    it('discarding a session gives the token a new conversation next time', () => {
      const before = service.getOrCreate('token-1');

      expect(service.discard('token-1')).toBe(true);
      const after = service.getOrCreate('token-1');

      expect(after.conversationId).not.toBe(before.conversationId);
      expect(after.transcript).toEqual([]);
    });

    it('discarding an unknown session is a no-op', () => {
      expect(service.discard('missing')).toBe(false);
    });

    it('clears every session', () => {
      service.getOrCreate('a');
      service.getOrCreate('b');

      expect(service.clearAll()).toBe(2);
      expect(repository.getAllSessions()).toEqual([]);
    });

    it('clears sessions on module destroy', () => {
      service.getOrCreate('a');

      service.onModuleDestroy();

      expect(service.get('a')).toBeNull();
    });
  });
});
