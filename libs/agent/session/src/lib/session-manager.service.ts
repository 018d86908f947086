/**
 * SessionManagerService
 * Maps external session tokens to conversations and their transcripts
 */

import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { AssistantMessage, UserMessage } from '@risk-router/shared/types';
import { RiskRouterError } from '@risk-router/shared/utils';
import { ConversationSession, ISessionRepository, SESSION_REPOSITORY, SessionSnapshot } from './interfaces';

@Injectable()
export class SessionManagerService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionManagerService.name);

  constructor(@Inject(SESSION_REPOSITORY) private readonly repository: ISessionRepository) {}

  onModuleDestroy(): void {
    this.clearAll();
  }

  /**
   * Existing session, or a new one with a fresh conversation id and an empty transcript
   */
  getOrCreate(sessionId: string): SessionSnapshot {
    let session = this.repository.getSession(sessionId);
    if (!session) {
      const now = new Date();
      session = {
        sessionId,
        conversationId: randomUUID(),
        transcript: [],
        turns: 0,
        createdAt: now,
        updatedAt: now,
      };
      this.repository.saveSession(session);
      this.logger.log(`[${sessionId}] Created conversation ${session.conversationId}`);
    }
    return this.snapshot(session);
  }

  get(sessionId: string): SessionSnapshot | null {
    const session = this.repository.getSession(sessionId);
    return session ? this.snapshot(session) : null;
  }

  has(sessionId: string): boolean {
    return this.repository.getSession(sessionId) !== null;
  }

  /**
   * Append one completed turn. Only called after the whole turn succeeded,
   * so a failed turn never leaves part of itself in the transcript.
   */
  appendTurn(sessionId: string, user: UserMessage, assistantMessages: readonly AssistantMessage[]): SessionSnapshot {
    const session = this.repository.getSession(sessionId);
    if (!session) {
      throw new RiskRouterError(`No session ${sessionId}`, 'SESSION_NOT_FOUND', { context: { sessionId } });
    }

    session.transcript.push(user, ...assistantMessages);
    session.turns += 1;
    session.updatedAt = new Date();
    this.repository.saveSession(session);

    this.logger.debug(`[${sessionId}] Transcript now ${session.transcript.length} messages`);
    return this.snapshot(session);
  }

  discard(sessionId: string): boolean {
    const removed = this.repository.deleteSession(sessionId);
    if (removed) {
      this.logger.log(`[${sessionId}] Session discarded`);
    }
    return removed;
  }

  clearAll(): number {
    const count = this.repository.clear();
    if (count > 0) {
      this.logger.log(`Cleared ${count} session(s)`);
    }
    return count;
  }

  count(): number {
    return this.repository.getAllSessions().length;
  }

  private snapshot(session: ConversationSession): SessionSnapshot {
    return {
      sessionId: session.sessionId,
      conversationId: session.conversationId,
      transcript: [...session.transcript],
      turns: session.turns,
    };
  }
}
