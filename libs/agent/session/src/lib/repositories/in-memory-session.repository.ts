import { Injectable } from '@nestjs/common';
import { ConversationSession, ISessionRepository } from '../interfaces';

@Injectable()
export class InMemorySessionRepository implements ISessionRepository {
  private sessions = new Map<string, ConversationSession>();

  saveSession(session: ConversationSession): void {
    this.sessions.set(session.sessionId, session);
  }

  getSession(sessionId: string): ConversationSession | null {
    return this.sessions.get(sessionId) || null;
  }

  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  getAllSessions(): ConversationSession[] {
    return Array.from(this.sessions.values());
  }

  clear(): number {
    const count = this.sessions.size;
    this.sessions.clear();
    return count;
  }
}
