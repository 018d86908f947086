import { ConversationSession } from './session.interface';

/**
 * Injection token for ISessionRepository
 * Use this token when injecting the repository via @Inject()
 */
export const SESSION_REPOSITORY = 'SESSION_REPOSITORY';

export interface ISessionRepository {
  saveSession(session: ConversationSession): void;
  getSession(sessionId: string): ConversationSession | null;
  deleteSession(sessionId: string): boolean;
  getAllSessions(): ConversationSession[];
  /** Returns the number of sessions removed */
  clear(): number;
}
