import { Message, Transcript } from '@risk-router/shared/types';

/**
 * One external session token and the conversation it is bound to
 */
export interface ConversationSession {
  sessionId: string;
  /** Generated on first use, stable until the session is discarded */
  conversationId: string;
  transcript: Message[];
  turns: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Read-only view handed to the pipeline
 */
export interface SessionSnapshot {
  sessionId: string;
  conversationId: string;
  transcript: Transcript;
  turns: number;
}
