/**
 * Transcript and turn types shared by the pipeline, session manager and API
 */

import { StageName } from './enums';

export interface UserMessage {
  readonly role: 'user';
  readonly content: string;
}

export interface AssistantMessage {
  readonly role: 'assistant';
  readonly content: string;
  /** Set when the message was produced by a pipeline stage */
  readonly stage?: StageName;
}

export type Message = UserMessage | AssistantMessage;

export type Transcript = readonly Message[];

export interface TurnContext {
  sessionId: string;
  conversationId: string;
}

export interface TurnResult {
  /** Messages appended during the turn, in execution order */
  messages: AssistantMessage[];
  /** Content of the last appended message */
  response: string;
  visited: StageName[];
}

export const userMessage = (content: string): UserMessage => ({ role: 'user', content });

export const assistantMessage = (content: string, stage?: StageName): AssistantMessage =>
  stage ? { role: 'assistant', content, stage } : { role: 'assistant', content };
