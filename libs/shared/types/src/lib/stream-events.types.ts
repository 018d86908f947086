/**
 * Stream Event Payload Types
 * Emitted by the pipeline, forwarded to SSE clients
 */

import { StreamEventType, StageName } from './enums';

interface BaseEvent {
  sessionId: string;
  timestamp: string;
}

export interface ConnectedEvent extends BaseEvent {
  type: StreamEventType.CONNECTED;
}

export interface TurnStartedEvent extends BaseEvent {
  type: StreamEventType.TURN_STARTED;
  conversationId: string;
  message: string;
}

export interface StageStartedEvent extends BaseEvent {
  type: StreamEventType.STAGE_STARTED;
  stage: StageName;
}

export interface ToolEvent extends BaseEvent {
  type: StreamEventType.TOOL;
  stage: StageName;
  toolName: string;
  toolId: string;
}

export interface StageCompletedEvent extends BaseEvent {
  type: StreamEventType.STAGE_COMPLETED;
  stage: StageName;
  content: string;
}

export interface CompleteEvent extends BaseEvent {
  type: StreamEventType.COMPLETE;
  conversationId: string;
  response: string;
  visited: StageName[];
  duration: number;
}

export interface ErrorEvent {
  type: StreamEventType.ERROR;
  sessionId?: string;
  message: string;
  timestamp: string;
}

export type StreamEventPayload =
  | ConnectedEvent
  | TurnStartedEvent
  | StageStartedEvent
  | ToolEvent
  | StageCompletedEvent
  | CompleteEvent
  | ErrorEvent;
