import { ToolDefinition } from '@risk-router/agent/tools';

/**
 * Injection token for ModelBackend
 */
export const MODEL_BACKEND = 'MODEL_BACKEND';

export type ModelContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_call'; id: string; name: string; input: unknown }
  | { type: 'tool_result'; toolCallId: string; content: string };

export interface ModelMessage {
  role: 'user' | 'assistant';
  content: string | ModelContentBlock[];
}

export interface ModelToolCall {
  id: string;
  name: string;
  input: unknown;
}

export interface ModelRequest {
  system: string;
  messages: ModelMessage[];
  tools: ToolDefinition[];
  signal?: AbortSignal;
}

export interface ModelResponse {
  text: string;
  toolCalls: ModelToolCall[];
  stopReason: string | null;
}

/**
 * One round trip to a tool-calling language model.
 * isAvailable() is false when the backend has no credentials; callers
 * check it instead of catching.
 */
export interface ModelBackend {
  readonly modelName: string;
  isAvailable(): boolean;
  createMessage(request: ModelRequest): Promise<ModelResponse>;
}
