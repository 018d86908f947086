/**
 * Scripted ModelBackend for specs
 *
 * Responses are queued per call; when the queue is empty the backend answers
 * with `<system prompt title> reply`.
 */

import { ModelBackend, ModelRequest, ModelResponse } from '../lib/backend/model-backend.interface';

export const textResponse = (text: string): ModelResponse => ({ text, toolCalls: [], stopReason: 'end_turn' });

export const toolResponse = (
  calls: Array<{ id: string; name: string; input?: unknown }>,
  text = ''
): ModelResponse => ({
  text,
  toolCalls: calls.map((call) => ({ id: call.id, name: call.name, input: call.input ?? {} })),
  stopReason: 'tool_use',
});

export class ScriptedModelBackend implements ModelBackend {
  readonly modelName = 'scripted-model';
  readonly requests: ModelRequest[] = [];
  available = true;
  private readonly queue: Array<ModelResponse | Error | ((request: ModelRequest) => Promise<ModelResponse>)> = [];

  enqueue(...responses: Array<ModelResponse | Error | ((request: ModelRequest) => Promise<ModelResponse>)>): this {
    this.queue.push(...responses);
    return this;
  }

  isAvailable(): boolean {
    return this.available;
  }

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push({ ...request, messages: request.messages.map((m) => ({ ...m })) });
    const next = this.queue.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === 'function') {
      return next(request);
    }
    if (next) {
      return next;
    }
    const title = request.system.split('\n')[0].replace(/^#\s*/, '');
    return textResponse(`${title} reply`);
  }
}
