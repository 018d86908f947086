import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic from '@anthropic-ai/sdk';
import { DEFAULT_MODEL, PipelineLimits } from '@risk-router/shared/types';
import { getErrorMessage, ModelBackendError, sleep } from '@risk-router/shared/utils';
import { ModelBackend, ModelContentBlock, ModelMessage, ModelRequest, ModelResponse } from './model-backend.interface';

const RATE_LIMIT_RETRIES = 2;
const RATE_LIMIT_DELAY_MS = 2000;

function toContentBlockParam(block: ModelContentBlock): Anthropic.Messages.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_call':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return { type: 'tool_result', tool_use_id: block.toolCallId, content: block.content };
  }
}

function toMessageParam(message: ModelMessage): Anthropic.MessageParam {
  return {
    role: message.role,
    content: typeof message.content === 'string' ? message.content : message.content.map(toContentBlockParam),
  };
}

function extractText(message: Anthropic.Messages.Message): string {
  return message.content
    .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('\n')
    .trim();
}

/**
 * ModelBackend over the Anthropic Messages API
 */
@Injectable()
export class AnthropicModelBackend implements ModelBackend {
  private readonly logger = new Logger(AnthropicModelBackend.name);
  private readonly client: Anthropic | null;
  readonly modelName: string;

  constructor(configService: ConfigService) {
    const apiKey = configService.get<string>('model.apiKey');
    this.modelName = configService.get<string>('model.name') ?? DEFAULT_MODEL;
    this.client = apiKey ? new Anthropic({ apiKey }) : null;

    if (!this.client) {
      this.logger.warn('ANTHROPIC_API_KEY not set - stages will answer with a placeholder');
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async createMessage(request: ModelRequest): Promise<ModelResponse> {
    if (!this.client) {
      throw new ModelBackendError('Model backend is not configured', this.modelName);
    }

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.modelName,
      max_tokens: PipelineLimits.STAGE_MAX_TOKENS,
      system: request.system,
      messages: request.messages.map(toMessageParam),
      tools: request.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: {
          type: 'object',
          properties: tool.inputSchema.properties,
          required: tool.inputSchema.required,
        },
      })),
    };
    const message = await this.callWithRetry(this.client, params, request.signal);

    return {
      text: extractText(message),
      toolCalls: message.content
        .filter((block): block is Anthropic.Messages.ToolUseBlock => block.type === 'tool_use')
        .map((block) => ({ id: block.id, name: block.name, input: block.input })),
      stopReason: message.stop_reason,
    };
  }

  private async callWithRetry(
    client: Anthropic,
    params: Anthropic.Messages.MessageCreateParamsNonStreaming,
    signal?: AbortSignal
  ): Promise<Anthropic.Messages.Message> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await client.messages.create(params, { signal });
      } catch (error) {
        const rateLimited = error instanceof Anthropic.APIError && error.status === 429;
        if (!rateLimited || attempt >= RATE_LIMIT_RETRIES || signal?.aborted) {
          throw new ModelBackendError(`Model call failed: ${getErrorMessage(error)}`, this.modelName, error);
        }
        this.logger.warn(`Rate limited, retrying in ${RATE_LIMIT_DELAY_MS * (attempt + 1)}ms`);
        await sleep(RATE_LIMIT_DELAY_MS * (attempt + 1));
      }
    }
  }
}
