import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  AGENT_NOT_AVAILABLE_MESSAGE,
  createEventName,
  ITERATION_LIMIT_MESSAGE,
  PipelineLimits,
  StageState,
  StreamEventType,
  ToolEvent,
  Transcript,
  TurnContext,
} from '@risk-router/shared/types';
import { ToolRegistry } from '@risk-router/agent/tools';
import { MODEL_BACKEND, ModelBackend, ModelContentBlock, ModelMessage } from '../backend/model-backend.interface';
import { getStageConfig } from './stage-registry';
import { lastUserMessage } from '../routing/intent-classifier';

export interface StageOutput {
  content: string;
  /** False when the backend was unavailable and content is the placeholder */
  available: boolean;
  iterations: number;
}

export interface StageRunOptions {
  signal?: AbortSignal;
}

const CONTINUE_PROMPT = 'Continue with your part of the analysis using the conversation above.';

/**
 * Model messages for a transcript: consecutive messages with the same role are
 * merged and the list always ends on a user message.
 */
export function toModelMessages(transcript: Transcript): ModelMessage[] {
  const messages: ModelMessage[] = [];
  for (const message of transcript) {
    const previous = messages[messages.length - 1];
    if (previous && previous.role === message.role && typeof previous.content === 'string') {
      previous.content = `${previous.content}\n\n${message.content}`;
    } else {
      messages.push({ role: message.role, content: message.content });
    }
  }
  if (messages.length === 0 || messages[messages.length - 1].role === 'assistant') {
    messages.push({ role: 'user', content: CONTINUE_PROMPT });
  }
  return messages;
}

/**
 * StageExecutorService
 *
 * Runs one stage as a bounded tool loop: the model answers or requests tools,
 * tool results are fed back, and a plain answer ends the loop. Hitting the
 * iteration cap returns whatever text the model produced last.
 */
@Injectable()
export class StageExecutorService {
  private readonly logger = new Logger(StageExecutorService.name);
  private readonly maxIterations: number;

  constructor(
    @Inject(MODEL_BACKEND) private readonly backend: ModelBackend,
    private readonly tools: ToolRegistry,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService
  ) {
    this.maxIterations =
      configService.get<number>('pipeline.stageMaxIterations') ?? PipelineLimits.STAGE_MAX_ITERATIONS;
  }

  async runStage(
    state: StageState,
    transcript: Transcript,
    context: TurnContext,
    options: StageRunOptions = {}
  ): Promise<StageOutput> {
    const stage = getStageConfig(state);

    if (!this.backend.isAvailable()) {
      this.logger.warn(`[${context.sessionId}] ${stage.name}: model backend unavailable`);
      return { content: AGENT_NOT_AVAILABLE_MESSAGE, available: false, iterations: 0 };
    }

    const messages = toModelMessages(transcript);
    const toolDefinitions = this.tools.getTools(stage.tools);
    const userQuery = lastUserMessage(transcript)?.content;
    let lastText = '';

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      options.signal?.throwIfAborted();

      const response = await this.backend.createMessage({
        system: stage.instructions,
        messages,
        tools: toolDefinitions,
        signal: options.signal,
      });

      if (response.text) {
        lastText = response.text;
      }

      if (response.toolCalls.length === 0) {
        this.logger.log(`[${context.sessionId}] ${stage.name} answered after ${iteration} iteration(s)`);
        return { content: response.text, available: true, iterations: iteration };
      }

      const assistantBlocks: ModelContentBlock[] = [];
      if (response.text) {
        assistantBlocks.push({ type: 'text', text: response.text });
      }
      const resultBlocks: ModelContentBlock[] = [];

      for (const call of response.toolCalls) {
        assistantBlocks.push({ type: 'tool_call', id: call.id, name: call.name, input: call.input });
        this.emitToolEvent(context, stage.name, call.name, call.id);

        const content = await this.tools.executeTool(call.name, call.input, {
          sessionId: context.sessionId,
          conversationId: context.conversationId,
          stage: stage.name,
          userQuery,
        });
        this.logger.debug(`[${context.sessionId}] ${call.name} returned ${content.length} chars`);
        resultBlocks.push({ type: 'tool_result', toolCallId: call.id, content });
      }

      messages.push({ role: 'assistant', content: assistantBlocks });
      messages.push({ role: 'user', content: resultBlocks });
    }

    this.logger.warn(`[${context.sessionId}] ${stage.name} hit the ${this.maxIterations} iteration limit`);
    return { content: lastText || ITERATION_LIMIT_MESSAGE, available: true, iterations: this.maxIterations };
  }

  private emitToolEvent(context: TurnContext, stage: ToolEvent['stage'], toolName: string, toolId: string): void {
    const event: ToolEvent = {
      type: StreamEventType.TOOL,
      sessionId: context.sessionId,
      stage,
      toolName,
      toolId,
      timestamp: new Date().toISOString(),
    };
    this.eventEmitter.emit(createEventName(context.sessionId), event);
  }
}
