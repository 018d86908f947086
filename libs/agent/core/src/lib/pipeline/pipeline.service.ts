import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  AssistantMessage,
  assistantMessage,
  createEventName,
  Message,
  PipelineState,
  StageName,
  StageState,
  StreamEventPayload,
  StreamEventType,
  TurnContext,
  TurnResult,
  USER_AGENT_NAME,
  USER_QUERY_ACTION,
  userMessage,
} from '@risk-router/shared/types';
import { getErrorMessage } from '@risk-router/shared/utils';
import { LogStoreService } from '@risk-router/persistence/log-store';
import { INTENT_CLASSIFIER, IntentClassifier } from '../routing/intent-classifier';
import { nextState } from '../routing/routing';
import { StageExecutorService } from '../stages/stage-executor.service';
import { getStageConfig } from '../stages/stage-registry';

export interface TurnOptions {
  signal?: AbortSignal;
}

// ROUTER plus the longest path (SCHEDULER → risk stage → REPORTING) fits well inside this
const MAX_TRANSITIONS = 8;

export function tagStageOutput(stage: StageName, content: string): string {
  return `${stage} > ${content}`;
}

function isStageState(state: PipelineState): state is StageState {
  return state !== PipelineState.ROUTER && state !== PipelineState.DONE;
}

/**
 * PipelineService
 *
 * Runs one turn of the routing state machine over a read-only transcript and
 * returns the assistant messages the turn produced. Progress is emitted as
 * `pipeline.{sessionId}` events; audit events are written best-effort.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly executor: StageExecutorService,
    private readonly logStore: LogStoreService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(INTENT_CLASSIFIER) private readonly classifier: IntentClassifier
  ) {}

  async runTurn(
    context: TurnContext,
    history: readonly Message[],
    message: string,
    options: TurnOptions = {}
  ): Promise<TurnResult> {
    const startTime = Date.now();
    const { sessionId, conversationId } = context;
    this.logger.log(`[${sessionId}] Turn started (conversation ${conversationId})`);

    this.emit(sessionId, {
      type: StreamEventType.TURN_STARTED,
      sessionId,
      conversationId,
      message,
      timestamp: new Date().toISOString(),
    });

    await this.logEvent(context, {
      agentName: USER_AGENT_NAME,
      action: USER_QUERY_ACTION,
      resultSummary: 'Processing user query',
      userQuery: message,
    });

    const transcript: Message[] = [...history, userMessage(message)];
    const produced: AssistantMessage[] = [];
    const visited: StageName[] = [];

    let state = nextState(PipelineState.ROUTER, transcript, this.classifier);
    for (let transitions = 0; isStageState(state); transitions++) {
      if (transitions >= MAX_TRANSITIONS) {
        throw new Error(`Routing did not terminate after ${MAX_TRANSITIONS} transitions`);
      }
      options.signal?.throwIfAborted();

      const stage = getStageConfig(state);
      this.emit(sessionId, {
        type: StreamEventType.STAGE_STARTED,
        sessionId,
        stage: stage.name,
        timestamp: new Date().toISOString(),
      });

      const output = await this.executor.runStage(state, transcript, context, { signal: options.signal });
      const content = output.available ? tagStageOutput(stage.name, output.content) : output.content;
      const appended = assistantMessage(content, stage.name);
      transcript.push(appended);
      produced.push(appended);
      visited.push(stage.name);

      await this.logEvent(context, {
        agentName: stage.name,
        action: stage.action,
        resultSummary: stage.resultSummary,
        agentOutput: content,
      });

      this.emit(sessionId, {
        type: StreamEventType.STAGE_COMPLETED,
        sessionId,
        stage: stage.name,
        content,
        timestamp: new Date().toISOString(),
      });

      state = nextState(state, transcript, this.classifier);
    }

    const response = produced.length > 0 ? produced[produced.length - 1].content : '';
    const duration = Date.now() - startTime;
    this.logger.log(`[${sessionId}] Turn complete: ${visited.join(' → ')} (${duration}ms)`);

    this.emit(sessionId, {
      type: StreamEventType.COMPLETE,
      sessionId,
      conversationId,
      response,
      visited,
      duration,
      timestamp: new Date().toISOString(),
    });

    return { messages: produced, response, visited };
  }

  private async logEvent(
    context: TurnContext,
    event: { agentName: string; action: string; resultSummary: string; userQuery?: string; agentOutput?: string }
  ): Promise<void> {
    try {
      await this.logStore.insertEvent({
        ...event,
        conversationId: context.conversationId,
        sessionId: context.sessionId,
      });
    } catch (error) {
      this.logger.warn(`[${context.sessionId}] Event "${event.action}" not logged: ${getErrorMessage(error)}`);
    }
  }

  private emit(sessionId: string, payload: StreamEventPayload): void {
    this.eventEmitter.emit(createEventName(sessionId), payload);
  }
}
