import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  createEventName,
  ErrorEvent,
  PipelineLimits,
  StageName,
  StreamEventType,
  TurnResult,
  userMessage,
} from '@risk-router/shared/types';
import { getErrorMessage, SessionBusyError, TurnTimeoutError } from '@risk-router/shared/utils';
import { PipelineService } from '@risk-router/agent/core';
import { SessionManagerService } from '@risk-router/agent/session';

export interface ChatResult {
  sessionId: string;
  conversationId: string;
  response: string;
  visited: StageName[];
}

/**
 * ChatService
 *
 * Owns the turn boundary: one turn at a time per session, a wall-clock
 * timeout around the whole pipeline, and session teardown on any failure.
 * The transcript is only appended once the turn has fully succeeded.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly turnTimeoutMs: number;
  private readonly activeTurns = new Set<string>();

  constructor(
    private readonly pipeline: PipelineService,
    private readonly sessions: SessionManagerService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService
  ) {
    this.turnTimeoutMs = configService.get<number>('pipeline.turnTimeoutMs') ?? PipelineLimits.TURN_TIMEOUT_MS;
  }

  async chat(sessionId: string, message: string): Promise<ChatResult> {
    if (this.activeTurns.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }
    this.activeTurns.add(sessionId);

    const session = this.sessions.getOrCreate(sessionId);
    const context = { sessionId, conversationId: session.conversationId };
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TurnTimeoutError(this.turnTimeoutMs, sessionId));
      }, this.turnTimeoutMs);
    });

    try {
      const result: TurnResult = await Promise.race([
        this.pipeline.runTurn(context, session.transcript, message, { signal: controller.signal }),
        timeout,
      ]);

      if (this.sessions.has(sessionId)) {
        this.sessions.appendTurn(sessionId, userMessage(message), result.messages);
      } else {
        this.logger.log(`[${sessionId}] Sessions were cleared during the turn; transcript not kept`);
      }

      return {
        sessionId,
        conversationId: session.conversationId,
        response: result.response,
        visited: result.visited,
      };
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      this.logger.error(`[${sessionId}] Turn failed: ${errorMessage}`);
      this.sessions.discard(sessionId);

      const event: ErrorEvent = {
        type: StreamEventType.ERROR,
        sessionId,
        message: errorMessage,
        timestamp: new Date().toISOString(),
      };
      this.eventEmitter.emit(createEventName(sessionId), event);
      throw error;
    } finally {
      clearTimeout(timer);
      this.activeTurns.delete(sessionId);
    }
  }

  isBusy(sessionId: string): boolean {
    return this.activeTurns.has(sessionId);
  }

  clearSessions(): number {
    return this.sessions.clearAll();
  }
}
