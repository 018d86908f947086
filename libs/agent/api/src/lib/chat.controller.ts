import { Body, Controller, Delete, HttpCode, Logger, Post, Req, Res } from '@nestjs/common';
import { Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { getErrorMessage, SessionBusyError, ValidationError } from '@risk-router/shared/utils';
import { PipelineStreamService, StreamResponse } from '@risk-router/agent/core';
import { ChatService } from './chat.service';
import { ChatRequestDto, ChatRequestSchema, ChatResponseDto } from './dto/chat.dto';
import { toHttpException } from './http-errors';

export type SseResponse = StreamResponse & Pick<Response, 'status' | 'setHeader'>;
export type SseRequest = Pick<Request, 'on'>;

/**
 * Chat Controller - one message exchange per request, keyed by session id
 *
 * - POST /api/chat            JSON reply once the turn finishes
 * - POST /api/chat/stream     same turn, stage progress streamed as SSE
 * - DELETE /api/sessions      drop every in-memory session
 */
@Controller('api')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(
    private chatService: ChatService,
    private streamService: PipelineStreamService
  ) {}

  @Post('chat')
  @HttpCode(200)
  async chat(@Body() body: unknown): Promise<ChatResponseDto> {
    const request = this.parseRequest(body);
    const sessionId = request.sessionId ?? randomUUID();
    this.logger.log(`[${sessionId}] Chat request received`);

    try {
      const result = await this.chatService.chat(sessionId, request.message);
      return {
        status: 'success',
        response: result.response,
        sessionId,
        conversationId: result.conversationId,
      };
    } catch (error) {
      throw toHttpException(error, sessionId);
    }
  }

  /**
   * Response: SSE stream with events (connected, turn_started, stage_started,
   * tool, stage_completed, complete, error)
   */
  @Post('chat/stream')
  async chatStream(@Body() body: unknown, @Req() req: SseRequest, @Res() res: SseResponse): Promise<void> {
    const request = this.parseRequest(body);
    const sessionId = request.sessionId ?? randomUUID();
    if (this.chatService.isBusy(sessionId)) {
      throw toHttpException(new SessionBusyError(sessionId), sessionId);
    }
    this.logger.log(`[${sessionId}] Starting chat turn with SSE streaming`);

    // MUST be 200, not 201, for EventSource compatibility
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');

    this.streamService.open(sessionId, res);

    req.on('close', () => {
      this.logger.log(`[${sessionId}] Client disconnected`);
      this.streamService.close(sessionId);
    });

    try {
      const result = await this.chatService.chat(sessionId, request.message);
      this.logger.log(`[${sessionId}] Streamed turn complete (${result.visited.join(' → ')})`);
    } catch (error) {
      // ChatService has already emitted the error event to the stream
      this.logger.warn(`[${sessionId}] Streamed turn failed: ${getErrorMessage(error)}`);
    } finally {
      // Normally already ended by the turn's complete or error event
      this.streamService.close(sessionId);
    }
  }

  @Delete('sessions')
  clearSessions(): { status: 'success'; cleared: number } {
    const cleared = this.chatService.clearSessions();
    this.logger.log(`Cleared ${cleared} session(s)`);
    return { status: 'success', cleared };
  }

  private parseRequest(body: unknown): ChatRequestDto {
    const parsed = ChatRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.') || 'body';
      throw toHttpException(new ValidationError(`Invalid ${field}: ${issue.message}`, { field }));
    }
    return parsed.data;
  }
}
