import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Response } from 'express';
import {
  ConnectedEvent,
  PIPELINE_EVENT_PATTERN,
  StreamEventPayload,
  StreamEventType,
} from '@risk-router/shared/types';

/**
 * The part of an Express response an SSE stream writes to
 */
export type StreamResponse = Pick<Response, 'write' | 'end' | 'on'>;

interface TurnStream {
  res: StreamResponse;
  openedAt: number;
  forwarded: number;
}

const TERMINAL_EVENTS: ReadonlySet<StreamEventType> = new Set<StreamEventType>([StreamEventType.COMPLETE, StreamEventType.ERROR]);

export function formatSseEvent(payload: StreamEventPayload): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/**
 * Streams one turn's pipeline events to the client that started it.
 *
 * A stream opens with a `connected` event and ends itself after the turn's
 * `complete` or `error` event. Events for sessions without an open stream are dropped.
 */
@Injectable()
export class PipelineStreamService implements OnModuleDestroy {
  private readonly logger = new Logger(PipelineStreamService.name);
  private readonly streams = new Map<string, TurnStream>();
  private readonly onPipelineEvent = (payload: StreamEventPayload): void => this.forward(payload);

  constructor(private readonly eventEmitter: EventEmitter2) {
    this.eventEmitter.on(PIPELINE_EVENT_PATTERN, this.onPipelineEvent);
  }

  onModuleDestroy(): void {
    this.eventEmitter.off(PIPELINE_EVENT_PATTERN, this.onPipelineEvent);
    for (const sessionId of [...this.streams.keys()]) {
      this.close(sessionId);
    }
  }

  open(sessionId: string, res: StreamResponse): void {
    if (this.streams.has(sessionId)) {
      this.logger.warn(`[${sessionId}] Replacing a stream that was still open`);
      this.close(sessionId);
    }

    this.streams.set(sessionId, { res, openedAt: Date.now(), forwarded: 0 });
    res.on('close', () => this.detach(sessionId, res, 'client disconnected'));
    res.on('error', (error) => this.detach(sessionId, res, `connection error: ${error.message}`));

    const connected: ConnectedEvent = {
      type: StreamEventType.CONNECTED,
      sessionId,
      timestamp: new Date().toISOString(),
    };
    this.send(sessionId, connected);
  }

  close(sessionId: string): void {
    const stream = this.streams.get(sessionId);
    if (!stream) return;

    this.streams.delete(sessionId);
    try {
      stream.res.end();
    } catch (error) {
      this.logger.error(`[${sessionId}] Error ending stream:`, error);
    }
    this.logger.log(
      `[${sessionId}] Stream closed after ${stream.forwarded} event(s) in ${Date.now() - stream.openedAt}ms`
    );
  }

  isOpen(sessionId: string): boolean {
    return this.streams.has(sessionId);
  }

  get openCount(): number {
    return this.streams.size;
  }

  private forward(payload: StreamEventPayload): void {
    const sessionId = payload.sessionId;
    if (!sessionId) {
      this.logger.warn(`Dropping ${payload.type} event without a session`);
      return;
    }
    if (!this.streams.has(sessionId)) return;

    this.send(sessionId, payload);
    if (TERMINAL_EVENTS.has(payload.type)) {
      this.close(sessionId);
    }
  }

  private send(sessionId: string, payload: StreamEventPayload): void {
    const stream = this.streams.get(sessionId);
    if (!stream) return;

    try {
      stream.res.write(formatSseEvent(payload));
      stream.forwarded++;
    } catch (error) {
      this.logger.error(`[${sessionId}] Failed to write ${payload.type} event:`, error);
      this.close(sessionId);
    }
  }

  // A late close from an earlier response must not drop the current one
  private detach(sessionId: string, res: StreamResponse, reason: string): void {
    if (this.streams.get(sessionId)?.res !== res) return;
    this.streams.delete(sessionId);
    this.logger.log(`[${sessionId}] Stream detached: ${reason}`);
  }
}
