import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { WORKFLOW_MESSAGE } from '@risk-router/shared/types';
import { reportTimestamp } from '@risk-router/agent/tools';
import { ChatService } from './chat.service';
import { WorkflowRunResponseDto } from './dto/workflow.dto';

export function workflowSessionId(now: Date): string {
  return `workflow_${reportTimestamp(now)}`;
}

/**
 * Runs the canned schedule analysis as an ordinary chat turn under its own session
 */
@Injectable()
export class WorkflowService {
  private readonly logger = new Logger(WorkflowService.name);

  constructor(private readonly chatService: ChatService) {}

  async run(sessionId: string, now: Date = new Date()): Promise<WorkflowRunResponseDto> {
    const workflowRunId = randomUUID();
    this.logger.log(`[${sessionId}] Workflow run ${workflowRunId} started`);

    const result = await this.chatService.chat(sessionId, WORKFLOW_MESSAGE);

    this.logger.log(`[${sessionId}] Workflow run ${workflowRunId} complete: ${result.visited.join(' → ')}`);
    return {
      status: 'success',
      report: result.response,
      workflowRunId,
      sessionId,
      conversationId: result.conversationId,
      timestamp: now.toISOString(),
    };
  }
}
