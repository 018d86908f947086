import { Controller, HttpCode, Post } from '@nestjs/common';
import { WorkflowRunResponseDto } from './dto/workflow.dto';
import { toHttpException } from './http-errors';
import { WorkflowService, workflowSessionId } from './workflow.service';

@Controller('api/workflow')
export class WorkflowController {
  constructor(private workflowService: WorkflowService) {}

  @Post('run')
  @HttpCode(200)
  async run(): Promise<WorkflowRunResponseDto> {
    const now = new Date();
    const sessionId = workflowSessionId(now);
    try {
      return await this.workflowService.run(sessionId, now);
    } catch (error) {
      throw toHttpException(error, sessionId);
    }
  }
}
