import { Module } from '@nestjs/common';
import { PipelineModule } from '@risk-router/agent/core';
import { SessionManagerModule } from '@risk-router/agent/session';
import { LogStoreModule } from '@risk-router/persistence/log-store';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { HistoryController } from './history.controller';
import { WorkflowController } from './workflow.controller';
import { WorkflowService } from './workflow.service';

@Module({
  imports: [PipelineModule, SessionManagerModule, LogStoreModule],
  controllers: [ChatController, HistoryController, WorkflowController],
  providers: [ChatService, WorkflowService],
  exports: [ChatService],
})
export class ApiModule {}
