import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LogStoreModule } from '@risk-router/persistence/log-store';
import { ToolsModule } from '@risk-router/agent/tools';
import { MODEL_BACKEND } from './backend/model-backend.interface';
import { AnthropicModelBackend } from './backend/anthropic-model.backend';
import { INTENT_CLASSIFIER, KeywordIntentClassifier } from './routing/intent-classifier';
import { StageExecutorService } from './stages/stage-executor.service';
import { PipelineService } from './pipeline/pipeline.service';
import { PipelineStreamService } from './pipeline/pipeline-stream.service';

@Module({
  imports: [
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),
    LogStoreModule,
    ToolsModule,
  ],
  providers: [
    { provide: MODEL_BACKEND, useClass: AnthropicModelBackend },
    { provide: INTENT_CLASSIFIER, useClass: KeywordIntentClassifier },
    StageExecutorService,
    PipelineService,
    PipelineStreamService,
  ],
  exports: [PipelineService, PipelineStreamService, MODEL_BACKEND],
})
export class PipelineModule {}
