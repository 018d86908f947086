export * from './lib/backend/model-backend.interface';
export * from './lib/backend/anthropic-model.backend';
export * from './lib/routing/intent-classifier';
export * from './lib/routing/routing';
export * from './lib/stages/stage-registry';
export * from './lib/stages/stage-executor.service';
export * from './lib/pipeline/pipeline.service';
export * from './lib/pipeline/pipeline-stream.service';
export * from './lib/pipeline.module';
