export * from './lib/dto/chat.dto';
export * from './lib/dto/workflow.dto';
export * from './lib/http-errors';
export * from './lib/chat.service';
export * from './lib/workflow.service';
export * from './lib/chat.controller';
export * from './lib/history.controller';
export * from './lib/workflow.controller';
export * from './lib/api.module';
