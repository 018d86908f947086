export * from './lib/enums';
export * from './lib/pipeline.types';
export * from './lib/risk.types';
export * from './lib/log-records.types';
export * from './lib/stream-events.types';
